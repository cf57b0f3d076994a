import {
  beginsWithDriveSpec,
  countConsecutiveSlashes,
  extractScheme,
  isUrlSlash,
  parseAfterScheme,
  parseFileAfterScheme,
  parsePath,
  trimUrl,
} from '../parse/parseUrl.js';
import {
  COMPONENT_NAMES,
  componentEnd,
  makeRange,
  parsedLength,
  shiftParsed,
  type CanonOptions,
  type CanonUrlResult,
  type Component,
  type ComponentName,
  type Parsed,
  type UrlSource,
} from '../types.js';
import { CHAR_SCHEME, isCharOfType, toLowerAscii } from './charTypes.js';
import { appendSourceText } from './escape.js';
import { doReplaceFileUrl } from './fileUrl.js';
import type { CanonOutput } from './output.js';
import { appendPathCharacters, canonicalizePath, fileCanonicalizePath } from './path.js';
import { canonicalizeQuery } from './query.js';
import { canonicalizeRef } from './ref.js';
import { copyBase, type ComponentOverrides } from './replacements.js';
import { schemeEquals } from './scheme.js';
import { codeUnitAt } from './source.js';
import { doReplaceStandardUrl } from './standardUrl.js';

const SLASH = 0x2f;
const COLON = 0x3a;

/**
 * Outcome of `isRelativeUrl`. A failed check means the reference cannot be used against
 * the base at all; a relative one carries the part of the reference to resolve.
 */
export type RelativeUrlCheck =
  | { readonly success: false }
  | { readonly success: true; readonly isRelative: false }
  | { readonly success: true; readonly isRelative: true; readonly component: Component };

const absolute: RelativeUrlCheck = { success: true, isRelative: false };
const unresolvable: RelativeUrlCheck = { success: false };

function relative(begin: number, end: number): RelativeUrlCheck {
  return { success: true, isRelative: true, component: makeRange(begin, end) };
}

/**
 * Decides whether `url` is relative to the canonical `base`. References without a usable
 * scheme are relative, which fails for a non-hierarchical base. A reference naming the
 * base's own scheme is still relative when fewer than two slashes follow the colon
 * (`http:foo`). On a `file:` base a leading drive letter (`c:/x`, `c|/x`) is a path.
 */
export function isRelativeUrl(
  base: UrlSource,
  baseParsed: Parsed,
  url: UrlSource,
  isBaseHierarchical: boolean,
): RelativeUrlCheck {
  const { begin, end } = trimUrl(url);

  if (begin >= end) {
    return isBaseHierarchical ? relative(begin, begin) : unresolvable;
  }

  if (
    isBaseHierarchical &&
    schemeEquals(base, baseParsed.scheme, 'file') &&
    beginsWithDriveSpec(url, begin, end)
  ) {
    return relative(begin, end);
  }

  const scheme = extractScheme(url, begin, end);
  if (!scheme || scheme.length === 0 || !isValidScheme(url, scheme)) {
    return isBaseHierarchical ? relative(begin, end) : unresolvable;
  }

  const sameScheme = baseParsed.scheme !== undefined && schemesMatch(base, baseParsed.scheme, url, scheme);
  if (!sameScheme || !isBaseHierarchical) {
    return absolute;
  }

  const afterColon = componentEnd(scheme) + 1;
  if (countConsecutiveSlashes(url, afterColon, end) < 2) {
    return relative(afterColon, end);
  }
  return absolute;
}

function isValidScheme(url: UrlSource, scheme: Component): boolean {
  for (let i = scheme.begin; i < componentEnd(scheme); i += 1) {
    if (!isCharOfType(codeUnitAt(url, i), CHAR_SCHEME)) {
      return false;
    }
  }
  return true;
}

function schemesMatch(base: UrlSource, baseScheme: Component, url: UrlSource, scheme: Component): boolean {
  if (baseScheme.length !== scheme.length) {
    return false;
  }
  let text = '';
  for (let i = scheme.begin; i < componentEnd(scheme); i += 1) {
    text += String.fromCharCode(toLowerAscii(codeUnitAt(url, i)));
  }
  return schemeEquals(base, baseScheme, text);
}

/**
 * Resolves the relative reference `relativeUrl[relativeComponent]` against the canonical,
 * hierarchical `base`. A base without a path or host cannot be resolved against: it is
 * echoed unchanged and the call fails.
 */
export function resolveRelativeUrl(
  base: UrlSource,
  baseParsed: Parsed,
  baseIsFile: boolean,
  relativeUrl: UrlSource,
  relativeComponent: Component,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  const basePath = baseParsed.path;
  if (!basePath || basePath.length === 0 || !baseParsed.host) {
    return copyBase(base, baseParsed, output);
  }

  if (relativeComponent.length === 0) {
    return copyWithoutRef(base, baseParsed, output);
  }

  const begin = relativeComponent.begin;
  const end = componentEnd(relativeComponent);
  const slashes = countConsecutiveSlashes(relativeUrl, begin, end);

  if (baseIsFile && (slashes >= 2 || beginsWithDriveSpec(relativeUrl, begin, end))) {
    const parsed = parseFileAfterScheme(relativeUrl, begin, end);
    const result = doReplaceFileUrl(
      base,
      baseParsed,
      overridesFrom(relativeUrl, parsed, ['host', 'path', 'query', 'ref']),
      output,
      options,
    );
    return collapseWrittenPath(output, result, true);
  }

  if (slashes >= 2) {
    const parsed = parseAfterScheme(relativeUrl, begin, end);
    const result = doReplaceStandardUrl(
      base,
      baseParsed,
      overridesFrom(relativeUrl, parsed, COMPONENT_NAMES.filter((name) => name !== 'scheme')),
      output,
      options,
    );
    return collapseWrittenPath(output, result, false);
  }

  return resolveRelativePath(base, baseParsed, baseIsFile, relativeUrl, relativeComponent, output, options);
}

function overridesFrom(
  source: UrlSource,
  parsed: Parsed,
  names: readonly ComponentName[],
): ComponentOverrides {
  const overrides: ComponentOverrides = {};
  for (const name of names) {
    overrides[name] = { source, component: parsed[name] };
  }
  return overrides;
}

function collapseWrittenPath(output: CanonOutput, result: CanonUrlResult, isFile: boolean): CanonUrlResult {
  const path = result.parsed.path;
  if (!path) {
    return result;
  }

  const pathEnd = componentEnd(path);
  const tail = output.substring(pathEnd, output.length);
  const collapsed = collapseDotSegments(output, path, isFile);
  output.appendAscii(tail);

  const moved = shiftParsed({ query: result.parsed.query, ref: result.parsed.ref }, componentEnd(collapsed) - pathEnd);
  return {
    success: result.success,
    parsed: { ...result.parsed, path: collapsed, query: moved.query, ref: moved.ref },
  };
}

function copyWithoutRef(base: UrlSource, baseParsed: Parsed, output: CanonOutput): CanonUrlResult {
  const offset = output.length;
  const end = baseParsed.ref ? baseParsed.ref.begin - 1 : parsedLength(baseParsed);
  appendSourceText(base, 0, end, output);
  const parsed = shiftParsed(baseParsed, offset);
  parsed.ref = undefined;
  return { success: true, parsed };
}

function resolveRelativePath(
  base: UrlSource,
  baseParsed: Parsed,
  baseIsFile: boolean,
  relativeUrl: UrlSource,
  relativeComponent: Component,
  output: CanonOutput,
  options: CanonOptions,
): CanonUrlResult {
  const basePath = baseParsed.path ?? makeRange(0, 0);
  const offset = output.length;
  const reference = parsePath(relativeUrl, relativeComponent);

  appendSourceText(base, 0, basePath.begin, output);
  const out = shiftParsed(
    {
      scheme: baseParsed.scheme,
      username: baseParsed.username,
      password: baseParsed.password,
      host: baseParsed.host,
      port: baseParsed.port,
    },
    offset,
  );
  let success = true;

  const pathBegin = output.length;
  if (reference.path) {
    if (isUrlSlash(codeUnitAt(relativeUrl, reference.path.begin))) {
      if (baseIsFile) {
        success = appendFileAbsolutePath(base, basePath, relativeUrl, reference.path, output);
      } else {
        success = canonicalizePath(relativeUrl, reference.path, output).success;
      }
    } else {
      const lastSlash = lastSlashIn(base, basePath);
      appendSourceText(base, basePath.begin, lastSlash + 1, output);
      success = appendPathCharacters(relativeUrl, reference.path.begin, componentEnd(reference.path), output);
    }
    out.path = collapseDotSegments(output, makeRange(pathBegin, output.length), baseIsFile);

    out.query = canonicalizeQuery(relativeUrl, reference.query, options.charsetConverter, output).component;
  } else {
    appendSourceText(base, basePath.begin, componentEnd(basePath), output);
    out.path = makeRange(pathBegin, output.length);

    if (reference.query) {
      out.query = canonicalizeQuery(relativeUrl, reference.query, options.charsetConverter, output).component;
    } else if (baseParsed.query) {
      out.query = copyQuery(base, baseParsed.query, output);
    }
  }

  out.ref = canonicalizeRef(relativeUrl, reference.ref, output).component;
  return { success, parsed: out };
}

// An absolute path without its own drive letter stays on the base's drive.
function appendFileAbsolutePath(
  base: UrlSource,
  basePath: Component,
  relativeUrl: UrlSource,
  path: Component,
  output: CanonOutput,
): boolean {
  const end = componentEnd(path);
  const driveBegin = path.begin + countConsecutiveSlashes(relativeUrl, path.begin, end);
  if (!beginsWithDriveSpec(relativeUrl, driveBegin, end) && baseHasDrive(base, basePath)) {
    appendSourceText(base, basePath.begin, basePath.begin + 3, output);
  }
  return fileCanonicalizePath(relativeUrl, path, output).success;
}

function baseHasDrive(base: UrlSource, path: Component): boolean {
  return (
    path.length >= 3 &&
    codeUnitAt(base, path.begin) === SLASH &&
    codeUnitAt(base, path.begin + 2) === COLON
  );
}

function lastSlashIn(base: UrlSource, path: Component): number {
  for (let i = componentEnd(path) - 1; i > path.begin; i -= 1) {
    if (codeUnitAt(base, i) === SLASH) {
      return i;
    }
  }
  return path.begin;
}

function copyQuery(base: UrlSource, query: Component, output: CanonOutput): Component {
  output.pushBack(0x3f);
  const begin = output.length;
  appendSourceText(base, query.begin, componentEnd(query), output);
  return makeRange(begin, output.length);
}

/**
 * Rewrites the canonical path just written at `path` with its dot segments removed and
 * returns its new range. A `file:` drive prefix (`/C:`) is kept out of reach of `..`.
 */
export function collapseDotSegments(output: CanonOutput, path: Component, isFile: boolean): Component {
  const text = output.substring(path.begin, componentEnd(path));
  const root = isFile && hasDrivePrefix(text) ? 3 : 0;
  const rest = text.slice(root);

  output.setLength(path.begin + root);
  output.appendAscii(rest.length === 0 ? rest : removeDotSegments(rest));
  return makeRange(path.begin, output.length);
}

function hasDrivePrefix(path: string): boolean {
  return path.length >= 3 && path.charCodeAt(0) === SLASH && path.charCodeAt(2) === COLON;
}

/** RFC 3986 section 5.2.4 over an absolute path; `..` at the root has no effect. */
export function removeDotSegments(path: string): string {
  const input = path.split('/');
  const segments: string[] = [];

  for (let i = 1; i < input.length; i += 1) {
    const segment = input[i] ?? '';
    const last = i === input.length - 1;
    if (segment === '.') {
      if (last) {
        segments.push('');
      }
    } else if (segment === '..') {
      segments.pop();
      if (last) {
        segments.push('');
      }
    } else {
      segments.push(segment);
    }
  }

  return `/${segments.join('/')}`;
}
