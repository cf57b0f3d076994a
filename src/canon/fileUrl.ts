import { makeRange, type CanonOptions, type CanonUrlResult, type ComponentName, type Parsed, type UrlSource } from '../types.js';
import { canonicalizeHost } from './host.js';
import type { CanonOutput } from './output.js';
import { fileCanonicalizePath } from './path.js';
import { canonicalizeQuery } from './query.js';
import { canonicalizeRef } from './ref.js';
import {
  copyBase,
  overridesSchemeTo,
  setupOverrideComponents,
  toOverrides,
  uniformSources,
  type ComponentOverrides,
  type ComponentSources,
  type Replacements,
} from './replacements.js';
import { canonicalizeScheme } from './scheme.js';

const FILE_REPLACEABLE: readonly ComponentName[] = ['scheme', 'host', 'path', 'query', 'ref'];

/**
 * `file://[host]/path[?query][#ref]`. User info and port are never written; an empty
 * host is kept as a present, zero-length range.
 */
export function canonicalizeFileUrl(
  spec: UrlSource,
  parsed: Parsed,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  return doCanonicalizeFileUrl(uniformSources(spec), parsed, output, options);
}

export function doCanonicalizeFileUrl(
  sources: ComponentSources,
  parsed: Parsed,
  output: CanonOutput,
  options: CanonOptions,
): CanonUrlResult {
  const out: Parsed = {};

  const scheme = canonicalizeScheme(sources.scheme, parsed.scheme, output);
  out.scheme = scheme.component;
  let success = scheme.success;

  output.appendAscii('//');

  const hostBegin = output.length;
  const host = canonicalizeHost(sources.host, parsed.host, output, options.idnConverter);
  out.host = host.component ?? makeRange(hostBegin, hostBegin);
  success = host.success && success;

  const path = fileCanonicalizePath(sources.path, parsed.path, output);
  out.path = path.component;
  success = path.success && success;

  out.query = canonicalizeQuery(sources.query, parsed.query, options.charsetConverter, output).component;
  out.ref = canonicalizeRef(sources.ref, parsed.ref, output).component;

  return { success, parsed: out };
}

export function replaceFileUrl(
  base: UrlSource,
  baseParsed: Parsed,
  replacements: Replacements,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  return doReplaceFileUrl(base, baseParsed, toOverrides(replacements), output, options);
}

export function doReplaceFileUrl(
  base: UrlSource,
  baseParsed: Parsed,
  overrides: ComponentOverrides,
  output: CanonOutput,
  options: CanonOptions,
): CanonUrlResult {
  if (overrides.scheme && !overridesSchemeTo(overrides.scheme, 'file')) {
    return copyBase(base, baseParsed, output);
  }
  const { sources, parsed } = setupOverrideComponents(base, baseParsed, overrides, FILE_REPLACEABLE);
  return doCanonicalizeFileUrl(sources, parsed, output, options);
}
