import {
  COMPONENT_NAMES,
  componentEnd,
  isNonEmpty,
  type CanonOptions,
  type CanonUrlResult,
  type Parsed,
  type UrlSource,
} from '../types.js';
import { canonicalizeHost } from './host.js';
import type { CanonOutput } from './output.js';
import { canonicalizePath } from './path.js';
import { canonicalizePort } from './port.js';
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
import { canonicalizeUserInfo } from './userInfo.js';

export function canonicalizeStandardUrl(
  spec: UrlSource,
  parsed: Parsed,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  return doCanonicalizeStandardUrl(uniformSources(spec), parsed, output, options);
}

export function doCanonicalizeStandardUrl(
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

  const userInfo = canonicalizeUserInfo(
    sources.username,
    parsed.username,
    sources.password,
    parsed.password,
    output,
  );
  out.username = userInfo.username;
  out.password = userInfo.password;
  success = userInfo.success && success;

  const host = canonicalizeHost(sources.host, parsed.host, output, options.idnConverter);
  out.host = host.component;
  success = host.success && isNonEmpty(host.component) && success;

  const schemeText = out.scheme ? output.substring(out.scheme.begin, componentEnd(out.scheme)) : '';
  const port = canonicalizePort(
    sources.port,
    parsed.port,
    options.defaultPortForScheme?.(schemeText),
    output,
  );
  out.port = port.component;
  success = port.success && success;

  const path = canonicalizePath(sources.path, parsed.path, output);
  out.path = path.component;
  success = path.success && success;

  out.query = canonicalizeQuery(sources.query, parsed.query, options.charsetConverter, output).component;
  out.ref = canonicalizeRef(sources.ref, parsed.ref, output).component;

  return { success, parsed: out };
}

export function replaceStandardUrl(
  base: UrlSource,
  baseParsed: Parsed,
  replacements: Replacements,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  return doReplaceStandardUrl(base, baseParsed, toOverrides(replacements), output, options);
}

export function doReplaceStandardUrl(
  base: UrlSource,
  baseParsed: Parsed,
  overrides: ComponentOverrides,
  output: CanonOutput,
  options: CanonOptions,
): CanonUrlResult {
  if (overridesSchemeTo(overrides.scheme, 'file')) {
    return copyBase(base, baseParsed, output);
  }
  const { sources, parsed } = setupOverrideComponents(base, baseParsed, overrides, COMPONENT_NAMES);
  return doCanonicalizeStandardUrl(sources, parsed, output, options);
}
