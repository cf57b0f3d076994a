import { makeRange, type CanonOptions, type CanonUrlResult, type ComponentName, type Parsed, type UrlSource } from '../types.js';
import { appendSourceText } from './escape.js';
import type { CanonOutput } from './output.js';
import { canonicalizeQuery } from './query.js';
import { canonicalizeRef } from './ref.js';
import {
  copyBase,
  overridesSchemeTo,
  setupOverrideComponents,
  toOverrides,
  uniformSources,
  type ComponentSources,
  type Replacements,
} from './replacements.js';
import { canonicalizeScheme } from './scheme.js';

const PATH_REPLACEABLE: readonly ComponentName[] = ['scheme', 'path'];

export function canonicalizePathUrl(
  spec: UrlSource,
  parsed: Parsed,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  return doCanonicalizePathUrl(uniformSources(spec), parsed, output, options);
}

function doCanonicalizePathUrl(
  sources: ComponentSources,
  parsed: Parsed,
  output: CanonOutput,
  options: CanonOptions,
): CanonUrlResult {
  const out: Parsed = {};

  const scheme = canonicalizeScheme(sources.scheme, parsed.scheme, output);
  out.scheme = scheme.component;

  if (parsed.path) {
    const begin = output.length;
    appendSourceText(sources.path, parsed.path.begin, parsed.path.begin + parsed.path.length, output);
    out.path = makeRange(begin, output.length);
  }

  out.query = canonicalizeQuery(sources.query, parsed.query, options.charsetConverter, output).component;
  out.ref = canonicalizeRef(sources.ref, parsed.ref, output).component;

  return { success: scheme.success, parsed: out };
}

export function replacePathUrl(
  base: UrlSource,
  baseParsed: Parsed,
  replacements: Replacements,
  output: CanonOutput,
  options: CanonOptions = {},
): CanonUrlResult {
  const overrides = toOverrides(replacements);
  if (overridesSchemeTo(overrides.scheme, 'file')) {
    return copyBase(base, baseParsed, output);
  }
  const { sources, parsed } = setupOverrideComponents(base, baseParsed, overrides, PATH_REPLACEABLE);
  return doCanonicalizePathUrl(sources, parsed, output, options);
}
