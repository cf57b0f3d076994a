import { canonicalizeFileUrl, replaceFileUrl } from './canon/fileUrl.js';
import { nodeIdnConverter } from './canon/idn.js';
import { RawCanonOutput } from './canon/output.js';
import { canonicalizePathUrl, replacePathUrl } from './canon/pathUrl.js';
import { isRelativeUrl, resolveRelativeUrl } from './canon/relative.js';
import type { Replacements } from './canon/replacements.js';
import { componentToString } from './canon/source.js';
import { canonicalizeStandardUrl, replaceStandardUrl } from './canon/standardUrl.js';
import {
  createCanonicalizeError,
  createConfigurationError,
  createReplaceError,
  createResolveError,
} from './errors.js';
import { extractScheme, parseFileUrl, parsePathUrl, parseStandardUrl } from './parse/parseUrl.js';
import type {
  CanonOptions,
  CanonUrlResult,
  CanonicalUrl,
  ComponentName,
  ResolvedUrlCanonConfig,
  UrlCanonConfig,
  UrlShape,
  UrlSource,
} from './types.js';
import { reportUrlCanonError } from './util/errorHandler.js';

const DEFAULT_STANDARD_SCHEMES: readonly string[] = ['http', 'https', 'ws', 'wss', 'ftp', 'gopher'];

const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  http: 80,
  https: 443,
  ws: 80,
  wss: 443,
  ftp: 21,
  gopher: 70,
};

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*$/;
const MAX_PORT = 65535;
const textDecoder = new TextDecoder('utf-8');

/**
 * Canonicalizes a whole URL. `file:` URLs, configured standard schemes and everything
 * else (opaque `scheme:path` URLs) each follow their own rules. An invalid result is
 * logged and returned with `valid: false`; this never throws for bad input.
 */
export function canonicalizeUrl(input: UrlSource, config: UrlCanonConfig = {}): CanonicalUrl {
  const resolved = resolveConfig(config);
  const url = canonicalizeWith(input, resolved);

  if (!url.valid) {
    reportUrlCanonError(
      createCanonicalizeError('URL could not be canonicalized.', { url: sourceText(input) }),
      { operation: 'canonicalize' },
    );
  }

  return url;
}

/** As `canonicalizeUrl`, but an invalid URL throws a recoverable `UrlCanonError`. */
export function requireCanonicalUrl(input: UrlSource, config: UrlCanonConfig = {}): CanonicalUrl {
  const url = canonicalizeWith(input, resolveConfig(config));
  if (!url.valid) {
    throw createCanonicalizeError(`Invalid URL: ${sourceText(input)}`, { url: sourceText(input), spec: url.spec });
  }
  return url;
}

/**
 * Resolves `reference` against `base`. An absolute reference is canonicalized on its
 * own. A reference that cannot be used against the base (anything relative against an
 * opaque base, or any reference against an invalid base) returns the base with
 * `valid: false`.
 */
export function resolveUrl(
  base: UrlSource | CanonicalUrl,
  reference: UrlSource,
  config: UrlCanonConfig = {},
): CanonicalUrl {
  const resolved = resolveConfig(config);
  const baseUrl = isUrlSource(base) ? canonicalizeWith(base, resolved) : base;
  const context = { operation: 'resolve', base: baseUrl.spec, reference: sourceText(reference) };

  if (!baseUrl.valid) {
    reportUrlCanonError(createResolveError('Base URL is not valid.'), context);
    return { ...baseUrl, valid: false };
  }

  const check = isRelativeUrl(baseUrl.bytes, baseUrl.parsed, reference, baseUrl.shape !== 'path');
  if (!check.success) {
    reportUrlCanonError(createResolveError('Reference cannot be resolved against this base.'), context);
    return { ...baseUrl, valid: false };
  }

  if (!check.isRelative) {
    const url = canonicalizeWith(reference, resolved);
    if (!url.valid) {
      reportUrlCanonError(createResolveError('Absolute reference is not valid.'), context);
    }
    return url;
  }

  const output = new RawCanonOutput();
  const result = resolveRelativeUrl(
    baseUrl.bytes,
    baseUrl.parsed,
    baseUrl.shape === 'file',
    reference,
    check.component,
    output,
    canonOptions(resolved),
  );
  const url = toCanonicalUrl(output, result, baseUrl.shape);

  if (!url.valid) {
    reportUrlCanonError(createResolveError('Resolved URL is not valid.'), context);
  }
  return url;
}

/**
 * Re-canonicalizes `url` with some components replaced. A scheme replacement may not
 * change the URL's shape; such a request returns the URL unchanged with `valid: false`.
 */
export function replaceUrlComponents(
  url: UrlSource | CanonicalUrl,
  replacements: Replacements,
  config: UrlCanonConfig = {},
): CanonicalUrl {
  const resolved = resolveConfig(config);
  const base = isUrlSource(url) ? canonicalizeWith(url, resolved) : url;
  const context = { operation: 'replace', url: base.spec };

  const scheme = replacements.scheme;
  if (scheme?.kind === 'delete') {
    reportUrlCanonError(createReplaceError('The scheme cannot be removed.'), context);
    return { ...base, valid: false };
  }
  if (scheme?.kind === 'replace' && shapeOfScheme(sourceText(scheme.value), resolved) !== base.shape) {
    reportUrlCanonError(
      createReplaceError('Scheme replacement would change the kind of URL.', {
        scheme: sourceText(scheme.value),
        shape: base.shape,
      }),
      context,
    );
    return { ...base, valid: false };
  }

  const output = new RawCanonOutput();
  const options = canonOptions(resolved);
  let result: CanonUrlResult;
  if (base.shape === 'file') {
    result = replaceFileUrl(base.bytes, base.parsed, replacements, output, options);
  } else if (base.shape === 'standard') {
    result = replaceStandardUrl(base.bytes, base.parsed, replacements, output, options);
  } else {
    result = replacePathUrl(base.bytes, base.parsed, replacements, output, options);
  }

  const replaced = toCanonicalUrl(output, result, base.shape);
  if (!replaced.valid) {
    reportUrlCanonError(createReplaceError('Replacement produced an invalid URL.'), context);
  }
  return replaced;
}

/** Decoded text of one component, or undefined when the URL has none. */
export function componentText(url: CanonicalUrl, name: ComponentName): string | undefined {
  const component = url.parsed[name];
  return component ? componentToString(url.bytes, component) : undefined;
}

export function resolveConfig(config: UrlCanonConfig = {}): ResolvedUrlCanonConfig {
  const standardSchemes = new Set<string>();
  for (const scheme of config.standardSchemes ?? DEFAULT_STANDARD_SCHEMES) {
    const name = coerceSchemeName(scheme, 'standardSchemes');
    if (name === 'file') {
      throw createConfigurationError('file cannot be configured as a standard scheme.', {
        field: 'standardSchemes',
      });
    }
    standardSchemes.add(name);
  }

  const defaultPorts = new Map<string, number>();
  for (const [scheme, port] of Object.entries({ ...DEFAULT_PORTS, ...config.defaultPorts })) {
    defaultPorts.set(coerceSchemeName(scheme, 'defaultPorts'), coercePort(port, scheme));
  }

  return {
    standardSchemes,
    defaultPorts,
    charsetConverter: config.charsetConverter,
    idnConverter: config.idnConverter ?? nodeIdnConverter,
  };
}

function coerceSchemeName(value: string, field: string): string {
  const name = value.toLowerCase();
  if (!SCHEME_PATTERN.test(name)) {
    throw createConfigurationError(`Invalid scheme name: ${JSON.stringify(value)}`, { value, field });
  }
  return name;
}

function coercePort(value: number, scheme: string): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_PORT) {
    throw createConfigurationError(`Default port for ${scheme} must be an integer from 0 to ${MAX_PORT}.`, {
      value,
      field: 'defaultPorts',
    });
  }
  return value;
}

function canonOptions(config: ResolvedUrlCanonConfig): CanonOptions {
  return {
    charsetConverter: config.charsetConverter,
    idnConverter: config.idnConverter,
    defaultPortForScheme: (scheme) => config.defaultPorts.get(scheme),
  };
}

function canonicalizeWith(input: UrlSource, config: ResolvedUrlCanonConfig): CanonicalUrl {
  const scheme = extractScheme(input);
  const shape = scheme
    ? shapeOfScheme(componentToString(input, scheme), config)
    : 'standard';

  const output = new RawCanonOutput();
  const options = canonOptions(config);
  let result: CanonUrlResult;
  if (shape === 'file') {
    result = canonicalizeFileUrl(input, parseFileUrl(input), output, options);
  } else if (shape === 'standard') {
    result = canonicalizeStandardUrl(input, parseStandardUrl(input), output, options);
  } else {
    result = canonicalizePathUrl(input, parsePathUrl(input), output, options);
  }

  return toCanonicalUrl(output, result, shape);
}

function shapeOfScheme(scheme: string, config: ResolvedUrlCanonConfig): UrlShape {
  const name = scheme.toLowerCase();
  if (name === 'file') {
    return 'file';
  }
  return config.standardSchemes.has(name) ? 'standard' : 'path';
}

function toCanonicalUrl(output: RawCanonOutput, result: CanonUrlResult, shape: UrlShape): CanonicalUrl {
  const bytes = output.data().slice();
  return {
    spec: textDecoder.decode(bytes),
    bytes,
    parsed: result.parsed,
    valid: result.success,
    shape,
  };
}

function isUrlSource(value: UrlSource | CanonicalUrl): value is UrlSource {
  return typeof value === 'string' || value instanceof Uint8Array;
}

function sourceText(source: UrlSource): string {
  return typeof source === 'string' ? source : textDecoder.decode(source);
}

export { configureLogger, getLogger, resetLogger, setLoggerInstance } from './logger.js';
export type { LoggerConfiguration, LoggerLike } from './logger.js';
export {
  UrlCanonError,
  createCanonicalizeError,
  createConfigurationError,
  createReplaceError,
  createResolveError,
  ensureUrlCanonError,
  isUrlCanonError,
} from './errors.js';
export type { ErrorKind, ErrorSeverity, UrlCanonErrorProps } from './errors.js';
export { reportUrlCanonError } from './util/errorHandler.js';

export { CanonOutputT, RawCanonOutput, RawCanonOutputT, RawCanonOutputW } from './canon/output.js';
export type { CanonOutput, CanonOutputW } from './canon/output.js';
export { canonicalizeScheme } from './canon/scheme.js';
export { canonicalizeUserInfo } from './canon/userInfo.js';
export { canonicalizeHost } from './canon/host.js';
export { canonicalizeIPAddress } from './canon/ip.js';
export { canonicalizePort } from './canon/port.js';
export { canonicalizePath, fileCanonicalizePath } from './canon/path.js';
export { canonicalizeQuery } from './canon/query.js';
export { canonicalizeRef } from './canon/ref.js';
export { canonicalizeStandardUrl, replaceStandardUrl } from './canon/standardUrl.js';
export { canonicalizeFileUrl, replaceFileUrl } from './canon/fileUrl.js';
export { canonicalizePathUrl, replacePathUrl } from './canon/pathUrl.js';
export { deleteComponent, keepComponent, replaceComponent } from './canon/replacements.js';
export type { ComponentReplacement, Replacements } from './canon/replacements.js';
export { isRelativeUrl, removeDotSegments, resolveRelativeUrl } from './canon/relative.js';
export type { RelativeUrlCheck } from './canon/relative.js';
export { nodeIdnConverter } from './canon/idn.js';
export {
  extractScheme,
  parseFileUrl,
  parsePathUrl,
  parsePort,
  parseStandardUrl,
} from './parse/parseUrl.js';
export type {
  CanonOptions,
  CanonUrlResult,
  CanonicalUrl,
  CharsetConverter,
  Component,
  ComponentName,
  ComponentResult,
  IdnConverter,
  Parsed,
  ResolvedUrlCanonConfig,
  UrlCanonConfig,
  UrlShape,
  UrlSource,
} from './types.js';
