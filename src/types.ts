import type { CanonOutput, CanonOutputW } from './canon/output.js';

/** 8-bit (UTF-8) or wide (UTF-16) source text. Offsets count code units of the form used. */
export type UrlSource = string | Uint8Array;

/** A `[begin, begin + length)` range into a source. A missing component is `undefined`. */
export interface Component {
  readonly begin: number;
  readonly length: number;
}

export interface Parsed {
  scheme?: Component;
  username?: Component;
  password?: Component;
  host?: Component;
  port?: Component;
  path?: Component;
  query?: Component;
  ref?: Component;
}

export type ComponentName = keyof Parsed;

export const COMPONENT_NAMES: readonly ComponentName[] = [
  'scheme',
  'username',
  'password',
  'host',
  'port',
  'path',
  'query',
  'ref',
];

export type UrlShape = 'standard' | 'file' | 'path';

export interface ComponentResult {
  success: boolean;
  component: Component | undefined;
}

export interface CanonUrlResult {
  success: boolean;
  parsed: Parsed;
}

/**
 * Re-encodes query text into another character set, appending the bytes to `output`.
 * Must not fail: a character the target set cannot represent becomes `%26%23<decimal>%3B`.
 */
export interface CharsetConverter {
  convertFromUtf16(input: string, output: CanonOutput): void;
}

/**
 * Converts a Unicode host name to its ASCII (IDNA) form. `output` is empty on entry.
 * Returns false on invalid input; the output is then unspecified.
 */
export interface IdnConverter {
  toAscii(input: string, output: CanonOutputW): boolean;
}

/** Per-call collaborators for the canonicalizers. */
export interface CanonOptions {
  charsetConverter?: CharsetConverter;
  idnConverter?: IdnConverter;
  defaultPortForScheme?: (scheme: string) => number | undefined;
}

export function makeRange(begin: number, end: number): Component {
  return { begin, length: end - begin };
}

export function componentEnd(component: Component): number {
  return component.begin + component.length;
}

export function isNonEmpty(component: Component | undefined): component is Component {
  return component !== undefined && component.length > 0;
}

/** Offset just past the last present component; the length of the URL a Parsed describes. */
export function parsedLength(parsed: Parsed): number {
  let end = 0;
  for (const name of COMPONENT_NAMES) {
    const component = parsed[name];
    if (component) {
      end = Math.max(end, componentEnd(component));
    }
  }
  return end;
}

/** `parsed` with every present component moved `offset` units along. */
export function shiftParsed(parsed: Parsed, offset: number): Parsed {
  const shifted: Parsed = {};
  for (const name of COMPONENT_NAMES) {
    const component = parsed[name];
    if (component) {
      shifted[name] = { begin: component.begin + offset, length: component.length };
    }
  }
  return shifted;
}

export interface UrlCanonConfig {
  /** Schemes canonicalized as `scheme://authority/path`. Replaces the default list. */
  standardSchemes?: readonly string[];
  /** Merged over the default table; a scheme's default port is never written. */
  defaultPorts?: Readonly<Record<string, number>>;
  charsetConverter?: CharsetConverter;
  idnConverter?: IdnConverter;
}

export interface ResolvedUrlCanonConfig {
  standardSchemes: ReadonlySet<string>;
  defaultPorts: ReadonlyMap<string, number>;
  charsetConverter?: CharsetConverter;
  idnConverter: IdnConverter;
}

/** A canonicalization result; `parsed` ranges count bytes of `bytes`. */
export interface CanonicalUrl {
  spec: string;
  bytes: Uint8Array;
  parsed: Parsed;
  /** False when the text is only a best-effort rendering, not fit for navigation. */
  valid: boolean;
  shape: UrlShape;
}
