import { isAsciiAlpha } from '../canon/charTypes.js';
import { codeUnitAt, sourceLength } from '../canon/source.js';
import { makeRange, type Component, type Parsed, type UrlSource } from '../types.js';

// Splits URL text into component ranges. Nothing here validates or rewrites content;
// that is the canonicalizers' job.

const COLON = 0x3a;
const SLASH = 0x2f;
const BACKSLASH = 0x5c;
const QUESTION = 0x3f;
const HASH = 0x23;
const AT = 0x40;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

export const MAX_PORT = 65535;

export type PortValue = number | 'unspecified' | 'invalid';

export interface TrimmedRange {
  begin: number;
  end: number;
}

export function isUrlSlash(unit: number): boolean {
  return unit === SLASH || unit === BACKSLASH;
}

function shouldTrimFromUrl(unit: number): boolean {
  return unit <= 0x20;
}

/** Drops leading and trailing whitespace and control characters. */
export function trimUrl(spec: UrlSource, begin = 0, end = sourceLength(spec)): TrimmedRange {
  let first = begin;
  let last = end;
  while (first < last && shouldTrimFromUrl(codeUnitAt(spec, first))) {
    first += 1;
  }
  while (last > first && shouldTrimFromUrl(codeUnitAt(spec, last - 1))) {
    last -= 1;
  }
  return { begin: first, end: last };
}

export function countConsecutiveSlashes(spec: UrlSource, begin: number, end: number): number {
  let count = 0;
  while (begin + count < end && isUrlSlash(codeUnitAt(spec, begin + count))) {
    count += 1;
  }
  return count;
}

/** The text before the first colon, once leading whitespace is skipped. */
export function extractScheme(
  spec: UrlSource,
  begin = 0,
  end = sourceLength(spec),
): Component | undefined {
  let first = begin;
  while (first < end && shouldTrimFromUrl(codeUnitAt(spec, first))) {
    first += 1;
  }

  for (let i = first; i < end; i += 1) {
    if (codeUnitAt(spec, i) === COLON) {
      return makeRange(first, i);
    }
  }
  return undefined;
}

/** `c:` or `c|` at `begin`, followed by the end of input or a slash. */
export function beginsWithDriveSpec(spec: UrlSource, begin: number, end: number): boolean {
  if (begin + 1 >= end) {
    return false;
  }
  const separator = codeUnitAt(spec, begin + 1);
  if (!isAsciiAlpha(codeUnitAt(spec, begin)) || (separator !== COLON && separator !== 0x7c)) {
    return false;
  }
  return begin + 2 === end || isUrlSlash(codeUnitAt(spec, begin + 2));
}

export function parseStandardUrl(spec: UrlSource): Parsed {
  const { begin, end } = trimUrl(spec);
  const scheme = extractScheme(spec, begin, end);
  const afterScheme = scheme ? scheme.begin + scheme.length + 1 : begin;
  const parsed = parseAfterScheme(spec, afterScheme, end);
  parsed.scheme = scheme;
  return parsed;
}

/** Authority and everything after it; the slashes before the authority may be missing. */
export function parseAfterScheme(spec: UrlSource, afterScheme: number, end: number): Parsed {
  const afterSlashes = afterScheme + countConsecutiveSlashes(spec, afterScheme, end);

  let authorityEnd = afterSlashes;
  while (authorityEnd < end && !isAuthorityTerminator(codeUnitAt(spec, authorityEnd))) {
    authorityEnd += 1;
  }

  const parsed = parseAuthority(spec, makeRange(afterSlashes, authorityEnd));
  const fullPath = authorityEnd < end ? makeRange(authorityEnd, end) : undefined;
  return { ...parsed, ...parsePath(spec, fullPath) };
}

function isAuthorityTerminator(unit: number): boolean {
  return isUrlSlash(unit) || unit === QUESTION || unit === HASH;
}

export function parseAuthority(
  spec: UrlSource,
  authority: Component,
): Pick<Parsed, 'username' | 'password' | 'host' | 'port'> {
  if (authority.length === 0) {
    return {};
  }

  const end = authority.begin + authority.length;
  let at = end - 1;
  while (at > authority.begin && codeUnitAt(spec, at) !== AT) {
    at -= 1;
  }

  if (codeUnitAt(spec, at) === AT) {
    return {
      ...parseUserInfo(spec, makeRange(authority.begin, at)),
      ...parseServerInfo(spec, makeRange(at + 1, end)),
    };
  }

  return parseServerInfo(spec, authority);
}

function parseUserInfo(spec: UrlSource, userInfo: Component): Pick<Parsed, 'username' | 'password'> {
  const end = userInfo.begin + userInfo.length;
  for (let i = userInfo.begin; i < end; i += 1) {
    if (codeUnitAt(spec, i) === COLON) {
      return { username: makeRange(userInfo.begin, i), password: makeRange(i + 1, end) };
    }
  }
  return { username: userInfo };
}

function parseServerInfo(spec: UrlSource, serverInfo: Component): Pick<Parsed, 'host' | 'port'> {
  if (serverInfo.length === 0) {
    return {};
  }

  const end = serverInfo.begin + serverInfo.length;
  // A leading bracket makes the whole text an IPv6 literal until a closing bracket shows up.
  let ipv6Terminator = codeUnitAt(spec, serverInfo.begin) === OPEN_BRACKET ? end : -1;
  let colon = -1;
  for (let i = serverInfo.begin; i < end; i += 1) {
    const unit = codeUnitAt(spec, i);
    if (unit === CLOSE_BRACKET) {
      ipv6Terminator = i;
    } else if (unit === COLON) {
      colon = i;
    }
  }

  if (colon > ipv6Terminator) {
    const host = makeRange(serverInfo.begin, colon);
    return {
      host: host.length > 0 ? host : undefined,
      port: makeRange(colon + 1, end),
    };
  }

  return { host: serverInfo };
}

/** Splits `path?query#ref`. An empty path is reported as missing; empty query and ref are kept. */
export function parsePath(
  spec: UrlSource,
  fullPath: Component | undefined,
): Pick<Parsed, 'path' | 'query' | 'ref'> {
  if (!fullPath) {
    return {};
  }

  const end = fullPath.begin + fullPath.length;
  let querySeparator = -1;
  let refSeparator = -1;
  for (let i = fullPath.begin; i < end; i += 1) {
    const unit = codeUnitAt(spec, i);
    if (unit === QUESTION && refSeparator < 0 && querySeparator < 0) {
      querySeparator = i;
    } else if (unit === HASH && refSeparator < 0) {
      refSeparator = i;
    }
  }

  const result: Pick<Parsed, 'path' | 'query' | 'ref'> = {};
  let pathEnd = end;
  let queryEnd = end;

  if (refSeparator >= 0) {
    pathEnd = refSeparator;
    queryEnd = refSeparator;
    result.ref = makeRange(refSeparator + 1, end);
  }

  if (querySeparator >= 0) {
    pathEnd = querySeparator;
    result.query = makeRange(querySeparator + 1, queryEnd);
  }

  if (pathEnd !== fullPath.begin) {
    result.path = makeRange(fullPath.begin, pathEnd);
  }

  return result;
}

/**
 * File URLs: exactly two slashes introduce a host; any other count (or a drive letter
 * right after the slashes) means there is no host and the path starts at the last slash.
 */
export function parseFileUrl(spec: UrlSource): Parsed {
  const { begin, end } = trimUrl(spec);
  const scheme = extractScheme(spec, begin, end);
  const afterScheme = scheme ? scheme.begin + scheme.length + 1 : begin;
  return { scheme, ...parseFileAfterScheme(spec, afterScheme, end) };
}

/** The part of a file URL after `file:`; also used for file references resolved against a file base. */
export function parseFileAfterScheme(spec: UrlSource, afterScheme: number, end: number): Parsed {
  const slashes = countConsecutiveSlashes(spec, afterScheme, end);
  const afterSlashes = afterScheme + slashes;

  if (slashes === 2 && !beginsWithDriveSpec(spec, afterSlashes, end)) {
    let hostEnd = afterSlashes;
    while (hostEnd < end && !isAuthorityTerminator(codeUnitAt(spec, hostEnd))) {
      hostEnd += 1;
    }
    const host = makeRange(afterSlashes, hostEnd);
    const rest = hostEnd < end ? makeRange(hostEnd, end) : undefined;
    return { host: host.length > 0 ? host : undefined, ...parsePath(spec, rest) };
  }

  const pathBegin = slashes > 0 ? afterSlashes - 1 : afterScheme;
  const rest = pathBegin < end ? makeRange(pathBegin, end) : undefined;
  return parsePath(spec, rest);
}

/** Opaque URLs such as `javascript:`; the scheme-specific part is a path plus query and ref. */
export function parsePathUrl(spec: UrlSource): Parsed {
  const { begin, end } = trimUrl(spec);
  const scheme = extractScheme(spec, begin, end);
  const afterScheme = scheme ? scheme.begin + scheme.length + 1 : begin;
  const rest = afterScheme < end ? makeRange(afterScheme, end) : undefined;
  return { scheme, ...parsePath(spec, rest) };
}

/** Leading zeros do not count towards the five-digit limit. */
export function parsePort(spec: UrlSource, port: Component | undefined): PortValue {
  if (!port || port.length === 0) {
    return 'unspecified';
  }

  const end = port.begin + port.length;
  let first = port.begin;
  while (first < end && codeUnitAt(spec, first) === 0x30) {
    first += 1;
  }

  if (first === end) {
    return 0;
  }
  if (end - first > 5) {
    return 'invalid';
  }

  let value = 0;
  for (let i = first; i < end; i += 1) {
    const unit = codeUnitAt(spec, i);
    if (unit < 0x30 || unit > 0x39) {
      return 'invalid';
    }
    value = value * 10 + (unit - 0x30);
  }

  return value > MAX_PORT ? 'invalid' : value;
}
