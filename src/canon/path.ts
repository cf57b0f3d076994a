import { makeRange, type Component, type ComponentResult, type UrlSource } from '../types.js';
import { beginsWithDriveSpec, countConsecutiveSlashes, isUrlSlash } from '../parse/parseUrl.js';
import { CHAR_PATH, isCharOfType, isUnreserved, toUpperAscii } from './charTypes.js';
import {
  PERCENT,
  appendEscapedByte,
  appendUtf8EscapedCodePoint,
  decodeEscapedByte,
} from './escape.js';
import type { CanonOutput } from './output.js';
import { codeUnitAt, readCodePoint } from './source.js';

const SLASH = 0x2f;
const BACKSLASH = 0x5c;
const COLON = 0x3a;

export function canonicalizePath(
  source: UrlSource,
  path: Component | undefined,
  output: CanonOutput,
): ComponentResult {
  const begin = output.length;

  if (!path || path.length === 0) {
    output.pushBack(SLASH);
    return { success: true, component: makeRange(begin, output.length) };
  }

  if (!isUrlSlash(codeUnitAt(source, path.begin))) {
    output.pushBack(SLASH);
  }
  const success = appendPathCharacters(source, path.begin, path.begin + path.length, output);
  return { success, component: makeRange(begin, output.length) };
}

export function fileCanonicalizePath(
  source: UrlSource,
  path: Component | undefined,
  output: CanonOutput,
): ComponentResult {
  if (!path || path.length === 0) {
    return canonicalizePath(source, path, output);
  }

  const end = path.begin + path.length;
  const driveBegin = path.begin + countConsecutiveSlashes(source, path.begin, end);
  if (!beginsWithDriveSpec(source, driveBegin, end)) {
    return canonicalizePath(source, path, output);
  }

  const begin = output.length;
  output.pushBack(SLASH);
  output.pushBack(toUpperAscii(codeUnitAt(source, driveBegin)));
  output.pushBack(COLON);
  const success = appendPathCharacters(source, driveBegin + 2, end, output);
  return { success, component: makeRange(begin, output.length) };
}

/**
 * Escapes `[begin, end)` onto the output without adding a leading slash. 8-bit input
 * above 0x7F is escaped byte for byte without checking that it is valid UTF-8.
 */
export function appendPathCharacters(
  source: UrlSource,
  begin: number,
  end: number,
  output: CanonOutput,
): boolean {
  let success = true;

  for (let i = begin; i < end; ) {
    const unit = codeUnitAt(source, i);

    if (unit === BACKSLASH) {
      output.pushBack(SLASH);
      i += 1;
    } else if (unit === PERCENT) {
      const byte = decodeEscapedByte(source, i, end);
      if (byte === undefined) {
        output.pushBack(PERCENT);
        i += 1;
      } else {
        if (isUnreserved(byte)) {
          output.pushBack(byte);
        } else {
          appendEscapedByte(byte, output);
        }
        i += 3;
      }
    } else if (unit < 0x80) {
      if (isCharOfType(unit, CHAR_PATH)) {
        output.pushBack(unit);
      } else {
        appendEscapedByte(unit, output);
      }
      i += 1;
    } else if (typeof source !== 'string') {
      appendEscapedByte(unit, output);
      i += 1;
    } else {
      const { codePoint, next, valid } = readCodePoint(source, i, end);
      appendUtf8EscapedCodePoint(codePoint, output);
      success = valid && success;
      i = next;
    }
  }

  return success;
}
