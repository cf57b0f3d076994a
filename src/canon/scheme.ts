import { makeRange, type Component, type ComponentResult, type UrlSource } from '../types.js';
import { CHAR_SCHEME, isCharOfType, toLowerAscii } from './charTypes.js';
import { appendUtf8EscapedCodePoint } from './escape.js';
import type { CanonOutput } from './output.js';
import { codeUnitAt, readCodePoint } from './source.js';

const COLON = 0x3a;

export function canonicalizeScheme(
  source: UrlSource,
  scheme: Component | undefined,
  output: CanonOutput,
): ComponentResult {
  const begin = output.length;

  if (!scheme || scheme.length === 0) {
    output.pushBack(COLON);
    return { success: false, component: makeRange(begin, begin) };
  }

  let success = true;
  const end = scheme.begin + scheme.length;
  for (let i = scheme.begin; i < end; ) {
    const { codePoint, next } = readCodePoint(source, i, end);
    if (isCharOfType(codePoint, CHAR_SCHEME)) {
      output.pushBack(toLowerAscii(codePoint));
    } else {
      appendUtf8EscapedCodePoint(codePoint, output);
      success = false;
    }
    i = next;
  }

  const component = makeRange(begin, output.length);
  output.pushBack(COLON);
  return { success, component };
}

export function schemeEquals(
  source: UrlSource,
  scheme: Component | undefined,
  expected: string,
): boolean {
  if (!scheme || scheme.length !== expected.length) {
    return false;
  }
  for (let i = 0; i < expected.length; i += 1) {
    if (toLowerAscii(codeUnitAt(source, scheme.begin + i)) !== expected.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}
