import { makeRange, type CharsetConverter, type Component, type ComponentResult, type UrlSource } from '../types.js';
import { CHAR_QUERY, isCharOfType } from './charTypes.js';
import { appendEscapedByte, appendUtf8EscapedCodePoint } from './escape.js';
import { RawCanonOutput, type CanonOutput } from './output.js';
import { codeUnitAt, readCodePoint } from './source.js';

const QUESTION = 0x3f;

/**
 * Appends `?query` when a query is present, even an empty one. Non-ASCII text goes
 * through `converter` (UTF-8 when none is given) and the resulting bytes are escaped.
 * Malformed input becomes U+FFFD; this never fails.
 */
export function canonicalizeQuery(
  source: UrlSource,
  query: Component | undefined,
  converter: CharsetConverter | undefined,
  output: CanonOutput,
): ComponentResult {
  if (!query) {
    return { success: true, component: undefined };
  }

  output.pushBack(QUESTION);
  const begin = output.length;
  const end = query.begin + query.length;

  if (converter && !isAsciiRange(source, query.begin, end)) {
    appendConvertedQuery(source, query.begin, end, converter, output);
  } else {
    for (let i = query.begin; i < end; ) {
      const { codePoint, next } = readCodePoint(source, i, end);
      appendQueryCodePoint(codePoint, output);
      i = next;
    }
  }

  return { success: true, component: makeRange(begin, output.length) };
}

function appendQueryCodePoint(codePoint: number, output: CanonOutput): void {
  if (isCharOfType(codePoint, CHAR_QUERY)) {
    output.pushBack(codePoint);
  } else if (codePoint < 0x80) {
    appendEscapedByte(codePoint, output);
  } else {
    appendUtf8EscapedCodePoint(codePoint, output);
  }
}

function appendConvertedQuery(
  source: UrlSource,
  begin: number,
  end: number,
  converter: CharsetConverter,
  output: CanonOutput,
): void {
  let text = '';
  for (let i = begin; i < end; ) {
    const { codePoint, next } = readCodePoint(source, i, end);
    text += String.fromCodePoint(codePoint);
    i = next;
  }

  const converted = new RawCanonOutput();
  converter.convertFromUtf16(text, converted);

  for (const byte of converted.data()) {
    if (isCharOfType(byte, CHAR_QUERY)) {
      output.pushBack(byte);
    } else {
      appendEscapedByte(byte, output);
    }
  }
}

function isAsciiRange(source: UrlSource, begin: number, end: number): boolean {
  for (let i = begin; i < end; i += 1) {
    if (codeUnitAt(source, i) >= 0x80) {
      return false;
    }
  }
  return true;
}
