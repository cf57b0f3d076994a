import type { UrlSource } from '../types.js';
import { hexValue } from './charTypes.js';
import type { CanonOutput } from './output.js';
import { codeUnitAt, encodeUtf8, readCodePoint } from './source.js';

const HEX_DIGITS = '0123456789ABCDEF';

export const PERCENT = 0x25;

export function appendEscapedByte(byte: number, output: CanonOutput): void {
  output.pushBack(PERCENT);
  output.pushBack(HEX_DIGITS.charCodeAt(byte >> 4));
  output.pushBack(HEX_DIGITS.charCodeAt(byte & 0x0f));
}

export function appendUtf8EscapedCodePoint(codePoint: number, output: CanonOutput): void {
  for (const byte of encodeUtf8(codePoint)) {
    appendEscapedByte(byte, output);
  }
}

export function appendUtf8CodePoint(codePoint: number, output: CanonOutput): void {
  output.append(encodeUtf8(codePoint));
}

export function decodeEscapedByte(source: UrlSource, index: number, end: number): number | undefined {
  if (index + 2 >= end || codeUnitAt(source, index) !== PERCENT) {
    return undefined;
  }

  const high = hexValue(codeUnitAt(source, index + 1));
  const low = hexValue(codeUnitAt(source, index + 2));
  if (high === undefined || low === undefined) {
    return undefined;
  }
  return (high << 4) | low;
}

export function appendSourceText(
  source: UrlSource,
  begin: number,
  end: number,
  output: CanonOutput,
): void {
  if (typeof source !== 'string') {
    output.append(source, begin, end);
    return;
  }
  for (let i = begin; i < end; ) {
    const { codePoint, next } = readCodePoint(source, i, end);
    appendUtf8CodePoint(codePoint, output);
    i = next;
  }
}
