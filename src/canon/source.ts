import type { Component, UrlSource } from '../types.js';

export const REPLACEMENT_CHARACTER = 0xfffd;

export interface DecodedCodePoint {
  codePoint: number;
  next: number;
  valid: boolean;
}

export function sourceLength(source: UrlSource): number {
  return source.length;
}

export function codeUnitAt(source: UrlSource, index: number): number {
  if (typeof source === 'string') {
    return source.charCodeAt(index);
  }
  return source[index] ?? Number.NaN;
}

export function readCodePoint(source: UrlSource, index: number, end: number): DecodedCodePoint {
  return typeof source === 'string'
    ? readUtf16(source, index, end)
    : readUtf8(source, index, end);
}

function readUtf16(source: string, index: number, end: number): DecodedCodePoint {
  const unit = source.charCodeAt(index);

  if (unit < 0xd800 || unit > 0xdfff) {
    return { codePoint: unit, next: index + 1, valid: true };
  }

  if (unit <= 0xdbff && index + 1 < end) {
    const trail = source.charCodeAt(index + 1);
    if (trail >= 0xdc00 && trail <= 0xdfff) {
      const codePoint = 0x10000 + ((unit - 0xd800) << 10) + (trail - 0xdc00);
      return { codePoint, next: index + 2, valid: true };
    }
  }

  return { codePoint: REPLACEMENT_CHARACTER, next: index + 1, valid: false };
}

function readUtf8(source: Uint8Array, index: number, end: number): DecodedCodePoint {
  const lead = source[index] ?? 0;
  const invalid = { codePoint: REPLACEMENT_CHARACTER, next: index + 1, valid: false };

  if (lead < 0x80) {
    return { codePoint: lead, next: index + 1, valid: true };
  }

  let count: number;
  let codePoint: number;
  let min: number;
  if (lead >= 0xc2 && lead <= 0xdf) {
    count = 1;
    codePoint = lead & 0x1f;
    min = 0x80;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    count = 2;
    codePoint = lead & 0x0f;
    min = 0x800;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    count = 3;
    codePoint = lead & 0x07;
    min = 0x10000;
  } else {
    return invalid;
  }

  if (index + count >= end) {
    return invalid;
  }

  for (let i = 1; i <= count; i += 1) {
    const trail = source[index + i] ?? 0;
    if ((trail & 0xc0) !== 0x80) {
      return invalid;
    }
    codePoint = (codePoint << 6) | (trail & 0x3f);
  }

  if (codePoint < min || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return invalid;
  }

  return { codePoint, next: index + count + 1, valid: true };
}

/** UTF-8 bytes of a code point; surrogates and out-of-range values encode U+FFFD. */
export function encodeUtf8(codePoint: number): number[] {
  if (codePoint < 0x80) {
    return [codePoint];
  }
  if (codePoint < 0x800) {
    return [0xc0 | (codePoint >> 6), 0x80 | (codePoint & 0x3f)];
  }
  if ((codePoint >= 0xd800 && codePoint <= 0xdfff) || codePoint > 0x10ffff) {
    return encodeUtf8(REPLACEMENT_CHARACTER);
  }
  if (codePoint < 0x10000) {
    return [
      0xe0 | (codePoint >> 12),
      0x80 | ((codePoint >> 6) & 0x3f),
      0x80 | (codePoint & 0x3f),
    ];
  }
  return [
    0xf0 | (codePoint >> 18),
    0x80 | ((codePoint >> 12) & 0x3f),
    0x80 | ((codePoint >> 6) & 0x3f),
    0x80 | (codePoint & 0x3f),
  ];
}

export function componentToString(source: UrlSource, component: Component): string {
  const end = component.begin + component.length;
  if (typeof source === 'string') {
    return source.slice(component.begin, end);
  }

  let text = '';
  for (let i = component.begin; i < end; ) {
    const decoded = readUtf8(source, i, end);
    text += String.fromCodePoint(decoded.codePoint);
    i = decoded.next;
  }
  return text;
}
