import { makeRange, type Component, type ComponentResult, type UrlSource } from '../types.js';
import { appendEscapedByte, appendUtf8CodePoint } from './escape.js';
import type { CanonOutput } from './output.js';
import { readCodePoint } from './source.js';

const HASH = 0x23;

export function canonicalizeRef(
  source: UrlSource,
  ref: Component | undefined,
  output: CanonOutput,
): ComponentResult {
  if (!ref) {
    return { success: true, component: undefined };
  }

  output.pushBack(HASH);
  const begin = output.length;
  const end = ref.begin + ref.length;
  let success = true;

  for (let i = ref.begin; i < end; ) {
    const { codePoint, next, valid } = readCodePoint(source, i, end);
    if (codePoint >= 0x20) {
      appendUtf8CodePoint(codePoint, output);
    } else if (codePoint !== 0) {
      appendEscapedByte(codePoint, output);
    }
    success = valid && success;
    i = next;
  }

  return { success, component: makeRange(begin, output.length) };
}
