import { makeRange, type Component, type ComponentResult, type UrlSource } from '../types.js';
import { parsePort } from '../parse/parseUrl.js';
import { appendUtf8EscapedCodePoint } from './escape.js';
import type { CanonOutput } from './output.js';
import { readCodePoint } from './source.js';

const COLON = 0x3a;

export function canonicalizePort(
  source: UrlSource,
  port: Component | undefined,
  defaultPortForScheme: number | undefined,
  output: CanonOutput,
): ComponentResult {
  const value = parsePort(source, port);

  if (value === 'unspecified' || value === defaultPortForScheme) {
    return { success: true, component: undefined };
  }

  output.pushBack(COLON);
  const begin = output.length;

  if (value === 'invalid') {
    appendInvalidPort(source, port, output);
    return { success: false, component: makeRange(begin, output.length) };
  }

  output.appendAscii(String(value));
  return { success: true, component: makeRange(begin, output.length) };
}

function appendInvalidPort(source: UrlSource, port: Component | undefined, output: CanonOutput): void {
  if (!port) {
    return;
  }
  const end = port.begin + port.length;
  for (let i = port.begin; i < end; ) {
    const { codePoint, next } = readCodePoint(source, i, end);
    if (codePoint > 0x20 && codePoint < 0x7f && codePoint !== 0x25) {
      output.pushBack(codePoint);
    } else {
      appendUtf8EscapedCodePoint(codePoint, output);
    }
    i = next;
  }
}
