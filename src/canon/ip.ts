import { makeRange, type Component, type UrlSource } from '../types.js';
import { CHAR_DEC, CHAR_HEX, CHAR_OCT, hexValue, isCharOfType } from './charTypes.js';
import type { CanonOutput } from './output.js';
import { codeUnitAt } from './source.js';

export type IPAddressFamily = 'ipv4' | 'ipv6';

export interface IPAddressResult {
  isIPAddress: boolean;
  family?: IPAddressFamily;
  component?: Component;
}

const MAX_IPV4 = 0xffffffff;

export function canonicalizeIPAddress(
  source: UrlSource,
  host: Component | undefined,
  output: CanonOutput,
): IPAddressResult {
  if (!host || host.length === 0) {
    return { isIPAddress: false };
  }

  let text = '';
  for (let i = host.begin; i < host.begin + host.length; i += 1) {
    const unit = codeUnitAt(source, i);
    if (!(unit < 0x80)) {
      return { isIPAddress: false };
    }
    text += String.fromCharCode(unit);
  }

  if (text.startsWith('[')) {
    if (!text.endsWith(']')) {
      return { isIPAddress: false };
    }
    const pieces = parseIPv6(text.slice(1, -1));
    if (!pieces) {
      return { isIPAddress: false };
    }
    return writeAddress(`[${serializeIPv6(pieces)}]`, 'ipv6', output);
  }

  const address = parseIPv4(text);
  if (address === undefined) {
    return { isIPAddress: false };
  }
  return writeAddress(serializeIPv4(address), 'ipv4', output);
}

function writeAddress(text: string, family: IPAddressFamily, output: CanonOutput): IPAddressResult {
  const begin = output.length;
  output.appendAscii(text);
  return { isIPAddress: true, family, component: makeRange(begin, output.length) };
}

/**
 * One to four dot-separated numbers (decimal, `0x` hex or leading-zero octal); the last
 * fills the remaining bytes, so `1.2.3` is 1.2.0.3. A single trailing dot is allowed.
 */
export function parseIPv4(text: string): number | undefined {
  const parts = text.split('.');
  if (parts.length > 1 && parts[parts.length - 1] === '') {
    parts.pop();
  }
  if (parts.length === 0 || parts.length > 4) {
    return undefined;
  }

  const values: number[] = [];
  for (const part of parts) {
    const value = parseIPv4Number(part);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }

  const last = values.length - 1;
  let address = 0;
  for (let i = 0; i < last; i += 1) {
    const value = values[i] ?? 0;
    if (value > 255) {
      return undefined;
    }
    address += value * 256 ** (3 - i);
  }

  const lastValue = values[last] ?? 0;
  if (lastValue >= 256 ** (4 - last)) {
    return undefined;
  }
  return address + lastValue;
}

function parseIPv4Number(part: string): number | undefined {
  if (part.length === 0) {
    return undefined;
  }

  let radix = 10;
  let digits = part;
  if (part.length >= 2 && part[0] === '0' && (part[1] === 'x' || part[1] === 'X')) {
    radix = 16;
    digits = part.slice(2);
  } else if (part.length > 1 && part[0] === '0') {
    radix = 8;
    digits = part.slice(1);
  }

  const type = radix === 16 ? CHAR_HEX : radix === 8 ? CHAR_OCT : CHAR_DEC;
  let value = 0;
  for (let i = 0; i < digits.length; i += 1) {
    const unit = digits.charCodeAt(i);
    const digit = hexValue(unit);
    if (!isCharOfType(unit, type) || digit === undefined) {
      return undefined;
    }
    value = value * radix + digit;
    if (value > MAX_IPV4) {
      return undefined;
    }
  }
  return value;
}

export function serializeIPv4(address: number): string {
  const octets: number[] = [];
  let remaining = address;
  for (let i = 0; i < 4; i += 1) {
    octets.unshift(remaining % 256);
    remaining = Math.floor(remaining / 256);
  }
  return octets.join('.');
}

export function parseIPv6(input: string): number[] | undefined {
  const address = [0, 0, 0, 0, 0, 0, 0, 0];
  const length = input.length;
  let pieceIndex = 0;
  let compress: number | undefined;
  let pointer = 0;
  const at = (index: number): string => input.charAt(index);

  if (at(0) === ':') {
    if (at(1) !== ':') {
      return undefined;
    }
    pointer = 2;
    pieceIndex = 1;
    compress = 1;
  }

  while (pointer < length) {
    if (pieceIndex === 8) {
      return undefined;
    }

    if (at(pointer) === ':') {
      if (compress !== undefined) {
        return undefined;
      }
      pointer += 1;
      pieceIndex += 1;
      compress = pieceIndex;
      continue;
    }

    let value = 0;
    let digits = 0;
    while (digits < 4 && pointer < length) {
      const digit = hexValue(input.charCodeAt(pointer));
      if (digit === undefined) {
        break;
      }
      value = value * 16 + digit;
      pointer += 1;
      digits += 1;
    }

    if (at(pointer) === '.') {
      if (digits === 0 || pieceIndex > 6) {
        return undefined;
      }
      pointer -= digits;
      const embedded = parseEmbeddedIPv4(input.slice(pointer));
      if (!embedded) {
        return undefined;
      }
      address[pieceIndex] = embedded[0];
      address[pieceIndex + 1] = embedded[1];
      pieceIndex += 2;
      pointer = length;
      break;
    }

    if (at(pointer) === ':') {
      pointer += 1;
      if (pointer >= length) {
        return undefined;
      }
    } else if (pointer < length) {
      return undefined;
    }

    address[pieceIndex] = value;
    pieceIndex += 1;
  }

  if (compress !== undefined) {
    let swaps = pieceIndex - compress;
    pieceIndex = 7;
    while (pieceIndex !== 0 && swaps > 0) {
      const target = compress + swaps - 1;
      const swapped = address[target] ?? 0;
      address[target] = address[pieceIndex] ?? 0;
      address[pieceIndex] = swapped;
      pieceIndex -= 1;
      swaps -= 1;
    }
  } else if (pieceIndex !== 8) {
    return undefined;
  }

  return address;
}

function parseEmbeddedIPv4(text: string): [number, number] | undefined {
  const parts = text.split('.');
  if (parts.length !== 4) {
    return undefined;
  }

  const octets: number[] = [];
  for (const part of parts) {
    if (!/^(0|[1-9][0-9]{0,2})$/.test(part)) {
      return undefined;
    }
    const value = Number(part);
    if (value > 255) {
      return undefined;
    }
    octets.push(value);
  }

  const [a = 0, b = 0, c = 0, d = 0] = octets;
  return [a * 256 + b, c * 256 + d];
}

export function serializeIPv6(pieces: readonly number[]): string {
  let bestStart = -1;
  let bestLength = 1;
  for (let i = 0; i < 8; ) {
    if (pieces[i] !== 0) {
      i += 1;
      continue;
    }
    let end = i;
    while (end < 8 && pieces[end] === 0) {
      end += 1;
    }
    if (end - i > bestLength) {
      bestStart = i;
      bestLength = end - i;
    }
    i = end;
  }

  let text = '';
  for (let i = 0; i < 8; i += 1) {
    if (i === bestStart) {
      text += i === 0 ? '::' : ':';
      i += bestLength - 1;
      continue;
    }
    text += (pieces[i] ?? 0).toString(16);
    if (i !== 7) {
      text += ':';
    }
  }
  return text;
}
