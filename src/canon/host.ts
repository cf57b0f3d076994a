import { makeRange, type Component, type IdnConverter, type UrlSource } from '../types.js';
import { CHAR_HOST, isCharOfType, toLowerAscii } from './charTypes.js';
import { PERCENT, appendUtf8EscapedCodePoint, decodeEscapedByte } from './escape.js';
import { nodeIdnConverter } from './idn.js';
import { canonicalizeIPAddress, type IPAddressFamily } from './ip.js';
import { RawCanonOutputW, type CanonOutput } from './output.js';
import { codeUnitAt, readCodePoint } from './source.js';

export interface HostResult {
  success: boolean;
  component: Component | undefined;
  isIPAddress: boolean;
  family?: IPAddressFamily;
}

interface UnescapedHost {
  text: string;
  valid: boolean;
}

export function isValidHostCharacter(unit: number): boolean {
  return isCharOfType(unit, CHAR_HOST);
}

/**
 * Appends the canonical host. Escapes are decoded first, then IP literals are tried;
 * anything else is a name: lower-cased, converted through `idnConverter` when it holds
 * non-ASCII text, and escaped (failing the host) wherever a character is not host-legal.
 * A missing or empty host writes nothing and succeeds.
 */
export function canonicalizeHost(
  source: UrlSource,
  host: Component | undefined,
  output: CanonOutput,
  idnConverter: IdnConverter = nodeIdnConverter,
): HostResult {
  if (!host || host.length === 0) {
    return { success: true, component: undefined, isIPAddress: false };
  }

  const unescaped = unescapeHost(source, host);
  let success = unescaped.valid;
  let name = unescaped.text;

  if (!isAsciiText(name)) {
    const converted = new RawCanonOutputW();
    if (!idnConverter.toAscii(name, converted)) {
      const begin = output.length;
      appendHostName(name, output);
      return { success: false, component: makeRange(begin, output.length), isIPAddress: false };
    }
    name = converted.toString();
  }

  const ip = canonicalizeIPAddress(name, makeRange(0, name.length), output);
  if (ip.isIPAddress) {
    return { success, component: ip.component, isIPAddress: true, family: ip.family };
  }

  const begin = output.length;
  success = appendHostName(name, output) && success;
  return { success, component: makeRange(begin, output.length), isIPAddress: false };
}

function unescapeHost(source: UrlSource, host: Component): UnescapedHost {
  const end = host.begin + host.length;
  let text = '';
  let valid = true;

  for (let i = host.begin; i < end; ) {
    if (codeUnitAt(source, i) === PERCENT) {
      const bytes: number[] = [];
      let byte = decodeEscapedByte(source, i, end);
      while (byte !== undefined) {
        bytes.push(byte);
        i += 3;
        byte = decodeEscapedByte(source, i, end);
      }

      if (bytes.length > 0) {
        const decoded = decodeUtf8Bytes(bytes);
        text += decoded.text;
        valid = decoded.valid && valid;
        continue;
      }
    }

    const { codePoint, next, valid: wellFormed } = readCodePoint(source, i, end);
    text += String.fromCodePoint(codePoint);
    valid = wellFormed && valid;
    i = next;
  }

  return { text, valid };
}

function decodeUtf8Bytes(bytes: number[]): UnescapedHost {
  const source = Uint8Array.from(bytes);
  let text = '';
  let valid = true;
  for (let i = 0; i < source.length; ) {
    const decoded = readCodePoint(source, i, source.length);
    text += String.fromCodePoint(decoded.codePoint);
    valid = decoded.valid && valid;
    i = decoded.next;
  }
  return { text, valid };
}

function appendHostName(name: string, output: CanonOutput): boolean {
  let success = true;
  for (let i = 0; i < name.length; ) {
    const { codePoint, next } = readCodePoint(name, i, name.length);
    if (isValidHostCharacter(codePoint)) {
      output.pushBack(toLowerAscii(codePoint));
    } else {
      appendUtf8EscapedCodePoint(toLowerAscii(codePoint), output);
      success = false;
    }
    i = next;
  }
  return success;
}

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) >= 0x80) {
      return false;
    }
  }
  return true;
}
