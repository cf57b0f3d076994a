// Character classes for the ASCII range; everything at or above 0x80 has no class.

export const CHAR_QUERY = 1;
export const CHAR_USERINFO = 2;
export const CHAR_PATH = 4;
export const CHAR_HOST = 8;
export const CHAR_SCHEME = 16;
export const CHAR_HEX = 32;
export const CHAR_DEC = 64;
export const CHAR_OCT = 128;

const ALNUM = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

const CHAR_TYPES = buildCharTypes();

function buildCharTypes(): Uint8Array {
  const table = new Uint8Array(0x80);
  const mark = (chars: string, type: number): void => {
    for (let i = 0; i < chars.length; i += 1) {
      table[chars.charCodeAt(i)] |= type;
    }
  };

  for (let ch = 0x21; ch < 0x7f; ch += 1) {
    table[ch] |= CHAR_QUERY | CHAR_PATH;
  }
  // Never literal in a query.
  for (const ch of '"#<>') {
    table[ch.charCodeAt(0)] &= ~CHAR_QUERY;
  }
  // Escaped in paths; '%' and '\' are handled by the path canonicalizer itself.
  for (const ch of '"#<>?`{}%\\') {
    table[ch.charCodeAt(0)] &= ~CHAR_PATH;
  }

  mark(ALNUM, CHAR_USERINFO | CHAR_HOST | CHAR_SCHEME);
  mark("!$&'()*+,-.;=_~%", CHAR_USERINFO);
  mark("-._~!$&'()*+,;=", CHAR_HOST);
  mark('+-.', CHAR_SCHEME);
  mark('0123456789abcdefABCDEF', CHAR_HEX);
  mark('0123456789', CHAR_DEC);
  mark('01234567', CHAR_OCT);

  return table;
}

export function isCharOfType(unit: number, type: number): boolean {
  return unit < 0x80 && ((CHAR_TYPES[unit] ?? 0) & type) !== 0;
}

export function isUnreserved(unit: number): boolean {
  return (
    (unit >= 0x30 && unit <= 0x39) ||
    (unit >= 0x41 && unit <= 0x5a) ||
    (unit >= 0x61 && unit <= 0x7a) ||
    unit === 0x2d ||
    unit === 0x2e ||
    unit === 0x5f ||
    unit === 0x7e
  );
}

export function toLowerAscii(unit: number): number {
  return unit >= 0x41 && unit <= 0x5a ? unit + 0x20 : unit;
}

export function toUpperAscii(unit: number): number {
  return unit >= 0x61 && unit <= 0x7a ? unit - 0x20 : unit;
}

export function isAsciiAlpha(unit: number): boolean {
  return (unit >= 0x41 && unit <= 0x5a) || (unit >= 0x61 && unit <= 0x7a);
}

export function hexValue(unit: number): number | undefined {
  if (unit >= 0x30 && unit <= 0x39) {
    return unit - 0x30;
  }
  if (unit >= 0x41 && unit <= 0x46) {
    return unit - 0x41 + 10;
  }
  if (unit >= 0x61 && unit <= 0x66) {
    return unit - 0x61 + 10;
  }
  return undefined;
}
