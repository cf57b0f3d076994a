import { describe, expect, it } from 'vitest';

import { canonicalizeHost } from '../src/canon/host.js';
import {
  canonicalizeIPAddress,
  parseIPv4,
  parseIPv6,
  serializeIPv4,
  serializeIPv6,
} from '../src/canon/ip.js';
import { RawCanonOutput } from '../src/canon/output.js';
import type { IdnConverter, UrlSource } from '../src/types.js';

function host(text: UrlSource, idnConverter?: IdnConverter) {
  const output = new RawCanonOutput();
  const result = canonicalizeHost(text, { begin: 0, length: text.length }, output, idnConverter);
  return { text: output.toString(), ...result };
}

describe('canonicalizeHost', () => {
  it('lower-cases host names', () => {
    const result = host('WWW.Example.COM');
    expect(result.text).toBe('www.example.com');
    expect(result.success).toBe(true);
    expect(result.isIPAddress).toBe(false);
    expect(result.component).toEqual({ begin: 0, length: 15 });
  });

  it('gives hex and decimal forms of one IPv4 address the same text', () => {
    const hex = host('0x1.0x1.0x1.0x1');
    const decimal = host('1.1.1.1');

    expect(hex.text).toBe('1.1.1.1');
    expect(decimal.text).toBe('1.1.1.1');
    expect(hex.family).toBe('ipv4');
  });

  it('keeps a canonical IPv6 literal as it is', () => {
    const result = host('[::1]');
    expect(result.text).toBe('[::1]');
    expect(result.isIPAddress).toBe(true);
    expect(result.family).toBe('ipv6');
  });

  it('compresses and lower-cases IPv6 literals', () => {
    expect(host('[0:0:0:0:0:0:0:1]').text).toBe('[::1]');
    expect(host('[2001:DB8::1]').text).toBe('[2001:db8::1]');
  });

  it('never takes a name for an IP literal', () => {
    const result = host('example.com');
    expect(result.isIPAddress).toBe(false);
    expect(result.text).toBe('example.com');
  });

  it('falls back to a name when an IPv4 part is out of range', () => {
    const result = host('256.1.1.1');
    expect(result.isIPAddress).toBe(false);
    expect(result.text).toBe('256.1.1.1');
    expect(result.success).toBe(true);
  });

  it('decodes escapes before classifying the host', () => {
    expect(host('%41bc').text).toBe('abc');
    expect(host('%31%32%37.0.0.1').text).toBe('127.0.0.1');
  });

  it('escapes characters a host cannot hold and fails', () => {
    const result = host('ex ample');
    expect(result.text).toBe('ex%20ample');
    expect(result.success).toBe(false);
  });

  it('converts Unicode names through IDNA', () => {
    expect(host('bücher.de').text).toBe('xn--bcher-kva.de');
  });

  it('accepts 8-bit input with escaped UTF-8', () => {
    const bytes = new TextEncoder().encode('B%C3%BCcher.de');
    expect(host(bytes).text).toBe('xn--bcher-kva.de');
  });

  it('fails when the IDN converter rejects the name', () => {
    const rejecting: IdnConverter = { toAscii: () => false };
    const result = host('ü', rejecting);
    expect(result.text).toBe('%C3%BC');
    expect(result.success).toBe(false);
  });

  it('writes nothing for an empty host', () => {
    const output = new RawCanonOutput();
    const result = canonicalizeHost('', { begin: 0, length: 0 }, output);
    expect(output.length).toBe(0);
    expect(result).toEqual({ success: true, component: undefined, isIPAddress: false });
  });
});

describe('IPv4', () => {
  it('lets the last part fill the remaining bytes', () => {
    expect(serializeIPv4(parseIPv4('1.2.3') ?? -1)).toBe('1.2.0.3');
    expect(serializeIPv4(parseIPv4('3232235521') ?? -1)).toBe('192.168.0.1');
  });

  it('reads octal parts and one trailing dot', () => {
    expect(serializeIPv4(parseIPv4('0300.0250.0.1') ?? -1)).toBe('192.168.0.1');
    expect(serializeIPv4(parseIPv4('192.168.0.1.') ?? -1)).toBe('192.168.0.1');
  });

  it('rejects malformed addresses', () => {
    expect(parseIPv4('1.2.3.4.5')).toBeUndefined();
    expect(parseIPv4('1..2')).toBeUndefined();
    expect(parseIPv4('08.1.1.1')).toBeUndefined();
    expect(parseIPv4('1.2.65536')).toBeUndefined();
  });

  it('reports non-literals without writing anything', () => {
    const output = new RawCanonOutput();
    expect(canonicalizeIPAddress('example.com', { begin: 0, length: 11 }, output)).toEqual({
      isIPAddress: false,
    });
    expect(output.length).toBe(0);
  });
});

describe('IPv6', () => {
  it('parses an embedded IPv4 tail', () => {
    const pieces = parseIPv6('::ffff:192.168.0.1');
    expect(pieces).toEqual([0, 0, 0, 0, 0, 0xffff, 0xc0a8, 0x0001]);
    expect(serializeIPv6(pieces ?? [])).toBe('::ffff:c0a8:1');
  });

  it('compresses the first of two equally long zero runs', () => {
    expect(serializeIPv6([1, 0, 0, 2, 0, 0, 3, 4])).toBe('1::2:0:0:3:4');
  });

  it('does not compress a single zero piece', () => {
    expect(serializeIPv6([1, 0, 2, 3, 4, 5, 6, 7])).toBe('1:0:2:3:4:5:6:7');
  });

  it('rejects malformed literals', () => {
    expect(parseIPv6('1:2:3')).toBeUndefined();
    expect(parseIPv6('1::2::3')).toBeUndefined();
    expect(parseIPv6('12345::')).toBeUndefined();
    expect(parseIPv6('::1.2.3')).toBeUndefined();
  });
});
