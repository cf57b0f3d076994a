import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  UrlCanonError,
  canonicalizeUrl,
  componentText,
  replaceComponent,
  replaceUrlComponents,
  requireCanonicalUrl,
  resetLogger,
  resolveConfig,
  resolveUrl,
  setLoggerInstance,
  type LoggerLike,
} from '../src/index.js';

function createFakeLogger() {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: (): LoggerLike => logger,
  };
  return logger;
}

let logger: ReturnType<typeof createFakeLogger>;

beforeEach(() => {
  logger = createFakeLogger();
  setLoggerInstance(logger);
});

afterEach(() => {
  resetLogger();
});

describe('canonicalizeUrl', () => {
  it('canonicalizes a standard URL', () => {
    const url = canonicalizeUrl('HTTP://Example.COM:80/a/./b?x#y');

    expect(url.spec).toBe('http://example.com/a/./b?x#y');
    expect(url.valid).toBe(true);
    expect(url.shape).toBe('standard');
    expect(componentText(url, 'host')).toBe('example.com');
    expect(componentText(url, 'port')).toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('picks the file and opaque shapes by scheme', () => {
    expect(canonicalizeUrl('file:c|/x')).toMatchObject({ spec: 'file:///C:/x', shape: 'file', valid: true });
    expect(canonicalizeUrl('Mailto:Someone@Example.com')).toMatchObject({
      spec: 'mailto:Someone@Example.com',
      shape: 'path',
    });
  });

  it('omits default ports from the scheme table', () => {
    expect(canonicalizeUrl('https://h:443/').spec).toBe('https://h/');
    expect(canonicalizeUrl('wss://h:443/').spec).toBe('wss://h/');
    expect(canonicalizeUrl('https://h:80/').spec).toBe('https://h:80/');
  });

  it('honours configured default ports and standard schemes', () => {
    expect(canonicalizeUrl('http://h:8080/', { defaultPorts: { http: 8080 } }).spec).toBe('http://h/');
    expect(canonicalizeUrl('http://h:80/', { defaultPorts: { http: 8080 } }).spec).toBe('http://h:80/');
    expect(canonicalizeUrl('Custom://Host/x', { standardSchemes: ['custom'] }).spec).toBe('custom://host/x');
    expect(canonicalizeUrl('Custom://Host/x').spec).toBe('custom://Host/x');
  });

  it('decodes the UTF-8 fragment in component text', () => {
    const url = canonicalizeUrl('http://h/#größe');
    expect(componentText(url, 'ref')).toBe('größe');
  });

  it('reports an invalid URL without throwing', () => {
    const url = canonicalizeUrl('http://exa mple/');

    expect(url.spec).toBe('http://exa%20mple/');
    expect(url.valid).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      {
        kind: 'canonicalize',
        severity: 'recoverable',
        url: 'http://exa mple/',
        operation: 'canonicalize',
      },
      '[canonicalize/recoverable] URL could not be canonicalized. (operation="canonicalize" url="http://exa mple/")',
    );
  });
});

describe('requireCanonicalUrl', () => {
  it('returns valid URLs', () => {
    expect(requireCanonicalUrl('http://h').spec).toBe('http://h/');
  });

  it('throws a recoverable error for invalid ones', () => {
    expect(() => requireCanonicalUrl('http://exa mple/')).toThrowError(UrlCanonError);
    try {
      requireCanonicalUrl('http://exa mple/');
    } catch (error) {
      expect(error).toMatchObject({ kind: 'canonicalize', severity: 'recoverable' });
    }
  });
});

describe('resolveUrl', () => {
  it('resolves relative references', () => {
    expect(resolveUrl('http://a/b/c/d;p?q', '../../../g').spec).toBe('http://a/g');
    expect(resolveUrl('http://a/b/c/d;p?q', 'g').spec).toBe('http://a/b/c/g');
    expect(resolveUrl('http://a/b/c/d;p?q', '?y').spec).toBe('http://a/b/c/d;p?y');
  });

  it('accepts an already canonical base', () => {
    const base = canonicalizeUrl('http://a/b/c');
    expect(resolveUrl(base, 'd').spec).toBe('http://a/b/d');
  });

  it('canonicalizes absolute references on their own', () => {
    const url = resolveUrl('http://a/b', 'mailto:x@y');
    expect(url).toMatchObject({ spec: 'mailto:x@y', shape: 'path', valid: true });
  });

  it('resolves against file bases', () => {
    expect(resolveUrl('file:///C:/dir/', '../x').spec).toBe('file:///C:/x');
  });

  it('resolves a drive path to the same text as canonicalizing it', () => {
    const resolved = resolveUrl('file:///C:/dir/x.txt', '/c|/foo');

    expect(resolved.spec).toBe('file:///C:/foo');
    expect(resolved.spec).toBe(canonicalizeUrl('file:///c|/foo').spec);
  });

  it('returns an opaque base unchanged for a relative reference', () => {
    const url = resolveUrl('javascript:void(0)', 'foo');

    expect(url.spec).toBe('javascript:void(0)');
    expect(url.valid).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('replaceUrlComponents', () => {
  it('deletes a query replaced with empty text', () => {
    const url = replaceUrlComponents('http://example.com/?a=1', { query: replaceComponent('') });
    expect(url.spec).toBe('http://example.com/');
    expect(url.valid).toBe(true);
  });

  it('switches between standard schemes', () => {
    expect(replaceUrlComponents('http://example.com/?a=1', { scheme: replaceComponent('https') }).spec).toBe(
      'https://example.com/?a=1',
    );
  });

  it('drops a port that becomes the default of the new scheme', () => {
    expect(replaceUrlComponents('http://example.com:443/', { scheme: replaceComponent('https') }).spec).toBe(
      'https://example.com/',
    );
  });

  it('refuses a scheme that changes the kind of URL', () => {
    const url = replaceUrlComponents('http://example.com/', { scheme: replaceComponent('mailto') });

    expect(url.spec).toBe('http://example.com/');
    expect(url.valid).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('resolveConfig', () => {
  it('fills in the defaults', () => {
    const config = resolveConfig();
    expect([...config.standardSchemes]).toEqual(['http', 'https', 'ws', 'wss', 'ftp', 'gopher']);
    expect(config.defaultPorts.get('gopher')).toBe(70);
  });

  it('rejects file as a standard scheme', () => {
    expect(() => resolveConfig({ standardSchemes: ['file'] })).toThrowError(UrlCanonError);
  });

  it('rejects malformed scheme names and ports', () => {
    expect(() => resolveConfig({ standardSchemes: ['1bad'] })).toThrowError(/Invalid scheme name/);
    expect(() => resolveConfig({ defaultPorts: { http: 70000 } })).toThrowError(/must be an integer/);
    expect(() => resolveConfig({ defaultPorts: { http: 1.5 } })).toThrowError(/must be an integer/);
  });

  it('raises configuration errors as fatal', () => {
    try {
      resolveConfig({ standardSchemes: ['file'] });
    } catch (error) {
      expect(error).toMatchObject({ kind: 'config', severity: 'fatal' });
    }
    expect.assertions(1);
  });
});
