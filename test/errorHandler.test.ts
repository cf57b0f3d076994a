import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  createConfigurationError,
  createResolveError,
  ensureUrlCanonError,
} from '../src/errors.js';
import { resetLogger, setLoggerInstance, type LoggerLike } from '../src/logger.js';
import { reportUrlCanonError } from '../src/util/errorHandler.js';

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

describe('reportUrlCanonError', () => {
  it('logs recoverable errors at warn without throwing', () => {
    const error = createResolveError('cannot resolve', { base: 'javascript:void(0)' });

    expect(() => {
      reportUrlCanonError(error, { operation: 'resolve', reference: 'foo' });
    }).not.toThrow();

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      {
        kind: 'resolve',
        severity: 'recoverable',
        base: 'javascript:void(0)',
        operation: 'resolve',
        reference: 'foo',
      },
      '[resolve/recoverable] cannot resolve (base="javascript:void(0)" operation="resolve" reference="foo")',
    );
  });

  it('throws on fatal errors by default', () => {
    const fatalError = createConfigurationError('bad port');
    expect(() => reportUrlCanonError(fatalError, { operation: 'configure' })).toThrowError(fatalError);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('can suppress throwing on fatal errors when requested', () => {
    const fatalError = createConfigurationError('boom');
    expect(() =>
      reportUrlCanonError(fatalError, { operation: 'canonicalize' }, { throwOnFatal: false }),
    ).not.toThrow();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const result = reportUrlCanonError('oops', { operation: 'replace' }, { throwOnFatal: false });
    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.message).toBe('oops');
    expect(result.name).toBe('InternalError');
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe('ensureUrlCanonError', () => {
  it('returns existing errors unchanged', () => {
    const error = createResolveError('cannot resolve');
    expect(ensureUrlCanonError(error)).toBe(error);
  });

  it('keeps the original error as the cause', () => {
    const cause = new TypeError('bad input');
    const wrapped = ensureUrlCanonError(cause, { kind: 'canonicalize', severity: 'recoverable' });

    expect(wrapped.kind).toBe('canonicalize');
    expect(wrapped.severity).toBe('recoverable');
    expect(wrapped.message).toBe('bad input');
    expect(wrapped.cause).toBe(cause);
  });
});
