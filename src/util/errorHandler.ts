import {
  UrlCanonError,
  ensureUrlCanonError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  operation?: string;
  url?: string;
  base?: string;
  reference?: string;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

export function reportUrlCanonError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): UrlCanonError {
  const canonError = ensureUrlCanonError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const mergedDetails: Record<string, unknown> = {
    ...(canonError.details ?? {}),
    ...context,
  };

  const message = buildLogMessage(canonError, mergedDetails);
  const shouldThrow = options.throwOnFatal ?? true;
  const logger = getLogger();
  const bindings = { kind: canonError.kind, severity: canonError.severity, ...mergedDetails };

  if (canonError.severity === 'fatal') {
    logger.error(bindings, message);
    if (shouldThrow) {
      throw canonError;
    }
  } else {
    logger.warn(bindings, message);
  }

  return canonError;
}

export function buildLogMessage(error: UrlCanonError, details: Record<string, unknown>): string {
  const parts = [`[${error.kind}/${error.severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}
