export type ErrorKind = 'canonicalize' | 'resolve' | 'replace' | 'config' | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface UrlCanonErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class UrlCanonError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: UrlCanonErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isUrlCanonError(value: unknown): value is UrlCanonError {
  return value instanceof UrlCanonError;
}

export function ensureUrlCanonError(
  error: unknown,
  fallback: Partial<UrlCanonErrorProps> & Pick<UrlCanonErrorProps, 'kind'> = { kind: 'internal' },
): UrlCanonError {
  if (isUrlCanonError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UrlCanonError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createCanonicalizeError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): UrlCanonError {
  return new UrlCanonError({
    message,
    kind: 'canonicalize',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createResolveError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): UrlCanonError {
  return new UrlCanonError({
    message,
    kind: 'resolve',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createReplaceError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): UrlCanonError {
  return new UrlCanonError({
    message,
    kind: 'replace',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): UrlCanonError {
  return new UrlCanonError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
