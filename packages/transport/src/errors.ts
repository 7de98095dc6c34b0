export type StatusCode = number | 'N/A';

export type TransportErrorOptions = {
  statusCode: StatusCode;
  error: string;
  info?: unknown;
  cause?: unknown;
};

export class TransportError extends Error {
  readonly statusCode: StatusCode;
  readonly error: string;
  readonly info: unknown;

  constructor(options: TransportErrorOptions) {
    super(`${options.statusCode}, ${quote(options.error)}`, { cause: options.cause });
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
    this.error = options.error;
    this.info = options.info;
  }
}

export class ConnectionError extends TransportError {
  constructor(error: string, cause?: unknown) {
    super({ statusCode: 'N/A', error, cause });
    this.name = 'ConnectionError';
    const reason = cause instanceof Error ? cause.message : undefined;
    this.message = reason ? `${quote(error)} caused by: ${reason}` : quote(error);
  }
}

export class ConnectionTimeout extends ConnectionError {
  constructor(error: string, cause?: unknown) {
    super(error, cause);
    this.name = 'ConnectionTimeout';
  }
}

export class ApiError extends TransportError {
  constructor(statusCode: number, error: string, info?: unknown) {
    super({ statusCode, error, info });
    this.name = 'ApiError';
    this.message = describeApiError(statusCode, error, info);
  }

  get status(): number {
    return typeof this.statusCode === 'number' ? this.statusCode : 0;
  }
}

export class BadRequestError extends ApiError {
  constructor(statusCode: number, error: string, info?: unknown) {
    super(statusCode, error, info);
    this.name = 'BadRequestError';
  }
}

export class AuthenticationException extends ApiError {
  constructor(statusCode: number, error: string, info?: unknown) {
    super(statusCode, error, info);
    this.name = 'AuthenticationException';
  }
}

export class AuthorizationException extends ApiError {
  constructor(statusCode: number, error: string, info?: unknown) {
    super(statusCode, error, info);
    this.name = 'AuthorizationException';
  }
}

export class NotFoundError extends ApiError {
  constructor(statusCode: number, error: string, info?: unknown) {
    super(statusCode, error, info);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ApiError {
  constructor(statusCode: number, error: string, info?: unknown) {
    super(statusCode, error, info);
    this.name = 'ConflictError';
  }
}

export class UnsupportedProductError extends TransportError {
  constructor(message: string) {
    super({ statusCode: 'N/A', error: message });
    this.name = 'UnsupportedProductError';
    this.message = message;
  }
}

export class SerializationError extends Error {
  readonly data: unknown;

  constructor(message: string, options: { data?: unknown; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SerializationError';
    this.data = options.data;
  }
}

export class ImproperlyConfigured extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImproperlyConfigured';
  }
}

/** The caller cancelled the request through its `signal`; never retried. */
export class RequestAbortedError extends Error {
  constructor(reason?: unknown) {
    const detail = reason instanceof Error ? reason.message : undefined;
    super(detail ? `Request aborted: ${detail}` : 'Request aborted', { cause: reason });
    this.name = 'RequestAbortedError';
  }
}

type ApiErrorConstructor = new (statusCode: number, error: string, info?: unknown) => ApiError;

export const HTTP_EXCEPTIONS: Readonly<Record<number, ApiErrorConstructor>> = {
  400: BadRequestError,
  401: AuthenticationException,
  403: AuthorizationException,
  404: NotFoundError,
  409: ConflictError
};

export function errorForStatus(statusCode: number, error: string, info?: unknown): ApiError {
  const ErrorClass = HTTP_EXCEPTIONS[statusCode] ?? ApiError;
  return new ErrorClass(statusCode, error, info);
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rootCauseDetails(info: unknown): string {
  if (!isRecord(info) || !('error' in info)) {
    return '';
  }
  const error = info.error;
  if (!isRecord(error)) {
    return typeof error === 'string' ? quote(error) : '';
  }
  const rootCauses = error.root_cause;
  const rootCause = Array.isArray(rootCauses) && isRecord(rootCauses[0]) ? rootCauses[0] : null;
  if (!rootCause) {
    return '';
  }
  const causedBy = isRecord(error.caused_by) ? error.caused_by : {};
  const parts = [
    typeof rootCause.reason === 'string' ? quote(rootCause.reason) : undefined,
    rootCause['resource.id'],
    rootCause['resource.type'],
    causedBy.reason
  ];
  return parts.filter((part): part is string => typeof part === 'string' && part.length > 0).join(', ');
}

function describeApiError(statusCode: number, error: string, info: unknown): string {
  return [String(statusCode), quote(error), rootCauseDetails(info)]
    .filter((part) => part.length > 0)
    .join(', ');
}
