export type ClientErrorKind = 'transport' | 'decode' | 'api' | 'request';

interface ClientErrorOptions {
  cause?: unknown;
}

abstract class BaseClientError extends Error {
  abstract readonly kind: ClientErrorKind;

  protected constructor(message: string, options?: ClientErrorOptions) {
    super(message);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The transport rejected before any response arrived (DNS, TLS, socket).
 * The underlying rejection is kept as `cause`.
 */
export class TransportError extends BaseClientError {
  readonly kind = 'transport' as const;

  constructor(message: string, options?: ClientErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The payload matched neither the current nor any fallback shape.
 * `path` is a JSONPath-like pointer (`$.data.entries[3].results`).
 */
export class DecodeError extends BaseClientError {
  readonly kind = 'decode' as const;

  constructor(
    public readonly path: string,
    public readonly reason: string,
    options?: ClientErrorOptions,
  ) {
    super(`Failed to decode response at ${path}: ${reason}`, options);
    this.name = 'DecodeError';
  }
}

export interface ApiErrorPayload {
  code: string;
  message: string;
  status: number;
  context?: string;
}

// Upstream reported a domain failure (unknown user, bad season, ...).
export class ApiError extends BaseClientError implements ApiErrorPayload {
  readonly kind = 'api' as const;
  readonly code: string;
  readonly status: number;
  readonly context?: string;

  constructor(payload: ApiErrorPayload) {
    super(payload.message);
    this.name = 'ApiError';
    this.code = payload.code;
    this.status = payload.status;
    this.context = payload.context;
  }
}

export const REQUEST_ERROR_CODES = {
  INVALID_LIMIT: 'INVALID_LIMIT',
  INVALID_BOUND: 'INVALID_BOUND',
  INVALID_COUNTRY: 'INVALID_COUNTRY',
  INVALID_IDENTIFIER: 'INVALID_IDENTIFIER',
  UNSUPPORTED_SORT: 'UNSUPPORTED_SORT',
} as const;

export type RequestErrorCode =
  (typeof REQUEST_ERROR_CODES)[keyof typeof REQUEST_ERROR_CODES];

// Parameters were rejected before a request was built; nothing was sent.
export class RequestError extends BaseClientError {
  readonly kind = 'request' as const;

  constructor(
    public readonly code: RequestErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

export type ClientError = TransportError | DecodeError | ApiError | RequestError;

export const isClientError = (error: unknown): error is ClientError =>
  error instanceof TransportError ||
  error instanceof DecodeError ||
  error instanceof ApiError ||
  error instanceof RequestError;
