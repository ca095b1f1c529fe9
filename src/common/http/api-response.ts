import type { OpenEnum } from '../validation/runtime-validation';
import type { ClientError } from '../errors/client-error';

export const CACHE_STATUSES = ['hit', 'miss', 'awaited'] as const;
export type CacheStatus = (typeof CACHE_STATUSES)[number];

export interface CacheMeta {
  status: OpenEnum<CacheStatus>;
  cachedAt: Date;
  cachedUntil: Date;
}

export interface ErrorDetail {
  code: string;
  message: string;
  context?: string;
}

export interface EnvelopeSuccess<T> {
  success: true;
  data: T;
  cache?: CacheMeta;
}

export interface EnvelopeFailure {
  success: false;
  error: ErrorDetail;
  cache?: CacheMeta;
}

export type Envelope<T> = EnvelopeSuccess<T> | EnvelopeFailure;

export interface ClientFailure {
  success: false;
  error: ClientError;
}

/**
 * What every facade operation resolves to. The success branch is the decoded
 * envelope itself; upstream failures are lifted into {@link ClientError}.
 */
export type ClientResult<T> = EnvelopeSuccess<T> | ClientFailure;

export const successResult = <T>(
  data: T,
  cache?: CacheMeta,
): EnvelopeSuccess<T> =>
  cache ? { success: true, data, cache } : { success: true, data };

export const failureResult = (error: ClientError): ClientFailure => ({
  success: false,
  error,
});

export const mapResult = <T, U>(
  result: ClientResult<T>,
  transform: (data: T) => U,
): ClientResult<U> =>
  result.success ? successResult(transform(result.data), result.cache) : result;

export const unwrapResult = <T>(result: ClientResult<T>): T => {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
};
