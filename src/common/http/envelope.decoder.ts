import { ApiError, DecodeError } from '../errors/client-error';
import {
  RuntimeValidationError,
  assertBoolean,
  assertEpochMillis,
  assertRecord,
  assertString,
  readOpenEnum,
  readOptionalString,
} from '../validation/runtime-validation';
import {
  CACHE_STATUSES,
  failureResult,
  successResult,
  type CacheMeta,
  type ClientResult,
  type Envelope,
  type ErrorDetail,
} from './api-response';

export type PayloadDecoder<T> = (value: unknown, path: string) => T;

const ERROR_CODE_BY_STATUS: Readonly<Record<number, string>> = {
  400: 'bad_request',
  401: 'unauthorized',
  403: 'forbidden',
  404: 'not_found',
  429: 'rate_limited',
};

const ERROR_CODE_BY_MESSAGE: ReadonlyArray<readonly [RegExp, string]> = [
  [/no such user/i, 'not_found'],
  [/not found/i, 'not_found'],
  [/too many requests/i, 'rate_limited'],
];

const FALLBACK_ERROR_CODE = 'upstream_error';

const isSuccessStatus = (status: number): boolean =>
  status >= 200 && status < 300;

const codeFromStatus = (status: number): string | undefined => {
  if (status >= 500) {
    return 'server_error';
  }
  return ERROR_CODE_BY_STATUS[status];
};

const codeFromMessage = (message: string): string | undefined =>
  ERROR_CODE_BY_MESSAGE.find(([pattern]) => pattern.test(message))?.[1];

/**
 * Accepts both the current `{ msg, key, context }` object and the legacy
 * bare-string form of the `error` field.
 */
export const decodeErrorDetail = (
  value: unknown,
  path: string,
  status: number,
): ErrorDetail => {
  if (typeof value === 'string') {
    return {
      code:
        codeFromStatus(status) ?? codeFromMessage(value) ?? FALLBACK_ERROR_CODE,
      message: value,
    };
  }

  const error = assertRecord(value, path);
  const key = readOptionalString(error.key, `${path}.key`);
  const msg = readOptionalString(error.msg, `${path}.msg`);
  const context = readOptionalString(error.context, `${path}.context`);
  const message = msg ?? key ?? `Upstream request failed (HTTP ${status})`;

  return {
    code:
      key ??
      codeFromStatus(status) ??
      codeFromMessage(message) ??
      FALLBACK_ERROR_CODE,
    message,
    ...(context !== undefined ? { context } : {}),
  };
};

export const decodeCacheMeta = (
  value: unknown,
  path: string,
): CacheMeta | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  const cache = assertRecord(value, path);
  return {
    status: readOpenEnum(
      assertString(cache.status, `${path}.status`),
      CACHE_STATUSES,
    ),
    cachedAt: assertEpochMillis(cache.cached_at, `${path}.cached_at`),
    cachedUntil: assertEpochMillis(cache.cached_until, `${path}.cached_until`),
  };
};

// On a failure envelope the error detail matters more than the cache block.
const readFailureCacheMeta = (value: unknown): CacheMeta | undefined => {
  try {
    return decodeCacheMeta(value, '$.cache');
  } catch (error) {
    if (error instanceof RuntimeValidationError) {
      return undefined;
    }
    throw error;
  }
};

/**
 * Decodes the outer shell only; `data` is left untouched for the
 * type-specific decoder. A non-2xx status is always a failure envelope,
 * whatever the body claims. A malformed cache block fails a success
 * envelope but is dropped from a failure one.
 */
export const decodeEnvelopeShell = (
  status: number,
  body: unknown,
): Envelope<unknown> => {
  const root = assertRecord(body, '$');

  if (isSuccessStatus(status) && assertBoolean(root.success, '$.success')) {
    const cache = decodeCacheMeta(root.cache, '$.cache');
    return cache
      ? { success: true, data: root.data, cache }
      : { success: true, data: root.data };
  }

  const error = decodeErrorDetail(root.error, '$.error', status);
  const cache = readFailureCacheMeta(root.cache);
  return cache ? { success: false, error, cache } : { success: false, error };
};

const parseBody = (body: Uint8Array | string): unknown => {
  const text =
    typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
  return JSON.parse(text);
};

const describeJsonError = (error: unknown): string =>
  error instanceof Error ? error.message : 'unknown JSON parse error';

export const toDecodeError = (error: RuntimeValidationError): DecodeError =>
  new DecodeError(error.path, `expected ${error.expected}`, { cause: error });

export const decodeEnvelope = <T>(
  status: number,
  body: Uint8Array | string,
  decodeData: PayloadDecoder<T>,
): ClientResult<T> => {
  let parsed: unknown;
  try {
    parsed = parseBody(body);
  } catch (error) {
    return failureResult(
      new DecodeError(
        '$',
        `invalid JSON body (HTTP ${status}): ${describeJsonError(error)}`,
        { cause: error },
      ),
    );
  }

  try {
    const envelope = decodeEnvelopeShell(status, parsed);
    if (!envelope.success) {
      return failureResult(
        new ApiError({
          ...envelope.error,
          status,
        }),
      );
    }
    return successResult(decodeData(envelope.data, '$.data'), envelope.cache);
  } catch (error) {
    if (error instanceof RuntimeValidationError) {
      return failureResult(toDecodeError(error));
    }
    throw error;
  }
};
