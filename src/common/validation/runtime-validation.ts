export class RuntimeValidationError extends Error {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly value: unknown,
  ) {
    super(`Validation failed at ${path}: expected ${expected}`);
    this.name = 'RuntimeValidationError';
  }
}

const fail = (path: string, expected: string, value: unknown): never => {
  throw new RuntimeValidationError(path, expected, value);
};

export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const assertRecord = (value: unknown, path: string): JsonRecord => {
  if (!isRecord(value)) {
    return fail(path, 'object', value);
  }
  return value;
};

export const assertArray = (value: unknown, path: string): unknown[] => {
  if (!Array.isArray(value)) {
    return fail(path, 'array', value);
  }
  return value;
};

export const assertString = (
  value: unknown,
  path: string,
  options?: { minLength?: number },
): string => {
  if (typeof value !== 'string') {
    return fail(path, 'string', value);
  }
  if (options?.minLength !== undefined && value.length < options.minLength) {
    fail(path, `string(length>=${options.minLength})`, value);
  }
  return value;
};

export const assertBoolean = (value: unknown, path: string): boolean => {
  if (typeof value !== 'boolean') {
    return fail(path, 'boolean', value);
  }
  return value;
};

export const assertNumber = (
  value: unknown,
  path: string,
  options?: { integer?: boolean; min?: number; max?: number },
): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fail(path, 'number', value);
  }
  if (options?.integer && !Number.isInteger(value)) {
    fail(path, 'integer', value);
  }
  if (options?.min !== undefined && value < options.min) {
    fail(path, `number(>=${options.min})`, value);
  }
  if (options?.max !== undefined && value > options.max) {
    fail(path, `number(<=${options.max})`, value);
  }
  return value;
};

const ISO_DATE_TIME =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;

export const assertIsoDateTime = (value: unknown, path: string): Date => {
  const text = assertString(value, path, { minLength: 1 });
  const parsed = ISO_DATE_TIME.test(text) ? Date.parse(text) : Number.NaN;
  if (Number.isNaN(parsed)) {
    return fail(path, 'ISO date-time string', value);
  }
  return new Date(parsed);
};

/**
 * Primitive adapters for the loosely specified upstream payloads.
 *
 * `null` and a missing key are treated the same way: both map to `undefined`.
 * A present value of the wrong type is still a validation error, so
 * "absent" and "malformed" stay distinguishable.
 */
export const readOptionalNumber = (
  value: unknown,
  path: string,
  options?: { integer?: boolean; min?: number; max?: number },
): number | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  return assertNumber(value, path, options);
};

export const readOptionalString = (
  value: unknown,
  path: string,
): string | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  return assertString(value, path);
};

// Upstream writes -1 for "no position"; any negative number reads as absent.
export const readOptionalNonNegative = (
  value: unknown,
  path: string,
  options?: { integer?: boolean },
): number | undefined => {
  const number = readOptionalNumber(value, path, options);
  return number === undefined || number < 0 ? undefined : number;
};

export const readBooleanOrDefault = (
  value: unknown,
  path: string,
  defaultValue: boolean,
): boolean => {
  if (value === undefined || value === null) {
    return defaultValue;
  }
  return assertBoolean(value, path);
};

export const readOptionalEpochMillis = (
  value: unknown,
  path: string,
): Date | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return fail(path, 'epoch milliseconds(>=0)', value);
  }
  return new Date(value);
};

export const assertEpochMillis = (value: unknown, path: string): Date => {
  const date = readOptionalEpochMillis(value, path);
  if (!date) {
    return fail(path, 'epoch milliseconds(>=0)', value);
  }
  return date;
};

export const readOptionalIsoTimestamp = (
  value: unknown,
  path: string,
): Date | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  return assertIsoDateTime(value, path);
};

export type OpenEnum<T extends string> =
  | { known: true; value: T }
  | { known: false; raw: string };

const isCandidate = <T extends string>(
  value: string,
  candidates: readonly T[],
): value is T => candidates.some((candidate) => candidate === value);

// Never throws: upstream adds codes without notice.
export const readOpenEnum = <T extends string>(
  raw: string,
  candidates: readonly T[],
): OpenEnum<T> => {
  if (isCandidate(raw, candidates)) {
    return { known: true, value: raw };
  }
  return { known: false, raw };
};

export const readOptionalOpenEnum = <T extends string>(
  value: unknown,
  path: string,
  candidates: readonly T[],
): OpenEnum<T> | undefined => {
  const raw = readOptionalString(value, path);
  return raw === undefined ? undefined : readOpenEnum(raw, candidates);
};

export const openEnumText = <T extends string>(code: OpenEnum<T>): string =>
  code.known ? code.value : code.raw;

/**
 * Numeric codes mapped through a lookup table. Unknown codes keep their
 * decimal text as `raw`.
 */
export const readCodedOpenEnum = <T extends string>(
  value: unknown,
  path: string,
  byCode: Readonly<Record<number, T>>,
): OpenEnum<T> => {
  const code = assertNumber(value, path, { integer: true });
  const known = byCode[code];
  return known === undefined
    ? { known: false, raw: String(code) }
    : { known: true, value: known };
};
