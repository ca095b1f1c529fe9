import {
  assertNumber,
  assertRecord,
} from '../common/validation/runtime-validation';

/**
 * 업스트림 정렬 키(`p`, primary/secondary/tertiary).
 * 커서는 이 값을 `pri:sec:ter` 형태로 직렬화한 문자열이며, 클라이언트는 내용을
 * 해석하지 않고 `after`/`before` 쿼리로 그대로 돌려보낸다.
 */
export type SortKey = {
  pri: number;
  sec: number;
  ter: number;
};

export const decodeSortKey = (value: unknown, path: string): SortKey => {
  const key = assertRecord(value, path);
  return {
    pri: assertNumber(key.pri, `${path}.pri`),
    sec: assertNumber(key.sec, `${path}.sec`),
    ter: assertNumber(key.ter, `${path}.ter`),
  };
};

export const readOptionalSortKey = (
  value: unknown,
  path: string,
): SortKey | undefined =>
  value === undefined || value === null ? undefined : decodeSortKey(value, path);

export const encodeCursor = (key: SortKey): string =>
  `${key.pri}:${key.sec}:${key.ter}`;
