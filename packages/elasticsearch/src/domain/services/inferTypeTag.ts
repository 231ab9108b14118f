import { isInteger, isLosslessNumber } from 'lossless-json';

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Type tag for a JSON value taken from the first document of a scroll.
 *
 * Numbers parsed with `lossless-json` are typed from their JSON text: integers
 * that fit 32 bits are `DT_INT32`, other integers that fit 64 bits
 * `DT_INT64`, anything else (`10.0`, `1e3`, larger integers) `DT_DOUBLE`.
 * Strings are `DT_STRING`. Booleans report `DT_BOOL` and anything else
 * `DT_INVALID`; the reader rejects both.
 */
export function inferTypeTag(value: unknown): string {
  if (isLosslessNumber(value)) {
    return isInteger(value.value) ? integerTag(BigInt(value.value)) : 'DT_DOUBLE';
  }

  switch (typeof value) {
    case 'number':
      if (!Number.isInteger(value)) return 'DT_DOUBLE';
      return Number.isSafeInteger(value) ? integerTag(BigInt(value)) : 'DT_DOUBLE';
    case 'bigint':
      return integerTag(value);
    case 'string':
      return 'DT_STRING';
    case 'boolean':
      return 'DT_BOOL';
    default:
      return 'DT_INVALID';
  }
}

function integerTag(value: bigint): string {
  if (value >= INT32_MIN && value <= INT32_MAX) return 'DT_INT32';
  if (value >= INT64_MIN && value <= INT64_MAX) return 'DT_INT64';
  return 'DT_DOUBLE';
}
