import { isInteger, isLosslessNumber } from 'lossless-json';
import type { SourceDocument } from '@scrollsource/core';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Replace the `LosslessNumber` fields of a parsed `_source` with values the
 * column decoder accepts. Key order is kept.
 */
export function toSourceDocument(source: Readonly<Record<string, unknown>>): SourceDocument {
  const document: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(source)) {
    document[field] = isLosslessNumber(value) ? numberFromText(value.value) : value;
  }
  return document;
}

/**
 * Safe integers become `number`, other integers within int64 `bigint`, and
 * everything else the nearest double.
 */
export function numberFromText(text: string): number | bigint {
  if (!isInteger(text)) return Number(text);

  const value = BigInt(text);
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value >= INT64_MIN && value <= INT64_MAX ? value : Number(text);
}
