import type { ColumnData, ColumnType } from '../model/ColumnType.js';
import { DecodeError } from '../errors/ScrollSourceError.js';

/** A document as returned by the backend: field name → JSON value. */
export interface SourceDocument {
  readonly [field: string]: unknown;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Turn row-oriented documents into one typed column per requested field.
 *
 * @returns Column data position-aligned with `columns`.
 * @throws DecodeError when a field is missing or does not fit its column type.
 */
export function decodeColumns(
  documents: readonly SourceDocument[],
  columns: readonly string[],
  columnTypes: readonly ColumnType[],
): ColumnData[] {
  if (columns.length !== columnTypes.length) {
    throw new DecodeError(`Got ${String(columnTypes.length)} column types for ${String(columns.length)} columns`, {
      columns,
      columnTypes,
    });
  }

  return columns.map((column, i) => {
    const type = columnTypes[i];
    if (type === undefined) {
      throw new DecodeError(`Missing column type for '${column}'`, { column });
    }
    return decodeColumn(documents, column, type);
  });
}

function decodeColumn(documents: readonly SourceDocument[], column: string, type: ColumnType): ColumnData {
  switch (type) {
    case 'int32': {
      const out = new Int32Array(documents.length);
      documents.forEach((doc, row) => {
        const value = readField(doc, column, row);
        if (typeof value !== 'number' || !Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
          throw mismatch(column, row, type, value);
        }
        out[row] = value;
      });
      return out;
    }
    case 'int64': {
      const out = new BigInt64Array(documents.length);
      documents.forEach((doc, row) => {
        const value = readField(doc, column, row);
        if (typeof value === 'bigint' && value >= INT64_MIN && value <= INT64_MAX) {
          out[row] = value;
        } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
          out[row] = BigInt(value);
        } else {
          throw mismatch(column, row, type, value);
        }
      });
      return out;
    }
    case 'double': {
      const out = new Float64Array(documents.length);
      documents.forEach((doc, row) => {
        const value = readField(doc, column, row);
        if (typeof value === 'bigint') {
          out[row] = Number(value);
        } else if (typeof value === 'number' && Number.isFinite(value)) {
          out[row] = value;
        } else {
          throw mismatch(column, row, type, value);
        }
      });
      return out;
    }
    case 'string':
      return documents.map((doc, row) => {
        const value = readField(doc, column, row);
        if (typeof value !== 'string') {
          throw mismatch(column, row, type, value);
        }
        return value;
      });
  }
}

function readField(doc: SourceDocument, column: string, row: number): unknown {
  if (!Object.hasOwn(doc, column)) {
    throw new DecodeError(`Row ${String(row)} has no field '${column}'`, { column, row });
  }
  return doc[column];
}

function mismatch(column: string, row: number, type: ColumnType, value: unknown): DecodeError {
  return new DecodeError(`Row ${String(row)} field '${column}' is not a valid ${type}: ${describe(value)}`, {
    column,
    row,
    type,
    value,
  });
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}
