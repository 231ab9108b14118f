import { DecodeError } from '../errors/ScrollSourceError.js';

/** Value type of a column. Fixed per column position for the lifetime of a session. */
export const ColumnType = {
  INT32: 'int32',
  INT64: 'int64',
  DOUBLE: 'double',
  STRING: 'string',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

/** Typed storage for one column of a page. */
export type ColumnData = Int32Array | BigInt64Array | Float64Array | readonly string[];

const TYPE_TAGS: Readonly<Record<string, ColumnType>> = {
  DT_INT32: ColumnType.INT32,
  DT_INT64: ColumnType.INT64,
  DT_DOUBLE: ColumnType.DOUBLE,
  DT_STRING: ColumnType.STRING,
};

/** Backend type tag for each column type. Inverse of `columnTypeFromTag()`. */
export const TYPE_TAG_BY_COLUMN_TYPE: Readonly<Record<ColumnType, string>> = {
  [ColumnType.INT32]: 'DT_INT32',
  [ColumnType.INT64]: 'DT_INT64',
  [ColumnType.DOUBLE]: 'DT_DOUBLE',
  [ColumnType.STRING]: 'DT_STRING',
};

/**
 * Map a backend type tag (`DT_INT32`, `DT_INT64`, `DT_DOUBLE`, `DT_STRING`) to a column type.
 *
 * @throws DecodeError for any tag outside that vocabulary.
 */
export function columnTypeFromTag(tag: string, column?: string): ColumnType {
  const type = Object.hasOwn(TYPE_TAGS, tag) ? TYPE_TAGS[tag] : undefined;
  if (type === undefined) {
    throw new DecodeError(`Unsupported column type tag '${tag}'${column !== undefined ? ` for column '${column}'` : ''}`, {
      tag,
      column,
    });
  }
  return type;
}

/** Map every tag in order, pairing each with its column name for error messages. */
export function columnTypesFromTags(tags: readonly string[], columns: readonly string[]): ColumnType[] {
  if (tags.length !== columns.length) {
    throw new DecodeError(
      `Backend returned ${String(tags.length)} type tags for ${String(columns.length)} columns`,
      { tags, columns },
    );
  }
  return tags.map((tag, i) => columnTypeFromTag(tag, columns[i]));
}
