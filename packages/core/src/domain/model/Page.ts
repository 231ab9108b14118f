import type { ColumnData } from './ColumnType.js';
import { CorruptPageError } from '../errors/ScrollSourceError.js';

/**
 * One batch of rows, column-oriented: column name → typed values.
 *
 * All columns of a page have the same length. A page with zero rows marks the
 * end of the scroll and is never handed to consumers.
 */
export type Page = Readonly<Record<string, ColumnData>>;

/**
 * Zip column names with the values returned by a backend into a `Page`,
 * checking that every column has the same length.
 *
 * @returns The page together with its row count.
 * @throws CorruptPageError when the column count or any column length disagrees.
 */
export function createPage(columns: readonly string[], values: readonly ColumnData[]): { page: Page; rowCount: number } {
  if (values.length !== columns.length) {
    throw new CorruptPageError(
      `Expected ${String(columns.length)} columns in page, received ${String(values.length)}`,
      { columns, received: values.length },
    );
  }

  const page: Record<string, ColumnData> = {};
  let rowCount = 0;

  values.forEach((data, i) => {
    const name = columns[i] ?? String(i);
    if (i === 0) {
      rowCount = data.length;
    } else if (data.length !== rowCount) {
      throw new CorruptPageError(
        `Column '${name}' has ${String(data.length)} rows but '${columns[0] ?? '0'}' has ${String(rowCount)}`,
        { column: name, length: data.length, expected: rowCount },
      );
    }
    page[name] = data;
  });

  return { page, rowCount };
}

/** Number of rows in a page, taken from its first column. `0` for a page without columns. */
export function pageRowCount(page: Page): number {
  for (const name in page) {
    return page[name]?.length ?? 0;
  }
  return 0;
}
