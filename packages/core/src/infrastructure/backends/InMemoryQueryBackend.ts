import type { ColumnType } from '../../domain/model/ColumnType.js';
import type { ScrollCursor } from '../../domain/model/Session.js';
import type { FetchedValues, OpenedScroll, QueryBackend } from '../../domain/ports/QueryBackend.js';
import type { SourceDocument } from '../../domain/services/ColumnDecoder.js';
import { TYPE_TAG_BY_COLUMN_TYPE } from '../../domain/model/ColumnType.js';
import { decodeColumns } from '../../domain/services/ColumnDecoder.js';
import { FetchError } from '../../domain/errors/ScrollSourceError.js';

/** A fixed table served by `InMemoryQueryBackend`. */
export interface InMemoryTable {
  readonly columns: readonly string[];
  readonly columnTypes: readonly ColumnType[];
  readonly rows: readonly SourceDocument[];
  /** Raw type tags reported on open, overriding the ones derived from `columnTypes`. */
  readonly typeTags?: readonly string[];
}

export interface InMemoryQueryBackendOptions {
  /** Rows per page. Default: `10`. */
  readonly pageSize?: number;
  /** Base URLs (`scheme://host:port`) whose health check fails. Default: none. */
  readonly unhealthyNodes?: readonly string[];
}

/** Cursor of the in-memory backend: the scroll id plus the offset of the next row. */
export interface InMemoryCursor extends ScrollCursor {
  readonly offset: number;
}

/** One call received by the backend, in arrival order. */
export interface InMemoryCall {
  readonly method: 'open' | 'next' | 'release';
  readonly url: string;
  readonly scrollId?: string;
}

/**
 * Query backend serving a fixed table from memory.
 *
 * Useful for tests and for pipelines that want the reader's page semantics
 * over data that is already loaded. Every call is recorded in `calls`.
 */
export class InMemoryQueryBackend implements QueryBackend<InMemoryCursor> {
  readonly calls: InMemoryCall[] = [];
  private readonly table: InMemoryTable;
  private readonly pageSize: number;
  private readonly unhealthyNodes: ReadonlySet<string>;
  private readonly released = new Set<string>();
  private scrollCounter = 0;

  constructor(table: InMemoryTable, options?: InMemoryQueryBackendOptions) {
    this.table = table;
    this.pageSize = options?.pageSize ?? 10;
    this.unhealthyNodes = new Set(options?.unhealthyNodes ?? []);
  }

  open(healthcheckUrl: string, _healthcheckField: string, requestUrl: string): Promise<OpenedScroll<InMemoryCursor>> {
    this.calls.push({ method: 'open', url: healthcheckUrl });

    if (this.unhealthyNodes.has(new URL(healthcheckUrl).origin)) {
      return Promise.reject(
        new FetchError(`HTTP 503 Service Unavailable for ${healthcheckUrl}`, healthcheckUrl, { status: 503 }),
      );
    }

    this.scrollCounter++;
    const scrollId = `scroll-${String(this.scrollCounter)}`;
    this.calls.push({ method: 'open', url: requestUrl, scrollId });

    return Promise.resolve({
      cursor: { scrollId, offset: 0 },
      columns: this.table.columns,
      typeTags: this.table.typeTags ?? this.table.columnTypes.map((type) => TYPE_TAG_BY_COLUMN_TYPE[type]),
    });
  }

  next(
    cursor: InMemoryCursor,
    _requestUrl: string,
    scrollUrl: string,
    columnTypes: readonly ColumnType[],
  ): Promise<FetchedValues<InMemoryCursor>> {
    this.calls.push({ method: 'next', url: scrollUrl, scrollId: cursor.scrollId });

    if (this.released.has(cursor.scrollId)) {
      return Promise.reject(
        new FetchError(`HTTP 404 Not Found: scroll '${cursor.scrollId}' was released`, scrollUrl, { status: 404 }),
      );
    }

    const rows = this.table.rows.slice(cursor.offset, cursor.offset + this.pageSize);
    try {
      const values = decodeColumns(rows, this.table.columns, columnTypes);
      return Promise.resolve({ cursor: { ...cursor, offset: cursor.offset + rows.length }, values });
    } catch (error) {
      return Promise.reject(error);
    }
  }

  release(cursor: InMemoryCursor, scrollUrl: string): Promise<void> {
    this.calls.push({ method: 'release', url: scrollUrl, scrollId: cursor.scrollId });
    this.released.add(cursor.scrollId);
    return Promise.resolve();
  }
}
