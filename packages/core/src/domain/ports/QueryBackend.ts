import type { ColumnData, ColumnType } from '../model/ColumnType.js';
import type { ScrollCursor } from '../model/Session.js';

/** What a backend learns from a node while opening a scroll. */
export interface OpenedScroll<C extends ScrollCursor = ScrollCursor> {
  readonly cursor: C;
  /** Column names, in the order later pages return their values. */
  readonly columns: readonly string[];
  /** Backend type tag per column (`DT_INT32`, `DT_INT64`, `DT_DOUBLE`, `DT_STRING`). */
  readonly typeTags: readonly string[];
}

/** One page of values returned by `next()`, plus the cursor for the page after it. */
export interface FetchedValues<C extends ScrollCursor = ScrollCursor> {
  readonly cursor: C;
  /** One entry per column, position-aligned with the session's columns. */
  readonly values: readonly ColumnData[];
}

/**
 * Port for executing scroll queries against a search backend.
 *
 * The reader never keeps hidden state in the backend: every call receives the
 * cursor it should continue from and returns the cursor for the next call.
 *
 * Implementations raise `FetchError` for transport or status failures and
 * `DecodeError` for responses they cannot decode.
 */
export interface QueryBackend<C extends ScrollCursor = ScrollCursor> {
  /**
   * Health-check a node, then run the opening search.
   *
   * @param healthcheckUrl - URL answered by the node's health endpoint.
   * @param healthcheckField - Field the health response must contain.
   * @param requestUrl - Opening search URL, including the scroll keep-alive.
   */
  open(healthcheckUrl: string, healthcheckField: string, requestUrl: string): Promise<OpenedScroll<C>>;

  /** Fetch the page after `cursor`. An empty page (zero rows) means the scroll is exhausted. */
  next(
    cursor: C,
    requestUrl: string,
    scrollUrl: string,
    columnTypes: readonly ColumnType[],
  ): Promise<FetchedValues<C>>;

  /** Release the server-side scroll. Optional: backends without server state may omit it. */
  release?(cursor: C, scrollUrl: string): Promise<void>;
}
