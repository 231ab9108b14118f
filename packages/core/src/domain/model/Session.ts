import type { ColumnType } from './ColumnType.js';

/**
 * Position of a server-side scroll.
 *
 * Each fetch returns the cursor to use for the following fetch; the reader
 * keeps only the newest one. Backends may extend this with their own fields.
 */
export interface ScrollCursor {
  /** Server-side scroll identifier returned by the most recent response. */
  readonly scrollId: string;
}

/** Index (and optional document type) a session reads from. */
export interface QueryTarget {
  readonly index: string;
  readonly docType?: string;
}

/**
 * Result of a successful node selection.
 *
 * Created once per reader and never reconnected: if the node dies mid-scroll
 * the reader fails rather than moving to another node.
 */
export interface Session<C extends ScrollCursor = ScrollCursor> {
  readonly cursor: C;
  /** Column names, in the order the backend returns values. */
  readonly columns: readonly string[];
  /** Column types, position-aligned with `columns`. */
  readonly columnTypes: readonly ColumnType[];
  /** Opening search URL of the selected node. Scroll URLs are derived from it. */
  readonly requestUrl: string;
  readonly healthcheckUrl: string;
}

/** Copy of the session positioned at a newer cursor. */
export function advanceSession<C extends ScrollCursor>(session: Session<C>, cursor: C): Session<C> {
  return { ...session, cursor };
}
