import type { Page } from '../../domain/model/Page.js';
import type { ScrollCursor, Session } from '../../domain/model/Session.js';
import type { QueryBackend } from '../../domain/ports/QueryBackend.js';
import { createPage } from '../../domain/model/Page.js';
import { scrollUrl } from '../../domain/services/UrlBuilder.js';

/** A decoded page and the cursor positioned after it. */
export interface FetchedPage<C extends ScrollCursor> {
  readonly page: Page;
  readonly rowCount: number;
  readonly cursor: C;
}

/**
 * Use case: fetch the page after the session's cursor.
 *
 * Does not touch the session; the caller decides whether to advance it.
 * Backend errors propagate unchanged and are never retried.
 */
export class FetchPage<C extends ScrollCursor> {
  constructor(private readonly backend: QueryBackend<C>) {}

  async execute(session: Session<C>): Promise<FetchedPage<C>> {
    const { cursor, values } = await this.backend.next(
      session.cursor,
      session.requestUrl,
      scrollUrl(session.requestUrl),
      session.columnTypes,
    );
    const { page, rowCount } = createPage(session.columns, values);
    return { page, rowCount, cursor };
  }
}
