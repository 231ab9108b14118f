import type { Page } from '../../domain/model/Page.js';
import type { ScrollCursor } from '../../domain/model/Session.js';
import { advanceSession } from '../../domain/model/Session.js';
import { isScrollSourceError } from '../../domain/errors/ScrollSourceError.js';
import { scrollUrl } from '../../domain/services/UrlBuilder.js';
import type { ReaderContext } from '../ReaderContext.js';
import { FetchPage } from './FetchPage.js';
import type { FetchedPage } from './FetchPage.js';

/**
 * Use case: pull the next non-empty page.
 *
 * Returns `null` once the scroll is exhausted; the empty page that signals the
 * end is swallowed here and never reaches the consumer. A failed release
 * after the last page is reported as `source:release-failed` and does not
 * fail the read.
 */
export class ProducePage<C extends ScrollCursor> {
  constructor(private readonly ctx: ReaderContext<C>) {}

  async execute(): Promise<Page | null> {
    switch (this.ctx.status) {
      case 'CREATED':
      case 'CONNECTING':
        throw new Error('ScrollReader: no open session. Call open() first.');
      case 'EXHAUSTED':
      case 'FAILED':
      case 'CLOSED':
        return null;
      case 'OPEN':
        break;
    }

    const session = this.ctx.requireSession();

    if (session.columns.length === 0) {
      await this.exhaust();
      return null;
    }

    let fetched: FetchedPage<C>;
    try {
      fetched = await new FetchPage(this.ctx.backend).execute(session);
    } catch (error) {
      this.ctx.fail(error);
      throw error;
    }

    this.ctx.session = advanceSession(session, fetched.cursor);

    if (fetched.rowCount === 0) {
      await this.exhaust();
      return null;
    }

    const pageIndex = this.ctx.pagesRead;
    this.ctx.pagesRead++;
    this.ctx.rowsRead += fetched.rowCount;

    this.ctx.eventBus.emit({
      type: 'page:fetched',
      readerId: this.ctx.readerId,
      pageIndex,
      rowCount: fetched.rowCount,
      timestamp: Date.now(),
    });

    return fetched.page;
  }

  private async exhaust(): Promise<void> {
    this.ctx.transitionTo('EXHAUSTED');
    this.ctx.eventBus.emit({
      type: 'source:exhausted',
      readerId: this.ctx.readerId,
      pagesRead: this.ctx.pagesRead,
      rowsRead: this.ctx.rowsRead,
      timestamp: Date.now(),
    });
    try {
      await this.ctx.releaseCursor();
    } catch (error) {
      const session = this.ctx.requireSession();
      this.ctx.eventBus.emit({
        type: 'source:release-failed',
        readerId: this.ctx.readerId,
        scrollUrl: scrollUrl(session.requestUrl),
        error: error instanceof Error ? error.message : String(error),
        code: isScrollSourceError(error) ? error.code : undefined,
        timestamp: Date.now(),
      });
    }
  }
}
