import type { ColumnType } from '../../domain/model/ColumnType.js';
import type { ScrollCursor, Session } from '../../domain/model/Session.js';
import type { OpenedScroll } from '../../domain/ports/QueryBackend.js';
import { columnTypesFromTags } from '../../domain/model/ColumnType.js';
import { NoHealthyNodeError, NodeUnavailableError } from '../../domain/errors/ScrollSourceError.js';
import { HEALTHCHECK_FIELD, scrollUrl } from '../../domain/services/UrlBuilder.js';
import type { ReaderContext } from '../ReaderContext.js';

/**
 * Use case: open a session on the first node that answers.
 *
 * Candidates are tried one at a time in configured order. A node that fails
 * its health check, its opening search, or whose columns cannot be typed is
 * skipped; later nodes are never contacted once one succeeds.
 */
export class SelectNode<C extends ScrollCursor> {
  constructor(private readonly ctx: ReaderContext<C>) {}

  async execute(): Promise<Session<C>> {
    const attempts: NodeUnavailableError[] = [];

    for (const [i, healthcheckUrl] of this.ctx.healthcheckUrls.entries()) {
      const requestUrl = this.ctx.requestUrls[i];
      if (requestUrl === undefined) break;

      try {
        const session = await this.attempt(healthcheckUrl, requestUrl);

        this.ctx.eventBus.emit({
          type: 'node:connected',
          readerId: this.ctx.readerId,
          healthcheckUrl,
          requestUrl,
          columns: session.columns,
          timestamp: Date.now(),
        });
        return session;
      } catch (error) {
        const failure = new NodeUnavailableError(healthcheckUrl, requestUrl, error);
        attempts.push(failure);

        this.ctx.eventBus.emit({
          type: 'node:skipped',
          readerId: this.ctx.readerId,
          healthcheckUrl,
          requestUrl,
          error: failure.message,
          timestamp: Date.now(),
        });
      }
    }

    throw new NoHealthyNodeError(attempts);
  }

  private async attempt(healthcheckUrl: string, requestUrl: string): Promise<Session<C>> {
    const opened = await this.ctx.backend.open(healthcheckUrl, HEALTHCHECK_FIELD, requestUrl);
    const columnTypes = await this.typeColumns(opened, requestUrl);

    return {
      cursor: opened.cursor,
      columns: [...opened.columns],
      columnTypes,
      requestUrl,
      healthcheckUrl,
    };
  }

  /** Map the backend's type tags; on failure the scroll opened on this node is released before moving on. */
  private async typeColumns(opened: OpenedScroll<C>, requestUrl: string): Promise<ColumnType[]> {
    try {
      return columnTypesFromTags(opened.typeTags, opened.columns);
    } catch (decodeError) {
      if (!this.ctx.backend.release) throw decodeError;
      try {
        await this.ctx.backend.release(opened.cursor, scrollUrl(requestUrl));
      } catch (releaseError) {
        throw new AggregateError([decodeError, releaseError], 'Unsupported columns, and the scroll could not be released');
      }
      throw decodeError;
    }
  }
}
