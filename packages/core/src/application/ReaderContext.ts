import type { QueryTarget, ScrollCursor, Session } from '../domain/model/Session.js';
import type { QueryBackend } from '../domain/ports/QueryBackend.js';
import type { NodesInput } from '../domain/services/EndpointResolver.js';
import { isScrollSourceError } from '../domain/errors/ScrollSourceError.js';
import { ReaderStatus, canTransition } from '../domain/model/ReaderStatus.js';
import { resolveEndpoints } from '../domain/services/EndpointResolver.js';
import { buildConnectionUrls, scrollUrl } from '../domain/services/UrlBuilder.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state holder shared across all use cases of a single reader.
 *
 * Internal: not exported from the public API. Node URLs are resolved here, in
 * the constructor, so a malformed node list fails before anything is fetched.
 */
export class ReaderContext<C extends ScrollCursor> {
  readonly eventBus: EventBus;
  readonly backend: QueryBackend<C>;
  readonly target: QueryTarget;
  readonly healthcheckUrls: readonly string[];
  readonly requestUrls: readonly string[];
  readonly readerId: string;

  status: ReaderStatus = ReaderStatus.CREATED;
  session: Session<C> | null = null;
  pagesRead = 0;
  rowsRead = 0;
  released = false;
  iterating = false;
  /** Tail of the pull queue; each pull starts after the previous one settles. */
  pull: Promise<void> = Promise.resolve();

  constructor(backend: QueryBackend<C>, target: QueryTarget, nodes?: NodesInput) {
    const urls = buildConnectionUrls(resolveEndpoints(nodes), target);
    this.backend = backend;
    this.target = target;
    this.healthcheckUrls = urls.healthcheckUrls;
    this.requestUrls = urls.requestUrls;
    this.eventBus = new EventBus();
    this.readerId = crypto.randomUUID();
  }

  transitionTo(newStatus: ReaderStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  requireSession(): Session<C> {
    if (!this.session) {
      throw new Error('ScrollReader: no open session. Call open() first.');
    }
    return this.session;
  }

  /** Release the server-side scroll at most once. No-op for backends without `release`. */
  async releaseCursor(): Promise<void> {
    const session = this.session;
    if (!session || this.released || !this.backend.release) return;
    this.released = true;
    await this.backend.release(session.cursor, scrollUrl(session.requestUrl));
  }

  fail(error: unknown): void {
    this.transitionTo(ReaderStatus.FAILED);
    this.eventBus.emit({
      type: 'source:failed',
      readerId: this.readerId,
      error: error instanceof Error ? error.message : String(error),
      code: isScrollSourceError(error) ? error.code : undefined,
      timestamp: Date.now(),
    });
  }
}
