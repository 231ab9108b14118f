import type { ColumnType } from './domain/model/ColumnType.js';
import type { Page } from './domain/model/Page.js';
import type { ReaderStatus } from './domain/model/ReaderStatus.js';
import type { ScrollCursor } from './domain/model/Session.js';
import type { QueryBackend } from './domain/ports/QueryBackend.js';
import type { NodesInput } from './domain/services/EndpointResolver.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { ReaderContext } from './application/ReaderContext.js';
import { OpenReader } from './application/usecases/OpenReader.js';
import { ProducePage } from './application/usecases/ProducePage.js';
import { CloseReader } from './application/usecases/CloseReader.js';

/** Configuration for a scroll reader. */
export interface ScrollReaderConfig<C extends ScrollCursor = ScrollCursor> {
  /** Executes health checks, opening searches and scroll requests. */
  readonly backend: QueryBackend<C>;
  /**
   * Candidate nodes in `protocol://host:port` form, tried in order.
   * Default: `'http://localhost:9200'`.
   */
  readonly nodes?: NodesInput;
  /** Index to read. */
  readonly index: string;
  /** Document type narrowing the search path. Default: none. */
  readonly docType?: string;
}

/** Snapshot returned by `ScrollReader.getStatus()`. */
export interface ScrollReaderStatus {
  readonly status: ReaderStatus;
  readonly pagesRead: number;
  readonly rowsRead: number;
  /** Opening search URL of the selected node, or `null` before a node is selected. */
  readonly requestUrl: string | null;
}

/**
 * Lazy, pull-based sequence of column-oriented pages read through a scroll cursor.
 *
 * Construction resolves the node list (and throws `ConfigurationError` for a
 * malformed one); `open()` selects the first healthy node; each `produce()`
 * fetches one page. Pages are read strictly one after another, and an instance
 * reads its scroll once: to read again, create a new reader.
 *
 * @example
 * ```typescript
 * const reader = new ScrollReader({ backend, nodes: ['http://localhost:9200'], index: 'books' });
 * reader.on('node:skipped', (e) => console.warn(`Skipping host: ${e.healthcheckUrl}`));
 * await reader.open();
 * for await (const page of reader) {
 *   train(page.title, page.year);
 * }
 * ```
 */
export class ScrollReader<C extends ScrollCursor = ScrollCursor> implements AsyncIterable<Page> {
  private readonly ctx: ReaderContext<C>;

  /** @throws ConfigurationError when a node lacks an explicit protocol or the index is empty. */
  constructor(config: ScrollReaderConfig<C>) {
    this.ctx = new ReaderContext(
      config.backend,
      config.docType !== undefined ? { index: config.index, docType: config.docType } : { index: config.index },
      config.nodes,
    );
  }

  /** Create a reader and open it in one step. */
  static async open<C extends ScrollCursor>(config: ScrollReaderConfig<C>): Promise<ScrollReader<C>> {
    const reader = new ScrollReader(config);
    await reader.open();
    return reader;
  }

  /** Unique identifier carried by every event this reader emits. */
  get readerId(): string {
    return this.ctx.readerId;
  }

  /** Column names of the open session. */
  get columns(): readonly string[] {
    return this.ctx.requireSession().columns;
  }

  /** Column types of the open session, position-aligned with `columns`. */
  get columnTypes(): readonly ColumnType[] {
    return this.ctx.requireSession().columnTypes;
  }

  /** Subscribe to a reader event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Select the first healthy node and open a scroll on it.
   *
   * @throws NoHealthyNodeError when every node fails.
   */
  async open(): Promise<void> {
    return new OpenReader(this.ctx).execute();
  }

  /**
   * Fetch the next non-empty page.
   *
   * @returns The page, or `null` once the scroll is exhausted, has failed, or the reader is closed.
   * @throws FetchError, DecodeError or CorruptPageError when the fetch fails. Nothing more is produced afterwards.
   */
  produce(): Promise<Page | null> {
    const result = this.ctx.pull.then(() => new ProducePage(this.ctx).execute());
    this.ctx.pull = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** `true` while more pages may follow. */
  hasMore(): boolean {
    return this.ctx.status === 'CREATED' || this.ctx.status === 'CONNECTING' || this.ctx.status === 'OPEN';
  }

  /** Release the server-side scroll and stop producing. Safe to call more than once. */
  async close(): Promise<void> {
    await this.ctx.pull;
    return new CloseReader(this.ctx).execute();
  }

  getStatus(): ScrollReaderStatus {
    return {
      status: this.ctx.status,
      pagesRead: this.ctx.pagesRead,
      rowsRead: this.ctx.rowsRead,
      requestUrl: this.ctx.session?.requestUrl ?? null,
    };
  }

  /**
   * Iterate over all remaining pages, opening the reader first if needed.
   *
   * An instance can be iterated once. The reader is closed when iteration ends
   * or the loop is left early; after a fetch error it is left `FAILED` and the
   * server drops the scroll when its keep-alive runs out.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Page, void, undefined> {
    if (this.ctx.iterating) {
      throw new Error('ScrollReader: pages can only be iterated once. Create a new reader to read again.');
    }
    this.ctx.iterating = true;

    if (this.ctx.status === 'CREATED') {
      await this.open();
    }

    try {
      for (;;) {
        const page = await this.produce();
        if (page === null) return;
        yield page;
      }
    } finally {
      if (this.ctx.status !== 'FAILED') {
        await this.close();
      }
    }
  }
}
