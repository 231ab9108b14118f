/** Emitted when a candidate node passed its health check and opened a scroll. */
export interface NodeConnectedEvent {
  readonly type: 'node:connected';
  readonly readerId: string;
  readonly healthcheckUrl: string;
  readonly requestUrl: string;
  readonly columns: readonly string[];
  readonly timestamp: number;
}

/** Emitted when a candidate node failed and selection moved on to the next one. */
export interface NodeSkippedEvent {
  readonly type: 'node:skipped';
  readonly readerId: string;
  readonly healthcheckUrl: string;
  readonly requestUrl: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for every non-empty page handed to the consumer. */
export interface PageFetchedEvent {
  readonly type: 'page:fetched';
  readonly readerId: string;
  /** Zero-based index of the page within this reader. */
  readonly pageIndex: number;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted once when an empty page ends the scroll. */
export interface SourceExhaustedEvent {
  readonly type: 'source:exhausted';
  readonly readerId: string;
  readonly pagesRead: number;
  readonly rowsRead: number;
  readonly timestamp: number;
}

/** Emitted when opening or fetching fails. The reader produces nothing afterwards. */
export interface SourceFailedEvent {
  readonly type: 'source:failed';
  readonly readerId: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Emitted when `close()` completes. */
export interface SourceClosedEvent {
  readonly type: 'source:closed';
  readonly readerId: string;
  readonly pagesRead: number;
  readonly rowsRead: number;
  readonly timestamp: number;
}

/**
 * Emitted when the scroll could not be released after the last page. The
 * read itself is complete; the server expires the scroll after its keep-alive.
 */
export interface SourceReleaseFailedEvent {
  readonly type: 'source:release-failed';
  readonly readerId: string;
  readonly scrollUrl: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | NodeConnectedEvent
  | NodeSkippedEvent
  | PageFetchedEvent
  | SourceExhaustedEvent
  | SourceFailedEvent
  | SourceReleaseFailedEvent
  | SourceClosedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
