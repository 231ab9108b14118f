// Main entry point
export { ScrollReader } from './ScrollReader.js';
export type { ScrollReaderConfig, ScrollReaderStatus } from './ScrollReader.js';

// Domain model
export { ColumnType, TYPE_TAG_BY_COLUMN_TYPE, columnTypeFromTag, columnTypesFromTags } from './domain/model/ColumnType.js';
export type { ColumnData } from './domain/model/ColumnType.js';
export type { Page } from './domain/model/Page.js';
export { createPage, pageRowCount } from './domain/model/Page.js';
export type { ScrollCursor, QueryTarget, Session } from './domain/model/Session.js';
export { advanceSession } from './domain/model/Session.js';
export { ReaderStatus } from './domain/model/ReaderStatus.js';

// Errors
export {
  ScrollSourceError,
  ConfigurationError,
  NodeUnavailableError,
  NoHealthyNodeError,
  FetchError,
  DecodeError,
  CorruptPageError,
  isScrollSourceError,
} from './domain/errors/ScrollSourceError.js';
export type { ScrollSourceErrorCode } from './domain/errors/ScrollSourceError.js';

// Domain services
export { resolveEndpoints, DEFAULT_NODE } from './domain/services/EndpointResolver.js';
export type { NodesInput } from './domain/services/EndpointResolver.js';
export {
  healthcheckUrl,
  requestUrl,
  scrollUrl,
  buildConnectionUrls,
  SCROLL_KEEP_ALIVE,
  HEALTHCHECK_FIELD,
} from './domain/services/UrlBuilder.js';
export type { ConnectionUrls } from './domain/services/UrlBuilder.js';
export { decodeColumns } from './domain/services/ColumnDecoder.js';
export type { SourceDocument } from './domain/services/ColumnDecoder.js';

// Ports (for custom backends)
export type { QueryBackend, OpenedScroll, FetchedValues } from './domain/ports/QueryBackend.js';

// Application internals (for adapters that drive pages themselves)
export { EventBus } from './application/EventBus.js';
export { FetchPage } from './application/usecases/FetchPage.js';
export type { FetchedPage } from './application/usecases/FetchPage.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  NodeConnectedEvent,
  NodeSkippedEvent,
  PageFetchedEvent,
  SourceExhaustedEvent,
  SourceFailedEvent,
  SourceReleaseFailedEvent,
  SourceClosedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { InMemoryQueryBackend } from './infrastructure/backends/InMemoryQueryBackend.js';
export type {
  InMemoryTable,
  InMemoryQueryBackendOptions,
  InMemoryCursor,
  InMemoryCall,
} from './infrastructure/backends/InMemoryQueryBackend.js';
