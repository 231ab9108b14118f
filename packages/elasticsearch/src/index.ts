// Main entry point
export { ElasticsearchDataset } from './ElasticsearchDataset.js';
export type { ElasticsearchDatasetConfig } from './ElasticsearchDataset.js';

// Infrastructure adapters
export { HttpQueryBackend } from './infrastructure/HttpQueryBackend.js';
export type { HttpQueryBackendOptions, HttpScrollCursor } from './infrastructure/HttpQueryBackend.js';

// Response decoding
export { inferTypeTag } from './domain/services/inferTypeTag.js';
export { searchResponseSchema, searchHitSchema, healthResponseSchema } from './domain/model/SearchResponse.js';
export type { SearchResponse, SearchHit, HealthResponse } from './domain/model/SearchResponse.js';

// Re-export commonly used types from @scrollsource/core for convenience
export type {
  Page,
  ColumnData,
  ScrollCursor,
  QueryBackend,
  NodesInput,
  ScrollReaderStatus,
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
} from '@scrollsource/core';

export {
  ColumnType,
  ReaderStatus,
  ScrollReader,
  ScrollSourceError,
  ConfigurationError,
  NodeUnavailableError,
  NoHealthyNodeError,
  FetchError,
  DecodeError,
  CorruptPageError,
  pageRowCount,
} from '@scrollsource/core';
