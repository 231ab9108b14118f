import { ScrollReader, type NodesInput, type QueryBackend } from '@scrollsource/core';
import { HttpQueryBackend, type HttpScrollCursor } from './infrastructure/HttpQueryBackend.js';

/** Configuration for an Elasticsearch-backed dataset. */
export interface ElasticsearchDatasetConfig {
  /**
   * Nodes in `protocol://host:port` form, e.g. `['http://localhost:9200']`.
   * Tried in order until one is healthy. Default: `'http://localhost:9200'`.
   */
  readonly nodes?: NodesInput;
  /** Index to read. */
  readonly index: string;
  /** Document type within the index. Default: none. */
  readonly docType?: string;
  /** Per-request timeout in milliseconds. Default: `30000`. Ignored when `backend` is given. */
  readonly timeout?: number;
  /** Extra HTTP headers for every request. Ignored when `backend` is given. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Backend override. Default: an `HttpQueryBackend` built from `timeout` and `headers`. */
  readonly backend?: QueryBackend<HttpScrollCursor>;
}

/**
 * An index read as a lazy sequence of column-oriented pages.
 *
 * Each page maps column names to typed arrays (`Int32Array`, `BigInt64Array`,
 * `Float64Array` or `string[]`) of equal length.
 *
 * @example
 * ```typescript
 * const dataset = await ElasticsearchDataset.connect({
 *   nodes: ['http://localhost:9200', 'http://localhost:9201'],
 *   index: 'books',
 * });
 * for await (const page of dataset) {
 *   console.log(page.title, page.year);
 * }
 * ```
 */
export class ElasticsearchDataset extends ScrollReader<HttpScrollCursor> {
  constructor(config: ElasticsearchDatasetConfig) {
    super({
      backend: config.backend ?? new HttpQueryBackend({ timeout: config.timeout, headers: config.headers }),
      nodes: config.nodes,
      index: config.index,
      docType: config.docType,
    });
  }

  /** Create the dataset and select a healthy node. */
  static async connect(config: ElasticsearchDatasetConfig): Promise<ElasticsearchDataset> {
    const dataset = new ElasticsearchDataset(config);
    await dataset.open();
    return dataset;
  }
}
