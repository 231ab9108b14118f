import { parse } from 'lossless-json';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  DecodeError,
  FetchError,
  SCROLL_KEEP_ALIVE,
  decodeColumns,
  type ColumnType,
  type FetchedValues,
  type OpenedScroll,
  type QueryBackend,
  type ScrollCursor,
  type SourceDocument,
} from '@scrollsource/core';
import { healthResponseSchema, searchResponseSchema, type SearchResponse } from '../domain/model/SearchResponse.js';
import { inferTypeTag } from '../domain/services/inferTypeTag.js';
import { toSourceDocument } from '../domain/services/toSourceDocument.js';

export interface HttpQueryBackendOptions {
  /** Extra HTTP headers sent with every request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Per-request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
}

/**
 * Scroll position on a search node.
 *
 * Carries the column names so every page can be decoded without asking the
 * node again, and the hits of the opening search until they are handed out.
 */
export interface HttpScrollCursor extends ScrollCursor {
  readonly columns: readonly string[];
  /** Documents returned by the opening search, or `null` once consumed. */
  readonly pending: readonly SourceDocument[] | null;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Query backend talking to a search node's REST API with the Fetch API.
 *
 * - open: `GET` the health endpoint, then `GET` the opening search
 * - next: first returns the opening hits, then `POST`s to the scroll endpoint
 * - release: `DELETE`s the scroll
 *
 * Bodies are parsed with `lossless-json`, so column types come from each
 * number's JSON text (`10.0` is a double) and integers beyond 2^53 arrive as
 * `bigint`. Columns follow the first hit's object key order, in which
 * integer-like field names (`"1"`, `"2"`) precede all others.
 *
 * Requires a runtime with global `fetch` (Node.js >= 18).
 */
export class HttpQueryBackend implements QueryBackend<HttpScrollCursor> {
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;

  constructor(options?: HttpQueryBackendOptions) {
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30000;
  }

  async open(healthcheckUrl: string, healthcheckField: string, requestUrl: string): Promise<OpenedScroll<HttpScrollCursor>> {
    const health = await this.requestJson('GET', healthcheckUrl, healthResponseSchema);
    if (!Object.hasOwn(health, healthcheckField)) {
      throw new DecodeError(`Health check response from ${healthcheckUrl} has no '${healthcheckField}' field`, {
        url: healthcheckUrl,
        field: healthcheckField,
      });
    }

    const response = await this.requestJson('GET', requestUrl, searchResponseSchema);
    // Typed from the raw JSON text, before numbers are converted.
    const first = response.hits.hits[0]?._source;
    const columns = first ? Object.keys(first) : [];

    return {
      cursor: { scrollId: response._scroll_id, columns, pending: toDocuments(response) },
      columns,
      typeTags: columns.map((column) => inferTypeTag(first?.[column])),
    };
  }

  async next(
    cursor: HttpScrollCursor,
    _requestUrl: string,
    scrollUrl: string,
    columnTypes: readonly ColumnType[],
  ): Promise<FetchedValues<HttpScrollCursor>> {
    if (cursor.pending !== null) {
      return {
        cursor: { ...cursor, pending: null },
        values: decodeColumns(cursor.pending, cursor.columns, columnTypes),
      };
    }

    const response = await this.requestJson('POST', scrollUrl, searchResponseSchema, {
      scroll: SCROLL_KEEP_ALIVE,
      scroll_id: cursor.scrollId,
    });

    return {
      cursor: { scrollId: response._scroll_id, columns: cursor.columns, pending: null },
      values: decodeColumns(toDocuments(response), cursor.columns, columnTypes),
    };
  }

  async release(cursor: HttpScrollCursor, scrollUrl: string): Promise<void> {
    const response = await this.send('DELETE', scrollUrl, { scroll_id: [cursor.scrollId] });

    // 404: the scroll already expired on the node.
    if (!response.ok && response.status !== 404) {
      throw new FetchError(`HTTP ${String(response.status)} ${response.statusText} for DELETE ${scrollUrl}`, scrollUrl, {
        status: response.status,
      });
    }
  }

  private async requestJson<T>(
    method: HttpMethod,
    url: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T> {
    const response = await this.send(method, url, body);

    if (!response.ok) {
      throw new FetchError(`HTTP ${String(response.status)} ${response.statusText} for ${method} ${url}`, url, {
        status: response.status,
      });
    }

    let json: unknown;
    try {
      json = parse(response.text);
    } catch (error) {
      throw new DecodeError(`Response from ${method} ${url} is not valid JSON`, { url }, error);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new DecodeError(`Unexpected response from ${method} ${url}: ${parsed.error.message}`, { url }, parsed.error);
    }
    return parsed.data;
  }

  /** Perform the request and read the whole body under one timeout. */
  private async send(
    method: HttpMethod,
    url: string,
    body?: unknown,
  ): Promise<{ ok: boolean; status: number; statusText: string; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      return { ok: response.ok, status: response.status, statusText: response.statusText, text };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${String(this.timeout)}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new FetchError(`Request failed: ${method} ${url}: ${reason}`, url, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function toDocuments(response: SearchResponse): SourceDocument[] {
  return response.hits.hits.map((hit) => toSourceDocument(hit._source));
}
