import type { QueryTarget } from '../model/Session.js';
import { ConfigurationError } from '../errors/ScrollSourceError.js';

/** How long the server keeps a scroll alive between page requests. Not configurable. */
export const SCROLL_KEEP_ALIVE = '1m';

/** Field the health endpoint's response must carry. */
export const HEALTHCHECK_FIELD = 'status';

const HEALTHCHECK_PATH = '/_cluster/health';
const SCROLL_PATH = '/_search/scroll';

/** Health, search and scroll URLs for one node, position-aligned across nodes. */
export interface ConnectionUrls {
  readonly healthcheckUrls: readonly string[];
  readonly requestUrls: readonly string[];
}

/** `base/_cluster/health` */
export function healthcheckUrl(baseUrl: string): string {
  return `${baseUrl}${HEALTHCHECK_PATH}`;
}

/** `base/index/_search?scroll=1m`, or `base/index/docType/_search?scroll=1m` when a document type is set. */
export function requestUrl(baseUrl: string, target: QueryTarget): string {
  const path = target.docType === undefined ? target.index : `${target.index}/${target.docType}`;
  return `${baseUrl}/${path}/_search?scroll=${SCROLL_KEEP_ALIVE}`;
}

/** Build the health-check and opening-search URL for every base URL, preserving order. */
export function buildConnectionUrls(baseUrls: readonly string[], target: QueryTarget): ConnectionUrls {
  assertTarget(target);
  return {
    healthcheckUrls: baseUrls.map(healthcheckUrl),
    requestUrls: baseUrls.map((base) => requestUrl(base, target)),
  };
}

/**
 * Derive the scroll continuation URL from any request URL: keeps only the
 * scheme and authority and appends `/_search/scroll`.
 */
export function scrollUrl(fromRequestUrl: string): string {
  const url = new URL(fromRequestUrl);
  return `${url.protocol}//${url.host}${SCROLL_PATH}`;
}

function assertTarget(target: QueryTarget): void {
  if (target.index.length === 0) {
    throw new ConfigurationError('Index name must not be empty');
  }
  if (target.docType !== undefined && target.docType.length === 0) {
    throw new ConfigurationError('Document type must not be empty when provided');
  }
}
