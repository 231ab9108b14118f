/** Machine-readable error codes shared by every `ScrollSourceError`. */
export type ScrollSourceErrorCode =
  | 'CONFIGURATION'
  | 'NODE_UNAVAILABLE'
  | 'NO_HEALTHY_NODE'
  | 'FETCH_FAILED'
  | 'DECODE_FAILED'
  | 'CORRUPT_PAGE';

/** Base class for all errors raised by the reader and its backends. */
export class ScrollSourceError extends Error {
  readonly code: ScrollSourceErrorCode;
  readonly context?: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code: ScrollSourceErrorCode,
    options?: { readonly cause?: unknown; readonly context?: Readonly<Record<string, unknown>> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.context = options?.context;
  }
}

/** A node entry or reader option is malformed. Raised before any request is made. */
export class ConfigurationError extends ScrollSourceError {
  constructor(message: string, context?: Readonly<Record<string, unknown>>) {
    super(message, 'CONFIGURATION', { context });
  }
}

/**
 * One candidate node failed its health check or opening search.
 *
 * The node selector collects these and moves on to the next candidate; they
 * only reach the caller inside `NoHealthyNodeError.attempts`.
 */
export class NodeUnavailableError extends ScrollSourceError {
  readonly healthcheckUrl: string;
  readonly requestUrl: string;

  constructor(healthcheckUrl: string, requestUrl: string, cause: unknown) {
    super(`Node unavailable: ${healthcheckUrl} (${describeCause(cause)})`, 'NODE_UNAVAILABLE', {
      cause,
      context: { healthcheckUrl, requestUrl },
    });
    this.healthcheckUrl = healthcheckUrl;
    this.requestUrl = requestUrl;
  }
}

/** Every candidate node failed. Terminal: the reader cannot be opened. */
export class NoHealthyNodeError extends ScrollSourceError {
  readonly attempts: readonly NodeUnavailableError[];

  constructor(attempts: readonly NodeUnavailableError[]) {
    super(
      `No healthy node available for this index (${String(attempts.length)} tried), check the cluster status and index`,
      'NO_HEALTHY_NODE',
      { context: { nodes: attempts.map((a) => a.healthcheckUrl) } },
    );
    this.attempts = attempts;
  }
}

/** A request failed at the transport level or returned a non-success status. */
export class FetchError extends ScrollSourceError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options?: { readonly status?: number; readonly cause?: unknown }) {
    super(message, 'FETCH_FAILED', { cause: options?.cause, context: { url, status: options?.status } });
    this.url = url;
    this.status = options?.status;
  }
}

/** A response or document could not be turned into typed columns. */
export class DecodeError extends ScrollSourceError {
  constructor(message: string, context?: Readonly<Record<string, unknown>>, cause?: unknown) {
    super(message, 'DECODE_FAILED', { cause, context });
  }
}

/** A fetched page has columns of different lengths, or the wrong number of columns. */
export class CorruptPageError extends ScrollSourceError {
  constructor(message: string, context?: Readonly<Record<string, unknown>>) {
    super(message, 'CORRUPT_PAGE', { context });
  }
}

/** Return `true` when the value is one of this library's errors. */
export function isScrollSourceError(error: unknown): error is ScrollSourceError {
  return error instanceof ScrollSourceError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
