/**
 * Error types shared by the crawl, embed and search phases.
 *
 * Every error carries a machine-readable `code` so job status and CLI output
 * can report it without relying on class identity.
 */

export class SiteIndexError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export type FetchErrorKind =
  | "transient-network"
  | "upstream-rejected-input"
  | "upstream-server-error"
  | "timeout";

const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  "transient-network",
  "timeout",
  "upstream-server-error",
]);

/**
 * A failed call to the scrape oracle
 */
export class FetchError extends SiteIndexError {
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, "FETCH_FAILED", { cause: options?.cause });
    this.kind = kind;
    this.status = options?.status;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export class PersistenceError extends SiteIndexError {
  constructor(message: string, cause?: unknown) {
    super(message, "PERSISTENCE_FAILED", { cause });
  }
}

export class EmbeddingError extends SiteIndexError {
  // true when the oracle could not be reached at all
  readonly unreachable: boolean;

  constructor(message: string, options?: { unreachable?: boolean; cause?: unknown }) {
    super(message, "EMBEDDING_FAILED", { cause: options?.cause });
    this.unreachable = options?.unreachable ?? false;
  }
}

export class CrawlAbortedError extends SiteIndexError {
  constructor(message: string, cause?: unknown) {
    super(message, "CRAWL_ABORTED", { cause });
  }
}

/**
 * One-line description of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof SiteIndexError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
