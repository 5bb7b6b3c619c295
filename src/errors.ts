export type ListingWatchErrorCode =
  | "FETCH_BLOCKED"
  | "FETCH_TIMEOUT"
  | "FETCH_NETWORK"
  | "EXTRACTION_SCHEMA"
  | "PERSISTENCE"
  | "DELIVERY"
  | "ABORTED";

export class ListingWatchError extends Error {
  readonly code: ListingWatchErrorCode;

  constructor(code: ListingWatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Anti-bot page, CAPTCHA or denied response. Never retried within a run. */
export class FetchBlockedError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FETCH_BLOCKED", message, options);
  }
}

export class FetchTimeoutError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FETCH_TIMEOUT", message, options);
  }
}

export class FetchNetworkError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FETCH_NETWORK", message, options);
  }
}

/** The page matches no known listing layout: the site changed and the selectors need maintenance. */
export class ExtractionSchemaError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXTRACTION_SCHEMA", message, options);
  }
}

export class PersistenceError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE", message, options);
  }
}

export class DeliveryError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DELIVERY", message, options);
  }
}

export class AbortedError extends ListingWatchError {
  constructor(message = "Run aborted by stop signal") {
    super("ABORTED", message);
  }
}

/** Fetch failures worth the single retry a run is allowed. */
export function isTransientFetchError(e: unknown): e is FetchTimeoutError | FetchNetworkError {
  return e instanceof FetchTimeoutError || e instanceof FetchNetworkError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
