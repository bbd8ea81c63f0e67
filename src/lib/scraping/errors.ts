export enum FetchErrorKind {
  NETWORK = "network",
  HTTP_STATUS = "http_status",
  CREDENTIALS_EXHAUSTED = "credentials_exhausted",
  RETRIES_EXHAUSTED = "retries_exhausted",
  CANCELLED = "cancelled",
}

export interface FetchErrorOptions {
  url?: string;
  status?: number;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url?: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, message: string, options: FetchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = options.url;
    this.status = options.status;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
  }
}

export function httpStatusError(url: string, status: number): FetchError {
  return new FetchError(FetchErrorKind.HTTP_STATUS, `HTTP ${status} for ${url}`, { url, status });
}

export function cancelledError(url?: string): FetchError {
  return new FetchError(FetchErrorKind.CANCELLED, url ? `Cancelled before fetching ${url}` : "Cancelled", { url });
}

/** Coerce anything thrown by a fetch into a FetchError */
export function toFetchError(error: unknown, url?: string): FetchError {
  if (error instanceof FetchError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(FetchErrorKind.NETWORK, url ? `${message} (${url})` : message, { url, cause: error });
}

/** 403 and 429: the origin (or the API in front of it) is refusing this identity */
export function isRateLimited(error: unknown): boolean {
  return (
    error instanceof FetchError &&
    error.kind === FetchErrorKind.HTTP_STATUS &&
    (error.status === 403 || error.status === 429)
  );
}

export function isCredentialsExhausted(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  if (error.kind === FetchErrorKind.CREDENTIALS_EXHAUSTED) return true;
  return error.kind === FetchErrorKind.RETRIES_EXHAUSTED && isCredentialsExhausted(error.cause);
}

export function isCancelled(error: unknown): boolean {
  return error instanceof FetchError && error.kind === FetchErrorKind.CANCELLED;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
