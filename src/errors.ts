export type PosterErrorCode =
  | "geocode_not_found"
  | "geocode_unavailable"
  | "network"
  | "cache"
  | "coordinates"
  | "render";

export class PosterError extends Error {
  readonly code: PosterErrorCode;

  constructor(code: PosterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PosterError";
    this.code = code;
  }
}

/** Raised when a place name cannot be turned into coordinates. */
export class GeocodingError extends PosterError {
  readonly query: string;

  constructor(
    reason: "not_found" | "unavailable",
    query: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(reason === "not_found" ? "geocode_not_found" : "geocode_unavailable", message, options);
    this.name = "GeocodingError";
    this.query = query;
  }
}

export class NetworkError extends PosterError {
  readonly status: number;
  readonly retryAfterMs: number | null;

  constructor(message: string, status: number, retryAfterMs: number | null = null) {
    super("network", message);
    this.name = "NetworkError";
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

export class CacheError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("cache", message, options);
    this.name = "CacheError";
  }
}

export class CoordinateParseError extends PosterError {
  readonly input: string;

  constructor(input: string, message: string) {
    super("coordinates", message);
    this.name = "CoordinateParseError";
    this.input = input;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
