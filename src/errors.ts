export type ErrorKind =
  | "config"
  | "invalid_request"
  | "auth"
  | "not_found"
  | "rate_limit"
  | "client"
  | "invalid_response"
  | "network"
  | "timeout"
  | "cancelled";

export class FurnilyticsError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode: number | null;
  /** Parsed response body, when the server sent one. */
  public readonly raw: unknown;

  constructor(
    kind: ErrorKind,
    message: string,
    statusCode: number | null = null,
    raw?: unknown,
  ) {
    super(message);
    this.name = "FurnilyticsError";
    this.kind = kind;
    this.statusCode = statusCode;
    this.raw = raw;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends FurnilyticsError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidRequestError extends FurnilyticsError {
  constructor(message: string) {
    super("invalid_request", message);
    this.name = "InvalidRequestError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthError extends FurnilyticsError {
  constructor(
    message: string = "Invalid or missing API key.",
    statusCode: 401 | 403 = 401,
    raw?: unknown,
  ) {
    super("auth", message, statusCode, raw);
    this.name = "AuthError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends FurnilyticsError {
  constructor(message: string = "Resource not found.", raw?: unknown) {
    super("not_found", message, 404, raw);
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RateLimitError extends FurnilyticsError {
  /** Server-requested wait before the next attempt, from Retry-After. */
  public readonly retryAfterMs: number | null;
  /** When the rate-limit window resets, from X-RateLimit-Reset. */
  public readonly resetAt: Date | null;

  constructor(
    message: string = "Rate limit exceeded.",
    options: { retryAfterMs?: number | null; resetAt?: Date | null; raw?: unknown } = {},
  ) {
    super("rate_limit", message, 429, options.raw);
    this.name = "RateLimitError";
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.resetAt = options.resetAt ?? null;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Any 4xx or 5xx response without a more specific class. */
export class ClientError extends FurnilyticsError {
  constructor(message: string, statusCode: number, raw?: unknown) {
    super("client", message, statusCode, raw);
    this.name = "ClientError";
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get isServerError(): boolean {
    return this.statusCode !== null && this.statusCode >= 500;
  }
}

export class InvalidResponseError extends FurnilyticsError {
  constructor(message: string, statusCode: number, raw?: unknown) {
    super("invalid_response", message, statusCode, raw);
    this.name = "InvalidResponseError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NetworkError extends FurnilyticsError {
  constructor(message: string = "Connection failed", options?: { cause?: unknown }) {
    super("network", message);
    this.name = "NetworkError";
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TimeoutError extends FurnilyticsError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("timeout", `Request timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CancelledError extends FurnilyticsError {
  constructor(reason?: unknown) {
    super("cancelled", "Request was cancelled");
    this.name = "CancelledError";
    if (reason !== undefined) this.cause = reason;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Errors produced by classifying an HTTP error status. */
export type ApiError = AuthError | NotFoundError | RateLimitError | ClientError;

export function isApiError(error: unknown): error is ApiError {
  return (
    error instanceof AuthError ||
    error instanceof NotFoundError ||
    error instanceof RateLimitError ||
    error instanceof ClientError
  );
}

/** Whether a failure may resolve on retry: 429, 5xx, or a connection failure. */
export function isTransient(error: FurnilyticsError): boolean {
  switch (error.kind) {
    case "rate_limit":
    case "network":
      return true;
    case "client":
      return error.statusCode !== null && error.statusCode >= 500;
    default:
      return false;
  }
}
