import {
  AuthError,
  ClientError,
  InvalidResponseError,
  NotFoundError,
  RateLimitError,
} from "./errors";
import type { FurnilyticsError } from "./errors";
import { parseRateLimitReset, parseRetryAfter } from "./meta";

export interface ParsedBody {
  text: string;
  isJson: boolean;
  json: unknown;
}

export type Classification =
  | { ok: true; status: number; body: unknown }
  | { ok: false; error: FurnilyticsError };

const SNIPPET_LENGTH = 200;

export function parseBody(text: string): ParsedBody {
  if (text.trim() === "") return { text, isJson: false, json: undefined };
  try {
    return { text, isJson: true, json: JSON.parse(text) };
  } catch {
    return { text, isJson: false, json: undefined };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonBlank(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

/**
 * Pulls a human-readable message out of an error body. Understands
 * `{detail: "..."}`, `{detail: {msg: "..."}}`, `{message}`, `{error}`,
 * a bare JSON string and plain text.
 */
export function extractMessage(body: ParsedBody, fallback: string): string {
  if (body.isJson) {
    const json = body.json;
    if (isRecord(json)) {
      const detail = json.detail;
      if (nonBlank(detail)) return detail;
      if (isRecord(detail)) {
        if (nonBlank(detail.msg)) return detail.msg;
        return JSON.stringify(detail);
      }
      if (nonBlank(json.message)) return json.message;
      if (nonBlank(json.error)) return json.error;
    } else if (nonBlank(json)) {
      return json;
    }
    return fallback;
  }
  const snippet = body.text.trim().slice(0, SNIPPET_LENGTH);
  return snippet || fallback;
}

/**
 * Maps an HTTP status and body to success or a typed error. Business fields
 * such as `visibility` are never consulted; access decisions are the server's.
 */
export function classifyResponse(
  status: number,
  body: ParsedBody,
  headers: Headers,
  now: number = Date.now(),
): Classification {
  const raw = body.isJson ? body.json : undefined;

  if (status >= 200 && status < 300) {
    if (body.isJson) return { ok: true, status, body: body.json };
    const snippet = body.text.trim().slice(0, SNIPPET_LENGTH);
    if (!snippet) return { ok: true, status, body: null };
    return {
      ok: false,
      error: new InvalidResponseError(`Invalid JSON response (HTTP ${status}): ${snippet}`, status),
    };
  }

  if (status === 401) {
    return { ok: false, error: new AuthError(extractMessage(body, "Invalid or missing API key."), 401, raw) };
  }
  if (status === 403) {
    return { ok: false, error: new AuthError(extractMessage(body, "Forbidden."), 403, raw) };
  }
  if (status === 404) {
    return { ok: false, error: new NotFoundError(extractMessage(body, "Resource not found."), raw) };
  }
  if (status === 429) {
    return {
      ok: false,
      error: new RateLimitError(extractMessage(body, "Rate limit exceeded."), {
        retryAfterMs: parseRetryAfter(headers.get("retry-after"), now),
        resetAt: parseRateLimitReset(
          headers.get("x-ratelimit-reset") ?? headers.get("ratelimit-reset"),
          now,
        ),
        raw,
      }),
    };
  }
  if (status >= 400 && status < 500) {
    return { ok: false, error: new ClientError(extractMessage(body, `Client error (${status}).`), status, raw) };
  }
  if (status >= 500 && status < 600) {
    return { ok: false, error: new ClientError(extractMessage(body, `Server error (${status}).`), status, raw) };
  }

  return {
    ok: false,
    error: new InvalidResponseError(`Unexpected HTTP status ${status}`, status, raw),
  };
}
