/** Snapshot of the most recent HTTP exchange, for caller diagnostics. */
export interface ResponseMeta {
  method: string;
  url: string;
  params: Record<string, string>;
  httpStatus: number;
  /** 1-based attempt that produced this response. */
  attempt: number;
  etag: string | null;
  cacheControl: string | null;
  retryAfter: string | null;
  rateLimitRemaining: number | null;
  rateLimitReset: Date | null;
}

// Values at or above this are epoch seconds; below, seconds from now.
const EPOCH_SECONDS_THRESHOLD = 1_000_000_000;

/** Parses Retry-After (delta seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null || value.trim() === "") return null;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : null;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }
  return null;
}

export function parseRateLimitReset(value: string | null, now: number = Date.now()): Date | null {
  if (value === null || value.trim() === "") return null;
  const n = Number(value);
  if (!Number.isNaN(n)) {
    if (n < 0) return null;
    return n >= EPOCH_SECONDS_THRESHOLD ? new Date(n * 1000) : new Date(now + n * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? null : new Date(date);
}

function parseRemaining(value: string | null): number | null {
  if (value === null || value.trim() === "") return null;
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

export function responseMetaFrom(
  response: { status: number; headers: Headers },
  request: { method: string; url: string; params: Readonly<Record<string, string>> },
  attempt: number,
  now: number = Date.now(),
): ResponseMeta {
  const h = response.headers;
  return {
    method: request.method,
    url: request.url,
    params: { ...request.params },
    httpStatus: response.status,
    attempt,
    etag: h.get("etag"),
    cacheControl: h.get("cache-control"),
    retryAfter: h.get("retry-after"),
    rateLimitRemaining: parseRemaining(
      h.get("x-ratelimit-remaining") ?? h.get("ratelimit-remaining"),
    ),
    rateLimitReset: parseRateLimitReset(
      h.get("x-ratelimit-reset") ?? h.get("ratelimit-reset"),
      now,
    ),
  };
}
