import type { ClientConfig } from "./config";
import { InvalidRequestError } from "./errors";

export type HttpMethod = "GET";

export interface DataQuery {
  /** Inclusive lower bound, `YYYY-MM-DD`. Sent as `frm`. */
  from?: string;
  /** Inclusive upper bound, `YYYY-MM-DD`. */
  to?: string;
  limit?: number;
}

export type Operation =
  | { op: "health" }
  | { op: "datasets" }
  | { op: "metadata" }
  | { op: "metadataOne"; id: string }
  | { op: "data"; id: string; query?: DataQuery };

export interface PreparedRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly url: string;
  readonly params: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Encodes a `topic/subtopic/table_id` identifier as a path, one segment at a
 * time, so the slashes between segments survive and everything else is escaped.
 */
export function encodeDatasetId(id: string): string {
  const trimmed = id.replace(/^\/+|\/+$/g, "");
  if (!trimmed) {
    throw new InvalidRequestError("Dataset id must not be empty");
  }
  const segments = trimmed.split("/");
  if (segments.some((s) => s.length === 0)) {
    throw new InvalidRequestError(`Dataset id "${id}" contains an empty segment`);
  }
  return segments.map(encodeURIComponent).join("/");
}

export function buildDataParams(query: DataQuery = {}): Record<string, string> {
  const qp: Record<string, string> = {};
  if (query.from !== undefined) qp.frm = query.from;
  if (query.to !== undefined) qp.to = query.to;
  if (query.limit !== undefined) {
    if (!Number.isInteger(query.limit) || query.limit <= 0) {
      throw new InvalidRequestError(`limit must be a positive integer, got ${query.limit}`);
    }
    qp.limit = String(query.limit);
  }
  return qp;
}

function routeFor(operation: Operation): { path: string; params: Record<string, string> } {
  switch (operation.op) {
    case "health":
      return { path: "/health", params: {} };
    case "datasets":
      return { path: "/datasets", params: {} };
    case "metadata":
      return { path: "/metadata", params: {} };
    case "metadataOne":
      return { path: `/metadata/${encodeDatasetId(operation.id)}`, params: {} };
    case "data":
      return {
        path: `/data/${encodeDatasetId(operation.id)}`,
        params: buildDataParams(operation.query),
      };
  }
}

export function buildHeaders(config: ClientConfig): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "User-Agent": config.userAgent,
    ...config.headers,
  };
  if (config.apiKey) {
    headers["X-API-Key"] = config.apiKey;
  }
  return headers;
}

export function buildRequest(config: ClientConfig, operation: Operation): PreparedRequest {
  const { path, params } = routeFor(operation);

  let url = `${config.baseURL}${path}`;
  if (Object.keys(params).length > 0) {
    url += `?${new URLSearchParams(params).toString()}`;
  }

  return {
    method: "GET",
    path,
    url,
    params,
    headers: buildHeaders(config),
  };
}
