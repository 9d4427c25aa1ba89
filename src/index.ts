export { FurnilyticsClient } from "./client";
export type { CallOptions } from "./client";
export { DEFAULT_CONFIG, ENV, VERSION, processEnv, resolveConfig } from "./config";
export type {
  ClientConfig,
  ClientOptions,
  EnvAccessor,
  RequestInterceptor,
  ResponseInterceptor,
} from "./config";
export {
  AuthError,
  CancelledError,
  ClientError,
  ConfigError,
  FurnilyticsError,
  InvalidRequestError,
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  isApiError,
  isTransient,
} from "./errors";
export type { ApiError, ErrorKind } from "./errors";
export { createConsoleLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export type { ResponseMeta } from "./meta";
export type { DataQuery } from "./request";
export { Table } from "./table";
export type { Sleep, TransportResult } from "./transport";
export type * from "./models";
