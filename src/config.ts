import { z } from "zod";
import { ConfigError } from "./errors";
import type { Logger } from "./logger";
import { createConsoleLogger, isLogLevel } from "./logger";
import type { Sleep } from "./transport";
import { defaultSleep } from "./transport";

export const VERSION = "0.2.0";

/** Interceptor called once per call, before the first attempt. Can modify headers. */
export interface RequestInterceptor {
  (request: { method: string; url: string; headers: Record<string, string> }): void | Promise<void>;
}

/** Interceptor called after each received response (before classification). */
export interface ResponseInterceptor {
  (response: Response, request: { method: string; url: string; attempt: number }): void | Promise<void>;
}

/** Reads one environment variable. Injected so resolution is testable without touching process.env. */
export type EnvAccessor = (name: string) => string | undefined;

export const processEnv: EnvAccessor = (name) => process.env[name];

export const ENV = {
  apiKey: "FURNILYTICS_API_KEY",
  baseURL: "FURNILYTICS_BASE_URL",
  logLevel: "FURNILYTICS_LOG_LEVEL",
} as const;

export interface ClientOptions {
  /** Only needed for pro datasets. Falls back to FURNILYTICS_API_KEY. */
  apiKey?: string;
  /** Falls back to FURNILYTICS_BASE_URL, then the public endpoint. */
  baseURL?: string;
  /** Overall budget for one call, retries and backoff included. */
  timeoutSeconds?: number;
  /** Retries after the first attempt, for 429, 5xx and connection failures. */
  maxRetries?: number;
  userAgent?: string;
  headers?: Record<string, string>;
  onRequest?: RequestInterceptor[];
  onResponse?: ResponseInterceptor[];
  logger?: Logger;
  /** Backoff sleep; must reject when the signal aborts. */
  sleep?: Sleep;
  /** Jitter source in [0, 1). */
  random?: () => number;
}

export interface ClientConfig {
  readonly baseURL: string;
  readonly apiKey?: string;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
  readonly userAgent: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly onRequest: readonly RequestInterceptor[];
  readonly onResponse: readonly ResponseInterceptor[];
  readonly logger: Logger;
  readonly sleep: Sleep;
  readonly random: () => number;
}

export const DEFAULT_CONFIG = {
  baseURL: "https://furnilytics-api.fly.dev",
  timeoutSeconds: 20,
  maxRetries: 4,
  userAgent: `furnilytics-js/${VERSION}`,
} as const;

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

const settingsSchema = z.object({
  baseURL: z.string().refine(isHttpUrl, "must be an absolute http(s) URL"),
  apiKey: z.string().optional(),
  timeoutSeconds: z.number().finite().positive(),
  maxRetries: z.number().int().nonnegative(),
});

function fromEnv(env: EnvAccessor, name: string): string | undefined {
  const value = env(name)?.trim();
  return value ? value : undefined;
}

/**
 * Resolves the effective configuration. Each setting comes from the explicit
 * option if given, then the environment, then the built-in default.
 */
export function resolveConfig(
  options: ClientOptions = {},
  env: EnvAccessor = processEnv,
): ClientConfig {
  const parsed = settingsSchema.safeParse({
    baseURL: options.baseURL ?? fromEnv(env, ENV.baseURL) ?? DEFAULT_CONFIG.baseURL,
    apiKey: options.apiKey !== undefined ? options.apiKey : fromEnv(env, ENV.apiKey),
    timeoutSeconds: options.timeoutSeconds ?? DEFAULT_CONFIG.timeoutSeconds,
    maxRetries: options.maxRetries ?? DEFAULT_CONFIG.maxRetries,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid client configuration (${details})`);
  }

  const settings = parsed.data;
  const level = fromEnv(env, ENV.logLevel)?.toLowerCase();

  return Object.freeze({
    baseURL: settings.baseURL.replace(/\/+$/, ""),
    apiKey: settings.apiKey ? settings.apiKey : undefined,
    timeoutSeconds: settings.timeoutSeconds,
    maxRetries: settings.maxRetries,
    userAgent: options.userAgent ?? DEFAULT_CONFIG.userAgent,
    headers: Object.freeze({ ...options.headers }),
    onRequest: Object.freeze([...(options.onRequest ?? [])]),
    onResponse: Object.freeze([...(options.onResponse ?? [])]),
    logger:
      options.logger ??
      createConsoleLogger(level !== undefined && isLogLevel(level) ? level : "warn"),
    sleep: options.sleep ?? defaultSleep,
    random: options.random ?? Math.random,
  });
}
