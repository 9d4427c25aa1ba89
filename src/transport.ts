import type { Classification } from "./classify";
import { classifyResponse, parseBody } from "./classify";
import type { ClientConfig } from "./config";
import {
  CancelledError,
  FurnilyticsError,
  NetworkError,
  RateLimitError,
  TimeoutError,
  isTransient,
} from "./errors";
import type { ResponseMeta } from "./meta";
import { responseMetaFrom } from "./meta";
import type { PreparedRequest } from "./request";

/** Waits `ms`, rejecting with the signal's reason if it aborts first. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export const BACKOFF_BASE_MS = 500;
export const BACKOFF_CAP_MS = 10_000;

/** Exponential backoff with jitter: base doubles per retry (capped), plus up to one more base. */
export function backoffDelay(retry: number, random: () => number): number {
  const base = Math.min(BACKOFF_BASE_MS * 2 ** retry, BACKOFF_CAP_MS);
  return base + random() * base;
}

/** Status and parsed JSON body of a successful exchange. */
export interface TransportResult {
  status: number;
  body: unknown;
}

/** Settles with `work`, or rejects with the signal's reason if it aborts first. */
export function untilAborted<T>(work: T | Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void Promise.resolve(work)
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Called with the metadata of every received response. */
  onMeta?: (meta: ResponseMeta) => void;
}

export class Transport {
  private readonly config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = config;
  }

  /**
   * Runs the request until it succeeds, fails with a non-transient error, or
   * runs out of retries or time. Interceptors count against the same deadline.
   */
  async execute(request: PreparedRequest, options: ExecuteOptions = {}): Promise<TransportResult> {
    const timeoutMs = this.config.timeoutSeconds * 1000;
    const deadline = Date.now() + timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

    const callerSignal = options.signal;
    const onCallerAbort = () => controller.abort(new CancelledError(callerSignal?.reason));
    if (callerSignal) {
      if (callerSignal.aborted) {
        onCallerAbort();
      } else {
        callerSignal.addEventListener("abort", onCallerAbort, { once: true });
      }
    }

    try {
      const headers: Record<string, string> = { ...request.headers };

      // Run request interceptors (e.g., trace IDs)
      for (const interceptor of this.config.onRequest) {
        await untilAborted(
          interceptor({ method: request.method, url: request.url, headers }),
          controller.signal,
        );
      }

      return await this.run(request, headers, controller.signal, deadline, options);
    } catch (e) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
      if (reason instanceof FurnilyticsError) throw reason;
      throw e;
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async run(
    request: PreparedRequest,
    headers: Record<string, string>,
    signal: AbortSignal,
    deadline: number,
    options: ExecuteOptions,
  ): Promise<TransportResult> {
    const { logger, maxRetries } = this.config;
    const maxAttempts = maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      signal.throwIfAborted();
      logger.debug(`${request.method} ${request.path}`, { attempt, maxAttempts });

      const outcome = await this.attempt(request, headers, signal, attempt, options);
      if (outcome.ok) return { status: outcome.status, body: outcome.body };

      const error = outcome.error;
      if (!isTransient(error) || attempt >= maxAttempts) {
        throw error;
      }

      const delayMs =
        error instanceof RateLimitError && error.retryAfterMs !== null
          ? error.retryAfterMs
          : backoffDelay(attempt - 1, this.config.random);

      if (Date.now() + delayMs >= deadline) {
        logger.warn(`Not retrying ${request.method} ${request.path}: backoff exceeds timeout`, {
          attempt,
          delayMs,
          kind: error.kind,
        });
        throw error;
      }

      logger.warn(`Retrying ${request.method} ${request.path} after ${error.kind} error`, {
        attempt,
        delayMs: Math.round(delayMs),
        statusCode: error.statusCode,
      });
      await this.config.sleep(delayMs, signal);
    }
  }

  private async attempt(
    request: PreparedRequest,
    headers: Record<string, string>,
    signal: AbortSignal,
    attempt: number,
    options: ExecuteOptions,
  ): Promise<Classification> {
    let response: Response;
    try {
      response = await fetch(request.url, { method: request.method, headers, signal });
    } catch (e) {
      if (signal.aborted) throw e;
      return { ok: false, error: toNetworkError(e) };
    }

    options.onMeta?.(responseMetaFrom(response, request, attempt));

    // Run response interceptors (e.g., logging, metrics)
    for (const interceptor of this.config.onResponse) {
      await untilAborted(
        interceptor(response, { method: request.method, url: request.url, attempt }),
        signal,
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (e) {
      if (signal.aborted) throw e;
      return { ok: false, error: toNetworkError(e) };
    }

    return classifyResponse(response.status, parseBody(text), response.headers);
  }
}

function toNetworkError(e: unknown): NetworkError {
  const message = e instanceof Error && e.message ? e.message : "Connection failed";
  return new NetworkError(message, { cause: e });
}
