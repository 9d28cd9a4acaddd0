import { ConfigurationError, OperationCancelledError, ProviderTimeoutError } from "../errors.js";
import { sleep } from "../utils/sleep.js";
import type { LLMRateLimitConfig } from "./llmTypes.js";

interface QueuedTask {
  execute: () => Promise<void>;
  reject: (reason?: unknown) => void;
  signal: AbortSignal | undefined;
  detach: () => void;
}

export interface RateLimitedRunOptions {
  signal?: AbortSignal;
  /** Overrides the configured retry count for this call; 0 makes a single attempt. */
  maxRetries?: number;
}

export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly window: RequestWindow;
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 30_000
    };
    this.window = new RequestWindow(this.config.requestsPerMinute);
  }

  run<T>(task: () => Promise<T>, options: RateLimitedRunOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError());
    }
    const maxRetries = options.maxRetries ?? this.config.maxRetries;

    return new Promise<T>((resolve, reject) => {
      // A task still waiting for a slot leaves the queue as soon as its caller cancels.
      const onAbort = (): void => {
        const index = this.queue.indexOf(item);
        if (index >= 0) {
          this.queue.splice(index, 1);
          if (this.queue.length === 0) {
            this.clearWaitTimer();
          }
          reject(new OperationCancelledError());
        }
      };
      const item: QueuedTask = {
        signal,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
        execute: () => this.executeWithRetry(task, maxRetries, signal).then(resolve, reject)
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(item);
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.window.waitMs(Date.now());
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }
      item.detach();
      if (item.signal?.aborted) {
        item.reject(new OperationCancelledError());
        continue;
      }

      this.activeCount += 1;
      this.window.record(Date.now());
      void item.execute().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeWithRetry<T>(
    task: () => Promise<T>,
    maxRetries: number,
    signal: AbortSignal | undefined
  ): Promise<T> {
    let attempt = 0;

    while (true) {
      if (signal?.aborted) {
        throw new OperationCancelledError();
      }

      try {
        return await this.withTimeout(task(), this.config.timeoutMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new OperationCancelledError();
        }

        const shouldRetry = this.isRetryableError(error) && attempt < maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        await sleep(retryAfterMs(error) ?? this.config.retryDelayMs * 2 ** (attempt - 1), signal);
      }
    }
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number, signal: AbortSignal | undefined): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              cleanup();
              reject(new ProviderTimeoutError(timeoutMs));
            }, timeoutMs)
          : null;

      const onAbort = (): void => {
        cleanup();
        reject(new OperationCancelledError());
      };

      const cleanup = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener("abort", onAbort);
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      promise
        .then((value) => {
          cleanup();
          resolve(value);
        })
        .catch((error: unknown) => {
          cleanup();
          reject(error);
        });
    });
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof ProviderTimeoutError) {
      return true;
    }
    if (error instanceof ConfigurationError || error instanceof OperationCancelledError) {
      return false;
    }
    if (typeof error !== "object" || error === null) {
      return false;
    }

    const status = "status" in error ? error.status : undefined;
    if (typeof status === "number") {
      return status === 429 || status >= 500;
    }
    const code = "code" in error ? error.code : undefined;
    if (typeof code === "string") {
      return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED", "ECONNREFUSED"].includes(code);
    }
    const message = "message" in error ? error.message : undefined;
    if (typeof message === "string") {
      return /timeout|timed out|temporarily unavailable/i.test(message);
    }
    return false;
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }
}

/** Sliding one-minute window of request start times. */
class RequestWindow {
  private readonly starts: number[] = [];

  constructor(private readonly limit: number) {}

  record(now: number): void {
    this.starts.push(now);
  }

  waitMs(now: number): number {
    const cutoff = now - 60_000;
    while (this.starts.length > 0 && (this.starts[0] ?? now) < cutoff) {
      this.starts.shift();
    }
    const oldest = this.starts[0];
    if (this.starts.length < this.limit || oldest === undefined) {
      return 0;
    }
    return Math.max(0, oldest + 60_000 - now);
  }
}

const MAX_RETRY_AFTER_MS = 60_000;

/** Reads a provider's Retry-After hint (seconds) off an API error, when there is one. */
function retryAfterMs(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("headers" in error)) {
    return undefined;
  }
  const headers = error.headers;
  if (typeof headers !== "object" || headers === null || !("retry-after" in headers)) {
    return undefined;
  }
  const value = headers["retry-after"];
  const seconds = typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}
