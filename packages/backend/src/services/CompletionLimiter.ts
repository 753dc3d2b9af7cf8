import type { CompletionLimitConfig } from "./llmTypes.js";

export class CompletionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Completion request timed out after ${timeoutMs}ms`);
    this.name = "CompletionTimeoutError";
  }
}

export class CompletionAbortedError extends Error {
  constructor() {
    super("Completion request aborted");
    this.name = "CompletionAbortedError";
  }
}

/**
 * Bounds concurrent completion calls and retries the retryable ones with
 * exponential backoff. Each attempt gets its own abort signal, fired on
 * timeout or when the caller's signal aborts.
 */
export class CompletionLimiter {
  private readonly config: CompletionLimitConfig;
  private activeCount = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(config: Partial<CompletionLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 4,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      timeoutMs: config.timeoutMs ?? 60_000
    };
  }

  get active(): number {
    return this.activeCount;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async run<T>(task: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await this.executeWithRetry(task, signal);
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CompletionAbortedError());
    }
    if (this.activeCount < this.config.maxConcurrent) {
      this.activeCount += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const start = (): void => {
        signal?.removeEventListener("abort", onAbort);
        this.activeCount += 1;
        resolve();
      };
      const onAbort = (): void => {
        const index = this.waiting.indexOf(start);
        if (index >= 0) {
          this.waiting.splice(index, 1);
        }
        reject(new CompletionAbortedError());
      };

      this.waiting.push(start);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(): void {
    this.activeCount -= 1;
    const next = this.waiting.shift();
    if (next) {
      next();
    }
  }

  private async executeWithRetry<T>(
    task: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let attempt = 0;

    for (;;) {
      try {
        return await this.attempt(task, signal);
      } catch (error) {
        const shouldRetry =
          !signal?.aborted && isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        await sleep(this.config.retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  private attempt<T>(task: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const { timeoutMs } = this.config;

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const finish = (action: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener("abort", onAbort);
        action();
      };

      const onAbort = (): void => {
        controller.abort();
        finish(() => reject(new CompletionAbortedError()));
      };
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              controller.abort();
              finish(() => reject(new CompletionTimeoutError(timeoutMs)));
            }, timeoutMs)
          : null;

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      task(controller.signal).then(
        (value) => finish(() => resolve(value)),
        (error: unknown) => finish(() => reject(error))
      );
    });
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof CompletionTimeoutError) {
    return true;
  }
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status === 429 || error.status >= 500;
  }
  if ("code" in error && typeof error.code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ECONNABORTED"].includes(error.code);
  }
  if ("message" in error && typeof error.message === "string") {
    return /timeout|timed out|temporarily unavailable/i.test(error.message);
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
