import axios, { AxiosRequestConfig } from "axios";
import type { Query } from "./routing/types";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

export interface DeadlineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

/**
 * Lowercases, turns every character outside [a-z0-9] into a space and
 * collapses whitespace. The result never contains ":" so it is safe inside
 * cache keys.
 */
export function normalizeQuery(text: string): string {
  return text
    .toLowerCase()
    .replaceAll(/[^a-z0-9]+/g, " ")
    .trim();
}

export function tokenize(normalized: string): string[] {
  return normalized.length === 0 ? [] : normalized.split(" ");
}

export function toQuery(text: string): Query {
  return { original: text.trim(), normalized: normalizeQuery(text) };
}

/** Index of the first whole-token occurrence of `phrase` in `tokens`, or -1. */
export function findPhrase(tokens: readonly string[], phrase: readonly string[]): number {
  if (phrase.length === 0) {
    return -1;
  }
  for (let start = 0; start + phrase.length <= tokens.length; start += 1) {
    let matched = true;
    for (let offset = 0; offset < phrase.length; offset += 1) {
      if (tokens[start + offset] !== phrase[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return start;
    }
  }
  return -1;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2 } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries) {
        throw error;
      }
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay *= factor;
      attempt += 1;
    }
  }
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor({ failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      return Promise.reject(new CircuitOpenError());
    }

    return action()
      .then((result) => {
        this.reset();
        return result;
      })
      .catch((error: unknown) => {
        this.recordFailure();
        throw error;
      });
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

export class CircuitOpenError extends Error {
  constructor() {
    super("Circuit breaker is open");
    this.name = "CircuitOpenError";
  }
}

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation did not finish within ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

export class OperationAbortedError extends Error {
  constructor() {
    super("Operation was cancelled by the caller");
    this.name = "OperationAbortedError";
  }
}

/**
 * Runs `task` with an abort signal that fires when `timeoutMs` elapses or the
 * caller's `signal` aborts, whichever comes first. The returned promise
 * rejects with DeadlineExceededError or OperationAbortedError in those cases
 * even if the task ignores its signal.
 */
export function withDeadline<T>(task: (signal: AbortSignal) => Promise<T>, { timeoutMs, signal }: DeadlineOptions = {}): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener("abort", onAbort);
    };

    const onAbort = () => {
      cleanup();
      controller.abort();
      reject(new OperationAbortedError());
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        cleanup();
        controller.abort();
        reject(new DeadlineExceededError(timeoutMs));
      }, timeoutMs);
    }

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }
    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

const breakerMap = new Map<string, CircuitBreaker>();

function getCircuitBreaker(host: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const key = host.toLowerCase();
  let breaker = breakerMap.get(key);
  if (!breaker) {
    breaker = new CircuitBreaker(options);
    breakerMap.set(key, breaker);
  }
  return breaker;
}

export function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch (_error) {
    return null;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function fetchJson(
  url: string,
  config: AxiosRequestConfig = {},
  retryOptions?: RetryOptions,
  cbOptions?: CircuitBreakerOptions
): Promise<unknown> {
  const parsed = new URL(url);
  const breaker = getCircuitBreaker(parsed.host, cbOptions);
  const executor = (): Promise<unknown> => axios({ url, ...config }).then((response) => response.data);
  return breaker.exec(() => withRetry(executor, retryOptions));
}
