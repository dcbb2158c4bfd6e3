import { abortReason } from "./external-call.ts";

// ── Concurrency Limiter ─────────────────────────────────────────────────────

/**
 * Counting semaphore shared by every caller of one external service.
 *
 * Waiters are released in FIFO order. A waiter whose signal aborts leaves
 * the queue without taking a slot.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Array<{
    readonly grant: () => void;
    readonly signal?: AbortSignal;
  }> = [];

  constructor(readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(
        `maxConcurrency must be a positive integer, got ${maxConcurrency}`,
      );
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  /** Run `fn` once a slot is free; the slot is released when it settles. */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (this.active < this.maxConcurrency) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        signal,
      };
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(abortReason(signal));
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot over directly; `active` stays the same
      next.grant();
    } else {
      this.active--;
    }
  }
}

// ── Concurrent Execution with Fail-Fast ─────────────────────────────────────

export interface ConcurrencyOptions<T> {
  /** Async task functions to execute. Each receives a signal for cancellation. */
  readonly tasks: ReadonlyArray<(signal: AbortSignal) => Promise<T>>;
  /** Maximum number of tasks running simultaneously. Must be >= 1. */
  readonly maxConcurrency: number;
  /** Aborts every task when triggered. */
  readonly signal?: AbortSignal;
}

export type ConcurrencyResult<T> =
  | { readonly ok: true; readonly results: readonly T[] }
  | { readonly ok: false; readonly error: unknown; readonly failedIndex: number };

/**
 * Execute async tasks with bounded concurrency and fail-fast semantics.
 *
 * - Launches up to `maxConcurrency` tasks at a time
 * - On the first rejection: aborts in-flight tasks through a child
 *   `AbortController` and stops launching new ones
 * - Results are returned in input order
 * - Never throws; always returns a `ConcurrencyResult`
 */
export async function runWithConcurrency<T>(
  options: ConcurrencyOptions<T>,
): Promise<ConcurrencyResult<T>> {
  const { tasks, maxConcurrency, signal } = options;

  if (tasks.length === 0) {
    return { ok: true, results: [] };
  }
  if (signal?.aborted) {
    return { ok: false, error: abortReason(signal), failedIndex: 0 };
  }

  const childController = new AbortController();
  const onParentAbort = () => childController.abort(signal?.reason);
  signal?.addEventListener("abort", onParentAbort, { once: true });

  const results: T[] = new Array<T>(tasks.length);
  let nextIndex = 0;
  const state: { failure: { error: unknown; index: number } | null } = {
    failure: null,
  };

  const worker = async (): Promise<void> => {
    while (state.failure === null && nextIndex < tasks.length) {
      const index = nextIndex++;
      const taskFn = tasks[index]!;
      try {
        results[index] = await taskFn(childController.signal);
      } catch (err: unknown) {
        if (state.failure === null) {
          state.failure = { error: err, index };
          childController.abort(err);
        }
      }
    }
  };

  const width = Math.max(1, Math.min(maxConcurrency, tasks.length));
  try {
    await Promise.all(Array.from({ length: width }, () => worker()));
  } finally {
    signal?.removeEventListener("abort", onParentAbort);
  }

  if (state.failure !== null) {
    return {
      ok: false,
      error: state.failure.error,
      failedIndex: state.failure.index,
    };
  }
  return { ok: true, results };
}
