import { TimeoutError } from "./errors.ts";

export interface DeadlineOptions {
  readonly timeoutMs: number;
  /** Caller's signal; aborting it aborts the work too. */
  readonly signal?: AbortSignal;
  /** Receives the late outcome of work abandoned after a timeout. */
  readonly onAbandoned: (outcome: unknown) => void;
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs`.
 *
 * On expiry this rejects with `TimeoutError` right away, without waiting
 * for `fn` to notice the abort.
 */
export async function withDeadline<T>(
  options: DeadlineOptions,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const { timeoutMs, signal: parent } = options;
  if (timeoutMs <= 0) {
    throw new TimeoutError(timeoutMs);
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      reject(err);
      controller.abort(err);
    }, timeoutMs);
  });

  const work = fn(controller.signal);
  try {
    return await Promise.race([work, timeout]);
  } catch (err: unknown) {
    if (err instanceof TimeoutError) {
      work.then(options.onAbandoned, options.onAbandoned);
    }
    throw err;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
