// ── External Call Errors ─────────────────────────────────────────────────────
// Every adapter that talks to a third-party service (GitHub, the LLM API)
// reports failures through this one error type so callers can decide on
// retries without knowing the vendor's error classes.

export const EXTERNAL_CALL_ERROR_KINDS = [
  "rate_limited",
  "unauthorized",
  "not_found",
  "transient_network",
  "malformed_response",
] as const;

export type ExternalCallErrorKind = (typeof EXTERNAL_CALL_ERROR_KINDS)[number];

const RETRYABLE_KINDS: ReadonlySet<ExternalCallErrorKind> = new Set([
  "rate_limited",
  "transient_network",
]);

export function isRetryableKind(kind: ExternalCallErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export class ExternalCallError extends Error {
  override readonly name = "ExternalCallError";
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly kind: ExternalCallErrorKind,
    readonly service: string,
    options?: {
      readonly status?: number;
      readonly retryable?: boolean;
      readonly cause?: unknown;
    },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.status = options?.status;
    this.retryable = options?.retryable ?? isRetryableKind(kind);
  }
}

// ── HTTP Status Classification ──────────────────────────────────────────────

/**
 * Map an HTTP status from a vendor API to an error kind.
 * `rateLimitExhausted` covers GitHub's secondary limits, which come back as 403.
 */
export function classifyHttpStatus(
  status: number,
  rateLimitExhausted = false,
): ExternalCallErrorKind {
  if (status === 429) return "rate_limited";
  if (status === 403 && rateLimitExhausted) return "rate_limited";
  if (status === 401 || status === 403) return "unauthorized";
  if (status === 404 || status === 410) return "not_found";
  if (status >= 500 && status < 600) return "transient_network";
  if (status === 408) return "transient_network";
  return "malformed_response";
}

// ── Retry ───────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Additional attempts after the first one. */
  readonly maxRetries: number;
  /** Delay before retry n is `baseBackoffMs * 2^n`. */
  readonly baseBackoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseBackoffMs: 500,
};

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.baseBackoffMs * 2 ** attempt;
}

/**
 * Resolve after `ms`, or reject with the signal's reason when it aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
