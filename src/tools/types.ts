import type { ToolInputSchema } from "../agents/claude-client.ts";

// ── Tool Contract ────────────────────────────────────────────────────────────

/**
 * A stateless adapter around one external capability.
 *
 * `invoke` throws `ToolInputError` for bad parameters and
 * `ExternalCallError` for failures of the service behind it; the registry
 * turns the latter into `ToolExecutionError` after retries.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<string>;
}

export interface ToolInvocationResult {
  readonly toolName: string;
  readonly content: string;
  readonly durationMs: number;
  readonly attempts: number;
}

// ── Errors ───────────────────────────────────────────────────────────────────

export class DuplicateToolError extends Error {
  override readonly name = "DuplicateToolError";

  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`);
  }
}

export class UnknownToolError extends Error {
  override readonly name = "UnknownToolError";

  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is not registered`);
  }
}

/** The caller (usually the model) passed parameters the tool cannot use. */
export class ToolInputError extends Error {
  override readonly name = "ToolInputError";

  constructor(
    readonly toolName: string,
    message: string,
  ) {
    super(`${toolName}: ${message}`);
  }
}

export class ToolExecutionError extends Error {
  override readonly name = "ToolExecutionError";

  constructor(
    readonly toolName: string,
    override readonly cause: unknown,
    readonly attempts: number,
  ) {
    super(
      `Tool "${toolName}" failed after ${attempts} attempt(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
  }
}

// ── Parameter Readers ────────────────────────────────────────────────────────
// Tool inputs come from the model as loose JSON; these narrow one field at a time.

export function readString(
  toolName: string,
  params: Record<string, unknown>,
  key: string,
): string {
  const value = params[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ToolInputError(toolName, `'${key}' must be a non-empty string`);
  }
  return value.trim();
}

export function readOptionalString(
  toolName: string,
  params: Record<string, unknown>,
  key: string,
  fallback: string,
): string {
  const value = params[key];
  if (value === undefined || value === null || value === "") return fallback;
  if (typeof value !== "string") {
    throw new ToolInputError(toolName, `'${key}' must be a string`);
  }
  return value.trim();
}

export function readOptionalInt(
  toolName: string,
  params: Record<string, unknown>,
  key: string,
  fallback: number,
  bounds: { readonly min: number; readonly max: number },
): number {
  const value = params[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ToolInputError(toolName, `'${key}' must be an integer`);
  }
  if (value < bounds.min || value > bounds.max) {
    throw new ToolInputError(
      toolName,
      `'${key}' must be between ${bounds.min} and ${bounds.max}`,
    );
  }
  return value;
}

export function readEnum<T extends string>(
  toolName: string,
  params: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  fallback?: T,
): T {
  const value = params[key];
  if ((value === undefined || value === null) && fallback !== undefined) {
    return fallback;
  }
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ToolInputError(
      toolName,
      `'${key}' must be one of: ${allowed.join(", ")}`,
    );
  }
  return match;
}
