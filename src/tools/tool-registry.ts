import type { ClaudeToolDef } from "../agents/claude-client.ts";
import {
  DEFAULT_RETRY_POLICY,
  ExternalCallError,
  backoffDelayMs,
  errorMessage,
  sleep,
} from "../integrations/external-call.ts";
import type { RetryPolicy } from "../integrations/external-call.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import {
  DuplicateToolError,
  ToolExecutionError,
  ToolInputError,
  UnknownToolError,
} from "./types.ts";
import type { Tool, ToolInvocationResult } from "./types.ts";

// ── Tool Name Rules ─────────────────────────────────────────────────────────
// Matches the Messages API constraint on tool names.

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ToolRegistryOptions {
  readonly retry?: RetryPolicy;
  readonly logger?: Logger;
}

// ── Tool Registry ───────────────────────────────────────────────────────────

/**
 * Holds every tool adapter available to the crew, keyed by name.
 *
 * Agents receive explicit tool lists resolved from here at build time;
 * invocation goes back through the registry so retries and error wrapping
 * are applied the same way for every tool.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = (options.logger ?? NULL_LOGGER).child({ module: "tool-registry" });
  }

  // ── Registration ────────────────────────────────────────────────────────

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new RangeError(
        `Invalid tool name "${tool.name}" (expected ${TOOL_NAME_PATTERN.source})`,
      );
    }
    this.tools.set(tool.name, Object.freeze(tool));
  }

  // ── Query Methods ───────────────────────────────────────────────────────

  get toolNames(): readonly string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  /** Resolve tools in the requested order. */
  getByNames(names: readonly string[]): Tool[] {
    return names.map((name) => this.get(name));
  }

  list(): readonly Tool[] {
    return [...this.tools.values()];
  }

  /** Tool definitions in the shape the Messages API `tools` parameter takes. */
  static toClaudeTools(tools: readonly Tool[]): ClaudeToolDef[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    }));
  }

  // ── Tool Invocation ─────────────────────────────────────────────────────

  /**
   * Invoke a tool by name.
   *
   * Transient `ExternalCallError`s are retried with exponential backoff up
   * to `retry.maxRetries` times. Everything else that fails in the
   * underlying call surfaces as `ToolExecutionError`; `ToolInputError` and
   * `UnknownToolError` pass through untouched.
   */
  async invoke(
    name: string,
    params: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<ToolInvocationResult> {
    const tool = this.get(name);
    const startTime = Date.now();
    let attempt = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      attempt++;
      if (signal?.aborted) {
        throw new ToolExecutionError(name, signal.reason, attempt - 1);
      }

      try {
        const content = await tool.invoke(params, signal);
        return {
          toolName: name,
          content,
          durationMs: Date.now() - startTime,
          attempts: attempt,
        };
      } catch (err: unknown) {
        if (err instanceof ToolInputError) {
          throw err;
        }

        const retriesUsed = attempt - 1;
        if (
          err instanceof ExternalCallError &&
          err.retryable &&
          retriesUsed < this.retry.maxRetries &&
          !signal?.aborted
        ) {
          const delayMs = backoffDelayMs(this.retry, retriesUsed);
          this.logger.warn("tool_retry", {
            tool: name,
            kind: err.kind,
            attempt,
            backoffMs: delayMs,
          });
          try {
            await sleep(delayMs, signal);
          } catch (abortErr: unknown) {
            throw new ToolExecutionError(name, abortErr, attempt);
          }
          continue;
        }

        this.logger.error("tool_failed", {
          tool: name,
          attempts: attempt,
          kind: err instanceof ExternalCallError ? err.kind : "unknown",
          error: errorMessage(err),
        });
        throw new ToolExecutionError(name, err, attempt);
      }
    }
  }
}
