import Anthropic from "@anthropic-ai/sdk";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { ConcurrencyLimiter } from "../integrations/concurrency.ts";
import { sleep } from "../integrations/external-call.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export interface ClaudeClient {
  createMessage(params: ClaudeMessageParams): Promise<ClaudeMessageResult>;
}

export interface ClaudeMessageParams {
  readonly model: string;
  readonly system: string;
  readonly messages: readonly ClaudeMessage[];
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  readonly tools?: readonly ClaudeToolDef[];
}

export interface ClaudeToolDef {
  readonly name: string;
  readonly description?: string;
  readonly input_schema: ToolInputSchema;
}

export interface ToolInputSchema {
  readonly type: "object";
  readonly properties?: Record<string, unknown>;
  readonly required?: readonly string[];
}

export interface ClaudeMessage {
  readonly role: "user" | "assistant";
  readonly content: string | readonly ClaudeContentBlock[];
}

// ── Content Block Types (for tool_use conversations) ────────────────────────

export interface ClaudeTextBlock {
  readonly type: "text";
  readonly text: string;
}

export interface ClaudeToolUseBlock {
  readonly type: "tool_use";
  readonly id: string;
  readonly name: string;
  readonly input: Record<string, unknown>;
}

export interface ClaudeToolResultBlock {
  readonly type: "tool_result";
  readonly tool_use_id: string;
  readonly content: string;
  readonly is_error?: boolean;
}

export type ClaudeContentBlock =
  | ClaudeTextBlock
  | ClaudeToolUseBlock
  | ClaudeToolResultBlock;

export interface ClaudeMessageResult {
  readonly content: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly stopReason: string;
  readonly durationMs: number;
  readonly toolUseBlocks?: readonly ClaudeToolUseBlock[];
  readonly contentBlocks?: readonly ClaudeContentBlock[];
}

// ── Error ────────────────────────────────────────────────────────────────────

export type ExecutionErrorCode =
  // API errors
  | "API_ERROR"
  | "RATE_LIMITED"
  | "TIMEOUT"
  | "UNAUTHORIZED"
  // Response issues
  | "RESPONSE_EMPTY"
  | "MALFORMED_OUTPUT"
  // Cancellation
  | "ABORTED"
  // Catch-all
  | "UNKNOWN";

/** Failure of the LLM backend while executing a task. */
export class ExecutionError extends Error {
  override readonly name = "ExecutionError";

  constructor(
    message: string,
    readonly code: ExecutionErrorCode,
    readonly taskId: string,
    readonly retryable: boolean,
    override readonly cause?: Error,
  ) {
    super(message);
  }
}

// ── Retry Configuration ──────────────────────────────────────────────────────

export interface ClaudeRetryConfig {
  readonly rateLimitBackoffsMs: readonly number[];
  readonly serverErrorBackoffsMs: readonly number[];
  readonly timeoutMaxRetries: number;
}

export const DEFAULT_RETRY_CONFIG: ClaudeRetryConfig = {
  rateLimitBackoffsMs: [2000, 4000, 8000, 16000, 32000],
  serverErrorBackoffsMs: [2000, 4000, 8000],
  timeoutMaxRetries: 1,
};

// ── Anthropic SDK Client ─────────────────────────────────────────────────────

export interface AnthropicClientOptions {
  readonly anthropic: Anthropic;
  readonly limiter?: ConcurrencyLimiter;
  readonly logger?: Logger;
  readonly retry?: ClaudeRetryConfig;
}

export class AnthropicClaudeClient implements ClaudeClient {
  private readonly anthropic: Anthropic;
  private readonly limiter: ConcurrencyLimiter | null;
  private readonly logger: Logger;
  private readonly retry: ClaudeRetryConfig;

  constructor(options: AnthropicClientOptions) {
    this.anthropic = options.anthropic;
    this.limiter = options.limiter ?? null;
    this.logger = (options.logger ?? NULL_LOGGER).child({ module: "claude-client" });
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  }

  async createMessage(
    params: ClaudeMessageParams,
  ): Promise<ClaudeMessageResult> {
    this.logger.debug("claude_request_started", {
      model: params.model,
      maxTokens: params.maxTokens,
      toolCount: params.tools?.length ?? 0,
    });

    const startTime = Date.now();
    const response = await this.callWithRetry(params);
    const durationMs = Date.now() - startTime;

    const contentBlocks: ClaudeContentBlock[] = [];
    const toolUseBlocks: ClaudeToolUseBlock[] = [];
    let content = "";

    for (const block of response.content) {
      if (block.type === "text") {
        content += block.text;
        contentBlocks.push({ type: "text", text: block.text });
      } else if (block.type === "tool_use") {
        const toolUse: ClaudeToolUseBlock = {
          type: "tool_use",
          id: block.id,
          name: block.name,
          input: toRecord(block.input),
        };
        toolUseBlocks.push(toolUse);
        contentBlocks.push(toolUse);
      }
    }

    this.logger.info("claude_request_completed", {
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      durationMs,
      stopReason: response.stop_reason ?? "unknown",
      toolUseCount: toolUseBlocks.length,
    });

    return {
      content,
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason ?? "unknown",
      durationMs,
      toolUseBlocks,
      contentBlocks,
    };
  }

  private async callWithRetry(
    params: ClaudeMessageParams,
  ): Promise<Anthropic.Message> {
    let rateLimitRetries = 0;
    let serverErrorRetries = 0;
    let timeoutRetries = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      // Check abort before each attempt (catches abort during backoff sleep)
      if (params.signal?.aborted) {
        throw new ExecutionError("Request aborted", "ABORTED", "", false);
      }

      try {
        const send = () =>
          this.anthropic.messages.create(
            {
              model: params.model,
              system: params.system,
              messages: params.messages.map(toMessageParam),
              max_tokens: params.maxTokens,
              ...(params.tools && params.tools.length > 0
                ? { tools: params.tools.map(toSdkTool) }
                : {}),
            },
            {
              timeout: params.timeoutMs,
              maxRetries: 0,
              ...(params.signal ? { signal: params.signal } : {}),
            },
          );
        return this.limiter
          ? await this.limiter.run(send, params.signal)
          : await send();
      } catch (err: unknown) {
        const classified = classifyError(err);

        const rateLimitBackoff = this.retry.rateLimitBackoffsMs[rateLimitRetries];
        if (classified === "rate_limited" && rateLimitBackoff !== undefined) {
          this.logger.warn("claude_rate_limited", {
            retryAttempt: rateLimitRetries + 1,
            backoffMs: rateLimitBackoff,
            model: params.model,
          });
          await this.backoff(rateLimitBackoff, params.signal);
          rateLimitRetries++;
          continue;
        }

        const serverBackoff = this.retry.serverErrorBackoffsMs[serverErrorRetries];
        if (classified === "server_error" && serverBackoff !== undefined) {
          this.logger.warn("claude_server_error", {
            retryAttempt: serverErrorRetries + 1,
            backoffMs: serverBackoff,
            model: params.model,
          });
          await this.backoff(serverBackoff, params.signal);
          serverErrorRetries++;
          continue;
        }

        if (
          classified === "timeout" &&
          timeoutRetries < this.retry.timeoutMaxRetries
        ) {
          this.logger.warn("claude_timeout_retry", {
            retryAttempt: timeoutRetries + 1,
            model: params.model,
          });
          timeoutRetries++;
          continue;
        }

        // Non-retryable or retries exhausted
        this.logger.error("claude_request_failed", {
          classification: classified,
          model: params.model,
          error: err instanceof Error ? err.message : String(err),
        });
        throw toExecutionError(classified, err);
      }
    }
  }

  private async backoff(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await sleep(ms, signal);
    } catch (err: unknown) {
      throw toExecutionError("aborted", err);
    }
  }
}

// ── SDK Mapping ──────────────────────────────────────────────────────────────

export function toMessageParam(message: ClaudeMessage): Anthropic.MessageParam {
  if (typeof message.content === "string") {
    return { role: message.role, content: message.content };
  }
  return {
    role: message.role,
    content: message.content.map(toSdkBlock),
  };
}

function toSdkBlock(block: ClaudeContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "tool_use":
      return {
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: block.input,
      };
    case "tool_result":
      return {
        type: "tool_result",
        tool_use_id: block.tool_use_id,
        content: block.content,
        ...(block.is_error !== undefined ? { is_error: block.is_error } : {}),
      };
  }
}

export function toSdkTool(tool: ClaudeToolDef): Anthropic.Tool {
  return {
    name: tool.name,
    ...(tool.description !== undefined ? { description: tool.description } : {}),
    input_schema: {
      type: "object",
      ...(tool.input_schema.properties
        ? { properties: tool.input_schema.properties }
        : {}),
      ...(tool.input_schema.required
        ? { required: [...tool.input_schema.required] }
        : {}),
    },
  };
}

function toRecord(input: unknown): Record<string, unknown> {
  if (input !== null && typeof input === "object" && !Array.isArray(input)) {
    return { ...input };
  }
  return {};
}

// ── Error Classification ─────────────────────────────────────────────────────

export type ErrorClass =
  | "rate_limited"
  | "server_error"
  | "timeout"
  | "unauthorized"
  | "aborted"
  | "non_retryable";

export function classifyError(err: unknown): ErrorClass {
  if (err instanceof ExecutionError && err.code === "ABORTED") {
    return "aborted";
  }

  // Check timeout subclasses BEFORE the parent APIError class.
  // APIConnectionTimeoutError extends APIConnectionError extends APIError,
  // so the APIError check would match first and misclassify timeouts.
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return "timeout";
  }

  if (err instanceof Anthropic.APIUserAbortError) {
    return "aborted";
  }

  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    if (status === undefined) return "server_error"; // connection reset, DNS
    if (status === 429) return "rate_limited";
    if (status === 401 || status === 403) return "unauthorized";
    if (status === 529 || (status >= 500 && status < 600)) return "server_error";
    return "non_retryable";
  }

  // Caller abort, not a timeout
  if (err instanceof Error && err.name === "AbortError") {
    return "aborted";
  }

  return "non_retryable";
}

function toExecutionError(
  classification: ErrorClass,
  err: unknown,
): ExecutionError {
  const cause = err instanceof Error ? err : undefined;
  const message =
    err instanceof Error ? err.message : "Unknown error calling Claude API";

  switch (classification) {
    case "rate_limited":
      return new ExecutionError(
        `Rate limited after max retries: ${message}`,
        "RATE_LIMITED",
        "",
        false,
        cause,
      );
    case "server_error":
      return new ExecutionError(
        `Server error after max retries: ${message}`,
        "API_ERROR",
        "",
        false,
        cause,
      );
    case "timeout":
      return new ExecutionError(
        `Request timed out: ${message}`,
        "TIMEOUT",
        "",
        false,
        cause,
      );
    case "unauthorized":
      return new ExecutionError(
        `LLM API rejected the credentials: ${message}`,
        "UNAUTHORIZED",
        "",
        false,
        cause,
      );
    case "aborted":
      return new ExecutionError(
        `Request aborted: ${message}`,
        "ABORTED",
        "",
        false,
        cause,
      );
    case "non_retryable":
      return new ExecutionError(message, "API_ERROR", "", false, cause);
  }
}
