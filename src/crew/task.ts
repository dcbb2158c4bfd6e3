import { ExecutionError } from "../agents/claude-client.ts";
import type { Agent } from "../types/agent.ts";
import { validateTransition } from "../types/task.ts";
import type { TaskKind, TaskResult, TaskStatus } from "../types/task.ts";
import { MissingParameterError } from "./errors.ts";

// ── Template Rendering ──────────────────────────────────────────────────────

export const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export type TemplateValue =
  | string
  | number
  | boolean
  | readonly (string | number)[]
  | null
  | undefined;

/** Placeholder names in order of first appearance. */
export function templatePlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined) names.add(name);
  }
  return [...names];
}

function formatValue(value: Exclude<TemplateValue, null | undefined>): string {
  if (Array.isArray(value)) return value.join(", ");
  return String(value);
}

/**
 * Replace every `{name}` placeholder with its value. Arrays are joined with
 * `", "`. Substituted values are not scanned again.
 *
 * @throws MissingParameterError for the first placeholder without a value
 */
export function renderTemplate(
  template: string,
  params: Readonly<Record<string, TemplateValue>>,
): string {
  for (const name of templatePlaceholders(template)) {
    const value = params[name];
    if (value === undefined || value === null) {
      throw new MissingParameterError(name);
    }
  }
  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = params[name];
    // Checked above
    if (value === undefined || value === null) throw new MissingParameterError(name);
    return formatValue(value);
  });
}

// ── Output Well-Formedness ──────────────────────────────────────────────────

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Non-empty after trimming and valid UTF-16 (no lone surrogates). */
export function checkOutputWellFormed(output: string, taskId: string): string {
  if (output.trim().length === 0) {
    throw new ExecutionError("Agent returned an empty result", "RESPONSE_EMPTY", taskId, false);
  }
  if (LONE_SURROGATE.test(output)) {
    throw new ExecutionError(
      "Agent returned malformed text (unpaired surrogate)",
      "MALFORMED_OUTPUT",
      taskId,
      false,
    );
  }
  return output;
}

// ── Task IDs ────────────────────────────────────────────────────────────────

/**
 * Generate a task ID: {kind}-{YYYYMMDD}-{6-char-hex}
 * Example: "content_strategy-20260219-a1b2c3"
 */
export function generateTaskId(kind: TaskKind): string {
  const dateStr = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const bytes = crypto.getRandomValues(new Uint8Array(3));
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return `${kind}-${dateStr}-${hex}`;
}

// ── Task ────────────────────────────────────────────────────────────────────

export interface TaskInit {
  readonly kind: TaskKind;
  readonly description: string;
  readonly expectedOutput: string;
  readonly agent: Agent;
  readonly id?: string;
}

/**
 * One unit of work bound to exactly one agent. Owned by the invocation that
 * created it; status moves `pending → running → completed | failed`.
 */
export class Task {
  readonly id: string;
  readonly kind: TaskKind;
  readonly description: string;
  readonly expectedOutput: string;
  readonly agent: Agent;

  private _status: TaskStatus = "pending";
  private _context: readonly string[] = [];
  private _output: string | null = null;
  private _error: Error | null = null;
  private _startedAt: string | null = null;
  private _completedAt: string | null = null;

  constructor(init: TaskInit) {
    this.id = init.id ?? generateTaskId(init.kind);
    this.kind = init.kind;
    this.description = init.description;
    this.expectedOutput = init.expectedOutput;
    this.agent = init.agent;
  }

  get status(): TaskStatus {
    return this._status;
  }

  /** Outputs of earlier tasks in the same invocation. */
  get context(): readonly string[] {
    return this._context;
  }

  get output(): string | null {
    return this._output;
  }

  get error(): Error | null {
    return this._error;
  }

  get startedAt(): string | null {
    return this._startedAt;
  }

  get completedAt(): string | null {
    return this._completedAt;
  }

  start(context: readonly string[] = []): void {
    validateTransition(this.id, this._status, "running");
    this._status = "running";
    this._context = Object.freeze([...context]);
    this._startedAt = new Date().toISOString();
  }

  complete(output: string): void {
    validateTransition(this.id, this._status, "completed");
    this._status = "completed";
    this._output = output;
    this._completedAt = new Date().toISOString();
  }

  /** Idempotent once failed: timeout cleanup and a late rejection may both call it. */
  fail(error: Error): void {
    if (this._status === "failed") return;
    validateTransition(this.id, this._status, "failed");
    this._status = "failed";
    this._error = error;
    this._completedAt = new Date().toISOString();
  }

  toResult(): TaskResult {
    return {
      id: this.id,
      kind: this.kind,
      agentRole: this.agent.role,
      status: this._status,
      output: this._output,
      error: this._error?.message ?? null,
      startedAt: this._startedAt,
      completedAt: this._completedAt,
    };
  }
}
