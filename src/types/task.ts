// ── Task Kinds ───────────────────────────────────────────────────────────────
// Default kinds, matching .agents/tasks.yaml.

export const TASK_KINDS = [
  "analyze_target_users",
  "content_strategy",
  "content_creation",
  "community_analysis",
  "community_engagement",
  "comprehensive_campaign",
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export function isTaskKind(value: unknown): value is TaskKind {
  return TASK_KINDS.some((k) => k === value);
}

// ── Task Status ──────────────────────────────────────────────────────────────

export const TASK_STATUSES = ["pending", "running", "completed", "failed"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

// ── Task State Machine ──────────────────────────────────────────────────────

export const VALID_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  // pending → failed: aborted before it started
  pending: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
} as const;

export class InvalidTransitionError extends Error {
  override readonly name = "InvalidTransitionError";
  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus,
  ) {
    super(
      `Invalid status transition for task ${taskId}: "${from}" -> "${to}"`,
    );
  }
}

export function validateTransition(
  taskId: string,
  from: TaskStatus,
  to: TaskStatus,
): void {
  const allowed = VALID_TRANSITIONS[from];
  if (!allowed.includes(to)) {
    throw new InvalidTransitionError(taskId, from, to);
  }
}

// ── Task Result ──────────────────────────────────────────────────────────────

export interface TaskResult {
  readonly id: string;
  readonly kind: TaskKind;
  readonly agentRole: string;
  readonly status: TaskStatus;
  readonly output: string | null;
  readonly error: string | null;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
}
