// ── Record Types ────────────────────────────────────────────────────────────

export interface TaskExecutionRecord {
  readonly taskId: string;
  readonly agentRole: string;
  readonly status: "completed" | "failed";
  readonly durationMs: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly timestamp: string;
}

export interface WorkflowRunRecord {
  readonly operation: string;
  readonly status: "completed" | "failed" | "timed_out" | "rejected";
  readonly durationMs: number;
  readonly taskCount: number;
  readonly timestamp: string;
}

// ── Per-Agent Stats ─────────────────────────────────────────────────────────

export interface AgentStats {
  readonly agentRole: string;
  readonly executionCount: number;
  readonly successCount: number;
  readonly failureCount: number;
  readonly totalDurationMs: number;
  readonly averageDurationMs: number;
  readonly totalInputTokens: number;
  readonly totalOutputTokens: number;
}

// ── Aggregate Metrics Snapshot ──────────────────────────────────────────────

export interface MetricsSnapshot {
  readonly totalTaskExecutions: number;
  readonly totalSuccesses: number;
  readonly totalFailures: number;
  readonly successRate: number; // 0.0 to 1.0
  readonly totalWorkflowRuns: number;
  readonly agentStats: readonly AgentStats[];
  /** Most recent first, capped at `MAX_RECENT_WORKFLOW_RUNS`. */
  readonly recentWorkflowRuns: readonly WorkflowRunRecord[];
  readonly collectedSince: string;
}

export const MAX_RECENT_WORKFLOW_RUNS = 20;

// ── Internal Mutable Agent Stats ────────────────────────────────────────────

interface MutableAgentStats {
  executionCount: number;
  successCount: number;
  failureCount: number;
  totalDurationMs: number;
  totalInputTokens: number;
  totalOutputTokens: number;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function clampNonNegative(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}

function toAgentStats(agentRole: string, stats: MutableAgentStats): AgentStats {
  return {
    agentRole,
    executionCount: stats.executionCount,
    successCount: stats.successCount,
    failureCount: stats.failureCount,
    totalDurationMs: stats.totalDurationMs,
    averageDurationMs:
      stats.executionCount > 0
        ? Math.round(stats.totalDurationMs / stats.executionCount)
        : 0,
    totalInputTokens: stats.totalInputTokens,
    totalOutputTokens: stats.totalOutputTokens,
  };
}

// ── MetricsCollector ────────────────────────────────────────────────────────

/** In-process counters behind `GET /status`. Reset on restart. */
export class MetricsCollector {
  private readonly agentMap = new Map<string, MutableAgentStats>();
  private readonly workflowRecords: WorkflowRunRecord[] = [];
  private totalWorkflowRuns = 0;
  private startedAt: string;

  constructor() {
    this.startedAt = new Date().toISOString();
  }

  // ── Recording ───────────────────────────────────────────────────────────

  recordTaskExecution(record: Omit<TaskExecutionRecord, "timestamp">): void {
    const durationMs = clampNonNegative(record.durationMs);
    const inputTokens = Math.round(clampNonNegative(record.inputTokens));
    const outputTokens = Math.round(clampNonNegative(record.outputTokens));

    let stats = this.agentMap.get(record.agentRole);
    if (!stats) {
      stats = {
        executionCount: 0,
        successCount: 0,
        failureCount: 0,
        totalDurationMs: 0,
        totalInputTokens: 0,
        totalOutputTokens: 0,
      };
      this.agentMap.set(record.agentRole, stats);
    }

    stats.executionCount += 1;
    if (record.status === "completed") {
      stats.successCount += 1;
    } else {
      stats.failureCount += 1;
    }
    stats.totalDurationMs += durationMs;
    stats.totalInputTokens += inputTokens;
    stats.totalOutputTokens += outputTokens;
  }

  recordWorkflowRun(record: Omit<WorkflowRunRecord, "timestamp">): void {
    this.totalWorkflowRuns += 1;
    this.workflowRecords.unshift({
      operation: record.operation,
      status: record.status,
      durationMs: clampNonNegative(record.durationMs),
      taskCount: Math.round(clampNonNegative(record.taskCount)),
      timestamp: new Date().toISOString(),
    });
    if (this.workflowRecords.length > MAX_RECENT_WORKFLOW_RUNS) {
      this.workflowRecords.length = MAX_RECENT_WORKFLOW_RUNS;
    }
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  getStats(): MetricsSnapshot {
    let totalExecutions = 0;
    let totalSuccesses = 0;
    let totalFailures = 0;

    const agentStats: AgentStats[] = [];

    for (const [agentRole, stats] of this.agentMap) {
      totalExecutions += stats.executionCount;
      totalSuccesses += stats.successCount;
      totalFailures += stats.failureCount;
      agentStats.push(toAgentStats(agentRole, stats));
    }

    return {
      totalTaskExecutions: totalExecutions,
      totalSuccesses,
      totalFailures,
      successRate: totalExecutions > 0 ? totalSuccesses / totalExecutions : 0,
      totalWorkflowRuns: this.totalWorkflowRuns,
      agentStats,
      recentWorkflowRuns: [...this.workflowRecords],
      collectedSince: this.startedAt,
    };
  }

  getAgentStats(agentRole: string): AgentStats | null {
    const stats = this.agentMap.get(agentRole);
    return stats ? toAgentStats(agentRole, stats) : null;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  reset(): void {
    this.agentMap.clear();
    this.workflowRecords.length = 0;
    this.totalWorkflowRuns = 0;
    this.startedAt = new Date().toISOString();
  }
}
