// ── Logger ────────────────────────────────────────────────────────────────────
export {
  createLogger,
  BufferLogger,
  NULL_LOGGER,
  DEFAULT_LOGGER_CONFIG,
  LOG_LEVELS,
  LOG_FORMATS,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
  type LogEntry,
} from "./logger.ts";

// ── Metrics ───────────────────────────────────────────────────────────────────
export {
  MetricsCollector,
  MAX_RECENT_WORKFLOW_RUNS,
  type TaskExecutionRecord,
  type WorkflowRunRecord,
  type AgentStats,
  type MetricsSnapshot,
} from "./metrics.ts";
