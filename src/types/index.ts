// ── Type re-exports ──────────────────────────────────────────────────────────
export type { AgentRole, ProcessMode, AgentDefinition, Agent } from "./agent.ts";
export type { TaskKind, TaskStatus, TaskResult } from "./task.ts";

// ── Const re-exports ─────────────────────────────────────────────────────────
export { AGENT_ROLES, PROCESS_MODES, isAgentRole } from "./agent.ts";
export {
  TASK_KINDS,
  TASK_STATUSES,
  VALID_TRANSITIONS,
  InvalidTransitionError,
  validateTransition,
  isTaskKind,
} from "./task.ts";
