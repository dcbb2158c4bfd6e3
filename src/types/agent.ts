import type { Tool } from "../tools/types.ts";

// ── Agent Roles ──────────────────────────────────────────────────────────────
// Default roles, matching .agents/crew.yaml.

export const AGENT_ROLES = [
  "data_analyst",
  "content_creator",
  "community_manager",
  "marketing_strategist",
] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

export function isAgentRole(value: unknown): value is AgentRole {
  return AGENT_ROLES.some((r) => r === value);
}

// ── Process Mode ─────────────────────────────────────────────────────────────

export const PROCESS_MODES = ["sequential", "hierarchical"] as const;
export type ProcessMode = (typeof PROCESS_MODES)[number];

// ── Agent Definition (as loaded from YAML) ──────────────────────────────────

export interface AgentDefinition {
  readonly role: AgentRole;
  readonly goal: string;
  readonly backstory: string;
  /** Tool names, or `"*"` for every registered tool. */
  readonly tools: readonly string[] | "*";
  readonly allowDelegation: boolean;
  readonly maxIterations: number;
}

// ── Agent ────────────────────────────────────────────────────────────────────

/** Immutable after construction; shared read-only across concurrent invocations. */
export interface Agent {
  readonly role: AgentRole;
  readonly goal: string;
  readonly backstory: string;
  readonly tools: readonly Tool[];
  readonly allowDelegation: boolean;
  readonly maxIterations: number;
}
