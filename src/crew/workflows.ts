import type { AgentRole, ProcessMode } from "../types/agent.ts";
import type { TaskKind } from "../types/task.ts";
import type { Crew } from "./crew.ts";
import { ConfigurationError } from "./errors.ts";
import type { TaskTemplateRegistry } from "./task-templates.ts";

// ── Operation Kinds ─────────────────────────────────────────────────────────

export const OPERATION_KINDS = [
  "analyze_users",
  "content_campaign",
  "community_engagement",
  "comprehensive_campaign",
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

// ── Workflow Table ──────────────────────────────────────────────────────────

export interface WorkflowStep {
  readonly agent: AgentRole;
  readonly task: TaskKind;
}

export interface WorkflowDefinition {
  readonly processMode: ProcessMode;
  readonly steps: readonly WorkflowStep[];
}

/** Which agents handle each operation, in order. */
export const WORKFLOW_TABLE: Readonly<Record<OperationKind, WorkflowDefinition>> = {
  analyze_users: {
    processMode: "sequential",
    steps: [{ agent: "data_analyst", task: "analyze_target_users" }],
  },
  content_campaign: {
    processMode: "sequential",
    steps: [
      { agent: "marketing_strategist", task: "content_strategy" },
      { agent: "content_creator", task: "content_creation" },
    ],
  },
  community_engagement: {
    processMode: "sequential",
    steps: [
      { agent: "data_analyst", task: "community_analysis" },
      { agent: "community_manager", task: "community_engagement" },
    ],
  },
  comprehensive_campaign: {
    processMode: "hierarchical",
    steps: [{ agent: "marketing_strategist", task: "comprehensive_campaign" }],
  },
};

/**
 * Startup check that every operation can actually run on this crew with
 * these templates. Collects every problem before failing.
 */
export function validateWorkflowTable(
  table: Readonly<Partial<Record<OperationKind, WorkflowDefinition>>>,
  crew: Crew,
  templates: TaskTemplateRegistry,
): void {
  const errors: string[] = [];

  for (const operation of OPERATION_KINDS) {
    const workflow = table[operation];
    if (!workflow) {
      errors.push(`Operation "${operation}" has no workflow`);
      continue;
    }
    if (workflow.steps.length === 0) {
      errors.push(`Operation "${operation}" has no steps`);
    }

    for (const step of workflow.steps) {
      if (!crew.agents.has(step.agent)) {
        errors.push(`Operation "${operation}": agent "${step.agent}" is not in the crew`);
      }
      if (!templates.has(step.task)) {
        errors.push(`Operation "${operation}": no task template for "${step.task}"`);
      }
    }

    if (workflow.processMode === "hierarchical") {
      const manager = crew.manager;
      if (manager === null) {
        errors.push(`Operation "${operation}" is hierarchical but the crew has no manager`);
      } else if (workflow.steps.length !== 1 || workflow.steps[0]?.agent !== manager.role) {
        errors.push(
          `Operation "${operation}" is hierarchical and must have exactly one step bound to the manager "${manager.role}"`,
        );
      }
      const delegators = [...crew.agents.values()].filter((a) => a.allowDelegation);
      if (delegators.length > 1) {
        errors.push(
          `Operation "${operation}" is hierarchical but ${delegators.length} agents allow delegation`,
        );
      }
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Workflow table validation failed with ${errors.length} error(s):\n${errors.map((e) => `  - ${e}`).join("\n")}`,
      errors,
    );
  }
}
