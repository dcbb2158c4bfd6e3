import type { ToolRegistry } from "../tools/tool-registry.ts";
import { AGENT_ROLES, isAgentRole } from "../types/agent.ts";
import type { Agent, AgentDefinition, AgentRole } from "../types/agent.ts";
import { ConfigurationError } from "./errors.ts";
import { failValidation, isRecord, loadYamlFile } from "./yaml.ts";

// ── Agent Construction ──────────────────────────────────────────────────────

/**
 * Build an immutable agent from its definition.
 *
 * `tools: "*"` resolves to every tool registered at this moment; the list is
 * captured once, so later registrations do not leak into the agent.
 */
export function createAgent(definition: AgentDefinition, registry: ToolRegistry): Agent {
  if (!Number.isInteger(definition.maxIterations) || definition.maxIterations < 1) {
    throw new ConfigurationError(
      `Agent "${definition.role}" must allow at least one iteration (got ${definition.maxIterations})`,
    );
  }

  const tools =
    definition.tools === "*"
      ? registry.list()
      : registry.getByNames(definition.tools);

  return Object.freeze({
    role: definition.role,
    goal: definition.goal,
    backstory: definition.backstory,
    tools: Object.freeze([...tools]),
    allowDelegation: definition.allowDelegation,
    maxIterations: definition.maxIterations,
  });
}

// ── Agent Definitions (YAML) ────────────────────────────────────────────────

/**
 * Agent definitions loaded from `.agents/crew.yaml`:
 *
 * ```yaml
 * manager: marketing_strategist
 * agents:
 *   data_analyst:
 *     goal: ...
 *     backstory: ...
 *     tools: [github_analysis]
 *     allow_delegation: false
 *     max_iterations: 3
 * ```
 */
export class AgentDefinitions {
  private constructor(
    readonly definitions: readonly AgentDefinition[],
    /** Agent that runs hierarchical workflows; `null` when none is configured. */
    readonly managerRole: AgentRole | null,
  ) {}

  static async fromYaml(yamlPath: string): Promise<AgentDefinitions> {
    return AgentDefinitions.fromData(await loadYamlFile(yamlPath, "Agent definitions"));
  }

  /** Validate raw (parsed) data and collect every problem before failing. */
  static fromData(data: unknown): AgentDefinitions {
    const agents = isRecord(data) ? data.agents : undefined;
    if (!isRecord(data) || !isRecord(agents)) {
      throw new ConfigurationError("Invalid agent definitions: expected an 'agents' map", [
        "Missing or invalid 'agents' key (expected an object)",
      ]);
    }

    const errors: string[] = [];
    const definitions: AgentDefinition[] = [];

    for (const [role, raw] of Object.entries(agents)) {
      if (!isAgentRole(role)) {
        errors.push(`Unknown agent role "${role}" (expected one of: ${AGENT_ROLES.join(", ")})`);
        continue;
      }
      const parsed = parseDefinition(role, raw, errors);
      if (parsed) definitions.push(parsed);
    }

    if (definitions.length === 0 && errors.length === 0) {
      errors.push("No agents defined");
    }

    let managerRole: AgentRole | null = null;
    const manager = data.manager;
    if (manager !== undefined && manager !== null) {
      if (!isAgentRole(manager)) {
        errors.push(`'manager' must be one of: ${AGENT_ROLES.join(", ")}`);
      } else if (!Object.hasOwn(agents, manager)) {
        errors.push(`Manager "${manager}" is not defined under 'agents'`);
      } else {
        managerRole = manager;
      }
    }

    if (errors.length > 0) {
      failValidation("Agent definitions", errors);
    }
    return new AgentDefinitions(Object.freeze(definitions), managerRole);
  }

  get roles(): AgentRole[] {
    return this.definitions.map((d) => d.role);
  }

  get(role: AgentRole): AgentDefinition | undefined {
    return this.definitions.find((d) => d.role === role);
  }

  build(registry: ToolRegistry): Agent[] {
    return this.definitions.map((d) => createAgent(d, registry));
  }
}

function parseDefinition(
  role: AgentRole,
  raw: unknown,
  errors: string[],
): AgentDefinition | null {
  if (!isRecord(raw)) {
    errors.push(`Agent "${role}": expected an object`);
    return null;
  }
  const before = errors.length;
  const goal = raw.goal;
  const backstory = raw.backstory;
  const rawTools = raw.tools;

  if (typeof goal !== "string" || goal.trim() === "") {
    errors.push(`Agent "${role}": 'goal' must be a non-empty string`);
  }
  if (typeof backstory !== "string" || backstory.trim() === "") {
    errors.push(`Agent "${role}": 'backstory' must be a non-empty string`);
  }

  let tools: readonly string[] | "*" = [];
  if (rawTools === "*") {
    tools = "*";
  } else if (Array.isArray(rawTools) && rawTools.every((t) => typeof t === "string")) {
    tools = rawTools.filter((t): t is string => typeof t === "string");
  } else if (rawTools !== undefined) {
    errors.push(`Agent "${role}": 'tools' must be a list of tool names or "*"`);
  }

  const allowDelegation = raw.allow_delegation ?? false;
  if (typeof allowDelegation !== "boolean") {
    errors.push(`Agent "${role}": 'allow_delegation' must be a boolean`);
  }

  const maxIterations = raw.max_iterations ?? 3;
  if (typeof maxIterations !== "number" || !Number.isInteger(maxIterations) || maxIterations < 1) {
    errors.push(`Agent "${role}": 'max_iterations' must be an integer >= 1`);
  }

  if (
    errors.length > before ||
    typeof goal !== "string" ||
    typeof backstory !== "string" ||
    typeof allowDelegation !== "boolean" ||
    typeof maxIterations !== "number"
  ) {
    return null;
  }

  return {
    role,
    goal: goal.trim(),
    backstory: backstory.trim(),
    tools,
    allowDelegation,
    maxIterations,
  };
}
