import { describe, expect, it } from "vitest";
import { ExecutionError } from "../../agents/claude-client.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { MetricsCollector } from "../../observability/metrics.ts";
import { ToolRegistry } from "../../tools/tool-registry.ts";
import type { Agent } from "../../types/agent.ts";
import type { ProcessMode } from "../../types/agent.ts";
import {
  ScriptedClaudeClient,
  firstUserText,
  rejected,
  testAgent,
  textResult,
  thrown,
} from "../../__tests__/helpers.ts";
import { AgentRunner, DELEGATE_TOOL_NAME } from "../agent-runner.ts";
import { Crew } from "../crew.ts";
import { ConfigurationError, TimeoutError } from "../errors.ts";
import { Task } from "../task.ts";

const analyst = testAgent("data_analyst");
const writer = testAgent("content_creator");
const community = testAgent("community_manager");
const manager = testAgent("marketing_strategist", { allowDelegation: true });

/** Answers per role, keyed on the system prompt; "ok" for roles not listed. */
function roleClient(overrides: Record<string, string> = {}): ScriptedClaudeClient {
  return new ScriptedClaudeClient((call) => {
    const role = Object.keys(overrides).find((r) =>
      call.system.startsWith(`You are the ${r.replace(/_/g, " ")}`),
    );
    return textResult(role ? (overrides[role] ?? "") : "ok");
  });
}

function makeCrew(
  client: ScriptedClaudeClient,
  options: {
    agents?: readonly Agent[];
    processMode?: ProcessMode;
    managerRole?: "marketing_strategist" | null;
  } = {},
) {
  const logger = new BufferLogger();
  const metrics = new MetricsCollector();
  const runner = new AgentRunner(
    { model: "test-model", maxTokens: 256, timeoutMs: 1000 },
    { client, registry: new ToolRegistry(), logger },
  );
  const crew = new Crew(
    {
      agents: options.agents ?? [analyst, writer, community, manager],
      processMode: options.processMode ?? "sequential",
      managerRole: options.managerRole === undefined ? "marketing_strategist" : options.managerRole,
    },
    { runner, metrics, logger },
  );
  return { crew, logger, metrics };
}

function task(id: string, agent: Agent): Task {
  return new Task({
    id,
    kind: "content_creation",
    description: `Do ${id}`,
    expectedOutput: "Something",
    agent,
  });
}

// ── Construction ─────────────────────────────────────────────────────────────

describe("Crew construction", () => {
  const runner = new AgentRunner(
    { model: "test-model", maxTokens: 256, timeoutMs: 1000 },
    { client: new ScriptedClaudeClient(), registry: new ToolRegistry() },
  );

  function problems(
    agents: readonly Agent[],
    processMode: ProcessMode,
    managerRole: "marketing_strategist" | null,
  ): readonly string[] {
    return thrown(() => new Crew({ agents, processMode, managerRole }, { runner }), ConfigurationError)
      .errors;
  }

  it("rejects duplicate roles", () => {
    expect(problems([analyst, testAgent("data_analyst")], "sequential", null)).toEqual([
      'Duplicate agent role "data_analyst"',
    ]);
  });

  it("requires at least one agent", () => {
    expect(problems([], "sequential", null)).toEqual(["A crew needs at least one agent"]);
  });

  it("requires the manager to be a member", () => {
    expect(problems([analyst], "sequential", "marketing_strategist")).toEqual([
      'Manager "marketing_strategist" is not a member of the crew',
    ]);
  });

  it("requires a manager for hierarchical mode", () => {
    expect(problems([analyst, writer], "hierarchical", null)).toEqual([
      "Hierarchical mode requires a manager agent",
    ]);
  });

  it("allows only one delegating agent in hierarchical mode", () => {
    const delegatingWriter = testAgent("content_creator", { allowDelegation: true });
    expect(problems([manager, delegatingWriter], "hierarchical", "marketing_strategist")).toEqual([
      "Hierarchical mode allows at most one agent with delegation (found: marketing_strategist, content_creator)",
    ]);
  });

  it("lists coworkers without the manager", () => {
    const crew = new Crew(
      { agents: [analyst, manager, writer], processMode: "sequential", managerRole: "marketing_strategist" },
      { runner },
    );
    expect(crew.coworkers.map((a) => a.role)).toEqual(["data_analyst", "content_creator"]);
    expect(crew.getAgent("content_creator")).toBe(writer);
    expect(() => crew.getAgent("community_manager")).toThrow(
      'Agent "community_manager" is not a member of the crew',
    );
  });
});

// ── Sequential ───────────────────────────────────────────────────────────────

describe("Crew.kickoff (sequential)", () => {
  it("runs tasks in order and passes earlier outputs forward", async () => {
    const client = roleClient({ data_analyst: "analysis", content_creator: "draft" });
    const { crew, metrics } = makeCrew(client);
    const tasks = [task("t1", analyst), task("t2", writer)];

    const result = await crew.kickoff(tasks, { timeoutMs: 5000 });

    expect(result.processMode).toBe("sequential");
    expect(result.finalOutput).toBe("draft");
    expect(result.tasks.map((t) => [t.id, t.status, t.output])).toEqual([
      ["t1", "completed", "analysis"],
      ["t2", "completed", "draft"],
    ]);
    expect(result.inputTokens).toBe(20);
    expect(result.outputTokens).toBe(10);
    expect(result.delegations).toEqual([]);

    const second = client.calls[1];
    expect(second && firstUserText(second)).toBe(
      "Do t2\n\n## Context from earlier tasks\n\n### Result 1\nanalysis\n\n## Expected output\nSomething",
    );
    expect(metrics.getStats()).toMatchObject({
      totalTaskExecutions: 2,
      totalSuccesses: 2,
      totalFailures: 0,
    });
    expect(metrics.getAgentStats("content_creator")).toMatchObject({
      executionCount: 1,
      totalInputTokens: 10,
      totalOutputTokens: 5,
    });
  });

  it("follows the list order when the list is reversed", async () => {
    const client = roleClient({ data_analyst: "analysis", content_creator: "draft" });
    const { crew } = makeCrew(client);
    const tasks = [task("t2", writer), task("t1", analyst)];

    const result = await crew.kickoff(tasks, { timeoutMs: 5000 });

    expect(client.calls.map((c) => c.system.split("\n")[0])).toEqual([
      "You are the content creator of a marketing team.",
      "You are the data analyst of a marketing team.",
    ]);
    expect(result.tasks.map((t) => [t.id, t.output])).toEqual([
      ["t2", "draft"],
      ["t1", "analysis"],
    ]);
    expect(result.finalOutput).toBe("analysis");
    const second = client.calls[1];
    expect(second && firstUserText(second)).toBe(
      "Do t1\n\n## Context from earlier tasks\n\n### Result 1\ndraft\n\n## Expected output\nSomething",
    );
  });

  it("stops at the first failure and marks the rest as not run", async () => {
    const client = roleClient({ content_creator: "   " });
    const { crew, metrics, logger } = makeCrew(client);
    const tasks = [task("t1", analyst), task("t2", writer), task("t3", community)];

    const err = await rejected(crew.kickoff(tasks, { timeoutMs: 5000 }), ExecutionError);

    expect(err.code).toBe("RESPONSE_EMPTY");
    expect(tasks.map((t) => t.status)).toEqual(["completed", "failed", "failed"]);
    expect(tasks[1]?.toResult().error).toBe(err.message);
    expect(tasks[2]?.toResult().error).toBe("Not run: task t2 failed");
    expect(client.calls).toHaveLength(2);
    expect(metrics.getStats()).toMatchObject({ totalSuccesses: 1, totalFailures: 1 });
    expect(logger.has("error", "crew_task_failed")).toBe(true);
  });

  it("times out, failing every unfinished task", async () => {
    const client = new ScriptedClaudeClient(() => new Promise<never>(() => {}));
    const { crew, logger } = makeCrew(client);
    const tasks = [task("t1", analyst), task("t2", writer)];

    const err = await rejected(crew.kickoff(tasks, { timeoutMs: 30 }), TimeoutError);

    expect(err.timeoutMs).toBe(30);
    expect(tasks.map((t) => t.toResult().error)).toEqual([
      "Crew invocation exceeded 30ms",
      "Crew invocation exceeded 30ms",
    ]);
    expect(tasks.every((t) => t.status === "failed")).toBe(true);
    expect(logger.has("warn", "crew_kickoff_timed_out")).toBe(true);
  });
});

// ── Kickoff Validation ───────────────────────────────────────────────────────

describe("Crew.kickoff validation", () => {
  it("requires at least one task", async () => {
    const { crew } = makeCrew(roleClient());
    const err = await rejected(crew.kickoff([], { timeoutMs: 1000 }), ConfigurationError);
    expect(err.errors).toEqual(["At least one task is required"]);
  });

  it("rejects tasks bound to agents outside the crew", async () => {
    const client = roleClient();
    const { crew } = makeCrew(client);
    const stranger = testAgent("data_analyst");

    const err = await rejected(
      crew.kickoff([task("t1", stranger)], { timeoutMs: 1000 }),
      ConfigurationError,
    );
    expect(err.errors).toEqual(['Task t1 is bound to "data_analyst", which is not a crew member']);
    expect(client.calls).toHaveLength(0);
  });

  it("rejects tasks that already ran", async () => {
    const { crew } = makeCrew(roleClient());
    const started = task("t1", analyst);
    started.start();

    const err = await rejected(crew.kickoff([started], { timeoutMs: 1000 }), ConfigurationError);
    expect(err.errors).toEqual(["Task t1 is already running"]);
  });
});

// ── Hierarchical ─────────────────────────────────────────────────────────────

describe("Crew.kickoff (hierarchical)", () => {
  it("gives the manager's task the delegation tool", async () => {
    const client = roleClient({ marketing_strategist: "campaign plan" });
    const { crew } = makeCrew(client);

    const result = await crew.kickoff([task("m1", manager)], {
      processMode: "hierarchical",
      timeoutMs: 1000,
    });

    expect(result.processMode).toBe("hierarchical");
    expect(result.finalOutput).toBe("campaign plan");
    expect(client.calls[0]?.toolNames).toEqual([DELEGATE_TOOL_NAME]);
  });

  it("takes exactly one task bound to the manager", async () => {
    const { crew } = makeCrew(roleClient());

    const err = await rejected(
      crew.kickoff([task("t1", analyst), task("m1", manager)], {
        processMode: "hierarchical",
        timeoutMs: 1000,
      }),
      ConfigurationError,
    );
    expect(err.errors).toEqual(["Hierarchical mode takes exactly one task, bound to the manager"]);
  });

  it("cannot switch to hierarchical mode without a manager", async () => {
    const { crew } = makeCrew(roleClient(), { agents: [analyst, writer], managerRole: null });

    const err = await rejected(
      crew.kickoff([task("t1", analyst)], { processMode: "hierarchical", timeoutMs: 1000 }),
      ConfigurationError,
    );
    expect(err.errors).toEqual([
      "Hierarchical mode requires a manager agent",
      "Hierarchical mode takes exactly one task, bound to the manager",
    ]);
  });
});
