import { abortReason, errorMessage } from "../integrations/external-call.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { MetricsCollector } from "../observability/metrics.ts";
import type { Agent, AgentRole, ProcessMode } from "../types/agent.ts";
import type { TaskResult } from "../types/task.ts";
import type { AgentRunner, DelegationRecord } from "./agent-runner.ts";
import { withDeadline } from "./deadline.ts";
import { ConfigurationError, TimeoutError } from "./errors.ts";
import type { Task } from "./task.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export interface CrewConfig {
  readonly agents: readonly Agent[];
  readonly processMode: ProcessMode;
  readonly managerRole?: AgentRole | null;
}

export interface CrewDeps {
  readonly runner: AgentRunner;
  readonly metrics?: MetricsCollector;
  readonly logger?: Logger;
}

export interface KickoffOptions {
  /** Overrides the crew's default process mode for this invocation. */
  readonly processMode?: ProcessMode;
  /** Bound on the whole invocation. */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export interface CrewResult {
  readonly processMode: ProcessMode;
  readonly tasks: readonly TaskResult[];
  /** Output of the last task. */
  readonly finalOutput: string;
  readonly durationMs: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly delegations: readonly DelegationRecord[];
}

interface RunTotals {
  inputTokens: number;
  outputTokens: number;
  readonly delegations: DelegationRecord[];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ── Crew ─────────────────────────────────────────────────────────────────────

/**
 * The agent set plus how to run a task list over it.
 *
 * Holds no per-invocation state: every `kickoff` owns its own task list, so
 * one crew serves concurrent requests.
 */
export class Crew {
  readonly agents: ReadonlyMap<AgentRole, Agent>;
  readonly processMode: ProcessMode;
  readonly manager: Agent | null;

  private readonly runner: AgentRunner;
  private readonly metrics: MetricsCollector | null;
  private readonly logger: Logger;

  constructor(config: CrewConfig, deps: CrewDeps) {
    const errors: string[] = [];
    const agents = new Map<AgentRole, Agent>();
    for (const agent of config.agents) {
      if (agents.has(agent.role)) {
        errors.push(`Duplicate agent role "${agent.role}"`);
        continue;
      }
      agents.set(agent.role, agent);
    }
    if (agents.size === 0) {
      errors.push("A crew needs at least one agent");
    }

    const managerRole = config.managerRole ?? null;
    const manager = managerRole === null ? null : agents.get(managerRole) ?? null;
    if (managerRole !== null && manager === null) {
      errors.push(`Manager "${managerRole}" is not a member of the crew`);
    }

    if (errors.length === 0 && config.processMode === "hierarchical") {
      errors.push(...hierarchicalProblems([...agents.values()], manager));
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        `Invalid crew configuration: ${errors.join("; ")}`,
        errors,
      );
    }

    this.agents = agents;
    this.processMode = config.processMode;
    this.manager = manager;
    this.runner = deps.runner;
    this.metrics = deps.metrics ?? null;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "crew" });
  }

  /** Crew members other than the manager. */
  get coworkers(): Agent[] {
    return [...this.agents.values()].filter((a) => a !== this.manager);
  }

  has(agent: Agent): boolean {
    return this.agents.get(agent.role) === agent;
  }

  getAgent(role: AgentRole): Agent {
    const agent = this.agents.get(role);
    if (!agent) {
      throw new ConfigurationError(`Agent "${role}" is not a member of the crew`);
    }
    return agent;
  }

  // ── Kickoff ─────────────────────────────────────────────────────────────

  async kickoff(tasks: readonly Task[], options: KickoffOptions): Promise<CrewResult> {
    const processMode = options.processMode ?? this.processMode;
    this.validateKickoff(tasks, processMode);

    const startTime = Date.now();
    this.logger.info("crew_kickoff_started", {
      processMode,
      taskIds: tasks.map((t) => t.id),
      timeoutMs: options.timeoutMs,
    });

    try {
      const { inputTokens, outputTokens, delegations } = await withDeadline(
        {
          timeoutMs: options.timeoutMs,
          signal: options.signal,
          onAbandoned: (late) => {
            this.logger.debug("crew_abandoned_run_settled", {
              outcome: late instanceof Error ? late.message : "resolved",
            });
          },
        },
        (signal) => this.execute(tasks, processMode, signal),
      );
      const durationMs = Date.now() - startTime;
      const results = tasks.map((t) => t.toResult());
      const last = results[results.length - 1];

      this.logger.info("crew_kickoff_completed", {
        processMode,
        durationMs,
        taskCount: tasks.length,
        inputTokens,
        outputTokens,
      });

      return {
        processMode,
        tasks: results,
        finalOutput: last?.output ?? "",
        durationMs,
        inputTokens,
        outputTokens,
        delegations,
      };
    } catch (err: unknown) {
      if (err instanceof TimeoutError) {
        for (const task of tasks) {
          if (task.status === "pending" || task.status === "running") {
            task.fail(err);
          }
        }
        this.logger.warn("crew_kickoff_timed_out", {
          processMode,
          timeoutMs: options.timeoutMs,
          taskIds: tasks.map((t) => t.id),
        });
      } else {
        this.logger.error("crew_kickoff_failed", {
          processMode,
          error: errorMessage(err),
          durationMs: Date.now() - startTime,
        });
      }
      throw err;
    }
  }

  private validateKickoff(tasks: readonly Task[], processMode: ProcessMode): void {
    const errors: string[] = [];
    if (tasks.length === 0) {
      errors.push("At least one task is required");
    }
    for (const task of tasks) {
      if (!this.has(task.agent)) {
        errors.push(`Task ${task.id} is bound to "${task.agent.role}", which is not a crew member`);
      }
      if (task.status !== "pending") {
        errors.push(`Task ${task.id} is already ${task.status}`);
      }
    }
    if (processMode === "hierarchical") {
      errors.push(...hierarchicalProblems([...this.agents.values()], this.manager));
      const [first] = tasks;
      if (tasks.length !== 1 || (first && first.agent !== this.manager)) {
        errors.push("Hierarchical mode takes exactly one task, bound to the manager");
      }
    }
    if (errors.length > 0) {
      throw new ConfigurationError(`Cannot start crew: ${errors.join("; ")}`, errors);
    }
  }

  // ── Execution ───────────────────────────────────────────────────────────

  private async execute(
    tasks: readonly Task[],
    processMode: ProcessMode,
    signal: AbortSignal,
  ): Promise<RunTotals> {
    const totals: RunTotals = { inputTokens: 0, outputTokens: 0, delegations: [] };
    const outputs: string[] = [];

    for (const [index, task] of tasks.entries()) {
      if (signal.aborted) {
        const reason = abortReason(signal);
        failRemaining(tasks, index, reason);
        throw reason;
      }

      // Sequential tasks see every earlier output of this invocation
      task.start(processMode === "sequential" ? outputs : []);
      const taskStart = Date.now();
      this.logger.debug("crew_task_started", { taskId: task.id, agent: task.agent.role });

      try {
        const result = await this.runner.run(task, {
          signal,
          ...(processMode === "hierarchical" ? { coworkers: this.coworkers } : {}),
        });
        if (signal.aborted) {
          throw abortReason(signal);
        }
        task.complete(result.output);
        outputs.push(result.output);
        totals.inputTokens += result.inputTokens;
        totals.outputTokens += result.outputTokens;
        totals.delegations.push(...result.delegations);
        this.metrics?.recordTaskExecution({
          taskId: task.id,
          agentRole: task.agent.role,
          status: "completed",
          durationMs: Date.now() - taskStart,
          inputTokens: result.inputTokens,
          outputTokens: result.outputTokens,
        });
      } catch (err: unknown) {
        const error = toError(err);
        task.fail(error);
        failRemaining(tasks, index + 1, new Error(`Not run: task ${task.id} failed`));
        this.metrics?.recordTaskExecution({
          taskId: task.id,
          agentRole: task.agent.role,
          status: "failed",
          durationMs: Date.now() - taskStart,
          inputTokens: 0,
          outputTokens: 0,
        });
        this.logger.error("crew_task_failed", {
          taskId: task.id,
          agent: task.agent.role,
          error: error.message,
        });
        throw err;
      }
    }

    return totals;
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function hierarchicalProblems(agents: readonly Agent[], manager: Agent | null): string[] {
  const problems: string[] = [];
  if (manager === null) {
    problems.push("Hierarchical mode requires a manager agent");
  }
  const delegators = agents.filter((a) => a.allowDelegation).map((a) => a.role);
  if (delegators.length > 1) {
    problems.push(
      `Hierarchical mode allows at most one agent with delegation (found: ${delegators.join(", ")})`,
    );
  }
  return problems;
}

function failRemaining(tasks: readonly Task[], from: number, error: Error): void {
  for (const task of tasks.slice(from)) {
    if (task.status === "pending") task.fail(error);
  }
}
