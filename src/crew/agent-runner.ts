import { ExecutionError } from "../agents/claude-client.ts";
import type {
  ClaudeClient,
  ClaudeContentBlock,
  ClaudeMessage,
  ClaudeToolDef,
  ClaudeToolUseBlock,
} from "../agents/claude-client.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { ToolRegistry } from "../tools/tool-registry.ts";
import { ToolInputError, UnknownToolError } from "../tools/types.ts";
import type { Agent } from "../types/agent.ts";
import { checkOutputWellFormed } from "./task.ts";
import type { Task } from "./task.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export interface AgentRunnerConfig {
  readonly model: string;
  readonly maxTokens: number;
  /** Per LLM request. */
  readonly timeoutMs: number;
}

export interface AgentRunnerDeps {
  readonly client: ClaudeClient;
  readonly registry: ToolRegistry;
  readonly logger?: Logger;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
  /** Agents the task's agent may delegate to. Ignored unless it allows delegation. */
  readonly coworkers?: readonly Agent[];
}

export interface ToolInvocationRecord {
  readonly agentRole: string;
  readonly toolName: string;
  readonly success: boolean;
  readonly attempts: number;
  readonly durationMs: number;
}

export interface DelegationRecord {
  readonly from: string;
  readonly to: string;
  readonly accepted: boolean;
  readonly durationMs: number;
}

export interface AgentRunResult {
  readonly output: string;
  /** Tool rounds used by the task's own agent. */
  readonly iterations: number;
  readonly toolInvocations: readonly ToolInvocationRecord[];
  readonly delegations: readonly DelegationRecord[];
  readonly inputTokens: number;
  readonly outputTokens: number;
}

interface RunStats {
  inputTokens: number;
  outputTokens: number;
  readonly toolInvocations: ToolInvocationRecord[];
  readonly delegations: DelegationRecord[];
}

interface Conversation {
  readonly agent: Agent;
  readonly taskId: string;
  readonly system: string;
  readonly userMessage: string;
  readonly coworkers: readonly Agent[];
  readonly stats: RunStats;
  readonly signal?: AbortSignal;
}

// ── Delegation Tool ──────────────────────────────────────────────────────────

export const DELEGATE_TOOL_NAME = "delegate_work";

function delegateToolDef(coworkers: readonly Agent[]): ClaudeToolDef {
  return {
    name: DELEGATE_TOOL_NAME,
    description:
      "Hand a self-contained piece of work to a coworker and receive their answer. " +
      "Include everything they need: they cannot see this conversation.",
    input_schema: {
      type: "object",
      properties: {
        coworker: { type: "string", enum: coworkers.map((c) => c.role) },
        task: { type: "string", description: "What the coworker should do" },
        context: { type: "string", description: "Background the coworker needs" },
      },
      required: ["coworker", "task"],
    },
  };
}

// ── Prompt Assembly ──────────────────────────────────────────────────────────

export const FINAL_ANSWER_INSTRUCTION =
  "You have reached the tool-use limit for this task. Do not call any more tools. " +
  "Give your final answer now, based on the information you already have.";

export function buildSystemPrompt(agent: Agent, coworkers: readonly Agent[]): string {
  const lines = [
    `You are the ${agent.role.replace(/_/g, " ")} of a marketing team.`,
    "",
    `Goal: ${agent.goal}`,
    "",
    `Background: ${agent.backstory}`,
  ];
  if (coworkers.length > 0) {
    lines.push(
      "",
      `You lead the team. Use the ${DELEGATE_TOOL_NAME} tool to hand work to a coworker:`,
      ...coworkers.map((c) => `- ${c.role}: ${c.goal}`),
    );
  }
  return lines.join("\n");
}

export function buildUserMessage(
  description: string,
  expectedOutput: string,
  context: readonly string[],
): string {
  const parts = [description];
  if (context.length > 0) {
    parts.push(
      "## Context from earlier tasks",
      context.map((c, i) => `### Result ${i + 1}\n${c}`).join("\n\n"),
    );
  }
  parts.push(`## Expected output\n${expectedOutput}`);
  return parts.join("\n\n");
}

// ── Agent Runner ─────────────────────────────────────────────────────────────

/**
 * Executes one task with its agent: prompt assembly, the tool-use loop,
 * delegation and the iteration ceiling.
 *
 * Task status is left to the caller. Tool input errors and rejected
 * delegations go back to the model as error tool results; a
 * `ToolExecutionError` or LLM failure rejects the run.
 */
export class AgentRunner {
  private readonly client: ClaudeClient;
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;

  constructor(
    private readonly config: AgentRunnerConfig,
    deps: AgentRunnerDeps,
  ) {
    this.client = deps.client;
    this.registry = deps.registry;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "agent-runner" });
  }

  async run(task: Task, options: RunOptions = {}): Promise<AgentRunResult> {
    const agent = task.agent;
    const coworkers = agent.allowDelegation
      ? (options.coworkers ?? []).filter((c) => c.role !== agent.role)
      : [];
    const stats: RunStats = {
      inputTokens: 0,
      outputTokens: 0,
      toolInvocations: [],
      delegations: [],
    };

    this.logger.info("agent_run_started", {
      taskId: task.id,
      agent: agent.role,
      toolCount: agent.tools.length,
      coworkers: coworkers.map((c) => c.role),
    });

    const { output, iterations } = await this.converse({
      agent,
      taskId: task.id,
      system: buildSystemPrompt(agent, coworkers),
      userMessage: buildUserMessage(task.description, task.expectedOutput, task.context),
      coworkers,
      stats,
      signal: options.signal,
    });

    this.logger.info("agent_run_completed", {
      taskId: task.id,
      agent: agent.role,
      iterations,
      toolInvocations: stats.toolInvocations.length,
      delegations: stats.delegations.length,
      inputTokens: stats.inputTokens,
      outputTokens: stats.outputTokens,
    });

    return {
      output,
      iterations,
      toolInvocations: stats.toolInvocations,
      delegations: stats.delegations,
      inputTokens: stats.inputTokens,
      outputTokens: stats.outputTokens,
    };
  }

  // ── Tool Loop ───────────────────────────────────────────────────────────

  private async converse(
    conversation: Conversation,
  ): Promise<{ output: string; iterations: number }> {
    const { agent, taskId, signal, stats } = conversation;
    const toolDefs = [
      ...ToolRegistry.toClaudeTools(agent.tools),
      ...(conversation.coworkers.length > 0 ? [delegateToolDef(conversation.coworkers)] : []),
    ];
    const messages: ClaudeMessage[] = [
      { role: "user", content: conversation.userMessage },
    ];
    let iterations = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      if (signal?.aborted) {
        throw new ExecutionError("Aborted during tool loop", "ABORTED", taskId, false);
      }

      const ceilingReached = iterations >= agent.maxIterations;
      // Tool definitions stay on the request once tool blocks are in the history
      const result = await this.client.createMessage({
        model: this.config.model,
        system: conversation.system,
        messages,
        maxTokens: this.config.maxTokens,
        timeoutMs: this.config.timeoutMs,
        signal,
        ...(toolDefs.length > 0 ? { tools: toolDefs } : {}),
      });
      stats.inputTokens += result.inputTokens;
      stats.outputTokens += result.outputTokens;

      const toolUses = result.toolUseBlocks ?? [];
      if (result.stopReason !== "tool_use" || toolUses.length === 0 || ceilingReached) {
        if (ceilingReached && toolUses.length > 0) {
          this.logger.warn("agent_tool_calls_ignored", {
            taskId,
            agent: agent.role,
            ignored: toolUses.map((u) => u.name),
          });
        }
        return { output: checkOutputWellFormed(result.content, taskId), iterations };
      }

      messages.push({ role: "assistant", content: result.contentBlocks ?? toolUses });

      const resultBlocks: ClaudeContentBlock[] = [];
      for (const toolUse of toolUses) {
        resultBlocks.push(await this.handleToolUse(conversation, toolUse));
      }

      iterations++;
      this.logger.debug("agent_tool_round", {
        taskId,
        agent: agent.role,
        iteration: iterations,
        toolsCalled: toolUses.length,
      });

      if (iterations >= agent.maxIterations) {
        this.logger.info("agent_iteration_ceiling", {
          taskId,
          agent: agent.role,
          maxIterations: agent.maxIterations,
        });
        resultBlocks.push({ type: "text", text: FINAL_ANSWER_INSTRUCTION });
      }
      messages.push({ role: "user", content: resultBlocks });
    }
  }

  private async handleToolUse(
    conversation: Conversation,
    toolUse: ClaudeToolUseBlock,
  ): Promise<ClaudeContentBlock> {
    const { agent, taskId, signal, stats } = conversation;

    if (toolUse.name === DELEGATE_TOOL_NAME && conversation.coworkers.length > 0) {
      return this.delegate(conversation, toolUse);
    }

    if (!agent.tools.some((t) => t.name === toolUse.name)) {
      this.logger.warn("agent_tool_not_granted", {
        taskId,
        agent: agent.role,
        tool: toolUse.name,
      });
      return errorResult(toolUse, new UnknownToolError(toolUse.name).message);
    }

    try {
      const invocation = await this.registry.invoke(toolUse.name, toolUse.input, signal);
      stats.toolInvocations.push({
        agentRole: agent.role,
        toolName: toolUse.name,
        success: true,
        attempts: invocation.attempts,
        durationMs: invocation.durationMs,
      });
      return {
        type: "tool_result",
        tool_use_id: toolUse.id,
        content: invocation.content,
      };
    } catch (err: unknown) {
      if (err instanceof ToolInputError || err instanceof UnknownToolError) {
        stats.toolInvocations.push({
          agentRole: agent.role,
          toolName: toolUse.name,
          success: false,
          attempts: 1,
          durationMs: 0,
        });
        return errorResult(toolUse, `Tool invocation error: ${err.message}`);
      }
      throw err;
    }
  }

  // ── Delegation ──────────────────────────────────────────────────────────

  private async delegate(
    conversation: Conversation,
    toolUse: ClaudeToolUseBlock,
  ): Promise<ClaudeContentBlock> {
    const { agent, taskId, signal, stats } = conversation;
    const { coworker, task: request, context } = toolUse.input;

    if (typeof request !== "string" || request.trim() === "") {
      return errorResult(toolUse, `${DELEGATE_TOOL_NAME}: 'task' must be a non-empty string`);
    }

    const target = conversation.coworkers.find((c) => c.role === coworker);
    if (!target) {
      const available = conversation.coworkers.map((c) => c.role);
      this.logger.warn("delegation_rejected", {
        taskId,
        from: agent.role,
        to: typeof coworker === "string" ? coworker : null,
        available,
      });
      stats.delegations.push({
        from: agent.role,
        to: typeof coworker === "string" ? coworker : String(coworker),
        accepted: false,
        durationMs: 0,
      });
      return errorResult(
        toolUse,
        `Delegation rejected: "${String(coworker)}" is not one of your coworkers (${available.join(", ")})`,
      );
    }

    this.logger.info("delegation_started", { taskId, from: agent.role, to: target.role });
    const startTime = Date.now();

    // Coworkers never delegate further
    const { output } = await this.converse({
      agent: target,
      taskId,
      system: buildSystemPrompt(target, []),
      userMessage: buildUserMessage(
        request.trim(),
        "A complete answer to the request above.",
        typeof context === "string" && context.trim() !== "" ? [context.trim()] : [],
      ),
      coworkers: [],
      stats,
      signal,
    });

    const durationMs = Date.now() - startTime;
    stats.delegations.push({ from: agent.role, to: target.role, accepted: true, durationMs });
    this.logger.info("delegation_completed", {
      taskId,
      from: agent.role,
      to: target.role,
      durationMs,
    });

    return { type: "tool_result", tool_use_id: toolUse.id, content: output };
  }
}

function errorResult(toolUse: ClaudeToolUseBlock, message: string): ClaudeContentBlock {
  return { type: "tool_result", tool_use_id: toolUse.id, content: message, is_error: true };
}
