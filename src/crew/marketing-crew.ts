import { randomBytes } from "node:crypto";
import { ExternalCallError, errorMessage } from "../integrations/external-call.ts";
import { runWithConcurrency } from "../integrations/concurrency.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { MetricsCollector, MetricsSnapshot } from "../observability/metrics.ts";
import { parseUserProfile } from "../tools/github-tools.ts";
import type { AnalysisDepth, GitHubUserProfile } from "../tools/github-tools.ts";
import type { ToolRegistry } from "../tools/tool-registry.ts";
import { ToolExecutionError } from "../tools/types.ts";
import type { Agent, AgentRole, ProcessMode } from "../types/agent.ts";
import type { TaskKind, TaskResult } from "../types/task.ts";
import type { DelegationRecord } from "./agent-runner.ts";
import type { Crew, CrewResult } from "./crew.ts";
import { withDeadline } from "./deadline.ts";
import { TimeoutError, ValidationError } from "./errors.ts";
import {
  validateAnalyzeUsers,
  validateCommunityEngagement,
  validateComprehensiveCampaign,
  validateContentCampaign,
  validateGenerateContent,
} from "./inputs.ts";
import type {
  AnalyzeUsersInput,
  CommunityEngagementInput,
  ComprehensiveCampaignInput,
  ContentCampaignInput,
  GenerateContentInput,
} from "./inputs.ts";
import type { Task } from "./task.ts";
import type { TaskTemplateRegistry } from "./task-templates.ts";
import { WORKFLOW_TABLE, validateWorkflowTable } from "./workflows.ts";
import type { OperationKind, WorkflowDefinition } from "./workflows.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export interface MarketingCrewConfig {
  /** Bound on each public operation, prefetching included. */
  readonly timeoutMs: number;
  /** `owner/repo` the community workflows act on. */
  readonly repository: string;
  /** Parallel profile fetches in `analyzeUsers`. */
  readonly profileConcurrency: number;
}

export interface MarketingCrewDeps {
  readonly crew: Crew;
  readonly templates: TaskTemplateRegistry;
  readonly registry: ToolRegistry;
  readonly metrics: MetricsCollector;
  readonly workflows?: Readonly<Record<OperationKind, WorkflowDefinition>>;
  readonly logger?: Logger;
}

/** Crew workflows plus the direct tool operations that skip the crew. */
export type OperationName = OperationKind | "generate_content";

export interface OperationOptions {
  readonly signal?: AbortSignal;
}

export type ProfileEntry =
  | ({ readonly found: true } & GitHubUserProfile)
  | { readonly found: false; readonly username: string };

interface OperationResult {
  readonly tasks: readonly TaskResult[];
  readonly durationMs: number;
}

export interface AnalyzeUsersResult extends OperationResult {
  readonly analysis: string;
  readonly profiles: Readonly<Record<string, ProfileEntry>>;
  readonly analyzedUsers: readonly string[];
  readonly analysisDepth: AnalysisDepth;
}

export interface ContentCampaignResult extends OperationResult {
  readonly campaignName: string;
  readonly strategy: string;
  readonly content: string;
}

export interface CommunityEngagementResult extends OperationResult {
  readonly repository: string;
  readonly analysis: string;
  readonly engagementPlan: string;
}

export interface ComprehensiveCampaignResult extends OperationResult {
  readonly campaignName: string;
  readonly report: string;
  readonly delegations: readonly DelegationRecord[];
}

export interface GeneratedContentResult {
  readonly contentId: string;
  readonly status: "completed";
  readonly content: string;
  readonly metadata: {
    readonly contentType: string;
    readonly topic: string;
    readonly targetAudience: string;
    readonly language: string;
    readonly generatedAt: string;
  };
  readonly durationMs: number;
}

export interface AgentStatus {
  readonly role: AgentRole;
  readonly goal: string;
  readonly tools: readonly string[];
  readonly allowDelegation: boolean;
  readonly maxIterations: number;
  readonly isManager: boolean;
}

export interface TeamStatus {
  readonly agents: readonly AgentStatus[];
  readonly tools: readonly string[];
  readonly processMode: ProcessMode;
  readonly manager: AgentRole | null;
  readonly workflows: Readonly<
    Record<OperationKind, { readonly processMode: ProcessMode; readonly agents: readonly AgentRole[] }>
  >;
  readonly metrics: MetricsSnapshot;
}

export interface ToolsStatus {
  readonly tools: ReadonlyArray<{ readonly name: string; readonly description: string }>;
  readonly total: number;
}

// ── MarketingCrew ────────────────────────────────────────────────────────────

/**
 * Public face of the crew: validates a request, builds the task list the
 * workflow table prescribes, runs it under the configured timeout and
 * shapes the result.
 */
export class MarketingCrew {
  private readonly crew: Crew;
  private readonly templates: TaskTemplateRegistry;
  private readonly registry: ToolRegistry;
  private readonly metrics: MetricsCollector;
  private readonly workflows: Readonly<Record<OperationKind, WorkflowDefinition>>;
  private readonly logger: Logger;

  constructor(
    private readonly config: MarketingCrewConfig,
    deps: MarketingCrewDeps,
  ) {
    this.crew = deps.crew;
    this.templates = deps.templates;
    this.registry = deps.registry;
    this.metrics = deps.metrics;
    this.workflows = deps.workflows ?? WORKFLOW_TABLE;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "marketing-crew" });

    validateWorkflowTable(this.workflows, this.crew, this.templates);
  }

  // ── Operations ──────────────────────────────────────────────────────────

  async analyzeUsers(
    input: AnalyzeUsersInput,
    options: OperationOptions = {},
  ): Promise<AnalyzeUsersResult> {
    const request = this.validated("analyze_users", () => validateAnalyzeUsers(input));
    const startTime = Date.now();
    const deadline = startTime + this.config.timeoutMs;

    const profiles = await this.tracked("analyze_users", startTime, 0, () =>
      this.fetchProfiles(request.userList, request.analysisDepth, options.signal),
    );

    const task = this.templates.createTask(
      "analyze_target_users",
      this.stepAgent("analyze_users", "analyze_target_users"),
      {
        userList: request.userList,
        analysisDepth: request.analysisDepth,
        language: request.language,
        profiles: JSON.stringify(profiles, null, 2),
      },
    );
    const result = await this.run("analyze_users", [task], options, deadline - Date.now());

    return {
      analysis: result.finalOutput,
      profiles,
      analyzedUsers: request.userList,
      analysisDepth: request.analysisDepth,
      tasks: result.tasks,
      durationMs: Date.now() - startTime,
    };
  }

  async createContentCampaign(
    input: ContentCampaignInput,
    options: OperationOptions = {},
  ): Promise<ContentCampaignResult> {
    const request = this.validated("content_campaign", () => validateContentCampaign(input));

    const strategy = this.templates.createTask(
      "content_strategy",
      this.stepAgent("content_campaign", "content_strategy"),
      {
        campaignName: request.name,
        targetAudience: request.targetAudience,
        topics: request.topics,
        contentTypes: request.contentTypes,
        duration: request.duration,
        keywords: request.keywords,
        language: request.language,
      },
    );
    const creation = this.templates.createTask(
      "content_creation",
      this.stepAgent("content_campaign", "content_creation"),
      {
        campaignName: request.name,
        targetAudience: request.targetAudience,
        contentTypes: request.contentTypes,
        keywords: request.keywords,
        language: request.language,
      },
    );
    const result = await this.run("content_campaign", [strategy, creation], options);

    return {
      campaignName: request.name,
      strategy: outputOf(result, 0),
      content: outputOf(result, 1),
      tasks: result.tasks,
      durationMs: result.durationMs,
    };
  }

  async executeCommunityEngagement(
    input: CommunityEngagementInput,
    options: OperationOptions = {},
  ): Promise<CommunityEngagementResult> {
    const request = this.validated("community_engagement", () =>
      validateCommunityEngagement(input),
    );
    const repository = this.config.repository;

    const analysis = this.templates.createTask(
      "community_analysis",
      this.stepAgent("community_engagement", "community_analysis"),
      {
        repository,
        interactionTypes: request.interactionTypes,
        targetCount: request.targetCount,
        language: request.language,
      },
    );
    const engagement = this.templates.createTask(
      "community_engagement",
      this.stepAgent("community_engagement", "community_engagement"),
      {
        repository,
        interactionTypes: request.interactionTypes,
        targetCount: request.targetCount,
        engagementLevel: request.engagementLevel,
        language: request.language,
      },
    );
    const result = await this.run("community_engagement", [analysis, engagement], options);

    return {
      repository,
      analysis: outputOf(result, 0),
      engagementPlan: outputOf(result, 1),
      tasks: result.tasks,
      durationMs: result.durationMs,
    };
  }

  async runComprehensiveCampaign(
    input: ComprehensiveCampaignInput,
    options: OperationOptions = {},
  ): Promise<ComprehensiveCampaignResult> {
    const request = this.validated("comprehensive_campaign", () =>
      validateComprehensiveCampaign(input),
    );

    const task = this.templates.createTask(
      "comprehensive_campaign",
      this.stepAgent("comprehensive_campaign", "comprehensive_campaign"),
      {
        campaignName: request.name,
        objectives: request.objectives,
        targetAudience: request.targetAudience,
        duration: request.duration,
        budgetLevel: request.budgetLevel,
        priorityChannels: request.priorityChannels,
        repository: this.config.repository,
        language: request.language,
      },
    );
    const result = await this.run("comprehensive_campaign", [task], options);

    return {
      campaignName: request.name,
      report: result.finalOutput,
      delegations: result.delegations,
      tasks: result.tasks,
      durationMs: result.durationMs,
    };
  }

  /** One `content_generation` call, without an agent in between. */
  async generateContent(
    input: GenerateContentInput,
    options: OperationOptions = {},
  ): Promise<GeneratedContentResult> {
    const operation = "generate_content";
    const request = this.validated(operation, () => validateGenerateContent(input));
    const startTime = Date.now();
    this.logger.info("operation_started", { operation, contentType: request.contentType });

    const result = await this.tracked(operation, startTime, 0, () =>
      withDeadline(
        {
          timeoutMs: this.config.timeoutMs,
          signal: options.signal,
          onAbandoned: (late) => {
            this.logger.debug("content_generation_abandoned_settled", {
              outcome: late instanceof Error ? late.message : "resolved",
            });
          },
        },
        (signal) =>
          this.registry.invoke(
            "content_generation",
            {
              content_type: request.contentType,
              topic: request.topic,
              target_audience: request.targetAudience,
              tone: request.tone,
              length: request.length,
              language: request.language,
              keywords: request.keywords.join(", "),
            },
            signal,
          ),
      ),
    );

    const durationMs = Date.now() - startTime;
    this.metrics.recordWorkflowRun({ operation, status: "completed", durationMs, taskCount: 0 });
    this.logger.info("operation_completed", { operation, durationMs });

    const generatedAt = new Date(startTime);
    return {
      contentId: contentId(generatedAt),
      status: "completed",
      content: result.content,
      metadata: {
        contentType: request.contentType,
        topic: request.topic,
        targetAudience: request.targetAudience,
        language: request.language,
        generatedAt: generatedAt.toISOString(),
      },
      durationMs,
    };
  }

  // ── Status ──────────────────────────────────────────────────────────────

  getTeamStatus(): TeamStatus {
    const manager = this.crew.manager;
    const agents = [...this.crew.agents.values()].map(
      (agent): AgentStatus => ({
        role: agent.role,
        goal: agent.goal,
        tools: agent.tools.map((t) => t.name),
        allowDelegation: agent.allowDelegation,
        maxIterations: agent.maxIterations,
        isManager: agent === manager,
      }),
    );

    return {
      agents,
      tools: [...this.registry.toolNames],
      processMode: this.crew.processMode,
      manager: manager?.role ?? null,
      workflows: {
        analyze_users: workflowSummary(this.workflows.analyze_users),
        content_campaign: workflowSummary(this.workflows.content_campaign),
        community_engagement: workflowSummary(this.workflows.community_engagement),
        comprehensive_campaign: workflowSummary(this.workflows.comprehensive_campaign),
      },
      metrics: this.metrics.getStats(),
    };
  }

  getToolsStatus(): ToolsStatus {
    const tools = this.registry
      .list()
      .map((tool) => ({ name: tool.name, description: tool.description }));
    return { tools, total: tools.length };
  }

  // ── Internals ───────────────────────────────────────────────────────────

  /** The agent the workflow binds to `kind`. */
  private stepAgent(operation: OperationKind, kind: TaskKind): Agent {
    const step = this.workflows[operation].steps.find((s) => s.task === kind);
    if (!step) {
      throw new Error(`Workflow "${operation}" has no "${kind}" step`);
    }
    return this.crew.getAgent(step.agent);
  }

  private validated<T>(operation: OperationName, validate: () => T): T {
    try {
      return validate();
    } catch (err: unknown) {
      if (err instanceof ValidationError) {
        this.metrics.recordWorkflowRun({
          operation,
          status: "rejected",
          durationMs: 0,
          taskCount: 0,
        });
        this.logger.warn("operation_rejected", {
          operation,
          field: err.field,
          error: err.message,
        });
      }
      throw err;
    }
  }

  /** Record a failed workflow run for errors raised outside the crew. */
  private async tracked<T>(
    operation: OperationName,
    startTime: number,
    taskCount: number,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      this.metrics.recordWorkflowRun({
        operation,
        status: err instanceof TimeoutError ? "timed_out" : "failed",
        durationMs: Date.now() - startTime,
        taskCount,
      });
      this.logger.error("operation_failed", { operation, error: errorMessage(err) });
      throw err;
    }
  }

  private async run(
    operation: OperationKind,
    tasks: readonly Task[],
    options: OperationOptions,
    timeoutMs: number = this.config.timeoutMs,
  ): Promise<CrewResult> {
    const startTime = Date.now();
    this.logger.info("operation_started", {
      operation,
      taskIds: tasks.map((t) => t.id),
    });

    const result = await this.tracked(operation, startTime, tasks.length, () => {
      if (timeoutMs <= 0) {
        throw new TimeoutError(this.config.timeoutMs);
      }
      return this.crew.kickoff(tasks, {
        processMode: this.workflows[operation].processMode,
        timeoutMs,
        signal: options.signal,
      });
    });

    this.metrics.recordWorkflowRun({
      operation,
      status: "completed",
      durationMs: result.durationMs,
      taskCount: tasks.length,
    });
    this.logger.info("operation_completed", {
      operation,
      durationMs: result.durationMs,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
    });
    return result;
  }

  /**
   * One `github_analysis` call per user with bounded concurrency. A user
   * GitHub does not know becomes `{found: false}`; any other failure
   * cancels the remaining fetches and propagates.
   */
  private async fetchProfiles(
    usernames: readonly string[],
    depth: AnalysisDepth,
    signal: AbortSignal | undefined,
  ): Promise<Record<string, ProfileEntry>> {
    const outcome = await withDeadline(
      {
        timeoutMs: this.config.timeoutMs,
        signal,
        onAbandoned: (late) => {
          this.logger.debug("profile_fetch_abandoned_settled", {
            outcome: late instanceof Error ? late.message : "resolved",
          });
        },
      },
      (deadlineSignal) =>
        runWithConcurrency({
          tasks: usernames.map(
            (username) => (taskSignal: AbortSignal) =>
              this.fetchProfile(username, depth, taskSignal),
          ),
          maxConcurrency: this.config.profileConcurrency,
          signal: deadlineSignal,
        }),
    );

    if (!outcome.ok) {
      throw outcome.error;
    }

    const profiles: Record<string, ProfileEntry> = {};
    for (const [index, username] of usernames.entries()) {
      const entry = outcome.results[index];
      if (entry) profiles[username] = entry;
    }
    this.logger.debug("profiles_fetched", {
      requested: usernames.length,
      found: Object.values(profiles).filter((p) => p.found).length,
    });
    return profiles;
  }

  private async fetchProfile(
    username: string,
    depth: AnalysisDepth,
    signal: AbortSignal,
  ): Promise<ProfileEntry> {
    try {
      const result = await this.registry.invoke(
        "github_analysis",
        { analysis_type: "user", username, depth },
        signal,
      );
      return { found: true, ...parseUserProfile(result.content) };
    } catch (err: unknown) {
      if (
        err instanceof ToolExecutionError &&
        err.cause instanceof ExternalCallError &&
        err.cause.kind === "not_found"
      ) {
        this.logger.info("profile_not_found", { username });
        return { found: false, username };
      }
      throw err;
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────────

/** `content-{YYYYMMDD}-{6 hex}` */
function contentId(at: Date): string {
  const date = at.toISOString().slice(0, 10).replace(/-/g, "");
  return `content-${date}-${randomBytes(3).toString("hex")}`;
}

function outputOf(result: CrewResult, index: number): string {
  return result.tasks[index]?.output ?? "";
}

function workflowSummary(workflow: WorkflowDefinition): {
  readonly processMode: ProcessMode;
  readonly agents: readonly AgentRole[];
} {
  return { processMode: workflow.processMode, agents: workflow.steps.map((s) => s.agent) };
}
