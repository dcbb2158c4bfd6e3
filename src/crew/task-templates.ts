import type { Agent } from "../types/agent.ts";
import { TASK_KINDS, isTaskKind } from "../types/task.ts";
import type { TaskKind } from "../types/task.ts";
import { ConfigurationError } from "./errors.ts";
import { Task, renderTemplate, templatePlaceholders } from "./task.ts";
import { failValidation, isRecord, loadYamlFile } from "./yaml.ts";

// ── Typed Parameters per Task Kind ──────────────────────────────────────────
// The orchestrator builds and validates these before any template is rendered.

export type AnalyzeTargetUsersParams = {
  readonly userList: readonly string[];
  readonly analysisDepth: string;
  readonly language: string;
  /** Pre-fetched GitHub profiles, serialized for the prompt. */
  readonly profiles: string;
};

export type ContentStrategyParams = {
  readonly campaignName: string;
  readonly targetAudience: string;
  readonly topics: readonly string[];
  readonly contentTypes: readonly string[];
  readonly duration: string;
  readonly keywords: readonly string[];
  readonly language: string;
};

export type ContentCreationParams = {
  readonly campaignName: string;
  readonly targetAudience: string;
  readonly contentTypes: readonly string[];
  readonly keywords: readonly string[];
  readonly language: string;
};

export type CommunityAnalysisParams = {
  readonly repository: string;
  readonly interactionTypes: readonly string[];
  readonly targetCount: number;
  readonly language: string;
};

export type CommunityEngagementParams = {
  readonly repository: string;
  readonly interactionTypes: readonly string[];
  readonly targetCount: number;
  readonly engagementLevel: string;
  readonly language: string;
};

export type ComprehensiveCampaignParams = {
  readonly campaignName: string;
  readonly objectives: readonly string[];
  readonly targetAudience: string;
  readonly duration: string;
  readonly budgetLevel: string;
  readonly priorityChannels: readonly string[];
  readonly repository: string;
  readonly language: string;
};

export type TaskParamsByKind = {
  readonly analyze_target_users: AnalyzeTargetUsersParams;
  readonly content_strategy: ContentStrategyParams;
  readonly content_creation: ContentCreationParams;
  readonly community_analysis: CommunityAnalysisParams;
  readonly community_engagement: CommunityEngagementParams;
  readonly comprehensive_campaign: ComprehensiveCampaignParams;
};

/** Placeholders a template of each kind may use. */
export const TASK_PARAM_KEYS: { readonly [K in TaskKind]: readonly (keyof TaskParamsByKind[K])[] } = {
  analyze_target_users: ["userList", "analysisDepth", "language", "profiles"],
  content_strategy: [
    "campaignName",
    "targetAudience",
    "topics",
    "contentTypes",
    "duration",
    "keywords",
    "language",
  ],
  content_creation: ["campaignName", "targetAudience", "contentTypes", "keywords", "language"],
  community_analysis: ["repository", "interactionTypes", "targetCount", "language"],
  community_engagement: [
    "repository",
    "interactionTypes",
    "targetCount",
    "engagementLevel",
    "language",
  ],
  comprehensive_campaign: [
    "campaignName",
    "objectives",
    "targetAudience",
    "duration",
    "budgetLevel",
    "priorityChannels",
    "repository",
    "language",
  ],
};

// ── Templates ───────────────────────────────────────────────────────────────

export interface TaskTemplate {
  readonly kind: TaskKind;
  readonly description: string;
  readonly expectedOutput: string;
}

/**
 * Task templates loaded from `.agents/tasks.yaml`, one per task kind:
 *
 * ```yaml
 * tasks:
 *   content_strategy:
 *     description: Plan the "{campaignName}" campaign for {targetAudience} ...
 *     expected_output: A content calendar ...
 * ```
 */
export class TaskTemplateRegistry {
  private constructor(private readonly templates: ReadonlyMap<TaskKind, TaskTemplate>) {}

  static async fromYaml(yamlPath: string): Promise<TaskTemplateRegistry> {
    return TaskTemplateRegistry.fromData(await loadYamlFile(yamlPath, "Task templates"));
  }

  static fromData(data: unknown): TaskTemplateRegistry {
    const tasks = isRecord(data) ? data.tasks : undefined;
    if (!isRecord(tasks)) {
      throw new ConfigurationError("Invalid task templates: expected a 'tasks' map", [
        "Missing or invalid 'tasks' key (expected an object)",
      ]);
    }

    const errors: string[] = [];
    const templates = new Map<TaskKind, TaskTemplate>();

    for (const [kind, raw] of Object.entries(tasks)) {
      if (!isTaskKind(kind)) {
        errors.push(`Unknown task kind "${kind}" (expected one of: ${TASK_KINDS.join(", ")})`);
        continue;
      }
      if (!isRecord(raw)) {
        errors.push(`Task "${kind}": expected an object`);
        continue;
      }
      const { description, expected_output: expectedOutput } = raw;
      if (typeof description !== "string" || description.trim() === "") {
        errors.push(`Task "${kind}": 'description' must be a non-empty string`);
        continue;
      }
      if (typeof expectedOutput !== "string" || expectedOutput.trim() === "") {
        errors.push(`Task "${kind}": 'expected_output' must be a non-empty string`);
        continue;
      }

      const allowed: readonly string[] = TASK_PARAM_KEYS[kind];
      for (const name of templatePlaceholders(description)) {
        if (!allowed.includes(name)) {
          errors.push(
            `Task "${kind}": unknown placeholder {${name}} (allowed: ${allowed.join(", ")})`,
          );
        }
      }
      if (templatePlaceholders(expectedOutput).length > 0) {
        errors.push(`Task "${kind}": 'expected_output' must not contain placeholders`);
      }

      templates.set(kind, {
        kind,
        description: description.trim(),
        expectedOutput: expectedOutput.trim(),
      });
    }

    if (errors.length > 0) {
      failValidation("Task templates", errors);
    }
    return new TaskTemplateRegistry(templates);
  }

  get kinds(): TaskKind[] {
    return [...this.templates.keys()];
  }

  has(kind: TaskKind): boolean {
    return this.templates.has(kind);
  }

  get(kind: TaskKind): TaskTemplate {
    const template = this.templates.get(kind);
    if (!template) {
      throw new ConfigurationError(`No task template for "${kind}"`);
    }
    return template;
  }

  /** Render the template for `kind` and bind the result to `agent`. */
  createTask<K extends TaskKind>(kind: K, agent: Agent, params: TaskParamsByKind[K]): Task {
    const template = this.get(kind);
    return new Task({
      kind,
      agent,
      description: renderTemplate(template.description, params),
      expectedOutput: template.expectedOutput,
    });
  }
}
