import { CONTENT_LENGTHS, CONTENT_TYPES } from "../tools/content-tools.ts";
import type { ContentLength, ContentType } from "../tools/content-tools.ts";
import { ANALYSIS_DEPTHS, INTERACTION_TYPES } from "../tools/github-tools.ts";
import type { AnalysisDepth, InteractionType } from "../tools/github-tools.ts";
import { ValidationError } from "./errors.ts";

// ── Enumerations & Defaults ─────────────────────────────────────────────────

export const ENGAGEMENT_LEVELS = ["light", "moderate", "intensive"] as const;
export type EngagementLevel = (typeof ENGAGEMENT_LEVELS)[number];

export const BUDGET_LEVELS = ["low", "medium", "high"] as const;
export type BudgetLevel = (typeof BUDGET_LEVELS)[number];

export const MAX_USERS_PER_ANALYSIS = 50;
export const MAX_TARGET_COUNT = 50;
const MAX_TEXT_LENGTH = 500;
const MAX_LIST_LENGTH = 20;

export const INPUT_DEFAULTS = {
  analysisDepth: "standard",
  language: "English",
  contentTypes: ["blog", "social"],
  duration: "1 month",
  interactionTypes: ["comment", "issue"],
  targetCount: 10,
  engagementLevel: "moderate",
  budgetLevel: "medium",
  priorityChannels: ["github", "social"],
  tone: "professional",
  contentLength: "medium",
} as const;

// GitHub logins: 1-39 alphanumerics or single inner hyphens
const GITHUB_LOGIN_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38}$/;

// ── Raw Inputs (optional fields defaulted) ──────────────────────────────────

export interface AnalyzeUsersInput {
  readonly userList: readonly string[];
  readonly analysisDepth?: string;
  readonly language?: string;
}

export interface ContentCampaignInput {
  readonly name: string;
  readonly targetAudience: string;
  readonly topics: readonly string[];
  readonly contentTypes?: readonly string[];
  readonly duration?: string;
  readonly keywords?: readonly string[];
  readonly language?: string;
}

export interface CommunityEngagementInput {
  readonly interactionTypes?: readonly string[];
  readonly targetCount?: number;
  readonly engagementLevel?: string;
  readonly language?: string;
}

export interface ComprehensiveCampaignInput {
  readonly name: string;
  readonly objectives: readonly string[];
  readonly targetAudience: string;
  readonly duration?: string;
  readonly budgetLevel?: string;
  readonly priorityChannels?: readonly string[];
  readonly language?: string;
}

export interface GenerateContentInput {
  readonly contentType: string;
  readonly topic: string;
  readonly targetAudience: string;
  readonly tone?: string;
  readonly length?: string;
  readonly keywords?: readonly string[];
  readonly language?: string;
}

// ── Validated Requests ──────────────────────────────────────────────────────

export interface AnalyzeUsersRequest {
  readonly userList: readonly string[];
  readonly analysisDepth: AnalysisDepth;
  readonly language: string;
}

export interface ContentCampaignRequest {
  readonly name: string;
  readonly targetAudience: string;
  readonly topics: readonly string[];
  readonly contentTypes: readonly ContentType[];
  readonly duration: string;
  readonly keywords: readonly string[];
  readonly language: string;
}

export interface CommunityEngagementRequest {
  readonly interactionTypes: readonly InteractionType[];
  readonly targetCount: number;
  readonly engagementLevel: EngagementLevel;
  readonly language: string;
}

export interface ComprehensiveCampaignRequest {
  readonly name: string;
  readonly objectives: readonly string[];
  readonly targetAudience: string;
  readonly duration: string;
  readonly budgetLevel: BudgetLevel;
  readonly priorityChannels: readonly string[];
  readonly language: string;
}

export interface GenerateContentRequest {
  readonly contentType: ContentType;
  readonly topic: string;
  readonly targetAudience: string;
  readonly tone: string;
  readonly length: ContentLength;
  readonly keywords: readonly string[];
  readonly language: string;
}

// ── Field Checks ────────────────────────────────────────────────────────────
// Field names in errors are the snake_case request keys callers send.

function text(value: string | undefined, field: string, fallback?: string): string {
  const trimmed = (value ?? "").trim();
  if (trimmed === "") {
    if (fallback !== undefined) return fallback;
    throw new ValidationError(`'${field}' must be a non-empty string`, field);
  }
  if (trimmed.length > MAX_TEXT_LENGTH) {
    throw new ValidationError(
      `'${field}' must be at most ${MAX_TEXT_LENGTH} characters`,
      field,
    );
  }
  return trimmed;
}

function textList(
  values: readonly string[] | undefined,
  field: string,
  options: { readonly required: boolean; readonly max?: number },
): string[] {
  const max = options.max ?? MAX_LIST_LENGTH;
  const items = (values ?? []).map((v) => v.trim()).filter((v) => v !== "");
  if (options.required && items.length === 0) {
    throw new ValidationError(`'${field}' must contain at least one entry`, field);
  }
  if (items.length > max) {
    throw new ValidationError(`'${field}' accepts at most ${max} entries`, field);
  }
  for (const item of items) {
    text(item, field);
  }
  return items;
}

function oneOf<T extends string>(
  value: string | undefined,
  field: string,
  allowed: readonly T[],
  fallback: T,
): T {
  if (value === undefined || value.trim() === "") return fallback;
  const match = allowed.find((a) => a === value.trim());
  if (match === undefined) {
    throw new ValidationError(`'${field}' must be one of: ${allowed.join(", ")}`, field);
  }
  return match;
}

function subsetOf<T extends string>(
  values: readonly string[] | undefined,
  field: string,
  allowed: readonly T[],
  fallback: readonly T[],
): T[] {
  if (values === undefined || values.length === 0) return [...fallback];
  const result: T[] = [];
  for (const value of values) {
    const match = allowed.find((a) => a === value.trim());
    if (match === undefined) {
      throw new ValidationError(`'${field}' must only contain: ${allowed.join(", ")}`, field);
    }
    if (!result.includes(match)) result.push(match);
  }
  return result;
}

// ── Validators ──────────────────────────────────────────────────────────────

export function validateAnalyzeUsers(input: AnalyzeUsersInput): AnalyzeUsersRequest {
  const field = "user_list";
  if (input.userList.length === 0) {
    throw new ValidationError(`'${field}' must contain at least one username`, field);
  }
  if (input.userList.length > MAX_USERS_PER_ANALYSIS) {
    throw new ValidationError(
      `'${field}' accepts at most ${MAX_USERS_PER_ANALYSIS} usernames`,
      field,
    );
  }

  const seen = new Set<string>();
  const userList: string[] = [];
  for (const raw of input.userList) {
    const username = raw.trim();
    if (!GITHUB_LOGIN_PATTERN.test(username)) {
      throw new ValidationError(`'${field}': "${raw}" is not a valid GitHub username`, field);
    }
    // Logins are case-insensitive
    const key = username.toLowerCase();
    if (seen.has(key)) {
      throw new ValidationError(`'${field}': "${username}" is listed more than once`, field);
    }
    seen.add(key);
    userList.push(username);
  }

  return {
    userList,
    analysisDepth: oneOf(
      input.analysisDepth,
      "analysis_depth",
      ANALYSIS_DEPTHS,
      INPUT_DEFAULTS.analysisDepth,
    ),
    language: text(input.language, "language", INPUT_DEFAULTS.language),
  };
}

export function validateContentCampaign(input: ContentCampaignInput): ContentCampaignRequest {
  return {
    name: text(input.name, "campaign_name"),
    targetAudience: text(input.targetAudience, "target_audience"),
    topics: textList(input.topics, "topics", { required: true }),
    contentTypes: subsetOf(
      input.contentTypes,
      "content_types",
      CONTENT_TYPES,
      INPUT_DEFAULTS.contentTypes,
    ),
    duration: text(input.duration, "duration", INPUT_DEFAULTS.duration),
    keywords: textList(input.keywords, "keywords", { required: false }),
    language: text(input.language, "language", INPUT_DEFAULTS.language),
  };
}

export function validateCommunityEngagement(
  input: CommunityEngagementInput,
): CommunityEngagementRequest {
  const targetCount = input.targetCount ?? INPUT_DEFAULTS.targetCount;
  if (!Number.isInteger(targetCount) || targetCount < 1 || targetCount > MAX_TARGET_COUNT) {
    throw new ValidationError(
      `'target_count' must be an integer between 1 and ${MAX_TARGET_COUNT}`,
      "target_count",
    );
  }
  return {
    interactionTypes: subsetOf(
      input.interactionTypes,
      "interaction_types",
      INTERACTION_TYPES,
      INPUT_DEFAULTS.interactionTypes,
    ),
    targetCount,
    engagementLevel: oneOf(
      input.engagementLevel,
      "engagement_level",
      ENGAGEMENT_LEVELS,
      INPUT_DEFAULTS.engagementLevel,
    ),
    language: text(input.language, "language", INPUT_DEFAULTS.language),
  };
}

export function validateComprehensiveCampaign(
  input: ComprehensiveCampaignInput,
): ComprehensiveCampaignRequest {
  const priorityChannels = textList(input.priorityChannels, "priority_channels", {
    required: false,
  });
  return {
    name: text(input.name, "campaign_name"),
    objectives: textList(input.objectives, "objectives", { required: true }),
    targetAudience: text(input.targetAudience, "target_audience"),
    duration: text(input.duration, "duration", INPUT_DEFAULTS.duration),
    budgetLevel: oneOf(input.budgetLevel, "budget_level", BUDGET_LEVELS, INPUT_DEFAULTS.budgetLevel),
    priorityChannels:
      priorityChannels.length > 0 ? priorityChannels : [...INPUT_DEFAULTS.priorityChannels],
    language: text(input.language, "language", INPUT_DEFAULTS.language),
  };
}

export function validateGenerateContent(input: GenerateContentInput): GenerateContentRequest {
  const contentType = CONTENT_TYPES.find((t) => t === input.contentType.trim());
  if (contentType === undefined) {
    throw new ValidationError(
      `'content_type' must be one of: ${CONTENT_TYPES.join(", ")}`,
      "content_type",
    );
  }
  return {
    contentType,
    topic: text(input.topic, "topic"),
    targetAudience: text(input.targetAudience, "target_audience"),
    tone: text(input.tone, "tone", INPUT_DEFAULTS.tone),
    length: oneOf(input.length, "length", CONTENT_LENGTHS, INPUT_DEFAULTS.contentLength),
    keywords: textList(input.keywords, "keywords", { required: false }),
    language: text(input.language, "language", INPUT_DEFAULTS.language),
  };
}
