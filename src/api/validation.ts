import { ValidationError } from "../crew/errors.ts";
import type {
  AnalyzeUsersInput,
  CommunityEngagementInput,
  ComprehensiveCampaignInput,
  ContentCampaignInput,
  GenerateContentInput,
} from "../crew/inputs.ts";
import { isRecord } from "../crew/yaml.ts";

// ── Body Readers ────────────────────────────────────────────────────────────
// Request bodies use snake_case keys. These check JSON types only; value
// rules (enums, limits, login format) live with the operations.

function requireObject(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError("Request body must be a JSON object", "body");
  }
  return body;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`'${key}' must be a string`, key);
  }
  return value;
}

function requiredString(body: Record<string, unknown>, key: string): string {
  const value = optionalString(body, key);
  if (value === undefined) {
    throw new ValidationError(`'${key}' is required`, key);
  }
  return value;
}

function optionalStringList(
  body: Record<string, unknown>,
  key: string,
): string[] | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationError(`'${key}' must be an array of strings`, key);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      throw new ValidationError(`'${key}' must be an array of strings`, key);
    }
    items.push(item);
  }
  return items;
}

function requiredStringList(body: Record<string, unknown>, key: string): string[] {
  const value = optionalStringList(body, key);
  if (value === undefined) {
    throw new ValidationError(`'${key}' is required`, key);
  }
  return value;
}

function optionalInteger(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError(`'${key}' must be an integer`, key);
  }
  return value;
}

// ── Request Parsers ─────────────────────────────────────────────────────────

export function parseAnalyzeUsersBody(raw: unknown): AnalyzeUsersInput {
  const body = requireObject(raw);
  return {
    userList: requiredStringList(body, "user_list"),
    analysisDepth: optionalString(body, "analysis_depth"),
    language: optionalString(body, "language"),
  };
}

export function parseContentCampaignBody(raw: unknown): ContentCampaignInput {
  const body = requireObject(raw);
  return {
    name: requiredString(body, "campaign_name"),
    targetAudience: requiredString(body, "target_audience"),
    topics: requiredStringList(body, "topics"),
    contentTypes: optionalStringList(body, "content_types"),
    duration: optionalString(body, "duration"),
    keywords: optionalStringList(body, "keywords"),
    language: optionalString(body, "language"),
  };
}

export function parseCommunityEngagementBody(raw: unknown): CommunityEngagementInput {
  // An empty body runs with every default
  const body = raw === undefined || raw === null ? {} : requireObject(raw);
  return {
    interactionTypes: optionalStringList(body, "interaction_types"),
    targetCount: optionalInteger(body, "target_count"),
    engagementLevel: optionalString(body, "engagement_level"),
    language: optionalString(body, "language"),
  };
}

export function parseComprehensiveCampaignBody(raw: unknown): ComprehensiveCampaignInput {
  const body = requireObject(raw);
  return {
    name: requiredString(body, "campaign_name"),
    objectives: requiredStringList(body, "objectives"),
    targetAudience: requiredString(body, "target_audience"),
    duration: optionalString(body, "duration"),
    budgetLevel: optionalString(body, "budget_level"),
    priorityChannels: optionalStringList(body, "priority_channels"),
    language: optionalString(body, "language"),
  };
}

export function parseGenerateContentBody(raw: unknown): GenerateContentInput {
  const body = requireObject(raw);
  return {
    contentType: requiredString(body, "content_type"),
    topic: requiredString(body, "topic"),
    targetAudience: requiredString(body, "target_audience"),
    tone: optionalString(body, "tone"),
    length: optionalString(body, "length"),
    keywords: optionalStringList(body, "keywords"),
    language: optionalString(body, "language"),
  };
}
