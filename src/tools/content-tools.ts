import { ExecutionError } from "../agents/claude-client.ts";
import type { ClaudeClient, ToolInputSchema } from "../agents/claude-client.ts";
import { ExternalCallError } from "../integrations/external-call.ts";
import type { ExternalCallErrorKind } from "../integrations/external-call.ts";
import { readEnum, readOptionalString, readString } from "./types.ts";
import type { Tool } from "./types.ts";

// ── Shared LLM Settings ─────────────────────────────────────────────────────

export interface ContentToolOptions {
  readonly client: ClaudeClient;
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
}

const CONTENT_SYSTEM_PROMPT =
  "You are a technical marketing writer for developer audiences. " +
  "Respond with the requested content only, without preamble.";

/**
 * The LLM client has already applied its own retry schedule, so failures
 * reach the registry as non-retryable external call errors.
 */
function toExternalCallError(err: unknown): unknown {
  if (!(err instanceof ExecutionError)) return err;
  let kind: ExternalCallErrorKind;
  switch (err.code) {
    case "RATE_LIMITED":
      kind = "rate_limited";
      break;
    case "UNAUTHORIZED":
      kind = "unauthorized";
      break;
    case "RESPONSE_EMPTY":
    case "MALFORMED_OUTPUT":
      kind = "malformed_response";
      break;
    case "ABORTED":
      return err;
    default:
      kind = "transient_network";
  }
  return new ExternalCallError(err.message, kind, "llm", {
    retryable: false,
    cause: err,
  });
}

async function complete(
  options: ContentToolOptions,
  prompt: string,
  signal?: AbortSignal,
): Promise<string> {
  try {
    const result = await options.client.createMessage({
      model: options.model,
      system: CONTENT_SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
      maxTokens: options.maxTokens,
      timeoutMs: options.timeoutMs,
      signal,
    });
    if (result.content.trim().length === 0) {
      throw new ExternalCallError("LLM returned empty content", "malformed_response", "llm");
    }
    return result.content;
  } catch (err: unknown) {
    throw toExternalCallError(err);
  }
}

// ── content_generation ──────────────────────────────────────────────────────

export const CONTENT_TYPES = ["blog", "social", "email", "tutorial"] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const CONTENT_LENGTHS = ["short", "medium", "long"] as const;
export type ContentLength = (typeof CONTENT_LENGTHS)[number];

const TYPE_GUIDANCE: Record<ContentType, string> = {
  blog: "A structured technical blog post with an introduction, body and conclusion.",
  social: "A short, engaging social media post with relevant hashtags.",
  email: "A professional email with a subject line and body.",
  tutorial: "A step-by-step tutorial with code examples where useful.",
};

const LENGTH_GUIDANCE: Record<ContentLength, string> = {
  short: "200-500 words",
  medium: "500-1000 words",
  long: "1000-2000 words",
};

export function buildGenerationPrompt(input: {
  readonly contentType: ContentType;
  readonly topic: string;
  readonly targetAudience: string;
  readonly tone: string;
  readonly length: ContentLength;
  readonly language: string;
  readonly keywords: string;
}): string {
  return [
    `Write ${input.contentType} content about: ${input.topic}`,
    "",
    `Target audience: ${input.targetAudience}`,
    `Tone: ${input.tone}`,
    `Length: ${LENGTH_GUIDANCE[input.length]}`,
    `Language: ${input.language}`,
    `Keywords: ${input.keywords || "none"}`,
    "",
    TYPE_GUIDANCE[input.contentType],
    "Weave any keywords in naturally.",
  ].join("\n");
}

export class ContentGenerationTool implements Tool {
  readonly name = "content_generation";
  readonly description =
    "Generate marketing content (blog, social, email, tutorial) for a topic and audience";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      content_type: { type: "string", enum: [...CONTENT_TYPES] },
      topic: { type: "string" },
      target_audience: { type: "string" },
      tone: { type: "string" },
      length: { type: "string", enum: [...CONTENT_LENGTHS] },
      language: { type: "string" },
      keywords: { type: "string", description: "Comma-separated" },
    },
    required: ["content_type", "topic"],
  };

  constructor(private readonly options: ContentToolOptions) {}

  async invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const prompt = buildGenerationPrompt({
      contentType: readEnum(this.name, params, "content_type", CONTENT_TYPES),
      topic: readString(this.name, params, "topic"),
      targetAudience: readOptionalString(this.name, params, "target_audience", "developers"),
      tone: readOptionalString(this.name, params, "tone", "professional"),
      length: readEnum(this.name, params, "length", CONTENT_LENGTHS, "medium"),
      language: readOptionalString(this.name, params, "language", "English"),
      keywords: readOptionalString(this.name, params, "keywords", ""),
    });
    return complete(this.options, prompt, signal);
  }
}

// ── content_optimization ────────────────────────────────────────────────────

export const OPTIMIZATION_TYPES = ["seo", "readability", "engagement"] as const;
export type OptimizationType = (typeof OPTIMIZATION_TYPES)[number];

const OPTIMIZATION_GUIDANCE: Record<OptimizationType, string> = {
  seo: "Improve search ranking: keyword placement, title and meta description.",
  readability: "Improve readability: paragraph structure, clear headings and lists.",
  engagement: "Increase engagement: interactive elements and a stronger hook.",
};

export class ContentOptimizationTool implements Tool {
  readonly name = "content_optimization";
  readonly description =
    "Optimize existing content for SEO, readability or engagement and explain the changes";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      content: { type: "string" },
      optimization_type: { type: "string", enum: [...OPTIMIZATION_TYPES] },
      target_audience: { type: "string" },
      keywords: { type: "string" },
    },
    required: ["content"],
  };

  constructor(private readonly options: ContentToolOptions) {}

  async invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const content = readString(this.name, params, "content");
    const optimizationType = readEnum(
      this.name,
      params,
      "optimization_type",
      OPTIMIZATION_TYPES,
      "seo",
    );
    const audience = readOptionalString(this.name, params, "target_audience", "developers");
    const keywords = readOptionalString(this.name, params, "keywords", "");

    const prompt = [
      `Optimize the following content (${optimizationType}).`,
      `Goal: ${OPTIMIZATION_GUIDANCE[optimizationType]}`,
      `Target audience: ${audience}`,
      `Keywords: ${keywords || "none"}`,
      "Keep the core message. Return the optimized content followed by a short list of the changes made.",
      "",
      "---",
      content,
    ].join("\n");
    return complete(this.options, prompt, signal);
  }
}

// ── content_analysis ────────────────────────────────────────────────────────
// Local text metrics plus an LLM quality report.

export interface ContentMetrics {
  readonly wordCount: number;
  readonly sentenceCount: number;
  readonly headingCount: number;
  readonly averageSentenceLength: number;
  readonly readingTimeMinutes: number;
  /** Keyword → occurrences per 100 words. */
  readonly keywordDensity: Readonly<Record<string, number>>;
}

const WORDS_PER_MINUTE = 200;

function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function computeContentMetrics(
  content: string,
  keywords: readonly string[],
): ContentMetrics {
  const words = content.split(/\s+/).filter((w) => w.length > 0);
  const sentences = content
    .split(/[.!?]+(?:\s|$)/)
    .filter((s) => s.trim().length > 0);
  const headingCount = content
    .split("\n")
    .filter((line) => /^#{1,6}\s/.test(line)).length;

  const lower = content.toLowerCase();
  const keywordDensity = Object.fromEntries(
    keywords.map((keyword): [string, number] => {
      const count = countOccurrences(lower, keyword.toLowerCase());
      return [
        keyword,
        words.length === 0 ? 0 : Math.round((count / words.length) * 10000) / 100,
      ];
    }),
  );

  return {
    wordCount: words.length,
    sentenceCount: sentences.length,
    headingCount,
    averageSentenceLength:
      sentences.length === 0
        ? 0
        : Math.round((words.length / sentences.length) * 10) / 10,
    readingTimeMinutes: Math.max(1, Math.ceil(words.length / WORDS_PER_MINUTE)),
    keywordDensity,
  };
}

export function splitKeywords(raw: string): string[] {
  return raw
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

export class ContentAnalysisTool implements Tool {
  readonly name = "content_analysis";
  readonly description =
    "Score content quality, SEO and expected engagement; returns metrics and a review as JSON";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      content: { type: "string" },
      keywords: { type: "string", description: "Comma-separated" },
      analysis_type: { type: "string", description: "e.g. comprehensive, seo, engagement" },
    },
    required: ["content"],
  };

  constructor(private readonly options: ContentToolOptions) {}

  async invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const content = readString(this.name, params, "content");
    const keywords = splitKeywords(readOptionalString(this.name, params, "keywords", ""));
    const analysisType = readOptionalString(this.name, params, "analysis_type", "comprehensive");

    const metrics = computeContentMetrics(content, keywords);
    const prompt = [
      `Give a ${analysisType} review of the content below.`,
      "Score 1-10 for: quality (accuracy, structure, language), SEO, and engagement potential.",
      "Then list concrete improvements.",
      "",
      `Measured: ${metrics.wordCount} words, ${metrics.headingCount} headings, ` +
        `${metrics.averageSentenceLength} words per sentence.`,
      "",
      "---",
      content,
    ].join("\n");

    const review = await complete(this.options, prompt, signal);
    return JSON.stringify({ metrics, review });
  }
}
