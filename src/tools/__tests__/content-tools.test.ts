import { describe, expect, it } from "vitest";
import { ExecutionError } from "../../agents/claude-client.ts";
import { ExternalCallError } from "../../integrations/external-call.ts";
import {
  ScriptedClaudeClient,
  firstUserText,
  rejected,
  textResult,
} from "../../__tests__/helpers.ts";
import {
  ContentAnalysisTool,
  ContentGenerationTool,
  ContentOptimizationTool,
  buildGenerationPrompt,
  computeContentMetrics,
  splitKeywords,
} from "../content-tools.ts";
import type { ContentToolOptions } from "../content-tools.ts";
import { ToolInputError } from "../types.ts";

const SAMPLE = "# Title\nTypeScript is great. TypeScript scales!\nUse it";

function options(client: ScriptedClaudeClient): ContentToolOptions {
  return { client, model: "test-model", maxTokens: 512, timeoutMs: 1000 };
}

function failingClient(err: Error): ScriptedClaudeClient {
  return new ScriptedClaudeClient(() => {
    throw err;
  });
}

// ── Local Metrics ────────────────────────────────────────────────────────────

describe("computeContentMetrics", () => {
  it("counts words, sentences, headings and keyword density", () => {
    expect(computeContentMetrics(SAMPLE, ["typescript", "rust"])).toEqual({
      wordCount: 9,
      sentenceCount: 3,
      headingCount: 1,
      averageSentenceLength: 3,
      readingTimeMinutes: 1,
      keywordDensity: { typescript: 22.22, rust: 0 },
    });
  });

  it("handles blank content", () => {
    expect(computeContentMetrics("   ", ["x"])).toEqual({
      wordCount: 0,
      sentenceCount: 0,
      headingCount: 0,
      averageSentenceLength: 0,
      readingTimeMinutes: 1,
      keywordDensity: { x: 0 },
    });
  });

  it("keeps keywords that collide with object property names", () => {
    const { keywordDensity } = computeContentMetrics("constructor __proto__ and more", [
      "__proto__",
      "constructor",
    ]);

    expect(Object.keys(keywordDensity)).toEqual(["__proto__", "constructor"]);
    expect(Object.getOwnPropertyDescriptor(keywordDensity, "__proto__")?.value).toBe(25);
    expect(keywordDensity["constructor"]).toBe(25);
  });

  it("scores an empty keyword as absent", () => {
    expect(computeContentMetrics("some words here", [""]).keywordDensity).toEqual({ "": 0 });
  });

  it("rounds reading time up at 200 words per minute", () => {
    const content = Array.from({ length: 401 }, () => "word").join(" ");
    expect(computeContentMetrics(content, []).readingTimeMinutes).toBe(3);
  });
});

describe("splitKeywords", () => {
  it("trims entries and drops empty ones", () => {
    expect(splitKeywords(" ai, ,open source ,")).toEqual(["ai", "open source"]);
  });
});

// ── content_generation ───────────────────────────────────────────────────────

describe("ContentGenerationTool", () => {
  it("builds the prompt from the content type and length guidance", () => {
    expect(
      buildGenerationPrompt({
        contentType: "social",
        topic: "Typed APIs",
        targetAudience: "backend devs",
        tone: "casual",
        length: "short",
        language: "English",
        keywords: "",
      }),
    ).toBe(
      [
        "Write social content about: Typed APIs",
        "",
        "Target audience: backend devs",
        "Tone: casual",
        "Length: 200-500 words",
        "Language: English",
        "Keywords: none",
        "",
        "A short, engaging social media post with relevant hashtags.",
        "Weave any keywords in naturally.",
      ].join("\n"),
    );
  });

  it("fills defaults and returns the model's text", async () => {
    const client = new ScriptedClaudeClient(() => textResult("A post about edge caching"));
    const tool = new ContentGenerationTool(options(client));

    const content = await tool.invoke({ content_type: "blog", topic: "Edge caching" });

    expect(content).toBe("A post about edge caching");
    expect(client.calls).toHaveLength(1);
    const call = client.calls[0];
    expect(call && firstUserText(call)).toBe(
      buildGenerationPrompt({
        contentType: "blog",
        topic: "Edge caching",
        targetAudience: "developers",
        tone: "professional",
        length: "medium",
        language: "English",
        keywords: "",
      }),
    );
    expect(call?.toolNames).toEqual([]);
  });

  it("rejects an unknown content type before calling the model", async () => {
    const client = new ScriptedClaudeClient();
    const tool = new ContentGenerationTool(options(client));
    const err = await rejected(tool.invoke({ content_type: "podcast", topic: "x" }), ToolInputError);
    expect(err.message).toBe(
      "content_generation: 'content_type' must be one of: blog, social, email, tutorial",
    );
    expect(client.calls).toHaveLength(0);
  });

  it("reports LLM failures as non-retryable external call errors", async () => {
    const tool = new ContentGenerationTool(
      options(failingClient(new ExecutionError("429 too many", "RATE_LIMITED", "", true))),
    );
    const err = await rejected(tool.invoke({ content_type: "blog", topic: "x" }), ExternalCallError);
    expect(err.kind).toBe("rate_limited");
    expect(err.service).toBe("llm");
    expect(err.retryable).toBe(false);
    expect(err.cause).toBeInstanceOf(ExecutionError);
  });

  it("lets an aborted request through unchanged", async () => {
    const aborted = new ExecutionError("Request aborted", "ABORTED", "", false);
    const tool = new ContentGenerationTool(options(failingClient(aborted)));
    await expect(tool.invoke({ content_type: "blog", topic: "x" })).rejects.toBe(aborted);
  });

  it("treats a blank completion as a malformed response", async () => {
    const tool = new ContentGenerationTool(
      options(new ScriptedClaudeClient(() => textResult("   "))),
    );
    const err = await rejected(tool.invoke({ content_type: "blog", topic: "x" }), ExternalCallError);
    expect(err.kind).toBe("malformed_response");
    expect(err.message).toBe("LLM returned empty content");
  });
});

// ── content_optimization ─────────────────────────────────────────────────────

describe("ContentOptimizationTool", () => {
  it("asks for the requested optimization and keeps the content last", async () => {
    const client = new ScriptedClaudeClient(() => textResult("Improved"));
    const tool = new ContentOptimizationTool(options(client));

    expect(await tool.invoke({ content: "Hello world", optimization_type: "readability" })).toBe(
      "Improved",
    );
    const call = client.calls[0];
    const lines = (call ? firstUserText(call) : "").split("\n");
    expect(lines[0]).toBe("Optimize the following content (readability).");
    expect(lines[lines.length - 1]).toBe("Hello world");
  });

  it("requires content", async () => {
    const tool = new ContentOptimizationTool(options(new ScriptedClaudeClient()));
    await expect(tool.invoke({ optimization_type: "seo" })).rejects.toThrow(
      "content_optimization: 'content' must be a non-empty string",
    );
  });
});

// ── content_analysis ─────────────────────────────────────────────────────────

describe("ContentAnalysisTool", () => {
  it("returns local metrics together with the model's review", async () => {
    const client = new ScriptedClaudeClient(() => textResult("Quality 8/10"));
    const tool = new ContentAnalysisTool(options(client));

    const result = JSON.parse(await tool.invoke({ content: SAMPLE, keywords: "TypeScript" }));

    expect(result.review).toBe("Quality 8/10");
    expect(result.metrics.wordCount).toBe(9);
    expect(result.metrics.keywordDensity).toEqual({ TypeScript: 22.22 });
    const call = client.calls[0];
    expect((call ? firstUserText(call) : "").split("\n")).toContain(
      "Measured: 9 words, 1 headings, 3 words per sentence.",
    );
  });
});
