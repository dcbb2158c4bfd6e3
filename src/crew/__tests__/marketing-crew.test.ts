import { afterEach, describe, expect, it, vi } from "vitest";
import { ExternalCallError } from "../../integrations/external-call.ts";
import { ToolExecutionError } from "../../tools/types.ts";
import {
  FakeGitHubApi,
  ScriptedClaudeClient,
  createTestApp,
  firstUserText,
  rejected,
  testUser,
  textResult,
  toolUseResult,
} from "../../__tests__/helpers.ts";
import { DELEGATE_TOOL_NAME } from "../agent-runner.ts";
import { TimeoutError, ValidationError } from "../errors.ts";
import type { Task } from "../task.ts";
import { TaskTemplateRegistry } from "../task-templates.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

/** Replies by agent role, read from the system prompt. */
function byRole(replies: Record<string, string>): ScriptedClaudeClient {
  return new ScriptedClaudeClient((call) => {
    const match = Object.entries(replies).find(([role]) =>
      call.system.startsWith(`You are the ${role}`),
    );
    return textResult(match ? match[1] : "ok");
  });
}

// ── Analyze Users ────────────────────────────────────────────────────────────

describe("MarketingCrew.analyzeUsers", () => {
  it("prefetches profiles, keeps unknown users and runs the analyst", async () => {
    const github = new FakeGitHubApi();
    github.addUser(testUser("octo", { name: "Octo Cat", followers: 50 }));
    const { app, client } = await createTestApp({
      github,
      client: byRole({ "data analyst": "User report" }),
    });

    const result = await app.crew.analyzeUsers({ userList: ["octo", "ghost"] });

    expect(result.analysis).toBe("User report");
    expect(result.analyzedUsers).toEqual(["octo", "ghost"]);
    expect(result.analysisDepth).toBe("standard");
    expect(result.profiles.ghost).toEqual({ found: false, username: "ghost" });
    expect(result.profiles.octo).toMatchObject({
      found: true,
      username: "octo",
      name: "Octo Cat",
      followers: 50,
      depth: "standard",
    });
    expect(result.tasks).toHaveLength(1);
    expect(result.tasks[0]).toMatchObject({
      kind: "analyze_target_users",
      agentRole: "data_analyst",
      status: "completed",
    });

    const prompt = client.calls[0] ? firstUserText(client.calls[0]) : "";
    expect(prompt.split("\n").slice(0, 2)).toEqual([
      "Analyze the following GitHub users as potential target users:",
      "octo, ghost.",
    ]);
    expect(prompt).toContain('"username": "ghost"');
    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "analyze_users",
      status: "completed",
      taskCount: 1,
    });
  });

  it("records a rejected request without running anything", async () => {
    const { app, client, github } = await createTestApp();

    const err = await rejected(app.crew.analyzeUsers({ userList: [] }), ValidationError);

    expect(err.field).toBe("user_list");
    expect(client.calls).toHaveLength(0);
    expect(github.calls).toEqual([]);
    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "analyze_users",
      status: "rejected",
      taskCount: 0,
    });
  });

  it("fails when a profile fetch fails for another reason", async () => {
    const github = new FakeGitHubApi();
    github.addUser(testUser("octo"));
    github.failNext.set(
      "getUser",
      new ExternalCallError("bad credentials", "unauthorized", "github", { status: 401 }),
    );
    const { app, client } = await createTestApp({ github });

    const err = await rejected(app.crew.analyzeUsers({ userList: ["octo"] }), ToolExecutionError);

    expect(err.message).toBe('Tool "github_analysis" failed after 1 attempt(s): bad credentials');
    expect(client.calls).toHaveLength(0);
    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "analyze_users",
      status: "failed",
      taskCount: 0,
    });
  });
});

// ── Content Campaign ─────────────────────────────────────────────────────────

describe("MarketingCrew.createContentCampaign", () => {
  it("runs strategy then creation and returns both outputs", async () => {
    const { app, client } = await createTestApp({
      client: byRole({ "marketing strategist": "Strategy doc", "content creator": "Drafts" }),
    });

    const result = await app.crew.createContentCampaign({
      name: "Launch",
      targetAudience: "platform engineers",
      topics: ["types"],
    });

    expect(result.campaignName).toBe("Launch");
    expect(result.strategy).toBe("Strategy doc");
    expect(result.content).toBe("Drafts");
    expect(result.tasks.map((t) => t.agentRole)).toEqual(["marketing_strategist", "content_creator"]);

    const creationPrompt = client.calls[1] ? firstUserText(client.calls[1]) : "";
    expect(creationPrompt).toContain("### Result 1\nStrategy doc");
    expect(creationPrompt).toContain("Content types: blog, social");
  });
});

// ── Community Engagement ─────────────────────────────────────────────────────

describe("MarketingCrew.executeCommunityEngagement", () => {
  it("analyzes the configured repository then plans engagement", async () => {
    const { app, client } = await createTestApp({
      client: byRole({ "data analyst": "Opportunities", "community manager": "Engagement log" }),
    });

    const result = await app.crew.executeCommunityEngagement({ targetCount: 3 });

    expect(result).toMatchObject({
      repository: "acme/widgets",
      analysis: "Opportunities",
      engagementPlan: "Engagement log",
    });
    const first = client.calls[0] ? firstUserText(client.calls[0]) : "";
    expect(first.split("\n")[0]).toBe("Analyze the community around acme/widgets.");
    expect(first).toContain("Number of interactions to plan: 3");
  });
});

// ── Comprehensive Campaign ───────────────────────────────────────────────────

describe("MarketingCrew.runComprehensiveCampaign", () => {
  const input = {
    name: "Q4 push",
    objectives: ["grow stars"],
    targetAudience: "maintainers",
  };

  it("lets the manager delegate and reports the delegations", async () => {
    const client = new ScriptedClaudeClient((call) => {
      if (call.system.startsWith("You are the data analyst")) {
        return textResult("Audience findings");
      }
      return call.messages.length === 1
        ? toolUseResult([
            {
              id: "d1",
              name: DELEGATE_TOOL_NAME,
              input: { coworker: "data_analyst", task: "Research the audience" },
            },
          ])
        : textResult("Campaign report");
    });
    const { app } = await createTestApp({ client });

    const result = await app.crew.runComprehensiveCampaign(input);

    expect(result.campaignName).toBe("Q4 push");
    expect(result.report).toBe("Campaign report");
    expect(result.delegations).toEqual([
      {
        from: "marketing_strategist",
        to: "data_analyst",
        accepted: true,
        durationMs: expect.any(Number),
      },
    ]);
    expect(client.calls[0]?.toolNames).toEqual([
      "github_analysis",
      "github_interaction",
      "content_generation",
      "content_optimization",
      "content_analysis",
      DELEGATE_TOOL_NAME,
    ]);
  });

  it("times out within the bound, fails its task and records the run", async () => {
    const createTask = vi.spyOn(TaskTemplateRegistry.prototype, "createTask");
    const { app } = await createTestApp({
      client: new ScriptedClaudeClient(() => new Promise<never>(() => {})),
      env: { CREW_TIMEOUT_MS: "30" },
    });

    const startTime = Date.now();
    const err = await rejected(app.crew.runComprehensiveCampaign(input), TimeoutError);
    const elapsedMs = Date.now() - startTime;

    expect(err.timeoutMs).toBe(30);
    expect(elapsedMs).toBeGreaterThanOrEqual(29);
    expect(elapsedMs).toBeLessThan(500);

    const tasks: Task[] = [];
    for (const result of createTask.mock.results) {
      if (result.type === "return") tasks.push(result.value);
    }
    expect(tasks.map((t) => [t.kind, t.status])).toEqual([["comprehensive_campaign", "failed"]]);
    expect(tasks[0]?.toResult().error).toBe("Crew invocation exceeded 30ms");
    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "comprehensive_campaign",
      status: "timed_out",
      taskCount: 1,
    });
  });
});

// ── Direct Content Generation ────────────────────────────────────────────────

describe("MarketingCrew.generateContent", () => {
  it("calls content_generation directly and describes the result", async () => {
    const client = new ScriptedClaudeClient(() => textResult("Generated post"));
    const { app } = await createTestApp({ client });

    const result = await app.crew.generateContent({
      contentType: "blog",
      topic: "Typed configs",
      targetAudience: "backend developers",
      keywords: ["yaml", "schemas"],
    });

    expect(result).toMatchObject({
      status: "completed",
      content: "Generated post",
      metadata: {
        contentType: "blog",
        topic: "Typed configs",
        targetAudience: "backend developers",
        language: "English",
        generatedAt: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      },
    });
    expect(result.contentId).toMatch(/^content-\d{8}-[0-9a-f]{6}$/);
    expect(client.calls).toHaveLength(1);
    const prompt = client.calls[0] ? firstUserText(client.calls[0]) : "";
    expect(prompt.split("\n").slice(0, 7)).toEqual([
      "Write blog content about: Typed configs",
      "",
      "Target audience: backend developers",
      "Tone: professional",
      "Length: 500-1000 words",
      "Language: English",
      "Keywords: yaml, schemas",
    ]);
    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "generate_content",
      status: "completed",
      taskCount: 0,
    });
  });

  it("rejects an unknown content type without calling the model", async () => {
    const { app, client } = await createTestApp();

    const err = await rejected(
      app.crew.generateContent({ contentType: "poem", topic: "Types", targetAudience: "devs" }),
      ValidationError,
    );

    expect(err.field).toBe("content_type");
    expect(err.message).toBe("'content_type' must be one of: blog, social, email, tutorial");
    expect(client.calls).toHaveLength(0);
    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "generate_content",
      status: "rejected",
    });
  });

  it("times out like the crew operations", async () => {
    const { app } = await createTestApp({
      client: new ScriptedClaudeClient(() => new Promise<never>(() => {})),
      env: { CREW_TIMEOUT_MS: "30" },
    });

    await rejected(
      app.crew.generateContent({ contentType: "social", topic: "Types", targetAudience: "devs" }),
      TimeoutError,
    );

    expect(app.metrics.getStats().recentWorkflowRuns[0]).toMatchObject({
      operation: "generate_content",
      status: "timed_out",
      taskCount: 0,
    });
  });
});

// ── Status ───────────────────────────────────────────────────────────────────

describe("MarketingCrew status", () => {
  it("describes the team, its workflows and metrics", async () => {
    const { app } = await createTestApp();

    const status = app.crew.getTeamStatus();

    expect(status.agents.map((a) => a.role)).toEqual([
      "data_analyst",
      "content_creator",
      "community_manager",
      "marketing_strategist",
    ]);
    expect(status.agents.filter((a) => a.isManager).map((a) => a.role)).toEqual([
      "marketing_strategist",
    ]);
    expect(status.manager).toBe("marketing_strategist");
    expect(status.processMode).toBe("sequential");
    expect(status.workflows.comprehensive_campaign).toEqual({
      processMode: "hierarchical",
      agents: ["marketing_strategist"],
    });
    expect(status.workflows.community_engagement.agents).toEqual([
      "data_analyst",
      "community_manager",
    ]);
    expect(status.metrics.totalWorkflowRuns).toBe(0);
  });

  it("lists registered tools with descriptions", async () => {
    const { app } = await createTestApp();

    const status = app.crew.getToolsStatus();

    expect(status.total).toBe(5);
    expect(status.tools.map((t) => t.name)).toEqual([
      "github_analysis",
      "github_interaction",
      "content_generation",
      "content_optimization",
      "content_analysis",
    ]);
    expect(status.tools.every((t) => t.description.length > 0)).toBe(true);
  });
});
