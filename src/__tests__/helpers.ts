import { fileURLToPath } from "node:url";
import type {
  ClaudeClient,
  ClaudeContentBlock,
  ClaudeMessage,
  ClaudeMessageParams,
  ClaudeMessageResult,
  ClaudeToolUseBlock,
} from "../agents/claude-client.ts";
import { bootstrap } from "../bootstrap.ts";
import type { Application } from "../bootstrap.ts";
import { loadConfig } from "../config.ts";
import type { RuntimeConfig } from "../config.ts";
import { ExternalCallError } from "../integrations/external-call.ts";
import type {
  GitHubApi,
  GitHubComment,
  GitHubContributor,
  GitHubEvent,
  GitHubIssue,
  GitHubRepoDetails,
  GitHubRepoSummary,
  GitHubUser,
  RepoRef,
} from "../integrations/github.ts";
import { BufferLogger } from "../observability/logger.ts";
import type { Tool } from "../tools/types.ts";
import type { Agent, AgentRole } from "../types/agent.ts";

// ── Paths ───────────────────────────────────────────────────────────────────

export const PROJECT_ROOT = fileURLToPath(new URL("../../", import.meta.url));
export const CREW_YAML = fileURLToPath(new URL("../../.agents/crew.yaml", import.meta.url));
export const TASKS_YAML = fileURLToPath(new URL("../../.agents/tasks.yaml", import.meta.url));

// ── Claude Client ───────────────────────────────────────────────────────────

export function textResult(content: string, tokens = { input: 10, output: 5 }): ClaudeMessageResult {
  return {
    content,
    model: "test-model",
    inputTokens: tokens.input,
    outputTokens: tokens.output,
    stopReason: "end_turn",
    durationMs: 1,
    toolUseBlocks: [],
    contentBlocks: [{ type: "text", text: content }],
  };
}

export function toolUseResult(
  uses: ReadonlyArray<{ id: string; name: string; input: Record<string, unknown> }>,
  text = "",
): ClaudeMessageResult {
  const toolUseBlocks: ClaudeToolUseBlock[] = uses.map((u) => ({ type: "tool_use", ...u }));
  const contentBlocks: ClaudeContentBlock[] = [
    ...(text ? [{ type: "text" as const, text }] : []),
    ...toolUseBlocks,
  ];
  return {
    content: text,
    model: "test-model",
    inputTokens: 10,
    outputTokens: 5,
    stopReason: "tool_use",
    durationMs: 1,
    toolUseBlocks,
    contentBlocks,
  };
}

export interface RecordedCall {
  readonly system: string;
  readonly messages: readonly ClaudeMessage[];
  readonly toolNames: readonly string[];
}

type Responder = (
  call: RecordedCall,
  index: number,
  signal: AbortSignal | undefined,
) => ClaudeMessageResult | Promise<ClaudeMessageResult>;

/** Answers every request through `respond` and records what it was sent. */
export class ScriptedClaudeClient implements ClaudeClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder = () => textResult("done")) {}

  async createMessage(params: ClaudeMessageParams): Promise<ClaudeMessageResult> {
    // The runner keeps appending to the array it passed in
    const call: RecordedCall = {
      system: params.system,
      messages: [...params.messages],
      toolNames: (params.tools ?? []).map((t) => t.name),
    };
    this.calls.push(call);
    return this.respond(call, this.calls.length - 1, params.signal);
  }
}

/** Replies with each result in turn, repeating the last one. */
export function scripted(...results: ClaudeMessageResult[]): ScriptedClaudeClient {
  return new ScriptedClaudeClient((_call, index) => {
    const result = results[Math.min(index, results.length - 1)];
    if (!result) throw new Error("scripted() needs at least one result");
    return result;
  });
}

export function firstUserText(call: RecordedCall): string {
  const first = call.messages[0];
  return first && typeof first.content === "string" ? first.content : "";
}

export function lastUserBlocks(call: RecordedCall): readonly ClaudeContentBlock[] {
  const last = call.messages[call.messages.length - 1];
  return last && typeof last.content !== "string" ? last.content : [];
}

// ── Tools & Agents ──────────────────────────────────────────────────────────

export class StubTool implements Tool {
  readonly calls: Record<string, unknown>[] = [];
  readonly description: string;
  readonly inputSchema = { type: "object", properties: {} } as const;

  constructor(
    readonly name: string,
    private readonly behavior: (
      params: Record<string, unknown>,
      call: number,
    ) => string | Promise<string> = () => "ok",
  ) {
    this.description = `${name} stub`;
  }

  async invoke(params: Record<string, unknown>): Promise<string> {
    this.calls.push(params);
    return this.behavior(params, this.calls.length);
  }
}

export function testAgent(
  role: AgentRole,
  overrides: Partial<Omit<Agent, "role">> = {},
): Agent {
  return Object.freeze({
    role,
    goal: `${role} goal`,
    backstory: `${role} backstory`,
    tools: [],
    allowDelegation: false,
    maxIterations: 3,
    ...overrides,
  });
}

// ── GitHub ──────────────────────────────────────────────────────────────────

export function testUser(login: string, overrides: Partial<GitHubUser> = {}): GitHubUser {
  return {
    login,
    name: null,
    bio: null,
    company: null,
    location: null,
    followers: 0,
    following: 0,
    publicRepos: 0,
    createdAt: "2020-01-01T00:00:00Z",
    ...overrides,
  };
}

export function testRepo(name: string, overrides: Partial<GitHubRepoSummary> = {}): GitHubRepoSummary {
  return {
    name,
    fullName: `owner/${name}`,
    description: null,
    language: null,
    stars: 0,
    forks: 0,
    topics: [],
    ...overrides,
  };
}

export function testIssue(number: number, overrides: Partial<GitHubIssue> = {}): GitHubIssue {
  return {
    number,
    title: `Issue ${number}`,
    state: "open",
    user: "reporter",
    createdAt: "2026-10-10T00:00:00Z",
    isPullRequest: false,
    ...overrides,
  };
}

function notFound(what: string): ExternalCallError {
  return new ExternalCallError(`GitHub ${what} not found`, "not_found", "github", {
    status: 404,
  });
}

/** In-memory GitHub. Unknown users are 404s. */
export class FakeGitHubApi implements GitHubApi {
  readonly users = new Map<string, GitHubUser>();
  readonly repos = new Map<string, GitHubRepoSummary[]>();
  readonly events = new Map<string, GitHubEvent[]>();
  readonly comments = new Map<number, GitHubComment[]>();
  repoDetails: GitHubRepoDetails = {
    name: "widgets",
    fullName: "acme/widgets",
    description: "Widgets for everyone",
    language: "TypeScript",
    stars: 250,
    forks: 12,
    topics: [],
    openIssues: 4,
    watchers: 9,
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt: "2026-10-01T00:00:00Z",
  };
  contributors: GitHubContributor[] = [];
  issues: GitHubIssue[] = [];
  login = "crew-bot";
  /** Thrown by the next call to the named method, then cleared. */
  readonly failNext = new Map<keyof GitHubApi, Error>();
  readonly calls: string[] = [];
  readonly createdComments: Array<{ issueNumber: number; body: string }> = [];
  readonly createdIssues: Array<{ title: string; body: string }> = [];

  addUser(user: GitHubUser, repos: GitHubRepoSummary[] = [], events: GitHubEvent[] = []): void {
    this.users.set(user.login, user);
    this.repos.set(user.login, repos);
    this.events.set(user.login, events);
  }

  private enter(method: keyof GitHubApi): void {
    this.calls.push(method);
    const err = this.failNext.get(method);
    if (err) {
      this.failNext.delete(method);
      throw err;
    }
  }

  async getUser(username: string): Promise<GitHubUser> {
    this.enter("getUser");
    const user = this.users.get(username);
    if (!user) throw notFound(`user ${username}`);
    return user;
  }

  async listUserRepos(username: string, limit: number): Promise<GitHubRepoSummary[]> {
    this.enter("listUserRepos");
    return (this.repos.get(username) ?? []).slice(0, limit);
  }

  async listUserEvents(username: string, limit: number): Promise<GitHubEvent[]> {
    this.enter("listUserEvents");
    return (this.events.get(username) ?? []).slice(0, limit);
  }

  async getRepo(_ref: RepoRef): Promise<GitHubRepoDetails> {
    this.enter("getRepo");
    return this.repoDetails;
  }

  async listContributors(_ref: RepoRef, limit: number): Promise<GitHubContributor[]> {
    this.enter("listContributors");
    return this.contributors.slice(0, limit);
  }

  async listIssues(_ref: RepoRef, _since: string, limit: number): Promise<GitHubIssue[]> {
    this.enter("listIssues");
    return this.issues.slice(0, limit);
  }

  async listIssueComments(_ref: RepoRef, issueNumber: number): Promise<GitHubComment[]> {
    this.enter("listIssueComments");
    return this.comments.get(issueNumber) ?? [];
  }

  async createIssueComment(_ref: RepoRef, issueNumber: number, body: string): Promise<GitHubComment> {
    this.enter("createIssueComment");
    this.createdComments.push({ issueNumber, body });
    const comment = { id: 1000 + this.createdComments.length, user: this.login };
    this.comments.set(issueNumber, [...(this.comments.get(issueNumber) ?? []), comment]);
    return comment;
  }

  async createIssue(_ref: RepoRef, title: string, body: string): Promise<GitHubIssue> {
    this.enter("createIssue");
    this.createdIssues.push({ title, body });
    return testIssue(500 + this.createdIssues.length, { title, user: this.login });
  }

  async getAuthenticatedLogin(): Promise<string> {
    this.enter("getAuthenticatedLogin");
    return this.login;
  }
}

// ── Application ─────────────────────────────────────────────────────────────

export function testConfig(env: Record<string, string> = {}): RuntimeConfig {
  return loadConfig({
    ANTHROPIC_API_KEY: "test-key",
    GITHUB_TOKEN: "test-token",
    GITHUB_REPOSITORY: "acme/widgets",
    PROJECT_ROOT,
    API_BASE_PATH: "/",
    TOOL_RETRY_BASE_MS: "1",
    LOG_LEVEL: "silent",
    ...env,
  });
}

export interface TestApp {
  readonly app: Application;
  readonly client: ScriptedClaudeClient;
  readonly github: FakeGitHubApi;
  readonly logger: BufferLogger;
}

export async function createTestApp(
  options: {
    readonly client?: ScriptedClaudeClient;
    readonly github?: FakeGitHubApi;
    readonly env?: Record<string, string>;
  } = {},
): Promise<TestApp> {
  const client = options.client ?? new ScriptedClaudeClient();
  const github = options.github ?? new FakeGitHubApi();
  const logger = new BufferLogger();
  const app = await bootstrap(testConfig(options.env), {
    client,
    github,
    logger,
    version: "0.0.0-test",
  });
  return { app, client, github, logger };
}

// ── Errors ──────────────────────────────────────────────────────────────────

type ErrorClass<E extends Error> = new (...args: never[]) => E;

/** The error `fn` throws, narrowed to `type`. */
export function thrown<E extends Error>(fn: () => unknown, type: ErrorClass<E>): E {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

export async function rejected<E extends Error>(
  promise: Promise<unknown>,
  type: ErrorClass<E>,
): Promise<E> {
  try {
    await promise;
  } catch (err: unknown) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
