import { Octokit } from "octokit";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { ConcurrencyLimiter } from "./concurrency.ts";
import { ExternalCallError, classifyHttpStatus } from "./external-call.ts";

// ── GitHub Data Shapes ──────────────────────────────────────────────────────
// Only the fields the tools read. Adapters map vendor payloads into these.

export interface GitHubUser {
  readonly login: string;
  readonly name: string | null;
  readonly bio: string | null;
  readonly company: string | null;
  readonly location: string | null;
  readonly followers: number;
  readonly following: number;
  readonly publicRepos: number;
  readonly createdAt: string;
}

export interface GitHubRepoSummary {
  readonly name: string;
  readonly fullName: string;
  readonly description: string | null;
  readonly language: string | null;
  readonly stars: number;
  readonly forks: number;
  readonly topics: readonly string[];
}

export interface GitHubRepoDetails extends GitHubRepoSummary {
  readonly openIssues: number;
  readonly watchers: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface GitHubEvent {
  readonly type: string;
  readonly repo: string | null;
  readonly createdAt: string;
}

export interface GitHubContributor {
  readonly login: string;
  readonly contributions: number;
}

export interface GitHubIssue {
  readonly number: number;
  readonly title: string;
  readonly state: string;
  readonly user: string | null;
  readonly createdAt: string;
  readonly isPullRequest: boolean;
}

export interface GitHubComment {
  readonly id: number;
  readonly user: string | null;
}

export interface RepoRef {
  readonly owner: string;
  readonly repo: string;
}

/** Capability interface the GitHub tools depend on. */
export interface GitHubApi {
  getUser(username: string, signal?: AbortSignal): Promise<GitHubUser>;
  listUserRepos(username: string, limit: number, signal?: AbortSignal): Promise<GitHubRepoSummary[]>;
  listUserEvents(username: string, limit: number, signal?: AbortSignal): Promise<GitHubEvent[]>;
  getRepo(ref: RepoRef, signal?: AbortSignal): Promise<GitHubRepoDetails>;
  listContributors(ref: RepoRef, limit: number, signal?: AbortSignal): Promise<GitHubContributor[]>;
  listIssues(ref: RepoRef, since: string, limit: number, signal?: AbortSignal): Promise<GitHubIssue[]>;
  listIssueComments(ref: RepoRef, issueNumber: number, signal?: AbortSignal): Promise<GitHubComment[]>;
  createIssueComment(ref: RepoRef, issueNumber: number, body: string, signal?: AbortSignal): Promise<GitHubComment>;
  createIssue(ref: RepoRef, title: string, body: string, signal?: AbortSignal): Promise<GitHubIssue>;
  getAuthenticatedLogin(signal?: AbortSignal): Promise<string>;
}

export function parseRepoRef(fullName: string): RepoRef {
  const [owner, repo, ...rest] = fullName.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repo format: ${fullName}. Expected: owner/repo`);
  }
  return { owner, repo };
}

// ── Octokit Adapter ─────────────────────────────────────────────────────────

export interface OctokitGitHubApiOptions {
  readonly octokit: Octokit;
  readonly limiter?: ConcurrencyLimiter;
  readonly logger?: Logger;
}

export interface OctokitTokenOptions extends Omit<OctokitGitHubApiOptions, "octokit"> {
  /** GitHub Enterprise or test server root; defaults to api.github.com. */
  readonly baseUrl?: string;
}

/**
 * Octokit with its retry and throttling plugins switched off. Retries
 * belong to `ToolRegistry.invoke`, bounded by `TOOL_MAX_RETRIES`.
 */
export function createOctokit(token: string, baseUrl?: string): Octokit {
  return new Octokit({
    auth: token,
    userAgent: "marketing-crew",
    ...(baseUrl !== undefined ? { baseUrl } : {}),
    retry: { enabled: false },
    throttle: {
      enabled: false,
      onRateLimit: () => false,
      onSecondaryRateLimit: () => false,
    },
  });
}

export class OctokitGitHubApi implements GitHubApi {
  private readonly octokit: Octokit;
  private readonly limiter: ConcurrencyLimiter | null;
  private readonly logger: Logger;

  constructor(options: OctokitGitHubApiOptions) {
    this.octokit = options.octokit;
    this.limiter = options.limiter ?? null;
    this.logger = (options.logger ?? NULL_LOGGER).child({ module: "github-api" });
  }

  static withToken(token: string, options: OctokitTokenOptions = {}): OctokitGitHubApi {
    const { baseUrl, ...rest } = options;
    return new OctokitGitHubApi({ ...rest, octokit: createOctokit(token, baseUrl) });
  }

  async getUser(username: string, signal?: AbortSignal): Promise<GitHubUser> {
    const { data } = await this.call("users.getByUsername", signal, () =>
      this.octokit.rest.users.getByUsername({ username, request: { signal } }),
    );
    return {
      login: data.login,
      name: data.name ?? null,
      bio: data.bio ?? null,
      company: data.company ?? null,
      location: data.location ?? null,
      followers: data.followers,
      following: data.following,
      publicRepos: data.public_repos,
      createdAt: data.created_at,
    };
  }

  async listUserRepos(username: string, limit: number, signal?: AbortSignal): Promise<GitHubRepoSummary[]> {
    const { data } = await this.call("repos.listForUser", signal, () =>
      this.octokit.rest.repos.listForUser({
        username,
        sort: "updated",
        per_page: limit,
        request: { signal },
      }),
    );
    return data.map((repo) => ({
      name: repo.name,
      fullName: repo.full_name,
      description: repo.description ?? null,
      language: repo.language ?? null,
      stars: repo.stargazers_count ?? 0,
      forks: repo.forks_count ?? 0,
      topics: repo.topics ?? [],
    }));
  }

  async listUserEvents(username: string, limit: number, signal?: AbortSignal): Promise<GitHubEvent[]> {
    const { data } = await this.call("activity.listPublicEventsForUser", signal, () =>
      this.octokit.rest.activity.listPublicEventsForUser({
        username,
        per_page: limit,
        request: { signal },
      }),
    );
    return data.map((event) => ({
      type: event.type ?? "UnknownEvent",
      repo: event.repo.name,
      createdAt: event.created_at ?? new Date(0).toISOString(),
    }));
  }

  async getRepo(ref: RepoRef, signal?: AbortSignal): Promise<GitHubRepoDetails> {
    const { data } = await this.call("repos.get", signal, () =>
      this.octokit.rest.repos.get({ ...ref, request: { signal } }),
    );
    return {
      name: data.name,
      fullName: data.full_name,
      description: data.description,
      language: data.language,
      stars: data.stargazers_count,
      forks: data.forks_count,
      topics: data.topics ?? [],
      openIssues: data.open_issues_count,
      watchers: data.subscribers_count ?? data.watchers_count,
      createdAt: data.created_at,
      updatedAt: data.updated_at,
    };
  }

  async listContributors(ref: RepoRef, limit: number, signal?: AbortSignal): Promise<GitHubContributor[]> {
    const { data } = await this.call("repos.listContributors", signal, () =>
      this.octokit.rest.repos.listContributors({
        ...ref,
        per_page: limit,
        request: { signal },
      }),
    );
    // 204 No Content for empty repositories
    if (!Array.isArray(data)) return [];
    return data.map((c) => ({
      login: c.login ?? "anonymous",
      contributions: c.contributions,
    }));
  }

  async listIssues(ref: RepoRef, since: string, limit: number, signal?: AbortSignal): Promise<GitHubIssue[]> {
    const { data } = await this.call("issues.listForRepo", signal, () =>
      this.octokit.rest.issues.listForRepo({
        ...ref,
        state: "all",
        since,
        per_page: limit,
        request: { signal },
      }),
    );
    return data.map((issue) => ({
      number: issue.number,
      title: issue.title,
      state: issue.state,
      user: issue.user?.login ?? null,
      createdAt: issue.created_at,
      isPullRequest: issue.pull_request !== undefined,
    }));
  }

  async listIssueComments(ref: RepoRef, issueNumber: number, signal?: AbortSignal): Promise<GitHubComment[]> {
    const { data } = await this.call("issues.listComments", signal, () =>
      this.octokit.rest.issues.listComments({
        ...ref,
        issue_number: issueNumber,
        per_page: 100,
        request: { signal },
      }),
    );
    return data.map((comment) => ({
      id: comment.id,
      user: comment.user?.login ?? null,
    }));
  }

  async createIssueComment(ref: RepoRef, issueNumber: number, body: string, signal?: AbortSignal): Promise<GitHubComment> {
    const { data } = await this.call("issues.createComment", signal, () =>
      this.octokit.rest.issues.createComment({
        ...ref,
        issue_number: issueNumber,
        body,
        request: { signal },
      }),
    );
    return { id: data.id, user: data.user?.login ?? null };
  }

  async createIssue(ref: RepoRef, title: string, body: string, signal?: AbortSignal): Promise<GitHubIssue> {
    const { data } = await this.call("issues.create", signal, () =>
      this.octokit.rest.issues.create({ ...ref, title, body, request: { signal } }),
    );
    return {
      number: data.number,
      title: data.title,
      state: data.state,
      user: data.user?.login ?? null,
      createdAt: data.created_at,
      isPullRequest: false,
    };
  }

  async getAuthenticatedLogin(signal?: AbortSignal): Promise<string> {
    const { data } = await this.call("users.getAuthenticated", signal, () =>
      this.octokit.rest.users.getAuthenticated({ request: { signal } }),
    );
    return data.login;
  }

  // ── Call Wrapper ────────────────────────────────────────────────────────

  private async call<T>(
    endpoint: string,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    const run = async (): Promise<T> => {
      try {
        return await fn();
      } catch (err: unknown) {
        throw toExternalCallError(endpoint, err);
      }
    };
    const startTime = Date.now();
    const result = this.limiter ? await this.limiter.run(run, signal) : await run();
    this.logger.debug("github_call_completed", {
      endpoint,
      durationMs: Date.now() - startTime,
    });
    return result;
  }
}

// ── Error Classification ────────────────────────────────────────────────────

interface HttpErrorLike {
  readonly status: number;
  readonly message: string;
  readonly response?: { readonly headers?: Record<string, unknown> };
}

function isHttpErrorLike(err: unknown): err is HttpErrorLike {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function toExternalCallError(endpoint: string, err: unknown): ExternalCallError {
  if (err instanceof ExternalCallError) return err;

  if (isHttpErrorLike(err)) {
    const remaining = err.response?.headers?.["x-ratelimit-remaining"];
    const exhausted = remaining === "0" || remaining === 0;
    // octokit reports network failures with status 500
    const kind = classifyHttpStatus(err.status, exhausted);
    return new ExternalCallError(
      `GitHub ${endpoint} failed (${err.status}): ${err.message}`,
      kind,
      "github",
      { status: err.status, cause: err },
    );
  }

  if (err instanceof SyntaxError) {
    return new ExternalCallError(
      `GitHub ${endpoint} returned an unparseable body: ${err.message}`,
      "malformed_response",
      "github",
      { cause: err },
    );
  }

  return new ExternalCallError(
    `GitHub ${endpoint} failed: ${err instanceof Error ? err.message : String(err)}`,
    "transient_network",
    "github",
    { cause: err },
  );
}
