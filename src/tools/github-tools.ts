import { ExternalCallError } from "../integrations/external-call.ts";
import type { GitHubApi, GitHubIssue, GitHubRepoSummary, RepoRef } from "../integrations/github.ts";
import { parseRepoRef } from "../integrations/github.ts";
import type { ToolInputSchema } from "../agents/claude-client.ts";
import {
  ToolInputError,
  readEnum,
  readOptionalInt,
  readOptionalString,
  readString,
} from "./types.ts";
import type { Tool } from "./types.ts";

// ── Analysis Depth ──────────────────────────────────────────────────────────
// basic: profile only; standard: + repositories; deep: + recent public events

export const ANALYSIS_DEPTHS = ["basic", "standard", "deep"] as const;
export type AnalysisDepth = (typeof ANALYSIS_DEPTHS)[number];

export const ANALYSIS_TYPES = ["user", "repo", "community"] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

const REPO_SAMPLE_SIZE = 20;
const EVENT_SAMPLE_SIZE = 50;
const ISSUE_SAMPLE_SIZE = 30;
const CONTRIBUTOR_SAMPLE_SIZE = 20;
const DEFAULT_LOOKBACK_DAYS = 30;

// ── Result Shapes ───────────────────────────────────────────────────────────

export interface RepositoryStats {
  readonly totalRepos: number;
  readonly totalStars: number;
  /** Language → number of repositories using it. */
  readonly languages: Readonly<Record<string, number>>;
  readonly topics: readonly string[];
}

export interface UserScores {
  /** `null` when events were not fetched at this depth. */
  readonly activityScore: number | null;
  readonly influenceScore: number;
  readonly overallScore: number;
}

export interface GitHubUserProfile {
  readonly username: string;
  readonly name: string | null;
  readonly bio: string | null;
  readonly company: string | null;
  readonly location: string | null;
  readonly followers: number;
  readonly following: number;
  readonly publicRepos: number;
  readonly createdAt: string;
  readonly depth: AnalysisDepth;
  readonly repositories: RepositoryStats | null;
  readonly recentEventCount: number | null;
  readonly scores: UserScores;
  readonly recommendations: readonly string[];
}

export interface RepositoryAnalysis {
  readonly repository: string;
  readonly description: string | null;
  readonly language: string | null;
  readonly stars: number;
  readonly forks: number;
  readonly watchers: number;
  readonly openIssues: number;
  readonly totalContributors: number;
  readonly topContributors: ReadonlyArray<{ readonly login: string; readonly contributions: number }>;
  readonly lookbackDays: number;
  readonly recentIssues: number;
  readonly recentPullRequests: number;
  readonly activityScore: number;
  readonly popularityScore: number;
}

// ── Scoring ─────────────────────────────────────────────────────────────────

export function activityScore(recentEventCount: number): number {
  return Math.min(recentEventCount * 2, 100);
}

export function influenceScore(followers: number, totalStars: number): number {
  return Math.min(followers * 0.1 + totalStars * 0.05, 100);
}

export function summarizeRepositories(repos: readonly GitHubRepoSummary[]): RepositoryStats {
  const languages: Record<string, number> = {};
  const topics: string[] = [];
  let totalStars = 0;
  for (const repo of repos) {
    totalStars += repo.stars;
    if (repo.language) {
      languages[repo.language] = (languages[repo.language] ?? 0) + 1;
    }
    topics.push(...repo.topics);
  }
  return {
    totalRepos: repos.length,
    totalStars,
    languages,
    topics: [...new Set(topics)],
  };
}

export function userRecommendations(
  followers: number,
  repositories: RepositoryStats | null,
  activity: number | null,
): string[] {
  const recommendations: string[] = [];

  if (activity !== null) {
    if (activity > 70) {
      recommendations.push("Highly active user: suitable for direct interaction");
    } else if (activity > 30) {
      recommendations.push("Moderately active user: attract with valuable content");
    } else {
      recommendations.push("Low activity user: needs especially compelling content");
    }
  }

  const languages = Object.keys(repositories?.languages ?? {});
  if (languages.includes("Python")) {
    recommendations.push("Python developer: likely interested in data tooling");
  }
  if (languages.includes("Jupyter Notebook")) {
    recommendations.push("Data science background: ideal target user");
  }

  if (followers > 100) {
    recommendations.push("Has notable influence: worth following closely");
  }

  return recommendations;
}

function cutoffIso(lookbackDays: number, now: Date): string {
  return new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000).toISOString();
}

// ── github_analysis ─────────────────────────────────────────────────────────

const GITHUB_ANALYSIS_SCHEMA: ToolInputSchema = {
  type: "object",
  properties: {
    analysis_type: {
      type: "string",
      enum: [...ANALYSIS_TYPES],
      description: "user: one GitHub account; repo: one repository; community: the configured target repository",
    },
    username: { type: "string", description: "GitHub login (analysis_type=user)" },
    repository: { type: "string", description: "owner/repo (analysis_type=repo)" },
    depth: { type: "string", enum: [...ANALYSIS_DEPTHS] },
    lookback_days: { type: "integer", minimum: 1, maximum: 365 },
  },
  required: ["analysis_type"],
};

export interface GitHubAnalysisToolOptions {
  readonly api: GitHubApi;
  /** `owner/repo` analysed by `analysis_type=community`. */
  readonly communityRepository: string;
  readonly now?: () => Date;
}

export class GitHubAnalysisTool implements Tool {
  readonly name = "github_analysis";
  readonly description =
    "Analyze GitHub users, repositories or the target community: profile, activity and influence data as JSON";
  readonly inputSchema = GITHUB_ANALYSIS_SCHEMA;

  private readonly api: GitHubApi;
  private readonly communityRef: RepoRef;
  private readonly now: () => Date;

  constructor(options: GitHubAnalysisToolOptions) {
    this.api = options.api;
    this.communityRef = parseRepoRef(options.communityRepository);
    this.now = options.now ?? (() => new Date());
  }

  async invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const analysisType = readEnum(this.name, params, "analysis_type", ANALYSIS_TYPES);
    const lookbackDays = readOptionalInt(
      this.name,
      params,
      "lookback_days",
      DEFAULT_LOOKBACK_DAYS,
      { min: 1, max: 365 },
    );

    switch (analysisType) {
      case "user": {
        const username = readString(this.name, params, "username");
        const depth = readEnum(this.name, params, "depth", ANALYSIS_DEPTHS, "deep");
        return JSON.stringify(await this.analyzeUser(username, depth, lookbackDays, signal));
      }
      case "repo": {
        const ref = this.readRepoRef(params, "repository");
        return JSON.stringify(await this.analyzeRepository(ref, lookbackDays, signal));
      }
      case "community":
        return JSON.stringify(
          await this.analyzeRepository(this.communityRef, lookbackDays, signal),
        );
    }
  }

  async analyzeUser(
    username: string,
    depth: AnalysisDepth,
    lookbackDays: number,
    signal?: AbortSignal,
  ): Promise<GitHubUserProfile> {
    const user = await this.api.getUser(username, signal);

    const repositories =
      depth === "basic"
        ? null
        : summarizeRepositories(
            await this.api.listUserRepos(username, REPO_SAMPLE_SIZE, signal),
          );

    let recentEventCount: number | null = null;
    if (depth === "deep") {
      const cutoff = cutoffIso(lookbackDays, this.now());
      const events = await this.api.listUserEvents(username, EVENT_SAMPLE_SIZE, signal);
      recentEventCount = events.filter((e) => e.createdAt >= cutoff).length;
    }

    const activity = recentEventCount === null ? null : activityScore(recentEventCount);
    const influence = influenceScore(user.followers, repositories?.totalStars ?? 0);

    return {
      username: user.login,
      name: user.name,
      bio: user.bio,
      company: user.company,
      location: user.location,
      followers: user.followers,
      following: user.following,
      publicRepos: user.publicRepos,
      createdAt: user.createdAt,
      depth,
      repositories,
      recentEventCount,
      scores: {
        activityScore: activity,
        influenceScore: influence,
        overallScore: activity === null ? influence : (activity + influence) / 2,
      },
      recommendations: userRecommendations(user.followers, repositories, activity),
    };
  }

  async analyzeRepository(
    ref: RepoRef,
    lookbackDays: number,
    signal?: AbortSignal,
  ): Promise<RepositoryAnalysis> {
    const cutoff = cutoffIso(lookbackDays, this.now());
    const [repo, contributors, issues] = await Promise.all([
      this.api.getRepo(ref, signal),
      this.api.listContributors(ref, CONTRIBUTOR_SAMPLE_SIZE, signal),
      this.api.listIssues(ref, cutoff, ISSUE_SAMPLE_SIZE, signal),
    ]);

    const recent = issues.filter((i) => i.createdAt >= cutoff);
    const recentPullRequests = recent.filter((i) => i.isPullRequest).length;
    const recentIssues = recent.length - recentPullRequests;

    return {
      repository: repo.fullName,
      description: repo.description,
      language: repo.language,
      stars: repo.stars,
      forks: repo.forks,
      watchers: repo.watchers,
      openIssues: repo.openIssues,
      totalContributors: contributors.length,
      topContributors: contributors.slice(0, 5),
      lookbackDays,
      recentIssues,
      recentPullRequests,
      activityScore: Math.min((recentIssues + recentPullRequests) * 5, 100),
      popularityScore: Math.min((repo.stars / 100) * 10, 100),
    };
  }

  private readRepoRef(params: Record<string, unknown>, key: string): RepoRef {
    const value = readString(this.name, params, key);
    try {
      return parseRepoRef(value);
    } catch (err: unknown) {
      throw new ToolInputError(this.name, err instanceof Error ? err.message : String(err));
    }
  }
}

// ── Profile Parsing ─────────────────────────────────────────────────────────
// The orchestrator reads `github_analysis` output back into a typed profile.

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function nullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function parseRepositoryStats(value: unknown): RepositoryStats | null {
  if (!isRecord(value)) return null;
  const languages: Record<string, number> = {};
  if (isRecord(value.languages)) {
    for (const [lang, count] of Object.entries(value.languages)) {
      languages[lang] = numberOr(count, 0);
    }
  }
  return {
    totalRepos: numberOr(value.totalRepos, 0),
    totalStars: numberOr(value.totalStars, 0),
    languages,
    topics: Array.isArray(value.topics)
      ? value.topics.filter((t): t is string => typeof t === "string")
      : [],
  };
}

export function parseUserProfile(content: string): GitHubUserProfile {
  const data: unknown = JSON.parse(content);
  if (!isRecord(data) || typeof data.username !== "string" || !isRecord(data.scores)) {
    throw new SyntaxError("github_analysis output is not a user profile");
  }
  const depth = ANALYSIS_DEPTHS.find((d) => d === data.depth) ?? "basic";
  const activity = data.scores.activityScore;
  return {
    username: data.username,
    name: nullableString(data.name),
    bio: nullableString(data.bio),
    company: nullableString(data.company),
    location: nullableString(data.location),
    followers: numberOr(data.followers, 0),
    following: numberOr(data.following, 0),
    publicRepos: numberOr(data.publicRepos, 0),
    createdAt: typeof data.createdAt === "string" ? data.createdAt : "",
    depth,
    repositories: parseRepositoryStats(data.repositories),
    recentEventCount:
      typeof data.recentEventCount === "number" ? data.recentEventCount : null,
    scores: {
      activityScore: typeof activity === "number" ? activity : null,
      influenceScore: numberOr(data.scores.influenceScore, 0),
      overallScore: numberOr(data.scores.overallScore, 0),
    },
    recommendations: Array.isArray(data.recommendations)
      ? data.recommendations.filter((r): r is string => typeof r === "string")
      : [],
  };
}

// ── github_interaction ──────────────────────────────────────────────────────

export const INTERACTION_TYPES = ["comment", "issue"] as const;
export type InteractionType = (typeof INTERACTION_TYPES)[number];

const GITHUB_INTERACTION_SCHEMA: ToolInputSchema = {
  type: "object",
  properties: {
    interaction_type: { type: "string", enum: [...INTERACTION_TYPES] },
    content: {
      type: "string",
      description: "Comment body, or for issues a title line followed by the body",
    },
    target_id: { type: "integer", description: "Issue or PR number (comment only)" },
    repository: {
      type: "string",
      description: "owner/repo; defaults to the configured target repository",
    },
  },
  required: ["interaction_type", "content"],
};

export interface GitHubInteractionToolOptions {
  readonly api: GitHubApi;
  readonly defaultRepository: string;
}

export class GitHubInteractionTool implements Tool {
  readonly name = "github_interaction";
  readonly description =
    "Interact on GitHub: comment on an issue or pull request, or open a new issue";
  readonly inputSchema = GITHUB_INTERACTION_SCHEMA;

  private readonly api: GitHubApi;
  private readonly defaultRepository: string;

  constructor(options: GitHubInteractionToolOptions) {
    this.api = options.api;
    this.defaultRepository = options.defaultRepository;
    parseRepoRef(options.defaultRepository);
  }

  async invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const interactionType = readEnum(this.name, params, "interaction_type", INTERACTION_TYPES);
    const content = readString(this.name, params, "content");
    const repository = readOptionalString(this.name, params, "repository", this.defaultRepository);

    let ref: RepoRef;
    try {
      ref = parseRepoRef(repository);
    } catch (err: unknown) {
      throw new ToolInputError(this.name, err instanceof Error ? err.message : String(err));
    }

    switch (interactionType) {
      case "comment": {
        const targetId = readOptionalInt(this.name, params, "target_id", 0, {
          min: 0,
          max: Number.MAX_SAFE_INTEGER,
        });
        if (targetId === 0) {
          throw new ToolInputError(this.name, "'target_id' is required for comments");
        }
        return JSON.stringify(await this.comment(ref, targetId, content, signal));
      }
      case "issue":
        return JSON.stringify(await this.openIssue(ref, content, signal));
    }
  }

  private async comment(
    ref: RepoRef,
    issueNumber: number,
    body: string,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const [existing, login] = await Promise.all([
      this.api.listIssueComments(ref, issueNumber, signal),
      this.api.getAuthenticatedLogin(signal),
    ]);
    if (existing.some((c) => c.user === login)) {
      return {
        status: "skipped",
        reason: `already commented on #${issueNumber}`,
        repository: `${ref.owner}/${ref.repo}`,
      };
    }
    const created = await this.api.createIssueComment(ref, issueNumber, body, signal);
    return {
      status: "created",
      commentId: created.id,
      issueNumber,
      repository: `${ref.owner}/${ref.repo}`,
    };
  }

  private async openIssue(
    ref: RepoRef,
    content: string,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const newline = content.indexOf("\n");
    const firstLine = newline === -1 ? content : content.slice(0, newline);
    const title = firstLine.replace(/^#+\s*/, "").trim();
    const body = newline === -1 ? "" : content.slice(newline + 1).trim();
    if (title.length === 0) {
      throw new ToolInputError(this.name, "issue content must start with a title line");
    }
    let issue: GitHubIssue;
    try {
      issue = await this.api.createIssue(ref, title, body, signal);
    } catch (err: unknown) {
      // A failed create may still have opened the issue; never retry it.
      if (err instanceof ExternalCallError && err.retryable) {
        throw new ExternalCallError(err.message, err.kind, err.service, {
          status: err.status,
          retryable: false,
          cause: err,
        });
      }
      throw err;
    }
    return {
      status: "created",
      issueNumber: issue.number,
      title,
      repository: `${ref.owner}/${ref.repo}`,
    };
  }
}
