import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  readonly llm: {
    readonly apiKey: string;
    readonly baseUrl: string | undefined;
    readonly model: string;
    readonly maxTokens: number;
    readonly timeoutMs: number;
    readonly maxConcurrency: number;
  };
  readonly github: {
    readonly token: string;
    /** `owner/repo` */
    readonly repository: string;
    readonly maxConcurrency: number;
  };
  readonly tools: {
    readonly maxRetries: number;
    readonly retryBaseMs: number;
  };
  readonly crew: {
    readonly timeoutMs: number;
  };
  readonly server: {
    readonly host: string;
    readonly port: number;
    /** Empty, or a path prefix such as `/api/v1`. */
    readonly basePath: string;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  /** Directory holding `.agents/`. */
  readonly projectRoot: string;
}

export const DEFAULT_LLM_MODEL = "claude-sonnet-4-5-20250929";

const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Field Readers ──────────────────────────────────────────────────────────

type EnvReader = (key: string) => string | undefined;

function requireString(env: EnvReader, key: string): string {
  const value = env(key)?.trim();
  if (!value) {
    throw new ConfigError(
      `${key} is required. Set it in .env or as an environment variable.`,
      key,
    );
  }
  return value;
}

function readInt(env: EnvReader, key: string, fallback: number, min: number): number {
  const raw = env(key)?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}".`, key);
  }
  return value;
}

function readChoice<T extends string>(
  env: EnvReader,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = (env(key) || fallback).trim();
  const match = allowed.find((a) => a === raw);
  if (match === undefined) {
    throw new ConfigError(`${key} must be one of: ${allowed.join(", ")}. Got "${raw}".`, key);
  }
  return match;
}

function normalizeBasePath(raw: string | undefined): string {
  const trimmed = (raw ?? "").trim().replace(/\/+$/, "");
  if (trimmed === "") return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Optional env-var-style overrides for testing.
 *   Keys are env var names (e.g. "ANTHROPIC_API_KEY"), values are strings.
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError if required fields are missing or invalid.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env: EnvReader = (key) => envOverrides?.[key] ?? process.env[key];

  // ── LLM ───────────────────────────────────────────────────────────────
  const apiKey = requireString(env, "ANTHROPIC_API_KEY");
  const baseUrl = env("ANTHROPIC_BASE_URL")?.trim() || undefined;
  const model = env("LLM_MODEL")?.trim() || DEFAULT_LLM_MODEL;
  const maxTokens = readInt(env, "LLM_MAX_TOKENS", 4096, 1);
  const llmTimeoutMs = readInt(env, "LLM_TIMEOUT_MS", 120_000, 1);
  const llmConcurrency = readInt(env, "LLM_MAX_CONCURRENCY", 4, 1);

  // ── GitHub ────────────────────────────────────────────────────────────
  const token = requireString(env, "GITHUB_TOKEN");
  const repository = requireString(env, "GITHUB_REPOSITORY");
  if (!REPOSITORY_PATTERN.test(repository)) {
    throw new ConfigError(
      `GITHUB_REPOSITORY must look like "owner/repo", got "${repository}".`,
      "GITHUB_REPOSITORY",
    );
  }
  const githubConcurrency = readInt(env, "GITHUB_MAX_CONCURRENCY", 4, 1);

  // ── Tools & Crew ──────────────────────────────────────────────────────
  const maxRetries = readInt(env, "TOOL_MAX_RETRIES", 2, 0);
  const retryBaseMs = readInt(env, "TOOL_RETRY_BASE_MS", 500, 0);
  const crewTimeoutMs = readInt(env, "CREW_TIMEOUT_MS", 300_000, 1);

  // ── Server ────────────────────────────────────────────────────────────
  const host = env("HOST")?.trim() || "0.0.0.0";
  const port = readInt(env, "PORT", 8000, 0);
  if (port > 65535) {
    throw new ConfigError(`PORT must be at most 65535, got "${port}".`, "PORT");
  }
  const basePath = normalizeBasePath(env("API_BASE_PATH"));

  // ── Logging ───────────────────────────────────────────────────────────
  const level = readChoice(env, "LOG_LEVEL", LOG_LEVELS, "info");
  const format = readChoice(env, "LOG_FORMAT", LOG_FORMATS, "pretty");

  // ── Project Root ──────────────────────────────────────────────────────
  const projectRootRaw = env("PROJECT_ROOT")?.trim();
  const projectRoot = projectRootRaw
    ? resolve(process.cwd(), projectRootRaw)
    : resolve(fileURLToPath(new URL(".", import.meta.url)), "..");

  return Object.freeze({
    llm: Object.freeze({
      apiKey,
      baseUrl,
      model,
      maxTokens,
      timeoutMs: llmTimeoutMs,
      maxConcurrency: llmConcurrency,
    }),
    github: Object.freeze({ token, repository, maxConcurrency: githubConcurrency }),
    tools: Object.freeze({ maxRetries, retryBaseMs }),
    crew: Object.freeze({ timeoutMs: crewTimeoutMs }),
    server: Object.freeze({ host, port, basePath }),
    logging: Object.freeze({ level, format }),
    projectRoot,
  });
}
