import { resolve } from "node:path";
import Anthropic from "@anthropic-ai/sdk";
import type { RuntimeConfig } from "./config.ts";
import { AnthropicClaudeClient } from "./agents/claude-client.ts";
import type { ClaudeClient } from "./agents/claude-client.ts";
import { createApiServer } from "./api/server.ts";
import type { ApiServer } from "./api/server.ts";
import { AgentDefinitions } from "./crew/agent.ts";
import { AgentRunner } from "./crew/agent-runner.ts";
import { Crew } from "./crew/crew.ts";
import { MarketingCrew } from "./crew/marketing-crew.ts";
import { TaskTemplateRegistry } from "./crew/task-templates.ts";
import { ConcurrencyLimiter } from "./integrations/concurrency.ts";
import { OctokitGitHubApi } from "./integrations/github.ts";
import type { GitHubApi } from "./integrations/github.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { MetricsCollector } from "./observability/metrics.ts";
import {
  ContentAnalysisTool,
  ContentGenerationTool,
  ContentOptimizationTool,
} from "./tools/content-tools.ts";
import type { ContentToolOptions } from "./tools/content-tools.ts";
import { GitHubAnalysisTool, GitHubInteractionTool } from "./tools/github-tools.ts";
import { ToolRegistry } from "./tools/tool-registry.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly registry: ToolRegistry;
  readonly metrics: MetricsCollector;
  readonly crew: MarketingCrew;
  readonly server: ApiServer;

  /** Start the HTTP listener; resolves with the bound port. */
  start(): Promise<number>;
  shutdown(): Promise<void>;
}

/** Replacements for the external services, used by tests and local runs. */
export interface BootstrapOverrides {
  readonly logger?: Logger;
  readonly client?: ClaudeClient;
  readonly github?: GitHubApi;
  readonly version?: string;
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire all modules together with real implementations.
 * This is the composition root: the single place where dependency injection happens.
 *
 * @param config Runtime configuration (from loadConfig()).
 * @returns Fully wired Application ready to start.
 */
export async function bootstrap(
  config: RuntimeConfig,
  overrides: BootstrapOverrides = {},
): Promise<Application> {
  // 1. Logger first, so all subsequent modules can log
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
      base: { service: "marketing-crew" },
    });
  const log = logger.child({ module: "bootstrap" });

  log.info("bootstrap_started", {
    model: config.llm.model,
    repository: config.github.repository,
    crewTimeoutMs: config.crew.timeoutMs,
  });

  // 2. External service clients, each behind its own concurrency bound
  const client =
    overrides.client ??
    new AnthropicClaudeClient({
      anthropic: new Anthropic({
        apiKey: config.llm.apiKey,
        ...(config.llm.baseUrl ? { baseURL: config.llm.baseUrl } : {}),
      }),
      limiter: new ConcurrencyLimiter(config.llm.maxConcurrency),
      logger,
    });
  const github =
    overrides.github ??
    OctokitGitHubApi.withToken(config.github.token, {
      limiter: new ConcurrencyLimiter(config.github.maxConcurrency),
      logger,
    });

  // 3. Tool registry
  const registry = new ToolRegistry({
    retry: {
      maxRetries: config.tools.maxRetries,
      baseBackoffMs: config.tools.retryBaseMs,
    },
    logger,
  });
  const contentOptions: ContentToolOptions = {
    client,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs,
  };
  registry.register(
    new GitHubAnalysisTool({ api: github, communityRepository: config.github.repository }),
  );
  registry.register(
    new GitHubInteractionTool({ api: github, defaultRepository: config.github.repository }),
  );
  registry.register(new ContentGenerationTool(contentOptions));
  registry.register(new ContentOptimizationTool(contentOptions));
  registry.register(new ContentAnalysisTool(contentOptions));
  log.info("tool_registry_ready", { tools: registry.toolNames });

  // 4. Agents and task templates from .agents/
  const definitions = await AgentDefinitions.fromYaml(
    resolve(config.projectRoot, ".agents/crew.yaml"),
  );
  const templates = await TaskTemplateRegistry.fromYaml(
    resolve(config.projectRoot, ".agents/tasks.yaml"),
  );
  const agents = definitions.build(registry);
  log.info("agents_loaded", {
    agents: agents.map((a) => a.role),
    manager: definitions.managerRole,
    taskKinds: templates.kinds,
  });

  // 5. Crew and orchestrator
  const metrics = new MetricsCollector();
  const runner = new AgentRunner(
    {
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
      timeoutMs: config.llm.timeoutMs,
    },
    { client, registry, logger },
  );
  const crew = new Crew(
    { agents, processMode: "sequential", managerRole: definitions.managerRole },
    { runner, metrics, logger },
  );
  const marketingCrew = new MarketingCrew(
    {
      timeoutMs: config.crew.timeoutMs,
      repository: config.github.repository,
      profileConcurrency: config.github.maxConcurrency,
    },
    { crew, templates, registry, metrics, logger },
  );

  // 6. HTTP API
  const server = createApiServer({
    crew: marketingCrew,
    basePath: config.server.basePath,
    version: overrides.version,
    logger,
  });

  let shuttingDown = false;

  return {
    config,
    logger,
    registry,
    metrics,
    crew: marketingCrew,
    server,

    async start(): Promise<number> {
      return server.listen(config.server.port, config.server.host);
    },

    async shutdown(): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info("shutdown_started");
      try {
        await server.close();
      } catch (err: unknown) {
        log.error("shutdown_server_close_failed", {
          error: err instanceof Error ? err.message : String(err),
        });
      }
      log.info("shutdown_completed");
    },
  };
}
