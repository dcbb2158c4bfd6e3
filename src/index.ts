export { VERSION } from "./version.ts";

// ── Runtime ─────────────────────────────────────────────────────────────────
export { loadConfig, ConfigError, DEFAULT_LLM_MODEL, type RuntimeConfig } from "./config.ts";
export { bootstrap, type Application, type BootstrapOverrides } from "./bootstrap.ts";
export {
  createApiServer,
  toErrorResponse,
  ERROR_CODES,
  type ApiServer,
  type ApiServerConfig,
  type CrewOperations,
} from "./api/server.ts";

// ── Crew ────────────────────────────────────────────────────────────────────
export { createAgent, AgentDefinitions } from "./crew/agent.ts";
export {
  AgentRunner,
  DELEGATE_TOOL_NAME,
  type AgentRunResult,
  type DelegationRecord,
} from "./crew/agent-runner.ts";
export { Crew, type CrewConfig, type CrewResult, type KickoffOptions } from "./crew/crew.ts";
export {
  ConfigurationError,
  MissingParameterError,
  TimeoutError,
  ValidationError,
} from "./crew/errors.ts";
export {
  MarketingCrew,
  type AnalyzeUsersResult,
  type CommunityEngagementResult,
  type ComprehensiveCampaignResult,
  type ContentCampaignResult,
  type GeneratedContentResult,
  type ProfileEntry,
  type TeamStatus,
  type ToolsStatus,
} from "./crew/marketing-crew.ts";
export {
  BUDGET_LEVELS,
  ENGAGEMENT_LEVELS,
  INPUT_DEFAULTS,
  type AnalyzeUsersInput,
  type CommunityEngagementInput,
  type ComprehensiveCampaignInput,
  type ContentCampaignInput,
  type GenerateContentInput,
} from "./crew/inputs.ts";
export { Task, renderTemplate } from "./crew/task.ts";
export { TaskTemplateRegistry, type TaskParamsByKind } from "./crew/task-templates.ts";
export { OPERATION_KINDS, WORKFLOW_TABLE, validateWorkflowTable } from "./crew/workflows.ts";

// ── Tools & Integrations ────────────────────────────────────────────────────
export { ToolRegistry } from "./tools/tool-registry.ts";
export {
  DuplicateToolError,
  ToolExecutionError,
  ToolInputError,
  UnknownToolError,
  type Tool,
} from "./tools/types.ts";
export { GitHubAnalysisTool, GitHubInteractionTool } from "./tools/github-tools.ts";
export {
  ContentAnalysisTool,
  ContentGenerationTool,
  ContentOptimizationTool,
} from "./tools/content-tools.ts";
export { AnthropicClaudeClient, ExecutionError, type ClaudeClient } from "./agents/claude-client.ts";
export { OctokitGitHubApi, type GitHubApi } from "./integrations/github.ts";
export { ExternalCallError } from "./integrations/external-call.ts";
export { ConcurrencyLimiter, runWithConcurrency } from "./integrations/concurrency.ts";

// ── Types & Observability ───────────────────────────────────────────────────
export * from "./types/index.ts";
export * from "./observability/index.ts";
