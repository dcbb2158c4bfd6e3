import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { ExecutionError } from "../agents/claude-client.ts";
import { TimeoutError, ValidationError } from "../crew/errors.ts";
import type { MarketingCrew } from "../crew/marketing-crew.ts";
import { errorMessage } from "../integrations/external-call.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { ToolExecutionError } from "../tools/types.ts";
import {
  parseAnalyzeUsersBody,
  parseCommunityEngagementBody,
  parseComprehensiveCampaignBody,
  parseContentCampaignBody,
  parseGenerateContentBody,
} from "./validation.ts";

// ── Types ───────────────────────────────────────────────────────────────────

/** The orchestrator surface the routes call. */
export type CrewOperations = Pick<
  MarketingCrew,
  | "analyzeUsers"
  | "createContentCampaign"
  | "executeCommunityEngagement"
  | "runComprehensiveCampaign"
  | "generateContent"
  | "getTeamStatus"
  | "getToolsStatus"
>;

export interface ApiServerConfig {
  readonly crew: CrewOperations;
  /** Empty, or a prefix such as `/api/v1`. `/health` is also served at the root. */
  readonly basePath?: string;
  readonly version?: string;
  readonly logger?: Logger;
}

export interface ApiServer {
  /** Fetch-style entry point; the HTTP listener and the tests both call it. */
  handleRequest(request: Request): Promise<Response>;
  /** Start listening; resolves with the bound port. */
  listen(port: number, host: string): Promise<number>;
  close(): Promise<void>;
}

export const ERROR_CODES = {
  invalidJson: "invalid_json",
  validation: "validation_error",
  notFound: "not_found",
  methodNotAllowed: "method_not_allowed",
  tool: "tool_error",
  llm: "llm_error",
  timeout: "timeout",
  internal: "internal_error",
} as const;

type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

interface Route {
  readonly method: "GET" | "POST";
  readonly message: string;
  readonly handle: (body: unknown, signal: AbortSignal) => Promise<unknown> | unknown;
}

// ── Envelope ────────────────────────────────────────────────────────────────

function jsonResponse(data: Record<string, unknown>, status: number): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function success(data: unknown, message: string): Response {
  return jsonResponse(
    { success: true, data, message, timestamp: new Date().toISOString() },
    200,
  );
}

function failure(status: number, code: ErrorCode, message: string): Response {
  return jsonResponse(
    {
      success: false,
      error: { code, message },
      message,
      timestamp: new Date().toISOString(),
    },
    status,
  );
}

/** HTTP status and client-safe message for an error thrown by an operation. */
export function toErrorResponse(err: unknown): Response {
  if (err instanceof ValidationError) {
    return failure(400, ERROR_CODES.validation, err.message);
  }
  if (err instanceof TimeoutError) {
    return failure(504, ERROR_CODES.timeout, err.message);
  }
  if (err instanceof ToolExecutionError) {
    return failure(502, ERROR_CODES.tool, err.message);
  }
  if (err instanceof ExecutionError) {
    return failure(502, ERROR_CODES.llm, `Language model request failed: ${err.message}`);
  }
  return failure(500, ERROR_CODES.internal, "Internal server error");
}

async function readJsonBody(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  const text = await request.text();
  if (text.trim() === "") return { ok: true, body: undefined };
  try {
    const body: unknown = JSON.parse(text);
    return { ok: true, body };
  } catch {
    return { ok: false };
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

export function createApiServer(config: ApiServerConfig): ApiServer {
  const logger = (config.logger ?? NULL_LOGGER).child({ module: "api" });
  const basePath = config.basePath ?? "";
  const startedAtMs = Date.now();
  const { crew } = config;
  let server: Server | null = null;

  const routes: ReadonlyMap<string, Route> = new Map<string, Route>([
    [
      "/health",
      {
        method: "GET",
        message: "Service is healthy",
        handle: () => ({
          status: "healthy",
          version: config.version ?? "unknown",
          uptimeMs: Date.now() - startedAtMs,
        }),
      },
    ],
    [
      "/status",
      { method: "GET", message: "Team status", handle: () => crew.getTeamStatus() },
    ],
    [
      "/tools/status",
      { method: "GET", message: "Tool status", handle: () => crew.getToolsStatus() },
    ],
    [
      "/analyze/users",
      {
        method: "POST",
        message: "User analysis completed",
        handle: (body, signal) => crew.analyzeUsers(parseAnalyzeUsersBody(body), { signal }),
      },
    ],
    [
      "/campaigns/content",
      {
        method: "POST",
        message: "Content campaign created",
        handle: (body, signal) =>
          crew.createContentCampaign(parseContentCampaignBody(body), { signal }),
      },
    ],
    [
      "/engagement/community",
      {
        method: "POST",
        message: "Community engagement completed",
        handle: (body, signal) =>
          crew.executeCommunityEngagement(parseCommunityEngagementBody(body), { signal }),
      },
    ],
    [
      "/campaigns/comprehensive",
      {
        method: "POST",
        message: "Comprehensive campaign completed",
        handle: (body, signal) =>
          crew.runComprehensiveCampaign(parseComprehensiveCampaignBody(body), { signal }),
      },
    ],
    [
      "/content/generate",
      {
        method: "POST",
        message: "Content generated",
        handle: (body, signal) => crew.generateContent(parseGenerateContentBody(body), { signal }),
      },
    ],
  ]);

  function resolveRoute(pathname: string): Route | undefined {
    const path = pathname.length > 1 ? pathname.replace(/\/+$/, "") : pathname;
    if (path === "/health") return routes.get("/health");
    if (basePath !== "" && !path.startsWith(`${basePath}/`)) return undefined;
    return routes.get(path.slice(basePath.length));
  }

  async function handleRequest(request: Request): Promise<Response> {
    const { pathname } = new URL(request.url);
    const route = resolveRoute(pathname);
    if (!route) {
      return failure(404, ERROR_CODES.notFound, `No route for ${pathname}`);
    }
    if (request.method !== route.method) {
      return failure(
        405,
        ERROR_CODES.methodNotAllowed,
        `${request.method} is not allowed on ${pathname}`,
      );
    }

    let body: unknown;
    if (route.method === "POST") {
      const parsed = await readJsonBody(request);
      if (!parsed.ok) {
        return failure(400, ERROR_CODES.invalidJson, "Request body is not valid JSON");
      }
      body = parsed.body;
    }

    const startTime = Date.now();
    try {
      const data = await route.handle(body, request.signal);
      logger.info("request_completed", {
        method: request.method,
        path: pathname,
        status: 200,
        durationMs: Date.now() - startTime,
      });
      return success(data, route.message);
    } catch (err: unknown) {
      const response = toErrorResponse(err);
      const level = response.status >= 500 ? "error" : "warn";
      logger[level]("request_failed", {
        method: request.method,
        path: pathname,
        status: response.status,
        error: errorMessage(err),
        durationMs: Date.now() - startTime,
      });
      return response;
    }
  }

  // ── node:http adapter ─────────────────────────────────────────────────

  async function onNodeRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort(new Error("Client disconnected"));
    });

    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    const headers = new Headers();
    for (const [name, value] of Object.entries(req.headers)) {
      if (Array.isArray(value)) {
        for (const v of value) headers.append(name, v);
      } else if (value !== undefined) {
        headers.set(name, value);
      }
    }

    const method = req.method ?? "GET";
    const request = new Request(`http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`, {
      method,
      headers,
      signal: controller.signal,
      ...(method === "GET" || method === "HEAD"
        ? {}
        : { body: Buffer.concat(chunks).toString("utf8") }),
    });

    const response = await handleRequest(request);
    res.writeHead(response.status, Object.fromEntries(response.headers));
    res.end(await response.text());
  }

  return {
    handleRequest,

    listen(port: number, host: string): Promise<number> {
      if (server !== null) {
        return Promise.reject(new Error("API server is already listening"));
      }
      const httpServer = createServer((req, res) => {
        onNodeRequest(req, res).catch((err: unknown) => {
          logger.error("request_adapter_failed", { error: errorMessage(err) });
          if (!res.headersSent) res.writeHead(500, { "Content-Type": "application/json" });
          res.end();
        });
      });
      server = httpServer;
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, host, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info("api_server_started", { host, port: bound, basePath });
          resolve(bound);
        });
      });
    },

    close(): Promise<void> {
      const current = server;
      if (current === null) return Promise.resolve();
      server = null;
      return new Promise((resolve, reject) => {
        current.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info("api_server_stopped");
          resolve();
        });
      });
    },
  };
}
