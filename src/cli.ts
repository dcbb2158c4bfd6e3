import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import type { RuntimeConfig } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import { ConfigurationError } from "./crew/errors.ts";
import { VERSION } from "./version.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export interface ParsedArgs {
  port: number | null;
  host: string | null;
  help: boolean;
  version: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    port: null,
    host: null,
    help: false,
    version: false,
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i]!;

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
      i++;
    } else if (arg === "--port" || arg === "-p") {
      const value = argv[i + 1];
      const port = value === undefined ? NaN : Number(value);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error("--port requires an integer between 0 and 65535");
      }
      result.port = port;
      i += 2;
    } else if (arg === "--host") {
      const value = argv[i + 1];
      if (!value || value.startsWith("-")) {
        throw new Error("--host requires a hostname or address");
      }
      result.host = value;
      i += 2;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

/** Apply command-line overrides on top of the environment configuration. */
export function applyArgs(config: RuntimeConfig, args: ParsedArgs): RuntimeConfig {
  if (args.port === null && args.host === null) return config;
  return Object.freeze({
    ...config,
    server: Object.freeze({
      ...config.server,
      port: args.port ?? config.server.port,
      host: args.host ?? config.server.host,
    }),
  });
}

// ── Help Text ──────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Marketing Crew: multi-agent marketing automation service

Usage:
  npm start                          Start the HTTP API
  npm start -- --port 9000           Listen on another port

Options:
  --port, -p <port>     Port to listen on (default: PORT or 8000)
  --host <host>         Address to bind (default: HOST or 0.0.0.0)
  --version, -v         Print the version
  --help, -h            Show this help message

Required environment:
  ANTHROPIC_API_KEY, GITHUB_TOKEN, GITHUB_REPOSITORY (owner/repo)
`.trim();

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(VERSION);
    return;
  }

  let config: RuntimeConfig;
  try {
    config = applyArgs(loadConfig(), args);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    process.exit(1);
    return;
  }

  let app;
  try {
    app = await bootstrap(config, { version: VERSION });
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      console.error(`Invalid crew configuration:\n${err.errors.map((e) => `  - ${e}`).join("\n")}`);
      process.exit(1);
      return;
    }
    throw err;
  }

  const port = await app.start();
  app.logger.info("service_listening", {
    host: config.server.host,
    port,
    basePath: config.server.basePath || "/",
  });

  // Graceful shutdown (with dedup guard)
  let signalHandled = false;
  const onSignal = (signal: string): void => {
    if (signalHandled) return;
    signalHandled = true;
    app.logger.info("shutdown_signal_received", { signal });
    app
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.logger.error("shutdown_failed", {
          error: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run only when executed as the entry point (not when imported for testing)
if (isEntryPoint()) {
  main().catch((err: unknown) => {
    console.error(
      "Fatal: Failed to start:",
      err instanceof Error ? err.message : String(err),
    );
    process.exit(1);
  });
}
