import { beforeEach, describe, expect, it } from "vitest";
import {
  BufferLogger,
  DEFAULT_LOGGER_CONFIG,
  NULL_LOGGER,
  createLogger,
} from "../logger.ts";
import type { Logger } from "../logger.ts";

// ── BufferLogger Tests ──────────────────────────────────────────────────────

describe("BufferLogger", () => {
  let logger: BufferLogger;

  beforeEach(() => {
    logger = new BufferLogger();
  });

  it("records entries at all log levels", () => {
    logger.trace("trace message");
    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");
    logger.fatal("fatal message");
    expect(logger.entries.map((e) => [e.level, e.msg])).toEqual([
      ["trace", "trace message"],
      ["debug", "debug message"],
      ["info", "info message"],
      ["warn", "warn message"],
      ["error", "error message"],
      ["fatal", "fatal message"],
    ]);
  });

  it("stores timestamp on each entry", () => {
    const before = new Date().toISOString();
    logger.info("test");
    const after = new Date().toISOString();
    const timestamp = logger.entries[0]?.timestamp ?? "";
    expect(timestamp >= before).toBe(true);
    expect(timestamp <= after).toBe(true);
  });

  it("stores data payload on entries", () => {
    logger.info("crew_kickoff_started", { processMode: "sequential", taskCount: 2 });
    expect(logger.entries[0]?.data).toEqual({ processMode: "sequential", taskCount: 2 });
  });

  it("leaves data undefined when none is given", () => {
    logger.info("no data");
    logger.info("undefined data", undefined);
    expect(logger.entries.map((e) => e.data)).toEqual([undefined, undefined]);
  });

  describe("child()", () => {
    it("merges bindings into every entry", () => {
      const child = logger.child({ module: "crew" });
      child.info("test", { taskId: "task-1" });
      expect(logger.entries[0]?.data).toEqual({ module: "crew", taskId: "task-1" });
    });

    it("shares entries with the parent both ways", () => {
      const child = logger.child({ module: "crew" });
      child.info("from child");
      logger.info("from parent");
      expect(child.entries.map((e) => e.msg)).toEqual(["from child", "from parent"]);
      expect(logger.entries).toBe(child.entries);
    });

    it("merges all ancestor bindings", () => {
      const grandchild = logger.child({ module: "agent-runner" }).child({ taskId: "task-1" });
      grandchild.info("deep message", { extra: true });
      expect(logger.entries[0]?.data).toEqual({
        module: "agent-runner",
        taskId: "task-1",
        extra: true,
      });
    });

    it("keeps data undefined for empty bindings", () => {
      logger.child({}).info("test");
      expect(logger.entries[0]?.data).toBeUndefined();
    });

    it("lets entry data override a binding with the same key", () => {
      logger.child({ module: "parent-mod" }).info("test", { module: "overridden" });
      expect(logger.entries[0]?.data).toEqual({ module: "overridden" });
    });
  });

  describe("clear()", () => {
    it("removes entries for parent and children", () => {
      const child = logger.child({ module: "test" });
      child.info("a");
      logger.info("b");
      logger.clear();
      expect(logger.entries).toHaveLength(0);
      expect(child.entries).toHaveLength(0);
    });
  });

  describe("getByLevel()", () => {
    it("filters entries by level", () => {
      logger.info("info 1");
      logger.warn("warn 1");
      logger.info("info 2");
      logger.error("error 1");
      expect(logger.getByLevel("info").map((e) => e.msg)).toEqual(["info 1", "info 2"]);
      expect(logger.getByLevel("fatal")).toEqual([]);
    });
  });

  describe("has()", () => {
    it("matches level and message substring", () => {
      logger.info("tool_retry scheduled");
      expect(logger.has("info", "tool_retry")).toBe(true);
      expect(logger.has("warn", "tool_retry")).toBe(false);
      expect(logger.has("info", "tool_failed")).toBe(false);
    });

    it("returns false on empty logger", () => {
      expect(logger.has("info", "anything")).toBe(false);
    });
  });
});

// ── NULL_LOGGER ─────────────────────────────────────────────────────────────

describe("NULL_LOGGER", () => {
  it("discards everything and returns itself as child", () => {
    NULL_LOGGER.info("ignored", { a: 1 });
    expect(NULL_LOGGER.child({ module: "x" })).toBe(NULL_LOGGER);
  });
});

// ── createLogger Tests ──────────────────────────────────────────────────────

describe("createLogger", () => {
  it("implements the Logger interface", () => {
    const logger: Logger = createLogger({ level: "silent" });
    for (const method of ["trace", "debug", "info", "warn", "error", "fatal", "child"] as const) {
      expect(typeof logger[method]).toBe("function");
    }
  });

  it("returns children that are loggers too", () => {
    const child = createLogger({ level: "silent" }).child({ module: "test" });
    expect(typeof child.info).toBe("function");
    expect(typeof child.child).toBe("function");
  });

  it("logs with and without data at silent level", () => {
    const logger = createLogger({ level: "silent", base: { service: "marketing-crew" } });
    expect(() => {
      logger.info("test", { key: "value", token: "test-token" });
      logger.error("err", { code: 500, nested: { a: 1 } });
      logger.fatal("f");
    }).not.toThrow();
  });
});

// ── DEFAULT_LOGGER_CONFIG Tests ─────────────────────────────────────────────

describe("DEFAULT_LOGGER_CONFIG", () => {
  it("logs JSON at info without base bindings", () => {
    expect(DEFAULT_LOGGER_CONFIG).toEqual({ level: "info", format: "json" });
  });
});
