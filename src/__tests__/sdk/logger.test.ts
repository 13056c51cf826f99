import { describe, it, expect } from "vitest";
import { createLogger, isLogLevel } from "../../sdk/logger.js";

function capture(level?: "debug" | "info" | "warn" | "error" | "silent") {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    write: (line) => lines.push(line),
    now: () => new Date("2024-01-01T00:00:00.000Z"),
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("formats a line with data", () => {
    const { logger, lines } = capture();
    logger.info("hello", { a: 1 });
    expect(lines).toEqual(['[2024-01-01T00:00:00.000Z] [INFO] [linkmux] hello | {"a":1}']);
  });

  it("serializes errors by name and message", () => {
    const { logger, lines } = capture();
    logger.error("failed", new Error("boom"));
    expect(lines).toEqual([
      '[2024-01-01T00:00:00.000Z] [ERROR] [linkmux] failed | {"name":"Error","message":"boom"}',
    ]);
  });

  it("tags child loggers with their category", () => {
    const { logger, lines } = capture();
    logger.child("mux").warn("slow");
    expect(lines).toEqual(["[2024-01-01T00:00:00.000Z] [WARN] [mux] slow"]);
  });

  it("survives data JSON cannot encode", () => {
    const { logger, lines } = capture();
    const loop: { self?: unknown } = {};
    loop.self = loop;
    logger.info("cycle", loop);
    expect(lines).toEqual(["[2024-01-01T00:00:00.000Z] [INFO] [linkmux] cycle | [Unserializable data]"]);
  });

  it("drops lines below the level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(lines).toHaveLength(2);

    const silent = capture("silent");
    silent.logger.error("e");
    expect(silent.lines).toEqual([]);
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("DEBUG")).toBe(false);
    expect(isLogLevel("trace")).toBe(false);
  });
});
