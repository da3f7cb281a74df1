import { afterEach, describe, expect, it, vi } from "vitest";

import { loggerFactory } from "./index.mjs";

import type { DestinationStream } from "pino";

const collect = () => {
  const lines: Record<string, unknown>[] = [];
  const destination: DestinationStream = {
    write(message: string) {
      const record: Record<string, unknown> = JSON.parse(message);
      lines.push(record);
    },
  };
  return { lines, destination };
};

describe("loggerFactory", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should have all logger methods defined", () => {
    const { logger } = loggerFactory({});
    expect(logger.trace).toBeDefined();
    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
    expect(logger.fatal).toBeDefined();
  });

  it("should write message and metadata as one record", () => {
    const { lines, destination } = collect();
    const { logger } = loggerFactory({}, destination);

    logger.info("test message", { key: "value" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "test message",
      key: "value",
    });
  });

  it("should record errors under err", () => {
    const { lines, destination } = collect();
    const { logger } = loggerFactory({}, destination);

    logger.error(new Error("boom"), { attempt: 2 });

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "boom",
      attempt: 2,
      err: { type: "Error", message: "boom" },
    });
  });

  it("should drop records below the configured level", () => {
    const { lines, destination } = collect();
    const { logger } = loggerFactory({ level: "warn" }, destination);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(lines.map((line) => line.msg)).toEqual(["shown"]);
  });

  it("should take the level from LOG_LEVEL when none is given", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const { pinoLogger } = loggerFactory();
    expect(pinoLogger.level).toBe("debug");
  });

  it("should prefer the configured level over LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const { pinoLogger } = loggerFactory({ level: "error" });
    expect(pinoLogger.level).toBe("error");
  });
});
