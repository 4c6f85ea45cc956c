import { afterEach, describe, it, expect } from "vitest";
import { getEnv, resetEnv } from "@/lib/env";
import { createLogger } from "@/lib/log/logger";

const saved = { ...process.env };

afterEach(() => {
  process.env = { ...saved };
  resetEnv();
});

describe("getEnv", () => {
  it("applies defaults for the data directories", () => {
    delete process.env.PROJECTIONS_DATA_DIR;
    delete process.env.PROJECTIONS_CACHE_DIR;
    delete process.env.PROJECTIONS_OUTPUT_DIR;
    resetEnv();
    const env = getEnv();
    expect(env.PROJECTIONS_DATA_DIR).toBe("data");
    expect(env.PROJECTIONS_CACHE_DIR).toBe("data/raw");
    expect(env.PROJECTIONS_OUTPUT_DIR).toBe("data/outputs");
  });

  it("caches until reset", () => {
    process.env.PROJECTIONS_OUTPUT_DIR = "out/a";
    resetEnv();
    expect(getEnv().PROJECTIONS_OUTPUT_DIR).toBe("out/a");
    process.env.PROJECTIONS_OUTPUT_DIR = "out/b";
    expect(getEnv().PROJECTIONS_OUTPUT_DIR).toBe("out/a");
    resetEnv();
    expect(getEnv().PROJECTIONS_OUTPUT_DIR).toBe("out/b");
  });

  it("rejects an unknown log level", () => {
    process.env.LOG_LEVEL = "loud";
    resetEnv();
    expect(() => getEnv()).toThrow(/LOG_LEVEL/);
  });
});

describe("createLogger", () => {
  it("logs with or without a payload", () => {
    const logger = createLogger("test");
    expect(() => {
      logger.info("plain message");
      logger.debug({ rows: 3 }, "with payload");
      logger.warn({ source: "teams" });
      logger.error({ err: new Error("boom") }, "failed");
    }).not.toThrow();
  });
});
