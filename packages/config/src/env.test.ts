import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/test",
    DATABASE_POOL_MAX: "20",
    REDIS_URL: "redis://localhost:6379",
    ENCRYPTION_KEY: "abcdefghijklmnopqrstuvwxyz012345",
    STATE_SECRET: "a-state-secret-that-is-at-least-32-chars",
    STORAGE_DIR: "/var/lib/docrelay",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.logLevel).toBe("info");
    expect(config.database.url).toBe("postgresql://localhost:5432/test");
    expect(config.database.poolMax).toBe(20);
    expect(config.redis.url).toBe("redis://localhost:6379");
    expect(config.encryption.key).toBe("abcdefghijklmnopqrstuvwxyz012345");
    expect(config.encryption.stateSecret).toContain("a-state-secret");
    expect(config.storage.dir).toBe("/var/lib/docrelay");
  });

  it("applies worker defaults", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.worker).toEqual({
      pipelineConcurrency: 4,
      deliveryConcurrency: 8,
      visibilityTimeoutMs: 300000,
      deliveryLeaseMs: 600000,
      credentialCheckIntervalMs: 900000,
      stalledSweepIntervalMs: 60000,
    });
  });

  it("parses numeric overrides", () => {
    const config = parseEnv(makeValidEnv({ WORKER_CONCURRENCY: "2", VISIBILITY_TIMEOUT_MS: "60000" }));

    expect(config.worker.pipelineConcurrency).toBe(2);
    expect(config.worker.visibilityTimeoutMs).toBe(60000);
  });

  it("rejects non-positive concurrency", () => {
    expect(() => parseEnv(makeValidEnv({ WORKER_CONCURRENCY: "0" }))).toThrow();
  });

  it("rejects invalid DATABASE_URL", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow();
  });

  it("rejects missing DATABASE_URL", () => {
    const env: Record<string, string | undefined> = makeValidEnv();
    delete env["DATABASE_URL"];
    expect(() => parseEnv(env)).toThrow();
  });

  it("rejects ENCRYPTION_KEY that is not 32 bytes", () => {
    expect(() => parseEnv(makeValidEnv({ ENCRYPTION_KEY: "short" }))).toThrow();
  });

  it("rejects STATE_SECRET shorter than 32 characters", () => {
    expect(() => parseEnv(makeValidEnv({ STATE_SECRET: "short" }))).toThrow();
  });
});
