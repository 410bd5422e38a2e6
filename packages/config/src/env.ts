import { z } from "zod";
import type { AppConfig } from "@docrelay/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for the bootstrap environment: everything a process needs before it can
 * reach the database. Runtime-tunable values live in the settings catalogue instead.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Database ----------
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL is required")
    .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
      message: "DATABASE_URL must start with postgresql://",
    }),
  DATABASE_POOL_MAX: positiveInt("10"),

  // ---------- Redis ----------
  REDIS_URL: z.string().min(1, "REDIS_URL is required"),

  // ---------- Secrets ----------
  ENCRYPTION_KEY: z
    .string()
    .refine((key) => Buffer.byteLength(key, "utf-8") === 32, {
      message: "ENCRYPTION_KEY must be exactly 32 bytes",
    }),
  STATE_SECRET: z.string().min(32, "STATE_SECRET must be at least 32 characters"),

  // ---------- Storage ----------
  STORAGE_DIR: z.string().min(1).default("./data/artifacts"),

  // ---------- Workers ----------
  WORKER_CONCURRENCY: positiveInt("4"),
  DELIVERY_CONCURRENCY: positiveInt("8"),
  VISIBILITY_TIMEOUT_MS: positiveInt("300000"),
  DELIVERY_LEASE_MS: positiveInt("600000"),
  CREDENTIAL_CHECK_INTERVAL_MS: positiveInt("900000"),
  STALLED_SWEEP_INTERVAL_MS: positiveInt("60000"),
});

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    encryption: {
      key: parsed.ENCRYPTION_KEY,
      stateSecret: parsed.STATE_SECRET,
    },

    storage: {
      dir: parsed.STORAGE_DIR,
    },

    worker: {
      pipelineConcurrency: parsed.WORKER_CONCURRENCY,
      deliveryConcurrency: parsed.DELIVERY_CONCURRENCY,
      visibilityTimeoutMs: parsed.VISIBILITY_TIMEOUT_MS,
      deliveryLeaseMs: parsed.DELIVERY_LEASE_MS,
      credentialCheckIntervalMs: parsed.CREDENTIAL_CHECK_INTERVAL_MS,
      stalledSweepIntervalMs: parsed.STALLED_SWEEP_INTERVAL_MS,
    },
  };
}
