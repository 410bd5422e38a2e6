export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  encryption: EncryptionConfig;
  storage: StorageConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface EncryptionConfig {
  /** 32-byte AES-256-GCM key for secrets at rest. */
  key: string;
  /** HMAC secret for OAuth correlation tokens. */
  stateSecret: string;
}

export interface StorageConfig {
  dir: string;
}

export interface WorkerConfig {
  pipelineConcurrency: number;
  deliveryConcurrency: number;
  /** How long a picked-up task may run before it is considered stalled and requeued. */
  visibilityTimeoutMs: number;
  /** Lease held on a (document, destination) pair while an upload is in flight. */
  deliveryLeaseMs: number;
  credentialCheckIntervalMs: number;
  /** How often to look for documents whose next stage was never queued. */
  stalledSweepIntervalMs: number;
}

/** Bounded exponential backoff: delay = min(maxDelayMs, baseDelayMs * factor^(attempt-1)). */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}
