import { LRUCache } from "lru-cache";
import { z } from "zod";
import { SETTING_DEFINITIONS, destinationSettingKey, getSettingDefinition } from "@docrelay/config";
import { seal, unseal } from "@docrelay/crypto";
import { ValidationError } from "@docrelay/errors";
import { createSilentLogger, maskSecret, type Logger } from "@docrelay/logger";
import type {
  ResolvedSetting,
  RetryPolicy,
  SettingDefinition,
  SettingDiagnostic,
  SettingSource,
  SettingsRepository,
} from "@docrelay/types";
import type { InvalidationBus } from "./invalidation-bus.js";

/** A resolution as cached: sensitive database values stay sealed until read. */
interface CachedResolution {
  value: string | null;
  source: SettingSource;
  sealed: boolean;
}

export interface SettingsResolverOptions {
  repository: SettingsRepository;
  /** AES-256-GCM key that seals sensitive values at rest. */
  encryptionKey: string;
  env?: Record<string, string | undefined>;
  /** Runtime overrides; highest precedence. */
  overrides?: Record<string, string>;
  /** Bounds how long another process's writes can go unseen without a bus. Default: 30s */
  cacheTtlMs?: number;
  /** Carries database-layer invalidations to and from other processes. */
  bus?: InvalidationBus;
  logger?: Logger;
}

export type InvalidationListener = (key: string | null) => void;

const invalidationSchema = z.object({
  origin: z.string(),
  key: z.string().nullable(),
});

const CACHE_MAX_SIZE = 500;
const DEFAULT_CACHE_TTL_MS = 30_000;

/**
 * Single source of truth for runtime settings and stored secrets.
 *
 * Resolution order: runtime override > database > environment > built-in default > unset.
 */
export class SettingsResolver {
  private readonly repository: SettingsRepository;
  private readonly encryptionKey: string;
  private readonly env: Record<string, string | undefined>;
  private readonly overrides = new Map<string, string>();
  private readonly cache: LRUCache<string, CachedResolution>;
  private readonly listeners = new Set<InvalidationListener>();
  private readonly logger: Logger;
  private readonly bus?: InvalidationBus;
  private readonly origin = crypto.randomUUID();
  private generation = 0;

  constructor(options: SettingsResolverOptions) {
    this.repository = options.repository;
    this.encryptionKey = options.encryptionKey;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? createSilentLogger();
    this.bus = options.bus;
    this.cache = new LRUCache<string, CachedResolution>({
      max: CACHE_MAX_SIZE,
      ttl: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
    });
    for (const [key, value] of Object.entries(options.overrides ?? {})) {
      this.overrides.set(this.definitionFor(key).key, value);
    }
  }

  async get(key: string): Promise<ResolvedSetting> {
    const definition = this.definitionFor(key);
    const resolution = await this.resolve(definition);
    return {
      key,
      value:
        resolution.sealed && resolution.value !== null
          ? unseal(resolution.value, this.encryptionKey)
          : resolution.value,
      source: resolution.source,
      sensitive: definition.sensitive,
    };
  }

  /** The resolved value, or a ValidationError naming the unset key. */
  async require(key: string): Promise<string> {
    const { value } = await this.get(key);
    if (value === null || value === "") {
      throw new ValidationError(`Setting ${key} is not configured`, { [key]: "unset" });
    }
    return value;
  }

  async getNumber(key: string): Promise<number> {
    const raw = await this.require(key);
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Setting ${key} must be numeric, got "${raw}"`, {
        [key]: "not_a_number",
      });
    }
    return value;
  }

  async getRetryPolicy(prefix: "stage" | "delivery"): Promise<RetryPolicy> {
    const [maxAttempts, baseDelayMs, factor, maxDelayMs] = await Promise.all([
      this.getNumber(`${prefix}.max_attempts`),
      this.getNumber(`${prefix}.base_delay_ms`),
      this.getNumber(`${prefix}.backoff_factor`),
      this.getNumber(`${prefix}.max_delay_ms`),
    ]);
    return { maxAttempts, baseDelayMs, factor, maxDelayMs };
  }

  /** Resolved `destination.<ref>.<field>` values; unset fields are omitted. */
  async getDestinationFields(
    credentialRef: string,
    fields: readonly string[],
  ): Promise<Record<string, string>> {
    const resolved = await Promise.all(
      fields.map(async (field) => {
        const { value } = await this.get(destinationSettingKey(credentialRef, field));
        return [field, value] as const;
      }),
    );
    const result: Record<string, string> = {};
    for (const [field, value] of resolved) {
      if (value !== null && value !== "") {
        result[field] = value;
      }
    }
    return result;
  }

  /**
   * Persist a value at the database layer. Sensitive keys (per the catalogue, or when
   * `sensitive` is passed) are sealed before they leave the process.
   */
  async set(key: string, value: string, sensitive?: boolean): Promise<void> {
    const definition = this.definitionFor(key);
    const isSensitive = sensitive ?? definition.sensitive;

    await this.repository.upsert({
      key,
      value: isSensitive ? null : value,
      ciphertext: isSensitive ? seal(value, this.encryptionKey) : null,
      sensitive: isSensitive,
    });
    this.logger.info({ key, sensitive: isSensitive }, "setting updated");
    this.invalidate(key);
    await this.broadcast(key);
  }

  async unset(key: string): Promise<void> {
    this.definitionFor(key);
    await this.repository.delete(key);
    this.logger.info({ key }, "setting removed");
    this.invalidate(key);
    await this.broadcast(key);
  }

  setOverride(key: string, value: string | null): void {
    this.definitionFor(key);
    if (value === null) {
      this.overrides.delete(key);
    } else {
      this.overrides.set(key, value);
    }
    this.invalidate(key);
  }

  /** Every static key plus any stored `destination.*` key, sensitive values masked. */
  async diagnostics(): Promise<SettingDiagnostic[]> {
    const stored = await this.repository.list();
    const keys = new Set(SETTING_DEFINITIONS.map((definition) => definition.key));
    for (const row of stored) {
      if (getSettingDefinition(row.key)) {
        keys.add(row.key);
      }
    }

    const rows: SettingDiagnostic[] = [];
    for (const key of keys) {
      const definition = this.definitionFor(key);
      const resolved = await this.get(key);
      const sensitive = resolved.sensitive || stored.some((row) => row.key === key && row.sensitive);
      rows.push({
        ...resolved,
        sensitive,
        value: sensitive && resolved.value !== null ? maskSecret(resolved.value) : resolved.value,
        category: definition.category,
        description: definition.description,
      });
    }
    return rows;
  }

  /**
   * Apply invalidations other processes publish on the bus. Overrides are per-process
   * and are never published. Resolves to the unsubscribe function.
   */
  async listen(): Promise<() => Promise<void>> {
    if (!this.bus) {
      return async () => undefined;
    }
    return this.bus.subscribe((message) => this.receive(message));
  }

  /** Subscribe to cache invalidation; `null` means everything was dropped. */
  onInvalidate(listener: InvalidationListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  invalidate(key: string | null = null): void {
    this.generation++;
    if (key === null) {
      this.cache.clear();
    } else {
      this.cache.delete(key);
    }
    for (const listener of this.listeners) {
      listener(key);
    }
  }

  private async broadcast(key: string): Promise<void> {
    if (!this.bus) {
      return;
    }
    try {
      await this.bus.publish(JSON.stringify({ origin: this.origin, key }));
    } catch (error: unknown) {
      // The write is committed; other processes catch up when their cache entry expires.
      this.logger.warn({ key, err: error }, "settings invalidation not published");
    }
  }

  private receive(message: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(message);
    } catch (error: unknown) {
      this.logger.warn({ err: error }, "malformed settings invalidation ignored");
      return;
    }
    const parsed = invalidationSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "malformed settings invalidation ignored");
      return;
    }
    if (parsed.data.origin !== this.origin) {
      this.logger.debug({ key: parsed.data.key }, "settings invalidated by another process");
      this.invalidate(parsed.data.key);
    }
  }

  private async resolve(definition: SettingDefinition): Promise<CachedResolution> {
    const cached = this.cache.get(definition.key);
    if (cached) {
      return cached;
    }

    const generation = this.generation;
    const resolution = await this.lookup(definition);
    // A write that landed while we were reading makes this result stale.
    if (generation === this.generation) {
      this.cache.set(definition.key, resolution);
    }
    return resolution;
  }

  private async lookup(definition: SettingDefinition): Promise<CachedResolution> {
    const override = this.overrides.get(definition.key);
    if (override !== undefined) {
      return { value: override, source: "override", sealed: false };
    }

    const stored = await this.repository.get(definition.key);
    if (stored) {
      if (stored.ciphertext !== null) {
        return { value: stored.ciphertext, source: "database", sealed: true };
      }
      if (stored.value !== null) {
        return { value: stored.value, source: "database", sealed: false };
      }
    }

    const fromEnv = this.env[definition.env];
    if (fromEnv !== undefined && fromEnv !== "") {
      return { value: fromEnv, source: "environment", sealed: false };
    }

    if (definition.default !== null) {
      return { value: definition.default, source: "default", sealed: false };
    }

    return { value: null, source: "unset", sealed: false };
  }

  private definitionFor(key: string): SettingDefinition {
    const definition = getSettingDefinition(key);
    if (!definition) {
      throw new ValidationError(`Unrecognized setting key: ${key}`, { [key]: "unknown" });
    }
    return definition;
  }
}
