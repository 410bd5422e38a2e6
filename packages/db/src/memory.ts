import { NotFoundError } from "@docrelay/errors";
import type {
  CredentialRepository,
  CredentialToken,
  DeliveryAttempt,
  DeliveryOutcome,
  DeliveryRepository,
  DestinationConfig,
  DestinationRepository,
  Document,
  DocumentPatch,
  DocumentRepository,
  DocumentStatus,
  NewDestination,
  NewDocument,
  OAuthState,
  Repositories,
  SettingsRepository,
  StoredSetting,
} from "@docrelay/types";

/**
 * In-process repositories with the same contracts as the drizzle ones. Every read
 * returns a copy so callers cannot mutate stored state behind the repository's back.
 */

export class MemoryDocumentRepository implements DocumentRepository {
  private readonly rows = new Map<string, Document>();

  constructor(private readonly deliveries: MemoryDeliveryRepository) {}

  async create(input: NewDocument): Promise<Document> {
    const now = new Date();
    const document: Document = {
      ...input,
      id: crypto.randomUUID(),
      canonicalKey: null,
      status: "received",
      failureReason: null,
      metadata: null,
      extractionErrors: [],
      cancelledAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(document.id, document);
    return structuredClone(document);
  }

  async get(id: string): Promise<Document | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async update(id: string, patch: DocumentPatch): Promise<Document> {
    const row = this.require(id);
    const next: Document = { ...row, ...structuredClone(patch), updatedAt: new Date() };
    this.rows.set(id, next);
    return structuredClone(next);
  }

  async transition(
    id: string,
    from: readonly DocumentStatus[],
    to: DocumentStatus,
    patch: DocumentPatch = {},
  ): Promise<Document | null> {
    const row = this.rows.get(id);
    if (!row || !from.includes(row.status)) {
      return null;
    }
    return this.update(id, { ...patch, status: to });
  }

  async recomputeStatus(
    id: string,
    compute: (document: Document, attempts: DeliveryAttempt[]) => DocumentStatus,
  ): Promise<Document> {
    const row = this.require(id);
    const attempts = await this.deliveries.listForDocument(id);
    const status = compute(structuredClone(row), attempts);
    return status === row.status ? structuredClone(row) : this.update(id, { status });
  }

  async listStalled(
    statuses: readonly DocumentStatus[],
    updatedBefore: Date,
    limit: number,
  ): Promise<Document[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          statuses.includes(row.status) && row.updatedAt < updatedBefore && row.cancelledAt === null,
      )
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map((row) => structuredClone(row));
  }

  private require(id: string): Document {
    const row = this.rows.get(id);
    if (!row) {
      throw new NotFoundError(`Document ${id} not found`, { details: { documentId: id } });
    }
    return row;
  }
}

export class MemoryDestinationRepository implements DestinationRepository {
  private readonly rows = new Map<string, DestinationConfig>();

  async get(id: string): Promise<DestinationConfig | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async list(): Promise<DestinationConfig[]> {
    return [...this.rows.values()].map((row) => structuredClone(row));
  }

  async listEnabled(): Promise<DestinationConfig[]> {
    return (await this.list()).filter((row) => row.enabled);
  }

  async save(destination: NewDestination): Promise<DestinationConfig> {
    const now = new Date();
    const id = destination.id ?? crypto.randomUUID();
    const existing = this.rows.get(id);
    const row: DestinationConfig = {
      ...structuredClone(destination),
      id,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.rows.set(id, row);
    return structuredClone(row);
  }
}

export class MemoryDeliveryRepository implements DeliveryRepository {
  private readonly rows = new Map<string, DeliveryAttempt>();

  async get(documentId: string, destinationId: string): Promise<DeliveryAttempt | null> {
    const row = this.rows.get(pairKey(documentId, destinationId));
    return row ? { ...row } : null;
  }

  async listForDocument(documentId: string): Promise<DeliveryAttempt[]> {
    return [...this.rows.values()]
      .filter((row) => row.documentId === documentId)
      .map((row) => ({ ...row }));
  }

  async ensure(documentId: string, destinationId: string): Promise<DeliveryAttempt> {
    const key = pairKey(documentId, destinationId);
    const existing = this.rows.get(key);
    if (existing) {
      return { ...existing };
    }

    const now = new Date();
    const row: DeliveryAttempt = {
      documentId,
      destinationId,
      state: "pending",
      attemptCount: 0,
      lastErrorClass: null,
      lastError: null,
      remoteRef: null,
      leaseExpiresAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(key, row);
    return { ...row };
  }

  async claim(
    documentId: string,
    destinationId: string,
    leaseMs: number,
    now: Date,
  ): Promise<DeliveryAttempt | null> {
    const key = pairKey(documentId, destinationId);
    const row = this.rows.get(key);
    if (!row) {
      return null;
    }

    const leaseExpired =
      row.state === "in_progress" &&
      row.leaseExpiresAt !== null &&
      row.leaseExpiresAt.getTime() < now.getTime();
    if (row.state !== "pending" && row.state !== "failed_retryable" && !leaseExpired) {
      return null;
    }

    const claimed: DeliveryAttempt = {
      ...row,
      state: "in_progress",
      attemptCount: row.attemptCount + 1,
      leaseExpiresAt: new Date(now.getTime() + leaseMs),
      updatedAt: now,
    };
    this.rows.set(key, claimed);
    return { ...claimed };
  }

  async complete(
    documentId: string,
    destinationId: string,
    attemptCount: number,
    outcome: DeliveryOutcome,
  ): Promise<DeliveryAttempt | null> {
    const key = pairKey(documentId, destinationId);
    const row = this.rows.get(key);
    if (!row || row.state !== "in_progress" || row.attemptCount !== attemptCount) {
      return null;
    }

    const completed: DeliveryAttempt = {
      ...row,
      state: outcome.state,
      lastErrorClass: outcome.errorClass,
      lastError: outcome.error,
      remoteRef: outcome.remoteRef,
      leaseExpiresAt: null,
      updatedAt: new Date(),
    };
    this.rows.set(key, completed);
    return { ...completed };
  }

  async reopenForDestination(destinationId: string): Promise<DeliveryAttempt[]> {
    const reopened: DeliveryAttempt[] = [];
    for (const [key, row] of this.rows) {
      if (row.destinationId === destinationId && row.state === "needs_reauth") {
        const next: DeliveryAttempt = {
          ...row,
          state: "pending",
          leaseExpiresAt: null,
          updatedAt: new Date(),
        };
        this.rows.set(key, next);
        reopened.push({ ...next });
      }
    }
    return reopened;
  }
}

export class MemorySettingsRepository implements SettingsRepository {
  private readonly rows = new Map<string, StoredSetting>();

  async get(key: string): Promise<StoredSetting | null> {
    const row = this.rows.get(key);
    return row ? { ...row } : null;
  }

  async list(): Promise<StoredSetting[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((row) => ({ ...row }));
  }

  async upsert(setting: Omit<StoredSetting, "updatedAt">): Promise<StoredSetting> {
    const row: StoredSetting = { ...setting, updatedAt: new Date() };
    this.rows.set(setting.key, row);
    return { ...row };
  }

  async delete(key: string): Promise<void> {
    this.rows.delete(key);
  }
}

export class MemoryCredentialRepository implements CredentialRepository {
  private readonly tokens = new Map<string, CredentialToken>();
  private readonly states = new Map<string, OAuthState>();

  async get(destinationId: string): Promise<CredentialToken | null> {
    const row = this.tokens.get(destinationId);
    return row ? { ...row } : null;
  }

  async list(): Promise<CredentialToken[]> {
    return [...this.tokens.values()].map((row) => ({ ...row }));
  }

  async save(token: Omit<CredentialToken, "updatedAt">): Promise<CredentialToken> {
    const row: CredentialToken = { ...token, updatedAt: new Date() };
    this.tokens.set(token.destinationId, row);
    return { ...row };
  }

  async saveState(state: OAuthState): Promise<void> {
    this.states.set(state.token, { ...state });
  }

  async consumeState(token: string): Promise<OAuthState | null> {
    const state = this.states.get(token);
    if (!state) {
      return null;
    }
    this.states.delete(token);
    return state;
  }
}

function pairKey(documentId: string, destinationId: string): string {
  return `${documentId}/${destinationId}`;
}

export interface MemoryRepositories extends Repositories {
  documents: MemoryDocumentRepository;
  destinations: MemoryDestinationRepository;
  deliveries: MemoryDeliveryRepository;
  settings: MemorySettingsRepository;
  credentials: MemoryCredentialRepository;
}

/** Transactions run inline: there is no rollback, which tests do not rely on. */
export function createMemoryRepositories(): MemoryRepositories {
  const deliveries = new MemoryDeliveryRepository();
  const repositories: MemoryRepositories = {
    documents: new MemoryDocumentRepository(deliveries),
    destinations: new MemoryDestinationRepository(),
    deliveries,
    settings: new MemorySettingsRepository(),
    credentials: new MemoryCredentialRepository(),
    transaction: <T>(fn: (scoped: Repositories) => Promise<T>): Promise<T> => fn(repositories),
  };
  return repositories;
}
