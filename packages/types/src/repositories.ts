import type { Document, DocumentPatch, DocumentStatus, NewDocument } from "./document.js";
import type { DestinationConfig, NewDestination } from "./destination.js";
import type { DeliveryAttempt, DeliveryOutcome } from "./delivery.js";
import type { StoredSetting } from "./setting.js";
import type { CredentialToken, OAuthState } from "./credential.js";

export interface DocumentRepository {
  create(input: NewDocument): Promise<Document>;
  get(id: string): Promise<Document | null>;
  update(id: string, patch: DocumentPatch): Promise<Document>;
  /**
   * Compare-and-set status change. Returns null when the document is not in one of
   * `from`, leaving it untouched.
   */
  transition(
    id: string,
    from: readonly DocumentStatus[],
    to: DocumentStatus,
    patch?: DocumentPatch,
  ): Promise<Document | null>;
  /**
   * Recompute the status from the document's delivery attempts while holding the
   * document row, so concurrent deliveries cannot overwrite each other's result.
   */
  recomputeStatus(
    id: string,
    compute: (document: Document, attempts: DeliveryAttempt[]) => DocumentStatus,
  ): Promise<Document>;
  /** Uncancelled documents in one of `statuses` last written before `updatedBefore`, oldest first. */
  listStalled(statuses: readonly DocumentStatus[], updatedBefore: Date, limit: number): Promise<Document[]>;
}

export interface DestinationRepository {
  get(id: string): Promise<DestinationConfig | null>;
  list(): Promise<DestinationConfig[]>;
  listEnabled(): Promise<DestinationConfig[]>;
  save(destination: NewDestination): Promise<DestinationConfig>;
}

export interface DeliveryRepository {
  get(documentId: string, destinationId: string): Promise<DeliveryAttempt | null>;
  listForDocument(documentId: string): Promise<DeliveryAttempt[]>;
  /** Insert a `pending` attempt unless one already exists for the pair. */
  ensure(documentId: string, destinationId: string): Promise<DeliveryAttempt>;
  /**
   * Take the per-pair execution lock: moves the attempt to `in_progress` and bumps
   * `attemptCount` if it is `pending`, `failed_retryable`, or `in_progress` with an
   * expired lease. Returns null when another worker holds it or it is settled.
   */
  claim(
    documentId: string,
    destinationId: string,
    leaseMs: number,
    now: Date,
  ): Promise<DeliveryAttempt | null>;
  /**
   * Release the lock with the attempt's outcome. `attemptCount` is the value the claim
   * returned and fences the write: when the pair is no longer `in_progress` under that
   * count (the lease ran out and another worker took it), nothing is written and null
   * is returned.
   */
  complete(
    documentId: string,
    destinationId: string,
    attemptCount: number,
    outcome: DeliveryOutcome,
  ): Promise<DeliveryAttempt | null>;
  /** Move a destination's `needs_reauth` attempts back to `pending`; returns the reopened ones. */
  reopenForDestination(destinationId: string): Promise<DeliveryAttempt[]>;
}

export interface SettingsRepository {
  get(key: string): Promise<StoredSetting | null>;
  list(): Promise<StoredSetting[]>;
  upsert(setting: Omit<StoredSetting, "updatedAt">): Promise<StoredSetting>;
  delete(key: string): Promise<void>;
}

export interface CredentialRepository {
  get(destinationId: string): Promise<CredentialToken | null>;
  list(): Promise<CredentialToken[]>;
  save(token: Omit<CredentialToken, "updatedAt">): Promise<CredentialToken>;
  saveState(state: OAuthState): Promise<void>;
  /** Delete and return the state in one step; null when unknown. */
  consumeState(token: string): Promise<OAuthState | null>;
}

export interface Repositories {
  documents: DocumentRepository;
  destinations: DestinationRepository;
  deliveries: DeliveryRepository;
  settings: SettingsRepository;
  credentials: CredentialRepository;
  /** Run `fn` against repositories that commit or roll back together. */
  transaction<T>(fn: (repositories: Repositories) => Promise<T>): Promise<T>;
}
