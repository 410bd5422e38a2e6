import {
  NotFoundError,
  calculateDelay,
  classifyError,
  errorMessage,
  sleep as defaultSleep,
} from "@docrelay/errors";
import {
  createAdapter as createRegisteredAdapter,
  renderTargetPath,
  type AdapterDependencies,
  type DeliveryArtifact,
  type DestinationCredential,
  type IDestinationAdapter,
  type RemoteReference,
} from "@docrelay/destinations";
import { createChildLogger, createSilentLogger, type Logger } from "@docrelay/logger";
import type { CredentialManager, SettingsResolver } from "@docrelay/settings";
import type { ArtifactStore } from "@docrelay/storage";
import type {
  DeliveryAttempt,
  DeliveryOutcome,
  DeliveryRepository,
  DestinationConfig,
  DestinationRepository,
  Document,
  DocumentRepository,
  DocumentStatus,
  RetryPolicy,
} from "@docrelay/types";
import { nextDocumentStatus } from "./document-status.js";
import { deliveredName } from "./filenames.js";
import { NO_NOTIFIER, type INotifier, type NotificationEvent } from "./notifier.js";

export interface DispatcherOptions {
  documents: DocumentRepository;
  destinations: DestinationRepository;
  deliveries: DeliveryRepository;
  store: ArtifactStore;
  settings: SettingsResolver;
  credentials: CredentialManager;
  /** How long a claimed (document, destination) pair stays locked. */
  leaseMs: number;
  adapterDependencies?: AdapterDependencies;
  createAdapter?: (destination: DestinationConfig) => IDestinationAdapter;
  /** Told when a document settles as delivered or partially delivered. */
  notifier?: INotifier;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface PreparedDelivery {
  destination: DestinationConfig;
  attempt: DeliveryAttempt;
}

const PDF_MIME = "application/pdf";

const SETTLED_EVENTS: Partial<Record<DocumentStatus, NotificationEvent>> = {
  delivered: "document.delivered",
  partially_delivered: "document.partially_delivered",
};

/**
 * Fans a converted document out to its destinations. Each (document, destination)
 * pair is claimed with a lease before its adapter runs, so a pair is uploaded by one
 * worker at a time and a succeeded pair is never uploaded again.
 */
export class Dispatcher {
  private readonly documents: DocumentRepository;
  private readonly destinations: DestinationRepository;
  private readonly deliveries: DeliveryRepository;
  private readonly store: ArtifactStore;
  private readonly settings: SettingsResolver;
  private readonly credentials: CredentialManager;
  private readonly leaseMs: number;
  private readonly adapterFor: (destination: DestinationConfig) => IDestinationAdapter;
  private readonly notifier: INotifier;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: DispatcherOptions) {
    this.documents = options.documents;
    this.destinations = options.destinations;
    this.deliveries = options.deliveries;
    this.store = options.store;
    this.settings = options.settings;
    this.credentials = options.credentials;
    this.leaseMs = options.leaseMs;
    const dependencies = options.adapterDependencies ?? {};
    this.adapterFor =
      options.createAdapter ?? ((destination) => createRegisteredAdapter(destination, dependencies));
    this.notifier = options.notifier ?? NO_NOTIFIER;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  /** Make sure every enabled destination has an attempt record; returns the unsettled ones. */
  async prepare(document: Document): Promise<PreparedDelivery[]> {
    const destinations = await this.destinations.listEnabled();
    const prepared = await Promise.all(
      destinations.map(async (destination) => ({
        destination,
        attempt: await this.deliveries.ensure(document.id, destination.id),
      })),
    );
    return prepared.filter(({ attempt }) =>
      ["pending", "in_progress", "failed_retryable"].includes(attempt.state),
    );
  }

  /**
   * Deliver to one destination. Transient failures are retried here with the
   * `delivery.*` backoff until `delivery.max_attempts` attempts have been made.
   * Returns the attempt as last stored; a pair held by another worker is returned as-is.
   */
  async deliverOne(document: Document, destination: DestinationConfig): Promise<DeliveryAttempt> {
    const log = createChildLogger(this.logger, { documentId: document.id, destinationId: destination.id });
    const [policy, timeoutMs] = await Promise.all([
      this.settings.getRetryPolicy("delivery"),
      this.settings.getNumber("delivery.timeout_ms"),
    ]);
    const existing = await this.deliveries.ensure(document.id, destination.id);

    for (;;) {
      const claimed = await this.deliveries.claim(document.id, destination.id, this.leaseMs, this.now());
      if (!claimed) {
        return (await this.deliveries.get(document.id, destination.id)) ?? existing;
      }

      const outcome = await this.attempt(document, destination, claimed, policy, timeoutMs, log);
      const completed = await this.deliveries.complete(
        document.id,
        destination.id,
        claimed.attemptCount,
        outcome,
      );
      if (!completed) {
        log.warn({ attempt: claimed.attemptCount, outcome: outcome.state }, "lease lost, result discarded");
        return (await this.deliveries.get(document.id, destination.id)) ?? claimed;
      }
      if (completed.state !== "failed_retryable") {
        return completed;
      }
      const delayMs = calculateDelay(completed.attemptCount, policy);
      log.warn(
        { attempt: completed.attemptCount, maxAttempts: policy.maxAttempts, delayMs, error: completed.lastError },
        "delivery failed, retrying",
      );
      await this.sleep(delayMs);
    }
  }

  /** Deliver to every enabled destination concurrently, then recompute the aggregate status. */
  async dispatch(document: Document): Promise<Document> {
    const destinations = await this.destinations.listEnabled();
    const results = await Promise.allSettled(
      destinations.map((destination) => this.deliverOne(document, destination)),
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error(
          { documentId: document.id, destinationId: destinations[index]?.id, err: result.reason },
          "delivery could not be recorded",
        );
      }
    });
    return this.recompute(document.id, destinations);
  }

  /**
   * Recompute the document's aggregate delivery status under its row lock. The
   * recompute that moves it into a settled status sends the notification.
   */
  async recompute(documentId: string, enabled?: DestinationConfig[]): Promise<Document> {
    const destinations = enabled ?? (await this.destinations.listEnabled());
    const enabledIds = new Set(destinations.map((destination) => destination.id));
    const seen: { previous?: DocumentStatus; attempts?: DeliveryAttempt[] } = {};
    const document = await this.documents.recomputeStatus(documentId, (locked, attempts) => {
      seen.previous = locked.status;
      seen.attempts = attempts;
      return nextDocumentStatus(locked, attempts, enabledIds);
    });

    const event = SETTLED_EVENTS[document.status];
    if (event && seen.previous !== undefined && seen.previous !== document.status) {
      await this.notifier.notify(event, {
        documentId: document.id,
        originalName: document.originalName,
        status: document.status,
        deliveries: (seen.attempts ?? [])
          .filter((attempt) => enabledIds.has(attempt.destinationId))
          .map((attempt) => ({
            destinationId: attempt.destinationId,
            state: attempt.state,
            remoteRef: attempt.remoteRef,
            error: attempt.lastError,
          })),
      });
    }
    return document;
  }

  /** Run the destination's connection test with its resolved credentials. */
  async testDestination(destination: DestinationConfig): Promise<void> {
    const adapter = this.adapterFor(destination);
    const timeoutMs = await this.settings.getNumber("delivery.timeout_ms");
    const secrets = await this.settings.getDestinationFields(destination.credentialRef, adapter.secretFields);
    const run = (accessToken: string | null) => adapter.testConnection({ secrets, accessToken }, { timeoutMs });

    if (adapter.oauthProvider) {
      await this.credentials.withAccessToken(destination.id, run);
    } else {
      await run(null);
    }
  }

  private async attempt(
    document: Document,
    destination: DestinationConfig,
    claimed: DeliveryAttempt,
    policy: RetryPolicy,
    timeoutMs: number,
    log: Logger,
  ): Promise<DeliveryOutcome> {
    try {
      const reference = await this.upload(document, destination, timeoutMs);
      log.info({ attempt: claimed.attemptCount, remoteRef: reference.ref }, "delivered");
      return { state: "succeeded", errorClass: null, error: null, remoteRef: reference.ref };
    } catch (error: unknown) {
      const errorClass = classifyError(error);
      const message = errorMessage(error);

      switch (errorClass) {
        case "transient":
          if (claimed.attemptCount < policy.maxAttempts) {
            return { state: "failed_retryable", errorClass, error: message, remoteRef: null };
          }
          log.warn({ attempt: claimed.attemptCount, err: error }, "delivery retries exhausted");
          return {
            state: "failed_terminal",
            errorClass,
            error: `${message} (gave up after ${String(claimed.attemptCount)} attempts)`,
            remoteRef: null,
          };
        case "auth_expired":
          log.warn({ err: error }, "destination needs re-authorization");
          return { state: "needs_reauth", errorClass, error: message, remoteRef: null };
        default:
          if (errorClass === "internal") {
            log.error({ err: error }, "delivery failed unexpectedly");
          } else {
            log.warn({ err: error, errorClass }, "delivery failed permanently");
          }
          return { state: "failed_terminal", errorClass, error: message, remoteRef: null };
      }
    }
  }

  private async upload(
    document: Document,
    destination: DestinationConfig,
    timeoutMs: number,
  ): Promise<RemoteReference> {
    if (!document.canonicalKey) {
      throw new NotFoundError(`Document ${document.id} has no canonical PDF`);
    }
    const adapter = this.adapterFor(destination);
    const filename = deliveredName(document.originalName);
    const target = renderTargetPath(destination.targetPathTemplate, {
      documentId: document.id,
      filename,
      metadata: document.metadata,
      createdAt: document.createdAt,
    });

    const [bytes, secrets] = await Promise.all([
      this.store.get(document.canonicalKey),
      this.settings.getDestinationFields(destination.credentialRef, adapter.secretFields),
    ]);
    const artifact: DeliveryArtifact = {
      documentId: document.id,
      filename,
      bytes,
      mimeType: PDF_MIME,
      metadata: document.metadata,
    };
    const deliver = (accessToken: string | null) => {
      const credential: DestinationCredential = { secrets, accessToken };
      return adapter.deliver(artifact, target.path, credential, { timeoutMs });
    };

    return adapter.oauthProvider
      ? this.credentials.withAccessToken(destination.id, deliver)
      : deliver(null);
  }
}
