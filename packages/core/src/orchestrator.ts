import { NotFoundError, classifyError, errorMessage } from "@docrelay/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docrelay/logger";
import type { AuthorizationResult, CredentialManager, SettingsResolver } from "@docrelay/settings";
import type { ArtifactStore } from "@docrelay/storage";
import type {
  DeliveryAttempt,
  DeliveryRepository,
  DeliveryTask,
  DestinationRepository,
  Document,
  DocumentFailureReason,
  DocumentRepository,
  DocumentStatus,
  PipelineStage,
  StageResult,
  StageTask,
  TaskQueue,
} from "@docrelay/types";
import type { ConversionStage } from "./conversion-stage.js";
import type { Dispatcher } from "./dispatcher.js";
import type { ExtractionStage } from "./extraction-stage.js";
import { NO_NOTIFIER, type INotifier } from "./notifier.js";

export interface OrchestratorOptions {
  documents: DocumentRepository;
  destinations: DestinationRepository;
  deliveries: DeliveryRepository;
  store: ArtifactStore;
  queue: TaskQueue;
  conversion: ConversionStage;
  extraction: ExtractionStage;
  dispatcher: Dispatcher;
  settings: SettingsResolver;
  credentials: CredentialManager;
  /** Told about failed documents and failed credential checks. */
  notifier?: INotifier;
  logger?: Logger;
  now?: () => Date;
}

export interface CredentialCheckResult {
  refreshed: string[];
  expired: string[];
  failed: string[];
  /** Destinations whose connection test failed, keyed by id. */
  unhealthy: Record<string, string>;
}

/** Statuses in which each stage may run. */
const STAGE_STATUSES: Record<PipelineStage, readonly DocumentStatus[]> = {
  convert: ["received", "converting"],
  extract: ["extracting"],
  dispatch: ["delivering"],
};

const PIPELINE_ORDER: readonly DocumentStatus[] = ["received", "converting", "extracting", "delivering"];

/** The stage a document in this status is waiting for. */
const PENDING_STAGE: Partial<Record<DocumentStatus, PipelineStage>> = {
  received: "convert",
  converting: "convert",
  extracting: "extract",
  delivering: "dispatch",
};

const STALLED_SWEEP_LIMIT = 100;

const success: StageResult = { outcome: "success" };

function skipped(reason: string): StageResult {
  return { outcome: "skipped", reason };
}

/**
 * Drives a document through convert → extract → dispatch. Each stage is a queued
 * task; the handlers here are idempotent, so a task that runs twice (at-least-once
 * delivery, a crashed worker) does no duplicate work.
 */
export class Orchestrator {
  private readonly documents: DocumentRepository;
  private readonly destinations: DestinationRepository;
  private readonly deliveries: DeliveryRepository;
  private readonly store: ArtifactStore;
  private readonly queue: TaskQueue;
  private readonly conversion: ConversionStage;
  private readonly extraction: ExtractionStage;
  private readonly dispatcher: Dispatcher;
  private readonly settings: SettingsResolver;
  private readonly credentials: CredentialManager;
  private readonly notifier: INotifier;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.documents = options.documents;
    this.destinations = options.destinations;
    this.deliveries = options.deliveries;
    this.store = options.store;
    this.queue = options.queue;
    this.conversion = options.conversion;
    this.extraction = options.extraction;
    this.dispatcher = options.dispatcher;
    this.settings = options.settings;
    this.credentials = options.credentials;
    this.notifier = options.notifier ?? NO_NOTIFIER;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /** Queue the first stage for a freshly ingested document. */
  async start(documentId: string): Promise<void> {
    await this.queue.enqueueStage({ documentId, stage: "convert" });
  }

  async handleStage(task: StageTask): Promise<StageResult> {
    const log = createChildLogger(this.logger, {
      documentId: task.documentId,
      stage: task.stage,
      attempt: task.attemptNumber,
    });
    const document = await this.documents.get(task.documentId);
    if (!document) {
      return { outcome: "terminal", error: `Document ${task.documentId} not found` };
    }
    if (document.cancelledAt) {
      log.info("document cancelled, stage skipped");
      return skipped("cancelled");
    }
    if (document.status === "failed") {
      return skipped("document failed");
    }

    const allowed = STAGE_STATUSES[task.stage];
    if (!allowed.includes(document.status)) {
      if (this.isPast(document.status, task.stage)) {
        // A duplicate of a stage that already finished; make sure the pipeline moved on.
        await this.enqueuePending(document);
        return skipped(`already ${document.status}`);
      }
      return skipped(`not ready: ${document.status}`);
    }

    switch (task.stage) {
      case "convert":
        return this.convert(document, log);
      case "extract":
        return this.extract(document, task, log);
      case "dispatch":
        return this.dispatch(document, log);
    }
  }

  async handleDelivery(task: DeliveryTask): Promise<StageResult> {
    const log = createChildLogger(this.logger, {
      documentId: task.documentId,
      destinationId: task.destinationId,
      attempt: task.attemptNumber,
    });
    const [document, destination] = await Promise.all([
      this.documents.get(task.documentId),
      this.destinations.get(task.destinationId),
    ]);
    if (!document) {
      return { outcome: "terminal", error: `Document ${task.documentId} not found` };
    }
    if (document.cancelledAt) {
      return skipped("cancelled");
    }
    if (!destination || !destination.enabled) {
      await this.dispatcher.recompute(document.id);
      return skipped("destination disabled");
    }

    try {
      const attempt = await this.dispatcher.deliverOne(document, destination);
      const updated = await this.dispatcher.recompute(document.id);
      log.debug({ state: attempt.state, documentStatus: updated.status }, "delivery task finished");

      switch (attempt.state) {
        case "succeeded":
          return success;
        case "failed_terminal":
          return { outcome: "terminal", error: attempt.lastError ?? "delivery failed" };
        case "needs_reauth":
          return skipped("needs re-authorization");
        default:
          return skipped(`held elsewhere: ${attempt.state}`);
      }
    } catch (error: unknown) {
      return this.retryOrGiveUp(task, error, log);
    }
  }

  /** Stop further stages for a document. Deliveries already in flight finish. */
  async cancel(documentId: string): Promise<Document> {
    const document = await this.documents.get(documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`, { details: { documentId } });
    }
    if (document.cancelledAt) {
      return document;
    }
    const cancelled = await this.documents.update(documentId, { cancelledAt: this.now() });
    this.logger.info({ documentId, status: cancelled.status }, "document cancelled");
    return cancelled;
  }

  /** Re-queue a destination's `needs_reauth` deliveries, e.g. after its credentials were fixed. */
  async resumeDestination(destinationId: string): Promise<DeliveryAttempt[]> {
    const destination = await this.destinations.get(destinationId);
    if (!destination) {
      throw new NotFoundError(`Destination ${destinationId} not found`, { details: { destinationId } });
    }
    const reopened = await this.deliveries.reopenForDestination(destinationId);
    this.logger.info({ destinationId, reopened: reopened.length }, "destination resumed");
    await this.enqueueReopened(reopened);
    return reopened;
  }

  /** Finish an OAuth grant and re-queue the deliveries that were waiting on it. */
  async completeAuthorization(state: string, code: string): Promise<AuthorizationResult> {
    const result = await this.credentials.completeAuthorization(state, code);
    await this.enqueueReopened(result.reopened);
    return result;
  }

  /**
   * Periodic credential sweep: refresh tokens that are about to expire, then run the
   * connection test of every enabled destination.
   */
  async checkCredentials(): Promise<CredentialCheckResult> {
    const sweep = await this.credentials.refreshExpiring();
    const unhealthy: Record<string, string> = {};

    const destinations = await this.destinations.listEnabled();
    const results = await Promise.allSettled(
      destinations.map((destination) => this.dispatcher.testDestination(destination)),
    );
    results.forEach((result, index) => {
      const destination = destinations[index];
      if (result.status === "rejected" && destination) {
        unhealthy[destination.id] = errorMessage(result.reason);
        this.logger.warn(
          { destinationId: destination.id, errorClass: classifyError(result.reason), err: result.reason },
          "destination connection test failed",
        );
      }
    });

    this.logger.info(
      {
        refreshed: sweep.refreshed.length,
        expired: sweep.expired.length,
        failed: sweep.failed.length,
        unhealthy: Object.keys(unhealthy).length,
      },
      "credential check finished",
    );

    const problems: Array<[string, string]> = [
      ...sweep.expired.map((id): [string, string] => [id, "expired"]),
      ...sweep.failed.map((id): [string, string] => [id, "refresh_failed"]),
      ...Object.entries(unhealthy),
    ];
    for (const [destinationId, error] of problems) {
      await this.notifier.notify("credential.failed", { destinationId, error });
    }
    return { ...sweep, unhealthy };
  }

  /**
   * Re-queue the pending stage of every document that has sat in a pipeline status
   * for longer than `olderThanMs`, e.g. because a worker died between committing a
   * status and queueing the next stage. Returns the ids of the resumed documents.
   */
  async resumeStalled(olderThanMs: number, limit = STALLED_SWEEP_LIMIT): Promise<string[]> {
    const now = this.now();
    const stalled = await this.documents.listStalled(
      PIPELINE_ORDER,
      new Date(now.getTime() - olderThanMs),
      limit,
    );
    const resumed: string[] = [];
    for (const document of stalled) {
      const stage = PENDING_STAGE[document.status];
      if (!stage) continue;
      await this.queue.enqueueStage({ documentId: document.id, stage, resumedAt: now.getTime() });
      resumed.push(document.id);
      this.logger.warn({ documentId: document.id, status: document.status, stage }, "stalled document resumed");
    }
    if (resumed.length > 0) {
      this.logger.info({ resumed: resumed.length }, "stalled sweep finished");
    }
    return resumed;
  }

  private async convert(document: Document, log: Logger): Promise<StageResult> {
    const converting =
      document.status === "received"
        ? await this.documents.transition(document.id, ["received"], "converting")
        : document;
    if (!converting) {
      return skipped("claimed by another worker");
    }

    try {
      await this.conversion.run(converting);
    } catch (error: unknown) {
      // The stage already retried under the stage policy.
      log.error({ err: error, errorClass: classifyError(error) }, "conversion failed");
      await this.fail(document.id, "converting", "conversion_failed", errorMessage(error));
      return { outcome: "terminal", error: errorMessage(error) };
    }

    return this.advance(document.id, "converting", "extracting", "extract", log);
  }

  private async extract(document: Document, task: StageTask, log: Logger): Promise<StageResult> {
    try {
      await this.extraction.run(document);
    } catch (error: unknown) {
      if (error instanceof NotFoundError) {
        return this.failArtifactMissing(document.id, "extracting", log);
      }
      if (await this.mayRetry(task)) {
        log.warn({ err: error }, "extraction failed, will retry");
        return { outcome: "retryable", error: errorMessage(error) };
      }
      // Metadata is optional for delivery.
      log.error({ err: error }, "extraction failed, delivering without metadata");
    }

    return this.advance(document.id, "extracting", "delivering", "dispatch", log);
  }

  private async dispatch(document: Document, log: Logger): Promise<StageResult> {
    if (!document.canonicalKey || !(await this.store.exists(document.canonicalKey))) {
      return this.failArtifactMissing(document.id, "delivering", log);
    }

    const prepared = await this.dispatcher.prepare(document);
    for (const { destination, attempt } of prepared) {
      await this.queue.enqueueDelivery({
        documentId: document.id,
        destinationId: destination.id,
        round: attempt.attemptCount,
      });
    }
    const updated = await this.dispatcher.recompute(document.id);
    log.info({ deliveries: prepared.length, status: updated.status }, "deliveries queued");
    return success;
  }

  /** Commit the status change, then queue the next stage. */
  private async advance(
    documentId: string,
    from: DocumentStatus,
    to: DocumentStatus,
    next: PipelineStage,
    log: Logger,
  ): Promise<StageResult> {
    const moved = await this.documents.transition(documentId, [from], to);
    if (!moved) {
      return skipped("status changed while the stage ran");
    }
    await this.queue.enqueueStage({ documentId, stage: next });
    log.debug({ status: to, next }, "stage finished");
    return success;
  }

  private isPast(status: DocumentStatus, stage: PipelineStage): boolean {
    const position = PIPELINE_ORDER.indexOf(status);
    const stagePosition = Math.max(...STAGE_STATUSES[stage].map((s) => PIPELINE_ORDER.indexOf(s)));
    return position === -1 || position > stagePosition;
  }

  private async enqueuePending(document: Document): Promise<void> {
    const stage = PENDING_STAGE[document.status];
    if (stage) {
      await this.queue.enqueueStage({ documentId: document.id, stage });
    }
  }

  private async failArtifactMissing(
    documentId: string,
    from: DocumentStatus,
    log: Logger,
  ): Promise<StageResult> {
    log.error("canonical PDF missing");
    await this.fail(documentId, from, "artifact_missing", "canonical PDF missing");
    return { outcome: "terminal", error: "canonical PDF missing" };
  }

  private async fail(
    documentId: string,
    from: DocumentStatus,
    failureReason: DocumentFailureReason,
    error: string,
  ): Promise<void> {
    const failed = await this.documents.transition(documentId, [from], "failed", { failureReason });
    if (failed) {
      await this.notifier.notify("document.failed", {
        documentId,
        originalName: failed.originalName,
        failureReason,
        error,
      });
    }
  }

  /** Another run is allowed by both the live stage policy and the queue's own limit. */
  private async mayRetry(task: { attemptNumber: number; maxAttempts?: number }): Promise<boolean> {
    const policy = await this.settings.getRetryPolicy("stage");
    const limit = Math.min(policy.maxAttempts, task.maxAttempts ?? Number.POSITIVE_INFINITY);
    return task.attemptNumber < limit;
  }

  private async retryOrGiveUp(task: DeliveryTask, error: unknown, log: Logger): Promise<StageResult> {
    if (await this.mayRetry(task)) {
      log.warn({ err: error }, "delivery task failed, will retry");
      return { outcome: "retryable", error: errorMessage(error) };
    }
    log.error({ err: error }, "delivery task failed");
    return { outcome: "terminal", error: errorMessage(error) };
  }

  private async enqueueReopened(reopened: DeliveryAttempt[]): Promise<void> {
    const documentIds = new Set<string>();
    for (const attempt of reopened) {
      await this.queue.enqueueDelivery({
        documentId: attempt.documentId,
        destinationId: attempt.destinationId,
        round: attempt.attemptCount,
      });
      documentIds.add(attempt.documentId);
    }
    for (const documentId of documentIds) {
      await this.dispatcher.recompute(documentId);
    }
  }
}
