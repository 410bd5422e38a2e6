import type { IRenderer } from "@docrelay/converter";
import { withRetry } from "@docrelay/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docrelay/logger";
import type { SettingsResolver } from "@docrelay/settings";
import type { ArtifactStore } from "@docrelay/storage";
import type { Document, DocumentRepository } from "@docrelay/types";

export interface ConversionStageOptions {
  documents: DocumentRepository;
  store: ArtifactStore;
  settings: SettingsResolver;
  /** Resolves the renderer for the current settings. */
  renderer: () => Promise<IRenderer>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Produces the canonical PDF. PDFs pass through unchanged; everything else goes to
 * the renderer, retried on transient errors under the `stage.*` policy. An error
 * that escapes `run` has used up that policy.
 */
export class ConversionStage {
  private readonly documents: DocumentRepository;
  private readonly store: ArtifactStore;
  private readonly settings: SettingsResolver;
  private readonly renderer: () => Promise<IRenderer>;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: ConversionStageOptions) {
    this.documents = options.documents;
    this.store = options.store;
    this.settings = options.settings;
    this.renderer = options.renderer;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep;
  }

  async run(document: Document): Promise<Document> {
    if (document.canonicalKey && (await this.store.exists(document.canonicalKey))) {
      return document;
    }

    if (document.mimeType === "application/pdf") {
      return this.documents.update(document.id, { canonicalKey: document.storageKey });
    }

    const [source, renderer, timeoutMs, policy] = await Promise.all([
      this.store.get(document.storageKey),
      this.renderer(),
      this.settings.getNumber("renderer.timeout_ms"),
      this.settings.getRetryPolicy("stage"),
    ]);

    const startedAt = Date.now();
    const pdf = await withRetry(
      () => renderer.render(source, document.mimeType, { timeoutMs, filename: document.originalName }),
      {
        ...policy,
        operation: "render",
        logger: createChildLogger(this.logger, { documentId: document.id }),
        sleep: this.sleep,
      },
    );
    const stored = await this.store.put(pdf);

    this.logger.info(
      {
        documentId: document.id,
        renderer: renderer.name,
        sizeBytes: stored.sizeBytes,
        durationMs: Date.now() - startedAt,
      },
      "document converted",
    );
    return this.documents.update(document.id, { canonicalKey: stored.key });
  }
}
