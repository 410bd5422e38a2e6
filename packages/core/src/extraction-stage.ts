import type CircuitBreaker from "opossum";
import {
  NotFoundError,
  classifyError,
  createCircuitBreaker,
  errorMessage,
  withRetry,
  type CircuitBreakerOptions,
} from "@docrelay/errors";
import type {
  ExtractionCallOptions,
  IMetadataExtractor,
  IOcrProvider,
  MetadataFields,
  MetadataInput,
} from "@docrelay/extraction";
import { createSilentLogger, type Logger } from "@docrelay/logger";
import type { SettingsResolver } from "@docrelay/settings";
import type { ArtifactStore } from "@docrelay/storage";
import type { Document, DocumentRepository, ExtractionFailure, RetryPolicy } from "@docrelay/types";

export interface ExtractionStageOptions {
  documents: DocumentRepository;
  store: ArtifactStore;
  settings: SettingsResolver;
  /** Null when OCR is not configured. */
  ocr: () => Promise<IOcrProvider | null>;
  /** Null when metadata extraction is not configured. */
  metadata: () => Promise<IMetadataExtractor | null>;
  breaker?: Omit<CircuitBreakerOptions, "timeout" | "logger">;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

type OcrCall = [IOcrProvider, Uint8Array, ExtractionCallOptions];
type MetadataCall = [IMetadataExtractor, MetadataInput, ExtractionCallOptions];

/**
 * Best-effort enrichment: OCR, then AI metadata from the OCR text (or the PDF itself
 * when there is no text). Failures are recorded on the document, never thrown, except
 * for a missing canonical artifact.
 */
export class ExtractionStage {
  private readonly documents: DocumentRepository;
  private readonly store: ArtifactStore;
  private readonly settings: SettingsResolver;
  private readonly ocrProvider: () => Promise<IOcrProvider | null>;
  private readonly metadataExtractor: () => Promise<IMetadataExtractor | null>;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly ocrBreaker: CircuitBreaker<OcrCall, string>;
  private readonly metadataBreaker: CircuitBreaker<MetadataCall, MetadataFields>;

  constructor(options: ExtractionStageOptions) {
    this.documents = options.documents;
    this.store = options.store;
    this.settings = options.settings;
    this.ocrProvider = options.ocr;
    this.metadataExtractor = options.metadata;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep;
    this.now = options.now ?? (() => new Date());

    // Each call carries its own timeout; the breaker only counts failures.
    const breakerOptions = { ...options.breaker, timeout: false as const, logger: this.logger };
    this.ocrBreaker = createCircuitBreaker(
      "ocr",
      (provider: IOcrProvider, pdf: Uint8Array, callOptions: ExtractionCallOptions) =>
        provider.ocr(pdf, callOptions),
      breakerOptions,
    );
    this.metadataBreaker = createCircuitBreaker(
      "metadata",
      (extractor: IMetadataExtractor, input: MetadataInput, callOptions: ExtractionCallOptions) =>
        extractor.extract(input, callOptions),
      breakerOptions,
    );
  }

  async run(document: Document): Promise<Document> {
    if (!document.canonicalKey) {
      throw new NotFoundError(`Document ${document.id} has no canonical PDF`, {
        details: { documentId: document.id },
      });
    }
    const pdf = await this.store.get(document.canonicalKey);
    const policy = await this.settings.getRetryPolicy("stage");
    const failures: ExtractionFailure[] = [];

    const text = await this.runOcr(document, pdf, policy, failures);
    const fields = await this.runMetadata(document, text === null ? { pdf } : { text }, policy, failures);

    return this.documents.update(document.id, {
      metadata: {
        title: fields?.title ?? null,
        date: fields?.date ?? null,
        classification: fields?.classification ?? null,
        text,
      },
      extractionErrors: [...document.extractionErrors, ...failures],
    });
  }

  private async runOcr(
    document: Document,
    pdf: Uint8Array,
    policy: RetryPolicy,
    failures: ExtractionFailure[],
  ): Promise<string | null> {
    const provider = await this.ocrProvider();
    if (!provider) {
      failures.push(this.skipped("ocr", "OCR service is not configured"));
      return null;
    }
    const timeoutMs = await this.settings.getNumber("ocr.timeout_ms");
    try {
      const text = await withRetry(() => this.ocrBreaker.fire(provider, pdf, { timeoutMs }), {
        ...policy,
        operation: "ocr",
        logger: this.logger,
        sleep: this.sleep,
      });
      return text.trim() === "" ? null : text;
    } catch (error: unknown) {
      failures.push(this.failure("ocr", document, error));
      return null;
    }
  }

  private async runMetadata(
    document: Document,
    input: MetadataInput,
    policy: RetryPolicy,
    failures: ExtractionFailure[],
  ): Promise<MetadataFields | null> {
    const extractor = await this.metadataExtractor();
    if (!extractor) {
      failures.push(this.skipped("metadata", "Metadata extraction is not configured"));
      return null;
    }
    const timeoutMs = await this.settings.getNumber("metadata.timeout_ms");
    try {
      return await withRetry(() => this.metadataBreaker.fire(extractor, input, { timeoutMs }), {
        ...policy,
        operation: "metadata",
        logger: this.logger,
        sleep: this.sleep,
      });
    } catch (error: unknown) {
      failures.push(this.failure("metadata", document, error));
      return null;
    }
  }

  private skipped(service: ExtractionFailure["service"], message: string): ExtractionFailure {
    return { service, errorClass: "skipped", message, at: this.now().toISOString() };
  }

  private failure(service: ExtractionFailure["service"], document: Document, error: unknown): ExtractionFailure {
    const errorClass = classifyError(error);
    const log = { documentId: document.id, service, errorClass, err: error };
    if (errorClass === "internal") {
      this.logger.error(log, "extraction failed unexpectedly");
    } else {
      this.logger.warn(log, "extraction failed, continuing without it");
    }
    return { service, errorClass, message: errorMessage(error), at: this.now().toISOString() };
  }
}
