import { ValidationError, errorFromResponse } from "@docrelay/errors";
import { createSilentLogger, type Logger } from "@docrelay/logger";
import type { SettingsResolver } from "@docrelay/settings";
import type { ArtifactStore } from "@docrelay/storage";
import type { Document, DocumentRepository, DocumentSource } from "@docrelay/types";
import { displayName, filenameFromContentDisposition, filenameFromUrl } from "./filenames.js";
import { sniffMime } from "./mime.js";

export interface IngestInput {
  bytes: Uint8Array;
  /** Name the client claims; only its basename survives. */
  filename: string | null;
  declaredMime?: string | null;
  source: DocumentSource;
  sourceUrl?: string | null;
}

export interface IngestFromUrlOptions {
  filename?: string | null;
}

export interface IngestionGateOptions {
  documents: DocumentRepository;
  store: ArtifactStore;
  settings: SettingsResolver;
  logger?: Logger;
}

function tooLarge(sizeBytes: number, maxBytes: number): ValidationError {
  return new ValidationError(
    `Payload of ${String(sizeBytes)} bytes exceeds the ${String(maxBytes)} byte limit`,
    { file: "too_large" },
    { details: { sizeBytes, maxBytes } },
  );
}

/**
 * Entry point of the pipeline: validates a payload, stores it content-addressed and
 * records a `received` Document. Identical bytes share one artifact but every call
 * creates its own Document.
 */
export class IngestionGate {
  private readonly documents: DocumentRepository;
  private readonly store: ArtifactStore;
  private readonly settings: SettingsResolver;
  private readonly logger: Logger;

  constructor(options: IngestionGateOptions) {
    this.documents = options.documents;
    this.store = options.store;
    this.settings = options.settings;
    this.logger = options.logger ?? createSilentLogger();
  }

  async ingest(input: IngestInput): Promise<Document> {
    const maxBytes = await this.settings.getNumber("ingest.max_bytes");
    if (input.bytes.byteLength === 0) {
      throw new ValidationError("Payload is empty", { file: "empty" });
    }
    if (input.bytes.byteLength > maxBytes) {
      throw tooLarge(input.bytes.byteLength, maxBytes);
    }

    const originalName = displayName(input.filename);
    const mimeType = await sniffMime({
      bytes: input.bytes,
      filename: originalName,
      declaredMime: input.declaredMime,
    });
    if (!mimeType) {
      throw new ValidationError(`Unsupported file type for ${originalName}`, { file: "unsupported_type" });
    }

    const stored = await this.store.put(input.bytes);
    const document = await this.documents.create({
      originalName,
      source: input.source,
      sourceUrl: input.sourceUrl ?? null,
      storageKey: stored.key,
      mimeType,
      sizeBytes: stored.sizeBytes,
      contentHash: stored.key,
    });

    this.logger.info(
      {
        documentId: document.id,
        source: document.source,
        mimeType,
        sizeBytes: stored.sizeBytes,
        deduplicated: !stored.created,
      },
      "document received",
    );
    return document;
  }

  /** Fetch an http(s) URL, enforcing the size limit while streaming, then ingest it. */
  async ingestFromUrl(rawUrl: string, options: IngestFromUrlOptions = {}): Promise<Document> {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch {
      throw new ValidationError(`Invalid URL: ${rawUrl}`, { url: "invalid" });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ValidationError(`Only http and https URLs can be fetched, got ${url.protocol}`, {
        url: "unsupported_scheme",
      });
    }

    const [maxBytes, timeoutMs] = await Promise.all([
      this.settings.getNumber("ingest.max_bytes"),
      this.settings.getNumber("ingest.fetch_timeout_ms"),
    ]);

    const response = await fetch(url, { redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw await errorFromResponse(response, `GET ${url.host}`);
    }

    const declaredLength = Number(response.headers.get("content-length"));
    if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
      await response.body?.cancel();
      throw tooLarge(declaredLength, maxBytes);
    }

    const bytes = await readLimited(response, maxBytes);
    const filename =
      options.filename ??
      filenameFromContentDisposition(response.headers.get("content-disposition")) ??
      filenameFromUrl(url);

    return this.ingest({
      bytes,
      filename,
      declaredMime: response.headers.get("content-type"),
      source: "url",
      sourceUrl: url.toString(),
    });
  }
}

async function readLimited(response: Response, maxBytes: number): Promise<Uint8Array> {
  if (!response.body) {
    return new Uint8Array(0);
  }
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw tooLarge(total, maxBytes);
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks);
}
