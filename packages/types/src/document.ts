import type { ErrorClass } from "./errors.js";

export type DocumentStatus =
  | "received"
  | "converting"
  | "extracting"
  | "delivering"
  | "partially_delivered"
  | "delivered"
  | "failed";

export type DocumentSource = "upload" | "url" | "email";

export type DocumentFailureReason = "conversion_failed" | "artifact_missing";

export interface ExtractedMetadata {
  title: string | null;
  date: string | null;
  classification: string | null;
  text: string | null;
}

/** A soft failure recorded by the extraction stage; never affects deliverability. */
export interface ExtractionFailure {
  service: "ocr" | "metadata";
  errorClass: ErrorClass | "skipped";
  message: string;
  at: string;
}

export interface Document {
  id: string;
  originalName: string;
  source: DocumentSource;
  sourceUrl: string | null;
  storageKey: string;
  canonicalKey: string | null;
  mimeType: string;
  sizeBytes: number;
  contentHash: string;
  status: DocumentStatus;
  failureReason: DocumentFailureReason | null;
  metadata: ExtractedMetadata | null;
  extractionErrors: ExtractionFailure[];
  cancelledAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocument {
  originalName: string;
  source: DocumentSource;
  sourceUrl: string | null;
  storageKey: string;
  mimeType: string;
  sizeBytes: number;
  contentHash: string;
}

export type DocumentPatch = Partial<
  Pick<
    Document,
    | "status"
    | "failureReason"
    | "canonicalKey"
    | "metadata"
    | "extractionErrors"
    | "cancelledAt"
  >
>;
