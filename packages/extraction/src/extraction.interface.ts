export interface ExtractionCallOptions {
  timeoutMs: number;
}

export interface IOcrProvider {
  readonly name: string;
  /** Recognized text of every page, in order. */
  ocr(pdf: Uint8Array, options: ExtractionCallOptions): Promise<string>;
}

/** OCR text when available; otherwise the PDF itself. */
export type MetadataInput = { text: string } | { pdf: Uint8Array };

export interface MetadataFields {
  title: string | null;
  /** ISO date (YYYY-MM-DD) the document was issued. */
  date: string | null;
  classification: string | null;
}

export interface IMetadataExtractor {
  readonly name: string;
  extract(input: MetadataInput, options: ExtractionCallOptions): Promise<MetadataFields>;
}
