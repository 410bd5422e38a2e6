import type { IMetadataExtractor, IOcrProvider } from "./extraction.interface.js";
import { HttpOcrProvider } from "./http-ocr-provider.js";
import { ClaudeMetadataExtractor } from "./claude-metadata-extractor.js";

export interface OcrProviderConfig {
  url: string | null;
  apiKey: string | null;
}

export interface MetadataExtractorConfig {
  apiKey: string | null;
  model: string;
  maxTextChars?: number;
}

/** Null when the service is not configured; the stage records it as skipped. */
export function createOcrProvider(config: OcrProviderConfig): IOcrProvider | null {
  if (!config.url) {
    return null;
  }
  return new HttpOcrProvider({ baseUrl: config.url, apiKey: config.apiKey });
}

export function createMetadataExtractor(config: MetadataExtractorConfig): IMetadataExtractor | null {
  if (!config.apiKey) {
    return null;
  }
  return new ClaudeMetadataExtractor({
    apiKey: config.apiKey,
    model: config.model,
    maxTextChars: config.maxTextChars,
  });
}
