export type {
  ExtractionCallOptions,
  IMetadataExtractor,
  IOcrProvider,
  MetadataFields,
  MetadataInput,
} from "./extraction.interface.js";
export { HttpOcrProvider } from "./http-ocr-provider.js";
export type { HttpOcrProviderConfig } from "./http-ocr-provider.js";
export { ClaudeMetadataExtractor, classifyAnthropicError } from "./claude-metadata-extractor.js";
export type { ClaudeMetadataExtractorConfig } from "./claude-metadata-extractor.js";
export { DOCUMENT_CLASSIFICATIONS, extractJsonObject, parseMetadataResponse } from "./metadata-response.js";
export { createOcrProvider, createMetadataExtractor } from "./factory.js";
export type { OcrProviderConfig, MetadataExtractorConfig } from "./factory.js";
