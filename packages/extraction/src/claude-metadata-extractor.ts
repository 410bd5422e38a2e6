import Anthropic from "@anthropic-ai/sdk";
import {
  AuthExpiredError,
  PermanentError,
  TransientError,
  classifyHttpStatus,
} from "@docrelay/errors";
import type {
  ExtractionCallOptions,
  IMetadataExtractor,
  MetadataFields,
  MetadataInput,
} from "./extraction.interface.js";
import { DOCUMENT_CLASSIFICATIONS, parseMetadataResponse } from "./metadata-response.js";

export interface ClaudeMetadataExtractorConfig {
  apiKey: string;
  model: string;
  /** OCR text is cut to this many characters before it is sent. */
  maxTextChars?: number;
}

const DEFAULT_MAX_TEXT_CHARS = 20_000;
const MAX_TOKENS = 512;

const INSTRUCTIONS = `You are a document classifier. Read the document and respond with ONLY a JSON object:
{
  "title": "short human-friendly title",
  "date": "issue date as YYYY-MM-DD, or null",
  "classification": "one of: ${DOCUMENT_CLASSIFICATIONS.join(", ")}"
}`;

/** Map SDK failures onto the error taxonomy; retries are the caller's job. */
export function classifyAnthropicError(error: unknown): unknown {
  if (error instanceof Anthropic.APIConnectionError) {
    return new TransientError(`Anthropic API unreachable: ${error.message}`, { cause: error });
  }
  if (error instanceof Anthropic.APIError && error.status !== undefined) {
    const details = { service: "Anthropic", status: error.status };
    const message = `Anthropic API responded ${String(error.status)}: ${error.message}`;
    switch (classifyHttpStatus(error.status)) {
      case "auth_expired":
        return new AuthExpiredError(message, { details, cause: error });
      case "transient":
        return new TransientError(message, { details, cause: error });
      default:
        return new PermanentError(message, { details, cause: error });
    }
  }
  return error;
}

export class ClaudeMetadataExtractor implements IMetadataExtractor {
  readonly name = "claude";
  private client: Anthropic;
  private model: string;
  private maxTextChars: number;

  constructor(config: ClaudeMetadataExtractorConfig) {
    // Retries happen in the extraction stage, where they are counted and logged.
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model;
    this.maxTextChars = config.maxTextChars ?? DEFAULT_MAX_TEXT_CHARS;
  }

  async extract(input: MetadataInput, options: ExtractionCallOptions): Promise<MetadataFields> {
    const content: Anthropic.ContentBlockParam[] =
      "text" in input
        ? [
            {
              type: "text",
              text: `${INSTRUCTIONS}\n\nDocument text:\n${input.text.slice(0, this.maxTextChars)}`,
            },
          ]
        : [
            {
              type: "document",
              source: {
                type: "base64",
                media_type: "application/pdf",
                data: Buffer.from(input.pdf).toString("base64"),
              },
            },
            { type: "text", text: INSTRUCTIONS },
          ];

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          temperature: 0,
          messages: [{ role: "user", content }],
        },
        { timeout: options.timeoutMs },
      );
    } catch (error: unknown) {
      throw classifyAnthropicError(error);
    }

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");
    return parseMetadataResponse(text);
  }
}
