import { z } from "zod";
import { ExternalServiceError, errorFromResponse } from "@docrelay/errors";
import type { ExtractionCallOptions, IOcrProvider } from "./extraction.interface.js";

export interface HttpOcrProviderConfig {
  baseUrl: string;
  apiKey?: string | null;
}

const ocrResponseSchema = z.object({
  text: z.string(),
  pages: z.number().int().nonnegative().optional(),
});

/**
 * OCR over HTTP: POST the PDF as multipart `file` to `/ocr`, receive `{ text }`.
 */
export class HttpOcrProvider implements IOcrProvider {
  readonly name = "http-ocr";
  private baseUrl: string;
  private apiKey: string | null;

  constructor(config: HttpOcrProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.apiKey = config.apiKey ?? null;
  }

  async ocr(pdf: Uint8Array, options: ExtractionCallOptions): Promise<string> {
    const form = new FormData();
    form.append("file", new Blob([pdf], { type: "application/pdf" }), "document.pdf");

    const response = await fetch(`${this.baseUrl}/ocr`, {
      method: "POST",
      headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
      body: form,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      throw await errorFromResponse(response, "OCR service");
    }

    const parsed = ocrResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("OCR service returned an unexpected payload", "OCR service", {
        cause: parsed.error,
      });
    }
    return parsed.data.text;
  }
}
