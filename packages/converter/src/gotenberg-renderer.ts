import { PermanentError, ValidationError, errorFromResponse } from "@docrelay/errors";
import type { IRenderer, RenderOptions } from "./renderer.interface.js";
import { getSupportedType } from "./supported-types.js";
import { isPdf } from "./pdf.js";

export interface GotenbergRendererConfig {
  baseUrl: string;
}

const MARKDOWN_WRAPPER = `<!doctype html>
<html>
  <head><meta charset="utf-8"></head>
  <body>{{ toHTML "document.md" }}</body>
</html>
`;

/**
 * PDF rendering through a Gotenberg-compatible service.
 * HTML goes to the Chromium route, Markdown to the Chromium Markdown route,
 * everything else to LibreOffice.
 */
export class GotenbergRenderer implements IRenderer {
  readonly name = "gotenberg";
  private baseUrl: string;

  constructor(config: GotenbergRendererConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
  }

  async render(bytes: Uint8Array, sourceMime: string, options: RenderOptions): Promise<Uint8Array> {
    const type = getSupportedType(sourceMime);
    if (!type) {
      throw new ValidationError(`Cannot render ${sourceMime}`, { mimeType: "unsupported" });
    }
    if (type.route === "passthrough") {
      return bytes;
    }

    const form = new FormData();
    let path: string;
    switch (type.route) {
      case "chromium":
        path = "/forms/chromium/convert/html";
        form.append("files", new Blob([bytes], { type: type.mime }), "index.html");
        break;
      case "markdown":
        path = "/forms/chromium/convert/markdown";
        form.append("files", new Blob([MARKDOWN_WRAPPER], { type: "text/html" }), "index.html");
        form.append("files", new Blob([bytes], { type: type.mime }), "document.md");
        break;
      case "libreoffice":
        path = "/forms/libreoffice/convert";
        // LibreOffice picks its import filter from the extension.
        form.append("files", new Blob([bytes], { type: type.mime }), `document.${type.extension}`);
        break;
      default: {
        const unreachable: never = type.route;
        throw new Error(`Unknown render route ${String(unreachable)}`);
      }
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      body: form,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      throw await errorFromResponse(response, "Gotenberg");
    }

    const pdf = new Uint8Array(await response.arrayBuffer());
    if (!isPdf(pdf)) {
      throw new PermanentError(`Gotenberg returned a non-PDF payload for ${options.filename}`, {
        details: { service: "Gotenberg", mimeType: type.mime },
      });
    }
    return pdf;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(5_000) });
      return response.ok;
    } catch {
      return false;
    }
  }
}
