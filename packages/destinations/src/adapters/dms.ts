import { PermanentError, errorFromResponse } from "@docrelay/errors";
import type { DestinationConfig } from "@docrelay/types";
import { z } from "zod";
import type {
  AdapterCallOptions,
  DeliveryArtifact,
  DestinationCredential,
  IDestinationAdapter,
  RemoteReference,
} from "../adapter.interface.js";
import { optionalOption, requireOption, requireSecret } from "../options.js";

// post_document answers with the bare consumption task id as a JSON string.
const taskIdSchema = z.string().min(1);

/**
 * Self-hosted document management system speaking the Paperless-ngx API.
 * The target path only contributes its file name; the DMS files documents itself.
 */
export class DmsAdapter implements IDestinationAdapter {
  readonly type = "dms" as const;
  readonly secretFields: readonly string[] = ["api_token"];
  readonly oauthProvider = null;
  private readonly baseUrl: string;
  private readonly tagId: string | null;

  constructor(private readonly destination: DestinationConfig) {
    this.baseUrl = requireOption(destination, "url").replace(/\/$/, "");
    this.tagId = optionalOption(destination, "tag_id");
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const filename = targetPath.split("/").pop() || artifact.filename;
    const form = new FormData();
    form.append("document", new Blob([artifact.bytes], { type: artifact.mimeType }), filename);
    if (artifact.metadata?.title) {
      form.append("title", artifact.metadata.title);
    }
    if (artifact.metadata?.date) {
      form.append("created", artifact.metadata.date);
    }
    if (this.tagId) {
      form.append("tags", this.tagId);
    }

    const response = await fetch(`${this.baseUrl}/api/documents/post_document/`, {
      method: "POST",
      headers: this.headers(credential),
      body: form,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "DMS");
    }

    const parsed = taskIdSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PermanentError("DMS did not return a consumption task id");
    }
    return { ref: `paperless-task:${parsed.data}`, url: null };
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    const response = await fetch(`${this.baseUrl}/api/documents/?page_size=1`, {
      headers: this.headers(credential),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "DMS");
    }
  }

  private headers(credential: DestinationCredential): Record<string, string> {
    return {
      Authorization: `Token ${requireSecret(this.destination, credential, "api_token")}`,
      Accept: "application/json",
    };
  }
}
