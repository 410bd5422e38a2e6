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
import { joinRemotePath, optionalOption, requireAccessToken } from "../options.js";

const GRAPH_URL = "https://graph.microsoft.com/v1.0";
/** Graph accepts simple PUT uploads up to 4 MB. */
export const SIMPLE_UPLOAD_LIMIT = 4 * 1024 * 1024;
/** Upload-session fragments must be multiples of 320 KiB. */
export const UPLOAD_CHUNK_BYTES = 16 * 320 * 1024;

const driveItemSchema = z.object({
  id: z.string(),
  webUrl: z.string().optional(),
});

const uploadSessionSchema = z.object({
  uploadUrl: z.string().url(),
});

function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

export class OneDriveAdapter implements IDestinationAdapter {
  readonly type = "cloud_drive" as const;
  readonly secretFields: readonly string[] = [];
  readonly oauthProvider = "onedrive" as const;
  private readonly basePath: string | null;

  constructor(private readonly destination: DestinationConfig) {
    this.basePath = optionalOption(destination, "base_path");
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const token = requireAccessToken(this.destination, credential);
    const itemPath = encodePath(joinRemotePath(this.basePath, targetPath));

    const item =
      artifact.bytes.byteLength <= SIMPLE_UPLOAD_LIMIT
        ? await this.simpleUpload(itemPath, artifact.bytes, token, options)
        : await this.sessionUpload(itemPath, artifact.bytes, token, options);

    return { ref: item.id, url: item.webUrl ?? null };
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    const response = await fetch(`${GRAPH_URL}/me/drive`, {
      headers: { Authorization: `Bearer ${requireAccessToken(this.destination, credential)}` },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "OneDrive");
    }
  }

  private async simpleUpload(
    itemPath: string,
    bytes: Uint8Array,
    token: string,
    options: AdapterCallOptions,
  ): Promise<z.infer<typeof driveItemSchema>> {
    // Simple PUT replaces an existing item at the same path.
    const response = await fetch(`${GRAPH_URL}/me/drive/root:/${itemPath}:/content`, {
      method: "PUT",
      headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/pdf" },
      body: bytes,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "OneDrive");
    }
    return driveItemSchema.parse(await response.json());
  }

  private async sessionUpload(
    itemPath: string,
    bytes: Uint8Array,
    token: string,
    options: AdapterCallOptions,
  ): Promise<z.infer<typeof driveItemSchema>> {
    const signal = AbortSignal.timeout(options.timeoutMs);
    const created = await fetch(`${GRAPH_URL}/me/drive/root:/${itemPath}:/createUploadSession`, {
      method: "POST",
      headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
      body: JSON.stringify({ item: { "@microsoft.graph.conflictBehavior": "replace" } }),
      signal,
    });
    if (!created.ok) {
      throw await errorFromResponse(created, "OneDrive");
    }
    const { uploadUrl } = uploadSessionSchema.parse(await created.json());

    const total = bytes.byteLength;
    for (let start = 0; start < total; start += UPLOAD_CHUNK_BYTES) {
      const end = Math.min(start + UPLOAD_CHUNK_BYTES, total);
      // The pre-authenticated upload URL must not receive the bearer token.
      const response = await fetch(uploadUrl, {
        method: "PUT",
        headers: { "Content-Range": `bytes ${String(start)}-${String(end - 1)}/${String(total)}` },
        body: bytes.subarray(start, end),
        signal,
      });
      if (!response.ok) {
        throw await errorFromResponse(response, "OneDrive");
      }
      if (end === total) {
        return driveItemSchema.parse(await response.json());
      }
    }
    throw new PermanentError("OneDrive upload session ended without a drive item");
  }
}
