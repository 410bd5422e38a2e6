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

const CONTENT_URL = "https://content.dropboxapi.com/2";
const API_URL = "https://api.dropboxapi.com/2";
/** Single-request upload limit of /files/upload. */
export const DROPBOX_UPLOAD_LIMIT = 150 * 1024 * 1024;

const uploadResultSchema = z.object({
  id: z.string(),
  path_display: z.string().optional(),
});

/** HTTP headers are ASCII-only, so Dropbox-API-Arg escapes everything above 0x7e. */
export function dropboxApiArg(value: unknown): string {
  return JSON.stringify(value).replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
}

export class DropboxAdapter implements IDestinationAdapter {
  readonly type = "cloud_drive" as const;
  readonly secretFields: readonly string[] = [];
  readonly oauthProvider = "dropbox" as const;
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
    if (artifact.bytes.byteLength > DROPBOX_UPLOAD_LIMIT) {
      throw new PermanentError(`${artifact.filename} exceeds the Dropbox single-upload limit`);
    }

    const path = `/${joinRemotePath(this.basePath, targetPath)}`;
    const response = await fetch(`${CONTENT_URL}/files/upload`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${requireAccessToken(this.destination, credential)}`,
        "Content-Type": "application/octet-stream",
        "Dropbox-API-Arg": dropboxApiArg({ path, mode: "overwrite", autorename: false, mute: true }),
      },
      body: artifact.bytes,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "Dropbox");
    }

    const result = uploadResultSchema.parse(await response.json());
    return { ref: result.id, url: null };
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    const response = await fetch(`${API_URL}/users/get_current_account`, {
      method: "POST",
      headers: { Authorization: `Bearer ${requireAccessToken(this.destination, credential)}` },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "Dropbox");
    }
  }
}
