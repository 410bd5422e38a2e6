import { errorFromResponse } from "@docrelay/errors";
import type { DestinationConfig } from "@docrelay/types";
import type {
  AdapterCallOptions,
  DeliveryArtifact,
  DestinationCredential,
  IDestinationAdapter,
  RemoteReference,
} from "../adapter.interface.js";
import { joinRemotePath, optionalOption, requireOption, requireSecret } from "../options.js";
import { splitTargetPath } from "../target-path.js";

function encodePath(path: string): string {
  return path.split("/").filter(Boolean).map(encodeURIComponent).join("/");
}

/** WebDAV upload with basic auth (Nextcloud, ownCloud, Apache mod_dav). */
export class WebDavAdapter implements IDestinationAdapter {
  readonly type = "webdav" as const;
  readonly secretFields: readonly string[] = ["username", "password"];
  readonly oauthProvider = null;
  private readonly baseUrl: string;
  private readonly basePath: string | null;

  constructor(private readonly destination: DestinationConfig) {
    this.baseUrl = requireOption(destination, "url").replace(/\/$/, "");
    this.basePath = optionalOption(destination, "base_path");
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const authorization = this.authorization(credential);
    const signal = AbortSignal.timeout(options.timeoutMs);
    const target = splitTargetPath(joinRemotePath(this.basePath, targetPath));

    let collection = "";
    for (const segment of target.folder.split("/").filter(Boolean)) {
      collection = collection ? `${collection}/${segment}` : segment;
      const response = await fetch(`${this.baseUrl}/${encodePath(collection)}/`, {
        method: "MKCOL",
        headers: { Authorization: authorization },
        signal,
      });
      // 405: the collection already exists
      if (!response.ok && response.status !== 405) {
        throw await errorFromResponse(response, "WebDAV");
      }
    }

    const url = `${this.baseUrl}/${encodePath(target.path)}`;
    const response = await fetch(url, {
      method: "PUT",
      headers: { Authorization: authorization, "Content-Type": artifact.mimeType },
      body: artifact.bytes,
      signal,
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "WebDAV");
    }
    return { ref: target.path, url };
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    const response = await fetch(`${this.baseUrl}/`, {
      method: "PROPFIND",
      headers: { Authorization: this.authorization(credential), Depth: "0" },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, "WebDAV");
    }
  }

  private authorization(credential: DestinationCredential): string {
    const username = requireSecret(this.destination, credential, "username");
    const password = requireSecret(this.destination, credential, "password");
    return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
  }
}
