import { Readable } from "node:stream";
import { google, type drive_v3 } from "googleapis";
import { PermanentError } from "@docrelay/errors";
import type { DestinationConfig } from "@docrelay/types";
import type {
  AdapterCallOptions,
  AdapterDependencies,
  DeliveryArtifact,
  DestinationCredential,
  IDestinationAdapter,
  RemoteReference,
} from "../adapter.interface.js";
import { optionalOption, requireAccessToken } from "../options.js";
import { fromSdkError } from "../sdk-errors.js";
import { splitTargetPath } from "../target-path.js";

const FOLDER_MIME = "application/vnd.google-apps.folder";
const DELIVERY_PROPERTY = "docrelayDocumentId";

/** The slice of `drive.files` this adapter calls. */
export interface DriveFilesApi {
  list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
  create(params: drive_v3.Params$Resource$Files$Create): Promise<{ data: drive_v3.Schema$File }>;
  update(params: drive_v3.Params$Resource$Files$Update): Promise<{ data: drive_v3.Schema$File }>;
}

export function createDriveFiles(accessToken: string, timeoutMs: number): DriveFilesApi {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  return google.drive({ version: "v3", auth, timeout: timeoutMs }).files;
}

/** Escape a value for use inside a single-quoted Drive query string. */
export function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export class GoogleDriveAdapter implements IDestinationAdapter {
  readonly type = "cloud_drive" as const;
  readonly secretFields: readonly string[] = [];
  readonly oauthProvider = "google_drive" as const;
  private readonly rootFolderId: string;
  private readonly filesFor: (accessToken: string, timeoutMs: number) => DriveFilesApi;

  constructor(
    private readonly destination: DestinationConfig,
    dependencies: AdapterDependencies = {},
  ) {
    this.rootFolderId = optionalOption(destination, "folder_id") ?? "root";
    this.filesFor = dependencies.createDriveFiles ?? createDriveFiles;
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const files = this.filesFor(requireAccessToken(this.destination, credential), options.timeoutMs);
    const target = splitTargetPath(targetPath);

    try {
      let parentId = this.rootFolderId;
      for (const segment of target.folder.split("/").filter(Boolean)) {
        parentId = await this.findOrCreateFolder(files, segment, parentId);
      }

      const media = { mimeType: artifact.mimeType, body: Readable.from(Buffer.from(artifact.bytes)) };
      const existing = await this.findDelivered(files, target.name, parentId, artifact.documentId);

      // Redelivery of the same document overwrites its earlier upload instead of duplicating it.
      const { data } = existing
        ? await files.update({ fileId: existing, media, fields: "id, webViewLink" })
        : await files.create({
            requestBody: {
              name: target.name,
              parents: [parentId],
              mimeType: artifact.mimeType,
              appProperties: { [DELIVERY_PROPERTY]: artifact.documentId },
            },
            media,
            fields: "id, webViewLink",
          });

      if (!data.id) {
        throw new PermanentError("Drive did not return a file id");
      }
      return { ref: data.id, url: data.webViewLink ?? null };
    } catch (error) {
      throw fromSdkError(error, "Google Drive");
    }
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    const files = this.filesFor(requireAccessToken(this.destination, credential), options.timeoutMs);
    try {
      await files.list({
        q: `'${escapeDriveQuery(this.rootFolderId)}' in parents and trashed = false`,
        pageSize: 1,
        fields: "files(id)",
      });
    } catch (error) {
      throw fromSdkError(error, "Google Drive");
    }
  }

  private async findOrCreateFolder(files: DriveFilesApi, name: string, parentId: string): Promise<string> {
    const { data } = await files.list({
      q:
        `name = '${escapeDriveQuery(name)}' and '${escapeDriveQuery(parentId)}' in parents ` +
        `and mimeType = '${FOLDER_MIME}' and trashed = false`,
      fields: "files(id, name)",
      spaces: "drive",
    });
    const found = data.files?.[0]?.id;
    if (found) {
      return found;
    }

    const created = await files.create({
      requestBody: { name, mimeType: FOLDER_MIME, parents: [parentId] },
      fields: "id",
    });
    if (!created.data.id) {
      throw new PermanentError(`Drive did not return an id for folder ${name}`);
    }
    return created.data.id;
  }

  private async findDelivered(
    files: DriveFilesApi,
    name: string,
    parentId: string,
    documentId: string,
  ): Promise<string | null> {
    const { data } = await files.list({
      q:
        `name = '${escapeDriveQuery(name)}' and '${escapeDriveQuery(parentId)}' in parents ` +
        `and appProperties has { key='${DELIVERY_PROPERTY}' and value='${escapeDriveQuery(documentId)}' } ` +
        "and trashed = false",
      fields: "files(id)",
      spaces: "drive",
    });
    return data.files?.[0]?.id ?? null;
  }
}
