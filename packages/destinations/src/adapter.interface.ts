import type {
  DestinationConfig,
  DestinationType,
  ExtractedMetadata,
  OAuthProvider,
} from "@docrelay/types";
import type { DriveFilesApi } from "./adapters/google-drive.js";
import type { S3Sender } from "./adapters/object-store.js";
import type { FtpSession, SftpSession } from "./adapters/sftp.js";
import type { MailTransport } from "./adapters/email.js";

export interface DeliveryArtifact {
  documentId: string;
  /** Delivered file name, e.g. "Invoice Jan.pdf". */
  filename: string;
  bytes: Uint8Array;
  mimeType: string;
  metadata: ExtractedMetadata | null;
}

export interface DestinationCredential {
  /** Resolved `destination.<credentialRef>.<field>` values. */
  secrets: Record<string, string>;
  /** OAuth access token for cloud drives; null for static credentials. */
  accessToken: string | null;
}

export interface RemoteReference {
  /** Provider-native identifier: file id, object key, message id, task id. */
  ref: string;
  url: string | null;
}

export interface AdapterCallOptions {
  timeoutMs: number;
}

export interface IDestinationAdapter {
  readonly type: DestinationType;
  /** Secret fields resolved from the settings layer before each call. */
  readonly secretFields: readonly string[];
  /** Provider whose OAuth access token `deliver` needs; null for static credentials. */
  readonly oauthProvider: OAuthProvider | null;
  /** Upload the artifact. Throws classified AppErrors. */
  deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference>;
  testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void>;
}

/** Client constructors, replaceable so adapters can be exercised without a network. */
export interface AdapterDependencies {
  createDriveFiles?: (accessToken: string, timeoutMs: number) => DriveFilesApi;
  createS3?: (config: S3ConnectionConfig) => S3Sender;
  createSftp?: () => SftpSession;
  createFtp?: (timeoutMs: number) => FtpSession;
  createMailTransport?: (config: SmtpConnectionConfig) => MailTransport;
}

export interface S3ConnectionConfig {
  region: string;
  endpoint: string | null;
  forcePathStyle: boolean;
  accessKeyId: string;
  secretAccessKey: string;
  timeoutMs: number;
}

export interface SmtpConnectionConfig {
  host: string;
  port: number;
  secure: boolean;
  username: string | null;
  password: string | null;
  timeoutMs: number;
}

export type AdapterFactory = (
  destination: DestinationConfig,
  dependencies: AdapterDependencies,
) => IDestinationAdapter;
