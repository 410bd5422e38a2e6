export type {
  AdapterCallOptions,
  AdapterDependencies,
  AdapterFactory,
  DeliveryArtifact,
  DestinationCredential,
  IDestinationAdapter,
  RemoteReference,
  S3ConnectionConfig,
  SmtpConnectionConfig,
} from "./adapter.interface.js";

export { ADAPTER_FACTORIES, createAdapter } from "./registry.js";
export { renderTargetPath, sanitizeSegment, splitTargetPath, TARGET_PATH_PLACEHOLDERS } from "./target-path.js";
export type { TargetPath, TargetPathContext, TargetPathPlaceholder } from "./target-path.js";

export { GoogleDriveAdapter, escapeDriveQuery } from "./adapters/google-drive.js";
export type { DriveFilesApi } from "./adapters/google-drive.js";
export { OneDriveAdapter } from "./adapters/onedrive.js";
export { DropboxAdapter } from "./adapters/dropbox.js";
export { ObjectStoreAdapter } from "./adapters/object-store.js";
export type { S3Sender } from "./adapters/object-store.js";
export { WebDavAdapter } from "./adapters/webdav.js";
export { FileTransferAdapter } from "./adapters/sftp.js";
export type { FileTransferProtocol, FtpSession, SftpSession } from "./adapters/sftp.js";
export { DmsAdapter } from "./adapters/dms.js";
export { EmailAdapter } from "./adapters/email.js";
export type { MailTransport } from "./adapters/email.js";
