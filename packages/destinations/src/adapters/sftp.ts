import { posix } from "node:path";
import { Readable } from "node:stream";
import { Client as FtpClient, FTPError, type AccessOptions, type FTPResponse } from "basic-ftp";
import SftpClient from "ssh2-sftp-client";
import {
  AppError,
  AuthExpiredError,
  PermanentError,
  TransientError,
  ValidationError,
  classifyError,
  errorMessage,
} from "@docrelay/errors";
import type { DestinationConfig } from "@docrelay/types";
import type {
  AdapterCallOptions,
  AdapterDependencies,
  DeliveryArtifact,
  DestinationCredential,
  IDestinationAdapter,
  RemoteReference,
} from "../adapter.interface.js";
import { joinRemotePath, numberOption, optionalOption, requireOption, requireSecret } from "../options.js";
import { splitTargetPath } from "../target-path.js";

/** The slice of ssh2-sftp-client this adapter calls. */
export interface SftpSession {
  connect(options: SftpClient.ConnectOptions): Promise<unknown>;
  mkdir(remotePath: string, recursive?: boolean): Promise<unknown>;
  put(input: Buffer, remotePath: string): Promise<unknown>;
  cwd(): Promise<string>;
  end(): Promise<unknown>;
}

/** The slice of basic-ftp's Client this adapter calls. */
export interface FtpSession {
  access(options: AccessOptions): Promise<FTPResponse>;
  ensureDir(remoteDirPath: string): Promise<void>;
  uploadFrom(source: Readable, toRemotePath: string): Promise<FTPResponse>;
  pwd(): Promise<string>;
  close(): void;
}

export type FileTransferProtocol = "sftp" | "ftp" | "ftps";

const DEFAULT_PORTS: Record<FileTransferProtocol, number> = { sftp: 22, ftp: 21, ftps: 21 };

function parseProtocol(destination: DestinationConfig): FileTransferProtocol {
  const protocol = optionalOption(destination, "protocol") ?? "sftp";
  if (protocol !== "sftp" && protocol !== "ftp" && protocol !== "ftps") {
    throw new ValidationError(`Unsupported file transfer protocol "${protocol}"`, { protocol: "unsupported" });
  }
  return protocol;
}

function sftpError(error: unknown): AppError {
  if (AppError.isAppError(error)) return error;
  const message = `SFTP: ${errorMessage(error)}`;
  if (/authentication/i.test(errorMessage(error))) {
    return new AuthExpiredError(message, { cause: error });
  }
  if (classifyError(error) === "transient") {
    return new TransientError(message, { cause: error });
  }
  return new PermanentError(message, { cause: error });
}

function ftpError(error: unknown): AppError {
  if (AppError.isAppError(error)) return error;
  const message = `FTP: ${errorMessage(error)}`;
  if (error instanceof FTPError) {
    if (error.code === 530) return new AuthExpiredError(message, { cause: error });
    if (error.code >= 400 && error.code < 500) return new TransientError(message, { cause: error });
    return new PermanentError(message, { cause: error });
  }
  if (classifyError(error) === "transient") {
    return new TransientError(message, { cause: error });
  }
  return new PermanentError(message, { cause: error });
}

/** SFTP, FTP or FTPS upload, picked by `options.protocol`. */
export class FileTransferAdapter implements IDestinationAdapter {
  readonly type = "sftp" as const;
  readonly secretFields: readonly string[] = ["username", "password", "private_key", "passphrase"];
  readonly oauthProvider = null;
  readonly protocol: FileTransferProtocol;
  private readonly host: string;
  private readonly port: number;
  private readonly basePath: string | null;
  private readonly newSftp: () => SftpSession;
  private readonly newFtp: (timeoutMs: number) => FtpSession;

  constructor(
    private readonly destination: DestinationConfig,
    dependencies: AdapterDependencies = {},
  ) {
    this.protocol = parseProtocol(destination);
    this.host = requireOption(destination, "host");
    this.port = numberOption(destination, "port", DEFAULT_PORTS[this.protocol]);
    this.basePath = optionalOption(destination, "base_path");
    this.newSftp = dependencies.createSftp ?? (() => new SftpClient());
    this.newFtp = dependencies.createFtp ?? ((timeoutMs) => new FtpClient(timeoutMs));
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const target = splitTargetPath(joinRemotePath(this.basePath, targetPath));
    const remotePath = `/${target.path}`;
    if (this.protocol === "sftp") {
      await this.withSftp(credential, options, async (sftp) => {
        if (target.folder) {
          await sftp.mkdir(posix.dirname(remotePath), true);
        }
        await sftp.put(Buffer.from(artifact.bytes), remotePath);
      });
    } else {
      await this.withFtp(credential, options, async (ftp) => {
        await ftp.ensureDir(posix.dirname(remotePath));
        await ftp.uploadFrom(Readable.from(Buffer.from(artifact.bytes)), target.name);
      });
    }
    return { ref: `${this.protocol}://${this.host}${remotePath}`, url: null };
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    if (this.protocol === "sftp") {
      await this.withSftp(credential, options, async (sftp) => {
        await sftp.cwd();
      });
    } else {
      await this.withFtp(credential, options, async (ftp) => {
        await ftp.pwd();
      });
    }
  }

  private async withSftp(
    credential: DestinationCredential,
    options: AdapterCallOptions,
    fn: (sftp: SftpSession) => Promise<void>,
  ): Promise<void> {
    const username = requireSecret(this.destination, credential, "username");
    const privateKey = credential.secrets.private_key;
    const connectOptions: SftpClient.ConnectOptions = {
      host: this.host,
      port: this.port,
      username,
      readyTimeout: options.timeoutMs,
      ...(privateKey
        ? { privateKey, passphrase: credential.secrets.passphrase }
        : { password: requireSecret(this.destination, credential, "password") }),
    };

    const sftp = this.newSftp();
    try {
      await sftp.connect(connectOptions);
      await fn(sftp);
    } catch (error) {
      throw sftpError(error);
    } finally {
      await sftp.end().catch(() => undefined);
    }
  }

  private async withFtp(
    credential: DestinationCredential,
    options: AdapterCallOptions,
    fn: (ftp: FtpSession) => Promise<void>,
  ): Promise<void> {
    const ftp = this.newFtp(options.timeoutMs);
    try {
      await ftp.access({
        host: this.host,
        port: this.port,
        user: requireSecret(this.destination, credential, "username"),
        password: requireSecret(this.destination, credential, "password"),
        secure: this.protocol === "ftps",
      });
      await fn(ftp);
    } catch (error) {
      throw ftpError(error);
    } finally {
      ftp.close();
    }
  }
}
