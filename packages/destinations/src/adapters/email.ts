import { createTransport, type SendMailOptions } from "nodemailer";
import {
  AppError,
  AuthExpiredError,
  PermanentError,
  TransientError,
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
  SmtpConnectionConfig,
} from "../adapter.interface.js";
import { booleanOption, numberOption, requireOption } from "../options.js";
import { numberProperty, stringProperty } from "../sdk-errors.js";

/** The slice of a nodemailer transporter this adapter calls. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
  verify(): Promise<true>;
  close(): void;
}

export function createMailTransport(config: SmtpConnectionConfig): MailTransport {
  return createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    ...(config.username ? { auth: { user: config.username, pass: config.password ?? "" } } : {}),
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });
}

/** Map nodemailer failures: EAUTH or 535 means the credential, 4xx replies are temporary. */
export function smtpError(error: unknown): AppError {
  if (AppError.isAppError(error)) return error;
  const message = `SMTP: ${errorMessage(error)}`;
  const code = stringProperty(error, "code");
  const responseCode = numberProperty(error, "responseCode");

  if (code === "EAUTH" || responseCode === 535) {
    return new AuthExpiredError(message, { cause: error });
  }
  if (responseCode !== undefined && responseCode >= 400 && responseCode < 500) {
    return new TransientError(message, { cause: error });
  }
  if (code === "ECONNECTION" || code === "ETIMEDOUT" || code === "ESOCKET" || code === "EDNS") {
    return new TransientError(message, { cause: error });
  }
  if (classifyError(error) === "transient") {
    return new TransientError(message, { cause: error });
  }
  return new PermanentError(message, { cause: error });
}

/** Forwards the PDF as an attachment over SMTP. The target path supplies the attachment name. */
export class EmailAdapter implements IDestinationAdapter {
  readonly type = "email" as const;
  readonly secretFields: readonly string[] = ["username", "password"];
  readonly oauthProvider = null;
  private readonly to: string;
  private readonly from: string;
  private readonly connect: (config: SmtpConnectionConfig) => MailTransport;

  constructor(
    private readonly destination: DestinationConfig,
    dependencies: AdapterDependencies = {},
  ) {
    this.to = requireOption(destination, "to");
    this.from = requireOption(destination, "from");
    this.connect = dependencies.createMailTransport ?? createMailTransport;
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const filename = targetPath.split("/").pop() || artifact.filename;
    const subject = artifact.metadata?.title ?? filename;
    const transport = this.transport(credential, options);
    try {
      const info = await transport.sendMail({
        from: this.from,
        to: this.to,
        subject,
        text: `Forwarded document: ${filename}`,
        attachments: [
          { filename, content: Buffer.from(artifact.bytes), contentType: artifact.mimeType },
        ],
        headers: { "X-Document-Id": artifact.documentId },
      });
      return { ref: info.messageId, url: null };
    } catch (error) {
      throw smtpError(error);
    } finally {
      transport.close();
    }
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    const transport = this.transport(credential, options);
    try {
      await transport.verify();
    } catch (error) {
      throw smtpError(error);
    } finally {
      transport.close();
    }
  }

  private transport(credential: DestinationCredential, options: AdapterCallOptions): MailTransport {
    const port = numberOption(this.destination, "port", 587);
    return this.connect({
      host: requireOption(this.destination, "host"),
      port,
      secure: booleanOption(this.destination, "secure", port === 465),
      username: credential.secrets.username ?? null,
      password: credential.secrets.password ?? null,
      timeoutMs: options.timeoutMs,
    });
  }
}
