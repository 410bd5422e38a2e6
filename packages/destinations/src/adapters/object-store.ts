import {
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  type HeadBucketCommandInput,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
} from "@aws-sdk/client-s3";
import type { DestinationConfig } from "@docrelay/types";
import type {
  AdapterCallOptions,
  AdapterDependencies,
  DeliveryArtifact,
  DestinationCredential,
  IDestinationAdapter,
  RemoteReference,
  S3ConnectionConfig,
} from "../adapter.interface.js";
import { booleanOption, joinRemotePath, optionalOption, requireOption, requireSecret } from "../options.js";
import { fromSdkError } from "../sdk-errors.js";

export interface S3Sender {
  putObject(input: PutObjectCommandInput): Promise<PutObjectCommandOutput>;
  headBucket(input: HeadBucketCommandInput): Promise<unknown>;
}

export function createS3(config: S3ConnectionConfig): S3Sender {
  const client = new S3Client({
    region: config.region,
    ...(config.endpoint ? { endpoint: config.endpoint } : {}),
    forcePathStyle: config.forcePathStyle,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    maxAttempts: 1,
    requestHandler: { requestTimeout: config.timeoutMs, connectionTimeout: config.timeoutMs },
  });
  return {
    putObject: (input) => client.send(new PutObjectCommand(input)),
    headBucket: (input) => client.send(new HeadBucketCommand(input)),
  };
}

/** S3-compatible object storage (AWS, MinIO, R2, ...). */
export class ObjectStoreAdapter implements IDestinationAdapter {
  readonly type = "object_store" as const;
  readonly secretFields: readonly string[] = ["access_key_id", "secret_access_key"];
  readonly oauthProvider = null;
  private readonly bucket: string;
  private readonly prefix: string | null;
  private readonly connect: (config: S3ConnectionConfig) => S3Sender;

  constructor(
    private readonly destination: DestinationConfig,
    dependencies: AdapterDependencies = {},
  ) {
    this.bucket = requireOption(destination, "bucket");
    this.prefix = optionalOption(destination, "prefix");
    this.connect = dependencies.createS3 ?? createS3;
  }

  async deliver(
    artifact: DeliveryArtifact,
    targetPath: string,
    credential: DestinationCredential,
    options: AdapterCallOptions,
  ): Promise<RemoteReference> {
    const s3 = this.client(credential, options);
    const key = joinRemotePath(this.prefix, targetPath);
    try {
      await s3.putObject({
        Bucket: this.bucket,
        Key: key,
        Body: artifact.bytes,
        ContentType: artifact.mimeType,
        Metadata: { "document-id": artifact.documentId },
      });
    } catch (error) {
      throw fromSdkError(error, "S3");
    }
    return { ref: `s3://${this.bucket}/${key}`, url: null };
  }

  async testConnection(credential: DestinationCredential, options: AdapterCallOptions): Promise<void> {
    try {
      await this.client(credential, options).headBucket({ Bucket: this.bucket });
    } catch (error) {
      throw fromSdkError(error, "S3");
    }
  }

  private client(credential: DestinationCredential, options: AdapterCallOptions): S3Sender {
    const endpoint = optionalOption(this.destination, "endpoint");
    return this.connect({
      region: optionalOption(this.destination, "region") ?? "us-east-1",
      endpoint,
      forcePathStyle: booleanOption(this.destination, "force_path_style", endpoint !== null),
      accessKeyId: requireSecret(this.destination, credential, "access_key_id"),
      secretAccessKey: requireSecret(this.destination, credential, "secret_access_key"),
      timeoutMs: options.timeoutMs,
    });
  }
}
