export const DESTINATION_TYPES = [
  "cloud_drive",
  "object_store",
  "webdav",
  "sftp",
  "dms",
  "email",
] as const;

export type DestinationType = (typeof DESTINATION_TYPES)[number];

export interface DestinationConfig {
  id: string;
  name: string;
  type: DestinationType;
  enabled: boolean;
  /** e.g. "Documents/{year}/{filename}" */
  targetPathTemplate: string;
  /** Settings-key prefix the resolver expands into this destination's secrets. */
  credentialRef: string;
  /** Non-secret provider options (bucket, host, folder id, ...). */
  options: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

/** Creation/update input; `id` is generated when omitted. */
export type NewDestination = Omit<DestinationConfig, "id" | "createdAt" | "updatedAt"> & {
  id?: string;
};
