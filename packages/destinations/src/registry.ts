import type { DestinationConfig, DestinationType } from "@docrelay/types";
import type { AdapterDependencies, AdapterFactory, IDestinationAdapter } from "./adapter.interface.js";
import { createCloudDriveAdapter } from "./adapters/cloud-drive.js";
import { DmsAdapter } from "./adapters/dms.js";
import { EmailAdapter } from "./adapters/email.js";
import { ObjectStoreAdapter } from "./adapters/object-store.js";
import { FileTransferAdapter } from "./adapters/sftp.js";
import { WebDavAdapter } from "./adapters/webdav.js";

export const ADAPTER_FACTORIES: Record<DestinationType, AdapterFactory> = {
  cloud_drive: createCloudDriveAdapter,
  object_store: (destination, dependencies) => new ObjectStoreAdapter(destination, dependencies),
  webdav: (destination) => new WebDavAdapter(destination),
  sftp: (destination, dependencies) => new FileTransferAdapter(destination, dependencies),
  dms: (destination) => new DmsAdapter(destination),
  email: (destination, dependencies) => new EmailAdapter(destination, dependencies),
};

/** Build the adapter for a destination. Throws ValidationError on missing options. */
export function createAdapter(
  destination: DestinationConfig,
  dependencies: AdapterDependencies = {},
): IDestinationAdapter {
  return ADAPTER_FACTORIES[destination.type](destination, dependencies);
}
