import { ValidationError } from "@docrelay/errors";
import type { AdapterFactory } from "../adapter.interface.js";
import { requireOption } from "../options.js";
import { DropboxAdapter } from "./dropbox.js";
import { GoogleDriveAdapter } from "./google-drive.js";
import { OneDriveAdapter } from "./onedrive.js";

/** `options.provider` picks the cloud drive implementation. */
export const createCloudDriveAdapter: AdapterFactory = (destination, dependencies) => {
  const provider = requireOption(destination, "provider");
  switch (provider) {
    case "google_drive":
      return new GoogleDriveAdapter(destination, dependencies);
    case "onedrive":
      return new OneDriveAdapter(destination);
    case "dropbox":
      return new DropboxAdapter(destination);
    default:
      throw new ValidationError(`Unsupported cloud drive provider "${provider}"`, {
        provider: "unsupported",
      });
  }
};
