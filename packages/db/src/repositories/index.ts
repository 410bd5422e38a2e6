import type { Repositories } from "@docrelay/types";
import type { DbExecutor } from "../client.js";
import { DrizzleDocumentRepository } from "./document-repository.js";
import { DrizzleDestinationRepository } from "./destination-repository.js";
import { DrizzleDeliveryRepository } from "./delivery-repository.js";
import { DrizzleSettingsRepository } from "./settings-repository.js";
import { DrizzleCredentialRepository } from "./credential-repository.js";

export function createDrizzleRepositories(db: DbExecutor): Repositories {
  return {
    documents: new DrizzleDocumentRepository(db),
    destinations: new DrizzleDestinationRepository(db),
    deliveries: new DrizzleDeliveryRepository(db),
    settings: new DrizzleSettingsRepository(db),
    credentials: new DrizzleCredentialRepository(db),
    transaction: <T>(fn: (repositories: Repositories) => Promise<T>): Promise<T> =>
      db.transaction((tx) => fn(createDrizzleRepositories(tx))),
  };
}

export {
  DrizzleDocumentRepository,
  DrizzleDestinationRepository,
  DrizzleDeliveryRepository,
  DrizzleSettingsRepository,
  DrizzleCredentialRepository,
};
