import { GotenbergRenderer, type IRenderer } from "@docrelay/converter";
import {
  ConversionStage,
  Dispatcher,
  ExtractionStage,
  IngestionGate,
  Orchestrator,
  WebhookNotifier,
  type INotifier,
} from "@docrelay/core";
import type { AdapterDependencies } from "@docrelay/destinations";
import {
  createMetadataExtractor,
  createOcrProvider,
  type IMetadataExtractor,
  type IOcrProvider,
} from "@docrelay/extraction";
import { createChildLogger, type Logger } from "@docrelay/logger";
import {
  CredentialManager,
  HttpOAuthClient,
  SettingsResolver,
  type InvalidationBus,
  type IOAuthClient,
} from "@docrelay/settings";
import type { ArtifactStore } from "@docrelay/storage";
import type { AppConfig, Repositories, TaskQueue } from "@docrelay/types";

export interface ServiceDependencies {
  config: AppConfig;
  repositories: Repositories;
  store: ArtifactStore;
  queue: TaskQueue;
  logger: Logger;
  /** Replaces the HTTP OAuth client, e.g. in tests. */
  oauth?: IOAuthClient;
  adapterDependencies?: AdapterDependencies;
  /** Replaces the webhook notifier, e.g. in tests. */
  notifier?: INotifier;
  /** An already built resolver, when the caller needed settings before the queues existed. */
  settings?: SettingsResolver;
  env?: Record<string, string | undefined>;
}

export interface Services {
  settings: SettingsResolver;
  credentials: CredentialManager;
  ingestion: IngestionGate;
  orchestrator: Orchestrator;
  dispatcher: Dispatcher;
  renderer: () => Promise<IRenderer>;
  ocr: () => Promise<IOcrProvider | null>;
  metadata: () => Promise<IMetadataExtractor | null>;
}

export function createSettings(
  deps: Pick<ServiceDependencies, "config" | "repositories" | "logger" | "env">,
  bus?: InvalidationBus,
): SettingsResolver {
  return new SettingsResolver({
    repository: deps.repositories.settings,
    encryptionKey: deps.config.encryption.key,
    env: deps.env,
    bus,
    logger: createChildLogger(deps.logger, { component: "settings" }),
  });
}

/** Wire the pipeline. External services are built from current settings on each use. */
export function createServices(deps: ServiceDependencies): Services {
  const { config, repositories, store, queue, logger } = deps;

  const settings = deps.settings ?? createSettings(deps);
  const credentials = new CredentialManager({
    repositories,
    oauth: deps.oauth ?? new HttpOAuthClient(settings),
    settings,
    encryptionKey: config.encryption.key,
    stateSecret: config.encryption.stateSecret,
    logger: createChildLogger(logger, { component: "credentials" }),
  });

  const notifier =
    deps.notifier ??
    new WebhookNotifier({ settings, logger: createChildLogger(logger, { component: "notifier" }) });

  const renderer = async (): Promise<IRenderer> =>
    new GotenbergRenderer({ baseUrl: await settings.require("renderer.url") });

  const ocr = async (): Promise<IOcrProvider | null> => {
    const [url, apiKey] = await Promise.all([settings.get("ocr.url"), settings.get("ocr.api_key")]);
    return createOcrProvider({ url: url.value, apiKey: apiKey.value });
  };

  const metadata = async (): Promise<IMetadataExtractor | null> => {
    const [apiKey, model, maxTextChars] = await Promise.all([
      settings.get("metadata.api_key"),
      settings.require("metadata.model"),
      settings.getNumber("metadata.max_text_chars"),
    ]);
    return createMetadataExtractor({ apiKey: apiKey.value, model, maxTextChars });
  };

  const dispatcher = new Dispatcher({
    documents: repositories.documents,
    destinations: repositories.destinations,
    deliveries: repositories.deliveries,
    store,
    settings,
    credentials,
    leaseMs: config.worker.deliveryLeaseMs,
    adapterDependencies: deps.adapterDependencies,
    notifier,
    logger: createChildLogger(logger, { component: "dispatcher" }),
  });

  const orchestrator = new Orchestrator({
    documents: repositories.documents,
    destinations: repositories.destinations,
    deliveries: repositories.deliveries,
    store,
    queue,
    settings,
    credentials,
    conversion: new ConversionStage({
      documents: repositories.documents,
      store,
      settings,
      renderer,
      logger: createChildLogger(logger, { component: "conversion" }),
    }),
    extraction: new ExtractionStage({
      documents: repositories.documents,
      store,
      settings,
      ocr,
      metadata,
      logger: createChildLogger(logger, { component: "extraction" }),
    }),
    dispatcher,
    notifier,
    logger: createChildLogger(logger, { component: "orchestrator" }),
  });

  const ingestion = new IngestionGate({
    documents: repositories.documents,
    store,
    settings,
    logger: createChildLogger(logger, { component: "ingestion" }),
  });

  return { settings, credentials, ingestion, orchestrator, dispatcher, renderer, ocr, metadata };
}
