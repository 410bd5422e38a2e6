export { IngestionGate } from "./ingestion-gate.js";
export type { IngestInput, IngestFromUrlOptions, IngestionGateOptions } from "./ingestion-gate.js";

export { ConversionStage } from "./conversion-stage.js";
export type { ConversionStageOptions } from "./conversion-stage.js";

export { ExtractionStage } from "./extraction-stage.js";
export type { ExtractionStageOptions } from "./extraction-stage.js";

export { Dispatcher } from "./dispatcher.js";
export type { DispatcherOptions, PreparedDelivery } from "./dispatcher.js";

export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, CredentialCheckResult } from "./orchestrator.js";

export { NO_NOTIFIER, WebhookNotifier, EVENT_HEADER, SIGNATURE_HEADER } from "./notifier.js";
export type { INotifier, NotificationEvent, WebhookNotifierOptions } from "./notifier.js";

export { aggregateDeliveryStatus, nextDocumentStatus } from "./document-status.js";
export { sniffMime } from "./mime.js";
export type { SniffInput } from "./mime.js";
export { deliveredName, displayName } from "./filenames.js";
