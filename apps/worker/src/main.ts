import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import { Redis as IORedis } from "ioredis";
import { parseEnv } from "@docrelay/config";
import { closeDbClient, createDbClient, createDrizzleRepositories } from "@docrelay/db";
import { createLogger, type Logger } from "@docrelay/logger";
import {
  BullTaskQueue,
  QUEUE_NAMES,
  closeQueues,
  createDeadLetterQueue,
  createBackoffStrategy,
  createQueues,
  parseRedisConnection,
  scheduleCredentialCheck,
  scheduleStalledSweep,
  type MaintenanceJobData,
} from "@docrelay/queue";
import { RedisInvalidationBus } from "@docrelay/settings";
import { LocalArtifactStore } from "@docrelay/storage";
import type { AppConfig, DeliveryJobData, StageJobData } from "@docrelay/types";
import { createDeadLetterForwarder, type DeadLetterSink } from "./dead-letter.js";
import { createDeliveryProcessor } from "./processors/delivery.js";
import { createMaintenanceProcessor } from "./processors/maintenance.js";
import { createStageProcessor } from "./processors/stage.js";
import { createServices, createSettings, type Services } from "./services.js";

function createWorkers(
  config: AppConfig,
  connection: ConnectionOptions,
  services: Services,
  deadLetters: DeadLetterSink,
  logger: Logger,
): Worker[] {
  // A job whose lock is not renewed within this window is considered stalled and requeued.
  const lockDuration = config.worker.visibilityTimeoutMs;
  const settings = { backoffStrategy: createBackoffStrategy(() => services.settings.getRetryPolicy("stage")) };

  const pipelineWorker = new Worker<StageJobData>(
    QUEUE_NAMES.PIPELINE,
    createStageProcessor(services.orchestrator),
    { connection, concurrency: config.worker.pipelineConcurrency, lockDuration, settings },
  );

  const deliveryWorker = new Worker<DeliveryJobData>(
    QUEUE_NAMES.DELIVERY,
    createDeliveryProcessor(services.orchestrator),
    { connection, concurrency: config.worker.deliveryConcurrency, lockDuration, settings },
  );

  const maintenanceWorker = new Worker<MaintenanceJobData>(
    QUEUE_NAMES.MAINTENANCE,
    createMaintenanceProcessor(services.orchestrator, { stalledAfterMs: config.worker.visibilityTimeoutMs }),
    { connection, concurrency: 1 },
  );

  const workers: Worker[] = [pipelineWorker, deliveryWorker, maintenanceWorker];
  for (const worker of workers) {
    const forward = createDeadLetterForwarder(worker.name, deadLetters, logger);
    worker.on("failed", (job, error) => {
      void forward(job, error);
    });
    worker.on("error", (error) => {
      logger.error({ queue: worker.name, err: error }, "worker error");
    });
  }
  return workers;
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "worker" });

  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  const repositories = createDrizzleRepositories(db);
  const connection = parseRedisConnection(config.redis.url);

  // The attempt limit is fixed per queue at startup; backoff delays follow live settings.
  // Settings writes from any process drop the cached value everywhere.
  const publisher = new IORedis(config.redis.url);
  const subscriber = publisher.duplicate();
  const settings = createSettings(
    { config, repositories, logger },
    new RedisInvalidationBus({ publisher, subscriber }),
  );
  const stopListening = await settings.listen();
  const stagePolicy = await settings.getRetryPolicy("stage");

  const queues = createQueues({ connection, stagePolicy });
  const deadLetterQueue = createDeadLetterQueue(connection);
  const services = createServices({
    config,
    repositories,
    store: new LocalArtifactStore(config.storage.dir),
    queue: new BullTaskQueue({ pipeline: queues.pipelineQueue, delivery: queues.deliveryQueue }),
    logger,
    settings,
  });

  const renderer = await services.renderer();
  if (!(await renderer.healthCheck())) {
    logger.warn({ renderer: renderer.name }, "renderer is not reachable; conversions will be retried");
  }

  await scheduleCredentialCheck(queues, config.worker.credentialCheckIntervalMs);
  await scheduleStalledSweep(queues, config.worker.stalledSweepIntervalMs);
  const workers = createWorkers(config, connection, services, deadLetterQueue, logger);

  logger.info(
    { workers: workers.length, queues: Object.values(QUEUE_NAMES) },
    "worker started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await closeQueues(queues);
    await deadLetterQueue.close();
    await stopListening();
    await Promise.all([publisher.quit(), subscriber.quit()]);
    await closeDbClient(db);
    logger.info("all workers closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: "worker" }).fatal({ err }, "worker failed to start");
  process.exit(1);
});
