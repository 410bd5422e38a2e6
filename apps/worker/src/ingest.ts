import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseArgs } from "node:util";
import { parseEnv } from "@docrelay/config";
import type { IngestionGate, Orchestrator } from "@docrelay/core";
import { closeDbClient, createDbClient, createDrizzleRepositories } from "@docrelay/db";
import { createLogger, type Logger } from "@docrelay/logger";
import { BullTaskQueue, closeQueues, createQueues, parseRedisConnection } from "@docrelay/queue";
import { LocalArtifactStore } from "@docrelay/storage";
import type { Document } from "@docrelay/types";
import { createServices, createSettings } from "./services.js";

export interface IngestTarget {
  kind: "file" | "url";
  value: string;
}

/** `--url` values are fetched, every positional argument is read from disk. */
export function parseIngestArgs(args: string[]): IngestTarget[] {
  const { values, positionals } = parseArgs({
    args,
    options: { url: { type: "string", multiple: true } },
    allowPositionals: true,
  });
  return [
    ...positionals.map((value): IngestTarget => ({ kind: "file", value })),
    ...(values.url ?? []).map((value): IngestTarget => ({ kind: "url", value })),
  ];
}

export async function ingestTargets(
  targets: IngestTarget[],
  ingestion: Pick<IngestionGate, "ingest" | "ingestFromUrl">,
  orchestrator: Pick<Orchestrator, "start">,
  logger: Logger,
  readBytes: (path: string) => Promise<Uint8Array> = (path) => readFile(path),
): Promise<Document[]> {
  const documents: Document[] = [];
  for (const target of targets) {
    const document =
      target.kind === "url"
        ? await ingestion.ingestFromUrl(target.value)
        : await ingestion.ingest({
            bytes: await readBytes(target.value),
            filename: basename(target.value),
            source: "upload",
          });
    await orchestrator.start(document.id);
    logger.info({ documentId: document.id, source: target.value }, "document queued");
    documents.push(document);
  }
  return documents;
}

async function main(): Promise<void> {
  const targets = parseIngestArgs(process.argv.slice(2));
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "ingest" });
  if (targets.length === 0) {
    logger.error("usage: ingest <file...> [--url <url>...]");
    process.exit(2);
  }

  const db = createDbClient({ url: config.database.url, maxConnections: 2 });
  const repositories = createDrizzleRepositories(db);
  const settings = createSettings({ config, repositories, logger });
  const queues = createQueues({
    connection: parseRedisConnection(config.redis.url),
    stagePolicy: await settings.getRetryPolicy("stage"),
  });

  try {
    const services = createServices({
      config,
      repositories,
      store: new LocalArtifactStore(config.storage.dir),
      queue: new BullTaskQueue({ pipeline: queues.pipelineQueue, delivery: queues.deliveryQueue }),
      logger,
      settings,
    });
    await ingestTargets(targets, services.ingestion, services.orchestrator, logger);
  } finally {
    await closeQueues(queues);
    await closeDbClient(db);
  }
}

const entry = process.argv[1];
if (entry && import.meta.url.endsWith(basename(entry))) {
  main().catch((err: unknown) => {
    createLogger({ service: "ingest" }).fatal({ err }, "ingest failed");
    process.exit(1);
  });
}
