import { describe, expect, it, vi } from "vitest";
import { parseEnv } from "@docrelay/config";
import { createMemoryRepositories } from "@docrelay/db";
import { createSilentLogger } from "@docrelay/logger";
import { MemoryTaskQueue } from "@docrelay/queue";
import type { IOAuthClient } from "@docrelay/settings";
import { MemoryArtifactStore } from "@docrelay/storage";
import { ingestTargets, parseIngestArgs } from "./ingest.js";
import { createServices } from "./services.js";

const config = parseEnv({
  NODE_ENV: "test",
  DATABASE_URL: "postgresql://localhost:5432/test",
  REDIS_URL: "redis://localhost:6379",
  ENCRYPTION_KEY: "abcdefghijklmnopqrstuvwxyz012345",
  STATE_SECRET: "test-state-secret-test-state-secret",
  STORAGE_DIR: "/var/lib/docrelay",
});

const oauth: IOAuthClient = {
  authorizationUrl: vi.fn<IOAuthClient["authorizationUrl"]>(),
  exchangeCode: vi.fn<IOAuthClient["exchangeCode"]>(),
  refresh: vi.fn<IOAuthClient["refresh"]>(),
};

function build() {
  const queue = new MemoryTaskQueue();
  const services = createServices({
    config,
    repositories: createMemoryRepositories(),
    store: new MemoryArtifactStore(),
    queue,
    logger: createSilentLogger(),
    oauth,
    env: {},
  });
  return { services, queue };
}

describe("createServices", () => {
  it("builds the renderer from the configured URL", async () => {
    const { services } = build();

    const renderer = await services.renderer();

    expect(renderer.name).toBe("gotenberg");
  });

  it("leaves OCR and metadata extraction off until they are configured", async () => {
    const { services } = build();

    expect(await services.ocr()).toBeNull();
    expect(await services.metadata()).toBeNull();

    services.settings.setOverride("ocr.url", "http://ocr.test");
    services.settings.setOverride("metadata.api_key", "test-secret");

    expect(await services.ocr()).not.toBeNull();
    expect(await services.metadata()).not.toBeNull();
  });

  it("queues conversion for ingested documents", async () => {
    const { services, queue } = build();
    const pdf = new TextEncoder().encode("%PDF-1.4\nhello");

    const [document] = await ingestTargets(
      [{ kind: "file", value: "/inbox/Invoice Jan.pdf" }],
      services.ingestion,
      services.orchestrator,
      createSilentLogger(),
      () => Promise.resolve(pdf),
    );

    expect(document?.originalName).toBe("Invoice Jan.pdf");
    expect(document?.status).toBe("received");
    expect(queue.peek()).toEqual([
      {
        kind: "stage",
        id: `${document?.id}-convert`,
        data: { documentId: document?.id, stage: "convert" },
      },
    ]);
  });
});

describe("parseIngestArgs", () => {
  it("reads files from positionals and URLs from --url", () => {
    expect(parseIngestArgs(["a.pdf", "--url", "https://files.test/b.docx", "c.txt"])).toEqual([
      { kind: "file", value: "a.pdf" },
      { kind: "file", value: "c.txt" },
      { kind: "url", value: "https://files.test/b.docx" },
    ]);
  });
});
