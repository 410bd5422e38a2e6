import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { signPayload } from "@docrelay/crypto";
import { createMemoryRepositories } from "@docrelay/db";
import { SettingsResolver } from "@docrelay/settings";
import { EVENT_HEADER, SIGNATURE_HEADER, WebhookNotifier } from "./notifier.js";

const ENCRYPTION_KEY = "abcdefghijklmnopqrstuvwxyz012345";
const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("WebhookNotifier", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let sleep: ReturnType<typeof vi.fn<(ms: number) => Promise<void>>>;

  function notifier(overrides: Record<string, string>): WebhookNotifier {
    const settings = new SettingsResolver({
      repository: createMemoryRepositories().settings,
      encryptionKey: ENCRYPTION_KEY,
      env: {},
      overrides,
    });
    return new WebhookNotifier({ settings, sleep, now: () => NOW });
  }

  beforeEach(() => {
    sleep = vi.fn(async (_ms: number) => undefined);
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it("sends nothing while no webhook URL is configured", async () => {
    await notifier({}).notify("document.failed", { documentId: "doc-1" });

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("posts a signed JSON envelope", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await notifier({
      "notify.webhook_url": "http://hooks.test/docrelay",
      "notify.webhook_secret": "test-secret",
    }).notify("document.delivered", { documentId: "doc-1", status: "delivered" });

    const body = '{"event":"document.delivered","timestamp":"2026-03-01T12:00:00.000Z","data":{"documentId":"doc-1","status":"delivered"}}';
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://hooks.test/docrelay");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(body);
    expect(init?.headers).toEqual({
      "content-type": "application/json",
      [EVENT_HEADER]: "document.delivered",
      [SIGNATURE_HEADER]: `sha256=${signPayload(body, "test-secret")}`,
    });
  });

  it("leaves the body unsigned without a secret", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));

    await notifier({ "notify.webhook_url": "http://hooks.test/docrelay" }).notify("credential.failed", {
      destinationId: "drive",
      error: "expired",
    });

    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      "content-type": "application/json",
      [EVENT_HEADER]: "credential.failed",
    });
  });

  it("retries a busy endpoint, then gives up without throwing", async () => {
    fetchMock.mockImplementation(async () => new Response("busy", { status: 503 }));

    await expect(
      notifier({ "notify.webhook_url": "http://hooks.test/docrelay" }).notify("document.failed", {
        documentId: "doc-1",
      }),
    ).resolves.toBeUndefined();

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry a rejected request", async () => {
    fetchMock.mockImplementation(async () => new Response("bad request", { status: 400 }));

    await notifier({ "notify.webhook_url": "http://hooks.test/docrelay" }).notify("document.failed", {
      documentId: "doc-1",
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
