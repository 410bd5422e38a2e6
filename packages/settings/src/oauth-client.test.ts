import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MemorySettingsRepository } from "@docrelay/db";
import { AuthExpiredError, PermanentError, TransientError, ValidationError } from "@docrelay/errors";
import { HttpOAuthClient } from "./oauth-client.js";
import { SettingsResolver } from "./settings-resolver.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("HttpOAuthClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let client: HttpOAuthClient;

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
    const settings = new SettingsResolver({
      repository: new MemorySettingsRepository(),
      encryptionKey: "abcdefghijklmnopqrstuvwxyz012345",
      env: {
        DROPBOX_APP_KEY: "test-app-key",
        DROPBOX_APP_SECRET: "test-app-secret",
        ONEDRIVE_CLIENT_ID: "test-client-id",
        ONEDRIVE_CLIENT_SECRET: "test-client-secret",
      },
    });
    client = new HttpOAuthClient(settings, { now: () => NOW });
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it("builds the authorize URL with offline access", async () => {
    const url = new URL(
      await client.authorizationUrl("dropbox", {
        redirectUri: "http://localhost/oauth/callback",
        state: "state-1",
      }),
    );

    expect(url.origin + url.pathname).toBe("https://www.dropbox.com/oauth2/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-app-key");
    expect(url.searchParams.get("state")).toBe("state-1");
    expect(url.searchParams.get("token_access_type")).toBe("offline");
    expect(url.searchParams.get("response_type")).toBe("code");
  });

  it("uses the configured tenant for OneDrive", async () => {
    const url = await client.authorizationUrl("onedrive", {
      redirectUri: "http://localhost/cb",
      state: "s",
    });

    expect(url.startsWith("https://login.microsoftonline.com/common/oauth2/v2.0/authorize?")).toBe(
      true,
    );
  });

  it("exchanges a code for tokens", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        access_token: "test-access",
        refresh_token: "test-refresh",
        expires_in: 3600,
        refresh_token_expires_in: 86400,
        scope: "files.content.write",
      }),
    );

    const grant = await client.exchangeCode("dropbox", "code-1", "http://localhost/cb");

    expect(grant).toEqual({
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiresAt: new Date("2026-03-01T13:00:00.000Z"),
      refreshExpiresAt: new Date("2026-03-02T12:00:00.000Z"),
      scope: "files.content.write",
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.dropboxapi.com/oauth2/token");
    const body = new URLSearchParams(String(init?.body));
    expect(body.get("grant_type")).toBe("authorization_code");
    expect(body.get("code")).toBe("code-1");
    expect(body.get("client_secret")).toBe("test-app-secret");
  });

  it("maps invalid_grant to AuthExpiredError", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: "invalid_grant" }, 400));

    await expect(client.refresh("dropbox", "test-refresh")).rejects.toBeInstanceOf(AuthExpiredError);
  });

  it("classifies other failures by status", async () => {
    fetchMock.mockResolvedValueOnce(new Response("busy", { status: 503 }));
    await expect(client.refresh("dropbox", "r")).rejects.toBeInstanceOf(TransientError);

    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "invalid_request" }, 400));
    await expect(client.refresh("dropbox", "r")).rejects.toBeInstanceOf(PermanentError);
  });

  it("requires client credentials", async () => {
    await expect(client.refresh("google_drive", "r")).rejects.toBeInstanceOf(ValidationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
