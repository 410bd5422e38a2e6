import { describe, it, expect, vi, beforeEach } from "vitest";
import { createMemoryRepositories, type MemoryRepositories } from "@docrelay/db";
import { seal, unseal } from "@docrelay/crypto";
import { AuthExpiredError, TransientError, ValidationError } from "@docrelay/errors";
import type { TokenGrant } from "@docrelay/types";
import { CredentialManager } from "./credential-manager.js";
import type { IOAuthClient } from "./oauth-client.js";
import { SettingsResolver } from "./settings-resolver.js";

const ENCRYPTION_KEY = "abcdefghijklmnopqrstuvwxyz012345";
const STATE_SECRET = "test-state-secret-test-state-secret";
const NOW = new Date("2026-03-01T12:00:00.000Z");
const IN_ONE_HOUR = new Date("2026-03-01T13:00:00.000Z");

function grant(overrides: Partial<TokenGrant> = {}): TokenGrant {
  return {
    accessToken: "test-access-2",
    refreshToken: "test-refresh-2",
    expiresAt: IN_ONE_HOUR,
    refreshExpiresAt: null,
    scope: "files.content.write",
    ...overrides,
  };
}

describe("CredentialManager", () => {
  let repos: MemoryRepositories;
  let oauth: {
    authorizationUrl: ReturnType<typeof vi.fn<IOAuthClient["authorizationUrl"]>>;
    exchangeCode: ReturnType<typeof vi.fn<IOAuthClient["exchangeCode"]>>;
    refresh: ReturnType<typeof vi.fn<IOAuthClient["refresh"]>>;
  };
  let manager: CredentialManager;

  async function storeToken(
    expiresAt: Date | null,
    refreshToken: string | null = "test-refresh",
    refreshExpiresAt: Date | null = null,
  ) {
    await repos.credentials.save({
      destinationId: "dropbox-1",
      provider: "dropbox",
      accessToken: seal("test-access", ENCRYPTION_KEY),
      refreshToken: refreshToken === null ? null : seal(refreshToken, ENCRYPTION_KEY),
      expiresAt,
      refreshExpiresAt,
      scope: null,
      status: "valid",
    });
  }

  beforeEach(async () => {
    repos = createMemoryRepositories();
    await repos.destinations.save({
      id: "dropbox-1",
      name: "Dropbox",
      type: "cloud_drive",
      enabled: true,
      targetPathTemplate: "/Scans/{filename}",
      credentialRef: "dropbox-1",
      options: { provider: "dropbox" },
    });
    oauth = {
      authorizationUrl: vi.fn<IOAuthClient["authorizationUrl"]>(),
      exchangeCode: vi.fn<IOAuthClient["exchangeCode"]>(),
      refresh: vi.fn<IOAuthClient["refresh"]>(),
    };
    manager = new CredentialManager({
      repositories: repos,
      oauth,
      settings: new SettingsResolver({
        repository: repos.settings,
        encryptionKey: ENCRYPTION_KEY,
        env: {},
      }),
      encryptionKey: ENCRYPTION_KEY,
      stateSecret: STATE_SECRET,
      now: () => NOW,
    });
  });

  describe("authorization", () => {
    it("moves an unconfigured destination to authorizing and then valid", async () => {
      oauth.authorizationUrl.mockResolvedValue("https://provider.test/authorize");
      oauth.exchangeCode.mockResolvedValue(grant());

      expect(await manager.state("dropbox-1")).toBe("unconfigured");

      const started = await manager.beginAuthorization(
        "dropbox-1",
        "dropbox",
        "http://localhost/callback",
      );
      expect(started.url).toBe("https://provider.test/authorize");
      expect(await manager.state("dropbox-1")).toBe("authorizing");

      const result = await manager.completeAuthorization(started.state, "code-1");

      expect(result).toEqual({ destinationId: "dropbox-1", provider: "dropbox", reopened: [] });
      expect(oauth.exchangeCode).toHaveBeenCalledWith("dropbox", "code-1", "http://localhost/callback");
      expect(await manager.state("dropbox-1")).toBe("valid");

      const stored = await repos.credentials.get("dropbox-1");
      expect(stored?.accessToken).not.toBe("test-access-2");
      expect(unseal(stored?.accessToken ?? "", ENCRYPTION_KEY)).toBe("test-access-2");
    });

    it("returns needs_reauth deliveries to pending on completion", async () => {
      oauth.authorizationUrl.mockResolvedValue("https://provider.test/authorize");
      oauth.exchangeCode.mockResolvedValue(grant());
      await repos.deliveries.ensure("doc-1", "dropbox-1");
      await repos.deliveries.claim("doc-1", "dropbox-1", 60_000, NOW);
      await repos.deliveries.complete("doc-1", "dropbox-1", 1, {
        state: "needs_reauth",
        errorClass: "auth_expired",
        error: "expired",
        remoteRef: null,
      });

      const { state } = await manager.beginAuthorization("dropbox-1", "dropbox", "http://cb");
      const result = await manager.completeAuthorization(state, "code");

      expect(result.reopened.map((a) => a.documentId)).toEqual(["doc-1"]);
      expect((await repos.deliveries.get("doc-1", "dropbox-1"))?.state).toBe("pending");
    });

    it("rejects forged, replayed and expired state tokens", async () => {
      oauth.authorizationUrl.mockResolvedValue("https://provider.test/authorize");
      oauth.exchangeCode.mockResolvedValue(grant());

      await expect(manager.completeAuthorization("forged.deadbeef", "code")).rejects.toThrow(
        "Authorization state is invalid",
      );

      const { state } = await manager.beginAuthorization("dropbox-1", "dropbox", "http://cb");
      await manager.completeAuthorization(state, "code");
      await expect(manager.completeAuthorization(state, "code")).rejects.toThrow(
        "Authorization state is unknown or already used",
      );

      const later = await manager.beginAuthorization("dropbox-1", "dropbox", "http://cb");
      const expiredManager = new CredentialManager({
        repositories: repos,
        oauth,
        settings: new SettingsResolver({ repository: repos.settings, encryptionKey: ENCRYPTION_KEY, env: {} }),
        encryptionKey: ENCRYPTION_KEY,
        stateSecret: STATE_SECRET,
        now: () => new Date(NOW.getTime() + 600_001),
      });
      await expect(expiredManager.completeAuthorization(later.state, "code")).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(oauth.exchangeCode).toHaveBeenCalledTimes(1);
    });

    it("keeps the previous refresh token when the provider omits one", async () => {
      await storeToken(IN_ONE_HOUR, "test-refresh-original");
      oauth.authorizationUrl.mockResolvedValue("https://provider.test/authorize");
      oauth.exchangeCode.mockResolvedValue(grant({ refreshToken: null }));

      const { state } = await manager.beginAuthorization("dropbox-1", "dropbox", "http://cb");
      await manager.completeAuthorization(state, "code");

      const stored = await repos.credentials.get("dropbox-1");
      expect(unseal(stored?.refreshToken ?? "", ENCRYPTION_KEY)).toBe("test-refresh-original");
    });

    it("stores the refresh token's own expiry", async () => {
      const inThirtyDays = new Date("2026-03-31T12:00:00.000Z");
      oauth.authorizationUrl.mockResolvedValue("https://provider.test/authorize");
      oauth.exchangeCode.mockResolvedValue(grant({ refreshExpiresAt: inThirtyDays }));

      const { state } = await manager.beginAuthorization("dropbox-1", "dropbox", "http://cb");
      await manager.completeAuthorization(state, "code");

      expect((await repos.credentials.get("dropbox-1"))?.refreshExpiresAt).toEqual(inThirtyDays);
    });
  });

  describe("withAccessToken", () => {
    it("passes the current token when it is not close to expiry", async () => {
      await storeToken(IN_ONE_HOUR);
      const fn = vi.fn().mockResolvedValue("uploaded");

      expect(await manager.withAccessToken("dropbox-1", fn)).toBe("uploaded");
      expect(fn).toHaveBeenCalledWith("test-access");
      expect(oauth.refresh).not.toHaveBeenCalled();
    });

    it("refreshes before use inside the expiry window", async () => {
      await storeToken(new Date(NOW.getTime() + 60_000));
      oauth.refresh.mockResolvedValue(grant());
      const fn = vi.fn().mockResolvedValue("uploaded");

      await manager.withAccessToken("dropbox-1", fn);

      expect(oauth.refresh).toHaveBeenCalledWith("dropbox", "test-refresh");
      expect(fn).toHaveBeenCalledWith("test-access-2");
      expect(await manager.state("dropbox-1")).toBe("valid");
    });

    it("refreshes once and re-runs when the provider rejects the token", async () => {
      await storeToken(IN_ONE_HOUR);
      oauth.refresh.mockResolvedValue(grant());
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new AuthExpiredError("401"))
        .mockResolvedValue("uploaded");

      expect(await manager.withAccessToken("dropbox-1", fn)).toBe("uploaded");
      expect(fn.mock.calls).toEqual([["test-access"], ["test-access-2"]]);
      expect(oauth.refresh).toHaveBeenCalledTimes(1);
    });

    it("does not refresh twice in one use", async () => {
      await storeToken(new Date(NOW.getTime() + 60_000));
      oauth.refresh.mockResolvedValue(grant());
      const fn = vi.fn().mockRejectedValue(new AuthExpiredError("still 401"));

      await expect(manager.withAccessToken("dropbox-1", fn)).rejects.toThrow("still 401");
      expect(oauth.refresh).toHaveBeenCalledTimes(1);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("marks the token expired when the refresh is rejected", async () => {
      await storeToken(new Date(NOW.getTime() - 1));
      oauth.refresh.mockRejectedValue(new AuthExpiredError("invalid_grant"));

      await expect(manager.withAccessToken("dropbox-1", vi.fn())).rejects.toBeInstanceOf(
        AuthExpiredError,
      );
      expect(await manager.state("dropbox-1")).toBe("expired");
    });

    it("does not send a refresh token that has itself expired", async () => {
      await storeToken(new Date(NOW.getTime() - 1), "test-refresh", new Date("2026-02-01T00:00:00.000Z"));
      const fn = vi.fn();

      await expect(manager.withAccessToken("dropbox-1", fn)).rejects.toBeInstanceOf(AuthExpiredError);
      expect(oauth.refresh).not.toHaveBeenCalled();
      expect(fn).not.toHaveBeenCalled();
      expect((await repos.credentials.get("dropbox-1"))?.status).toBe("expired");
    });

    it("leaves the token valid when the refresh fails transiently", async () => {
      await storeToken(new Date(NOW.getTime() - 1));
      oauth.refresh.mockRejectedValue(new TransientError("provider down"));

      await expect(manager.withAccessToken("dropbox-1", vi.fn())).rejects.toBeInstanceOf(
        TransientError,
      );
      expect((await repos.credentials.get("dropbox-1"))?.status).toBe("valid");
    });

    it("fails with AuthExpiredError when no credential exists", async () => {
      await expect(manager.withAccessToken("dropbox-1", vi.fn())).rejects.toThrow(
        "Destination dropbox-1 has no usable credential (unconfigured)",
      );
    });
  });

  describe("refreshExpiring", () => {
    it("refreshes tokens inside the window and expires dead ones", async () => {
      await storeToken(new Date(NOW.getTime() + 60_000));
      await repos.destinations.save({
        id: "onedrive-1",
        name: "OneDrive",
        type: "cloud_drive",
        enabled: true,
        targetPathTemplate: "{filename}",
        credentialRef: "onedrive-1",
        options: { provider: "onedrive" },
      });
      await repos.credentials.save({
        destinationId: "onedrive-1",
        provider: "onedrive",
        accessToken: seal("test-access", ENCRYPTION_KEY),
        refreshToken: null,
        expiresAt: new Date(NOW.getTime() - 1),
        refreshExpiresAt: null,
        scope: null,
        status: "valid",
      });
      oauth.refresh.mockResolvedValue(grant());

      expect(await manager.refreshExpiring()).toEqual({
        refreshed: ["dropbox-1"],
        expired: ["onedrive-1"],
        failed: [],
      });
      expect(await manager.state("onedrive-1")).toBe("expired");
    });
  });

  it("revoke clears tokens", async () => {
    await storeToken(IN_ONE_HOUR);

    await manager.revoke("dropbox-1");

    expect(await repos.credentials.get("dropbox-1")).toMatchObject({
      accessToken: null,
      refreshToken: null,
      status: "revoked",
    });
    expect(await manager.state("dropbox-1")).toBe("revoked");
  });
});
