import { createStateToken, seal, unseal, verifyStateToken } from "@docrelay/crypto";
import {
  AuthExpiredError,
  NotFoundError,
  ValidationError,
  classifyError,
  errorMessage,
} from "@docrelay/errors";
import { createSilentLogger, type Logger } from "@docrelay/logger";
import type {
  CredentialState,
  CredentialToken,
  DeliveryAttempt,
  OAuthProvider,
  Repositories,
  TokenGrant,
} from "@docrelay/types";
import type { IOAuthClient } from "./oauth-client.js";
import type { SettingsResolver } from "./settings-resolver.js";

export interface CredentialManagerOptions {
  repositories: Repositories;
  oauth: IOAuthClient;
  settings: SettingsResolver;
  encryptionKey: string;
  /** HMAC secret for authorization correlation tokens. */
  stateSecret: string;
  logger?: Logger;
  now?: () => Date;
}

export interface AuthorizationStart {
  url: string;
  state: string;
}

export interface AuthorizationResult {
  destinationId: string;
  provider: OAuthProvider;
  /** Deliveries moved from needs_reauth back to pending. */
  reopened: DeliveryAttempt[];
}

export interface RefreshSweepResult {
  refreshed: string[];
  expired: string[];
  failed: string[];
}

/**
 * OAuth lifecycle per destination:
 * unconfigured → authorizing → valid → expiring_soon → expired | revoked → authorizing.
 *
 * Tokens are sealed at rest and unsealed only for the duration of a call.
 */
export class CredentialManager {
  private readonly repositories: Repositories;
  private readonly oauth: IOAuthClient;
  private readonly settings: SettingsResolver;
  private readonly encryptionKey: string;
  private readonly stateSecret: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CredentialManagerOptions) {
    this.repositories = options.repositories;
    this.oauth = options.oauth;
    this.settings = options.settings;
    this.encryptionKey = options.encryptionKey;
    this.stateSecret = options.stateSecret;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async state(destinationId: string): Promise<CredentialState> {
    const token = await this.repositories.credentials.get(destinationId);
    if (!token) {
      return "unconfigured";
    }
    if (token.status !== "valid") {
      return token.status;
    }
    if (token.expiresAt === null) {
      return "valid";
    }
    const skewMs = await this.settings.getNumber("oauth.expiry_skew_ms");
    const remaining = token.expiresAt.getTime() - this.now().getTime();
    if (remaining <= 0) {
      // Still refreshable; only a failed refresh persists `expired`.
      return this.canRefresh(token) ? "expiring_soon" : "expired";
    }
    return remaining <= skewMs ? "expiring_soon" : "valid";
  }

  async beginAuthorization(
    destinationId: string,
    provider: OAuthProvider,
    redirectUri: string,
  ): Promise<AuthorizationStart> {
    const destination = await this.repositories.destinations.get(destinationId);
    if (!destination) {
      throw new NotFoundError(`Destination ${destinationId} not found`, {
        details: { destinationId },
      });
    }

    const ttlMs = await this.settings.getNumber("oauth.state_ttl_ms");
    const state = createStateToken(this.stateSecret);
    await this.repositories.credentials.saveState({
      token: state,
      destinationId,
      provider,
      redirectUri,
      expiresAt: new Date(this.now().getTime() + ttlMs),
    });

    const existing = await this.repositories.credentials.get(destinationId);
    if (!existing || existing.status !== "valid") {
      await this.repositories.credentials.save({
        destinationId,
        provider,
        accessToken: existing?.accessToken ?? null,
        refreshToken: existing?.refreshToken ?? null,
        expiresAt: existing?.expiresAt ?? null,
        refreshExpiresAt: existing?.refreshExpiresAt ?? null,
        scope: existing?.scope ?? null,
        status: "authorizing",
      });
    }

    const url = await this.oauth.authorizationUrl(provider, { redirectUri, state });
    this.logger.info({ destinationId, provider }, "authorization started");
    return { url, state };
  }

  async completeAuthorization(state: string, code: string): Promise<AuthorizationResult> {
    if (!verifyStateToken(state, this.stateSecret)) {
      throw new ValidationError("Authorization state is invalid", { state: "invalid" });
    }

    const pending = await this.repositories.credentials.consumeState(state);
    if (!pending) {
      throw new ValidationError("Authorization state is unknown or already used", {
        state: "unknown",
      });
    }
    if (pending.expiresAt.getTime() <= this.now().getTime()) {
      throw new ValidationError("Authorization state has expired", { state: "expired" });
    }

    const { destinationId, provider } = pending;
    const grant = await this.oauth.exchangeCode(provider, code, pending.redirectUri);

    const reopened = await this.repositories.transaction(async (tx) => {
      const existing = await tx.credentials.get(destinationId);
      await tx.credentials.save({
        destinationId,
        provider,
        accessToken: seal(grant.accessToken, this.encryptionKey),
        // Some providers only return a refresh token on the first consent.
        refreshToken: grant.refreshToken
          ? seal(grant.refreshToken, this.encryptionKey)
          : (existing?.refreshToken ?? null),
        expiresAt: grant.expiresAt,
        refreshExpiresAt: grant.refreshToken ? grant.refreshExpiresAt : (existing?.refreshExpiresAt ?? null),
        scope: grant.scope,
        status: "valid",
      });
      return tx.deliveries.reopenForDestination(destinationId);
    });

    this.logger.info(
      { destinationId, provider, reopened: reopened.length },
      "authorization completed",
    );
    return { destinationId, provider, reopened };
  }

  /**
   * Run `fn` with a usable access token. Refreshes at most once per call: up front when
   * the token is expired or about to expire, or after `fn` reports the token rejected.
   */
  async withAccessToken<T>(destinationId: string, fn: (accessToken: string) => Promise<T>): Promise<T> {
    let token = await this.requireUsable(destinationId);
    let refreshed = false;

    if (await this.needsRefresh(token)) {
      token = await this.refresh(token);
      refreshed = true;
    }

    try {
      return await fn(this.accessTokenOf(token));
    } catch (error: unknown) {
      if (refreshed || classifyError(error) !== "auth_expired" || !this.canRefresh(token)) {
        throw error;
      }
      this.logger.info({ destinationId }, "access token rejected, refreshing once");
      token = await this.refresh(token);
      return fn(this.accessTokenOf(token));
    }
  }

  /** Proactive refresh of tokens inside the expiry window; run periodically. */
  async refreshExpiring(): Promise<RefreshSweepResult> {
    const result: RefreshSweepResult = { refreshed: [], expired: [], failed: [] };
    const tokens = await this.repositories.credentials.list();

    for (const token of tokens) {
      if (
        token.status !== "valid" ||
        !this.canRefresh(token) ||
        (await this.state(token.destinationId)) !== "expiring_soon"
      ) {
        continue;
      }
      try {
        await this.refresh(token);
        result.refreshed.push(token.destinationId);
      } catch (error: unknown) {
        if (error instanceof AuthExpiredError) {
          result.expired.push(token.destinationId);
        } else {
          result.failed.push(token.destinationId);
          this.logger.warn(
            { destinationId: token.destinationId, err: error },
            "proactive token refresh failed",
          );
        }
      }
    }

    const expiredWithoutRefresh = tokens.filter(
      (token) =>
        token.status === "valid" &&
        !this.canRefresh(token) &&
        token.expiresAt !== null &&
        token.expiresAt.getTime() <= this.now().getTime(),
    );
    for (const token of expiredWithoutRefresh) {
      await this.markExpired(token);
      result.expired.push(token.destinationId);
    }

    return result;
  }

  async revoke(destinationId: string): Promise<void> {
    const token = await this.repositories.credentials.get(destinationId);
    if (!token) {
      return;
    }
    await this.repositories.credentials.save({
      ...token,
      accessToken: null,
      refreshToken: null,
      expiresAt: null,
      refreshExpiresAt: null,
      status: "revoked",
    });
    this.logger.info({ destinationId, provider: token.provider }, "credential revoked");
  }

  private async requireUsable(destinationId: string): Promise<CredentialToken> {
    const token = await this.repositories.credentials.get(destinationId);
    if (!token || token.accessToken === null || token.status !== "valid") {
      throw new AuthExpiredError(
        `Destination ${destinationId} has no usable credential (${token?.status ?? "unconfigured"})`,
        { details: { destinationId } },
      );
    }
    return token;
  }

  private async needsRefresh(token: CredentialToken): Promise<boolean> {
    if (token.expiresAt === null) {
      return false;
    }
    const skewMs = await this.settings.getNumber("oauth.expiry_skew_ms");
    const expiring = token.expiresAt.getTime() - this.now().getTime() <= skewMs;
    if (expiring && !this.canRefresh(token)) {
      if (token.expiresAt.getTime() <= this.now().getTime()) {
        await this.markExpired(token);
        throw new AuthExpiredError(`Credential for ${token.destinationId} expired`, {
          details: { destinationId: token.destinationId },
        });
      }
      return false;
    }
    return expiring;
  }

  private async refresh(token: CredentialToken): Promise<CredentialToken> {
    const refreshToken = this.canRefresh(token) ? token.refreshToken : null;
    if (refreshToken === null) {
      await this.markExpired(token);
      throw new AuthExpiredError(`Credential for ${token.destinationId} cannot be refreshed`, {
        details: { destinationId: token.destinationId },
      });
    }

    let grant: TokenGrant;
    try {
      grant = await this.oauth.refresh(token.provider, unseal(refreshToken, this.encryptionKey));
    } catch (error: unknown) {
      if (classifyError(error) === "transient") {
        throw error;
      }
      await this.markExpired(token);
      throw new AuthExpiredError(
        `Refreshing the credential for ${token.destinationId} failed: ${errorMessage(error)}`,
        { details: { destinationId: token.destinationId }, cause: error },
      );
    }

    const saved = await this.repositories.credentials.save({
      ...token,
      accessToken: seal(grant.accessToken, this.encryptionKey),
      refreshToken: grant.refreshToken
        ? seal(grant.refreshToken, this.encryptionKey)
        : token.refreshToken,
      expiresAt: grant.expiresAt,
      refreshExpiresAt: grant.refreshToken ? grant.refreshExpiresAt : token.refreshExpiresAt,
      scope: grant.scope ?? token.scope,
      status: "valid",
    });
    this.logger.info({ destinationId: token.destinationId }, "access token refreshed");
    return saved;
  }

  /** A refresh token that is present and not itself past its expiry. */
  private canRefresh(token: CredentialToken): boolean {
    return (
      token.refreshToken !== null &&
      (token.refreshExpiresAt === null || token.refreshExpiresAt.getTime() > this.now().getTime())
    );
  }

  private async markExpired(token: CredentialToken): Promise<void> {
    await this.repositories.credentials.save({ ...token, status: "expired" });
    this.logger.warn({ destinationId: token.destinationId }, "credential expired");
  }

  private accessTokenOf(token: CredentialToken): string {
    if (token.accessToken === null) {
      throw new AuthExpiredError(`Destination ${token.destinationId} has no access token`, {
        details: { destinationId: token.destinationId },
      });
    }
    return unseal(token.accessToken, this.encryptionKey);
  }
}
