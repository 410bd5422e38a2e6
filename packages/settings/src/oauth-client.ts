import { z } from "zod";
import {
  AuthExpiredError,
  ExternalServiceError,
  ValidationError,
  errorFromResponse,
} from "@docrelay/errors";
import type { OAuthProvider, TokenGrant } from "@docrelay/types";
import { OAUTH_PROVIDERS } from "./oauth-providers.js";
import type { SettingsResolver } from "./settings-resolver.js";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().positive().optional(),
  refresh_token_expires_in: z.coerce.number().positive().optional(),
  scope: z.string().optional(),
});

const oauthErrorSchema = z.object({ error: z.string() });

export interface AuthorizationRequest {
  redirectUri: string;
  state: string;
}

/** Provider-facing half of the OAuth lifecycle. */
export interface IOAuthClient {
  authorizationUrl(provider: OAuthProvider, request: AuthorizationRequest): Promise<string>;
  exchangeCode(provider: OAuthProvider, code: string, redirectUri: string): Promise<TokenGrant>;
  refresh(provider: OAuthProvider, refreshToken: string): Promise<TokenGrant>;
}

export interface HttpOAuthClientOptions {
  timeoutMs?: number;
  now?: () => Date;
}

const DEFAULT_TIMEOUT_MS = 15_000;

/** Authorization-code flow over each provider's token endpoint. */
export class HttpOAuthClient implements IOAuthClient {
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly settings: SettingsResolver,
    options: HttpOAuthClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  async authorizationUrl(provider: OAuthProvider, request: AuthorizationRequest): Promise<string> {
    const config = OAUTH_PROVIDERS[provider];
    const { clientId, tenant } = await this.clientCredentials(provider);
    const url = new URL(config.authorizeUrl(tenant));
    url.search = new URLSearchParams({
      client_id: clientId,
      redirect_uri: request.redirectUri,
      response_type: "code",
      scope: config.scope,
      state: request.state,
      ...config.authorizeParams,
    }).toString();
    return url.toString();
  }

  async exchangeCode(provider: OAuthProvider, code: string, redirectUri: string): Promise<TokenGrant> {
    return this.tokenRequest(provider, {
      grant_type: "authorization_code",
      code,
      redirect_uri: redirectUri,
    });
  }

  async refresh(provider: OAuthProvider, refreshToken: string): Promise<TokenGrant> {
    return this.tokenRequest(provider, {
      grant_type: "refresh_token",
      refresh_token: refreshToken,
    });
  }

  private async tokenRequest(
    provider: OAuthProvider,
    params: Record<string, string>,
  ): Promise<TokenGrant> {
    const config = OAUTH_PROVIDERS[provider];
    const { clientId, clientSecret, tenant } = await this.clientCredentials(provider);

    const response = await fetch(config.tokenUrl(tenant), {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
      body: new URLSearchParams({ ...params, client_id: clientId, client_secret: clientSecret }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw await this.tokenError(response, config.label);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError(
        `${config.label} token endpoint returned an unexpected payload`,
        config.label,
        { cause: parsed.error },
      );
    }

    const { access_token, refresh_token, expires_in, refresh_token_expires_in, scope } = parsed.data;
    return {
      accessToken: access_token,
      refreshToken: refresh_token ?? null,
      expiresAt: this.after(expires_in),
      refreshExpiresAt: this.after(refresh_token_expires_in),
      scope: scope ?? null,
    };
  }

  private after(seconds: number | undefined): Date | null {
    return seconds === undefined ? null : new Date(this.now().getTime() + seconds * 1_000);
  }

  /** `invalid_grant` means the code or refresh token is dead; the user must re-authorize. */
  private async tokenError(response: Response, service: string): Promise<Error> {
    if (response.status === 400) {
      const body = oauthErrorSchema.safeParse(await response.clone().json().catch(() => null));
      if (body.success && body.data.error === "invalid_grant") {
        return new AuthExpiredError(`${service} rejected the grant (invalid_grant)`, {
          details: { service, status: response.status },
        });
      }
    }
    return errorFromResponse(response, service);
  }

  private async clientCredentials(
    provider: OAuthProvider,
  ): Promise<{ clientId: string; clientSecret: string; tenant: string }> {
    const [clientId, clientSecret] = await Promise.all([
      this.settings.get(`oauth.${provider}.client_id`),
      this.settings.get(`oauth.${provider}.client_secret`),
    ]);
    if (!clientId.value || !clientSecret.value) {
      throw new ValidationError(`${OAUTH_PROVIDERS[provider].label} OAuth client is not configured`, {
        [`oauth.${provider}.client_id`]: clientId.value ? "ok" : "unset",
        [`oauth.${provider}.client_secret`]: clientSecret.value ? "ok" : "unset",
      });
    }
    const tenant =
      provider === "onedrive" ? await this.settings.require("oauth.onedrive.tenant") : "common";
    return { clientId: clientId.value, clientSecret: clientSecret.value, tenant };
  }
}
