export type OAuthProvider = "google_drive" | "onedrive" | "dropbox";

/** Persisted token status. `unconfigured` and `expiring_soon` are derived, never stored. */
export type StoredCredentialStatus = "authorizing" | "valid" | "expired" | "revoked";

export type CredentialState = "unconfigured" | "expiring_soon" | StoredCredentialStatus;

export interface CredentialToken {
  destinationId: string;
  provider: OAuthProvider;
  /** Sealed (encrypted) access token. */
  accessToken: string | null;
  /** Sealed (encrypted) refresh token. */
  refreshToken: string | null;
  expiresAt: Date | null;
  refreshExpiresAt: Date | null;
  scope: string | null;
  status: StoredCredentialStatus;
  updatedAt: Date;
}

export interface OAuthState {
  token: string;
  destinationId: string;
  provider: OAuthProvider;
  redirectUri: string;
  expiresAt: Date;
}

export interface TokenGrant {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date | null;
  /** When the refresh token itself stops working; null when the provider does not say. */
  refreshExpiresAt: Date | null;
  scope: string | null;
}
