import type { OAuthProvider } from "@docrelay/types";

export interface OAuthProviderConfig {
  label: string;
  authorizeUrl: (tenant: string) => string;
  tokenUrl: (tenant: string) => string;
  scope: string;
  /** Extra authorize parameters needed to obtain a refresh token. */
  authorizeParams: Record<string, string>;
}

export const OAUTH_PROVIDERS: Record<OAuthProvider, OAuthProviderConfig> = {
  google_drive: {
    label: "Google Drive",
    authorizeUrl: () => "https://accounts.google.com/o/oauth2/v2/auth",
    tokenUrl: () => "https://oauth2.googleapis.com/token",
    // drive.file: only files this app created
    scope: "https://www.googleapis.com/auth/drive.file",
    authorizeParams: { access_type: "offline", prompt: "consent" },
  },
  onedrive: {
    label: "OneDrive",
    authorizeUrl: (tenant) =>
      `https://login.microsoftonline.com/${encodeURIComponent(tenant)}/oauth2/v2.0/authorize`,
    tokenUrl: (tenant) =>
      `https://login.microsoftonline.com/${encodeURIComponent(tenant)}/oauth2/v2.0/token`,
    scope: "offline_access https://graph.microsoft.com/Files.ReadWrite",
    authorizeParams: { response_mode: "query" },
  },
  dropbox: {
    label: "Dropbox",
    authorizeUrl: () => "https://www.dropbox.com/oauth2/authorize",
    tokenUrl: () => "https://api.dropboxapi.com/oauth2/token",
    scope: "files.content.write",
    authorizeParams: { token_access_type: "offline" },
  },
};
