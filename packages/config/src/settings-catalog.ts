import type { SettingDefinition } from "@docrelay/types";

/**
 * Every static setting the resolver recognizes. Each value resolves through
 * override > database > environment (`env`) > `default` > unset.
 */
export const SETTING_DEFINITIONS: readonly SettingDefinition[] = [
  // ---------- Core ----------
  {
    key: "ingest.max_bytes",
    env: "MAX_UPLOAD_BYTES",
    default: "104857600",
    sensitive: false,
    category: "Core",
    description: "Largest accepted upload in bytes",
  },
  {
    key: "ingest.fetch_timeout_ms",
    env: "URL_FETCH_TIMEOUT_MS",
    default: "30000",
    sensitive: false,
    category: "Core",
    description: "Timeout for fetch-by-URL ingestion",
  },

  // ---------- Conversion ----------
  {
    key: "renderer.url",
    env: "GOTENBERG_URL",
    default: "http://gotenberg:3000",
    sensitive: false,
    category: "Conversion",
    description: "Base URL of the PDF rendering service",
  },
  {
    key: "renderer.timeout_ms",
    env: "RENDERER_TIMEOUT_MS",
    default: "120000",
    sensitive: false,
    category: "Conversion",
    description: "Timeout for a single render call",
  },
  {
    key: "stage.max_attempts",
    env: "STAGE_MAX_ATTEMPTS",
    default: "3",
    sensitive: false,
    category: "Conversion",
    description: "Attempts per external call inside the conversion and extraction stages",
  },
  {
    key: "stage.base_delay_ms",
    env: "STAGE_BASE_DELAY_MS",
    default: "2000",
    sensitive: false,
    category: "Conversion",
    description: "First backoff delay inside a stage",
  },
  {
    key: "stage.backoff_factor",
    env: "STAGE_BACKOFF_FACTOR",
    default: "2",
    sensitive: false,
    category: "Conversion",
    description: "Backoff multiplier inside a stage",
  },
  {
    key: "stage.max_delay_ms",
    env: "STAGE_MAX_DELAY_MS",
    default: "30000",
    sensitive: false,
    category: "Conversion",
    description: "Backoff cap inside a stage",
  },

  // ---------- Extraction ----------
  {
    key: "ocr.url",
    env: "OCR_SERVICE_URL",
    default: null,
    sensitive: false,
    category: "Extraction",
    description: "Base URL of the OCR service; OCR is skipped when unset",
  },
  {
    key: "ocr.api_key",
    env: "OCR_API_KEY",
    default: null,
    sensitive: true,
    category: "Extraction",
    description: "Bearer token for the OCR service",
  },
  {
    key: "ocr.timeout_ms",
    env: "OCR_TIMEOUT_MS",
    default: "120000",
    sensitive: false,
    category: "Extraction",
    description: "Timeout for a single OCR call",
  },
  {
    key: "metadata.api_key",
    env: "ANTHROPIC_API_KEY",
    default: null,
    sensitive: true,
    category: "Extraction",
    description: "API key for AI metadata extraction; extraction is skipped when unset",
  },
  {
    key: "metadata.model",
    env: "AI_MODEL",
    default: "claude-3-5-haiku-latest",
    sensitive: false,
    category: "Extraction",
    description: "Model used for metadata extraction",
  },
  {
    key: "metadata.timeout_ms",
    env: "AI_TIMEOUT_MS",
    default: "60000",
    sensitive: false,
    category: "Extraction",
    description: "Timeout for a single metadata call",
  },
  {
    key: "metadata.max_text_chars",
    env: "AI_MAX_TEXT_CHARS",
    default: "20000",
    sensitive: false,
    category: "Extraction",
    description: "OCR text beyond this length is truncated before classification",
  },

  // ---------- Delivery ----------
  {
    key: "delivery.max_attempts",
    env: "DELIVERY_MAX_ATTEMPTS",
    default: "5",
    sensitive: false,
    category: "Delivery",
    description: "Attempts per destination before a transient failure becomes terminal",
  },
  {
    key: "delivery.base_delay_ms",
    env: "DELIVERY_BASE_DELAY_MS",
    default: "5000",
    sensitive: false,
    category: "Delivery",
    description: "First backoff delay between delivery attempts",
  },
  {
    key: "delivery.backoff_factor",
    env: "DELIVERY_BACKOFF_FACTOR",
    default: "2",
    sensitive: false,
    category: "Delivery",
    description: "Backoff multiplier between delivery attempts",
  },
  {
    key: "delivery.max_delay_ms",
    env: "DELIVERY_MAX_DELAY_MS",
    default: "300000",
    sensitive: false,
    category: "Delivery",
    description: "Backoff cap between delivery attempts",
  },
  {
    key: "delivery.timeout_ms",
    env: "DELIVERY_TIMEOUT_MS",
    default: "120000",
    sensitive: false,
    category: "Delivery",
    description: "Timeout for a single upload",
  },

  // ---------- Notifications ----------
  {
    key: "notify.webhook_url",
    env: "NOTIFY_WEBHOOK_URL",
    default: null,
    sensitive: false,
    category: "Notifications",
    description: "Endpoint that receives document and credential events; unset disables them",
  },
  {
    key: "notify.webhook_secret",
    env: "NOTIFY_WEBHOOK_SECRET",
    default: null,
    sensitive: true,
    category: "Notifications",
    description: "Shared secret for the X-Docrelay-Signature HMAC header",
  },
  {
    key: "notify.timeout_ms",
    env: "NOTIFY_TIMEOUT_MS",
    default: "10000",
    sensitive: false,
    category: "Notifications",
    description: "Timeout for a single webhook POST",
  },

  // ---------- OAuth ----------
  {
    key: "oauth.google_drive.client_id",
    env: "GOOGLE_DRIVE_CLIENT_ID",
    default: null,
    sensitive: false,
    category: "OAuth",
    description: "Google OAuth client id",
  },
  {
    key: "oauth.google_drive.client_secret",
    env: "GOOGLE_DRIVE_CLIENT_SECRET",
    default: null,
    sensitive: true,
    category: "OAuth",
    description: "Google OAuth client secret",
  },
  {
    key: "oauth.onedrive.client_id",
    env: "ONEDRIVE_CLIENT_ID",
    default: null,
    sensitive: false,
    category: "OAuth",
    description: "Microsoft identity platform application id",
  },
  {
    key: "oauth.onedrive.client_secret",
    env: "ONEDRIVE_CLIENT_SECRET",
    default: null,
    sensitive: true,
    category: "OAuth",
    description: "Microsoft identity platform client secret",
  },
  {
    key: "oauth.onedrive.tenant",
    env: "ONEDRIVE_TENANT_ID",
    default: "common",
    sensitive: false,
    category: "OAuth",
    description: "Microsoft tenant; 'common' accepts personal and work accounts",
  },
  {
    key: "oauth.dropbox.client_id",
    env: "DROPBOX_APP_KEY",
    default: null,
    sensitive: false,
    category: "OAuth",
    description: "Dropbox app key",
  },
  {
    key: "oauth.dropbox.client_secret",
    env: "DROPBOX_APP_SECRET",
    default: null,
    sensitive: true,
    category: "OAuth",
    description: "Dropbox app secret",
  },
  {
    key: "oauth.expiry_skew_ms",
    env: "OAUTH_EXPIRY_SKEW_MS",
    default: "300000",
    sensitive: false,
    category: "OAuth",
    description: "Tokens expiring within this window count as expiring soon",
  },
  {
    key: "oauth.state_ttl_ms",
    env: "OAUTH_STATE_TTL_MS",
    default: "600000",
    sensitive: false,
    category: "OAuth",
    description: "Lifetime of an authorization correlation token",
  },
];

const DEFINITIONS_BY_KEY: ReadonlyMap<string, SettingDefinition> = new Map(
  SETTING_DEFINITIONS.map((definition) => [definition.key, definition]),
);

const DESTINATION_KEY_PATTERN = /^destination\.([a-z0-9][a-z0-9_-]*)\.([a-z][a-z0-9_]*)$/;

/** Destination secret fields; anything else under `destination.*` is stored in plaintext. */
const SENSITIVE_DESTINATION_FIELDS: ReadonlySet<string> = new Set([
  "password",
  "secret_access_key",
  "api_token",
  "private_key",
  "passphrase",
]);

export function destinationSettingKey(credentialRef: string, field: string): string {
  return `destination.${credentialRef}.${field}`;
}

function envNameFor(ref: string, field: string): string {
  return `DESTINATION_${ref}_${field}`.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

/**
 * Look up the definition for a key. Static keys come from the catalogue;
 * `destination.<ref>.<field>` keys are recognized for every destination and have no default.
 * Returns null for unrecognized keys.
 */
export function getSettingDefinition(key: string): SettingDefinition | null {
  const definition = DEFINITIONS_BY_KEY.get(key);
  if (definition) {
    return definition;
  }

  const match = DESTINATION_KEY_PATTERN.exec(key);
  if (!match) {
    return null;
  }

  const [, ref = "", field = ""] = match;
  return {
    key,
    env: envNameFor(ref, field),
    default: null,
    sensitive: SENSITIVE_DESTINATION_FIELDS.has(field),
    category: "Destination",
    description: `Credential field "${field}" for destination ${ref}`,
  };
}
