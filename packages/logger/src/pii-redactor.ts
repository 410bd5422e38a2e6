/**
 * Secret Redaction
 *
 * Paths Pino blanks out of every log line, and masking for diagnostic listings.
 */

/**
 * List of JSON-path strings suitable for Pino's `redact` option.
 * These cover the most common top-level property names that carry secrets.
 */
const TOP_LEVEL_REDACT_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessToken",
  "access_token",
  "refreshToken",
  "refresh_token",
  "clientSecret",
  "client_secret",
  "secretAccessKey",
  "encryptionKey",
  "ciphertext",
];

export const REDACT_PATHS: string[] = [
  ...TOP_LEVEL_REDACT_PATHS,
  // Also cover one level of nesting (e.g. credential.accessToken)
  ...TOP_LEVEL_REDACT_PATHS.map((path) => `*.${path}`),
];

const MASK_CHAR = "*";
const VISIBLE_EDGE = 4;

/**
 * Mask a secret for diagnostic display, keeping the first and last four characters.
 * Values of eight characters or fewer are masked entirely.
 *
 * @example maskSecret("sk-test-secret-value") // "sk-t************alue"
 */
export function maskSecret(value: string): string {
  if (value.length <= VISIBLE_EDGE * 2) {
    return MASK_CHAR.repeat(value.length);
  }
  const hidden = value.length - VISIBLE_EDGE * 2;
  return `${value.slice(0, VISIBLE_EDGE)}${MASK_CHAR.repeat(hidden)}${value.slice(-VISIBLE_EDGE)}`;
}
