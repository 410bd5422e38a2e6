import crypto from "node:crypto";

const NONCE_BYTES = 24;
const HEX = /^[0-9a-f]+$/;

/** Hex HMAC-SHA256 of `payload`; also signs outgoing webhook bodies. */
export function signPayload(payload: string | Uint8Array, secret: string): string {
  return crypto.createHmac("sha256", secret).update(payload).digest("hex");
}

/** Constant-time check of a hex signature made by {@link signPayload}. */
export function verifySignature(payload: string | Uint8Array, secret: string, signature: string): boolean {
  if (!HEX.test(signature)) {
    return false;
  }
  const expected = Buffer.from(signPayload(payload, secret), "hex");
  const provided = Buffer.from(signature, "hex");
  return expected.length === provided.length && crypto.timingSafeEqual(expected, provided);
}

/**
 * Create an opaque correlation token for a redirect-based flow: a random nonce plus
 * its HMAC, so forged tokens are rejected before any lookup.
 */
export function createStateToken(secret: string): string {
  const nonce = crypto.randomBytes(NONCE_BYTES).toString("base64url");
  return `${nonce}.${signPayload(nonce, secret)}`;
}

export function verifyStateToken(token: string, secret: string): boolean {
  const separator = token.indexOf(".");
  if (separator <= 0) {
    return false;
  }
  return verifySignature(token.slice(0, separator), secret, token.slice(separator + 1));
}
