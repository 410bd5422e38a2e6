import crypto from "node:crypto";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const KEY_LENGTH = 32;

export interface EncryptedData {
  iv: string;
  ciphertext: string;
  tag: string;
  keyId: string;
}

function validateKey(key: string): Buffer {
  const keyBuffer = Buffer.from(key, "utf-8");
  if (keyBuffer.length !== KEY_LENGTH) {
    throw new Error(`Key must be exactly ${KEY_LENGTH} bytes, got ${keyBuffer.length}`);
  }
  return keyBuffer;
}

function deriveKeyId(key: string): string {
  return crypto.createHash("sha256").update(key).digest("hex").slice(0, 16);
}

export function encrypt(plaintext: string, key: string): EncryptedData {
  const keyBuffer = validateKey(key);
  const iv = crypto.randomBytes(IV_LENGTH);

  const cipher = crypto.createCipheriv(ALGORITHM, keyBuffer, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
  const tag = cipher.getAuthTag();

  return {
    iv: iv.toString("hex"),
    ciphertext: encrypted.toString("hex"),
    tag: tag.toString("hex"),
    keyId: deriveKeyId(key),
  };
}

export function decrypt(data: EncryptedData, key: string): string {
  const keyBuffer = validateKey(key);
  const iv = Buffer.from(data.iv, "hex");
  const ciphertext = Buffer.from(data.ciphertext, "hex");
  const tag = Buffer.from(data.tag, "hex");

  const decipher = crypto.createDecipheriv(ALGORITHM, keyBuffer, iv);
  decipher.setAuthTag(tag);

  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

  return decrypted.toString("utf-8");
}

const SEALED_PREFIX = "v1";

/**
 * Serialize an encrypted value into a single storable string:
 * `v1:<keyId>:<iv>:<tag>:<ciphertext>`.
 */
export function seal(plaintext: string, key: string): string {
  const { iv, ciphertext, tag, keyId } = encrypt(plaintext, key);
  return [SEALED_PREFIX, keyId, iv, tag, ciphertext].join(":");
}

export function unseal(sealed: string, key: string): string {
  const parts = sealed.split(":");
  const [prefix, keyId, iv, tag, ciphertext] = parts;
  if (
    parts.length !== 5 ||
    prefix !== SEALED_PREFIX ||
    keyId === undefined ||
    iv === undefined ||
    tag === undefined ||
    ciphertext === undefined
  ) {
    throw new Error("Sealed value is malformed");
  }
  if (keyId !== deriveKeyId(key)) {
    throw new Error(`Sealed value was encrypted with key ${keyId}, not the configured key`);
  }
  return decrypt({ iv, tag, ciphertext, keyId }, key);
}
