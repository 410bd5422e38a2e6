export { encrypt, decrypt, seal, unseal } from "./encryption.js";
export type { EncryptedData } from "./encryption.js";

export { createStateToken, signPayload, verifySignature, verifyStateToken } from "./state-token.js";
export { sha256Hex } from "./hash.js";
