import { describe, it, expect } from "vitest";
import { createStateToken, signPayload, verifySignature, verifyStateToken } from "./state-token.js";
import { sha256Hex } from "./hash.js";

const SECRET = "test-state-secret";

describe("state tokens", () => {
  it("verifies tokens it created", () => {
    const token = createStateToken(SECRET);
    expect(verifyStateToken(token, SECRET)).toBe(true);
  });

  it("produces unique tokens", () => {
    expect(createStateToken(SECRET)).not.toBe(createStateToken(SECRET));
  });

  it("rejects tokens signed with another secret", () => {
    const token = createStateToken("other-secret");
    expect(verifyStateToken(token, SECRET)).toBe(false);
  });

  it("rejects tampered nonces", () => {
    const token = createStateToken(SECRET);
    expect(verifyStateToken(`x${token}`, SECRET)).toBe(false);
  });

  it("rejects malformed tokens", () => {
    expect(verifyStateToken("no-separator", SECRET)).toBe(false);
    expect(verifyStateToken(".abc", SECRET)).toBe(false);
    expect(verifyStateToken("nonce.not-hex!", SECRET)).toBe(false);
  });
});

describe("payload signatures", () => {
  it("computes HMAC-SHA256 as lowercase hex", () => {
    expect(signPayload("The quick brown fox jumps over the lazy dog", "key")).toBe(
      "f7bc83f430538424b13298e6aa6fb143ef4d59a14946175997479dbc2d1a3cd8",
    );
  });

  it("signs bytes and strings identically", () => {
    expect(signPayload(new TextEncoder().encode("payload"), SECRET)).toBe(signPayload("payload", SECRET));
  });

  it("accepts only the signature of the exact payload and secret", () => {
    const signature = signPayload('{"event":"document.delivered"}', SECRET);

    expect(verifySignature('{"event":"document.delivered"}', SECRET, signature)).toBe(true);
    expect(verifySignature('{"event":"document.failed"}', SECRET, signature)).toBe(false);
    expect(verifySignature('{"event":"document.delivered"}', "other-secret", signature)).toBe(false);
  });

  it("rejects truncated and non-hex signatures", () => {
    const signature = signPayload("payload", SECRET);

    expect(verifySignature("payload", SECRET, signature.slice(0, 32))).toBe(false);
    expect(verifySignature("payload", SECRET, signature.toUpperCase())).toBe(false);
    expect(verifySignature("payload", SECRET, "")).toBe(false);
  });
});

describe("sha256Hex", () => {
  it("hashes bytes and strings identically", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
    expect(sha256Hex(new TextEncoder().encode("abc"))).toBe(sha256Hex("abc"));
  });
});
