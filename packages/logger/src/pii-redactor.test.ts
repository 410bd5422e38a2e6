import { describe, it, expect } from "vitest";
import { maskSecret, REDACT_PATHS } from "./pii-redactor.js";

describe("Secret Redactor", () => {
  describe("maskSecret", () => {
    it("keeps the first and last four characters", () => {
      expect(maskSecret("sk-test-secret-value")).toBe("sk-t************alue");
    });

    it("masks short values entirely", () => {
      expect(maskSecret("12345678")).toBe("********");
      expect(maskSecret("abc")).toBe("***");
      expect(maskSecret("")).toBe("");
    });

    it("never returns the plaintext", () => {
      const secret = "abcdefghij";
      expect(maskSecret(secret)).toBe("abcd**ghij");
      expect(maskSecret(secret)).not.toBe(secret);
    });
  });

  describe("REDACT_PATHS", () => {
    it("includes top-level and nested credential paths", () => {
      expect(REDACT_PATHS).toContain("accessToken");
      expect(REDACT_PATHS).toContain("*.accessToken");
      expect(REDACT_PATHS).toContain("refreshToken");
      expect(REDACT_PATHS).toContain("*.clientSecret");
      expect(REDACT_PATHS).toContain("*.authorization");
    });

    it("has both top-level and nested for each sensitive key", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });
  });
});
