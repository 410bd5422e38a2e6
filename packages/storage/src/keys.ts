import { ValidationError } from "@docrelay/errors";

const KEY_PATTERN = /^[0-9a-f]{64}$/;

export function assertArtifactKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new ValidationError("Artifact key must be a SHA-256 hex digest", { key: "invalid" });
  }
}

/** `ab/cd/abcd…`: two levels of two-character shards. */
export function shardedPath(key: string): string[] {
  assertArtifactKey(key);
  return [key.slice(0, 2), key.slice(2, 4), key];
}
