import { sha256Hex } from "@docrelay/crypto";
import { NotFoundError } from "@docrelay/errors";
import type { ArtifactStore, StoredArtifact } from "./artifact-store.interface.js";
import { assertArtifactKey } from "./keys.js";

export class MemoryArtifactStore implements ArtifactStore {
  private readonly blobs = new Map<string, Uint8Array>();

  async put(bytes: Uint8Array): Promise<StoredArtifact> {
    const key = sha256Hex(bytes);
    const created = !this.blobs.has(key);
    if (created) {
      this.blobs.set(key, bytes.slice());
    }
    return { key, sizeBytes: bytes.byteLength, created };
  }

  async get(key: string): Promise<Uint8Array> {
    assertArtifactKey(key);
    const blob = this.blobs.get(key);
    if (!blob) {
      throw new NotFoundError(`Artifact ${key} not found`, { details: { key } });
    }
    return blob.slice();
  }

  async exists(key: string): Promise<boolean> {
    assertArtifactKey(key);
    return this.blobs.has(key);
  }

  /** Test helper: simulate an artifact lost from storage. */
  remove(key: string): void {
    this.blobs.delete(key);
  }

  get size(): number {
    return this.blobs.size;
  }
}
