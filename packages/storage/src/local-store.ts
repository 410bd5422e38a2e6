import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { sha256Hex } from "@docrelay/crypto";
import { NotFoundError } from "@docrelay/errors";
import type { ArtifactStore, StoredArtifact } from "./artifact-store.interface.js";
import { shardedPath } from "./keys.js";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Filesystem artifact store. Writes go to a temporary file in the target directory
 * and are renamed into place, so a reader never observes a partial artifact.
 */
export class LocalArtifactStore implements ArtifactStore {
  constructor(private readonly rootDir: string) {}

  async put(bytes: Uint8Array): Promise<StoredArtifact> {
    const key = sha256Hex(bytes);
    const target = this.pathFor(key);

    if (await this.exists(key)) {
      return { key, sizeBytes: bytes.byteLength, created: false };
    }

    await mkdir(path.dirname(target), { recursive: true });
    const tmp = `${target}.${crypto.randomUUID()}.tmp`;
    try {
      await writeFile(tmp, bytes, { flag: "wx" });
      await rename(tmp, target);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }

    return { key, sizeBytes: bytes.byteLength, created: true };
  }

  async get(key: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(this.pathFor(key)));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Artifact ${key} not found`, { details: { key } });
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await stat(this.pathFor(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  private pathFor(key: string): string {
    return path.join(this.rootDir, ...shardedPath(key));
  }
}
