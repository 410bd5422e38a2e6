export interface StoredArtifact {
  /** Lowercase SHA-256 hex of the bytes; doubles as the storage key. */
  key: string;
  sizeBytes: number;
  /** False when identical bytes were already stored. */
  created: boolean;
}

/**
 * Content-addressed, write-once byte storage. Keys are derived from content only,
 * never from user-supplied names.
 */
export interface ArtifactStore {
  put(bytes: Uint8Array): Promise<StoredArtifact>;
  /** Throws NotFoundError when no artifact exists under `key`. */
  get(key: string): Promise<Uint8Array>;
  exists(key: string): Promise<boolean>;
}
