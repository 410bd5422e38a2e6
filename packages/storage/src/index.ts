export type { ArtifactStore, StoredArtifact } from "./artifact-store.interface.js";
export { LocalArtifactStore } from "./local-store.js";
export { MemoryArtifactStore } from "./memory-store.js";
export { assertArtifactKey, shardedPath } from "./keys.js";
