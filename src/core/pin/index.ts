/**
 * Barrel exports for the pin module.
 */
export { PinManager, sanitizeTag, computeManifestHash, MANIFEST_FILE } from './manager.js';
export { SnapshotManifestSchema } from './types.js';
export type {
  SnapshotManifest,
  PinManagerOptions,
  SnapshotInfo,
  CreateSnapshotResult,
  SnapshotMismatch,
  SnapshotMismatchKind,
  SnapshotChange,
  SnapshotDiffEntry,
} from './types.js';
