/**
 * Types for pinned standards snapshots.
 */
import { z } from 'zod';

const Sha256Schema = z.string().regex(/^[0-9a-f]{64}$/, 'expected a SHA-256 hex digest');

/**
 * `pin-manifest.json` written at the root of every snapshot.
 */
export const SnapshotManifestSchema = z.object({
  version: z.string().min(1),
  created_at: z.string(),
  source_path: z.string(),
  file_count: z.number().int().min(0),
  manifest_hash: Sha256Schema,
  /** Snapshot-relative POSIX path to SHA-256 of the file bytes */
  files: z.record(z.string(), Sha256Schema),
});

export type SnapshotManifest = z.infer<typeof SnapshotManifestSchema>;

export interface PinManagerOptions {
  /** Standards tree copied by createSnapshot */
  standardsPath?: string;
  /** Snapshot directory, absolute or relative to the project */
  pinsDir: string;
  /** Clock for manifest timestamps */
  now?: () => Date;
}

export interface SnapshotInfo {
  /** Sanitised tag */
  tag: string;
  /** Absolute snapshot directory */
  path: string;
  manifest: SnapshotManifest;
}

export interface CreateSnapshotResult extends SnapshotInfo {
  /** False when an identical snapshot already existed */
  created: boolean;
}

export type SnapshotMismatchKind = 'changed' | 'missing' | 'unexpected' | 'manifest';

export interface SnapshotMismatch {
  path: string;
  kind: SnapshotMismatchKind;
  expected: string | null;
  actual: string | null;
}

export type SnapshotChange = 'added' | 'removed' | 'modified';

export interface SnapshotDiffEntry {
  path: string;
  change: SnapshotChange;
}
