/**
 * Types for adopting the standards into a downstream project.
 */
import type { MergeConflictError } from '../../utils/errors.js';
import type { AdoptionMode, CommandName, Config } from '../config/schema.js';
import type { BlockOutcome } from '../merge/types.js';

export type ProjectStack = 'node' | 'python' | 'go' | 'rust' | 'jvm' | 'generic';

/**
 * What the downstream project looks like, as far as the agent file cares.
 */
export interface StackProfile {
  /** Label written into the file (the override when one is configured) */
  stack: string;
  /** Stack whose defaults were used */
  detected: ProjectStack;
  language: string;
  runtime: string;
  testFramework: string;
  /** npm/pnpm/yarn/bun for node, the build tool otherwise */
  packageManager: string;
  commands: Record<CommandName, string>;
}

export type CompanionStatus =
  | 'skipped'
  | 'created-symlink'
  | 'created-copy'
  | 'kept-existing-symlink'
  | 'kept-existing-copy'
  | 'kept-existing-different'
  | 'refreshed-copy'
  | 'overwritten';

export interface CompanionResult {
  path: string;
  status: CompanionStatus;
  backupPath?: string;
  warning?: string;
}

export type AdoptOperation = 'rendered-template' | 'overwrote-existing' | 'merged' | 'no-change';

export interface AdoptOptions {
  projectDir: string;
  config: Config;
  /** Resolved standards tree (the live one; pinned mode snapshots it) */
  standardsPath: string;
  /** Defaults to config.mode */
  mode?: AdoptionMode;
  /** Defaults to config.pinned_version */
  pinnedVersion?: string;
  /** Defaults to config.project_name, then the project directory name */
  projectName?: string;
  force?: boolean;
  /** Compute the result without touching the disk */
  dryRun?: boolean;
  now?: () => Date;
}

export interface AdoptResult {
  mode: AdoptionMode;
  operation: AdoptOperation;
  targetPath: string;
  outcomes: BlockOutcome[];
  conflicts: MergeConflictError[];
  backupPath?: string;
  companion: CompanionResult;
  /** Standards tree the template and guide rows came from */
  standardsPath: string;
  pinnedVersion?: string;
  manifestHash?: string;
  stack: StackProfile;
  templateSource: 'custom' | 'default';
  warnings: string[];
  dryRun: boolean;
  /** 1 when any managed block conflicted */
  exitCode: 0 | 1;
  /** Resulting file content (also when dry-running) */
  content: string;
}

export type AdoptionIssueSeverity = 'error' | 'warning';

export interface AdoptionIssue {
  severity: AdoptionIssueSeverity;
  code: string;
  message: string;
  line?: number;
}

export interface CheckAdoptionOptions {
  config: Config;
  /** Standards path the file is expected to reference */
  expectStandardsPath?: string;
  /** Warnings fail the check */
  strict?: boolean;
}

export interface AdoptionCheckReport {
  projectDir: string;
  targetPath: string;
  strict: boolean;
  errors: AdoptionIssue[];
  warnings: AdoptionIssue[];
  /** Standards path referenced by the file, resolved */
  standardsPath?: string;
  pinnedVersion?: string;
  passed: boolean;
}
