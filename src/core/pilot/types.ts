/**
 * Types for pilot rollout artifacts.
 */
import type { Config } from '../config/schema.js';
import type { AdoptResult, AdoptionCheckReport } from '../adopt/types.js';

/** Files every prepared pilot directory holds. */
export const PILOT_ARTIFACTS = [
  'kickoff.md',
  'weekly-checkin-template.md',
  'retrospective-template.md',
  'README.md',
] as const;

export type PilotArtifact = (typeof PILOT_ARTIFACTS)[number];

/** Adoption mode as shown in pilot documents. */
export type PilotAdoptionMode = 'latest' | 'pinned';

export interface PreparePilotOptions {
  config: Config;
  /** Resolved live standards tree */
  standardsPath: string;
  /** Defaults to config.pilot.dir */
  pilotDir?: string;
  /** Defaults to config.project_name, then the project directory name */
  projectName?: string;
  /** Default: TBD */
  pilotOwner?: string;
  /** YYYY-MM-DD; defaults to today's date from `now` */
  startDate?: string;
  /** Replace existing artifact files */
  overwrite?: boolean;
  /** Adopt the standards (merge when the target exists, else fresh) before writing artifacts */
  adopt?: boolean;
  /** Passed to the adoption step */
  force?: boolean;
  now?: () => Date;
}

export type PilotFileStatus = 'created' | 'overwritten' | 'skipped';

export interface PilotFileResult {
  file: PilotArtifact;
  path: string;
  status: PilotFileStatus;
  templateSource: 'custom' | 'default';
}

export interface PreparePilotResult {
  pilotDir: string;
  files: PilotFileResult[];
  adoption?: AdoptResult;
  adoptionMode: PilotAdoptionMode;
}

export interface PilotIssue {
  severity: 'error' | 'warning';
  code: string;
  message: string;
}

export interface PilotReadinessOptions {
  config: Config;
  pilotDir?: string;
  /** Defaults to config.pilot.min_weekly_checkins */
  minWeeklyCheckins?: number;
  /** Defaults to config.pilot.require_retrospective */
  requireRetrospective?: boolean;
  strict?: boolean;
}

export interface PilotReadinessReport {
  projectDir: string;
  pilotDir: string;
  weeklyCount: number;
  retrospectiveCount: number;
  adoption: AdoptionCheckReport;
  errors: PilotIssue[];
  warnings: PilotIssue[];
  strict: boolean;
  passed: boolean;
}

export interface SummarizePilotOptions {
  config: Config;
  pilotDir?: string;
  /** Defaults to <pilotDir>/pilot-summary.md */
  output?: string;
  minWeeklyCheckins?: number;
  requireRetrospective?: boolean;
  /** Return the summary without writing it */
  printOnly?: boolean;
  strict?: boolean;
  now?: () => Date;
}

export interface WeeklySnapshotRow {
  file: string;
  reportingPeriod: string;
  blockers: string;
  criticalDefects: string;
}

export interface PilotSummary {
  content: string;
  /** Absent when printOnly */
  outputPath?: string;
  weekly: WeeklySnapshotRow[];
  latestRetrospective?: string;
  retrospectiveCount: number;
  errors: PilotIssue[];
  warnings: PilotIssue[];
  strict: boolean;
  passed: boolean;
}
