/**
 * Barrel exports for the pilot module.
 */
export { preparePilot, formatDate } from './prepare.js';
export { checkPilotReadiness } from './readiness.js';
export { summarizePilotFindings, SUMMARY_FILE } from './summary.js';
export {
  extractTableValue,
  escapeTableValue,
  listRetrospectives,
  listWeeklyCheckins,
  resolvePilotDir,
} from './artifacts.js';
export { PILOT_ARTIFACTS } from './types.js';
export type {
  PilotArtifact,
  PilotAdoptionMode,
  PreparePilotOptions,
  PilotFileStatus,
  PilotFileResult,
  PreparePilotResult,
  PilotIssue,
  PilotReadinessOptions,
  PilotReadinessReport,
  SummarizePilotOptions,
  WeeklySnapshotRow,
  PilotSummary,
} from './types.js';
