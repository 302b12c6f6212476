/**
 * Barrel exports for the adopt module.
 */
export { adoptProject, renderPinBlock, PIN_BLOCK_ID } from './adopt.js';
export { checkAdoption, isPinnedVersionLabel } from './check.js';
export { syncCompanion, describeCompanion } from './companion.js';
export type { CompanionOptions } from './companion.js';
export {
  buildStackProfile,
  detectProjectStack,
  detectPackageManager,
  isProjectStack,
  scriptCommand,
} from './stack.js';
export type { PackageManager, StackProfileOptions } from './stack.js';
export { buildStandardsRows, buildAgentsContext, resolveGuidePath } from './standards.js';
export type { AgentsContextInput } from './standards.js';
export type {
  ProjectStack,
  StackProfile,
  CompanionStatus,
  CompanionResult,
  AdoptOperation,
  AdoptOptions,
  AdoptResult,
  AdoptionIssue,
  AdoptionIssueSeverity,
  CheckAdoptionOptions,
  AdoptionCheckReport,
} from './types.js';
