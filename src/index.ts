/**
 * guidekeeper library exports.
 */

// Configuration
export * from './core/config/index.js';

// Markdown parsing
export * from './core/markdown/index.js';

// Navigation validation
export * from './core/navigation/index.js';

// Managed-block merging
export * from './core/merge/index.js';

// Templates
export * from './core/templates/index.js';

// Snapshots
export * from './core/pin/index.js';

// Adoption
export * from './core/adopt/index.js';

// Pilot tooling
export * from './core/pilot/index.js';

// Freshness
export * from './core/freshness/index.js';

// Simulator
export * from './core/simulate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
