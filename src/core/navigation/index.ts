/**
 * Barrel exports for the navigation module.
 */
export { discoverDocuments } from './discovery.js';
export type { DiscoveredTree } from './discovery.js';
export { NavigationGraphBuilder } from './builder.js';
export { validateNavigation, validateNavigationTree } from './validator.js';
export { resolveLinkPath, isMarkdownPath, isUnderRoot } from './paths.js';
export type {
  IndexEntry,
  NavigationGraph,
  ValidationMode,
  NavigationWarning,
  NavigationWarningCode,
  NavigationStats,
  NavigationReport,
  NavigationIssue,
  ValidateOptions,
} from './types.js';
