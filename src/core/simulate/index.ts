/**
 * Barrel exports for simulate module.
 */
export { Sandbox, withSandbox, SEED_TEMPLATE_FILE } from './sandbox.js';
export { ScenarioAssert } from './assert.js';
export { runScenario, runScenarios } from './runner.js';
export { BUILTIN_SCENARIOS } from './scenarios.js';
export type {
  Scenario,
  ScenarioContext,
  ScenarioResult,
  RunScenariosOptions,
  ScenarioRunSummary,
} from './types.js';
