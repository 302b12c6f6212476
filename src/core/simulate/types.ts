/**
 * Types for the adoption simulator.
 */
import type { ScenarioAssert } from './assert.js';
import type { Sandbox } from './sandbox.js';

export interface ScenarioContext {
  sandbox: Sandbox;
  assert: ScenarioAssert;
  /** Fixed clock for backups and generated dates */
  now: () => Date;
}

export interface Scenario {
  name: string;
  description: string;
  run(context: ScenarioContext): Promise<void>;
}

export interface ScenarioResult {
  name: string;
  passed: boolean;
  /** Failed assertion name */
  assertion?: string;
  expected?: string;
  actual?: string;
  /** Message of an unexpected error */
  error?: string;
}

export interface RunScenariosOptions {
  /** Run only scenarios whose name contains this string */
  filter?: string;
  now?: () => Date;
  /** Called after each scenario */
  onResult?: (result: ScenarioResult) => void;
}

export interface ScenarioRunSummary {
  results: ScenarioResult[];
  passed: number;
  failed: number;
}
