/**
 * Runs scenarios one after another, each in its own sandbox.
 */
import { ScenarioAssertionError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { ScenarioAssert } from './assert.js';
import { withSandbox } from './sandbox.js';
import type { RunScenariosOptions, Scenario, ScenarioResult, ScenarioRunSummary } from './types.js';

export async function runScenario(scenario: Scenario, now: () => Date): Promise<ScenarioResult> {
  try {
    await withSandbox(`guidekeeper-${scenario.name}`, (sandbox) =>
      scenario.run({ sandbox, assert: new ScenarioAssert(), now })
    );
    return { name: scenario.name, passed: true };
  } catch (error) {
    if (error instanceof ScenarioAssertionError) {
      return {
        name: scenario.name,
        passed: false,
        assertion: error.assertion,
        expected: error.expected,
        actual: error.actual,
      };
    }
    return {
      name: scenario.name,
      passed: false,
      error: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
    };
  }
}

export async function runScenarios(scenarios: Scenario[], options: RunScenariosOptions = {}): Promise<ScenarioRunSummary> {
  const now = options.now ?? (() => new Date());
  const selected = options.filter
    ? scenarios.filter((scenario) => scenario.name.includes(options.filter ?? ''))
    : scenarios;

  const results: ScenarioResult[] = [];
  for (const scenario of selected) {
    log.debug(`Scenario ${scenario.name}`);
    const result = await runScenario(scenario, now);
    results.push(result);
    options.onResult?.(result);
  }

  const passed = results.filter((result) => result.passed).length;
  return { results, passed, failed: results.length - passed };
}
