/**
 * Run adoption scenarios in throwaway sandboxes.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { BUILTIN_SCENARIOS } from '../../core/simulate/scenarios.js';
import { runScenarios } from '../../core/simulate/runner.js';
import { ErrorCodes, GuidekeeperError } from '../../utils/errors.js';
import { createFormatter } from '../formatters/index.js';
import { exitWithError } from '../shared.js';

interface SimulateOptions {
  scenario?: string;
  list?: boolean;
  json?: boolean;
}

/**
 * Create the simulate command.
 */
export function createSimulateCommand(): Command {
  return new Command('simulate')
    .description('Run end-to-end adoption scenarios against temporary projects')
    .option('--scenario <name>', 'Run only scenarios whose name contains this text')
    .option('--list', 'List the available scenarios')
    .option('--json', 'Output as JSON')
    .action(async (options: SimulateOptions) => {
      let exitCode: number;
      try {
        exitCode = await runSimulate(options);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

async function runSimulate(options: SimulateOptions): Promise<number> {
  if (options.list) {
    for (const scenario of BUILTIN_SCENARIOS) {
      console.log(`${chalk.bold(scenario.name)}  ${chalk.dim(scenario.description)}`);
    }
    return 0;
  }

  const summary = await runScenarios(BUILTIN_SCENARIOS, { filter: options.scenario });
  if (summary.results.length === 0) {
    throw new GuidekeeperError(ErrorCodes.SCENARIO_NOT_FOUND, `No scenario matches '${options.scenario ?? ''}'`);
  }

  console.log(createFormatter(options.json).formatScenarios(summary));
  return summary.failed > 0 ? 1 : 0;
}
