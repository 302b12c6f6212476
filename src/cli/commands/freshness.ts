/**
 * Report guides that have not been touched for a while.
 */
import { Command } from 'commander';
import { checkGuideFreshness } from '../../core/freshness/index.js';
import { createFormatter } from '../formatters/index.js';
import { exitWithError, loadCommandConfig, parseNonNegativeInt, resolveProjectDir } from '../shared.js';

interface FreshnessCommandOptions {
  root?: string;
  thresholdDays?: number;
  json?: boolean;
}

/**
 * Create the freshness command.
 */
export function createFreshnessCommand(): Command {
  return new Command('freshness')
    .description('List guides older than the freshness threshold')
    .option('--root <dir>', 'Root of the standards tree', '.')
    .option('--threshold-days <days>', 'Age in days after which a guide is stale', parseNonNegativeInt)
    .option('--json', 'Output as JSON')
    .action(async (options: FreshnessCommandOptions, command: Command) => {
      try {
        await runFreshness(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
    });
}

async function runFreshness(options: FreshnessCommandOptions, command: Command): Promise<void> {
  const root = resolveProjectDir(options.root);
  const config = await loadCommandConfig(root, command);

  const report = await checkGuideFreshness(root, {
    guideRoots: config.navigation.guide_roots,
    thresholdDays: options.thresholdDays ?? config.freshness.threshold_days,
  });

  console.log(createFormatter(options.json).formatFreshness(report));
}
