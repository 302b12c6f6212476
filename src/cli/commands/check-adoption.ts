/**
 * Validate a downstream project's adoption of the standards.
 */
import { Command } from 'commander';
import { checkAdoption } from '../../core/adopt/check.js';
import { createFormatter } from '../formatters/index.js';
import { exitWithError, getGlobalOptions, loadCommandConfig, resolveProjectDir } from '../shared.js';

interface CheckAdoptionCommandOptions {
  projectDir?: string;
  expectStandardsPath?: string;
  strict?: boolean;
  json?: boolean;
}

/**
 * Create the check-adoption command.
 */
export function createCheckAdoptionCommand(): Command {
  return new Command('check-adoption')
    .description('Check the agent instruction file of a downstream project')
    .option('--project-dir <dir>', 'Downstream project directory', '.')
    .option('--expect-standards-path <path>', 'Standards path the file must reference')
    .option('--strict', 'Fail on warnings')
    .option('--json', 'Output as JSON')
    .action(async (options: CheckAdoptionCommandOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runCheckAdoption(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

async function runCheckAdoption(options: CheckAdoptionCommandOptions, command: Command): Promise<number> {
  const projectDir = resolveProjectDir(options.projectDir);
  const config = await loadCommandConfig(projectDir, command);

  const report = await checkAdoption(projectDir, {
    config,
    expectStandardsPath: options.expectStandardsPath,
    strict: options.strict,
  });

  const formatter = createFormatter(options.json, { verbose: getGlobalOptions(command).verbose });
  console.log(formatter.formatAdoptionCheck(report));
  return report.passed ? 0 : 1;
}
