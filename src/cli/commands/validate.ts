/**
 * Navigation, link and completeness validation for a standards tree.
 */
import { Command } from 'commander';
import { validateNavigationTree } from '../../core/navigation/validator.js';
import { createFormatter } from '../formatters/index.js';
import { exitWithError, getGlobalOptions, loadCommandConfig, resolveProjectDir } from '../shared.js';

interface ValidateOptions {
  strict?: boolean;
  json?: boolean;
  failOnWarning?: boolean;
  root?: string;
}

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate index completeness, links and anchors of a standards tree')
    .option('--strict', 'Stop at the first error')
    .option('--json', 'Output as JSON')
    .option('--fail-on-warning', 'Exit non-zero when warnings are reported')
    .option('--root <dir>', 'Root of the standards tree', '.')
    .action(async (options: ValidateOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runValidate(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

async function runValidate(options: ValidateOptions, command: Command): Promise<number> {
  const root = resolveProjectDir(options.root);
  const config = await loadCommandConfig(root, command);

  const report = await validateNavigationTree(root, config.navigation, {
    mode: options.strict ? 'strict' : 'report-all',
  });

  const formatter = createFormatter(options.json, { verbose: getGlobalOptions(command).verbose });
  console.log(formatter.formatNavigation(report));

  const failed = !report.passed || (options.failOnWarning === true && report.warnings.length > 0);
  return failed ? 1 : 0;
}
