/**
 * Pilot tooling: prepare artifacts, check readiness, summarize findings.
 */
import { Command, InvalidArgumentError } from 'commander';
import { mergeConfig, resolveStandardsPath } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { preparePilot } from '../../core/pilot/prepare.js';
import { checkPilotReadiness } from '../../core/pilot/readiness.js';
import { summarizePilotFindings } from '../../core/pilot/summary.js';
import { createFormatter } from '../formatters/index.js';
import {
  exitWithError,
  getGlobalOptions,
  loadCommandConfig,
  parseNonNegativeInt,
  resolveProjectDir,
} from '../shared.js';

interface PilotCommonOptions {
  projectDir?: string;
  pilotDir?: string;
  json?: boolean;
}

interface PilotPrepareOptions extends PilotCommonOptions {
  standardsPath?: string;
  projectName?: string;
  owner?: string;
  startDate?: string;
  pinnedVersion?: string;
  overwrite?: boolean;
  adopt: boolean;
  force?: boolean;
}

interface PilotCheckOptions extends PilotCommonOptions {
  minWeeklyCheckins?: number;
  requireRetrospective?: boolean;
  strict?: boolean;
}

interface PilotSummarizeOptions extends PilotCheckOptions {
  output?: string;
  printOnly?: boolean;
}

function parseStartDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(value))) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return value;
}

/**
 * Create the pilot command with its subcommands.
 */
export function createPilotCommand(): Command {
  return new Command('pilot')
    .description('Prepare, check and summarize an adoption pilot')
    .addCommand(createPrepareCommand())
    .addCommand(createCheckCommand())
    .addCommand(createSummarizeCommand());
}

function createPrepareCommand(): Command {
  return new Command('prepare')
    .description('Adopt the standards and write the pilot artifacts')
    .option('--project-dir <dir>', 'Pilot project directory', '.')
    .option('--pilot-dir <dir>', 'Directory for pilot artifacts')
    .option('--standards-path <path>', 'Standards tree to adopt from')
    .option('--project-name <name>', 'Project name written into the artifacts')
    .option('--owner <name>', 'Pilot owner', 'TBD')
    .option('--start-date <date>', 'Pilot start date (YYYY-MM-DD)', parseStartDate)
    .option('--pinned-version <tag>', 'Adopt a pinned snapshot instead of the latest standards')
    .option('--overwrite', 'Replace existing pilot artifacts')
    .option('--no-adopt', 'Only write the pilot artifacts')
    .option('--force', 'Overwrite drifted blocks during adoption')
    .option('--json', 'Output as JSON')
    .action(async (options: PilotPrepareOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runPrepare(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

function createCheckCommand(): Command {
  return new Command('check')
    .description('Check that a project is ready to run the pilot')
    .option('--project-dir <dir>', 'Pilot project directory', '.')
    .option('--pilot-dir <dir>', 'Directory holding the pilot artifacts')
    .option('--min-weekly-checkins <n>', 'Weekly check-ins expected so far', parseNonNegativeInt)
    .option('--require-retrospective', 'Fail when no completed retrospective exists')
    .option('--strict', 'Treat too few check-ins as an error')
    .option('--json', 'Output as JSON')
    .action(async (options: PilotCheckOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runCheck(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

function createSummarizeCommand(): Command {
  return new Command('summarize')
    .description('Summarize weekly check-ins and the latest retrospective')
    .option('--project-dir <dir>', 'Pilot project directory', '.')
    .option('--pilot-dir <dir>', 'Directory holding the pilot artifacts')
    .option('--output <file>', 'Summary file to write')
    .option('--min-weekly-checkins <n>', 'Weekly check-ins expected so far', parseNonNegativeInt)
    .option('--require-retrospective', 'Fail when no completed retrospective exists')
    .option('--print-only', 'Print the summary without writing it')
    .option('--strict', 'Fail on warnings')
    .option('--json', 'Output as JSON')
    .action(async (options: PilotSummarizeOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runSummarize(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

async function runPrepare(options: PilotPrepareOptions, command: Command): Promise<number> {
  const projectDir = resolveProjectDir(options.projectDir);
  const loaded = await loadCommandConfig(projectDir, command);
  const config: Config = options.pinnedVersion
    ? mergeConfig(loaded, { mode: 'pinned', pinned_version: options.pinnedVersion })
    : loaded;

  const result = await preparePilot(projectDir, {
    config,
    standardsPath: resolveStandardsPath(projectDir, config, options.standardsPath),
    pilotDir: options.pilotDir,
    projectName: options.projectName,
    pilotOwner: options.owner,
    startDate: options.startDate,
    overwrite: options.overwrite,
    adopt: options.adopt,
    force: options.force,
  });

  const formatter = createFormatter(options.json, { verbose: getGlobalOptions(command).verbose });
  console.log(formatter.formatPilotPrepare(result));
  return result.adoption?.exitCode ?? 0;
}

async function runCheck(options: PilotCheckOptions, command: Command): Promise<number> {
  const projectDir = resolveProjectDir(options.projectDir);
  const config = await loadCommandConfig(projectDir, command);

  const report = await checkPilotReadiness(projectDir, {
    config,
    pilotDir: options.pilotDir,
    minWeeklyCheckins: options.minWeeklyCheckins,
    requireRetrospective: options.requireRetrospective,
    strict: options.strict,
  });

  const formatter = createFormatter(options.json, { verbose: getGlobalOptions(command).verbose });
  console.log(formatter.formatPilotReadiness(report));
  return report.passed ? 0 : 1;
}

async function runSummarize(options: PilotSummarizeOptions, command: Command): Promise<number> {
  const projectDir = resolveProjectDir(options.projectDir);
  const config = await loadCommandConfig(projectDir, command);

  const summary = await summarizePilotFindings(projectDir, {
    config,
    pilotDir: options.pilotDir,
    output: options.output,
    minWeeklyCheckins: options.minWeeklyCheckins,
    requireRetrospective: options.requireRetrospective,
    printOnly: options.printOnly,
    strict: options.strict,
  });

  console.log(createFormatter(options.json).formatPilotSummary(summary));
  return summary.passed ? 0 : 1;
}
