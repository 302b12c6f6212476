/**
 * Adopt the standards into a downstream project's agent instruction file.
 */
import { Command, Option } from 'commander';
import { resolveStandardsPath, mergeConfig } from '../../core/config/loader.js';
import type { AdoptionMode, CompanionMode } from '../../core/config/schema.js';
import { adoptProject } from '../../core/adopt/adopt.js';
import { createFormatter } from '../formatters/index.js';
import {
  exitWithError,
  getGlobalOptions,
  loadCommandConfig,
  parseAdoptionMode,
  parseCompanionMode,
  resolveProjectDir,
} from '../shared.js';

interface AdoptCommandOptions {
  mode?: AdoptionMode;
  projectDir?: string;
  standardsPath?: string;
  pinnedVersion?: string;
  projectName?: string;
  projectDescription?: string;
  agentRole?: string;
  priorityOne?: string;
  priorityTwo?: string;
  priorityThree?: string;
  stack?: string;
  companion?: CompanionMode;
  force?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

/**
 * Create the adopt command.
 */
export function createAdoptCommand(): Command {
  return new Command('adopt')
    .description('Render or merge the managed agent instruction file')
    .addOption(
      new Option('--mode <mode>', 'Adoption mode (fresh, merge, pinned)').argParser(parseAdoptionMode)
    )
    .option('--project-dir <dir>', 'Downstream project directory', '.')
    .option('--standards-path <path>', 'Standards tree to adopt from')
    .option('--pinned-version <tag>', 'Snapshot tag used in pinned mode')
    .option('--project-name <name>', 'Project name written into the file')
    .option('--project-description <text>', 'Project description written into the Agent Role section')
    .option('--agent-role <role>', 'Role the agent is asked to take')
    .option('--priority-one <text>', 'First agent priority')
    .option('--priority-two <text>', 'Second agent priority')
    .option('--priority-three <text>', 'Third agent priority')
    .option('--stack <label>', 'Stack label overriding detection')
    .addOption(
      new Option('--companion <mode>', 'Companion file handling (auto, symlink, copy, skip)').argParser(
        parseCompanionMode
      )
    )
    .option('--force', 'Overwrite drifted blocks and existing files')
    .option('--dry-run', 'Report the result without writing')
    .option('--json', 'Output as JSON')
    .action(async (options: AdoptCommandOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runAdopt(options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

async function runAdopt(options: AdoptCommandOptions, command: Command): Promise<number> {
  const projectDir = resolveProjectDir(options.projectDir);
  const loaded = await loadCommandConfig(projectDir, command);
  const config = mergeConfig(loaded, {
    stack_override: options.stack,
    project_name: options.projectName,
    project_description: options.projectDescription,
    agent_role: options.agentRole,
    priorities: [
      options.priorityOne ?? loaded.priorities[0],
      options.priorityTwo ?? loaded.priorities[1],
      options.priorityThree ?? loaded.priorities[2],
    ],
    companion: options.companion ? { ...loaded.companion, mode: options.companion } : undefined,
  });

  const result = await adoptProject({
    projectDir,
    config,
    standardsPath: resolveStandardsPath(projectDir, config, options.standardsPath),
    mode: options.mode,
    pinnedVersion: options.pinnedVersion,
    force: options.force,
    dryRun: options.dryRun,
  });

  const formatter = createFormatter(options.json, { verbose: getGlobalOptions(command).verbose });
  console.log(formatter.formatAdopt(result));
  return result.exitCode;
}
