/**
 * Compare two snapshots by manifest.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { PinManager } from '../../core/pin/manager.js';
import type { SnapshotChange } from '../../core/pin/types.js';
import { exitWithError, loadCommandConfig, resolveProjectDir } from '../shared.js';

interface DiffPinsOptions {
  projectDir?: string;
  json?: boolean;
}

const CHANGE_SYMBOLS: Record<SnapshotChange, string> = {
  added: chalk.green('+'),
  removed: chalk.red('-'),
  modified: chalk.yellow('~'),
};

/**
 * Create the diff-pins command.
 */
export function createDiffPinsCommand(): Command {
  return new Command('diff-pins')
    .description('List paths that differ between two snapshots')
    .argument('<version-a>', 'Older snapshot')
    .argument('<version-b>', 'Newer snapshot')
    .option('--project-dir <dir>', 'Project owning the snapshot directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (versionA: string, versionB: string, options: DiffPinsOptions, command: Command) => {
      try {
        await runDiffPins(versionA, versionB, options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
    });
}

async function runDiffPins(
  versionA: string,
  versionB: string,
  options: DiffPinsOptions,
  command: Command
): Promise<void> {
  const projectDir = resolveProjectDir(options.projectDir);
  const config = await loadCommandConfig(projectDir, command);
  const manager = new PinManager(projectDir, { pinsDir: config.pins.dir });

  const entries = await manager.diffSnapshots(versionA, versionB);

  if (options.json) {
    console.log(JSON.stringify({ from: versionA, to: versionB, changes: entries }, null, 2));
    return;
  }

  if (entries.length === 0) {
    console.log(chalk.dim(`No differences between ${versionA} and ${versionB}`));
    return;
  }
  console.log(`Changes from ${versionA} to ${versionB}:`);
  for (const entry of entries) {
    console.log(`   ${CHANGE_SYMBOLS[entry.change]} ${entry.path}`);
  }
}
