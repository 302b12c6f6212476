/**
 * Snapshot the standards tree under a version tag.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { resolveStandardsPath } from '../../core/config/loader.js';
import { PinManager } from '../../core/pin/manager.js';
import { relativePosix } from '../../utils/file-system.js';
import { exitWithError, loadCommandConfig, resolveProjectDir } from '../shared.js';

interface PinOptions {
  standardsPath?: string;
  projectDir?: string;
  json?: boolean;
}

/**
 * Create the pin command.
 */
export function createPinCommand(): Command {
  return new Command('pin')
    .description('Create a read-only snapshot of the standards tree')
    .argument('<version-tag>', 'Version label, e.g. v1.2.0 or a commit SHA')
    .option('--standards-path <path>', 'Standards tree to snapshot')
    .option('--project-dir <dir>', 'Project owning the snapshot directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (versionTag: string, options: PinOptions, command: Command) => {
      try {
        await runPin(versionTag, options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
    });
}

async function runPin(versionTag: string, options: PinOptions, command: Command): Promise<void> {
  const projectDir = resolveProjectDir(options.projectDir);
  const config = await loadCommandConfig(projectDir, command);
  const manager = new PinManager(projectDir, {
    standardsPath: resolveStandardsPath(projectDir, config, options.standardsPath),
    pinsDir: config.pins.dir,
  });

  const snapshot = await manager.createSnapshot(versionTag);

  if (options.json) {
    console.log(JSON.stringify({
      tag: snapshot.tag,
      path: snapshot.path,
      created: snapshot.created,
      file_count: snapshot.manifest.file_count,
      manifest_hash: snapshot.manifest.manifest_hash,
    }, null, 2));
    return;
  }

  const verb = snapshot.created ? 'Created' : 'Reused existing';
  console.log(chalk.green(`${verb} snapshot ${snapshot.tag}`));
  console.log(`   Path: ${relativePosix(projectDir, snapshot.path)}`);
  console.log(`   Files: ${snapshot.manifest.file_count}`);
  console.log(`   Manifest hash: ${snapshot.manifest.manifest_hash}`);
}
