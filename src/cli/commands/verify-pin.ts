/**
 * Verify a snapshot against its manifest.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { PinManager } from '../../core/pin/manager.js';
import { SnapshotHashMismatchError } from '../../utils/errors.js';
import { exitWithError, loadCommandConfig, resolveProjectDir } from '../shared.js';

interface VerifyPinOptions {
  projectDir?: string;
  json?: boolean;
}

/**
 * Create the verify-pin command.
 */
export function createVerifyPinCommand(): Command {
  return new Command('verify-pin')
    .description('Recompute snapshot hashes and compare them with the manifest')
    .argument('<version-tag>', 'Snapshot to verify')
    .option('--project-dir <dir>', 'Project owning the snapshot directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (versionTag: string, options: VerifyPinOptions, command: Command) => {
      let exitCode: number;
      try {
        exitCode = await runVerifyPin(versionTag, options, command);
      } catch (error) {
        exitWithError(error, options.json);
      }
      process.exit(exitCode);
    });
}

async function runVerifyPin(versionTag: string, options: VerifyPinOptions, command: Command): Promise<number> {
  const projectDir = resolveProjectDir(options.projectDir);
  const config = await loadCommandConfig(projectDir, command);
  const manager = new PinManager(projectDir, { pinsDir: config.pins.dir });

  try {
    const snapshot = await manager.verifySnapshot(versionTag);
    if (options.json) {
      console.log(JSON.stringify({
        tag: snapshot.tag,
        intact: true,
        file_count: snapshot.manifest.file_count,
        manifest_hash: snapshot.manifest.manifest_hash,
      }, null, 2));
    } else {
      console.log(`${chalk.green('✓')} Snapshot ${snapshot.tag} is intact (${snapshot.manifest.file_count} files)`);
    }
    return 0;
  } catch (error) {
    if (!(error instanceof SnapshotHashMismatchError)) {
      throw error;
    }
    if (options.json) {
      console.log(JSON.stringify({ tag: versionTag, intact: false, error: error.toJSON() }, null, 2));
    } else {
      console.log(`${chalk.red('✗')} Snapshot ${versionTag} failed verification`);
      console.log(`   Path: ${error.path}`);
      console.log(`   Expected: ${error.expected ?? '(absent)'}`);
      console.log(`   Actual:   ${error.actual ?? '(absent)'}`);
    }
    return 1;
  }
}
