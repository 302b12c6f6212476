/**
 * guidekeeper command-line program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';
import { createAdoptCommand } from './commands/adopt.js';
import { createCheckAdoptionCommand } from './commands/check-adoption.js';
import { createDiffPinsCommand } from './commands/diff-pins.js';
import { createFreshnessCommand } from './commands/freshness.js';
import { createPilotCommand } from './commands/pilot.js';
import { createPinCommand } from './commands/pin.js';
import { createSimulateCommand } from './commands/simulate.js';
import { createValidateCommand } from './commands/validate.js';
import { createVerifyPinCommand } from './commands/verify-pin.js';
import { getGlobalOptions } from './shared.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION = readVersion();

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('guidekeeper')
    .description('Keep a markdown standards repository navigable and its adopters in sync')
    .version(VERSION)
    .option('--config-file <path>', 'Configuration file (default: .guidekeeper/config.yaml)')
    .option('--quiet', 'Only log errors')
    .option('--verbose', 'Log debug output')
    .hook('preAction', (_program, actionCommand) => {
      const globals = getGlobalOptions(actionCommand);
      if (globals.verbose) {
        logger.setLevel('debug');
      } else if (globals.quiet) {
        logger.setLevel('error');
      }
    });
  [createValidateCommand, createAdoptCommand, createPinCommand, createVerifyPinCommand, createDiffPinsCommand,
   createCheckAdoptionCommand, createPilotCommand, createFreshnessCommand, createSimulateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
