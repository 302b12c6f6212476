/**
 * Helpers shared by the CLI commands.
 */
import * as path from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import { AdoptionModeSchema, CompanionModeSchema, type AdoptionMode, type CompanionMode, type Config } from '../core/config/schema.js';
import { GuidekeeperError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Options defined on the root program.
 */
export interface GlobalOptions {
  configFile?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Load the project's configuration, honouring the global `--config-file`.
 */
export async function loadCommandConfig(projectDir: string, command: Command): Promise<Config> {
  return loadConfig(projectDir, getGlobalOptions(command).configFile);
}

export function resolveProjectDir(value: string | undefined): string {
  return path.resolve(process.cwd(), value ?? '.');
}

export function parseAdoptionMode(value: string): AdoptionMode {
  const result = AdoptionModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${AdoptionModeSchema.options.join(', ')}.`);
  }
  return result.data;
}

export function parseCompanionMode(value: string): CompanionMode {
  const result = CompanionModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${CompanionModeSchema.options.join(', ')}.`);
  }
  return result.data;
}

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Report a failed command and exit with status 1.
 */
export function exitWithError(error: unknown, json = false): never {
  if (json) {
    const payload = error instanceof GuidekeeperError
      ? error.toJSON()
      : { message: error instanceof Error ? error.message : String(error) };
    console.log(JSON.stringify({ error: payload }, null, 2));
  } else if (error instanceof GuidekeeperError) {
    logger.error(`${error.message} [${error.code}]`);
  } else {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exit(1);
}
