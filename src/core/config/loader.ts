import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { fileExists, expandHome } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.guidekeeper/config.yaml';

/** Environment variable consulted when no standards_path is configured. */
export const STANDARDS_PATH_ENV = 'GUIDEKEEPER_STANDARDS_PATH';

const FALLBACK_STANDARDS_PATH = '~/guidekeeper-standards';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * requested file that is missing is an error.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, expandHome(configPath))
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  const exists = await fileExists(fullPath);

  if (!exists) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Apply command-line overrides on top of a loaded config and re-validate,
 * so cross-field rules (pinned mode needs a version) hold for the merged result.
 */
export function mergeConfig(base: Config, overrides: Partial<Config>): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = ConfigSchema.safeParse({ ...base, ...defined });
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Resolve where the standards tree lives for a project:
 * explicit value, then config, then environment, then the home-directory default.
 */
export function resolveStandardsPath(
  projectRoot: string,
  config: Config,
  explicit?: string
): string {
  const value =
    explicit ?? config.standards_path ?? process.env[STANDARDS_PATH_ENV] ?? FALLBACK_STANDARDS_PATH;
  return path.resolve(projectRoot, expandHome(value));
}
