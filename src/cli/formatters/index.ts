/**
 * Barrel exports for the formatters.
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export { HumanFormatter, JsonFormatter };
export type { FormatOptions, IFormatter, OutputFormat } from './types.js';

/**
 * Formatter for `--json` or human output.
 */
export function createFormatter(json: boolean | undefined, options: Partial<FormatOptions> = {}): IFormatter {
  return json ? new JsonFormatter(options) : new HumanFormatter(options);
}
