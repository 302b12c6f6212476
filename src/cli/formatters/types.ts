/**
 * Formatter type definitions.
 */
import type { AdoptionCheckReport, AdoptResult } from '../../core/adopt/types.js';
import type { FreshnessReport } from '../../core/freshness/index.js';
import type { NavigationReport } from '../../core/navigation/types.js';
import type { PilotReadinessReport, PilotSummary, PreparePilotResult } from '../../core/pilot/types.js';
import type { ScenarioRunSummary } from '../../core/simulate/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  verbose: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatNavigation(report: NavigationReport): string;
  formatAdopt(result: AdoptResult): string;
  formatAdoptionCheck(report: AdoptionCheckReport): string;
  formatPilotPrepare(result: PreparePilotResult): string;
  formatPilotReadiness(report: PilotReadinessReport): string;
  formatPilotSummary(summary: PilotSummary): string;
  formatFreshness(report: FreshnessReport): string;
  formatScenarios(summary: ScenarioRunSummary): string;
}
