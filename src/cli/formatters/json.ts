/**
 * JSON output formatter for machine consumption.
 */
import type { AdoptionCheckReport, AdoptResult } from '../../core/adopt/types.js';
import type { FreshnessReport } from '../../core/freshness/index.js';
import type { NavigationReport } from '../../core/navigation/types.js';
import type { PilotReadinessReport, PilotSummary, PreparePilotResult } from '../../core/pilot/types.js';
import type { ScenarioRunSummary } from '../../core/simulate/types.js';
import type { FormatOptions, IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  private verbose: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.verbose = options.verbose ?? false;
  }

  formatNavigation(report: NavigationReport): string {
    return this.stringify({
      mode: report.mode,
      passed: report.passed,
      stats: report.stats,
      errors: report.errors.map((error) => ({
        code: error.code,
        type: error.name,
        file: error.file,
        line: error.line,
        message: error.message,
        details: error.details,
      })),
      warnings: report.warnings,
    });
  }

  formatAdopt(result: AdoptResult): string {
    return this.stringify(this.adoptPayload(result));
  }

  formatAdoptionCheck(report: AdoptionCheckReport): string {
    return this.stringify(report);
  }

  formatPilotPrepare(result: PreparePilotResult): string {
    return this.stringify({
      pilot_dir: result.pilotDir,
      adoption_mode: result.adoptionMode,
      files: result.files,
      adoption: result.adoption ? this.adoptPayload(result.adoption) : undefined,
    });
  }

  formatPilotReadiness(report: PilotReadinessReport): string {
    return this.stringify(report);
  }

  formatPilotSummary(summary: PilotSummary): string {
    return this.stringify(summary);
  }

  formatFreshness(report: FreshnessReport): string {
    return this.stringify(report);
  }

  formatScenarios(summary: ScenarioRunSummary): string {
    return this.stringify(summary);
  }

  private adoptPayload(result: AdoptResult): Record<string, unknown> {
    return {
      mode: result.mode,
      operation: result.operation,
      target_path: result.targetPath,
      dry_run: result.dryRun,
      exit_code: result.exitCode,
      standards_path: result.standardsPath,
      pinned_version: result.pinnedVersion,
      manifest_hash: result.manifestHash,
      backup_path: result.backupPath,
      template_source: result.templateSource,
      stack: result.stack,
      companion: result.companion,
      outcomes: result.outcomes.map((outcome) => ({ id: outcome.id, outcome: outcome.outcome })),
      conflicts: result.conflicts.map((conflict) => conflict.toJSON()),
      warnings: result.warnings,
      content: this.verbose || result.dryRun ? result.content : undefined,
    };
  }

  private stringify(value: unknown): string {
    return JSON.stringify(value, null, 2);
  }
}
