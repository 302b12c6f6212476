/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { AdoptionCheckReport, AdoptionIssue, AdoptResult } from '../../core/adopt/types.js';
import type { FreshnessReport } from '../../core/freshness/index.js';
import type { NavigationReport } from '../../core/navigation/types.js';
import type {
  PilotIssue,
  PilotReadinessReport,
  PilotSummary,
  PreparePilotResult,
} from '../../core/pilot/types.js';
import type { ScenarioRunSummary } from '../../core/simulate/types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'dim';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatNavigation(report: NavigationReport): string {
    const lines: string[] = [];
    const { stats } = report;
    lines.push(
      `${this.statusLine(report.passed, report.warnings.length > 0)}: navigation ` +
        this.colorize(`(${stats.documents} documents, ${stats.links} links, ${stats.guides} guides)`, 'dim')
    );

    if (report.errors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${report.errors.length}):`, 'red')}`);
      for (const error of report.errors) {
        lines.push(`      [${error.code}] ${error.message}`);
      }
    }

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${report.warnings.length}):`, 'yellow')}`);
      for (const warning of report.warnings) {
        const location = warning.line ? `${warning.file}:${warning.line}` : warning.file;
        lines.push(`      [${warning.code}] ${location}: ${warning.message}`);
      }
    }

    if (report.mode === 'strict' && report.errors.length > 0) {
      lines.push('');
      lines.push(this.colorize('   Stopped at the first error (strict mode)', 'dim'));
    }

    lines.push('');
    lines.push(this.summary(report.errors.length, report.warnings.length));
    return lines.join('\n');
  }

  formatAdopt(result: AdoptResult): string {
    const lines: string[] = [];
    const prefix = result.dryRun ? this.colorize('[dry run] ', 'dim') : '';
    lines.push(`${prefix}${this.statusLine(result.exitCode === 0, result.warnings.length > 0)}: ${result.targetPath}`);
    lines.push(`   Mode: ${result.mode} (${result.operation})`);
    lines.push(`   Standards: ${result.standardsPath}`);
    if (result.pinnedVersion) {
      lines.push(`   Pinned version: ${result.pinnedVersion}`);
    }
    lines.push(`   Stack: ${result.stack.stack} (${result.stack.packageManager})`);
    lines.push(`   Template: ${result.templateSource}`);
    if (result.backupPath) {
      lines.push(`   Backup: ${result.backupPath}`);
    }
    lines.push(`   Companion: ${result.companion.path} (${result.companion.status})`);

    if (result.outcomes.length > 0) {
      lines.push('');
      lines.push('   BLOCKS:');
      const width = Math.max(...result.outcomes.map((outcome) => outcome.id.length));
      for (const outcome of result.outcomes) {
        lines.push(`      ${outcome.id.padEnd(width)}  ${this.colorize(outcome.outcome, this.outcomeColor(outcome.outcome))}`);
      }
    }

    if (result.conflicts.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`CONFLICTS (${result.conflicts.length}):`, 'red')}`);
      for (const conflict of result.conflicts) {
        lines.push(`      ${conflict.message}`);
      }
    }

    if (result.warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${result.warnings.length}):`, 'yellow')}`);
      for (const warning of result.warnings) {
        lines.push(`      ${warning}`);
      }
    }

    if (result.dryRun && this.options.verbose) {
      lines.push('');
      lines.push(result.content);
    }
    return lines.join('\n');
  }

  formatAdoptionCheck(report: AdoptionCheckReport): string {
    const lines: string[] = [];
    lines.push(`${this.statusLine(report.passed, report.warnings.length > 0)}: ${report.targetPath}`);
    if (report.standardsPath) {
      lines.push(`   Standards: ${report.standardsPath}`);
    }
    if (report.pinnedVersion) {
      lines.push(`   Pinned version: ${report.pinnedVersion}`);
    }
    lines.push(...this.issueLines(report.errors, report.warnings));
    lines.push('');
    lines.push(this.summary(report.errors.length, report.warnings.length, report.strict));
    return lines.join('\n');
  }

  formatPilotPrepare(result: PreparePilotResult): string {
    const lines: string[] = [];
    if (result.adoption) {
      lines.push(this.formatAdopt(result.adoption));
      lines.push('');
    }
    lines.push(`Pilot artifacts in ${result.pilotDir} (${result.adoptionMode}):`);
    for (const file of result.files) {
      const color: Color = file.status === 'skipped' ? 'dim' : 'green';
      lines.push(`   ${this.colorize(file.status.padEnd(11), color)} ${file.file}`);
    }
    return lines.join('\n');
  }

  formatPilotReadiness(report: PilotReadinessReport): string {
    const lines: string[] = [];
    lines.push(`${this.statusLine(report.passed, report.warnings.length > 0)}: pilot readiness`);
    lines.push(`   Project: ${report.projectDir}`);
    lines.push(`   Pilot directory: ${report.pilotDir}`);
    lines.push(`   Weekly check-ins: ${report.weeklyCount}`);
    lines.push(`   Retrospectives found: ${report.retrospectiveCount}`);
    lines.push(...this.issueLines(report.errors, report.warnings));
    if (!report.adoption.passed && this.options.verbose) {
      lines.push('');
      lines.push(this.formatAdoptionCheck(report.adoption));
    }
    lines.push('');
    lines.push(this.summary(report.errors.length, report.warnings.length, report.strict));
    return lines.join('\n');
  }

  formatPilotSummary(summary: PilotSummary): string {
    const lines: string[] = [];
    if (summary.outputPath) {
      lines.push(`Pilot summary written to: ${summary.outputPath}`);
    } else {
      lines.push(summary.content.trimEnd());
    }
    lines.push(...this.issueLines(summary.errors, summary.warnings));
    lines.push('');
    lines.push(this.summary(summary.errors.length, summary.warnings.length, summary.strict));
    return lines.join('\n');
  }

  formatFreshness(report: FreshnessReport): string {
    const lines: string[] = [];
    lines.push(`Checking guide freshness (threshold: ${report.thresholdDays} days)`);
    for (const guide of report.stale) {
      lines.push(`   ${this.colorize(`STALE (${guide.ageDays} days)`, 'yellow')} ${guide.path}`);
    }
    lines.push('');
    lines.push(`Total guides: ${report.total}`);
    lines.push(`Stale guides: ${report.stale.length} (${report.stalePercent}%)`);
    if (report.warning) {
      lines.push(this.colorize('More than 25% of guides are stale; consider increasing maintenance frequency.', 'yellow'));
    }
    return lines.join('\n');
  }

  formatScenarios(summary: ScenarioRunSummary): string {
    const lines: string[] = [];
    for (const result of summary.results) {
      lines.push(`${this.statusLine(result.passed, false)}: ${result.name}`);
      if (result.assertion) {
        lines.push(`      ${result.assertion}`);
        lines.push(`        Expected: ${result.expected ?? ''}`);
        lines.push(`        Actual:   ${result.actual ?? ''}`);
      } else if (result.error) {
        lines.push(`      ${result.error}`);
      }
    }
    lines.push('');
    lines.push('═'.repeat(60));
    lines.push(
      `SCENARIOS: ${this.colorize(`${summary.passed} passed`, 'green')}, ${this.colorize(`${summary.failed} failed`, 'red')}`
    );
    return lines.join('\n');
  }

  private issueLines(errors: Array<AdoptionIssue | PilotIssue>, warnings: Array<AdoptionIssue | PilotIssue>): string[] {
    const lines: string[] = [];
    const describe = (issue: AdoptionIssue | PilotIssue): string =>
      'line' in issue && issue.line ? `Line ${issue.line}: ${issue.message}` : issue.message;

    if (errors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${errors.length}):`, 'red')}`);
      for (const issue of errors) {
        lines.push(`      [${issue.code}] ${describe(issue)}`);
      }
    }
    if (warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${warnings.length}):`, 'yellow')}`);
      for (const issue of warnings) {
        lines.push(`      [${issue.code}] ${describe(issue)}`);
      }
    }
    return lines;
  }

  private summary(errors: number, warnings: number, strict = false): string {
    const errorText = this.colorize(`${errors} error(s)`, errors > 0 ? 'red' : 'green');
    const warningText = this.colorize(`${warnings} warning(s)`, warnings > 0 ? 'yellow' : 'green');
    return `${'═'.repeat(60)}\nSUMMARY: ${errorText}, ${warningText}${strict ? ' (strict)' : ''}`;
  }

  private statusLine(passed: boolean, warned: boolean): string {
    if (!passed) {
      return `${this.colorize('✗', 'red')} ${this.colorize('FAIL', 'red')}`;
    }
    if (warned) {
      return `${this.colorize('⚠', 'yellow')} ${this.colorize('WARN', 'yellow')}`;
    }
    return `${this.colorize('✓', 'green')} ${this.colorize('PASS', 'green')}`;
  }

  private outcomeColor(outcome: AdoptResult['outcomes'][number]['outcome']): Color {
    switch (outcome) {
      case 'conflict':
        return 'red';
      case 'forced':
        return 'yellow';
      case 'unchanged':
      case 'retained':
        return 'dim';
      default:
        return 'green';
    }
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
