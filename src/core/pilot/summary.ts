/**
 * Roll filled-in pilot artifacts up into one findings summary.
 */
import * as path from 'node:path';
import { readFile, resolveFromProject, isDirectory, writeFile } from '../../utils/file-system.js';
import {
  escapeTableValue,
  extractTableValue,
  listRetrospectives,
  listWeeklyCheckins,
  resolvePilotDir,
} from './artifacts.js';
import type { PilotIssue, PilotSummary, SummarizePilotOptions, WeeklySnapshotRow } from './types.js';

export const SUMMARY_FILE = 'pilot-summary.md';

const BACKLOG_ITEMS: Array<[string, string]> = [
  ['Review weekly blockers and defects from all weekly files', 'Maintainer + pilot owner'],
  ['Convert confirmed gaps into feedback issues using `docs/templates/feedback-template.md`', 'Maintainer + contributors'],
  ['Map accepted issues into next release backlog and roadmap milestones', 'Maintainer'],
];

interface RetrospectiveFields {
  file: string;
  decision: string;
  preferredMode: string;
  followUp: string;
}

/**
 * UTC timestamp without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function renderSummary(
  header: Array<[string, string | number]>,
  generatedAt: string,
  weekly: WeeklySnapshotRow[],
  retrospective: RetrospectiveFields | undefined
): string {
  const lines = [
    '# Pilot Findings Summary',
    '',
    `Generated by \`guidekeeper pilot summarize\` on ${generatedAt}.`,
    '',
    '| Field | Value |',
    '| --- | --- |',
    ...header.map(([field, value]) => `| ${field} | ${value} |`),
    '',
    '## Weekly Snapshot',
    '',
    '| Weekly File | Reporting Period | Blockers Encountered | Critical Defects |',
    '| --- | --- | --- | --- |',
  ];
  if (weekly.length === 0) {
    lines.push('| N/A | N/A | N/A | N/A |');
  }
  for (const row of weekly) {
    lines.push(`| \`${row.file}\` | ${row.reportingPeriod} | ${row.blockers} | ${row.criticalDefects} |`);
  }

  lines.push(
    '',
    '## Retrospective Snapshot',
    '',
    '| Field | Value |',
    '| --- | --- |',
    `| Latest retrospective | ${retrospective ? `\`${retrospective.file}\`` : 'N/A'} |`,
    `| Rollout decision | ${retrospective?.decision ?? 'N/A'} |`,
    `| Preferred adoption mode | ${retrospective?.preferredMode ?? 'N/A'} |`,
    `| Follow-up owners/deadlines | ${retrospective?.followUp ?? 'N/A'} |`,
    '',
    '## Backlog Intake Checklist',
    '',
    '| Item | Owner | Status |',
    '| --- | --- | --- |',
    ...BACKLOG_ITEMS.map(([item, owner]) => `| ${item} | ${owner} | Pending |`)
  );
  return `${lines.join('\n')}\n`;
}

/**
 * Build the findings summary and write it to `<pilot>/pilot-summary.md`
 * (or `output`), unless `printOnly`.
 */
export async function summarizePilotFindings(projectDir: string, options: SummarizePilotOptions): Promise<PilotSummary> {
  const root = path.resolve(projectDir);
  const { config } = options;
  const strict = options.strict ?? false;
  const now = options.now ?? (() => new Date());
  const minWeekly = options.minWeeklyCheckins ?? config.pilot.min_weekly_checkins;
  const requireRetrospective = options.requireRetrospective ?? config.pilot.require_retrospective;
  const pilotDir = resolvePilotDir(root, options.pilotDir ?? config.pilot.dir);
  const outputPath = options.output ? resolveFromProject(root, options.output) : path.join(pilotDir, SUMMARY_FILE);

  const errors: PilotIssue[] = [];
  const warnings: PilotIssue[] = [];
  const weekly: WeeklySnapshotRow[] = [];
  let retrospectiveCount = 0;
  let retrospective: RetrospectiveFields | undefined;

  if (!(await isDirectory(pilotDir))) {
    errors.push({ severity: 'error', code: 'missing-pilot-dir', message: `Pilot directory not found: ${pilotDir}` });
  } else {
    const weeklyFiles = await listWeeklyCheckins(pilotDir);
    if (weeklyFiles.length < minWeekly) {
      warnings.push({
        severity: 'warning',
        code: 'weekly-below-target',
        message: `Weekly check-ins below target. Required: ${minWeekly}, found: ${weeklyFiles.length}`,
      });
    }
    for (const file of weeklyFiles) {
      const text = await readFile(path.join(pilotDir, file));
      weekly.push({
        file,
        reportingPeriod: escapeTableValue(extractTableValue(text, 'Reporting Period')),
        blockers: escapeTableValue(extractTableValue(text, 'Blockers encountered')),
        criticalDefects: escapeTableValue(extractTableValue(text, 'Critical defects linked to guidance')),
      });
    }

    const retrospectives = await listRetrospectives(pilotDir);
    retrospectiveCount = retrospectives.length;
    const latest = retrospectives.at(-1);
    if (latest) {
      const text = await readFile(path.join(pilotDir, latest));
      retrospective = {
        file: latest,
        decision: escapeTableValue(extractTableValue(text, 'Continue rollout / pause / iterate')),
        preferredMode: escapeTableValue(extractTableValue(text, 'Preferred adoption mode (latest or pinned)')),
        followUp: escapeTableValue(extractTableValue(text, 'Follow-up owners and deadlines')),
      };
    } else if (requireRetrospective) {
      errors.push({
        severity: 'error',
        code: 'missing-retrospective',
        message: 'No completed retrospective found (expected retrospective*.md excluding template).',
      });
    } else {
      warnings.push({ severity: 'warning', code: 'missing-retrospective', message: 'No completed retrospective found yet.' });
    }
  }

  const content = renderSummary(
    [
      ['Project', path.basename(root)],
      ['Project Directory', root],
      ['Pilot Directory', pilotDir],
      ['Weekly Check-ins Found', weekly.length],
      ['Retrospectives Found', retrospectiveCount],
    ],
    formatTimestamp(now()),
    weekly,
    retrospective
  );

  if (!options.printOnly) {
    await writeFile(outputPath, content);
  }

  return {
    content,
    outputPath: options.printOnly ? undefined : outputPath,
    weekly,
    latestRetrospective: retrospective?.file,
    retrospectiveCount,
    errors,
    warnings,
    strict,
    passed: errors.length === 0 && (!strict || warnings.length === 0),
  };
}
