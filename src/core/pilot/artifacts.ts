/**
 * Reading filled-in pilot artifacts.
 */
import { globFiles, isDirectory, resolveFromProject } from '../../utils/file-system.js';

/**
 * Absolute pilot directory for a project (`~/` expanded, trailing slash dropped).
 */
export function resolvePilotDir(projectDir: string, pilotDir: string): string {
  return resolveFromProject(projectDir, pilotDir.replace(/(.)\/+$/, '$1'));
}

async function listTopLevel(dir: string, pattern: string, template: string): Promise<string[]> {
  if (!(await isDirectory(dir))) {
    return [];
  }
  const files = await globFiles(pattern, { cwd: dir, ignore: [template], absolute: false, dot: false });
  return files.sort();
}

/**
 * Completed weekly check-ins (`weekly-*.md`, the template excluded), sorted by name.
 */
export function listWeeklyCheckins(pilotDir: string): Promise<string[]> {
  return listTopLevel(pilotDir, 'weekly-*.md', 'weekly-checkin-template.md');
}

/**
 * Completed retrospectives (`retrospective*.md`, the template excluded), sorted by name.
 */
export function listRetrospectives(pilotDir: string): Promise<string[]> {
  return listTopLevel(pilotDir, 'retrospective*.md', 'retrospective-template.md');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value of the first `| key | value |` row, or '' when there is none.
 */
export function extractTableValue(text: string, key: string): string {
  const row = new RegExp(`^\\| ${escapeRegExp(key)} \\| (.*) \\|$`);
  for (const line of text.split('\n')) {
    const match = row.exec(line.replace(/\r$/, ''));
    if (match) {
      return match[1];
    }
  }
  return '';
}

/**
 * Make a value safe for a table cell: pipes escaped, carriage returns dropped, blanks become N/A.
 */
export function escapeTableValue(value: string): string {
  const escaped = value.replace(/\|/g, '\\|').replace(/\r/g, '');
  return escaped.trim() === '' ? 'N/A' : escaped;
}
