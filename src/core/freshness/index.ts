/**
 * Guide freshness: guides untouched for longer than a threshold are stale.
 */
import * as path from 'node:path';
import { getStats, globFiles, isDirectory, toPosix } from '../../utils/file-system.js';

const DAY_MS = 86_400_000;

/** More stale guides than this share of the total raises a warning. */
export const STALE_WARNING_PERCENT = 25;

export interface FreshnessOptions {
  guideRoots: string[];
  thresholdDays: number;
  now?: () => Date;
}

export interface StaleGuide {
  /** Root-relative POSIX path */
  path: string;
  ageDays: number;
}

export interface FreshnessReport {
  thresholdDays: number;
  total: number;
  stale: StaleGuide[];
  /** Whole percent, rounded down */
  stalePercent: number;
  /** More than STALE_WARNING_PERCENT of the guides are stale */
  warning: boolean;
}

/**
 * Age every guide by modification time. A guide is stale when older than `thresholdDays` whole days.
 */
export async function checkGuideFreshness(root: string, options: FreshnessOptions): Promise<FreshnessReport> {
  const base = path.resolve(root);
  const now = (options.now ?? (() => new Date()))().getTime();

  const guides: string[] = [];
  for (const guideRoot of options.guideRoots) {
    const dir = path.resolve(base, guideRoot);
    if (!(await isDirectory(dir))) {
      continue;
    }
    for (const file of await globFiles('**/*.md', { cwd: dir, absolute: true })) {
      guides.push(toPosix(path.relative(base, file)));
    }
  }
  const unique = [...new Set(guides)].sort();

  const stale: StaleGuide[] = [];
  for (const guide of unique) {
    const stats = await getStats(path.join(base, guide));
    const ageDays = Math.floor((now - stats.mtimeMs) / DAY_MS);
    if (ageDays > options.thresholdDays) {
      stale.push({ path: guide, ageDays });
    }
  }

  const stalePercent = unique.length === 0 ? 0 : Math.floor((stale.length * 100) / unique.length);
  return {
    thresholdDays: options.thresholdDays,
    total: unique.length,
    stale,
    stalePercent,
    warning: stalePercent > STALE_WARNING_PERCENT,
  };
}
