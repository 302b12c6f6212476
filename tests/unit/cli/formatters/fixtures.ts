/**
 * Report fixtures shared by the formatter tests.
 */
import type { AdoptResult, AdoptionCheckReport, StackProfile } from '../../../../src/core/adopt/types.js';
import type { NavigationReport } from '../../../../src/core/navigation/types.js';
import { BrokenLinkError, MergeConflictError, OrphanGuideError } from '../../../../src/utils/errors.js';

export const stack: StackProfile = {
  stack: 'node',
  detected: 'node',
  language: 'TypeScript',
  runtime: 'Node.js 20+',
  testFramework: 'Jest/Vitest/TBD',
  packageManager: 'npm',
  commands: {
    dev: 'npm run dev',
    test: 'npm run test',
    coverage: 'npm run test:coverage',
    lint: 'npm run lint',
    typecheck: 'npm run typecheck',
    build: 'npm run build',
  },
};

export function navigationReport(overrides: Partial<NavigationReport> = {}): NavigationReport {
  return {
    mode: 'report-all',
    errors: [
      new OrphanGuideError('guides/new.md', 'README.md'),
      new BrokenLinkError('guides/a.md', 'b.md#setup', 4, 'missing-anchor'),
    ],
    warnings: [
      { code: 'duplicate-index-entry', message: "entry 'A' is listed twice", file: 'README.md', line: 9 },
    ],
    stats: { documents: 5, links: 12, indexEntries: 4, guides: 3 },
    passed: false,
    ...overrides,
  };
}

export function adoptResult(overrides: Partial<AdoptResult> = {}): AdoptResult {
  return {
    mode: 'merge',
    operation: 'merged',
    targetPath: '/work/app/AGENTS.md',
    outcomes: [
      { id: 'standards-reference', outcome: 'updated' },
      { id: 'key-commands', outcome: 'unchanged' },
    ],
    conflicts: [],
    backupPath: '/work/app/AGENTS.md.bak.20260304050607',
    companion: { path: '/work/app/CLAUDE.md', status: 'kept-existing-symlink' },
    standardsPath: '/srv/standards',
    stack,
    templateSource: 'default',
    warnings: [],
    dryRun: false,
    exitCode: 0,
    content: '# app\n',
    ...overrides,
  };
}

export function conflictResult(): AdoptResult {
  const conflict = new MergeConflictError('key-commands', 'local', 'template');
  return adoptResult({
    operation: 'no-change',
    outcomes: [
      { id: 'standards-reference', outcome: 'unchanged' },
      { id: 'key-commands', outcome: 'conflict', conflict },
    ],
    conflicts: [conflict],
    backupPath: undefined,
    exitCode: 1,
  });
}

export function checkReport(overrides: Partial<AdoptionCheckReport> = {}): AdoptionCheckReport {
  return {
    projectDir: '/work/app',
    targetPath: '/work/app/AGENTS.md',
    strict: false,
    errors: [{ severity: 'error', code: 'missing-guide', message: 'Referenced guide not found: /srv/g.md', line: 12 }],
    warnings: [{ severity: 'warning', code: 'missing-companion', message: 'CLAUDE.md is missing' }],
    standardsPath: '/srv/standards',
    passed: false,
    ...overrides,
  };
}
