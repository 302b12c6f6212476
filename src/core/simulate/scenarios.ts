/**
 * Built-in adoption scenarios, each run end to end in a sandbox.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  AdoptionError,
  OrphanGuideError,
  SnapshotHashMismatchError,
} from '../../utils/errors.js';
import { adoptProject } from '../adopt/adopt.js';
import { checkAdoption } from '../adopt/check.js';
import { buildStackProfile } from '../adopt/stack.js';
import { getDefaultConfig, mergeConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { validateNavigationTree } from '../navigation/validator.js';
import { PinManager } from '../pin/manager.js';
import { checkPilotReadiness } from '../pilot/readiness.js';
import { preparePilot } from '../pilot/prepare.js';
import { summarizePilotFindings } from '../pilot/summary.js';
import type { ScenarioAssert } from './assert.js';
import type { Scenario } from './types.js';
import type { AdoptionCheckReport } from '../adopt/types.js';

const PACKAGE_JSON = `${JSON.stringify(
  {
    name: 'sample-service',
    version: '1.0.0',
    private: true,
    scripts: { dev: 'echo dev', test: 'echo test', lint: 'echo lint', build: 'echo build' },
  },
  null,
  2
)}\n`;

const EXISTING_AGENTS = `# AGENTS.md

## Agent Role

You are a maintainer.

## Tech Stack

| Layer | Technology | Version |
| --- | --- | --- |
| Language | TypeScript | 5.x |

## Key Commands

\`\`\`bash
npm test
npm run lint
\`\`\`

## Boundaries

| Level | Action | Why |
| --- | --- | --- |
| **Always** | Run lint | Quality gate |
| **Never** | Commit secrets | Security |
`;

function scenarioConfig(overrides: Partial<Config> = {}): Config {
  return mergeConfig(getDefaultConfig(), overrides);
}

function issueCodes(report: AdoptionCheckReport): string {
  return [...report.errors, ...report.warnings].map((issue) => issue.code).join(', ');
}

function countStandardsSections(text: string): number {
  return text.split('\n').filter((line) => /^##\s+Standards Reference\s*$/.test(line)).length;
}

async function expectStrictAdoption(
  assert: ScenarioAssert,
  projectDir: string,
  config: Config,
  expectStandardsPath?: string
): Promise<void> {
  const report = await checkAdoption(projectDir, { config, expectStandardsPath, strict: true });
  assert.equal('strict adoption check reports no issues', issueCodes(report), '');
}

const freshAdoption: Scenario = {
  name: 'fresh-adopt',
  description: 'New project bootstrap yields a strict-valid agent file and a clean standards tree',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('app/package.json', PACKAGE_JSON);
    const config = scenarioConfig({ mode: 'fresh' });

    const result = await adoptProject({ projectDir: sandbox.path('app'), config, standardsPath: standards, now });
    assert.equal('fresh adoption renders the template', result.operation, 'rendered-template');
    assert.equal('companion is linked', result.companion.status, 'created-symlink');
    assert.equal('stack is detected from package.json', result.stack.detected, 'node');

    const navigation = await validateNavigationTree(standards, config.navigation);
    assert.equal('standards tree has no navigation errors', navigation.errors.length, 0);
    await expectStrictAdoption(assert, sandbox.path('app'), config, standards);
  },
};

const mergeIntoExisting: Scenario = {
  name: 'merge-existing',
  description: 'Merging into a hand-written agent file preserves it and is idempotent',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('app/AGENTS.md', EXISTING_AGENTS);
    const projectDir = sandbox.path('app');
    const config = scenarioConfig({ mode: 'merge' });

    const before = await checkAdoption(projectDir, { config, expectStandardsPath: standards, strict: true });
    assert.equal('strict check fails before the merge', before.passed, false);

    const first = await adoptProject({ projectDir, config, standardsPath: standards, now });
    assert.equal('first merge changes the file', first.operation, 'merged');
    const merged = await sandbox.read('app/AGENTS.md');
    assert.ok('text outside managed blocks is preserved', merged.endsWith(EXISTING_AGENTS.slice(EXISTING_AGENTS.indexOf('## Agent Role'))));
    assert.ok('title is preserved', merged.startsWith('# AGENTS.md\n'));
    await expectStrictAdoption(assert, projectDir, config, standards);

    const second = await adoptProject({ projectDir, config, standardsPath: standards, now });
    assert.equal('second merge is a no-op', second.operation, 'no-change');
    const after = await sandbox.read('app/AGENTS.md');
    assert.equal('file is byte-identical after the second merge', after, merged);
    assert.equal('exactly one Standards Reference section', countStandardsSections(after), 1);
  },
};

const pinnedMode: Scenario = {
  name: 'pinned-mode',
  description: 'Pinned adoption snapshots the standards and records the pin',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('app/package.json', PACKAGE_JSON);
    const projectDir = sandbox.path('app');
    const config = scenarioConfig({ mode: 'pinned', pinned_version: 'v1.0.0' });

    const result = await adoptProject({ projectDir, config, standardsPath: standards, now });
    assert.equal('pinned version is recorded', result.pinnedVersion, 'v1.0.0');
    await assert.fileExists('snapshot manifest exists', sandbox.path('app/.guidekeeper/pins/v1.0.0/pin-manifest.json'));

    const content = await sandbox.read('app/AGENTS.md');
    assert.contains('agent file references the snapshot', content, '`.guidekeeper/pins/v1.0.0`');
    assert.contains('agent file records the pin', content, 'Pinned standards version: v1.0.0');
    assert.contains('agent file records the manifest hash', content, `Snapshot manifest hash: ${result.manifestHash ?? ''}`);
    await expectStrictAdoption(assert, projectDir, config);
  },
};

const conflictingEdit: Scenario = {
  name: 'conflicting-edit',
  description: 'A local edit inside a managed block is reported and left untouched',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('app/package.json', PACKAGE_JSON);
    const projectDir = sandbox.path('app');

    await adoptProject({ projectDir, config: scenarioConfig({ mode: 'fresh' }), standardsPath: standards, now });
    const adopted = await sandbox.read('app/AGENTS.md');
    await sandbox.write('app/AGENTS.md', adopted.replace('**Deviation policy**:', 'Local note.\n\n**Deviation policy**:'));

    const config = scenarioConfig({ mode: 'merge' });
    const result = await adoptProject({ projectDir, config, standardsPath: standards, now });
    assert.equal('merge exits with 1', result.exitCode, 1);
    assert.equal('conflict names the block', result.conflicts.map((conflict) => conflict.markerId).join(','), 'standards-reference');
    assert.contains('edited block is left as is', await sandbox.read('app/AGENTS.md'), 'Local note.');

    const forced = await adoptProject({ projectDir, config, standardsPath: standards, force: true, now });
    assert.equal('forced merge exits with 0', forced.exitCode, 0);
    assert.notContains('forced merge replaces the block', await sandbox.read('app/AGENTS.md'), 'Local note.');
  },
};

const freshRefused: Scenario = {
  name: 'fresh-refused',
  description: 'Fresh mode refuses an existing file unless forced, then backs it up',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('app/package.json', PACKAGE_JSON);
    await sandbox.write('app/AGENTS.md', '# AGENTS.md\n\n## Agent Role\n\nYou are a maintainer.\n');
    const projectDir = sandbox.path('app');
    const config = scenarioConfig({ mode: 'fresh', companion: { path: 'CLAUDE.md', mode: 'copy' } });

    await assert.throws(
      'fresh mode refuses an existing file',
      () => adoptProject({ projectDir, config, standardsPath: standards, now }),
      AdoptionError
    );

    const result = await adoptProject({ projectDir, config, standardsPath: standards, force: true, now });
    assert.equal('forced fresh adoption overwrites', result.operation, 'overwrote-existing');
    await assert.fileExists('previous file is backed up', result.backupPath ?? path.join(projectDir, 'AGENTS.md.bak'));
    assert.equal('companion is copied', result.companion.status, 'created-copy');
    await expectStrictAdoption(assert, projectDir, config, standards);
  },
};

const stackShapes: Scenario = {
  name: 'stack-shapes',
  description: 'Stack detection for node/pnpm, python, go, rust, jvm and generic projects',
  async run({ sandbox, assert }) {
    const shapes: Array<[string, string, string, string]> = [
      ['node-pnpm', 'pnpm-lock.yaml', 'node', 'pnpm run test'],
      ['python', 'pyproject.toml', 'python', 'pytest'],
      ['go', 'go.mod', 'go', 'go test ./...'],
      ['rust', 'Cargo.toml', 'rust', 'cargo test'],
      ['jvm', 'pom.xml', 'jvm', 'mvn test'],
      ['generic', 'README.md', 'generic', 'make test'],
    ];
    await sandbox.write('node-pnpm/package.json', PACKAGE_JSON);

    for (const [dir, marker, stack, testCommand] of shapes) {
      await sandbox.write(`${dir}/${marker}`, '\n');
      const profile = await buildStackProfile(sandbox.path(dir));
      assert.equal(`${dir} is detected as ${stack}`, profile.detected, stack);
      assert.equal(`${dir} test command`, profile.commands.test, testCommand);
    }

    const overridden = await buildStackProfile(sandbox.path('generic'), { stackOverride: 'rust' });
    assert.equal('a known override selects its defaults', overridden.commands.build, 'cargo build --release');
  },
};

const snapshotTamper: Scenario = {
  name: 'snapshot-tamper',
  description: 'Editing a pinned snapshot is detected and names the file',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    const manager = new PinManager(sandbox.path('app'), { standardsPath: standards, pinsDir: '.guidekeeper/pins', now });

    const created = await manager.createSnapshot('v1.0.0');
    assert.equal('snapshot is created', created.created, true);
    const again = await manager.createSnapshot('v1.0.0');
    assert.equal('identical snapshot is reused', again.created, false);
    await manager.verifySnapshot('v1.0.0');

    const tampered = path.join(created.path, 'guides/logging-practices/logging-practices.md');
    await fs.promises.chmod(tampered, 0o644);
    await fs.promises.appendFile(tampered, '\nUnreviewed change.\n');

    const error = await assert.throws(
      'verification fails after tampering',
      () => manager.verifySnapshot('v1.0.0'),
      SnapshotHashMismatchError
    );
    assert.equal(
      'mismatch names the tampered file',
      error instanceof SnapshotHashMismatchError ? error.path : '',
      'guides/logging-practices/logging-practices.md'
    );
  },
};

const pilotReadiness: Scenario = {
  name: 'pilot-readiness',
  description: 'Pilot preparation adopts, scaffolds artifacts and is idempotent',
  async run({ sandbox, assert, now }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('app/package.json', PACKAGE_JSON);
    const projectDir = sandbox.path('app');
    const config = scenarioConfig();
    const prepareOptions = {
      config,
      standardsPath: standards,
      adopt: true,
      projectName: 'pilot-project',
      pilotOwner: 'pilot-owner',
      now,
    };

    const first = await preparePilot(projectDir, prepareOptions);
    assert.equal('all artifacts are created', first.files.map((file) => file.status).join(','), 'created,created,created,created');
    assert.equal('missing agent file is adopted fresh', first.adoption?.operation, 'rendered-template');

    const readiness = await checkPilotReadiness(projectDir, { config });
    assert.equal('readiness has no errors', readiness.errors.map((issue) => issue.code).join(','), '');
    assert.equal('missing weekly check-in is a warning', readiness.warnings.map((issue) => issue.code).join(','), 'weekly-below-target');

    const second = await preparePilot(projectDir, prepareOptions);
    assert.equal('second run keeps every artifact', second.files.map((file) => file.status).join(','), 'skipped,skipped,skipped,skipped');
    assert.equal('second run leaves the agent file alone', second.adoption?.operation, 'no-change');

    await sandbox.write('app/.guidekeeper/pilot/weekly-01.md', '| Field | Value |\n| --- | --- |\n| Reporting Period | Week 1 |\n');
    const strict = await checkPilotReadiness(projectDir, { config, strict: true });
    assert.equal('strict readiness passes with a check-in', strict.passed, true);
  },
};

const findingsSummary: Scenario = {
  name: 'findings-summary',
  description: 'Weekly and retrospective artifacts roll up into the findings summary',
  async run({ sandbox, assert, now }) {
    await sandbox.write(
      'app/.guidekeeper/pilot/weekly-01.md',
      [
        '| Field | Value |',
        '| --- | --- |',
        '| Reporting Period | Week 1 |',
        '| Blockers encountered | CI flakes | retries |',
        '| Critical defects linked to guidance | |',
        '',
      ].join('\n')
    );
    await sandbox.write('app/.guidekeeper/pilot/weekly-checkin-template.md', '| Reporting Period | template |\n');
    await sandbox.write(
      'app/.guidekeeper/pilot/retrospective.md',
      '| Question | Answer |\n| --- | --- |\n| Continue rollout / pause / iterate | Continue rollout |\n'
    );

    const summary = await summarizePilotFindings(sandbox.path('app'), { config: scenarioConfig(), printOnly: true, now });
    assert.contains('weekly row is summarised', summary.content, '| `weekly-01.md` | Week 1 | CI flakes \\| retries | N/A |');
    assert.contains('retrospective decision is summarised', summary.content, '| Rollout decision | Continue rollout |');
    assert.equal('template is not counted', summary.weekly.length, 1);
    assert.equal('print-only writes nothing', await sandbox.exists('app/.guidekeeper/pilot/pilot-summary.md'), false);
  },
};

const orphanGuide: Scenario = {
  name: 'orphan-guide',
  description: 'A guide missing from the indexes is reported for each index',
  async run({ sandbox, assert }) {
    const standards = await sandbox.seedStandardsTree();
    await sandbox.write('standards/guides/new-topic/new-topic.md', '# New Topic\n');
    const settings = scenarioConfig().navigation;

    const report = await validateNavigationTree(standards, settings);
    const orphans = report.errors.filter((error) => error instanceof OrphanGuideError);
    assert.equal('orphan is reported once per index', orphans.length, 2);
    assert.equal('only orphans are reported', report.errors.length, 2);
    assert.equal('orphan names the guide', orphans.map((error) => error.file).join(','), 'guides/new-topic/new-topic.md,guides/new-topic/new-topic.md');

    const strict = await validateNavigationTree(standards, settings, { mode: 'strict' });
    assert.equal('strict mode stops at the first error', strict.errors.length, 1);
  },
};

export const BUILTIN_SCENARIOS: Scenario[] = [
  freshAdoption,
  mergeIntoExisting,
  pinnedMode,
  conflictingEdit,
  freshRefused,
  stackShapes,
  snapshotTamper,
  pilotReadiness,
  findingsSummary,
  orphanGuide,
];
