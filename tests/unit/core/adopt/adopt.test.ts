/**
 * Tests for adopting the standards into a project.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { adoptProject, renderPinBlock } from '../../../../src/core/adopt/adopt.js';
import { checkAdoption } from '../../../../src/core/adopt/check.js';
import { getDefaultConfig, mergeConfig } from '../../../../src/core/config/loader.js';
import type { AdoptionMode, Config } from '../../../../src/core/config/schema.js';
import { Sandbox } from '../../../../src/core/simulate/sandbox.js';

const PACKAGE_JSON = '{ "name": "app", "scripts": { "test": "vitest" } }\n';

const HAND_WRITTEN = '# Service\n\nNotes.\n\n## Agent Role\n\nMaintainer.\n';

function configFor(mode: AdoptionMode, overrides: Partial<Config> = {}): Config {
  return mergeConfig(getDefaultConfig(), { mode, ...overrides });
}

describe('renderPinBlock', () => {
  it('records the tag and manifest hash inside a managed block', () => {
    expect(renderPinBlock('v1.0.0', 'abc123')).toBe(
      [
        '<!-- BEGIN:standards-pin -->',
        'Pinned standards version: v1.0.0',
        'Snapshot manifest hash: abc123',
        '<!-- END:standards-pin -->',
      ].join('\n')
    );
  });
});

describe('adoptProject', () => {
  let sandbox: Sandbox;
  let standards: string;
  let project: string;
  let target: string;
  const now = (): Date => new Date('2026-03-04T05:06:07.000Z');

  beforeEach(async () => {
    sandbox = new Sandbox(await fs.mkdtemp(path.join(os.tmpdir(), 'gk-adopt-')));
    standards = await sandbox.seedStandardsTree();
    project = sandbox.path('app');
    target = path.join(project, 'AGENTS.md');
    await sandbox.write('app/package.json', PACKAGE_JSON);
  });

  afterEach(async () => {
    await fs.rm(sandbox.root, { recursive: true, force: true });
  });

  describe('fresh mode', () => {
    it('renders the template and links the companion', async () => {
      const result = await adoptProject({ projectDir: project, config: configFor('fresh'), standardsPath: standards, now });

      expect(result.operation).toBe('rendered-template');
      expect(result.outcomes).toEqual([
        { id: 'standards-reference', outcome: 'inserted' },
        { id: 'key-commands', outcome: 'inserted' },
      ]);
      expect(result.templateSource).toBe('custom');
      expect(result.exitCode).toBe(0);
      expect(result.stack.detected).toBe('node');

      const written = await fs.readFile(target, 'utf-8');
      expect(written).toBe(result.content);
      expect(written.startsWith('# app\n')).toBe(true);
      expect(written).toContain(`This project follows organizational standards defined in \`${standards}\`.`);
      expect(written).toContain(`| Logging | \`${standards}/guides/logging-practices/logging-practices.md\` |`);
      expect(written).toContain('| `npm run test` | Run the default test suite |');

      expect(result.companion.status).toBe('created-symlink');
      expect(await fs.readlink(path.join(project, 'CLAUDE.md'))).toBe('AGENTS.md');
    });

    it('uses the configured project name', async () => {
      const result = await adoptProject({
        projectDir: project,
        config: configFor('fresh', { project_name: 'Billing API' }),
        standardsPath: standards,
        now,
      });

      expect(result.content.startsWith('# Billing API\n')).toBe(true);
    });

    it('writes the default agent role and priorities', async () => {
      const result = await adoptProject({ projectDir: project, config: configFor('fresh'), standardsPath: standards, now });

      expect(result.content).toContain(
        [
          '## Agent Role',
          '',
          'You are a project-focused software engineer working on this project.',
          '',
          'Priorities, in order:',
          '',
          '1. Correctness over speed',
          '2. Security over convenience',
          '3. Readability over cleverness',
        ].join('\n')
      );
    });

    it('writes the configured agent role and priorities', async () => {
      const result = await adoptProject({
        projectDir: project,
        config: configFor('fresh', {
          agent_role: 'security-conscious backend developer',
          project_description: 'a payments gateway',
          priorities: ['Security over convenience', 'Correctness over speed', 'Latency over throughput'],
        }),
        standardsPath: standards,
        now,
      });

      expect(result.content).toContain('You are a security-conscious backend developer working on a payments gateway.\n');
      expect(result.content).toContain(
        '1. Security over convenience\n2. Correctness over speed\n3. Latency over throughput\n'
      );
    });

    it('refuses to replace an existing file without force', async () => {
      await fs.writeFile(target, 'old\n');

      await expect(
        adoptProject({ projectDir: project, config: configFor('fresh'), standardsPath: standards, now })
      ).rejects.toMatchObject({ code: 'M002' });
      expect(await fs.readFile(target, 'utf-8')).toBe('old\n');
    });

    it('backs up and overwrites an existing file with force', async () => {
      await fs.writeFile(target, 'old\n');

      const result = await adoptProject({
        projectDir: project,
        config: configFor('fresh'),
        standardsPath: standards,
        force: true,
        now,
      });

      expect(result.operation).toBe('overwrote-existing');
      expect(result.outcomes.map((outcome) => outcome.outcome)).toEqual(['updated', 'updated']);
      expect(result.backupPath).toBe(`${target}.bak.20260304050607`);
      expect(await fs.readFile(`${target}.bak.20260304050607`, 'utf-8')).toBe('old\n');
      expect(await fs.readFile(target, 'utf-8')).toBe(result.content);
    });

    it('writes nothing on a dry run', async () => {
      const result = await adoptProject({
        projectDir: project,
        config: configFor('fresh'),
        standardsPath: standards,
        dryRun: true,
        now,
      });

      expect(result.dryRun).toBe(true);
      expect(result.operation).toBe('rendered-template');
      expect(result.companion.status).toBe('skipped');
      expect(result.content).toContain('## Standards Reference');
      await expect(fs.access(target)).rejects.toThrow();
      await expect(fs.lstat(path.join(project, 'CLAUDE.md'))).rejects.toThrow();
    });
  });

  describe('merge mode', () => {
    it('requires an existing file', async () => {
      await expect(
        adoptProject({ projectDir: project, config: configFor('merge'), standardsPath: standards, now })
      ).rejects.toMatchObject({ code: 'M003' });
    });

    it('inserts the managed blocks before the first section and keeps the rest', async () => {
      await fs.writeFile(target, HAND_WRITTEN);

      const result = await adoptProject({ projectDir: project, config: configFor('merge'), standardsPath: standards, now });

      expect(result.operation).toBe('merged');
      expect(result.outcomes).toEqual([
        { id: 'standards-reference', outcome: 'inserted' },
        { id: 'key-commands', outcome: 'inserted' },
      ]);
      expect(result.content.startsWith('# Service\n\nNotes.\n\n<!-- BEGIN:standards-reference -->\n')).toBe(true);
      expect(result.content).toContain('<!-- END:standards-reference -->\n\n<!-- BEGIN:key-commands -->');
      expect(result.content.endsWith('<!-- END:key-commands -->\n\n## Agent Role\n\nMaintainer.\n')).toBe(true);
      expect(result.backupPath).toBe(`${target}.bak.20260304050607`);
      expect(await fs.readFile(result.backupPath ?? '', 'utf-8')).toBe(HAND_WRITTEN);
      expect(result.companion.status).toBe('created-symlink');
    });

    it('is idempotent', async () => {
      await fs.writeFile(target, HAND_WRITTEN);
      const config = configFor('merge');
      const first = await adoptProject({ projectDir: project, config, standardsPath: standards, now });

      const second = await adoptProject({ projectDir: project, config, standardsPath: standards, now });

      expect(second.operation).toBe('no-change');
      expect(second.content).toBe(first.content);
      expect(second.outcomes.map((outcome) => outcome.outcome)).toEqual(['unchanged', 'unchanged']);
      expect(second.backupPath).toBeUndefined();
      expect(second.companion.status).toBe('kept-existing-symlink');
    });

    it('skips the backup when backups are disabled', async () => {
      await fs.writeFile(target, HAND_WRITTEN);

      const result = await adoptProject({
        projectDir: project,
        config: configFor('merge', { backup: false }),
        standardsPath: standards,
        now,
      });

      expect(result.operation).toBe('merged');
      expect(result.backupPath).toBeUndefined();
    });

    it('reports locally edited blocks as conflicts and exits 1', async () => {
      await adoptProject({ projectDir: project, config: configFor('fresh'), standardsPath: standards, now });
      const adopted = await fs.readFile(target, 'utf-8');
      const edited = adopted.replace(/^\*\*Deviation policy\*\*: .*$/m, '**Deviation policy**: Ask the platform team first.');
      await fs.writeFile(target, edited);

      const result = await adoptProject({ projectDir: project, config: configFor('merge'), standardsPath: standards, now });

      expect(result.exitCode).toBe(1);
      expect(result.conflicts.map((conflict) => conflict.markerId)).toEqual(['standards-reference']);
      expect(result.outcomes.map((outcome) => outcome.outcome)).toEqual(['conflict', 'unchanged']);
      expect(result.operation).toBe('no-change');
      expect(await fs.readFile(target, 'utf-8')).toBe(edited);
    });

    it('replaces edited blocks with force', async () => {
      await adoptProject({ projectDir: project, config: configFor('fresh'), standardsPath: standards, now });
      const adopted = await fs.readFile(target, 'utf-8');
      await fs.writeFile(target, adopted.replace('Run lint checks', 'Run the linters'));

      const result = await adoptProject({
        projectDir: project,
        config: configFor('merge'),
        standardsPath: standards,
        force: true,
        now,
      });

      expect(result.exitCode).toBe(0);
      expect(result.outcomes.map((outcome) => outcome.outcome)).toEqual(['unchanged', 'forced']);
      expect(await fs.readFile(target, 'utf-8')).toBe(adopted);
    });
  });

  describe('pinned mode', () => {
    it('snapshots the standards and records the pin', async () => {
      const result = await adoptProject({
        projectDir: project,
        config: configFor('merge'),
        standardsPath: standards,
        mode: 'pinned',
        pinnedVersion: 'v1.0.0',
        now,
      });

      expect(result.mode).toBe('pinned');
      expect(result.operation).toBe('rendered-template');
      expect(result.pinnedVersion).toBe('v1.0.0');
      expect(result.standardsPath).toBe(path.join(project, '.guidekeeper', 'pins', 'v1.0.0'));
      expect(result.outcomes.map((outcome) => outcome.id)).toEqual([
        'standards-reference',
        'key-commands',
        'standards-pin',
      ]);
      expect(result.content).toContain(
        'This project follows organizational standards defined in `.guidekeeper/pins/v1.0.0`.'
      );
      expect(result.content).toContain(
        `Pinned standards version: v1.0.0\nSnapshot manifest hash: ${result.manifestHash ?? ''}\n`
      );
      expect(result.content).toContain('| None | N/A | N/A | N/A |\n\n<!-- BEGIN:standards-pin -->');

      const report = await checkAdoption(project, { config: configFor('merge') });
      expect(report.errors).toEqual([]);
      expect(report.pinnedVersion).toBe('v1.0.0');
    });

    it('reuses an existing snapshot', async () => {
      const options = {
        projectDir: project,
        config: configFor('pinned', { pinned_version: 'v1.0.0' }),
        standardsPath: standards,
        now,
      };
      const first = await adoptProject(options);

      const second = await adoptProject(options);

      expect(second.manifestHash).toBe(first.manifestHash);
      expect(second.operation).toBe('no-change');
    });

    it('requires a version', async () => {
      await expect(
        adoptProject({ projectDir: project, config: configFor('merge'), standardsPath: standards, mode: 'pinned', now })
      ).rejects.toMatchObject({ code: 'C001' });
    });

    it('refuses a dry run before the snapshot exists', async () => {
      await expect(
        adoptProject({
          projectDir: project,
          config: configFor('merge'),
          standardsPath: standards,
          mode: 'pinned',
          pinnedVersion: 'v1.0.0',
          dryRun: true,
          now,
        })
      ).rejects.toMatchObject({ code: 'S003' });
    });
  });
});
