/**
 * Throwaway project directories for adoption scenarios.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileExists, readFile, removePath, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { DEFAULT_STANDARDS_TOPICS } from '../config/schema.js';
import { DEFAULT_TEMPLATES } from '../templates/defaults.js';

export const SEED_TEMPLATE_FILE = 'adoption/template-agents.md';

/**
 * A temporary directory with path-relative helpers.
 */
export class Sandbox {
  constructor(readonly root: string) {}

  path(...parts: string[]): string {
    return path.join(this.root, ...parts);
  }

  async write(relativePath: string, content: string): Promise<string> {
    const target = this.path(relativePath);
    await writeFile(target, content);
    return target;
  }

  read(relativePath: string): Promise<string> {
    return readFile(this.path(relativePath));
  }

  exists(relativePath: string): Promise<boolean> {
    return fileExists(this.path(relativePath));
  }

  /**
   * Write a minimal standards repository under `dir`: one guide per default topic,
   * the adoption template, and AGENTS.md/README.md indexes listing every guide.
   * Returns the absolute standards path.
   */
  async seedStandardsTree(dir = 'standards'): Promise<string> {
    const rows: string[] = [];

    for (const { topic, guide } of DEFAULT_STANDARDS_TOPICS) {
      rows.push(`| ${topic} | [${topic}](${guide}) |`);
      const depth = guide.split('/').length - 1;
      await this.write(
        path.posix.join(dir, guide),
        [
          `# ${topic}`,
          '',
          `Standards for ${topic.toLowerCase()}. Start with the [overview](#overview).`,
          '',
          '## Contents',
          '',
          '| Section | Read it for |',
          '| --- | --- |',
          '| [Overview](#overview) | The rule of thumb |',
          '| [Checklist](#checklist) | Review before merging |',
          '',
          '## Overview',
          '',
          'Prefer explicit behaviour over convention.',
          '',
          '## Checklist',
          '',
          '- Follow the overview.',
          '',
          `[Back to the index](${'../'.repeat(depth)}README.md)`,
          '',
        ].join('\n')
      );
    }

    rows.push(`| Adoption template | [Agent file template](${SEED_TEMPLATE_FILE}) |`);
    await this.write(path.posix.join(dir, SEED_TEMPLATE_FILE), DEFAULT_TEMPLATES.agents);

    const table = ['| Topic | Guide |', '| --- | --- |', ...rows].join('\n');
    await this.write(
      path.posix.join(dir, 'README.md'),
      `# Engineering Standards\n\nEvery guide, by topic.\n\n${table}\n`
    );
    await this.write(
      path.posix.join(dir, 'AGENTS.md'),
      `# Agent Navigation\n\nRead the guide for the topic at hand before changing code.\n\n${table}\n`
    );

    return this.path(dir);
  }
}

/**
 * Run `fn` in a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withSandbox<T>(prefix: string, fn: (sandbox: Sandbox) => Promise<T>): Promise<T> {
  const root = await fs.promises.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  log.debug(`Sandbox ${root}`);
  try {
    return await fn(new Sandbox(root));
  } finally {
    await removePath(root);
  }
}
