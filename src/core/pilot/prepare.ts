/**
 * Prepare a project for an adoption pilot.
 */
import * as path from 'node:path';
import { fileExists, relativePosix, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { adoptProject } from '../adopt/adopt.js';
import { PinManager } from '../pin/manager.js';
import { TemplateEngine, PILOT_TEMPLATE_FILES } from '../templates/engine.js';
import type { TemplateName } from '../templates/defaults.js';
import { resolvePilotDir } from './artifacts.js';
import type {
  PilotAdoptionMode,
  PilotArtifact,
  PilotFileResult,
  PreparePilotOptions,
  PreparePilotResult,
} from './types.js';

const ARTIFACT_TEMPLATES: Array<[PilotArtifact, TemplateName]> = [
  ['kickoff.md', 'pilot-kickoff'],
  ['weekly-checkin-template.md', 'pilot-weekly-checkin'],
  ['retrospective-template.md', 'pilot-retrospective'],
  ['README.md', 'pilot-readme'],
];

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Write the kickoff, weekly check-in, retrospective and README artifacts.
 * Existing files are left alone unless `overwrite`, so a second run changes nothing.
 */
export async function preparePilot(projectDir: string, options: PreparePilotOptions): Promise<PreparePilotResult> {
  const root = path.resolve(projectDir);
  const { config } = options;
  const now = options.now ?? (() => new Date());
  const pilotDir = resolvePilotDir(root, options.pilotDir ?? config.pilot.dir);
  const adoptionMode: PilotAdoptionMode = config.mode === 'pinned' ? 'pinned' : 'latest';

  let adoption: PreparePilotResult['adoption'];
  if (options.adopt) {
    const targetExists = await fileExists(path.resolve(root, config.target_file));
    adoption = await adoptProject({
      projectDir: root,
      config,
      standardsPath: options.standardsPath,
      mode: config.mode === 'pinned' ? 'pinned' : targetExists ? 'merge' : 'fresh',
      projectName: options.projectName,
      force: options.force,
      now,
    });
  }

  let standardsPath = options.standardsPath;
  if (adoptionMode === 'pinned' && config.pinned_version) {
    const snapshot = new PinManager(root, { pinsDir: config.pins.dir }).snapshotPath(config.pinned_version);
    standardsPath = relativePosix(root, snapshot);
  }

  const context = {
    PROJECT_NAME: options.projectName ?? config.project_name ?? path.basename(root),
    PROJECT_DIR: root,
    PILOT_OWNER: options.pilotOwner ?? 'TBD',
    START_DATE: options.startDate ?? formatDate(now()),
    ADOPTION_MODE: adoptionMode,
    STANDARDS_PATH: standardsPath,
  };

  const engine = new TemplateEngine(options.standardsPath, PILOT_TEMPLATE_FILES);
  const files: PilotFileResult[] = [];
  for (const [file, template] of ARTIFACT_TEMPLATES) {
    const filePath = path.join(pilotDir, file);
    const exists = await fileExists(filePath);
    const rendered = await engine.render(template, context);
    if (exists && !options.overwrite) {
      log.debug(`Keeping existing ${filePath}`);
      files.push({ file, path: filePath, status: 'skipped', templateSource: rendered.source });
      continue;
    }
    await writeFile(filePath, rendered.text);
    files.push({ file, path: filePath, status: exists ? 'overwritten' : 'created', templateSource: rendered.source });
  }

  return { pilotDir, files, adoption, adoptionMode };
}
