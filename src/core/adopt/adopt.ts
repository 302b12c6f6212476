/**
 * Adopt the standards into a downstream project's agent instruction file.
 */
import * as path from 'node:path';
import { AdoptionError, ConfigError, ErrorCodes, SnapshotError } from '../../utils/errors.js';
import {
  backupIfExists,
  copyFile,
  fileExists,
  readFile,
  relativePosix,
  writeFile,
} from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import type { AdoptionMode, Config } from '../config/schema.js';
import { beginMarker, endMarker, scanMergeBlocks } from '../markdown/markers.js';
import { parseInsertAnchor } from '../merge/anchors.js';
import { markTemplate, mergeManagedBlocks } from '../merge/engine.js';
import type { BlockOutcome, BlockOutcomeKind } from '../merge/types.js';
import { MANIFEST_FILE, PinManager } from '../pin/manager.js';
import { TemplateEngine } from '../templates/engine.js';
import { describeCompanion, syncCompanion } from './companion.js';
import { buildStackProfile } from './stack.js';
import { buildAgentsContext } from './standards.js';
import type { AdoptOperation, AdoptOptions, AdoptResult, CompanionResult } from './types.js';

export const PIN_BLOCK_ID = 'standards-pin';

interface StandardsSource {
  /** Directory templates are read from */
  root: string;
  /** Standards path as written into the agent file */
  displayed: string;
  pinnedVersion?: string;
  manifestHash?: string;
}

/**
 * Managed block recording the pinned snapshot.
 */
export function renderPinBlock(tag: string, manifestHash: string): string {
  return [
    beginMarker(PIN_BLOCK_ID),
    `Pinned standards version: ${tag}`,
    `Snapshot manifest hash: ${manifestHash}`,
    endMarker(PIN_BLOCK_ID),
  ].join('\n');
}

function appendBlock(text: string, block: string): string {
  return `${text.replace(/\n*$/, '\n')}\n${block}\n`;
}

async function resolveStandardsSource(
  projectDir: string,
  config: Config,
  options: AdoptOptions,
  mode: AdoptionMode
): Promise<StandardsSource> {
  if (mode !== 'pinned') {
    return { root: options.standardsPath, displayed: options.standardsPath };
  }

  const tag = options.pinnedVersion ?? config.pinned_version;
  if (!tag) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, 'pinned mode requires a pinned version', {
      field: 'pinned_version',
    });
  }

  const manager = new PinManager(projectDir, {
    standardsPath: options.standardsPath,
    pinsDir: config.pins.dir,
    now: options.now,
  });
  const snapshotDir = manager.snapshotPath(tag);

  let manifestHash: string;
  if (await fileExists(path.join(snapshotDir, MANIFEST_FILE))) {
    manifestHash = (await manager.verifySnapshot(tag)).manifest.manifest_hash;
    log.debug(`Verified snapshot ${path.basename(snapshotDir)}`);
  } else if (options.dryRun) {
    throw new SnapshotError(
      ErrorCodes.SNAPSHOT_NOT_FOUND,
      `Snapshot '${tag}' does not exist yet; run \`guidekeeper pin ${tag}\` before a dry run`,
      { tag, path: snapshotDir }
    );
  } else {
    manifestHash = (await manager.createSnapshot(tag)).manifest.manifest_hash;
    log.debug(`Created snapshot ${path.basename(snapshotDir)} for adoption`);
  }

  return {
    root: snapshotDir,
    displayed: relativePosix(projectDir, snapshotDir),
    pinnedVersion: path.basename(snapshotDir),
    manifestHash,
  };
}

function blockOutcomes(text: string, file: string, outcome: BlockOutcomeKind): BlockOutcome[] {
  return scanMergeBlocks(text, file).map((block) => ({ id: block.id, outcome }));
}

/**
 * Render the agent file for a project and write it according to the adoption mode.
 *
 * - fresh: the target must not exist unless `force` (backed up, then overwritten)
 * - merge: the target must exist; managed blocks are merged in
 * - pinned: like merge against a verified snapshot, or fresh when the target is missing
 */
export async function adoptProject(options: AdoptOptions): Promise<AdoptResult> {
  const projectDir = path.resolve(options.projectDir);
  const { config } = options;
  const mode = options.mode ?? config.mode;
  const dryRun = options.dryRun ?? false;
  const now = options.now ?? (() => new Date());
  const targetPath = path.resolve(projectDir, config.target_file);
  const companionPath = path.resolve(projectDir, config.companion.path);
  const anchor = parseInsertAnchor(config.insert_anchor);

  const source = await resolveStandardsSource(projectDir, config, options, mode);
  const stack = await buildStackProfile(projectDir, {
    stackOverride: config.stack_override,
    commandOverrides: config.command_overrides,
  });

  const engine = new TemplateEngine(source.root, { agents: config.template_file });
  const rendered = await engine.render(
    'agents',
    buildAgentsContext({
      projectName: options.projectName ?? config.project_name ?? path.basename(projectDir),
      standardsPath: source.displayed,
      topics: config.standards_topics,
      deviationPolicy: config.deviation_policy,
      agentRole: config.agent_role,
      projectDescription: config.project_description,
      priorities: config.priorities,
      stack,
      pinnedVersion: source.pinnedVersion,
    })
  );
  log.debug(`Using ${rendered.source} agent template${rendered.templatePath ? ` (${rendered.templatePath})` : ''}`);

  const templateFile = rendered.templatePath ?? 'template';
  let templateText = rendered.text;
  if (source.pinnedVersion && source.manifestHash) {
    templateText = appendBlock(templateText, renderPinBlock(source.pinnedVersion, source.manifestHash));
  }
  const marked = markTemplate(templateText, templateFile);

  const exists = await fileExists(targetPath);
  const warnings: string[] = [];
  let operation: AdoptOperation;
  let content: string;
  let outcomes: BlockOutcome[];
  let conflicts: AdoptResult['conflicts'] = [];
  let backupPath: string | undefined;
  let writeTarget = false;

  if (!exists) {
    if (mode === 'merge') {
      throw new AdoptionError(
        ErrorCodes.TARGET_MISSING,
        `${config.target_file} not found in ${projectDir}; use --mode fresh to create it`,
        { targetPath }
      );
    }
    operation = 'rendered-template';
    content = marked;
    outcomes = blockOutcomes(marked, templateFile, 'inserted');
    writeTarget = true;
  } else if (mode === 'fresh') {
    if (!options.force) {
      throw new AdoptionError(
        ErrorCodes.TARGET_EXISTS,
        `${config.target_file} already exists in ${projectDir}; use --mode merge, or --force to overwrite`,
        { targetPath }
      );
    }
    operation = 'overwrote-existing';
    content = marked;
    outcomes = blockOutcomes(marked, templateFile, 'updated');
    writeTarget = true;
    if (!dryRun) {
      backupPath = (await backupIfExists(targetPath, now())) ?? undefined;
    }
  } else {
    const existing = await readFile(targetPath);
    const merged = mergeManagedBlocks(marked, existing, {
      anchor,
      force: options.force,
      templatePath: templateFile,
      downstreamPath: targetPath,
    });
    content = merged.content;
    outcomes = merged.outcomes;
    conflicts = merged.conflicts;
    warnings.push(...merged.warnings);
    operation = merged.changed ? 'merged' : 'no-change';
    writeTarget = merged.changed;
    if (merged.changed && config.backup && !dryRun) {
      backupPath = (await backupIfExists(targetPath, now())) ?? undefined;
    }
  }

  let companion: CompanionResult;
  if (dryRun) {
    companion = { path: companionPath, status: 'skipped' };
  } else {
    const companionBefore = config.companion.mode === 'skip' || !exists
      ? 'missing'
      : await describeCompanion(targetPath, companionPath);
    if (writeTarget) {
      await writeFile(targetPath, content);
      log.debug(`Wrote ${targetPath}`);
    }
    if (companionBefore === 'copy' && writeTarget && !options.force) {
      await copyFile(targetPath, companionPath);
      companion = { path: companionPath, status: 'refreshed-copy' };
    } else {
      companion = await syncCompanion(targetPath, companionPath, config.companion.mode, {
        force: options.force,
        now,
      });
    }
  }
  if (companion.warning) {
    warnings.push(companion.warning);
  }

  for (const conflict of conflicts) {
    log.debug(`Conflict in block ${conflict.markerId}`);
  }

  return {
    mode,
    operation,
    targetPath,
    outcomes,
    conflicts,
    backupPath,
    companion,
    standardsPath: source.root,
    pinnedVersion: source.pinnedVersion,
    manifestHash: source.manifestHash,
    stack,
    templateSource: rendered.source,
    warnings,
    dryRun,
    exitCode: conflicts.length > 0 ? 1 : 0,
    content,
  };
}
