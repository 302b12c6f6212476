/**
 * Validate a downstream project's adoption of the standards.
 */
import * as path from 'node:path';
import { ParseError, SnapshotError, SnapshotHashMismatchError } from '../../utils/errors.js';
import { fileExists, isDirectory, readFile, resolveFromProject } from '../../utils/file-system.js';
import { splitLines } from '../markdown/lines.js';
import { scanMergeBlocks } from '../markdown/markers.js';
import { parseHeadings } from '../markdown/parser.js';
import type { MergeBlock } from '../markdown/types.js';
import { PinManager } from '../pin/manager.js';
import { findUnresolvedTokens } from '../templates/engine.js';
import { describeCompanion } from './companion.js';
import type { AdoptionCheckReport, AdoptionIssue, CheckAdoptionOptions } from './types.js';

const STANDARDS_LINE = /^This project follows organizational standards defined in `([^`]+?)\/?`\./m;
const DEVIATION_LINE = /^\*\*Deviation policy\*\*:/m;
const GUIDE_REFERENCE = /`([^`\s]*guides\/[^`\s]+\.md)`/g;
const PIN_LINE = /^Pinned standards version: (\S+)\s*$/m;
const MANIFEST_HASH_LINE = /^Snapshot manifest hash: ([0-9a-f]+)\s*$/m;
const SEMVER_TAG = /^v?\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?$/;
const COMMIT_SHA = /^[0-9a-f]{7,40}$/i;

/** Fewer guide references than this is suspicious. */
const MIN_GUIDE_REFERENCES = 3;

/**
 * Whether a pin label looks like a release tag or a commit.
 */
export function isPinnedVersionLabel(value: string): boolean {
  return SEMVER_TAG.test(value) || COMMIT_SHA.test(value);
}

class IssueCollector {
  readonly errors: AdoptionIssue[] = [];
  readonly warnings: AdoptionIssue[] = [];

  error(code: string, message: string, line?: number): void {
    this.errors.push({ severity: 'error', code, message, line });
  }

  warn(code: string, message: string, line?: number): void {
    this.warnings.push({ severity: 'warning', code, message, line });
  }
}

function lineOf(text: string, index: number): number {
  return text.slice(0, index).split('\n').length;
}

function checkBlocks(text: string, targetPath: string, issues: IssueCollector): void {
  let blocks: MergeBlock[];
  try {
    blocks = scanMergeBlocks(text, targetPath);
  } catch (error) {
    if (error instanceof ParseError) {
      issues.error('marker-parse', error.message, error.line);
      return;
    }
    throw error;
  }
  for (const block of blocks) {
    if (block.storedHash === undefined) {
      issues.warn('untracked-block', `Managed block '${block.id}' has no source-hash trailer`, block.beginLine + 1);
    } else if (block.storedHash !== block.contentHash) {
      issues.warn('drifted-block', `Managed block '${block.id}' was edited since it was last merged`, block.beginLine + 1);
    }
  }
}

function checkSections(text: string, recommended: string[], issues: IssueCollector): void {
  const sections = parseHeadings(splitLines(text)).filter((heading) => heading.level === 2);
  const titles = new Set(sections.map((heading) => heading.text.trim().toLowerCase()));

  const references = sections.filter((heading) => heading.text.trim().toLowerCase() === 'standards reference');
  if (references.length === 0) {
    issues.error('missing-standards-reference', "No '## Standards Reference' section");
  } else if (references.length > 1) {
    issues.warn('duplicate-standards-reference', "More than one '## Standards Reference' section", references[1].line);
  }

  if (!DEVIATION_LINE.test(text)) {
    issues.error('missing-deviation-policy', "No '**Deviation policy**:' line");
  }

  for (const section of recommended) {
    if (!titles.has(section.trim().toLowerCase())) {
      issues.warn('missing-section', `Recommended section '## ${section}' is missing`);
    }
  }
}

async function checkStandardsPath(
  projectDir: string,
  text: string,
  options: CheckAdoptionOptions,
  issues: IssueCollector
): Promise<string | undefined> {
  const match = STANDARDS_LINE.exec(text);
  if (!match) {
    issues.error('standards-path-unparsed', 'Could not find the standards path line in the Standards Reference section');
    return undefined;
  }

  const standardsPath = resolveFromProject(projectDir, match[1]);
  const line = lineOf(text, match.index);
  const present = await isDirectory(standardsPath);
  if (!present) {
    issues.error('standards-path-missing', `Standards path does not exist: ${match[1]}`, line);
  }
  if (options.expectStandardsPath !== undefined) {
    const expected = resolveFromProject(projectDir, options.expectStandardsPath.replace(/\/+$/, ''));
    if (expected !== standardsPath) {
      issues.error('standards-path-mismatch', `Standards path ${match[1]} does not match ${options.expectStandardsPath}`, line);
    }
  }

  const references = [...text.matchAll(GUIDE_REFERENCE)];
  if (references.length === 0) {
    issues.error('no-guide-references', 'No guide references found in the Standards Reference table');
  } else if (references.length < MIN_GUIDE_REFERENCES) {
    issues.warn('few-guide-references', `Only ${references.length} guide reference(s); expected at least ${MIN_GUIDE_REFERENCES}`);
  }
  if (present) {
    for (const reference of references) {
      if (!(await fileExists(resolveFromProject(projectDir, reference[1])))) {
        issues.error('missing-guide', `Referenced guide not found: ${reference[1]}`, lineOf(text, reference.index ?? 0));
      }
    }
  }
  return standardsPath;
}

async function checkPin(
  projectDir: string,
  text: string,
  options: CheckAdoptionOptions,
  issues: IssueCollector
): Promise<string | undefined> {
  const match = PIN_LINE.exec(text);
  if (!match) {
    return undefined;
  }
  const tag = match[1];
  const line = lineOf(text, match.index);
  if (!isPinnedVersionLabel(tag)) {
    issues.warn('pin-format', `Pinned version '${tag}' is neither a semver tag nor a commit SHA`, line);
  }

  const manager = new PinManager(projectDir, { pinsDir: options.config.pins.dir });
  try {
    const snapshot = await manager.verifySnapshot(tag);
    const recorded = MANIFEST_HASH_LINE.exec(text);
    if (recorded && recorded[1] !== snapshot.manifest.manifest_hash) {
      issues.error(
        'manifest-hash-mismatch',
        `Recorded manifest hash ${recorded[1]} differs from snapshot '${tag}' (${snapshot.manifest.manifest_hash})`,
        lineOf(text, recorded.index)
      );
    }
  } catch (error) {
    if (error instanceof SnapshotHashMismatchError) {
      issues.error('snapshot-mismatch', `Snapshot '${tag}' failed verification: ${error.path}`, line);
    } else if (error instanceof SnapshotError) {
      issues.error('snapshot-missing', error.message, line);
    } else {
      throw error;
    }
  }
  return tag;
}

async function checkCompanion(
  projectDir: string,
  targetPath: string,
  options: CheckAdoptionOptions,
  issues: IssueCollector
): Promise<void> {
  const { companion } = options.config;
  if (companion.mode === 'skip') {
    return;
  }
  const companionPath = path.resolve(projectDir, companion.path);
  switch (await describeCompanion(targetPath, companionPath)) {
    case 'missing':
      issues.warn('missing-companion', `${companion.path} is missing`);
      break;
    case 'wrong-symlink':
      issues.warn('companion-symlink-mismatch', `${companion.path} is a symlink that does not point at ${options.config.target_file}`);
      break;
    case 'different':
      issues.warn('companion-differs', `${companion.path} differs from ${options.config.target_file}`);
      break;
    default:
      break;
  }
}

/**
 * Check that a project's agent file is a complete, current adoption of the standards.
 * Errors always fail the check; warnings fail it only in strict mode.
 */
export async function checkAdoption(projectDir: string, options: CheckAdoptionOptions): Promise<AdoptionCheckReport> {
  const root = path.resolve(projectDir);
  const { config } = options;
  const strict = options.strict ?? false;
  const targetPath = path.resolve(root, config.target_file);
  const issues = new IssueCollector();

  const finish = (standardsPath?: string, pinnedVersion?: string): AdoptionCheckReport => ({
    projectDir: root,
    targetPath,
    strict,
    errors: issues.errors,
    warnings: issues.warnings,
    standardsPath,
    pinnedVersion,
    passed: issues.errors.length === 0 && (!strict || issues.warnings.length === 0),
  });

  if (!(await fileExists(targetPath))) {
    issues.error('missing-target', `${config.target_file} not found in ${root}`);
    return finish();
  }

  const text = await readFile(targetPath);
  for (const { token, line } of findUnresolvedTokens(text)) {
    issues.error('unresolved-token', `Unresolved template token {{${token}}}`, line);
  }
  checkBlocks(text, targetPath, issues);
  checkSections(text, config.adoption_check.recommended_sections, issues);
  const standardsPath = await checkStandardsPath(root, text, options, issues);
  const pinnedVersion = await checkPin(root, text, options, issues);
  await checkCompanion(root, targetPath, options, issues);

  return finish(standardsPath, pinnedVersion);
}
