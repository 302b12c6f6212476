/**
 * Pilot readiness: is the project adopted and are the pilot artifacts in place?
 */
import * as path from 'node:path';
import { fileExists, isDirectory, pathExists, readFile } from '../../utils/file-system.js';
import { checkAdoption } from '../adopt/check.js';
import { listRetrospectives, listWeeklyCheckins, resolvePilotDir } from './artifacts.js';
import { PILOT_ARTIFACTS, type PilotIssue, type PilotReadinessOptions, type PilotReadinessReport } from './types.js';

export async function checkPilotReadiness(
  projectDir: string,
  options: PilotReadinessOptions
): Promise<PilotReadinessReport> {
  const root = path.resolve(projectDir);
  const { config } = options;
  const strict = options.strict ?? false;
  const minWeekly = options.minWeeklyCheckins ?? config.pilot.min_weekly_checkins;
  const requireRetrospective = options.requireRetrospective ?? config.pilot.require_retrospective;
  const pilotDir = resolvePilotDir(root, options.pilotDir ?? config.pilot.dir);

  const errors: PilotIssue[] = [];
  const warnings: PilotIssue[] = [];
  const error = (code: string, message: string): void => {
    errors.push({ severity: 'error', code, message });
  };
  const warn = (code: string, message: string): void => {
    warnings.push({ severity: 'warning', code, message });
  };

  if (!(await fileExists(path.resolve(root, config.target_file)))) {
    error('missing-target', `${config.target_file} missing in ${root}`);
  }
  if (config.companion.mode !== 'skip' && !(await pathExists(path.resolve(root, config.companion.path)))) {
    warn('missing-companion', `${config.companion.path} missing in ${root}`);
  }

  const adoption = await checkAdoption(root, { config, strict });
  if (!adoption.passed) {
    error('adoption-failed', 'Adoption check failed; run `guidekeeper check-adoption` and fix the reported issues');
  }

  let weeklyCount = 0;
  let retrospectiveCount = 0;
  if (!(await isDirectory(pilotDir))) {
    error('missing-pilot-dir', `Pilot directory missing at ${pilotDir}`);
  } else {
    for (const artifact of PILOT_ARTIFACTS) {
      if (!(await fileExists(path.join(pilotDir, artifact)))) {
        error('missing-artifact', `Missing pilot artifact file: ${path.join(pilotDir, artifact)}`);
      }
    }

    const kickoff = path.join(pilotDir, 'kickoff.md');
    if ((await fileExists(kickoff)) && (await readFile(kickoff)).includes('{{')) {
      error('unresolved-kickoff', 'kickoff.md still contains unresolved template tokens');
    }

    weeklyCount = (await listWeeklyCheckins(pilotDir)).length;
    if (weeklyCount < minWeekly) {
      const message = `Weekly check-ins below target. Required: ${minWeekly}, found: ${weeklyCount}`;
      if (strict) {
        error('weekly-below-target', message);
      } else {
        warn('weekly-below-target', message);
      }
    }

    retrospectiveCount = (await listRetrospectives(pilotDir)).length;
    if (requireRetrospective && retrospectiveCount === 0) {
      error('missing-retrospective', 'Completed retrospective file not found (expected retrospective*.md excluding template)');
    }
  }

  return {
    projectDir: root,
    pilotDir,
    weeklyCount,
    retrospectiveCount,
    adoption,
    errors,
    warnings,
    strict,
    passed: errors.length === 0 && (!strict || warnings.length === 0),
  };
}
