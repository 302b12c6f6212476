/**
 * Standards Reference rows and the template context for the agent file.
 */
import * as path from 'node:path';
import { expandHome } from '../../utils/file-system.js';
import type { StandardsTopic } from '../config/schema.js';
import type { TemplateContext } from '../templates/engine.js';
import type { StackProfile } from './types.js';

const STANDARDS_PATH_TOKEN = '{{STANDARDS_PATH}}';

/**
 * Where a topic's guide lives as written into the file:
 * `{{STANDARDS_PATH}}` is substituted, absolute paths are kept,
 * anything else is taken relative to the standards path.
 */
export function resolveGuidePath(standardsPath: string, guide: string): string {
  const value = expandHome(guide.trim());
  if (value.includes(STANDARDS_PATH_TOKEN)) {
    return value.split(STANDARDS_PATH_TOKEN).join(standardsPath);
  }
  if (path.isAbsolute(value)) {
    return value;
  }
  const base = standardsPath.replace(/\/+$/, '');
  return `${base}/${value.replace(/^\.\//, '')}`;
}

/**
 * `| Topic | \`path\` |` rows of the Standards Reference table.
 */
export function buildStandardsRows(standardsPath: string, topics: StandardsTopic[]): string {
  return topics
    .map((entry) => `| ${entry.topic.trim()} | \`${resolveGuidePath(standardsPath, entry.guide)}\` |`)
    .join('\n');
}

export interface AgentsContextInput {
  projectName: string;
  /** Standards path as written into the file */
  standardsPath: string;
  topics: StandardsTopic[];
  deviationPolicy: string;
  agentRole: string;
  projectDescription: string;
  /** Most important first */
  priorities: [string, string, string];
  stack: StackProfile;
  pinnedVersion?: string;
}

/**
 * Token values for the agent file template.
 */
export function buildAgentsContext(input: AgentsContextInput): TemplateContext {
  const { stack } = input;
  const [first, second, third] = input.priorities;
  return {
    PROJECT_NAME: input.projectName,
    STANDARDS_PATH: input.standardsPath,
    STANDARDS_GUIDE_ROWS: buildStandardsRows(input.standardsPath, input.topics),
    DEVIATION_POLICY: input.deviationPolicy,
    AGENT_ROLE: input.agentRole,
    PROJECT_DESCRIPTION: input.projectDescription,
    PRIORITY_ONE: first,
    PRIORITY_TWO: second,
    PRIORITY_THREE: third,
    STACK: stack.stack,
    LANGUAGE: stack.language,
    RUNTIME: stack.runtime,
    TEST_FRAMEWORK: stack.testFramework,
    PACKAGE_MANAGER: stack.packageManager,
    DEV_CMD: stack.commands.dev,
    TEST_CMD: stack.commands.test,
    COVERAGE_CMD: stack.commands.coverage,
    LINT_CMD: stack.commands.lint,
    TYPECHECK_CMD: stack.commands.typecheck,
    BUILD_CMD: stack.commands.build,
    PINNED_VERSION: input.pinnedVersion ?? 'latest',
  };
}
