/**
 * Project stack detection from marker files.
 */
import * as path from 'node:path';
import { fileExists } from '../../utils/file-system.js';
import { CommandNameSchema, type CommandName } from '../config/schema.js';
import type { ProjectStack, StackProfile } from './types.js';

export type PackageManager = 'npm' | 'pnpm' | 'yarn' | 'bun';

const PROJECT_STACKS: readonly ProjectStack[] = ['node', 'python', 'go', 'rust', 'jvm', 'generic'];

export function isProjectStack(value: string): value is ProjectStack {
  return PROJECT_STACKS.some((stack) => stack === value);
}

async function anyExists(projectDir: string, names: string[]): Promise<boolean> {
  for (const name of names) {
    if (await fileExists(path.join(projectDir, name))) {
      return true;
    }
  }
  return false;
}

/**
 * Detect the stack label; the first match wins.
 */
export async function detectProjectStack(projectDir: string): Promise<ProjectStack> {
  if (await anyExists(projectDir, ['package.json'])) return 'node';
  if (await anyExists(projectDir, ['pyproject.toml', 'requirements.txt', 'setup.py', 'Pipfile'])) return 'python';
  if (await anyExists(projectDir, ['go.mod'])) return 'go';
  if (await anyExists(projectDir, ['Cargo.toml'])) return 'rust';
  if (await anyExists(projectDir, ['pom.xml', 'build.gradle', 'build.gradle.kts'])) return 'jvm';
  return 'generic';
}

/**
 * Node package manager by lock file (npm when none is found).
 */
export async function detectPackageManager(projectDir: string): Promise<PackageManager> {
  if (await anyExists(projectDir, ['pnpm-lock.yaml'])) return 'pnpm';
  if (await anyExists(projectDir, ['yarn.lock'])) return 'yarn';
  if (await anyExists(projectDir, ['bun.lock', 'bun.lockb'])) return 'bun';
  return 'npm';
}

/**
 * How a package manager runs a package.json script.
 */
export function scriptCommand(manager: PackageManager, script: string): string {
  switch (manager) {
    case 'yarn':
      return `yarn ${script}`;
    case 'bun':
      return `bun run ${script}`;
    default:
      return `${manager} run ${script}`;
  }
}

async function nodeProfile(projectDir: string): Promise<Omit<StackProfile, 'stack' | 'detected'>> {
  const manager = await detectPackageManager(projectDir);
  const typescript = await anyExists(projectDir, ['tsconfig.json', 'tsconfig.base.json']);
  return {
    language: typescript ? 'TypeScript' : 'JavaScript/TypeScript',
    runtime: 'Node.js 20+',
    testFramework: 'Jest/Vitest/TBD',
    packageManager: manager,
    commands: {
      dev: scriptCommand(manager, 'dev'),
      test: scriptCommand(manager, 'test'),
      coverage: scriptCommand(manager, 'test:coverage'),
      lint: scriptCommand(manager, 'lint'),
      typecheck: scriptCommand(manager, 'typecheck'),
      build: scriptCommand(manager, 'build'),
    },
  };
}

async function pythonProfile(projectDir: string): Promise<Omit<StackProfile, 'stack' | 'detected'>> {
  let tool = 'pip';
  if (await anyExists(projectDir, ['uv.lock'])) tool = 'uv';
  else if (await anyExists(projectDir, ['poetry.lock'])) tool = 'poetry';
  else if (await anyExists(projectDir, ['Pipfile.lock', 'Pipfile'])) tool = 'pipenv';
  const prefix = tool === 'pip' ? '' : `${tool} run `;

  let dev = `${prefix}python -m app`;
  for (const [file, command] of [
    ['manage.py', 'python manage.py runserver'],
    ['app.py', 'python app.py'],
    ['src/main.py', 'python src/main.py'],
    ['main.py', 'python main.py'],
  ] as const) {
    if (await anyExists(projectDir, [file])) {
      dev = `${prefix}${command}`;
      break;
    }
  }

  return {
    language: 'Python',
    runtime: 'Python 3.11+',
    testFramework: 'pytest',
    packageManager: tool,
    commands: {
      dev,
      test: `${prefix}pytest`,
      coverage: `${prefix}pytest --cov`,
      lint: `${prefix}ruff check .`,
      typecheck: `${prefix}mypy .`,
      build: `${prefix}python -m build`,
    },
  };
}

async function jvmProfile(projectDir: string): Promise<Omit<StackProfile, 'stack' | 'detected'>> {
  const base = { language: 'Java/Kotlin', runtime: 'JVM 17+', testFramework: 'JUnit/TestNG' };
  if (await anyExists(projectDir, ['gradlew', 'build.gradle', 'build.gradle.kts'])) {
    return {
      ...base,
      packageManager: 'gradle',
      commands: {
        dev: './gradlew run',
        test: './gradlew test',
        coverage: './gradlew test',
        lint: './gradlew check',
        typecheck: './gradlew classes',
        build: './gradlew build',
      },
    };
  }
  const mvn = (await anyExists(projectDir, ['mvnw'])) ? './mvnw' : 'mvn';
  return {
    ...base,
    packageManager: 'maven',
    commands: {
      dev: `${mvn} spring-boot:run`,
      test: `${mvn} test`,
      coverage: `${mvn} test`,
      lint: `${mvn} -q -DskipTests verify`,
      typecheck: `${mvn} -q -DskipTests compile`,
      build: `${mvn} -DskipTests package`,
    },
  };
}

async function profileFor(stack: ProjectStack, projectDir: string): Promise<Omit<StackProfile, 'stack' | 'detected'>> {
  switch (stack) {
    case 'node':
      return nodeProfile(projectDir);
    case 'python':
      return pythonProfile(projectDir);
    case 'jvm':
      return jvmProfile(projectDir);
    case 'go':
      return {
        language: 'Go',
        runtime: 'Go 1.22+',
        testFramework: 'go test',
        packageManager: 'go modules',
        commands: {
          dev: 'go run .',
          test: 'go test ./...',
          coverage: 'go test ./... -cover',
          lint: 'go vet ./...',
          typecheck: 'go test ./...',
          build: 'go build ./...',
        },
      };
    case 'rust':
      return {
        language: 'Rust',
        runtime: 'Rust stable',
        testFramework: 'cargo test',
        packageManager: 'cargo',
        commands: {
          dev: 'cargo run',
          test: 'cargo test',
          coverage: 'cargo test',
          lint: 'cargo clippy --all-targets --all-features -- -D warnings',
          typecheck: 'cargo check',
          build: 'cargo build --release',
        },
      };
    case 'generic':
      return {
        language: 'TBD',
        runtime: 'TBD',
        testFramework: 'TBD',
        packageManager: 'make',
        commands: {
          dev: 'make dev',
          test: 'make test',
          coverage: 'make test-coverage',
          lint: 'make lint',
          typecheck: 'make typecheck',
          build: 'make build',
        },
      };
  }
}

export interface StackProfileOptions {
  stackOverride?: string;
  commandOverrides?: Partial<Record<CommandName, string>>;
}

/**
 * Detect the stack and build its profile.
 * A known override label selects that stack's defaults; any other label only renames the stack.
 */
export async function buildStackProfile(projectDir: string, options: StackProfileOptions = {}): Promise<StackProfile> {
  const override = options.stackOverride?.trim();
  const detected = override && isProjectStack(override) ? override : await detectProjectStack(projectDir);
  const profile = await profileFor(detected, projectDir);

  const commands = { ...profile.commands };
  for (const [name, command] of Object.entries(options.commandOverrides ?? {})) {
    if (command && isCommandName(name)) {
      commands[name] = command;
    }
  }

  return { ...profile, stack: override || detected, detected, commands };
}

function isCommandName(value: string): value is CommandName {
  return CommandNameSchema.safeParse(value).success;
}
