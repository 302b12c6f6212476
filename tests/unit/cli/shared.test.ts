/**
 * Tests for helpers shared by the CLI commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import {
  exitWithError,
  parseAdoptionMode,
  parseCompanionMode,
  parseNonNegativeInt,
  resolveProjectDir,
} from '../../../src/cli/shared.js';
import { AdoptionError, ErrorCodes } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), setLevel: vi.fn() },
}));

describe('argument parsers', () => {
  it('should accept known adoption modes', () => {
    expect(parseAdoptionMode('pinned')).toBe('pinned');
    expect(() => parseAdoptionMode('latest')).toThrow(InvalidArgumentError);
    expect(() => parseAdoptionMode('latest')).toThrow('Expected one of: fresh, merge, pinned.');
  });

  it('should accept known companion modes', () => {
    expect(parseCompanionMode('copy')).toBe('copy');
    expect(() => parseCompanionMode('hardlink')).toThrow('Expected one of: auto, symlink, copy, skip.');
  });

  it('should parse non-negative integers', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(parseNonNegativeInt('180')).toBe(180);
    expect(() => parseNonNegativeInt('-1')).toThrow('Expected a non-negative integer.');
    expect(() => parseNonNegativeInt('1.5')).toThrow('Expected a non-negative integer.');
  });

  it('should resolve the project directory from the working directory', () => {
    expect(resolveProjectDir(undefined)).toBe(process.cwd());
    expect(resolveProjectDir('app')).toBe(path.join(process.cwd(), 'app'));
  });
});

describe('exitWithError', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('process.exit called');
    });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    logSpy.mockRestore();
  });

  it('should log the message with its code', () => {
    const error = new AdoptionError(ErrorCodes.TARGET_MISSING, 'AGENTS.md not found');

    expect(() => exitWithError(error)).toThrow('process.exit called');
    expect(logger.error).toHaveBeenCalledWith('AGENTS.md not found [M003]');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should log plain errors by message', () => {
    expect(() => exitWithError(new Error('disk full'))).toThrow('process.exit called');
    expect(logger.error).toHaveBeenCalledWith('disk full');
  });

  it('should print a JSON error payload', () => {
    const error = new AdoptionError(ErrorCodes.TARGET_MISSING, 'AGENTS.md not found');

    expect(() => exitWithError(error, true)).toThrow('process.exit called');
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { name: 'AdoptionError', code: 'M003', message: 'AGENTS.md not found' },
    });
    expect(logger.error).not.toHaveBeenCalled();
  });
});
