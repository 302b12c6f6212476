/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { formatZodError, loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ErrorCodes, SystemError } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  name: z.string(),
  threshold: z.number().default(180),
});

describe('parseYaml', () => {
  it('should parse a mapping', () => {
    expect(parseYaml('name: standards\nthreshold: 30\n')).toEqual({ name: 'standards', threshold: 30 });
  });

  it('should parse JSON documents', () => {
    expect(parseYaml('{"files": {"a.md": "abc"}}')).toEqual({ files: { 'a.md': 'abc' } });
  });

  it('should throw a SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
    try {
      parseYaml('key: [unclosed');
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.YAML_ERROR });
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: standards\n', Schema)).toEqual({ name: 'standards', threshold: 180 });
  });

  it('should treat an empty document as an empty mapping', () => {
    expect(parseYamlWithSchema('', z.object({ mode: z.string().default('merge') }))).toEqual({ mode: 'merge' });
  });

  it('should report validation failures with their path', () => {
    expect(() => parseYamlWithSchema('name: 3\n', Schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: standards\nthreshold: 7\n');

    await expect(loadYamlWithSchema('/tmp/config.yaml', Schema)).resolves.toEqual({ name: 'standards', threshold: 7 });
    expect(mockReadFile).toHaveBeenCalledWith('/tmp/config.yaml');
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('threshold: 7\n');

    await expect(loadYamlWithSchema('/tmp/config.yaml', Schema)).rejects.toThrow(/\(file: \/tmp\/config\.yaml\)$/);
  });

  it('should report an unreadable file', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/tmp/missing.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      message: 'Failed to load YAML file: /tmp/missing.yaml',
    });
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ pins: z.object({ dir: z.string() }) }).safeParse({ pins: { dir: 1 } });
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    expect(formatZodError(result.error)).toMatch(/^pins\.dir: /);
  });
});
