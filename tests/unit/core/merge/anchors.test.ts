/**
 * Tests for insert anchor parsing.
 */
import { describe, it, expect } from 'vitest';
import { formatInsertAnchor, parseInsertAnchor } from '../../../../src/core/merge/anchors.js';
import { ConfigError } from '../../../../src/utils/errors.js';

describe('parseInsertAnchor', () => {
  it('parses the fixed anchors', () => {
    expect(parseInsertAnchor('end')).toEqual({ kind: 'end' });
    expect(parseInsertAnchor('start')).toEqual({ kind: 'start' });
    expect(parseInsertAnchor('before-first-section')).toEqual({ kind: 'before-first-section' });
  });

  it('parses after-section with a trimmed heading', () => {
    expect(parseInsertAnchor('after-section: Setup')).toEqual({ kind: 'after-section', heading: 'Setup' });
  });

  it('rejects anything else', () => {
    expect(() => parseInsertAnchor('middle')).toThrow(ConfigError);
    expect(() => parseInsertAnchor('after-section:')).toThrow(ConfigError);
  });

  it('formats back to the setting value', () => {
    expect(formatInsertAnchor({ kind: 'after-section', heading: 'Setup' })).toBe('after-section:Setup');
    expect(formatInsertAnchor({ kind: 'end' })).toBe('end');
  });
});
