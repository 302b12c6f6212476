/**
 * Property tests for heading slugs.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { slugify, SlugRegistry } from '../../../../src/core/markdown/slugify.js';

describe('slugify properties', () => {
  it('is idempotent', () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(slugify(slugify(text))).toBe(slugify(text));
      })
    );
  });

  it('only yields lowercase ASCII, digits and inner hyphens', () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        const slug = slugify(text);
        expect(slug).toMatch(/^[a-z0-9-]*$/);
        expect(slug.startsWith('-')).toBe(false);
        expect(slug.endsWith('-')).toBe(false);
      })
    );
  });
});

describe('SlugRegistry properties', () => {
  const headingArb = fc.oneof(
    fc.constantFrom('Section', 'Section 1', 'Section 2', 'Setup', 'setup-1'),
    fc.stringMatching(/^[A-Za-z0-9 ]{0,12}$/)
  );

  it('never hands out the same slug twice in one document', () => {
    fc.assert(
      fc.property(fc.array(headingArb, { maxLength: 20 }), (headings) => {
        const registry = new SlugRegistry();
        const slugs = headings.map((heading) => registry.register(heading)).filter((slug) => slug !== '');
        expect(new Set(slugs).size).toBe(slugs.length);
      })
    );
  });

  it('keeps the base slug for the first occurrence', () => {
    fc.assert(
      fc.property(fc.array(headingArb, { minLength: 1, maxLength: 20 }), (headings) => {
        const registry = new SlugRegistry();
        const first = registry.register(headings[0]);
        expect(first).toBe(slugify(headings[0]));
      })
    );
  });
});
