/**
 * GitHub-style heading anchors.
 *
 * Rule: lowercase, drop emphasis markers, strip everything outside
 * `[a-z0-9 -]`, turn each run of spaces into one hyphen, trim hyphens.
 * Non-ASCII letters and emoji are stripped.
 */

const EMPHASIS_MARKERS = /[*_~`]/g;
const NON_SLUG_CHARS = /[^a-z0-9 -]/g;
const SPACE_RUNS = / +/g;
const EDGE_HYPHENS = /^-+|-+$/g;

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(EMPHASIS_MARKERS, '')
    .replace(NON_SLUG_CHARS, '')
    .replace(SPACE_RUNS, '-')
    .replace(EDGE_HYPHENS, '');
}

/**
 * Hands out unique slugs for one document, in heading order.
 * Repeats of a base slug get `-1`, `-2`, ... appended.
 */
export class SlugRegistry {
  private readonly taken = new Set<string>();
  private readonly occurrences = new Map<string, number>();

  register(text: string): string {
    const base = slugify(text);
    if (base === '') {
      return '';
    }

    let count = this.occurrences.get(base) ?? 0;
    let candidate = count === 0 ? base : `${base}-${count}`;
    // A literal heading like "Section 1" may already own "section-1"
    while (this.taken.has(candidate)) {
      count++;
      candidate = `${base}-${count}`;
    }

    this.occurrences.set(base, count + 1);
    this.taken.add(candidate);
    return candidate;
  }

  has(slug: string): boolean {
    return this.taken.has(slug);
  }

  all(): Set<string> {
    return new Set(this.taken);
  }
}
