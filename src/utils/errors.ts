/**
 * Error types and codes for guidekeeper.
 * All errors raised by the library extend GuidekeeperError.
 */

/**
 * Base error class for all guidekeeper errors.
 */
export class GuidekeeperError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GuidekeeperError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends GuidekeeperError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, unreadable YAML, etc.).
 */
export class SystemError extends GuidekeeperError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Malformed marker structure in a markdown file.
 * Fatal for the containing file.
 */
export class ParseError extends GuidekeeperError {
  constructor(
    message: string,
    public readonly file: string,
    public readonly line: number
  ) {
    super(ErrorCodes.PARSE_ERROR, `${file}:${line}: ${message}`, { file, line });
    this.name = 'ParseError';
  }
}

/**
 * Base class for navigation violations. These are collected into
 * validation reports rather than thrown.
 */
export class NavigationError extends GuidekeeperError {
  constructor(
    code: string,
    message: string,
    public readonly file: string,
    public readonly line: number | null,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'NavigationError';
  }
}

/**
 * A guide exists on disk but a required index does not list it.
 */
export class OrphanGuideError extends NavigationError {
  constructor(
    public readonly guidePath: string,
    public readonly missingFromIndex: string
  ) {
    super(
      ErrorCodes.ORPHAN_GUIDE,
      `Guide '${guidePath}' is not listed in ${missingFromIndex}`,
      guidePath,
      null,
      { guide: guidePath, index: missingFromIndex }
    );
    this.name = 'OrphanGuideError';
  }
}

/**
 * A link's target file or anchor does not resolve.
 */
export class BrokenLinkError extends NavigationError {
  constructor(
    public readonly source: string,
    public readonly target: string,
    line: number,
    public readonly reason: 'missing-file' | 'missing-anchor'
  ) {
    super(
      ErrorCodes.BROKEN_LINK,
      reason === 'missing-anchor'
        ? `${source}:${line} links to unknown anchor: ${target}`
        : `${source}:${line} links to non-existent file: ${target}`,
      source,
      line,
      { source, target, line, reason }
    );
    this.name = 'BrokenLinkError';
  }
}

/**
 * An index entry points at a deleted or renamed target.
 */
export class StaleIndexError extends NavigationError {
  constructor(
    public readonly indexFile: string,
    public readonly target: string,
    line: number,
    public readonly title: string
  ) {
    super(
      ErrorCodes.STALE_INDEX,
      `${indexFile}:${line} index entry '${title}' points at missing target: ${target}`,
      indexFile,
      line,
      { index: indexFile, target, line, title }
    );
    this.name = 'StaleIndexError';
  }
}

/**
 * A managed block was edited locally since the last merge.
 * Reported per marker; never aborts the whole merge.
 */
export class MergeConflictError extends GuidekeeperError {
  constructor(
    public readonly markerId: string,
    public readonly downstreamContent: string,
    public readonly templateContent: string
  ) {
    super(
      ErrorCodes.MERGE_CONFLICT,
      `Managed block '${markerId}' has local edits; refusing to overwrite (use --force to replace)`,
      { markerId }
    );
    this.name = 'MergeConflictError';
  }
}

/**
 * Adoption preconditions not met (existing target in fresh mode, missing target in merge mode...).
 */
export class AdoptionError extends GuidekeeperError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AdoptionError';
  }
}

/**
 * Snapshot lifecycle errors (missing snapshot, tag collision, bad tag).
 */
export class SnapshotError extends GuidekeeperError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SnapshotError';
  }
}

/**
 * Snapshot content no longer matches its manifest.
 */
export class SnapshotHashMismatchError extends SnapshotError {
  constructor(
    public readonly path: string,
    public readonly expected: string | null,
    public readonly actual: string | null,
    details?: Record<string, unknown>
  ) {
    super(
      ErrorCodes.SNAPSHOT_HASH_MISMATCH,
      `Snapshot hash mismatch: ${path}`,
      { path, expected, actual, ...details }
    );
    this.name = 'SnapshotHashMismatchError';
  }
}

/**
 * A simulator assertion failed.
 */
export class ScenarioAssertionError extends GuidekeeperError {
  constructor(
    public readonly assertion: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(ErrorCodes.SCENARIO_ASSERTION, `Assertion failed: ${assertion}`, {
      assertion,
      expected,
      actual,
    });
    this.name = 'ScenarioAssertionError';
  }
}

export const ErrorCodes = {
  // Parse errors
  PARSE_ERROR: 'P001',

  // Navigation errors (N001-N003)
  ORPHAN_GUIDE: 'N001',
  BROKEN_LINK: 'N002',
  STALE_INDEX: 'N003',

  // Merge / adoption errors (M001-M003)
  MERGE_CONFLICT: 'M001',
  TARGET_EXISTS: 'M002',
  TARGET_MISSING: 'M003',

  // System / snapshot errors (S001-S006)
  YAML_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  SNAPSHOT_NOT_FOUND: 'S003',
  SNAPSHOT_EXISTS: 'S004',
  SNAPSHOT_HASH_MISMATCH: 'S005',
  SNAPSHOT_TAG_INVALID: 'S006',

  // Config errors
  CONFIG_INVALID: 'C001',
  CONFIG_LOAD: 'C002',

  // Simulator
  SCENARIO_ASSERTION: 'T001',
  SCENARIO_NOT_FOUND: 'T002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
