import { z } from 'zod';

/**
 * Helper to create an optional object field with schema defaults.
 * `.default({})` doesn't apply inner defaults for objects, so both
 * undefined and null are preprocessed into {} before parsing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Adoption modes. */
export const AdoptionModeSchema = z.enum(['fresh', 'merge', 'pinned']);

/** How the companion instruction file (e.g. CLAUDE.md) is maintained. */
export const CompanionModeSchema = z.enum(['auto', 'symlink', 'copy', 'skip']);

/** Commands that can be overridden in the rendered template. */
export const CommandNameSchema = z.enum(['dev', 'test', 'coverage', 'lint', 'typecheck', 'build']);

/** Where new managed blocks are inserted in an existing file. */
export const InsertAnchorSchema = z
  .string()
  .regex(
    /^(end|start|before-first-section|after-section:.+)$/,
    "expected 'end', 'start', 'before-first-section' or 'after-section:<heading>'"
  );

/** One row of the Standards Reference table. */
export const StandardsTopicSchema = z.object({
  topic: z.string().min(1),
  guide: z.string().min(1),
});

export const DEFAULT_STANDARDS_TOPICS: Array<z.infer<typeof StandardsTopicSchema>> = [
  { topic: 'Error handling', guide: 'guides/error-handling/error-handling.md' },
  { topic: 'Logging', guide: 'guides/logging-practices/logging-practices.md' },
  { topic: 'API design', guide: 'guides/api-design/api-design.md' },
  { topic: 'Documentation', guide: 'guides/documentation-guidelines/documentation-guidelines.md' },
  { topic: 'Code style', guide: 'guides/coding-guidelines/coding-guidelines.md' },
  { topic: 'Comments', guide: 'guides/commenting-guidelines/commenting-guidelines.md' },
];

export const DEFAULT_DEVIATION_POLICY =
  'Do not deviate from these standards without explicit approval. ' +
  'If deviation is necessary, document it in the Project-Specific Overrides section with rationale.';

export const DEFAULT_AGENT_ROLE = 'project-focused software engineer';
export const DEFAULT_PROJECT_DESCRIPTION = 'this project';
export const DEFAULT_PRIORITIES: [string, string, string] = [
  'Correctness over speed',
  'Security over convenience',
  'Readability over cleverness',
];

/** Companion file settings. */
export const CompanionSettingsSchema = z.object({
  path: z.string().default('CLAUDE.md'),
  mode: CompanionModeSchema.default('auto'),
});

/** Snapshot storage settings. */
export const PinSettingsSchema = z.object({
  /** Project-relative directory holding pinned snapshots */
  dir: z.string().default('.guidekeeper/pins'),
});

/** Navigation validation settings. */
export const NavigationSettingsSchema = z.object({
  /** Root navigation files that must list every guide */
  index_files: z.array(z.string()).default(['AGENTS.md', 'README.md']),
  /** Directories whose markdown files are guides */
  guide_roots: z.array(z.string()).default(['guides', 'adoption']),
  /** Directories scanned for markdown documents */
  content_roots: z.array(z.string()).default(['guides', 'adoption', 'docs']),
  /** Directories whose guides must carry a `## Contents` table */
  contents_roots: z.array(z.string()).default(['guides']),
  /** Glob patterns excluded from discovery */
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/.git/**', '**/dist/**']),
});

/** Downstream adoption check settings. */
export const AdoptionCheckSettingsSchema = z.object({
  recommended_sections: z
    .array(z.string())
    .default(['Agent Role', 'Tech Stack', 'Key Commands', 'Boundaries']),
});

/** Pilot artifact settings. */
export const PilotSettingsSchema = z.object({
  dir: z.string().default('.guidekeeper/pilot'),
  min_weekly_checkins: z.number().int().min(0).default(1),
  require_retrospective: z.boolean().default(false),
});

/** Guide freshness settings. */
export const FreshnessSettingsSchema = z.object({
  threshold_days: z.number().int().min(1).default(180),
});

/**
 * Root configuration schema.
 */
export const ConfigSchema = z
  .object({
    standards_path: z.string().optional(),
    mode: AdoptionModeSchema.default('merge'),
    pinned_version: z.string().min(1).optional(),
    stack_override: z.string().min(1).optional(),
    command_overrides: z.partialRecord(CommandNameSchema, z.string()).default({}),
    target_file: z.string().default('AGENTS.md'),
    template_file: z.string().default('adoption/template-agents.md'),
    insert_anchor: InsertAnchorSchema.default('before-first-section'),
    backup: z.boolean().default(true),
    project_name: z.string().optional(),
    deviation_policy: z.string().default(DEFAULT_DEVIATION_POLICY),
    agent_role: z.string().min(1).default(DEFAULT_AGENT_ROLE),
    project_description: z.string().min(1).default(DEFAULT_PROJECT_DESCRIPTION),
    /** Agent priorities, most important first */
    priorities: z
      .tuple([z.string().min(1), z.string().min(1), z.string().min(1)])
      .default(DEFAULT_PRIORITIES),
    standards_topics: z.array(StandardsTopicSchema).min(1).default(DEFAULT_STANDARDS_TOPICS),
    companion: withDefaults(CompanionSettingsSchema),
    pins: withDefaults(PinSettingsSchema),
    navigation: withDefaults(NavigationSettingsSchema),
    adoption_check: withDefaults(AdoptionCheckSettingsSchema),
    pilot: withDefaults(PilotSettingsSchema),
    freshness: withDefaults(FreshnessSettingsSchema),
  })
  .superRefine((config, ctx) => {
    if (config.mode === 'pinned' && !config.pinned_version) {
      ctx.addIssue({
        code: 'custom',
        path: ['pinned_version'],
        message: 'pinned_version is required when mode is pinned',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type AdoptionMode = z.infer<typeof AdoptionModeSchema>;
export type CompanionMode = z.infer<typeof CompanionModeSchema>;
export type CommandName = z.infer<typeof CommandNameSchema>;
export type StandardsTopic = z.infer<typeof StandardsTopicSchema>;
export type NavigationSettings = z.infer<typeof NavigationSettingsSchema>;
export type PilotSettings = z.infer<typeof PilotSettingsSchema>;
