/**
 * Embedded default templates, used when the standards tree has no own copy.
 */

export type TemplateName =
  | 'agents'
  | 'pilot-kickoff'
  | 'pilot-weekly-checkin'
  | 'pilot-retrospective'
  | 'pilot-readme';

const DEFAULT_AGENTS_TEMPLATE = `# {{PROJECT_NAME}}

Instructions for AI coding agents working in this repository.

<!-- BEGIN:standards-reference -->
## Standards Reference

This project follows organizational standards defined in \`{{STANDARDS_PATH}}\`.

| Topic | Guide |
| --- | --- |
{{STANDARDS_GUIDE_ROWS}}

**Deviation policy**: {{DEVIATION_POLICY}}
<!-- END:standards-reference -->

## Agent Role

You are a {{AGENT_ROLE}} working on {{PROJECT_DESCRIPTION}}.

Priorities, in order:

1. {{PRIORITY_ONE}}
2. {{PRIORITY_TWO}}
3. {{PRIORITY_THREE}}

## Tech Stack

| Layer | Choice |
| --- | --- |
| Stack | {{STACK}} |
| Language | {{LANGUAGE}} |
| Runtime | {{RUNTIME}} |
| Testing | {{TEST_FRAMEWORK}} |
| Package manager | {{PACKAGE_MANAGER}} |

<!-- BEGIN:key-commands -->
## Key Commands

| Command | Purpose |
| --- | --- |
| \`{{DEV_CMD}}\` | Start development environment |
| \`{{TEST_CMD}}\` | Run the default test suite |
| \`{{COVERAGE_CMD}}\` | Run tests with coverage |
| \`{{LINT_CMD}}\` | Run lint checks |
| \`{{TYPECHECK_CMD}}\` | Run type checks |
| \`{{BUILD_CMD}}\` | Build production artifacts |
<!-- END:key-commands -->

## Boundaries

- Ask before adding new dependencies.
- Never commit secrets or credentials.
- Do not edit generated files by hand.

## Project-Specific Overrides

| Topic | Standard | Override | Rationale |
| --- | --- | --- | --- |
| None | N/A | N/A | N/A |
`;

const DEFAULT_PILOT_KICKOFF_TEMPLATE = `# Pilot Kickoff: {{PROJECT_NAME}}

| Field | Value |
| --- | --- |
| Project | {{PROJECT_NAME}} |
| Project directory | {{PROJECT_DIR}} |
| Pilot owner | {{PILOT_OWNER}} |
| Start date | {{START_DATE}} |
| Adoption mode | {{ADOPTION_MODE}} |
| Standards path | {{STANDARDS_PATH}} |

## Setup Checklist

- [ ] AGENTS.md adopted and validated
- [ ] Team briefed on the deviation policy
- [ ] Weekly check-in owner assigned

## Baseline

| Metric | Value |
| --- | --- |
| Open defects at start | |
| Average review turnaround | |
`;

const DEFAULT_PILOT_WEEKLY_TEMPLATE = `# Weekly Check-in: {{PROJECT_NAME}}

| Field | Value |
| --- | --- |
| Reporting Period | |
| Blockers encountered | |
| Critical defects linked to guidance | |
| Guides consulted most | |

## Notes

## Friction With Guidance
`;

const DEFAULT_PILOT_RETROSPECTIVE_TEMPLATE = `# Pilot Retrospective: {{PROJECT_NAME}}

Pilot started {{START_DATE}} with owner {{PILOT_OWNER}} in {{ADOPTION_MODE}} mode.

| Question | Answer |
| --- | --- |
| Continue rollout / pause / iterate | |
| Preferred adoption mode (latest or pinned) | |
| Follow-up owners and deadlines | |

## What Worked

## What Did Not Work

## Change Requests
`;

const DEFAULT_PILOT_README_TEMPLATE = `# Adoption Pilot Artifacts

Generated by guidekeeper on {{START_DATE}}.

| File | Purpose |
| --- | --- |
| kickoff.md | Pilot setup checklist and baseline metadata |
| weekly-checkin-template.md | Weekly progress and friction tracking |
| retrospective-template.md | End-of-pilot outcomes and decisions |

| Context | Value |
| --- | --- |
| Project | {{PROJECT_NAME}} |
| Project directory | {{PROJECT_DIR}} |
| Adoption mode | {{ADOPTION_MODE}} |
| Standards path in AGENTS | {{STANDARDS_PATH}} |
| Pilot owner | {{PILOT_OWNER}} |

## Suggested Workflow

1. Fill \`kickoff.md\` before week 1 starts.
2. Duplicate \`weekly-checkin-template.md\` each week (for example, \`weekly-01.md\`).
3. File concrete issues using \`{{STANDARDS_PATH}}/docs/templates/feedback-template.md\` when guidance fails.
4. Complete \`retrospective-template.md\` at pilot end and link resulting change requests.
`;

export const DEFAULT_TEMPLATES: Record<TemplateName, string> = {
  'agents': DEFAULT_AGENTS_TEMPLATE,
  'pilot-kickoff': DEFAULT_PILOT_KICKOFF_TEMPLATE,
  'pilot-weekly-checkin': DEFAULT_PILOT_WEEKLY_TEMPLATE,
  'pilot-retrospective': DEFAULT_PILOT_RETROSPECTIVE_TEMPLATE,
  'pilot-readme': DEFAULT_PILOT_README_TEMPLATE,
};
