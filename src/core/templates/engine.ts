/**
 * Template engine for adoption and pilot documents.
 *
 * Template resolution order:
 * 1. A file in the standards tree (e.g. adoption/template-agents.md)
 * 2. Embedded default template
 *
 * Rendering is deterministic: no clock, no environment.
 */
import * as path from 'node:path';
import { readFile, fileExists } from '../../utils/file-system.js';
import { DEFAULT_TEMPLATES, type TemplateName } from './defaults.js';

export type TemplateValue = string | number | boolean | undefined;

export interface TemplateContext {
  [key: string]: TemplateValue;
}

export interface LoadedTemplate {
  text: string;
  source: 'custom' | 'default';
  /** Absolute path of the custom template */
  templatePath?: string;
}

/** Standards-tree locations of the pilot templates. */
export const PILOT_TEMPLATE_FILES: Partial<Record<TemplateName, string>> = {
  'pilot-kickoff': 'docs/templates/pilot-kickoff-template.md',
  'pilot-weekly-checkin': 'docs/templates/pilot-weekly-checkin-template.md',
  'pilot-retrospective': 'docs/templates/pilot-retrospective-template.md',
};

const TOKEN_PATTERN = /\{\{\s*([A-Z][A-Z0-9_]*)\s*\}\}/g;
const IF_PATTERN = /\{\{#if\s+([A-Z][A-Z0-9_]*)\}\}([\s\S]*?)(?:\{\{else\}\}([\s\S]*?))?\{\{\/if\}\}/g;

/**
 * Loads templates from a standards tree or falls back to defaults.
 */
export class TemplateEngine {
  private readonly standardsPath: string;
  private readonly files: Partial<Record<TemplateName, string>>;

  /**
   * @param files - Standards-relative file per template name
   */
  constructor(standardsPath: string, files: Partial<Record<TemplateName, string>> = {}) {
    this.standardsPath = standardsPath;
    this.files = files;
  }

  async load(name: TemplateName): Promise<LoadedTemplate> {
    const relative = this.files[name];
    if (relative) {
      const templatePath = path.resolve(this.standardsPath, relative);
      if (await fileExists(templatePath)) {
        return { text: await readFile(templatePath), source: 'custom', templatePath };
      }
    }
    return { text: DEFAULT_TEMPLATES[name], source: 'default' };
  }

  async render(name: TemplateName, context: TemplateContext): Promise<LoadedTemplate> {
    const loaded = await this.load(name);
    return { ...loaded, text: applyTemplate(loaded.text, context) };
  }
}

function isTruthy(value: TemplateValue): boolean {
  return value !== undefined && value !== false && value !== '';
}

/**
 * Substitute `{{TOKEN}}` placeholders and `{{#if TOKEN}}...{{else}}...{{/if}}` blocks.
 * Tokens missing from the context are left in place.
 */
export function applyTemplate(template: string, context: TemplateContext): string {
  const conditionals = (text: string): string =>
    text.replace(IF_PATTERN, (_, name: string, ifContent: string, elseContent: string = '') =>
      conditionals(isTruthy(context[name]) ? ifContent : elseContent)
    );

  return conditionals(template).replace(TOKEN_PATTERN, (token: string, name: string) => {
    const value = context[name];
    return value === undefined ? token : String(value);
  });
}

/**
 * Unresolved `{{TOKEN}}` placeholders in a rendered document, in order of appearance.
 */
export function findUnresolvedTokens(text: string): Array<{ token: string; line: number }> {
  const found: Array<{ token: string; line: number }> = [];
  text.split(/\r?\n/).forEach((line, index) => {
    for (const match of line.matchAll(TOKEN_PATTERN)) {
      found.push({ token: match[1], line: index + 1 });
    }
  });
  return found;
}
