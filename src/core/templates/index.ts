/**
 * Barrel exports for the templates module.
 */
export { TemplateEngine, applyTemplate, findUnresolvedTokens, PILOT_TEMPLATE_FILES } from './engine.js';
export type { TemplateContext, TemplateValue, LoadedTemplate } from './engine.js';
export { DEFAULT_TEMPLATES } from './defaults.js';
export type { TemplateName } from './defaults.js';
