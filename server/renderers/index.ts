/**
 * Renderers Module
 *
 * Letter templates, placeholder resolution and .docx layout.
 */

export { TemplateRenderer } from './template-renderer.js';
export type { TemplateRendererOptions } from './template-renderer.js';
export { loadLetterTemplate, parseLetterTemplate, ENGLISH_MONTHS } from './letter-template.js';
export type { LetterTemplate, LetterBlock, TextStyle } from './letter-template.js';
export { resolveLetter, formatLetterDate } from './letter-resolver.js';
export type { ResolvedLetter, ResolvedBlock, LetterContext } from './letter-resolver.js';
export { renderLetterDocx } from './docx-renderer.js';
export { substitute, listPlaceholders } from './placeholders.js';
