/**
 * Letter Template
 *
 * A letter template is a JSON block document. Text anywhere in it may carry
 * {{token}} placeholders; the `proposals` block is repeated once per
 * proposal of the record being rendered.
 */

import { readFile } from 'fs/promises';
import { TemplateValidationError, describeError } from '../types/errors.js';

// ============================================================================
// Template Shape
// ============================================================================

export type TextAlign = 'left' | 'center' | 'right' | 'justify';

export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  /** Points */
  size?: number;
  align?: TextAlign;
  /** Hex without '#', e.g. "A0A0A0" */
  color?: string;
}

export interface FieldRow {
  label: string;
  value: string;
}

export interface ProposalColumn {
  header: string;
  /** Cell text, usually a proposal.* placeholder */
  value: string;
  /** Centimetres */
  width?: number;
}

export type LetterBlock =
  | { type: 'heading'; text: string; style?: TextStyle }
  | { type: 'paragraph'; text: string; style?: TextStyle }
  | { type: 'fields'; rows: FieldRow[]; labelWidth?: number; valueWidth?: number }
  | { type: 'numbered'; items: string[] }
  | { type: 'proposals'; columns: ProposalColumn[]; fontSize?: number }
  | { type: 'signature'; lines: string[]; note?: string }
  | { type: 'page_break' }
  | { type: 'spacer' };

export interface LetterTemplate {
  title: string;
  font: string;
  /** Points */
  fontSize: number;
  /** Month names used by {{date}}, January first */
  monthNames: string[];
  blocks: LetterBlock[];
}

export const ENGLISH_MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const ALIGNMENTS = new Set<string>(['left', 'center', 'right', 'justify']);

// ============================================================================
// Validation
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new TemplateValidationError('must be a string', path);
  }
  return value;
}

function requireStringArray(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new TemplateValidationError('must be an array of strings', path);
  }
  return value.map((item, i) => requireString(item, `${path}[${i}]`));
}

function optionalNumber(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new TemplateValidationError('must be a positive number', path);
  }
  return value;
}

function parseStyle(value: unknown, path: string): TextStyle | undefined {
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    throw new TemplateValidationError('must be an object', path);
  }

  const style: TextStyle = {};
  if (value.bold !== undefined) style.bold = value.bold === true;
  if (value.italic !== undefined) style.italic = value.italic === true;
  style.size = optionalNumber(value.size, `${path}.size`);

  if (value.align !== undefined) {
    const align = requireString(value.align, `${path}.align`);
    if (!ALIGNMENTS.has(align)) {
      throw new TemplateValidationError(`must be one of: ${Array.from(ALIGNMENTS).join(', ')}`, `${path}.align`);
    }
    style.align = align === 'left' || align === 'center' || align === 'right' ? align : 'justify';
  }

  if (value.color !== undefined) {
    const color = requireString(value.color, `${path}.color`).replace(/^#/, '');
    if (!/^[0-9a-fA-F]{6}$/.test(color)) {
      throw new TemplateValidationError('must be a 6-digit hex color', `${path}.color`);
    }
    style.color = color.toUpperCase();
  }

  return style;
}

function parseBlock(value: unknown, path: string): LetterBlock {
  if (!isObject(value)) {
    throw new TemplateValidationError('must be an object', path);
  }

  const type = requireString(value.type, `${path}.type`);

  switch (type) {
    case 'heading':
    case 'paragraph':
      return {
        type,
        text: requireString(value.text, `${path}.text`),
        style: parseStyle(value.style, `${path}.style`),
      };

    case 'fields': {
      if (!Array.isArray(value.rows)) {
        throw new TemplateValidationError('must be an array', `${path}.rows`);
      }
      const rows = value.rows.map((row, i) => {
        const rowPath = `${path}.rows[${i}]`;
        if (!isObject(row)) {
          throw new TemplateValidationError('must be an object', rowPath);
        }
        return {
          label: requireString(row.label, `${rowPath}.label`),
          value: requireString(row.value, `${rowPath}.value`),
        };
      });
      return {
        type,
        rows,
        labelWidth: optionalNumber(value.labelWidth, `${path}.labelWidth`),
        valueWidth: optionalNumber(value.valueWidth, `${path}.valueWidth`),
      };
    }

    case 'numbered':
      return { type, items: requireStringArray(value.items, `${path}.items`) };

    case 'proposals': {
      if (!Array.isArray(value.columns) || value.columns.length === 0) {
        throw new TemplateValidationError('must be a non-empty array', `${path}.columns`);
      }
      const columns = value.columns.map((column, i) => {
        const columnPath = `${path}.columns[${i}]`;
        if (!isObject(column)) {
          throw new TemplateValidationError('must be an object', columnPath);
        }
        return {
          header: requireString(column.header, `${columnPath}.header`),
          value: requireString(column.value, `${columnPath}.value`),
          width: optionalNumber(column.width, `${columnPath}.width`),
        };
      });
      return { type, columns, fontSize: optionalNumber(value.fontSize, `${path}.fontSize`) };
    }

    case 'signature':
      return {
        type,
        lines: requireStringArray(value.lines, `${path}.lines`),
        note: value.note === undefined ? undefined : requireString(value.note, `${path}.note`),
      };

    case 'page_break':
    case 'spacer':
      return { type };

    default:
      throw new TemplateValidationError(`unknown block type "${type}"`, `${path}.type`);
  }
}

/**
 * Validate parsed JSON into a LetterTemplate.
 */
export function parseLetterTemplate(value: unknown): LetterTemplate {
  if (!isObject(value)) {
    throw new TemplateValidationError('must be an object', 'template');
  }
  if (!Array.isArray(value.blocks)) {
    throw new TemplateValidationError('must be an array', 'template.blocks');
  }

  const blocks = value.blocks.map((block, i) => parseBlock(block, `template.blocks[${i}]`));
  if (!blocks.some(block => block.type === 'proposals')) {
    throw new TemplateValidationError('template needs a "proposals" block', 'template.blocks');
  }

  const monthNames = value.monthNames === undefined
    ? ENGLISH_MONTHS
    : requireStringArray(value.monthNames, 'template.monthNames');
  if (monthNames.length !== 12) {
    throw new TemplateValidationError('must list 12 month names', 'template.monthNames');
  }

  return {
    title: value.title === undefined ? 'Letter' : requireString(value.title, 'template.title'),
    font: value.font === undefined ? 'Cambria' : requireString(value.font, 'template.font'),
    fontSize: optionalNumber(value.fontSize, 'template.fontSize') ?? 11,
    monthNames,
    blocks,
  };
}

export async function loadLetterTemplate(path: string): Promise<LetterTemplate> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new TemplateValidationError(`cannot read template (${describeError(error)})`, path);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new TemplateValidationError(`invalid JSON (${describeError(error)})`, path);
  }

  return parseLetterTemplate(json);
}
