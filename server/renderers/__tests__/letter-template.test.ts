import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ENGLISH_MONTHS, loadLetterTemplate, parseLetterTemplate } from '../letter-template.js';
import { DEFAULT_TEMPLATE_PATH } from '../../config/app-config.js';
import { TemplateValidationError } from '../../types/errors.js';

const MINIMAL = {
  blocks: [{ type: 'proposals', columns: [{ header: 'No.', value: '{{proposal.number}}' }] }],
};

describe('letter-template', () => {
  it('applies defaults to a minimal template', () => {
    const template = parseLetterTemplate(MINIMAL);

    expect(template.title).toBe('Letter');
    expect(template.font).toBe('Cambria');
    expect(template.fontSize).toBe(11);
    expect(template.monthNames).toEqual(ENGLISH_MONTHS);
    expect(template.blocks).toEqual([
      { type: 'proposals', columns: [{ header: 'No.', value: '{{proposal.number}}', width: undefined }], fontSize: undefined },
    ]);
  });

  it('requires a proposals block', () => {
    expect(() => parseLetterTemplate({ blocks: [{ type: 'spacer' }] })).toThrow(
      'template.blocks: template needs a "proposals" block',
    );
  });

  it('reports the path of an invalid field', () => {
    const bad = { blocks: [{ type: 'heading', text: 'x', style: { align: 'middle' } }, ...MINIMAL.blocks] };
    expect(() => parseLetterTemplate(bad)).toThrow(TemplateValidationError);
    expect(() => parseLetterTemplate(bad)).toThrow(/^template\.blocks\[0\]\.style\.align: must be one of/);
  });

  it('rejects unknown block types', () => {
    expect(() => parseLetterTemplate({ blocks: [{ type: 'image' }] })).toThrow(
      'template.blocks[0].type: unknown block type "image"',
    );
  });

  it('normalizes colors', () => {
    const template = parseLetterTemplate({
      blocks: [{ type: 'paragraph', text: 'x', style: { color: '#a0a0a0' } }, ...MINIMAL.blocks],
    });
    expect(template.blocks[0]).toEqual({ type: 'paragraph', text: 'x', style: { color: 'A0A0A0', size: undefined } });
  });

  it('needs twelve month names', () => {
    expect(() => parseLetterTemplate({ ...MINIMAL, monthNames: ['Jan'] })).toThrow(
      'template.monthNames: must list 12 month names',
    );
  });

  it('loads the bundled template', async () => {
    const template = await loadLetterTemplate(DEFAULT_TEMPLATE_PATH);
    expect(template.blocks.some(block => block.type === 'proposals')).toBe(true);
  });

  it('wraps invalid JSON in a TemplateValidationError', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'letter-template-'));
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json');

    await expect(loadLetterTemplate(path)).rejects.toBeInstanceOf(TemplateValidationError);
  });
});
