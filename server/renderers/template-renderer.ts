/**
 * Template Renderer
 *
 * Record + letter template -> intermediate .docx on disk. Conversion to the
 * final format is the DocumentConverter's job.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { PersonRecord } from '../types/letters.js';
import { loggers } from '../utils/logger.js';
import { renderLetterDocx } from './docx-renderer.js';
import { resolveLetter, type LetterContext } from './letter-resolver.js';
import type { LetterTemplate } from './letter-template.js';

const logger = loggers.renderer;

export interface TemplateRendererOptions {
  /** Place name for the {{place}} token */
  place: string;
  /** Date source for the {{date}} token */
  now?: () => Date;
}

export class TemplateRenderer {
  private readonly now: () => Date;

  constructor(
    private readonly template: LetterTemplate,
    private readonly options: TemplateRendererOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  context(): LetterContext {
    return { date: this.now(), place: this.options.place };
  }

  async renderBuffer(record: PersonRecord): Promise<Buffer> {
    const letter = resolveLetter(this.template, record, this.context());
    return renderLetterDocx(letter);
  }

  async render(record: PersonRecord, outputPath: string): Promise<string> {
    const buffer = await this.renderBuffer(record);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, buffer);

    logger.debug('Letter rendered', {
      id: record.id,
      proposals: record.proposals.length,
      bytes: buffer.length,
    });
    return outputPath;
  }
}
