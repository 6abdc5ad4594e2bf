/**
 * Batch Orchestrator
 *
 * Drives render -> convert over the selected window of records, one record
 * at a time, and writes the run's artifacts:
 *
 *   <outputDir>/work/<base>.docx        intermediate (kept on request)
 *   <outputDir>/documents/<base>.pdf    final documents
 *   <outputDir>/<archive>.zip           every SUCCESS document
 *   <outputDir>/<archive>-sample.zip    first k SUCCESS documents
 *   <outputDir>/generation-report.csv   one row per processed record
 *
 * A per-record error becomes a FAILED outcome and the loop moves on. Only the
 * converter pre-flight can abort the run before the first record.
 */

import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { ConversionError, describeError } from '../types/errors.js';
import type { FailureReason, GenerationOutcome, PersonRecord } from '../types/letters.js';
import { writeGenerationReport } from '../reports/generation-report.js';
import { loggers, type Logger } from '../utils/logger.js';
import { writeArchive } from './archive.js';
import { documentBaseName, type DocumentNaming } from './naming.js';

export interface LetterRenderer {
  render(record: PersonRecord, outputPath: string): Promise<string>;
}

export interface Converter {
  resolveBinary(): Promise<string>;
  convert(inputPath: string, outDir: string): Promise<string>;
}

export interface BatchDependencies {
  renderer: LetterRenderer;
  converter: Converter;
  naming: DocumentNaming;
  archiveName: string;
  logger?: Logger;
}

export interface BatchOptions {
  outputDir: string;
  /** Records to skip from the start of the extracted sequence */
  offset?: number;
  /** Records to process after the offset; null processes the rest */
  limit?: number | null;
  sampleCount?: number;
  keepIntermediate?: boolean;
  signal?: AbortSignal;
}

export interface BatchResult {
  outcomes: GenerationOutcome[];
  archivePath: string;
  samplePath: string;
  /** Document names in the sample archive */
  sample: string[];
  reportPath: string;
  documentsDir: string;
  selected: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

export const DEFAULT_SAMPLE_COUNT = 5;
export const GENERATION_REPORT_FILE = 'generation-report.csv';

export class BatchOptionsError extends Error {
  readonly code = 'BatchOptionsError';

  constructor(message: string, public field: string) {
    super(message);
    this.name = 'BatchOptionsError';
  }
}

function requireCount(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new BatchOptionsError(`${field} must be a non-negative integer`, field);
  }
  return value;
}

/**
 * The window of records a run covers: `limit` records starting at `offset`.
 */
export function selectWindow<T>(records: readonly T[], offset = 0, limit: number | null = null): T[] {
  const start = requireCount(offset, 'offset');
  const end = limit === null ? undefined : start + requireCount(limit, 'limit');
  return records.slice(start, end);
}

function failureReason(error: unknown): FailureReason {
  return error instanceof ConversionError ? error.code : 'ConversionFailed';
}

export class BatchOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: BatchDependencies) {
    this.logger = deps.logger ?? loggers.batch;
  }

  async run(records: readonly PersonRecord[], options: BatchOptions): Promise<BatchResult> {
    const selected = selectWindow(records, options.offset ?? 0, options.limit ?? null);
    const sampleCount = requireCount(options.sampleCount ?? DEFAULT_SAMPLE_COUNT, 'sampleCount');

    // Structural: no converter means no record can succeed
    const binary = await this.deps.converter.resolveBinary();

    const workDir = join(options.outputDir, 'work');
    const documentsDir = join(options.outputDir, 'documents');
    await mkdir(workDir, { recursive: true });
    await mkdir(documentsDir, { recursive: true });

    this.logger.info('Batch started', {
      selected: selected.length,
      total: records.length,
      offset: options.offset ?? 0,
      converter: binary,
    });

    const outcomes: GenerationOutcome[] = [];
    const claimed = new Map<string, string>();
    let cancelled = false;

    for (const [index, record] of selected.entries()) {
      if (options.signal?.aborted) {
        cancelled = true;
        this.logger.warn('Batch cancelled', { processed: index, remaining: selected.length - index });
        break;
      }

      const outcome = await this.processRecord(
        record,
        workDir,
        documentsDir,
        claimed,
        options.keepIntermediate ?? false,
      );
      outcomes.push(outcome);

      if (outcome.status === 'FAILED') {
        this.logger.warn('Record failed', {
          id: record.id,
          reason: outcome.reason,
          detail: outcome.detail,
        });
      } else {
        this.logger.info('Record generated', {
          id: record.id,
          document: outcome.documentName,
          progress: `${index + 1}/${selected.length}`,
        });
      }
    }

    const successes = outcomes.flatMap(o => (o.status === 'SUCCESS' ? [o] : []));
    const sampled = successes.slice(0, sampleCount);

    const archivePath = await writeArchive(
      join(options.outputDir, `${this.deps.archiveName}.zip`),
      successes.map(o => o.documentPath),
    );
    const samplePath = await writeArchive(
      join(options.outputDir, `${this.deps.archiveName}-sample.zip`),
      sampled.map(o => o.documentPath),
    );
    const reportPath = await writeGenerationReport(join(options.outputDir, GENERATION_REPORT_FILE), outcomes);

    const result: BatchResult = {
      outcomes,
      archivePath,
      samplePath,
      sample: sampled.map(o => o.documentName),
      reportPath,
      documentsDir,
      selected: selected.length,
      succeeded: successes.length,
      failed: outcomes.length - successes.length,
      cancelled,
    };

    this.logger.info('Batch finished', {
      succeeded: result.succeeded,
      failed: result.failed,
      cancelled,
      archive: archivePath,
      report: reportPath,
    });

    return result;
  }

  private async processRecord(
    record: PersonRecord,
    workDir: string,
    documentsDir: string,
    claimed: Map<string, string>,
    keepIntermediate: boolean,
  ): Promise<GenerationOutcome> {
    const base = documentBaseName(this.deps.naming, record);
    const owner = claimed.get(base);
    if (owner !== undefined) {
      return {
        recordId: record.id,
        name: record.name,
        status: 'FAILED',
        reason: 'RenderFailed',
        detail: `Document name ${base}.pdf is already used by record ${owner}`,
      };
    }
    claimed.set(base, record.id);

    const intermediate = join(workDir, `${base}.docx`);

    try {
      await this.deps.renderer.render(record, intermediate);
    } catch (error) {
      return {
        recordId: record.id,
        name: record.name,
        status: 'FAILED',
        reason: 'RenderFailed',
        detail: describeError(error),
      };
    }

    let documentPath: string;
    try {
      documentPath = await this.deps.converter.convert(intermediate, documentsDir);
    } catch (error) {
      // The intermediate stays on disk for inspection
      return {
        recordId: record.id,
        name: record.name,
        status: 'FAILED',
        reason: failureReason(error),
        detail: describeError(error),
      };
    }

    if (!keepIntermediate) {
      await rm(intermediate, { force: true });
    }

    return {
      recordId: record.id,
      name: record.name,
      status: 'SUCCESS',
      documentName: `${base}.pdf`,
      documentPath,
    };
  }
}
