/**
 * Generation report: one row per selected record, in record order.
 *
 *   ID, Name, Status, Reason
 *
 * Reason is "<code>: <detail>" for FAILED rows and empty for SUCCESS rows.
 */

import { join } from 'path';
import { documentFileName, type DocumentNaming } from '../batch/naming.js';
import { SchemaError } from '../types/errors.js';
import type { FailureReason, GenerationOutcome } from '../types/letters.js';
import { parseCsv, toCsv, writeCsv } from './csv.js';

export const GENERATION_REPORT_HEADER = ['ID', 'Name', 'Status', 'Reason'] as const;

const FAILURE_REASONS: readonly FailureReason[] = [
  'ConverterNotFound',
  'ConversionTimeout',
  'ConversionFailed',
  'RenderFailed',
];

function isFailureReason(value: string): value is FailureReason {
  return FAILURE_REASONS.some(reason => reason === value);
}

export function generationReportRows(outcomes: readonly GenerationOutcome[]): string[][] {
  return outcomes.map(outcome => [
    outcome.recordId,
    outcome.name,
    outcome.status,
    outcome.status === 'FAILED' ? `${outcome.reason}: ${outcome.detail}` : '',
  ]);
}

export function formatGenerationReport(outcomes: readonly GenerationOutcome[]): string {
  return toCsv(GENERATION_REPORT_HEADER, generationReportRows(outcomes));
}

export function writeGenerationReport(path: string, outcomes: readonly GenerationOutcome[]): Promise<string> {
  return writeCsv(path, GENERATION_REPORT_HEADER, generationReportRows(outcomes));
}

/**
 * Rebuild outcomes from a generation report written by an earlier run.
 * SUCCESS rows point at the document the naming rule gives inside
 * `documentsDir`; whether the file is still there is checked at dispatch.
 */
export function readGenerationReport(
  csv: string,
  documentsDir: string,
  naming: DocumentNaming,
): GenerationOutcome[] {
  const rows = parseCsv(csv, 'generation-report.csv');
  const missing = GENERATION_REPORT_HEADER.filter(column => rows.length > 0 && !(column in rows[0]));
  if (missing.length > 0) {
    throw new SchemaError(`Generation report is missing columns: ${missing.join(', ')}`, missing);
  }

  const outcomes: GenerationOutcome[] = [];
  for (const row of rows) {
    const recordId = row.ID;
    const name = row.Name;
    if (!recordId) continue;

    if (row.Status === 'SUCCESS') {
      const documentName = documentFileName(naming, { id: recordId, name });
      outcomes.push({
        recordId,
        name,
        status: 'SUCCESS',
        documentName,
        documentPath: join(documentsDir, documentName),
      });
    } else if (row.Status === 'FAILED') {
      const separator = row.Reason.indexOf(': ');
      const code = separator === -1 ? row.Reason : row.Reason.slice(0, separator);
      outcomes.push({
        recordId,
        name,
        status: 'FAILED',
        reason: isFailureReason(code) ? code : 'ConversionFailed',
        detail: separator === -1 ? '' : row.Reason.slice(separator + 2),
      });
    }
  }
  return outcomes;
}
