/**
 * Dispatch report: one row per eligible record, in record order.
 *
 *   ID, Name, Address, Status, Timestamp, Detail
 */

import type { DispatchOutcome } from '../types/letters.js';
import { parseCsv, toCsv, writeCsv } from './csv.js';

/** Detail of the SKIP row written for a record delivered by an earlier run */
export const ALREADY_SENT_DETAIL = 'Already sent in a previous run';

export const DISPATCH_REPORT_HEADER = ['ID', 'Name', 'Address', 'Status', 'Timestamp', 'Detail'] as const;

export function dispatchReportRows(outcomes: readonly DispatchOutcome[]): string[][] {
  return outcomes.map(outcome => [
    outcome.recordId,
    outcome.name,
    outcome.address,
    outcome.status,
    outcome.timestamp,
    outcome.detail,
  ]);
}

export function formatDispatchReport(outcomes: readonly DispatchOutcome[]): string {
  return toCsv(DISPATCH_REPORT_HEADER, dispatchReportRows(outcomes));
}

export function writeDispatchReport(path: string, outcomes: readonly DispatchOutcome[]): Promise<string> {
  return writeCsv(path, DISPATCH_REPORT_HEADER, dispatchReportRows(outcomes));
}

/**
 * IDs already delivered according to a previous dispatch report: the `OK`
 * rows, plus the rows a resumed run carried forward as already sent.
 */
export function readSentIds(csv: string): Set<string> {
  return new Set(
    parseCsv(csv, 'dispatch-report.csv')
      .filter(row => row.ID && (row.Status === 'OK' || (row.Status === 'SKIP' && row.Detail === ALREADY_SENT_DETAIL)))
      .map(row => row.ID),
  );
}
