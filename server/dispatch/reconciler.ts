/**
 * Email Reconciler
 *
 * Fills missing addresses from an ID -> email mapping sheet. Existing
 * addresses on a record are never replaced.
 */

import type { SheetTable } from '../import/file-parser.js';
import { findColumn } from '../import/record-extractor.js';
import { normalizeEmail, normalizeText } from '../import/value-parsers.js';
import { SchemaError } from '../types/errors.js';
import type { PersonRecord } from '../types/letters.js';
import { loggers } from '../utils/logger.js';

const logger = loggers.reconciler;

export interface MappingColumns {
  idColumn: string;
  emailColumn: string;
}

/** Same ID mapped to two different addresses; the later row wins */
export interface ReconciliationAmbiguity {
  id: string;
  rowNumber: number;
  previous: string;
  chosen: string;
}

export interface EmailMap {
  emails: Map<string, string>;
  ambiguities: ReconciliationAmbiguity[];
  /** Rows without an ID or without a valid address */
  ignored: number;
}

export interface ReconcileResult {
  records: PersonRecord[];
  /** IDs whose address came from the map */
  filled: string[];
  /** IDs still without an address */
  unresolved: string[];
}

export function buildEmailMap(
  table: SheetTable,
  columns: MappingColumns = { idColumn: 'NIP', emailColumn: 'Email' },
): EmailMap {
  const idIndex = findColumn(table.headers, columns.idColumn);
  const emailIndex = findColumn(table.headers, columns.emailColumn);

  const missing = [
    ...(idIndex === -1 ? [columns.idColumn] : []),
    ...(emailIndex === -1 ? [columns.emailColumn] : []),
  ];
  if (missing.length > 0) {
    throw new SchemaError(
      `Email mapping must have the columns ${columns.idColumn} and ${columns.emailColumn}; missing: ${missing.join(', ')}`,
      missing,
    );
  }

  const emails = new Map<string, string>();
  const ambiguities: ReconciliationAmbiguity[] = [];
  let ignored = 0;

  for (const row of table.rows) {
    const id = normalizeText(row.cells[idIndex]);
    const email = normalizeEmail(row.cells[emailIndex]);
    if (!id || !email) {
      ignored++;
      continue;
    }

    const previous = emails.get(id);
    if (previous !== undefined && previous !== email) {
      logger.warn('Conflicting addresses for ID, keeping the later row', {
        id,
        row: row.rowNumber,
        previous,
        chosen: email,
      });
      ambiguities.push({ id, rowNumber: row.rowNumber, previous, chosen: email });
    }
    emails.set(id, email);
  }

  logger.info('Email mapping loaded', { entries: emails.size, ignored, conflicts: ambiguities.length });
  return { emails, ambiguities, ignored };
}

export function reconcileEmails(
  records: readonly PersonRecord[],
  emailMap: ReadonlyMap<string, string>,
): ReconcileResult {
  const filled: string[] = [];
  const unresolved: string[] = [];

  const reconciled = records.map(record => {
    if (record.email !== null) return record;

    const email = emailMap.get(record.id);
    if (email === undefined) {
      unresolved.push(record.id);
      return record;
    }

    filled.push(record.id);
    return { ...record, email };
  });

  logger.info('Emails reconciled', { filled: filled.length, unresolved: unresolved.length });
  return { records: reconciled, filled, unresolved };
}
