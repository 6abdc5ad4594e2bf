/**
 * Record Extractor
 *
 * Turns the wide personnel sheet into one PersonRecord per row. Identity
 * columns are mapped by header name; proposals come from the suffix-numbered
 * column family NoProp<i> / Judul<i> / Skema<i> / Jumlah_dana<i>.
 */

import { DEFAULT_COLUMNS, type ColumnMapping } from '../config/app-config.js';
import { SchemaError } from '../types/errors.js';
import type { PersonRecord, Proposal, SkippedRow } from '../types/letters.js';
import { loggers } from '../utils/logger.js';
import type { SheetTable } from './file-parser.js';
import {
  cellText,
  normalizeEmail,
  normalizeText,
  parseFundingAmount,
  type CellValue,
} from './value-parsers.js';

const logger = loggers.extractor;

export const PROPOSAL_COLUMNS = {
  number: 'NoProp',
  title: 'Judul',
  scheme: 'Skema',
  amount: 'Jumlah_dana',
} as const;

const REQUIRED_FIELDS = ['id', 'name', 'unit', 'account'] as const;
type RequiredField = typeof REQUIRED_FIELDS[number];

/** Alternate spellings accepted for the optional columns */
const OPTIONAL_ALIASES = {
  bank: ['nama_bank'],
  email: ['email'],
};

export interface ExtractOptions {
  columns?: ColumnMapping;
}

export interface ExtractionResult {
  records: PersonRecord[];
  skipped: SkippedRow[];
  /** Highest NoProp<i> suffix in the header; 0 when the family is absent */
  proposalSlots: number;
}

export interface ColumnValidation {
  ok: boolean;
  missing: string[];
  proposalSlots: number;
  hasEmailColumn: boolean;
  messages: string[];
}

export interface TableSummary {
  sheetNames: string[];
  sheetName: string;
  rowCount: number;
  columnCount: number;
  hasEmailColumn: boolean;
  proposalSlots: number;
}

/**
 * Index of a header, case-insensitive, trying aliases in order.
 */
export function findColumn(headers: string[], name: string, aliases: string[] = []): number {
  const wanted = [name, ...aliases].map(n => n.trim().toLowerCase());
  for (const candidate of wanted) {
    const index = headers.findIndex(h => h.trim().toLowerCase() === candidate);
    if (index !== -1) return index;
  }
  return -1;
}

/**
 * Highest numeric suffix of the NoProp<i> family, 0 when none.
 */
export function detectProposalSlots(headers: string[]): number {
  const pattern = new RegExp(`^${PROPOSAL_COLUMNS.number}(\\d+)$`);
  let max = 0;
  for (const header of headers) {
    const match = header.trim().match(pattern);
    if (match) {
      max = Math.max(max, parseInt(match[1], 10));
    }
  }
  return max;
}

interface SlotColumns {
  slot: number;
  number: number;
  title: number;
  scheme: number;
  amount: number;
}

function resolveSlots(headers: string[], maxSlot: number): SlotColumns[] {
  const slots: SlotColumns[] = [];
  for (let i = 1; i <= maxSlot; i++) {
    const number = findColumn(headers, `${PROPOSAL_COLUMNS.number}${i}`);
    // A gap in the numbering (NoProp1, NoProp3) leaves nothing to read
    if (number === -1) continue;
    slots.push({
      slot: i,
      number,
      title: findColumn(headers, `${PROPOSAL_COLUMNS.title}${i}`),
      scheme: findColumn(headers, `${PROPOSAL_COLUMNS.scheme}${i}`),
      amount: findColumn(headers, `${PROPOSAL_COLUMNS.amount}${i}`),
    });
  }
  return slots;
}

function cellAt(cells: CellValue[], index: number): CellValue {
  return index === -1 ? undefined : cells[index];
}

function extractProposals(cells: CellValue[], slots: SlotColumns[]): Proposal[] {
  const proposals: Proposal[] = [];
  for (const columns of slots) {
    const number = normalizeText(cellAt(cells, columns.number));
    if (!number) continue;

    const amountCell = cellAt(cells, columns.amount);
    proposals.push({
      slot: columns.slot,
      number,
      title: normalizeText(cellAt(cells, columns.title)),
      scheme: normalizeText(cellAt(cells, columns.scheme)),
      amount: parseFundingAmount(amountCell),
      amountText: cellText(amountCell),
    });
  }
  return proposals;
}

/**
 * Structural check run before any processing. Reports every missing
 * required column rather than stopping at the first.
 */
export function validateColumns(
  table: SheetTable,
  options: { columns?: ColumnMapping; requireEmail?: boolean } = {}
): ColumnValidation {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const missing = REQUIRED_FIELDS
    .map(field => columns[field])
    .filter(header => findColumn(table.headers, header) === -1);

  const proposalSlots = detectProposalSlots(table.headers);
  const hasEmailColumn = findColumn(table.headers, columns.email, OPTIONAL_ALIASES.email) !== -1;
  const messages: string[] = [];

  if (missing.length > 0) {
    messages.push(`Required columns not found: ${missing.join(', ')}`);
  }
  if (proposalSlots === 0) {
    messages.push(`No proposal columns found (${PROPOSAL_COLUMNS.number}1, ${PROPOSAL_COLUMNS.number}2, ...)`);
  }
  if (options.requireEmail && !hasEmailColumn) {
    messages.push(`Email column "${columns.email}" not found; supply an ID to email mapping file`);
  }

  return {
    ok: messages.length === 0,
    missing,
    proposalSlots,
    hasEmailColumn,
    messages,
  };
}

export function describeTable(table: SheetTable, columns: ColumnMapping = DEFAULT_COLUMNS): TableSummary {
  return {
    sheetNames: table.sheetNames,
    sheetName: table.sheetName,
    rowCount: table.rows.length,
    columnCount: table.headers.length,
    hasEmailColumn: findColumn(table.headers, columns.email, OPTIONAL_ALIASES.email) !== -1,
    proposalSlots: detectProposalSlots(table.headers),
  };
}

/**
 * Extract one record per usable row, in row order.
 *
 * Rows with a blank required identity cell, or repeating an ID already
 * extracted, are returned as skipped rows. Throws SchemaError only when no
 * required identity column exists in the header at all.
 */
export function extractRecords(table: SheetTable, options: ExtractOptions = {}): ExtractionResult {
  const columns = options.columns ?? DEFAULT_COLUMNS;

  const required: Record<RequiredField, number> = {
    id: findColumn(table.headers, columns.id),
    name: findColumn(table.headers, columns.name),
    unit: findColumn(table.headers, columns.unit),
    account: findColumn(table.headers, columns.account),
  };

  const present = REQUIRED_FIELDS.filter(field => required[field] !== -1);
  if (present.length === 0) {
    throw new SchemaError(
      `None of the required identity columns were found: ${REQUIRED_FIELDS.map(f => columns[f]).join(', ')}`,
      REQUIRED_FIELDS.map(f => columns[f])
    );
  }

  const bankIndex = findColumn(table.headers, columns.bank, OPTIONAL_ALIASES.bank);
  const emailIndex = findColumn(table.headers, columns.email, OPTIONAL_ALIASES.email);
  const proposalSlots = detectProposalSlots(table.headers);
  const slots = resolveSlots(table.headers, proposalSlots);

  const records: PersonRecord[] = [];
  const skipped: SkippedRow[] = [];
  const seen = new Set<string>();

  for (const row of table.rows) {
    const identity: Record<RequiredField, string> = {
      id: normalizeText(cellAt(row.cells, required.id)),
      name: normalizeText(cellAt(row.cells, required.name)),
      unit: normalizeText(cellAt(row.cells, required.unit)),
      account: normalizeText(cellAt(row.cells, required.account)),
    };
    const missing = REQUIRED_FIELDS
      .filter(field => !identity[field])
      .map(field => columns[field]);

    if (missing.length > 0) {
      skipped.push({ rowNumber: row.rowNumber, reason: 'missing_identity', missing });
      continue;
    }

    if (seen.has(identity.id)) {
      logger.warn('Duplicate ID, row skipped', { id: identity.id, row: row.rowNumber });
      skipped.push({ rowNumber: row.rowNumber, reason: 'duplicate_id', missing: [] });
      continue;
    }
    seen.add(identity.id);

    records.push({
      ...identity,
      bank: normalizeText(cellAt(row.cells, bankIndex)),
      email: normalizeEmail(cellAt(row.cells, emailIndex)),
      proposals: extractProposals(row.cells, slots),
      rowNumber: row.rowNumber,
    });
  }

  logger.info('Records extracted', {
    records: records.length,
    skipped: skipped.length,
    proposal_slots: proposalSlots,
  });

  return { records, skipped, proposalSlots };
}
