/**
 * CSV report IO through SheetJS.
 */

import * as XLSX from 'xlsx';
import { writeFile } from 'fs/promises';
import { readSheetTable } from '../import/file-parser.js';
import { cellText } from '../import/value-parsers.js';

export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const sheet = XLSX.utils.aoa_to_sheet([[...header], ...rows.map(row => [...row])]);
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}

export async function writeCsv(
  path: string,
  header: readonly string[],
  rows: ReadonlyArray<readonly string[]>,
): Promise<string> {
  await writeFile(path, toCsv(header, rows), 'utf-8');
  return path;
}

/**
 * Parse CSV text into objects keyed by header. Every value is text.
 */
export function parseCsv(text: string, name = 'report.csv'): Array<Record<string, string>> {
  const table = readSheetTable(Buffer.from(text, 'utf-8'), name);
  return table.rows.map(row => {
    const entry: Record<string, string> = {};
    table.headers.forEach((header, i) => {
      entry[header] = cellText(row.cells[i]);
    });
    return entry;
  });
}
