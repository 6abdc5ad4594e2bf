import * as XLSX from 'xlsx';
import chardet from 'chardet';
import { SchemaError, describeError } from '../types/errors.js';
import { loggers } from '../utils/logger.js';
import type { CellValue } from './value-parsers.js';

const logger = loggers.sheets;

export type SheetFileType = 'csv' | 'xlsx' | 'xls';

export interface SheetRow {
  /** 1-based row number in the sheet (the header is row 1) */
  rowNumber: number;
  cells: CellValue[];
}

export interface SheetTable {
  sheetName: string;
  sheetNames: string[];
  fileType: SheetFileType;
  headers: string[];
  rows: SheetRow[];
}

export interface ReadSheetOptions {
  sheetName?: string;
}

/**
 * Strip UTF-8 BOM if present
 */
function stripBOM(buffer: Buffer): Buffer {
  if (buffer.length >= 3 &&
      buffer[0] === 0xEF &&
      buffer[1] === 0xBB &&
      buffer[2] === 0xBF) {
    return buffer.subarray(3);
  }
  return buffer;
}

const DECODER_NAMES: Record<string, string> = {
  'ISO-8859-1': 'iso-8859-1',
  'windows-1252': 'windows-1252',
  'windows-1250': 'windows-1250',
  'ISO-8859-15': 'iso-8859-15',
  'ISO-8859-2': 'iso-8859-2',
};

/**
 * Detect and normalize CSV encoding to UTF-8. SheetJS handles Excel files
 * internally.
 */
function normalizeEncoding(buffer: Buffer): Buffer {
  const detected = chardet.detect(buffer);

  if (!detected) {
    logger.warn('Could not detect encoding, assuming UTF-8');
    return buffer;
  }

  if (detected === 'UTF-8' || detected.toLowerCase() === 'ascii') {
    return buffer;
  }

  const decoderName = Object.entries(DECODER_NAMES)
    .find(([name]) => name.toLowerCase() === detected.toLowerCase())?.[1];

  if (!decoderName) {
    logger.warn('Unexpected encoding, reading as-is', { encoding: detected });
    return buffer;
  }

  logger.info('Converting CSV to UTF-8', { encoding: detected });
  const text = new TextDecoder(decoderName).decode(buffer);
  return Buffer.from(text, 'utf-8');
}

function detectCsvDelimiter(buffer: Buffer): string {
  let text = buffer.toString('utf-8', 0, Math.min(buffer.length, 2000));
  if (text.charCodeAt(0) === 0xFEFF) {
    text = text.slice(1);
  }

  const firstLine = text.split(/\r?\n/)[0] || '';

  const commaCount = (firstLine.match(/,/g) || []).length;
  const semicolonCount = (firstLine.match(/;/g) || []).length;
  const tabCount = (firstLine.match(/\t/g) || []).length;

  if (tabCount > commaCount && tabCount > semicolonCount) return '\t';
  if (semicolonCount > commaCount) return ';';
  return ',';
}

export function detectFileType(filename: string): SheetFileType {
  const ext = filename.toLowerCase().match(/\.(xlsx|xls|csv)$/)?.[1];
  if (ext === 'csv' || ext === 'xlsx' || ext === 'xls') return ext;
  throw new SchemaError(`Unsupported file type: ${filename}. Use .xlsx, .xls, or .csv files.`);
}

/**
 * Load one sheet as a header row plus data rows. Fully blank rows are
 * dropped; cell types are kept (numbers, dates, text).
 */
export function readSheetTable(
  buffer: Buffer,
  filename: string,
  options: ReadSheetOptions = {}
): SheetTable {
  const fileType = detectFileType(filename);

  let input = buffer;
  let delimiter = ',';
  if (fileType === 'csv') {
    input = stripBOM(normalizeEncoding(buffer));
    delimiter = detectCsvDelimiter(input);
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(input, {
      type: 'buffer',
      cellDates: true,
      // CSV cells stay text so IDs and account numbers keep leading zeros
      ...(fileType === 'csv' ? { codepage: 65001, raw: true } : {}),
      ...(fileType === 'csv' && delimiter !== ',' ? { FS: delimiter } : {}),
    });
  } catch (error) {
    throw new SchemaError(`Failed to parse ${filename} (${describeError(error)}). File may be corrupted or in an unsupported format.`);
  }

  if (workbook.SheetNames.length === 0) {
    throw new SchemaError(`${filename} contains no sheets.`);
  }

  let sheetName = workbook.SheetNames[0];
  if (options.sheetName) {
    if (workbook.SheetNames.includes(options.sheetName)) {
      sheetName = options.sheetName;
    } else {
      logger.warn('Sheet not found, using first sheet', { requested: options.sheetName, using: sheetName });
    }
  }

  const sheet = workbook.Sheets[sheetName];
  const rawData = XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
    header: 1,
    defval: '',
    blankrows: true,
  });

  if (rawData.length === 0) {
    throw new SchemaError(`Sheet "${sheetName}" is empty.`);
  }

  const headers = rawData[0].map(h => String(h ?? '').trim());
  const rows: SheetRow[] = [];

  rawData.slice(1).forEach((cells, index) => {
    const hasContent = cells.some(cell => cell !== '' && cell !== null && cell !== undefined);
    if (hasContent) {
      rows.push({ rowNumber: index + 2, cells });
    }
  });

  logger.debug('Sheet loaded', { filename, sheet: sheetName, rows: rows.length, columns: headers.length });

  return {
    sheetName,
    sheetNames: workbook.SheetNames,
    fileType,
    headers,
    rows,
  };
}
