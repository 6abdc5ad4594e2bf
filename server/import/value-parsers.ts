export type CellValue = string | number | boolean | Date | null | undefined;

const EMAIL_RE = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

/**
 * Cell as display text. Integers keep every digit (no exponent), dates
 * become YYYY-MM-DD.
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';

  if (value instanceof Date) {
    return isNaN(value.getTime()) ? '' : formatISODate(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return '';
    return Number.isInteger(value) ? BigInt(value).toString() : String(value);
  }

  return String(value).trim();
}

/**
 * Parse a funding amount. Accepts numbers and text in either grouping
 * convention ("1.000.000,50", "1,000,000.50"), with an optional "Rp" prefix.
 */
export function parseFundingAmount(value: CellValue): number | null {
  if (value === null || value === undefined || value === '') return null;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'boolean' || value instanceof Date) return null;

  let str = value.trim().replace(/^rp\.?/i, '').replace(/\s+/g, '');
  if (!str) return null;

  if (/^-?\d{1,3}(\.\d{3})+(,\d+)?$/.test(str)) {
    str = str.replace(/\./g, '').replace(',', '.');
  } else if (/^-?\d{1,3}(,\d{3})+(\.\d+)?$/.test(str)) {
    str = str.replace(/,/g, '');
  } else if (/^-?\d+([.,]\d+)?$/.test(str)) {
    str = str.replace(',', '.');
  } else {
    return null;
  }

  const parsed = Number(str);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Whole amount with "." thousands grouping: 1000000 -> "1.000.000".
 * Falls back to the raw text when the cell was not numeric.
 */
export function formatAmount(amount: number | null, fallbackText = ''): string {
  if (amount === null) return fallbackText.trim();

  const whole = Math.trunc(amount);
  const grouped = String(Math.abs(whole)).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  return whole < 0 ? `-${grouped}` : grouped;
}

/**
 * Trimmed, lowercased address, or null when the value is not an address.
 */
export function normalizeEmail(value: CellValue): string | null {
  const str = cellText(value).toLowerCase();
  if (!str) return null;
  return EMAIL_RE.test(str) ? str : null;
}

export function normalizeText(value: CellValue): string {
  return cellText(value).replace(/\s+/g, ' ');
}

function formatISODate(d: Date): string {
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, '0')}-${String(d.getDate()).padStart(2, '0')}`;
}
