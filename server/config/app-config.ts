/**
 * Application Configuration
 *
 * Built once at process start from the environment and passed explicitly to
 * the converter, batch orchestrator, mail transport and dispatch engine.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export const DEFAULT_TEMPLATE_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  'templates',
  'compliance-letter.json',
);

export interface ColumnMapping {
  id: string;
  name: string;
  unit: string;
  account: string;
  bank: string;
  email: string;
}

export const DEFAULT_COLUMNS: ColumnMapping = {
  id: 'NIP',
  name: 'Nama',
  unit: 'Fakultas',
  account: 'Norek',
  bank: 'Nama Bank',
  email: 'Email',
};

export interface ConverterConfig {
  /** Explicit converter executable; null means search PATH and well-known locations */
  binaryPath: string | null;
  timeoutMs: number;
}

export interface OutputConfig {
  dir: string;
  documentPrefix: string;
  archiveName: string;
}

export interface LetterConfig {
  templatePath: string;
  place: string;
}

export interface MailConfig {
  apiKey: string | null;
  fromAddress: string | null;
  fromName: string;
  delayMs: number;
}

export interface AppConfig {
  converter: Readonly<ConverterConfig>;
  output: Readonly<OutputConfig>;
  letter: Readonly<LetterConfig>;
  mail: Readonly<MailConfig>;
  columns: Readonly<ColumnMapping>;
}

export interface ResolvedMailConfig extends MailConfig {
  apiKey: string;
  fromAddress: string;
}

export class ConfigValidationError extends Error {
  readonly code = 'ConfigValidationError';

  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

const EMAIL_RE = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigValidationError(
      `${key} must be an integer >= ${min}`,
      key,
      raw
    );
  }
  return value;
}

/**
 * Build the process-wide configuration. The result is frozen; nothing
 * re-reads the environment mid-run.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const fromAddress = readString(env, 'MAIL_FROM_ADDRESS');
  if (fromAddress !== null && !EMAIL_RE.test(fromAddress)) {
    throw new ConfigValidationError(
      'MAIL_FROM_ADDRESS is not a valid email address',
      'MAIL_FROM_ADDRESS',
      fromAddress
    );
  }

  const config: AppConfig = {
    converter: Object.freeze({
      binaryPath: readString(env, 'SOFFICE_PATH'),
      timeoutMs: readInteger(env, 'CONVERTER_TIMEOUT_MS', 60_000, 1),
    }),
    output: Object.freeze({
      dir: readString(env, 'OUTPUT_DIR') ?? 'output',
      documentPrefix: readString(env, 'DOCUMENT_PREFIX') ?? 'SPTJM',
      archiveName: readString(env, 'ARCHIVE_NAME') ?? 'compliance-letters',
    }),
    letter: Object.freeze({
      templatePath: readString(env, 'LETTER_TEMPLATE_PATH') ?? DEFAULT_TEMPLATE_PATH,
      place: readString(env, 'LETTER_PLACE') ?? '',
    }),
    mail: Object.freeze({
      apiKey: readString(env, 'RESEND_API_KEY'),
      fromAddress,
      fromName: readString(env, 'MAIL_FROM_NAME') ?? fromAddress ?? '',
      delayMs: readInteger(env, 'DISPATCH_DELAY_MS', 700, 0),
    }),
    columns: Object.freeze({
      id: readString(env, 'COLUMN_ID') ?? DEFAULT_COLUMNS.id,
      name: readString(env, 'COLUMN_NAME') ?? DEFAULT_COLUMNS.name,
      unit: readString(env, 'COLUMN_UNIT') ?? DEFAULT_COLUMNS.unit,
      account: readString(env, 'COLUMN_ACCOUNT') ?? DEFAULT_COLUMNS.account,
      bank: readString(env, 'COLUMN_BANK') ?? DEFAULT_COLUMNS.bank,
      email: readString(env, 'COLUMN_EMAIL') ?? DEFAULT_COLUMNS.email,
    }),
  };

  return Object.freeze(config);
}

/**
 * Mail settings are optional for generation; a live dispatch needs them all.
 */
export function requireMailConfig(config: AppConfig): ResolvedMailConfig {
  const { apiKey, fromAddress } = config.mail;
  if (!apiKey) {
    throw new ConfigValidationError('RESEND_API_KEY is required for live dispatch', 'RESEND_API_KEY', apiKey);
  }
  if (!fromAddress) {
    throw new ConfigValidationError('MAIL_FROM_ADDRESS is required for live dispatch', 'MAIL_FROM_ADDRESS', fromAddress);
  }
  return { ...config.mail, apiKey, fromAddress };
}
