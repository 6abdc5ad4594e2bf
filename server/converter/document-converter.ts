/**
 * Document Converter
 *
 * Turns an intermediate .docx into a PDF with a headless LibreOffice
 * (soffice) process. One attempt per document, bounded by a timeout; each
 * call runs against its own throwaway user profile so concurrent or stale
 * soffice instances cannot lock each other out.
 */

import { constants } from 'fs';
import { access, mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, delimiter, extname, join } from 'path';
import { pathToFileURL } from 'url';
import type { ConverterConfig } from '../config/app-config.js';
import {
  ConversionFailedError,
  ConversionTimeoutError,
  ConverterNotFoundError,
  describeError,
} from '../types/errors.js';
import { loggers } from '../utils/logger.js';
import { spawnProcess, type ProcessResult, type ProcessRunner } from './process-runner.js';

const logger = loggers.converter;

const BINARY_NAMES = process.platform === 'win32'
  ? ['soffice.exe', 'soffice.com']
  : ['soffice', 'libreoffice'];

const WELL_KNOWN_PATHS = [
  '/usr/bin/soffice',
  '/usr/lib/libreoffice/program/soffice',
  '/opt/libreoffice/program/soffice',
  '/snap/bin/libreoffice',
  '/Applications/LibreOffice.app/Contents/MacOS/soffice',
  'C:\\Program Files\\LibreOffice\\program\\soffice.exe',
];

/** Longest stderr excerpt carried on a ConversionFailedError */
const STDERR_LIMIT = 2000;

export interface DocumentConverterOptions {
  /** Injected for tests; defaults to spawning the real process */
  runner?: ProcessRunner;
  /** PATH-style directory list searched when no binary is configured */
  searchPath?: string;
  /** Extra locations tried after the search path */
  wellKnownPaths?: string[];
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function spawnErrorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

export class DocumentConverter {
  private readonly runner: ProcessRunner;
  private readonly searchPath: string;
  private readonly wellKnownPaths: string[];
  private resolved: string | null = null;

  constructor(
    private readonly config: ConverterConfig,
    options: DocumentConverterOptions = {},
  ) {
    this.runner = options.runner ?? spawnProcess;
    this.searchPath = options.searchPath ?? '';
    this.wellKnownPaths = options.wellKnownPaths ?? WELL_KNOWN_PATHS;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Locate the converter executable. A configured path must exist and be
   * executable; otherwise the search path and well-known install locations
   * are tried in order. The first hit is cached.
   */
  async resolveBinary(): Promise<string> {
    if (this.resolved) return this.resolved;

    if (this.config.binaryPath) {
      if (!(await isExecutable(this.config.binaryPath))) {
        throw new ConverterNotFoundError(
          `Configured converter is missing or not executable: ${this.config.binaryPath}`,
          this.config.binaryPath,
        );
      }
      this.resolved = this.config.binaryPath;
      return this.resolved;
    }

    const directories = this.searchPath.split(delimiter).filter(Boolean);
    const candidates = [
      ...directories.flatMap(dir => BINARY_NAMES.map(name => join(dir, name))),
      ...this.wellKnownPaths,
    ];

    for (const candidate of candidates) {
      if (await isExecutable(candidate)) {
        logger.debug('Converter found', { path: candidate });
        this.resolved = candidate;
        return candidate;
      }
    }

    throw new ConverterNotFoundError(
      'No LibreOffice converter found on PATH or in the usual install locations; set SOFFICE_PATH',
      null,
    );
  }

  /**
   * Convert one document into `outDir`, returning the path of the PDF.
   * The input file is left in place.
   */
  async convert(inputPath: string, outDir: string): Promise<string> {
    const binary = await this.resolveBinary();
    const expected = join(outDir, `${basename(inputPath, extname(inputPath))}.pdf`);
    // A clean exit can leave nothing behind; never mistake an earlier run's file for output
    await rm(expected, { force: true });
    const profileDir = await mkdtemp(join(tmpdir(), 'soffice-profile-'));

    const args = [
      '--headless',
      '--nologo',
      '--nofirststartwizard',
      `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
      '--convert-to',
      'pdf',
      '--outdir',
      outDir,
      inputPath,
    ];

    const startedAt = Date.now();
    try {
      let result: ProcessResult;
      try {
        result = await this.runner(binary, args, { timeoutMs: this.config.timeoutMs });
      } catch (error) {
        const code = spawnErrorCode(error);
        if (code === 'ENOENT' || code === 'EACCES') {
          throw new ConverterNotFoundError(
            `Converter could not be started: ${describeError(error)}`,
            binary,
          );
        }
        throw new ConversionFailedError(
          `Converter could not be started: ${describeError(error)}`,
          null,
          '',
        );
      }

      if (result.timedOut) {
        throw new ConversionTimeoutError(this.config.timeoutMs, inputPath);
      }

      const stderr = result.stderr.trim().slice(0, STDERR_LIMIT);
      if (result.exitCode !== 0) {
        throw new ConversionFailedError(
          stderr
            ? `Converter exited with code ${result.exitCode}: ${stderr}`
            : `Converter exited with code ${result.exitCode}`,
          result.exitCode,
          stderr,
        );
      }

      let size = 0;
      try {
        size = (await stat(expected)).size;
      } catch {
        size = 0;
      }
      if (size === 0) {
        throw new ConversionFailedError(
          `Converter produced no output at ${expected}`,
          result.exitCode,
          stderr,
        );
      }

      logger.debug('Document converted', {
        input: basename(inputPath),
        duration_ms: Date.now() - startedAt,
      });
      return expected;
    } finally {
      await rm(profileDir, { recursive: true, force: true });
    }
  }
}
