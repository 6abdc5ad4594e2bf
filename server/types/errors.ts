/**
 * Pipeline error taxonomy.
 *
 * Structural errors (schema, configuration, template, unconfirmed live
 * dispatch) abort a run before per-record work starts. Conversion errors are
 * caught per record by the batch loop and recorded as FAILED outcomes.
 */

import type { FailureReason } from './letters.js';

export class SchemaError extends Error {
  readonly code = 'SchemaError';

  constructor(message: string, public missing: string[] = []) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class TemplateValidationError extends Error {
  readonly code = 'TemplateValidationError';

  constructor(message: string, public path: string) {
    super(`${path}: ${message}`);
    this.name = 'TemplateValidationError';
  }
}

export abstract class ConversionError extends Error {
  abstract readonly code: FailureReason;
}

export class ConverterNotFoundError extends ConversionError {
  readonly code = 'ConverterNotFound';

  constructor(message: string, public binaryPath: string | null) {
    super(message);
    this.name = 'ConverterNotFoundError';
  }
}

export class ConversionTimeoutError extends ConversionError {
  readonly code = 'ConversionTimeout';

  constructor(public timeoutMs: number, public inputPath: string) {
    super(`Converter exceeded ${timeoutMs}ms and was terminated`);
    this.name = 'ConversionTimeoutError';
  }
}

export class ConversionFailedError extends ConversionError {
  readonly code = 'ConversionFailed';

  constructor(
    message: string,
    public exitCode: number | null,
    public stderr: string,
  ) {
    super(message);
    this.name = 'ConversionFailedError';
  }
}

export class DispatchNotConfirmedError extends Error {
  readonly code = 'DispatchNotConfirmed';

  constructor() {
    super('Live dispatch requires explicit confirmation before sending');
    this.name = 'DispatchNotConfirmedError';
  }
}

export class MailTransportError extends Error {
  readonly code = 'MailTransportError';

  constructor(message: string, public provider: string) {
    super(message);
    this.name = 'MailTransportError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
