/**
 * Dispatch Engine
 *
 * Sends (or simulates sending) each generated document to its owner, one
 * record at a time, with a fixed pause between consecutive attempts.
 *
 * Lifecycle:
 *
 *   ARMED --confirm()--> CONFIRMED --run()--> DISPATCHING --> DONE
 *                                                        \--> CANCELLED
 *
 * A dry run may start straight from ARMED. A live run needs CONFIRMED and
 * fails with DispatchNotConfirmedError before touching any record otherwise.
 * An engine runs once.
 */

import { readFile, stat } from 'fs/promises';
import { basename } from 'path';
import { identityTokens } from '../renderers/letter-resolver.js';
import { substitute, type TokenValues } from '../renderers/placeholders.js';
import { ALREADY_SENT_DETAIL } from '../reports/dispatch-report.js';
import { DispatchNotConfirmedError, describeError } from '../types/errors.js';
import type {
  DispatchMode,
  DispatchOutcome,
  DispatchStatus,
  GenerationOutcome,
  PersonRecord,
} from '../types/letters.js';
import { loggers, type Logger } from '../utils/logger.js';
import type { MailTransport } from './transport.js';

export type DispatchState = 'ARMED' | 'CONFIRMED' | 'DISPATCHING' | 'DONE' | 'CANCELLED';

export interface MessageTemplates {
  subject: string;
  body: string;
}

export const DEFAULT_SUBJECT = 'Compliance letter - {{name}} ({{id}})';
export const DEFAULT_BODY =
  'Dear {{name}},\n\nPlease find attached your compliance letter ({{document}}).\n\nThank you.\n';

interface CommonOptions {
  templates?: Partial<MessageTemplates>;
  /** Pause between consecutive attempts, in milliseconds */
  delayMs: number;
  /** IDs delivered by an earlier run; these are skipped */
  alreadySent?: ReadonlySet<string>;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  logger?: Logger;
}

export type DispatchEngineOptions =
  | (CommonOptions & { mode: 'dry_run'; transport?: MailTransport })
  | (CommonOptions & { mode: 'live'; transport: MailTransport });

export interface DispatchRunOptions {
  signal?: AbortSignal;
}

export interface DispatchResult {
  mode: DispatchMode;
  state: DispatchState;
  outcomes: DispatchOutcome[];
  counts: Record<DispatchStatus, number>;
  /** Records left out because their document was not generated */
  ineligible: number;
}

export class DispatchStateError extends Error {
  readonly code = 'DispatchStateError';

  constructor(message: string, public state: DispatchState) {
    super(message);
    this.name = 'DispatchStateError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function messageTokens(record: PersonRecord, documentName: string): TokenValues {
  return { ...identityTokens(record), document: documentName };
}

async function documentProblem(path: string): Promise<string | null> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return `Document is not a file: ${path}`;
    return info.size === 0 ? `Document is empty: ${path}` : null;
  } catch {
    return `Document not found: ${path}`;
  }
}

export class DispatchEngine {
  private currentState: DispatchState = 'ARMED';
  private readonly templates: MessageTemplates;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: DispatchEngineOptions) {
    this.templates = {
      subject: options.templates?.subject ?? DEFAULT_SUBJECT,
      body: options.templates?.body ?? DEFAULT_BODY,
    };
    this.sleep = options.sleep ?? sleep;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? loggers.dispatch;
  }

  get state(): DispatchState {
    return this.currentState;
  }

  get mode(): DispatchMode {
    return this.options.mode;
  }

  /**
   * Explicit operator confirmation; required before a live run.
   */
  confirm(): void {
    if (this.currentState !== 'ARMED') {
      throw new DispatchStateError(`Cannot confirm from state ${this.currentState}`, this.currentState);
    }
    this.currentState = 'CONFIRMED';
  }

  async run(
    records: readonly PersonRecord[],
    generation: readonly GenerationOutcome[],
    runOptions: DispatchRunOptions = {},
  ): Promise<DispatchResult> {
    if (this.currentState !== 'ARMED' && this.currentState !== 'CONFIRMED') {
      throw new DispatchStateError(`Dispatch engine already ran (state ${this.currentState})`, this.currentState);
    }
    if (this.options.mode === 'live' && this.currentState !== 'CONFIRMED') {
      throw new DispatchNotConfirmedError();
    }

    this.currentState = 'DISPATCHING';

    const documents = new Map<string, string>();
    for (const outcome of generation) {
      if (outcome.status === 'SUCCESS') {
        documents.set(outcome.recordId, outcome.documentPath);
      }
    }
    const eligible = records.filter(record => documents.has(record.id));
    const ineligible = records.length - eligible.length;

    this.logger.info('Dispatch started', {
      mode: this.options.mode,
      eligible: eligible.length,
      ineligible,
      delay_ms: this.options.delayMs,
    });

    const outcomes: DispatchOutcome[] = [];
    let attempts = 0;

    for (const record of eligible) {
      if (runOptions.signal?.aborted) {
        this.currentState = 'CANCELLED';
        this.logger.warn('Dispatch cancelled', {
          processed: outcomes.length,
          remaining: eligible.length - outcomes.length,
        });
        break;
      }

      const documentPath = documents.get(record.id) ?? '';
      const skip = await this.skipReason(record, documentPath);
      if (skip) {
        outcomes.push(this.outcome(record, 'SKIP', skip));
        this.logger.info('Record skipped', { id: record.id, reason: skip });
        continue;
      }

      if (attempts > 0 && this.options.delayMs > 0) {
        await this.sleep(this.options.delayMs);
      }
      attempts++;

      outcomes.push(await this.attempt(record, documentPath));
    }

    if (this.currentState === 'DISPATCHING') {
      this.currentState = 'DONE';
    }

    const counts: Record<DispatchStatus, number> = { OK: 0, FAIL: 0, SKIP: 0, 'DRY-RUN': 0 };
    for (const outcome of outcomes) {
      counts[outcome.status]++;
    }

    this.logger.info('Dispatch finished', { state: this.currentState, ...counts, ineligible });

    return {
      mode: this.options.mode,
      state: this.currentState,
      outcomes,
      counts,
      ineligible,
    };
  }

  private async skipReason(record: PersonRecord, documentPath: string): Promise<string | null> {
    if (this.options.alreadySent?.has(record.id)) {
      return ALREADY_SENT_DETAIL;
    }
    if (!record.email) {
      return 'No email address';
    }
    return documentProblem(documentPath);
  }

  private async attempt(record: PersonRecord, documentPath: string): Promise<DispatchOutcome> {
    const documentName = basename(documentPath);
    const tokens = messageTokens(record, documentName);
    const subject = substitute(this.templates.subject, tokens);
    const text = substitute(this.templates.body, tokens);
    const to = record.email ?? '';

    if (this.options.mode === 'dry_run') {
      this.logger.info('Dry run, not sent', { id: record.id, to, subject });
      return this.outcome(record, 'DRY-RUN', `Not sent (dry run): ${subject}`);
    }

    try {
      const content = await readFile(documentPath);
      const { messageId } = await this.options.transport.send({
        to,
        subject,
        text,
        attachments: [{ filename: documentName, content }],
      });
      this.logger.info('Sent', { id: record.id, to, message_id: messageId });
      return { ...this.outcome(record, 'OK', 'Sent'), messageId };
    } catch (error) {
      this.logger.warn('Send failed', { id: record.id, to, error: describeError(error) });
      return this.outcome(record, 'FAIL', describeError(error));
    }
  }

  private outcome(record: PersonRecord, status: DispatchStatus, detail: string): DispatchOutcome {
    return {
      recordId: record.id,
      name: record.name,
      address: record.email ?? '',
      status,
      timestamp: this.clock().toISOString(),
      detail,
    };
  }
}
