/**
 * CLI commands: inspect, generate, dispatch.
 */

import { readFile } from 'fs/promises';
import { basename, join } from 'path';
import { BatchOrchestrator, GENERATION_REPORT_FILE, type BatchResult } from '../batch/index.js';
import { requireMailConfig, type AppConfig } from '../config/app-config.js';
import { DocumentConverter } from '../converter/index.js';
import {
  buildEmailMap,
  DispatchEngine,
  reconcileEmails,
  ResendTransport,
  type DispatchResult,
  type MailTransport,
} from '../dispatch/index.js';
import { readSheetTable, type SheetTable } from '../import/file-parser.js';
import { describeTable, extractRecords, validateColumns } from '../import/record-extractor.js';
import { loadLetterTemplate, TemplateRenderer } from '../renderers/index.js';
import { readGenerationReport, readSentIds, writeDispatchReport } from '../reports/index.js';
import { SchemaError } from '../types/errors.js';
import type { PersonRecord } from '../types/letters.js';
import type { Logger } from '../utils/logger.js';
import type { DispatchArgs, GenerateArgs, InspectArgs } from './args.js';

export const DISPATCH_REPORT_FILE = 'dispatch-report.csv';

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  signal?: AbortSignal;
  /** PATH used to look for the converter */
  searchPath?: string;
  /** Overrides the Resend transport, for tests */
  transport?: MailTransport;
  now?: () => Date;
  print?: (line: string) => void;
}

async function loadTable(path: string, sheet?: string): Promise<SheetTable> {
  return readSheetTable(await readFile(path), basename(path), { sheetName: sheet });
}

async function loadRecords(
  args: { input: string; sheet?: string },
  context: CommandContext,
  requireEmail: boolean,
): Promise<PersonRecord[]> {
  const table = await loadTable(args.input, args.sheet);
  const validation = validateColumns(table, { columns: context.config.columns, requireEmail });
  if (!validation.ok) {
    throw new SchemaError(validation.messages.join('; '), validation.missing);
  }

  const { records, skipped } = extractRecords(table, { columns: context.config.columns });
  for (const row of skipped) {
    context.logger.warn('Row skipped', { row: row.rowNumber, reason: row.reason, missing: row.missing });
  }
  return records;
}

/** "\n" typed on the command line means a newline */
function unescapeTemplate(text: string | undefined): string | undefined {
  return text?.replace(/\\n/g, '\n');
}

export async function runInspect(args: InspectArgs, context: CommandContext): Promise<void> {
  const print = context.print ?? console.log;
  const table = await loadTable(args.input, args.sheet);
  const summary = describeTable(table, context.config.columns);
  const validation = validateColumns(table, { columns: context.config.columns });

  print(`Sheets:          ${summary.sheetNames.join(', ')}`);
  print(`Sheet:           ${summary.sheetName}`);
  print(`Rows:            ${summary.rowCount}`);
  print(`Columns:         ${summary.columnCount}`);
  print(`Proposal slots:  ${summary.proposalSlots}`);
  print(`Email column:    ${summary.hasEmailColumn ? 'yes' : 'no'}`);
  print(`Columns valid:   ${validation.ok ? 'yes' : 'no'}`);
  for (const message of validation.messages) {
    print(`  - ${message}`);
  }
}

export async function runGenerate(args: GenerateArgs, context: CommandContext): Promise<BatchResult> {
  const { config } = context;
  const records = await loadRecords(args, context, false);
  const template = await loadLetterTemplate(config.letter.templatePath);

  const orchestrator = new BatchOrchestrator({
    renderer: new TemplateRenderer(template, { place: config.letter.place, now: context.now }),
    converter: new DocumentConverter(config.converter, { searchPath: context.searchPath }),
    naming: { prefix: config.output.documentPrefix },
    archiveName: config.output.archiveName,
    logger: context.logger,
  });

  return orchestrator.run(records, {
    outputDir: args.output ?? config.output.dir,
    offset: args.offset,
    limit: args.limit,
    sampleCount: args.sample,
    keepIntermediate: args.keepIntermediate,
    signal: context.signal,
  });
}

export async function runDispatch(args: DispatchArgs, context: CommandContext): Promise<DispatchResult> {
  const { config, logger } = context;
  const outputDir = args.output ?? config.output.dir;

  let records = await loadRecords(args, context, args.mapping === undefined);

  if (args.mapping) {
    const emailMap = buildEmailMap(await loadTable(args.mapping), {
      idColumn: config.columns.id,
      emailColumn: config.columns.email,
    });
    const reconciled = reconcileEmails(records, emailMap.emails);
    records = reconciled.records;
    if (reconciled.unresolved.length > 0) {
      logger.warn('Records without an email address', { ids: reconciled.unresolved });
    }
  }

  const generation = readGenerationReport(
    await readFile(join(outputDir, GENERATION_REPORT_FILE), 'utf-8'),
    join(outputDir, 'documents'),
    { prefix: config.output.documentPrefix },
  );

  const alreadySent = args.resume ? readSentIds(await readFile(args.resume, 'utf-8')) : undefined;
  const templates = { subject: unescapeTemplate(args.subject), body: unescapeTemplate(args.body) };
  const delayMs = args.delay ?? config.mail.delayMs;

  const engine = args.live
    ? new DispatchEngine({
        mode: 'live',
        transport: context.transport ?? new ResendTransport(requireMailConfig(config)),
        templates,
        delayMs,
        alreadySent,
        logger,
      })
    : new DispatchEngine({ mode: 'dry_run', templates, delayMs, alreadySent, logger });

  if (args.confirm) {
    engine.confirm();
  }

  const result = await engine.run(records, generation, { signal: context.signal });
  const reportPath = await writeDispatchReport(join(outputDir, DISPATCH_REPORT_FILE), result.outcomes);
  logger.info('Dispatch report written', { path: reportPath });
  return result;
}
