/**
 * Letter Resolver
 *
 * Pure substitution pass: template + record -> resolved letter with every
 * known placeholder filled and the proposal table expanded.
 */

import { formatAmount } from '../import/value-parsers.js';
import type { PersonRecord, Proposal } from '../types/letters.js';
import type { FieldRow, LetterTemplate, TextStyle } from './letter-template.js';
import { substitute, type TokenValues } from './placeholders.js';

export interface LetterContext {
  date: Date;
  place: string;
}

export type ResolvedBlock =
  | { type: 'heading' | 'paragraph'; text: string; style?: TextStyle }
  | { type: 'fields'; rows: FieldRow[]; labelWidth?: number; valueWidth?: number }
  | { type: 'numbered'; items: string[] }
  | {
      type: 'proposals';
      headers: string[];
      widths: Array<number | undefined>;
      rows: string[][];
      fontSize?: number;
    }
  | { type: 'signature'; lines: string[]; note?: string }
  | { type: 'page_break' | 'spacer' };

export interface ResolvedLetter {
  title: string;
  font: string;
  fontSize: number;
  blocks: ResolvedBlock[];
}

export function formatLetterDate(date: Date, monthNames: string[]): string {
  const day = String(date.getDate()).padStart(2, '0');
  return `${day} ${monthNames[date.getMonth()]} ${date.getFullYear()}`;
}

export function totalAmount(proposals: readonly Proposal[]): number | null {
  const amounts = proposals
    .map(p => p.amount)
    .filter((amount): amount is number => amount !== null);
  return amounts.length === 0 ? null : amounts.reduce((sum, amount) => sum + amount, 0);
}

/** Tokens that describe the person, shared by letters and email messages */
export function identityTokens(record: PersonRecord): Record<string, string> {
  return {
    id: record.id,
    name: record.name,
    unit: record.unit,
    account: record.account,
    bank: record.bank || '-',
    email: record.email ?? '',
    proposal_count: String(record.proposals.length),
  };
}

export function recordTokens(
  record: PersonRecord,
  context: LetterContext,
  monthNames: string[],
): Record<string, string> {
  return {
    ...identityTokens(record),
    date: formatLetterDate(context.date, monthNames),
    place: context.place,
    total_amount: formatAmount(totalAmount(record.proposals)),
  };
}

export function proposalTokens(base: TokenValues, proposal: Proposal, index: number): TokenValues {
  return {
    ...base,
    'proposal.index': String(index + 1),
    'proposal.number': proposal.number,
    'proposal.title': proposal.title,
    'proposal.scheme': proposal.scheme,
    'proposal.amount': formatAmount(proposal.amount, proposal.amountText),
  };
}

export function resolveLetter(
  template: LetterTemplate,
  record: PersonRecord,
  context: LetterContext,
): ResolvedLetter {
  const tokens = recordTokens(record, context, template.monthNames);
  const fill = (text: string) => substitute(text, tokens);

  const blocks = template.blocks.map((block): ResolvedBlock => {
    switch (block.type) {
      case 'heading':
      case 'paragraph':
        return { type: block.type, text: fill(block.text), style: block.style };
      case 'fields':
        return {
          type: 'fields',
          rows: block.rows.map(row => ({ label: fill(row.label), value: fill(row.value) })),
          labelWidth: block.labelWidth,
          valueWidth: block.valueWidth,
        };
      case 'numbered':
        return { type: 'numbered', items: block.items.map(fill) };
      case 'proposals':
        return {
          type: 'proposals',
          headers: block.columns.map(column => fill(column.header)),
          widths: block.columns.map(column => column.width),
          rows: record.proposals.map((proposal, index) => {
            const rowTokens = proposalTokens(tokens, proposal, index);
            return block.columns.map(column => substitute(column.value, rowTokens));
          }),
          fontSize: block.fontSize,
        };
      case 'signature':
        return {
          type: 'signature',
          lines: block.lines.map(fill),
          note: block.note === undefined ? undefined : fill(block.note),
        };
      case 'page_break':
      case 'spacer':
        return { type: block.type };
    }
  });

  return {
    title: fill(template.title),
    font: template.font,
    fontSize: template.fontSize,
    blocks,
  };
}
