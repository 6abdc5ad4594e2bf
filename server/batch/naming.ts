/**
 * Document naming: <prefix>_<slug(name)>_<id>.
 *
 * Only the name slug is shortened to fit MAX_BASE_NAME_LENGTH; the ID part
 * is always kept whole so distinct records get distinct files.
 */

import crypto from 'crypto';

export const MAX_BASE_NAME_LENGTH = 120;

export interface DocumentNaming {
  prefix: string;
}

export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * File-safe form of an ID. When characters had to be replaced, a short hash
 * of the raw ID is appended, so "1/2" and "1-2" stay apart.
 */
export function safeId(id: string): string {
  const raw = id.trim();
  const safe = raw.replace(/[^A-Za-z0-9._-]+/g, '-');
  if (safe === raw) return safe;
  const hash = crypto.createHash('sha256').update(raw).digest('hex').slice(0, 8);
  return `${safe}-${hash}`;
}

export function documentBaseName(naming: DocumentNaming, record: { id: string; name: string }): string {
  const id = safeId(record.id);
  const room = Math.max(MAX_BASE_NAME_LENGTH - naming.prefix.length - id.length - 2, 1);
  const slug = (slugify(record.name) || 'unnamed').slice(0, room).replace(/-+$/, '') || 'unnamed';
  return [naming.prefix, slug, id].join('_');
}

export function documentFileName(naming: DocumentNaming, record: { id: string; name: string }): string {
  return `${documentBaseName(naming, record)}.pdf`;
}
