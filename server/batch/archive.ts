/**
 * Zip archives of generated documents. Entries carry a fixed timestamp so
 * the same documents always produce the same archive listing.
 */

import JSZip from 'jszip';
import { readFile, writeFile } from 'fs/promises';
import { basename } from 'path';

export const ARCHIVE_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));

export async function buildArchive(files: string[]): Promise<Buffer> {
  const zip = new JSZip();
  for (const file of files) {
    zip.file(basename(file), await readFile(file), { date: ARCHIVE_ENTRY_DATE });
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

export async function writeArchive(outputPath: string, files: string[]): Promise<string> {
  await writeFile(outputPath, await buildArchive(files));
  return outputPath;
}
