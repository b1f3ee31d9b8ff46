/**
 * PDF metadata writer
 *
 * Rewrites the Info dictionary with pdf-lib. The new file is written beside
 * the original and moved over it, so a failed save leaves the original intact.
 */

import { readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { PDFDocument } from 'pdf-lib';
import type { MetadataUpdate, MetadataWriter } from '../types/index.js';

export class PdfMetadataWriter implements MetadataWriter {
  async write(path: string, update: MetadataUpdate): Promise<void> {
    const bytes = await readFile(path);
    const pdfDoc = await PDFDocument.load(bytes, { updateMetadata: false });

    if (update.title) pdfDoc.setTitle(update.title);
    if (update.author) pdfDoc.setAuthor(update.author);
    if (update.subject) pdfDoc.setSubject(update.subject);
    // setKeywords joins its entries with spaces; keep the caller's separators
    if (update.keywords) pdfDoc.setKeywords([update.keywords]);
    pdfDoc.setModificationDate(new Date());

    const saved = await pdfDoc.save();
    const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);

    try {
      await writeFile(tempPath, saved);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
