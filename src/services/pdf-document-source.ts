/**
 * PDF document source
 *
 * Page text comes from pdf-parse (v2 API, page-level results); the Info
 * dictionary is read with pdf-lib.
 */

import { readFile } from 'fs/promises';
import { PDFDocument } from 'pdf-lib';
import { PDFParse } from 'pdf-parse';
import { DocumentNotFoundError, DocumentReadError, DocumentUnreadableError } from '../utils/errors.js';
import type { DocumentContent, DocumentSource, RawMetadata } from '../types/index.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Read the Info dictionary fields the reconciler cares about
 */
export async function readPdfMetadata(bytes: Uint8Array): Promise<{ metadata: RawMetadata; pageCount: number }> {
  const pdfDoc = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });

  return {
    metadata: {
      title: pdfDoc.getTitle(),
      author: pdfDoc.getAuthor(),
      subject: pdfDoc.getSubject(),
      keywords: pdfDoc.getKeywords(),
      producer: pdfDoc.getProducer(),
      creator: pdfDoc.getCreator(),
    },
    pageCount: pdfDoc.getPageCount(),
  };
}

/**
 * Text of the first `maxPages` pages, pages separated by a blank line
 */
export async function extractPageText(bytes: Uint8Array, maxPages: number): Promise<string> {
  const parser = new PDFParse({ data: bytes });
  try {
    const textResult = await parser.getText();
    return textResult.pages
      .slice(0, maxPages)
      .map((page) => page.text)
      .join('\n\n');
  } finally {
    await parser.destroy();
  }
}

export class PdfDocumentSource implements DocumentSource {
  async read(path: string, maxPages: number): Promise<DocumentContent> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new DocumentNotFoundError(path);
      }
      throw new DocumentReadError(path, error);
    }

    try {
      // pdf.js may detach the buffer it is handed, so each reader gets its own copy
      const { metadata, pageCount } = await readPdfMetadata(new Uint8Array(buffer));
      const text = await extractPageText(new Uint8Array(buffer), maxPages);
      return { text, pageCount, metadata };
    } catch (error) {
      throw new DocumentUnreadableError(path, error);
    }
  }
}
