/**
 * pdf-citation-renamer
 *
 * Renames PDFs after a citation reconciled from a language-model extraction,
 * the document's own metadata and a Crossref lookup.
 */

import { BatchRenamer } from './modules/batch-renamer.js';
import { CrossrefLookup, NullLookup } from './services/crossref-lookup.js';
import {
  LanguageModelCitationExtractor,
  createGenkit,
  createGenkitGenerator,
} from './services/citation-extractor.js';
import { PdfDocumentSource } from './services/pdf-document-source.js';
import { PdfMetadataWriter } from './services/pdf-metadata-writer.js';
import { ExtractionError } from './utils/errors.js';
import type { RenamerConfig } from './config.js';

export interface CreateRenamerOptions {
  /** Query Crossref when fields are missing or sources disagree (default: true) */
  lookup?: boolean;
}

/**
 * Wire the production collaborators into a BatchRenamer
 */
export function createBatchRenamer(config: RenamerConfig, options: CreateRenamerOptions = {}): BatchRenamer {
  if (!config.apiKey) {
    throw new ExtractionError('GEMINI_API_KEY (or GOOGLE_API_KEY) environment variable required');
  }

  const generatorOptions = { apiKey: config.apiKey, model: config.model };
  const ai = createGenkit(generatorOptions);

  return new BatchRenamer({
    documents: new PdfDocumentSource(),
    extractor: new LanguageModelCitationExtractor(createGenkitGenerator(ai, generatorOptions)),
    lookup: options.lookup === false ? new NullLookup() : new CrossrefLookup(config.crossref),
    writer: new PdfMetadataWriter(),
  });
}

export { BatchRenamer, createRunSummary, resolveCollision, toMetadataUpdate } from './modules/batch-renamer.js';
export { CitationReconciler, reconcile } from './modules/citation-reconciler.js';
export { buildFilename } from './utils/filename-builder.js';
export { sanitizeBasename, sanitizeFilename } from './utils/filename-sanitizer.js';
export { normalizeField, normalizeMetadata } from './utils/metadata-normalizer.js';
export { formatChicagoCitation } from './utils/citation-format.js';
export { CrossrefLookup, NullLookup } from './services/crossref-lookup.js';
export { LanguageModelCitationExtractor, parseExtractionResponse } from './services/citation-extractor.js';
export { PdfDocumentSource } from './services/pdf-document-source.js';
export { PdfMetadataWriter } from './services/pdf-metadata-writer.js';
export { loadConfig, type RenamerConfig } from './config.js';
export * from './utils/errors.js';
export type * from './types/index.js';
