/**
 * Citation Reconciler Module
 *
 * Merges three candidate sources of bibliographic fields into one record:
 * - Language-model extraction (primary)
 * - Embedded document metadata (fills empty title/author only)
 * - Bibliographic lookup (overrides everything it supplies, once matched)
 *
 * Disagreements and fallbacks are recorded in `notes` for the audit trail
 * written into the PDF. Notes never drive control flow.
 */

import { BaseModule } from './base.js';
import { normalizeField, normalizeMetadata } from '../utils/metadata-normalizer.js';
import { errorMessage } from '../utils/errors.js';
import {
  BIBLIOGRAPHIC_FIELDS,
  LOOKUP_FIELDS,
  type BibliographicLookup,
  type ExtractionResult,
  type RawMetadata,
  type ReconciledRecord,
  type RenameOptions,
} from '../types/index.js';

export interface ReconcileInput {
  extraction: ExtractionResult;
  /** False when the model response was malformed; the extraction is then ignored */
  parsed?: boolean;
  metadata: RawMetadata;
}

/** Fields compared against, and filled from, document metadata */
const METADATA_BACKED_FIELDS = ['title', 'author'] as const;

/** Fields that must be present to skip the lookup */
const REQUIRED_FIELDS = ['title', 'author', 'year', 'publisher'] as const;

export function emptyRecord(): ReconciledRecord {
  return {
    title: '',
    author: '',
    year: '',
    publisher: '',
    journal: '',
    other_info: '',
    volume: '',
    issue: '',
    page: '',
    notes: [],
  };
}

export class CitationReconciler extends BaseModule<ReconcileInput, ReconciledRecord> {
  readonly name = 'citation-reconciler';
  readonly description = 'Merges model extraction, document metadata and lookup results into one record';

  constructor(private readonly lookup: BibliographicLookup) {
    super();
  }

  async process(input: ReconcileInput, options?: RenameOptions): Promise<ReconciledRecord> {
    const record = emptyRecord();
    const metadata = normalizeMetadata(input.metadata);

    // Step 1: a malformed response is dropped entirely
    if (input.parsed === false) {
      record.notes.push('Extraction response was not valid JSON; falling back to document metadata');
    } else {
      for (const field of BIBLIOGRAPHIC_FIELDS) {
        record[field] = normalizeField(input.extraction[field]);
      }
    }

    // Steps 2-3: fill-only merge from metadata, flag disagreements
    let needLookup = false;
    for (const field of METADATA_BACKED_FIELDS) {
      const metadataValue = metadata[field] ?? '';
      if (!metadataValue) continue;

      if (!record[field]) {
        record[field] = metadataValue;
        record.notes.push(`${field} taken from document metadata`);
      } else if (record[field] !== metadataValue) {
        record.notes.push(`${field} disagreement: extraction "${record[field]}" vs metadata "${metadataValue}"`);
        needLookup = true;
      }
    }

    // Step 4: completeness
    const missing = REQUIRED_FIELDS.filter((field) => !record[field]);
    if (missing.length > 0) {
      this.log(`Missing fields: ${missing.join(', ')}`, options?.verbose);
      needLookup = true;
    }

    if (needLookup) {
      await this.supplementFromLookup(record, options);
    }

    return record;
  }

  /**
   * Step 5: one query built from the current title and author
   */
  private async supplementFromLookup(record: ReconciledRecord, options?: RenameOptions): Promise<void> {
    const query = `${record.title} ${record.author}`.trim();
    if (!query) {
      record.notes.push('Lookup skipped: no title or author to query');
      return;
    }

    this.log(`Looking up "${query}"`, options?.verbose);

    try {
      const match = await this.lookup.search(query);
      if (!match) {
        record.notes.push(`Lookup: no match found for "${query}"`);
        return;
      }

      const supplied: string[] = [];
      for (const field of LOOKUP_FIELDS) {
        const value = normalizeField(match[field]);
        if (value) {
          record[field] = value;
          supplied.push(field);
        }
      }
      record.notes.push(`Fields supplemented via lookup: ${supplied.join(', ') || 'none'}`);
    } catch (error) {
      this.log(`Lookup failed: ${errorMessage(error)}`, options?.verbose);
      record.notes.push(`Lookup failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Reconcile one file's sources with the given lookup collaborator
 */
export function reconcile(
  extraction: ExtractionResult,
  metadata: RawMetadata,
  lookup: BibliographicLookup,
  options?: RenameOptions & { parsed?: boolean }
): Promise<ReconciledRecord> {
  return new CitationReconciler(lookup).process({ extraction, metadata, parsed: options?.parsed }, options);
}
