/**
 * Type definitions for pdf-citation-renamer
 */

/**
 * Bibliographic fields shared by every source
 */
export const BIBLIOGRAPHIC_FIELDS = ['title', 'author', 'year', 'publisher', 'journal', 'other_info'] as const;

export type BibliographicField = (typeof BIBLIOGRAPHIC_FIELDS)[number];

/**
 * Fields a lookup match may add on top of the bibliographic ones
 */
export const LOOKUP_FIELDS = [...BIBLIOGRAPHIC_FIELDS, 'volume', 'issue', 'page'] as const;

export type LookupField = (typeof LOOKUP_FIELDS)[number];

/**
 * Embedded document metadata, as read from the PDF Info dictionary
 */
export interface RawMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  producer?: string;
  creator?: string;
}

export const METADATA_FIELDS = ['title', 'author', 'subject', 'keywords', 'producer', 'creator'] as const satisfies ReadonlyArray<keyof RawMetadata>;

/**
 * Structured guess produced by the language model.
 * An unparseable response is represented by the empty object.
 */
export type ExtractionResult = Partial<Record<BibliographicField, string>>;

/**
 * Best match returned by a bibliographic lookup
 */
export type LookupResult = Partial<Record<LookupField, string>>;

/**
 * Canonical merged record. Missing data is the empty string.
 */
export type ReconciledRecord = Record<LookupField, string> & {
  /** Disagreement and fallback annotations, in the order they were made */
  notes: string[];
};

/**
 * Fields persisted back into the PDF
 */
export interface MetadataUpdate {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
}

/**
 * What the document source yields for one file
 */
export interface DocumentContent {
  /** Plain text of the first pages */
  text: string;
  pageCount: number;
  metadata: RawMetadata;
}

/**
 * Outcome of the model call for one file
 */
export interface ExtractionOutcome {
  result: ExtractionResult;
  /** False when the response could not be parsed into a JSON object */
  parsed: boolean;
  raw: string;
}

/**
 * Outcome for a file that was handled without error
 */
export interface FileOutcome {
  source: string;
  target: string;
  /** False when the target equals the source or the run is a dry run */
  renamed: boolean;
  metadataWritten: boolean;
  record: ReconciledRecord;
}

/**
 * Summary of one batch invocation
 */
export interface RunSummary {
  total: number;
  successful: number;
  failed: number;
  errors: string[];
  results: FileOutcome[];
}

/**
 * Options shared by modules
 */
export interface RenameOptions {
  /** Enable verbose logging */
  verbose?: boolean;

  /** Pages of text handed to the extractor */
  maxPages?: number;

  /** Maximum filename length, excluding the .pdf suffix */
  maxFilenameLength?: number;

  /** Write the reconciled citation into the PDF metadata */
  writeMetadata?: boolean;

  /** Compute targets without touching any file */
  dryRun?: boolean;
}

/**
 * Collaborator contracts
 */

export interface DocumentSource {
  /**
   * Read page text (first `maxPages` pages) and embedded metadata
   * @throws DocumentNotFoundError | DocumentUnreadableError | DocumentReadError
   */
  read(path: string, maxPages: number): Promise<DocumentContent>;
}

export interface CitationExtractor {
  /**
   * Ask the model for bibliographic fields. Parse failures are reported via
   * `parsed: false`; only a failed call throws.
   */
  extract(text: string, filename: string): Promise<ExtractionOutcome>;
}

export interface BibliographicLookup {
  /**
   * Best match for a free-text query, or null when nothing matched
   * @throws LookupError when the service fails
   */
  search(query: string): Promise<LookupResult | null>;
}

export interface MetadataWriter {
  /** Replace the supplied, non-empty keys and leave the rest untouched */
  write(path: string, update: MetadataUpdate): Promise<void>;
}
