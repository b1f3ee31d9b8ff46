/**
 * Batch Renamer Module
 *
 * Walks a directory of PDFs one file at a time:
 * read -> extract -> reconcile -> build -> sanitize -> write metadata -> rename.
 *
 * One file's failure never aborts the batch; it is recorded under the file
 * name and counted as failed. An existing target is never overwritten.
 */

import { constants } from 'fs';
import { access, readdir, rename, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { BaseModule } from './base.js';
import { CitationReconciler } from './citation-reconciler.js';
import { buildFilename, DEFAULT_MAX_FILENAME_LENGTH } from '../utils/filename-builder.js';
import { PDF_EXTENSION, sanitizeFilename } from '../utils/filename-sanitizer.js';
import { formatChicagoCitation } from '../utils/citation-format.js';
import { errorMessage } from '../utils/errors.js';
import type {
  BibliographicLookup,
  CitationExtractor,
  DocumentSource,
  FileOutcome,
  MetadataUpdate,
  MetadataWriter,
  ReconciledRecord,
  RenameOptions,
  RunSummary,
} from '../types/index.js';

export const DEFAULT_MAX_PAGES = 1;

export interface BatchRenamerDependencies {
  documents: DocumentSource;
  extractor: CitationExtractor;
  lookup: BibliographicLookup;
  writer: MetadataWriter;
  /** Permission probe run before a file is touched (default: fs.access R_OK | W_OK) */
  checkAccess?: (path: string) => Promise<boolean>;
}

interface BatchInput {
  directory: string;
}

async function canReadAndWrite(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK | constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export interface CollisionOptions {
  /** File being renamed; its own name never counts as taken */
  source?: string;
  /** Lower-cased names already handed out in this run */
  claimed?: ReadonlySet<string>;
}

/**
 * First free "<base>.pdf", "<base>_1.pdf", "<base>_2.pdf", ... in `directory`
 */
export async function resolveCollision(
  directory: string,
  filename: string,
  options: CollisionOptions = {}
): Promise<string> {
  const { source, claimed } = options;

  const isFree = async (candidate: string): Promise<boolean> => {
    const key = candidate.toLowerCase();
    if (source && key === source.toLowerCase()) return true;
    if (claimed?.has(key)) return false;
    return !(await exists(join(directory, candidate)));
  };
  const pick = (candidate: string): string =>
    source && candidate.toLowerCase() === source.toLowerCase() ? source : candidate;

  if (await isFree(filename)) return pick(filename);

  const base = filename.slice(0, filename.length - extname(filename).length);
  const extension = extname(filename);
  for (let suffix = 1; ; suffix++) {
    const candidate = `${base}_${suffix}${extension}`;
    if (await isFree(candidate)) return pick(candidate);
  }
}

export function createRunSummary(): RunSummary {
  return { total: 0, successful: 0, failed: 0, errors: [], results: [] };
}

export class BatchRenamer extends BaseModule<BatchInput, RunSummary> {
  readonly name = 'batch-renamer';
  readonly description = 'Renames every PDF in a directory after its reconciled citation';

  private readonly reconciler: CitationReconciler;

  constructor(private readonly deps: BatchRenamerDependencies) {
    super();
    this.reconciler = new CitationReconciler(deps.lookup);
  }

  /**
   * PDF files in `directory`, matched case-insensitively, sorted by name
   */
  async listCandidates(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === PDF_EXTENSION)
      .map((entry) => entry.name)
      .sort();
  }

  async process(input: BatchInput, options?: RenameOptions): Promise<RunSummary> {
    const summary = createRunSummary();
    const directory = resolve(input.directory);

    try {
      const info = await stat(directory);
      if (!info.isDirectory()) {
        summary.errors.push(`${directory} is not a valid directory`);
        return summary;
      }
    } catch (error) {
      summary.errors.push(`${directory} is not a valid directory: ${errorMessage(error)}`);
      return summary;
    }

    let files: string[];
    try {
      files = await this.listCandidates(directory);
    } catch (error) {
      summary.errors.push(`${directory}: ${errorMessage(error)}`);
      return summary;
    }
    this.log(`Found ${files.length} PDF files in ${directory}`, options?.verbose);

    const checkAccess = this.deps.checkAccess ?? canReadAndWrite;
    const claimed = new Set<string>();

    for (const filename of files) {
      summary.total++;

      if (!(await checkAccess(join(directory, filename)))) {
        summary.failed++;
        summary.errors.push(`${filename}: insufficient permissions (read and write required)`);
        continue;
      }

      try {
        const outcome = await this.processFile(directory, filename, claimed, options);
        summary.successful++;
        summary.results.push(outcome);
      } catch (error) {
        this.logError(`${filename}: ${errorMessage(error)}`);
        summary.failed++;
        summary.errors.push(`${filename}: ${errorMessage(error)}`);
      }
    }

    return summary;
  }

  private async processFile(
    directory: string,
    filename: string,
    claimed: Set<string>,
    options?: RenameOptions
  ): Promise<FileOutcome> {
    const sourcePath = join(directory, filename);
    const maxPages = options?.maxPages ?? DEFAULT_MAX_PAGES;
    const maxLength = options?.maxFilenameLength ?? DEFAULT_MAX_FILENAME_LENGTH;

    this.log(`Processing ${filename}`, options?.verbose);

    const document = await this.deps.documents.read(sourcePath, maxPages);
    const extraction = await this.deps.extractor.extract(document.text, filename);
    if (!extraction.parsed) {
      this.log(`Unparseable model response for ${filename}: ${extraction.raw.slice(0, 200)}`, options?.verbose);
    }

    const record = await this.reconciler.process(
      { extraction: extraction.result, parsed: extraction.parsed, metadata: document.metadata },
      options
    );

    const candidate = buildFilename(record.author, record.year, record.title, maxLength);
    const safeName = sanitizeFilename(candidate, maxLength);
    this.log(`${filename} -> ${safeName}`, options?.verbose);

    const target =
      safeName.toLowerCase() === filename.toLowerCase()
        ? filename
        : await resolveCollision(directory, safeName, { source: filename, claimed });
    const unchanged = target === filename;
    // Dry runs rename nothing, so later files must see the names handed out so far
    claimed.add(target.toLowerCase());

    if (options?.dryRun) {
      return { source: filename, target, renamed: false, metadataWritten: false, record };
    }

    let metadataWritten = false;
    if (options?.writeMetadata ?? true) {
      await this.deps.writer.write(sourcePath, toMetadataUpdate(record));
      metadataWritten = true;
    }

    if (unchanged) {
      this.log(`${filename} already has its citation name`, options?.verbose);
      return { source: filename, target, renamed: false, metadataWritten, record };
    }

    await rename(sourcePath, join(directory, target));

    return { source: filename, target, renamed: true, metadataWritten, record };
  }
}

/**
 * Metadata written back into the PDF: citation as subject, audit notes as keywords
 */
export function toMetadataUpdate(record: ReconciledRecord): MetadataUpdate {
  return {
    title: record.title,
    author: record.author,
    subject: formatChicagoCitation(record),
    keywords: record.notes.join('; '),
  };
}
