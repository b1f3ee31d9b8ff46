/**
 * Metadata Normalizer
 *
 * Cleans field values pulled from a PDF's Info dictionary or from a model
 * response. Some producers wrap uncertain titles in square brackets,
 * e.g. "[Untitled Draft]".
 */

import { METADATA_FIELDS, type RawMetadata } from '../types/index.js';

/**
 * Trim, strip one layer of surrounding square brackets, trim again.
 * Absent and all-whitespace values become the empty string.
 */
export function normalizeField(value: string | null | undefined): string {
  if (value === null || value === undefined) return '';

  let cleaned = value.trim();
  if (cleaned.startsWith('[')) cleaned = cleaned.slice(1);
  if (cleaned.endsWith(']')) cleaned = cleaned.slice(0, -1);

  return cleaned.trim();
}

/**
 * Normalize every known metadata field, dropping the empty ones
 */
export function normalizeMetadata(raw: RawMetadata): RawMetadata {
  const normalized: RawMetadata = {};

  for (const field of METADATA_FIELDS) {
    const value = normalizeField(raw[field]);
    if (value) normalized[field] = value;
  }

  return normalized;
}
