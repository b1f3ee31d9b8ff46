/**
 * Filename Sanitizer
 *
 * Makes a candidate filename safe on Windows, macOS and Linux file systems.
 * The ".pdf" extension is always appended here, never taken from the caller.
 */

import { DEFAULT_MAX_FILENAME_LENGTH } from './filename-builder.js';

export const PDF_EXTENSION = '.pdf';
export const FALLBACK_BASENAME = 'unnamed_document';

export const RESERVED_DEVICE_NAMES: ReadonlySet<string> = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  'COM1',
  'COM2',
  'COM3',
  'COM4',
  'LPT1',
  'LPT2',
  'LPT3',
  'LPT4',
]);

const PDF_EXTENSION_PATTERN = /(\.pdf)+$/i;
const COLON_PATTERN = /\s*:\s*/g;
const SEPARATOR_WHITESPACE_PATTERN = /[\t\n\r\v\f]+/g;
const FORBIDDEN_PATTERN = /[<>:"/\\|?*\x00-\x1F]/g;
const HYPHEN_RUN_PATTERN = /\s*-(?:\s*-)+\s*/g;
const EDGE_PATTERN = /^[.\s]+|[.\s]+$/g;

function trimEdges(name: string, maxLength: number): string {
  let current = name;
  let previous: string;

  // Trimming can expose another ".pdf" and vice versa
  do {
    previous = current;
    current = current.slice(0, maxLength).replace(EDGE_PATTERN, '').replace(PDF_EXTENSION_PATTERN, '');
  } while (current !== previous);

  return current;
}

/**
 * Sanitize without appending the extension
 */
export function sanitizeBasename(candidate: string, maxLength: number = DEFAULT_MAX_FILENAME_LENGTH): string {
  let name = candidate.trim().replace(PDF_EXTENSION_PATTERN, '');

  name = name
    .replace(COLON_PATTERN, '-')
    .replace(SEPARATOR_WHITESPACE_PATTERN, '-')
    .replace(FORBIDDEN_PATTERN, '')
    .replace(HYPHEN_RUN_PATTERN, '-');

  name = trimEdges(name, maxLength);

  if (RESERVED_DEVICE_NAMES.has(name.toUpperCase())) {
    name = `_${name}`.slice(0, maxLength);
  }

  return name || FALLBACK_BASENAME.slice(0, maxLength);
}

/**
 * Safe "<base>.pdf" filename for any candidate string
 */
export function sanitizeFilename(candidate: string, maxLength: number = DEFAULT_MAX_FILENAME_LENGTH): string {
  return `${sanitizeBasename(candidate, maxLength)}${PDF_EXTENSION}`;
}
