/**
 * Citation string formatting
 */

import type { ReconciledRecord } from '../types/index.js';

type CitationFields = Pick<ReconciledRecord, 'author' | 'title' | 'year' | 'publisher' | 'journal' | 'volume' | 'issue' | 'page'>;

function withPeriod(value: string): string {
  return /[.?!]$/.test(value) ? value : `${value}.`;
}

/**
 * Chicago bibliography style, simplified.
 *
 * Article: Author. "Title." Journal 12, no. 3 (2020): 45-67.
 * Book:    Author. Title. Publisher, 2020.
 */
export function formatChicagoCitation(record: CitationFields): string {
  const parts: string[] = [];

  if (record.author) parts.push(withPeriod(record.author));

  if (record.journal) {
    if (record.title) parts.push(`"${withPeriod(record.title)}"`);

    let source = record.journal;
    if (record.volume) source += ` ${record.volume}`;
    if (record.issue) source += `, no. ${record.issue}`;
    if (record.year) source += ` (${record.year})`;
    if (record.page) source += `: ${record.page}`;
    parts.push(withPeriod(source));
  } else {
    if (record.title) parts.push(withPeriod(record.title));

    const imprint = [record.publisher, record.year].filter((value) => value.length > 0).join(', ');
    if (imprint) parts.push(withPeriod(imprint));
  }

  return parts.join(' ');
}
