/**
 * Crossref bibliographic lookup
 *
 * Free-text search against https://api.crossref.org/works, best match only.
 * No API key is needed; a `mailto` routes requests to the polite pool.
 */

import { z } from 'genkit';
import { LookupError, errorMessage } from '../utils/errors.js';
import type { BibliographicLookup, LookupResult } from '../types/index.js';

const CrossrefDateSchema = z.object({
  'date-parts': z.array(z.array(z.number().nullable())).optional(),
});

export const CrossrefWorkSchema = z.object({
  title: z.array(z.string()).optional(),
  author: z
    .array(
      z.object({
        given: z.string().optional(),
        family: z.string().optional(),
        name: z.string().optional(),
      })
    )
    .optional(),
  'published-print': CrossrefDateSchema.optional(),
  'published-online': CrossrefDateSchema.optional(),
  issued: CrossrefDateSchema.optional(),
  'container-title': z.array(z.string()).optional(),
  publisher: z.string().optional(),
  volume: z.string().optional(),
  issue: z.string().optional(),
  page: z.string().optional(),
  DOI: z.string().optional(),
});

const CrossrefSearchResponseSchema = z.object({
  status: z.string().optional(),
  message: z
    .object({
      'total-results': z.number().optional(),
      items: z.array(CrossrefWorkSchema).optional(),
    })
    .optional(),
});

type CrossrefDate = z.infer<typeof CrossrefDateSchema>;
export type CrossrefWork = z.infer<typeof CrossrefWorkSchema>;

export interface CrossrefLookupOptions {
  baseUrl?: string;
  /** Contact address sent with every request */
  mailto?: string;
  fetch?: typeof fetch;
}

export const DEFAULT_CROSSREF_BASE_URL = 'https://api.crossref.org';

function firstYear(...dates: Array<CrossrefDate | undefined>): string {
  for (const date of dates) {
    const year = date?.['date-parts']?.[0]?.[0];
    if (typeof year === 'number') return String(year);
  }
  return '';
}

/**
 * Map a Crossref work onto the lookup fields
 */
export function mapCrossrefWork(work: CrossrefWork): LookupResult {
  const authors = (work.author ?? [])
    .map((author) => author.name ?? [author.given, author.family].filter(Boolean).join(' '))
    .filter((name) => name.length > 0);

  return {
    title: work.title?.[0] ?? '',
    author: authors.join(', '),
    year: firstYear(work['published-print'], work['published-online'], work.issued),
    publisher: work.publisher ?? '',
    journal: work['container-title']?.[0] ?? '',
    volume: work.volume ?? '',
    issue: work.issue ?? '',
    page: work.page ?? '',
  };
}

export class CrossrefLookup implements BibliographicLookup {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: CrossrefLookupOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_CROSSREF_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string): Promise<LookupResult | null> {
    const url = new URL(`${this.baseUrl}/works`);
    url.searchParams.set('query', query);
    url.searchParams.set('rows', '1');
    if (this.options.mailto) url.searchParams.set('mailto', this.options.mailto);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      throw new LookupError(`Crossref request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new LookupError(`Crossref responded with HTTP ${response.status}`, response.status);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new LookupError('Crossref returned a response that is not JSON');
    }

    const parsed = CrossrefSearchResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new LookupError(`Unexpected Crossref response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const item = parsed.data.message?.items?.[0];
    if (!item) {
      return null;
    }

    return mapCrossrefWork(item);
  }
}

/**
 * Lookup that never matches, for runs with the lookup switched off
 */
export class NullLookup implements BibliographicLookup {
  async search(_query: string): Promise<LookupResult | null> {
    return null;
  }
}
