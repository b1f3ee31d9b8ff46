/**
 * Filename Builder
 *
 * Composes "Author.Year.Title" from a reconciled record. The result carries
 * no extension; the sanitizer appends ".pdf".
 */

export const DEFAULT_MAX_FILENAME_LENGTH = 225;
export const COMPONENT_SEPARATOR = '.';

/**
 * "J. Smith, A. Lee" -> "J. Smith et al"
 */
export function formatAuthorComponent(author: string): string {
  const names = author
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  if (names.length === 0) return '';
  return names.length > 1 ? `${names[0]} et al` : names[0];
}

/**
 * Digits only, at most four of them
 */
export function formatYearComponent(year: string): string {
  return year.replace(/\D/g, '').slice(0, 4);
}

export function formatTitleComponent(title: string): string {
  return title.replace(/\s+/g, ' ').trim();
}

/**
 * Cut `value` to `maxLength` characters without splitting a word or a
 * "."-separated component. A single word longer than the budget is cut hard.
 */
export function truncateAtWordBoundary(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;

  let cut = value.slice(0, maxLength);
  if (!/[\s.]/.test(value.charAt(maxLength))) {
    const lastBoundary = cut.search(/[\s.][^\s.]*$/);
    if (lastBoundary > 0) cut = cut.slice(0, lastBoundary);
  }

  // No dangling separator once the tail is gone
  return cut.replace(/[\s.]+$/, '');
}

/**
 * Join author, year and title with "." skipping empty components,
 * bounded by `maxLength` characters.
 */
export function buildFilename(
  author: string,
  year: string,
  title: string,
  maxLength: number = DEFAULT_MAX_FILENAME_LENGTH
): string {
  const components = [formatAuthorComponent(author), formatYearComponent(year), formatTitleComponent(title)].filter(
    (component) => component.length > 0
  );

  return truncateAtWordBoundary(components.join(COMPONENT_SEPARATOR), maxLength);
}
