/**
 * Error types raised by the renamer and its collaborators
 */

export class DocumentSourceError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocumentSourceError';
  }
}

export class DocumentNotFoundError extends DocumentSourceError {
  constructor(path: string) {
    super(`File not found: ${path}`, path);
    this.name = 'DocumentNotFoundError';
  }
}

/** The file exists but is not a PDF the parser can open (corrupt, encrypted, truncated) */
export class DocumentUnreadableError extends DocumentSourceError {
  constructor(path: string, cause?: unknown) {
    super(`Unreadable or corrupt PDF: ${path} (${errorMessage(cause)})`, path, { cause });
    this.name = 'DocumentUnreadableError';
  }
}

export class DocumentReadError extends DocumentSourceError {
  constructor(path: string, cause?: unknown) {
    super(`Failed to read ${path}: ${errorMessage(cause)}`, path, { cause });
    this.name = 'DocumentReadError';
  }
}

/** The model call itself failed (authentication, quota, network) */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export class LookupError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'LookupError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
