/**
 * Runtime configuration, read from the environment (.env is loaded by the CLI)
 */

import { z } from 'genkit';
import { DEFAULT_EXTRACTION_MODEL } from './agents/config.js';
import { DEFAULT_CROSSREF_BASE_URL } from './services/crossref-lookup.js';
import { DEFAULT_MAX_FILENAME_LENGTH } from './utils/filename-builder.js';
import { DEFAULT_MAX_PAGES } from './modules/batch-renamer.js';
import { ConfigError } from './utils/errors.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const ConfigSchema = z.object({
  GEMINI_API_KEY: optionalString,
  GOOGLE_API_KEY: optionalString,
  EXTRACTION_MODEL: z.string().default(DEFAULT_EXTRACTION_MODEL),
  MAX_PAGES: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
  // Room for "unnamed_document" and a collision suffix
  MAX_FILENAME_LENGTH: z.coerce.number().int().min(20).max(250).default(DEFAULT_MAX_FILENAME_LENGTH),
  CROSSREF_BASE_URL: z.string().url().default(DEFAULT_CROSSREF_BASE_URL),
  CROSSREF_MAILTO: optionalString,
});

export interface RenamerConfig {
  apiKey?: string;
  model: string;
  maxPages: number;
  maxFilenameLength: number;
  crossref: {
    baseUrl: string;
    mailto?: string;
  };
}

/**
 * Validate `env` and shape it into a RenamerConfig
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RenamerConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    apiKey: vars.GEMINI_API_KEY ?? vars.GOOGLE_API_KEY,
    model: vars.EXTRACTION_MODEL,
    maxPages: vars.MAX_PAGES,
    maxFilenameLength: vars.MAX_FILENAME_LENGTH,
    crossref: {
      baseUrl: vars.CROSSREF_BASE_URL,
      mailto: vars.CROSSREF_MAILTO,
    },
  };
}

type NumericSetting = 'MAX_PAGES' | 'MAX_FILENAME_LENGTH';

/**
 * Validate a command-line override against the same bounds as its environment variable
 * @throws ConfigError naming the flag
 */
export function parseNumericOverride(setting: NumericSetting, value: string, flag: string): number {
  const parsed = ConfigSchema.shape[setting].safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${flag}: ${issue.message}`));
  }
  return parsed.data;
}
