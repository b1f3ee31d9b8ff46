import { test, expect } from '@playwright/test';
import { loadConfig, parseNumericOverride } from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';

test.describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      model: 'googleai/gemini-2.5-flash',
      maxPages: 1,
      maxFilenameLength: 225,
      crossref: { baseUrl: 'https://api.crossref.org', mailto: undefined },
    });
  });

  test('prefers GEMINI_API_KEY and coerces numbers', () => {
    const config = loadConfig({
      GEMINI_API_KEY: ' test-secret ',
      GOOGLE_API_KEY: 'other-secret',
      MAX_PAGES: '3',
      MAX_FILENAME_LENGTH: '120',
      CROSSREF_MAILTO: 'test@example.com',
    });

    expect(config.apiKey).toBe('test-secret');
    expect(config.maxPages).toBe(3);
    expect(config.maxFilenameLength).toBe(120);
    expect(config.crossref.mailto).toBe('test@example.com');
  });

  test('falls back to GOOGLE_API_KEY and ignores blank keys', () => {
    expect(loadConfig({ GEMINI_API_KEY: '  ', GOOGLE_API_KEY: 'test-secret' }).apiKey).toBe('test-secret');
  });

  test('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ MAX_PAGES: '0', MAX_FILENAME_LENGTH: '5' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toHaveProperty('issues');
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0].startsWith('MAX_PAGES: ')).toBe(true);
      expect(caught.issues[1].startsWith('MAX_FILENAME_LENGTH: ')).toBe(true);
    }
  });
});

test.describe('parseNumericOverride', () => {
  test('accepts values inside the environment bounds', () => {
    expect(parseNumericOverride('MAX_FILENAME_LENGTH', '120', '--max-length')).toBe(120);
    expect(parseNumericOverride('MAX_PAGES', '2', '--max-pages')).toBe(2);
  });

  test('rejects values the environment variable would reject', () => {
    for (const value of ['3', '1000', 'abc']) {
      let caught: unknown;
      try {
        parseNumericOverride('MAX_FILENAME_LENGTH', value, '--max-length');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.issues[0].startsWith('--max-length: ')).toBe(true);
      }
    }
  });
});
