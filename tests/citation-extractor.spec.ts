import { test, expect } from '@playwright/test';
import {
  LanguageModelCitationExtractor,
  parseExtractionResponse,
  type TextGenerator,
} from '../src/services/citation-extractor.js';
import { ExtractionError } from '../src/utils/errors.js';

class ScriptedGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly reply: () => Promise<string>) {}

  async generate(request: { system: string; prompt: string }): Promise<string> {
    this.prompts.push(request.prompt);
    return this.reply();
  }
}

test.describe('parseExtractionResponse', () => {
  test('parses a plain JSON object', () => {
    expect(parseExtractionResponse('{"title": "Deep Work", "author": "Cal Newport", "year": "2016"}')).toEqual({
      title: 'Deep Work',
      author: 'Cal Newport',
      year: '2016',
    });
  });

  test('unwraps a markdown code fence', () => {
    const raw = '```json\n{"title": "Deep Work", "publisher": "Grand Central"}\n```';
    expect(parseExtractionResponse(raw)).toEqual({ title: 'Deep Work', publisher: 'Grand Central' });
  });

  test('coerces numbers to strings and drops nulls and unknown keys', () => {
    expect(parseExtractionResponse('{"year": 2016, "journal": null, "doi": "10.1000/x"}')).toEqual({ year: '2016' });
  });

  test('joins an author array into a comma-separated list', () => {
    expect(parseExtractionResponse('{"author": ["Ann Author", " Ben Writer "], "title": "Deep Work", "year": 2016}')).toEqual({
      author: 'Ann Author, Ben Writer',
      title: 'Deep Work',
      year: '2016',
    });
  });

  test('rejects anything that is not a JSON object of strings', () => {
    expect(parseExtractionResponse('Deep Work by Cal Newport (2016)')).toBeNull();
    expect(parseExtractionResponse('["Deep Work"]')).toBeNull();
    expect(parseExtractionResponse('{"title": ["Deep", "Work"]}')).toBeNull();
    expect(parseExtractionResponse('{"title": "Deep Work"')).toBeNull();
  });
});

test.describe('LanguageModelCitationExtractor', () => {
  test('returns the parsed fields and passes the filename to the model', async () => {
    const generator = new ScriptedGenerator(async () => '{"title": "Deep Work"}');
    const outcome = await new LanguageModelCitationExtractor(generator).extract('page text', 'scan-001.pdf');

    expect(outcome).toEqual({ result: { title: 'Deep Work' }, parsed: true, raw: '{"title": "Deep Work"}' });
    expect(generator.prompts[0]).toContain('The original filename is "scan-001.pdf".');
    expect(generator.prompts[0]).toContain('page text');
  });

  test('reports an unparseable reply as an empty, unparsed result', async () => {
    const generator = new ScriptedGenerator(async () => 'Sorry, I cannot help with that.');
    const outcome = await new LanguageModelCitationExtractor(generator).extract('page text', 'scan-001.pdf');

    expect(outcome).toEqual({ result: {}, parsed: false, raw: 'Sorry, I cannot help with that.' });
  });

  test('wraps a failed model call in an ExtractionError', async () => {
    const generator = new ScriptedGenerator(async () => {
      throw new Error('API key not valid');
    });
    const extractor = new LanguageModelCitationExtractor(generator);

    const error = await extractor.extract('page text', 'scan-001.pdf').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toHaveProperty('message', 'Model call failed for scan-001.pdf: API key not valid');
  });
});
