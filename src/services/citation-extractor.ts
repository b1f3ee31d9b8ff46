/**
 * Language-model citation extractor
 *
 * Sends the first pages of text to a Gemini model through Genkit and parses
 * the reply into bibliographic fields. A reply that is not a JSON object is
 * reported as unparsed and never partially trusted.
 */

import { genkit, z, type Genkit } from 'genkit';
import { googleAI } from '@genkit-ai/googleai';
import { AGENT_CONFIGS, buildExtractionPrompt, type AgentOptions } from '../agents/config.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import {
  BIBLIOGRAPHIC_FIELDS,
  type CitationExtractor,
  type ExtractionOutcome,
  type ExtractionResult,
} from '../types/index.js';

/**
 * Minimal text-generation handle, so the extractor can run without a live model
 */
export interface TextGenerator {
  generate(request: { system: string; prompt: string }): Promise<string>;
}

// Models return years as numbers and missing fields as null
const FieldValueSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

// Author lists often come back as arrays of names
const AuthorValueSchema = z
  .union([z.array(z.string()), z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    if (Array.isArray(value)) return value.map((name) => name.trim()).filter(Boolean).join(', ');
    return String(value);
  });

export const ExtractionResponseSchema = z.object({
  title: FieldValueSchema,
  author: AuthorValueSchema,
  year: FieldValueSchema,
  publisher: FieldValueSchema,
  journal: FieldValueSchema,
  other_info: FieldValueSchema,
});

const CODE_FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Parse a model reply into an extraction result.
 * Returns null when the reply is not a JSON object of the expected shape.
 */
export function parseExtractionResponse(raw: string): ExtractionResult | null {
  const trimmed = raw.trim();
  const body = CODE_FENCE_PATTERN.exec(trimmed)?.[1] ?? trimmed;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = ExtractionResponseSchema.safeParse(json);
  if (!parsed.success) return null;

  const result: ExtractionResult = {};
  for (const field of BIBLIOGRAPHIC_FIELDS) {
    const value = parsed.data[field];
    if (value !== undefined) result[field] = value;
  }
  return result;
}

export class LanguageModelCitationExtractor implements CitationExtractor {
  constructor(
    private readonly generator: TextGenerator,
    private readonly agent: AgentOptions = AGENT_CONFIGS.citationExtractor
  ) {}

  async extract(text: string, filename: string): Promise<ExtractionOutcome> {
    let raw: string;
    try {
      raw = await this.generator.generate({
        system: this.agent.systemPrompt,
        prompt: buildExtractionPrompt(text, filename),
      });
    } catch (error) {
      throw new ExtractionError(`Model call failed for ${filename}: ${errorMessage(error)}`, { cause: error });
    }

    const result = parseExtractionResponse(raw);
    return result ? { result, parsed: true, raw } : { result: {}, parsed: false, raw };
  }
}

export interface GenkitGeneratorOptions {
  apiKey?: string;
  model: string;
  temperature?: number;
}

/**
 * Genkit instance configured with the Google AI plugin
 */
export function createGenkit(options: GenkitGeneratorOptions): Genkit {
  return genkit({
    plugins: [googleAI(options.apiKey ? { apiKey: options.apiKey } : undefined)],
    model: options.model,
  });
}

/**
 * TextGenerator backed by a Genkit instance
 */
export function createGenkitGenerator(ai: Genkit, options: GenkitGeneratorOptions): TextGenerator {
  return {
    async generate({ system, prompt }) {
      const response = await ai.generate({
        model: options.model,
        system,
        prompt,
        config: { temperature: options.temperature ?? AGENT_CONFIGS.citationExtractor.temperature },
      });
      return response.text;
    },
  };
}
