/**
 * Agent configuration for the citation extractor
 */

export interface AgentOptions {
  name: string;
  model: string;
  temperature?: number;
  systemPrompt: string;
}

export const DEFAULT_EXTRACTION_MODEL = 'googleai/gemini-2.5-flash';

export const AGENT_CONFIGS = {
  /**
   * Citation Extractor Agent
   * Reads the first pages of a document and returns its bibliographic fields as JSON
   */
  citationExtractor: {
    name: 'citation-extractor',
    model: DEFAULT_EXTRACTION_MODEL,
    temperature: 0.0,
    systemPrompt: 'You are an expert at extracting bibliographic information. Always respond with valid JSON.',
  } satisfies AgentOptions,
};

/**
 * User prompt for the citation extractor
 */
export function buildExtractionPrompt(text: string, filename: string): string {
  return `Extract bibliographic information from the provided text and return it in valid JSON format.
Use exactly this JSON structure:
{
  "title": "extracted title",
  "author": "extracted author names, separated by commas",
  "year": "publication year",
  "publisher": "publisher name",
  "journal": "journal title",
  "other_info": "any other relevant information"
}
Use an empty string for any field the text does not support. Return only the JSON object.

The original filename is "${filename}".

Text from the first pages:
${text}`;
}
