import type { ExtractionProviderType } from '../config/extraction.js';

/**
 * Extraction Client
 *
 * Sends one free-text prompt to an LLM provider and returns its text reply.
 * The API key is passed per call and never kept on the client.
 */
export interface ExtractionClient {
  readonly provider: ExtractionProviderType;
  readonly model: string;

  generate(prompt: string, apiKey: string): Promise<string>;
}
