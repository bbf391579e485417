import OpenAI from 'openai';
import { DEFAULT_MODELS } from '../../config/extraction.js';
import type { ExtractionClient } from '../ExtractionClient.js';

/**
 * OpenAI Extraction Client
 *
 * Responses API with a plain-text reply.
 */
export class OpenAIExtractionClient implements ExtractionClient {
  readonly provider = 'openai' as const;

  constructor(
    readonly model: string = DEFAULT_MODELS.openai,
    private timeoutMs: number = 60_000
  ) {}

  async generate(prompt: string, apiKey: string): Promise<string> {
    const client = new OpenAI({
      apiKey,
      timeout: this.timeoutMs,
      maxRetries: 2,
    });

    const response = await client.responses.create({
      model: this.model,
      input: prompt,
    });

    // SDK helper concatenates all text segments
    return response.output_text ?? '';
  }
}
