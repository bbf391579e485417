import Anthropic from '@anthropic-ai/sdk';
import { DEFAULT_MODELS } from '../../config/extraction.js';
import type { ExtractionClient } from '../ExtractionClient.js';

/**
 * Claude Extraction Client
 *
 * Anthropic Messages API; text blocks of the reply are concatenated.
 */
export class ClaudeExtractionClient implements ExtractionClient {
  readonly provider = 'anthropic' as const;

  constructor(
    readonly model: string = DEFAULT_MODELS.anthropic,
    private maxTokens: number = 512
  ) {}

  async generate(prompt: string, apiKey: string): Promise<string> {
    const client = new Anthropic({
      apiKey,
      timeout: 60_000,
      maxRetries: 2,
    });

    const response = await client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      messages: [{ role: 'user', content: prompt }],
    });

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }
    return content;
  }
}
