import { GoogleGenerativeAI } from '@google/generative-ai';
import { DEFAULT_MODELS } from '../../config/extraction.js';
import type { ExtractionClient } from '../ExtractionClient.js';

/**
 * Gemini Extraction Client
 *
 * Google Generative AI `generateContent` with a plain-text reply.
 */
export class GeminiExtractionClient implements ExtractionClient {
  readonly provider = 'gemini' as const;

  constructor(readonly model: string = DEFAULT_MODELS.gemini) {}

  async generate(prompt: string, apiKey: string): Promise<string> {
    const genAI = new GoogleGenerativeAI(apiKey);
    const model = genAI.getGenerativeModel({
      model: this.model,
      generationConfig: { temperature: 0 },
    });

    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}
