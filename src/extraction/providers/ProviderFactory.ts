import type { ExtractionProviderType } from '../../config/extraction.js';
import { DEFAULT_MODELS } from '../../config/extraction.js';
import { createLogger } from '../../utils/logger.js';
import type { ExtractionClient } from '../ExtractionClient.js';
import { ClaudeExtractionClient } from './ClaudeExtractionClient.js';
import { GeminiExtractionClient } from './GeminiExtractionClient.js';
import { OpenAIExtractionClient } from './OpenAIExtractionClient.js';

const logger = createLogger('ProviderFactory');

/**
 * Provider Factory
 *
 * Creates the extraction client for the configured provider
 */
export class ProviderFactory {
  static createClient(provider: ExtractionProviderType, model?: string): ExtractionClient {
    const resolvedModel = model || DEFAULT_MODELS[provider];
    logger.debug('Creating extraction client', { provider, model: resolvedModel });

    switch (provider) {
      case 'gemini':
        return new GeminiExtractionClient(resolvedModel);
      case 'openai':
        return new OpenAIExtractionClient(resolvedModel);
      case 'anthropic':
        return new ClaudeExtractionClient(resolvedModel);
    }
  }
}
