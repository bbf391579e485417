import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { readOptionalEnv, readStringEnv } from './env.js';
import { logger } from '../utils/logger.js';

dotenv.config();

export const EXTRACTION_PROVIDERS = ['gemini', 'openai', 'anthropic'] as const;

export type ExtractionProviderType = (typeof EXTRACTION_PROVIDERS)[number];

export const DEFAULT_MODELS: Record<ExtractionProviderType, string> = {
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-sonnet-4-5',
};

export interface ExtractionSettings {
  provider: ExtractionProviderType;
  model: string;
  apiKey?: string;
}

export function isExtractionProvider(value: string): value is ExtractionProviderType {
  return (EXTRACTION_PROVIDERS as readonly string[]).includes(value);
}

export function parseExtractionProvider(value: string): ExtractionProviderType {
  const normalized = value.trim().toLowerCase();
  if (!isExtractionProvider(normalized)) {
    throw new ConfigurationError(
      `Unknown extraction provider "${value}". Valid options: ${EXTRACTION_PROVIDERS.join(', ')}`
    );
  }
  return normalized;
}

/**
 * Extraction Configuration
 *
 * Which LLM provider infers APC, frequency and open-access status.
 * Defaults to Gemini.
 */
export class ExtractionConfig {
  static getConfig(): ExtractionSettings {
    const provider = parseExtractionProvider(readStringEnv('EXTRACTION_PROVIDER', 'gemini'));
    return {
      provider,
      model: readStringEnv('EXTRACTION_MODEL', DEFAULT_MODELS[provider]),
      apiKey: readOptionalEnv('EXTRACTION_API_KEY'),
    };
  }

  static validate(): boolean {
    try {
      const { apiKey, ...config } = this.getConfig();
      logger.info('Extraction configuration valid', { ...config, apiKeyPresent: Boolean(apiKey) });
      return true;
    } catch (error) {
      logger.error('Extraction configuration invalid', { error: String(error) });
      return false;
    }
  }
}
