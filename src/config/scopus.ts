import dotenv from 'dotenv';
import { readIntEnv, readOptionalEnv, readStringEnv } from './env.js';
import { logger } from '../utils/logger.js';

dotenv.config();

export const SCOPUS_SERIAL_TITLE_URL = 'https://api.elsevier.com/content/serial/title';

export const DEFAULT_SCOPUS_TIMEOUT_MS = 30_000;

export interface ScopusSettings {
  apiUrl: string;
  /** Pause before every request, per API key */
  minIntervalMs: number;
  timeoutMs: number;
  apiKey?: string;
}

/**
 * Scopus Configuration
 *
 * Elsevier serial title endpoint used for index verification.
 * The API key is optional: without it index status stays "unknown".
 */
export class ScopusConfig {
  static getConfig(): ScopusSettings {
    return {
      apiUrl: readStringEnv('SCOPUS_API_URL', SCOPUS_SERIAL_TITLE_URL),
      minIntervalMs: readIntEnv('SCOPUS_MIN_INTERVAL_MS', 500),
      timeoutMs: readIntEnv('SCOPUS_TIMEOUT_MS', DEFAULT_SCOPUS_TIMEOUT_MS),
      apiKey: readOptionalEnv('ELSEVIER_API_KEY'),
    };
  }

  static validate(): boolean {
    try {
      const { apiKey, ...config } = this.getConfig();
      logger.info('Scopus configuration valid', { ...config, apiKeyPresent: Boolean(apiKey) });
      return true;
    } catch (error) {
      logger.error('Scopus configuration invalid', { error: String(error) });
      return false;
    }
  }
}
