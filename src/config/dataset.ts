import path from 'path';
import dotenv from 'dotenv';
import { readIntEnv, readStringEnv } from './env.js';
import { logger } from '../utils/logger.js';

dotenv.config();

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export interface DatasetSettings {
  journalsPath: string;
  predatoryJournalsPath: string;
  predatoryPublishersPath: string;
  cacheTtlMs: number;
}

/**
 * Dataset Configuration
 *
 * Locations of the SCImago export and the two predatory registries,
 * resolved against the working directory.
 */
export class DatasetConfig {
  static getConfig(): DatasetSettings {
    return {
      journalsPath: path.resolve(readStringEnv('JOURNALS_PATH', 'data/scimago_journals.csv')),
      predatoryJournalsPath: path.resolve(
        readStringEnv('PREDATORY_JOURNALS_PATH', 'data/predatory_journals.txt')
      ),
      predatoryPublishersPath: path.resolve(
        readStringEnv('PREDATORY_PUBLISHERS_PATH', 'data/predatory_publishers.txt')
      ),
      cacheTtlMs: readIntEnv('REFERENCE_CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS),
    };
  }

  static validate(): boolean {
    try {
      const config = this.getConfig();
      logger.info('Dataset configuration valid', { ...config });
      return true;
    } catch (error) {
      logger.error('Dataset configuration invalid', { error: String(error) });
      return false;
    }
  }
}
