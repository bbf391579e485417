import type { Credentials, JournalRecord } from '../core/types.js';
import type { ReferenceDataCache } from '../reference/ReferenceDataCache.js';
import { listCategories, selectByCategory, selectByName } from '../selection/candidateSelector.js';
import { createLogger } from '../utils/logger.js';
import type { EnrichmentPipeline, EnrichmentRun, EnrichmentRunOptions } from './EnrichmentPipeline.js';

const logger = createLogger('JournalAnalyzer');

/**
 * Journal Analyzer
 *
 * Entry point for a query: loads reference data through the cache, selects
 * candidates and enriches them. A DataUnavailableError from the cache
 * propagates before any journal is processed.
 */
export class JournalAnalyzer {
  constructor(
    private cache: ReferenceDataCache,
    private pipeline: EnrichmentPipeline
  ) {}

  async listCategories(): Promise<string[]> {
    const { journals } = await this.cache.get();
    return listCategories(journals);
  }

  async analyzeCategory(
    category: string,
    credentials: Credentials,
    options?: EnrichmentRunOptions
  ): Promise<EnrichmentRun> {
    const { journals, registry } = await this.cache.get();
    const candidates = selectByCategory(journals, category);
    logger.info('Candidates selected by category', { category, candidates: candidates.length });

    return this.pipeline.run(candidates, registry, credentials, options);
  }

  async analyzeByName(
    query: string,
    credentials: Credentials,
    options?: EnrichmentRunOptions
  ): Promise<EnrichmentRun> {
    const { journals, registry } = await this.cache.get();
    const candidates: JournalRecord[] = selectByName(journals, query);
    if (candidates.length === 0) {
      logger.warn('No journals matched the name query', { query });
    } else {
      logger.info('Candidates selected by name', { query, candidates: candidates.length });
    }

    return this.pipeline.run(candidates, registry, credentials, options);
  }
}
