import { DatasetConfig, type DatasetSettings } from '../config/dataset.js';
import { ExtractionConfig, type ExtractionSettings } from '../config/extraction.js';
import { ScopusConfig, type ScopusSettings } from '../config/scopus.js';
import { MetadataExtractor } from '../extraction/MetadataExtractor.js';
import { ProviderFactory } from '../extraction/providers/ProviderFactory.js';
import { IndexVerifier } from '../indexing/IndexVerifier.js';
import { FixedDelayPolicy } from '../indexing/RateLimitPolicy.js';
import { ScopusClient } from '../indexing/ScopusClient.js';
import { ReferenceDataCache } from '../reference/ReferenceDataCache.js';
import { ReferenceDataStore } from '../reference/ReferenceDataStore.js';
import { EnrichmentPipeline } from './EnrichmentPipeline.js';
import { JournalAnalyzer } from './JournalAnalyzer.js';

export interface AnalyzerSettings {
  dataset: DatasetSettings;
  scopus: ScopusSettings;
  extraction: ExtractionSettings;
}

export function loadAnalyzerSettings(): AnalyzerSettings {
  return {
    dataset: DatasetConfig.getConfig(),
    scopus: ScopusConfig.getConfig(),
    extraction: ExtractionConfig.getConfig(),
  };
}

/**
 * Wire a JournalAnalyzer from settings (defaults to the environment)
 */
export function createJournalAnalyzer(settings: AnalyzerSettings = loadAnalyzerSettings()): JournalAnalyzer {
  const store = new ReferenceDataStore(settings.dataset);
  const cache = new ReferenceDataCache(() => store.load(), { ttlMs: settings.dataset.cacheTtlMs });

  const indexVerifier = new IndexVerifier(
    new ScopusClient({ apiUrl: settings.scopus.apiUrl, timeoutMs: settings.scopus.timeoutMs }),
    new FixedDelayPolicy(settings.scopus.minIntervalMs)
  );
  const metadataExtractor = new MetadataExtractor(
    ProviderFactory.createClient(settings.extraction.provider, settings.extraction.model)
  );

  return new JournalAnalyzer(cache, new EnrichmentPipeline(indexVerifier, metadataExtractor));
}
