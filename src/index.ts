export { TriState, triStateFromBoolean, triStateToBoolean } from './core/TriState.js';
export type {
  Credentials,
  EnrichmentResult,
  ExtractedMetadata,
  JournalRecord,
  PredatoryMatch,
  PredatoryRegistry,
  ReferenceData,
} from './core/types.js';
export {
  ConfigurationError,
  DataUnavailableError,
  ExtractionError,
  IndexServiceError,
  JournalPipelineError,
} from './core/errors.js';

export { ReferenceDataStore, parseJournalTable } from './reference/ReferenceDataStore.js';
export { ReferenceDataCache } from './reference/ReferenceDataCache.js';
export { dedupeByTitle, listCategories, selectByCategory, selectByName } from './selection/candidateSelector.js';
export { checkPredatory } from './predatory/predatoryMatcher.js';
export { ScopusClient } from './indexing/ScopusClient.js';
export { IndexVerifier } from './indexing/IndexVerifier.js';
export { FixedDelayPolicy, NO_DELAY, type RateLimitPolicy } from './indexing/RateLimitPolicy.js';
export type { ExtractionClient } from './extraction/ExtractionClient.js';
export { MetadataExtractor } from './extraction/MetadataExtractor.js';
export { ProviderFactory } from './extraction/providers/ProviderFactory.js';
export { buildExtractionPrompt } from './extraction/prompt.js';
export { parseExtractionResponse } from './extraction/responseParser.js';
export { assembleResult, assembleResultTable, type EnrichmentParts } from './pipeline/resultAssembler.js';
export { EnrichmentPipeline, type EnrichmentRun, type EnrichmentRunOptions } from './pipeline/EnrichmentPipeline.js';
export { JournalAnalyzer } from './pipeline/JournalAnalyzer.js';
export { createJournalAnalyzer, loadAnalyzerSettings } from './pipeline/factory.js';
export { summarizeResults, type RunSummary } from './pipeline/summary.js';
