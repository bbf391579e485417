import { randomUUID } from 'crypto';
import { errorMessage } from '../core/errors.js';
import { triStateFromBoolean, TriState } from '../core/TriState.js';
import type {
  Credentials,
  EnrichmentResult,
  JournalRecord,
  PredatoryRegistry,
} from '../core/types.js';
import type { MetadataExtractor } from '../extraction/MetadataExtractor.js';
import type { IndexVerifier } from '../indexing/IndexVerifier.js';
import { checkPredatory } from '../predatory/predatoryMatcher.js';
import { RunLogger } from '../utils/logger.js';
import { assembleResultTable, type EnrichmentParts } from './resultAssembler.js';
import { summarizeResults, type RunSummary } from './summary.js';

export interface EnrichmentProgress {
  completed: number;
  total: number;
  title: string;
}

export interface EnrichmentRunOptions {
  runId?: string;
  onProgress?: (progress: EnrichmentProgress) => void;
}

export interface EnrichmentRun {
  runId: string;
  results: EnrichmentResult[];
  summary: RunSummary;
}

/**
 * Enrichment Pipeline
 *
 * Enriches candidates one at a time: predatory check, index verification,
 * metadata extraction, then assembly. Remote calls are strictly sequential so
 * the index rate limit needs no shared limiter. A journal is never dropped:
 * failures become UNKNOWN / false fields in its result.
 */
export class EnrichmentPipeline {
  constructor(
    private indexVerifier: IndexVerifier,
    private metadataExtractor: MetadataExtractor
  ) {}

  /**
   * Collect the outputs of every component for one journal.
   * Lookups without a credential (absent or blank) are skipped and stay UNKNOWN.
   */
  async enrichJournal(
    record: JournalRecord,
    registry: PredatoryRegistry,
    credentials: Credentials
  ): Promise<EnrichmentParts> {
    const parts: EnrichmentParts = {
      predatory: checkPredatory(record.title, record.publisher, registry),
    };

    const scopusApiKey = credentials.scopusApiKey?.trim();
    parts.indexed = scopusApiKey
      ? triStateFromBoolean(await this.indexVerifier.verify(record.title, scopusApiKey))
      : TriState.UNKNOWN;

    const extractionApiKey = credentials.extractionApiKey?.trim();
    if (extractionApiKey) {
      parts.metadata = await this.metadataExtractor.extract(record.title, extractionApiKey);
    }

    return parts;
  }

  async run(
    candidates: readonly JournalRecord[],
    registry: PredatoryRegistry,
    credentials: Credentials,
    options: EnrichmentRunOptions = {}
  ): Promise<EnrichmentRun> {
    const runId = options.runId ?? randomUUID().slice(0, 8);
    const runLogger = new RunLogger(runId);
    const start = Date.now();

    runLogger.started({
      candidates: candidates.length,
      indexVerification: Boolean(credentials.scopusApiKey?.trim()),
      metadataExtraction: Boolean(credentials.extractionApiKey?.trim()),
      extractionProvider: this.metadataExtractor.provider,
    });

    const collected: EnrichmentParts[] = [];
    for (const record of candidates) {
      let parts: EnrichmentParts;
      try {
        parts = await this.enrichJournal(record, registry, credentials);
      } catch (error) {
        runLogger.warn('Enrichment failed, recording unknown fields', {
          journal: record.title,
          error: errorMessage(error),
        });
        parts = { predatory: checkPredatory(record.title, record.publisher, registry) };
      }

      collected.push(parts);
      options.onProgress?.({ completed: collected.length, total: candidates.length, title: record.title });
    }

    const results = assembleResultTable(candidates, (_record, index) => collected[index]);
    const summary = summarizeResults(results, Date.now() - start);
    runLogger.completed({ ...summary });

    return { runId, results, summary };
  }
}
