import { describe, expect, it, vi } from 'vitest';
import { DataUnavailableError } from '../core/errors.js';
import { TriState } from '../core/TriState.js';
import type { ReferenceData } from '../core/types.js';
import type { ExtractionClient } from '../extraction/ExtractionClient.js';
import { MetadataExtractor } from '../extraction/MetadataExtractor.js';
import { IndexVerifier } from '../indexing/IndexVerifier.js';
import { NO_DELAY } from '../indexing/RateLimitPolicy.js';
import { ScopusClient, type FetchFn } from '../indexing/ScopusClient.js';
import { ReferenceDataCache } from '../reference/ReferenceDataCache.js';
import { EnrichmentPipeline } from './EnrichmentPipeline.js';
import { JournalAnalyzer } from './JournalAnalyzer.js';

const DATA: ReferenceData = {
  journals: [
    { title: 'Applied Computing Letters', issn: '1', publisher: 'P', categories: 'Computer Science (Q1); Software (Q2)' },
    { title: 'Marine Ecology Review', issn: '2', publisher: 'P', categories: 'Ecology (Q2)' },
    { title: 'Applied Computing Letters', issn: '3', publisher: 'P', categories: 'Computer Science (Q2)' },
  ],
  registry: { journals: new Set(), publishers: new Set(['p']) },
  loadedAt: 0,
};

function createAnalyzer(loader: () => Promise<ReferenceData>) {
  const fetchFn = vi.fn<FetchFn>(
    async () => new Response(JSON.stringify({ 'serial-metadata-response': { entry: [{}] } }))
  );
  const generate = vi.fn<ExtractionClient['generate']>(async () => '');
  const pipeline = new EnrichmentPipeline(
    new IndexVerifier(new ScopusClient({ fetch: fetchFn }), NO_DELAY),
    new MetadataExtractor({ provider: 'gemini', model: 'test-model', generate })
  );
  const analyzer = new JournalAnalyzer(new ReferenceDataCache(loader), pipeline);
  return { analyzer, fetchFn };
}

describe('JournalAnalyzer', () => {
  it('enriches the deduplicated journals of a category', async () => {
    const { analyzer, fetchFn } = createAnalyzer(async () => DATA);

    const run = await analyzer.analyzeCategory('computer science', { scopusApiKey: 'test-key' });

    expect(run.results).toHaveLength(1);
    expect(run.results[0]).toMatchObject({
      title: 'Applied Computing Letters',
      issn: '1',
      indexed: TriState.TRUE,
      predatoryPublisher: true,
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('returns an empty run when no title matches', async () => {
    const { analyzer } = createAnalyzer(async () => DATA);

    const run = await analyzer.analyzeByName('quantum', {});

    expect(run.results).toEqual([]);
    expect(run.summary.total).toBe(0);
  });

  it('lists categories from the cached table', async () => {
    const loader = vi.fn(async () => DATA);
    const { analyzer } = createAnalyzer(loader);

    await expect(analyzer.listCategories()).resolves.toEqual([
      'Computer Science (Q1)',
      'Computer Science (Q2)',
      'Ecology (Q2)',
      'Software (Q2)',
    ]);
    await analyzer.analyzeByName('marine', {});
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('aborts before any lookup when reference data is unavailable', async () => {
    const { analyzer, fetchFn } = createAnalyzer(async () => {
      throw new DataUnavailableError('journals.csv', 'file is empty');
    });

    await expect(analyzer.analyzeCategory('Ecology', { scopusApiKey: 'test-key' })).rejects.toBeInstanceOf(
      DataUnavailableError
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
