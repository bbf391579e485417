import { TriState } from '../core/TriState.js';
import type { EnrichmentResult } from '../core/types.js';

export interface RunSummary {
  total: number;
  indexed: Record<TriState, number>;
  predatoryJournals: number;
  predatoryPublishers: number;
  openAccess: number;
  durationMs: number;
}

export function summarizeResults(results: readonly EnrichmentResult[], durationMs: number): RunSummary {
  const summary: RunSummary = {
    total: results.length,
    indexed: {
      [TriState.TRUE]: 0,
      [TriState.FALSE]: 0,
      [TriState.UNKNOWN]: 0,
    },
    predatoryJournals: 0,
    predatoryPublishers: 0,
    openAccess: 0,
    durationMs,
  };

  for (const result of results) {
    summary.indexed[result.indexed]++;
    if (result.predatoryJournal) summary.predatoryJournals++;
    if (result.predatoryPublisher) summary.predatoryPublishers++;
    if (result.openAccess === TriState.TRUE) summary.openAccess++;
  }

  return summary;
}
