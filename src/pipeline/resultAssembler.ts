import { TriState } from '../core/TriState.js';
import type {
  EnrichmentResult,
  ExtractedMetadata,
  JournalRecord,
  PredatoryMatch,
} from '../core/types.js';
import { unknownMetadata } from '../extraction/responseParser.js';

/**
 * Outputs contributed for one journal. Anything omitted is recorded as
 * UNKNOWN (index, metadata) or false (predatory flags).
 */
export interface EnrichmentParts {
  predatory?: PredatoryMatch;
  indexed?: TriState;
  metadata?: ExtractedMetadata;
}

export function assembleResult(record: JournalRecord, parts: EnrichmentParts = {}): EnrichmentResult {
  const metadata = parts.metadata ?? unknownMetadata();

  return {
    title: record.title,
    issn: record.issn,
    publisher: record.publisher,
    categories: record.categories,
    indexed: parts.indexed ?? TriState.UNKNOWN,
    predatoryJournal: parts.predatory?.journal ?? false,
    predatoryPublisher: parts.predatory?.publisher ?? false,
    fee: metadata.fee,
    frequency: metadata.frequency,
    openAccess: metadata.openAccess,
    hybrid: metadata.hybrid,
  };
}

/**
 * One result per candidate, in candidate order
 */
export function assembleResultTable(
  candidates: readonly JournalRecord[],
  partsFor: (record: JournalRecord, index: number) => EnrichmentParts
): EnrichmentResult[] {
  return candidates.map((record, index) => assembleResult(record, partsFor(record, index)));
}
