import type { TriState } from './TriState.js';

/**
 * Journal Record
 *
 * One row of the reference dataset. `title` is the natural key used for
 * deduplication; `categories` keeps the raw semicolon-delimited tag list.
 */
export interface JournalRecord {
  readonly title: string;
  readonly issn: string;
  readonly publisher: string;
  readonly categories: string;
}

/**
 * Predatory Registry
 *
 * Lower-cased, trimmed blocklist entries. Membership only.
 */
export interface PredatoryRegistry {
  readonly journals: ReadonlySet<string>;
  readonly publishers: ReadonlySet<string>;
}

export interface ReferenceData {
  readonly journals: readonly JournalRecord[];
  readonly registry: PredatoryRegistry;
  /** Epoch milliseconds at which the sources were read */
  readonly loadedAt: number;
}

export interface PredatoryMatch {
  journal: boolean;
  publisher: boolean;
}

/**
 * Fields inferred by the metadata extractor. `fee` and `frequency` are free
 * text as returned by the model.
 */
export interface ExtractedMetadata {
  fee: string | null;
  frequency: string | null;
  openAccess: TriState;
  hybrid: TriState;
}

export interface EnrichmentResult {
  title: string;
  issn: string;
  publisher: string;
  categories: string;
  indexed: TriState;
  predatoryJournal: boolean;
  predatoryPublisher: boolean;
  fee: string | null;
  frequency: string | null;
  openAccess: TriState;
  hybrid: TriState;
}

/**
 * Per-run credentials. Absent keys disable the matching lookup.
 */
export interface Credentials {
  scopusApiKey?: string;
  extractionApiKey?: string;
}
