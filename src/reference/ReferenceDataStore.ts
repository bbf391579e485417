import fs from 'fs/promises';
import { DataUnavailableError, errorMessage } from '../core/errors.js';
import type { JournalRecord, PredatoryRegistry, ReferenceData } from '../core/types.js';
import { createLogger } from '../utils/logger.js';
import { parseDelimitedTable } from './csvParser.js';
import { parseRegistry } from './registryParser.js';

const logger = createLogger('ReferenceDataStore');

/**
 * Columns the journal table must provide, located by header name
 */
const REQUIRED_COLUMNS = {
  title: 'Title',
  issn: 'Issn',
  publisher: 'Publisher',
  categories: 'Categories',
} as const;

type ColumnKey = keyof typeof REQUIRED_COLUMNS;

export interface ReferenceSources {
  journalsPath: string;
  predatoryJournalsPath: string;
  predatoryPublishersPath: string;
}

export interface ReferenceDataStoreOptions {
  readFile?: (filePath: string) => Promise<string>;
  now?: () => number;
}

/**
 * Parse the SCImago journal table
 *
 * @throws DataUnavailableError if the header is missing or lacks a required column
 */
export function parseJournalTable(content: string, source: string): JournalRecord[] {
  const table = parseDelimitedTable(content);
  if (!table) {
    throw new DataUnavailableError(source, 'file is empty');
  }

  const normalizedHeader = table.header.map((name) => name.trim().toLowerCase());
  const columnIndex = (column: string) => normalizedHeader.indexOf(column.toLowerCase());

  const indexes: Record<ColumnKey, number> = {
    title: columnIndex(REQUIRED_COLUMNS.title),
    issn: columnIndex(REQUIRED_COLUMNS.issn),
    publisher: columnIndex(REQUIRED_COLUMNS.publisher),
    categories: columnIndex(REQUIRED_COLUMNS.categories),
  };
  const missing = Object.values(REQUIRED_COLUMNS).filter((column) => columnIndex(column) === -1);

  if (missing.length > 0) {
    throw new DataUnavailableError(source, `missing required column(s): ${missing.join(', ')}`);
  }

  const journals: JournalRecord[] = [];
  for (const fields of table.rows) {
    const title = fields[indexes.title] ?? '';
    if (!title) {
      continue;
    }

    journals.push(
      Object.freeze({
        title,
        issn: fields[indexes.issn] ?? '',
        publisher: fields[indexes.publisher] ?? '',
        categories: fields[indexes.categories] ?? '',
      })
    );
  }

  return journals;
}

/**
 * Reference Data Store
 *
 * Reads the journal table and both predatory registries. All three sources
 * must load; any failure raises DataUnavailableError and nothing is returned.
 */
export class ReferenceDataStore {
  private readFile: (filePath: string) => Promise<string>;
  private now: () => number;

  constructor(
    private sources: ReferenceSources,
    options?: ReferenceDataStoreOptions
  ) {
    this.readFile = options?.readFile ?? ((filePath) => fs.readFile(filePath, 'utf-8'));
    this.now = options?.now ?? Date.now;
  }

  async load(): Promise<ReferenceData> {
    const start = Date.now();

    const [journalsText, predatoryJournalsText, predatoryPublishersText] = await Promise.all([
      this.readSource(this.sources.journalsPath),
      this.readSource(this.sources.predatoryJournalsPath),
      this.readSource(this.sources.predatoryPublishersPath),
    ]);

    const journals = parseJournalTable(journalsText, this.sources.journalsPath);
    const registry: PredatoryRegistry = {
      journals: parseRegistry(predatoryJournalsText),
      publishers: parseRegistry(predatoryPublishersText),
    };

    logger.info('Reference data loaded', {
      journals: journals.length,
      predatoryJournals: registry.journals.size,
      predatoryPublishers: registry.publishers.size,
      durationMs: Date.now() - start,
    });

    return {
      journals: Object.freeze(journals),
      registry,
      loadedAt: this.now(),
    };
  }

  private async readSource(filePath: string): Promise<string> {
    try {
      return await this.readFile(filePath);
    } catch (error) {
      throw new DataUnavailableError(filePath, errorMessage(error), { cause: error });
    }
  }
}
