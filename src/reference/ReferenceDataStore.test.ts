import path from 'path';
import { describe, expect, it } from 'vitest';
import { DataUnavailableError } from '../core/errors.js';
import { parseJournalTable, ReferenceDataStore } from './ReferenceDataStore.js';

const JOURNALS_CSV = [
  'Rank;Title;Issn;Publisher;Categories;Areas',
  '1;"Alpha Journal";"12345678, 87654321";Alpha Press;"Computer Science (Q1); Software (Q2)";Computer Science',
  '2;;00000000;No Title Press;Misc;Misc',
  '3;Beta Review;;;Ecology (Q3);Environmental Science',
].join('\n');

const SOURCES = {
  journalsPath: 'journals.csv',
  predatoryJournalsPath: 'predatory_journals.txt',
  predatoryPublishersPath: 'predatory_publishers.txt',
};

function fakeReader(files: Record<string, string>) {
  return async (filePath: string): Promise<string> => {
    const content = files[filePath];
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return content;
  };
}

describe('parseJournalTable', () => {
  it('maps required columns by header name and skips rows without a title', () => {
    expect(parseJournalTable(JOURNALS_CSV, 'journals.csv')).toEqual([
      {
        title: 'Alpha Journal',
        issn: '12345678, 87654321',
        publisher: 'Alpha Press',
        categories: 'Computer Science (Q1); Software (Q2)',
      },
      { title: 'Beta Review', issn: '', publisher: '', categories: 'Ecology (Q3)' },
    ]);
  });

  it('accepts columns in any order and any case', () => {
    const csv = 'CATEGORIES;publisher;title;ISSN\nEcology;Gamma Press;Gamma Letters;1111-2222';
    expect(parseJournalTable(csv, 'x.csv')).toEqual([
      { title: 'Gamma Letters', issn: '1111-2222', publisher: 'Gamma Press', categories: 'Ecology' },
    ]);
  });

  it('returns frozen records', () => {
    const [record] = parseJournalTable(JOURNALS_CSV, 'journals.csv');
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects a table missing a required column', () => {
    expect(() => parseJournalTable('Title;Publisher;Categories\nA;B;C', 'journals.csv')).toThrow(
      'Reference data unavailable (journals.csv): missing required column(s): Issn'
    );
  });

  it('rejects an empty table', () => {
    expect(() => parseJournalTable('', 'journals.csv')).toThrow(DataUnavailableError);
  });
});

describe('ReferenceDataStore', () => {
  it('loads journals and both registries', async () => {
    const store = new ReferenceDataStore(SOURCES, {
      readFile: fakeReader({
        'journals.csv': JOURNALS_CSV,
        'predatory_journals.txt': '# comment\n\n  Fake Journal  \nAnother FAKE\n',
        'predatory_publishers.txt': 'Shady Press\n#Not A Publisher\n',
      }),
      now: () => 1234,
    });

    const data = await store.load();

    expect(data.journals.map((journal) => journal.title)).toEqual(['Alpha Journal', 'Beta Review']);
    expect([...data.registry.journals]).toEqual(['fake journal', 'another fake']);
    expect([...data.registry.publishers]).toEqual(['shady press']);
    expect(data.loadedAt).toBe(1234);
  });

  it('fails with DataUnavailableError when any source is missing', async () => {
    const store = new ReferenceDataStore(SOURCES, {
      readFile: fakeReader({
        'journals.csv': JOURNALS_CSV,
        'predatory_journals.txt': 'Fake Journal',
      }),
    });

    await expect(store.load()).rejects.toBeInstanceOf(DataUnavailableError);
    await expect(store.load()).rejects.toMatchObject({
      code: 'DATA_UNAVAILABLE',
      source: 'predatory_publishers.txt',
    });
  });

  it('fails when the journal table cannot be parsed', async () => {
    const store = new ReferenceDataStore(SOURCES, {
      readFile: fakeReader({
        'journals.csv': 'Name;Code\nA;1',
        'predatory_journals.txt': '',
        'predatory_publishers.txt': '',
      }),
    });

    await expect(store.load()).rejects.toMatchObject({ source: 'journals.csv' });
  });

  it('reads the bundled sample dataset', async () => {
    const dataDir = path.resolve('data');
    const store = new ReferenceDataStore({
      journalsPath: path.join(dataDir, 'scimago_journals.csv'),
      predatoryJournalsPath: path.join(dataDir, 'predatory_journals.txt'),
      predatoryPublishersPath: path.join(dataDir, 'predatory_publishers.txt'),
    });

    const data = await store.load();

    expect(data.journals).toHaveLength(6);
    expect(data.journals[4].title).toBe('Materials Science Letters; Series B');
    expect(data.registry.journals.has('global journal of advanced research')).toBe(true);
    expect(data.registry.publishers.has('open horizons publishing group')).toBe(true);
  });
});
