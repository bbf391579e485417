import type { JournalRecord } from '../core/types.js';

/**
 * Candidate Selector
 *
 * Both selection modes are case-insensitive substring matches and keep the
 * first record per title. The category match is not tokenized: "Science"
 * also selects "Computer Science" journals.
 */

/**
 * Keep the first record for each title, preserving order
 */
export function dedupeByTitle(records: Iterable<JournalRecord>): JournalRecord[] {
  const seen = new Set<string>();
  const unique: JournalRecord[] = [];

  for (const record of records) {
    if (seen.has(record.title)) {
      continue;
    }
    seen.add(record.title);
    unique.push(record);
  }

  return unique;
}

export function selectByCategory(
  journals: readonly JournalRecord[],
  category: string
): JournalRecord[] {
  const needle = category.toLowerCase();
  return dedupeByTitle(
    journals.filter((journal) => journal.categories.toLowerCase().includes(needle))
  );
}

/**
 * Select journals whose title contains the trimmed query.
 * A blank query selects nothing.
 */
export function selectByName(journals: readonly JournalRecord[], query: string): JournalRecord[] {
  const needle = query.trim().toLowerCase();
  if (!needle) {
    return [];
  }

  return dedupeByTitle(journals.filter((journal) => journal.title.toLowerCase().includes(needle)));
}

/**
 * Sorted distinct category labels across the table
 */
export function listCategories(journals: readonly JournalRecord[]): string[] {
  const labels = new Set<string>();

  for (const journal of journals) {
    for (const label of journal.categories.split(';')) {
      const trimmed = label.trim();
      if (trimmed) {
        labels.add(trimmed);
      }
    }
  }

  return [...labels].sort((a, b) => a.localeCompare(b));
}
