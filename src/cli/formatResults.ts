import { TriState } from '../core/TriState.js';
import type { EnrichmentResult } from '../core/types.js';
import type { RunSummary } from '../pipeline/summary.js';

const TRI_STATE_LABELS: Record<TriState, string> = {
  [TriState.TRUE]: 'yes',
  [TriState.FALSE]: 'no',
  [TriState.UNKNOWN]: '?',
};

export function formatTriState(value: TriState): string {
  return TRI_STATE_LABELS[value];
}

function formatFlag(value: boolean): string {
  return value ? 'YES' : 'no';
}

export function truncate(value: string, width: number): string {
  if (value.length <= width) {
    return value;
  }
  return `${value.slice(0, Math.max(0, width - 1))}…`;
}

interface Column {
  header: string;
  width: number;
  value: (result: EnrichmentResult) => string;
}

const COLUMNS: Column[] = [
  { header: 'Title', width: 40, value: (r) => r.title },
  { header: 'ISSN', width: 20, value: (r) => r.issn },
  { header: 'Publisher', width: 24, value: (r) => r.publisher },
  { header: 'Scopus', width: 6, value: (r) => formatTriState(r.indexed) },
  { header: 'Pred.J', width: 6, value: (r) => formatFlag(r.predatoryJournal) },
  { header: 'Pred.P', width: 6, value: (r) => formatFlag(r.predatoryPublisher) },
  { header: 'APC', width: 16, value: (r) => r.fee ?? '-' },
  { header: 'Frequency', width: 14, value: (r) => r.frequency ?? '-' },
  { header: 'OA', width: 3, value: (r) => formatTriState(r.openAccess) },
  { header: 'Hybrid', width: 6, value: (r) => formatTriState(r.hybrid) },
];

function formatRow(cells: string[]): string {
  return cells
    .map((cell, index) => truncate(cell, COLUMNS[index].width).padEnd(COLUMNS[index].width))
    .join('  ')
    .trimEnd();
}

/**
 * Render results as an aligned plain-text table
 */
export function formatResultTable(results: readonly EnrichmentResult[]): string {
  const header = formatRow(COLUMNS.map((column) => column.header));
  const separator = '-'.repeat(header.length);
  const rows = results.map((result) => formatRow(COLUMNS.map((column) => column.value(result))));
  return [header, separator, ...rows].join('\n');
}

export function formatSummary(summary: RunSummary): string {
  return [
    `Journals analysed:     ${summary.total}`,
    `Scopus indexed:        ${summary.indexed[TriState.TRUE]} yes / ${summary.indexed[TriState.FALSE]} no / ${summary.indexed[TriState.UNKNOWN]} unknown`,
    `Predatory journals:    ${summary.predatoryJournals}`,
    `Predatory publishers:  ${summary.predatoryPublishers}`,
    `Open access:           ${summary.openAccess}`,
    `Duration:              ${(summary.durationMs / 1000).toFixed(1)}s`,
  ].join('\n');
}
