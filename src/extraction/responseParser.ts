import { TriState } from '../core/TriState.js';
import type { ExtractedMetadata } from '../core/types.js';

export function unknownMetadata(): ExtractedMetadata {
  return {
    fee: null,
    frequency: null,
    openAccess: TriState.UNKNOWN,
    hybrid: TriState.UNKNOWN,
  };
}

/**
 * "Yes..." → TRUE, "No..." → FALSE, anything else → UNKNOWN
 */
export function parseYesNo(value: string): TriState {
  const normalized = value.trim().toLowerCase();
  if (normalized.startsWith('y')) return TriState.TRUE;
  if (normalized.startsWith('n')) return TriState.FALSE;
  return TriState.UNKNOWN;
}

function valueAfterLabel(line: string): string {
  return line.slice(line.indexOf(':') + 1).trim();
}

/**
 * Parse the four labelled lines of a metadata response.
 *
 * Labels are matched case-insensitively at the start of a line; the value is
 * everything after the first colon. Lines without a known label are ignored,
 * and a later duplicate label replaces an earlier one. Missing labels stay
 * null / UNKNOWN, so empty or malformed text yields all-unknown.
 */
export function parseExtractionResponse(text: string): ExtractedMetadata {
  const metadata = unknownMetadata();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const lower = line.toLowerCase();

    if (lower.startsWith('apc:')) {
      metadata.fee = valueAfterLabel(line);
    } else if (lower.startsWith('frequency:')) {
      metadata.frequency = valueAfterLabel(line);
    } else if (lower.startsWith('open access:')) {
      metadata.openAccess = parseYesNo(valueAfterLabel(line));
    } else if (lower.startsWith('hybrid:')) {
      metadata.hybrid = parseYesNo(valueAfterLabel(line));
    }
  }

  return metadata;
}
