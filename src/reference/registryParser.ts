/**
 * Parse a line-oriented registry file into lower-cased entries.
 * Blank lines and `#` comments are skipped.
 */
export function parseRegistry(content: string): Set<string> {
  const entries = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    entries.add(trimmed.toLowerCase());
  }

  return entries;
}
