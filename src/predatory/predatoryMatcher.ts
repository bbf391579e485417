import type { PredatoryMatch, PredatoryRegistry } from '../core/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PredatoryMatcher');

function normalize(value: unknown): string {
  return typeof value === 'string' ? value.trim().toLowerCase() : '';
}

/**
 * Check a journal against both predatory registries.
 *
 * Matching is exact after trimming and lower-casing: "fake journal" matches
 * " Fake Journal " but not "Fake Journal of Science". Blank values never match.
 */
export function checkPredatory(
  title: string,
  publisher: string | null | undefined,
  registry: PredatoryRegistry
): PredatoryMatch {
  const normalizedTitle = normalize(title);
  const normalizedPublisher = normalize(publisher);

  const match: PredatoryMatch = {
    journal: normalizedTitle !== '' && registry.journals.has(normalizedTitle),
    publisher: normalizedPublisher !== '' && registry.publishers.has(normalizedPublisher),
  };

  if (match.journal || match.publisher) {
    logger.debug('Predatory registry match', {
      journal: title,
      publisher: publisher ?? '',
      journalListed: match.journal,
      publisherListed: match.publisher,
    });
  }

  return match;
}
