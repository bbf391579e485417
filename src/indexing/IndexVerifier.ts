import { errorMessage, IndexServiceError } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import type { RateLimitPolicy } from './RateLimitPolicy.js';
import type { ScopusClient } from './ScopusClient.js';

const logger = createLogger('IndexVerifier');

/**
 * Index Verifier
 *
 * Rate-limited wrapper around the Scopus client. A failed lookup is logged
 * and reported as "not indexed"; it never propagates.
 */
export class IndexVerifier {
  constructor(
    private client: ScopusClient,
    private policy: RateLimitPolicy
  ) {}

  async verify(title: string, apiKey: string): Promise<boolean> {
    await this.policy.beforeCall();

    try {
      const indexed = await this.client.lookupSerialTitle(title, apiKey);
      logger.debug('Scopus lookup completed', { journal: title, indexed });
      return indexed;
    } catch (error) {
      logger.warn('Scopus lookup failed, recording journal as not indexed', {
        journal: title,
        status: error instanceof IndexServiceError ? error.status : undefined,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
