import { DEFAULT_CACHE_TTL_MS } from '../config/dataset.js';
import type { ReferenceData } from '../core/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ReferenceDataCache');

export interface ReferenceDataCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Reference Data Cache
 *
 * Holds the last successful load and the time it was taken. `get()` serves
 * it until it is older than the TTL, then reloads. A failed reload rejects
 * and keeps the previous entry. Overlapping `get()` calls share one load.
 */
export class ReferenceDataCache {
  private entry: { data: ReferenceData; cachedAt: number } | null = null;
  private pending: Promise<ReferenceData> | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private loader: () => Promise<ReferenceData>,
    options?: ReferenceDataCacheOptions
  ) {
    this.ttlMs = options?.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options?.now ?? Date.now;
  }

  isFresh(): boolean {
    return this.entry !== null && this.now() - this.entry.cachedAt < this.ttlMs;
  }

  async get(): Promise<ReferenceData> {
    if (this.entry && this.isFresh()) {
      return this.entry.data;
    }

    if (!this.pending) {
      logger.debug(this.entry ? 'Cache entry expired, reloading' : 'Cache empty, loading');
      this.pending = this.reload();
    }
    return this.pending;
  }

  /**
   * Force the next `get()` to reload from source
   */
  invalidate(): void {
    this.entry = null;
  }

  private async reload(): Promise<ReferenceData> {
    try {
      const data = await this.loader();
      this.entry = { data, cachedAt: this.now() };
      return data;
    } finally {
      this.pending = null;
    }
  }
}
