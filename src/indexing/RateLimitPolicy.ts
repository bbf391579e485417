export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Rate Limit Policy
 *
 * Consulted before every outbound index request.
 */
export interface RateLimitPolicy {
  readonly minIntervalMs: number;
  beforeCall(): Promise<void>;
}

/**
 * Waits a fixed interval before every call, including the first one of a
 * session. Requests are sequential, so this spaces calls at least
 * `minIntervalMs` apart without tracking the previous request.
 */
export class FixedDelayPolicy implements RateLimitPolicy {
  constructor(
    readonly minIntervalMs: number,
    private sleepFn: Sleep = sleep
  ) {}

  async beforeCall(): Promise<void> {
    if (this.minIntervalMs > 0) {
      await this.sleepFn(this.minIntervalMs);
    }
  }
}

export const NO_DELAY: RateLimitPolicy = new FixedDelayPolicy(0);
