import { describe, expect, it, vi } from 'vitest';
import { IndexVerifier } from './IndexVerifier.js';
import { FixedDelayPolicy, NO_DELAY, type Sleep } from './RateLimitPolicy.js';
import { ScopusClient, type FetchFn } from './ScopusClient.js';

function serialResponse(entries: unknown[]): Response {
  return new Response(JSON.stringify({ 'serial-metadata-response': { entry: entries } }));
}

describe('IndexVerifier', () => {
  it('waits the configured interval before every request, including the first', async () => {
    const calls: string[] = [];
    const sleepFn = vi.fn<Sleep>(async () => {
      calls.push('sleep');
    });
    const fetchFn: FetchFn = async () => {
      calls.push('fetch');
      return serialResponse([{}]);
    };
    const verifier = new IndexVerifier(
      new ScopusClient({ fetch: fetchFn }),
      new FixedDelayPolicy(500, sleepFn)
    );

    await verifier.verify('Alpha', 'test-key');
    expect(calls).toEqual(['sleep', 'fetch']);
    expect(sleepFn).toHaveBeenCalledWith(500);

    await verifier.verify('Beta', 'test-key');
    expect(calls).toEqual(['sleep', 'fetch', 'sleep', 'fetch']);
  });

  it('returns the lookup result', async () => {
    const verifier = new IndexVerifier(
      new ScopusClient({ fetch: async () => serialResponse([{ 'dc:title': 'Alpha' }]) }),
      NO_DELAY
    );

    await expect(verifier.verify('Alpha', 'test-key')).resolves.toBe(true);
  });

  it('reports an HTTP error as not indexed', async () => {
    const verifier = new IndexVerifier(
      new ScopusClient({ fetch: async () => new Response('Server Error', { status: 500 }) }),
      NO_DELAY
    );

    await expect(verifier.verify('Alpha', 'test-key')).resolves.toBe(false);
  });

  it('reports an empty key as not indexed', async () => {
    const fetchFn = vi.fn<FetchFn>();
    const verifier = new IndexVerifier(new ScopusClient({ fetch: fetchFn }), NO_DELAY);

    await expect(verifier.verify('Alpha', '')).resolves.toBe(false);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe('FixedDelayPolicy', () => {
  it('does not sleep when the interval is zero', async () => {
    const sleepFn = vi.fn<Sleep>(async () => undefined);
    await new FixedDelayPolicy(0, sleepFn).beforeCall();
    expect(sleepFn).not.toHaveBeenCalled();
  });
});
