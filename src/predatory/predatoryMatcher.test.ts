import { describe, expect, it } from 'vitest';
import type { PredatoryRegistry } from '../core/types.js';
import { checkPredatory } from './predatoryMatcher.js';

const REGISTRY: PredatoryRegistry = {
  journals: new Set(['fake journal']),
  publishers: new Set(['shady press']),
};

describe('checkPredatory', () => {
  it('matches a journal title after trimming and lower-casing', () => {
    expect(checkPredatory(' Fake Journal ', 'Honest Press', REGISTRY)).toEqual({
      journal: true,
      publisher: false,
    });
  });

  it('does not match partial titles', () => {
    expect(checkPredatory('Fake Journal of Science', 'Honest Press', REGISTRY).journal).toBe(false);
  });

  it('matches the publisher independently of the title', () => {
    expect(checkPredatory('Real Journal', '  SHADY PRESS', REGISTRY)).toEqual({
      journal: false,
      publisher: true,
    });
  });

  it('treats a missing publisher as no match', () => {
    expect(checkPredatory('Fake Journal', null, REGISTRY)).toEqual({ journal: true, publisher: false });
    expect(checkPredatory('Fake Journal', undefined, REGISTRY).publisher).toBe(false);
  });

  it('never matches blank values', () => {
    const registry: PredatoryRegistry = { journals: new Set(['']), publishers: new Set(['']) };
    expect(checkPredatory('  ', '', registry)).toEqual({ journal: false, publisher: false });
  });
});
