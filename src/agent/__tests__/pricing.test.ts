import { describe, expect, it } from '@jest/globals';

import { calculateCost, DEFAULT_RATE_TABLE, rateFor } from '../pricing.js';

describe('pricing', () => {
  it('looks up the rate by model identifier', () => {
    expect(rateFor('claude-opus-4-20250514')).toBe(15);
    expect(rateFor('claude-3-5-haiku-20241022')).toBe(1);
  });

  it('uses the fallback for unknown models', () => {
    expect(rateFor('some-other-model')).toBe(DEFAULT_RATE_TABLE.fallback);
  });

  it('charges per million tokens', () => {
    expect(calculateCost(2_000_000, 'claude-opus-4-20250514')).toBe(30);
    expect(calculateCost(0, 'claude-opus-4-20250514')).toBe(0);
  });

  it('accepts a custom rate table', () => {
    const table = { rates: { local: 0 }, fallback: 10 };

    expect(calculateCost(1_000_000, 'local', table)).toBe(0);
    expect(calculateCost(500_000, 'remote', table)).toBe(5);
  });
});
