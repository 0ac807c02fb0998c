/**
 * Cost estimation from token counts.
 */

import { DEFAULT_PRICING_FALLBACK, DEFAULT_PRICING_RATES } from '../config/constants.js';

/**
 * USD per million tokens, keyed by model identifier.
 */
export interface RateTable {
  readonly rates: Readonly<Record<string, number>>;
  /** Used for identifiers missing from `rates` */
  readonly fallback: number;
}

export const DEFAULT_RATE_TABLE: RateTable = Object.freeze({
  rates: Object.freeze({ ...DEFAULT_PRICING_RATES }),
  fallback: DEFAULT_PRICING_FALLBACK,
});

export function rateFor(modelIdentifier: string, table: RateTable = DEFAULT_RATE_TABLE): number {
  return table.rates[modelIdentifier] ?? table.fallback;
}

/**
 * Input and output tokens are charged at the same blended rate.
 */
export function calculateCost(
  totalTokens: number,
  modelIdentifier: string,
  table: RateTable = DEFAULT_RATE_TABLE
): number {
  return (totalTokens * rateFor(modelIdentifier, table)) / 1_000_000;
}
