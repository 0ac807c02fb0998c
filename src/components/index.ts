/**
 * Ink views for the fork command.
 */

export { ForkProgress } from './ForkProgress.js';
export type { ForkProgressProps } from './ForkProgress.js';
export { ForkSummary } from './ForkSummary.js';
export type { ForkSummaryProps } from './ForkSummary.js';
