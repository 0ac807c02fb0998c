import type { SecurityConfig } from '../config/schema.js';

/**
 * Resolved policy shared read-only by every fork of a run.
 */
export interface PolicyConfig {
  readonly allowedPathPrefixes: readonly string[];
  readonly blockedPathPrefixes: readonly string[];
  readonly blockedCommandSubstrings: readonly string[];
  /** Regex sources, compiled case-insensitive */
  readonly blockedCommandPatterns: readonly string[];
  readonly maxFileSizeBytes: number;
  readonly strictPathValidation: boolean;
  readonly escapeIdioms: readonly string[];
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Build the frozen policy from the validated security config section.
 */
export function toPolicyConfig(security: SecurityConfig): PolicyConfig {
  return Object.freeze({
    allowedPathPrefixes: Object.freeze([...security.allowedPathPrefixes]),
    blockedPathPrefixes: Object.freeze([...security.blockedPathPrefixes]),
    blockedCommandSubstrings: Object.freeze([...security.blockedCommandSubstrings]),
    blockedCommandPatterns: Object.freeze([...security.blockedCommandPatterns]),
    maxFileSizeBytes: Math.floor(security.maxFileSizeMb * BYTES_PER_MB),
    strictPathValidation: security.strictPathValidation,
    escapeIdioms: Object.freeze([...security.escapeIdioms]),
  });
}
