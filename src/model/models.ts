/**
 * Model alias resolution.
 */

import { DEFAULT_MODEL_IDENTIFIERS } from '../config/constants.js';
import { isModelAlias } from '../config/env.js';
import type { ModelsConfig } from '../config/schema.js';

/**
 * Map sonnet, opus or haiku to a provider model identifier.
 * Any other string is returned unchanged.
 */
export function resolveModelIdentifier(
  model: string,
  models: ModelsConfig = DEFAULT_MODEL_IDENTIFIERS
): string {
  return isModelAlias(model) ? models[model] : model;
}
