// Configuration transport across the binding boundary.
//
// A config map travels as a flat list of alternating key/value strings plus
// an explicit pair count. Reconstruction keeps the last value for a key that
// appears more than once.

import { BackendConfigInvalidError } from '../errors/index.js';
import type { BackendConfig } from '../storage/index.js';

export interface FlatConfig {
  params: string[];
  count: number;
}

export function flattenConfig(config: BackendConfig): FlatConfig {
  const params: string[] = [];
  for (const [key, value] of Object.entries(config)) {
    params.push(key, value);
  }
  return { params, count: params.length / 2 };
}

/**
 * Rebuild a key-unique config map from `count` key/value pairs.
 * `scheme` only labels the error raised for a malformed list.
 */
export function unflattenConfig(
  scheme: string,
  params: readonly string[],
  count: number
): BackendConfig {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new BackendConfigInvalidError(
      scheme,
      `pair count must be a non-negative integer, got ${count}`
    );
  }
  if (params.length !== count * 2) {
    throw new BackendConfigInvalidError(
      scheme,
      `expected ${count * 2} parameters for ${count} pairs, got ${params.length}`
    );
  }

  const pairs = new Map<string, string>();
  for (let i = 0; i < params.length; i += 2) {
    const key = params[i];
    const value = params[i + 1];
    if (typeof key !== 'string' || typeof value !== 'string') {
      throw new BackendConfigInvalidError(scheme, `parameter ${i} is not a string pair`);
    }
    if (key.length === 0) {
      throw new BackendConfigInvalidError(scheme, `empty key at position ${i}`);
    }
    pairs.set(key, value);
  }
  return Object.fromEntries(pairs);
}
