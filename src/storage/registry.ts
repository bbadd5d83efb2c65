// Backend registry: scheme name -> backend factory.
//
// The set of schemes is open. New protocols are added with register(); the
// registry never branches on a scheme name itself.

import type { BaseLogger } from 'pino';
import type { z } from 'zod';

import type { Backend, BackendConfig, BackendFactory } from './types.js';
import {
  BackendConfigInvalidError,
  SchemeAlreadyRegisteredError,
  UnknownSchemeError,
  isConstructionError,
} from '../errors/index.js';
import { createLogger } from '../logger.js';

export class BackendRegistry {
  private readonly factories = new Map<string, BackendFactory>();
  private readonly logger: BaseLogger;

  constructor(options: { logger?: BaseLogger } = {}) {
    this.logger = options.logger ?? createLogger();
  }

  register(scheme: string, factory: BackendFactory): this {
    if (this.factories.has(scheme)) {
      throw new SchemeAlreadyRegisteredError(scheme);
    }
    this.factories.set(scheme, factory);
    return this;
  }

  has(scheme: string): boolean {
    return this.factories.has(scheme);
  }

  schemes(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Resolve a scheme and configuration into a live backend.
   *
   * Fails with UnknownSchemeError for unregistered (or empty) schemes and
   * BackendConfigInvalidError when the factory rejects the configuration.
   * Whatever else a factory throws is reported as BackendConfigInvalidError,
   * so a caller only ever sees the two construction variants.
   */
  async construct(scheme: string, config: BackendConfig): Promise<Backend> {
    const factory = this.factories.get(scheme);
    if (!factory) {
      throw new UnknownSchemeError(scheme === '' ? '(empty)' : scheme);
    }

    this.logger.debug({ scheme, keys: Object.keys(config) }, 'Constructing backend');

    try {
      return await factory({ ...config }, { logger: this.logger });
    } catch (error) {
      if (isConstructionError(error)) {
        throw error;
      }
      const cause = error instanceof Error ? error.message : 'Unknown error';
      const wrapped = new BackendConfigInvalidError(scheme, cause);
      wrapped.cause = error;
      throw wrapped;
    }
  }
}

/**
 * Validate a configuration map against a backend's zod schema.
 * Issues are flattened to "key: message" pairs, matching the application
 * config loader.
 */
export function parseBackendConfig<T>(
  scheme: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  config: BackendConfig
): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${e.path.length > 0 ? e.path.join('.') : '(config)'}: ${e.message}`)
      .join(', ');
    throw new BackendConfigInvalidError(scheme, errors);
  }

  return result.data;
}
