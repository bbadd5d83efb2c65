import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export { ConfigSchema };
export type { Config, GatewayBackend } from './schema.js';

/** STOWAGE_CONFIG overrides the default ./config/config.json */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.STOWAGE_CONFIG
    ? resolve(env.STOWAGE_CONFIG)
    : resolve(process.cwd(), 'config', 'config.json');
}

export function loadConfig(configPath: string = defaultConfigPath()): Config {
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  return parseConfig(rawConfig);
}

/** Validate an already-parsed config object and apply defaults */
export function parseConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
