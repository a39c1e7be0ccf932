/**
 * Environment variable access for profile resolution.
 *
 * Lookups go through an injected {@link EnvLookup}; only
 * {@link processEnvLookup} reads `process.env`.
 *
 * @packageDocumentation
 */

import * as os from 'node:os';
import * as path from 'node:path';
import type { EnvLookup } from './types.js';

/** Path to a config file that overrides every other selection rule. */
export const ENV_CONFIG = 'DCOS_CONFIG';

/** Name or ID of the cluster to use. */
export const ENV_CLUSTER = 'DCOS_CLUSTER';

/** Root configuration directory. */
export const ENV_DIR = 'DCOS_DIR';

/** Prefix shared by every per-key override variable. */
export const ENV_PREFIX = 'DCOS_';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Builds a lookup over a fixed environment record.
 *
 * @param env - Environment record to read from.
 * @returns A lookup returning `undefined` for unset keys.
 *
 * @example
 * ```typescript
 * const lookup = createEnvLookup({ DCOS_CLUSTER: 'prod' });
 * lookup('DCOS_CLUSTER'); // "prod"
 * lookup('DCOS_CONFIG'); // undefined
 * ```
 */
export function createEnvLookup(env: EnvRecord): EnvLookup {
  return (key) => (Object.prototype.hasOwnProperty.call(env, key) ? env[key] : undefined);
}

/**
 * Lookup over the live `process.env`, read at call time.
 */
export const processEnvLookup: EnvLookup = (key) => process.env[key];

/**
 * Maps a dotted config key to the environment variable overriding it.
 *
 * The `core.` section is implied, so `core.dcos_url` maps to `DCOS_URL`
 * while `cluster.name` maps to `DCOS_CLUSTER_NAME`.
 *
 * @param key - Dotted configuration key.
 * @returns The environment variable name.
 */
export function configKeyToEnvVar(key: string): string {
  const unqualified = key.startsWith('core.') ? key.slice('core.'.length) : key;
  const suffix = unqualified.replaceAll('.', '_').toUpperCase();
  return suffix.startsWith(ENV_PREFIX) ? suffix : ENV_PREFIX + suffix;
}

/**
 * Resolves the root configuration directory.
 *
 * @param envLookup - Environment lookup.
 * @param homeDir - Home directory used when `DCOS_DIR` is unset.
 * @returns `DCOS_DIR` when set and non-empty, else `<home>/.dcos`.
 */
export function resolveConfigDir(
  envLookup: EnvLookup = processEnvLookup,
  homeDir: string = os.homedir()
): string {
  const fromEnv = envLookup(ENV_DIR);
  if (fromEnv !== undefined && fromEnv !== '') {
    return fromEnv;
  }
  return path.join(homeDir, '.dcos');
}
