/**
 * Cluster profile resolution for command-line tools.
 *
 * @packageDocumentation
 */

import { processEnvLookup, resolveConfigDir } from './profiles/env.js';
import { ProfileResolver } from './profiles/resolver.js';
import type { ProfileResolverOptions } from './profiles/types.js';

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

/**
 * Creates a resolver rooted at `DCOS_DIR`, or `~/.dcos` when it is unset.
 *
 * @param options - Resolver options; `dir` overrides the environment.
 * @returns A ready-to-use resolver.
 *
 * @example
 * ```typescript
 * import { createProfileResolver } from 'cluster-profiles';
 *
 * const config = createProfileResolver().current();
 * console.log(config.get('core.dcos_url'));
 * ```
 */
export function createProfileResolver(
  options: Partial<ProfileResolverOptions> = {}
): ProfileResolver {
  const envLookup = options.envLookup ?? processEnvLookup;
  return new ProfileResolver({
    ...options,
    envLookup,
    dir: options.dir ?? resolveConfigDir(envLookup),
  });
}

export * from './profiles/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { PathValidationError, validatePath } from './utils/safe-fs.js';
