/**
 * Cluster profile resolution.
 *
 * Finds the `dcos.toml` profiles stored under a configuration directory and
 * decides which one a command should run against.
 *
 * Selection precedence: DCOS_CONFIG > DCOS_CLUSTER > single/attached cluster > legacy file
 *
 * @packageDocumentation
 */

export { ProfileResolver, CLUSTERS_DIR } from './resolver.js';
export {
  ClusterConfig,
  clusterIdFromPath,
  ATTACHED_FILE,
  CLUSTER_NAME_KEY,
  CONFIG_FILE,
} from './config.js';
export type { ClusterConfigOptions } from './config.js';
export {
  ProfileResolutionError,
  ConfigLoadError,
  NoAttachedClusterError,
  AmbiguousAttachmentError,
  ClusterNotFoundError,
  AmbiguousMatchError,
  isProfileResolutionError,
} from './errors.js';
export type { ProfileErrorCode } from './errors.js';
export {
  ENV_CLUSTER,
  ENV_CONFIG,
  ENV_DIR,
  ENV_PREFIX,
  configKeyToEnvVar,
  createEnvLookup,
  processEnvLookup,
  resolveConfigDir,
} from './env.js';
export type { EnvRecord } from './env.js';
export { createNodeProfileFs } from './fs.js';
export type {
  ConfigDependencies,
  ConfigFactory,
  EnvLookup,
  ProfileConfig,
  ProfileDirEntry,
  ProfileFs,
  ProfileResolverOptions,
  SelectionSource,
} from './types.js';
