/**
 * Selection of the active cluster profile.
 *
 * Profiles live under `<dir>/clusters/<id>/dcos.toml`. Which one is active
 * is decided, in order, by:
 *
 * 1. `DCOS_CONFIG`, a direct path to a config file;
 * 2. `DCOS_CLUSTER`, the name or ID of a configured cluster;
 * 3. the only configured cluster, or the attached one when there are several;
 * 4. the legacy `<dir>/dcos.toml` when no cluster is configured.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { Logger } from '../utils/logger.js';
import { CONFIG_FILE, ClusterConfig, clusterIdFromPath } from './config.js';
import {
  AmbiguousAttachmentError,
  AmbiguousMatchError,
  ClusterNotFoundError,
  NoAttachedClusterError,
} from './errors.js';
import { ENV_CLUSTER, ENV_CONFIG, processEnvLookup } from './env.js';
import { createNodeProfileFs } from './fs.js';
import type {
  ConfigFactory,
  EnvLookup,
  ProfileConfig,
  ProfileDirEntry,
  ProfileFs,
  ProfileResolverOptions,
  SelectionSource,
} from './types.js';

/** Directory under the root holding one sub-directory per cluster. */
export const CLUSTERS_DIR = 'clusters';

const defaultConfigFactory: ConfigFactory = (deps) => new ClusterConfig(deps);

/**
 * Locates cluster configurations on disk and picks the active one.
 *
 * Holds no state beyond its dependencies; each call re-reads the file
 * system and environment.
 *
 * @example
 * ```typescript
 * const resolver = new ProfileResolver({ dir: resolveConfigDir() });
 * const config = resolver.current();
 * console.log(config.path());
 * ```
 */
export class ProfileResolver {
  private readonly fs: ProfileFs;
  private readonly envLookup: EnvLookup;
  private readonly dir: string;
  private readonly createConfig: ConfigFactory;
  private readonly logger: Logger;

  constructor(options: ProfileResolverOptions) {
    this.fs = options.fs ?? createNodeProfileFs();
    this.envLookup = options.envLookup ?? processEnvLookup;
    this.dir = options.dir;
    this.createConfig = options.createConfig ?? defaultConfigFactory;
    this.logger = options.logger ?? new Logger({ component: 'ProfileResolver' });
  }

  /**
   * Returns the configuration currently in effect.
   *
   * @returns The selected configuration.
   * @throws ConfigLoadError if `DCOS_CONFIG` or the legacy file cannot be loaded.
   * @throws ClusterNotFoundError | AmbiguousMatchError if `DCOS_CLUSTER` does not resolve.
   * @throws NoAttachedClusterError if several clusters exist and none is attached.
   * @throws AmbiguousAttachmentError if more than one cluster is attached.
   */
  current(): ProfileConfig {
    const configPath = this.envLookup(ENV_CONFIG);
    if (configPath !== undefined) {
      return this.selected(this.load(configPath), 'env_config');
    }

    const clusterName = this.envLookup(ENV_CLUSTER);
    if (clusterName !== undefined) {
      return this.selected(this.find(clusterName, true), 'env_cluster');
    }

    const configs = this.all();

    if (configs.length === 0) {
      const legacyPath = path.join(this.dir, CONFIG_FILE);
      this.trace('legacy_config_fallback', () => ({ configPath: legacyPath }));
      return this.selected(this.load(legacyPath), 'legacy');
    }

    const [only] = configs;
    if (only !== undefined && configs.length === 1) {
      return this.selected(only, 'single');
    }

    const attached = configs.filter((config) => config.attached());
    const [current] = attached;
    if (current === undefined) {
      throw new NoAttachedClusterError(configs.map((config) => config.path()));
    }
    if (attached.length > 1) {
      throw new AmbiguousAttachmentError(attached.map((config) => config.path()));
    }
    return this.selected(current, 'attached');
  }

  /**
   * Finds a configuration by cluster name or ID.
   *
   * An exact ID match is returned straight away. Otherwise every cluster
   * whose name equals `name` matches, and, unless `strict` is set, every
   * cluster whose ID starts with `name`. Clusters without a `cluster.name`
   * have the name `''`, so an empty `name` matches each of them.
   *
   * @param name - Cluster name, ID, or ID prefix.
   * @param strict - Disallow ID prefix matches.
   * @returns The single matching configuration.
   * @throws ClusterNotFoundError if nothing matches.
   * @throws AmbiguousMatchError if several clusters match.
   */
  find(name: string, strict: boolean): ProfileConfig {
    const matches: ProfileConfig[] = [];

    for (const config of this.all()) {
      const clusterId = clusterIdFromPath(config.path());
      if (clusterId === name) {
        return config;
      }
      if (config.clusterName() === name || (!strict && clusterId.startsWith(name))) {
        matches.push(config);
      }
    }

    const [match] = matches;
    if (match === undefined) {
      throw new ClusterNotFoundError(name);
    }
    if (matches.length > 1) {
      throw new AmbiguousMatchError(name, matches.map((config) => config.path()));
    }
    return match;
  }

  /**
   * Loads every configured cluster, ordered by cluster ID.
   *
   * Entries that are not directories, or whose `dcos.toml` fails to load,
   * are left out. A missing `clusters` directory yields an empty list.
   *
   * @returns The loadable cluster configurations.
   */
  all(): ProfileConfig[] {
    const clustersDir = path.join(this.dir, CLUSTERS_DIR);

    let entries: ProfileDirEntry[];
    try {
      entries = this.fs.readDir(clustersDir);
    } catch (error) {
      this.trace('clusters_dir_unreadable', () => ({
        dir: clustersDir,
        error: error instanceof Error ? error.message : String(error),
      }));
      return [];
    }

    const configs: ProfileConfig[] = [];
    const names = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    for (const name of names) {
      const configPath = path.join(clustersDir, name, CONFIG_FILE);
      const config = this.createConfig({ fs: this.fs, envLookup: this.envLookup });
      try {
        config.loadPath(configPath);
      } catch (error) {
        this.trace('profile_skipped', () => ({
          configPath,
          error: error instanceof Error ? error.message : String(error),
        }));
        continue;
      }
      configs.push(config);
    }

    return configs;
  }

  private load(configPath: string): ProfileConfig {
    const config = this.createConfig({ fs: this.fs, envLookup: this.envLookup });
    config.loadPath(configPath);
    return config;
  }

  private selected(config: ProfileConfig, source: SelectionSource): ProfileConfig {
    this.trace('profile_selected', () => ({ source, configPath: config.path() }));
    return config;
  }

  private trace(event: string, data: () => Record<string, unknown>): void {
    if (this.logger.isDebugEnabled) {
      this.logger.debug(event, data());
    }
  }
}
