/**
 * Read-only cluster configuration backed by a `dcos.toml` file.
 *
 * @packageDocumentation
 */

import TOML from '@iarna/toml';
import * as path from 'node:path';
import { ConfigLoadError } from './errors.js';
import { configKeyToEnvVar, processEnvLookup } from './env.js';
import { createNodeProfileFs } from './fs.js';
import type { EnvLookup, ProfileConfig, ProfileFs } from './types.js';

/** Key holding the human-readable cluster name. */
export const CLUSTER_NAME_KEY = 'cluster.name';

/** Marker file whose presence flags a cluster as attached. */
export const ATTACHED_FILE = 'attached';

/** Name of the config file inside each cluster directory. */
export const CONFIG_FILE = 'dcos.toml';

/**
 * Options for constructing a {@link ClusterConfig}.
 */
export interface ClusterConfigOptions {
  /** File system to read through. Defaults to the real OS file system. */
  readonly fs?: ProfileFs;
  /** Environment lookup for key overrides. Defaults to `process.env`. */
  readonly envLookup?: EnvLookup;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Derives a cluster ID from a config path: the name of its parent directory.
 *
 * @param configPath - Path such as `.../clusters/<id>/dcos.toml`.
 * @returns The cluster ID.
 */
export function clusterIdFromPath(configPath: string): string {
  return path.basename(path.dirname(configPath));
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * A cluster configuration loaded from TOML.
 *
 * Values are read with dotted keys. An environment variable named after the
 * key (see {@link configKeyToEnvVar}) takes precedence over the file.
 *
 * @example
 * ```typescript
 * const config = new ClusterConfig();
 * config.loadPath('/home/me/.dcos/clusters/4f1c/dcos.toml');
 * config.get('core.dcos_url'); // "https://dcos.example.com"
 * config.attached(); // true when clusters/4f1c/attached exists
 * ```
 */
export class ClusterConfig implements ProfileConfig {
  private readonly fs: ProfileFs;
  private readonly envLookup: EnvLookup;
  private document: Record<string, unknown> = {};
  private configPath = '';

  constructor(options: ClusterConfigOptions = {}) {
    this.fs = options.fs ?? createNodeProfileFs();
    this.envLookup = options.envLookup ?? processEnvLookup;
  }

  /**
   * Loads and parses the TOML file at `configPath`.
   *
   * The previously loaded document is kept when loading fails.
   *
   * @param configPath - Path to a `dcos.toml` file.
   * @throws ConfigLoadError if the file cannot be read or is not valid TOML.
   */
  loadPath(configPath: string): void {
    let content: string;
    try {
      content = this.fs.readFile(configPath);
    } catch (err) {
      const error = toError(err);
      throw new ConfigLoadError(
        configPath,
        `Failed to read config file '${configPath}': ${error.message}`,
        error
      );
    }

    let document: Record<string, unknown>;
    try {
      document = TOML.parse(content);
    } catch (err) {
      const error = toError(err);
      throw new ConfigLoadError(
        configPath,
        `Invalid TOML syntax in '${configPath}': ${error.message}`,
        error
      );
    }

    this.document = document;
    this.configPath = configPath;
  }

  /**
   * Reads a dotted key such as `cluster.name`.
   *
   * @param key - Dotted configuration key.
   * @returns The environment override if set, else the stored value, else `undefined`.
   */
  get(key: string): unknown {
    const override = this.envLookup(configKeyToEnvVar(key));
    if (override !== undefined) {
      return override;
    }

    let node: unknown = this.document;
    for (const segment of key.split('.')) {
      if (!isTable(node) || !Object.prototype.hasOwnProperty.call(node, segment)) {
        return undefined;
      }
      node = node[segment];
    }
    return node;
  }

  path(): string {
    return this.configPath;
  }

  /**
   * The `cluster.name` value, or `''` when it is missing or not a string.
   * An unnamed cluster is therefore found by `find('')`.
   */
  clusterName(): string {
    const name = this.get(CLUSTER_NAME_KEY);
    return typeof name === 'string' ? name : '';
  }

  /**
   * The cluster ID, i.e. the name of the directory holding the config file.
   */
  clusterId(): string {
    return this.configPath === '' ? '' : clusterIdFromPath(this.configPath);
  }

  /**
   * Whether an `attached` marker sits next to the loaded file.
   */
  attached(): boolean {
    if (this.configPath === '') {
      return false;
    }
    return this.fs.exists(path.join(path.dirname(this.configPath), ATTACHED_FILE));
  }
}
