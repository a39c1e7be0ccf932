/**
 * Types shared by the cluster profile resolver and its collaborators.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * A single directory entry as returned by {@link ProfileFs.readDir}.
 * Structurally compatible with `node:fs` `Dirent`.
 */
export interface ProfileDirEntry {
  /** Entry name, without any directory prefix. */
  readonly name: string;
  /** Whether the entry is a directory. */
  isDirectory(): boolean;
}

/**
 * The file system capability the resolver reads through.
 *
 * `readDir` and `readFile` throw when the target is missing or unreadable.
 */
export interface ProfileFs {
  /** Lists the entries of a directory. */
  readDir(dirPath: string): ProfileDirEntry[];
  /** Reads a file as UTF-8 text. */
  readFile(filePath: string): string;
  /** Whether a file or directory exists at the path. */
  exists(targetPath: string): boolean;
}

/**
 * Looks up an environment variable. `undefined` means the variable is not set;
 * an empty string means it is set to the empty value.
 */
export type EnvLookup = (key: string) => string | undefined;

/**
 * What the resolver needs from a loaded cluster configuration.
 */
export interface ProfileConfig {
  /**
   * Loads the configuration stored at the given path.
   * @throws ConfigLoadError when the file is unreadable or unparsable.
   */
  loadPath(configPath: string): void;
  /** Reads a dotted configuration key, such as `cluster.name`. */
  get(key: string): unknown;
  /** The path this configuration was loaded from. */
  path(): string;
  /** Whether this cluster is the one currently attached. */
  attached(): boolean;
  /** The human-readable cluster name, or `''` when unset (and then matched by an empty lookup). */
  clusterName(): string;
}

/**
 * Dependencies handed to a {@link ConfigFactory}.
 */
export interface ConfigDependencies {
  readonly fs: ProfileFs;
  readonly envLookup: EnvLookup;
}

/**
 * Builds an empty, unloaded configuration object.
 */
export type ConfigFactory = (deps: ConfigDependencies) => ProfileConfig;

/**
 * Options for constructing a {@link ProfileResolver}.
 */
export interface ProfileResolverOptions {
  /** Root configuration directory, usually `~/.dcos`. */
  readonly dir: string;
  /**
   * File system to read through.
   * @defaultValue the real OS file system
   */
  readonly fs?: ProfileFs;
  /**
   * Environment variable lookup.
   * @defaultValue a lookup over `process.env`
   */
  readonly envLookup?: EnvLookup;
  /**
   * Factory for configuration objects.
   * @defaultValue builds a `ClusterConfig`
   */
  readonly createConfig?: ConfigFactory;
  /** Logger for resolution traces. */
  readonly logger?: Logger;
}

/**
 * How {@link ProfileResolver.current} arrived at its result.
 */
export type SelectionSource = 'env_config' | 'env_cluster' | 'legacy' | 'single' | 'attached';
