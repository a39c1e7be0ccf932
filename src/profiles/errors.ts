/**
 * Errors raised while locating or selecting a cluster profile.
 *
 * @packageDocumentation
 */

/**
 * Discriminant carried by every {@link ProfileResolutionError}.
 */
export type ProfileErrorCode =
  | 'load_failed'
  | 'no_attached_cluster'
  | 'ambiguous_attachment'
  | 'not_found'
  | 'ambiguous_match';

/**
 * Base class for all profile resolution errors.
 */
export abstract class ProfileResolutionError extends Error {
  /** Machine-readable error kind. */
  public abstract readonly code: ProfileErrorCode;
}

/**
 * A configuration file could not be read or parsed.
 */
export class ConfigLoadError extends ProfileResolutionError {
  public readonly code = 'load_failed';
  /** The path that failed to load. */
  public readonly configPath: string;
  /** The underlying read or parse failure. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigLoadError.
   *
   * @param configPath - The path that failed to load.
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(configPath: string, message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.configPath = configPath;
    this.cause = cause;
  }
}

/**
 * Several clusters are configured and none of them is attached.
 */
export class NoAttachedClusterError extends ProfileResolutionError {
  public readonly code = 'no_attached_cluster';
  /** Paths of the configured clusters. */
  public readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    super('no cluster is attached');
    this.name = 'NoAttachedClusterError';
    this.candidates = candidates;
  }
}

/**
 * More than one cluster carries the attached marker.
 */
export class AmbiguousAttachmentError extends ProfileResolutionError {
  public readonly code = 'ambiguous_attachment';
  /** Paths of every attached cluster. */
  public readonly attachedPaths: readonly string[];

  constructor(attachedPaths: readonly string[]) {
    super('multiple clusters are attached');
    this.name = 'AmbiguousAttachmentError';
    this.attachedPaths = attachedPaths;
  }
}

/**
 * No cluster matched a name or ID lookup.
 */
export class ClusterNotFoundError extends ProfileResolutionError {
  public readonly code = 'not_found';
  /** The name or ID that was looked up. */
  public readonly query: string;

  constructor(query: string) {
    super(`no match found for '${query}'`);
    this.name = 'ClusterNotFoundError';
    this.query = query;
  }
}

/**
 * A name or ID prefix lookup matched several clusters.
 */
export class AmbiguousMatchError extends ProfileResolutionError {
  public readonly code = 'ambiguous_match';
  /** The name or ID prefix that was looked up. */
  public readonly query: string;
  /** Paths of the matching clusters. */
  public readonly matches: readonly string[];

  constructor(query: string, matches: readonly string[]) {
    super(`multiple matches found for '${query}'`);
    this.name = 'AmbiguousMatchError';
    this.query = query;
    this.matches = matches;
  }
}

/**
 * Type guard for errors raised by profile resolution.
 *
 * @param error - Value to check.
 * @returns True if the value is a ProfileResolutionError.
 */
export function isProfileResolutionError(error: unknown): error is ProfileResolutionError {
  return error instanceof ProfileResolutionError;
}
