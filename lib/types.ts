/**
 * Shared types for pipeline config resolution.
 *
 * Repositories, users and pipelines are owned by the caller; the resolver
 * only reads them.
 */

/**
 * Per-repository scanning policy.
 * Stored elsewhere; values arrive here already resolved.
 */
export type RepoConfigPolicy = {
  /** Explicit config location. Blank means "use the default order". */
  override: string;
  /** 0 = directory only, N = N levels of subdirectories below it. Range 0..10. */
  scanDepth: number;
  /** Drop any file whose name contains "template" (case-insensitive). */
  ignoreTemplateFiles: boolean;
};

export type Repo = {
  owner: string;
  name: string;
  /** "owner/name" — also used as the log key. */
  fullName: string;
  policy: RepoConfigPolicy;
};

export type User = {
  login: string;
  /** Forwarded to the forge CLI as its token env var. */
  token?: string;
};

export type Pipeline = {
  /** Revision the config is read at. */
  commit: string;
  ref?: string;
  number?: number;
};

/** A resolved config file. Name is relative to the repository root. */
export type FileMeta = {
  name: string;
  data: Buffer;
};

/** Conventional config locations, probed in order. A trailing "/" marks a directory. */
export const DEFAULT_CONFIG_ORDER: readonly string[] = Object.freeze([
  ".ci/",
  ".ci.yaml",
  ".ci.yml",
]);

/** Upper bound for RepoConfigPolicy.scanDepth. */
export const MAX_SCAN_DEPTH = 10;
