/**
 * config/types.ts — Types for pipeconf settings.
 *
 * Settings come from pipeconf.yaml layered over built-in defaults:
 * built-in → workspace → explicit file.
 */
import type { LogLevel } from "../logger.js";

export type FetchSettings = {
  /** Budget per attempt, in milliseconds. */
  timeoutMs: number;
  /** Total attempts per resolution. */
  attempts: number;
  /** Candidates probed when a repo has no override. Trailing "/" = directory. */
  defaultOrder: string[];
};

/** Policy values given to repositories that do not set their own. */
export type RepoDefaults = {
  scanDepth: number;
  ignoreTemplateFiles: boolean;
};

export type LogSettings = {
  level: LogLevel;
  json: boolean;
};

/**
 * The pipeconf.yaml shape.
 * All fields optional — missing fields inherit from the layer below.
 */
export type PipeconfConfig = {
  fetch?: Partial<FetchSettings>;
  repoDefaults?: Partial<RepoDefaults>;
  log?: Partial<LogSettings>;
};

/** Fully resolved settings — all fields present. */
export type ResolvedSettings = {
  fetch: FetchSettings;
  repoDefaults: RepoDefaults;
  log: LogSettings;
};
