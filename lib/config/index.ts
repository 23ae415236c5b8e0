/**
 * config/ — pipeconf settings.
 */
export type {
  PipeconfConfig,
  FetchSettings,
  RepoDefaults,
  LogSettings,
  ResolvedSettings,
} from "./types.js";

export { loadSettings, resolveRepoPolicy, DEFAULT_SETTINGS, SETTINGS_FILE } from "./loader.js";
export { mergeSettings } from "./merge.js";
export { validateConfig, validateRepoPolicy, PipeconfConfigSchema, RepoConfigPolicySchema } from "./schema.js";
