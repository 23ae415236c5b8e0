/**
 * pipeconf — resolve which config files govern a CI pipeline run.
 */
export { ForgeConfigFetcher, type FetcherOptions, type FetchRequest } from "./lib/fetch/index.js";
export {
  getFirstAvailableConfig,
  probeCandidate,
  filterPipelineFiles,
  validateUniqueFileNames,
  logicalName,
  createFetchPolicy,
  type FetchScope,
  type ProbeResult,
} from "./lib/fetch/index.js";
export {
  createForge,
  detectForge,
  GitHubForge,
  GitLabForge,
  type Forge,
  type ForgeFile,
  type ForgeKind,
} from "./lib/forges/index.js";
export {
  ConfigNotFoundError,
  DuplicateConfigNameError,
  ForgeFetchError,
  UserConfigNotFoundError,
  ConfigFetchTimeoutError,
  UnsupportedCapabilityError,
  ForgeRequestError,
} from "./lib/errors.js";
export { loadSettings, resolveRepoPolicy, DEFAULT_SETTINGS, type ResolvedSettings } from "./lib/config/index.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/logger.js";
export { runCommand, type RunCommand } from "./lib/run-command.js";
export {
  DEFAULT_CONFIG_ORDER,
  MAX_SCAN_DEPTH,
  type FileMeta,
  type Pipeline,
  type Repo,
  type RepoConfigPolicy,
  type User,
} from "./lib/types.js";
