/**
 * fetch/ — Pipeline config resolution against a forge.
 */
export { ForgeConfigFetcher, type FetcherOptions, type FetchRequest } from "./service.js";
export {
  getFirstAvailableConfig,
  probeCandidate,
  isDirectoryCandidate,
  type FetchScope,
  type ProbeResult,
} from "./cascade.js";
export {
  filterPipelineFiles,
  validateUniqueFileNames,
  logicalName,
  isPipelineFileName,
  CONFIG_EXTENSIONS,
} from "./filter.js";
export { createFetchPolicy, isRetryable, type FetchPolicyOptions } from "./resilience.js";
