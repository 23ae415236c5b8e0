/**
 * fetch/cascade.ts — First-match-wins search over config candidates.
 *
 * Each candidate is probed in order. A probe either wins (the cascade stops),
 * misses (nothing there, try the next one), or fails with a forge error that
 * is kept as evidence. Duplicate logical names abort the whole search.
 */
import type { Forge, ForgeFile } from "../forges/forge.js";
import type { Logger } from "../logger.js";
import type { FileMeta, Pipeline, Repo, User } from "../types.js";
import { ConfigNotFoundError, ForgeFetchError, UnsupportedCapabilityError } from "../errors.js";
import { filterPipelineFiles, validateUniqueFileNames } from "./filter.js";

export type FetchScope = {
  forge: Forge;
  user: User;
  repo: Repo;
  pipeline: Pipeline;
  logger: Logger;
  signal?: AbortSignal;
};

export type ProbeResult =
  | { kind: "found"; files: FileMeta[] }
  | { kind: "miss"; note: string }
  | { kind: "error"; error: Error; note: string };

export function isDirectoryCandidate(candidate: string): boolean {
  return candidate.endsWith("/");
}

/**
 * Probe one candidate. Throws only DuplicateConfigNameError; every other
 * outcome is classified in the result.
 */
export async function probeCandidate(scope: FetchScope, candidate: string): Promise<ProbeResult> {
  scope.logger.trace(`fetching ${candidate} from forge`);
  return isDirectoryCandidate(candidate)
    ? probeDirectory(scope, candidate)
    : probeFile(scope, candidate);
}

async function probeDirectory(scope: FetchScope, candidate: string): Promise<ProbeResult> {
  const { forge, user, repo, pipeline, logger, signal } = scope;
  const notFound: ProbeResult = { kind: "miss", note: `${candidate}: not found or not implemented` };
  if (!forge.dir) return notFound;

  const basePath = candidate.slice(0, -1);
  let listing: ForgeFile[] | null;
  try {
    listing = await forge.dir(user, repo, pipeline, basePath, repo.policy.scanDepth, signal);
  } catch (err) {
    const error = toError(err);
    if (error instanceof UnsupportedCapabilityError) return notFound;
    logger.error(`could not get folder from forge: ${error.message}`, { user: user.login });
    return { kind: "error", error, note: `${candidate}: error - ${error.message}` };
  }
  if (listing === null) return notFound;

  const files = filterPipelineFiles(listing, repo.policy);
  if (files.length === 0) {
    const names = listing.map((file) => file.name);
    const note = `${candidate}: found ${names.length} items but none are pipeline files: [${names.join(" ")}]`;
    logger.debug(note);
    return { kind: "miss", note };
  }

  try {
    validateUniqueFileNames(files);
  } catch (err) {
    logger.error("duplicate config file names found", { error: toError(err) });
    throw err;
  }

  logger.info(`found ${files.length} config files in '${candidate}': [${files.map((f) => f.name).join(" ")}]`);
  return { kind: "found", files: files.map((file) => ({ name: file.name, data: file.data })) };
}

async function probeFile(scope: FetchScope, candidate: string): Promise<ProbeResult> {
  const { forge, user, repo, pipeline, logger, signal } = scope;
  let data: Buffer | null;
  try {
    data = await forge.file(user, repo, pipeline, candidate, signal);
  } catch (err) {
    const error = toError(err);
    if (error instanceof UnsupportedCapabilityError) {
      return { kind: "miss", note: `${candidate}: not found or not implemented` };
    }
    return { kind: "error", error, note: `${candidate}: error - ${error.message}` };
  }

  if (data === null) return { kind: "miss", note: `${candidate}: file not found` };
  if (data.length === 0) return { kind: "miss", note: `${candidate}: file is empty` };

  logger.info(`found config file: '${candidate}'`);
  return { kind: "found", files: [{ name: candidate, data }] };
}

/**
 * Probe `configs` in order and return the first non-empty match.
 *
 * Throws DuplicateConfigNameError straight from the probe that found it,
 * ForgeFetchError when any probe failed with a forge error, and
 * ConfigNotFoundError when every probe simply missed.
 */
export async function getFirstAvailableConfig(
  scope: FetchScope,
  configs: readonly string[],
): Promise<FileMeta[]> {
  const forgeErrors: Error[] = [];
  const debugInfo: string[] = [];

  for (const fileOrFolder of configs) {
    if (scope.signal?.aborted) {
      forgeErrors.push(abortReason(scope.signal));
      break;
    }

    const result = await probeCandidate(scope, fileOrFolder);
    if (result.kind === "found") return result.files;
    if (result.kind === "error") forgeErrors.push(result.error);
    debugInfo.push(result.note);
  }

  if (forgeErrors.length > 0) {
    throw new ForgeFetchError(forgeErrors);
  }

  scope.logger.warn(`No config found. Searched: [${debugInfo.join(", ")}]`);
  throw new ConfigNotFoundError(configs);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("operation aborted");
}
