/**
 * config/loader.ts — Layered settings loading.
 *
 * Resolution order:
 *   1. Built-in defaults
 *   2. Workspace: <workspace>/pipeconf.yaml
 *   3. Explicit file (e.g. --settings on the CLI)
 */
import fs from "node:fs/promises";
import path from "node:path";
import YAML, { YAMLError } from "yaml";
import { ZodError } from "zod";
import { DEFAULT_CONFIG_ORDER, type RepoConfigPolicy } from "../types.js";
import { mergeSettings } from "./merge.js";
import { validateConfig, validateRepoPolicy } from "./schema.js";
import type { PipeconfConfig, RepoDefaults, ResolvedSettings } from "./types.js";

export const SETTINGS_FILE = "pipeconf.yaml";

export const DEFAULT_SETTINGS: ResolvedSettings = {
  fetch: {
    timeoutMs: 5_000,
    attempts: 3,
    defaultOrder: [...DEFAULT_CONFIG_ORDER],
  },
  repoDefaults: {
    scanDepth: 0,
    ignoreTemplateFiles: false,
  },
  log: {
    level: "info",
    json: false,
  },
};

/**
 * Load and resolve settings.
 *
 * Merges: built-in → workspace pipeconf.yaml → explicit file.
 * A missing workspace file is fine; a missing explicit file is an error.
 */
export async function loadSettings(opts: { workspaceDir?: string; file?: string } = {}): Promise<ResolvedSettings> {
  let merged: PipeconfConfig = DEFAULT_SETTINGS;

  if (opts.workspaceDir) {
    const workspaceConfig = await readSettingsFile(path.join(opts.workspaceDir, SETTINGS_FILE));
    if (workspaceConfig) merged = mergeSettings(merged, workspaceConfig);
  }

  if (opts.file) {
    const fileConfig = await readSettingsFile(opts.file);
    if (!fileConfig) throw new Error(`Settings file not found: ${opts.file}`);
    merged = mergeSettings(merged, fileConfig);
  }

  return resolve(merged);
}

function resolve(config: PipeconfConfig): ResolvedSettings {
  return {
    fetch: {
      timeoutMs: config.fetch?.timeoutMs ?? DEFAULT_SETTINGS.fetch.timeoutMs,
      attempts: config.fetch?.attempts ?? DEFAULT_SETTINGS.fetch.attempts,
      defaultOrder: [...(config.fetch?.defaultOrder ?? DEFAULT_SETTINGS.fetch.defaultOrder)],
    },
    repoDefaults: {
      scanDepth: config.repoDefaults?.scanDepth ?? DEFAULT_SETTINGS.repoDefaults.scanDepth,
      ignoreTemplateFiles: config.repoDefaults?.ignoreTemplateFiles ?? DEFAULT_SETTINGS.repoDefaults.ignoreTemplateFiles,
    },
    log: {
      level: config.log?.level ?? DEFAULT_SETTINGS.log.level,
      json: config.log?.json ?? DEFAULT_SETTINGS.log.json,
    },
  };
}

/**
 * Fill a repository's policy from the defaults and validate it.
 * Throws when scanDepth is outside 0..10.
 */
export function resolveRepoPolicy(
  repo: Partial<RepoConfigPolicy>,
  defaults: RepoDefaults = DEFAULT_SETTINGS.repoDefaults,
): RepoConfigPolicy {
  return validateRepoPolicy({
    override: repo.override ?? "",
    scanDepth: repo.scanDepth ?? defaults.scanDepth,
    ignoreTemplateFiles: repo.ignoreTemplateFiles ?? defaults.ignoreTemplateFiles,
  });
}

// ---------------------------------------------------------------------------
// File reading helpers
// ---------------------------------------------------------------------------

/** Read one settings file. Null when it does not exist; throws when it is invalid. */
async function readSettingsFile(filePath: string): Promise<PipeconfConfig | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }

  try {
    const parsed: unknown = YAML.parse(content);
    // An empty file parses to null — same as no overrides.
    return parsed == null ? {} : validateConfig(parsed);
  } catch (err) {
    if (err instanceof ZodError || err instanceof YAMLError) {
      throw new Error(`Invalid ${SETTINGS_FILE} at ${filePath}: ${err.message}`);
    }
    throw err;
  }
}
