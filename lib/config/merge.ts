/**
 * config/merge.ts — Merge for pipeconf settings layers.
 *
 * Merge semantics:
 * - Sections: shallow merge (sparse override)
 * - Arrays: replace entirely
 * - Primitives: override
 */
import type { PipeconfConfig } from "./types.js";

/**
 * Merge a settings overlay on top of a base.
 * Returns a new config — does not mutate inputs.
 */
export function mergeSettings(
  base: PipeconfConfig,
  overlay: PipeconfConfig,
): PipeconfConfig {
  const merged: PipeconfConfig = {};

  if (base.fetch || overlay.fetch) {
    merged.fetch = { ...base.fetch, ...overlay.fetch };
    const order = overlay.fetch?.defaultOrder ?? base.fetch?.defaultOrder;
    if (order) merged.fetch.defaultOrder = [...order];
  }

  if (base.repoDefaults || overlay.repoDefaults) {
    merged.repoDefaults = { ...base.repoDefaults, ...overlay.repoDefaults };
  }

  if (base.log || overlay.log) {
    merged.log = { ...base.log, ...overlay.log };
  }

  return merged;
}
