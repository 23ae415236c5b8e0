/**
 * fetch/filter.ts — Narrow a directory listing to pipeline files.
 */
import type { ForgeFile } from "../forges/forge.js";
import { DuplicateConfigNameError } from "../errors.js";

export const CONFIG_EXTENSIONS = [".yml", ".yaml"] as const;

export function isPipelineFileName(name: string): boolean {
  return CONFIG_EXTENSIONS.some((ext) => name.endsWith(ext));
}

/**
 * Keep .yml/.yaml entries, in input order.
 * With `ignoreTemplateFiles`, also drop any name containing "template" in any case.
 */
export function filterPipelineFiles<T extends ForgeFile>(
  files: readonly T[],
  opts: { ignoreTemplateFiles: boolean },
): T[] {
  return files.filter((file) => {
    if (!isPipelineFileName(file.name)) return false;
    if (opts.ignoreTemplateFiles && file.name.toLowerCase().includes("template")) return false;
    return true;
  });
}

/** "ci/sub/build.yaml" → "build". */
export function logicalName(path: string): string {
  const stem = path.replace(/\.yml$/, "").replace(/\.yaml$/, "");
  const parts = stem.split("/");
  return parts[parts.length - 1] ?? stem;
}

/**
 * Throw on the first pair of files sharing a logical name.
 * Downstream merging keys by that name, so a collision has no defined winner.
 */
export function validateUniqueFileNames(files: readonly ForgeFile[]): void {
  const seen = new Map<string, string>();
  for (const file of files) {
    const key = logicalName(file.name);
    const existing = seen.get(key);
    if (existing !== undefined) {
      throw new DuplicateConfigNameError(key, existing, file.name);
    }
    seen.set(key, file.name);
  }
}
