/**
 * config/schema.ts — Zod validation for pipeconf settings and repo policy.
 */
import { z } from "zod";
import { MAX_SCAN_DEPTH, type RepoConfigPolicy } from "../types.js";
import type { PipeconfConfig } from "./types.js";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

const ScanDepthSchema = z.number().int().min(0).max(MAX_SCAN_DEPTH);

const FetchSettingsSchema = z.object({
  timeoutMs: z.number().positive().optional(),
  attempts: z.number().int().min(1).optional(),
  defaultOrder: z.array(z.string().min(1)).min(1).optional(),
}).strict();

const RepoDefaultsSchema = z.object({
  scanDepth: ScanDepthSchema.optional(),
  ignoreTemplateFiles: z.boolean().optional(),
}).strict();

const LogSettingsSchema = z.object({
  level: LogLevelSchema.optional(),
  json: z.boolean().optional(),
}).strict();

export const PipeconfConfigSchema = z.object({
  fetch: FetchSettingsSchema.optional(),
  repoDefaults: RepoDefaultsSchema.optional(),
  log: LogSettingsSchema.optional(),
}).strict();

export const RepoConfigPolicySchema = z.object({
  override: z.string(),
  scanDepth: ScanDepthSchema,
  ignoreTemplateFiles: z.boolean(),
});

/**
 * Validate a raw parsed settings object.
 * Returns the typed config or throws a ZodError.
 */
export function validateConfig(raw: unknown): PipeconfConfig {
  return PipeconfConfigSchema.parse(raw);
}

/** Validate a fully merged repo policy (scan depth range, field types). */
export function validateRepoPolicy(raw: unknown): RepoConfigPolicy {
  return RepoConfigPolicySchema.parse(raw);
}
