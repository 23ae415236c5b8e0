/**
 * Forge factory — auto-detects GitHub vs GitLab from git remote.
 */
import type { Forge, ForgeKind } from "./forge.js";
import type { RunCommand } from "../run-command.js";
import { GitHubForge } from "./github.js";
import { GitLabForge } from "./gitlab.js";

export type { Forge, ForgeFile, ForgeKind } from "./forge.js";
export { GitHubForge } from "./github.js";
export { GitLabForge } from "./gitlab.js";

export type ForgeOptions = {
  kind?: ForgeKind;
  /** Local checkout; used for remote detection and as the CLI working directory. */
  repoPath?: string;
  runCommand: RunCommand;
  timeoutMs?: number;
};

export type ForgeWithKind = {
  forge: Forge;
  kind: ForgeKind;
};

export async function detectForge(repoPath: string, runCommand: RunCommand): Promise<ForgeKind> {
  const result = await runCommand(["git", "remote", "get-url", "origin"], { timeoutMs: 5_000, cwd: repoPath });
  if (result.code !== 0) return "gitlab";
  return result.stdout.trim().includes("github.com") ? "github" : "gitlab";
}

export async function createForge(opts: ForgeOptions): Promise<ForgeWithKind> {
  const kind = opts.kind ?? (opts.repoPath ? await detectForge(opts.repoPath, opts.runCommand) : undefined);
  if (!kind) throw new Error("Either kind or repoPath must be provided");

  const forgeOpts = { runCommand: opts.runCommand, repoPath: opts.repoPath, timeoutMs: opts.timeoutMs };
  const forge = kind === "github" ? new GitHubForge(forgeOpts) : new GitLabForge(forgeOpts);
  return { forge, kind };
}
