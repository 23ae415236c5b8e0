/**
 * GitHubForge — Forge implementation using the gh CLI.
 */
import { z } from "zod";
import type { Forge, ForgeFile } from "./forge.js";
import type { RunCommand } from "../run-command.js";
import type { Pipeline, Repo, User } from "../types.js";
import { ForgeRequestError } from "../errors.js";
import { decodeContent, encodePath, isNotFound, isWithinDepth, normalizeDirPath } from "./tree.js";

const GhContentSchema = z.object({
  type: z.string(),
  path: z.string(),
  content: z.string().optional(),
  encoding: z.string().optional(),
});

const GhTreeSchema = z.object({
  tree: z.array(z.object({ path: z.string(), type: z.string() })),
  truncated: z.boolean().optional(),
});

export class GitHubForge implements Forge {
  readonly name = "github";
  private runCommand: RunCommand;
  private repoPath: string | undefined;
  private timeoutMs: number;

  constructor(opts: { runCommand: RunCommand; repoPath?: string; timeoutMs?: number }) {
    this.runCommand = opts.runCommand;
    this.repoPath = opts.repoPath;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  /** Run `gh`; null on 404, stdout on success. */
  private async gh(user: User, args: string[], signal?: AbortSignal): Promise<string | null> {
    const result = await this.runCommand(["gh", ...args], {
      timeoutMs: this.timeoutMs,
      cwd: this.repoPath,
      env: user.token ? { GH_TOKEN: user.token } : undefined,
      signal,
    });
    if (result.code === 0) return result.stdout;
    if (isNotFound(result.stderr)) return null;
    throw new ForgeRequestError(`gh ${args.join(" ")}`, result.code, result.stderr);
  }

  async file(user: User, repo: Repo, pipeline: Pipeline, path: string, signal?: AbortSignal): Promise<Buffer | null> {
    const endpoint = `repos/${repo.owner}/${repo.name}/contents/${encodePath(path)}?ref=${encodeURIComponent(pipeline.commit)}`;
    const raw = await this.gh(user, ["api", endpoint], signal);
    if (raw === null) return null;

    const parsed = GhContentSchema.safeParse(JSON.parse(raw));
    // A directory at this path comes back as an array; that is not a file.
    if (!parsed.success || parsed.data.type !== "file") return null;
    // Files over 1 MB come back without content.
    if (parsed.data.encoding === "none") {
      throw new ForgeRequestError(`gh api ${endpoint}`, 0, `${path} is too large for the contents API`);
    }
    return decodeContent(parsed.data.content ?? "", parsed.data.encoding);
  }

  async dir(
    user: User,
    repo: Repo,
    pipeline: Pipeline,
    path: string,
    depth: number,
    signal?: AbortSignal,
  ): Promise<ForgeFile[] | null> {
    const base = normalizeDirPath(path);
    const endpoint = `repos/${repo.owner}/${repo.name}/git/trees/${encodeURIComponent(pipeline.commit)}?recursive=1`;
    const raw = await this.gh(user, ["api", endpoint], signal);
    if (raw === null) return null;

    const { tree, truncated } = GhTreeSchema.parse(JSON.parse(raw));
    if (truncated) {
      throw new ForgeRequestError(`gh api ${endpoint}`, 0, "recursive tree listing was truncated");
    }
    if (base !== "" && !tree.some((entry) => entry.type === "tree" && entry.path === base)) {
      return null;
    }

    const files: ForgeFile[] = [];
    for (const entry of tree) {
      if (entry.type !== "blob" || !isWithinDepth(base, entry.path, depth)) continue;
      const data = await this.file(user, repo, pipeline, entry.path, signal);
      if (data !== null) files.push({ name: entry.path, data });
    }
    return files;
  }
}
