/**
 * GitLabForge — Forge implementation using the glab CLI.
 */
import { z } from "zod";
import type { Forge, ForgeFile } from "./forge.js";
import type { RunCommand } from "../run-command.js";
import type { Pipeline, Repo, User } from "../types.js";
import { ForgeRequestError } from "../errors.js";
import { decodeContent, isNotFound, isWithinDepth, normalizeDirPath } from "./tree.js";

const GitLabFileSchema = z.object({
  file_path: z.string(),
  content: z.string(),
  encoding: z.string().optional(),
});

const GitLabTreeSchema = z.array(z.object({ path: z.string(), type: z.string() }));

/** Entries per tree page; a shorter page is the last one. */
const TREE_PAGE_SIZE = 100;

export class GitLabForge implements Forge {
  readonly name = "gitlab";
  private runCommand: RunCommand;
  private repoPath: string | undefined;
  private timeoutMs: number;

  constructor(opts: { runCommand: RunCommand; repoPath?: string; timeoutMs?: number }) {
    this.runCommand = opts.runCommand;
    this.repoPath = opts.repoPath;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  private async glab(user: User, args: string[], signal?: AbortSignal): Promise<string | null> {
    const result = await this.runCommand(["glab", ...args], {
      timeoutMs: this.timeoutMs,
      cwd: this.repoPath,
      env: user.token ? { GITLAB_TOKEN: user.token } : undefined,
      signal,
    });
    if (result.code === 0) return result.stdout;
    if (isNotFound(result.stderr)) return null;
    throw new ForgeRequestError(`glab ${args.join(" ")}`, result.code, result.stderr);
  }

  private projectId(repo: Repo): string {
    return encodeURIComponent(repo.fullName);
  }

  async file(user: User, repo: Repo, pipeline: Pipeline, path: string, signal?: AbortSignal): Promise<Buffer | null> {
    const endpoint =
      `projects/${this.projectId(repo)}/repository/files/${encodeURIComponent(path)}` +
      `?ref=${encodeURIComponent(pipeline.commit)}`;
    const raw = await this.glab(user, ["api", endpoint], signal);
    if (raw === null) return null;

    const parsed = GitLabFileSchema.parse(JSON.parse(raw));
    return decodeContent(parsed.content, parsed.encoding);
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
    const entries: z.infer<typeof GitLabTreeSchema> = [];
    for (let page = 1; ; page++) {
      const query = new URLSearchParams({
        ref: pipeline.commit,
        recursive: "true",
        per_page: String(TREE_PAGE_SIZE),
      });
      if (base !== "") query.set("path", base);
      query.set("page", String(page));

      const raw = await this.glab(user, ["api", `projects/${this.projectId(repo)}/repository/tree?${query.toString()}`], signal);
      if (raw === null) {
        if (page === 1) return null;
        break;
      }
      const batch = GitLabTreeSchema.parse(JSON.parse(raw));
      entries.push(...batch);
      if (batch.length < TREE_PAGE_SIZE) break;
    }

    const files: ForgeFile[] = [];
    for (const entry of entries) {
      if (entry.type !== "blob" || !isWithinDepth(base, entry.path, depth)) continue;
      const data = await this.file(user, repo, pipeline, entry.path, signal);
      if (data !== null) files.push({ name: entry.path, data });
    }
    return files;
  }
}
