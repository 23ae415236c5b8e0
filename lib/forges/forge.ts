/**
 * Forge — capability interface for reading repository files at a revision.
 *
 * Implementations: GitHub (gh CLI), GitLab (glab CLI), in-memory TestForge.
 */
import type { Pipeline, Repo, User } from "../types.js";

/** Entry of a directory listing. Name is relative to the repository root. */
export type ForgeFile = {
  name: string;
  data: Buffer;
};

export type ForgeKind = "github" | "gitlab";

export interface Forge {
  /** Short identifier used in logs and errors. */
  readonly name: string;

  /**
   * Read one file at the pipeline's commit.
   * Returns null when the path does not exist. Throws on any other failure.
   */
  file(user: User, repo: Repo, pipeline: Pipeline, path: string, signal?: AbortSignal): Promise<Buffer | null>;

  /**
   * List files under `path` (no trailing slash; "" is the repository root).
   * Depth 0 returns only files directly under `path`; N adds N nested levels.
   * Returns null when the directory does not exist.
   *
   * Optional: a forge without directory listing leaves it undefined, or
   * throws UnsupportedCapabilityError when support depends on the repository.
   */
  dir?(
    user: User,
    repo: Repo,
    pipeline: Pipeline,
    path: string,
    depth: number,
    signal?: AbortSignal,
  ): Promise<ForgeFile[] | null>;
}
