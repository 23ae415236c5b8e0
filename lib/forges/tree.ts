/**
 * forges/tree.ts — Helpers shared by the CLI-backed forges.
 */

/**
 * Whether `filePath` lies under `basePath` at most `depth` levels down.
 * basePath "" is the repository root. Depth 0 means direct children only.
 */
export function isWithinDepth(basePath: string, filePath: string, depth: number): boolean {
  const prefix = basePath === "" ? "" : `${basePath}/`;
  if (!filePath.startsWith(prefix)) return false;
  const rest = filePath.slice(prefix.length);
  if (rest === "") return false;
  return rest.split("/").length <= depth + 1;
}

/** gh and glab both report missing resources as HTTP 404 on stderr. */
export function isNotFound(stderr: string): boolean {
  return /HTTP 404|404 Not Found/i.test(stderr);
}

/** Decode the `content` field of a GitHub/GitLab file response. */
export function decodeContent(content: string, encoding: string | undefined): Buffer {
  if (encoding === "base64") return Buffer.from(content.replace(/\n/g, ""), "base64");
  return Buffer.from(content, "utf-8");
}

/** Strip leading/trailing slashes so "ci/", "/ci" and "ci" address the same directory. "." is the root. */
export function normalizeDirPath(path: string): string {
  const trimmed = path.replace(/^\/+|\/+$/g, "");
  return trimmed === "." ? "" : trimmed;
}

/** Percent-encode each segment of a repository path, keeping the separators. */
export function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}
