/**
 * cli.ts — CLI registration for `pipeconf resolve`.
 *
 * Uses Commander.js. Dependencies are injected so tests can drive the
 * command without spawning gh/glab.
 */
import { InvalidArgumentError, type Command } from "commander";
import { loadSettings, resolveRepoPolicy } from "./config/index.js";
import { createForge, type Forge, type ForgeKind } from "./forges/index.js";
import { ForgeConfigFetcher } from "./fetch/index.js";
import { createLogger, LOG_LEVELS, type LogLevel } from "./logger.js";
import type { RunCommand } from "./run-command.js";
import type { FileMeta, Repo } from "./types.js";

export type CliDeps = {
  runCommand: RunCommand;
  /** Overrides forge construction (tests). */
  forge?: Forge;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  signal?: AbortSignal;
};

export type ResolveOptions = {
  commit: string;
  forge?: ForgeKind;
  repoPath?: string;
  config?: string;
  depth?: number;
  ignoreTemplates?: boolean;
  settings?: string;
  user: string;
  json?: boolean;
  print?: boolean;
  logLevel?: LogLevel;
};

/**
 * Register the `resolve` command on a Commander program.
 */
export function registerCli(program: Command, deps: CliDeps): void {
  program
    .command("resolve")
    .description("Resolve the pipeline config files for a repository at a commit")
    .argument("<repo>", "Repository as owner/name (GitLab groups: group/sub/name)")
    .requiredOption("--commit <sha>", "Revision to read config from")
    .option("--forge <kind>", "github or gitlab (default: detect from --repo-path remote)", parseForgeKind)
    .option("--repo-path <dir>", "Local checkout; used for forge detection and pipeconf.yaml")
    .option("--config <path>", "Explicit config file or directory (trailing /) instead of the defaults")
    .option("--depth <n>", "Subdirectory levels to scan below a config directory (0-10)", parseInteger)
    .option("--ignore-templates", "Skip files with \"template\" in their name")
    .option("--settings <file>", "Settings file layered over the workspace pipeconf.yaml")
    .option("--user <login>", "Login recorded in logs", "cli")
    .option("--json", "Print files as JSON")
    .option("--print", "Print file contents")
    .option("--log-level <level>", "trace, debug, info, warn or error", parseLogLevel)
    .action(async (repo: string, opts: ResolveOptions) => {
      process.exitCode = await runResolve(repo, opts, deps);
    });
}

/**
 * Resolve and print. Returns the process exit code.
 */
export async function runResolve(repoArg: string, opts: ResolveOptions, deps: CliDeps): Promise<number> {
  try {
    const settings = await loadSettings({ workspaceDir: opts.repoPath, file: opts.settings });
    const logger = createLogger({
      level: opts.logLevel ?? settings.log.level,
      json: settings.log.json,
      write: deps.stderr,
    });

    const policy = resolveRepoPolicy(
      { override: opts.config, scanDepth: opts.depth, ignoreTemplateFiles: opts.ignoreTemplates },
      settings.repoDefaults,
    );
    const repo: Repo = { ...parseRepo(repoArg), policy };

    const forge = deps.forge ?? (await createForge({
      kind: opts.forge,
      repoPath: opts.repoPath,
      runCommand: deps.runCommand,
      timeoutMs: settings.fetch.timeoutMs,
    })).forge;

    const fetcher = new ForgeConfigFetcher({
      timeoutMs: settings.fetch.timeoutMs,
      attempts: settings.fetch.attempts,
      defaultOrder: settings.fetch.defaultOrder,
      logger,
    });

    const files = await fetcher.fetch({
      forge,
      user: { login: opts.user },
      repo,
      pipeline: { commit: opts.commit },
      signal: deps.signal,
    });
    deps.stdout(formatFiles(files, opts));
    return 0;
  } catch (err) {
    deps.stderr(`pipeconf: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

export function formatFiles(files: FileMeta[], opts: { json?: boolean; print?: boolean }): string {
  if (opts.json) {
    const rows = files.map((f) => ({ name: f.name, size: f.data.length, content: f.data.toString("utf-8") }));
    return `${JSON.stringify(rows, null, 2)}\n`;
  }
  if (opts.print) {
    return files.map((f) => `--- ${f.name}\n${f.data.toString("utf-8")}`).join("\n");
  }
  return files.map((f) => `${f.name}\t${f.data.length}\n`).join("");
}

/** "group/sub/name" → owner "group/sub", name "name". */
export function parseRepo(fullName: string): Pick<Repo, "owner" | "name" | "fullName"> {
  const trimmed = fullName.replace(/^\/+|\/+$/g, "");
  const idx = trimmed.lastIndexOf("/");
  if (idx <= 0 || idx === trimmed.length - 1) {
    throw new Error(`Invalid repository "${fullName}": expected owner/name`);
  }
  return { owner: trimmed.slice(0, idx), name: trimmed.slice(idx + 1), fullName: trimmed };
}

function parseForgeKind(value: string): ForgeKind {
  if (value === "github" || value === "gitlab") return value;
  throw new InvalidArgumentError(`Unknown forge "${value}" (expected github or gitlab)`);
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  if (!level) throw new InvalidArgumentError(`Unknown log level "${value}"`);
  return level;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`Not an integer: ${value}`);
  return n;
}
