/**
 * run-command.ts — Subprocess runner used by the CLI-backed forges.
 *
 * Never rejects on a non-zero exit; callers inspect `code` and `stderr`.
 * Rejects only when the call was cancelled through `signal`.
 */
import { execa } from "execa";

export type RunCommandOptions = {
  timeoutMs: number;
  cwd?: string;
  /** Merged over the parent environment. */
  env?: Record<string, string>;
  signal?: AbortSignal;
};

export type CommandResult = {
  stdout: string;
  stderr: string;
  /** null when the process never produced an exit code (spawn failure, timeout, signal). */
  code: number | null;
};

export type RunCommand = (argv: string[], opts: RunCommandOptions) => Promise<CommandResult>;

export const runCommand: RunCommand = async (argv, opts) => {
  const [file, ...args] = argv;
  if (!file) throw new Error("runCommand: empty argv");

  const result = await execa(file, args, {
    cwd: opts.cwd,
    env: opts.env,
    timeout: opts.timeoutMs,
    cancelSignal: opts.signal,
    reject: false,
    stripFinalNewline: true,
  });

  if (result.isCanceled) {
    throw new Error(`${file} cancelled`);
  }

  return {
    stdout: result.stdout,
    // Spawn failures and timeouts leave stderr empty; keep the reason.
    stderr: result.stderr || (result.timedOut ? `${file} timed out after ${opts.timeoutMs}ms` : ""),
    code: result.exitCode ?? null,
  };
};
