/**
 * errors.ts — Classified failures of config resolution.
 *
 * Callers branch on the class (or `name`), never on message text.
 */

/** No candidate matched and no forge call failed. */
export class ConfigNotFoundError extends Error {
  readonly configs: readonly string[];

  constructor(configs: readonly string[]) {
    super(`config not found in: ${configs.join(", ")}`);
    this.name = "ConfigNotFoundError";
    this.configs = [...configs];
  }
}

/** Two resolved files share a logical name. Never retried. */
export class DuplicateConfigNameError extends Error {
  readonly fileName: string;
  readonly firstPath: string;
  readonly secondPath: string;

  constructor(fileName: string, firstPath: string, secondPath: string) {
    super(`duplicate config file name '${fileName}' found at paths: '${firstPath}' and '${secondPath}'`);
    this.name = "DuplicateConfigNameError";
    this.fileName = fileName;
    this.firstPath = firstPath;
    this.secondPath = secondPath;
  }
}

/**
 * One or more candidates failed with a real forge error and nothing matched.
 * Individual causes stay inspectable through `errors`.
 */
export class ForgeFetchError extends AggregateError {
  constructor(errors: Error[]) {
    super(errors, `forge errors while fetching config: ${errors.map((e) => e.message).join("; ")}`);
    this.name = "ForgeFetchError";
  }
}

/** The repository's explicit config setting could not be resolved. */
export class UserConfigNotFoundError extends Error {
  readonly config: string;

  constructor(config: string, cause: Error) {
    super(`user defined config '${config}' not found: ${cause.message}`, { cause });
    this.name = "UserConfigNotFoundError";
    this.config = config;
  }
}

/** The attempt's time budget ran out, or the caller cancelled, before anything matched. */
export class ConfigFetchTimeoutError extends Error {
  readonly timeoutMs: number;
  readonly cancelled: boolean;

  constructor(timeoutMs: number, opts: { cancelled: boolean; cause?: Error }) {
    super(
      opts.cancelled
        ? "config fetch cancelled"
        : `config fetch timed out after ${timeoutMs}ms`,
      { cause: opts.cause },
    );
    this.name = "ConfigFetchTimeoutError";
    this.timeoutMs = timeoutMs;
    this.cancelled = opts.cancelled;
  }
}

/** A forge lacks an operation. Converted to a soft-miss by the resolver. */
export class UnsupportedCapabilityError extends Error {
  readonly forge: string;
  readonly capability: "file" | "dir";

  constructor(forge: string, capability: "file" | "dir") {
    super(`forge ${forge} does not support capability: ${capability}`);
    this.name = "UnsupportedCapabilityError";
    this.forge = forge;
    this.capability = capability;
  }
}

/** A forge CLI call exited non-zero for a reason other than "not found". */
export class ForgeRequestError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(`${command} failed (exit ${exitCode ?? "?"}): ${stderr.trim() || "no output"}`);
    this.name = "ForgeRequestError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
