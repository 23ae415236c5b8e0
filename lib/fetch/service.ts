/**
 * fetch/service.ts — Entry point for resolving a pipeline's config files.
 *
 * Order of business:
 *   1. Restart with prior data → return it, no forge traffic.
 *   2. Repo override set → search only that location.
 *      Otherwise → search the default order.
 *   3. Each search attempt is bounded by a timeout and retried up to `attempts`.
 */
import type { IPolicy } from "cockatiel";
import type { Forge } from "../forges/forge.js";
import { silentLogger, type Logger } from "../logger.js";
import { DEFAULT_CONFIG_ORDER, type FileMeta, type Pipeline, type Repo, type User } from "../types.js";
import {
  ConfigFetchTimeoutError,
  DuplicateConfigNameError,
  UserConfigNotFoundError,
} from "../errors.js";
import { getFirstAvailableConfig, toError, type FetchScope } from "./cascade.js";
import { createFetchPolicy } from "./resilience.js";

export type FetcherOptions = {
  /** Budget per attempt, in milliseconds. */
  timeoutMs: number;
  /** Total attempts. */
  attempts: number;
  /** Replaces the built-in default order for this fetcher. Frozen on construction. */
  defaultOrder?: readonly string[];
  logger?: Logger;
};

export type FetchRequest = {
  forge: Forge;
  user: User;
  repo: Repo;
  pipeline: Pipeline;
  /** Config resolved by an earlier run of this pipeline. */
  previous?: FileMeta[];
  restart?: boolean;
  signal?: AbortSignal;
};

export class ForgeConfigFetcher {
  readonly timeoutMs: number;
  readonly attempts: number;
  readonly defaultOrder: readonly string[];
  private logger: Logger;
  private policy: IPolicy;

  constructor(opts: FetcherOptions) {
    if (!Number.isInteger(opts.attempts) || opts.attempts < 1) {
      throw new RangeError(`attempts must be a positive integer, got ${opts.attempts}`);
    }
    if (!(opts.timeoutMs > 0)) {
      throw new RangeError(`timeoutMs must be positive, got ${opts.timeoutMs}`);
    }
    this.timeoutMs = opts.timeoutMs;
    this.attempts = opts.attempts;
    this.defaultOrder = Object.freeze([...(opts.defaultOrder ?? DEFAULT_CONFIG_ORDER)]);
    this.logger = opts.logger ?? silentLogger;
    this.policy = createFetchPolicy({ attempts: opts.attempts, timeoutMs: opts.timeoutMs });
  }

  async fetch(req: FetchRequest): Promise<FileMeta[]> {
    // Skip fetching when restarting with the old config
    if (req.restart && req.previous && req.previous.length > 0) {
      return req.previous;
    }

    const config = req.repo.policy.override.trim();
    const logger = this.logger.child({ repo: req.repo.fullName });
    let attempt = 0;

    return this.policy.execute(async ({ signal }) => {
      attempt++;
      try {
        return await this.fetchOnce({ ...req, logger, signal }, config, req.signal);
      } catch (err) {
        logger.trace(`Fetching config files: attempt #${attempt} failed`, { error: toError(err) });
        throw err;
      }
    }, req.signal);
  }

  /** One attempt. `scope.signal` is this attempt's timeout signal. */
  private async fetchOnce(scope: FetchScope & { signal: AbortSignal }, config: string, outer?: AbortSignal): Promise<FileMeta[]> {
    if (config.length > 0) {
      scope.logger.trace(`use user config '${config}'`);
    } else {
      scope.logger.trace("user did not define own config, following default procedure");
    }

    const candidates = config.length > 0 ? [config] : this.defaultOrder;
    try {
      return await getFirstAvailableConfig(scope, candidates);
    } catch (err) {
      const error = toError(err);
      if (error instanceof DuplicateConfigNameError) throw error;
      if (scope.signal.aborted) {
        throw new ConfigFetchTimeoutError(this.timeoutMs, { cancelled: outer?.aborted ?? false, cause: error });
      }
      if (config.length > 0) throw new UserConfigNotFoundError(config, error);
      throw error;
    }
  }
}
