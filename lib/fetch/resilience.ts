/**
 * fetch/resilience.ts — Retry and per-attempt timeout for config resolution.
 *
 * Uses cockatiel. Attempts run one after another with no backoff; each gets
 * its own timeout window starting when the attempt starts.
 */
import {
  ConstantBackoff,
  handleWhen,
  retry,
  timeout,
  TimeoutStrategy,
  wrap,
  type IPolicy,
} from "cockatiel";
import { DuplicateConfigNameError } from "../errors.js";

export type FetchPolicyOptions = {
  /** Total attempts, including the first. */
  attempts: number;
  /** Budget per attempt. */
  timeoutMs: number;
};

/** A duplicate name is a property of the repository content; retrying cannot clear it. */
export function isRetryable(err: Error): boolean {
  return !(err instanceof DuplicateConfigNameError);
}

/**
 * Retry wrapping a cooperative timeout: the attempt's signal is aborted when
 * its window closes, and the attempt itself decides what to throw.
 */
export function createFetchPolicy(opts: FetchPolicyOptions): IPolicy {
  const retryPolicy = retry(handleWhen(isRetryable), {
    maxAttempts: Math.max(0, opts.attempts - 1),
    backoff: new ConstantBackoff(0),
  });
  const timeoutPolicy = timeout(opts.timeoutMs, TimeoutStrategy.Cooperative);
  return wrap(retryPolicy, timeoutPolicy);
}
