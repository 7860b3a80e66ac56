import {
  describeError,
  HttpStatusError,
  NetworkError,
  type PipelineError,
} from "./errors.js";
import type { Result } from "./types.js";
import { sleep } from "./utils.js";

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function isRetryable(error: PipelineError): boolean {
  if (error instanceof NetworkError) {
    return true;
  }
  return error instanceof HttpStatusError && error.code >= 500;
}

/**
 * Re-invokes a whole run while it fails with a transient error, backing off
 * exponentially between attempts. The last result is returned as is.
 */
export async function runWithRetry<T>(
  run: () => Promise<Result<T, PipelineError>>,
  options: RetryOptions = {}
): Promise<Result<T, PipelineError>> {
  const attempts = options.attempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 500;
  const wait = options.sleep ?? sleep;

  let result = await run();
  for (let attempt = 1; attempt < attempts; attempt += 1) {
    if (result.ok || !isRetryable(result.error)) {
      return result;
    }
    const backoffMs = baseDelayMs * 2 ** (attempt - 1);
    console.error(
      `Run attempt ${attempt} failed (${describeError(result.error)}), retrying in ${backoffMs}ms`
    );
    await wait(backoffMs);
    result = await run();
  }
  return result;
}
