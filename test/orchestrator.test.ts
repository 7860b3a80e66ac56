import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  HttpStatusError,
  NetworkError,
  type PipelineError,
  StorageError,
} from "../src/errors.js";
import { isRetryable, runWithRetry } from "../src/orchestrator.js";
import { err, ok, type Result } from "../src/types.js";

describe("isRetryable", () => {
  it("retries transient failures only", () => {
    expect(isRetryable(new NetworkError("timeout"))).toBe(true);
    expect(isRetryable(new HttpStatusError(502))).toBe(true);
    expect(isRetryable(new HttpStatusError(404))).toBe(false);
    expect(isRetryable(new HttpStatusError(429))).toBe(false);
    expect(isRetryable(new StorageError("disk-full", "no space"))).toBe(false);
  });
});

describe("runWithRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function sequence(
    results: Result<number, PipelineError>[]
  ): () => Promise<Result<number, PipelineError>> {
    let call = 0;
    return vi.fn(async () => {
      const result = results[Math.min(call, results.length - 1)];
      call += 1;
      return result;
    });
  }

  it("re-runs after a network failure with exponential backoff", async () => {
    const run = sequence([
      err(new NetworkError("reset")),
      err(new HttpStatusError(503)),
      ok(24),
    ]);
    const sleep = vi.fn(async (_ms: number) => undefined);

    const result = await runWithRetry(run, { attempts: 3, baseDelayMs: 100, sleep });

    expect(result).toEqual({ ok: true, value: 24 });
    expect(run).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("returns a permanent failure immediately", async () => {
    const run = sequence([err(new HttpStatusError(400)), ok(1)]);
    const sleep = vi.fn(async (_ms: number) => undefined);

    const result = await runWithRetry(run, { sleep });

    expect(result).toMatchObject({ ok: false, error: { code: 400 } });
    expect(run).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up after the last attempt", async () => {
    const run = sequence([err(new NetworkError("down"))]);
    const sleep = vi.fn(async (_ms: number) => undefined);

    const result = await runWithRetry(run, { attempts: 2, baseDelayMs: 10, sleep });

    expect(result).toMatchObject({ ok: false, error: { kind: "NetworkError" } });
    expect(run).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[10]]);
  });
});
