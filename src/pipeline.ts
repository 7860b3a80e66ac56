import type { ResponseCache } from "./cache.js";
import { PipelineError } from "./errors.js";
import { saveDataset } from "./storage.js";
import { normalize } from "./transform.js";
import {
  type DateRange,
  err,
  type LocationConfig,
  ok,
  type Result,
  type SaveMode,
  type VariableKind,
  type WeatherDataset,
} from "./types.js";
import { fetchWeather } from "./weather-client.js";

export interface PipelineRun {
  location: LocationConfig;
  dateRange: DateRange;
  variables: readonly VariableKind[];
  outputPath: string;
  mode: SaveMode;
  timeoutMs?: number;
  baseUrl?: string;
  cache?: ResponseCache;
  fetch?: typeof fetch;
  now?: Date;
}

export interface PipelineOutcome {
  /** Rows in the persisted table after the write. */
  recordCount: number;
  /** Rows produced by this run. */
  dataset: WeatherDataset;
}

/**
 * Fetch, normalize and persist one location as a single sequential unit.
 * A failed stage stops the run; nothing is written unless the whole
 * dataset was produced.
 */
export async function runPipeline(
  run: PipelineRun
): Promise<Result<PipelineOutcome, PipelineError>> {
  const raw = await fetchWeather(
    run.location,
    { ...run.dateRange, variables: run.variables },
    {
      timeoutMs: run.timeoutMs,
      baseUrl: run.baseUrl,
      cache: run.cache,
      fetch: run.fetch,
      now: run.now,
    }
  );
  if (!raw.ok) {
    return raw;
  }
  console.log(`Received ${raw.value.time.length} hourly timestamps`);

  let dataset: WeatherDataset;
  try {
    dataset = normalize(raw.value);
  } catch (error) {
    if (error instanceof PipelineError) {
      return err(error);
    }
    throw error;
  }
  console.log(`Normalized ${dataset.length} records`);

  const saved = await saveDataset(dataset, run.outputPath, run.mode);
  if (!saved.ok) {
    return saved;
  }
  return ok({ recordCount: saved.value, dataset });
}
