#!/usr/bin/env node
import "dotenv/config";
import { ResponseCache } from "./cache.js";
import { type AppConfig, DEFAULT_CONFIG_PATH, loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { runWithRetry } from "./orchestrator.js";
import { runPipeline } from "./pipeline.js";
import { formatSummary, summarizeDataset } from "./summary.js";
import { calculateNextDelay, sleep } from "./utils.js";

async function logOnce(config: AppConfig, cache: ResponseCache | undefined): Promise<boolean> {
  const { location } = config;
  console.log(
    `Running pipeline for ${location.name} (${location.latitude}, ${location.longitude}, ${location.timezone})`
  );

  const result = await runWithRetry(() =>
    runPipeline({
      location,
      dateRange: config.dateRange,
      variables: config.variables,
      outputPath: config.outputPath,
      mode: config.mode,
      timeoutMs: config.timeoutMs,
      cache,
    })
  );

  if (!result.ok) {
    console.error(`Run failed: ${describeError(result.error)}`);
    return false;
  }

  console.log(
    `Saved ${result.value.recordCount} rows to ${config.outputPath}: ${formatSummary(summarizeDataset(result.value.dataset))}`
  );
  return true;
}

async function startLogger(): Promise<void> {
  const configPath = process.env.CONFIG_PATH?.trim() || DEFAULT_CONFIG_PATH;
  const loaded = await loadConfig(configPath);
  if (!loaded.ok) {
    console.error(`Invalid configuration: ${describeError(loaded.error)}`);
    process.exitCode = 1;
    return;
  }

  const config = loaded.value;
  const cache = config.cache
    ? new ResponseCache({
        directory: config.cache.directory,
        ttlMinutes: config.cache.ttlMinutes,
      })
    : undefined;

  if (config.pollMinutes === null) {
    if (!(await logOnce(config, cache))) {
      process.exitCode = 1;
    }
    return;
  }

  const pollMinutes = config.pollMinutes;
  const initialDelay = calculateNextDelay(pollMinutes);
  if (initialDelay > 0) {
    console.log(`Aligning first run in ${Math.round(initialDelay / 1000)}s`);
    await sleep(initialDelay);
  }

  await logOnce(config, cache);

  setInterval(() => {
    logOnce(config, cache).catch((error) => {
      console.error("Run failed", error);
    });
  }, pollMinutes * 60 * 1000);
}

startLogger().catch((error) => {
  console.error("Logger failed", error);
  process.exitCode = 1;
});
