import { roundValue } from "./transform.js";
import type { WeatherDataset, WeatherField } from "./types.js";

export interface DatasetSummary {
  rows: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  meanTemperatureC: number | null;
  meanHumidityPct: number | null;
  totalPrecipitationMm: number | null;
  meanWindSpeedKmh: number | null;
}

function present(dataset: WeatherDataset, field: WeatherField): number[] {
  return dataset.flatMap((record) => {
    const value = record[field];
    return value === null ? [] : [value];
  });
}

function total(values: number[]): number | null {
  return values.length === 0
    ? null
    : roundValue(values.reduce((sum, value) => sum + value, 0));
}

function mean(values: number[]): number | null {
  return values.length === 0
    ? null
    : roundValue(values.reduce((sum, value) => sum + value, 0) / values.length);
}

/** Missing samples are left out of every statistic rather than counted as zero. */
export function summarizeDataset(dataset: WeatherDataset): DatasetSummary {
  return {
    rows: dataset.length,
    firstTimestamp: dataset[0]?.timestamp ?? null,
    lastTimestamp: dataset[dataset.length - 1]?.timestamp ?? null,
    meanTemperatureC: mean(present(dataset, "temperature_c")),
    meanHumidityPct: mean(present(dataset, "humidity_pct")),
    totalPrecipitationMm: total(present(dataset, "precipitation_mm")),
    meanWindSpeedKmh: mean(present(dataset, "wind_speed_kmh")),
  };
}

export function formatSummary(summary: DatasetSummary): string {
  const show = (value: number | null, unit: string) =>
    value === null ? "n/a" : `${value.toFixed(2)} ${unit}`;
  return [
    `rows=${summary.rows}`,
    `range=${summary.firstTimestamp ?? "n/a"}..${summary.lastTimestamp ?? "n/a"}`,
    `temperature=${show(summary.meanTemperatureC, "°C")}`,
    `humidity=${show(summary.meanHumidityPct, "%")}`,
    `precipitation=${show(summary.totalPrecipitationMm, "mm")}`,
    `wind=${show(summary.meanWindSpeedKmh, "km/h")}`,
  ].join(" ");
}
