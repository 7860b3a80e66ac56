import { TZDate } from "@date-fns/tz";
import { format } from "date-fns";
import {
  DataIntegrityError,
  IncompleteDataError,
  MalformedResponseError,
} from "./errors.js";
import type {
  RawSample,
  RawWeatherResponse,
  VariableKind,
  WeatherDataset,
  WeatherRecord,
} from "./types.js";
import { PROVIDER_CODES, RECORD_FIELDS } from "./variables.js";

/** Decimal places kept for every numeric field, in memory and on disk. */
export const VALUE_DECIMALS = 2;

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ssxxx";
const TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?(Z|[+-]\d{2}:\d{2})?$/;
const HOUR_MS = 60 * 60 * 1000;
const OVERLAP_SHIFTS_MS = [-HOUR_MS, -HOUR_MS / 2, HOUR_MS / 2, HOUR_MS];
export const NUMERIC_TOKEN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function roundValue(value: number): number {
  const factor = 10 ** VALUE_DECIMALS;
  const rounded = Math.round(value * factor) / factor;
  // collapse -0
  return rounded === 0 ? 0 : rounded;
}

function hasWallTime(date: TZDate, wall: readonly number[]): boolean {
  return [
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
  ].every((part, index) => part === wall[index]);
}

/**
 * Resolves a provider timestamp to an ISO instant carrying the offset of
 * `timeZone`. Strings without an offset are wall-clock times in `timeZone`
 * and must name exactly one instant there.
 */
export function toZonedTimestamp(value: string, timeZone: string): string {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    throw new MalformedResponseError(`Unparseable timestamp "${value}"`);
  }
  const [year, month, day, hours, minutes, seconds] = match
    .slice(1, 7)
    .map((part) => (part === undefined ? 0 : Number(part)));
  const offset = match[7];

  let zoned: TZDate;
  if (offset !== undefined) {
    const calendar = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
    if (
      calendar.getUTCMonth() !== month - 1 ||
      calendar.getUTCDate() !== day ||
      calendar.getUTCHours() !== hours ||
      calendar.getUTCMinutes() !== minutes ||
      calendar.getUTCSeconds() !== seconds
    ) {
      throw new MalformedResponseError(`Invalid timestamp "${value}"`);
    }
    zoned = new TZDate(Date.parse(value), timeZone);
  } else {
    const wall = [year, month - 1, day, hours, minutes, seconds];
    zoned = new TZDate(year, month - 1, day, hours, minutes, seconds, 0, timeZone);
    // Wall times skipped by a DST transition come back shifted.
    if (!hasWallTime(zoned, wall)) {
      throw new MalformedResponseError(
        `Timestamp "${value}" does not exist in ${timeZone}`
      );
    }
    // Wall times repeated when clocks go back map to more than one instant.
    const instant = zoned.getTime();
    const repeated = OVERLAP_SHIFTS_MS.some((shift) =>
      hasWallTime(new TZDate(instant + shift, timeZone), wall)
    );
    if (repeated) {
      throw new MalformedResponseError(
        `Timestamp "${value}" is ambiguous in ${timeZone}`
      );
    }
  }

  if (Number.isNaN(zoned.getTime())) {
    throw new MalformedResponseError(
      `Timestamp "${value}" cannot be resolved in ${timeZone}`
    );
  }
  return format(zoned, TIMESTAMP_FORMAT);
}

function coerceSample(
  sample: RawSample,
  kind: VariableKind,
  index: number
): number | null {
  if (sample === null) {
    return null;
  }
  const value =
    typeof sample === "number"
      ? sample
      : NUMERIC_TOKEN.test(sample.trim())
        ? Number(sample.trim())
        : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new DataIntegrityError(
      `Non-numeric ${PROVIDER_CODES[kind]} sample ${JSON.stringify(sample)} at index ${index}`
    );
  }
  return roundValue(value);
}

/**
 * Sorts records by instant and collapses duplicate instants, keeping the
 * one that appears last in the input.
 */
export function orderRecords(records: WeatherDataset): WeatherRecord[] {
  const keyed = records.map((record) => ({
    instant: Date.parse(record.timestamp),
    record,
  }));
  keyed.sort((a, b) => a.instant - b.instant);

  const ordered: WeatherRecord[] = [];
  let previous: number | undefined;
  for (const { instant, record } of keyed) {
    if (instant === previous) {
      ordered[ordered.length - 1] = record;
    } else {
      ordered.push(record);
    }
    previous = instant;
  }
  return ordered;
}

/**
 * Converts a raw provider response into a dataset.
 *
 * Records are fixed width: every record carries all four measurement fields,
 * and variables that were not requested stay `null`. Series the caller did
 * not request are ignored.
 */
export function normalize(raw: RawWeatherResponse): WeatherDataset {
  const columns = raw.requested.map((kind) => {
    const samples = raw.series[kind];
    if (samples === undefined) {
      throw new IncompleteDataError(kind);
    }
    if (samples.length !== raw.time.length) {
      throw new MalformedResponseError(
        `${PROVIDER_CODES[kind]} has ${samples.length} samples for ${raw.time.length} timestamps`
      );
    }
    return { kind, samples };
  });

  const records = raw.time.map((time, index) => {
    const record: WeatherRecord = {
      timestamp: toZonedTimestamp(time, raw.timezone),
      temperature_c: null,
      humidity_pct: null,
      precipitation_mm: null,
      wind_speed_kmh: null,
    };
    for (const { kind, samples } of columns) {
      record[RECORD_FIELDS[kind]] = coerceSample(samples[index], kind, index);
    }
    return record;
  });

  return orderRecords(records);
}
