export const VARIABLE_KINDS = [
  "temperature",
  "humidity",
  "precipitation",
  "wind_speed",
] as const;

export type VariableKind = (typeof VARIABLE_KINDS)[number];

export interface LocationConfig {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly timezone: string;
}

/** A single sample as delivered by the provider; `null` marks "no data". */
export type RawSample = number | string | null;

export interface RawWeatherResponse {
  readonly latitude: number;
  readonly longitude: number;
  readonly timezone: string;
  readonly units: Readonly<Partial<Record<VariableKind, string>>>;
  readonly requested: readonly VariableKind[];
  readonly time: readonly string[];
  readonly series: Readonly<Partial<Record<VariableKind, readonly RawSample[]>>>;
}

export interface WeatherRecord {
  /** ISO 8601 instant carrying the location's UTC offset. */
  timestamp: string;
  temperature_c: number | null;
  humidity_pct: number | null;
  precipitation_mm: number | null;
  wind_speed_kmh: number | null;
}

export type WeatherField = Exclude<keyof WeatherRecord, "timestamp">;

export type WeatherDataset = readonly WeatherRecord[];

export type SaveMode = "overwrite" | "append";

export interface DateRange {
  startDate?: string;
  endDate?: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
