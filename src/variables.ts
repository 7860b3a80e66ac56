import { UnsupportedVariableError, ValidationError } from "./errors.js";
import { VARIABLE_KINDS, type VariableKind, type WeatherField } from "./types.js";

/** Open-Meteo hourly variable codes. */
export const PROVIDER_CODES: Readonly<Record<VariableKind, string>> = {
  temperature: "temperature_2m",
  humidity: "relative_humidity_2m",
  precipitation: "precipitation",
  wind_speed: "wind_speed_10m",
};

export const RECORD_FIELDS: Readonly<Record<VariableKind, WeatherField>> = {
  temperature: "temperature_c",
  humidity: "humidity_pct",
  precipitation: "precipitation_mm",
  wind_speed: "wind_speed_kmh",
};

/** Persisted column order. */
export const WEATHER_FIELDS: readonly WeatherField[] = VARIABLE_KINDS.map(
  (kind) => RECORD_FIELDS[kind]
);

export function isVariableKind(value: string): value is VariableKind {
  return VARIABLE_KINDS.some((kind) => kind === value);
}

/**
 * Validates a requested variable list and returns it deduplicated in
 * canonical order.
 */
export function parseVariables(requested: Iterable<string>): VariableKind[] {
  const selected = new Set<VariableKind>();
  for (const value of requested) {
    if (!isVariableKind(value)) {
      throw new UnsupportedVariableError(value);
    }
    selected.add(value);
  }
  if (selected.size === 0) {
    throw new ValidationError("At least one weather variable must be requested");
  }
  return VARIABLE_KINDS.filter((kind) => selected.has(kind));
}
