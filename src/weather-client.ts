import { z } from "zod";
import { buildCacheKey, type ResponseCache } from "./cache.js";
import {
  type FetchError,
  HttpStatusError,
  MalformedResponseError,
  NetworkError,
  UnsupportedVariableError,
  ValidationError,
} from "./errors.js";
import { validateLocation } from "./location.js";
import {
  type DateRange,
  err,
  type LocationConfig,
  ok,
  type RawSample,
  type RawWeatherResponse,
  type Result,
  VARIABLE_KINDS,
  type VariableKind,
} from "./types.js";
import { getLocalDateString } from "./utils.js";
import { parseVariables, PROVIDER_CODES } from "./variables.js";

export const DEFAULT_BASE_URL = "https://api.open-meteo.com/v1/forecast";
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const RawSampleSchema = z.union([z.number(), z.string(), z.null()]);

const ProviderBodySchema = z.object({
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  timezone: z.string().optional(),
  hourly_units: z.record(z.string()).optional(),
  hourly: z.object({ time: z.array(z.string()) }).passthrough(),
});

const ProviderErrorSchema = z.object({ reason: z.string() });

export interface WeatherRequest extends DateRange {
  variables: Iterable<string>;
}

export interface FetchWeatherOptions {
  timeoutMs?: number;
  baseUrl?: string;
  cache?: ResponseCache;
  fetch?: typeof fetch;
  /** Reference instant for the "today" default. */
  now?: Date;
}

export interface PreparedRequest {
  location: LocationConfig;
  startDate: string;
  endDate: string;
  variables: VariableKind[];
}

function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [match[1], match[2], match[3]].map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Checks everything that can be checked without the network. Throws
 * `ValidationError` or `UnsupportedVariableError`.
 */
export function prepareRequest(
  location: LocationConfig,
  request: WeatherRequest,
  now = new Date()
): PreparedRequest {
  validateLocation(location);
  const variables = parseVariables(request.variables);

  const today = getLocalDateString(location.timezone, now);
  const startDate = request.startDate ?? today;
  const endDate = request.endDate ?? request.startDate ?? today;
  for (const value of [startDate, endDate]) {
    if (!isCalendarDate(value)) {
      throw new ValidationError(`Invalid date "${value}", expected YYYY-MM-DD`);
    }
  }
  if (startDate > endDate) {
    throw new ValidationError(
      `start_date ${startDate} is after end_date ${endDate}`
    );
  }

  return { location, startDate, endDate, variables };
}

export function buildRequestUrl(
  prepared: PreparedRequest,
  baseUrl = DEFAULT_BASE_URL
): string {
  const params = new URLSearchParams({
    latitude: String(prepared.location.latitude),
    longitude: String(prepared.location.longitude),
    hourly: prepared.variables.map((kind) => PROVIDER_CODES[kind]).join(","),
    start_date: prepared.startDate,
    end_date: prepared.endDate,
    timezone: prepared.location.timezone,
  });
  return `${baseUrl}?${params.toString()}`;
}

export function requestCacheKey(prepared: PreparedRequest): string {
  return buildCacheKey([
    "weather_raw",
    prepared.location.latitude,
    prepared.location.longitude,
    prepared.location.timezone,
    prepared.startDate,
    prepared.endDate,
    ...prepared.variables.map((kind) => PROVIDER_CODES[kind]),
  ]);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates a provider body into a `RawWeatherResponse`. Keys outside the
 * known variable set are not carried over.
 */
export function parseProviderBody(
  body: unknown,
  prepared: PreparedRequest
): Result<RawWeatherResponse, MalformedResponseError> {
  const parsed = ProviderBodySchema.safeParse(body);
  if (!parsed.success) {
    return err(
      new MalformedResponseError(
        `Unexpected response shape: ${describeIssues(parsed.error)}`
      )
    );
  }

  const { hourly, hourly_units: hourlyUnits = {} } = parsed.data;
  const series: Partial<Record<VariableKind, RawSample[]>> = {};
  const units: Partial<Record<VariableKind, string>> = {};

  for (const kind of VARIABLE_KINDS) {
    const code = PROVIDER_CODES[kind];
    if (hourly[code] === undefined) {
      continue;
    }
    const samples = z.array(RawSampleSchema).safeParse(hourly[code]);
    if (!samples.success) {
      return err(
        new MalformedResponseError(
          `hourly.${code} is not a sequence of numbers or nulls`
        )
      );
    }
    if (samples.data.length !== hourly.time.length) {
      return err(
        new MalformedResponseError(
          `hourly.${code} has ${samples.data.length} samples for ${hourly.time.length} timestamps`
        )
      );
    }
    series[kind] = samples.data;
    const unit = hourlyUnits[code];
    if (unit !== undefined) {
      units[kind] = unit;
    }
  }

  return ok({
    latitude: parsed.data.latitude ?? prepared.location.latitude,
    longitude: parsed.data.longitude ?? prepared.location.longitude,
    timezone: prepared.location.timezone,
    units,
    requested: prepared.variables,
    time: hourly.time,
    series,
  });
}

async function readErrorReason(response: Response): Promise<string | undefined> {
  const text = await response.text();
  try {
    const parsed = ProviderErrorSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.reason : undefined;
  } catch {
    return text.trim().length > 0 ? text.trim().slice(0, 200) : undefined;
  }
}

/**
 * Performs a single bounded request for hourly data. Every expected failure
 * is returned, not thrown; nothing reaches the network unless the location,
 * dates and variables are valid.
 */
export async function fetchWeather(
  location: LocationConfig,
  request: WeatherRequest,
  options: FetchWeatherOptions = {}
): Promise<Result<RawWeatherResponse, FetchError>> {
  let prepared: PreparedRequest;
  try {
    prepared = prepareRequest(location, request, options.now);
  } catch (error) {
    if (
      error instanceof ValidationError ||
      error instanceof UnsupportedVariableError
    ) {
      return err(error);
    }
    throw error;
  }

  const cacheKey = requestCacheKey(prepared);
  if (options.cache) {
    const cached = await options.cache.get(cacheKey).catch((error: unknown) => {
      console.warn("Could not read response cache", error);
      return null;
    });
    if (cached !== null) {
      console.log(`Using cached response for ${location.name}`);
      return parseProviderBody(cached, prepared);
    }
  }

  const url = buildRequestUrl(prepared, options.baseUrl);
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let text: string;
  try {
    console.log(
      `Fetching ${prepared.startDate}..${prepared.endDate} for ${location.name} (timeout ${timeoutMs}ms)`
    );
    const response = await fetchImpl(url, { signal: controller.signal });
    if (!response.ok) {
      return err(
        new HttpStatusError(response.status, await readErrorReason(response))
      );
    }
    text = await response.text();
  } catch (error) {
    const message = controller.signal.aborted
      ? `Request timed out after ${timeoutMs}ms`
      : `Request failed: ${error instanceof Error ? error.message : String(error)}`;
    return err(new NetworkError(message, { cause: error }));
  } finally {
    clearTimeout(timeoutId);
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    return err(
      new MalformedResponseError("Response body is not valid JSON", {
        cause: error,
      })
    );
  }

  const result = parseProviderBody(body, prepared);
  if (result.ok && options.cache) {
    try {
      await options.cache.set(cacheKey, body);
    } catch (error) {
      console.warn("Could not write response cache", error);
    }
  }
  return result;
}
