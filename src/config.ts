import fs from "node:fs/promises";
import { z } from "zod";
import { PipelineError, ValidationError } from "./errors.js";
import { createLocation } from "./location.js";
import {
  type DateRange,
  err,
  type LocationConfig,
  ok,
  type Result,
  type SaveMode,
  VARIABLE_KINDS,
  type VariableKind,
} from "./types.js";
import { buildOutputPath, isMissingFile } from "./utils.js";
import { parseVariables } from "./variables.js";
import { DEFAULT_FETCH_TIMEOUT_MS } from "./weather-client.js";

export const DEFAULT_CONFIG_PATH = "config/settings.json";

const DEFAULT_LOCATION: LocationConfig = {
  name: "Medellín",
  latitude: 6.244,
  longitude: -75.581,
  timezone: "America/Bogota",
};

const SettingsSchema = z.object({
  location: z.object({
    name: z.string(),
    latitude: z.number(),
    longitude: z.number(),
    timezone: z.string(),
  }),
  request: z
    .object({
      variables: z.array(z.string()).default([...VARIABLE_KINDS]),
      start_date: z.string().optional(),
      end_date: z.string().optional(),
      timeout_ms: z.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
    })
    .default({}),
  data: z
    .object({
      output_directory: z.string().min(1).default("data"),
      default_filename: z.string().min(1).default("weather_data.csv"),
      mode: z.enum(["overwrite", "append"]).default("append"),
      timestamped_filename: z.boolean().default(false),
    })
    .default({}),
  cache: z
    .object({
      enabled: z.boolean().default(false),
      directory: z.string().min(1).default("cache"),
      ttl_minutes: z.number().positive().default(15),
    })
    .default({}),
});

type Settings = z.infer<typeof SettingsSchema>;

export interface CacheSettings {
  directory: string;
  ttlMinutes: number;
}

/** Everything a run needs, resolved once at startup and passed by value. */
export interface AppConfig {
  location: LocationConfig;
  variables: VariableKind[];
  dateRange: DateRange;
  timeoutMs: number;
  outputPath: string;
  mode: SaveMode;
  pollMinutes: number | null;
  cache: CacheSettings | null;
}

function getEnvVar(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback?: string
): string | undefined {
  const value = env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

function getPositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = getEnvVar(env, name);
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

async function readSettings(configPath: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      console.warn(`${configPath} not found, using defaults`);
      return SettingsSchema.parse({ location: DEFAULT_LOCATION });
    }
    throw new ValidationError(`Cannot read ${configPath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${configPath} is not valid JSON`, { cause: error });
  }

  const parsed = SettingsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid settings in ${configPath}: ${issues}`);
  }
  return parsed.data;
}

function resolveConfig(settings: Settings, env: NodeJS.ProcessEnv): AppConfig {
  const location = createLocation(settings.location);

  let variables: VariableKind[];
  try {
    variables = parseVariables(settings.request.variables);
  } catch (error) {
    if (error instanceof PipelineError) {
      throw new ValidationError(`Invalid request.variables: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }

  const mode = getEnvVar(env, "SAVE_MODE", settings.data.mode);
  if (mode !== "overwrite" && mode !== "append") {
    throw new ValidationError(
      `SAVE_MODE must be "overwrite" or "append", got "${mode}"`
    );
  }

  const outputDir = getEnvVar(env, "OUTPUT_DIR", settings.data.output_directory);
  const cacheEnabled =
    getEnvVar(env, "CACHE_ENABLED", String(settings.cache.enabled)) === "true";
  const pollMinutes = getPositiveNumber(env, "POLL_MINUTES", 0);

  return {
    location,
    variables,
    dateRange: {
      startDate: settings.request.start_date,
      endDate: settings.request.end_date,
    },
    timeoutMs: getPositiveNumber(env, "FETCH_TIMEOUT_MS", settings.request.timeout_ms),
    outputPath: buildOutputPath(
      outputDir ?? settings.data.output_directory,
      settings.data.default_filename,
      settings.data.timestamped_filename
    ),
    mode,
    pollMinutes: pollMinutes > 0 ? pollMinutes : null,
    cache: cacheEnabled
      ? {
          directory: getEnvVar(env, "CACHE_DIR", settings.cache.directory) ?? settings.cache.directory,
          ttlMinutes: getPositiveNumber(env, "CACHE_TTL_MINUTES", settings.cache.ttl_minutes),
        }
      : null,
  };
}

/**
 * Reads the settings file and applies environment overrides. A missing file
 * falls back to built-in defaults; anything malformed is a `ValidationError`.
 */
export async function loadConfig(
  configPath = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<Result<AppConfig, ValidationError>> {
  try {
    return ok(resolveConfig(await readSettings(configPath), env));
  } catch (error) {
    if (error instanceof ValidationError) {
      return err(error);
    }
    throw error;
  }
}
