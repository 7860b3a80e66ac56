import { createHash, randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { CorruptFileError, StorageError, type StorageFailure } from "./errors.js";
import { NUMERIC_TOKEN, orderRecords, VALUE_DECIMALS } from "./transform.js";
import {
  err,
  ok,
  type Result,
  type SaveMode,
  type WeatherDataset,
  type WeatherRecord,
} from "./types.js";
import { ensureOutputDir, errorCode, isMissingFile } from "./utils.js";
import { WEATHER_FIELDS } from "./variables.js";

export const CSV_HEADER = ["timestamp", ...WEATHER_FIELDS].join(",");

const STORED_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:Z|[+-]\d{2}:\d{2})$/;
const ABSENT = "absent";

export interface SaveOptions {
  /** Runs after the new table is staged and before it replaces the destination. */
  beforeCommit?: () => Promise<void> | void;
}

function formatValue(value: number | null): string {
  return value === null ? "" : value.toFixed(VALUE_DECIMALS);
}

function findNonFinite(dataset: WeatherDataset): string | undefined {
  for (const record of dataset) {
    for (const field of WEATHER_FIELDS) {
      const value = record[field];
      if (value !== null && !Number.isFinite(value)) {
        return `${field} is ${value} at ${record.timestamp}`;
      }
    }
  }
  return undefined;
}

export function serializeDataset(dataset: WeatherDataset): string {
  const lines = dataset.map((record) =>
    [record.timestamp, ...WEATHER_FIELDS.map((field) => formatValue(record[field]))].join(",")
  );
  return [CSV_HEADER, ...lines].map((line) => `${line}\n`).join("");
}

export function parseDataset(
  filePath: string,
  text: string
): Result<WeatherDataset, CorruptFileError> {
  const lines = text.split("\n").map((line) => line.replace(/\r$/, ""));
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  if (lines.length === 0 || lines[0] !== CSV_HEADER) {
    return err(new CorruptFileError(filePath, "missing or unexpected header"));
  }

  const records: WeatherRecord[] = [];
  let previous = Number.NEGATIVE_INFINITY;
  for (let index = 1; index < lines.length; index += 1) {
    const lineNumber = index + 1;
    const fields = lines[index].split(",");
    if (fields.length !== WEATHER_FIELDS.length + 1) {
      return err(
        new CorruptFileError(
          filePath,
          `line ${lineNumber} has ${fields.length} fields, expected ${WEATHER_FIELDS.length + 1}`
        )
      );
    }

    const [timestamp, ...values] = fields;
    const instant = STORED_TIMESTAMP.test(timestamp)
      ? Date.parse(timestamp)
      : Number.NaN;
    if (Number.isNaN(instant)) {
      return err(
        new CorruptFileError(filePath, `line ${lineNumber} has invalid timestamp "${timestamp}"`)
      );
    }
    if (instant <= previous) {
      return err(
        new CorruptFileError(filePath, `line ${lineNumber} is out of timestamp order`)
      );
    }
    previous = instant;

    const record: WeatherRecord = {
      timestamp,
      temperature_c: null,
      humidity_pct: null,
      precipitation_mm: null,
      wind_speed_kmh: null,
    };
    for (const [position, field] of WEATHER_FIELDS.entries()) {
      const value = values[position];
      if (value === "") {
        continue;
      }
      if (!NUMERIC_TOKEN.test(value) || !Number.isFinite(Number(value))) {
        return err(
          new CorruptFileError(
            filePath,
            `line ${lineNumber} has non-numeric ${field} "${value}"`
          )
        );
      }
      record[field] = Number(value);
    }
    records.push(record);
  }
  return ok(records);
}

function toStorageError(
  error: unknown,
  action: string,
  filePath: string
): StorageError {
  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : String(error);
  const message = `Could not ${action} ${filePath}: ${detail}`;
  switch (code) {
    case "ENOSPC":
      return new StorageError("disk-full", message, { cause: error });
    case "EACCES":
    case "EPERM":
    case "EROFS":
    case "ENOTDIR":
    case "EISDIR":
    case "EEXIST":
      return new StorageError("unwritable-path", message, { cause: error });
    default:
      return new StorageError("io-error", message, { cause: error });
  }
}

interface Snapshot {
  text: string | null;
  fingerprint: string;
}

async function readSnapshot(filePath: string): Promise<Snapshot> {
  try {
    const bytes = await fs.readFile(filePath);
    return {
      text: bytes.toString("utf-8"),
      fingerprint: createHash("sha256").update(bytes).digest("hex"),
    };
  } catch (error) {
    if (isMissingFile(error)) {
      return { text: null, fingerprint: ABSENT };
    }
    throw error;
  }
}

export async function loadDataset(
  filePath: string
): Promise<Result<WeatherDataset, StorageFailure>> {
  let snapshot: Snapshot;
  try {
    snapshot = await readSnapshot(filePath);
  } catch (error) {
    return err(toStorageError(error, "read", filePath));
  }
  if (snapshot.text === null) {
    return ok([]);
  }
  return parseDataset(filePath, snapshot.text);
}

async function writeStaged(stagingPath: string, content: string): Promise<void> {
  const handle = await fs.open(stagingPath, "w");
  try {
    await handle.writeFile(content, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Persists `dataset` and returns the number of rows in the resulting table.
 *
 * Append mode is merge-then-rewrite: the stored table and `dataset` are
 * merged by instant (new rows win) and written back whole. The new table is
 * staged beside the destination and renamed over it, so readers never see a
 * partial file. If the destination changed after it was read, the write is
 * abandoned with a `concurrent-modification` error.
 */
export async function saveDataset(
  dataset: WeatherDataset,
  filePath: string,
  mode: SaveMode,
  options: SaveOptions = {}
): Promise<Result<number, StorageFailure>> {
  const nonFinite = findNonFinite(dataset);
  if (nonFinite !== undefined) {
    return err(
      new StorageError("invalid-record", `Refusing to write ${filePath}: ${nonFinite}`)
    );
  }

  try {
    await ensureOutputDir(path.dirname(filePath));
  } catch (error) {
    return err(toStorageError(error, "create directory for", filePath));
  }

  let rows = orderRecords(dataset);
  let expectedFingerprint: string | undefined;
  if (mode === "append") {
    let snapshot: Snapshot;
    try {
      snapshot = await readSnapshot(filePath);
    } catch (error) {
      return err(toStorageError(error, "read", filePath));
    }
    if (snapshot.text !== null) {
      const existing = parseDataset(filePath, snapshot.text);
      if (!existing.ok) {
        return existing;
      }
      rows = orderRecords([...existing.value, ...rows]);
    }
    expectedFingerprint = snapshot.fingerprint;
  }

  const stagingPath = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await writeStaged(stagingPath, serializeDataset(rows));
    await options.beforeCommit?.();
    if (expectedFingerprint !== undefined) {
      const current = await readSnapshot(filePath);
      if (current.fingerprint !== expectedFingerprint) {
        await fs.rm(stagingPath, { force: true });
        return err(
          new StorageError(
            "concurrent-modification",
            `${filePath} changed while it was being merged; nothing was written`
          )
        );
      }
    }
    await fs.rename(stagingPath, filePath);
  } catch (error) {
    await fs.rm(stagingPath, { force: true });
    return err(toStorageError(error, "write", filePath));
  }

  console.log(`Wrote ${rows.length} rows to ${filePath} (${mode})`);
  return ok(rows.length);
}
