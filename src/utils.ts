import fs from "node:fs/promises";
import path from "node:path";

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await fs.mkdir(outputDir, { recursive: true });
}

function formatDateParts(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(date);
}

/** Calendar date (YYYY-MM-DD) of `now` as seen in `timeZone`. */
export function getLocalDateString(timeZone: string, now = new Date()): string {
  return formatDateParts(now, timeZone);
}

export function buildOutputPath(
  outputDir: string,
  filename: string,
  timestamped = false,
  now = new Date()
): string {
  const withExtension = filename.endsWith(".csv") ? filename : `${filename}.csv`;
  if (!timestamped) {
    return path.join(outputDir, withExtension);
  }
  const stamp = now
    .toISOString()
    .replace(/\.\d{3}Z$/, "")
    .replace(/[-:]/g, "")
    .replace("T", "_");
  const { name, ext } = path.parse(withExtension);
  return path.join(outputDir, `${name}_${stamp}${ext}`);
}

export function calculateNextDelay(
  intervalMinutes: number,
  now = Date.now()
): number {
  const intervalMs = intervalMinutes * 60 * 1000;
  const next = Math.ceil(now / intervalMs) * intervalMs;
  return Math.max(next - now, 0);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isMissingFile(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}
