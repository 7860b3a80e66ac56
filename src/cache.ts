import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ensureOutputDir, isMissingFile } from "./utils.js";

const CacheEntrySchema = z.object({
  key: z.string(),
  fetchedAt: z.string().datetime(),
  body: z.unknown(),
});

export interface CacheStats {
  entries: number;
  sizeBytes: number;
  directory: string;
  ttlMinutes: number;
}

export interface ResponseCacheOptions {
  directory: string;
  ttlMinutes: number;
  now?: () => Date;
}

export function buildCacheKey(parts: readonly (string | number)[]): string {
  return createHash("md5").update(parts.map(String).join("_")).digest("hex");
}

/**
 * Provider response bodies kept on disk for `ttlMinutes`, one JSON file per
 * request key. Bodies are stored as received; callers validate them again.
 */
export class ResponseCache {
  readonly directory: string;
  readonly ttlMinutes: number;
  private readonly now: () => Date;

  constructor(options: ResponseCacheOptions) {
    this.directory = options.directory;
    this.ttlMinutes = options.ttlMinutes;
    this.now = options.now ?? (() => new Date());
  }

  private entryPath(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  async get(key: string): Promise<unknown | null> {
    const filePath = this.entryPath(key);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let parsed: z.infer<typeof CacheEntrySchema>;
    try {
      parsed = CacheEntrySchema.parse(JSON.parse(raw));
    } catch (error) {
      console.warn(`Ignoring unreadable entry ${filePath}`, error);
      await fs.rm(filePath, { force: true });
      return null;
    }

    const ageMs = this.now().getTime() - Date.parse(parsed.fetchedAt);
    if (ageMs >= this.ttlMinutes * 60 * 1000) {
      await fs.rm(filePath, { force: true });
      return null;
    }
    return parsed.body;
  }

  async set(key: string, body: unknown): Promise<void> {
    await ensureOutputDir(this.directory);
    const entry = { key, fetchedAt: this.now().toISOString(), body };
    await fs.writeFile(this.entryPath(key), JSON.stringify(entry));
  }

  async clear(): Promise<number> {
    const files = await this.listEntries();
    await Promise.all(
      files.map((file) => fs.rm(path.join(this.directory, file), { force: true }))
    );
    console.log(`Cleared ${files.length} entries from ${this.directory}`);
    return files.length;
  }

  async stats(): Promise<CacheStats> {
    const files = await this.listEntries();
    const sizes = await Promise.all(
      files.map(async (file) => (await fs.stat(path.join(this.directory, file))).size)
    );
    return {
      entries: files.length,
      sizeBytes: sizes.reduce((total, size) => total + size, 0),
      directory: this.directory,
      ttlMinutes: this.ttlMinutes,
    };
  }

  private async listEntries(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.directory);
      return files.filter((file) => file.endsWith(".json"));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }
}
