import { createHash, randomBytes } from "node:crypto";
import { mkdirSync, readdirSync, unlinkSync } from "node:fs";
import { open, readdir, readFile, rename, unlink } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { z } from "zod";
import { errorMessage, StorageError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { PersistentCacheStorage } from "../interfaces/storage.js";
import type { PersistedCacheRecord } from "../types/cache.js";
import { noopLogger } from "../utils/noop-logger.js";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const CACHE_SCHEMA_VERSION = 1;

const ENTRY_FILE_PATTERN = /^[a-f0-9]{64}\.json(\.gz)?$/;

const storedRecordSchema = z.object({
  schemaVersion: z.literal(CACHE_SCHEMA_VERSION),
  key: z.string(),
  value: z.unknown(),
  storedAt: z.number(),
  ttlMs: z.number().nonnegative().nullable(),
  source: z.enum(["live", "fallback"]),
});

export interface FileCacheStorageOptions {
  directory: string;
  /** gzip entry files (default: true). */
  compress?: boolean;
  logger?: Logger;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Persistent cache tier on disk: one file per key, named by the SHA-256 of the
 * key so arbitrary keys stay filesystem-safe.
 *
 * Writes are atomic (temp file → fsync → rename): a reader sees either the
 * previous record or the new one, never a torn file.
 */
export class FileCacheStorage implements PersistentCacheStorage {
  private readonly dir: string;
  private readonly compress: boolean;
  private readonly logger: Logger;

  constructor(options: FileCacheStorageOptions) {
    this.dir = options.directory;
    this.compress = options.compress ?? true;
    this.logger = options.logger ?? noopLogger;
    mkdirSync(this.dir, { recursive: true });
    this.removeOrphanedTempFiles();
  }

  get directory(): string {
    return this.dir;
  }

  async list(): Promise<PersistedCacheRecord[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw new StorageError(`Failed to list cache directory ${this.dir}`, { cause: err });
    }

    const records: PersistedCacheRecord[] = [];
    for (const file of files) {
      if (!ENTRY_FILE_PATTERN.test(file)) continue;
      const record = await this.readFile(file);
      if (record) records.push(record);
    }
    return records;
  }

  async read(key: string): Promise<PersistedCacheRecord | null> {
    const [preferred, alternate] = this.candidateFiles(key);
    const record = (await this.readFile(preferred)) ?? (await this.readFile(alternate));
    if (record && record.key !== key) {
      this.logger.warn("Cache file holds a different key, ignoring", { key, stored: record.key });
      return null;
    }
    return record;
  }

  async write(record: PersistedCacheRecord): Promise<void> {
    const [target, stale] = this.candidateFiles(record.key);
    const json = JSON.stringify({ schemaVersion: CACHE_SCHEMA_VERSION, ...record });
    const data = this.compress ? await gzipAsync(json) : Buffer.from(json, "utf-8");

    try {
      await this.atomicWrite(join(this.dir, target), data);
    } catch (err) {
      throw new StorageError(`Failed to write cache entry ${record.key}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    // Drop a copy left under the other compression setting so list() sees the key once
    await this.unlinkIfPresent(stale);
  }

  async remove(key: string): Promise<boolean> {
    const removed = await Promise.all(this.candidateFiles(key).map((f) => this.unlinkIfPresent(f)));
    return removed.some(Boolean);
  }

  /** [file for the current compression setting, file for the other one] */
  private candidateFiles(key: string): [string, string] {
    const hash = createHash("sha256").update(key).digest("hex");
    const gz = `${hash}.json.gz`;
    const plain = `${hash}.json`;
    return this.compress ? [gz, plain] : [plain, gz];
  }

  private async readFile(file: string): Promise<PersistedCacheRecord | null> {
    let raw: Buffer;
    try {
      raw = await readFile(join(this.dir, file));
    } catch (err) {
      if (isMissing(err)) return null;
      this.logger.warn("Failed to read cache file", { file, error: err });
      return null;
    }

    try {
      const text = file.endsWith(".gz")
        ? (await gunzipAsync(raw)).toString("utf-8")
        : raw.toString("utf-8");
      const parsed = storedRecordSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        this.logger.warn("Skipping cache file with unexpected shape", {
          file,
          issues: parsed.error.issues.length,
        });
        return null;
      }
      const { key, value, storedAt, ttlMs, source } = parsed.data;
      return { key, value, storedAt, ttlMs, source };
    } catch (err) {
      this.logger.warn("Skipping corrupt cache file", { file, error: err });
      return null;
    }
  }

  private async atomicWrite(filePath: string, data: Buffer): Promise<void> {
    const tmpPath = `${filePath}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      const handle = await open(tmpPath, "w", 0o600);
      try {
        await handle.writeFile(data);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, filePath);
    } catch (err) {
      await this.unlinkIfPresent(tmpPath, true).catch((cleanupErr: unknown) => {
        this.logger.warn("Failed to remove temp file", { tmpPath, error: cleanupErr });
      });
      throw err;
    }
  }

  private async unlinkIfPresent(file: string, absolute = false): Promise<boolean> {
    try {
      await unlink(absolute ? file : join(this.dir, file));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw new StorageError(`Failed to remove ${file}`, { cause: err });
    }
  }

  /** Temp files left by a crash mid-write are never valid entries. */
  private removeOrphanedTempFiles(): void {
    for (const file of readdirSync(this.dir)) {
      if (!file.endsWith(".tmp")) continue;
      try {
        unlinkSync(join(this.dir, file));
      } catch (err) {
        this.logger.warn("Failed to remove orphaned temp file", { file, error: err });
      }
    }
  }
}
