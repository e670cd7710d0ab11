import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import dayjs from "dayjs";
import { Pool } from "pg";
import { z } from "zod";
import { CacheCorruptError, errorMessage } from "./errors.js";
import { mergeStartupRecords } from "../services/startup-normalization.js";
import type { CacheEntry, CacheStatus, CachedDirectory, FreshnessVerdict, StartupRecord } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;
export const ERROR_MAX_AGE_MS = HOUR_MS;
export const FALLBACK_MAX_AGE_MS = 4 * HOUR_MS;
export const CACHE_MAX_AGE_MS = 24 * HOUR_MS;

type CacheKey = "cache_info" | "startups_data" | "startups_manual";

const cacheEntrySchema = z.object({
  lastUpdate: z.string().min(1),
  status: z.enum(["success", "fallback", "error"]),
  recordCount: z.number().int().nonnegative(),
  message: z.string().default("")
});

const startupRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
  domain: z.string().default(""),
  location: z.string().default(""),
  url: z.string().default(""),
  contact: z.string().default(""),
  email: z.string().default(""),
  phone: z.string().default(""),
  ceo: z.string().optional(),
  yearFounded: z.string().optional(),
  employeeCount: z.string().optional(),
  logoUrl: z.string().optional(),
  lastUpdated: z.string().default("")
});

const startupListSchema = z.array(startupRecordSchema);

function toTimestamp(value: string): number {
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Freshness policy, first matching rule wins. */
export function evaluateFreshness(entry: CacheEntry | undefined, now: Date): FreshnessVerdict {
  if (!entry) return { fresh: false, reason: "No cache metadata found" };

  const updatedAt = toTimestamp(entry.lastUpdate);
  if (updatedAt === 0) return { fresh: false, reason: "Cache metadata has an invalid timestamp" };

  const age = now.getTime() - updatedAt;
  if (entry.status === "error" && age > ERROR_MAX_AGE_MS) {
    return { fresh: false, reason: "Cache is in error state and older than 1 hour" };
  }
  if (entry.status === "fallback" && age > FALLBACK_MAX_AGE_MS) {
    return { fresh: false, reason: "Cache used fallback data and is older than 4 hours" };
  }
  if (age > CACHE_MAX_AGE_MS) {
    return { fresh: false, reason: `Cache is older than 24 hours (last update: ${entry.lastUpdate})` };
  }
  return { fresh: true };
}

export function snapshotName(at: Date): string {
  return `startups_crawl_${dayjs(at).format("YYYYMMDD_HHmmss")}`;
}

interface CacheBackend {
  readonly kind: "file" | "postgres";
  init(): Promise<void>;
  read(key: CacheKey): Promise<unknown>;
  write(key: CacheKey, value: unknown): Promise<void>;
  remove(keys: CacheKey[]): Promise<void>;
  writeSnapshot(name: string, records: StartupRecord[]): Promise<string>;
  describe(key: CacheKey): string;
  close(): Promise<void>;
}

class FileCacheBackend implements CacheBackend {
  readonly kind = "file";
  private readonly files: Record<CacheKey, string>;
  private readonly snapshotDir: string;

  constructor(dataDir: string) {
    const root = path.resolve(dataDir);
    this.files = {
      cache_info: path.join(root, "cache", "cache_info.json"),
      startups_data: path.join(root, "cache", "startups_data.json"),
      startups_manual: path.join(root, "startups_manual.json")
    };
    this.snapshotDir = path.join(root, "snapshots");
  }

  async init(): Promise<void> {
    await mkdir(path.dirname(this.files.cache_info), { recursive: true });
    await mkdir(this.snapshotDir, { recursive: true });
  }

  async read(key: CacheKey): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(this.files[key], "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptError(this.files[key], { cause: error });
    }
  }

  async write(key: CacheKey, value: unknown): Promise<void> {
    await mkdir(path.dirname(this.files[key]), { recursive: true });
    await writeFile(this.files[key], JSON.stringify(value, null, 2), "utf8");
  }

  async remove(keys: CacheKey[]): Promise<void> {
    await Promise.all(keys.map((key) => rm(this.files[key], { force: true })));
  }

  async writeSnapshot(name: string, records: StartupRecord[]): Promise<string> {
    const target = path.join(this.snapshotDir, `${name}.json`);
    await mkdir(this.snapshotDir, { recursive: true });
    await writeFile(target, JSON.stringify(records, null, 2), "utf8");
    return target;
  }

  describe(key: CacheKey): string {
    return this.files[key];
  }

  async close(): Promise<void> {}
}

class PostgresCacheBackend implements CacheBackend {
  readonly kind = "postgres";
  private readonly pool: Pool;

  constructor(databaseUrl: string, ssl: boolean) {
    this.pool = new Pool({
      connectionString: databaseUrl,
      ssl: ssl ? { rejectUnauthorized: false } : false
    });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS startup_cache (
        key TEXT PRIMARY KEY,
        payload JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS crawl_snapshots (
        name TEXT PRIMARY KEY,
        payload JSONB NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  async read(key: CacheKey): Promise<unknown> {
    const result = await this.pool.query<{ payload: unknown }>("SELECT payload FROM startup_cache WHERE key = $1", [key]);
    return result.rows[0]?.payload;
  }

  async write(key: CacheKey, value: unknown): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO startup_cache (key, payload, updated_at)
        VALUES ($1, $2::jsonb, NOW())
        ON CONFLICT (key)
        DO UPDATE SET payload = EXCLUDED.payload, updated_at = NOW()
      `,
      [key, JSON.stringify(value)]
    );
  }

  async remove(keys: CacheKey[]): Promise<void> {
    await this.pool.query("DELETE FROM startup_cache WHERE key = ANY($1::text[])", [keys]);
  }

  async writeSnapshot(name: string, records: StartupRecord[]): Promise<string> {
    await this.pool.query(
      `
        INSERT INTO crawl_snapshots (name, payload)
        VALUES ($1, $2::jsonb)
        ON CONFLICT (name) DO UPDATE SET payload = EXCLUDED.payload
      `,
      [name, JSON.stringify(records)]
    );
    return `crawl_snapshots/${name}`;
  }

  describe(key: CacheKey): string {
    return `startup_cache/${key}`;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export interface CacheStoreOptions {
  dataDir: string;
  databaseUrl?: string;
  databaseSsl?: boolean;
}

export class CacheStore {
  private readonly backend: CacheBackend;

  constructor(options: CacheStoreOptions) {
    this.backend = options.databaseUrl
      ? new PostgresCacheBackend(options.databaseUrl, options.databaseSsl ?? true)
      : new FileCacheBackend(options.dataDir);
  }

  isUsingPostgres(): boolean {
    return this.backend.kind === "postgres";
  }

  async init(): Promise<void> {
    await this.backend.init();
    console.info(`[cache] Using ${this.backend.kind} storage`);
  }

  async shutdown(): Promise<void> {
    await this.backend.close();
  }

  async save(records: StartupRecord[], status: CacheStatus, message: string, now = new Date()): Promise<CacheEntry> {
    const entry: CacheEntry = {
      lastUpdate: now.toISOString(),
      status,
      recordCount: records.length,
      message
    };
    // Data first, so the metadata never describes records that were not written.
    await this.backend.write("startups_data", records);
    await this.backend.write("cache_info", entry);
    console.info(`[cache] Saved ${records.length} startups (${status})`);
    return entry;
  }

  async load(): Promise<CachedDirectory | undefined> {
    const entry = await this.readValidated("cache_info", cacheEntrySchema);
    if (!entry) return undefined;
    const records = await this.readValidated("startups_data", startupListSchema);
    if (!records) return undefined;
    return { records, entry };
  }

  async loadEntry(): Promise<CacheEntry | undefined> {
    return this.readValidated("cache_info", cacheEntrySchema);
  }

  async isFresh(now = new Date()): Promise<FreshnessVerdict> {
    return evaluateFreshness(await this.loadEntry(), now);
  }

  async clear(): Promise<void> {
    await this.backend.remove(["cache_info", "startups_data"]);
    console.info("[cache] Cache cleared");
  }

  async snapshot(records: StartupRecord[], now = new Date()): Promise<string> {
    const location = await this.backend.writeSnapshot(snapshotName(now), records);
    console.info(`[cache] Snapshot of ${records.length} startups written to ${location}`);
    return location;
  }

  async loadCurated(): Promise<StartupRecord[]> {
    return (await this.readValidated("startups_manual", startupListSchema)) ?? [];
  }

  /** Appends crawled records whose id is not curated yet; existing curated records are left untouched. */
  async mergeCurated(records: StartupRecord[]): Promise<number> {
    const curated = await this.loadCurated();
    const known = new Set(curated.map((record) => record.id));
    const additions = records.filter((record) => !known.has(record.id));
    if (additions.length > 0) {
      await this.backend.write("startups_manual", [...curated, ...additions]);
    }
    console.info(`[cache] Added ${additions.length} new startups to the curated store`);
    return additions.length;
  }

  async upsertCurated(record: StartupRecord): Promise<StartupRecord> {
    const curated = await this.loadCurated();
    const index = curated.findIndex((item) => item.id === record.id);
    const current = index >= 0 ? curated[index] : undefined;
    const next = current ? mergeStartupRecords(current, record) : record;
    const updated = current ? curated.map((item, i) => (i === index ? next : item)) : [...curated, next];
    await this.backend.write("startups_manual", updated);
    return next;
  }

  private async readValidated<S extends z.ZodTypeAny>(key: CacheKey, schema: S): Promise<z.infer<S> | undefined> {
    try {
      const raw = await this.backend.read(key);
      if (raw === undefined) return undefined;
      const parsed = schema.safeParse(raw);
      if (!parsed.success) throw new CacheCorruptError(this.backend.describe(key), { cause: parsed.error });
      return parsed.data;
    } catch (error) {
      if (error instanceof CacheCorruptError) {
        console.warn(`[cache] ${error.message}, treating it as absent: ${errorMessage(error.cause)}`);
        return undefined;
      }
      throw error;
    }
  }
}
