import { createSampleStartups } from "../domain/seed.js";
import { evaluateFreshness, type CacheStore } from "../domain/store.js";
import { errorMessage } from "../domain/errors.js";
import type { CacheEntry, CacheStatus, CachedDirectory, CrawlResult, CrawlStats, RawStartupRecord, StartupRecord } from "../domain/types.js";
import { buildCrawlStats } from "./crawl-stats.js";
import { PromiseChainLock, type Lock } from "./lock.js";
import type { ScheduledJob, Scheduler } from "./scheduler.js";
import { normalizeStartup } from "./startup-normalization.js";

const MEMORY_TTL_MS = 10 * 60 * 1000;

export interface DirectoryCrawler {
  crawl(): Promise<CrawlResult>;
}

export type DirectoryCache = Pick<
  CacheStore,
  "load" | "save" | "snapshot" | "clear" | "loadCurated" | "mergeCurated" | "upsertCurated"
>;

export interface StartupDataServiceOptions {
  store: DirectoryCache;
  crawler: DirectoryCrawler;
  lock?: Lock;
  scheduler?: Scheduler;
  dailyAt?: string;
  memoryTtlMs?: number;
  now?: () => Date;
}

interface MemoryView {
  records: StartupRecord[];
  entry: CacheEntry;
  loadedAt: number;
}

function timestampOf(value: string): number {
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Cached records overlaid with curated ones: for a shared id the most recently updated version is served. */
export function overlayCurated(cached: StartupRecord[], curated: StartupRecord[]): StartupRecord[] {
  const byId = new Map(cached.map((record) => [record.id, record]));
  for (const record of curated) {
    const current = byId.get(record.id);
    if (!current || timestampOf(record.lastUpdated) > timestampOf(current.lastUpdated)) {
      byId.set(record.id, record);
    }
  }
  return [...byId.values()];
}

export class StartupDataService {
  private readonly store: DirectoryCache;
  private readonly crawler: DirectoryCrawler;
  private readonly lock: Lock;
  private readonly scheduler?: Scheduler;
  private readonly dailyAt: string;
  private readonly memoryTtlMs: number;
  private readonly now: () => Date;

  private view?: MemoryView;
  private crawlGeneration = 0;
  private job?: ScheduledJob;

  constructor(options: StartupDataServiceOptions) {
    this.store = options.store;
    this.crawler = options.crawler;
    this.lock = options.lock ?? new PromiseChainLock();
    this.scheduler = options.scheduler;
    this.dailyAt = options.dailyAt ?? "03:00";
    this.memoryTtlMs = options.memoryTtlMs ?? MEMORY_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  init(): void {
    if (!this.scheduler || this.job) return;
    this.job = this.scheduler.schedule(this.dailyAt, async () => {
      console.info("[scheduler] Starting scheduled crawl");
      await this.forceRefresh();
    });
  }

  shutdown(): void {
    this.job?.cancel();
    this.job = undefined;
  }

  async getStartups(options: { forceRefresh?: boolean } = {}): Promise<StartupRecord[]> {
    const forceRefresh = options.forceRefresh ?? false;
    const generation = this.crawlGeneration;
    if (!forceRefresh) {
      const view = this.memoryView();
      if (view) return view.records;

      const cached = await this.loadCached();
      const verdict = evaluateFreshness(cached?.entry, this.now());
      if (cached && verdict.fresh) {
        return this.publish(cached);
      }
      console.info(`[cache] Refresh needed: ${verdict.reason ?? "cache unavailable"}`);
    }

    return this.refresh(generation, forceRefresh);
  }

  async forceRefresh(): Promise<StartupRecord[]> {
    return this.getStartups({ forceRefresh: true });
  }

  async getStartup(id: string): Promise<StartupRecord | undefined> {
    return (await this.getStartups()).find((record) => record.id === id);
  }

  async getCrawlStats(): Promise<CrawlStats> {
    const records = await this.getStartups();
    return buildCrawlStats(records, this.view?.entry);
  }

  async clearCache(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.store.clear();
      this.view = undefined;
    });
  }

  /** Shares the lock with crawls, whose curated merge rewrites the same store. */
  async upsertCurated(raw: RawStartupRecord): Promise<StartupRecord> {
    return this.lock.runExclusive(async () => {
      const record = normalizeStartup({ ...raw, lastUpdated: this.now().toISOString() });
      const saved = await this.store.upsertCurated(record);
      if (this.view) {
        this.view = { ...this.view, records: overlayCurated(this.view.records, [saved]) };
      }
      return saved;
    });
  }

  private async loadCached(): Promise<CachedDirectory | undefined> {
    try {
      return await this.store.load();
    } catch (error) {
      console.error(`[cache] Could not read the cache, treating it as absent: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private memoryView(): MemoryView | undefined {
    if (!this.view) return undefined;
    if (this.now().getTime() - this.view.loadedAt > this.memoryTtlMs) return undefined;
    return this.view;
  }

  /** A caller that waited on a crawl started after it arrived reuses that crawl's result. */
  private async refresh(generation: number, forced: boolean): Promise<StartupRecord[]> {
    return this.lock.runExclusive(async () => {
      if (this.crawlGeneration !== generation && this.view) {
        console.info(`[cache] ${forced ? "Forced refresh" : "Refresh"} satisfied by the crawl that just finished`);
        return this.view.records;
      }
      return this.crawlAndStore();
    });
  }

  private async crawlAndStore(): Promise<StartupRecord[]> {
    const startedAt = this.now();
    let records: StartupRecord[];
    let status: CacheStatus;
    let message: string;

    try {
      const result = await this.crawler.crawl();
      ({ records, status, message } = result);
    } catch (error) {
      console.error(`[crawler] Crawl failed, serving sample data: ${errorMessage(error)}`);
      records = createSampleStartups(startedAt.toISOString());
      status = "error";
      message = `Crawl failed: ${errorMessage(error)}`;
    }

    const entry = await this.persist(records, status, message);
    this.crawlGeneration += 1;
    return this.publish({ records, entry });
  }

  private async persist(records: StartupRecord[], status: CacheStatus, message: string): Promise<CacheEntry> {
    const at = this.now();
    let entry: CacheEntry = { lastUpdate: at.toISOString(), status, recordCount: records.length, message };

    try {
      entry = await this.store.save(records, status, message, at);
      await this.store.snapshot(records, at);
      if (status === "success") await this.store.mergeCurated(records);
    } catch (error) {
      console.error(`[cache] Could not persist crawl results: ${errorMessage(error)}`);
    }
    return entry;
  }

  private async publish(cached: CachedDirectory): Promise<StartupRecord[]> {
    let curated: StartupRecord[] = [];
    try {
      curated = await this.store.loadCurated();
    } catch (error) {
      console.error(`[cache] Could not read curated startups: ${errorMessage(error)}`);
    }

    const records = overlayCurated(cached.records, curated);
    this.view = { records, entry: cached.entry, loadedAt: this.now().getTime() };
    return records;
  }
}
