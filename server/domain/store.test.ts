import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSampleStartups } from "./seed.js";
import { CacheStore, evaluateFreshness, snapshotName } from "./store.js";
import type { CacheEntry } from "./types.js";

const now = new Date("2026-03-10T12:00:00.000Z");
const hoursAgo = (hours: number) => new Date(now.getTime() - hours * 60 * 60 * 1000).toISOString();

function entry(status: CacheEntry["status"], ageHours: number): CacheEntry {
  return { lastUpdate: hoursAgo(ageHours), status, recordCount: 10, message: "" };
}

describe("evaluateFreshness", () => {
  it("treats a missing entry as stale", () => {
    expect(evaluateFreshness(undefined, now)).toEqual({ fresh: false, reason: "No cache metadata found" });
  });

  it("expires a fallback entry after four hours", () => {
    const verdict = evaluateFreshness(entry("fallback", 5), now);
    expect(verdict.fresh).toBe(false);
    expect(verdict.reason).toBe("Cache used fallback data and is older than 4 hours");
    expect(evaluateFreshness(entry("fallback", 3), now)).toEqual({ fresh: true });
  });

  it("expires an error entry after one hour", () => {
    expect(evaluateFreshness(entry("error", 2), now)).toEqual({
      fresh: false,
      reason: "Cache is in error state and older than 1 hour"
    });
    expect(evaluateFreshness(entry("error", 0.5), now).fresh).toBe(true);
  });

  it("expires any entry after a day", () => {
    expect(evaluateFreshness(entry("success", 23), now).fresh).toBe(true);
    expect(evaluateFreshness(entry("success", 25), now)).toEqual({
      fresh: false,
      reason: `Cache is older than 24 hours (last update: ${hoursAgo(25)})`
    });
  });

  it("never turns fresh again as the entry ages", () => {
    const ages = [0, 0.5, 1, 2, 4, 5, 23, 24, 25, 48];
    for (const status of ["success", "fallback", "error"] as const) {
      const verdicts = ages.map((age) => evaluateFreshness(entry(status, age), now).fresh);
      const firstStale = verdicts.indexOf(false);
      if (firstStale >= 0) expect(verdicts.slice(firstStale).every((fresh) => !fresh)).toBe(true);
    }
  });
});

describe("snapshotName", () => {
  it("formats the timestamp", () => {
    expect(snapshotName(new Date(2026, 2, 10, 8, 5, 9))).toBe("startups_crawl_20260310_080509");
  });
});

describe("CacheStore (file backend)", () => {
  let dataDir: string;
  let store: CacheStore;
  const records = createSampleStartups("2026-03-10T12:00:00.000Z");

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "startup-cache-"));
    store = new CacheStore({ dataDir });
    await store.init();
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("round-trips records and metadata", async () => {
    const saved = await store.save(records, "success", "Crawled 10 startups", now);
    const loaded = await store.load();

    expect(saved).toEqual({ lastUpdate: now.toISOString(), status: "success", recordCount: 10, message: "Crawled 10 startups" });
    expect(loaded?.entry).toEqual(saved);
    expect(loaded?.records).toEqual(records);
    expect(await store.isFresh(now)).toEqual({ fresh: true });
  });

  it("reports a five hour old fallback cache as stale", async () => {
    await store.save(records, "fallback", "sample data", new Date(hoursAgo(5)));
    const verdict = await store.isFresh(now);
    expect(verdict.fresh).toBe(false);
    expect(verdict.reason).toContain("fallback");
  });

  it("treats unreadable data as absent", async () => {
    await store.save(records, "success", "ok", now);
    await writeFile(path.join(dataDir, "cache", "startups_data.json"), "{not json", "utf8");
    expect(await store.load()).toBeUndefined();

    await writeFile(path.join(dataDir, "cache", "cache_info.json"), JSON.stringify({ status: "unknown" }), "utf8");
    expect(await store.isFresh(now)).toEqual({ fresh: false, reason: "No cache metadata found" });
  });

  it("clears the cache", async () => {
    await store.save(records, "success", "ok", now);
    await store.clear();
    expect(await store.load()).toBeUndefined();
  });

  it("writes a timestamped snapshot", async () => {
    const location = await store.snapshot(records.slice(0, 2), now);
    const files = await readdir(path.join(dataDir, "snapshots"));

    expect(files).toEqual([`${snapshotName(now)}.json`]);
    expect(JSON.parse(await readFile(location, "utf8"))).toHaveLength(2);
  });

  it("appends only unseen ids to the curated store", async () => {
    const [first, second, third] = records;
    if (!first || !second || !third) throw new Error("sample data is missing");

    await store.upsertCurated({ ...first, description: "Edited by hand" });
    const added = await store.mergeCurated([first, second, third]);
    const curated = await store.loadCurated();

    expect(added).toBe(2);
    expect(curated.map((record) => record.id)).toEqual([first.id, second.id, third.id]);
    expect(curated[0]?.description).toBe("Edited by hand");
  });

  it("merges an upsert into the existing curated record", async () => {
    const [first] = records;
    if (!first) throw new Error("sample data is missing");

    await store.upsertCurated(first);
    const updated = await store.upsertCurated({ ...first, phone: "0262 11 22 33", tags: ["IoT"] });

    expect(updated.phone).toBe("0262 11 22 33");
    expect(updated.tags).toEqual([...first.tags, "IoT"]);
    expect(await store.loadCurated()).toHaveLength(1);
  });
});
