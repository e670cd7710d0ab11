import type { CacheEntry, CrawlStats, StartupMetadata, StartupRecord } from "../domain/types.js";

function sortedUnique(values: string[]): string[] {
  return [...new Set(values.filter((value) => value.trim().length > 0))].sort((a, b) => a.localeCompare(b, "fr"));
}

export function collectMetadata(records: StartupRecord[]): StartupMetadata {
  return {
    tags: sortedUnique(records.flatMap((record) => record.tags)),
    domains: sortedUnique(records.map((record) => record.domain)),
    locations: sortedUnique(records.map((record) => record.location))
  };
}

export function buildCrawlStats(records: StartupRecord[], entry?: CacheEntry): CrawlStats {
  const metadata = collectMetadata(records);
  return {
    count: records.length,
    lastUpdate: entry?.lastUpdate,
    status: entry?.status,
    message: entry?.message,
    domainsCount: metadata.domains.length,
    locationsCount: metadata.locations.length,
    tagsUnique: metadata.tags.length,
    tagsTotal: records.reduce((sum, record) => sum + record.tags.length, 0)
  };
}
