import type { RankedStartup, SearchFilters, StartupCombination, StartupRecord } from "../domain/types.js";

export interface ScoringWeights {
  name: number;
  description: number;
  tag: number;
  domain: number;
  location: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  name: 3,
  description: 2,
  tag: 2,
  domain: 1,
  location: 0
};

// What to return when no record scores above zero.
export type ZeroMatchPolicy = "random_sample" | "empty";

export interface MatchOptions {
  weights?: Partial<ScoringWeights>;
  filters?: SearchFilters;
  zeroMatchPolicy?: ZeroMatchPolicy;
  random?: () => number;
}

const COMBINATION_POOL_SIZE = 10;
const NEED_EXCERPT_CHARS = 100;

export function needKeywords(need: string): string[] {
  return need
    .toLowerCase()
    .split(/\s+/)
    .filter((keyword) => keyword.length > 0);
}

export function scoreStartup(record: StartupRecord, keywords: string[], weights: ScoringWeights = DEFAULT_WEIGHTS): number {
  const name = record.name.toLowerCase();
  const description = record.description.toLowerCase();
  const tags = record.tags.map((tag) => tag.toLowerCase());
  const domain = record.domain.toLowerCase();
  const location = record.location.toLowerCase();

  let score = 0;
  for (const keyword of keywords) {
    if (name.includes(keyword)) score += weights.name;
    if (description.includes(keyword)) score += weights.description;
    score += tags.filter((tag) => tag.includes(keyword)).length * weights.tag;
    if (domain.includes(keyword)) score += weights.domain;
    if (location.includes(keyword)) score += weights.location;
  }
  return score;
}

function hasFilters(filters?: SearchFilters): filters is SearchFilters {
  return Boolean(filters && ((filters.tags && filters.tags.length > 0) || filters.domain || filters.location));
}

export function matchesFilters(record: StartupRecord, filters?: SearchFilters): boolean {
  if (!hasFilters(filters)) return true;

  if (filters.tags && filters.tags.length > 0) {
    const wanted = filters.tags.map((tag) => tag.trim().toLowerCase()).filter(Boolean);
    const owned = new Set(record.tags.map((tag) => tag.toLowerCase()));
    if (wanted.length > 0 && !wanted.some((tag) => owned.has(tag))) return false;
  }
  if (filters.domain && record.domain.toLowerCase() !== filters.domain.trim().toLowerCase()) return false;
  if (filters.location && !record.location.toLowerCase().includes(filters.location.trim().toLowerCase())) return false;
  return true;
}

export function applyFilters(records: StartupRecord[], filters?: SearchFilters): StartupRecord[] {
  return hasFilters(filters) ? records.filter((record) => matchesFilters(record, filters)) : records;
}

export function sampleRecords<T>(items: T[], count: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const size = Math.min(count, pool.length);
  for (let i = 0; i < size; i += 1) {
    const j = i + Math.floor(random() * (pool.length - i));
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) continue;
    pool[i] = picked;
    pool[j] = current;
  }
  return pool.slice(0, size);
}

export function matchNeed(
  need: string,
  records: StartupRecord[],
  topK = 5,
  options: MatchOptions = {}
): RankedStartup[] {
  const limit = Math.max(0, topK);
  const weights = { ...DEFAULT_WEIGHTS, ...options.weights };
  const candidates = applyFilters(records, options.filters);
  const keywords = needKeywords(need);

  if (keywords.length === 0 && candidates.length > 0) {
    return candidates.slice(0, limit).map((startup) => ({ startup, score: 0 }));
  }

  const ranked = candidates
    .map((startup) => ({ startup, score: scoreStartup(startup, keywords, weights) }))
    .filter((item) => item.score > 0)
    .sort((a, b) => b.score - a.score);

  if (ranked.length > 0) return ranked.slice(0, limit);
  if ((options.zeroMatchPolicy ?? "random_sample") === "empty") return [];

  const pool = candidates.length > 0 ? candidates : records;
  console.info(`[matcher] No keyword match for "${need}", sampling ${Math.min(limit, pool.length)} startups`);
  return sampleRecords(pool, limit, options.random).map((startup) => ({ startup, score: 0 }));
}

export function combinationReason(first: StartupRecord, second: StartupRecord, need: string): string {
  const excerpt = need.length > NEED_EXCERPT_CHARS ? `${need.slice(0, NEED_EXCERPT_CHARS)}...` : need;
  return `Combining '${first.name}' (${first.domain}) with '${second.name}' (${second.domain}) to address: ${excerpt}`;
}

/** Pairs the strongest matches whose domains differ. */
export function combineForNeed(
  need: string,
  records: StartupRecord[],
  topK = 3,
  options: MatchOptions = {}
): StartupCombination[] {
  const relevant = matchNeed(need, records, COMBINATION_POOL_SIZE, options).map((item) => item.startup);
  const combinations: StartupCombination[] = [];

  for (let i = 0; i < Math.min(relevant.length, 4); i += 1) {
    for (let j = i + 1; j < Math.min(relevant.length, 5); j += 1) {
      const first = relevant[i];
      const second = relevant[j];
      if (!first || !second || first.domain === second.domain) continue;
      combinations.push({ startups: [first, second], reason: combinationReason(first, second, need) });
    }
  }

  return combinations.slice(0, Math.max(0, topK));
}

/** Whole-phrase search used by the directory listing. */
export function searchDirectory(query: string, records: StartupRecord[]): StartupRecord[] {
  const phrase = query.trim().toLowerCase();
  if (!phrase) return records;

  const scored: RankedStartup[] = [];
  for (const startup of records) {
    const name = startup.name.toLowerCase();
    let score = 0;
    if (name.includes(phrase)) {
      score += 10;
      if (name.startsWith(phrase)) score += 5;
    }
    if (startup.description.toLowerCase().includes(phrase)) score += 5;
    if (startup.tags.some((tag) => tag.toLowerCase().includes(phrase))) score += 7;
    if (startup.domain.toLowerCase().includes(phrase)) score += 8;
    if (startup.location.toLowerCase().includes(phrase)) score += 3;
    if (score > 0) scored.push({ startup, score });
  }

  return scored.sort((a, b) => b.score - a.score).map((item) => item.startup);
}

export function findStartupById(records: StartupRecord[], id: string): StartupRecord | undefined {
  return records.find((record) => record.id === id);
}

export function findStartupByName(records: StartupRecord[], name: string): StartupRecord | undefined {
  const wanted = name.trim().toLowerCase();
  return records.find((record) => record.name.toLowerCase() === wanted);
}

export function startupsByDomain(records: StartupRecord[], domain: string): StartupRecord[] {
  const wanted = domain.trim().toLowerCase();
  return records.filter((record) => record.domain.toLowerCase() === wanted);
}

export function startupsByTag(records: StartupRecord[], tag: string): StartupRecord[] {
  const wanted = tag.trim().toLowerCase();
  return records.filter((record) => record.tags.some((item) => item.toLowerCase() === wanted));
}
