// ── Directory Records ───────────────────────────────────────────────
export type CacheStatus = "success" | "fallback" | "error";

export interface StartupRecord {
  id: string;
  name: string;
  description: string;
  tags: string[];
  domain: string;
  location: string;
  url: string;
  contact: string;
  email: string;
  phone: string;
  ceo?: string;
  yearFounded?: string;
  employeeCount?: string;
  logoUrl?: string;
  lastUpdated: string;
}

export interface CacheEntry {
  lastUpdate: string;
  status: CacheStatus;
  recordCount: number;
  message: string;
}

// ── Search & Matching ───────────────────────────────────────────────
export interface SearchFilters {
  tags?: string[];
  domain?: string;
  location?: string;
}

export type SearchMode = "keyword" | "semantic";

export type NeedIntent = "search" | "combine" | "details" | "refine";

export interface RankedStartup {
  startup: StartupRecord;
  score: number;
}

export interface StartupCombination {
  startups: [StartupRecord, StartupRecord];
  reason: string;
}

export interface RecommendResponse {
  intent: NeedIntent;
  need: string;
  filters?: SearchFilters;
  matches: RankedStartup[];
  combinations: StartupCombination[];
  answer: string;
}

// ── Admin ───────────────────────────────────────────────────────────
export interface CrawlStats {
  count: number;
  lastUpdate?: string;
  status?: CacheStatus;
  message?: string;
  domainsCount: number;
  locationsCount: number;
  tagsUnique: number;
  tagsTotal: number;
}

export interface StartupMetadata {
  tags: string[];
  domains: string[];
  locations: string[];
}
