import type { CacheEntry, CacheStatus, StartupRecord } from "../../shared/types.js";

export type {
  CacheEntry,
  CacheStatus,
  CrawlStats,
  NeedIntent,
  RankedStartup,
  RecommendResponse,
  SearchFilters,
  SearchMode,
  StartupCombination,
  StartupMetadata,
  StartupRecord
} from "../../shared/types.js";

export interface RawStartupRecord {
  id?: string | null;
  name?: string | null;
  description?: string | null;
  tags?: string[] | string | null;
  domain?: string | null;
  location?: string | null;
  url?: string | null;
  contact?: string | null;
  email?: string | null;
  phone?: string | null;
  ceo?: string | null;
  yearFounded?: string | null;
  employeeCount?: string | null;
  logoUrl?: string | null;
  lastUpdated?: string | null;
}

export interface ChunkMetadata {
  source: "startup_crawl";
  startupId: string;
  startupName: string;
  tags: string[];
  domain: string;
  location: string;
}

export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface EmbeddingEntry {
  chunkId: number;
  vector: number[];
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  score: number;
}

export interface CrawlResult {
  runId: string;
  records: StartupRecord[];
  status: Exclude<CacheStatus, "error">;
  message: string;
  pagesFetched: number;
}

export interface FreshnessVerdict {
  fresh: boolean;
  reason?: string;
}

export interface CachedDirectory {
  records: StartupRecord[];
  entry: CacheEntry;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmConfig {
  model: string;
  temperature: number;
  maxTokens: number;
}
