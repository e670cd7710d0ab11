import type { RankedStartup, SearchFilters, StartupRecord } from "../domain/types.js";
import { matchesFilters, matchNeed, type MatchOptions } from "../services/need-matcher.js";
import { DocumentChunker } from "./document-chunker.js";
import { EmbeddingIndex, type EmbeddingProvider } from "./embedding-index.js";

export interface SemanticRetrieverOptions {
  chunker: DocumentChunker;
  provider: EmbeddingProvider;
  batchSize?: number;
}

interface IndexedCorpus {
  key: string;
  index: Promise<EmbeddingIndex>;
}

// Same ids at the same revision means the same chunks, whichever array carries them.
function corpusKey(records: StartupRecord[]): string {
  return records.map((record) => `${record.id}@${record.lastUpdated}`).join("|");
}

function hasAnyFilter(filters?: SearchFilters): boolean {
  return Boolean(filters && ((filters.tags?.length ?? 0) > 0 || filters.domain || filters.location));
}

/**
 * Semantic search over the served records. The index is rebuilt when the record ids or their
 * revisions change; keyword matching answers when the index yields nothing.
 */
export class SemanticRetriever {
  private readonly chunker: DocumentChunker;
  private readonly provider: EmbeddingProvider;
  private readonly batchSize?: number;
  private indexed?: IndexedCorpus;

  constructor(options: SemanticRetrieverOptions) {
    this.chunker = options.chunker;
    this.provider = options.provider;
    this.batchSize = options.batchSize;
  }

  async retrieve(
    need: string,
    records: StartupRecord[],
    topK = 5,
    options: MatchOptions = {}
  ): Promise<RankedStartup[]> {
    const index = await this.indexFor(records);
    const filtered = hasAnyFilter(options.filters);
    const hits = await index.search(need, filtered ? topK * 2 : topK);

    const byId = new Map(records.map((record) => [record.id, record]));
    const seen = new Set<string>();
    const ranked: RankedStartup[] = [];
    for (const { chunk, score } of hits) {
      const startup = byId.get(chunk.metadata.startupId);
      if (!startup || seen.has(startup.id)) continue;
      if (filtered && !matchesFilters(startup, options.filters)) continue;
      seen.add(startup.id);
      ranked.push({ startup, score });
      if (ranked.length >= topK) break;
    }

    if (ranked.length > 0) return ranked;
    console.info("[rag] Semantic search returned nothing, using keyword matching");
    return matchNeed(need, records, topK, options);
  }

  private indexFor(records: StartupRecord[]): Promise<EmbeddingIndex> {
    const key = corpusKey(records);
    if (this.indexed?.key === key) return this.indexed.index;

    const index = new EmbeddingIndex(this.provider, { batchSize: this.batchSize });
    const entry: IndexedCorpus = {
      key,
      index: index.build(this.chunker.chunkStartups(records)).then(
        () => {
          // An index with no vectors is retried on the next query.
          if (index.size === 0 && this.indexed === entry) this.indexed = undefined;
          return index;
        },
        (error: unknown) => {
          if (this.indexed === entry) this.indexed = undefined;
          throw error;
        }
      )
    };
    this.indexed = entry;
    return entry.index;
  }
}
