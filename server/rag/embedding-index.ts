import { EmbeddingServiceError, errorMessage } from "../domain/errors.js";
import type { DocumentChunk, EmbeddingEntry, ScoredChunk } from "../domain/types.js";

export interface EmbeddingProvider {
  /** One vector per text, or an empty list when the service fails. */
  embed(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingIndexOptions {
  batchSize?: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class EmbeddingIndex {
  private readonly batchSize: number;
  private chunks: DocumentChunk[] = [];
  private entries: EmbeddingEntry[] = [];

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingIndexOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 10);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Rebuilds the index; a failed batch leaves its chunks out instead of aborting the build. */
  async build(chunks: DocumentChunk[]): Promise<void> {
    this.chunks = [...chunks];
    this.entries = [];

    for (let start = 0; start < this.chunks.length; start += this.batchSize) {
      const batch = this.chunks.slice(start, start + this.batchSize);
      const batchNumber = start / this.batchSize + 1;
      try {
        const vectors = await this.provider.embed(batch.map((chunk) => chunk.content));
        if (vectors.length !== batch.length) {
          throw new EmbeddingServiceError(`expected ${batch.length} vectors, received ${vectors.length}`);
        }
        vectors.forEach((vector, offset) => {
          const chunk = batch[offset];
          if (chunk) this.entries.push({ chunkId: start + offset, vector, metadata: chunk.metadata });
        });
      } catch (error) {
        console.error(`[rag] Embedding batch ${batchNumber} failed, skipping ${batch.length} chunks: ${errorMessage(error)}`);
      }
    }

    console.info(`[rag] Indexed ${this.entries.length}/${this.chunks.length} chunks`);
  }

  async search(query: string, topK = 5): Promise<ScoredChunk[]> {
    if (this.entries.length === 0) return [];

    let queryVector: number[] | undefined;
    try {
      [queryVector] = await this.provider.embed([query]);
    } catch (error) {
      console.error(`[rag] Query embedding failed: ${errorMessage(error)}`);
      return [];
    }
    if (!queryVector) return [];

    const scored: ScoredChunk[] = [];
    for (const entry of this.entries) {
      const chunk = this.chunks[entry.chunkId];
      if (chunk) scored.push({ chunk, score: cosineSimilarity(queryVector, entry.vector) });
    }
    return scored.sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
  }
}
