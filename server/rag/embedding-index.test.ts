import { describe, expect, it, vi } from "vitest";
import type { DocumentChunk } from "../domain/types.js";
import { EmbeddingIndex, cosineSimilarity, type EmbeddingProvider } from "./embedding-index.js";

const topics = ["santé", "énergie", "logistique"];

// Bag-of-topics vectors keep similarities predictable.
function topicVector(text: string): number[] {
  const lower = text.toLowerCase();
  return topics.map((topic): number => (lower.includes(topic) ? 1 : 0)).concat(0.1);
}

function chunk(content: string, startupId: string): DocumentChunk {
  return {
    content,
    metadata: { source: "startup_crawl", startupId, startupName: startupId, tags: [], domain: "", location: "" }
  };
}

const chunks = [
  chunk("Télémédecine et santé connectée", "a"),
  chunk("Panneaux solaires et énergie", "b"),
  chunk("Logistique portuaire", "c"),
  chunk("Santé et énergie pour les hôpitaux", "d")
];

describe("cosineSimilarity", () => {
  it("handles identical, orthogonal and degenerate vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 1])).toBe(0);
  });
});

describe("EmbeddingIndex", () => {
  const provider: EmbeddingProvider = { embed: async (texts) => texts.map(topicVector) };

  it("ranks chunks by descending similarity", async () => {
    const index = new EmbeddingIndex(provider, { batchSize: 2 });
    await index.build(chunks);

    const results = await index.search("besoin en santé", 3);

    expect(index.size).toBe(4);
    expect(results.map((result) => result.chunk.metadata.startupId)).toEqual(["a", "d", "b"]);
    const scores = results.map((result) => result.score);
    expect(scores).toEqual([...scores].sort((x, y) => y - x));
  });

  it("skips a failed batch and keeps the others aligned", async () => {
    const embed = vi
      .fn(async (texts: string[]) => texts.map(topicVector))
      .mockRejectedValueOnce(new Error("rate limited"));
    const index = new EmbeddingIndex({ embed }, { batchSize: 2 });

    await index.build(chunks);
    const results = await index.search("logistique", 1);

    expect(index.size).toBe(2);
    expect(results[0]?.chunk.content).toBe("Logistique portuaire");
  });

  it("treats a short batch result as a failure", async () => {
    const index = new EmbeddingIndex({ embed: async (texts) => texts.slice(1).map(topicVector) }, { batchSize: 10 });
    await index.build(chunks);
    expect(index.size).toBe(0);
    expect(await index.search("santé")).toEqual([]);
  });

  it("returns nothing when the query cannot be embedded", async () => {
    const embed = vi.fn(async (texts: string[]) => (texts.length === 1 ? [] : texts.map(topicVector)));
    const index = new EmbeddingIndex({ embed });
    await index.build(chunks);
    expect(await index.search("santé")).toEqual([]);
  });
});
