import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "./app.js";
import { createSampleStartups } from "./domain/seed.js";
import type { RankedStartup, RawStartupRecord, RecommendResponse, StartupCombination } from "./domain/types.js";
import { buildCrawlStats } from "./services/crawl-stats.js";
import { normalizeStartup } from "./services/startup-normalization.js";
import type { CombineRequest, SearchRequest } from "./services/startup-search.js";

const at = "2026-01-01T00:00:00.000Z";
const records = createSampleStartups(at);

const data = {
  getStartups: vi.fn(async () => records),
  getStartup: vi.fn(async (id: string) => records.find((record) => record.id === id)),
  getCrawlStats: vi.fn(async () => buildCrawlStats(records)),
  forceRefresh: vi.fn(async () => records),
  clearCache: vi.fn(async () => undefined),
  upsertCurated: vi.fn(async (raw: RawStartupRecord) => normalizeStartup({ ...raw, lastUpdated: at }))
};

const search = {
  search: vi.fn(async (_request: SearchRequest): Promise<RankedStartup[]> => []),
  combine: vi.fn(async (_request: CombineRequest): Promise<StartupCombination[]> => []),
  recommend: vi.fn(
    async (request: { need: string }): Promise<RecommendResponse> => ({
      intent: "search",
      need: request.need,
      matches: [],
      combinations: [],
      answer: "ok"
    })
  )
};

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  server = createApp({ data, search }).listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

function send(path: string, method = "GET", body?: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
}

describe("HTTP API", () => {
  it("reports health", async () => {
    const res = await send("/api/health");
    expect(await res.json()).toEqual({ ok: true, service: "startup-matcher" });
  });

  it("searches the directory listing by phrase and domain", async () => {
    const byPhrase = await send("/api/startups?q=logistique");
    const byDomain = await send("/api/startups?domain=sant%C3%A9");

    expect(await byPhrase.json()).toEqual([expect.objectContaining({ id: "startup-89012" })]);
    expect(await byDomain.json()).toEqual([expect.objectContaining({ id: "startup-45678" })]);
  });

  it("answers 404 for an unknown startup", async () => {
    const res = await send("/api/startups/startup-00000");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ message: "Startup not found" });
  });

  it("serves one startup by id", async () => {
    const res = await send("/api/startups/startup-45678");
    expect(await res.json()).toMatchObject({ name: "MediSanté 974" });
  });

  it("rejects a search without a need", async () => {
    const res = await send("/api/search", "POST", { topK: 3 });
    expect(res.status).toBe(400);
    expect(search.search).not.toHaveBeenCalled();
  });

  it("passes validated searches with the default mode", async () => {
    const res = await send("/api/search", "POST", { need: "  énergie  ", topK: 2 });

    expect(res.status).toBe(200);
    expect(search.search).toHaveBeenCalledWith({ need: "énergie", topK: 2, mode: "keyword" });
  });

  it("turns a service failure into a 500", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    search.combine.mockRejectedValueOnce(new Error("index unavailable"));

    const res = await send("/api/combine", "POST", { need: "énergie" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ message: "index unavailable" });
  });

  it("clears the cache", async () => {
    const res = await send("/api/admin/cache", "DELETE");
    expect(res.status).toBe(204);
    expect(data.clearCache).toHaveBeenCalledTimes(1);
  });

  it("upserts a curated startup", async () => {
    const res = await send("/api/admin/startups", "PUT", { name: "Kaz Data", tags: "Data, IA" });

    expect(data.upsertCurated).toHaveBeenCalledWith({ name: "Kaz Data", tags: "Data, IA" });
    expect(await res.json()).toMatchObject({ name: "Kaz Data", tags: ["Data", "IA"], lastUpdated: at });
  });
});
