import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { describe, expect, it, vi } from "vitest";
import type { FetchOutcome } from "../services/page-fetcher.js";
import { StartupExtractor } from "../services/startup-extractor.js";
import { CrawlOrchestrator, listingPageUrl } from "./crawl-orchestrator.js";

const root = "https://directory.test/annuaire/";
const stamp = "2026-01-01T00:00:00.000Z";

function fakeSite(pages: Record<string, string>) {
  const requested: string[] = [];
  return {
    requested,
    async fetch(url: string): Promise<FetchOutcome> {
      requested.push(url);
      const html = pages[url];
      if (html === undefined) return { ok: false, url, reason: "HTTP 404" };
      return { ok: true, url, $: cheerio.load(html) };
    }
  };
}

function createOrchestrator(site: ReturnType<typeof fakeSite>, maxPages = 10) {
  return new CrawlOrchestrator({
    fetcher: site,
    extractor: new StartupExtractor({ defaultLocation: "La Réunion", defaultDomain: "Technologie" }),
    rootUrl: root,
    maxPages,
    sleep: async () => {},
    random: () => 0,
    now: () => stamp
  });
}

const card = (name: string, extra = "") => `<article><h3>${name}</h3>${extra}</article>`;

describe("listingPageUrl", () => {
  it("appends the page segment after the root", () => {
    expect(listingPageUrl(root, 1)).toBe(root);
    expect(listingPageUrl(root, 3)).toBe("https://directory.test/annuaire/page/3/");
    expect(listingPageUrl("https://directory.test/annuaire", 2)).toBe("https://directory.test/annuaire/page/2/");
  });
});

describe("CrawlOrchestrator", () => {
  it("extracts three cards from a single listing page", async () => {
    const site = fakeSite({
      [root]: `<main>
        ${card("Alpha Robotics", '<p>Robots agricoles.</p><div class="tags">Robotique, Agriculture</div>')}
        ${card("Beta Santé", '<p>Télémédecine.</p><div class="tags">Santé</div>')}
        ${card("Gamma Data", "<p>Outils data.</p>")}
      </main>`
    });

    const result = await createOrchestrator(site).crawl();

    expect(result.status).toBe("success");
    expect(result.pagesFetched).toBe(1);
    expect(result.message).toBe("Crawled 3 startups from 1 pages");
    expect(result.records.map((record) => record.name)).toEqual(["Alpha Robotics", "Beta Santé", "Gamma Data"]);
    expect(result.records.map((record) => record.domain)).toEqual(["Robotique", "Santé", "Technologie"]);
    expect(result.records.every((record) => record.lastUpdated === stamp)).toBe(true);
    expect(site.requested).toEqual([root, "https://directory.test/annuaire/page/2/"]);
  });

  it("keeps crawling past a card with a malformed mailto link", async () => {
    const site = fakeSite({
      [root]: `${card("Alpha")}${card("Beta", '<a href="mailto:contact%ZZ@beta.re">Écrire</a>')}${card("Gamma")}`
    });

    const result = await createOrchestrator(site, 1).crawl();

    expect(result.status).toBe("success");
    expect(result.records.map((record) => record.name)).toEqual(["Alpha", "Beta", "Gamma"]);
  });

  it("skips only the card whose extraction throws", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    class FlakyExtractor extends StartupExtractor {
      override extractFromCard($: CheerioAPI, element: Element, pageUrl: string) {
        if ($(element).text().includes("Beta")) throw new Error("broken markup");
        return super.extractFromCard($, element, pageUrl);
      }
    }
    const site = fakeSite({ [root]: `${card("Alpha")}${card("Beta")}${card("Gamma")}` });
    const orchestrator = new CrawlOrchestrator({
      fetcher: site,
      extractor: new FlakyExtractor({ defaultLocation: "La Réunion", defaultDomain: "Technologie" }),
      rootUrl: root,
      maxPages: 1,
      sleep: async () => {},
      random: () => 0,
      now: () => stamp
    });

    const result = await orchestrator.crawl();

    expect(result.records.map((record) => record.name)).toEqual(["Alpha", "Gamma"]);
    expect(console.warn).toHaveBeenCalledWith(`[crawler] Skipping an item on ${root}: broken markup`);
  });

  it("prefers the detail page and falls back to the card", async () => {
    const site = fakeSite({
      [root]: `${card("Alpha", '<a href="/startups/alpha/">Voir</a>')}${card("Beta", '<a href="/startups/beta/">Voir</a>')}`,
      "https://directory.test/startups/alpha/": `<h1>Alpha Robotics</h1>`
    });

    const result = await createOrchestrator(site, 1).crawl();

    expect(result.records.map((record) => [record.name, record.url])).toEqual([
      ["Alpha Robotics", "https://directory.test/startups/alpha/"],
      ["Beta", ""]
    ]);
  });

  it("stops when a speculative page adds no new startups", async () => {
    const listing = `${card("Alpha")}${card("Beta")}`;
    const site = fakeSite({
      [root]: listing,
      "https://directory.test/annuaire/page/2/": listing
    });

    const result = await createOrchestrator(site).crawl();

    expect(result.records).toHaveLength(2);
    expect(result.pagesFetched).toBe(2);
    expect(site.requested).toEqual([root, "https://directory.test/annuaire/page/2/"]);
  });

  it("follows an explicit next link", async () => {
    const site = fakeSite({
      [root]: `${card("Alpha")}<a class="next" href="/annuaire/?p=2">Suivant</a>`,
      "https://directory.test/annuaire/?p=2": card("Beta")
    });

    const result = await createOrchestrator(site).crawl();

    expect(result.records.map((record) => record.name)).toEqual(["Alpha", "Beta"]);
    expect(site.requested).toEqual([
      root,
      "https://directory.test/annuaire/?p=2",
      "https://directory.test/annuaire/page/3/"
    ]);
  });

  it("never fetches beyond the page cap", async () => {
    const site = fakeSite({ [root]: `${card("Alpha")}<a class="next" href="/annuaire/page/2/">Suivant</a>` });

    await createOrchestrator(site, 1).crawl();

    expect(site.requested).toEqual([root]);
  });

  it("harvests startup links when listing pages are empty", async () => {
    const site = fakeSite({
      [root]: `<div><a href="/entreprise/delta/">Delta</a><a href="/contact/">Contact</a></div>`,
      "https://directory.test/entreprise/delta/": `<h1>Delta Océan</h1>`
    });

    const result = await createOrchestrator(site).crawl();

    expect(result.status).toBe("success");
    expect(result.records.map((record) => record.name)).toEqual(["Delta Océan"]);
  });

  it("serves the sample dataset when nothing can be extracted", async () => {
    const site = fakeSite({ [root]: `<div><p>Rien ici</p></div>` });

    const result = await createOrchestrator(site).crawl();

    expect(result.status).toBe("fallback");
    expect(result.records).toHaveLength(10);
    expect(result.records[0]?.lastUpdated).toBe(stamp);
  });

  it("serves the sample dataset when the root page is unreachable", async () => {
    const result = await createOrchestrator(fakeSite({})).crawl();

    expect(result.status).toBe("fallback");
    expect(result.pagesFetched).toBe(0);
    expect(result.records.map((record) => record.id)).toContain("startup-89012");
  });
});
