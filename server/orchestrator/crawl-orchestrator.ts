import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { v4 as uuid } from "uuid";
import { errorMessage } from "../domain/errors.js";
import { createSampleStartups } from "../domain/seed.js";
import type { CrawlResult, StartupRecord } from "../domain/types.js";
import type { FetchOutcome, Sleep } from "../services/page-fetcher.js";
import { sleep as defaultSleep } from "../services/page-fetcher.js";
import { StartupExtractor, toAbsoluteUrl } from "../services/startup-extractor.js";
import { dedupeById } from "../services/startup-normalization.js";

export const CARD_SELECTORS = [
  "article",
  "div.startup",
  "div.directory-item",
  "div.annuaire-item",
  ".elementor-post",
  ".elementor-grid-item",
  ".startup-item",
  ".company-item",
  ".directory-listing .item",
  ".elementor-posts-container article"
] as const;

const NEXT_PAGE_SELECTORS = [
  "a.next",
  "a.next-page",
  "a.pagination-next",
  ".nav-links a.next",
  "a[rel='next']",
  ".pagination a[aria-label='Next']"
] as const;

const PAGE_NUMBER_SELECTOR = "a.page-numbers, .pagination a, .nav-links a";
const SOCIAL_HOSTS = ["facebook.com", "twitter.com", "x.com", "linkedin.com", "instagram.com", "youtube.com"];
const EXCLUDED_PATH_PARTS = ["wp-admin", "wp-login", "login", "admin", "/feed", "wp-json"];
const STARTUP_LINK_KEYWORDS = ["startup", "entreprise", "societe", "company", "innovation", "annuaire"];

export interface PageSource {
  fetch(url: string): Promise<FetchOutcome>;
}

export interface CrawlOrchestratorOptions {
  fetcher: PageSource;
  extractor: StartupExtractor;
  rootUrl: string;
  maxPages?: number;
  maxLinksPerPage?: number;
  maxFallbackLinks?: number;
  /** Delay between listing pages, in milliseconds. */
  pageDelayMs?: [number, number];
  sleep?: Sleep;
  random?: () => number;
  now?: () => string;
}

type LoadedPage = { pageNumber: number; url: string; $: CheerioAPI; speculative: boolean };

type CrawlPhase =
  | { kind: "fetch_page"; pageNumber: number; url: string; speculative: boolean }
  | { kind: "extract_items"; page: LoadedPage }
  | { kind: "detect_next"; page: LoadedPage; itemCount: number; newIds: number }
  | { kind: "stop"; reason: string };

export function listingPageUrl(rootUrl: string, pageNumber: number): string {
  if (pageNumber <= 1) return rootUrl;
  const base = rootUrl.endsWith("/") ? rootUrl : `${rootUrl}/`;
  return `${base}page/${pageNumber}/`;
}

function isExcludedLink(url: URL): boolean {
  const host = url.hostname.toLowerCase();
  if (SOCIAL_HOSTS.some((social) => host === social || host.endsWith(`.${social}`))) return true;
  const path = url.pathname.toLowerCase();
  return EXCLUDED_PATH_PARTS.some((part) => path.includes(part));
}

export class CrawlOrchestrator {
  private readonly fetcher: PageSource;
  private readonly extractor: StartupExtractor;
  private readonly rootUrl: string;
  private readonly maxPages: number;
  private readonly maxLinksPerPage: number;
  private readonly maxFallbackLinks: number;
  private readonly pageDelayMs: [number, number];
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => string;

  constructor(options: CrawlOrchestratorOptions) {
    this.fetcher = options.fetcher;
    this.extractor = options.extractor;
    this.rootUrl = options.rootUrl;
    this.maxPages = Math.max(1, options.maxPages ?? 10);
    this.maxLinksPerPage = Math.max(1, options.maxLinksPerPage ?? 10);
    this.maxFallbackLinks = Math.max(1, options.maxFallbackLinks ?? 30);
    this.pageDelayMs = options.pageDelayMs ?? [1500, 3000];
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  async crawl(): Promise<CrawlResult> {
    const runId = uuid();
    const seenIds = new Set<string>();
    const collected: StartupRecord[] = [];
    let rootPage: LoadedPage | undefined;
    let pagesFetched = 0;

    console.info(`[crawler] Run ${runId} starting at ${this.rootUrl}`);
    let phase: CrawlPhase = { kind: "fetch_page", pageNumber: 1, url: this.rootUrl, speculative: false };

    while (phase.kind !== "stop") {
      switch (phase.kind) {
        case "fetch_page": {
          if (phase.pageNumber > 1) await this.politenessDelay();
          const outcome = await this.fetcher.fetch(phase.url);
          if (!outcome.ok) {
            phase = {
              kind: "stop",
              reason: phase.speculative
                ? `page ${phase.pageNumber} does not exist`
                : `page ${phase.pageNumber} failed: ${outcome.reason}`
            };
            break;
          }
          pagesFetched += 1;
          const page: LoadedPage = {
            pageNumber: phase.pageNumber,
            url: outcome.url,
            $: outcome.$,
            speculative: phase.speculative
          };
          if (page.pageNumber === 1) rootPage = page;
          phase = { kind: "extract_items", page };
          break;
        }

        case "extract_items": {
          const found = await this.extractItems(phase.page);
          let newIds = 0;
          for (const record of found) {
            collected.push(record);
            if (!seenIds.has(record.id)) {
              seenIds.add(record.id);
              newIds += 1;
            }
          }
          console.info(
            `[crawler] Page ${phase.page.pageNumber}: ${found.length} startups extracted, ${newIds} new`
          );
          phase = { kind: "detect_next", page: phase.page, itemCount: found.length, newIds };
          break;
        }

        case "detect_next":
          phase = this.detectNext(phase.page, phase.itemCount, phase.newIds);
          break;
      }
    }

    console.info(`[crawler] Run ${runId} stopped: ${phase.reason}`);

    if (collected.length === 0 && rootPage) {
      collected.push(...(await this.harvestStartupLinks(rootPage)));
    }

    const stamp = this.now();
    if (collected.length === 0) {
      console.warn(`[crawler] Run ${runId} found no startups, serving sample data`);
      return {
        runId,
        records: createSampleStartups(stamp),
        status: "fallback",
        message: "No startups could be extracted from the directory; sample data is served instead",
        pagesFetched
      };
    }

    const records = dedupeById(collected).map((record) => ({ ...record, lastUpdated: stamp }));
    console.info(`[crawler] Run ${runId} collected ${records.length} startups from ${pagesFetched} pages`);
    return {
      runId,
      records,
      status: "success",
      message: `Crawled ${records.length} startups from ${pagesFetched} pages`,
      pagesFetched
    };
  }

  private detectNext(page: LoadedPage, itemCount: number, newIds: number): CrawlPhase {
    if (page.speculative && newIds === 0) {
      return { kind: "stop", reason: `speculative page ${page.pageNumber} added no new startups` };
    }
    if (page.pageNumber >= this.maxPages) {
      return { kind: "stop", reason: `page limit of ${this.maxPages} reached` };
    }

    const nextPageNumber = page.pageNumber + 1;
    const linked = this.findNextPageLink(page);
    if (linked) {
      return { kind: "fetch_page", pageNumber: nextPageNumber, url: linked, speculative: false };
    }
    if (itemCount > 0) {
      return {
        kind: "fetch_page",
        pageNumber: nextPageNumber,
        url: listingPageUrl(this.rootUrl, nextPageNumber),
        speculative: true
      };
    }
    return { kind: "stop", reason: `no next page after page ${page.pageNumber}` };
  }

  private findNextPageLink({ $, url, pageNumber }: LoadedPage): string | undefined {
    const candidates: string[] = [];
    for (const selector of NEXT_PAGE_SELECTORS) {
      const href = $(selector).first().attr("href");
      if (href) candidates.push(href);
    }

    const expected = String(pageNumber + 1);
    for (const element of $(PAGE_NUMBER_SELECTOR).toArray()) {
      if ($(element).text().trim() === expected && element.attribs.href) {
        candidates.push(element.attribs.href);
      }
    }

    for (const href of candidates) {
      const absolute = toAbsoluteUrl(url, href);
      if (absolute && absolute !== url) return absolute;
    }
    return undefined;
  }

  private findCards($: CheerioAPI): Element[] {
    for (const selector of CARD_SELECTORS) {
      const cards = $(selector).toArray();
      if (cards.length > 0) return cards;
    }
    return [];
  }

  private async extractItems(page: LoadedPage): Promise<StartupRecord[]> {
    const { $, url } = page;
    const cards = this.findCards($);

    if (cards.length === 0) {
      const links = this.outboundLinks($, url).slice(0, this.maxLinksPerPage);
      console.info(`[crawler] No cards on ${url}, visiting ${links.length} outbound links`);
      return this.visitDetailPages(links);
    }

    const records: StartupRecord[] = [];
    for (const card of cards) {
      const href = $(card).find("a[href]").first().attr("href");
      const detailUrl = href ? toAbsoluteUrl(url, href) : undefined;

      const fromDetail = detailUrl ? (await this.visitDetailPages([detailUrl])).at(0) : undefined;
      const record = fromDetail ?? this.tryExtract(url, () => this.extractor.extractFromCard($, card, url));
      if (record) records.push(record);
    }
    return records;
  }

  private async visitDetailPages(urls: string[]): Promise<StartupRecord[]> {
    const records: StartupRecord[] = [];
    for (const url of urls) {
      const outcome = await this.fetcher.fetch(url);
      if (!outcome.ok) continue;
      const record = this.tryExtract(outcome.url, () => this.extractor.extractFromPage(outcome.$, outcome.url));
      if (record) records.push(record);
    }
    return records;
  }

  /** A failing item is skipped; the rest of the page still counts. */
  private tryExtract(url: string, extract: () => StartupRecord | null): StartupRecord | null {
    try {
      return extract();
    } catch (error) {
      console.warn(`[crawler] Skipping an item on ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private outboundLinks($: CheerioAPI, pageUrl: string): string[] {
    const links = new Set<string>();
    for (const element of $("a[href]").toArray()) {
      const href = element.attribs.href?.trim() ?? "";
      if (!href.startsWith("http")) continue;
      if ($(element).text().trim().length <= 3) continue;
      const absolute = toAbsoluteUrl(pageUrl, href);
      if (!absolute || isExcludedLink(new URL(absolute))) continue;
      links.add(absolute);
    }
    return [...links];
  }

  private async harvestStartupLinks(rootPage: LoadedPage): Promise<StartupRecord[]> {
    const { $, url } = rootPage;
    const siteHost = new URL(url).hostname;
    const links = new Set<string>();

    for (const element of $("a[href]").toArray()) {
      const absolute = toAbsoluteUrl(url, element.attribs.href ?? "");
      if (!absolute || absolute === url) continue;
      const target = new URL(absolute);
      if (target.hostname !== siteHost || isExcludedLink(target)) continue;
      const lower = absolute.toLowerCase();
      if (STARTUP_LINK_KEYWORDS.some((keyword) => lower.includes(keyword))) links.add(absolute);
      if (links.size >= this.maxFallbackLinks) break;
    }

    if (links.size === 0) return [];
    console.info(`[crawler] Listing pages were empty, visiting ${links.size} startup links from ${url}`);
    return this.visitDetailPages([...links]);
  }

  private async politenessDelay(): Promise<void> {
    const [min, max] = this.pageDelayMs;
    await this.sleep(min + this.random() * (max - min));
  }
}
