import * as cheerio from "cheerio";
import { TransientFetchError, errorMessage } from "../domain/errors.js";

export type FetchOutcome =
  | { ok: true; url: string; $: cheerio.CheerioAPI }
  | { ok: false; url: string; reason: string };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export interface PageFetcherOptions {
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  timeoutMs?: number;
  retries?: number;
  /** Politeness jitter applied before every attempt, in milliseconds. */
  jitterMs?: [number, number];
  maxHtmlChars?: number;
}

interface LoadedPage {
  url: string;
  contentType: string | null;
  html?: string;
}

const DEFAULT_HEADERS: Record<string, string> = {
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "accept-language": "fr,fr-FR;q=0.8,en-US;q=0.5,en;q=0.3",
  "cache-control": "max-age=0"
};

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function isHtmlContentType(contentType: string | null): boolean {
  const lower = contentType?.toLowerCase() ?? "";
  return lower.includes("text/html") || lower.includes("application/xhtml+xml");
}

export class PageFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly jitterMs: [number, number];
  private readonly maxHtmlChars: number;

  constructor(options: PageFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.timeoutMs = Math.max(1000, options.timeoutMs ?? 15_000);
    this.retries = Math.max(1, options.retries ?? 3);
    this.jitterMs = options.jitterMs ?? [1000, 3000];
    this.maxHtmlChars = Math.max(10_000, options.maxHtmlChars ?? 2_000_000);
  }

  async fetch(url: string, retries = this.retries): Promise<FetchOutcome> {
    const attempts = Math.max(1, retries);
    let lastError = "unknown error";

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      const [minJitter, maxJitter] = this.jitterMs;
      await this.sleep(minJitter + this.random() * (maxJitter - minJitter));

      try {
        console.info(`[crawler] Fetching ${url} (attempt ${attempt + 1}/${attempts})`);
        const page = await this.request(url);
        if (page.html === undefined) {
          console.warn(`[crawler] ${url} is not HTML (${page.contentType ?? "no content-type"})`);
          return { ok: false, url, reason: `Unexpected content type: ${page.contentType ?? "none"}` };
        }
        return { ok: true, url: page.url, $: cheerio.load(page.html) };
      } catch (error) {
        lastError = errorMessage(error);
        console.warn(`[crawler] Attempt ${attempt + 1} for ${url} failed: ${lastError}`);
        if (attempt < attempts - 1) {
          const waitSeconds = 2 ** attempt + this.random();
          await this.sleep(waitSeconds * 1000);
        }
      }
    }

    console.error(`[crawler] Giving up on ${url} after ${attempts} attempts: ${lastError}`);
    return { ok: false, url, reason: lastError };
  }

  /** The timeout covers the whole exchange, body included. */
  private async request(url: string): Promise<LoadedPage> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        redirect: "follow",
        headers: DEFAULT_HEADERS
      });
      if (!response.ok) {
        throw new TransientFetchError(url, `HTTP ${response.status}`, { status: response.status });
      }
      const contentType = response.headers.get("content-type");
      const finalUrl = response.url || url;
      if (!isHtmlContentType(contentType)) {
        return { url: finalUrl, contentType };
      }
      const html = (await response.text()).slice(0, this.maxHtmlChars);
      return { url: finalUrl, contentType, html };
    } catch (error) {
      if (error instanceof TransientFetchError) throw error;
      throw new TransientFetchError(url, errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
