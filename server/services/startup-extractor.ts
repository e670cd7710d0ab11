import { URL } from "node:url";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { RawStartupRecord, StartupRecord } from "../domain/types.js";
import { extractEmail, normalizeStartup } from "./startup-normalization.js";

export const NO_DESCRIPTION = "No description available";

const REUNION_PHONE_PATTERN = /(?:\+262|0262)\s?[0-9]{2}\s?[0-9]{2}\s?[0-9]{2}/;
const ADDRESS_TOWN_HINTS = ["saint-", "sainte-", "st-", "ste-"];
const MAX_ADDRESS_CHARS = 200;

export type ExtractionInput =
  | { mode: "card"; $: CheerioAPI; element: Element; pageUrl: string }
  | { mode: "page"; $: CheerioAPI; url: string };

interface ExtractionScope {
  $: CheerioAPI;
  baseUrl: string;
  select(selector: string): Cheerio<Element>;
}

type Strategy<T> = (scope: ExtractionScope) => T | undefined;

export interface StartupExtractorOptions {
  defaultLocation: string;
  defaultDomain: string;
  now?: () => string;
}

function textOf($: CheerioAPI, element: Element): string {
  return $(element).text().replace(/\s+/g, " ").trim();
}

export function toAbsoluteUrl(base: string, href: string): string | undefined {
  try {
    const url = new URL(href, base);
    if (url.protocol !== "http:" && url.protocol !== "https:") return undefined;
    return url.toString();
  } catch {
    return undefined;
  }
}

function firstOf<T>(strategies: Array<Strategy<T>>, scope: ExtractionScope): T | undefined {
  for (const strategy of strategies) {
    const value = strategy(scope);
    if (value !== undefined) return value;
  }
  return undefined;
}

// ── Strategy builders ───────────────────────────────────────────────

function firstText(selector: string, minLength = 1): Strategy<string> {
  return ({ $, select }) => {
    for (const element of select(selector).toArray()) {
      const text = textOf($, element);
      if (text.length >= minLength) return text;
    }
    return undefined;
  };
}

function firstHref(selector: string): Strategy<string> {
  return ({ select, baseUrl }) => {
    for (const element of select(selector).toArray()) {
      const href = element.attribs.href?.trim();
      if (!href) continue;
      const absolute = toAbsoluteUrl(baseUrl, href);
      if (absolute) return absolute;
    }
    return undefined;
  };
}

// A malformed percent sequence keeps the raw text.
function decodeLinkValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function linkTarget(scheme: "mailto:" | "tel:"): Strategy<string> {
  return ({ select }) => {
    const href = select(`a[href^='${scheme}']`).first().attr("href");
    if (!href) return undefined;
    const value = decodeLinkValue(href.slice(scheme.length).split("?")[0] ?? "").trim();
    return value || undefined;
  };
}

function patternInText(selector: string, pattern: RegExp): Strategy<string> {
  return ({ $, select }) => {
    for (const element of select(selector).toArray()) {
      const match = textOf($, element).match(pattern);
      if (match) return match[0];
    }
    return undefined;
  };
}

function commaSeparatedTags(selector: string): Strategy<string[]> {
  return (scope) => {
    const text = firstText(selector)(scope);
    if (!text) return undefined;
    const tags = text
      .split(",")
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
    return tags.length > 0 ? tags : undefined;
  };
}

function eachTextTags(selector: string): Strategy<string[]> {
  return ({ $, select }) => {
    const tags = select(selector)
      .toArray()
      .map((element) => textOf($, element))
      .filter((tag) => tag.length > 0);
    return tags.length > 0 ? tags : undefined;
  };
}

const addressLikeText: Strategy<string> = ({ $, select }) => {
  for (const element of select("p, div").toArray()) {
    const text = textOf($, element);
    if (!text || text.length > MAX_ADDRESS_CHARS) continue;
    const lower = text.toLowerCase();
    if (lower.includes("réunion") && ADDRESS_TOWN_HINTS.some((hint) => lower.includes(hint))) {
      return text;
    }
  }
  return undefined;
};

const pageLogo: Strategy<string> = ({ select, baseUrl }) => {
  const src = select(".logo img, .startup-logo img, .company-logo img").first().attr("src")?.trim();
  if (!src) return undefined;
  return toAbsoluteUrl(baseUrl, src);
};

// ── Strategy chains ─────────────────────────────────────────────────

const domainStrategies: Array<Strategy<string>> = [firstText(".startup-domain, .activity, .secteur")];

const cardStrategies = {
  name: [firstText("h2, h3, h4, .entry-title, .startup-name, .title")],
  description: [firstText("p, .description, .excerpt, .content, .summary")],
  url: [firstHref("a[href*='http'], .website, .url")],
  tags: [commaSeparatedTags(".tags, .categories, .domain, .sector")],
  location: [firstText(".location, .address")],
  email: [linkTarget("mailto:"), patternInText(".email, .contact", /[\w.+-]+@[\w-]+\.[\w.-]+/)],
  contact: [linkTarget("mailto:"), firstText(".email, .contact")],
  phone: [linkTarget("tel:"), firstText(".phone, .tel")]
} satisfies Record<string, Array<Strategy<string | string[]>>>;

const pageStrategies = {
  name: [firstText("h1, .entry-title, .page-title"), firstText("h2")],
  description: [firstText("p, .description, .content", 51)],
  tags: [eachTextTags(".tags a, .categories a, .domain a, .sector a, .tag, .category")],
  location: [firstText(".location, .address, .city"), addressLikeText],
  email: [linkTarget("mailto:"), patternInText("p, div, span", /[\w.+-]+@[\w-]+\.[\w.-]+/)],
  phone: [linkTarget("tel:"), firstText(".phone, .tel"), patternInText("p, div, span", REUNION_PHONE_PATTERN)],
  logoUrl: [pageLogo]
} satisfies Record<string, Array<Strategy<string | string[]>>>;

export class StartupExtractor {
  constructor(private readonly options: StartupExtractorOptions) {}

  extract(input: ExtractionInput): StartupRecord | null {
    return input.mode === "card"
      ? this.extractFromCard(input.$, input.element, input.pageUrl)
      : this.extractFromPage(input.$, input.url);
  }

  extractFromCard($: CheerioAPI, element: Element, pageUrl: string): StartupRecord | null {
    const node = $(element);
    const scope: ExtractionScope = { $, baseUrl: pageUrl, select: (selector) => node.find(selector) };

    const name = firstOf(cardStrategies.name, scope);
    if (!name) return null;

    const contact = firstOf(cardStrategies.contact, scope) ?? "";
    const tags = firstOf(cardStrategies.tags, scope) ?? [];

    return this.finish({
      name,
      description: firstOf(cardStrategies.description, scope),
      url: firstOf(cardStrategies.url, scope),
      tags,
      domain: firstOf(domainStrategies, scope),
      location: firstOf(cardStrategies.location, scope),
      contact,
      email: firstOf(cardStrategies.email, scope) ?? extractEmail(contact),
      phone: firstOf(cardStrategies.phone, scope)
    });
  }

  extractFromPage($: CheerioAPI, url: string): StartupRecord | null {
    const scope: ExtractionScope = { $, baseUrl: url, select: (selector) => $<Element, string>(selector) };

    const name = firstOf(pageStrategies.name, scope);
    if (!name) return null;

    const email = firstOf(pageStrategies.email, scope);
    const phone = firstOf(pageStrategies.phone, scope);
    const contactParts: string[] = [];
    if (email) contactParts.push(`Email: ${email}`);
    if (phone) contactParts.push(`Phone: ${phone}`);

    return this.finish({
      name,
      description: firstOf(pageStrategies.description, scope),
      url,
      tags: firstOf(pageStrategies.tags, scope) ?? [],
      domain: firstOf(domainStrategies, scope),
      location: firstOf(pageStrategies.location, scope),
      contact: contactParts.join(" | "),
      email,
      phone,
      logoUrl: firstOf(pageStrategies.logoUrl, scope) ?? "",
      ceo: "",
      yearFounded: "",
      employeeCount: ""
    });
  }

  private finish(draft: RawStartupRecord & { name: string; tags: string[] }): StartupRecord {
    const now = this.options.now ?? (() => new Date().toISOString());
    return normalizeStartup(
      {
        ...draft,
        description: draft.description || NO_DESCRIPTION,
        domain: draft.domain || draft.tags[0] || this.options.defaultDomain,
        location: draft.location || this.options.defaultLocation,
        url: draft.url ?? "",
        contact: draft.contact ?? "",
        email: draft.email ?? "",
        phone: draft.phone ?? "",
        lastUpdated: now()
      },
      { now }
    );
  }
}
