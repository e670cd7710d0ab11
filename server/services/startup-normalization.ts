import { createHash } from "node:crypto";
import type { RawStartupRecord, StartupRecord } from "../domain/types.js";

const EMAIL_PATTERN = /[\w.+-]+@[\w-]+\.[\w.-]+/;

export interface NormalizeOptions {
  now?: () => string;
}

function clean(value?: string | null): string {
  return typeof value === "string" ? value.trim() : "";
}

function cleanOptional(value?: string | null): string | undefined {
  if (value === undefined || value === null) return undefined;
  return clean(value);
}

export function startupIdFromName(name: string): string {
  const hash = createHash("md5").update(name.trim(), "utf8").digest("hex");
  return `startup-${hash.slice(0, 8)}`;
}

export function normalizeTags(value?: string[] | string | null): string[] {
  if (value === undefined || value === null) return [];
  const items = typeof value === "string" ? value.split(",") : value;
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const item of items) {
    const tag = clean(item);
    if (!tag) continue;
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    tags.push(tag);
  }
  return tags;
}

export function normalizeWebsiteUrl(value: string): string {
  const raw = value.trim();
  if (!raw) return "";
  if (/^[a-z][a-z0-9+.-]*:/i.test(raw)) return raw;
  if (raw.startsWith("//")) return `https:${raw}`;
  return `https://${raw}`;
}

export function extractEmail(text: string): string {
  const match = text.match(EMAIL_PATTERN);
  return match?.[0] ?? "";
}

export function normalizeStartup(raw: RawStartupRecord, options: NormalizeOptions = {}): StartupRecord {
  const name = clean(raw.name);
  const tags = normalizeTags(raw.tags);
  const contact = clean(raw.contact);
  const email = clean(raw.email) || extractEmail(contact);
  const domain = clean(raw.domain) || tags[0] || "";

  const record: StartupRecord = {
    id: clean(raw.id) || (name ? startupIdFromName(name) : ""),
    name,
    description: clean(raw.description),
    tags,
    domain,
    location: clean(raw.location),
    url: normalizeWebsiteUrl(clean(raw.url)),
    contact,
    email,
    phone: clean(raw.phone),
    lastUpdated: clean(raw.lastUpdated) || (options.now ?? (() => new Date().toISOString()))()
  };

  const ceo = cleanOptional(raw.ceo);
  const yearFounded = cleanOptional(raw.yearFounded);
  const employeeCount = cleanOptional(raw.employeeCount);
  const logoUrl = cleanOptional(raw.logoUrl);
  if (ceo !== undefined) record.ceo = ceo;
  if (yearFounded !== undefined) record.yearFounded = yearFounded;
  if (employeeCount !== undefined) record.employeeCount = employeeCount;
  if (logoUrl !== undefined) record.logoUrl = logoUrl;

  return record;
}

function pick(incoming: string | undefined, existing: string | undefined): string | undefined {
  if (incoming !== undefined && incoming.trim().length > 0) return incoming;
  return existing ?? incoming;
}

/** Field-level merge: non-empty incoming values win, tags are unioned. */
export function mergeStartupRecords(existing: StartupRecord, incoming: StartupRecord): StartupRecord {
  const merged: StartupRecord = {
    id: existing.id,
    name: pick(incoming.name, existing.name) ?? "",
    description: pick(incoming.description, existing.description) ?? "",
    tags: normalizeTags([...existing.tags, ...incoming.tags]),
    domain: pick(incoming.domain, existing.domain) ?? "",
    location: pick(incoming.location, existing.location) ?? "",
    url: pick(incoming.url, existing.url) ?? "",
    contact: pick(incoming.contact, existing.contact) ?? "",
    email: pick(incoming.email, existing.email) ?? "",
    phone: pick(incoming.phone, existing.phone) ?? "",
    lastUpdated: pick(incoming.lastUpdated, existing.lastUpdated) ?? ""
  };

  const ceo = pick(incoming.ceo, existing.ceo);
  const yearFounded = pick(incoming.yearFounded, existing.yearFounded);
  const employeeCount = pick(incoming.employeeCount, existing.employeeCount);
  const logoUrl = pick(incoming.logoUrl, existing.logoUrl);
  if (ceo !== undefined) merged.ceo = ceo;
  if (yearFounded !== undefined) merged.yearFounded = yearFounded;
  if (employeeCount !== undefined) merged.employeeCount = employeeCount;
  if (logoUrl !== undefined) merged.logoUrl = logoUrl;

  return merged;
}

/** Keeps the first occurrence of every id; later duplicates are merged into it. */
export function dedupeById(records: StartupRecord[]): StartupRecord[] {
  const byId = new Map<string, StartupRecord>();
  for (const record of records) {
    const current = byId.get(record.id);
    byId.set(record.id, current ? mergeStartupRecords(current, record) : record);
  }
  return [...byId.values()];
}
