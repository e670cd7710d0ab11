import type { NeedIntent, SearchFilters, StartupRecord } from "../domain/types.js";

const intentPatterns: Array<[NeedIntent, RegExp[]]> = [
  ["search", [/recherche/, /trouve/, /cherche/, /identifie/, /liste/, /quelles? startup/, /quelles? entreprises?/]],
  ["combine", [/combin/, /associe/, /synergie/, /ensembles?/, /plusieurs/, /paires?/, /groupes?/]],
  ["details", [/détails/, /plus d'info/, /en savoir plus/, /approfondi/, /contact/, /coordonnées/]],
  ["refine", [/affine/, /précise/, /filtre/, /spécifique/, /domaine/, /localisation/, /technologie/]]
];

const filterPatterns = {
  tags: /\btags?[:\s]+([^.]+)/i,
  domain: /\bdomaine[:\s]+([^.]+)/i,
  location: /\blocalisation[:\s]+([^.]+)/i
} as const;

export interface ParsedNeed {
  need: string;
  filters?: SearchFilters;
}

/** First intent whose pattern appears in the message; plain searches are the default. */
export function extractIntent(message: string): NeedIntent {
  const lower = message.toLowerCase();
  for (const [intent, patterns] of intentPatterns) {
    if (patterns.some((pattern) => pattern.test(lower))) return intent;
  }
  return "search";
}

/** Pulls inline `tags:` / `domaine:` / `localisation:` filters out of a need. */
export function parseNeedFilters(message: string): ParsedNeed {
  const filters: SearchFilters = {};

  const tags = filterPatterns.tags.exec(message)?.[1]?.trim();
  if (tags) {
    filters.tags = tags
      .split(",")
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }
  const domain = filterPatterns.domain.exec(message)?.[1]?.trim();
  if (domain) filters.domain = domain;
  const location = filterPatterns.location.exec(message)?.[1]?.trim();
  if (location) filters.location = location;

  if (!filters.tags && !filters.domain && !filters.location) return { need: message };

  let cleaned = message;
  for (const pattern of Object.values(filterPatterns)) {
    cleaned = cleaned.replace(new RegExp(pattern.source, "gi"), "");
  }
  cleaned = cleaned.replace(/\s+/g, " ").trim();
  cleaned = cleaned.replace(/\s*[.,]\s*/g, ". ").trim();

  return { need: cleaned, filters };
}

export function summarizeStartup(record: StartupRecord): string {
  const description =
    record.description.length > 100 ? `${record.description.slice(0, 97)}...` : record.description || "No description available.";
  let tags = record.tags.slice(0, 3).join(", ");
  if (record.tags.length > 3) tags += ", ...";

  return tags ? `${record.name}: ${description} [Tags: ${tags}]` : `${record.name}: ${description}`;
}
