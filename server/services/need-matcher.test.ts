import { describe, expect, it } from "vitest";
import { createSampleStartups } from "../domain/seed.js";
import {
  applyFilters,
  combinationReason,
  combineForNeed,
  findStartupById,
  findStartupByName,
  matchNeed,
  sampleRecords,
  scoreStartup,
  searchDirectory,
  startupsByDomain,
  startupsByTag
} from "./need-matcher.js";
import { normalizeStartup } from "./startup-normalization.js";

const records = createSampleStartups("2026-01-01T00:00:00.000Z");

describe("scoreStartup", () => {
  it("adds the field weights for every keyword", () => {
    const logistics = findStartupById(records, "startup-89012");
    if (!logistics) throw new Error("missing sample startup");
    // description 2+2, tags Logistique 2 and Optimisation 2, domain 1
    expect(scoreStartup(logistics, ["logistique", "optimisation"])).toBe(9);
  });

  it("ignores location unless the caller weights it", () => {
    const record = normalizeStartup({ name: "Kaz", location: "Le Port, La Réunion" });
    expect(scoreStartup(record, ["port"])).toBe(0);
    expect(scoreStartup(record, ["port"], { name: 3, description: 2, tag: 2, domain: 1, location: 4 })).toBe(4);
  });
});

describe("matchNeed", () => {
  it("ranks the logistics startup first for a logistics need", () => {
    const ranked = matchNeed("logistique optimisation", records, 2);

    expect(ranked[0]?.startup.name).toBe("LogisticPlus Réunion");
    expect(ranked[0]?.score).toBeGreaterThanOrEqual(3);
    expect(ranked.length).toBeLessThanOrEqual(2);
  });

  it("returns scores in non-increasing order", () => {
    const ranked = matchNeed("réunion numérique santé", records, 10);
    const scores = ranked.map((item) => item.score);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });

  it("samples records when nothing matches", () => {
    const ranked = matchNeed("xylophone", records, 3, { random: () => 0 });

    expect(ranked.map((item) => item.startup.id)).toEqual(["startup-12345", "startup-23456", "startup-34567"]);
    expect(ranked.every((item) => item.score === 0)).toBe(true);
  });

  it("can return nothing when sampling is disabled", () => {
    expect(matchNeed("xylophone", records, 3, { zeroMatchPolicy: "empty" })).toEqual([]);
  });

  it("narrows candidates with filters before scoring", () => {
    const ranked = matchNeed("réunion", records, 5, { filters: { domain: "santé" } });
    expect(ranked.map((item) => item.startup.name)).toEqual(["MediSanté 974"]);
  });

  it("still answers when filters exclude every record", () => {
    const ranked = matchNeed("santé", records, 2, { filters: { location: "Paris" }, random: () => 0 });
    expect(ranked).toHaveLength(2);
  });

  it("samples all records when an empty need's filters exclude everything", () => {
    const ranked = matchNeed("", records, 2, { filters: { domain: "Aérospatial" }, random: () => 0 });

    expect(ranked.map((item) => item.startup.id)).toEqual(["startup-12345", "startup-23456"]);
    expect(matchNeed("", records, 2, { filters: { domain: "Aérospatial" }, zeroMatchPolicy: "empty" })).toEqual([]);
  });

  it("returns the first records for an empty need", () => {
    expect(matchNeed("   ", records, 2).map((item) => item.startup.id)).toEqual(["startup-12345", "startup-23456"]);
  });
});

describe("applyFilters", () => {
  it("matches tags case-insensitively and location by substring", () => {
    expect(applyFilters(records, { tags: ["iot"] }).map((record) => record.id)).toEqual(["startup-34567"]);
    expect(applyFilters(records, { location: "saint-pierre" }).map((record) => record.id)).toEqual([
      "startup-23456",
      "startup-01234"
    ]);
  });
});

describe("sampleRecords", () => {
  it("returns distinct items", () => {
    const picked = sampleRecords([1, 2, 3, 4], 3, () => 0.99);
    expect(new Set(picked).size).toBe(3);
    expect(picked).toEqual([4, 1, 2]);
  });
});

describe("combineForNeed", () => {
  it("pairs matches from different domains", () => {
    const combinations = combineForNeed("réunion", records, 3);

    expect(combinations).toHaveLength(3);
    for (const { startups } of combinations) {
      expect(startups[0].domain).not.toBe(startups[1].domain);
    }
    expect(combinations[0]?.startups.map((record) => record.name)).toEqual(["EcoTech Réunion", "AgriTech Réunion"]);
  });

  it("skips pairs sharing a domain", () => {
    const twins = [
      normalizeStartup({ name: "Solar One", domain: "Énergie" }),
      normalizeStartup({ name: "Solar Two", domain: "Énergie" })
    ];
    expect(combineForNeed("solar", twins, 3)).toEqual([]);
  });

  it("truncates long needs in the reason", () => {
    const [a, b] = records;
    if (!a || !b) throw new Error("missing sample startups");
    const need = "x".repeat(120);

    expect(combinationReason(a, b, "énergie")).toBe(
      "Combining 'EcoTech Réunion' (Écologie) with 'DigitalOcean974' (Numérique) to address: énergie"
    );
    expect(combinationReason(a, b, need).endsWith(`${"x".repeat(100)}...`)).toBe(true);
  });
});

describe("directory lookups", () => {
  it("ranks phrase matches by field weight", () => {
    expect(searchDirectory("santé", records).map((record) => record.id)).toEqual(["startup-45678"]);
    expect(searchDirectory("energie", records)).toEqual([]);
    expect(searchDirectory("", records)).toHaveLength(10);
  });

  it("finds records by name, domain and tag", () => {
    expect(findStartupByName(records, "fintech 974")?.id).toBe("startup-78901");
    expect(startupsByDomain(records, "tourisme").map((record) => record.id)).toEqual(["startup-56789"]);
    expect(startupsByTag(records, "blockchain").map((record) => record.id)).toEqual(["startup-78901"]);
  });
});
