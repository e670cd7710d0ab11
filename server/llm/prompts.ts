import type { ChatMessage, RankedStartup, StartupCombination } from "../domain/types.js";
import { summarizeStartup } from "../services/need-analysis.js";

export const SYSTEM_PROMPT =
  "Vous êtes un agent spécialisé dans la mise en relation entre des acheteurs de grands groupes ou de " +
  "collectivités et des startups innovantes. Votre mission est d'analyser les besoins exprimés et de " +
  "recommander les startups les plus pertinentes.";

const INSTRUCTIONS = [
  "Présentez les startups ci-dessous par ordre de pertinence décroissante.",
  "Pour chacune, expliquez en deux phrases pourquoi elle répond au besoin et comment la contacter.",
  "N'inventez aucune startup absente de la liste."
].join("\n");

export function buildRecommendationMessages(
  need: string,
  matches: RankedStartup[],
  combinations: StartupCombination[] = []
): ChatMessage[] {
  const lines = [`Besoin exprimé: ${need}`, "", "Startups candidates:"];
  matches.forEach(({ startup }, index) => {
    const contact = [startup.url, startup.email].filter(Boolean).join(" | ");
    lines.push(`${index + 1}. ${summarizeStartup(startup)}${contact ? ` (${contact})` : ""}`);
  });

  if (combinations.length > 0) {
    lines.push("", "Combinaisons possibles:");
    for (const combination of combinations) lines.push(`- ${combination.reason}`);
  }

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: `${INSTRUCTIONS}\n\n${lines.join("\n")}` }
  ];
}
