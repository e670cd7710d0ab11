import { normalizeStartup } from "../services/startup-normalization.js";
import type { RawStartupRecord, StartupRecord } from "./types.js";

// Served when a crawl finds nothing, so the index is never empty.
const sampleSeed = [
  ["startup-12345", "EcoTech Réunion", "Startup spécialisée dans les solutions écologiques et le développement durable à La Réunion.", ["Écologie", "Développement durable", "Énergie renouvelable"], "https://ecotechreunion.com", "contact@ecotechreunion.com", "Saint-Denis, La Réunion"],
  ["startup-23456", "DigitalOcean974", "Accompagnement à la transformation numérique des entreprises réunionnaises.", ["Numérique", "Transformation digitale", "Conseil"], "https://digitalocean974.re", "info@digitalocean974.re", "Saint-Pierre, La Réunion"],
  ["startup-34567", "AgriTech Réunion", "Solutions technologiques innovantes pour l'agriculture tropicale.", ["Agriculture", "IoT", "Data Science"], "https://agritech-reunion.com", "contact@agritech-reunion.com", "Saint-Paul, La Réunion"],
  ["startup-45678", "MediSanté 974", "Plateforme de télémédecine adaptée aux spécificités de La Réunion.", ["Santé", "E-santé", "Télémédecine"], "https://medisante974.re", "contact@medisante974.re", "Saint-Denis, La Réunion"],
  ["startup-56789", "TourismTech Réunion", "Développement d'applications et services numériques pour le tourisme local.", ["Tourisme", "Application mobile", "Expérience utilisateur"], "https://tourismtech.re", "info@tourismtech.re", "Saint-Gilles, La Réunion"],
  ["startup-67890", "CyberSécurité Océan Indien", "Services de cybersécurité pour les entreprises de la zone Océan Indien.", ["Cybersécurité", "Protection des données", "Audit"], "https://cybersecurite-oi.com", "security@cybersecurite-oi.com", "Le Port, La Réunion"],
  ["startup-78901", "FinTech 974", "Solutions financières innovantes adaptées au contexte insulaire.", ["Finance", "Blockchain", "Paiement mobile"], "https://fintech974.com", "contact@fintech974.com", "Saint-Denis, La Réunion"],
  ["startup-89012", "LogisticPlus Réunion", "Optimisation de la chaîne logistique pour les territoires insulaires.", ["Logistique", "Supply Chain", "Optimisation"], "https://logisticplus.re", "info@logisticplus.re", "Le Port, La Réunion"],
  ["startup-90123", "EduTech Océan Indien", "Plateformes éducatives adaptées aux spécificités culturelles de l'Océan Indien.", ["Éducation", "E-learning", "Contenu local"], "https://edutech-oi.com", "contact@edutech-oi.com", "Saint-André, La Réunion"],
  ["startup-01234", "RenewEnergy Réunion", "Développement de solutions énergétiques renouvelables adaptées au climat tropical.", ["Énergie", "Solaire", "Transition énergétique"], "https://renewenergy-reunion.com", "info@renewenergy-reunion.com", "Saint-Pierre, La Réunion"]
] as const;

export function createSampleStartups(now: string = new Date().toISOString()): StartupRecord[] {
  return sampleSeed.map((entry) => {
    const [id, name, description, tags, url, contact, location] = entry;
    const raw: RawStartupRecord = {
      id,
      name,
      description,
      tags: [...tags],
      domain: tags[0],
      url,
      contact,
      location,
      phone: "",
      lastUpdated: now
    };
    return normalizeStartup(raw);
  });
}
