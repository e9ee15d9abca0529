/**
 * Dataset glossary used to ground the paraphrase prompt
 */

import { TermMatcher, plainText } from "./text.js";

interface KnowledgeChunk {
  id: string;
  keywords: TermMatcher;
  text: string;
}

const chunk = (id: string, keywords: string[], text: string): KnowledgeChunk => ({
  id,
  keywords: new TermMatcher(keywords),
  text,
});

export const KNOWLEDGE: readonly KnowledgeChunk[] = [
  chunk(
    "collisions",
    ["collision", "accident", "incident", "hotspot", "intersection", "rue", "grave"],
    "Collisions routières: une ligne par collision avec date, heure, localisation (intersection), " +
      "quartier, nombre de morts, blessés graves et légers, et condition de surface au constat."
  ),
  chunk(
    "requests",
    ["311", "requete", "signalement", "nid", "deneig", "eclair"],
    "Requêtes 311: signalements citoyens (nids-de-poule, déneigement, éclairage...) avec date, " +
      "catégorie, quartier, statut et température du jour comme approximation météo."
  ),
  chunk(
    "transit",
    ["stm", "bus", "metro", "arret", "ligne", "station"],
    "Arrêts STM: identifiant, nom, coordonnées et ligne. Le rapprochement avec les collisions se " +
      "fait par cellules de grille d'environ 500-700 m."
  ),
  chunk(
    "weather",
    ["meteo", "neige", "pluie", "verglas", "temperature", "froid", "gel"],
    "Météo quotidienne: températures minimale et maximale, précipitations (mm) et neige (cm). " +
      "Les collisions portent leur propre condition de surface (sèche, mouillée, enneigée, glacée)."
  ),
  chunk(
    "severity",
    ["grave", "gravite", "dangereu", "danger", "risque"],
    "Gravité: score = 4 × morts + 3 × blessés graves + 2 × blessés légers (minimum 1). " +
      "Une collision est dite grave à partir d'un score de 3."
  ),
  chunk(
    "hotspot",
    ["hotspot", "top", "plus", "coince", "bloque"],
    "Hotspot: lieu qui concentre un nombre de collisions disproportionné sur la fenêtre analysée."
  ),
  chunk(
    "trend",
    ["hausse", "baisse", "augment", "tendance", "evolution", "variation"],
    "Tendance: comparaison de deux fenêtres consécutives de même durée, ancrées sur la date la " +
      "plus récente des données."
  ),
  chunk(
    "lift",
    ["type", "categorie", "lift", "explos"],
    "Lift: part d'une catégorie les jours de la condition météo divisée par sa part les autres " +
      "jours; au-dessus de 1, la catégorie est sur-représentée."
  ),
];

const DEFAULT_CHUNKS = ["collisions", "requests"];
const MAX_CHUNKS = 3;

/**
 * Up to three glossary entries matching the question, trimmed to `maxChars`
 */
export function glossaryContext(question: string, maxChars = 1200): string {
  const plain = plainText(question);
  let selected = KNOWLEDGE.filter((c) => c.keywords.matches(plain)).slice(0, MAX_CHUNKS);
  if (selected.length === 0) {
    selected = KNOWLEDGE.filter((c) => DEFAULT_CHUNKS.includes(c.id));
  }
  return selected
    .map((c) => `- ${c.text}`)
    .join("\n")
    .slice(0, maxChars);
}
