/**
 * Ambiguity Detector
 * Fixed catalogue of vague phrasings, each with its candidate readings.
 */

import type { AmbiguityReport, RefinementOption } from "../schemas/index.js";
import { plainText } from "./text.js";

interface AmbiguityEntry {
  /** Matched against plain text */
  pattern: RegExp;
  reason: string;
  choices: string[];
}

const COINCE_CHOICES = [
  "Embouteillages / ralentissements de trafic",
  "Zones à fort taux de collisions",
  "Secteurs avec beaucoup de requêtes 311 non résolues",
];

export const AMBIGUITY_CATALOGUE: readonly AmbiguityEntry[] = [
  {
    pattern: /(?<![a-z0-9])ca\s+coince(?![a-z0-9])/,
    reason: "L'expression 'ça coince' peut désigner plusieurs phénomènes.",
    choices: COINCE_CHOICES,
  },
  {
    pattern: /(?<![a-z0-9])ca\s+bloque(?![a-z0-9])/,
    reason: "L'expression 'ça bloque' peut désigner plusieurs phénomènes.",
    choices: COINCE_CHOICES,
  },
  {
    pattern: /(?<![a-z0-9])incidents(?![a-z0-9])/,
    reason: "Le terme 'incidents' peut couvrir différents types de données.",
    choices: [
      "Collisions routières (base de données accidents)",
      "Requêtes 311 (problèmes signalés par citoyens)",
      "Perturbations du réseau STM",
    ],
  },
  {
    pattern: /(?<![a-z0-9])problemes(?![a-z0-9])/,
    reason: "Plusieurs types de problèmes sont disponibles dans les données.",
    choices: [
      "Problèmes de voirie (nids-de-poule, trottoirs)",
      "Problèmes de sécurité (collisions, zones dangereuses)",
      "Problèmes d'infrastructure (éclairage, aqueduc)",
    ],
  },
];

const NOT_AMBIGUOUS: AmbiguityReport = { isAmbiguous: false, reason: "", options: [] };

/**
 * Rewrite the question with the domain reading the user picked
 */
export function refineQuestion(question: string, choice: string): string {
  const c = plainText(choice);
  const q = question.trim();
  if (c.includes("requete") || c.includes("311")) {
    return `Analyse orientée requêtes 311: ${q}`;
  }
  if (c.includes("stm") || c.includes("bus") || c.includes("metro")) {
    return `Analyse orientée STM: ${q}`;
  }
  if (c.includes("embouteill") || c.includes("trafic")) {
    return `Analyse orientée congestion routière (proxy collisions): ${q}`;
  }
  if (c.includes("collision") || c.includes("securite")) {
    return `Analyse orientée collisions routières: ${q}`;
  }
  return `Analyse orientée: ${choice}. Question: ${q}`;
}

export function detectAmbiguity(question: string): AmbiguityReport {
  const plain = plainText(question);
  const entry = AMBIGUITY_CATALOGUE.find((e) => e.pattern.test(plain));
  if (!entry) {
    return NOT_AMBIGUOUS;
  }

  const options: RefinementOption[] = entry.choices.map((label) => ({
    label,
    refinedQuestion: refineQuestion(question, label),
  }));

  return { isAmbiguous: true, reason: entry.reason, options };
}
