/**
 * Confidence status, derived from the aggregation result alone
 *
 * RULES (first match wins):
 * =========================
 *   empty result                          → insufficient
 *   weather filter asked but not applied  → partial
 *   any degradation note                  → partial
 *   trend: a source with nothing now,
 *          a source with no data at all,
 *          split anchors                  → partial
 *   descriptive (correlation) kind        → partial
 *   otherwise                             → verified
 */

import type { AggregationResult, AnalysisKind, ConfidenceStatus } from "../schemas/index.js";
import { isEmptyOutput, sourceTotals } from "./aggregations/index.js";

export const DESCRIPTIVE_KINDS: ReadonlySet<AnalysisKind> = new Set<AnalysisKind>([
  "hotspots_meteo",
  "meteo_collision",
  "311_temperature",
  "311_types_weather",
  "quartiers_meteo",
  "quartiers",
  "stm",
]);

const LABELS = {
  verified: "Vérifié",
  partial: "Partiel",
  insufficient: "Données insuffisantes",
} as const;

const partial = (detail: string): ConfidenceStatus => ({ level: "partial", label: LABELS.partial, detail });

export function assessConfidence(result: AggregationResult): ConfidenceStatus {
  const { attributes } = result;

  if (isEmptyOutput(result)) {
    return {
      level: "insufficient",
      label: LABELS.insufficient,
      detail:
        "Aucun résultat exploitable sur la fenêtre sélectionnée : élargir la période ou reformuler la question.",
    };
  }

  if (attributes.weatherFilterRequested && !attributes.weatherFilterApplied) {
    const relaxed = attributes.notes.some((n) => n.step === "weather_filter_relaxed");
    return partial(
      relaxed
        ? "Filtre météo demandé assoupli faute d'échantillon suffisant; lecture descriptive à confirmer."
        : "Filtre météo demandé non applicable à ce type d'analyse; lecture toutes conditions confondues."
    );
  }

  if (attributes.notes.length > 0) {
    return partial(
      "Analyse déclenchée avec hypothèse de routage ou élargissement de fenêtre; à valider avec une question plus précise."
    );
  }

  if (result.kind === "trend_incidents") {
    const totals = sourceTotals(result.rows);
    const dropped = totals.find((r) => r.current === 0 && r.previous > 0);
    if (dropped) {
      return partial(
        `Aucun enregistrement sur la fenêtre courante (contre ${dropped.previous} sur la précédente): ` +
          "baisse à confirmer, un retard de saisie reste possible."
      );
    }
    const silent = totals.find((r) => r.current === 0 && r.previous === 0);
    if (silent) {
      const name = silent.source === "collisions" ? "collision" : "requête 311";
      return partial(`Aucune ${name} sur les deux fenêtres: la comparaison ne porte que sur l'autre source.`);
    }
    if (attributes.alignmentCaveat) {
      return partial(attributes.alignmentCaveat);
    }
  }

  if (DESCRIPTIVE_KINDS.has(result.kind)) {
    return partial("Corrélation descriptive, données non normalisées (population, trafic, longueur de voirie).");
  }

  return {
    level: "verified",
    label: LABELS.verified,
    detail: "Calculs reproduits sur données filtrées avec trace d'exécution et preuves affichées.",
  };
}
