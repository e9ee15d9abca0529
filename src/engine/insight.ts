/**
 * Plain-text readings of a result: lead insight, key points and caveats
 */

import type { AggregationResult, AnalysisKind, Caveats, TrendRow } from "../schemas/index.js";
import { sourceTotals } from "./aggregations/index.js";
import { REQUEST_WEATHER_LABELS } from "./filters.js";
import { formatWindow } from "./period.js";

const NO_RESULT = "Aucun résultat exploitable sur la fenêtre sélectionnée.";

export function signed(value: number): string {
  return `${value >= 0 ? "+" : ""}${value}`;
}

export function signedPct(value: number | null): string {
  return value === null ? "n/a" : `${value >= 0 ? "+" : ""}${value.toFixed(1)}%`;
}

const plural = (n: number, word: string) => `${n} ${word}${n > 1 ? "s" : ""}`;

function trendLead(row: TrendRow): string {
  const subject = row.source === "collisions" ? "collisions" : "requêtes 311";
  if (row.current === 0 && row.previous > 0) {
    const none = row.source === "collisions" ? "Aucune collision enregistrée" : "Aucune requête 311 enregistrée";
    return `${none} sur la période courante (contre ${row.previous} sur la période précédente).`;
  }
  return `Comparaison période courante vs précédente: ${subject} ${signed(row.delta)} (${signedPct(row.pct)}).`;
}

/**
 * One sentence carrying the headline number of the result
 */
export function leadInsight(result: AggregationResult): string {
  const p = result.attributes.periodApplied;
  const weather = result.attributes.weatherFilterApplied;
  const weatherClause = weather ? ` (condition ${weather.labels.join("/")})` : "";

  switch (result.kind) {
    case "hotspots":
    case "hotspots_meteo": {
      const top = result.rows[0];
      if (!top) return NO_RESULT;
      return (
        `Sur ${p}${weatherClause}, le hotspot principal est ${top.location} avec ` +
        `${plural(top.total, "collision")} dont ${plural(top.severe, "grave")}.`
      );
    }
    case "meteo_collision": {
      const top = result.rows[0];
      if (!top) return NO_RESULT;
      return (
        `Sur ${p}, la condition "${top.condition}" regroupe le plus de collisions ` +
        `(${top.total}, taux de graves ${top.severeRate.toFixed(1)}%).`
      );
    }
    case "quartiers_meteo": {
      const top = result.rows[0];
      if (!top) return NO_RESULT;
      return (
        `${top.neighborhood} est le quartier le plus touché sur ${p}${weatherClause} ` +
        `(${plural(top.incidents, "collision")}, ${plural(top.severe, "grave")}).`
      );
    }
    case "311_temperature": {
      if (result.rows.length === 0) return NO_RESULT;
      const total = result.rows.reduce((sum, r) => sum + r.count, 0);
      const top = result.rows.reduce((best, r) => (r.count > best.count ? r : best));
      return `Les requêtes 311 se concentrent surtout dans la tranche ${top.band} (${top.count} sur ${total}).`;
    }
    case "311_types_weather": {
      const top = result.rows[0];
      if (!top) return NO_RESULT;
      const tag = result.attributes.requestWeatherTag ?? "snow";
      return (
        `Le type "${top.category}" est le plus sur-représenté par temps de ${REQUEST_WEATHER_LABELS[tag]} ` +
        `(lift ${top.lift.toFixed(2)}, ${top.weatherCount} requêtes).`
      );
    }
    case "quartiers": {
      const top = result.rows[0];
      if (!top) return NO_RESULT;
      return (
        `${top.neighborhood} ressort en tête sur ${p} avec un score de ${top.score} ` +
        `(${plural(top.incidents, "collision")}, ${top.requests} requêtes 311).`
      );
    }
    case "stm": {
      const top = result.rows[0];
      if (!top) return NO_RESULT;
      return (
        `La zone autour de ${top.stops} compte ${plural(top.total, "collision")} sur ${p} ` +
        `(${plural(top.stopCount, "arrêt")} STM dans la cellule).`
      );
    }
    case "trend_incidents": {
      const leads = sourceTotals(result.rows)
        .filter((r) => r.current > 0 || r.previous > 0)
        .map(trendLead);
      return leads.length > 0 ? leads.join(" ") : NO_RESULT;
    }
  }
}

/**
 * Row summaries, top first
 */
export function describeRows(result: AggregationResult, limit = 3): string[] {
  switch (result.kind) {
    case "hotspots":
    case "hotspots_meteo":
      return result.rows
        .slice(0, limit)
        .map((r) => `${r.location}: ${r.total} collisions, ${r.severe} graves, heure moyenne ${r.meanHour}h`);
    case "meteo_collision":
      return result.rows
        .slice(0, limit)
        .map((r) => `${r.condition}: ${r.total} collisions, ${r.severeRate.toFixed(1)}% graves`);
    case "quartiers_meteo":
      return result.rows.slice(0, limit).map((r) => `${r.neighborhood}: ${r.incidents} collisions, ${r.severe} graves`);
    case "311_temperature":
      return result.rows.slice(0, limit).map((r) => `${r.band}: ${r.count} requêtes`);
    case "311_types_weather":
      return result.rows
        .slice(0, limit)
        .map((r) => `${r.category}: lift ${r.lift.toFixed(2)} (${r.weatherCount} vs ${r.otherCount})`);
    case "quartiers":
      return result.rows
        .slice(0, limit)
        .map((r) => `${r.neighborhood}: score ${r.score} (${r.incidents} collisions, ${r.requests} requêtes 311)`);
    case "stm":
      return result.rows.slice(0, limit).map((r) => `${r.stops}: ${r.total} collisions, ${r.stopCount} arrêts`);
    case "trend_incidents":
      return result.rows
        .slice(0, limit)
        .map((r) => `${r.segment}: ${r.current} vs ${r.previous} (${signed(r.delta)}, ${signedPct(r.pct)})`);
  }
}

export function keyPoints(result: AggregationResult): string[] {
  const { periodApplied, window } = result.attributes;
  const scope = window ? ` (${formatWindow(window)})` : "";
  return [`Période analysée: ${periodApplied}${scope}`, ...describeRows(result)];
}

// ============================================================
// CAVEATS PER KIND
// ============================================================

export const CAVEATS: Record<AnalysisKind, Caveats> = {
  hotspots: {
    limits: "Comptage brut, non normalisé par le débit de circulation ni par la longueur des axes.",
    nextCheck: "Vérifier la stabilité du classement sur une fenêtre plus longue.",
    decision: "Prioriser une inspection terrain des deux premières intersections.",
  },
  hotspots_meteo: {
    limits: "Condition de surface saisie au constat, pas la météo mesurée; échantillons réduits par condition.",
    nextCheck: "Comparer avec le même classement sans filtre météo.",
    decision: "Cibler l'entretien hivernal et le drainage sur les axes qui restent en tête.",
  },
  meteo_collision: {
    limits: "Exposition non mesurée: davantage de jours secs donne mécaniquement plus de collisions sur chaussée sèche.",
    nextCheck: "Rapporter les collisions au nombre de jours observés par condition.",
    decision: "Suivre le taux de graves plutôt que le volume brut.",
  },
  quartiers_meteo: {
    limits: "Volumes non rapportés à la population ni au trafic du quartier.",
    nextCheck: "Comparer au même classement toutes conditions confondues.",
    decision: "Orienter les opérations d'épandage vers les quartiers en tête.",
  },
  "311_temperature": {
    limits: "Température journalière utilisée comme approximation de la météo; aucun lien causal établi.",
    nextCheck: "Croiser avec les précipitations du même jour.",
    decision: "Anticiper les effectifs 311 sur les tranches les plus chargées.",
  },
  "311_types_weather": {
    limits: "Lift instable pour les faibles volumes; le masque météo repose sur la température.",
    nextCheck: "Confirmer le lift sur une seconde saison.",
    decision: "Préparer les équipes pour les types à lift élevé avant l'épisode météo.",
  },
  quartiers: {
    limits: "Score composite (2 × collisions + requêtes 311) à pondération arbitraire.",
    nextCheck: "Examiner séparément les deux composantes du score.",
    decision: "Planifier une revue croisée voirie/sécurité dans les quartiers en tête.",
  },
  stm: {
    limits: "Proximité approximée par une grille (~500-700 m), sans jointure géométrique.",
    nextCheck: "Valider sur carte les arrêts effectivement exposés.",
    decision: "Signaler les arrêts concernés à l'équipe sécurité du réseau.",
  },
  trend_incidents: {
    limits: "Deux fenêtres consécutives de même durée: sensible à la saisonnalité et aux délais de saisie.",
    nextCheck: "Comparer avec la même période l'an dernier.",
    decision: "Ne déclencher une action qu'après confirmation sur deux périodes.",
  },
};
