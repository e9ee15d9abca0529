/**
 * Intent Router
 *
 * ROUTING ORDER:
 * ==============
 *   smalltalk → off_topic → needs_clarification → analysis kind
 *
 * The analysis kind comes from KIND_RULES, an ordered table of
 * (predicate, kind) pairs: the first predicate that holds wins, and the last
 * rule always holds, so every question gets a route.
 */

import type { AnalysisKind, RefinementOption, Route } from "../schemas/index.js";
import { LEXICON, MATCHERS } from "./lexicon.js";
import { plainText } from "./text.js";

/**
 * Topic flags read from a question
 */
export interface RouteSignals {
  requests311: boolean;
  weather: boolean;
  collision: boolean;
  typology: boolean;
  trend: boolean;
  street: boolean;
  area: boolean;
  transit: boolean;
  risk: boolean;
  now: boolean;
}

export interface KindRule {
  kind: AnalysisKind;
  when: (s: RouteSignals) => boolean;
}

export const KIND_RULES: readonly KindRule[] = [
  { kind: "311_types_weather", when: (s) => s.requests311 && (s.weather || s.typology) },
  { kind: "trend_incidents", when: (s) => s.now && (s.collision || s.requests311) },
  { kind: "trend_incidents", when: (s) => s.trend && (s.collision || s.requests311) },
  { kind: "hotspots_meteo", when: (s) => s.weather && s.street && (s.collision || s.risk) },
  { kind: "311_temperature", when: (s) => s.requests311 },
  { kind: "stm", when: (s) => s.transit },
  { kind: "quartiers_meteo", when: (s) => s.area && s.weather },
  { kind: "quartiers", when: (s) => s.area },
  { kind: "meteo_collision", when: (s) => s.weather },
  { kind: "hotspots", when: () => true },
];

export function readSignals(question: string): RouteSignals {
  const plain = plainText(question);
  const m = MATCHERS.router;
  return {
    requests311: m.requests311.matches(plain),
    weather: m.weather.matches(plain),
    collision: m.collision.matches(plain),
    typology: m.typology.matches(plain),
    trend: m.trend.matches(plain),
    street: m.street.matches(plain),
    area: m.area.matches(plain),
    transit: m.transit.matches(plain),
    risk: m.risk.matches(plain),
    now: m.now.matches(plain),
  };
}

/**
 * Analysis kind for a question that already passed the control checks
 */
export function classifyKind(question: string): AnalysisKind {
  const signals = readSignals(question);
  const rule = KIND_RULES.find((r) => r.when(signals));
  return rule ? rule.kind : "hotspots";
}

// ============================================================
// CONTROL STATES
// ============================================================

export function hasDomainContext(question: string): boolean {
  return MATCHERS.domainContext.matches(plainText(question));
}

export function hasAnalyticIntent(question: string): boolean {
  return MATCHERS.analyticIntent.matches(plainText(question));
}

/**
 * Greeting or acknowledgement with no mobility vocabulary
 */
export function isSmalltalk(question: string): boolean {
  const plain = plainText(question).replace(/[\s!?.,;:]+$/, "");
  if (!plain) return true;
  if (hasDomainContext(plain)) return false;
  return LEXICON.smalltalk.some((token) => {
    const tok = plainText(token);
    return plain === tok || plain.startsWith(`${tok} `);
  });
}

export function routeQuestion(question: string): Route {
  if (isSmalltalk(question)) return "smalltalk";
  if (!hasDomainContext(question)) return "off_topic";
  if (!hasAnalyticIntent(question)) return "needs_clarification";
  return classifyKind(question);
}

// ============================================================
// CLARIFICATION
// ============================================================

export const CLARIFICATION_REASON =
  "La question est comprise, mais l'angle d'analyse n'est pas assez précis " +
  "(tendance, top zones, météo, STM, 311). Choisissez une option pour lancer " +
  "une requête validée sur les données.";

const WEATHER_CLAUSES: Record<string, string> = {
  neige: "quand il neige",
  pluie: "quand il pleut",
  verglas: "en cas de verglas",
};

const DEGRADED_WEATHER = "météo dégradée";
const DEGRADED_CLAUSE = "en météo dégradée";

const MAX_CLARIFICATION_OPTIONS = 4;

function weatherWording(plain: string): { desc: string; clause: string } | null {
  if (!MATCHERS.router.weather.matches(plain)) return null;
  const entry = MATCHERS.weatherFilters.find(
    (e) => e.label in WEATHER_CLAUSES && e.triggers.matches(plain)
  );
  if (entry) {
    return { desc: entry.label, clause: WEATHER_CLAUSES[entry.label] ?? DEGRADED_CLAUSE };
  }
  return { desc: DEGRADED_WEATHER, clause: DEGRADED_CLAUSE };
}

/**
 * Two to four ready-to-run reformulations of an under-specified question
 */
export function buildClarificationOptions(question: string, periodLabel: string): RefinementOption[] {
  const plain = plainText(question);
  const p = periodLabel;
  const has311 = MATCHERS.clarification.requests311.matches(plain);
  const hasCollision = MATCHERS.clarification.collision.matches(plain);
  const hasTransit = MATCHERS.clarification.transit.matches(plain);
  const weather = weatherWording(plain);

  const options: RefinementOption[] = [];

  if (hasCollision || (!has311 && !hasTransit)) {
    options.push(
      {
        label: "Comparer l'évolution récente des collisions",
        refinedQuestion: `Les collisions augmentent-elles sur ${p} ?`,
      },
      {
        label: "Voir les 5 intersections les plus touchées",
        refinedQuestion: `Top 5 intersections avec le plus de collisions sur ${p}`,
      },
      {
        label: "Voir les quartiers les plus touchés",
        refinedQuestion: `Quels quartiers ont le plus de collisions sur ${p} ?`,
      }
    );
    if (weather) {
      options.splice(1, 0, {
        label: `Voir les rues/intersections les plus exposées (${weather.desc})`,
        refinedQuestion: `Quelles rues/intersections ont le plus de collisions ${weather.clause} sur ${p} ?`,
      });
    }
  }

  if (has311) {
    options.push(
      {
        label: "Voir les types 311 dominants",
        refinedQuestion: `Quels types de requêtes 311 dominent sur ${p} ?`,
      },
      {
        label: "Comparer l'évolution des requêtes 311",
        refinedQuestion: `Les requêtes 311 augmentent-elles sur ${p} ?`,
      }
    );
    if (weather) {
      options.push({
        label: `Voir les types 311 sensibles (${weather.desc})`,
        refinedQuestion: `Quels types de requêtes 311 augmentent ${weather.clause} sur ${p} ?`,
      });
    }
  }

  if (hasTransit) {
    options.push(
      {
        label: "Voir les arrêts STM proches des zones de collisions",
        refinedQuestion: `Autour de quels arrêts STM observe-t-on le plus de collisions sur ${p} ?`,
      },
      {
        label: "Voir les hotspots collisions pour orienter STM",
        refinedQuestion: `Top 5 intersections avec le plus de collisions sur ${p}`,
      }
    );
  }

  const seen = new Set<string>();
  const unique = options.filter((option) => {
    const key = `${option.label.toLowerCase()}|${option.refinedQuestion.toLowerCase()}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return unique.slice(0, MAX_CLARIFICATION_OPTIONS);
}
