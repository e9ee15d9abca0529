/**
 * Fallback Cascade
 *
 * STEPS (only while the result is still empty):
 * ==============================================
 * 1. weather_filter_relaxed  drop the collision weather filter
 * 2. lift_to_bands           311 lift per type → 311 per temperature band
 * 3. period_widened          same kind on the widest period (relaxing the
 *                            weather filter there too if needed)
 * 4. default_diagnostic      unfiltered hotspots, current then widest period
 *
 * Every step recomputes from the store and leaves a note, so the result's
 * attributes alone say what was asked and what was actually shown.
 */

import { logger } from "../core/logger.js";
import type {
  AggregationOutput,
  AggregationResult,
  AnalysisKind,
  DegradationNote,
  RequestWeatherTag,
  TimeWindow,
  TrendScope,
  WeatherFilter,
} from "../schemas/index.js";
import type { RecordStore } from "../store/record-store.js";
import {
  WEATHER_FILTERED_KINDS,
  isEmptyOutput,
  runAggregation,
  trendContext,
  type AggregationInput,
} from "./aggregations/index.js";
import { WIDEST_PERIOD, bucket, filterByPeriod, isWidest, periodWindow, type Period } from "./period.js";

export interface CascadeRequest {
  kind: AnalysisKind;
  period: Period;
  weatherFilter: WeatherFilter | null;
  requestWeatherTag: RequestWeatherTag;
  trendScope: TrendScope;
}

export const CASCADE_MESSAGES = {
  weatherRelaxed:
    "Aucune ligne trouvée pour la condition météo demandée sur cette fenêtre: filtre météo assoupli, " +
    "résultats affichés sans filtre pour conserver une lecture utile.",
  liftToBands:
    "Pas assez de signalements météo ciblés pour calculer un lift par type: affichage de la " +
    "répartition des requêtes 311 par tranche de température.",
  widenedWeatherRelaxed:
    "La combinaison période + météo ne contient pas assez de lignes: filtre météo assoupli sur la fenêtre élargie.",
  periodWidened: (label: string) =>
    `Aucun résultat robuste sur la période demandée (${label}): fenêtre élargie à ${WIDEST_PERIOD}.`,
  defaultDiagnostic:
    "La requête spécifique ne retourne pas assez de lignes exploitables: affichage d'un diagnostic " +
    "global des hotspots collisions.",
} as const;

interface Attempt {
  kind: AnalysisKind;
  period: Period;
  weatherFilter: WeatherFilter | null;
  input: AggregationInput;
  output: AggregationOutput;
}

const REQUEST_KINDS: ReadonlySet<AnalysisKind> = new Set<AnalysisKind>(["311_temperature", "311_types_weather"]);

export class FallbackCascade {
  private log = logger.child({ component: "cascade" });

  constructor(private readonly store: RecordStore) {}

  run(request: CascadeRequest, initialNotes: readonly DegradationNote[] = []): AggregationResult {
    const notes: DegradationNote[] = [...initialNotes];
    const note = (step: DegradationNote["step"], message: string) => {
      notes.push({ step, message });
      this.log.info("Cascade step applied", { step, kind: request.kind });
    };

    let current = this.attempt(request, request.kind, request.period, request.weatherFilter);

    // Step 1: relax the weather filter on the same window
    if (isEmptyOutput(current.output) && current.weatherFilter && WEATHER_FILTERED_KINDS.has(current.kind)) {
      const relaxed = this.attempt(request, current.kind, current.period, null);
      if (!isEmptyOutput(relaxed.output)) {
        note("weather_filter_relaxed", CASCADE_MESSAGES.weatherRelaxed);
        current = relaxed;
      }
    }

    // Step 2: lift needs weather-day volume; fall back to temperature bands
    if (isEmptyOutput(current.output) && current.kind === "311_types_weather") {
      const bands = this.attempt(request, "311_temperature", current.period, current.weatherFilter);
      if (!isEmptyOutput(bands.output)) {
        note("lift_to_bands", CASCADE_MESSAGES.liftToBands);
        current = bands;
      }
    }

    // Step 3: widest period, same kind
    if (isEmptyOutput(current.output) && !isWidest(current.period)) {
      const requestedLabel = current.period.label;
      let broad = this.attempt(request, current.kind, bucket(WIDEST_PERIOD), current.weatherFilter);
      let relaxedOnBroad = false;
      if (isEmptyOutput(broad.output) && broad.weatherFilter && WEATHER_FILTERED_KINDS.has(broad.kind)) {
        const relaxed = this.attempt(request, broad.kind, broad.period, null);
        if (!isEmptyOutput(relaxed.output)) {
          broad = relaxed;
          relaxedOnBroad = true;
        }
      }
      if (!isEmptyOutput(broad.output)) {
        if (relaxedOnBroad) note("weather_filter_relaxed", CASCADE_MESSAGES.widenedWeatherRelaxed);
        note("period_widened", CASCADE_MESSAGES.periodWidened(requestedLabel));
        current = broad;
      }
    }

    // Step 4: global hotspot diagnostic
    if (isEmptyOutput(current.output)) {
      let fallback = this.attempt(request, "hotspots", current.period, null);
      if (isEmptyOutput(fallback.output) && !isWidest(current.period)) {
        fallback = this.attempt(request, "hotspots", bucket(WIDEST_PERIOD), null);
      }
      if (!isEmptyOutput(fallback.output)) {
        note("default_diagnostic", CASCADE_MESSAGES.defaultDiagnostic);
        current = fallback;
      } else {
        this.log.warn("Cascade exhausted without rows", { kind: request.kind });
      }
    }

    return this.toResult(request, current, notes);
  }

  private attempt(
    request: CascadeRequest,
    kind: AnalysisKind,
    period: Period,
    weatherFilter: WeatherFilter | null
  ): Attempt {
    const input: AggregationInput = {
      incidents: filterByPeriod(this.store.incidents, period),
      requests: filterByPeriod(this.store.requests, period),
      allIncidents: this.store.incidents,
      allRequests: this.store.requests,
      stops: this.store.stops,
      period,
      weatherFilter,
      requestWeatherTag: request.requestWeatherTag,
      trendScope: request.trendScope,
    };
    const output = runAggregation(kind, input);
    this.log.debug("Aggregation attempt", {
      kind,
      period: period.label,
      weather: weatherFilter !== null,
      rows: output.rows.length,
    });
    return { kind, period, weatherFilter, input, output };
  }

  private windowOf(attempt: Attempt): TimeWindow | null {
    if (REQUEST_KINDS.has(attempt.kind)) {
      return periodWindow(this.store.requests, attempt.period);
    }
    return periodWindow(this.store.incidents, attempt.period);
  }

  private toResult(request: CascadeRequest, attempt: Attempt, notes: DegradationNote[]): AggregationResult {
    const isTrend = attempt.kind === "trend_incidents";
    const trend = isTrend ? trendContext(attempt.input) : null;
    return {
      ...attempt.output,
      attributes: {
        kindRequested: request.kind,
        periodRequested: request.period.label,
        periodApplied: attempt.period.label,
        window: trend ? trend.window : this.windowOf(attempt),
        weatherFilterRequested: request.weatherFilter,
        weatherFilterApplied: WEATHER_FILTERED_KINDS.has(attempt.kind) ? attempt.weatherFilter : null,
        requestWeatherTag: REQUEST_KINDS.has(request.kind) ? request.requestWeatherTag : null,
        trendScope: isTrend ? request.trendScope : null,
        sourceRows: {
          incidents: isTrend ? attempt.input.allIncidents.length : attempt.input.incidents.length,
          requests: isTrend ? attempt.input.allRequests.length : attempt.input.requests.length,
        },
        alignmentCaveat: trend ? trend.alignmentCaveat : null,
        notes,
      },
    };
  }
}
