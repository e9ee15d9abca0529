/**
 * Aggregation dispatch table, one entry per analysis kind
 */

import type { AggregationOutput, AnalysisKind } from "../../schemas/index.js";
import { hotspots, weatherHotspots } from "./hotspots.js";
import { neighborhoodPressure } from "./neighborhoods.js";
import { temperatureBands, weatherLift } from "./requests.js";
import { collisionsNearStops } from "./transit.js";
import { incidentTrend } from "./trend.js";
import type { Aggregation, AggregationInput } from "./types.js";
import { conditionBreakdown, neighborhoodsUnderWeather } from "./weather.js";

export const AGGREGATIONS: { readonly [K in AnalysisKind]: Aggregation<K> } = {
  hotspots,
  hotspots_meteo: weatherHotspots,
  meteo_collision: conditionBreakdown,
  quartiers_meteo: neighborhoodsUnderWeather,
  "311_temperature": temperatureBands,
  "311_types_weather": weatherLift,
  quartiers: neighborhoodPressure,
  stm: collisionsNearStops,
  trend_incidents: incidentTrend,
};

/** Kinds whose result depends on the collision weather filter */
export const WEATHER_FILTERED_KINDS: ReadonlySet<AnalysisKind> = new Set<AnalysisKind>([
  "hotspots_meteo",
  "quartiers_meteo",
  "meteo_collision",
  "trend_incidents",
]);

export function runAggregation(kind: AnalysisKind, input: AggregationInput): AggregationOutput {
  return AGGREGATIONS[kind](input);
}

/**
 * A trend with nothing in either window is as empty as a result with no rows
 */
export function isEmptyOutput(output: AggregationOutput): boolean {
  if (output.kind === "trend_incidents") {
    return output.rows.every((r) => r.current === 0 && r.previous === 0);
  }
  return output.rows.length === 0;
}

export type { Aggregation, AggregationInput, KindOutput } from "./types.js";
export { rankHotspots, HOTSPOT_LIMIT } from "./hotspots.js";
export { liftScore, LIFT_MIN_COUNT, TEMPERATURE_BANDS } from "./requests.js";
export { gridCell } from "./transit.js";
export { percentChange, sourceTotals, trendContext, trendWindows } from "./trend.js";
