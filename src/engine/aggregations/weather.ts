/**
 * Collision breakdowns by surface condition and by neighborhood under a
 * weather condition
 */

import {
  SEVERE_THRESHOLD,
  type ConditionRow,
  type NeighborhoodWeatherRow,
} from "../../schemas/index.js";
import { matchesWeather } from "../filters.js";
import { groupBy, round1, sortDesc, type Aggregation, type AggregationInput } from "./types.js";

export const NEIGHBORHOOD_WEATHER_LIMIT = 8;

function weatherScoped(input: AggregationInput) {
  const filter = input.weatherFilter;
  return filter ? input.incidents.filter((r) => matchesWeather(r.condition, filter)) : input.incidents;
}

export const conditionBreakdown: Aggregation<"meteo_collision"> = (input) => {
  const rows: ConditionRow[] = [];
  for (const [condition, group] of groupBy(weatherScoped(input), (r) => r.condition)) {
    const severe = group.filter((r) => r.severity >= SEVERE_THRESHOLD).length;
    rows.push({
      condition,
      total: group.length,
      severe,
      severeRate: round1((severe / group.length) * 100),
    });
  }
  return { kind: "meteo_collision", rows: sortDesc(rows, (r) => r.total) };
};

export const neighborhoodsUnderWeather: Aggregation<"quartiers_meteo"> = (input) => {
  const rows: NeighborhoodWeatherRow[] = [];
  for (const [neighborhood, group] of groupBy(weatherScoped(input), (r) => r.neighborhood)) {
    rows.push({
      neighborhood,
      incidents: group.length,
      severe: group.filter((r) => r.severity >= SEVERE_THRESHOLD).length,
    });
  }
  return {
    kind: "quartiers_meteo",
    rows: sortDesc(rows, (r) => r.incidents).slice(0, NEIGHBORHOOD_WEATHER_LIMIT),
  };
};
