import { SEVERE_THRESHOLD, type HotspotRow, type IncidentRecord } from "../../schemas/index.js";
import { matchesWeather } from "../filters.js";
import { groupBy, round1, sortDesc, type Aggregation } from "./types.js";

export const HOTSPOT_LIMIT = 5;

/**
 * Locations ranked by collision count (first-seen order on ties)
 */
export function rankHotspots(incidents: readonly IncidentRecord[]): HotspotRow[] {
  const rows: HotspotRow[] = [];
  for (const [location, group] of groupBy(incidents, (r) => r.location)) {
    const hours = group.reduce((sum, r) => sum + r.hour, 0);
    rows.push({
      location,
      total: group.length,
      severe: group.filter((r) => r.severity >= SEVERE_THRESHOLD).length,
      meanHour: round1(hours / group.length),
    });
  }
  return sortDesc(rows, (r) => r.total).slice(0, HOTSPOT_LIMIT);
}

export const hotspots: Aggregation<"hotspots"> = (input) => ({
  kind: "hotspots",
  rows: rankHotspots(input.incidents),
});

export const weatherHotspots: Aggregation<"hotspots_meteo"> = (input) => {
  const filter = input.weatherFilter;
  const incidents = filter
    ? input.incidents.filter((r) => matchesWeather(r.condition, filter))
    : input.incidents;
  return { kind: "hotspots_meteo", rows: rankHotspots(incidents) };
};
