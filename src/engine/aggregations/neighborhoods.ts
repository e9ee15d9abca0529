import type { NeighborhoodRow } from "../../schemas/index.js";
import { countBy, type Aggregation } from "./types.js";

export const NEIGHBORHOOD_LIMIT = 8;

/** A collision weighs twice a 311 request */
export const INCIDENT_WEIGHT = 2;

/**
 * Outer join of collision and 311 counts per neighborhood, zero-filled
 */
export const neighborhoodPressure: Aggregation<"quartiers"> = (input) => {
  const incidents = countBy(input.incidents, (r) => r.neighborhood);
  const requests = countBy(input.requests, (r) => r.neighborhood);
  const names = new Set([...incidents.keys(), ...requests.keys()]);

  const rows: NeighborhoodRow[] = [...names].map((neighborhood) => {
    const i = incidents.get(neighborhood) ?? 0;
    const r = requests.get(neighborhood) ?? 0;
    return { neighborhood, incidents: i, requests: r, score: INCIDENT_WEIGHT * i + r };
  });

  rows.sort((a, b) => b.score - a.score || a.neighborhood.localeCompare(b.neighborhood, "fr"));
  return { kind: "quartiers", rows: rows.slice(0, NEIGHBORHOOD_LIMIT) };
};
