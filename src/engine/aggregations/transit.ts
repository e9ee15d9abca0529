/**
 * Collisions around STM stops.
 *
 * Coordinates are snapped to a coarse grid (~500-700 m cells at Montréal's
 * latitude) and collisions are joined to the stops of the same cell. This is
 * a proximity approximation, not a spatial join.
 */

import { SEVERE_THRESHOLD, type TransitRow } from "../../schemas/index.js";
import { groupBy, sortDesc, type Aggregation } from "./types.js";

export const GRID_LAT_STEP = 0.008;
export const GRID_LON_STEP = 0.01;
export const TRANSIT_LIMIT = 5;
const STOP_NAMES_PER_CELL = 2;

export interface GridCell {
  key: string;
  latitude: number;
  longitude: number;
}

export function gridCell(latitude: number, longitude: number): GridCell {
  const i = Math.round(latitude / GRID_LAT_STEP);
  const j = Math.round(longitude / GRID_LON_STEP);
  return {
    key: `${i}:${j}`,
    // trim float noise left by the step multiplication
    latitude: Math.round(i * GRID_LAT_STEP * 1e6) / 1e6,
    longitude: Math.round(j * GRID_LON_STEP * 1e6) / 1e6,
  };
}

export const collisionsNearStops: Aggregation<"stm"> = (input) => {
  if (input.incidents.length === 0 || input.stops.length === 0) {
    return { kind: "stm", rows: [] };
  }

  const stopsByCell = groupBy(input.stops, (s) => gridCell(s.latitude, s.longitude).key);

  const rows: TransitRow[] = [];
  for (const [key, group] of groupBy(input.incidents, (r) => gridCell(r.latitude, r.longitude).key)) {
    const stops = stopsByCell.get(key);
    const first = group[0];
    if (!stops || !first) continue;
    const cell = gridCell(first.latitude, first.longitude);
    rows.push({
      cellLatitude: cell.latitude,
      cellLongitude: cell.longitude,
      stops: stops
        .slice(0, STOP_NAMES_PER_CELL)
        .map((s) => s.stopName)
        .join(", "),
      stopCount: stops.length,
      total: group.length,
      severe: group.filter((r) => r.severity >= SEVERE_THRESHOLD).length,
    });
  }

  return { kind: "stm", rows: sortDesc(rows, (r) => r.total).slice(0, TRANSIT_LIMIT) };
};
