/**
 * Aggregation contract
 * Every kind is a pure function of the same input, so the cascade can rerun
 * any of them on a relaxed input without knowing what it computes.
 */

import type {
  AnalysisKind,
  IncidentRecord,
  RequestWeatherTag,
  RowsByKind,
  ServiceRequestRecord,
  TransitStopRecord,
  TrendScope,
  WeatherFilter,
} from "../../schemas/index.js";
import type { Period } from "../period.js";

export interface AggregationInput {
  /** Collisions inside the selected period */
  incidents: readonly IncidentRecord[];
  /** 311 requests inside the selected period */
  requests: readonly ServiceRequestRecord[];
  /** Full history, for window comparisons */
  allIncidents: readonly IncidentRecord[];
  allRequests: readonly ServiceRequestRecord[];
  stops: readonly TransitStopRecord[];
  period: Period;
  weatherFilter: WeatherFilter | null;
  requestWeatherTag: RequestWeatherTag;
  trendScope: TrendScope;
}

export type KindOutput<K extends AnalysisKind> = { kind: K; rows: RowsByKind[K][] };

export type Aggregation<K extends AnalysisKind> = (input: AggregationInput) => KindOutput<K>;

// ============ Helpers ============

export const round1 = (value: number): number => Math.round(value * 10) / 10;
export const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Group records by key, keeping groups in first-seen order
 */
export function groupBy<T>(records: readonly T[], key: (record: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const k = key(record);
    const bucket = groups.get(k);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(k, [record]);
    }
  }
  return groups;
}

/**
 * Count records by key, keeping keys in first-seen order
 */
export function countBy<T>(records: readonly T[], key: (record: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const k = key(record);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

/**
 * Stable descending sort on a numeric field (ties keep input order)
 */
export function sortDesc<T>(rows: T[], value: (row: T) => number): T[] {
  return [...rows].sort((a, b) => value(b) - value(a));
}
