/**
 * Trend comparison: current window vs. the window of equal length just
 * before it.
 *
 *   previous = (anchor - 2N, anchor - N]    current = (anchor - N, anchor]
 *
 * Each source is anchored on its own most recent date and read from its
 * full history, so that a narrow UI period never leaves the previous window
 * empty by construction. The weather filter applies to collisions only, after
 * anchoring: the windows follow the export's freshness, not the last day
 * that matched the filter. A source with no date at all is anchored on the
 * wall clock.
 */

import type { TimeWindow, TrendRow } from "../../schemas/index.js";
import { matchesWeather } from "../filters.js";
import { addDays, anchorDate, daysBetween, formatWindow, todayIso } from "../period.js";
import { countBy, round1, type Aggregation, type AggregationInput } from "./types.js";

export const RISING_NEIGHBORHOOD_LIMIT = 4;

/** Anchors further apart than this (or than N days) are read separately */
export const ALIGNMENT_TOLERANCE_DAYS = 14;

export interface TrendWindows {
  current: TimeWindow;
  previous: TimeWindow;
}

/**
 * Two contiguous, non-overlapping windows of `days` days ending at `anchor`
 */
export function trendWindows(anchor: string, days: number): TrendWindows {
  const currentStart = addDays(anchor, -days + 1);
  const previousEnd = addDays(currentStart, -1);
  return {
    current: { start: currentStart, end: anchor },
    previous: { start: addDays(previousEnd, -days + 1), end: previousEnd },
  };
}

/**
 * Percentage change; 100 when something appears out of nothing, null when
 * both windows are empty
 */
export function percentChange(current: number, previous: number): number | null {
  if (previous === 0) {
    return current > 0 ? 100 : null;
  }
  return round1(((current - previous) / previous) * 100);
}

const inWindow = (date: string, window: TimeWindow) => date >= window.start && date <= window.end;

interface SourceSpec {
  source: TrendRow["source"];
  totalLabel: string;
  risingLabel: string;
}

const SOURCES: Record<TrendRow["source"], SourceSpec> = {
  collisions: {
    source: "collisions",
    totalLabel: "Collisions (total)",
    risingLabel: "Quartier en hausse",
  },
  requests: {
    source: "requests",
    totalLabel: "Requêtes 311 (total)",
    risingLabel: "Quartier 311 en hausse",
  },
};

function compareSource(
  meta: SourceSpec,
  records: readonly { date: string; neighborhood: string }[],
  days: number,
  anchorRecords: readonly { date: string }[] = records
): { rows: TrendRow[]; anchor: string | null; windows: TrendWindows } {
  // A source without any date falls back to today: its rows are zeros either way
  const anchor = anchorDate(anchorRecords);
  const windows = trendWindows(anchor ?? todayIso(), days);
  const current = records.filter((r) => inWindow(r.date, windows.current));
  const previous = records.filter((r) => inWindow(r.date, windows.previous));
  const currentWindow = formatWindow(windows.current);
  const previousWindow = formatWindow(windows.previous);

  const row = (segment: string, cur: number, prev: number): TrendRow => ({
    segment,
    source: meta.source,
    current: cur,
    previous: prev,
    delta: cur - prev,
    pct: percentChange(cur, prev),
    currentWindow,
    previousWindow,
  });

  const rows = [row(meta.totalLabel, current.length, previous.length)];

  const currentByArea = countBy(current, (r) => r.neighborhood);
  const previousByArea = countBy(previous, (r) => r.neighborhood);
  const rising = [...currentByArea]
    .map(([area, cur]) => row(`${meta.risingLabel}: ${area}`, cur, previousByArea.get(area) ?? 0))
    .filter((r) => r.delta > 0)
    .sort((a, b) => b.delta - a.delta)
    .slice(0, RISING_NEIGHBORHOOD_LIMIT);

  return { rows: [...rows, ...rising], anchor, windows };
}

/**
 * Headline row of each source in scope (rising-neighborhood rows left out)
 */
export function sourceTotals(rows: readonly TrendRow[]): TrendRow[] {
  return rows.filter((r) => r.segment === SOURCES[r.source].totalLabel);
}

interface TrendComparison {
  rows: TrendRow[];
  /** Current window of the first source in scope that has data */
  window: TimeWindow | null;
  alignmentCaveat: string | null;
}

function compareTrend(input: AggregationInput): TrendComparison {
  const days = input.period.days;
  const filter = input.weatherFilter;
  const scope = input.trendScope;

  const rows: TrendRow[] = [];
  let window: TimeWindow | null = null;
  let unanchoredWindow: TimeWindow | null = null;
  let collisionAnchor: string | null = null;
  let requestAnchor: string | null = null;

  if (scope !== "requests") {
    const incidents = filter
      ? input.allIncidents.filter((r) => matchesWeather(r.condition, filter))
      : input.allIncidents;
    const result = compareSource(SOURCES.collisions, incidents, days, input.allIncidents);
    rows.push(...result.rows);
    collisionAnchor = result.anchor;
    if (result.anchor) window = result.windows.current;
    else unanchoredWindow = result.windows.current;
  }

  if (scope !== "collisions") {
    const result = compareSource(SOURCES.requests, input.allRequests, days);
    rows.push(...result.rows);
    requestAnchor = result.anchor;
    if (result.anchor) window = window ?? result.windows.current;
    else unanchoredWindow = unanchoredWindow ?? result.windows.current;
  }

  let alignmentCaveat: string | null = null;
  if (scope === "both" && collisionAnchor && requestAnchor) {
    const gap = Math.abs(daysBetween(collisionAnchor, requestAnchor));
    if (gap > Math.max(ALIGNMENT_TOLERANCE_DAYS, days)) {
      alignmentCaveat =
        "Comparaison multi-sources affichée en lecture séparée: les ancres temporelles " +
        `diffèrent (collisions=${collisionAnchor} vs 311=${requestAnchor}).`;
    }
  }

  return { rows, window: window ?? unanchoredWindow, alignmentCaveat };
}

export const incidentTrend: Aggregation<"trend_incidents"> = (input) => ({
  kind: "trend_incidents",
  rows: compareTrend(input).rows,
});

/**
 * Window and alignment caveat of a trend, for the result attributes
 */
export function trendContext(input: AggregationInput): Omit<TrendComparison, "rows"> {
  const { window, alignmentCaveat } = compareTrend(input);
  return { window, alignmentCaveat };
}
