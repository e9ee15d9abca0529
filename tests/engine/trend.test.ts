import { describe, it, expect, afterEach, vi } from "vitest";
import type { AggregationInput } from "../../src/engine/aggregations/index.js";
import {
  incidentTrend,
  percentChange,
  trendContext,
  trendWindows,
} from "../../src/engine/aggregations/trend.js";
import { addDays, bucket, daysBetween, filterByPeriod } from "../../src/engine/period.js";
import type { IncidentRecord, ServiceRequestRecord, TrendScope } from "../../src/schemas/index.js";
import { incident, request, times } from "../helpers/factories.js";

function trendInput(parts: {
  incidents?: IncidentRecord[];
  requests?: ServiceRequestRecord[];
  scope?: TrendScope;
  days?: 7 | 30;
}): AggregationInput {
  const period = bucket(parts.days === 30 ? "30 derniers jours" : "7 derniers jours");
  const allIncidents = parts.incidents ?? [];
  const allRequests = parts.requests ?? [];
  return {
    incidents: filterByPeriod(allIncidents, period),
    requests: filterByPeriod(allRequests, period),
    allIncidents,
    allRequests,
    stops: [],
    period,
    weatherFilter: null,
    requestWeatherTag: "snow",
    trendScope: parts.scope ?? "collisions",
  };
}

describe("trendWindows", () => {
  it("builds two windows of N days ending at the anchor", () => {
    expect(trendWindows("2024-03-31", 7)).toEqual({
      current: { start: "2024-03-25", end: "2024-03-31" },
      previous: { start: "2024-03-18", end: "2024-03-24" },
    });
  });

  for (const days of [7, 30, 90, 365]) {
    it(`keeps ${days}-day windows equal and contiguous`, () => {
      const { current, previous } = trendWindows("2024-02-29", days);
      expect(daysBetween(current.start, current.end) + 1).toBe(days);
      expect(daysBetween(previous.start, previous.end) + 1).toBe(days);
      expect(addDays(previous.end, 1)).toBe(current.start);
      expect(current.end).toBe("2024-02-29");
    });
  }
});

describe("percentChange", () => {
  it("is null when both windows are empty", () => {
    expect(percentChange(0, 0)).toBeNull();
  });

  it("is 100 when something appears from nothing", () => {
    expect(percentChange(5, 0)).toBe(100);
  });

  it("rounds to one decimal", () => {
    expect(percentChange(0, 12)).toBe(-100);
    expect(percentChange(15, 12)).toBe(25);
    expect(percentChange(1, 3)).toBe(-66.7);
  });
});

describe("incidentTrend", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reads the previous window from full history, not the period slice", () => {
    const incidents = [
      ...times(4, () => incident({ date: "2024-03-20" })),
      ...times(2, () => incident({ date: "2024-03-31" })),
    ];
    const input = trendInput({ incidents });
    expect(input.incidents).toHaveLength(2);

    const [total] = incidentTrend(input).rows;
    expect(total).toEqual({
      segment: "Collisions (total)",
      source: "collisions",
      current: 2,
      previous: 4,
      delta: -2,
      pct: -50,
      currentWindow: "2024-03-25 -> 2024-03-31",
      previousWindow: "2024-03-18 -> 2024-03-24",
    });
  });

  it("reports zero current against twelve previous under a weather filter", () => {
    const incidents = [
      ...times(12, () => incident({ date: "2024-03-20", condition: "Enneigée" })),
      ...times(3, () => incident({ date: "2024-03-31", condition: "Sèche" })),
    ];
    const input = { ...trendInput({ incidents }), weatherFilter: { labels: ["neige"], patterns: ["enneig", "neige"] } };
    const [total] = incidentTrend(input).rows;
    expect(total).toMatchObject({ current: 0, previous: 12, delta: -12, pct: -100 });
  });

  it("adds rising neighborhoods, largest delta first", () => {
    const incidents = [
      incident({ date: "2024-03-20", neighborhood: "Plateau" }),
      ...times(3, () => incident({ date: "2024-03-30", neighborhood: "Plateau" })),
      ...times(2, () => incident({ date: "2024-03-31", neighborhood: "Verdun" })),
      incident({ date: "2024-03-19", neighborhood: "Anjou" }),
    ];
    const rows = incidentTrend(trendInput({ incidents })).rows;
    expect(rows.map((r) => [r.segment, r.delta])).toEqual([
      ["Collisions (total)", 3],
      ["Quartier en hausse: Plateau", 2],
      ["Quartier en hausse: Verdun", 2],
    ]);
  });

  it("emits one zero row per source without data, windowed on today", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-10T12:00:00Z"));
    const rows = incidentTrend(trendInput({ scope: "requests" })).rows;
    expect(rows).toEqual([
      {
        segment: "Requêtes 311 (total)",
        source: "requests",
        current: 0,
        previous: 0,
        delta: 0,
        pct: null,
        currentWindow: "2024-05-04 -> 2024-05-10",
        previousWindow: "2024-04-27 -> 2024-05-03",
      },
    ]);
  });

  it("flags sources whose anchors drift apart", () => {
    const input = trendInput({
      incidents: [incident({ date: "2024-03-31" })],
      requests: [request({ date: "2024-01-15" })],
      scope: "both",
    });
    const context = trendContext(input);
    expect(context.window).toEqual({ start: "2024-03-25", end: "2024-03-31" });
    expect(context.alignmentCaveat).toBe(
      "Comparaison multi-sources affichée en lecture séparée: les ancres temporelles " +
        "diffèrent (collisions=2024-03-31 vs 311=2024-01-15)."
    );
  });

  it("tolerates a gap up to the window length", () => {
    const input = trendInput({
      incidents: [incident({ date: "2024-03-31" })],
      requests: [request({ date: "2024-03-05" })],
      scope: "both",
      days: 30,
    });
    expect(trendContext(input).alignmentCaveat).toBeNull();
  });

  it("reports the window of the source that has data", () => {
    const input = trendInput({ requests: [request({ date: "2024-03-31" })], scope: "both" });
    expect(trendContext(input)).toEqual({
      window: { start: "2024-03-25", end: "2024-03-31" },
      alignmentCaveat: null,
    });
  });
});
