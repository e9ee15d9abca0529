import { describe, it, expect } from "vitest";
import { FallbackCascade, type CascadeRequest } from "../../src/engine/cascade.js";
import { assessConfidence } from "../../src/engine/confidence.js";
import { bucket } from "../../src/engine/period.js";
import type { AggregationResult, AnalysisKind, PeriodLabel, TrendScope, WeatherFilter } from "../../src/schemas/index.js";
import type { RecordStore } from "../../src/store/record-store.js";
import { incident, request, stop, storeOf, times } from "../helpers/factories.js";

const SNOW: WeatherFilter = { labels: ["neige"], patterns: ["enneig", "neige"] };

function run(
  store: RecordStore,
  kind: AnalysisKind,
  options: { label?: PeriodLabel; weatherFilter?: WeatherFilter; trendScope?: TrendScope } = {}
): AggregationResult {
  const req: CascadeRequest = {
    kind,
    period: bucket(options.label ?? "30 derniers jours"),
    weatherFilter: options.weatherFilter ?? null,
    requestWeatherTag: "snow",
    trendScope: options.trendScope ?? "collisions",
  };
  return new FallbackCascade(store).run(req);
}

describe("assessConfidence", () => {
  it("is insufficient for an empty result", () => {
    const status = assessConfidence(run(storeOf({}), "quartiers"));
    expect(status.level).toBe("insufficient");
    expect(status.label).toBe("Données insuffisantes");
  });

  it("is partial when the weather filter had to be relaxed", () => {
    const store = storeOf({ incidents: [incident({ condition: "Sèche" })] });
    const status = assessConfidence(run(store, "hotspots_meteo", { weatherFilter: SNOW }));
    expect(status.level).toBe("partial");
    expect(status.detail).toBe(
      "Filtre météo demandé assoupli faute d'échantillon suffisant; lecture descriptive à confirmer."
    );
  });

  it("says when a weather filter does not apply to the kind", () => {
    const store = storeOf({ incidents: [incident()] });
    const status = assessConfidence(run(store, "hotspots", { weatherFilter: SNOW }));
    expect(status.level).toBe("partial");
    expect(status.detail).toBe(
      "Filtre météo demandé non applicable à ce type d'analyse; lecture toutes conditions confondues."
    );
  });

  it("is partial after a period widening", () => {
    const store = storeOf({
      stops: [stop({ latitude: 45.501, longitude: -73.561 })],
      incidents: [
        incident({ date: "2024-03-31", latitude: 45.6, longitude: -73.7 }),
        incident({ date: "2024-01-10", latitude: 45.5012, longitude: -73.5611 }),
      ],
    });
    const result = run(store, "stm", { label: "7 derniers jours" });
    expect(result.attributes.notes.map((n) => n.step)).toEqual(["period_widened"]);
    expect(assessConfidence(result).level).toBe("partial");
  });

  it("flags a trend with nothing in the current window without calling it insufficient", () => {
    const store = storeOf({
      incidents: [
        ...times(12, () => incident({ date: "2024-03-20", condition: "Enneigée" })),
        ...times(3, () => incident({ date: "2024-03-31", condition: "Sèche" })),
      ],
    });
    const status = assessConfidence(run(store, "trend_incidents", { label: "7 derniers jours", weatherFilter: SNOW }));
    expect(status).toEqual({
      level: "partial",
      label: "Partiel",
      detail:
        "Aucun enregistrement sur la fenêtre courante (contre 12 sur la précédente): " +
        "baisse à confirmer, un retard de saisie reste possible.",
    });
  });

  it("carries the alignment caveat of a split trend", () => {
    const store = storeOf({
      incidents: [incident({ date: "2024-03-31" })],
      requests: [request({ date: "2024-01-15" })],
    });
    const status = assessConfidence(run(store, "trend_incidents", { label: "7 derniers jours", trendScope: "both" }));
    expect(status.level).toBe("partial");
    expect(status.detail).toContain("collisions=2024-03-31 vs 311=2024-01-15");
  });

  it("is partial when one source of a two-source trend has no data", () => {
    const store = storeOf({
      requests: [...times(6, () => request({ date: "2024-03-31" })), ...times(4, () => request({ date: "2024-03-20" }))],
    });
    expect(assessConfidence(run(store, "trend_incidents", { label: "7 derniers jours", trendScope: "both" }))).toEqual({
      level: "partial",
      label: "Partiel",
      detail: "Aucune collision sur les deux fenêtres: la comparaison ne porte que sur l'autre source.",
    });
  });

  it("is partial for descriptive kinds", () => {
    const store = storeOf({ incidents: [incident()] });
    expect(assessConfidence(run(store, "quartiers")).detail).toBe(
      "Corrélation descriptive, données non normalisées (population, trafic, longueur de voirie)."
    );
  });

  it("is verified for a direct hotspot count", () => {
    const store = storeOf({ incidents: [incident()] });
    expect(assessConfidence(run(store, "hotspots")).level).toBe("verified");
  });
});
