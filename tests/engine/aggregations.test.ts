import { describe, it, expect } from "vitest";
import type { AggregationInput } from "../../src/engine/aggregations/index.js";
import { hotspots, rankHotspots, weatherHotspots } from "../../src/engine/aggregations/hotspots.js";
import { neighborhoodPressure } from "../../src/engine/aggregations/neighborhoods.js";
import { liftScore, temperatureBands, weatherLift } from "../../src/engine/aggregations/requests.js";
import { collisionsNearStops, gridCell } from "../../src/engine/aggregations/transit.js";
import { conditionBreakdown, neighborhoodsUnderWeather } from "../../src/engine/aggregations/weather.js";
import { bucket } from "../../src/engine/period.js";
import type { IncidentRecord, ServiceRequestRecord, TransitStopRecord } from "../../src/schemas/index.js";
import { incident, request, stop, times } from "../helpers/factories.js";

function inputOf(parts: {
  incidents?: IncidentRecord[];
  requests?: ServiceRequestRecord[];
  stops?: TransitStopRecord[];
}): AggregationInput {
  const incidents = parts.incidents ?? [];
  const requests = parts.requests ?? [];
  return {
    incidents,
    requests,
    allIncidents: incidents,
    allRequests: requests,
    stops: parts.stops ?? [],
    period: bucket("30 derniers jours"),
    weatherFilter: null,
    requestWeatherTag: "snow",
    trendScope: "collisions",
  };
}

const SNOW = { labels: ["neige"], patterns: ["enneig", "neige"] };
const RAIN = { labels: ["pluie"], patterns: ["mouill", "pluie", "averse"] };

describe("hotspots", () => {
  const peel = "Rue Peel / Rue Sainte-Catherine";
  const incidents = [
    incident({ location: peel, hour: 8, severeInjuries: 1 }),
    incident({ location: peel, hour: 17 }),
    incident({ location: peel, hour: 9 }),
    incident({ location: "B", hour: 12, fatalities: 1 }),
    incident({ location: "B", hour: 12 }),
    incident({ location: "C" }),
    incident({ location: "D" }),
    incident({ location: "E" }),
    incident({ location: "F" }),
  ];

  it("ranks locations by collision count", () => {
    const rows = rankHotspots(incidents);
    expect(rows[0]).toEqual({ location: peel, total: 3, severe: 1, meanHour: 11.3 });
    expect(rows[1]).toEqual({ location: "B", total: 2, severe: 1, meanHour: 12 });
  });

  it("keeps the top five, first seen first on ties", () => {
    expect(rankHotspots(incidents).map((r) => r.location)).toEqual([peel, "B", "C", "D", "E"]);
  });

  it("ignores the weather filter for plain hotspots", () => {
    const output = hotspots({ ...inputOf({ incidents }), weatherFilter: SNOW });
    expect(output.rows[0]?.total).toBe(3);
  });

  it("restricts weather hotspots to matching surfaces", () => {
    const mixed = [
      incident({ location: "A", condition: "Enneigée" }),
      incident({ location: "A", condition: "Sèche" }),
      incident({ location: "B", condition: "13" }),
      incident({ location: "B", condition: "Enneigée" }),
    ];
    const output = weatherHotspots({ ...inputOf({ incidents: mixed }), weatherFilter: SNOW });
    expect(output.rows.map((r) => [r.location, r.total])).toEqual([
      ["B", 2],
      ["A", 1],
    ]);
  });
});

describe("weather breakdowns", () => {
  it("computes the severe rate per surface condition", () => {
    const incidents = [
      incident({ condition: "Sèche", severeInjuries: 1 }),
      incident({ condition: "Sèche" }),
      incident({ condition: "Sèche" }),
      incident({ condition: "Enneigée", severeInjuries: 1 }),
    ];
    expect(conditionBreakdown(inputOf({ incidents })).rows).toEqual([
      { condition: "Sèche", total: 3, severe: 1, severeRate: 33.3 },
      { condition: "Enneigée", total: 1, severe: 1, severeRate: 100 },
    ]);
  });

  it("ranks neighborhoods under the requested weather", () => {
    const incidents = [
      incident({ neighborhood: "Plateau", condition: "Sèche" }),
      incident({ neighborhood: "Plateau", condition: "Sèche" }),
      incident({ neighborhood: "Plateau", condition: "Mouillée" }),
      incident({ neighborhood: "Ville-Marie", condition: "Mouillée" }),
      incident({ neighborhood: "Ville-Marie", condition: "Mouillée", minorInjuries: 1 }),
    ];
    const output = neighborhoodsUnderWeather({ ...inputOf({ incidents }), weatherFilter: RAIN });
    expect(output.rows).toEqual([
      { neighborhood: "Ville-Marie", incidents: 2, severe: 0 },
      { neighborhood: "Plateau", incidents: 1, severe: 0 },
    ]);
  });
});

describe("311 temperature bands", () => {
  it("assigns band edges to the lower band", () => {
    const requests = [-10, -5, -3, 0, 0.5, 5, 10, 15, 20].map((temperature) => request({ temperature }));
    expect(temperatureBands(inputOf({ requests })).rows).toEqual([
      { band: "< -5°C", count: 2 },
      { band: "-5 à 0°C", count: 2 },
      { band: "0 à 5°C", count: 2 },
      { band: "5 à 15°C", count: 2 },
      { band: "> 15°C", count: 1 },
    ]);
  });

  it("omits empty bands and requests without temperature", () => {
    const requests = [request({ temperature: -3 }), request({ temperature: 20 }), request({ temperature: 21 }), request({ temperature: null })];
    expect(temperatureBands(inputOf({ requests })).rows).toEqual([
      { band: "-5 à 0°C", count: 1 },
      { band: "> 15°C", count: 2 },
    ]);
  });
});

describe("311 weather lift", () => {
  const requests = [
    ...times(6, () => request({ category: "Déneigement", temperature: -4 })),
    request({ category: "Déneigement", temperature: 5 }),
    ...times(5, () => request({ category: "Nid-de-poule", temperature: -2 })),
    ...times(9, () => request({ category: "Nid-de-poule", temperature: 8 })),
    ...times(2, () => request({ category: "Éclairage", temperature: -1 })),
    ...times(3, () => request({ category: "Graffiti", temperature: 10 })),
  ];

  it("smooths the share outside the weather days", () => {
    expect(liftScore(10, 20, 2, 40)).toBe(6.67);
    expect(liftScore(5, 5, 0, 0)).toBe(1);
  });

  it("ranks categories over-represented on snow days", () => {
    expect(weatherLift(inputOf({ requests })).rows).toEqual([
      { category: "Déneigement", weatherCount: 6, otherCount: 1, lift: 3 },
      { category: "Nid-de-poule", weatherCount: 5, otherCount: 9, lift: 0.5 },
    ]);
  });

  it("follows the requested tag", () => {
    const output = weatherLift({ ...inputOf({ requests }), requestWeatherTag: "rain" });
    expect(output.rows).toEqual([{ category: "Nid-de-poule", weatherCount: 9, otherCount: 5, lift: 1.5 }]);
  });

  it("is empty when no day matches the tag", () => {
    expect(weatherLift({ ...inputOf({ requests }), requestWeatherTag: "cold" }).rows).toEqual([]);
  });
});

describe("neighborhood pressure", () => {
  it("scores two per collision and one per request, zero-filling missing sides", () => {
    const output = neighborhoodPressure(
      inputOf({
        incidents: [
          incident({ neighborhood: "Ville-Marie" }),
          incident({ neighborhood: "Ville-Marie" }),
          incident({ neighborhood: "Plateau" }),
          incident({ neighborhood: "Ahuntsic" }),
        ],
        requests: [
          ...times(3, () => request({ neighborhood: "Plateau" })),
          ...times(2, () => request({ neighborhood: "Rosemont" })),
        ],
      })
    );
    expect(output.rows).toEqual([
      { neighborhood: "Plateau", incidents: 1, requests: 3, score: 5 },
      { neighborhood: "Ville-Marie", incidents: 2, requests: 0, score: 4 },
      { neighborhood: "Ahuntsic", incidents: 1, requests: 0, score: 2 },
      { neighborhood: "Rosemont", incidents: 0, requests: 2, score: 2 },
    ]);
  });

  it("holds the score formula on every row", () => {
    const output = neighborhoodPressure(
      inputOf({
        incidents: times(4, () => incident({ neighborhood: "Verdun" })),
        requests: times(7, () => request({ neighborhood: "Verdun" })),
      })
    );
    for (const row of output.rows) {
      expect(row.score).toBe(2 * row.incidents + row.requests);
    }
  });
});

describe("collisions near STM stops", () => {
  it("snaps nearby points to the same cell", () => {
    expect(gridCell(45.501, -73.561)).toEqual({ key: "5688:-7356", latitude: 45.504, longitude: -73.56 });
    expect(gridCell(45.502, -73.562).key).toBe("5688:-7356");
    expect(gridCell(45.5245, -73.582).key).not.toBe("5688:-7356");
  });

  it("counts collisions in cells that hold a stop", () => {
    const stops = [
      stop({ stopId: "1", stopName: "Station Peel", latitude: 45.501, longitude: -73.561 }),
      stop({ stopId: "2", stopName: "Peel / de Maisonneuve", latitude: 45.502, longitude: -73.562 }),
      stop({ stopId: 3, stopName: "Station Mont-Royal", latitude: 45.5245, longitude: -73.582 }),
    ];
    const incidents = [
      ...times(3, () => incident({ latitude: 45.5012, longitude: -73.5611 })),
      incident({ latitude: 45.5246, longitude: -73.5821, severeInjuries: 1 }),
      ...times(2, () => incident({ latitude: 45.6, longitude: -73.7 })),
    ];

    expect(collisionsNearStops(inputOf({ incidents, stops })).rows).toEqual([
      {
        cellLatitude: 45.504,
        cellLongitude: -73.56,
        stops: "Station Peel, Peel / de Maisonneuve",
        stopCount: 2,
        total: 3,
        severe: 0,
      },
      {
        cellLatitude: 45.528,
        cellLongitude: -73.58,
        stops: "Station Mont-Royal",
        stopCount: 1,
        total: 1,
        severe: 1,
      },
    ]);
  });

  it("is empty without stops", () => {
    expect(collisionsNearStops(inputOf({ incidents: [incident()] })).rows).toEqual([]);
  });
});
