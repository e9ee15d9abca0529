/**
 * 311 request aggregations: volume per temperature band, and categories
 * over-represented on days matching a weather tag (lift).
 */

import type { TemperatureBandRow, WeatherLiftRow } from "../../schemas/index.js";
import { REQUEST_WEATHER_MASKS } from "../filters.js";
import { countBy, round2, type Aggregation } from "./types.js";

export const TEMPERATURE_BANDS: ReadonlyArray<{ label: string; contains: (t: number) => boolean }> = [
  { label: "< -5°C", contains: (t) => t <= -5 },
  { label: "-5 à 0°C", contains: (t) => t > -5 && t <= 0 },
  { label: "0 à 5°C", contains: (t) => t > 0 && t <= 5 },
  { label: "5 à 15°C", contains: (t) => t > 5 && t <= 15 },
  { label: "> 15°C", contains: (t) => t > 15 },
];

/** A category needs this many weather-day requests to be ranked */
export const LIFT_MIN_COUNT = 5;
export const LIFT_LIMIT = 8;

export const temperatureBands: Aggregation<"311_temperature"> = (input) => {
  const counts = TEMPERATURE_BANDS.map(() => 0);
  for (const request of input.requests) {
    const t = request.temperature;
    if (t === null) continue;
    const index = TEMPERATURE_BANDS.findIndex((band) => band.contains(t));
    if (index >= 0) counts[index] = (counts[index] ?? 0) + 1;
  }

  const rows: TemperatureBandRow[] = [];
  TEMPERATURE_BANDS.forEach((band, i) => {
    const count = counts[i] ?? 0;
    if (count > 0) rows.push({ band: band.label, count });
  });
  return { kind: "311_temperature", rows };
};

/**
 * lift = (share among weather days) / (smoothed share among other days).
 * The +1 keeps categories never seen outside the weather set finite.
 */
export function liftScore(weatherCount: number, weatherTotal: number, otherCount: number, otherTotal: number): number {
  const weatherShare = weatherCount / Math.max(weatherTotal, 1);
  const otherShare = (otherCount + 1) / Math.max(otherTotal, 1);
  return round2(weatherShare / otherShare);
}

export const weatherLift: Aggregation<"311_types_weather"> = (input) => {
  const mask = REQUEST_WEATHER_MASKS[input.requestWeatherTag];
  const weatherDays = input.requests.filter((r) => r.temperature !== null && mask(r.temperature));
  const otherDays = input.requests.filter((r) => !(r.temperature !== null && mask(r.temperature)));

  if (weatherDays.length === 0) {
    return { kind: "311_types_weather", rows: [] };
  }

  const weatherCounts = countBy(weatherDays, (r) => r.category);
  const otherCounts = countBy(otherDays, (r) => r.category);

  const rows: WeatherLiftRow[] = [];
  for (const [category, weatherCount] of weatherCounts) {
    if (weatherCount < LIFT_MIN_COUNT) continue;
    const otherCount = otherCounts.get(category) ?? 0;
    rows.push({
      category,
      weatherCount,
      otherCount,
      lift: liftScore(weatherCount, weatherDays.length, otherCount, otherDays.length),
    });
  }

  rows.sort((a, b) => b.lift - a.lift || b.weatherCount - a.weatherCount);
  return { kind: "311_types_weather", rows: rows.slice(0, LIFT_LIMIT) };
};
