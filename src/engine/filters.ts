/**
 * Filters read from the question: collision weather filter, 311 weather tag
 * and trend scope.
 */

import type { RequestWeatherTag, TrendScope, WeatherFilter } from "../schemas/index.js";
import { MATCHERS } from "./lexicon.js";
import { labelContains, plainText } from "./text.js";

/**
 * Collision surface filter for every weather word in the question, or null
 */
export function extractWeatherFilter(question: string): WeatherFilter | null {
  const plain = plainText(question);
  const labels: string[] = [];
  const patterns: string[] = [];

  for (const entry of MATCHERS.weatherFilters) {
    if (!entry.triggers.matches(plain)) continue;
    labels.push(entry.label);
    for (const pattern of entry.patterns) {
      if (!patterns.includes(pattern)) patterns.push(pattern);
    }
  }

  return labels.length > 0 ? { labels, patterns } : null;
}

export function matchesWeather(condition: string, filter: WeatherFilter): boolean {
  return labelContains(condition, filter.patterns);
}

export function describeWeatherFilter(filter: WeatherFilter | null): string | null {
  return filter ? filter.patterns.join("|") : null;
}

// ============================================================
// 311 WEATHER TAG
// ============================================================

/**
 * Temperature proxy deciding whether a request day counts as "under" a tag
 */
export const REQUEST_WEATHER_MASKS: Record<RequestWeatherTag, (temperature: number) => boolean> = {
  snow: (t) => t <= 0,
  ice: (t) => t >= -5 && t <= 1,
  rain: (t) => t > 0 && t <= 12,
  cold: (t) => t <= -8,
};

export const REQUEST_WEATHER_LABELS: Record<RequestWeatherTag, string> = {
  snow: "neige",
  ice: "verglas",
  rain: "pluie",
  cold: "grand froid",
};

/**
 * First tag whose words appear in the question; snow when none does
 */
export function requestWeatherTag(question: string): RequestWeatherTag {
  const plain = plainText(question);
  return MATCHERS.requestWeatherTags.find((entry) => entry.triggers.matches(plain))?.tag ?? "snow";
}

// ============================================================
// TREND SCOPE
// ============================================================

export function trendScope(question: string): TrendScope {
  const plain = plainText(question);
  const requests = MATCHERS.trendScope.requests311.matches(plain);
  const collisions = MATCHERS.trendScope.collision.matches(plain);
  if (requests && collisions) return "both";
  if (requests) return "requests";
  return "collisions";
}
