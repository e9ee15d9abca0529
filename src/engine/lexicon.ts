/**
 * Vocabulary tables
 * Loaded from lexicon.json, validated once and compiled into matchers.
 */

import { z } from "zod";
import lexiconData from "./lexicon.json" with { type: "json" };
import { TermMatcher } from "./text.js";
import { PERIOD_LABELS, RequestWeatherTagSchema } from "../schemas/index.js";

const TermsSchema = z.array(z.string().min(1)).min(1);

const LexiconSchema = z.object({
  smalltalk: TermsSchema,
  domainContext: TermsSchema,
  analyticIntent: TermsSchema,
  router: z.object({
    requests311: TermsSchema,
    weather: TermsSchema,
    collision: TermsSchema,
    typology: TermsSchema,
    trend: TermsSchema,
    street: TermsSchema,
    area: TermsSchema,
    transit: TermsSchema,
    risk: TermsSchema,
    now: TermsSchema,
  }),
  clarification: z.object({
    requests311: TermsSchema,
    collision: TermsSchema,
    transit: TermsSchema,
  }),
  weatherFilters: z.array(
    z.object({
      label: z.string(),
      triggers: TermsSchema,
      patterns: TermsSchema,
    })
  ),
  requestWeatherTags: z.array(
    z.object({
      tag: RequestWeatherTagSchema,
      triggers: TermsSchema,
    })
  ),
  trendScope: z.object({
    requests311: TermsSchema,
    collision: TermsSchema,
  }),
  periodOverrides: z.array(
    z.object({
      period: z.enum(PERIOD_LABELS),
      triggers: TermsSchema,
    })
  ),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export const LEXICON: Lexicon = LexiconSchema.parse(lexiconData);

const matcher = (terms: readonly string[]) => new TermMatcher(terms);

export const MATCHERS = {
  domainContext: matcher(LEXICON.domainContext),
  analyticIntent: matcher(LEXICON.analyticIntent),
  router: {
    requests311: matcher(LEXICON.router.requests311),
    weather: matcher(LEXICON.router.weather),
    collision: matcher(LEXICON.router.collision),
    typology: matcher(LEXICON.router.typology),
    trend: matcher(LEXICON.router.trend),
    street: matcher(LEXICON.router.street),
    area: matcher(LEXICON.router.area),
    transit: matcher(LEXICON.router.transit),
    risk: matcher(LEXICON.router.risk),
    now: matcher(LEXICON.router.now),
  },
  clarification: {
    requests311: matcher(LEXICON.clarification.requests311),
    collision: matcher(LEXICON.clarification.collision),
    transit: matcher(LEXICON.clarification.transit),
  },
  weatherFilters: LEXICON.weatherFilters.map((entry) => ({
    label: entry.label,
    patterns: entry.patterns,
    triggers: matcher(entry.triggers),
  })),
  requestWeatherTags: LEXICON.requestWeatherTags.map((entry) => ({
    tag: entry.tag,
    triggers: matcher(entry.triggers),
  })),
  trendScope: {
    requests311: matcher(LEXICON.trendScope.requests311),
    collision: matcher(LEXICON.trendScope.collision),
  },
  periodOverrides: LEXICON.periodOverrides.map((entry) => ({
    period: entry.period,
    triggers: matcher(entry.triggers),
  })),
} as const;
