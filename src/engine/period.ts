/**
 * Period Resolver
 *
 * Turns the UI period label (and any period words in the question) into a
 * Period, and a Period into the records it covers. Windows are anchored on
 * the most recent date present in the data, never on the wall clock, so that
 * a stale export still answers "the last 30 days" of what it contains.
 */

import {
  PERIOD_LABELS,
  isValidIsoDate,
  type DegradationNote,
  type PeriodLabel,
  type TimeWindow,
} from "../schemas/index.js";
import { MATCHERS } from "./lexicon.js";
import { plainText } from "./text.js";

export const DEFAULT_PERIOD: PeriodLabel = "30 derniers jours";
export const WIDEST_PERIOD: PeriodLabel = "12 derniers mois";

export const PERIOD_DAYS: Record<PeriodLabel, number> = {
  "7 derniers jours": 7,
  "30 derniers jours": 30,
  "3 derniers mois": 90,
  "12 derniers mois": 365,
};

export type Period =
  | { type: "bucket"; label: PeriodLabel; days: number }
  | { type: "custom"; label: string; days: number; range: TimeWindow };

export interface PeriodResolution {
  period: Period;
  /** Set when the label could not be honoured as written */
  note: DegradationNote | null;
}

const CUSTOM_PATTERN =
  /Personnalis[ée]e\s*:\s*(\d{4}-\d{2}-\d{2})\s*(?:->|→)\s*(\d{4}-\d{2}-\d{2})/i;

// ============================================================
// DATE ARITHMETIC (ISO strings, UTC)
// ============================================================

const DAY_MS = 86_400_000;

function toUtc(iso: string): number {
  return Date.parse(`${iso}T00:00:00Z`);
}

export function addDays(iso: string, days: number): string {
  return new Date(toUtc(iso) + days * DAY_MS).toISOString().slice(0, 10);
}

/** Signed number of days from `from` to `to` */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtc(to) - toUtc(from)) / DAY_MS);
}

/** Wall-clock date, only ever used when there is no data to anchor on */
export function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}

export function formatWindow(window: TimeWindow | null): string {
  return window ? `${window.start} -> ${window.end}` : "n/a";
}

/**
 * Most recent date over one or more collections, null when all are empty
 */
export function anchorDate(...collections: ReadonlyArray<readonly { date: string }[]>): string | null {
  let anchor: string | null = null;
  for (const records of collections) {
    for (const { date } of records) {
      if (anchor === null || date > anchor) anchor = date;
    }
  }
  return anchor;
}

// ============================================================
// LABEL RESOLUTION
// ============================================================

function isPeriodLabel(label: string): label is PeriodLabel {
  return PERIOD_LABELS.some((known) => known === label);
}

export function bucket(label: PeriodLabel): Period {
  return { type: "bucket", label, days: PERIOD_DAYS[label] };
}

export function customPeriod(start: string, end: string): Period {
  const [from, to] = start <= end ? [start, end] : [end, start];
  return {
    type: "custom",
    label: `Personnalisée : ${from} -> ${to}`,
    days: Math.max(1, daysBetween(from, to) + 1),
    range: { start: from, end: to },
  };
}

/**
 * Parse a UI period label.
 *
 * A custom label that cannot be read falls back to the last valid custom
 * range the session saw, then to the default bucket.
 */
export function parsePeriodLabel(
  label: string,
  lastValidRange: TimeWindow | null = null
): PeriodResolution {
  const trimmed = label.trim();

  if (isPeriodLabel(trimmed)) {
    return { period: bucket(trimmed), note: null };
  }

  if (/^personnalis/i.test(trimmed)) {
    const match = CUSTOM_PATTERN.exec(trimmed);
    const start = match?.[1];
    const end = match?.[2];
    if (start && end && isValidIsoDate(start) && isValidIsoDate(end)) {
      return { period: customPeriod(start, end), note: null };
    }

    if (lastValidRange) {
      return {
        period: customPeriod(lastValidRange.start, lastValidRange.end),
        note: {
          step: "custom_period_fallback",
          message: `Période personnalisée illisible ("${trimmed}"): dernière plage valide réutilisée (${formatWindow(lastValidRange)}).`,
        },
      };
    }

    return {
      period: bucket(DEFAULT_PERIOD),
      note: {
        step: "custom_period_fallback",
        message: `Période personnalisée illisible ("${trimmed}"): période par défaut ${DEFAULT_PERIOD} appliquée.`,
      },
    };
  }

  return { period: bucket(DEFAULT_PERIOD), note: null };
}

/**
 * Period words in the question win over the UI selection
 */
export function resolveEffectivePeriod(
  question: string,
  uiLabel: string,
  lastValidRange: TimeWindow | null = null
): PeriodResolution {
  const plain = plainText(question);
  const override = MATCHERS.periodOverrides.find((entry) => entry.triggers.matches(plain));
  if (override) {
    return { period: bucket(override.period), note: null };
  }
  return parsePeriodLabel(uiLabel, lastValidRange);
}

export function isWidest(period: Period): boolean {
  return period.type === "bucket" && period.label === WIDEST_PERIOD;
}

// ============================================================
// FILTERING
// ============================================================

/**
 * Window a period covers over a collection (null when it is empty).
 * A bucket keeps dates from anchor - N days up to the anchor, both included.
 */
export function periodWindow(records: readonly { date: string }[], period: Period): TimeWindow | null {
  if (period.type === "custom") {
    return period.range;
  }
  const anchor = anchorDate(records);
  return anchor ? { start: addDays(anchor, -period.days), end: anchor } : null;
}

export function filterByPeriod<T extends { date: string }>(records: readonly T[], period: Period): T[] {
  const window = periodWindow(records, period);
  if (!window) return [];
  return records.filter((r) => r.date >= window.start && r.date <= window.end);
}
