/**
 * Record Schemas
 * Zod schemas for the four source collections. Inputs are lenient about
 * numeric strings and missing labels (the exports are inconsistent), outputs
 * are the normalized records the engine works on.
 */

import { z } from "zod";

// ============ Helpers ============

/**
 * Parse string or number to number; blanks and garbage become undefined
 */
const numeric = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((val) => {
    if (val === null || val === undefined) return undefined;
    if (typeof val === "number") return Number.isFinite(val) ? val : undefined;
    const parsed = parseFloat(val.replace(",", "."));
    return Number.isFinite(parsed) ? parsed : undefined;
  });

const count = numeric.transform((v) => Math.max(0, Math.trunc(v ?? 0)));

const label = (fallback: string) =>
  z
    .string()
    .nullable()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : fallback));

const flag = z
  .union([z.boolean(), z.number(), z.null()])
  .optional()
  .transform((v) => (typeof v === "number" ? v > 0 : v === true));

/**
 * ISO calendar date (YYYY-MM-DD). A timestamp is cut to its date part.
 */
export const IsoDateSchema = z
  .string()
  .transform((s) => s.trim().slice(0, 10))
  .refine((s) => isValidIsoDate(s), { message: "Expected a YYYY-MM-DD date" });

export function isValidIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

// ============ Incidents (collisions) ============

/**
 * Road-surface codes used by the collision export, mapped to labels
 */
export const SURFACE_CODES: Readonly<Record<string, string>> = {
  "10": "Sèche",
  "11": "Mouillée",
  "12": "Boueuse",
  "13": "Enneigée",
  "14": "Glacée/Verglacée",
  "16": "Huileuse",
};

const surfaceCondition = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((v) => {
    const raw = v === null || v === undefined ? "" : String(v).trim();
    if (!raw) return "Inconnue";
    return SURFACE_CODES[raw] ?? raw;
  });

export const IncidentRecordSchema = z
  .object({
    date: IsoDateSchema,
    hour: numeric,
    latitude: z.number(),
    longitude: z.number(),
    neighborhood: label("Montréal"),
    location: label("Secteur inconnu"),
    fatalities: count,
    severeInjuries: count,
    minorInjuries: count,
    condition: surfaceCondition,
    pedestrians: flag,
    cyclists: flag,
  })
  .transform((r) => ({
    ...r,
    hour: Math.min(23, Math.max(0, Math.trunc(r.hour ?? 12))),
    severity: incidentSeverity(r.fatalities, r.severeInjuries, r.minorInjuries),
  }));

export type IncidentInput = z.input<typeof IncidentRecordSchema>;
export type IncidentRecord = z.output<typeof IncidentRecordSchema>;

/**
 * Weighted injury score, floored at 1 so that property-damage-only
 * collisions still count
 */
export function incidentSeverity(
  fatalities: number,
  severeInjuries: number,
  minorInjuries: number
): number {
  return Math.max(1, 4 * fatalities + 3 * severeInjuries + 2 * minorInjuries);
}

/** Severity from which a collision counts as "grave" */
export const SEVERE_THRESHOLD = 3;

// ============ 311 service requests ============

export const ServiceRequestRecordSchema = z
  .object({
    date: IsoDateSchema,
    category: label("Non spécifié"),
    neighborhood: label("Montréal"),
    status: label("Inconnu"),
    temperature: numeric,
  })
  .transform((r) => ({ ...r, temperature: r.temperature ?? null }));

export type ServiceRequestInput = z.input<typeof ServiceRequestRecordSchema>;
export type ServiceRequestRecord = z.output<typeof ServiceRequestRecordSchema>;

// ============ STM stops ============

export const TransitStopRecordSchema = z.object({
  stopId: z.union([z.string(), z.number()]).transform((v) => String(v)),
  stopName: label("Arrêt STM"),
  latitude: z.number(),
  longitude: z.number(),
  line: label("STM"),
});

export type TransitStopInput = z.input<typeof TransitStopRecordSchema>;
export type TransitStopRecord = z.output<typeof TransitStopRecordSchema>;

// ============ Daily weather ============

export const WeatherRecordSchema = z
  .object({
    date: IsoDateSchema,
    maxTemperature: numeric,
    minTemperature: numeric,
    precipitationMm: numeric,
    snowfallCm: numeric,
    station: label("Montréal"),
  })
  .transform((r) => {
    const day = {
      date: r.date,
      maxTemperature: r.maxTemperature ?? 0,
      minTemperature: r.minTemperature ?? 0,
      precipitationMm: r.precipitationMm ?? 0,
      snowfallCm: r.snowfallCm ?? 0,
      station: r.station,
    };
    return { ...day, condition: weatherCondition(day) };
  });

export type WeatherInput = z.input<typeof WeatherRecordSchema>;
export type WeatherRecord = z.output<typeof WeatherRecordSchema>;

/**
 * Surface label for a day, using the same vocabulary as collision reports
 */
export function weatherCondition(day: {
  maxTemperature: number;
  precipitationMm: number;
  snowfallCm: number;
}): string {
  if (day.snowfallCm > 2) return "Enneigée";
  if (day.snowfallCm > 0) return "Neige légère";
  if (day.precipitationMm > 10) return "Pluie forte";
  if (day.precipitationMm > 1) return "Pluie légère";
  if (day.maxTemperature < -5) return "Glacée/Verglacée";
  return "Sèche";
}
