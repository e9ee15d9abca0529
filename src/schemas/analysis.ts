/**
 * Analysis Schemas
 * Kinds, aggregation rows, results and answer payloads
 */

import { z } from "zod";

// ============ Periods ============

export const PERIOD_LABELS = [
  "7 derniers jours",
  "30 derniers jours",
  "3 derniers mois",
  "12 derniers mois",
] as const;

export const PeriodLabelSchema = z.enum(PERIOD_LABELS);
export type PeriodLabel = z.infer<typeof PeriodLabelSchema>;

/** Inclusive ISO date range */
export interface TimeWindow {
  start: string;
  end: string;
}

// ============ Kinds ============

export const ANALYSIS_KINDS = [
  "hotspots",
  "hotspots_meteo",
  "meteo_collision",
  "quartiers_meteo",
  "311_temperature",
  "311_types_weather",
  "quartiers",
  "stm",
  "trend_incidents",
] as const;

export const AnalysisKindSchema = z.enum(ANALYSIS_KINDS);
export type AnalysisKind = z.infer<typeof AnalysisKindSchema>;

export type ControlState = "smalltalk" | "off_topic" | "needs_clarification";

/** Everything the router can return */
export type Route = ControlState | AnalysisKind;

export const RequestWeatherTagSchema = z.enum(["snow", "ice", "rain", "cold"]);
export type RequestWeatherTag = z.infer<typeof RequestWeatherTagSchema>;

export type TrendScope = "collisions" | "requests" | "both";

/**
 * Condition filter on collision surface labels
 */
export interface WeatherFilter {
  /** Weather words detected in the question ("neige", "pluie"...) */
  labels: string[];
  /** Label fragments, any of which selects a record */
  patterns: string[];
}

// ============ Rows ============

export interface HotspotRow {
  location: string;
  total: number;
  severe: number;
  meanHour: number;
}

export interface ConditionRow {
  condition: string;
  total: number;
  severe: number;
  /** Percentage of severe collisions, one decimal */
  severeRate: number;
}

export interface NeighborhoodWeatherRow {
  neighborhood: string;
  incidents: number;
  severe: number;
}

export interface TemperatureBandRow {
  band: string;
  count: number;
}

export interface WeatherLiftRow {
  category: string;
  weatherCount: number;
  otherCount: number;
  lift: number;
}

export interface NeighborhoodRow {
  neighborhood: string;
  incidents: number;
  requests: number;
  score: number;
}

export interface TransitRow {
  cellLatitude: number;
  cellLongitude: number;
  stops: string;
  stopCount: number;
  total: number;
  severe: number;
}

export interface TrendRow {
  segment: string;
  source: "collisions" | "requests";
  current: number;
  previous: number;
  delta: number;
  /** null when both windows are empty */
  pct: number | null;
  currentWindow: string;
  previousWindow: string;
}

export interface RowsByKind {
  hotspots: HotspotRow;
  hotspots_meteo: HotspotRow;
  meteo_collision: ConditionRow;
  quartiers_meteo: NeighborhoodWeatherRow;
  "311_temperature": TemperatureBandRow;
  "311_types_weather": WeatherLiftRow;
  quartiers: NeighborhoodRow;
  stm: TransitRow;
  trend_incidents: TrendRow;
}

/**
 * Output of one aggregation, tagged by kind
 */
export type AggregationOutput = {
  [K in AnalysisKind]: { kind: K; rows: RowsByKind[K][] };
}[AnalysisKind];

// ============ Results ============

export type DegradationStep =
  | "weather_filter_relaxed"
  | "lift_to_bands"
  | "period_widened"
  | "default_diagnostic"
  | "ambiguity_default"
  | "custom_period_fallback"
  | "engine_error";

export interface DegradationNote {
  step: DegradationStep;
  message: string;
}

export interface ResultAttributes {
  kindRequested: AnalysisKind;
  periodRequested: string;
  periodApplied: string;
  /** Window actually read (the current window for trends) */
  window: TimeWindow | null;
  weatherFilterRequested: WeatherFilter | null;
  weatherFilterApplied: WeatherFilter | null;
  requestWeatherTag: RequestWeatherTag | null;
  trendScope: TrendScope | null;
  sourceRows: { incidents: number; requests: number };
  alignmentCaveat: string | null;
  notes: DegradationNote[];
}

export type AggregationResult = AggregationOutput & { attributes: ResultAttributes };

// ============ Answer payloads ============

export const CONFIDENCE_LEVELS = ["verified", "partial", "insufficient"] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export interface ConfidenceStatus {
  level: ConfidenceLevel;
  label: string;
  detail: string;
}

export interface RefinementOption {
  label: string;
  refinedQuestion: string;
}

export interface AmbiguityReport {
  isAmbiguous: boolean;
  reason: string;
  options: RefinementOption[];
}

export interface Caveats {
  limits: string;
  nextCheck: string;
  decision: string;
}

export interface Trace {
  kindRequested: AnalysisKind;
  kindFinal: AnalysisKind;
  periodRequested: string;
  periodFinal: string;
  window: TimeWindow | null;
  weatherFilterRequested: string | null;
  weatherFilterApplied: string | null;
  requestWeatherTag: RequestWeatherTag | null;
  trendScope: TrendScope | null;
  sourceRows: { incidents: number; requests: number };
  notes: string[];
}

export type Paraphrase =
  | { status: "ok"; text: string; provider: string; model: string }
  | { status: "unavailable"; reason: string }
  | { status: "disabled" }
  | { status: "not_requested" };

interface PayloadBase {
  question: string;
  period: string;
  message: string;
}

export interface SmalltalkPayload extends PayloadBase {
  type: "smalltalk";
}

export interface OffTopicPayload extends PayloadBase {
  type: "off_topic";
}

export interface ClarificationPayload extends PayloadBase {
  type: "clarification";
  options: RefinementOption[];
}

export interface AnalysisPayload extends PayloadBase {
  type: "analysis";
  kind: AnalysisKind;
  result: AggregationResult;
  confidence: ConfidenceStatus;
  insight: string;
  keyPoints: string[];
  caveats: Caveats;
  trace: Trace;
  paraphrase: Paraphrase;
}

export interface AmbiguousPayload extends PayloadBase {
  type: "ambiguous";
  ambiguity: AmbiguityReport;
  /** Default diagnostic shown while the user picks an option */
  provisional: AnalysisPayload;
}

export type AnswerPayload =
  | SmalltalkPayload
  | OffTopicPayload
  | ClarificationPayload
  | AnalysisPayload
  | AmbiguousPayload;
