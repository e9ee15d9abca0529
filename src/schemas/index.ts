/**
 * Schema Exports
 * Re-exports all schemas and types
 */

// Source records
export {
  IsoDateSchema,
  IncidentRecordSchema,
  ServiceRequestRecordSchema,
  TransitStopRecordSchema,
  WeatherRecordSchema,
  SURFACE_CODES,
  SEVERE_THRESHOLD,
  isValidIsoDate,
  incidentSeverity,
  weatherCondition,
  type IncidentInput,
  type IncidentRecord,
  type ServiceRequestInput,
  type ServiceRequestRecord,
  type TransitStopInput,
  type TransitStopRecord,
  type WeatherInput,
  type WeatherRecord,
} from "./records.js";

// Analysis kinds, results and payloads
export {
  PERIOD_LABELS,
  PeriodLabelSchema,
  ANALYSIS_KINDS,
  AnalysisKindSchema,
  RequestWeatherTagSchema,
  CONFIDENCE_LEVELS,
  type PeriodLabel,
  type TimeWindow,
  type AnalysisKind,
  type ControlState,
  type Route,
  type RequestWeatherTag,
  type TrendScope,
  type WeatherFilter,
  type HotspotRow,
  type ConditionRow,
  type NeighborhoodWeatherRow,
  type TemperatureBandRow,
  type WeatherLiftRow,
  type NeighborhoodRow,
  type TransitRow,
  type TrendRow,
  type RowsByKind,
  type AggregationOutput,
  type DegradationStep,
  type DegradationNote,
  type ResultAttributes,
  type AggregationResult,
  type ConfidenceLevel,
  type ConfidenceStatus,
  type RefinementOption,
  type AmbiguityReport,
  type Caveats,
  type Trace,
  type Paraphrase,
  type SmalltalkPayload,
  type OffTopicPayload,
  type ClarificationPayload,
  type AnalysisPayload,
  type AmbiguousPayload,
  type AnswerPayload,
} from "./analysis.js";
