/**
 * Response Assembler
 * Packages an aggregation result into the analysis payload.
 */

import type { AggregationResult, AnalysisPayload, Paraphrase, Trace } from "../schemas/index.js";
import { assessConfidence } from "./confidence.js";
import { describeWeatherFilter } from "./filters.js";
import { CAVEATS, keyPoints, leadInsight } from "./insight.js";

export function buildTrace(result: AggregationResult): Trace {
  const a = result.attributes;
  return {
    kindRequested: a.kindRequested,
    kindFinal: result.kind,
    periodRequested: a.periodRequested,
    periodFinal: a.periodApplied,
    window: a.window,
    weatherFilterRequested: describeWeatherFilter(a.weatherFilterRequested),
    weatherFilterApplied: describeWeatherFilter(a.weatherFilterApplied),
    requestWeatherTag: a.requestWeatherTag,
    trendScope: a.trendScope,
    sourceRows: a.sourceRows,
    notes: [...a.notes.map((n) => n.message), ...(a.alignmentCaveat ? [a.alignmentCaveat] : [])],
  };
}

export function assembleAnalysis(
  question: string,
  result: AggregationResult,
  paraphrase: Paraphrase = { status: "not_requested" }
): AnalysisPayload {
  const insight = leadInsight(result);
  return {
    type: "analysis",
    question,
    period: result.attributes.periodRequested,
    message: insight,
    kind: result.kind,
    result,
    confidence: assessConfidence(result),
    insight,
    keyPoints: keyPoints(result),
    caveats: CAVEATS[result.kind],
    trace: buildTrace(result),
    paraphrase,
  };
}
