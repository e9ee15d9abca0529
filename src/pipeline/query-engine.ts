/**
 * Query Engine - Main Orchestrator
 * Turns a free-text question and a UI period into an answer payload.
 *
 * PIPELINE STEPS:
 * ===============
 * Step 1: PERIOD
 *   - Period words in the question override the UI selection
 *   - Unreadable custom ranges fall back to the session's last valid one
 *
 * Step 2: ROUTE
 *   - smalltalk / off_topic / needs_clarification short-circuit with a message
 *   - otherwise an analysis kind from the ordered rule table
 *
 * Step 3: AMBIGUITY (kind = hotspots, unless skipped)
 *   - Vague phrasing pauses with 2-4 readings plus a default diagnostic
 *   - Offered readings (and clarification options) become the session's
 *     pending choice, resolved by chooseOption()
 *
 * Step 4: AGGREGATE + CASCADE
 *   - Aggregation for the kind, relaxed step by step while empty
 *
 * Step 5: ASSEMBLE (+ optional paraphrase in answer())
 *   - Confidence, insight, key points, caveats, trace
 *   - The provisional diagnostic of an ambiguity is paraphrased too
 *
 * CALL FLOW:
 * ==========
 * index.ts → QueryEngine.answer(question, period, { session })
 *                 ↓
 *            analyze() → Step 1 → 2 → 3 → 4 → 5 → Paraphraser → EngineReply
 */

import { randomUUID } from "crypto";
import { wrapError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { detectAmbiguity } from "../engine/ambiguity.js";
import { assembleAnalysis } from "../engine/assembler.js";
import { FallbackCascade } from "../engine/cascade.js";
import { extractWeatherFilter, requestWeatherTag, trendScope } from "../engine/filters.js";
import { DEFAULT_PERIOD, parsePeriodLabel, resolveEffectivePeriod, type Period } from "../engine/period.js";
import { CLARIFICATION_REASON, buildClarificationOptions, routeQuestion } from "../engine/router.js";
import type { Paraphraser } from "../llm/paraphraser.js";
import type {
  AggregationResult,
  AnalysisKind,
  AnalysisPayload,
  AnswerPayload,
  ClarificationPayload,
  DegradationNote,
  Paraphrase,
} from "../schemas/index.js";
import type { RecordStore } from "../store/record-store.js";
import { createSession, recordTurn, type PendingChoice, type SessionContext } from "./session.js";

export interface AnswerOptions {
  /** Run the routed kind even if the phrasing is vague */
  skipAmbiguity?: boolean;
  session?: SessionContext;
}

export interface EngineReply {
  payload: AnswerPayload;
  session: SessionContext;
}

export const MESSAGES = {
  smalltalk:
    "Bonjour ! Je peux analyser les collisions, les requêtes 311, les arrêts STM et la météo à Montréal. " +
    "Par exemple: « Top 5 intersections avec le plus de collisions sur 30 derniers jours ».",
  offTopic:
    "Je réponds uniquement aux questions de mobilité urbaine à Montréal (collisions, requêtes 311, STM, météo). " +
    "Reformulez votre question dans ce cadre.",
  ambiguityDefault: "Question ambiguë: affichage d'un diagnostic collisions par défaut en attendant votre choix.",
  engineError: "Erreur interne pendant le calcul: aucun résultat n'a pu être produit.",
  nothingPending: "Aucune option en attente: posez une nouvelle question.",
} as const;

// ============================================================
// QUERY ENGINE CLASS
// ============================================================
export class QueryEngine {
  private log = logger.child({ component: "query-engine" });
  private cascade: FallbackCascade;

  constructor(
    store: RecordStore,
    private readonly paraphraser: Paraphraser | null = null
  ) {
    this.cascade = new FallbackCascade(store);
  }

  /**
   * Full answer, including the paraphrase when a provider is configured
   */
  async answer(question: string, periodLabel: string, options: AnswerOptions = {}): Promise<EngineReply> {
    const reply = this.analyze(question, periodLabel, options);
    const { payload } = reply;

    switch (payload.type) {
      case "analysis":
        return { ...reply, payload: await this.withParaphrase(question, payload) };
      case "ambiguous":
        return {
          ...reply,
          payload: { ...payload, provisional: await this.withParaphrase(question, payload.provisional) },
        };
      default:
        return reply;
    }
  }

  /**
   * Deterministic part of answer(): no network, no paraphrase
   */
  analyze(question: string, periodLabel: string, options: AnswerOptions = {}): EngineReply {
    const correlationId = randomUUID().slice(0, 8);
    const log = this.log.child({ correlationId });
    const startedAt = Date.now();
    let session = options.session ?? createSession();

    // --------------------------------------------------------
    // STEP 1: Effective period
    // --------------------------------------------------------
    const resolution = resolveEffectivePeriod(question, periodLabel, session.lastValidCustomRange);
    const period = resolution.period;
    if (period.type === "custom" && resolution.note === null) {
      session = { ...session, lastValidCustomRange: period.range };
    }
    const notes: DegradationNote[] = resolution.note ? [resolution.note] : [];

    // --------------------------------------------------------
    // STEP 2: Route
    // --------------------------------------------------------
    const route = routeQuestion(question);
    log.info("Question routed", { route, period: period.label });

    let payload: AnswerPayload;
    let pendingChoice: PendingChoice | null = null;
    switch (route) {
      case "smalltalk":
        payload = { type: "smalltalk", question, period: period.label, message: MESSAGES.smalltalk };
        break;

      case "off_topic":
        payload = { type: "off_topic", question, period: period.label, message: MESSAGES.offTopic };
        break;

      case "needs_clarification": {
        const clarification: ClarificationPayload = {
          type: "clarification",
          question,
          period: period.label,
          message: CLARIFICATION_REASON,
          options: buildClarificationOptions(question, period.label),
        };
        payload = clarification;
        pendingChoice = { origin: "clarification", question, period: periodLabel, options: clarification.options };
        break;
      }

      default: {
        // --------------------------------------------------------
        // STEP 3: Ambiguity
        // --------------------------------------------------------
        const ambiguity =
          route === "hotspots" && !options.skipAmbiguity ? detectAmbiguity(question) : null;

        if (ambiguity?.isAmbiguous) {
          const provisional = this.runAnalysis(question, route, period, [
            ...notes,
            { step: "ambiguity_default", message: MESSAGES.ambiguityDefault },
          ]);
          payload = {
            type: "ambiguous",
            question,
            period: period.label,
            message: ambiguity.reason,
            ambiguity,
            provisional,
          };
          pendingChoice = { origin: "ambiguous", question, period: periodLabel, options: ambiguity.options };
          log.info("Ambiguous question, waiting for a choice", { options: ambiguity.options.length });
          break;
        }

        // --------------------------------------------------------
        // STEP 4-5: Aggregate, cascade, assemble
        // --------------------------------------------------------
        payload = this.runAnalysis(question, route, period, notes);
      }
    }
    session = { ...session, pendingChoice };

    log.metric("engine.duration_ms", Date.now() - startedAt, { route });
    return { payload, session: recordTurn(session, payload) };
  }

  /**
   * Resolve the pending choice with the option the user picked (0-based).
   *
   * Nothing pending gives an option-less clarification; an index out of
   * range offers the same options again. Neither throws.
   */
  async chooseOption(session: SessionContext, optionIndex: number, periodLabel?: string): Promise<EngineReply> {
    const pending = session.pendingChoice;
    if (!pending) {
      this.log.warn("Option chosen with nothing pending", { optionIndex });
      const period = parsePeriodLabel(periodLabel ?? DEFAULT_PERIOD, session.lastValidCustomRange).period;
      const payload: ClarificationPayload = {
        type: "clarification",
        question: String(optionIndex + 1),
        period: period.label,
        message: MESSAGES.nothingPending,
        options: [],
      };
      return { payload, session: recordTurn(session, payload) };
    }

    const option = pending.options[optionIndex];
    if (!option) {
      this.log.warn("Unknown option, offering the choices again", {
        optionIndex,
        available: pending.options.length,
      });
      const reply = await this.answer(pending.question, periodLabel ?? pending.period, { session });
      const notice = `Option ${optionIndex + 1} inexistante: choisissez un numéro entre 1 et ${pending.options.length}.`;
      return { ...reply, payload: { ...reply.payload, message: `${notice} ${reply.payload.message}` } };
    }

    return this.answer(option.refinedQuestion, periodLabel ?? pending.period, {
      skipAmbiguity: true,
      session: { ...session, pendingChoice: null },
    });
  }

  private async withParaphrase(question: string, analysis: AnalysisPayload): Promise<AnalysisPayload> {
    const paraphrase: Paraphrase = this.paraphraser
      ? await this.paraphraser.paraphrase(question, analysis.result)
      : { status: "disabled" };
    return { ...analysis, paraphrase };
  }

  private runAnalysis(
    question: string,
    kind: AnalysisKind,
    period: Period,
    notes: DegradationNote[]
  ): AnalysisPayload {
    try {
      const result = this.cascade.run(
        {
          kind,
          period,
          weatherFilter: extractWeatherFilter(question),
          requestWeatherTag: requestWeatherTag(question),
          trendScope: trendScope(question),
        },
        notes
      );
      return assembleAnalysis(question, result);
    } catch (error) {
      const wrapped = wrapError(error, "Aggregation failed");
      this.log.error("Analysis failed", wrapped, { kind, period: period.label });
      return assembleAnalysis(
        question,
        emptyResult(kind, period, [...notes, { step: "engine_error", message: MESSAGES.engineError }])
      );
    }
  }
}

/**
 * Rowless result standing in for a computation that threw
 */
function emptyResult(kind: AnalysisKind, period: Period, notes: DegradationNote[]): AggregationResult {
  return {
    kind: "hotspots",
    rows: [],
    attributes: {
      kindRequested: kind,
      periodRequested: period.label,
      periodApplied: period.label,
      window: null,
      weatherFilterRequested: null,
      weatherFilterApplied: null,
      requestWeatherTag: null,
      trendScope: null,
      sourceRows: { incidents: 0, requests: 0 },
      alignmentCaveat: null,
      notes,
    },
  };
}
