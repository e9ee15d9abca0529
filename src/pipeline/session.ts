/**
 * Session Context
 * Conversation state owned by the caller: passed into every engine call and
 * returned updated, never kept inside the engine.
 */

import type { AnalysisKind, AnswerPayload, RefinementOption, TimeWindow } from "../schemas/index.js";

export const MAX_HISTORY = 20;

export interface SessionTurn {
  question: string;
  type: AnswerPayload["type"];
  kind?: AnalysisKind;
  at: string;
}

/**
 * Options offered by the last answer (ambiguity or clarification)
 */
export interface PendingChoice {
  origin: "ambiguous" | "clarification";
  question: string;
  period: string;
  options: RefinementOption[];
}

export interface SessionContext {
  history: readonly SessionTurn[];
  /** Set while the user has not picked one of the offered readings */
  pendingChoice: PendingChoice | null;
  /** Last custom range that parsed, reused when a later one does not */
  lastValidCustomRange: TimeWindow | null;
}

export function createSession(): SessionContext {
  return { history: [], pendingChoice: null, lastValidCustomRange: null };
}

/**
 * Session with the answered turn appended (oldest turns dropped past MAX_HISTORY)
 */
export function recordTurn(session: SessionContext, payload: AnswerPayload): SessionContext {
  const turn: SessionTurn = {
    question: payload.question,
    type: payload.type,
    at: new Date().toISOString(),
  };
  if (payload.type === "analysis") {
    turn.kind = payload.kind;
  }
  return { ...session, history: [...session.history, turn].slice(-MAX_HISTORY) };
}
