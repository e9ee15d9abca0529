/**
 * Paraphraser
 * Optional plain-language rewording of a computed result.
 *
 * The numbers in the payload never depend on this step: a missing provider,
 * an error, a timeout or an unusable answer all leave the analysis as is and
 * only change the `paraphrase` field.
 */

import { GenerationTimeoutError, isRetryableError, wrapError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { isEmptyOutput } from "../engine/aggregations/index.js";
import { glossaryContext } from "../engine/knowledge.js";
import type { AggregationResult, Paraphrase } from "../schemas/index.js";
import type { TextGenerator } from "./generator.js";

export const SYSTEM_PROMPT =
  "Tu es un analyste mobilité pour Montréal. Tu dois répondre uniquement à partir des données " +
  "fournies ci-dessous. N'invente rien. Si une info manque, dis-le explicitement. " +
  "Réponse courte, factuelle, en français.";

const PREVIEW_ROWS = 6;
const PREVIEW_COLUMNS = 8;

/** Shorter answers are treated as truncated */
const MIN_LENGTH = 70;
/** Below this length an answer must contain sentence punctuation */
const MIN_UNPUNCTUATED_LENGTH = 140;

export interface ParaphraserOptions {
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

function csvCell(value: unknown): string {
  const text = value === null || value === undefined ? "" : String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * First rows of the result as CSV
 */
export function resultPreview(result: AggregationResult): string {
  const rows: readonly object[] = result.rows;
  const first = rows[0];
  if (!first) {
    return "(aucune ligne)";
  }
  const columns = Object.keys(first).slice(0, PREVIEW_COLUMNS);
  const lines = rows.slice(0, PREVIEW_ROWS).map((row) => {
    const entries = new Map(Object.entries(row));
    return columns.map((c) => csvCell(entries.get(c))).join(",");
  });
  return [columns.join(","), ...lines].join("\n");
}

export function buildUserPrompt(question: string, result: AggregationResult): string {
  const a = result.attributes;
  const notes = a.notes.map((n) => `- ${n.message}`).join("\n");
  return [
    `Question: ${question}`,
    `Type d'analyse: ${result.kind}`,
    `Période: ${a.periodApplied}`,
    "",
    "Contexte des données:",
    glossaryContext(question),
    "",
    `Résultats (${Math.min(result.rows.length, PREVIEW_ROWS)} premières lignes, CSV):`,
    resultPreview(result),
    ...(notes ? ["", "Ajustements appliqués:", notes] : []),
    "",
    "Rédige 2 à 4 phrases qui répondent à la question avec les chiffres ci-dessus.",
  ].join("\n");
}

/**
 * Trimmed text, or null when it looks cut off
 */
export function acceptParaphrase(text: string | null): string | null {
  const trimmed = text?.trim() ?? "";
  if (trimmed.length < MIN_LENGTH) return null;
  if (!/[.!?]/.test(trimmed) && trimmed.length < MIN_UNPUNCTUATED_LENGTH) return null;
  return trimmed;
}

export class Paraphraser {
  private log = logger.child({ component: "paraphraser" });

  constructor(
    private readonly generator: TextGenerator | null,
    private readonly options: ParaphraserOptions
  ) {}

  get enabled(): boolean {
    return this.generator !== null;
  }

  async paraphrase(question: string, result: AggregationResult): Promise<Paraphrase> {
    const generator = this.generator;
    if (!generator) {
      return { status: "disabled" };
    }
    if (isEmptyOutput(result)) {
      return { status: "unavailable", reason: "Aucune donnée à reformuler." };
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new GenerationTimeoutError(generator.provider, this.options.timeoutMs));
        controller.abort();
      }, this.options.timeoutMs);
    });

    const startedAt = Date.now();
    try {
      const text = await Promise.race([
        generator.generate({
          systemPrompt: SYSTEM_PROMPT,
          userPrompt: buildUserPrompt(question, result),
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
          signal: controller.signal,
        }),
        timeout,
      ]);
      this.log.metric("paraphrase.duration_ms", Date.now() - startedAt, { provider: generator.provider });

      const accepted = acceptParaphrase(text);
      if (!accepted) {
        return { status: "unavailable", reason: "Réponse du modèle vide ou incomplète." };
      }
      return { status: "ok", text: accepted, provider: generator.provider, model: generator.model };
    } catch (error) {
      const wrapped = wrapError(error, "Paraphrase failed");
      this.log.warn("Paraphrase unavailable", {
        provider: generator.provider,
        code: wrapped.code,
        retryable: isRetryableError(error),
        error: wrapped.message,
      });
      return { status: "unavailable", reason: wrapped.message };
    } finally {
      clearTimeout(timer);
    }
  }
}
