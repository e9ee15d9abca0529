/**
 * Public entry point for embedding the engine
 */

export { QueryEngine, MESSAGES, type AnswerOptions, type EngineReply } from "./query-engine.js";
export { createSession, recordTurn, MAX_HISTORY, type SessionContext, type SessionTurn, type PendingChoice } from "./session.js";
export { RecordStore, loadRecordStore, DATASET_FILES, type RawCollections } from "../store/record-store.js";
export { Paraphraser, createTextGenerator, type TextGenerator, type GenerationRequest } from "../llm/index.js";
export { getConfig, loadConfig, resetConfig, type Config, type LlmSettings } from "../core/config.js";
export { logger, type LogLevel } from "../core/logger.js";
export * from "../core/errors.js";
export type * from "../schemas/analysis.js";
