#!/usr/bin/env node
/**
 * Mobility CLI - Entry Point
 * Ask analytical questions about Montréal mobility data
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Validate configuration (getConfig)
 * 4. Load the record collections from DATA_DIR
 * 5. Branch based on command:
 *    - "ask"  → one question, one answer
 *    - "chat" → interactive loop keeping the session between questions
 * 6. Display the payload (text or JSON)
 *
 * USAGE:
 *   npm run ask -- "Top 5 intersections avec le plus de collisions"
 *   npx tsx src/index.ts ask "où ça coince ?" --choose 1
 *   npx tsx src/index.ts chat --period "3 derniers mois"
 */

// ============================================================
// STEP 1: Load environment variables from .env file
// ============================================================
import "dotenv/config";

import { createInterface } from "readline/promises";
import { getConfig, type Config } from "./core/config.js";
import { isMobilityError } from "./core/errors.js";
import { logger } from "./core/logger.js";
import { formatWindow } from "./engine/period.js";
import { Paraphraser, createTextGenerator } from "./llm/index.js";
import { QueryEngine, type EngineReply } from "./pipeline/query-engine.js";
import { createSession, type SessionContext } from "./pipeline/session.js";
import type { AnalysisPayload, AnswerPayload } from "./schemas/index.js";
import { loadRecordStore } from "./store/record-store.js";

interface CliOptions {
  period?: string;
  dataDir?: string;
  skipAmbiguity: boolean;
  choose?: number;
  json: boolean;
  verbose: boolean;
}

/**
 * Parse command line arguments
 */
function parseArgs(): { command: string; question: string; options: CliOptions } {
  const args = process.argv.slice(2);

  const options: CliOptions = {
    skipAmbiguity: false,
    json: false,
    verbose: false,
  };
  const result = { command: "ask", question: "", options };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (i === 0 && (arg === "ask" || arg === "chat" || arg === "help")) {
      result.command = arg;
    } else if (arg === "--period" || arg === "-p") {
      result.options.period = args[++i];
    } else if (arg === "--data-dir" || arg === "-d") {
      result.options.dataDir = args[++i];
    } else if (arg === "--choose" || arg === "-c") {
      const choice = parseInt(args[++i] ?? "", 10);
      if (Number.isInteger(choice) && choice >= 1) {
        result.options.choose = choice;
      }
    } else if (arg === "--skip-ambiguity") {
      result.options.skipAmbiguity = true;
    } else if (arg === "--json") {
      result.options.json = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else if (!arg.startsWith("-") && !result.question) {
      result.question = arg;
    }
  }

  return result;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Mobility - Montréal mobility query engine

USAGE:
  npm run ask -- "<question>" [options]
  npx tsx src/index.ts [command] [options]

COMMANDS:
  ask <question>      Answer one question (default)
  chat                Interactive session (type "1", "2"... to pick one of the
                      options the last answer offered)
  help                Show this help message

OPTIONS:
  -p, --period <label>    7 derniers jours | 30 derniers jours | 3 derniers mois |
                          12 derniers mois | "Personnalisée : YYYY-MM-DD -> YYYY-MM-DD"
  -d, --data-dir <path>   Directory holding collisions.json, requests.json,
                          transit-stops.json, weather.json (default: DATA_DIR)
  -c, --choose <n>        Pick option n (1-based) of an ambiguous or unclear question
      --skip-ambiguity    Run the default analysis without asking
      --json              Print the raw payload as JSON
  -v, --verbose           Enable debug logging

EXAMPLES:
  npm run ask -- "Top 5 intersections avec le plus de collisions"
  npm run ask -- "Hotspots collisions quand il neige" --period "3 derniers mois"
  npm run ask -- "Quels types de requêtes 311 explosent quand il neige ?"
  npm run ask -- "Les collisions sont-elles en hausse ?" --json
`);
}

// ============================================================
// DISPLAY
// ============================================================
function displayAnalysis(payload: AnalysisPayload): void {
  console.log(`\n${payload.insight}`);
  console.log(`\nConfiance: ${payload.confidence.label} - ${payload.confidence.detail}`);

  console.log("\n--- Points clés ---");
  for (const point of payload.keyPoints) {
    console.log(`  • ${point}`);
  }

  if (payload.paraphrase.status === "ok") {
    console.log(`\n--- Résumé (${payload.paraphrase.provider}) ---`);
    console.log(`  ${payload.paraphrase.text}`);
  } else if (payload.paraphrase.status === "unavailable") {
    console.log(`\n(Résumé indisponible: ${payload.paraphrase.reason})`);
  }

  console.log("\n--- Limites ---");
  console.log(`  ${payload.caveats.limits}`);
  console.log(`  À vérifier: ${payload.caveats.nextCheck}`);
  console.log(`  Décision: ${payload.caveats.decision}`);

  const t = payload.trace;
  console.log("\n--- Trace ---");
  console.log(`  Analyse:  ${t.kindRequested}${t.kindFinal !== t.kindRequested ? ` → ${t.kindFinal}` : ""}`);
  console.log(`  Période:  ${t.periodRequested}${t.periodFinal !== t.periodRequested ? ` → ${t.periodFinal}` : ""}`);
  console.log(`  Fenêtre:  ${formatWindow(t.window)}`);
  console.log(`  Lignes:   ${t.sourceRows.incidents} collisions, ${t.sourceRows.requests} requêtes 311`);
  for (const note of t.notes) {
    console.log(`  Note:     ${note}`);
  }
}

function displayPayload(payload: AnswerPayload): void {
  console.log("\n" + "=".repeat(60));

  switch (payload.type) {
    case "smalltalk":
    case "off_topic":
      console.log(payload.message);
      break;

    case "clarification":
      console.log(payload.message);
      payload.options.forEach((option, i) => console.log(`  ${i + 1}. ${option.label}`));
      break;

    case "ambiguous":
      console.log(payload.message);
      payload.ambiguity.options.forEach((option, i) => console.log(`  ${i + 1}. ${option.label}`));
      console.log("\nDiagnostic par défaut en attendant votre choix:");
      displayAnalysis(payload.provisional);
      break;

    case "analysis":
      displayAnalysis(payload);
      break;
  }

  console.log("=".repeat(60));
}

function display(reply: EngineReply, options: CliOptions): void {
  if (options.json) {
    console.log(JSON.stringify(reply.payload, null, 2));
  } else {
    displayPayload(reply.payload);
  }
}

async function buildEngine(config: Config, options: CliOptions): Promise<QueryEngine> {
  const store = await loadRecordStore(options.dataDir ?? config.defaults.dataDir);
  if (store.isEmpty) {
    logger.warn("No records loaded: every analysis will come back empty");
  }

  const paraphraser = config.llm
    ? new Paraphraser(createTextGenerator(config.llm), {
        timeoutMs: config.llm.timeoutMs,
        maxTokens: config.llm.maxTokens,
        temperature: config.llm.temperature,
      })
    : null;

  return new QueryEngine(store, paraphraser);
}

// ============================================================
// COMMANDS
// ============================================================
async function ask(engine: QueryEngine, question: string, period: string, options: CliOptions): Promise<void> {
  const reply = await engine.answer(question, period, { skipAmbiguity: options.skipAmbiguity });

  if (options.choose !== undefined && reply.session.pendingChoice) {
    display(await engine.chooseOption(reply.session, options.choose - 1, period), options);
    return;
  }
  display(reply, options);
}

async function chat(engine: QueryEngine, period: string, options: CliOptions): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let session: SessionContext = createSession();

  console.log(`Période: ${period}. Tapez une question, le numéro d'une option proposée, ou "exit".`);
  try {
    for (;;) {
      const line = (await rl.question("\n> ")).trim();
      if (line === "exit" || line === "quit") break;
      if (!line) continue;

      const choice = /^\d+$/.test(line) ? parseInt(line, 10) - 1 : null;
      const reply =
        choice !== null && session.pendingChoice
          ? await engine.chooseOption(session, choice, period)
          : await engine.answer(line, period, { session, skipAmbiguity: options.skipAmbiguity });

      session = reply.session;
      display(reply, options);
    }
  } finally {
    rl.close();
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================
async function main(): Promise<void> {
  // --------------------------------------------------------
  // STEP 2: Parse command line arguments
  // --------------------------------------------------------
  const { command, question, options } = parseArgs();

  if (command === "help" || (command === "ask" && !question)) {
    printHelp();
    process.exit(command === "help" ? 0 : 1);
  }

  // --------------------------------------------------------
  // STEP 3: Validate configuration
  // No variable is required; a provider without its key is an error
  // --------------------------------------------------------
  let config: Config;
  try {
    config = getConfig();
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    console.error("\nSet LLM_PROVIDER=none, or provide the matching key:");
    console.error("  GEMINI_API_KEY | ANTHROPIC_API_KEY | OPENAI_API_KEY");
    process.exit(1);
  }

  logger.setLevel(options.verbose ? "debug" : config.defaults.logLevel);
  const period = options.period ?? config.defaults.period;

  // --------------------------------------------------------
  // STEP 4-6: Load records, answer, display
  // --------------------------------------------------------
  try {
    const engine = await buildEngine(config, options);
    if (command === "chat") {
      await chat(engine, period, options);
    } else {
      await ask(engine, question, period, options);
    }
  } catch (error) {
    const code = isMobilityError(error) ? ` [${error.code}]` : "";
    console.error(`\nQuery failed${code}:`, error instanceof Error ? error.message : error);
    if (options.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

// Run
main().catch(console.error);
