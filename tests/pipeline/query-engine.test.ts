import { describe, it, expect } from "vitest";
import { CLARIFICATION_REASON } from "../../src/engine/router.js";
import { Paraphraser } from "../../src/llm/paraphraser.js";
import { MESSAGES, QueryEngine } from "../../src/pipeline/query-engine.js";
import { MAX_HISTORY, createSession, type SessionContext } from "../../src/pipeline/session.js";
import type { AnalysisPayload, AnswerPayload } from "../../src/schemas/index.js";
import { FakeGenerator, LONG_ANSWER } from "../helpers/fake-generator.js";
import { incident, request, storeOf, times } from "../helpers/factories.js";

const PERIOD = "30 derniers jours";
const TOP = "Top 5 intersections avec le plus de collisions";
const PEEL = "Rue Peel / Rue Sainte-Catherine";

const store = () =>
  storeOf({
    incidents: [incident({ severeInjuries: 1 }), ...times(2, () => incident())],
    requests: times(3, () => request()),
  });

function asAnalysis(payload: AnswerPayload): AnalysisPayload {
  if (payload.type !== "analysis") {
    throw new Error(`expected an analysis, got ${payload.type}`);
  }
  return payload;
}

describe("QueryEngine control states", () => {
  const engine = new QueryEngine(store());

  it("answers greetings", () => {
    expect(engine.analyze("Bonjour", PERIOD).payload).toEqual({
      type: "smalltalk",
      question: "Bonjour",
      period: PERIOD,
      message: MESSAGES.smalltalk,
    });
  });

  it("declines off-topic questions", () => {
    const { payload } = engine.analyze("Quelle est la capitale de la France ?", PERIOD);
    expect(payload.type).toBe("off_topic");
    expect(payload.message).toBe(MESSAGES.offTopic);
  });

  it("offers options when the angle is missing", () => {
    const { payload } = engine.analyze("Parle-moi des collisions", PERIOD);
    if (payload.type !== "clarification") throw new Error(payload.type);
    expect(payload.message).toBe(CLARIFICATION_REASON);
    expect(payload.options.map((o) => o.refinedQuestion)).toEqual([
      "Les collisions augmentent-elles sur 30 derniers jours ?",
      "Top 5 intersections avec le plus de collisions sur 30 derniers jours",
      "Quels quartiers ont le plus de collisions sur 30 derniers jours ?",
    ]);
  });
});

describe("QueryEngine analyses", () => {
  it("ranks hotspots without a paraphrase in analyze()", () => {
    const { payload, session } = new QueryEngine(store()).analyze(TOP, PERIOD);
    const analysis = asAnalysis(payload);
    expect(analysis.kind).toBe("hotspots");
    expect(analysis.result.rows[0]).toEqual({ location: PEEL, total: 3, severe: 1, meanHour: 12 });
    expect(analysis.paraphrase).toEqual({ status: "not_requested" });
    expect(session.history[0]).toMatchObject({ question: TOP, type: "analysis", kind: "hotspots" });
  });

  it("marks the paraphrase disabled without a provider", async () => {
    const { payload } = await new QueryEngine(store()).answer(TOP, PERIOD);
    expect(asAnalysis(payload).paraphrase).toEqual({ status: "disabled" });
  });

  it("adds the paraphrase when a provider answers", async () => {
    const generator = new FakeGenerator(async () => LONG_ANSWER);
    const paraphraser = new Paraphraser(generator, { timeoutMs: 1000, maxTokens: 420, temperature: 0.1 });
    const { payload } = await new QueryEngine(store(), paraphraser).answer(TOP, PERIOD);
    expect(asAnalysis(payload).paraphrase).toEqual({
      status: "ok",
      text: LONG_ANSWER,
      provider: "fake",
      model: "fake-1",
    });
  });

  it("does not paraphrase control states", async () => {
    const generator = new FakeGenerator(async () => LONG_ANSWER);
    const paraphraser = new Paraphraser(generator, { timeoutMs: 1000, maxTokens: 420, temperature: 0.1 });
    await new QueryEngine(store(), paraphraser).answer("Bonjour", PERIOD);
    expect(generator.requests).toHaveLength(0);
  });

  it("reports an empty current window against a busy previous one", () => {
    const snowy = storeOf({
      incidents: [
        ...times(12, () => incident({ date: "2024-03-20", condition: "Enneigée" })),
        ...times(3, () => incident({ date: "2024-03-31", condition: "Sèche" })),
      ],
    });
    const { payload } = new QueryEngine(snowy).analyze(
      "Les collisions augmentent-elles sur 7 derniers jours quand il neige ?",
      PERIOD
    );
    const analysis = asAnalysis(payload);
    expect(analysis.kind).toBe("trend_incidents");
    expect(analysis.period).toBe("7 derniers jours");
    expect(analysis.result.rows).toEqual([
      {
        segment: "Collisions (total)",
        source: "collisions",
        current: 0,
        previous: 12,
        delta: -12,
        pct: -100,
        currentWindow: "2024-03-25 -> 2024-03-31",
        previousWindow: "2024-03-18 -> 2024-03-24",
      },
    ]);
    expect(analysis.confidence.level).toBe("partial");
  });

  it("compares 311 requests when a two-source trend has no collisions", () => {
    const requestsOnly = storeOf({
      requests: [...times(6, () => request({ date: "2024-03-31" })), ...times(4, () => request({ date: "2024-03-20" }))],
    });
    const { payload } = new QueryEngine(requestsOnly).analyze("Tendance des collisions et requêtes 311 sur 7 jours", PERIOD);
    const analysis = asAnalysis(payload);

    expect(analysis.kind).toBe("trend_incidents");
    expect(analysis.result.attributes.trendScope).toBe("both");
    expect(analysis.result.rows.map((r) => [r.segment, r.current, r.previous])).toEqual([
      ["Collisions (total)", 0, 0],
      ["Requêtes 311 (total)", 6, 4],
      ["Quartier 311 en hausse: Ville-Marie", 6, 4],
    ]);
    expect(analysis.insight).toBe("Comparaison période courante vs précédente: requêtes 311 +2 (+50.0%).");
    expect(analysis.confidence.level).toBe("partial");
  });

  it("turns a failing computation into an insufficient analysis", () => {
    const broken = store();
    Object.defineProperty(broken, "incidents", {
      get() {
        throw new Error("disk read failed");
      },
    });
    const analysis = asAnalysis(new QueryEngine(broken).analyze(TOP, PERIOD).payload);
    expect(analysis.confidence.level).toBe("insufficient");
    expect(analysis.trace.notes).toEqual([MESSAGES.engineError]);
  });
});

describe("QueryEngine ambiguity", () => {
  const VAGUE = "Où ça coince ?";

  it("pauses on vague phrasing with a provisional diagnostic", () => {
    const { payload, session } = new QueryEngine(store()).analyze(VAGUE, PERIOD);
    if (payload.type !== "ambiguous") throw new Error(payload.type);

    expect(payload.ambiguity.options).toHaveLength(3);
    expect(payload.provisional.kind).toBe("hotspots");
    expect(payload.provisional.trace.notes).toEqual([MESSAGES.ambiguityDefault]);
    expect(payload.provisional.confidence.level).toBe("partial");
    expect(session.pendingChoice).toMatchObject({ origin: "ambiguous", question: VAGUE, period: PERIOD });
  });

  it("runs the chosen reading and clears the pending choice", async () => {
    const engine = new QueryEngine(store());
    const first = engine.analyze(VAGUE, PERIOD);
    const reply = await engine.chooseOption(first.session, 2);

    const analysis = asAnalysis(reply.payload);
    expect(analysis.question).toBe("Analyse orientée requêtes 311: Où ça coince ?");
    expect(analysis.kind).toBe("311_temperature");
    expect(reply.session.pendingChoice).toBeNull();
    expect(reply.session.history.map((t) => t.type)).toEqual(["ambiguous", "analysis"]);
  });

  it("answers a choice with nothing pending by asking for a question", async () => {
    const { payload, session } = await new QueryEngine(store()).chooseOption(createSession(), 0);
    expect(payload).toEqual({
      type: "clarification",
      question: "1",
      period: PERIOD,
      message: MESSAGES.nothingPending,
      options: [],
    });
    expect(session.pendingChoice).toBeNull();
  });

  it("offers the same readings again for an option that does not exist", async () => {
    const engine = new QueryEngine(store());
    const { session } = engine.analyze(VAGUE, PERIOD);
    const reply = await engine.chooseOption(session, 7);

    if (reply.payload.type !== "ambiguous") throw new Error(reply.payload.type);
    expect(reply.payload.message).toBe(
      "Option 8 inexistante: choisissez un numéro entre 1 et 3. " +
        "L'expression 'ça coince' peut désigner plusieurs phénomènes."
    );
    expect(reply.payload.ambiguity.options).toHaveLength(3);
    expect(reply.session.pendingChoice).toMatchObject({ origin: "ambiguous", question: VAGUE });
  });

  it("paraphrases the provisional diagnostic", async () => {
    const generator = new FakeGenerator(async () => LONG_ANSWER);
    const paraphraser = new Paraphraser(generator, { timeoutMs: 1000, maxTokens: 420, temperature: 0.1 });
    const { payload } = await new QueryEngine(store(), paraphraser).answer(VAGUE, PERIOD);

    if (payload.type !== "ambiguous") throw new Error(payload.type);
    expect(payload.provisional.paraphrase).toEqual({
      status: "ok",
      text: LONG_ANSWER,
      provider: "fake",
      model: "fake-1",
    });
  });

  it("can be skipped", () => {
    const { payload, session } = new QueryEngine(store()).analyze(VAGUE, PERIOD, { skipAmbiguity: true });
    expect(asAnalysis(payload).kind).toBe("hotspots");
    expect(session.pendingChoice).toBeNull();
  });
});

describe("QueryEngine clarification choices", () => {
  it("keeps the clarification options pending", () => {
    const { session } = new QueryEngine(store()).analyze("Parle-moi des collisions", PERIOD);
    expect(session.pendingChoice?.origin).toBe("clarification");
    expect(session.pendingChoice?.options).toHaveLength(3);
  });

  it("runs the picked clarification option", async () => {
    const engine = new QueryEngine(store());
    const { session } = engine.analyze("Parle-moi des collisions", PERIOD);
    const reply = await engine.chooseOption(session, 1);

    const analysis = asAnalysis(reply.payload);
    expect(analysis.question).toBe("Top 5 intersections avec le plus de collisions sur 30 derniers jours");
    expect(analysis.kind).toBe("hotspots");
    expect(reply.session.pendingChoice).toBeNull();
  });

  it("drops the pending options once another question is answered", () => {
    const engine = new QueryEngine(store());
    const first = engine.analyze("Parle-moi des collisions", PERIOD);
    const second = engine.analyze("Bonjour", PERIOD, { session: first.session });
    expect(second.session.pendingChoice).toBeNull();
  });
});

describe("QueryEngine session", () => {
  it("remembers the last valid custom range", () => {
    const engine = new QueryEngine(store());
    const first = engine.analyze(TOP, "Personnalisée : 2024-03-01 -> 2024-03-31");
    expect(first.session.lastValidCustomRange).toEqual({ start: "2024-03-01", end: "2024-03-31" });

    const second = engine.analyze(TOP, "Personnalisée : hier -> aujourd'hui", { session: first.session });
    const analysis = asAnalysis(second.payload);
    expect(analysis.period).toBe("Personnalisée : 2024-03-01 -> 2024-03-31");
    expect(analysis.result.attributes.notes.map((n) => n.step)).toEqual(["custom_period_fallback"]);
  });

  it("falls back to the default bucket without a remembered range", () => {
    const { payload, session } = new QueryEngine(store()).analyze(TOP, "Personnalisée : hier -> aujourd'hui");
    expect(payload.period).toBe(PERIOD);
    expect(session.lastValidCustomRange).toBeNull();
  });

  it("keeps the most recent turns only", () => {
    const engine = new QueryEngine(store());
    let session: SessionContext = createSession();
    for (let i = 0; i < 25; i++) {
      session = engine.analyze(`Bonjour ${i}`, PERIOD, { session }).session;
    }
    expect(session.history).toHaveLength(MAX_HISTORY);
    expect(session.history[0]?.question).toBe("Bonjour 5");
    expect(session.history[MAX_HISTORY - 1]?.question).toBe("Bonjour 24");
  });
});
