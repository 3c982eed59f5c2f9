import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { IRGraph } from "../src/ir/graph.js";
import { createAction, createIntent } from "../src/ir/nodes.js";
import { graphToSnapshot, type GraphSnapshot } from "../src/ir/snapshot.js";
import { CandidateRouter, type RoutedResult } from "../src/router/candidateRouter.js";
import { scoreGraphStructure } from "../src/router/stubScorer.js";
import { Simulator } from "../src/sim/engine.js";
import { createEmptyMetrics, type ScenarioParameters, type SimulationRun } from "../src/sim/run.js";
import { buildLoginGraph, FIXED_INSTANT, fixedClock, ScriptedRandom, sequentialIds } from "./helpers/graphs.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const SCORES: Record<string, { score: number; failureModes: string[] }> = {
  "g-a": { score: 0.6, failureModes: [] },
  "g-b": { score: 0.9, failureModes: [] },
  "g-c": { score: 0.3, failureModes: ["Action a2 failed: Disk full", "Dependency deadlock detected", "third"] },
};

function scriptedRun(snapshot: GraphSnapshot, _scenario?: ScenarioParameters): SimulationRun {
  const scripted = SCORES[snapshot.graph_id] ?? { score: 0, failureModes: [] };
  return {
    runId: `run-${snapshot.graph_id}`,
    graphId: snapshot.graph_id,
    mode: "standard",
    failureProbability: 0.1,
    status: "completed",
    steps: [],
    metrics: createEmptyMetrics(),
    failureModes: [...scripted.failureModes],
    score: scripted.score,
    startedAt: FIXED_INSTANT,
  };
}

function candidates(): IRGraph[] {
  return ["g-a", "g-b", "g-c"].map((id) => buildLoginGraph({ id }));
}

function scriptedRouter(logger = new RecordingLogger(), maxCandidates = 5) {
  const simulate = sinon.spy(scriptedRun);
  const router = new CandidateRouter({
    engine: { simulate },
    maxCandidates,
    logger,
    now: fixedClock(),
    idFactory: sequentialIds("req"),
  });
  return { router, simulate, logger };
}

describe("router candidate router", () => {
  it("ranks candidates best first with a reason for each", async () => {
    const { router, simulate } = scriptedRouter();
    const ranked = await router.simulateCandidates(candidates(), { parameters: { risk_multiplier: 2 } });

    expect(ranked.map((entry) => [entry.graph.id, entry.rank, entry.selectionReason])).to.deep.equal([
      ["g-b", 1, "Highest score: 0.90"],
      ["g-a", 2, "Score: 0.60"],
      ["g-c", 3, "Has failure modes: Action a2 failed: Disk full, Dependency deadlock detected"],
    ]);
    expect(simulate.callCount).to.equal(3);
    expect(simulate.firstCall.args[1]).to.deep.equal({ risk_multiplier: 2 });
    expect(router.getPendingCount()).to.equal(0);
  });

  it("selects the best candidate only when it clears the bar", async () => {
    const { router, logger } = scriptedRouter();

    const chosen = await router.selectBest(candidates(), 0.7);
    expect(chosen?.id).to.equal("g-b");

    expect(await router.selectBest(candidates(), 0.95)).to.equal(null);
    expect(logger.entries.at(-1)).to.deep.equal({
      level: "warn",
      message: "no_candidate_selected",
      payload: { min_score: 0.95 },
    });
  });

  it("drops candidates beyond the configured maximum", async () => {
    const { router, simulate, logger } = scriptedRouter(new RecordingLogger(), 2);
    const ranked = await router.simulateCandidates(candidates());

    expect(ranked.map((entry) => entry.graph.id)).to.deep.equal(["g-b", "g-a"]);
    expect(simulate.callCount).to.equal(2);
    expect(logger.entries[0]).to.deep.equal({
      level: "warn",
      message: "candidates_truncated",
      payload: { received: 3, kept: 2 },
    });
  });

  it("turns engine faults into zero-scored results", async () => {
    const logger = new RecordingLogger();
    const router = new CandidateRouter({
      engine: {
        simulate: () => {
          throw new Error("engine offline");
        },
      },
      logger,
      now: fixedClock(),
      idFactory: sequentialIds("req"),
    });

    const result = await router.route(router.createRequest(buildLoginGraph()));
    expect(result).to.deep.equal({
      requestId: "req-1",
      graphId: "graph-login",
      success: false,
      score: 0,
      metrics: {},
      failureModes: ["engine offline"],
      executionTimeMs: 0,
      completedAt: FIXED_INSTANT,
    });
    expect(logger.messages("error")).to.deep.equal(["simulation_route_failed"]);
  });

  it("gives up on engines that never answer", async () => {
    const router = new CandidateRouter({
      engine: { simulate: () => new Promise<SimulationRun>(() => undefined) },
      idFactory: sequentialIds("req"),
    });

    const result = await router.route(router.createRequest(buildLoginGraph(), { timeoutMs: 5 }));
    expect(result.success).to.equal(false);
    expect(result.failureModes).to.deep.equal(["Simulation timed out after 5ms"]);
  });

  it("summarises real simulator runs", async () => {
    const simulator = new Simulator(new ScriptedRandom([]), {}, { idFactory: sequentialIds("run"), now: fixedClock() });
    const router = new CandidateRouter({ engine: simulator, now: fixedClock() });

    const result = await router.route(router.createRequest(buildLoginGraph()));
    expect(result.success).to.equal(true);
    expect(result.score).to.equal(1);
    expect(result.metrics).to.deep.equal({
      run_id: "run-1",
      mode: "standard",
      total_steps: 3,
      successful_steps: 3,
      failed_steps: 0,
      total_duration_ms: 7500,
      critical_path_length: 3,
      parallelism_factor: 1,
      bottlenecks: 0,
    });
  });

  describe("requests", () => {
    it("clamps priority and falls back to the default timeout", () => {
      const router = new CandidateRouter({ defaultTimeoutMs: 12_000, idFactory: sequentialIds("req"), now: fixedClock() });
      const graph = buildLoginGraph();

      const high = router.createRequest(graph, { priority: 42, timeoutMs: 0 });
      const low = router.createRequest(graph, { priority: -3, timeoutMs: 2_500 });
      const plain = router.createRequest(graph);

      expect([high.priority, low.priority, plain.priority]).to.deep.equal([10, 1, 5]);
      expect([high.timeoutMs, low.timeoutMs, plain.timeoutMs]).to.deep.equal([12_000, 2_500, 12_000]);
      expect(plain).to.deep.include({ requestId: "req-3", scenarioType: "default", parameters: {}, createdAt: FIXED_INSTANT });
      expect(router.getPendingCount()).to.equal(3);
    });

    it("snapshots the candidate at request time", () => {
      const router = new CandidateRouter();
      const graph = buildLoginGraph();
      const request = router.createRequest(graph);

      graph.addAction(createAction({ id: "a4", kind: "reasoning", description: "late addition" }));
      expect(request.snapshot.actions.map((action) => action.node_id)).to.deep.equal(["a1", "a2", "a3"]);
    });

    it("keeps routed results until cleared", async () => {
      const router = new CandidateRouter({ idFactory: sequentialIds("req") });
      const request = router.createRequest(buildLoginGraph());
      const result = await router.route(request);

      expect(router.getResult("req-1")).to.equal(result);
      expect(router.getResultsForGraph("graph-login")).to.deep.equal([result]);
      router.clearResults();
      expect(router.getResult("req-1")).to.equal(undefined);
    });
  });

  describe("structural stub scoring", () => {
    it("rewards complete, constrained graphs", async () => {
      const router = new CandidateRouter();
      const result = await router.route(router.createRequest(buildLoginGraph()));

      expect(result.success).to.equal(true);
      expect(result.score).to.be.closeTo(1, 1e-9);
      expect(result.metrics).to.deep.equal({
        intent_count: 1,
        action_count: 3,
        constraint_count: 1,
        stub_simulation: true,
      });
    });

    it("penalises intents without actions", () => {
      const graph = new IRGraph({ id: "bare" });
      graph.addIntent(createIntent({ id: "i1", kind: "create", description: "Something" }));

      expect(scoreGraphStructure(graphToSnapshot(graph)).score).to.be.closeTo(0.1, 1e-9);
      expect(scoreGraphStructure(graphToSnapshot(new IRGraph({ id: "empty" }))).score).to.equal(0);
    });
  });

  it("formats selection reasons", () => {
    const result: RoutedResult = {
      requestId: "r",
      graphId: "g",
      success: true,
      score: 0.456,
      metrics: {},
      failureModes: [],
      executionTimeMs: 0,
      completedAt: FIXED_INSTANT,
    };
    expect(CandidateRouter.selectionReason(result, 1)).to.equal("Highest score: 0.46");
    expect(CandidateRouter.selectionReason(result, 2)).to.equal("Score: 0.46");
    expect(CandidateRouter.selectionReason({ ...result, failureModes: ["boom"] }, 3)).to.equal("Has failure modes: boom");
  });
});
