import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { createCriterion, OutcomeEvaluator } from "../src/eval/outcome.js";
import { IRGraph } from "../src/ir/graph.js";
import { createAction, createIntent } from "../src/ir/nodes.js";
import { IRValidator } from "../src/ir/validator.js";
import { runPlanningPipeline, type PipelineComponents } from "../src/pipeline.js";
import { PlanSynthesizer } from "../src/planner/synthesizer.js";
import { Simulator } from "../src/sim/engine.js";
import type { RandomSource } from "../src/utils/random.js";
import { ERROR_CODES } from "../src/types.js";
import { buildLoginGraph, fixedClock, ScriptedRandom, sequentialIds } from "./helpers/graphs.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function components(random: RandomSource = new ScriptedRandom([]), logger = new RecordingLogger()): PipelineComponents {
  const now = fixedClock();
  return {
    validator: new IRValidator({ now }),
    synthesizer: new PlanSynthesizer({ idFactory: sequentialIds("step"), now }),
    simulator: new Simulator(random, {}, { idFactory: sequentialIds("run"), now }),
    evaluator: new OutcomeEvaluator({ idFactory: sequentialIds("ev"), now }),
    logger,
  };
}

function cyclicGraph(): IRGraph {
  const graph = new IRGraph({ id: "cyclic" });
  graph.addIntent(createIntent({ id: "i1", kind: "create", description: "Loop", target: "svc" }));
  graph.addAction(
    createAction({ id: "x", kind: "reasoning", description: "x", target: "svc", derivedFromIntent: "i1", dependsOn: ["y"] }),
  );
  graph.addAction(
    createAction({ id: "y", kind: "reasoning", description: "y", target: "svc", derivedFromIntent: "i1", dependsOn: ["x"] }),
  );
  return graph;
}

describe("planning pipeline", () => {
  it("approves a graph that clears every stage", () => {
    const logger = new RecordingLogger();
    const graph = buildLoginGraph();
    const outcome = runPlanningPipeline(graph, components(new ScriptedRandom([]), logger));

    expect(outcome.stage).to.equal("evaluation");
    expect(outcome.approved).to.equal(true);
    expect(outcome.plan?.steps).to.have.length(3);
    expect(outcome.run?.score).to.equal(1);
    expect(outcome.evaluation?.verdict).to.equal("pass");
    expect(graph.status).to.equal("approved");
    expect(logger.entries).to.deep.equal([
      {
        level: "info",
        message: "pipeline_completed",
        payload: { graph_id: "graph-login", plan_id: "step-4", run_id: "run-1", verdict: "pass", approved: true },
      },
    ]);
  });

  it("stops at the validation gate", () => {
    const logger = new RecordingLogger();
    const graph = cyclicGraph();
    const outcome = runPlanningPipeline(graph, components(new ScriptedRandom([]), logger));

    expect(outcome.stage).to.equal("validation");
    expect(outcome.approved).to.equal(false);
    expect(outcome.validation.errors.map((issue) => issue.code)).to.include("DEPENDENCY_CYCLE");
    expect(outcome.plan).to.equal(undefined);
    expect(graph.status).to.equal("draft");
    expect(logger.messages("warn")).to.deep.equal(["pipeline_stopped"]);
  });

  it("reports synthesis failures that slip past the gate", () => {
    const parts = components();
    const passing = parts.validator.validate(buildLoginGraph());
    sinon.stub(parts.validator, "validateAndUpdateStatus").returns(passing);

    const outcome = runPlanningPipeline(cyclicGraph(), parts);

    expect(outcome.stage).to.equal("synthesis");
    expect(outcome.synthesisError?.code).to.equal(ERROR_CODES.PLAN_CYCLE);
    expect(outcome.run).to.equal(undefined);
  });

  it("stops when the simulation itself fails", () => {
    const broken: RandomSource = {
      next(): number {
        throw new Error("entropy source exhausted");
      },
    };
    const graph = buildLoginGraph();
    const outcome = runPlanningPipeline(graph, components(broken));

    expect(outcome.stage).to.equal("simulation");
    expect(outcome.run?.status).to.equal("failed");
    expect(outcome.evaluation).to.equal(undefined);
    expect(graph.status).to.equal("validated");
  });

  it("leaves a conditionally passing graph simulated but not approved", () => {
    const graph = buildLoginGraph();
    const outcome = runPlanningPipeline(graph, components(new ScriptedRandom([0.99, 0.01, 0.5])), {
      criteria: [createCriterion({ name: "success-rate", threshold: 1, weight: 2, type: "success_rate" })],
    });

    expect(outcome.stage).to.equal("evaluation");
    expect(outcome.evaluation?.overallScore).to.equal(0.5);
    expect(outcome.evaluation?.verdict).to.equal("conditional_pass");
    expect(outcome.approved).to.equal(false);
    expect(graph.status).to.equal("simulated");
  });

  it("hands the scenario to the simulator", () => {
    const parts = components(new ScriptedRandom([0.99, 0.2, 0.5]));
    const outcome = runPlanningPipeline(buildLoginGraph(), parts, { scenario: { risk_multiplier: 2 } });

    expect(outcome.run?.failureModes).to.deep.equal([
      "Action a2 failed: Disk full",
      "Dependency deadlock detected",
    ]);
  });
});
