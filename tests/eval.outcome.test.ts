import { describe, it } from "mocha";
import { expect } from "chai";

import {
  createCriterion,
  EvaluationConfigError,
  evaluateCriterion,
  evaluationToDocument,
  OutcomeEvaluator,
} from "../src/eval/outcome.js";
import { createEmptyMetrics, type SimulationMetrics, type SimulationRun } from "../src/sim/run.js";
import { ERROR_CODES } from "../src/types.js";
import { FIXED_INSTANT, fixedClock, sequentialIds } from "./helpers/graphs.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function makeRun(
  runId: string,
  metrics: Partial<SimulationMetrics>,
  failureModes: string[] = [],
  score = 1,
): SimulationRun {
  return {
    runId,
    graphId: "graph-login",
    mode: "standard",
    failureProbability: 0.1,
    status: "completed",
    steps: [],
    metrics: { ...createEmptyMetrics(), ...metrics },
    failureModes,
    score,
    startedAt: FIXED_INSTANT,
    completedAt: FIXED_INSTANT,
  };
}

const cleanRun = () => makeRun("clean", { totalSteps: 3, successfulSteps: 3, totalDurationMs: 7500 });
const deadlockedRun = () =>
  makeRun("deadlocked", { totalSteps: 2, successfulSteps: 1, failedSteps: 1 }, [
    "Action a2 failed: Disk full",
    "Dependency deadlock detected",
  ]);
const brokenRun = () =>
  makeRun("broken", { totalSteps: 4, successfulSteps: 1, failedSteps: 3 }, [
    "Critical fault in step 2",
    "Timeout error",
    "Action a3 failed: Disk full",
    "Dependency deadlock detected",
  ]);

function evaluator(options: { passThreshold?: number; conditionalThreshold?: number; logger?: RecordingLogger } = {}) {
  return new OutcomeEvaluator({ ...options, idFactory: sequentialIds("ev"), now: fixedClock() });
}

describe("eval outcome evaluator", () => {
  describe("criterion scoring", () => {
    const criterion = (comparison: string, threshold: number) => createCriterion({ name: "probe", threshold, comparison });

    it("scores lower bounds proportionally", () => {
      expect(evaluateCriterion(criterion("gte", 0.8), 0.4)).to.deep.equal({ passed: false, score: 0.5 });
      expect(evaluateCriterion(criterion("gte", 0.8), 1)).to.deep.equal({ passed: true, score: 1 });
      expect(evaluateCriterion(criterion("gt", 2), 2)).to.deep.equal({ passed: false, score: 1 });
      expect(evaluateCriterion(criterion("gte", 0), 0)).to.deep.equal({ passed: true, score: 0 });
    });

    it("scores upper bounds with a linear fall-off", () => {
      expect(evaluateCriterion(criterion("lte", 10), 15)).to.deep.equal({ passed: false, score: 0.5 });
      expect(evaluateCriterion(criterion("lte", 10), 40)).to.deep.equal({ passed: false, score: 0 });
      expect(evaluateCriterion(criterion("lt", 5), 5)).to.deep.equal({ passed: false, score: 1 });
    });

    it("compares equality within a small tolerance", () => {
      expect(evaluateCriterion(criterion("eq", 0.5), 0.5005)).to.deep.equal({ passed: true, score: 1 });
      expect(evaluateCriterion(criterion("eq", 0.5), 0.6)).to.deep.equal({ passed: false, score: 0 });
    });

    it("falls back to gte for unknown comparators", () => {
      expect(criterion("roughly", 1).comparison).to.equal("gte");
      expect(criterion(" LTE ", 1).comparison).to.equal("lte");
    });
  });

  it("passes a clean run and explains the soft miss", () => {
    const logger = new RecordingLogger();
    const evaluation = evaluator({ logger }).evaluate(cleanRun());

    expect(evaluation.verdict).to.equal("pass");
    expect(evaluation.overallScore).to.be.closeTo(71 / 72, 1e-9);
    expect(evaluation.passedCriteria).to.equal(3);
    expect(evaluation.failedCriteria).to.equal(1);
    expect(evaluation.recommendations).to.deep.equal(["Address performance issue: parallelism-factor"]);
    expect(Object.isFrozen(evaluation)).to.equal(true);
    expect(logger.entries).to.deep.equal([
      {
        level: "info",
        message: "evaluation_completed",
        payload: { run_id: "clean", verdict: "pass", overall_score: evaluation.overallScore },
      },
    ]);
  });

  it("lets a heavy failure through when the overall score stays high", () => {
    const evaluation = evaluator().evaluate(deadlockedRun());

    expect(evaluation.overallScore).to.be.closeTo(31 / 36, 1e-9);
    expect(evaluation.verdict).to.equal("pass");
    expect(evaluation.recommendations).to.deep.equal([
      "Improve error handling to increase success rate",
      "Address performance issue: parallelism-factor",
    ]);
  });

  it("fails a run with critical faults and many failure modes", () => {
    const evaluation = evaluator().evaluate(brokenRun());

    expect(evaluation.criterionResults.map((result) => result.value)).to.deep.equal([0.25, 2, 1, 0]);
    expect(evaluation.overallScore).to.be.closeTo(37 / 144, 1e-9);
    expect(evaluation.verdict).to.equal("fail");
    expect(evaluation.recommendations).to.deep.equal([
      "Improve error handling to increase success rate",
      "Add retry logic and fallback mechanisms",
      "Address performance issue: parallelism-factor",
      "Address 4 distinct failure modes",
    ]);
  });

  it("moves verdicts with the thresholds", () => {
    const judge = evaluator();
    judge.setThresholds(0.99, 0.9);

    expect(judge.thresholds).to.deep.equal({ pass: 0.99, conditional: 0.9 });
    expect(judge.evaluate(cleanRun()).verdict).to.equal("conditional_pass");
  });

  it("rejects inconsistent thresholds", () => {
    expect(() => evaluator({ passThreshold: 0.4, conditionalThreshold: 0.6 }))
      .to.throw(EvaluationConfigError)
      .with.property("code", ERROR_CODES.EVAL_INVALID_THRESHOLDS);

    const judge = evaluator();
    expect(() => judge.setThresholds(1.2, 0.5)).to.throw(EvaluationConfigError);
    expect(judge.thresholds).to.deep.equal({ pass: 0.7, conditional: 0.5 });
  });

  it("judges custom criteria and falls back to the defaults for an empty list", () => {
    const judge = evaluator();
    const criteria = [
      createCriterion({ name: "total-duration-ms", threshold: 10_000, comparison: "lte", type: "performance" }),
      createCriterion({ name: "run-score", threshold: 0.9, weight: 3 }),
    ];

    const custom = judge.evaluate(cleanRun(), criteria);
    expect(custom.criterionResults.map((result) => [result.value, result.passed])).to.deep.equal([
      [7500, true],
      [1, true],
    ]);
    expect(custom.overallScore).to.equal(1);

    expect(judge.evaluate(cleanRun(), []).criterionResults).to.have.length(4);
  });

  it("ranks runs best first", () => {
    const ranked = evaluator().rankRuns([brokenRun(), cleanRun(), deadlockedRun()]);
    expect(ranked.map((entry) => entry.run.runId)).to.deep.equal(["clean", "deadlocked", "broken"]);
  });

  it("renders an evaluation document", () => {
    const document = evaluationToDocument(evaluator().evaluate(cleanRun()));

    expect(document).to.deep.include({
      evaluation_id: "ev-1",
      run_id: "clean",
      verdict: "pass",
      passed_criteria: 3,
      failed_criteria: 1,
      evaluated_at: FIXED_INSTANT,
    });
    expect(document.criteria_results[2]).to.deep.equal({
      criterion: "parallelism-factor",
      value: 1,
      passed: false,
      score: 1 / 1.2,
      weight: 0.5,
      feedback: "parallelism-factor: 1.00 does not meet threshold 1.2",
    });
  });
});
