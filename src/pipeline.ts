import type { EvaluationCriterion, EvaluationResult, OutcomeEvaluator } from "./eval/outcome.js";
import type { IRGraph } from "./ir/graph.js";
import type { IRValidator, ValidationResult } from "./ir/validator.js";
import { createSilentLogger, type StructuredLogger } from "./logger.js";
import type { ExecutionPlan } from "./planner/plan.js";
import type { PlanSynthesisError, PlanSynthesizer } from "./planner/synthesizer.js";
import type { Simulator } from "./sim/engine.js";
import type { ScenarioParameters, SimulationRun } from "./sim/run.js";

/** Last stage the pipeline entered. */
export type PipelineStage = "validation" | "synthesis" | "simulation" | "evaluation";

export interface PipelineComponents {
  validator: IRValidator;
  synthesizer: PlanSynthesizer;
  simulator: Simulator;
  evaluator: OutcomeEvaluator;
  logger?: StructuredLogger;
}

export interface PipelineOptions {
  scenario?: ScenarioParameters;
  criteria?: readonly EvaluationCriterion[];
}

export interface PipelineOutcome {
  stage: PipelineStage;
  /** True only when the evaluator returned `pass` and the graph was approved. */
  approved: boolean;
  validation: ValidationResult;
  plan?: ExecutionPlan;
  synthesisError?: PlanSynthesisError;
  run?: SimulationRun;
  evaluation?: EvaluationResult;
}

/**
 * Validator (gate), plan synthesis, simulation and evaluation, in that order.
 * The pipeline stops at the first stage that does not succeed and reports it;
 * the graph moves to `simulated` after a completed run and to `approved` on a
 * `pass` verdict.
 */
export function runPlanningPipeline(
  graph: IRGraph,
  components: PipelineComponents,
  options: PipelineOptions = {},
): PipelineOutcome {
  const logger = components.logger ?? createSilentLogger();

  const validation = components.validator.validateAndUpdateStatus(graph);
  if (!validation.valid) {
    logger.warn("pipeline_stopped", { graph_id: graph.id, stage: "validation", errors: validation.errors.length });
    return { stage: "validation", approved: false, validation };
  }

  const synthesis = components.synthesizer.synthesize(graph);
  if (!synthesis.ok) {
    logger.warn("pipeline_stopped", { graph_id: graph.id, stage: "synthesis", code: synthesis.error.code });
    return { stage: "synthesis", approved: false, validation, synthesisError: synthesis.error };
  }
  const { plan } = synthesis;

  const run = components.simulator.simulate(graph, options.scenario);
  if (run.status !== "completed") {
    logger.warn("pipeline_stopped", { graph_id: graph.id, stage: "simulation", run_id: run.runId });
    return { stage: "simulation", approved: false, validation, plan, run };
  }
  graph.setStatus("simulated");

  const evaluation = components.evaluator.evaluate(run, options.criteria);
  const approved = evaluation.verdict === "pass";
  if (approved) {
    graph.setStatus("approved");
  }
  logger.info("pipeline_completed", {
    graph_id: graph.id,
    plan_id: plan.planId,
    run_id: run.runId,
    verdict: evaluation.verdict,
    approved,
  });
  return { stage: "evaluation", approved, validation, plan, run, evaluation };
}
