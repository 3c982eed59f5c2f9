import { randomUUID } from "node:crypto";

import { IRGraph } from "../ir/graph.js";
import type { GraphSnapshot } from "../ir/snapshot.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import { describeError } from "../types.js";
import { clamp, uniqueInOrder } from "../utils/object.js";
import type { RandomSource } from "../utils/random.js";
import {
  accumulateResources,
  drawFailureReason,
  estimateActionRisk,
  estimateDuration,
  estimateResources,
  type ResourceUsage,
  type SimulatedAction,
} from "./riskModel.js";
import {
  createEmptyMetrics,
  successRate,
  type ScenarioParameters,
  type SimulationMode,
  type SimulationRun,
  type SimulationStep,
} from "./run.js";

export interface SimulatorConfig {
  mode: SimulationMode;
  /** Base per-action failure probability before kind multipliers. */
  failureProbability: number;
}

export interface SimulatorOptions {
  logger?: StructuredLogger;
  now?: () => Date;
  idFactory?: () => string;
}

/** Graph handed to the simulator: a live graph or a detached snapshot document. */
export type SimulationInput = IRGraph | GraphSnapshot;

const STRESS_RUNS = 3;
const MAX_STRESS_PROBABILITY = 0.5;
const EMPTY_GRAPH_SCORE = 0.5;
const FAILURE_PENALTY_PER_MODE = 0.05;
const MAX_FAILURE_PENALTY = 0.3;
const PARALLELISM_BONUS_THRESHOLD = 1.5;
const PARALLELISM_BONUS = 0.1;
export const DEADLOCK_FAILURE = "Dependency deadlock detected";

interface PassOutcome {
  steps: SimulationStep[];
  failureModes: string[];
}

function toSimulatedActions(input: SimulationInput): SimulatedAction[] {
  if (input instanceof IRGraph) {
    return input.listActions().map((action) => ({
      id: action.id,
      kind: action.kind,
      dependsOn: [...action.dependsOn],
      parameterCount: Object.keys(action.parameters).length,
      ...(action.estimatedDurationMs !== undefined ? { estimatedDurationMs: action.estimatedDurationMs } : {}),
    }));
  }
  return input.actions.map((entry) => ({
    id: entry.node_id,
    kind: entry.action_type,
    dependsOn: [...entry.depends_on],
    parameterCount: Object.keys(entry.parameters).length,
    ...(entry.estimated_duration_ms !== null ? { estimatedDurationMs: entry.estimated_duration_ms } : {}),
  }));
}

/** Scenario `risk_multiplier`, or 1.0 when absent or not a finite non-negative number. */
export function resolveRiskMultiplier(scenario: ScenarioParameters | undefined): number {
  const value = scenario?.risk_multiplier;
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : 1;
}

/**
 * Longest dependency chain, counted in actions. Dependencies on ids that are
 * not actions are ignored; a back edge contributes nothing so cyclic input
 * still terminates.
 */
export function criticalPathLength(actions: readonly SimulatedAction[]): number {
  const byId = new Map(actions.map((action) => [action.id, action]));
  const memo = new Map<string, number>();
  const visiting = new Set<string>();

  const lengthFrom = (actionId: string): number => {
    const cached = memo.get(actionId);
    if (cached !== undefined) {
      return cached;
    }
    if (visiting.has(actionId)) {
      return 0;
    }
    visiting.add(actionId);
    const dependencies = (byId.get(actionId)?.dependsOn ?? []).filter((dependency) => byId.has(dependency));
    const length = 1 + Math.max(0, ...dependencies.map(lengthFrom));
    visiting.delete(actionId);
    memo.set(actionId, length);
    return length;
  };

  return actions.reduce((longest, action) => Math.max(longest, lengthFrom(action.id)), 0);
}

/** Total actions over critical-path length; 1.0 for an empty path. */
export function parallelismFactor(actions: readonly SimulatedAction[]): number {
  const path = criticalPathLength(actions);
  return path === 0 ? 1 : actions.length / path;
}

/** Steps lasting more than twice the mean step duration. */
export function findBottlenecks(steps: readonly SimulationStep[]): string[] {
  if (steps.length === 0) {
    return [];
  }
  const mean = steps.reduce((total, step) => total + step.durationMs, 0) / steps.length;
  return steps
    .filter((step) => step.durationMs > mean * 2)
    .map((step) => `${step.actionKind} ${step.actionId}: ${step.durationMs}ms`);
}

/**
 * Success rate minus 0.05 per distinct failure mode (at most 0.3), plus 0.1
 * when the parallelism factor exceeds 1.5, clamped to [0, 1].
 */
export function scoreRun(run: SimulationRun): number {
  const penalty = Math.min(MAX_FAILURE_PENALTY, FAILURE_PENALTY_PER_MODE * new Set(run.failureModes).size);
  const bonus = run.metrics.parallelismFactor > PARALLELISM_BONUS_THRESHOLD ? PARALLELISM_BONUS : 0;
  return clamp(successRate(run) - penalty + bonus, 0, 1);
}

/**
 * Heuristic executor estimating how a graph's actions would fare. Every
 * stochastic decision is drawn from the injected {@link RandomSource}, so two
 * simulators built on equally seeded sources produce identical runs for the
 * same graph and scenario. Simulation never throws: faults become a failed
 * run scored 0.
 */
export class Simulator {
  public readonly config: Readonly<SimulatorConfig>;
  private readonly random: RandomSource;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly runs = new Map<string, SimulationRun>();

  constructor(random: RandomSource, config: Partial<SimulatorConfig> = {}, options: SimulatorOptions = {}) {
    this.random = random;
    this.config = Object.freeze({
      mode: config.mode ?? "standard",
      failureProbability: clamp(config.failureProbability ?? 0.1, 0, 1),
    });
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  simulate(input: SimulationInput, scenario?: ScenarioParameters): SimulationRun {
    const run: SimulationRun = {
      runId: this.idFactory(),
      graphId: input instanceof IRGraph ? input.id : input.graph_id,
      mode: this.config.mode,
      failureProbability: this.config.failureProbability,
      status: "running",
      steps: [],
      metrics: createEmptyMetrics(),
      failureModes: [],
      score: 0,
      startedAt: this.now().toISOString(),
    };
    this.runs.set(run.runId, run);

    try {
      const actions = toSimulatedActions(input);
      if (actions.length === 0) {
        run.score = EMPTY_GRAPH_SCORE;
      } else {
        this.execute(run, actions, resolveRiskMultiplier(scenario));
        run.score = scoreRun(run);
      }
      run.status = "completed";
    } catch (error) {
      const message = describeError(error);
      this.logger.error("simulation_failed", { run_id: run.runId, graph_id: run.graphId, message });
      run.status = "failed";
      run.score = 0;
      run.failureModes.push(message);
    }

    run.completedAt = this.now().toISOString();
    this.logger.info("simulation_completed", {
      run_id: run.runId,
      graph_id: run.graphId,
      mode: run.mode,
      status: run.status,
      score: run.score,
    });
    return run;
  }

  getRun(runId: string): SimulationRun | undefined {
    return this.runs.get(runId);
  }

  getRunsForGraph(graphId: string): SimulationRun[] {
    return Array.from(this.runs.values()).filter((run) => run.graphId === graphId);
  }

  /** Forgets every recorded run and returns how many were dropped. */
  clearRuns(): number {
    const count = this.runs.size;
    this.runs.clear();
    return count;
  }

  private execute(run: SimulationRun, actions: SimulatedAction[], multiplier: number): void {
    const probability = this.config.failureProbability;
    if (this.config.mode === "fast") {
      this.record(run, this.fastPass(actions, probability, multiplier));
      return;
    }

    this.record(run, this.frontierPass(actions, probability, multiplier));
    run.metrics.criticalPathLength = criticalPathLength(actions);
    if (this.config.mode !== "thorough") {
      return;
    }

    run.metrics.bottlenecks = findBottlenecks(run.steps);
    run.metrics.parallelismFactor = parallelismFactor(actions);

    const stressProbability = Math.min(MAX_STRESS_PROBABILITY, probability * 2);
    const stressFailures: string[] = [];
    for (let index = 0; index < STRESS_RUNS; index += 1) {
      stressFailures.push(...this.frontierPass(actions, stressProbability, multiplier).failureModes);
    }
    for (const failure of uniqueInOrder(stressFailures)) {
      if (!run.failureModes.includes(failure)) {
        run.failureModes.push(`[stress] ${failure}`);
      }
    }
  }

  private record(run: SimulationRun, outcome: PassOutcome): void {
    run.steps.push(...outcome.steps);
    run.failureModes.push(...outcome.failureModes);
    const successful = run.steps.filter((step) => step.status === "completed").length;
    const resourceUsage: ResourceUsage = {};
    for (const step of run.steps) {
      accumulateResources(resourceUsage, step.resources);
    }
    Object.assign(run.metrics, {
      totalSteps: run.steps.length,
      successfulSteps: successful,
      failedSteps: run.steps.length - successful,
      totalDurationMs: run.steps.reduce((total, step) => total + step.durationMs, 0),
      resourceUsage,
    });
  }

  /** Independent draw per action, ignoring dependencies. */
  private fastPass(actions: SimulatedAction[], probability: number, multiplier: number): PassOutcome {
    const steps: SimulationStep[] = [];
    const failureModes: string[] = [];
    for (const action of actions) {
      const failed = this.random.next() < estimateActionRisk(action, probability) * multiplier;
      const step: SimulationStep = {
        stepId: `step-${steps.length + 1}`,
        actionId: action.id,
        actionKind: action.kind,
        status: failed ? "failed" : "completed",
        durationMs: estimateDuration(action),
        resources: estimateResources(action),
        frontier: 0,
      };
      if (failed) {
        step.error = `Simulated failure for ${action.kind}`;
        failureModes.push(step.error);
      }
      steps.push(step);
    }
    return { steps, failureModes };
  }

  /**
   * Runs actions frontier by frontier: each frontier holds the remaining
   * actions whose dependencies have all completed. A failed action never
   * completes, so its dependents stay blocked and the pass ends in a deadlock.
   */
  private frontierPass(actions: SimulatedAction[], probability: number, multiplier: number): PassOutcome {
    const steps: SimulationStep[] = [];
    const failureModes: string[] = [];
    const completed = new Set<string>();
    let remaining = actions;
    let frontier = 0;

    while (remaining.length > 0) {
      const ready = remaining.filter((action) => action.dependsOn.every((dependency) => completed.has(dependency)));
      if (ready.length === 0) {
        failureModes.push(DEADLOCK_FAILURE);
        break;
      }
      for (const action of ready) {
        const step = this.simulateAction(action, steps.length + 1, frontier, probability, multiplier);
        steps.push(step);
        if (step.status === "completed") {
          completed.add(action.id);
        } else {
          failureModes.push(`Action ${action.id} failed: ${step.error ?? "Unknown error"}`);
        }
      }
      const started = new Set(ready);
      remaining = remaining.filter((action) => !started.has(action));
      frontier += 1;
    }
    return { steps, failureModes };
  }

  private simulateAction(
    action: SimulatedAction,
    index: number,
    frontier: number,
    probability: number,
    multiplier: number,
  ): SimulationStep {
    const step: SimulationStep = {
      stepId: `step-${index}`,
      actionId: action.id,
      actionKind: action.kind,
      status: "completed",
      durationMs: estimateDuration(action),
      resources: estimateResources(action),
      frontier,
    };
    if (this.random.next() < estimateActionRisk(action, probability) * multiplier) {
      step.status = "failed";
      step.error = drawFailureReason(action, this.random);
    }
    return step;
  }
}
