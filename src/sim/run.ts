import type { ActionKind } from "../ir/types.js";
import type { ResourceUsage } from "./riskModel.js";

export const SIMULATION_MODES = ["fast", "standard", "thorough"] as const;
export type SimulationMode = (typeof SIMULATION_MODES)[number];

export type SimulationStepStatus = "completed" | "failed";
export type SimulationRunStatus = "running" | "completed" | "failed";

export interface SimulationStep {
  stepId: string;
  actionId: string;
  actionKind: ActionKind;
  status: SimulationStepStatus;
  durationMs: number;
  resources: ResourceUsage;
  /** Index of the ready frontier the step ran in; fast mode uses 0 throughout. */
  frontier: number;
  error?: string;
}

export interface SimulationMetrics {
  totalSteps: number;
  successfulSteps: number;
  failedSteps: number;
  /** Simulated time: the sum of every step's duration. */
  totalDurationMs: number;
  resourceUsage: ResourceUsage;
  bottlenecks: string[];
  criticalPathLength: number;
  parallelismFactor: number;
}

/** Parameters a scenario hands to the simulator. Unknown keys are carried along untouched. */
export interface ScenarioParameters {
  risk_multiplier?: number | undefined;
  [key: string]: unknown;
}

export interface SimulationRun {
  runId: string;
  graphId: string;
  mode: SimulationMode;
  failureProbability: number;
  status: SimulationRunStatus;
  steps: SimulationStep[];
  metrics: SimulationMetrics;
  failureModes: string[];
  /** Overall quality in [0, 1]. */
  score: number;
  startedAt: string;
  completedAt?: string;
}

export function createEmptyMetrics(): SimulationMetrics {
  return {
    totalSteps: 0,
    successfulSteps: 0,
    failedSteps: 0,
    totalDurationMs: 0,
    resourceUsage: {},
    bottlenecks: [],
    criticalPathLength: 0,
    parallelismFactor: 1,
  };
}

/** Fraction of steps that completed; 0 when nothing ran. */
export function successRate(run: SimulationRun): number {
  return run.metrics.totalSteps === 0 ? 0 : run.metrics.successfulSteps / run.metrics.totalSteps;
}

export interface SimulationRunDocument {
  run_id: string;
  graph_id: string;
  mode: SimulationMode;
  status: SimulationRunStatus;
  score: number;
  total_steps: number;
  successful_steps: number;
  failed_steps: number;
  duration_ms: number;
  resource_usage: ResourceUsage;
  bottlenecks: string[];
  critical_path_length: number;
  parallelism_factor: number;
  failure_modes: string[];
  steps: Array<{
    step_id: string;
    action_id: string;
    action_type: ActionKind;
    status: SimulationStepStatus;
    duration_ms: number;
    resource_used: ResourceUsage;
    frontier: number;
    error: string | null;
  }>;
  started_at: string;
  completed_at: string | null;
}

export function runToDocument(run: SimulationRun): SimulationRunDocument {
  return {
    run_id: run.runId,
    graph_id: run.graphId,
    mode: run.mode,
    status: run.status,
    score: run.score,
    total_steps: run.metrics.totalSteps,
    successful_steps: run.metrics.successfulSteps,
    failed_steps: run.metrics.failedSteps,
    duration_ms: run.metrics.totalDurationMs,
    resource_usage: { ...run.metrics.resourceUsage },
    bottlenecks: [...run.metrics.bottlenecks],
    critical_path_length: run.metrics.criticalPathLength,
    parallelism_factor: run.metrics.parallelismFactor,
    failure_modes: [...run.failureModes],
    steps: run.steps.map((step) => ({
      step_id: step.stepId,
      action_id: step.actionId,
      action_type: step.actionKind,
      status: step.status,
      duration_ms: step.durationMs,
      resource_used: { ...step.resources },
      frontier: step.frontier,
      error: step.error ?? null,
    })),
    started_at: run.startedAt,
    completed_at: run.completedAt ?? null,
  };
}
