import { randomUUID } from "node:crypto";

import type { ActionKind, GraphStatus, NodeParameters } from "../ir/types.js";
import { CoreError, ERROR_CODES, type ErrorCode } from "../types.js";
import { uniqueInOrder } from "../utils/object.js";

export const STEP_STATUSES = ["pending", "running", "completed", "failed", "skipped"] as const;
export type StepStatus = (typeof STEP_STATUSES)[number];

export const PLAN_STATUSES = ["created", "executing", "completed", "failed", "cancelled"] as const;
export type PlanStatus = (typeof PLAN_STATUSES)[number];

/** One executable unit of a plan; steps synthesised from a graph map 1:1 to an action. */
export interface ExecutionStep {
  stepId: string;
  /** 1-based position, contiguous across the plan. */
  stepNumber: number;
  /** Originating action, `null` for steps inserted after synthesis. */
  actionId: string | null;
  actionKind: ActionKind;
  description: string;
  target: string;
  parameters: NodeParameters;
  /** Step ids that must complete before this step runs. */
  dependencies: string[];
  /** Descriptions of the constraints attached to the originating action. */
  constraints: string[];
  timeoutMs: number;
  retryCount: number;
  maxRetries: number;
  status: StepStatus;
  result?: Record<string, unknown>;
  error?: string;
  startedAt?: string;
  completedAt?: string;
}

export interface PlanMetadata {
  intentCount: number;
  constraintCount: number;
  activeConstraintCount: number;
  sourceStatus: GraphStatus;
}

/** Ordered steps derived from a graph. The plan references the graph by id only. */
export interface ExecutionPlan {
  planId: string;
  sourceGraphId: string;
  steps: ExecutionStep[];
  metadata: PlanMetadata;
  createdAt: string;
  status: PlanStatus;
  /** Number of the step most recently started, 0 before execution. */
  currentStep: number;
}

/** Raised when a plan mutation targets a step or position that does not exist. */
export class PlanMutationError extends CoreError {
  constructor(message: string, code: ErrorCode, details?: unknown) {
    super(message, code, details);
    this.name = "PlanMutationError";
  }
}

/** First step still waiting to run, in step order. */
export function getNextStep(plan: ExecutionPlan): ExecutionStep | undefined {
  return plan.steps.find((step) => step.status === "pending");
}

/**
 * Pending steps whose dependencies have all completed. Every returned step
 * may be handed to a worker concurrently.
 */
export function getExecutableSteps(plan: ExecutionPlan): ExecutionStep[] {
  const completed = new Set(plan.steps.filter((step) => step.status === "completed").map((step) => step.stepId));
  return plan.steps.filter(
    (step) => step.status === "pending" && step.dependencies.every((dependency) => completed.has(dependency)),
  );
}

function requireStep(plan: ExecutionPlan, stepId: string): ExecutionStep {
  const step = plan.steps.find((candidate) => candidate.stepId === stepId);
  if (!step) {
    throw new PlanMutationError(`plan ${plan.planId} has no step ${stepId}`, ERROR_CODES.PLAN_STEP_NOT_FOUND, {
      planId: plan.planId,
      stepId,
    });
  }
  return step;
}

export interface StepUpdate {
  result?: Record<string, unknown>;
  error?: string;
}

/**
 * Records a status change reported by whoever executes the plan. Moving a
 * failed step back to `pending` consumes one retry; the plan itself becomes
 * `completed` once every step is completed or skipped, and `failed` when a
 * failed step has no retries left.
 *
 * @throws PlanMutationError for an unknown step or an exhausted retry budget.
 */
export function updateStepStatus(
  plan: ExecutionPlan,
  stepId: string,
  status: StepStatus,
  update: StepUpdate = {},
  now: Date = new Date(),
): ExecutionStep {
  const step = requireStep(plan, stepId);
  const timestamp = now.toISOString();

  if (status === "pending" && step.status === "failed") {
    if (step.retryCount >= step.maxRetries) {
      throw new PlanMutationError(
        `step ${stepId} exhausted its ${step.maxRetries} retries`,
        ERROR_CODES.PLAN_RETRY_EXHAUSTED,
        { stepId, retryCount: step.retryCount },
      );
    }
    step.retryCount += 1;
    delete step.error;
    delete step.completedAt;
  }

  step.status = status;
  if (status === "running") {
    step.startedAt = timestamp;
    plan.currentStep = step.stepNumber;
    if (plan.status === "created") {
      plan.status = "executing";
    }
  }
  if (status === "completed" || status === "failed" || status === "skipped") {
    step.completedAt = timestamp;
  }
  if (update.result !== undefined) {
    step.result = update.result;
  }
  if (update.error !== undefined) {
    step.error = update.error;
  }

  if (plan.steps.every((candidate) => candidate.status === "completed" || candidate.status === "skipped")) {
    plan.status = "completed";
  } else if (status === "failed" && step.retryCount >= step.maxRetries) {
    plan.status = "failed";
  }
  return step;
}

export interface StepInsertion {
  kind: ActionKind;
  description: string;
  target: string;
  parameters?: NodeParameters;
  dependencies?: string[];
  timeoutMs: number;
  maxRetries: number;
  stepId?: string;
}

/**
 * Inserts a step after `afterStep` (0 inserts at the front) and renumbers the
 * steps that follow. Dependencies on unknown or later steps are dropped.
 *
 * @throws PlanMutationError when `afterStep` is outside `0..steps.length`.
 */
export function insertStep(plan: ExecutionPlan, afterStep: number, insertion: StepInsertion): ExecutionStep {
  if (!Number.isInteger(afterStep) || afterStep < 0 || afterStep > plan.steps.length) {
    throw new PlanMutationError(
      `cannot insert after step ${afterStep} in a plan of ${plan.steps.length} steps`,
      ERROR_CODES.PLAN_INVALID_POSITION,
      { planId: plan.planId, afterStep },
    );
  }
  // A dependency must carry a smaller step number.
  const earlier = new Set(plan.steps.slice(0, afterStep).map((step) => step.stepId));
  const step: ExecutionStep = {
    stepId: insertion.stepId ?? randomUUID(),
    stepNumber: afterStep + 1,
    actionId: null,
    actionKind: insertion.kind,
    description: insertion.description,
    target: insertion.target,
    parameters: { ...(insertion.parameters ?? {}) },
    dependencies: uniqueInOrder(insertion.dependencies ?? []).filter((dependency) => earlier.has(dependency)),
    constraints: [],
    timeoutMs: insertion.timeoutMs,
    retryCount: 0,
    maxRetries: insertion.maxRetries,
    status: "pending",
  };
  plan.steps.splice(afterStep, 0, step);
  renumber(plan);
  return step;
}

/**
 * Removes the step numbered `stepNumber`, renumbers the remainder and drops
 * the removed id from every dependency list.
 *
 * @throws PlanMutationError when no step carries that number.
 */
export function removeStep(plan: ExecutionPlan, stepNumber: number): ExecutionStep {
  const index = plan.steps.findIndex((step) => step.stepNumber === stepNumber);
  const [removed] = index >= 0 ? plan.steps.splice(index, 1) : [];
  if (!removed) {
    throw new PlanMutationError(`plan ${plan.planId} has no step number ${stepNumber}`, ERROR_CODES.PLAN_STEP_NOT_FOUND, {
      planId: plan.planId,
      stepNumber,
    });
  }
  for (const step of plan.steps) {
    step.dependencies = step.dependencies.filter((dependency) => dependency !== removed.stepId);
  }
  renumber(plan);
  return removed;
}

function renumber(plan: ExecutionPlan): void {
  plan.steps.forEach((step, index) => {
    step.stepNumber = index + 1;
  });
}

// -- documents -----------------------------------------------------------------

export interface StepDocument {
  step_id: string;
  step_number: number;
  action_id: string | null;
  action_type: ActionKind;
  description: string;
  target: string;
  parameters: NodeParameters;
  dependencies: string[];
  constraints: string[];
  timeout_ms: number;
  retry_count: number;
  max_retries: number;
  status: StepStatus;
  result: Record<string, unknown> | null;
  error: string | null;
  started_at: string | null;
  completed_at: string | null;
}

export interface PlanDocument {
  plan_id: string;
  source_graph_id: string;
  status: PlanStatus;
  current_step: number;
  total_steps: number;
  steps: StepDocument[];
  metadata: {
    intent_count: number;
    constraint_count: number;
    active_constraint_count: number;
    source_status: GraphStatus;
  };
  created_at: string;
}

export function planToDocument(plan: ExecutionPlan): PlanDocument {
  return {
    plan_id: plan.planId,
    source_graph_id: plan.sourceGraphId,
    status: plan.status,
    current_step: plan.currentStep,
    total_steps: plan.steps.length,
    steps: plan.steps.map((step) => ({
      step_id: step.stepId,
      step_number: step.stepNumber,
      action_id: step.actionId,
      action_type: step.actionKind,
      description: step.description,
      target: step.target,
      parameters: structuredClone(step.parameters),
      dependencies: [...step.dependencies],
      constraints: [...step.constraints],
      timeout_ms: step.timeoutMs,
      retry_count: step.retryCount,
      max_retries: step.maxRetries,
      status: step.status,
      result: step.result ? structuredClone(step.result) : null,
      error: step.error ?? null,
      started_at: step.startedAt ?? null,
      completed_at: step.completedAt ?? null,
    })),
    metadata: {
      intent_count: plan.metadata.intentCount,
      constraint_count: plan.metadata.constraintCount,
      active_constraint_count: plan.metadata.activeConstraintCount,
      source_status: plan.metadata.sourceStatus,
    },
    created_at: plan.createdAt,
  };
}

/** Item accepted by an external task queue; one per plan step. */
export interface TaskQueueItem {
  task_id: string;
  task_type: ActionKind;
  /** Step number: earlier steps have higher priority. */
  priority: number;
  payload: {
    description: string;
    target: string;
    parameters: NodeParameters;
  };
  constraints: string[];
  dependencies: string[];
  timeout_ms: number;
  max_retries: number;
  source: {
    plan_id: string;
    graph_id: string;
  };
}

export function planToTaskQueue(plan: ExecutionPlan): TaskQueueItem[] {
  return plan.steps.map((step) => ({
    task_id: step.stepId,
    task_type: step.actionKind,
    priority: step.stepNumber,
    payload: {
      description: step.description,
      target: step.target,
      parameters: structuredClone(step.parameters),
    },
    constraints: [...step.constraints],
    dependencies: [...step.dependencies],
    timeout_ms: step.timeoutMs,
    max_retries: step.maxRetries,
    source: { plan_id: plan.planId, graph_id: plan.sourceGraphId },
  }));
}

/** Compact packet describing a plan for audit or knowledge stores. */
export interface PlanSummary {
  kind: "execution_plan";
  plan_id: string;
  source_graph_id: string;
  total_steps: number;
  /** Distinct action kinds, in first-seen order. */
  step_types: ActionKind[];
  /** Upper bound obtained by summing step timeouts. */
  estimated_duration_ms: number;
  constraints_active: number;
  created_at: string;
}

export function planToSummary(plan: ExecutionPlan): PlanSummary {
  return {
    kind: "execution_plan",
    plan_id: plan.planId,
    source_graph_id: plan.sourceGraphId,
    total_steps: plan.steps.length,
    step_types: uniqueInOrder(plan.steps.map((step) => step.actionKind)),
    estimated_duration_ms: plan.steps.reduce((total, step) => total + step.timeoutMs, 0),
    constraints_active: plan.metadata.activeConstraintCount,
    created_at: plan.createdAt,
  };
}
