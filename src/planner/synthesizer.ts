import { randomUUID } from "node:crypto";

import type { IRGraph } from "../ir/graph.js";
import type { ActionNode } from "../ir/nodes.js";
import { priorityRank, type ActionKind } from "../ir/types.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import { CoreError, ERROR_CODES } from "../types.js";
import { uniqueInOrder } from "../utils/object.js";
import {
  insertStep,
  planToTaskQueue,
  type ExecutionPlan,
  type ExecutionStep,
  type StepInsertion,
  type TaskQueueItem,
} from "./plan.js";

/** Step timeouts used when an action carries no duration estimate. */
export const DEFAULT_STEP_TIMEOUTS_MS: Readonly<Record<ActionKind, number>> = {
  code_write: 60_000,
  code_read: 10_000,
  code_modify: 60_000,
  file_create: 30_000,
  file_delete: 10_000,
  api_call: 30_000,
  reasoning: 120_000,
  validation: 10_000,
  simulation: 60_000,
};

/** Margin applied on top of an action's own duration estimate. */
const ESTIMATE_TIMEOUT_FACTOR = 1.5;

const PLANNABLE_STATUSES = new Set(["validated", "simulated", "approved"]);

/**
 * Raised when the action dependency graph cannot be fully ordered. The
 * unresolved actions are those on, or downstream of, a cycle.
 */
export class PlanSynthesisError extends CoreError {
  public readonly unresolved: string[];

  constructor(graphId: string, unresolved: string[]) {
    super(`graph ${graphId} contains dependency cycles`, ERROR_CODES.PLAN_CYCLE, { graphId, unresolved });
    this.name = "PlanSynthesisError";
    this.unresolved = unresolved;
  }
}

export type SynthesisResult = { ok: true; plan: ExecutionPlan } | { ok: false; error: PlanSynthesisError };

export interface PlanSynthesizerOptions {
  defaultTimeoutMs?: number;
  maxRetries?: number;
  logger?: StructuredLogger;
  now?: () => Date;
  /** Generates plan and step ids. Defaults to random UUIDs. */
  idFactory?: () => string;
}

interface ActionOrder {
  ordered: ActionNode[];
  unresolved: string[];
}

function byPriority(a: ActionNode, b: ActionNode): number {
  return priorityRank(a.priority) - priorityRank(b.priority);
}

/**
 * Kahn's algorithm over `depends_on` edges between existing actions. The ready
 * queue is kept sorted by priority rank (stable, so ties keep insertion order)
 * and each dequeue takes its head. Actions that never reach in-degree zero are
 * returned as `unresolved` instead of looping.
 */
export function orderActions(graph: IRGraph): ActionOrder {
  const actions = graph.listActions();
  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const action of actions) {
    dependents.set(action.id, []);
  }
  for (const action of actions) {
    const dependencies = uniqueInOrder(action.dependsOn).filter((dependency) => graph.hasAction(dependency));
    indegree.set(action.id, dependencies.length);
    for (const dependency of dependencies) {
      dependents.get(dependency)?.push(action.id);
    }
  }

  const ready = actions.filter((action) => indegree.get(action.id) === 0).sort(byPriority);
  const ordered: ActionNode[] = [];
  let current = ready.shift();
  while (current) {
    ordered.push(current);
    for (const dependentId of dependents.get(current.id) ?? []) {
      const remaining = (indegree.get(dependentId) ?? 0) - 1;
      indegree.set(dependentId, remaining);
      const dependent = graph.getAction(dependentId);
      if (remaining === 0 && dependent) {
        ready.push(dependent);
      }
    }
    ready.sort(byPriority);
    current = ready.shift();
  }

  const placed = new Set(ordered.map((action) => action.id));
  return { ordered, unresolved: actions.filter((action) => !placed.has(action.id)).map((action) => action.id) };
}

/** Turns validated graphs into dependency-ordered execution plans. */
export class PlanSynthesizer {
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: PlanSynthesizerOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Builds the plan for `graph`. Graphs that were never validated are still
   * planned, with a warning; run the validator first.
   *
   * @throws PlanSynthesisError when the dependencies contain a cycle.
   */
  toExecutionPlan(graph: IRGraph): ExecutionPlan {
    if (!PLANNABLE_STATUSES.has(graph.status)) {
      this.logger.warn("plan_source_not_validated", { graph_id: graph.id, status: graph.status });
    }

    const { ordered, unresolved } = orderActions(graph);
    if (unresolved.length > 0) {
      this.logger.error("plan_synthesis_failed", { graph_id: graph.id, unresolved });
      throw new PlanSynthesisError(graph.id, unresolved);
    }

    const stepIds = new Map<string, string>();
    const steps: ExecutionStep[] = ordered.map((action, index) => {
      const step = this.actionToStep(graph, action, index + 1, stepIds);
      stepIds.set(action.id, step.stepId);
      return step;
    });

    const plan: ExecutionPlan = {
      planId: this.idFactory(),
      sourceGraphId: graph.id,
      steps,
      metadata: {
        intentCount: graph.listIntents().length,
        constraintCount: graph.listConstraints().length,
        activeConstraintCount: graph.getActiveConstraints().length,
        sourceStatus: graph.status,
      },
      createdAt: this.now().toISOString(),
      status: "created",
      currentStep: 0,
    };
    this.logger.info("plan_synthesized", { plan_id: plan.planId, graph_id: graph.id, steps: steps.length });
    return plan;
  }

  /** Same as {@link toExecutionPlan} but reports cycles as data. */
  synthesize(graph: IRGraph): SynthesisResult {
    try {
      return { ok: true, plan: this.toExecutionPlan(graph) };
    } catch (error) {
      if (error instanceof PlanSynthesisError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /** Read-only ordering of action ids; actions caught in cycles are omitted. */
  previewExecutionOrder(graph: IRGraph): string[] {
    return orderActions(graph).ordered.map((action) => action.id);
  }

  toTaskQueue(graph: IRGraph): TaskQueueItem[] {
    return planToTaskQueue(this.toExecutionPlan(graph));
  }

  /** Inserts a step with this synthesizer's default timeout and retry budget. */
  insertStep(
    plan: ExecutionPlan,
    afterStep: number,
    insertion: Omit<StepInsertion, "timeoutMs" | "maxRetries" | "stepId">,
  ): ExecutionStep {
    return insertStep(plan, afterStep, {
      ...insertion,
      timeoutMs: this.defaultTimeoutMs,
      maxRetries: this.maxRetries,
      stepId: this.idFactory(),
    });
  }

  /** 1.5x the action's own estimate when positive, else the per-kind default. */
  timeoutFor(action: ActionNode): number {
    if (action.estimatedDurationMs !== undefined && action.estimatedDurationMs > 0) {
      return Math.trunc(action.estimatedDurationMs * ESTIMATE_TIMEOUT_FACTOR);
    }
    return DEFAULT_STEP_TIMEOUTS_MS[action.kind] ?? this.defaultTimeoutMs;
  }

  private actionToStep(
    graph: IRGraph,
    action: ActionNode,
    stepNumber: number,
    stepIds: ReadonlyMap<string, string>,
  ): ExecutionStep {
    const dependencies = uniqueInOrder(action.dependsOn).flatMap((dependency) => {
      const stepId = stepIds.get(dependency);
      return stepId === undefined ? [] : [stepId];
    });
    const constraints = action.constrainedBy.flatMap((constraintId) => {
      const constraint = graph.getConstraint(constraintId);
      return constraint ? [constraint.description] : [];
    });
    return {
      stepId: this.idFactory(),
      stepNumber,
      actionId: action.id,
      actionKind: action.kind,
      description: action.description,
      target: action.target,
      parameters: { ...action.parameters },
      dependencies,
      constraints,
      timeoutMs: this.timeoutFor(action),
      retryCount: 0,
      maxRetries: this.maxRetries,
      status: "pending",
    };
  }
}
