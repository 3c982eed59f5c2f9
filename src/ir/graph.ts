import { randomUUID } from "node:crypto";

import { CoreError, ERROR_CODES } from "../types.js";
import type { ActionNode, ConstraintNode, IntentNode } from "./nodes.js";
import { priorityRank, statusRank, type GraphStatus } from "./types.js";

/** Raised when a status change would move the graph backwards illegally. */
export class GraphStatusError extends CoreError {
  constructor(from: GraphStatus, to: GraphStatus) {
    super(`graph status cannot move from ${from} to ${to}`, ERROR_CODES.GRAPH_STATUS_TRANSITION, { from, to });
    this.name = "GraphStatusError";
  }
}

/** Raised when a constraint is asked to leave a terminal or incompatible status. */
export class ConstraintTransitionError extends CoreError {
  constructor(constraintId: string, from: string, to: string) {
    super(
      `constraint ${constraintId} cannot move from ${from} to ${to}`,
      ERROR_CODES.GRAPH_CONSTRAINT_TRANSITION,
      { constraintId, from, to },
    );
    this.name = "ConstraintTransitionError";
  }
}

/** Raised when an operation names a node the graph does not own. */
export class GraphNodeNotFoundError extends CoreError {
  constructor(kind: "intent" | "constraint" | "action", nodeId: string) {
    super(`unknown ${kind} ${nodeId}`, ERROR_CODES.GRAPH_NODE_NOT_FOUND, { kind, nodeId });
    this.name = "GraphNodeNotFoundError";
  }
}

/** Append-only audit entry recorded for every mutation of the graph. */
export interface ProcessingLogEntry {
  readonly event: string;
  readonly payload: Record<string, unknown>;
  readonly timestamp: string;
}

/** Free-form provenance attached to a graph by its producer. */
export interface GraphMetadata {
  source: string;
  sessionId?: string;
  version: number;
  tags: string[];
  context: Record<string, unknown>;
}

export interface IRGraphOptions {
  id?: string;
  status?: GraphStatus;
  metadata?: Partial<GraphMetadata>;
  /** Clock used to timestamp processing log entries. */
  now?: () => Date;
}

/** Compact counters describing a graph. */
export interface GraphSummary {
  graph_id: string;
  status: GraphStatus;
  intent_count: number;
  constraint_count: number;
  action_count: number;
  active_constraints: number;
  challenged_constraints: number;
  log_entries: number;
}

/**
 * Arena owning every intent, constraint and action of a request. Nodes refer
 * to one another by id only; cross references are resolved through the maps
 * below, so dangling ids are representable and left for the validator.
 */
export class IRGraph {
  public readonly id: string;
  public readonly metadata: GraphMetadata;
  private currentStatus: GraphStatus;
  private readonly intents = new Map<string, IntentNode>();
  private readonly constraints = new Map<string, ConstraintNode>();
  private readonly actions = new Map<string, ActionNode>();
  private readonly log: ProcessingLogEntry[] = [];
  private readonly now: () => Date;

  constructor(options: IRGraphOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.currentStatus = options.status ?? "draft";
    this.now = options.now ?? (() => new Date());
    this.metadata = {
      source: options.metadata?.source ?? "user_input",
      version: options.metadata?.version ?? 1,
      tags: [...(options.metadata?.tags ?? [])],
      context: { ...(options.metadata?.context ?? {}) },
      ...(options.metadata?.sessionId !== undefined ? { sessionId: options.metadata.sessionId } : {}),
    };
  }

  get status(): GraphStatus {
    return this.currentStatus;
  }

  get processingLog(): readonly ProcessingLogEntry[] {
    return this.log;
  }

  // -- node management ------------------------------------------------------

  addIntent(intent: IntentNode): string {
    this.intents.set(intent.id, intent);
    this.record("intent_added", { intent_id: intent.id });
    return intent.id;
  }

  addConstraint(constraint: ConstraintNode): string {
    this.constraints.set(constraint.id, constraint);
    this.record("constraint_added", { constraint_id: constraint.id });
    return constraint.id;
  }

  addAction(action: ActionNode): string {
    this.actions.set(action.id, action);
    this.record("action_added", { action_id: action.id });
    return action.id;
  }

  getIntent(id: string): IntentNode | undefined {
    return this.intents.get(id);
  }

  getConstraint(id: string): ConstraintNode | undefined {
    return this.constraints.get(id);
  }

  getAction(id: string): ActionNode | undefined {
    return this.actions.get(id);
  }

  hasIntent(id: string): boolean {
    return this.intents.has(id);
  }

  hasConstraint(id: string): boolean {
    return this.constraints.has(id);
  }

  hasAction(id: string): boolean {
    return this.actions.has(id);
  }

  removeIntent(id: string): boolean {
    return this.removeFrom(this.intents, id, "intent_removed", "intent_id");
  }

  removeConstraint(id: string): boolean {
    return this.removeFrom(this.constraints, id, "constraint_removed", "constraint_id");
  }

  removeAction(id: string): boolean {
    return this.removeFrom(this.actions, id, "action_removed", "action_id");
  }

  /** Records `childId` as a child of `parentId` and back-links the parent. */
  addChildIntent(parentId: string, childId: string): void {
    const parent = this.requireIntent(parentId);
    const child = this.requireIntent(childId);
    if (!parent.childIds.includes(childId)) {
      parent.childIds.push(childId);
    }
    child.parentId = parentId;
    this.record("intent_child_added", { intent_id: parentId, child_id: childId });
  }

  /** Adds a `depends_on` edge; acyclicity is checked by the validator, not here. */
  addActionDependency(actionId: string, dependencyId: string): void {
    const action = this.getAction(actionId);
    if (!action) {
      throw new GraphNodeNotFoundError("action", actionId);
    }
    if (!action.dependsOn.includes(dependencyId)) {
      action.dependsOn.push(dependencyId);
      this.record("action_dependency_added", { action_id: actionId, depends_on: dependencyId });
    }
  }

  // -- queries ----------------------------------------------------------------

  listIntents(): IntentNode[] {
    return Array.from(this.intents.values());
  }

  listConstraints(): ConstraintNode[] {
    return Array.from(this.constraints.values());
  }

  listActions(): ActionNode[] {
    return Array.from(this.actions.values());
  }

  getActiveConstraints(): ConstraintNode[] {
    return this.listConstraints().filter((constraint) => constraint.status === "active");
  }

  getChallengedConstraints(): ConstraintNode[] {
    return this.listConstraints().filter((constraint) => constraint.status === "challenged");
  }

  getRootIntents(): IntentNode[] {
    return this.listIntents().filter((intent) => intent.parentId === undefined);
  }

  /** Actions sorted critical-first; ties keep insertion order. */
  getActionsByPriority(): ActionNode[] {
    return this.listActions().sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));
  }

  /** Constraints whose `appliesTo` names the given intent or action. */
  getConstraintsFor(nodeId: string): ConstraintNode[] {
    return this.listConstraints().filter((constraint) => constraint.appliesTo.includes(nodeId));
  }

  // -- constraint lifecycle ---------------------------------------------------

  /**
   * Moves an active constraint to `challenged`, recording the reason and an
   * optional alternative. The node stays in the graph.
   */
  challengeConstraint(id: string, reason: string, alternative?: string): ConstraintNode {
    const constraint = this.requireConstraint(id);
    if (constraint.status !== "active") {
      throw new ConstraintTransitionError(id, constraint.status, "challenged");
    }
    constraint.status = "challenged";
    constraint.challengeReason = reason;
    if (alternative !== undefined) {
      constraint.alternative = alternative;
    }
    this.record("constraint_challenged", { constraint_id: id, reason });
    return constraint;
  }

  /** Marks a constraint inert. Allowed from `active` and `challenged`. */
  invalidateConstraint(id: string, reason: string): ConstraintNode {
    const constraint = this.requireConstraint(id);
    if (constraint.status === "invalidated") {
      throw new ConstraintTransitionError(id, constraint.status, "invalidated");
    }
    constraint.status = "invalidated";
    constraint.challengeReason = reason;
    this.record("constraint_invalidated", { constraint_id: id, reason });
    return constraint;
  }

  // -- status -----------------------------------------------------------------

  /**
   * Updates the lifecycle status. Forward moves are always accepted; the only
   * backward moves are the validator's: back to `draft` on failure and back to
   * `validated` when a later-stage graph is re-validated.
   */
  setStatus(next: GraphStatus): void {
    const previous = this.currentStatus;
    const backwards = statusRank(next) < statusRank(previous);
    if (backwards && next !== "draft" && next !== "validated") {
      throw new GraphStatusError(previous, next);
    }
    this.currentStatus = next;
    this.record("status_changed", { old: previous, new: next });
  }

  /** Appends an audit entry; exposed for stages that act on the graph from outside. */
  record(event: string, payload: Record<string, unknown>): void {
    this.log.push({ event, payload, timestamp: this.now().toISOString() });
  }

  toSummary(): GraphSummary {
    return {
      graph_id: this.id,
      status: this.currentStatus,
      intent_count: this.intents.size,
      constraint_count: this.constraints.size,
      action_count: this.actions.size,
      active_constraints: this.getActiveConstraints().length,
      challenged_constraints: this.getChallengedConstraints().length,
      log_entries: this.log.length,
    };
  }

  private requireIntent(id: string): IntentNode {
    const intent = this.intents.get(id);
    if (!intent) {
      throw new GraphNodeNotFoundError("intent", id);
    }
    return intent;
  }

  private requireConstraint(id: string): ConstraintNode {
    const constraint = this.constraints.get(id);
    if (!constraint) {
      throw new GraphNodeNotFoundError("constraint", id);
    }
    return constraint;
  }

  private removeFrom<T>(store: Map<string, T>, id: string, event: string, key: string): boolean {
    if (!store.delete(id)) {
      return false;
    }
    this.record(event, { [key]: id });
    return true;
  }
}
