import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { IRGraph } from "./graph.js";
import type { ConstraintNode } from "./nodes.js";

/** Semver of the rule set; bumped whenever a check is added or its severity changes. */
export const VALIDATOR_VERSION = "1.1.0";

export type ValidationSeverity = "error" | "warning" | "info";

/** Stable codes emitted by {@link IRValidator}. */
export type ValidationCode =
  | "INTENT_NO_DESCRIPTION"
  | "INTENT_NO_TARGET"
  | "INTENT_INVALID_CONFIDENCE"
  | "CONSTRAINT_NO_DESCRIPTION"
  | "CONSTRAINT_INVALID_CONFIDENCE"
  | "ACTION_NO_DESCRIPTION"
  | "ACTION_NO_TARGET"
  | "ACTION_INVALID_RISK_LEVEL"
  | "INTENT_INVALID_PARENT"
  | "INTENT_INVALID_CHILD"
  | "CONSTRAINT_INVALID_REFERENCE"
  | "ACTION_INVALID_INTENT_REF"
  | "ACTION_INVALID_CONSTRAINT_REF"
  | "ACTION_INVALID_DEPENDENCY"
  | "CONSTRAINT_CONFLICT"
  | "CONSTRAINT_ORPHAN"
  | "FALSE_CONSTRAINT_ACTIVE"
  | "DEPENDENCY_CYCLE"
  | "NO_INTENTS"
  | "NO_ACTIONS"
  | "INTENT_NO_ACTION";

export interface ValidationIssue {
  code: ValidationCode;
  message: string;
  /** Originating node, `null` for graph-level findings. */
  nodeId: string | null;
  severity: ValidationSeverity;
}

export interface ValidationResult {
  /** False iff at least one error was recorded. */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  info: ValidationIssue[];
  graphId: string;
  validatedAt: string;
  validatorVersion: string;
}

export interface IRValidatorOptions {
  /** Records every warning as an error. */
  strictMode?: boolean;
  /** Turns the zero-action finding from a warning into an error. */
  requireActions?: boolean;
  logger?: StructuredLogger;
  now?: () => Date;
}

/**
 * Keyword pairs whose members, found one in each of two constraint
 * descriptions, flag the pair as potentially conflicting. Plain substring
 * matching: "must" also matches inside "must not".
 */
const ANTONYM_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ["must", "must not"],
  ["required", "forbidden"],
  ["always", "never"],
  ["include", "exclude"],
];

/** Accumulates findings for a single validation run. */
class IssueCollector {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];
  readonly info: ValidationIssue[] = [];

  constructor(private readonly strict: boolean) {}

  error(code: ValidationCode, message: string, nodeId: string | null): void {
    this.errors.push({ code, message, nodeId, severity: "error" });
  }

  warning(code: ValidationCode, message: string, nodeId: string | null): void {
    if (this.strict) {
      this.error(code, message, nodeId);
      return;
    }
    this.warnings.push({ code, message, nodeId, severity: "warning" });
  }

  note(code: ValidationCode, message: string, nodeId: string | null): void {
    this.info.push({ code, message, nodeId, severity: "info" });
  }
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

function inUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/** Returns true when the two descriptions trigger one of the antonym pairs. */
export function constraintsMayConflict(first: ConstraintNode, second: ConstraintNode): boolean {
  const a = first.description.toLowerCase();
  const b = second.description.toLowerCase();
  return ANTONYM_PAIRS.some(
    ([positive, negative]) => (a.includes(positive) && b.includes(negative)) || (a.includes(negative) && b.includes(positive)),
  );
}

/**
 * Finds every dependency cycle among actions using a DFS that tracks the
 * nodes currently on the recursion stack. Each back edge yields one cycle,
 * reported as the path from the re-entered node back to itself. Dangling
 * dependency ids are ignored here; the referential pass reports them.
 */
export function findDependencyCycles(graph: IRGraph): string[][] {
  const visiting = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (actionId: string): void => {
    visiting.add(actionId);
    stack.push(actionId);
    for (const dependencyId of graph.getAction(actionId)?.dependsOn ?? []) {
      if (!graph.hasAction(dependencyId)) {
        continue;
      }
      if (visiting.has(dependencyId)) {
        cycles.push(stack.slice(stack.indexOf(dependencyId)).concat(dependencyId));
        continue;
      }
      if (!visited.has(dependencyId)) {
        visit(dependencyId);
      }
    }
    visiting.delete(actionId);
    visited.add(actionId);
    stack.pop();
  };

  for (const action of graph.listActions()) {
    if (!visited.has(action.id)) {
      visit(action.id);
    }
  }
  return cycles;
}

/**
 * Five-pass validator for intent/constraint/action graphs. Passes never
 * short-circuit one another: a single run reports everything it finds, and
 * running it twice on an unchanged graph yields identical lists.
 */
export class IRValidator {
  private readonly strictMode: boolean;
  private readonly requireActions: boolean;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;

  constructor(options: IRValidatorOptions = {}) {
    this.strictMode = options.strictMode ?? false;
    this.requireActions = options.requireActions ?? false;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  validate(graph: IRGraph): ValidationResult {
    const issues = new IssueCollector(this.strictMode);
    this.checkSchema(graph, issues);
    this.checkReferences(graph, issues);
    this.checkConstraints(graph, issues);
    this.checkDependencies(graph, issues);
    this.checkCompleteness(graph, issues);

    const result: ValidationResult = {
      valid: issues.errors.length === 0,
      errors: issues.errors,
      warnings: issues.warnings,
      info: issues.info,
      graphId: graph.id,
      validatedAt: this.now().toISOString(),
      validatorVersion: VALIDATOR_VERSION,
    };
    this.logger.info(result.valid ? "ir_validation_completed" : "ir_validation_failed", {
      graph_id: graph.id,
      errors: result.errors.length,
      warnings: result.warnings.length,
      info: result.info.length,
    });
    return result;
  }

  /**
   * Validates and moves the graph to `validated` on success or back to
   * `draft` on failure. Either way a `status_changed` entry is logged.
   */
  validateAndUpdateStatus(graph: IRGraph): ValidationResult {
    const result = this.validate(graph);
    graph.setStatus(result.valid ? "validated" : "draft");
    return result;
  }

  quickValidate(graph: IRGraph): boolean {
    return this.validate(graph).valid;
  }

  private checkSchema(graph: IRGraph, issues: IssueCollector): void {
    for (const intent of graph.listIntents()) {
      if (isBlank(intent.description)) {
        issues.error("INTENT_NO_DESCRIPTION", `Intent ${intent.id} has no description`, intent.id);
      }
      if (isBlank(intent.target)) {
        issues.warning("INTENT_NO_TARGET", `Intent ${intent.id} has no target specified`, intent.id);
      }
      if (!inUnitInterval(intent.confidence)) {
        issues.error(
          "INTENT_INVALID_CONFIDENCE",
          `Intent ${intent.id} has invalid confidence: ${intent.confidence}`,
          intent.id,
        );
      }
    }

    for (const constraint of graph.listConstraints()) {
      if (isBlank(constraint.description)) {
        issues.error("CONSTRAINT_NO_DESCRIPTION", `Constraint ${constraint.id} has no description`, constraint.id);
      }
      if (!inUnitInterval(constraint.confidence)) {
        issues.error(
          "CONSTRAINT_INVALID_CONFIDENCE",
          `Constraint ${constraint.id} has invalid confidence: ${constraint.confidence}`,
          constraint.id,
        );
      }
    }

    for (const action of graph.listActions()) {
      if (isBlank(action.description)) {
        issues.error("ACTION_NO_DESCRIPTION", `Action ${action.id} has no description`, action.id);
      }
      if (isBlank(action.target)) {
        issues.warning("ACTION_NO_TARGET", `Action ${action.id} has no target specified`, action.id);
      }
      if (!inUnitInterval(action.riskLevel)) {
        issues.error(
          "ACTION_INVALID_RISK_LEVEL",
          `Action ${action.id} has invalid risk level: ${action.riskLevel}`,
          action.id,
        );
      }
    }
  }

  private checkReferences(graph: IRGraph, issues: IssueCollector): void {
    for (const intent of graph.listIntents()) {
      if (intent.parentId !== undefined && !graph.hasIntent(intent.parentId)) {
        issues.error(
          "INTENT_INVALID_PARENT",
          `Intent ${intent.id} references non-existent parent ${intent.parentId}`,
          intent.id,
        );
      }
      for (const childId of intent.childIds) {
        if (!graph.hasIntent(childId)) {
          issues.error("INTENT_INVALID_CHILD", `Intent ${intent.id} references non-existent child ${childId}`, intent.id);
        }
      }
    }

    for (const constraint of graph.listConstraints()) {
      for (const targetId of constraint.appliesTo) {
        if (!graph.hasIntent(targetId) && !graph.hasAction(targetId)) {
          issues.warning(
            "CONSTRAINT_INVALID_REFERENCE",
            `Constraint ${constraint.id} applies to non-existent node ${targetId}`,
            constraint.id,
          );
        }
      }
    }

    for (const action of graph.listActions()) {
      if (action.derivedFromIntent !== undefined && !graph.hasIntent(action.derivedFromIntent)) {
        issues.warning(
          "ACTION_INVALID_INTENT_REF",
          `Action ${action.id} derived from non-existent intent ${action.derivedFromIntent}`,
          action.id,
        );
      }
      for (const constraintId of action.constrainedBy) {
        if (!graph.hasConstraint(constraintId)) {
          issues.warning(
            "ACTION_INVALID_CONSTRAINT_REF",
            `Action ${action.id} constrained by non-existent constraint ${constraintId}`,
            action.id,
          );
        }
      }
      for (const dependencyId of action.dependsOn) {
        if (!graph.hasAction(dependencyId)) {
          issues.error(
            "ACTION_INVALID_DEPENDENCY",
            `Action ${action.id} depends on non-existent action ${dependencyId}`,
            action.id,
          );
        }
      }
    }
  }

  private checkConstraints(graph: IRGraph, issues: IssueCollector): void {
    const active = graph.getActiveConstraints();
    for (let i = 0; i < active.length; i += 1) {
      const first = active[i];
      if (!first) {
        continue;
      }
      for (const second of active.slice(i + 1)) {
        const shared = first.appliesTo.some((targetId) => second.appliesTo.includes(targetId));
        if (shared && constraintsMayConflict(first, second)) {
          issues.warning("CONSTRAINT_CONFLICT", `Constraints ${first.id} and ${second.id} may conflict`, first.id);
        }
      }
    }

    for (const constraint of graph.listConstraints()) {
      if (constraint.appliesTo.length === 0) {
        issues.note("CONSTRAINT_ORPHAN", `Constraint ${constraint.id} does not apply to any nodes`, constraint.id);
      }
    }

    for (const constraint of graph.listConstraints()) {
      if (constraint.kind === "false" && constraint.status === "active") {
        issues.warning("FALSE_CONSTRAINT_ACTIVE", `False constraint ${constraint.id} is still active`, constraint.id);
      }
    }
  }

  private checkDependencies(graph: IRGraph, issues: IssueCollector): void {
    for (const cycle of findDependencyCycles(graph)) {
      const [start = ""] = cycle;
      issues.error("DEPENDENCY_CYCLE", `Circular dependency detected: ${cycle.join(" -> ")}`, start);
    }
  }

  private checkCompleteness(graph: IRGraph, issues: IssueCollector): void {
    const intents = graph.listIntents();
    const actions = graph.listActions();
    if (intents.length === 0) {
      issues.error("NO_INTENTS", "Graph has no intents defined", null);
    }
    if (actions.length === 0) {
      if (this.requireActions) {
        issues.error("NO_ACTIONS", "Graph has no actions defined", null);
      } else {
        issues.warning("NO_ACTIONS", "Graph has no actions defined", null);
      }
    }

    const handled = new Set(actions.map((action) => action.derivedFromIntent).filter((id) => id !== undefined));
    for (const intent of intents) {
      if (!handled.has(intent.id)) {
        issues.note("INTENT_NO_ACTION", `Intent ${intent.id} has no derived actions`, intent.id);
      }
    }
  }
}
