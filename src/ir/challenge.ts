import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { IRGraph } from "./graph.js";
import type { ConstraintNode } from "./nodes.js";
import { statusRank } from "./types.js";

/** Descriptions shorter than this are treated as too vague to act on. */
export const MIN_CONSTRAINT_DESCRIPTION_LENGTH = 10;
/** Constraints below this confidence are sent back for review. */
export const MIN_CONSTRAINT_CONFIDENCE = 0.5;

export interface ConstraintChallenge {
  constraintId: string;
  reason: string;
  alternative: string;
}

export interface ConstraintInvalidation {
  constraintId: string;
  reason: string;
}

export interface ChallengeResult {
  challenged: ConstraintChallenge[];
  invalidated: ConstraintInvalidation[];
  /** True when the findings were written back to the graph. */
  applied: boolean;
}

export interface RuleChallengeOptions {
  /** Apply findings through the constraint lifecycle. Defaults to true. */
  autoApply?: boolean;
  logger?: StructuredLogger;
}

function challengesFor(constraint: ConstraintNode): ConstraintChallenge[] {
  const findings: ConstraintChallenge[] = [];
  if (constraint.description.length < MIN_CONSTRAINT_DESCRIPTION_LENGTH) {
    findings.push({
      constraintId: constraint.id,
      reason: "Constraint description is too vague",
      alternative: "Provide more specific requirements",
    });
  }
  if (constraint.appliesTo.length === 0) {
    findings.push({
      constraintId: constraint.id,
      reason: "Constraint does not apply to any intent or action",
      alternative: "Specify which intents/actions this constraint applies to",
    });
  }
  if (constraint.confidence < MIN_CONSTRAINT_CONFIDENCE) {
    findings.push({
      constraintId: constraint.id,
      reason: `Low confidence constraint (${constraint.confidence.toFixed(2)})`,
      alternative: "Review and verify this constraint",
    });
  }
  return findings;
}

function contradicts(constraint: ConstraintNode): boolean {
  const text = constraint.description.toLowerCase();
  return text.includes("always") && text.includes("never");
}

/**
 * Challenges the graph's active constraints without any external critic:
 * vague, orphan and low-confidence constraints are challenged, and one that
 * says both "always" and "never" is invalidated. With `autoApply` the
 * findings go through {@link IRGraph.challengeConstraint} and
 * {@link IRGraph.invalidateConstraint}, and a graph not yet past
 * `challenged` is moved there.
 */
export function challengeConstraintsByRules(graph: IRGraph, options: RuleChallengeOptions = {}): ChallengeResult {
  const autoApply = options.autoApply ?? true;
  const logger = options.logger ?? createSilentLogger();
  const challenged: ConstraintChallenge[] = [];
  const invalidated: ConstraintInvalidation[] = [];

  for (const constraint of graph.getActiveConstraints()) {
    const findings = challengesFor(constraint);
    challenged.push(...findings);
    const invalidation = contradicts(constraint)
      ? { constraintId: constraint.id, reason: "Constraint contains conflicting terms (always + never)" }
      : null;
    if (invalidation) {
      invalidated.push(invalidation);
    }
    if (!autoApply) {
      continue;
    }
    const [first] = findings;
    if (invalidation) {
      graph.invalidateConstraint(constraint.id, invalidation.reason);
    } else if (first) {
      graph.challengeConstraint(
        constraint.id,
        findings.map((finding) => finding.reason).join("; "),
        first.alternative,
      );
    }
  }

  const found = challenged.length + invalidated.length > 0;
  if (autoApply && found && statusRank(graph.status) < statusRank("challenged")) {
    graph.setStatus("challenged");
  }
  logger.info("constraints_challenged", {
    graph_id: graph.id,
    challenged: challenged.length,
    invalidated: invalidated.length,
    applied: autoApply,
  });
  return { challenged, invalidated, applied: autoApply };
}
