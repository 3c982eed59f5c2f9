import { randomUUID } from "node:crypto";

import { omitUndefinedEntries, uniqueInOrder } from "../utils/object.js";
import type {
  ActionKind,
  ConstraintKind,
  ConstraintStatus,
  IntentKind,
  NodeParameters,
  NodePriority,
} from "./types.js";

/** A user intention: WHAT should be achieved, independent of HOW. */
export interface IntentNode {
  id: string;
  kind: IntentKind;
  description: string;
  /** Free-text name of the resource the intent operates on. */
  target: string;
  parameters: NodeParameters;
  priority: NodePriority;
  /** Producer confidence, expected within [0, 1]. */
  confidence: number;
  sourceText?: string;
  parentId?: string;
  childIds: string[];
}

/** A boundary or requirement applying to intents and/or actions. */
export interface ConstraintNode {
  id: string;
  kind: ConstraintKind;
  status: ConstraintStatus;
  description: string;
  /** Optional machine-checkable expression. */
  expression?: string;
  /** Intent or action ids the constraint applies to. */
  appliesTo: string[];
  priority: NodePriority;
  confidence: number;
  challengeReason?: string;
  alternative?: string;
}

/** A concrete executable step derived from an intent. */
export interface ActionNode {
  id: string;
  kind: ActionKind;
  description: string;
  target: string;
  parameters: NodeParameters;
  priority: NodePriority;
  derivedFromIntent?: string;
  constrainedBy: string[];
  /** Action ids that must complete first. The relation must stay acyclic. */
  dependsOn: string[];
  estimatedDurationMs?: number;
  /** Producer-estimated risk, expected within [0, 1]. */
  riskLevel: number;
  rollback?: string;
}

export type IntentInput = Pick<IntentNode, "kind" | "description"> &
  Partial<Omit<IntentNode, "kind" | "description">>;

export type ConstraintInput = Pick<ConstraintNode, "kind" | "description"> &
  Partial<Omit<ConstraintNode, "kind" | "description">>;

export type ActionInput = Pick<ActionNode, "kind" | "description"> &
  Partial<Omit<ActionNode, "kind" | "description">>;

export function createIntent(input: IntentInput): IntentNode {
  return {
    id: input.id ?? randomUUID(),
    kind: input.kind,
    description: input.description,
    target: input.target ?? "",
    parameters: { ...(input.parameters ?? {}) },
    priority: input.priority ?? "medium",
    confidence: input.confidence ?? 1,
    childIds: uniqueInOrder(input.childIds ?? []),
    ...omitUndefinedEntries({ sourceText: input.sourceText, parentId: input.parentId }),
  };
}

export function createConstraint(input: ConstraintInput): ConstraintNode {
  return {
    id: input.id ?? randomUUID(),
    kind: input.kind,
    status: input.status ?? "active",
    description: input.description,
    appliesTo: uniqueInOrder(input.appliesTo ?? []),
    priority: input.priority ?? "medium",
    confidence: input.confidence ?? 1,
    ...omitUndefinedEntries({
      expression: input.expression,
      challengeReason: input.challengeReason,
      alternative: input.alternative,
    }),
  };
}

export function createAction(input: ActionInput): ActionNode {
  return {
    id: input.id ?? randomUUID(),
    kind: input.kind,
    description: input.description,
    target: input.target ?? "",
    parameters: { ...(input.parameters ?? {}) },
    priority: input.priority ?? "medium",
    constrainedBy: uniqueInOrder(input.constrainedBy ?? []),
    dependsOn: uniqueInOrder(input.dependsOn ?? []),
    riskLevel: input.riskLevel ?? 0,
    ...omitUndefinedEntries({
      derivedFromIntent: input.derivedFromIntent,
      estimatedDurationMs: input.estimatedDurationMs,
      rollback: input.rollback,
    }),
  };
}
