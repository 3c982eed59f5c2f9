import { z } from "zod";

import { CoreError, ERROR_CODES } from "../types.js";
import { omitUndefinedEntries } from "../utils/object.js";
import { IRGraph, type IRGraphOptions } from "./graph.js";
import {
  createAction,
  createConstraint,
  createIntent,
  type ActionNode,
  type ConstraintNode,
  type IntentNode,
} from "./nodes.js";
import {
  parseActionKind,
  parseConstraintKind,
  parseConstraintStatus,
  parseGraphStatus,
  parseIntentKind,
  parsePriority,
} from "./types.js";

/**
 * Identifiers may arrive as strings or numbers depending on the producer; they
 * are always rendered back as strings.
 */
const idSchema = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));

const optionalIdSchema = idSchema.nullish().transform((value) => value ?? null);
const optionalTextSchema = z.string().nullish().transform((value) => value ?? null);
const idListSchema = z.array(idSchema).default([]);
const parametersSchema = z.record(z.unknown()).default({});

/**
 * Label fields accept anything: unknown labels resolve to the documented
 * fallback of their set rather than rejecting the document.
 */
const intentKindSchema = z.unknown().transform(parseIntentKind);
const constraintKindSchema = z.unknown().transform(parseConstraintKind);
const constraintStatusSchema = z.unknown().transform(parseConstraintStatus);
const actionKindSchema = z.unknown().transform(parseActionKind);
const prioritySchema = z.unknown().transform(parsePriority);
const graphStatusSchema = z.unknown().transform(parseGraphStatus);

export const intentSnapshotSchema = z.object({
  node_id: idSchema,
  intent_type: intentKindSchema,
  description: z.string().default(""),
  target: z.string().nullish().transform((value) => value ?? ""),
  parameters: parametersSchema,
  priority: prioritySchema,
  confidence: z.number().default(1),
  source_text: optionalTextSchema,
  parent_intent_id: optionalIdSchema,
  child_intent_ids: idListSchema,
});

export const constraintSnapshotSchema = z.object({
  node_id: idSchema,
  constraint_type: constraintKindSchema,
  status: constraintStatusSchema,
  description: z.string().default(""),
  expression: optionalTextSchema,
  applies_to: idListSchema,
  priority: prioritySchema,
  confidence: z.number().default(1),
  challenge_reason: optionalTextSchema,
  alternative_suggestion: optionalTextSchema,
});

export const actionSnapshotSchema = z.object({
  node_id: idSchema,
  action_type: actionKindSchema,
  description: z.string().default(""),
  target: z.string().nullish().transform((value) => value ?? ""),
  parameters: parametersSchema,
  priority: prioritySchema,
  derived_from_intent: optionalIdSchema,
  constrained_by: idListSchema,
  depends_on: idListSchema,
  estimated_duration_ms: z.number().nonnegative().nullish().transform((value) => value ?? null),
  risk_level: z.number().default(0),
  rollback_action: optionalTextSchema,
});

const metadataSchema = z.object({
  source: z.string().optional(),
  session_id: z.string().nullish(),
  version: z.number().int().optional(),
  tags: z.array(z.string()).optional(),
  context: z.record(z.unknown()).optional(),
});

export const graphSnapshotSchema = z.object({
  graph_id: idSchema,
  status: graphStatusSchema,
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  metadata: metadataSchema.optional(),
  intents: z.array(intentSnapshotSchema).default([]),
  constraints: z.array(constraintSnapshotSchema).default([]),
  actions: z.array(actionSnapshotSchema).default([]),
});

export type IntentSnapshot = z.output<typeof intentSnapshotSchema>;
export type ConstraintSnapshot = z.output<typeof constraintSnapshotSchema>;
export type ActionSnapshot = z.output<typeof actionSnapshotSchema>;
/** Normalised, JSON-serialisable document describing a whole graph. */
export type GraphSnapshot = z.output<typeof graphSnapshotSchema>;

/** Structural problem found while parsing a snapshot document. */
export interface SnapshotIssue {
  path: string;
  message: string;
}

export type SnapshotParseResult =
  | { ok: true; snapshot: GraphSnapshot }
  | { ok: false; issues: SnapshotIssue[] };

/** Raised by {@link graphFromSnapshot} when the document is structurally unusable. */
export class GraphSnapshotError extends CoreError {
  public readonly issues: SnapshotIssue[];

  constructor(issues: SnapshotIssue[]) {
    super(
      `invalid graph snapshot: ${issues.map((issue) => `${issue.path || "<root>"} ${issue.message}`).join("; ")}`,
      ERROR_CODES.GRAPH_INVALID_SNAPSHOT,
      { issues },
    );
    this.name = "GraphSnapshotError";
    this.issues = issues;
  }
}

/** Converts zod issues into the flat `{ path, message }` shape used across the core. */
export function toSnapshotIssues(error: z.ZodError): SnapshotIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/**
 * Parses a producer document. Only wrong JSON types are rejected here; empty
 * descriptions, out-of-range confidences and dangling ids are kept so the
 * validator can report them.
 */
export function parseGraphSnapshot(input: unknown): SnapshotParseResult {
  const parsed = graphSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, issues: toSnapshotIssues(parsed.error) };
  }
  return { ok: true, snapshot: parsed.data };
}

export function intentFromSnapshot(entry: IntentSnapshot): IntentNode {
  return createIntent({
    id: entry.node_id,
    kind: entry.intent_type,
    description: entry.description,
    target: entry.target,
    parameters: entry.parameters,
    priority: entry.priority,
    confidence: entry.confidence,
    childIds: entry.child_intent_ids,
    ...omitUndefinedEntries({
      sourceText: entry.source_text ?? undefined,
      parentId: entry.parent_intent_id ?? undefined,
    }),
  });
}

export function constraintFromSnapshot(entry: ConstraintSnapshot): ConstraintNode {
  return createConstraint({
    id: entry.node_id,
    kind: entry.constraint_type,
    status: entry.status,
    description: entry.description,
    appliesTo: entry.applies_to,
    priority: entry.priority,
    confidence: entry.confidence,
    ...omitUndefinedEntries({
      expression: entry.expression ?? undefined,
      challengeReason: entry.challenge_reason ?? undefined,
      alternative: entry.alternative_suggestion ?? undefined,
    }),
  });
}

export function actionFromSnapshot(entry: ActionSnapshot): ActionNode {
  return createAction({
    id: entry.node_id,
    kind: entry.action_type,
    description: entry.description,
    target: entry.target,
    parameters: entry.parameters,
    priority: entry.priority,
    constrainedBy: entry.constrained_by,
    dependsOn: entry.depends_on,
    riskLevel: entry.risk_level,
    ...omitUndefinedEntries({
      derivedFromIntent: entry.derived_from_intent ?? undefined,
      estimatedDurationMs: entry.estimated_duration_ms ?? undefined,
      rollback: entry.rollback_action ?? undefined,
    }),
  });
}

/**
 * Builds an {@link IRGraph} from a producer document.
 *
 * @throws GraphSnapshotError when the document does not have the snapshot shape.
 */
export function graphFromSnapshot(input: unknown, options: Pick<IRGraphOptions, "now"> = {}): IRGraph {
  const parsed = parseGraphSnapshot(input);
  if (!parsed.ok) {
    throw new GraphSnapshotError(parsed.issues);
  }
  const { snapshot } = parsed;
  const metadata = snapshot.metadata;
  const graph = new IRGraph({
    id: snapshot.graph_id,
    status: snapshot.status,
    ...(options.now ? { now: options.now } : {}),
    ...(metadata
      ? {
          metadata: omitUndefinedEntries({
            source: metadata.source,
            sessionId: metadata.session_id ?? undefined,
            version: metadata.version,
            tags: metadata.tags,
            context: metadata.context,
          }),
        }
      : {}),
  });
  for (const entry of snapshot.intents) {
    graph.addIntent(intentFromSnapshot(entry));
  }
  for (const entry of snapshot.constraints) {
    graph.addConstraint(constraintFromSnapshot(entry));
  }
  for (const entry of snapshot.actions) {
    graph.addAction(actionFromSnapshot(entry));
  }
  return graph;
}

/** Renders the graph as a detached snapshot document; later graph mutations do not leak into it. */
export function graphToSnapshot(graph: IRGraph): GraphSnapshot {
  return {
    graph_id: graph.id,
    status: graph.status,
    metadata: {
      source: graph.metadata.source,
      session_id: graph.metadata.sessionId ?? null,
      version: graph.metadata.version,
      tags: [...graph.metadata.tags],
      context: structuredClone(graph.metadata.context),
    },
    intents: graph.listIntents().map((intent) => ({
      node_id: intent.id,
      intent_type: intent.kind,
      description: intent.description,
      target: intent.target,
      parameters: structuredClone(intent.parameters),
      priority: intent.priority,
      confidence: intent.confidence,
      source_text: intent.sourceText ?? null,
      parent_intent_id: intent.parentId ?? null,
      child_intent_ids: [...intent.childIds],
    })),
    constraints: graph.listConstraints().map((constraint) => ({
      node_id: constraint.id,
      constraint_type: constraint.kind,
      status: constraint.status,
      description: constraint.description,
      expression: constraint.expression ?? null,
      applies_to: [...constraint.appliesTo],
      priority: constraint.priority,
      confidence: constraint.confidence,
      challenge_reason: constraint.challengeReason ?? null,
      alternative_suggestion: constraint.alternative ?? null,
    })),
    actions: graph.listActions().map((action) => ({
      node_id: action.id,
      action_type: action.kind,
      description: action.description,
      target: action.target,
      parameters: structuredClone(action.parameters),
      priority: action.priority,
      derived_from_intent: action.derivedFromIntent ?? null,
      constrained_by: [...action.constrainedBy],
      depends_on: [...action.dependsOn],
      estimated_duration_ms: action.estimatedDurationMs ?? null,
      risk_level: action.riskLevel,
      rollback_action: action.rollback ?? null,
    })),
  };
}
