/**
 * Closed label sets of the intent/constraint/action graph. Each set is an
 * `as const` tuple so the union type and the runtime allow-list cannot drift,
 * and each has a lenient parser mapping external labels onto the set with a
 * documented fallback instead of failing.
 */

export const INTENT_KINDS = [
  "create",
  "modify",
  "delete",
  "query",
  "analyze",
  "transform",
  "validate",
  "execute",
] as const;
export type IntentKind = (typeof INTENT_KINDS)[number];

/**
 * Constraint origins: `explicit` stated by the user, `implicit` inferred from
 * context, `hidden` discovered through analysis, `false` detected as
 * unnecessary, `system` imposed by the platform.
 */
export const CONSTRAINT_KINDS = ["explicit", "implicit", "hidden", "false", "system"] as const;
export type ConstraintKind = (typeof CONSTRAINT_KINDS)[number];

export const CONSTRAINT_STATUSES = ["active", "challenged", "invalidated"] as const;
export type ConstraintStatus = (typeof CONSTRAINT_STATUSES)[number];

export const ACTION_KINDS = [
  "code_write",
  "code_read",
  "code_modify",
  "file_create",
  "file_delete",
  "api_call",
  "reasoning",
  "validation",
  "simulation",
] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

/** Ordered from most to least urgent; the index doubles as the scheduling rank. */
export const NODE_PRIORITIES = ["critical", "high", "medium", "low"] as const;
export type NodePriority = (typeof NODE_PRIORITIES)[number];

/** Lifecycle of a graph, in promotion order. */
export const GRAPH_STATUSES = ["draft", "compiled", "validated", "challenged", "simulated", "approved"] as const;
export type GraphStatus = (typeof GRAPH_STATUSES)[number];

/**
 * Maps an external label onto `allowed`, ignoring case and surrounding
 * whitespace. Unknown or non-string labels resolve to `fallback`.
 */
export function parseLabel<T extends string>(allowed: readonly T[], raw: unknown, fallback: T): T {
  if (typeof raw !== "string") {
    return fallback;
  }
  const normalised = raw.trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalised) ?? fallback;
}

export const parseIntentKind = (raw: unknown): IntentKind => parseLabel(INTENT_KINDS, raw, "execute");
export const parseConstraintKind = (raw: unknown): ConstraintKind => parseLabel(CONSTRAINT_KINDS, raw, "implicit");
export const parseConstraintStatus = (raw: unknown): ConstraintStatus =>
  parseLabel(CONSTRAINT_STATUSES, raw, "active");
export const parseActionKind = (raw: unknown): ActionKind => parseLabel(ACTION_KINDS, raw, "reasoning");
export const parsePriority = (raw: unknown): NodePriority => parseLabel(NODE_PRIORITIES, raw, "medium");
export const parseGraphStatus = (raw: unknown): GraphStatus => parseLabel(GRAPH_STATUSES, raw, "draft");

/** Scheduling rank of a priority: critical (0) dequeues before low (3). */
export function priorityRank(priority: NodePriority): number {
  return NODE_PRIORITIES.indexOf(priority);
}

/** Position of a status along the promotion order. */
export function statusRank(status: GraphStatus): number {
  return GRAPH_STATUSES.indexOf(status);
}

/** Free-form parameters attached to intents and actions. */
export type NodeParameters = Record<string, unknown>;
