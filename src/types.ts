/**
 * Error codes shared by the graph, planner, scenario and evaluator modules.
 * Every typed error raised across a module boundary carries one of them.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    INVALID_SNAPSHOT: "E-GRAPH-INVALID-SNAPSHOT",
    INVALID_PATCH: "E-GRAPH-INVALID-PATCH",
    STATUS_TRANSITION: "E-GRAPH-STATUS-TRANSITION",
    CONSTRAINT_TRANSITION: "E-GRAPH-CONSTRAINT-TRANSITION",
    NODE_NOT_FOUND: "E-GRAPH-NODE-NOT-FOUND",
  },
  PLAN: {
    CYCLE: "E-PLAN-CYCLE",
    STEP_NOT_FOUND: "E-PLAN-STEP-NOT-FOUND",
    INVALID_POSITION: "E-PLAN-INVALID-POSITION",
    RETRY_EXHAUSTED: "E-PLAN-RETRY-EXHAUSTED",
  },
  EVAL: {
    INVALID_THRESHOLDS: "E-EVAL-INVALID-THRESHOLDS",
  },
  SCENARIO: {
    INVALID: "E-SCENARIO-INVALID",
    NOT_FOUND: "E-SCENARIO-NOT-FOUND",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `PLAN_CYCLE`).
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const [familyKey, family] of Object.entries(catalog)) {
    for (const [codeKey, code] of Object.entries(family)) {
      flat[`${familyKey}_${codeKey}`] = code;
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.PLAN_CYCLE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union of every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/**
 * Base class for the typed errors raised by the core. Subclasses only pick a
 * name; the code and optional details travel with every instance.
 */
export class CoreError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = "CoreError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/** Maximum number of UTF-16 code units kept when an error message is surfaced as data. */
export const ERROR_TEXT_MAX_LENGTH = 200;

/**
 * Collapses whitespace and truncates the message so failure modes recorded in
 * run documents stay on a single readable line.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Extracts a printable message from any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return normaliseErrorMessage(error.message);
  }
  return normaliseErrorMessage(String(error));
}
