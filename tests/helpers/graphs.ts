import { IRGraph } from "../../src/ir/graph.js";
import { createAction, createConstraint, createIntent } from "../../src/ir/nodes.js";
import type { RandomSource } from "../../src/utils/random.js";

export const FIXED_INSTANT = "2024-03-01T09:30:00.000Z";

/** Clock frozen at {@link FIXED_INSTANT}. */
export function fixedClock(): () => Date {
  return () => new Date(FIXED_INSTANT);
}

/** Predictable id generator: `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = "id"): () => string {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter}`;
  };
}

/**
 * Replays the listed draws, then keeps returning `fallback`. Lets a test pin
 * exactly which simulated action fails.
 */
export class ScriptedRandom implements RandomSource {
  private readonly values: number[];
  public draws = 0;

  constructor(values: readonly number[], private readonly fallback = 0.99) {
    this.values = [...values];
  }

  next(): number {
    this.draws += 1;
    return this.values.shift() ?? this.fallback;
  }
}

/**
 * One intent served by three chained actions:
 * a1 (code_read) -> a2 (code_write, constrained by c1) -> a3 (validation).
 * The graph validates without findings.
 */
export function buildLoginGraph(options: { id?: string } = {}): IRGraph {
  const graph = new IRGraph({ id: options.id ?? "graph-login", now: fixedClock() });
  graph.addIntent(
    createIntent({ id: "i1", kind: "create", description: "Add a login endpoint", target: "auth-service" }),
  );
  graph.addConstraint(
    createConstraint({ id: "c1", kind: "explicit", description: "Must use bcrypt", appliesTo: ["a2"] }),
  );
  graph.addAction(
    createAction({
      id: "a1",
      kind: "code_read",
      description: "Read the existing routes",
      target: "src/routes.ts",
      derivedFromIntent: "i1",
    }),
  );
  graph.addAction(
    createAction({
      id: "a2",
      kind: "code_write",
      description: "Write the login handler",
      target: "src/login.ts",
      derivedFromIntent: "i1",
      constrainedBy: ["c1"],
      dependsOn: ["a1"],
    }),
  );
  graph.addAction(
    createAction({
      id: "a3",
      kind: "validation",
      description: "Run the auth test suite",
      target: "tests/auth",
      derivedFromIntent: "i1",
      dependsOn: ["a2"],
    }),
  );
  return graph;
}
