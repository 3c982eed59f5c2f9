import type { IRGraph } from "./graph.js";
import type { GraphPatch } from "./patch.js";

/** Outcome of a critique round over a draft graph. */
export interface GraphCritique {
  /** Quality estimate in [0, 1]. */
  score: number;
  issues: string[];
  /** Whether the critic considers the graph ready for validation. */
  consensus: boolean;
}

/**
 * Produces additive patches for a graph, typically backed by a language model.
 * The core only consumes the returned patch through `applyGraphPatch`.
 */
export interface GraphProposer {
  propose(graph: IRGraph, task: string, critique: GraphCritique | null): Promise<GraphPatch>;
}

export interface GraphCritic {
  critique(graph: IRGraph, task: string): Promise<GraphCritique>;
}
