import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { GraphCritic, GraphCritique, GraphProposer } from "./collaborators.js";
import type { IRGraph } from "./graph.js";
import { applyGraphPatch } from "./patch.js";

export interface RefinementOptions {
  /** Upper bound on propose/critique rounds. Defaults to 3. */
  maxRounds?: number;
  logger?: StructuredLogger;
}

export interface RefinementOutcome {
  rounds: number;
  consensus: boolean;
  lastCritique: GraphCritique | null;
}

/**
 * Alternates critique and proposal until the critic reaches consensus or the
 * round budget runs out. Patches are applied in place on `graph`.
 */
export async function refineGraph(
  graph: IRGraph,
  task: string,
  proposer: GraphProposer,
  critic: GraphCritic,
  options: RefinementOptions = {},
): Promise<RefinementOutcome> {
  const maxRounds = Math.max(1, Math.trunc(options.maxRounds ?? 3));
  const logger = options.logger ?? createSilentLogger();
  let critique: GraphCritique | null = null;

  for (let round = 1; round <= maxRounds; round += 1) {
    const patch = await proposer.propose(graph, task, critique);
    applyGraphPatch(graph, patch);
    critique = await critic.critique(graph, task);
    logger.debug("graph_refinement_round", {
      graph_id: graph.id,
      round,
      score: critique.score,
      consensus: critique.consensus,
    });
    if (critique.consensus) {
      return { rounds: round, consensus: true, lastCritique: critique };
    }
  }
  return { rounds: maxRounds, consensus: false, lastCritique: critique };
}
