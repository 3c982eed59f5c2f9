import type { GraphSnapshot } from "../ir/snapshot.js";
import { clamp } from "../utils/object.js";

export interface StructureScore {
  score: number;
  metrics: {
    intent_count: number;
    action_count: number;
    constraint_count: number;
    stub_simulation: true;
  };
}

/**
 * Structural heuristic used when no simulation engine is attached. Points are
 * awarded for having intents (0.3), actions (0.4) and constraints (0.2),
 * 0.2 is removed when intents exist without any action, and 0.1 is added when
 * there are between half and twice as many constraints as intents.
 */
export function scoreGraphStructure(snapshot: Pick<GraphSnapshot, "intents" | "actions" | "constraints">): StructureScore {
  const intentCount = snapshot.intents.length;
  const actionCount = snapshot.actions.length;
  const constraintCount = snapshot.constraints.length;

  let completeness = 0;
  if (intentCount > 0) {
    completeness += 0.3;
  }
  if (actionCount > 0) {
    completeness += 0.4;
  }
  if (constraintCount > 0) {
    completeness += 0.2;
  }
  if (intentCount > 0 && actionCount === 0) {
    completeness -= 0.2;
  }
  if (intentCount > 0) {
    const ratio = constraintCount / intentCount;
    if (ratio >= 0.5 && ratio <= 2) {
      completeness += 0.1;
    }
  }

  return {
    score: clamp(completeness, 0, 1),
    metrics: {
      intent_count: intentCount,
      action_count: actionCount,
      constraint_count: constraintCount,
      stub_simulation: true,
    },
  };
}
