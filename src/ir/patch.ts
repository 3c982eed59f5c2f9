import { z } from "zod";

import { CoreError, ERROR_CODES } from "../types.js";
import type { IRGraph } from "./graph.js";
import {
  actionFromSnapshot,
  actionSnapshotSchema,
  constraintFromSnapshot,
  constraintSnapshotSchema,
  intentFromSnapshot,
  intentSnapshotSchema,
  toSnapshotIssues,
  type SnapshotIssue,
} from "./snapshot.js";

/** Additive change proposed by a graph producer: new nodes only. */
export const graphPatchSchema = z.object({
  intents: z.array(intentSnapshotSchema).default([]),
  constraints: z.array(constraintSnapshotSchema).default([]),
  actions: z.array(actionSnapshotSchema).default([]),
});

export type GraphPatch = z.input<typeof graphPatchSchema>;

export class GraphPatchError extends CoreError {
  public readonly issues: SnapshotIssue[];

  constructor(issues: SnapshotIssue[]) {
    super("invalid graph patch", ERROR_CODES.GRAPH_INVALID_PATCH, { issues });
    this.name = "GraphPatchError";
    this.issues = issues;
  }
}

export interface PatchSummary {
  intents: string[];
  constraints: string[];
  actions: string[];
}

/**
 * Appends the nodes of a producer patch to `graph`. The document is checked
 * with the snapshot node schemas before anything is added, so a rejected patch
 * leaves the graph untouched.
 *
 * @throws GraphPatchError when the patch is structurally invalid.
 */
export function applyGraphPatch(graph: IRGraph, patch: unknown): PatchSummary {
  const parsed = graphPatchSchema.safeParse(patch);
  if (!parsed.success) {
    throw new GraphPatchError(toSnapshotIssues(parsed.error));
  }
  const summary: PatchSummary = {
    intents: parsed.data.intents.map((entry) => graph.addIntent(intentFromSnapshot(entry))),
    constraints: parsed.data.constraints.map((entry) => graph.addConstraint(constraintFromSnapshot(entry))),
    actions: parsed.data.actions.map((entry) => graph.addAction(actionFromSnapshot(entry))),
  };
  graph.record("patch_applied", {
    intents: summary.intents.length,
    constraints: summary.constraints.length,
    actions: summary.actions.length,
  });
  return summary;
}
