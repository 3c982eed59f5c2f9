import type { ActionKind } from "../ir/types.js";
import { pick, type RandomSource } from "../utils/random.js";

/** Action as seen by the simulator, whatever document it came from. */
export interface SimulatedAction {
  id: string;
  kind: ActionKind;
  dependsOn: string[];
  parameterCount: number;
  estimatedDurationMs?: number;
}

/** Failure-probability multipliers; kinds not listed use 1.0. */
const RISK_MULTIPLIERS: Partial<Record<ActionKind, number>> = {
  code_write: 1.2,
  code_modify: 1.5,
  file_delete: 1.3,
  api_call: 2.0,
  simulation: 1.5,
  code_read: 0.5,
  validation: 0.8,
};

const COMPLEX_ACTION_PARAMETERS = 5;
const COMPLEX_ACTION_FACTOR = 1.2;
const MAX_ACTION_RISK = 0.9;

export const DEFAULT_DURATIONS_MS: Readonly<Record<ActionKind, number>> = {
  code_write: 5000,
  code_read: 1000,
  code_modify: 3000,
  file_create: 2000,
  file_delete: 500,
  api_call: 2000,
  reasoning: 10000,
  validation: 1500,
  simulation: 5000,
};

const FAILURE_REASONS: Partial<Record<ActionKind, readonly [string, ...string[]]>> = {
  code_write: ["File permission denied", "Disk full", "Invalid path"],
  code_modify: ["File locked", "Merge conflict", "Syntax error introduced"],
  api_call: ["Network timeout", "Rate limited", "Service unavailable"],
  file_delete: ["File not found", "Permission denied"],
  validation: ["Schema validation failed", "Constraint violated"],
};

const UNKNOWN_FAILURE: readonly [string] = ["Unknown error"];

/** Resources consumed by one simulated step, keyed by resource name. */
export type ResourceUsage = Record<string, number>;

/**
 * Failure probability of one action: the base probability scaled by the
 * per-kind multiplier, and by 1.2 more for actions with over five
 * parameters, capped at 0.9.
 */
export function estimateActionRisk(action: SimulatedAction, baseProbability: number): number {
  let multiplier = RISK_MULTIPLIERS[action.kind] ?? 1;
  if (action.parameterCount > COMPLEX_ACTION_PARAMETERS) {
    multiplier *= COMPLEX_ACTION_FACTOR;
  }
  return Math.min(MAX_ACTION_RISK, baseProbability * multiplier);
}

export function estimateDuration(action: SimulatedAction): number {
  if (action.estimatedDurationMs !== undefined && action.estimatedDurationMs > 0) {
    return action.estimatedDurationMs;
  }
  return DEFAULT_DURATIONS_MS[action.kind];
}

export function estimateResources(action: SimulatedAction): ResourceUsage {
  const resources: ResourceUsage = { cpu: 0.1, memory_mb: 50, io_ops: 10 };
  switch (action.kind) {
    case "code_write":
    case "code_modify":
      resources.io_ops = 50;
      resources.memory_mb = 100;
      break;
    case "reasoning":
      resources.cpu = 0.5;
      resources.memory_mb = 200;
      break;
    case "api_call":
      resources.network_kb = 100;
      break;
    default:
      break;
  }
  return resources;
}

/** Draws a plausible failure reason for the action's kind. */
export function drawFailureReason(action: SimulatedAction, random: RandomSource): string {
  return pick(random, FAILURE_REASONS[action.kind] ?? UNKNOWN_FAILURE);
}

/** Adds every entry of `usage` into `total`. */
export function accumulateResources(total: ResourceUsage, usage: ResourceUsage): void {
  for (const [name, amount] of Object.entries(usage)) {
    total[name] = (total[name] ?? 0) + amount;
  }
}
