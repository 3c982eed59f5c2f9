import { SIMULATION_MODES, type SimulationMode } from "../sim/run.js";
import { readBool, readEnum, readInt, readNumber, readOptionalString } from "./env.js";

const DEFAULT_STEP_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_FAILURE_PROBABILITY = 0.1;
const DEFAULT_PASS_THRESHOLD = 0.7;
const DEFAULT_CONDITIONAL_THRESHOLD = 0.5;
const DEFAULT_MAX_CANDIDATES = 5;
const DEFAULT_ROUTER_TIMEOUT_MS = 30_000;

export interface ValidatorSettings {
  readonly strictMode: boolean;
  readonly requireActions: boolean;
}

export interface PlannerSettings {
  readonly defaultTimeoutMs: number;
  readonly maxRetries: number;
}

export interface SimulatorSettings {
  readonly mode: SimulationMode;
  readonly failureProbability: number;
  /** Generator seed; `null` seeds from the clock. */
  readonly seed: number | string | null;
  /** Directory scanned for scenario files, if any. */
  readonly scenarioDirectory: string | null;
}

export interface EvaluatorSettings {
  readonly passThreshold: number;
  readonly conditionalThreshold: number;
}

export interface RouterSettings {
  readonly maxCandidates: number;
  readonly timeoutMs: number;
}

export interface CoreSettings {
  readonly validator: ValidatorSettings;
  readonly planner: PlannerSettings;
  readonly simulator: SimulatorSettings;
  readonly evaluator: EvaluatorSettings;
  readonly router: RouterSettings;
  readonly logFile: string | null;
}

/** Integer literals become numeric seeds; anything else is hashed as text. */
export function parseSeed(raw: string | undefined): number | string | null {
  if (raw === undefined) {
    return null;
  }
  return /^[-+]?\d+$/.test(raw) ? Number.parseInt(raw, 10) : raw;
}

/** A conditional threshold above the pass threshold resets both to the defaults. */
function readEvaluatorSettings(): EvaluatorSettings {
  const passThreshold = readNumber("IRPLAN_EVAL_PASS_THRESHOLD", DEFAULT_PASS_THRESHOLD, { min: 0, max: 1 });
  const conditionalThreshold = readNumber("IRPLAN_EVAL_CONDITIONAL_THRESHOLD", DEFAULT_CONDITIONAL_THRESHOLD, {
    min: 0,
    max: 1,
  });
  if (conditionalThreshold > passThreshold) {
    return { passThreshold: DEFAULT_PASS_THRESHOLD, conditionalThreshold: DEFAULT_CONDITIONAL_THRESHOLD };
  }
  return { passThreshold, conditionalThreshold };
}

/**
 * Reads every `IRPLAN_*` variable. Malformed or out-of-range values fall back
 * to the defaults rather than failing start-up.
 */
export function loadCoreSettings(): CoreSettings {
  return {
    validator: {
      strictMode: readBool("IRPLAN_VALIDATOR_STRICT", false),
      requireActions: readBool("IRPLAN_REQUIRE_ACTIONS", false),
    },
    planner: {
      defaultTimeoutMs: readInt("IRPLAN_PLAN_DEFAULT_TIMEOUT_MS", DEFAULT_STEP_TIMEOUT_MS, { min: 1 }),
      maxRetries: readInt("IRPLAN_PLAN_MAX_RETRIES", DEFAULT_MAX_RETRIES, { min: 0, max: 100 }),
    },
    simulator: {
      mode: readEnum("IRPLAN_SIM_MODE", SIMULATION_MODES, "standard"),
      failureProbability: readNumber("IRPLAN_SIM_FAILURE_PROBABILITY", DEFAULT_FAILURE_PROBABILITY, {
        min: 0,
        max: 1,
      }),
      seed: parseSeed(readOptionalString("IRPLAN_SIM_SEED")),
      scenarioDirectory: readOptionalString("IRPLAN_SCENARIO_DIR") ?? null,
    },
    evaluator: readEvaluatorSettings(),
    router: {
      maxCandidates: readInt("IRPLAN_ROUTER_MAX_CANDIDATES", DEFAULT_MAX_CANDIDATES, { min: 1, max: 100 }),
      timeoutMs: readInt("IRPLAN_ROUTER_TIMEOUT_MS", DEFAULT_ROUTER_TIMEOUT_MS, { min: 1 }),
    },
    logFile: readOptionalString("IRPLAN_LOG_FILE") ?? null,
  };
}
