import { loadCoreSettings, type CoreSettings } from "./config/settings.js";
import { OutcomeEvaluator } from "./eval/outcome.js";
import type { IRGraph } from "./ir/graph.js";
import { IRValidator } from "./ir/validator.js";
import { StructuredLogger } from "./logger.js";
import { runPlanningPipeline, type PipelineOptions, type PipelineOutcome } from "./pipeline.js";
import { PlanSynthesizer } from "./planner/synthesizer.js";
import { CandidateRouter } from "./router/candidateRouter.js";
import { Simulator } from "./sim/engine.js";
import { ScenarioLoader } from "./sim/scenarios.js";
import { SeededRandom } from "./utils/random.js";

export interface CoreServices {
  readonly settings: CoreSettings;
  readonly logger: StructuredLogger;
  /** Seed actually used by the simulator, recorded so a run can be replayed. */
  readonly seed: number | string;
  readonly validator: IRValidator;
  readonly synthesizer: PlanSynthesizer;
  readonly simulator: Simulator;
  readonly evaluator: OutcomeEvaluator;
  readonly scenarios: ScenarioLoader;
  readonly router: CandidateRouter;
  runPipeline(graph: IRGraph, options?: PipelineOptions): PipelineOutcome;
}

export interface CoreServiceOverrides {
  logger?: StructuredLogger;
  now?: () => Date;
}

/**
 * Builds every component from one settings object. The router uses the
 * simulator as its engine. Without a configured seed the clock seeds the
 * generator and the chosen value is logged.
 */
export function createCoreServices(
  settings: CoreSettings = loadCoreSettings(),
  overrides: CoreServiceOverrides = {},
): CoreServices {
  const logger = overrides.logger ?? new StructuredLogger({ logFile: settings.logFile });
  const now = overrides.now ?? (() => new Date());
  const seed = settings.simulator.seed ?? now().getTime();

  const validator = new IRValidator({ ...settings.validator, logger, now });
  const synthesizer = new PlanSynthesizer({ ...settings.planner, logger, now });
  const simulator = new Simulator(
    new SeededRandom(seed),
    { mode: settings.simulator.mode, failureProbability: settings.simulator.failureProbability },
    { logger, now },
  );
  const evaluator = new OutcomeEvaluator({ ...settings.evaluator, logger, now });
  const scenarios = new ScenarioLoader({
    logger,
    ...(settings.simulator.scenarioDirectory !== null ? { directory: settings.simulator.scenarioDirectory } : {}),
  });
  const router = new CandidateRouter({
    engine: simulator,
    maxCandidates: settings.router.maxCandidates,
    defaultTimeoutMs: settings.router.timeoutMs,
    logger,
    now,
  });

  logger.info("core_services_ready", {
    mode: settings.simulator.mode,
    seed,
    strict: settings.validator.strictMode,
  });

  return {
    settings,
    logger,
    seed,
    validator,
    synthesizer,
    simulator,
    evaluator,
    scenarios,
    router,
    runPipeline: (graph, options) =>
      runPlanningPipeline(graph, { validator, synthesizer, simulator, evaluator, logger }, options),
  };
}
