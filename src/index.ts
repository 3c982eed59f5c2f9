export * from "./types.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./config/settings.js";
export * from "./utils/random.js";

export * from "./ir/types.js";
export * from "./ir/nodes.js";
export * from "./ir/graph.js";
export * from "./ir/snapshot.js";
export * from "./ir/validator.js";
export * from "./ir/patch.js";
export * from "./ir/collaborators.js";
export * from "./ir/refine.js";
export * from "./ir/challenge.js";

export * from "./planner/plan.js";
export * from "./planner/synthesizer.js";

export * from "./sim/riskModel.js";
export * from "./sim/run.js";
export * from "./sim/engine.js";
export * from "./sim/scenarios.js";

export * from "./eval/outcome.js";

export * from "./router/stubScorer.js";
export * from "./router/candidateRouter.js";

export * from "./pipeline.js";
export * from "./runtime.js";
