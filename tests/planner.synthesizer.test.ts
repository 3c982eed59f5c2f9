import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { IRGraph } from "../src/ir/graph.js";
import { createAction } from "../src/ir/nodes.js";
import { NODE_PRIORITIES } from "../src/ir/types.js";
import { planToSummary } from "../src/planner/plan.js";
import { orderActions, PlanSynthesisError, PlanSynthesizer } from "../src/planner/synthesizer.js";
import { ERROR_CODES } from "../src/types.js";
import { buildLoginGraph, FIXED_INSTANT, fixedClock, sequentialIds } from "./helpers/graphs.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function validatedLoginGraph(): IRGraph {
  const graph = buildLoginGraph();
  graph.setStatus("validated");
  return graph;
}

describe("planner synthesizer", () => {
  it("turns a dependency chain into ordered steps", () => {
    const synthesizer = new PlanSynthesizer({ idFactory: sequentialIds("step"), now: fixedClock() });
    const plan = synthesizer.toExecutionPlan(validatedLoginGraph());

    expect(plan.planId).to.equal("step-4");
    expect(plan.sourceGraphId).to.equal("graph-login");
    expect(plan.status).to.equal("created");
    expect(plan.currentStep).to.equal(0);
    expect(plan.createdAt).to.equal(FIXED_INSTANT);
    expect(plan.metadata).to.deep.equal({
      intentCount: 1,
      constraintCount: 1,
      activeConstraintCount: 1,
      sourceStatus: "validated",
    });
    expect(
      plan.steps.map((step) => ({
        stepId: step.stepId,
        stepNumber: step.stepNumber,
        actionId: step.actionId,
        dependencies: step.dependencies,
        constraints: step.constraints,
        timeoutMs: step.timeoutMs,
      })),
    ).to.deep.equal([
      { stepId: "step-1", stepNumber: 1, actionId: "a1", dependencies: [], constraints: [], timeoutMs: 10_000 },
      {
        stepId: "step-2",
        stepNumber: 2,
        actionId: "a2",
        dependencies: ["step-1"],
        constraints: ["Must use bcrypt"],
        timeoutMs: 60_000,
      },
      { stepId: "step-3", stepNumber: 3, actionId: "a3", dependencies: ["step-2"], constraints: [], timeoutMs: 10_000 },
    ]);
    expect(plan.steps.every((step) => step.status === "pending" && step.retryCount === 0 && step.maxRetries === 3)).to.equal(
      true,
    );
  });

  it("dequeues ready actions by priority", () => {
    const graph = new IRGraph({ id: "g1" });
    graph.addAction(createAction({ id: "p", kind: "reasoning", description: "p", priority: "low" }));
    graph.addAction(createAction({ id: "q", kind: "reasoning", description: "q", priority: "critical", dependsOn: ["p"] }));
    graph.addAction(createAction({ id: "r", kind: "reasoning", description: "r", priority: "high" }));
    graph.addAction(createAction({ id: "s", kind: "reasoning", description: "s", priority: "high" }));

    expect(new PlanSynthesizer().previewExecutionOrder(graph)).to.deep.equal(["r", "s", "p", "q"]);
  });

  it("scales an action's own duration estimate into its timeout", () => {
    const synthesizer = new PlanSynthesizer();
    expect(
      synthesizer.timeoutFor(createAction({ kind: "api_call", description: "Call", estimatedDurationMs: 1234 })),
    ).to.equal(1851);
    expect(synthesizer.timeoutFor(createAction({ kind: "api_call", description: "Call", estimatedDurationMs: 0 }))).to.equal(
      30_000,
    );
    expect(synthesizer.timeoutFor(createAction({ kind: "reasoning", description: "Think" }))).to.equal(120_000);
  });

  it("ignores dependencies on unknown actions and duplicate edges", () => {
    const graph = new IRGraph({ id: "g1" });
    graph.addAction(createAction({ id: "a", kind: "reasoning", description: "a" }));
    graph.addAction(createAction({ id: "b", kind: "reasoning", description: "b", dependsOn: ["a", "ghost"] }));
    graph.addActionDependency("b", "a");

    const plan = new PlanSynthesizer({ idFactory: sequentialIds() }).toExecutionPlan(graph);
    expect(plan.steps.map((step) => step.dependencies)).to.deep.equal([[], ["id-1"]]);
  });

  it("warns when planning a graph that was never validated", () => {
    const logger = new RecordingLogger();
    new PlanSynthesizer({ logger }).toExecutionPlan(buildLoginGraph());

    expect(logger.entries[0]).to.deep.equal({
      level: "warn",
      message: "plan_source_not_validated",
      payload: { graph_id: "graph-login", status: "draft" },
    });
    expect(logger.messages("info")).to.deep.equal(["plan_synthesized"]);
  });

  describe("cycles", () => {
    function cyclicGraph(): IRGraph {
      const graph = new IRGraph({ id: "cyclic" });
      graph.addAction(createAction({ id: "free", kind: "reasoning", description: "free" }));
      graph.addAction(createAction({ id: "x", kind: "reasoning", description: "x", dependsOn: ["y"] }));
      graph.addAction(createAction({ id: "y", kind: "reasoning", description: "y", dependsOn: ["x"] }));
      graph.addAction(createAction({ id: "after", kind: "reasoning", description: "after", dependsOn: ["x"] }));
      return graph;
    }

    it("leaves actions on or behind a cycle unresolved", () => {
      expect(orderActions(cyclicGraph())).to.deep.include({ unresolved: ["x", "y", "after"] });
      expect(new PlanSynthesizer().previewExecutionOrder(cyclicGraph())).to.deep.equal(["free"]);
    });

    it("throws a typed error from toExecutionPlan", () => {
      expect(() => new PlanSynthesizer().toExecutionPlan(cyclicGraph()))
        .to.throw(PlanSynthesisError)
        .with.property("code", ERROR_CODES.PLAN_CYCLE);
    });

    it("reports the failure as data from synthesize", () => {
      const logger = new RecordingLogger();
      const result = new PlanSynthesizer({ logger }).synthesize(cyclicGraph());

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.unresolved).to.deep.equal(["x", "y", "after"]);
      }
      expect(logger.messages("error")).to.deep.equal(["plan_synthesis_failed"]);
    });
  });

  it("numbers steps contiguously and places every dependency earlier", () => {
    const dagArbitrary = fc.integer({ min: 1, max: 8 }).chain((size) =>
      fc.tuple(
        fc.array(fc.array(fc.nat(), { maxLength: 3 }), { minLength: size, maxLength: size }),
        fc.array(fc.constantFrom(...NODE_PRIORITIES), { minLength: size, maxLength: size }),
      ),
    );

    fc.assert(
      fc.property(dagArbitrary, ([edges, priorities]) => {
        const graph = new IRGraph({ id: "dag", status: "validated" });
        // Insert in reverse so insertion order never matches dependency order.
        for (let index = edges.length - 1; index >= 0; index -= 1) {
          const dependsOn = index === 0 ? [] : (edges[index] ?? []).map((raw) => `n${raw % index}`);
          graph.addAction(
            createAction({
              id: `n${index}`,
              kind: "reasoning",
              description: `node ${index}`,
              priority: priorities[index] ?? "medium",
              dependsOn,
            }),
          );
        }

        const plan = new PlanSynthesizer().toExecutionPlan(graph);
        const positions = new Map(plan.steps.map((step) => [step.stepId, step.stepNumber]));

        expect(plan.steps.map((step) => step.stepNumber)).to.deep.equal(edges.map((_, index) => index + 1));
        for (const step of plan.steps) {
          for (const dependency of step.dependencies) {
            expect(positions.get(dependency)).to.be.lessThan(step.stepNumber);
          }
        }
      }),
    );
  });

  it("emits task-queue items and a plan summary", () => {
    const synthesizer = new PlanSynthesizer({ idFactory: sequentialIds("t"), now: fixedClock() });
    const graph = validatedLoginGraph();
    const queue = synthesizer.toTaskQueue(graph);

    expect(queue.map((item) => item.priority)).to.deep.equal([1, 2, 3]);
    expect(queue[1]).to.deep.equal({
      task_id: "t-2",
      task_type: "code_write",
      priority: 2,
      payload: { description: "Write the login handler", target: "src/login.ts", parameters: {} },
      constraints: ["Must use bcrypt"],
      dependencies: ["t-1"],
      timeout_ms: 60_000,
      max_retries: 3,
      source: { plan_id: "t-4", graph_id: "graph-login" },
    });

    const plan = synthesizer.toExecutionPlan(graph);
    expect(planToSummary(plan)).to.deep.equal({
      kind: "execution_plan",
      plan_id: "t-8",
      source_graph_id: "graph-login",
      total_steps: 3,
      step_types: ["code_read", "code_write", "validation"],
      estimated_duration_ms: 80_000,
      constraints_active: 1,
      created_at: FIXED_INSTANT,
    });
  });

  it("inserts steps with its own timeout and retry defaults", () => {
    const synthesizer = new PlanSynthesizer({ idFactory: sequentialIds(), defaultTimeoutMs: 45_000, maxRetries: 1 });
    const plan = synthesizer.toExecutionPlan(validatedLoginGraph());

    const inserted = synthesizer.insertStep(plan, 1, {
      kind: "validation",
      description: "Lint the routes",
      target: "src/routes.ts",
      dependencies: ["id-1"],
    });

    expect(inserted).to.deep.include({ stepId: "id-5", stepNumber: 2, actionId: null, timeoutMs: 45_000, maxRetries: 1 });
    expect(plan.steps.map((step) => step.stepId)).to.deep.equal(["id-1", "id-5", "id-2", "id-3"]);
    expect(plan.steps.map((step) => step.stepNumber)).to.deep.equal([1, 2, 3, 4]);
  });
});
