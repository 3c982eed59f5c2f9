import { randomUUID } from "node:crypto";

import type { IRGraph } from "../ir/graph.js";
import { graphToSnapshot, type GraphSnapshot } from "../ir/snapshot.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { ScenarioParameters, SimulationRun } from "../sim/run.js";
import { describeError } from "../types.js";
import { scoreGraphStructure } from "./stubScorer.js";

/** Anything able to simulate a detached graph snapshot. `Simulator` satisfies it. */
export interface SimulationEngine {
  simulate(snapshot: GraphSnapshot, scenario?: ScenarioParameters): SimulationRun | Promise<SimulationRun>;
}

export interface SimulationRequest {
  requestId: string;
  graphId: string;
  /** Independent copy of the candidate taken when the request was created. */
  snapshot: GraphSnapshot;
  scenarioType: string;
  parameters: ScenarioParameters;
  /** 1 (lowest) to 10 (highest). */
  priority: number;
  timeoutMs: number;
  createdAt: string;
}

export interface RoutedResult {
  requestId: string;
  graphId: string;
  success: boolean;
  score: number;
  metrics: Record<string, unknown>;
  failureModes: string[];
  executionTimeMs: number;
  completedAt: string;
}

export interface RankedCandidate {
  graph: IRGraph;
  result: RoutedResult;
  /** 1-based, best first. */
  rank: number;
  selectionReason: string;
}

export interface RequestOptions {
  scenarioType?: string;
  parameters?: ScenarioParameters;
  priority?: number;
  timeoutMs?: number;
}

export interface CandidateRouterOptions {
  /** Omit to score candidates with the structural heuristic. */
  engine?: SimulationEngine;
  maxCandidates?: number;
  defaultTimeoutMs?: number;
  logger?: StructuredLogger;
  now?: () => Date;
  idFactory?: () => string;
}

const DEFAULT_MIN_SCORE = 0.5;

function summariseRun(run: SimulationRun): Record<string, unknown> {
  return {
    run_id: run.runId,
    mode: run.mode,
    total_steps: run.metrics.totalSteps,
    successful_steps: run.metrics.successfulSteps,
    failed_steps: run.metrics.failedSteps,
    total_duration_ms: run.metrics.totalDurationMs,
    critical_path_length: run.metrics.criticalPathLength,
    parallelism_factor: run.metrics.parallelismFactor,
    bottlenecks: run.metrics.bottlenecks.length,
  };
}

/**
 * Runs each candidate graph through the simulation engine (or the structural
 * heuristic when none is attached) and ranks them. Every candidate is
 * simulated from its own snapshot, so candidates share no mutable state.
 */
export class CandidateRouter {
  private engine: SimulationEngine | undefined;
  private readonly maxCandidates: number;
  private readonly defaultTimeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly pending = new Map<string, SimulationRequest>();
  private readonly results = new Map<string, RoutedResult>();

  constructor(options: CandidateRouterOptions = {}) {
    this.engine = options.engine;
    this.maxCandidates = Math.max(1, Math.trunc(options.maxCandidates ?? 5));
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  setEngine(engine: SimulationEngine | undefined): void {
    this.engine = engine;
  }

  createRequest(graph: IRGraph, options: RequestOptions = {}): SimulationRequest {
    const request: SimulationRequest = {
      requestId: this.idFactory(),
      graphId: graph.id,
      snapshot: graphToSnapshot(graph),
      scenarioType: options.scenarioType ?? "default",
      parameters: { ...(options.parameters ?? {}) },
      priority: Math.max(1, Math.min(10, Math.trunc(options.priority ?? 5))),
      timeoutMs: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : this.defaultTimeoutMs,
      createdAt: this.now().toISOString(),
    };
    this.pending.set(request.requestId, request);
    this.logger.debug("simulation_request_created", { request_id: request.requestId, graph_id: graph.id });
    return request;
  }

  /**
   * Simulates one request. Engine faults and timeouts do not propagate: they
   * become an unsuccessful result scored 0 carrying the fault message.
   */
  async route(request: SimulationRequest): Promise<RoutedResult> {
    const started = this.now().getTime();
    let result: RoutedResult;
    try {
      result = this.engine ? await this.simulateWithEngine(this.engine, request) : this.stubResult(request);
    } catch (error) {
      const message = describeError(error);
      this.logger.error("simulation_route_failed", { request_id: request.requestId, message });
      result = {
        requestId: request.requestId,
        graphId: request.graphId,
        success: false,
        score: 0,
        metrics: {},
        failureModes: [message],
        executionTimeMs: 0,
        completedAt: "",
      };
    }
    const finished = this.now();
    result.executionTimeMs = Math.max(0, finished.getTime() - started);
    result.completedAt = finished.toISOString();

    this.results.set(request.requestId, result);
    this.pending.delete(request.requestId);
    this.logger.info("simulation_routed", {
      request_id: request.requestId,
      graph_id: request.graphId,
      score: result.score,
      success: result.success,
    });
    return result;
  }

  /**
   * Simulates up to `maxCandidates` graphs in order and ranks them by score,
   * best first. Extra candidates are dropped with a warning.
   */
  async simulateCandidates(candidates: readonly IRGraph[], options: RequestOptions = {}): Promise<RankedCandidate[]> {
    let selected = candidates;
    if (candidates.length > this.maxCandidates) {
      this.logger.warn("candidates_truncated", { received: candidates.length, kept: this.maxCandidates });
      selected = candidates.slice(0, this.maxCandidates);
    }

    const outcomes: Array<{ graph: IRGraph; result: RoutedResult }> = [];
    for (const graph of selected) {
      const result = await this.route(this.createRequest(graph, options));
      outcomes.push({ graph, result });
    }
    outcomes.sort((a, b) => b.result.score - a.result.score);

    return outcomes.map(({ graph, result }, index) => ({
      graph,
      result,
      rank: index + 1,
      selectionReason: CandidateRouter.selectionReason(result, index + 1),
    }));
  }

  /** Top-ranked graph when its score reaches `minScore`, otherwise `null`. */
  async selectBest(
    candidates: readonly IRGraph[],
    minScore = DEFAULT_MIN_SCORE,
    options: RequestOptions = {},
  ): Promise<IRGraph | null> {
    const [best] = await this.simulateCandidates(candidates, options);
    if (best && best.result.score >= minScore) {
      this.logger.info("candidate_selected", { graph_id: best.graph.id, score: best.result.score });
      return best.graph;
    }
    this.logger.warn("no_candidate_selected", { min_score: minScore });
    return null;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  getResult(requestId: string): RoutedResult | undefined {
    return this.results.get(requestId);
  }

  getResultsForGraph(graphId: string): RoutedResult[] {
    return Array.from(this.results.values()).filter((result) => result.graphId === graphId);
  }

  clearResults(): void {
    this.results.clear();
  }

  static selectionReason(result: RoutedResult, rank: number): string {
    if (rank === 1) {
      return `Highest score: ${result.score.toFixed(2)}`;
    }
    if (result.failureModes.length > 0) {
      return `Has failure modes: ${result.failureModes.slice(0, 2).join(", ")}`;
    }
    return `Score: ${result.score.toFixed(2)}`;
  }

  private stubResult(request: SimulationRequest): RoutedResult {
    const { score, metrics } = scoreGraphStructure(request.snapshot);
    return {
      requestId: request.requestId,
      graphId: request.graphId,
      success: true,
      score,
      metrics,
      failureModes: [],
      executionTimeMs: 0,
      completedAt: "",
    };
  }

  private async simulateWithEngine(engine: SimulationEngine, request: SimulationRequest): Promise<RoutedResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Simulation timed out after ${request.timeoutMs}ms`)),
        request.timeoutMs,
      );
    });
    try {
      const run = await Promise.race([Promise.resolve(engine.simulate(request.snapshot, request.parameters)), timeout]);
      return {
        requestId: request.requestId,
        graphId: request.graphId,
        success: run.status === "completed",
        score: run.score,
        metrics: summariseRun(run),
        failureModes: [...run.failureModes],
        executionTimeMs: 0,
        completedAt: "",
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
