import { randomUUID } from "node:crypto";

import { parseLabel } from "../ir/types.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { SimulationRun } from "../sim/run.js";
import { CoreError, ERROR_CODES } from "../types.js";

export const COMPARISONS = ["gte", "lte", "gt", "lt", "eq"] as const;
export type Comparison = (typeof COMPARISONS)[number];
export const parseComparison = (raw: unknown): Comparison => parseLabel(COMPARISONS, raw, "gte");

export const CRITERION_TYPES = ["success_rate", "performance", "resource", "reliability", "custom"] as const;
export type CriterionType = (typeof CRITERION_TYPES)[number];

export type Verdict = "pass" | "conditional_pass" | "fail";

/** Names recognised when extracting a criterion's value from a run. */
export const CRITERION_NAMES = {
  successRate: "success-rate",
  criticalFailures: "critical-failure-count",
  parallelism: "parallelism-factor",
  bottlenecks: "bottleneck-count",
  duration: "total-duration-ms",
} as const;

export interface EvaluationCriterion {
  readonly name: string;
  readonly type: CriterionType;
  readonly threshold: number;
  readonly weight: number;
  readonly comparison: Comparison;
  readonly description: string;
}

export interface CriterionResult {
  readonly criterion: EvaluationCriterion;
  readonly value: number;
  readonly passed: boolean;
  readonly score: number;
  readonly weightedScore: number;
  readonly feedback: string;
}

/** Judgment over one run for one criteria set. Frozen on creation. */
export interface EvaluationResult {
  readonly evaluationId: string;
  readonly runId: string;
  readonly verdict: Verdict;
  readonly overallScore: number;
  readonly criterionResults: readonly CriterionResult[];
  readonly passedCriteria: number;
  readonly failedCriteria: number;
  readonly recommendations: readonly string[];
  readonly evaluatedAt: string;
}

export class EvaluationConfigError extends CoreError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.EVAL_INVALID_THRESHOLDS, details);
    this.name = "EvaluationConfigError";
  }
}

const EQUALITY_TOLERANCE = 0.001;
const MIN_DIVISOR = 0.001;
const MAX_RECOMMENDATIONS = 5;
const DISTINCT_FAILURE_ALERT = 3;

const DEFAULT_CRITERIA: readonly EvaluationCriterion[] = [
  {
    name: CRITERION_NAMES.successRate,
    type: "success_rate",
    threshold: 0.8,
    weight: 2.0,
    comparison: "gte",
    description: "Share of steps that completed successfully",
  },
  {
    name: CRITERION_NAMES.criticalFailures,
    type: "reliability",
    threshold: 0,
    weight: 3.0,
    comparison: "lte",
    description: "Failure modes mentioning a critical fault or an error",
  },
  {
    name: CRITERION_NAMES.parallelism,
    type: "performance",
    threshold: 1.2,
    weight: 0.5,
    comparison: "gte",
    description: "Degree of parallelism the plan allows",
  },
  {
    name: CRITERION_NAMES.bottlenecks,
    type: "performance",
    threshold: 3,
    weight: 0.5,
    comparison: "lte",
    description: "Number of bottleneck steps",
  },
];

/**
 * Applies the comparator and scores the value in [0, 1]. Lower-bound
 * comparators score `value / threshold` capped at 1; upper-bound comparators
 * score 1 up to the threshold then fall off linearly; `eq` scores 1 or 0.
 */
export function evaluateCriterion(criterion: EvaluationCriterion, value: number): { passed: boolean; score: number } {
  const { threshold } = criterion;
  let passed: boolean;
  switch (criterion.comparison) {
    case "lte":
      passed = value <= threshold;
      break;
    case "gt":
      passed = value > threshold;
      break;
    case "lt":
      passed = value < threshold;
      break;
    case "eq":
      passed = Math.abs(value - threshold) < EQUALITY_TOLERANCE;
      break;
    default:
      passed = value >= threshold;
  }

  let score: number;
  if (criterion.comparison === "gte" || criterion.comparison === "gt") {
    score = Math.min(1, value / Math.max(threshold, MIN_DIVISOR));
  } else if (criterion.comparison === "lte" || criterion.comparison === "lt") {
    score = value <= threshold ? 1 : Math.max(0, 1 - (value - threshold) / Math.max(threshold, MIN_DIVISOR));
  } else {
    score = passed ? 1 : 0;
  }
  return { passed, score };
}

/** Reads the value a criterion judges; unrecognised names judge the run score. */
export function extractCriterionValue(run: SimulationRun, criterion: EvaluationCriterion): number {
  const { metrics } = run;
  switch (criterion.name) {
    case CRITERION_NAMES.successRate:
      return metrics.totalSteps === 0 ? 1 : metrics.successfulSteps / metrics.totalSteps;
    case CRITERION_NAMES.criticalFailures:
      return run.failureModes.filter((failure) => {
        const lower = failure.toLowerCase();
        return lower.includes("critical") || lower.includes("error");
      }).length;
    case CRITERION_NAMES.parallelism:
      return metrics.parallelismFactor;
    case CRITERION_NAMES.bottlenecks:
      return metrics.bottlenecks.length;
    case CRITERION_NAMES.duration:
      return metrics.totalDurationMs;
    default:
      return run.score;
  }
}

export interface CriterionInput {
  name: string;
  threshold: number;
  type?: CriterionType;
  weight?: number;
  comparison?: Comparison | string;
  description?: string;
}

export function createCriterion(input: CriterionInput): EvaluationCriterion {
  return Object.freeze({
    name: input.name,
    type: input.type ?? "custom",
    threshold: input.threshold,
    weight: input.weight ?? 1,
    comparison: parseComparison(input.comparison),
    description: input.description ?? "",
  });
}

function assertThresholds(passThreshold: number, conditionalThreshold: number): void {
  const inRange = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;
  if (!inRange(passThreshold) || !inRange(conditionalThreshold) || conditionalThreshold > passThreshold) {
    throw new EvaluationConfigError(
      `invalid verdict thresholds: pass ${passThreshold}, conditional ${conditionalThreshold}`,
      { passThreshold, conditionalThreshold },
    );
  }
}

export interface OutcomeEvaluatorOptions {
  passThreshold?: number;
  conditionalThreshold?: number;
  logger?: StructuredLogger;
  now?: () => Date;
  idFactory?: () => string;
}

export interface RankedRun {
  run: SimulationRun;
  evaluation: EvaluationResult;
}

/** Weighted multi-criteria judge turning simulation runs into verdicts. */
export class OutcomeEvaluator {
  private passThreshold: number;
  private conditionalThreshold: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: OutcomeEvaluatorOptions = {}) {
    this.passThreshold = options.passThreshold ?? 0.7;
    this.conditionalThreshold = options.conditionalThreshold ?? 0.5;
    assertThresholds(this.passThreshold, this.conditionalThreshold);
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get thresholds(): { pass: number; conditional: number } {
    return { pass: this.passThreshold, conditional: this.conditionalThreshold };
  }

  /** @throws EvaluationConfigError when the conditional floor exceeds the pass threshold. */
  setThresholds(passThreshold: number, conditionalThreshold: number): void {
    assertThresholds(passThreshold, conditionalThreshold);
    this.passThreshold = passThreshold;
    this.conditionalThreshold = conditionalThreshold;
  }

  getDefaultCriteria(): EvaluationCriterion[] {
    return DEFAULT_CRITERIA.map((criterion) => ({ ...criterion }));
  }

  /** Judges `run`; an absent or empty criteria list uses the defaults. */
  evaluate(run: SimulationRun, criteria?: readonly EvaluationCriterion[]): EvaluationResult {
    const applied = criteria && criteria.length > 0 ? criteria : DEFAULT_CRITERIA;
    const criterionResults: CriterionResult[] = applied.map((criterion) => {
      const value = extractCriterionValue(run, criterion);
      const { passed, score } = evaluateCriterion(criterion, value);
      return Object.freeze({
        criterion,
        value,
        passed,
        score,
        weightedScore: score * criterion.weight,
        feedback: `${criterion.name}: ${value.toFixed(2)} ${passed ? "meets" : "does not meet"} threshold ${criterion.threshold}`,
      });
    });

    const totalWeight = criterionResults.reduce((total, result) => total + result.criterion.weight, 0);
    const weightedSum = criterionResults.reduce((total, result) => total + result.weightedScore, 0);
    const overallScore = totalWeight > 0 ? weightedSum / totalWeight : 0;
    const passedCriteria = criterionResults.filter((result) => result.passed).length;

    const evaluation: EvaluationResult = Object.freeze({
      evaluationId: this.idFactory(),
      runId: run.runId,
      verdict: this.determineVerdict(overallScore, criterionResults),
      overallScore,
      criterionResults: Object.freeze(criterionResults),
      passedCriteria,
      failedCriteria: criterionResults.length - passedCriteria,
      recommendations: Object.freeze(this.recommend(criterionResults, run)),
      evaluatedAt: this.now().toISOString(),
    });
    this.logger.info("evaluation_completed", {
      run_id: run.runId,
      verdict: evaluation.verdict,
      overall_score: overallScore,
    });
    return evaluation;
  }

  evaluateMultiple(runs: readonly SimulationRun[], criteria?: readonly EvaluationCriterion[]): EvaluationResult[] {
    return runs.map((run) => this.evaluate(run, criteria));
  }

  /** Runs ordered by overall score, best first; ties keep input order. */
  rankRuns(runs: readonly SimulationRun[], criteria?: readonly EvaluationCriterion[]): RankedRun[] {
    return runs
      .map((run) => ({ run, evaluation: this.evaluate(run, criteria) }))
      .sort((a, b) => b.evaluation.overallScore - a.evaluation.overallScore);
  }

  /** A failed criterion of weight 2 or more forces `fail` only below the conditional floor. */
  private determineVerdict(overallScore: number, results: readonly CriterionResult[]): Verdict {
    const heavyFailure = results.some((result) => result.criterion.weight >= 2 && !result.passed);
    if (heavyFailure && overallScore < this.conditionalThreshold) {
      return "fail";
    }
    if (overallScore >= this.passThreshold) {
      return "pass";
    }
    if (overallScore >= this.conditionalThreshold) {
      return "conditional_pass";
    }
    return "fail";
  }

  private recommend(results: readonly CriterionResult[], run: SimulationRun): string[] {
    const recommendations: string[] = [];
    for (const result of results) {
      if (result.passed) {
        continue;
      }
      switch (result.criterion.type) {
        case "success_rate":
          recommendations.push("Improve error handling to increase success rate");
          break;
        case "performance":
          recommendations.push(`Address performance issue: ${result.criterion.name}`);
          break;
        case "reliability":
          recommendations.push("Add retry logic and fallback mechanisms");
          break;
        default:
          break;
      }
    }
    const distinctFailures = new Set(run.failureModes).size;
    if (distinctFailures > DISTINCT_FAILURE_ALERT) {
      recommendations.push(`Address ${distinctFailures} distinct failure modes`);
    }
    return recommendations.slice(0, MAX_RECOMMENDATIONS);
  }
}

export interface EvaluationDocument {
  evaluation_id: string;
  run_id: string;
  verdict: Verdict;
  overall_score: number;
  passed_criteria: number;
  failed_criteria: number;
  criteria_results: Array<{
    criterion: string;
    value: number;
    passed: boolean;
    score: number;
    weight: number;
    feedback: string;
  }>;
  recommendations: string[];
  evaluated_at: string;
}

export function evaluationToDocument(evaluation: EvaluationResult): EvaluationDocument {
  return {
    evaluation_id: evaluation.evaluationId,
    run_id: evaluation.runId,
    verdict: evaluation.verdict,
    overall_score: evaluation.overallScore,
    passed_criteria: evaluation.passedCriteria,
    failed_criteria: evaluation.failedCriteria,
    criteria_results: evaluation.criterionResults.map((result) => ({
      criterion: result.criterion.name,
      value: result.value,
      passed: result.passed,
      score: result.score,
      weight: result.criterion.weight,
      feedback: result.feedback,
    })),
    recommendations: [...evaluation.recommendations],
    evaluated_at: evaluation.evaluatedAt,
  };
}
