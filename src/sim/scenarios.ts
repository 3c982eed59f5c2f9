import { randomUUID } from "node:crypto";
import { readdir, readFile, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";

import YAML from "yaml";
import { z } from "zod";

import { parseLabel } from "../ir/types.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import { CoreError, describeError, ERROR_CODES } from "../types.js";
import type { ScenarioParameters } from "./run.js";

export const SCENARIO_TYPES = ["normal", "stress", "failure", "edge", "security", "performance", "custom"] as const;
export type ScenarioType = (typeof SCENARIO_TYPES)[number];

export const parseScenarioType = (raw: unknown): ScenarioType => parseLabel(SCENARIO_TYPES, raw, "custom");

/** Environmental condition attached to a scenario (resource, timing, failure, constraint...). */
export interface ScenarioCondition {
  name: string;
  type: string;
  parameters: Record<string, unknown>;
  /** Probability that the condition applies, in [0, 1]. */
  probability: number;
}

export interface Scenario {
  id: string;
  name: string;
  description: string;
  type: ScenarioType;
  conditions: ScenarioCondition[];
  /** Handed to `Simulator#simulate` as is. */
  parameters: ScenarioParameters;
  expectedOutcomes: Record<string, unknown>;
  tags: string[];
}

export class ScenarioDefinitionError extends CoreError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.SCENARIO_INVALID, details);
    this.name = "ScenarioDefinitionError";
  }
}

export class ScenarioNotFoundError extends CoreError {
  constructor(name: string) {
    super(`unknown scenario ${name}`, ERROR_CODES.SCENARIO_NOT_FOUND, { name });
    this.name = "ScenarioNotFoundError";
  }
}

const conditionSchema = z.object({
  name: z.string().default(""),
  type: z.string().default(""),
  parameters: z.record(z.unknown()).default({}),
  probability: z.number().min(0).max(1).default(1),
});

const scenarioDocumentSchema = z.object({
  scenario_id: z.string().min(1).optional(),
  name: z.string().min(1),
  description: z.string().default(""),
  scenario_type: z.unknown().transform(parseScenarioType),
  conditions: z.array(conditionSchema).default([]),
  parameters: z
    .object({ risk_multiplier: z.number().nonnegative().optional() })
    .passthrough()
    .default({}),
  expected_outcomes: z.record(z.unknown()).default({}),
  tags: z.array(z.string()).default([]),
});

export type ScenarioDocument = z.input<typeof scenarioDocumentSchema>;

const SCENARIO_EXTENSIONS = new Set([".json", ".yaml", ".yml"]);

type BuiltinScenario = Omit<Scenario, "id" | "tags">;

/** Catalogue shipped with the simulator, keyed by lookup name. */
const BUILTIN_SCENARIOS: Readonly<Record<string, BuiltinScenario>> = {
  normal: {
    name: "Normal Execution",
    description: "Standard execution conditions",
    type: "normal",
    conditions: [],
    parameters: { risk_multiplier: 1.0, resource_limit: null, timeout_multiplier: 1.0 },
    expectedOutcomes: { success_rate_min: 0.8 },
  },
  stress: {
    name: "Stress Test",
    description: "High load simulation",
    type: "stress",
    conditions: [
      { name: "high_load", type: "resource", parameters: { cpu_multiplier: 2.0, memory_multiplier: 1.5 }, probability: 1 },
      { name: "slow_network", type: "timing", parameters: { latency_multiplier: 3.0 }, probability: 1 },
    ],
    parameters: { risk_multiplier: 1.5, timeout_multiplier: 2.0 },
    expectedOutcomes: { success_rate_min: 0.6, degradation_acceptable: true },
  },
  failure_injection: {
    name: "Failure Injection",
    description: "Inject random failures",
    type: "failure",
    conditions: [
      { name: "random_failure", type: "failure", parameters: { failure_rate: 0.3 }, probability: 0.5 },
      { name: "dependency_failure", type: "failure", parameters: { affected_types: ["api_call"] }, probability: 0.3 },
    ],
    parameters: { risk_multiplier: 2.0 },
    expectedOutcomes: { graceful_degradation: true, error_handling_tested: true },
  },
  edge_cases: {
    name: "Edge Cases",
    description: "Test boundary conditions",
    type: "edge",
    conditions: [
      { name: "empty_input", type: "constraint", parameters: { input_size: 0 }, probability: 1 },
      { name: "max_input", type: "constraint", parameters: { input_size: "max" }, probability: 1 },
      { name: "concurrent_access", type: "timing", parameters: { concurrent_users: 100 }, probability: 1 },
    ],
    parameters: { risk_multiplier: 1.3 },
    expectedOutcomes: { boundary_handling: true },
  },
  security: {
    name: "Security Testing",
    description: "Security-focused simulation",
    type: "security",
    conditions: [
      { name: "auth_failure", type: "failure", parameters: { target: "authentication" }, probability: 0.2 },
      { name: "injection_attempt", type: "constraint", parameters: { malicious_input: true }, probability: 1 },
    ],
    parameters: { risk_multiplier: 1.5 },
    expectedOutcomes: { security_preserved: true },
  },
  performance: {
    name: "Performance Testing",
    description: "Performance benchmarking",
    type: "performance",
    conditions: [{ name: "high_throughput", type: "resource", parameters: { requests_per_second: 1000 }, probability: 1 }],
    parameters: { risk_multiplier: 1.0, collect_timing: true },
    expectedOutcomes: { latency_p99_ms: 500, throughput_min: 100 },
  },
};

/** Lower-cased name with spaces turned into underscores, used for file names. */
export function scenarioSlug(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

/**
 * Validates a scenario document.
 *
 * @throws ScenarioDefinitionError listing every schema issue.
 */
export function parseScenarioDocument(data: unknown, source = "<inline>", idFactory: () => string = randomUUID): Scenario {
  const parsed = scenarioDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ScenarioDefinitionError(`Failed to parse scenario from ${source}: ${issues.join("; ")}`, { source, issues });
  }
  const document = parsed.data;
  return {
    id: document.scenario_id ?? idFactory(),
    name: document.name,
    description: document.description,
    type: document.scenario_type,
    conditions: document.conditions,
    parameters: document.parameters,
    expectedOutcomes: document.expected_outcomes,
    tags: document.tags,
  };
}

export function scenarioToDocument(scenario: Scenario): Record<string, unknown> {
  return {
    scenario_id: scenario.id,
    name: scenario.name,
    description: scenario.description,
    scenario_type: scenario.type,
    conditions: scenario.conditions.map((condition) => ({ ...condition, parameters: { ...condition.parameters } })),
    parameters: { ...scenario.parameters },
    expected_outcomes: { ...scenario.expectedOutcomes },
    tags: [...scenario.tags],
  };
}

function isMissingPathError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export interface ScenarioLoaderOptions {
  /** Directory scanned by {@link ScenarioLoader.loadFromDirectory} and used as the default save target. */
  directory?: string;
  logger?: StructuredLogger;
  idFactory?: () => string;
}

export interface ScenarioCreation {
  name: string;
  type: ScenarioType;
  description?: string;
  conditions?: Array<Partial<ScenarioCondition> & { name: string }>;
  parameters?: ScenarioParameters;
  tags?: string[];
}

/**
 * Registry of simulation scenarios. Built-ins are registered lazily on first
 * access and never replace a scenario already registered under the same key;
 * file-backed and created scenarios are keyed by their name.
 */
export class ScenarioLoader {
  private readonly directory: string | undefined;
  private readonly logger: StructuredLogger;
  private readonly idFactory: () => string;
  private readonly scenarios = new Map<string, Scenario>();
  private builtinsLoaded = false;

  constructor(options: ScenarioLoaderOptions = {}) {
    this.directory = options.directory;
    this.logger = options.logger ?? createSilentLogger();
    this.idFactory = options.idFactory ?? randomUUID;
  }

  loadBuiltins(): void {
    if (this.builtinsLoaded) {
      return;
    }
    let registered = 0;
    for (const [key, builtin] of Object.entries(BUILTIN_SCENARIOS)) {
      if (this.scenarios.has(key)) {
        continue;
      }
      registered += 1;
      this.scenarios.set(key, {
        ...structuredClone(builtin),
        id: this.idFactory(),
        tags: ["builtin"],
      });
    }
    this.builtinsLoaded = true;
    this.logger.debug("scenario_builtins_loaded", { count: registered });
  }

  /**
   * Reads a JSON or YAML scenario file and registers it under its name.
   *
   * @throws ScenarioDefinitionError for unreadable, unparsable or invalid files.
   */
  async loadFromFile(filePath: string): Promise<Scenario> {
    const extension = extname(filePath).toLowerCase();
    if (!SCENARIO_EXTENSIONS.has(extension)) {
      throw new ScenarioDefinitionError(`Unsupported scenario extension for ${filePath}`, { filePath });
    }
    let raw: unknown;
    try {
      const contents = await readFile(filePath, "utf8");
      raw = extension === ".json" ? JSON.parse(contents) : YAML.parse(contents);
    } catch (error) {
      throw new ScenarioDefinitionError(`Failed to read scenario from ${filePath}: ${describeError(error)}`, {
        filePath,
      });
    }
    const scenario = parseScenarioDocument(raw, filePath, this.idFactory);
    this.scenarios.set(scenario.name, scenario);
    this.logger.info("scenario_loaded", { name: scenario.name, file: filePath });
    return scenario;
  }

  /**
   * Loads every scenario file of the configured directory in name order. A
   * file that fails to load is logged and skipped; a missing directory yields
   * an empty list.
   */
  async loadFromDirectory(): Promise<Scenario[]> {
    if (!this.directory) {
      return [];
    }
    let names: string[];
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      names = entries
        .filter((entry) => entry.isFile() && !entry.name.startsWith(".") && SCENARIO_EXTENSIONS.has(extname(entry.name).toLowerCase()))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isMissingPathError(error)) {
        return [];
      }
      throw error;
    }

    const loaded: Scenario[] = [];
    for (const name of names) {
      const filePath = join(this.directory, name);
      try {
        loaded.push(await this.loadFromFile(filePath));
      } catch (error) {
        this.logger.error("scenario_load_failed", { file: filePath, message: describeError(error) });
      }
    }
    return loaded;
  }

  /** Writes the scenario as indented JSON and returns the path written. */
  async saveScenario(scenario: Scenario, filePath?: string): Promise<string> {
    const fileName = `${scenarioSlug(scenario.name)}.json`;
    const target = filePath ?? (this.directory ? join(this.directory, fileName) : fileName);
    await writeFile(target, `${JSON.stringify(scenarioToDocument(scenario), null, 2)}\n`, "utf8");
    this.logger.info("scenario_saved", { name: scenario.name, file: target });
    return target;
  }

  getScenario(name: string): Scenario | undefined {
    this.loadBuiltins();
    return this.scenarios.get(name);
  }

  /** @throws ScenarioNotFoundError when no scenario is registered under `name`. */
  requireScenario(name: string): Scenario {
    const scenario = this.getScenario(name);
    if (!scenario) {
      throw new ScenarioNotFoundError(name);
    }
    return scenario;
  }

  getScenariosByType(type: ScenarioType): Scenario[] {
    return this.getAllScenarios().filter((scenario) => scenario.type === type);
  }

  getAllScenarios(): Scenario[] {
    this.loadBuiltins();
    return Array.from(this.scenarios.values());
  }

  listScenarioNames(): string[] {
    this.loadBuiltins();
    return Array.from(this.scenarios.keys());
  }

  createScenario(creation: ScenarioCreation): Scenario {
    const scenario: Scenario = {
      id: this.idFactory(),
      name: creation.name,
      description: creation.description ?? "",
      type: creation.type,
      conditions: (creation.conditions ?? []).map((condition) => ({
        name: condition.name,
        type: condition.type ?? "",
        parameters: { ...(condition.parameters ?? {}) },
        probability: condition.probability ?? 1,
      })),
      parameters: { ...(creation.parameters ?? {}) },
      expectedOutcomes: {},
      tags: [...(creation.tags ?? [])],
    };
    this.scenarios.set(scenario.name, scenario);
    this.logger.info("scenario_created", { name: scenario.name, type: scenario.type });
    return scenario;
  }

  /**
   * Combines existing scenarios: conditions are concatenated and parameters
   * merged left to right, so later bases win. Unknown base names are skipped.
   */
  createCompositeScenario(name: string, baseNames: readonly string[]): Scenario {
    const conditions: ScenarioCondition[] = [];
    const parameters: ScenarioParameters = {};
    for (const baseName of baseNames) {
      const base = this.getScenario(baseName);
      if (!base) {
        this.logger.warn("scenario_composite_base_missing", { name, base: baseName });
        continue;
      }
      conditions.push(...structuredClone(base.conditions));
      Object.assign(parameters, base.parameters);
    }
    const scenario: Scenario = {
      id: this.idFactory(),
      name,
      description: `Composite: ${baseNames.join(", ")}`,
      type: "custom",
      conditions,
      parameters,
      expectedOutcomes: {},
      tags: ["composite"],
    };
    this.scenarios.set(name, scenario);
    return scenario;
  }
}
