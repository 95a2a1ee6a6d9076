/**
 * Built-in cost scenarios.
 *
 * The figures live in config/cost-scenarios.yaml at the repository root and
 * are validated on first load.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ScenarioDefinition, ScenarioId, type CostScenario } from "../schemas/cost.js";
import { InvalidInputError, UnknownScenarioError, formatIssues } from "../errors.js";

export const DEFAULT_SCENARIOS_PATH = fileURLToPath(
  new URL("../../config/cost-scenarios.yaml", import.meta.url),
);

export const DEFAULT_SCENARIO_ID = "realistic";

export const BUILT_IN_SCENARIO_IDS: readonly string[] = ["realistic", "conservative", "optimistic"];

const DefaultScenarios = z.record(ScenarioId, ScenarioDefinition);

let cached: Record<string, ScenarioDefinition> | undefined;

function readDefaults(): Record<string, ScenarioDefinition> {
  if (cached) return cached;

  const parsed = DefaultScenarios.safeParse(parseYaml(readFileSync(DEFAULT_SCENARIOS_PATH, "utf-8")));
  if (!parsed.success) {
    throw new InvalidInputError(
      `Invalid built-in scenarios in ${DEFAULT_SCENARIOS_PATH}: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }
  for (const id of BUILT_IN_SCENARIO_IDS) {
    if (!Object.hasOwn(parsed.data, id)) {
      throw new InvalidInputError(`Built-in scenario '${id}' missing from ${DEFAULT_SCENARIOS_PATH}`);
    }
  }

  cached = parsed.data;
  return cached;
}

/** Fresh, mutable copy of the built-in scenario definitions. */
export function loadDefaultScenarios(): Record<string, ScenarioDefinition> {
  return structuredClone(readDefaults());
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** Immutable scenario snapshot built from a definition. */
export function toScenario(id: string, definition: ScenarioDefinition): CostScenario {
  return deepFreeze({ id, ...structuredClone(definition) });
}

/**
 * Snapshot of a built-in scenario.
 *
 * @throws UnknownScenarioError if `id` is not a built-in scenario
 */
export function defaultScenario(id: string = DEFAULT_SCENARIO_ID): CostScenario {
  const defaults = readDefaults();
  const definition = Object.hasOwn(defaults, id) ? defaults[id] : undefined;
  if (!definition) {
    throw new UnknownScenarioError(id, Object.keys(defaults));
  }
  return toScenario(id, definition);
}

/** Where the planner takes its scenario snapshots from. */
export interface ScenarioSource {
  current(): CostScenario;
  get(id: string): CostScenario;
}

/** Read-only source over the built-in scenarios, current = realistic. */
export const BUILT_IN_SCENARIOS: ScenarioSource = {
  current: () => defaultScenario(),
  get: (id) => defaultScenario(id),
};
