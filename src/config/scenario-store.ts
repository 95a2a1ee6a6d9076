/**
 * Scenario store: named cost scenarios plus a "current scenario" pointer,
 * persisted as YAML.
 *
 * Switching the current scenario only moves the pointer. Callers take a
 * frozen snapshot with `current()` at the start of a calculation or batch
 * and pass it along; a later switch never affects that snapshot.
 */

import { mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import {
  CostConfigFile,
  ScenarioDefinition,
  ScenarioId,
  type CostScenario,
} from "../schemas/cost.js";
import type { EventLogger } from "../events/logger.js";
import { InvalidInputError, UnknownScenarioError, formatIssues } from "../errors.js";
import {
  BUILT_IN_SCENARIO_IDS,
  DEFAULT_SCENARIO_ID,
  loadDefaultScenarios,
  toScenario,
  type ScenarioSource,
} from "./defaults.js";

export interface ScenarioStoreOptions {
  logger?: EventLogger;
  /** Actor recorded on scenario events (default: "cli"). */
  actor?: string;
}

export interface ScenarioListing {
  id: string;
  name: string;
  description: string;
  current: boolean;
  builtIn: boolean;
}

export interface ScenarioValueChange {
  key: string;
  oldValue: unknown;
  newValue: unknown;
  scenario: CostScenario;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Numbers are stored as numbers; anything else as the raw string. */
function coerceValue(raw: string): string | number {
  const trimmed = raw.trim();
  if (trimmed !== "" && Number.isFinite(Number(trimmed))) return Number(trimmed);
  return raw;
}

export class ScenarioStore implements ScenarioSource {
  private readonly filePath: string;
  private readonly logger?: EventLogger;
  private readonly actor: string;
  private config: CostConfigFile;

  private constructor(filePath: string, config: CostConfigFile, options?: ScenarioStoreOptions) {
    this.filePath = filePath;
    this.config = config;
    this.logger = options?.logger;
    this.actor = options?.actor ?? "cli";
  }

  /**
   * Open the store at `filePath`, seeding it with the built-in scenarios
   * when the file does not exist yet.
   *
   * @throws InvalidInputError if the file exists but does not validate
   */
  static async open(filePath: string, options?: ScenarioStoreOptions): Promise<ScenarioStore> {
    let text: string | undefined;
    try {
      text = await readFile(filePath, "utf-8");
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }

    if (text === undefined) {
      const store = new ScenarioStore(
        filePath,
        { currentScenario: DEFAULT_SCENARIO_ID, scenarios: loadDefaultScenarios() },
        options,
      );
      await store.save();
      return store;
    }

    const parsed = CostConfigFile.safeParse(parseYaml(text));
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid cost configuration ${filePath}: ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues,
      );
    }
    if (!Object.hasOwn(parsed.data.scenarios, parsed.data.currentScenario)) {
      throw new InvalidInputError(
        `Invalid cost configuration ${filePath}: current scenario '${parsed.data.currentScenario}' is not defined`,
      );
    }

    return new ScenarioStore(filePath, parsed.data, options);
  }

  get path(): string {
    return this.filePath;
  }

  get currentId(): string {
    return this.config.currentScenario;
  }

  has(id: string): boolean {
    return Object.hasOwn(this.config.scenarios, id);
  }

  list(): ScenarioListing[] {
    return Object.entries(this.config.scenarios).map(([id, def]) => ({
      id,
      name: def.name,
      description: def.description,
      current: id === this.config.currentScenario,
      builtIn: BUILT_IN_SCENARIO_IDS.includes(id),
    }));
  }

  /**
   * Frozen snapshot of a scenario.
   *
   * @throws UnknownScenarioError
   */
  get(id: string): CostScenario {
    return toScenario(id, this.definition(id));
  }

  /** Frozen snapshot of the current scenario. */
  current(): CostScenario {
    return this.get(this.config.currentScenario);
  }

  /**
   * Make `id` the current scenario.
   *
   * @throws UnknownScenarioError, leaving the current scenario unchanged
   */
  async use(id: string): Promise<CostScenario> {
    const scenario = this.get(id);
    const from = this.config.currentScenario;
    if (from === id) return scenario;

    this.config = { ...this.config, currentScenario: id };
    await this.save();
    await this.logger?.logScenarioSwitch(this.actor, { from, to: id });
    return scenario;
  }

  /**
   * Add or replace a user-defined scenario.
   *
   * @throws InvalidInputError for an invalid id, a built-in id, or an
   *   invalid definition
   */
  async define(id: string, definition: unknown): Promise<CostScenario> {
    const idResult = ScenarioId.safeParse(id);
    if (!idResult.success) {
      throw new InvalidInputError(`Invalid scenario id '${id}': ${formatIssues(idResult.error.issues)}`, idResult.error.issues);
    }
    if (BUILT_IN_SCENARIO_IDS.includes(id)) {
      throw new InvalidInputError(`Scenario '${id}' is built in and cannot be redefined`);
    }

    const parsed = ScenarioDefinition.safeParse(definition);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid scenario '${id}': ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues,
      );
    }

    const existed = this.has(id);
    this.config = {
      ...this.config,
      scenarios: { ...this.config.scenarios, [id]: parsed.data },
    };
    await this.save();
    await this.logger?.logScenario(existed ? "scenario.updated" : "scenario.defined", this.actor, { id });
    return this.get(id);
  }

  /**
   * Set one value of a scenario by dot-notation key
   * (e.g. `costs.letterPostage`). The result is re-validated before it is
   * written.
   *
   * @throws UnknownScenarioError
   * @throws InvalidInputError for an unknown key or an invalid result
   */
  async setValue(id: string, key: string, rawValue: string): Promise<ScenarioValueChange> {
    const candidate: unknown = structuredClone(this.definition(id));
    const segments = key.split(".").filter((s) => s.length > 0);
    const leaf = segments.pop();
    if (leaf === undefined) {
      throw new InvalidInputError("Key must not be empty");
    }

    let target: unknown = candidate;
    for (const segment of segments) {
      target = isRecord(target) && Object.hasOwn(target, segment) ? target[segment] : undefined;
    }
    if (!isRecord(target) || !Object.hasOwn(target, leaf) || isRecord(target[leaf])) {
      throw new InvalidInputError(`Unknown scenario key '${key}'`);
    }

    const oldValue = target[leaf];
    const newValue = coerceValue(rawValue);
    target[leaf] = newValue;

    const parsed = ScenarioDefinition.safeParse(candidate);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid value for '${key}': ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues,
      );
    }

    this.config = {
      ...this.config,
      scenarios: { ...this.config.scenarios, [id]: parsed.data },
    };
    await this.save();
    await this.logger?.logScenario("scenario.updated", this.actor, { id, key, oldValue, newValue });
    return { key, oldValue, newValue, scenario: this.get(id) };
  }

  /**
   * Remove a user-defined scenario.
   *
   * @throws UnknownScenarioError
   * @throws InvalidInputError for a built-in or the current scenario
   */
  async remove(id: string): Promise<void> {
    this.definition(id);
    if (BUILT_IN_SCENARIO_IDS.includes(id)) {
      throw new InvalidInputError(`Scenario '${id}' is built in and cannot be removed`);
    }
    if (id === this.config.currentScenario) {
      throw new InvalidInputError(`Scenario '${id}' is current; switch to another scenario first`);
    }

    const scenarios = { ...this.config.scenarios };
    delete scenarios[id];
    this.config = { ...this.config, scenarios };
    await this.save();
    await this.logger?.logScenario("scenario.removed", this.actor, { id });
  }

  /** Own-key lookup, so inherited names such as `constructor` are not scenarios. */
  private definition(id: string): ScenarioDefinition {
    const def = Object.hasOwn(this.config.scenarios, id) ? this.config.scenarios[id] : undefined;
    if (!def) {
      throw new UnknownScenarioError(id, Object.keys(this.config.scenarios));
    }
    return def;
  }

  private async save(): Promise<void> {
    this.config = { ...this.config, lastUpdated: new Date().toISOString() };
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, stringifyYaml(this.config, { lineWidth: 120 }));
  }
}
