/**
 * Cost scenario management (list, inspect, switch, define, edit, remove).
 */

import type { Command } from "commander";
import { stringify as stringifyYaml } from "yaml";
import type { CostScenario, ScenarioDefinition } from "../../schemas/cost.js";
import { eventLogger, openStore, reportError, rootDir } from "../shared.js";

function definitionOf(scenario: CostScenario): ScenarioDefinition {
  return {
    name: scenario.name,
    description: scenario.description,
    costs: { ...scenario.costs },
    carbon: { ...scenario.carbon },
    discounts: { ...scenario.discounts },
  };
}

function show(value: unknown): string {
  if (value === undefined) return "undefined";
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

export function registerScenarioCommands(program: Command): void {
  const scenario = program
    .command("scenario")
    .description("Cost scenario management");

  scenario
    .command("list")
    .description("List scenarios; * marks the current one")
    .action(async () => {
      const root = rootDir(program);
      try {
        const store = await openStore(root, eventLogger(root));
        for (const s of store.list()) {
          console.log(`${s.current ? "*" : " "} ${s.id} - ${s.name}${s.builtIn ? " (built-in)" : ""}`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  scenario
    .command("show [id]")
    .description("Show a scenario (default: current)")
    .action(async (id: string | undefined) => {
      const root = rootDir(program);
      try {
        const store = await openStore(root, eventLogger(root));
        const selected = id !== undefined ? store.get(id) : store.current();
        console.log(`# ${selected.id}${selected.id === store.currentId ? " (current)" : ""}`);
        console.log(stringifyYaml(definitionOf(selected)).trimEnd());
      } catch (err) {
        reportError(err);
      }
    });

  scenario
    .command("use <id>")
    .description("Make a scenario current")
    .action(async (id: string) => {
      const root = rootDir(program);
      try {
        const store = await openStore(root, eventLogger(root));
        await store.use(id);
        console.log(`✅ Current scenario: ${id}`);
      } catch (err) {
        reportError(err);
      }
    });

  scenario
    .command("define <id>")
    .description("Define a scenario by copying another one")
    .option("--from <id>", "Scenario to copy (default: current)")
    .option("--name <name>", "Display name (default: the id)")
    .option("--description <text>", "Description")
    .action(async (id: string, opts: { from?: string; name?: string; description?: string }) => {
      const root = rootDir(program);
      try {
        const store = await openStore(root, eventLogger(root));
        const base = opts.from !== undefined ? store.get(opts.from) : store.current();
        await store.define(id, {
          ...definitionOf(base),
          name: opts.name ?? id,
          description: opts.description ?? `Based on ${base.id}`,
        });
        console.log(`✅ Scenario defined: ${id} (from ${base.id})`);
      } catch (err) {
        reportError(err);
      }
    });

  scenario
    .command("set <id> <key> <value>")
    .description("Set a scenario value (dot-notation, e.g. costs.letterPostage)")
    .action(async (id: string, key: string, value: string) => {
      const root = rootDir(program);
      try {
        const store = await openStore(root, eventLogger(root));
        const change = await store.setValue(id, key, value);
        console.log(`✅ Scenario updated: ${id}`);
        console.log(`  ${key}: ${show(change.oldValue)} → ${show(change.newValue)}`);
      } catch (err) {
        reportError(err);
      }
    });

  scenario
    .command("remove <id>")
    .description("Remove a user-defined scenario")
    .action(async (id: string) => {
      const root = rootDir(program);
      try {
        const store = await openStore(root, eventLogger(root));
        await store.remove(id);
        console.log(`✅ Scenario removed: ${id}`);
      } catch (err) {
        reportError(err);
      }
    });
}
