/**
 * Channel planner command-line interface.
 * Built with Commander for arg parsing, help generation, and subcommands.
 *
 * This module builds the Commander program with all commands registered.
 * It is separated from the entrypoint (index.ts) so tests can drive the
 * program without triggering parseAsync on process.argv.
 */

import { Command } from "commander";
import { DEFAULT_ROOT } from "./shared.js";
import { registerPlanCommands } from "./commands/plan.js";
import { registerCostCommands } from "./commands/cost.js";
import { registerScenarioCommands } from "./commands/scenario.js";

export function createProgram(): Command {
  const program = new Command()
    .name("chplan")
    .version("0.1.0")
    .description("Channel planning for customer letters: rules, cost optimisation and scenarios")
    .option("--root <path>", "Data directory (cost config, event log)", DEFAULT_ROOT);

  // --- plan, batch ---
  registerPlanCommands(program);

  // --- cost ---
  registerCostCommands(program);

  // --- scenario ---
  registerScenarioCommands(program);

  return program;
}
