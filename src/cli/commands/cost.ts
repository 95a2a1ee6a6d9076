/**
 * Channel cost lookup.
 */

import type { Command } from "commander";
import { calculateChannelCost } from "../../catalog/cost-model.js";
import { InvalidInputError } from "../../errors.js";
import { eventLogger, grams, money, openStore, reportError, rootDir } from "../shared.js";

export function registerCostCommands(program: Command): void {
  program
    .command("cost <channel>")
    .description("Cost of sending a volume of items on one channel")
    .option("--volume <n>", "Number of items", "1")
    .option("--scenario <id>", "Cost scenario (default: current)")
    .action(async (channel: string, opts: { volume: string; scenario?: string }) => {
      const root = rootDir(program);
      try {
        const volume = Number(opts.volume);
        if (opts.volume.trim() === "" || Number.isNaN(volume)) {
          throw new InvalidInputError(`Volume must be a number, got '${opts.volume}'`);
        }

        const store = await openStore(root, eventLogger(root));
        const scenario = opts.scenario !== undefined ? store.get(opts.scenario) : store.current();
        const calc = calculateChannelCost(channel, volume, scenario);

        console.log(`${calc.channel} × ${calc.volume} (${scenario.id})`);
        console.log(`  Unit cost: ${money(calc.unitCost)}`);
        console.log(`  Discount: ${(calc.discountApplied * 100).toFixed(0)}%`);
        console.log(`  Discounted unit cost: ${money(calc.discountedUnitCost)}`);
        console.log(`  Total cost: ${money(calc.totalCost)}`);
        console.log(`  Carbon: ${grams(calc.totalCarbon)}`);
      } catch (err) {
        reportError(err);
      }
    });
}
