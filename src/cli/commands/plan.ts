/**
 * Planning commands: a single plan and a batch from a customer file.
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import { parse as parseYaml } from "yaml";
import { ClassificationInput } from "../../schemas/customer.js";
import { PlanningService } from "../../service/planning-service.js";
import { PlannerMetrics } from "../../metrics/exporter.js";
import { InvalidInputError, formatIssues } from "../../errors.js";
import {
  eventLogger,
  formatPlan,
  grams,
  money,
  openStore,
  reportError,
  rootDir,
} from "../shared.js";

async function createService(root: string, withMetrics: boolean) {
  const logger = eventLogger(root);
  const scenarios = await openStore(root, logger);
  const metrics = withMetrics ? new PlannerMetrics() : undefined;
  const service = new PlanningService({ logger, scenarios, metrics }, { dataDir: root, actor: "cli" });
  return { service, metrics };
}

/** Customer list from a YAML or JSON document: a list, or `{ customers: [...] }`. */
export function customersFrom(document: unknown, file: string): unknown[] {
  if (Array.isArray(document)) return document;
  if (document !== null && typeof document === "object" && "customers" in document) {
    const { customers } = document;
    if (Array.isArray(customers)) return customers;
  }
  throw new InvalidInputError(`${file} must contain a list of customers or a 'customers' list`);
}

export function registerPlanCommands(program: Command): void {
  program
    .command("plan")
    .description("Plan the communication for one customer")
    .requiredOption("--category <category>", "Customer category (id or categoriser label)")
    .requiredOption("--classification <classification>", "Letter classification")
    .option("--customer <id>", "Customer id", "customer")
    .option("--upsell", "Customer is upsell-eligible", false)
    .option("--product <name>", "Product suggested by the categoriser")
    .option("--scenario <id>", "Cost scenario (default: current)")
    .option("--json", "Print the plan result as JSON", false)
    .option("--metrics", "Print Prometheus metrics afterwards", false)
    .action(async (opts: {
      category: string;
      classification: string;
      customer: string;
      upsell: boolean;
      product?: string;
      scenario?: string;
      json: boolean;
      metrics: boolean;
    }) => {
      const root = rootDir(program);
      try {
        const { service, metrics } = await createService(root, opts.metrics);
        const result = await service.plan(
          {
            customerId: opts.customer,
            category: opts.category,
            classification: opts.classification,
            upsellEligible: opts.upsell,
            upsellProducts: opts.product ? [opts.product] : [],
          },
          { scenarioId: opts.scenario },
        );

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          for (const line of formatPlan(result)) console.log(line);
        }
        if (metrics) console.log(await metrics.getMetrics());
      } catch (err) {
        reportError(err);
      }
    });

  program
    .command("batch <file>")
    .description("Plan a letter for every customer in a YAML or JSON file")
    .requiredOption("--classification <classification>", "Letter classification")
    .option("--scenario <id>", "Cost scenario (default: current)")
    .option("--json", "Print the batch result as JSON", false)
    .option("--metrics", "Print Prometheus metrics afterwards", false)
    .action(async (file: string, opts: {
      classification: string;
      scenario?: string;
      json: boolean;
      metrics: boolean;
    }) => {
      const root = rootDir(program);
      try {
        const classification = ClassificationInput.safeParse(opts.classification);
        if (!classification.success) {
          throw new InvalidInputError(
            `Invalid classification: ${formatIssues(classification.error.issues)}`,
            classification.error.issues,
          );
        }

        let text: string;
        try {
          text = await readFile(file, "utf-8");
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new InvalidInputError(`Cannot read ${file}: ${message}`);
        }

        const { service, metrics } = await createService(root, opts.metrics);
        const batch = await service.planBatch(
          customersFrom(parseYaml(text), file),
          classification.data,
          { scenarioId: opts.scenario },
        );

        if (opts.json) {
          console.log(JSON.stringify(batch, null, 2));
        } else {
          const { cost, summary } = batch;
          console.log(`✅ Planned ${cost.customers} customers (${batch.classification}, scenario ${batch.scenarioId})`);
          console.log(
            `Optimised: ${money(cost.optimized.totalCost)} total, ${money(cost.optimized.costPerCustomer)} per customer, ${grams(cost.optimized.totalCarbon)}`,
          );
          console.log(
            `Baseline: ${money(cost.baseline.totalCost)} total, ${money(cost.baseline.costPerCustomer)} per customer, ${grams(cost.baseline.totalCarbon)}`,
          );
          console.log(
            `Savings: ${money(cost.savings.cost)} (${cost.savings.costPercentage.toFixed(1)}%) | Carbon: ${grams(cost.savings.carbon)} (${cost.savings.carbonPercentage.toFixed(1)}%)`,
          );
          console.log(`Most popular channel: ${summary.mostPopularChannel ?? "none"}`);
          if (batch.recommendations.length > 0) {
            console.log("Recommendations:");
            for (const line of batch.recommendations) console.log(`  • ${line}`);
          }
        }
        if (metrics) console.log(await metrics.getMetrics());
      } catch (err) {
        reportError(err);
      }
    });
}
