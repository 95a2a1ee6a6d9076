/**
 * Prometheus metrics for the planner using prom-client.
 *
 * Metrics:
 * - chplan_plans_total{category,classification}     counter
 * - chplan_rule_applications_total{rule}            counter
 * - chplan_channels_trimmed_total{classification}   counter
 * - chplan_plan_cost                                histogram
 * - chplan_batch_savings_ratio                      gauge
 */

import {
  Registry,
  Gauge,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { CustomerCategory, MessageClassification } from "../schemas/channel.js";

export interface PlannerMetricsOptions {
  /** Also collect Node.js process metrics (GC, event loop, memory). */
  collectDefaults?: boolean;
}

/**
 * Planner metrics registry: all metrics in one place.
 */
export class PlannerMetrics {
  readonly registry: Registry;

  readonly plansTotal: Counter<"category" | "classification">;
  readonly ruleApplicationsTotal: Counter<"rule">;
  readonly channelsTrimmedTotal: Counter<"classification">;
  readonly planCost: Histogram;
  readonly batchSavingsRatio: Gauge;

  constructor(options?: PlannerMetricsOptions) {
    this.registry = new Registry();

    if (options?.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: "chplan_" });
    }

    this.plansTotal = new Counter({
      name: "chplan_plans_total",
      help: "Plans produced, by category and effective classification",
      labelNames: ["category", "classification"] as const,
      registers: [this.registry],
    });

    this.ruleApplicationsTotal = new Counter({
      name: "chplan_rule_applications_total",
      help: "Rules that changed a plan",
      labelNames: ["rule"] as const,
      registers: [this.registry],
    });

    this.channelsTrimmedTotal = new Counter({
      name: "chplan_channels_trimmed_total",
      help: "Steps removed by the cost optimiser",
      labelNames: ["classification"] as const,
      registers: [this.registry],
    });

    this.planCost = new Histogram({
      name: "chplan_plan_cost",
      help: "Cost of one plan in the scenario's currency",
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 1.5, 2, 3, 5],
      registers: [this.registry],
    });

    this.batchSavingsRatio = new Gauge({
      name: "chplan_batch_savings_ratio",
      help: "Cost savings of the last batch against the letter baseline (0-1)",
      registers: [this.registry],
    });
  }

  /** Record a finished plan. */
  recordPlan(
    category: CustomerCategory,
    classification: MessageClassification,
    cost: number,
  ): void {
    this.plansTotal.labels({ category, classification }).inc();
    this.planCost.observe(cost);
  }

  recordRules(rules: readonly string[]): void {
    for (const rule of rules) {
      this.ruleApplicationsTotal.labels({ rule }).inc();
    }
  }

  recordTrimmed(classification: MessageClassification, count: number): void {
    if (count > 0) {
      this.channelsTrimmedTotal.labels({ classification }).inc(count);
    }
  }

  /** Record the savings percentage of a batch as a ratio. */
  recordBatchSavings(costPercentage: number): void {
    this.batchSavingsRatio.set(costPercentage / 100);
  }

  /** Get metrics in Prometheus text format. */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
