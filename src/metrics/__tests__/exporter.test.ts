import { describe, it, expect, beforeEach } from "vitest";
import { PlannerMetrics } from "../exporter.js";

describe("PlannerMetrics", () => {
  let metrics: PlannerMetrics;

  beforeEach(() => {
    metrics = new PlannerMetrics();
  });

  it("counts plans by category and classification", async () => {
    metrics.recordPlan("low_digital", "information", 1.46);
    metrics.recordPlan("low_digital", "information", 1.46);
    metrics.recordPlan("vulnerable", "information", 1.46);
    const output = await metrics.getMetrics();

    expect(output).toContain('chplan_plans_total{category="low_digital",classification="information"} 2');
    expect(output).toContain('chplan_plans_total{category="vulnerable",classification="information"} 1');
  });

  it("observes plan cost in a histogram", async () => {
    metrics.recordPlan("digital_first", "information", 0.028);
    const output = await metrics.getMetrics();

    expect(output).toContain('chplan_plan_cost_bucket{le="0.01"} 0');
    expect(output).toContain('chplan_plan_cost_bucket{le="0.05"} 1');
    expect(output).toContain("chplan_plan_cost_count 1");
  });

  it("counts rule applications", async () => {
    metrics.recordRules(["promotional-offer", "vulnerable-protection", "promotional-offer"]);
    const output = await metrics.getMetrics();

    expect(output).toContain('chplan_rule_applications_total{rule="promotional-offer"} 2');
    expect(output).toContain('chplan_rule_applications_total{rule="vulnerable-protection"} 1');
  });

  it("records trimmed channels only when some were removed", async () => {
    metrics.recordTrimmed("regulatory", 0);
    metrics.recordTrimmed("information", 2);
    const output = await metrics.getMetrics();

    expect(output).toContain('chplan_channels_trimmed_total{classification="information"} 2');
    expect(output).not.toContain('chplan_channels_trimmed_total{classification="regulatory"}');
  });

  it("stores batch savings as a ratio", async () => {
    metrics.recordBatchSavings(25);
    expect(await metrics.getMetrics()).toContain("chplan_batch_savings_ratio 0.25");
  });

  it("keeps registries independent", async () => {
    const other = new PlannerMetrics();
    metrics.recordRules(["promotional-offer"]);
    expect(await other.getMetrics()).not.toContain('rule="promotional-offer"');
  });

  it("collects process metrics only when asked", async () => {
    expect(await metrics.getMetrics()).not.toContain("chplan_process_cpu_seconds_total");
    const withDefaults = new PlannerMetrics({ collectDefaults: true });
    expect(await withDefaults.getMetrics()).toContain("chplan_process_cpu_seconds_total");
  });
});
