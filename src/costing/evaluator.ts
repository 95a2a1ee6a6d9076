/**
 * Cost evaluator: per-plan cost and carbon, and batch totals against the
 * "everyone gets a letter" baseline.
 *
 * Each step is costed at volume 1, so a single plan never sees a volume
 * discount. The baseline is costed at the batch's real volume and does.
 * Savings figures therefore understate what the optimised plans would
 * cost if they were also bought in bulk.
 */

import { Channel, type CommunicationPlan } from "../schemas/channel.js";
import type {
  BatchCostSummary,
  ChannelTotals,
  ChannelUsage,
  CostScenario,
  CostSummary,
} from "../schemas/cost.js";
import { calculateChannelCost } from "../catalog/cost-model.js";

export const BASELINE_DESCRIPTION = "Everyone gets a letter";
export const OPTIMIZED_DESCRIPTION = "Personalised communication strategy";

function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/** Cost and carbon of one plan, with one line per step. */
export function evaluatePlan(plan: CommunicationPlan, scenario: CostScenario): CostSummary {
  const lines = plan.steps.map((step) => calculateChannelCost(step.channel, 1, scenario));

  const perChannel: Partial<Record<Channel, ChannelTotals>> = {};
  let totalCost = 0;
  let totalCarbon = 0;
  for (const line of lines) {
    totalCost += line.totalCost;
    totalCarbon += line.totalCarbon;
    const totals = perChannel[line.channel] ?? { occurrences: 0, totalCost: 0, totalCarbon: 0 };
    perChannel[line.channel] = {
      occurrences: totals.occurrences + 1,
      totalCost: totals.totalCost + line.totalCost,
      totalCarbon: totals.totalCarbon + line.totalCarbon,
    };
  }

  return { scenarioId: scenario.id, totalCost, totalCarbon, lines, perChannel };
}

/**
 * Batch totals from per-plan summaries. All summaries must come from the
 * same scenario snapshot as `scenario`.
 */
export function aggregateCosts(
  summaries: readonly CostSummary[],
  scenario: CostScenario,
): BatchCostSummary {
  const customers = summaries.length;

  let optimizedCost = 0;
  let optimizedCarbon = 0;
  const channelUsage: Partial<Record<Channel, ChannelUsage>> = {};
  for (const summary of summaries) {
    optimizedCost += summary.totalCost;
    optimizedCarbon += summary.totalCarbon;
    for (const channel of Channel.options) {
      const totals = summary.perChannel[channel];
      if (!totals) continue;
      const usage = channelUsage[channel] ?? { customers: 0, totalCost: 0 };
      channelUsage[channel] = {
        customers: usage.customers + 1,
        totalCost: usage.totalCost + totals.totalCost,
      };
    }
  }

  const baseline = calculateChannelCost("letter", customers, scenario);
  const costSavings = baseline.totalCost - optimizedCost;
  const carbonSavings = baseline.totalCarbon - optimizedCarbon;

  return {
    scenarioId: scenario.id,
    customers,
    optimized: {
      description: OPTIMIZED_DESCRIPTION,
      totalCost: optimizedCost,
      totalCarbon: optimizedCarbon,
      costPerCustomer: customers > 0 ? optimizedCost / customers : 0,
      channelUsage,
    },
    baseline: {
      description: BASELINE_DESCRIPTION,
      totalCost: baseline.totalCost,
      totalCarbon: baseline.totalCarbon,
      costPerCustomer: customers > 0 ? baseline.totalCost / customers : 0,
    },
    savings: {
      cost: costSavings,
      costPercentage: percentage(costSavings, baseline.totalCost),
      carbon: carbonSavings,
      carbonPercentage: percentage(carbonSavings, baseline.totalCarbon),
      breakEven: costSavings > 0 ? "immediate" : "not-achieved",
    },
  };
}

export function evaluateBatch(
  plans: readonly CommunicationPlan[],
  scenario: CostScenario,
): BatchCostSummary {
  return aggregateCosts(
    plans.map((plan) => evaluatePlan(plan, scenario)),
    scenario,
  );
}
