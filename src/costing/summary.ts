/**
 * Batch summary statistics and the recommendation lines derived from them.
 */

import type { Channel, CommunicationPlan, CustomerCategory } from "../schemas/channel.js";
import type { BatchCostSummary } from "../schemas/cost.js";
import { DIGITAL_CHANNELS, TRADITIONAL_CHANNELS } from "../catalog/channels.js";

export interface BatchSummary {
  customers: number;
  categoryDistribution: Partial<Record<CustomerCategory, number>>;
  /** Steps per channel across the batch, in order of first appearance. */
  channelPopularity: Partial<Record<Channel, number>>;
  /** Most used channel; the first seen wins a tie. Null for an empty batch. */
  mostPopularChannel: Channel | null;
  /** Plans whose final upsell decision is included. */
  upsellOpportunities: number;
  averageChannelsPerCustomer: number;
  digitalPercentage: number;
  traditionalPercentage: number;
}

export function summarizeBatch(plans: readonly CommunicationPlan[]): BatchSummary {
  const categoryDistribution: Partial<Record<CustomerCategory, number>> = {};
  const popularity = new Map<Channel, number>();
  let upsellOpportunities = 0;

  for (const plan of plans) {
    categoryDistribution[plan.category] = (categoryDistribution[plan.category] ?? 0) + 1;
    for (const { channel } of plan.steps) {
      popularity.set(channel, (popularity.get(channel) ?? 0) + 1);
    }
    if (plan.upsell.included) upsellOpportunities += 1;
  }

  let mostPopularChannel: Channel | null = null;
  let best = 0;
  let totalSteps = 0;
  let digital = 0;
  let traditional = 0;
  const channelPopularity: Partial<Record<Channel, number>> = {};
  for (const [channel, count] of popularity) {
    channelPopularity[channel] = count;
    totalSteps += count;
    if (count > best) {
      best = count;
      mostPopularChannel = channel;
    }
    if (DIGITAL_CHANNELS.has(channel)) digital += count;
    if (TRADITIONAL_CHANNELS.has(channel)) traditional += count;
  }

  return {
    customers: plans.length,
    categoryDistribution,
    channelPopularity,
    mostPopularChannel,
    upsellOpportunities,
    averageChannelsPerCustomer: plans.length > 0 ? totalSteps / plans.length : 0,
    digitalPercentage: totalSteps > 0 ? (digital / totalSteps) * 100 : 0,
    traditionalPercentage: totalSteps > 0 ? (traditional / totalSteps) * 100 : 0,
  };
}

function pct(value: number): string {
  return `${value.toFixed(0)}%`;
}

/** Recommendation lines for a batch. An empty batch gets none. */
export function recommendBatch(cost: BatchCostSummary, summary: BatchSummary): string[] {
  if (summary.customers === 0) return [];

  const lines: string[] = [];
  const savings = cost.savings.costPercentage;
  if (savings > 70) {
    lines.push(`Excellent cost optimisation: ${pct(savings)} savings through targeted channels.`);
  } else if (savings > 50) {
    lines.push(`Good cost savings of ${pct(savings)}. Consider further digital adoption.`);
  } else {
    lines.push(`Limited savings of ${pct(savings)}. Review customer segmentation strategy.`);
  }

  if (cost.savings.carbonPercentage > 70) {
    lines.push(`Significant environmental impact: ${pct(cost.savings.carbonPercentage)} carbon reduction.`);
  }

  if (summary.digitalPercentage > 70) {
    lines.push(`High digital adoption (${pct(summary.digitalPercentage)}). Consider advanced digital features.`);
  } else if (summary.digitalPercentage < 30) {
    lines.push("High traditional channel usage. Invest in digital education programmes.");
  }

  const upsellRate = (summary.upsellOpportunities / summary.customers) * 100;
  if (upsellRate > 40) {
    lines.push(`Strong upsell potential (${pct(upsellRate)} of customers). Prioritise sales follow-up.`);
  } else if (upsellRate < 10) {
    lines.push(`Low upsell rate (${pct(upsellRate)}) reflects vulnerable customer protection.`);
  }

  if (summary.mostPopularChannel === "letter") {
    lines.push("Letter-heavy approach. Consider digital coaching programmes.");
  } else if (summary.mostPopularChannel === "email") {
    lines.push("Email-first approach working well. Maintain the digital strategy.");
  } else if (summary.mostPopularChannel === "in_app") {
    lines.push("In-app-first approach working well. Maintain the digital strategy.");
  }

  return lines;
}
