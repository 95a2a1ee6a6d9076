/**
 * Cost optimiser: trims a composed plan to the classification's channel
 * cap.
 *
 * Regulatory plans keep one durable step plus the best-ranked non-durable
 * step.
 * Everything else keeps protected steps (mandatory, or durable for the
 * category) first, then the best-ranked by category priority. Kept steps
 * stay in timeline order.
 */

import type {
  ChannelStep,
  CommunicationPlan,
  CustomerCategory,
  MessageClassification,
} from "../schemas/channel.js";
import { CLASSIFICATION_RULES, isDurableFor, priorityRank } from "../catalog/channels.js";
import { appendRisk, withSteps } from "../planner/plan.js";
import { pickDurableIndex } from "../rules/protection.js";

export const OPTIMIZATION_NOTE = "Kept by cost optimisation (category priority)";
export const DURABLE_RETENTION_NOTE = "Kept as the regulatory durable medium";

interface Candidate {
  index: number;
  step: ChannelStep;
}

/** Ascending sort key: lower sorts first. */
function rankKey(candidate: Candidate, category: CustomerCategory): [number, number, number] {
  const { step, index } = candidate;
  const isProtected = step.mandatory || isDurableFor(category, step.channel);
  return [isProtected ? 0 : 1, priorityRank(category, step.channel), index];
}

function compareKeys(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function byPriority(category: CustomerCategory): (a: Candidate, b: Candidate) => number {
  return (a, b) =>
    compareKeys(
      [priorityRank(category, a.step.channel), a.index],
      [priorityRank(category, b.step.channel), b.index],
    );
}

function selectRegulatory(steps: readonly ChannelStep[], category: CustomerCategory): Set<number> {
  const keep = new Set<number>();
  const durable = pickDurableIndex(steps, category);
  if (durable !== -1) keep.add(durable);

  const others = steps
    .map((step, index) => ({ step, index }))
    .filter((c) => c.index !== durable && !isDurableFor(category, c.step.channel))
    .sort(byPriority(category));
  const best = others[0];
  if (best) keep.add(best.index);

  return keep;
}

function selectRanked(
  steps: readonly ChannelStep[],
  category: CustomerCategory,
  cap: number,
): Set<number> {
  const ranked = steps
    .map((step, index) => ({ step, index }))
    .sort((a, b) => compareKeys(rankKey(a, category), rankKey(b, category)));
  return new Set(ranked.slice(0, cap).map((c) => c.index));
}

export function optimizePlan(
  plan: CommunicationPlan,
  classification: MessageClassification = plan.classification,
  category: CustomerCategory = plan.category,
): CommunicationPlan {
  const cap = CLASSIFICATION_RULES[classification].maxChannels;
  if (plan.steps.length <= cap) return plan;

  const regulatory = classification === "regulatory";
  const keep = regulatory
    ? selectRegulatory(plan.steps, category)
    : selectRanked(plan.steps, category, cap);
  const durableIndex = regulatory ? pickDurableIndex(plan.steps, category) : -1;

  const kept = plan.steps
    .map((step, index) => ({ step, index }))
    .filter((c) => keep.has(c.index))
    .map(({ step, index }) => ({
      ...step,
      optimization: index === durableIndex ? DURABLE_RETENTION_NOTE : OPTIMIZATION_NOTE,
    }));

  const trimmed = plan.steps.length - kept.length;
  return appendRisk(
    withSteps(plan, kept),
    `COST OPTIMISATION: ${trimmed} channel(s) removed to meet the ${classification} cap of ${cap}`,
  );
}
