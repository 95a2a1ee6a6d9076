/**
 * Plan builder: turns (category, classification) into the initial
 * channel timeline.
 *
 * Algorithm:
 * 1. Classification-mandatory channels first, flagged mandatory, immediate
 * 2. Category default channels not already present, up to
 *    min(classification cap, category cap)
 * 3. Timing from the channel lookup; purpose and rationale templated
 * 4. Renumber
 *
 * Nothing is removed here: if the mandatory channels alone fill the budget,
 * step 2 adds nothing.
 */

import type {
  Channel,
  ChannelStep,
  CommunicationPlan,
  UpsellDecision,
} from "../schemas/channel.js";
import type { PlanRequest } from "../schemas/customer.js";
import {
  CATEGORY_STRATEGIES,
  CHANNEL_TIMING,
  CLASSIFICATION_RULES,
  channelBudget,
  channelPurpose,
  channelRationale,
  classificationLabel,
} from "../catalog/channels.js";
import { makeStep, renumber } from "./plan.js";
import { defaultUpsellProduct, draftAssets } from "./assets.js";

/** Initial upsell decision, before any protection rule runs. */
export function decideUpsell(request: PlanRequest): UpsellDecision {
  if (request.classification === "regulatory") {
    return {
      included: false,
      product: null,
      message: null,
      reasoning: "No upsell in regulatory communications",
    };
  }
  if (!request.upsellEligible) {
    return {
      included: false,
      product: null,
      message: null,
      reasoning: "Customer is not upsell-eligible",
    };
  }

  const suggested = request.upsellProducts[0];
  if (suggested) {
    return {
      included: true,
      product: suggested,
      message: `Special offer: ${suggested} is available to you`,
      reasoning: "Product suggested by customer categorisation",
    };
  }

  const fallback = defaultUpsellProduct(request.category);
  return {
    included: true,
    product: fallback.product,
    message: fallback.message,
    reasoning: "Category default product for an upsell-eligible customer",
  };
}

/** Initial timeline for a category and classification. */
export function buildTimeline(request: Pick<PlanRequest, "category" | "classification">): ChannelStep[] {
  const { category, classification } = request;
  const mandatory = CLASSIFICATION_RULES[classification].mandatoryChannels;
  const budget = channelBudget(category, classification);
  const label = classificationLabel(classification);

  const steps: ChannelStep[] = mandatory.map((channel) =>
    makeStep({
      channel,
      when: "immediate",
      purpose: `Mandatory ${label} communication`,
      rationale: `Required for ${label} compliance`,
      mandatory: true,
    }),
  );

  const present = new Set<Channel>(mandatory);
  for (const channel of CATEGORY_STRATEGIES[category].channels) {
    if (steps.length >= budget) break;
    if (present.has(channel)) continue;
    present.add(channel);
    steps.push(
      makeStep({
        channel,
        when: CHANNEL_TIMING[channel],
        purpose: channelPurpose(channel, classification),
        rationale: channelRationale(channel, category),
      }),
    );
  }

  return renumber(steps);
}

/** Initial plan: timeline, draft assets and upsell decision. */
export function buildPlan(request: PlanRequest): CommunicationPlan {
  const steps = buildTimeline(request);
  const upsell = decideUpsell(request);

  return {
    customerId: request.customerId,
    category: request.category,
    classification: request.classification,
    steps,
    assets: draftAssets(steps, request.classification, upsell),
    upsell,
    risks: [],
    appliedRules: [],
  };
}
