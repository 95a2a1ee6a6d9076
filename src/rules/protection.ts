/**
 * Override procedures: vulnerable-customer protection and regulatory
 * durable-medium compliance.
 *
 * Both are called from more than one phase of the composer and are fixed
 * points after a single application.
 */

import {
  Channel,
  type ChannelStep,
  type CommunicationPlan,
  type ContentAssets,
  type CustomerCategory,
  type UpsellDecision,
} from "../schemas/channel.js";
import { DURABLE_MEDIA } from "../catalog/channels.js";
import {
  NEUTRAL_SUPPORT_MESSAGE,
  NEUTRAL_SUPPORT_SUBJECT,
  SMS_MAX_LENGTH,
  draftFor,
  isPromotional,
} from "../planner/assets.js";
import { insertStep, leadRisk, setAsset } from "../planner/plan.js";

export const VULNERABLE_PROTECTION_NOTE =
  "VULNERABLE CUSTOMER PROTECTION: all sales and promotional content removed";

const PROTECTED_UPSELL: UpsellDecision = {
  included: false,
  product: null,
  message: null,
  reasoning: "Removed for vulnerable customer protection",
};

function neutralBody(channel: Channel): string {
  return channel === "sms" ? NEUTRAL_SUPPORT_MESSAGE.slice(0, SMS_MAX_LENGTH) : NEUTRAL_SUPPORT_MESSAGE;
}

/** Replace promotional subjects and bodies with neutral support text. */
export function stripPromotionalContent(assets: ContentAssets): ContentAssets {
  const cleaned: ContentAssets = {};
  for (const channel of Channel.options) {
    const asset = assets[channel];
    if (!asset) continue;
    cleaned[channel] = {
      ...asset,
      ...(isPromotional(asset.subject) ? { subject: NEUTRAL_SUPPORT_SUBJECT } : {}),
      body: isPromotional(asset.body) ? neutralBody(channel) : asset.body,
    };
  }
  return cleaned;
}

/**
 * Remove every trace of sales content from a plan: the upsell is dropped,
 * promotional asset text is replaced, and the protection note leads the
 * risk log.
 */
export function enforceVulnerableProtection(plan: CommunicationPlan): CommunicationPlan {
  const protectedPlan: CommunicationPlan = {
    ...plan,
    upsell: { ...PROTECTED_UPSELL },
    assets: stripPromotionalContent(plan.assets),
  };
  return leadRisk(protectedPlan, VULNERABLE_PROTECTION_NOTE);
}

/**
 * Index of the durable step a regulatory plan should rely on: the
 * category's preferred durable channel, else a mandatory durable step, else
 * the first durable step. -1 when the plan has none.
 */
export function pickDurableIndex(steps: readonly ChannelStep[], category: CustomerCategory): number {
  const policy = DURABLE_MEDIA[category];
  const preferred = steps.findIndex((s) => s.channel === policy.preferred);
  if (preferred !== -1) return preferred;
  const mandatory = steps.findIndex((s) => s.mandatory && policy.channels.has(s.channel));
  if (mandatory !== -1) return mandatory;
  return steps.findIndex((s) => policy.channels.has(s.channel));
}

export function hasDurableMedium(plan: CommunicationPlan, category: CustomerCategory): boolean {
  return pickDurableIndex(plan.steps, category) !== -1;
}

/**
 * Guarantee a durable medium appropriate to the category. When the plan has
 * none, the preferred durable channel is inserted at position 0 with a
 * compliance annotation; otherwise the plan is returned unchanged.
 */
export function enforceRegulatoryCompliance(
  plan: CommunicationPlan,
  category: CustomerCategory,
): CommunicationPlan {
  if (hasDurableMedium(plan, category)) return plan;

  const { preferred } = DURABLE_MEDIA[category];
  let next = insertStep(plan, 0, {
    channel: preferred,
    when: "immediate",
    purpose: `REGULATORY REQUIREMENT - durable medium via ${preferred}`,
    rationale: "Legal requirement for regulatory communications",
    mandatory: true,
    compliance: `Durable medium requirement satisfied via ${preferred}`,
  });

  const draft = draftFor(preferred, "regulatory");
  if (draft && !next.assets[preferred]) {
    next = setAsset(next, preferred, draft);
  }

  return leadRisk(next, `REGULATORY OVERRIDE: durable medium delivery via ${preferred} mandated`);
}
