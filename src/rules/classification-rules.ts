/**
 * Phase B: one rule per message classification.
 *
 * The promotional rule is the only rule that changes the effective
 * classification: a promotional message to a vulnerable customer is
 * protected at once and planned as information from then on.
 */

import type {
  CommunicationPlan,
  CustomerCategory,
  MessageClassification,
} from "../schemas/channel.js";
import { SMS_MAX_LENGTH, isPromotional } from "../planner/assets.js";
import { appendRisk, appendStep, hasChannel, setAsset } from "../planner/plan.js";
import {
  enforceRegulatoryCompliance,
  enforceVulnerableProtection,
  pickDurableIndex,
} from "./protection.js";
import type { PlanRule } from "./types.js";

export const FORMAL_SUBJECT_PREFIX = "Important Regulatory Notice: ";
export const FORMAL_SMS_PREFIX = "IMPORTANT: ";
export const INFORMATION_SUBJECT_PREFIX = "Account Information: ";
export const SMS_SIMPLIFY_THRESHOLD = 140;
export const SHORT_SMS_POINTER = "Account update available. Check the app or call us for details.";
export const PROMOTIONAL_TERMS_NOTE = "PROMOTIONAL: standard terms and conditions apply to all offers";
export const PROMOTION_BLOCKED_NOTE =
  "VULNERABLE CUSTOMER PROTECTION: promotional message delivered as information only";

const TERMS_DISCLAIMER = `<p class="disclaimer">Terms and conditions apply. See website for details.</p>`;

function enforceFormalTone(plan: CommunicationPlan): CommunicationPlan {
  let next = plan;

  const email = next.assets.email;
  if (email?.subject !== undefined && !/important|notice|regulatory/i.test(email.subject)) {
    next = setAsset(next, "email", { ...email, subject: `${FORMAL_SUBJECT_PREFIX}${email.subject}` });
  }

  const sms = next.assets.sms;
  if (sms && !sms.body.startsWith("IMPORTANT")) {
    const body = `${FORMAL_SMS_PREFIX}${sms.body.slice(0, SMS_SIMPLIFY_THRESHOLD)}`.slice(0, SMS_MAX_LENGTH);
    next = setAsset(next, "sms", { ...sms, body });
  }

  return next;
}

function regulatory(plan: CommunicationPlan, category: CustomerCategory): CommunicationPlan {
  let next = enforceFormalTone(enforceRegulatoryCompliance(plan, category));

  const durable = next.steps[pickDurableIndex(next.steps, category)];
  if (durable) {
    next = appendRisk(next, `REGULATORY COMPLIANCE: durable medium requirement met via ${durable.channel}`);
    if (durable.channel === "email") {
      next = appendRisk(
        next,
        "COST OPTIMISATION: email used as durable medium for a digitally capable customer",
      );
    }
  }

  return next;
}

function embellishOffer(plan: CommunicationPlan, message: string): CommunicationPlan {
  let next = plan;

  const email = next.assets.email;
  if (email && !email.body.includes(`class="promo-offer"`)) {
    next = setAsset(next, "email", {
      ...email,
      body: `${email.body}\n<div class="promo-offer"><h3>Exclusive offer</h3><p>${message}</p></div>`,
    });
  }

  const inApp = next.assets.in_app;
  if (inApp && !isPromotional(inApp.body)) {
    next = setAsset(next, "in_app", { ...inApp, body: `${inApp.body}\n\nExclusive offer: ${message}` });
  }

  return next;
}

function promotional(plan: CommunicationPlan, category: CustomerCategory): CommunicationPlan {
  if (category === "vulnerable") {
    const protectedPlan = enforceVulnerableProtection(plan);
    return { ...appendRisk(protectedPlan, PROMOTION_BLOCKED_NOTE), classification: "information" };
  }

  let next = plan;
  if (next.upsell.included && next.upsell.message) {
    next = embellishOffer(next, next.upsell.message);
  }

  const email = next.assets.email;
  if (email && !email.body.includes(TERMS_DISCLAIMER)) {
    next = setAsset(next, "email", { ...email, body: `${email.body}\n${TERMS_DISCLAIMER}` });
  }

  return appendRisk(next, PROMOTIONAL_TERMS_NOTE);
}

function information(plan: CommunicationPlan, category: CustomerCategory): CommunicationPlan {
  let next = plan;

  const email = next.assets.email;
  if (email?.subject !== undefined && !/update|information|notice/i.test(email.subject)) {
    next = setAsset(next, "email", { ...email, subject: `${INFORMATION_SUBJECT_PREFIX}${email.subject}` });
  }

  const sms = next.assets.sms;
  if (sms && sms.body.length > SMS_SIMPLIFY_THRESHOLD) {
    next = setAsset(next, "sms", { ...sms, body: SHORT_SMS_POINTER });
  }

  if (category === "accessibility" && !hasChannel(next, "audio")) {
    next = appendStep(next, {
      channel: "audio",
      when: "immediate",
      purpose: "Audio format for accessibility",
      rationale: "Ensuring information is accessible to all customers",
    });
  }

  if (!hasChannel(next, "in_app")) {
    next = appendStep(next, {
      channel: "in_app",
      when: "immediate",
      purpose: "Clear in-app notification",
      rationale: "Convenient access to information",
    });
  }

  return next;
}

export const CLASSIFICATION_PHASE_RULES: Readonly<Record<MessageClassification, PlanRule>> = {
  regulatory: {
    name: "regulatory-durable-medium",
    description: "Durable medium, formal tone, compliance notes",
    apply: (plan, { category }) => regulatory(plan, category),
  },
  promotional: {
    name: "promotional-offer",
    description: "Offer embellishment and terms, or protection for vulnerable customers",
    apply: (plan, { category }) => promotional(plan, category),
  },
  information: {
    name: "information-clarity",
    description: "Plain subjects, short SMS, in-app and audio coverage",
    apply: (plan, { category }) => information(plan, category),
  },
};
