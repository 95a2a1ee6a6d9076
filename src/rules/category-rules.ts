/**
 * Phase A: one rule per customer category.
 */

import type { CommunicationPlan, CustomerCategory } from "../schemas/channel.js";
import {
  appendStep,
  hasChannel,
  hasPurpose,
  insertStep,
  removeAsset,
  removeChannel,
  setAsset,
} from "../planner/plan.js";
import {
  COACHING_PHONE_SCRIPT,
  LETTER_ONLINE_HELP,
  SUPPORTIVE_PHONE_SCRIPT,
} from "../planner/assets.js";
import type { PlanRule } from "./types.js";

const ONLINE_HELP_MARKER = /\bonline\b|\bQR\b/i;

function digitalFirst(plan: CommunicationPlan): CommunicationPlan {
  let next = removeAsset(removeChannel(plan, "phone"), "phone");

  if (!hasChannel(next, "in_app")) {
    next = insertStep(next, 0, {
      channel: "in_app",
      when: "immediate",
      purpose: "Primary notification via mobile app",
      rationale: "Digital-first customers prefer in-app communication",
    });
  }

  if (!hasChannel(next, "voice_note")) {
    next = appendStep(next, {
      channel: "voice_note",
      when: "immediate",
      purpose: "Personalised voice explanation",
      rationale: "Voice notes add a personal touch to digital communication",
    });
  }

  const inApp = next.assets.in_app;
  if (!next.assets.voice_note && inApp) {
    next = setAsset(next, "voice_note", { body: inApp.body });
  }

  return next;
}

function assistedDigital(plan: CommunicationPlan): CommunicationPlan {
  let next = plan;
  if (!hasPurpose(next, "coaching")) {
    next = appendStep(next, {
      channel: "phone",
      when: "+3 days",
      purpose: "Optional coaching call for digital banking setup",
      rationale: "Assisted-digital customers benefit from guided digital onboarding",
    });
  }
  if (!next.assets.phone) {
    next = setAsset(next, "phone", { body: COACHING_PHONE_SCRIPT });
  }
  return next;
}

function lowDigital(plan: CommunicationPlan): CommunicationPlan {
  let next = plan;

  if (!hasChannel(next, "letter")) {
    next = insertStep(next, 0, {
      channel: "letter",
      when: "immediate",
      purpose: "Primary communication via preferred postal method",
      rationale: "Low-digital customers prefer traditional postal communication",
    });
  }

  if (!hasPurpose(next, "coaching")) {
    next = appendStep(next, {
      channel: "phone",
      when: "+5 days",
      purpose: "Optional coaching call to introduce digital banking benefits",
      rationale: "Gentle introduction to digital services for offline-preferred customers",
    });
  }

  const letter = next.assets.letter;
  if (letter && !ONLINE_HELP_MARKER.test(letter.body)) {
    next = setAsset(next, "letter", { ...letter, body: `${letter.body}\n\n${LETTER_ONLINE_HELP}` });
  }

  return next;
}

function accessibility(plan: CommunicationPlan): CommunicationPlan {
  let next = plan;

  if (!hasChannel(next, "braille")) {
    next = appendStep(next, {
      channel: "braille",
      when: "immediate",
      purpose: "Accessible format for visually impaired customers",
      rationale: "Ensuring equal access to information",
    });
  }

  if (!hasChannel(next, "audio")) {
    next = appendStep(next, {
      channel: "audio",
      when: "immediate",
      purpose: "Audio version for accessibility",
      rationale: "Multiple accessible formats for different needs",
    });
  }

  const inApp = next.assets.in_app;
  if (!next.assets.braille && inApp) {
    next = setAsset(next, "braille", { body: inApp.body });
  }

  return next;
}

function vulnerable(plan: CommunicationPlan): CommunicationPlan {
  let next = plan;

  if (!hasPurpose(next, "callback")) {
    next = insertStep(next, next.steps.length === 0 ? 0 : 1, {
      channel: "phone",
      when: "+1 day",
      purpose: "Proactive callback offer for vulnerable customer support",
      rationale: "Vulnerable customers benefit from personal contact and reassurance",
    });
  }

  if (next.assets.phone?.body !== SUPPORTIVE_PHONE_SCRIPT) {
    next = setAsset(next, "phone", { body: SUPPORTIVE_PHONE_SCRIPT });
  }

  return next;
}

export const CATEGORY_RULES: Readonly<Record<CustomerCategory, PlanRule>> = {
  digital_first: {
    name: "digital-first-channels",
    description: "App first, no phone calls, voice note follow-up",
    apply: digitalFirst,
  },
  assisted_digital: {
    name: "assisted-digital-coaching",
    description: "Optional coaching call for digital onboarding",
    apply: assistedDigital,
  },
  low_digital: {
    name: "low-digital-postal-first",
    description: "Letter first, coaching call, online help in the letter",
    apply: lowDigital,
  },
  accessibility: {
    name: "accessibility-formats",
    description: "Braille and audio alternates",
    apply: accessibility,
  },
  vulnerable: {
    name: "vulnerable-callback-support",
    description: "Proactive supportive callback",
    apply: vulnerable,
  },
};
