import { describe, it, expect } from "vitest";
import { composeRules } from "../composer.js";
import { CATEGORY_RULES } from "../category-rules.js";
import {
  CLASSIFICATION_PHASE_RULES,
  FORMAL_SUBJECT_PREFIX,
  PROMOTION_BLOCKED_NOTE,
  SHORT_SMS_POINTER,
} from "../classification-rules.js";
import { VULNERABLE_PROTECTION_NOTE } from "../protection.js";
import { buildPlan } from "../../planner/builder.js";
import { channelsOf, makeStep, renumber } from "../../planner/plan.js";
import {
  COACHING_PHONE_SCRIPT,
  LETTER_ONLINE_HELP,
  SUPPORTIVE_PHONE_SCRIPT,
  isPromotional,
} from "../../planner/assets.js";
import type {
  Channel,
  CommunicationPlan,
  CustomerCategory,
  MessageClassification,
} from "../../schemas/channel.js";
import type { PlanRequest } from "../../schemas/customer.js";

function request(
  category: CustomerCategory,
  classification: MessageClassification,
  overrides: Partial<PlanRequest> = {},
): PlanRequest {
  return {
    customerId: "C-1",
    category,
    classification,
    upsellEligible: false,
    upsellProducts: [],
    ...overrides,
  };
}

/** A bare plan with the given channels and no assets. */
function planWith(
  category: CustomerCategory,
  classification: MessageClassification,
  channels: Channel[],
): CommunicationPlan {
  return {
    customerId: "C-1",
    category,
    classification,
    steps: renumber(
      channels.map((channel) => makeStep({ channel, when: "immediate", purpose: "test", rationale: "test" })),
    ),
    assets: {},
    upsell: { included: false, product: null, message: null, reasoning: "test" },
    risks: [],
    appliedRules: [],
  };
}

describe("composeRules", () => {
  it("moves a digital-first customer off the phone", () => {
    const { plan, applied } = composeRules(planWith("digital_first", "information", ["phone"]));
    expect(channelsOf(plan)).toEqual(["in_app", "voice_note"]);
    expect(plan.steps.map((s) => s.step)).toEqual([1, 2]);
    expect(applied).toEqual(["digital-first-channels"]);
  });

  it("starts a low-digital regulatory plan with a letter", () => {
    const { plan } = composeRules(planWith("low_digital", "regulatory", []));
    expect(plan.steps[0]?.step).toBe(1);
    expect(plan.steps[0]?.channel).toBe("letter");
    expect(channelsOf(plan)).toEqual(["letter", "phone"]);
    expect(plan.steps[1]?.when).toBe("+5 days");
  });

  it("removes every sales trace for a vulnerable promotional plan", () => {
    const built = buildPlan(
      request("vulnerable", "promotional", { upsellEligible: true, upsellProducts: ["Gold Card"] }),
    );
    expect(built.upsell.included).toBe(true);

    const { plan, classification, applied } = composeRules(built);
    expect(classification).toBe("information");
    expect(plan.classification).toBe("information");
    expect(plan.upsell).toEqual({
      included: false,
      product: null,
      message: null,
      reasoning: "Removed for vulnerable customer protection",
    });
    expect(plan.risks).toEqual([VULNERABLE_PROTECTION_NOTE, PROMOTION_BLOCKED_NOTE]);
    expect(applied).toEqual(["vulnerable-callback-support", "promotional-offer"]);
    for (const asset of Object.values(plan.assets)) {
      expect(isPromotional(asset?.subject)).toBe(false);
      expect(isPromotional(asset?.body)).toBe(false);
    }
  });

  it("protects vulnerable customers for every classification", () => {
    const built = buildPlan(
      request("vulnerable", "information", { upsellEligible: true, upsellProducts: ["Gold Card"] }),
    );
    const { plan, applied } = composeRules(built);
    expect(plan.upsell.included).toBe(false);
    expect(plan.risks[0]).toBe(VULNERABLE_PROTECTION_NOTE);
    expect(applied.at(-1)).toBe("vulnerable-protection");
  });

  it("adds a supportive callback second for vulnerable customers", () => {
    const { plan } = composeRules(buildPlan(request("vulnerable", "regulatory")));
    expect(channelsOf(plan)).toEqual(["letter", "phone", "phone"]);
    expect(plan.steps[1]?.purpose).toBe("Proactive callback offer for vulnerable customer support");
    expect(plan.assets.phone?.body).toBe(SUPPORTIVE_PHONE_SCRIPT);
  });

  it("keeps the durable letter for a regulatory digital-first plan", () => {
    const { plan, applied } = composeRules(buildPlan(request("digital_first", "regulatory")));
    expect(channelsOf(plan)).toEqual(["letter", "in_app", "voice_note"]);
    expect(plan.risks).toEqual(["REGULATORY COMPLIANCE: durable medium requirement met via letter"]);
    expect(applied).toEqual(["digital-first-channels", "regulatory-durable-medium"]);
  });

  it("inserts the preferred durable medium when a regulatory plan has none", () => {
    const { plan } = composeRules(planWith("assisted_digital", "regulatory", ["sms"]));
    expect(channelsOf(plan)).toEqual(["email", "sms", "phone"]);
    expect(plan.steps[0]).toMatchObject({
      mandatory: true,
      compliance: "Durable medium requirement satisfied via email",
    });
    expect(plan.assets.email?.subject).toBe(`${FORMAL_SUBJECT_PREFIX}Your account information`);
    expect(plan.risks).toEqual([
      "REGULATORY OVERRIDE: durable medium delivery via email mandated",
      "REGULATORY COMPLIANCE: durable medium requirement met via email",
      "COST OPTIMISATION: email used as durable medium for a digitally capable customer",
    ]);
  });

  it("dispatches by the incoming classification but reports the effective one", () => {
    const { classification } = composeRules(buildPlan(request("low_digital", "promotional")));
    expect(classification).toBe("promotional");
  });

  it("is a fixed point when run on its own output", () => {
    const first = composeRules(buildPlan(request("accessibility", "information"))).plan;
    const second = composeRules(first);
    expect(second.plan).toEqual(first);
    expect(second.applied).toEqual([]);
  });
});

describe("category rules", () => {
  const context = (category: CustomerCategory) => ({ category, classification: "information" as const });

  it("offers assisted-digital customers a coaching call", () => {
    const plan = CATEGORY_RULES.assisted_digital.apply(
      planWith("assisted_digital", "information", ["email"]),
      context("assisted_digital"),
    );
    expect(channelsOf(plan)).toEqual(["email", "phone"]);
    expect(plan.steps[1]?.when).toBe("+3 days");
    expect(plan.assets.phone?.body).toBe(COACHING_PHONE_SCRIPT);
  });

  it("adds the online help line to a low-digital letter once", () => {
    const built = buildPlan(request("low_digital", "information"));
    const once = CATEGORY_RULES.low_digital.apply(built, context("low_digital"));
    const twice = CATEGORY_RULES.low_digital.apply(once, context("low_digital"));
    expect(once.assets.letter?.body).toBe(`INFORMATION letter content\n\n${LETTER_ONLINE_HELP}`);
    expect(twice.assets.letter?.body).toBe(once.assets.letter?.body);
    expect(channelsOf(twice)).toEqual(["letter", "phone", "phone"]);
  });

  it("adds braille and audio for accessibility customers", () => {
    const plan = CATEGORY_RULES.accessibility.apply(
      planWith("accessibility", "information", ["letter"]),
      context("accessibility"),
    );
    expect(channelsOf(plan)).toEqual(["letter", "braille", "audio"]);
  });
});

describe("classification rules", () => {
  it("formalises SMS text for regulatory messages", () => {
    const base = planWith("assisted_digital", "regulatory", ["email", "sms"]);
    const plan = CLASSIFICATION_PHASE_RULES.regulatory.apply(
      { ...base, assets: { sms: { body: "x".repeat(200) } } },
      { category: "assisted_digital", classification: "regulatory" },
    );
    expect(plan.assets.sms?.body).toBe(`IMPORTANT: ${"x".repeat(140)}`);
    expect(plan.assets.sms?.body).toHaveLength(151);
  });

  it("adds the offer and terms to promotional email", () => {
    const built = buildPlan(
      request("digital_first", "promotional", { upsellEligible: true, upsellProducts: ["Gold Card"] }),
    );
    const plan = CLASSIFICATION_PHASE_RULES.promotional.apply(built, {
      category: "digital_first",
      classification: "promotional",
    });
    expect(plan.assets.email?.body).toBe(
      "<p>PROMOTIONAL email content</p>\n" +
        '<div class="promo-offer"><h3>Exclusive offer</h3><p>Special offer: Gold Card is available to you</p></div>\n' +
        '<p class="disclaimer">Terms and conditions apply. See website for details.</p>',
    );
    expect(plan.risks).toEqual(["PROMOTIONAL: standard terms and conditions apply to all offers"]);
  });

  it("simplifies information assets and ensures in-app", () => {
    const base = planWith("assisted_digital", "information", ["email", "sms"]);
    const plan = CLASSIFICATION_PHASE_RULES.information.apply(
      {
        ...base,
        assets: {
          email: { subject: "Changes to your account", body: "<p>b</p>" },
          sms: { body: "y".repeat(141) },
        },
      },
      { category: "assisted_digital", classification: "information" },
    );
    expect(plan.assets.email?.subject).toBe("Account Information: Changes to your account");
    expect(plan.assets.sms?.body).toBe(SHORT_SMS_POINTER);
    expect(channelsOf(plan)).toEqual(["email", "sms", "in_app"]);
  });

  it("adds audio for accessibility information messages", () => {
    const plan = CLASSIFICATION_PHASE_RULES.information.apply(
      planWith("accessibility", "information", ["letter"]),
      { category: "accessibility", classification: "information" },
    );
    expect(channelsOf(plan)).toEqual(["letter", "audio", "in_app"]);
  });
});
