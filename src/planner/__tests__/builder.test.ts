import { describe, it, expect } from "vitest";
import { buildPlan, buildTimeline, decideUpsell } from "../builder.js";
import { insertStep, leadRisk, appendRisk, removeChannel } from "../plan.js";
import { isPromotional } from "../assets.js";
import type { PlanRequest } from "../../schemas/customer.js";

function request(overrides: Partial<PlanRequest> = {}): PlanRequest {
  return {
    customerId: "C-1",
    category: "digital_first",
    classification: "information",
    upsellEligible: false,
    upsellProducts: [],
    ...overrides,
  };
}

describe("buildTimeline", () => {
  it("fills category defaults up to the tighter cap", () => {
    const steps = buildTimeline({ category: "digital_first", classification: "information" });
    expect(steps.map((s) => s.channel)).toEqual(["in_app", "email"]);
    expect(steps.map((s) => s.step)).toEqual([1, 2]);
    expect(steps[0]?.purpose).toBe("INFORMATION notification for digital-first experience");
    expect(steps[1]?.rationale).toBe("Suitable for Digital-first self-serve customers with digital capability");
  });

  it("puts classification-mandatory channels first", () => {
    const steps = buildTimeline({ category: "digital_first", classification: "regulatory" });
    expect(steps.map((s) => s.channel)).toEqual(["letter", "in_app"]);
    expect(steps[0]).toMatchObject({
      mandatory: true,
      when: "immediate",
      purpose: "Mandatory REGULATORY communication",
    });
    expect(steps[1]?.mandatory).toBe(false);
  });

  it("does not repeat a mandatory channel from the category defaults", () => {
    const steps = buildTimeline({ category: "low_digital", classification: "regulatory" });
    expect(steps.map((s) => s.channel)).toEqual(["letter", "phone"]);
    expect(steps[1]?.when).toBe("+1 day");
  });

  it("uses every category default when the budget allows", () => {
    const steps = buildTimeline({ category: "accessibility", classification: "promotional" });
    expect(steps.map((s) => s.channel)).toEqual(["letter", "braille", "audio", "phone"]);
  });
});

describe("decideUpsell", () => {
  it("never includes an upsell in a regulatory message", () => {
    const upsell = decideUpsell(request({ classification: "regulatory", upsellEligible: true }));
    expect(upsell).toEqual({
      included: false,
      product: null,
      message: null,
      reasoning: "No upsell in regulatory communications",
    });
  });

  it("skips customers who are not eligible", () => {
    expect(decideUpsell(request()).reasoning).toBe("Customer is not upsell-eligible");
  });

  it("offers the categoriser's first product", () => {
    const upsell = decideUpsell(request({ upsellEligible: true, upsellProducts: ["Travel Card", "Saver"] }));
    expect(upsell.included).toBe(true);
    expect(upsell.product).toBe("Travel Card");
    expect(upsell.message).toBe("Special offer: Travel Card is available to you");
  });

  it("falls back to the category default product", () => {
    expect(decideUpsell(request({ category: "assisted_digital", upsellEligible: true })).product).toBe(
      "Premium Digital Banking",
    );
    expect(decideUpsell(request({ category: "low_digital", upsellEligible: true })).product).toBe(
      "Premium Account",
    );
  });
});

describe("buildPlan", () => {
  it("drafts assets for every channel and carries the offer in-app", () => {
    const plan = buildPlan(request({ upsellEligible: true, upsellProducts: ["Travel Card"] }));
    expect(plan.assets.email).toEqual({
      subject: "Your account information",
      body: "<p>INFORMATION email content</p>",
    });
    expect(plan.assets.in_app?.body).toBe(
      "INFORMATION in-app notification content\n\nSpecial offer: Travel Card is available to you",
    );
    expect(isPromotional(plan.assets.in_app?.body)).toBe(true);
    expect(plan.risks).toEqual([]);
    expect(plan.appliedRules).toEqual([]);
  });

  it("gives phone steps no draft asset", () => {
    const plan = buildPlan(request({ category: "low_digital" }));
    expect(Object.keys(plan.assets)).toEqual(["letter"]);
  });
});

describe("plan helpers", () => {
  it("renumber after inserts and removals without touching the input", () => {
    const plan = buildPlan(request());
    const inserted = insertStep(plan, 1, {
      channel: "sms",
      when: "+1 hour",
      purpose: "p",
      rationale: "r",
    });
    expect(inserted.steps.map((s) => [s.step, s.channel])).toEqual([
      [1, "in_app"],
      [2, "sms"],
      [3, "email"],
    ]);
    expect(plan.steps).toHaveLength(2);

    const removed = removeChannel(inserted, "in_app");
    expect(removed.steps.map((s) => [s.step, s.channel])).toEqual([
      [1, "sms"],
      [2, "email"],
    ]);
  });

  it("clamps insert positions to the timeline", () => {
    const plan = insertStep(buildPlan(request()), 10, {
      channel: "sms",
      when: "+1 hour",
      purpose: "p",
      rationale: "r",
    });
    expect(plan.steps.at(-1)?.channel).toBe("sms");
  });

  it("logs a risk note once, leading notes at the head", () => {
    let plan = appendRisk(buildPlan(request()), "first");
    plan = leadRisk(plan, "override");
    plan = leadRisk(plan, "override");
    plan = appendRisk(plan, "first");
    expect(plan.risks).toEqual(["override", "first"]);
  });
});
