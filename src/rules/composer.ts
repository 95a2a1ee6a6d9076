/**
 * Rule composer. Applies the fixed rule catalogue in three phases:
 *
 *   A. the category rule
 *   B. the classification rule (may force promotional → information)
 *   C. final invariants: vulnerable protection, then regulatory compliance
 *
 * Phase C always runs last, so nothing in A or B can undo either
 * invariant. The order is not configurable.
 */

import type { CommunicationPlan, MessageClassification } from "../schemas/channel.js";
import { plansEqual, withSteps } from "../planner/plan.js";
import { CATEGORY_RULES } from "./category-rules.js";
import { CLASSIFICATION_PHASE_RULES } from "./classification-rules.js";
import { enforceRegulatoryCompliance, enforceVulnerableProtection } from "./protection.js";
import type { PlanRule, RuleContext } from "./types.js";

export interface CompositionResult {
  plan: CommunicationPlan;
  /** Effective classification after Phase B. */
  classification: MessageClassification;
  /** Names of the rules that changed the plan, in application order. */
  applied: string[];
}

export const VULNERABLE_PROTECTION_RULE: PlanRule = {
  name: "vulnerable-protection",
  description: "No upsell or promotional content for vulnerable customers",
  apply: (plan, { category }) =>
    category === "vulnerable" ? enforceVulnerableProtection(plan) : plan,
};

export const REGULATORY_COMPLIANCE_RULE: PlanRule = {
  name: "regulatory-compliance",
  description: "At least one durable medium for regulatory messages",
  apply: (plan, { category, classification }) =>
    classification === "regulatory" ? enforceRegulatoryCompliance(plan, category) : plan,
};

const FINAL_INVARIANTS: readonly PlanRule[] = [VULNERABLE_PROTECTION_RULE, REGULATORY_COMPLIANCE_RULE];

/** Apply one rule, renumber, and record its name if it changed anything. */
function applyRule(plan: CommunicationPlan, rule: PlanRule, context: RuleContext): CommunicationPlan {
  const result = rule.apply(plan, context);
  const next = withSteps(result, result.steps);
  if (plansEqual(plan, next)) return plan;
  return { ...next, appliedRules: [...next.appliedRules, rule.name] };
}

export function composeRules(
  plan: CommunicationPlan,
  context: RuleContext = { category: plan.category, classification: plan.classification },
): CompositionResult {
  const { category } = context;
  const before = plan.appliedRules.length;

  let current = applyRule(plan, CATEGORY_RULES[category], context);
  current = applyRule(current, CLASSIFICATION_PHASE_RULES[context.classification], context);

  const classification = current.classification;
  for (const invariant of FINAL_INVARIANTS) {
    current = applyRule(current, invariant, { category, classification });
  }

  return {
    plan: current,
    classification,
    applied: current.appliedRules.slice(before),
  };
}
