import type {
  CommunicationPlan,
  CustomerCategory,
  MessageClassification,
} from "../schemas/channel.js";

export interface RuleContext {
  category: CustomerCategory;
  classification: MessageClassification;
}

/**
 * One entry of the fixed rule catalogue. `apply` is pure: it returns a new
 * plan (or the same plan when nothing applies) and never mutates its input.
 */
export interface PlanRule {
  name: string;
  description: string;
  apply: (plan: CommunicationPlan, context: RuleContext) => CommunicationPlan;
}
