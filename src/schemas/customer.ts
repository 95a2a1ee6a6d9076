/**
 * Inputs produced by the upstream collaborators (customer categoriser and
 * letter classifier), and the plan request assembled from them.
 *
 * Category and classification are consumed as opaque labels. The
 * categoriser's display labels and the classifier's upper-case labels are
 * accepted alongside the enum ids.
 */

import { z } from "zod";
import { CustomerCategory, MessageClassification } from "./channel.js";

/** Display labels used by the categoriser, keyed by category id. */
export const CATEGORY_LABELS: Record<CustomerCategory, string> = {
  digital_first: "Digital-first self-serve",
  assisted_digital: "Assisted-digital",
  low_digital: "Low/no-digital (offline-preferred)",
  accessibility: "Accessibility & alternate-format needs",
  vulnerable: "Vulnerable / extra-support",
};

const CATEGORY_BY_LABEL = new Map<string, CustomerCategory>(
  CustomerCategory.options.map((id) => [CATEGORY_LABELS[id].toLowerCase(), id]),
);

function normalizeCategory(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const key = value.trim().toLowerCase();
  return CATEGORY_BY_LABEL.get(key) ?? key.replace(/[\s-]+/g, "_");
}

function normalizeClassification(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toLowerCase() : value;
}

/** Category accepting either the enum id or the categoriser's label. */
export const CategoryInput = z.preprocess(normalizeCategory, CustomerCategory);

/** Classification accepting either the enum id or an upper-case label. */
export const ClassificationInput = z.preprocess(normalizeClassification, MessageClassification);

/** Output of the customer categoriser. */
export const CategorizedCustomer = z.object({
  customerId: z.string().min(1),
  name: z.string().optional(),
  category: CategoryInput,
  upsellEligible: z.boolean().default(false),
  upsellProducts: z.array(z.string()).default([]),
  financialIndicators: z.record(z.string(), z.unknown()).default({}),
});
export type CategorizedCustomer = z.infer<typeof CategorizedCustomer>;

/** Output of the letter classifier; only `classification` drives planning. */
export const LetterClassification = z.object({
  classification: ClassificationInput,
  confidence: z.number().min(0).max(10).optional(),
  reasoning: z.string().optional(),
});
export type LetterClassification = z.infer<typeof LetterClassification>;

/** Everything the pipeline needs for one (customer, letter) pair. */
export const PlanRequest = z.object({
  customerId: z.string().min(1),
  category: CategoryInput,
  classification: ClassificationInput,
  upsellEligible: z.boolean().default(false),
  upsellProducts: z.array(z.string()).default([]),
});
export type PlanRequest = z.infer<typeof PlanRequest>;
export type PlanRequestInput = z.input<typeof PlanRequest>;
