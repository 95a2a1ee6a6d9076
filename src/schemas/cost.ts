/**
 * Cost scenario and cost summary schemas.
 *
 * A scenario is a named set of unit costs, carbon factors and volume
 * discount tiers. Scenarios are persisted as a keyed record together with
 * a "current scenario" pointer.
 */

import { z } from "zod";
import { Channel } from "./channel.js";

const Money = z.number().nonnegative();

export const ChannelCosts = z.object({
  letterPostage: Money,
  letterPrinting: Money,
  letterEnvelope: Money,
  /** Staff time per letter, as money. */
  letterStaffTime: Money,
  email: Money,
  sms: Money,
  inApp: Money,
  voiceNote: Money,
  emailStaffMinutes: z.number().nonnegative(),
  smsStaffMinutes: z.number().nonnegative(),
  staffHourlyRate: Money,
});
export type ChannelCosts = z.infer<typeof ChannelCosts>;

/** Grams of CO2e per item. */
export const CarbonFactors = z.object({
  letter: z.number().nonnegative(),
  email: z.number().nonnegative(),
  sms: z.number().nonnegative(),
  inApp: z.number().nonnegative(),
  voiceNote: z.number().nonnegative(),
});
export type CarbonFactors = z.infer<typeof CarbonFactors>;

const Rate = z.number().min(0).lt(1);

export const VolumeDiscounts = z
  .object({
    smallThreshold: z.number().int().positive(),
    mediumThreshold: z.number().int().positive(),
    largeThreshold: z.number().int().positive(),
    smallRate: Rate,
    mediumRate: Rate,
    largeRate: Rate,
  })
  .refine(
    (d) => d.smallThreshold < d.mediumThreshold && d.mediumThreshold < d.largeThreshold,
    { message: "Discount thresholds must be strictly increasing (small < medium < large)" },
  );
export type VolumeDiscounts = z.infer<typeof VolumeDiscounts>;

/** Scenario body as persisted (the id is the record key). */
export const ScenarioDefinition = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  costs: ChannelCosts,
  carbon: CarbonFactors,
  discounts: VolumeDiscounts,
});
export type ScenarioDefinition = z.infer<typeof ScenarioDefinition>;

export const ScenarioId = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]*$/, "Scenario ids are lower-case letters, digits, '-' and '_'");

export const CostScenario = ScenarioDefinition.and(z.object({ id: ScenarioId }));
export type CostScenario = z.infer<typeof CostScenario>;

/** Persisted configuration file. */
export const CostConfigFile = z.object({
  currentScenario: ScenarioId,
  lastUpdated: z.string().optional(),
  scenarios: z.record(ScenarioId, ScenarioDefinition),
});
export type CostConfigFile = z.infer<typeof CostConfigFile>;

export const ChannelCostCalculation = z.object({
  channel: Channel,
  volume: z.number().int().nonnegative(),
  unitCost: z.number(),
  discountApplied: z.number(),
  discountedUnitCost: z.number(),
  totalCost: z.number(),
  /** Grams of CO2e. */
  totalCarbon: z.number(),
});
export type ChannelCostCalculation = z.infer<typeof ChannelCostCalculation>;

export const ChannelTotals = z.object({
  occurrences: z.number().int().nonnegative(),
  totalCost: z.number(),
  totalCarbon: z.number(),
});
export type ChannelTotals = z.infer<typeof ChannelTotals>;

/** Cost of one plan. */
export const CostSummary = z.object({
  scenarioId: z.string(),
  totalCost: z.number(),
  totalCarbon: z.number(),
  /** One calculation per step, at volume 1. */
  lines: z.array(ChannelCostCalculation),
  perChannel: z.record(Channel, ChannelTotals),
});
export type CostSummary = z.infer<typeof CostSummary>;

export const ApproachCost = z.object({
  description: z.string(),
  totalCost: z.number(),
  totalCarbon: z.number(),
  costPerCustomer: z.number(),
});
export type ApproachCost = z.infer<typeof ApproachCost>;

export const ChannelUsage = z.object({
  customers: z.number().int().nonnegative(),
  totalCost: z.number(),
});
export type ChannelUsage = z.infer<typeof ChannelUsage>;

/** Cost of a batch against the uniform-letter baseline. */
export const BatchCostSummary = z.object({
  scenarioId: z.string(),
  customers: z.number().int().nonnegative(),
  optimized: ApproachCost.extend({
    channelUsage: z.record(Channel, ChannelUsage),
  }),
  baseline: ApproachCost,
  savings: z.object({
    cost: z.number(),
    costPercentage: z.number(),
    carbon: z.number(),
    carbonPercentage: z.number(),
    breakEven: z.enum(["immediate", "not-achieved"]),
  }),
});
export type BatchCostSummary = z.infer<typeof BatchCostSummary>;
