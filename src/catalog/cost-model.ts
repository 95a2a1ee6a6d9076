/**
 * Cost model: unit cost, volume discount and carbon per channel.
 *
 * Every calculation reads only the scenario value it is given, so a
 * calculation never changes after the current scenario is switched.
 */

import { Channel } from "../schemas/channel.js";
import type {
  ChannelCostCalculation,
  ChannelCosts,
  CarbonFactors,
  CostScenario,
  VolumeDiscounts,
} from "../schemas/cost.js";
import { InvalidInputError, UnknownChannelError } from "../errors.js";

/** Channel whose cost figures a channel is billed against. */
type CostBasis = "letter" | "email" | "sms" | "in_app" | "voice_note" | "none";

const COST_BASIS: Readonly<Record<Channel, CostBasis>> = {
  letter: "letter",
  email: "email",
  sms: "sms",
  in_app: "in_app",
  voice_note: "voice_note",
  braille: "letter",
  audio: "voice_note",
  phone: "none",
};

function staffShare(minutes: number, costs: ChannelCosts): number {
  return (minutes / 60) * costs.staffHourlyRate;
}

function basisUnitCost(basis: CostBasis, costs: ChannelCosts): number {
  switch (basis) {
    case "letter":
      return costs.letterPostage + costs.letterPrinting + costs.letterEnvelope + costs.letterStaffTime;
    case "email":
      return costs.email + staffShare(costs.emailStaffMinutes, costs);
    case "sms":
      return costs.sms + staffShare(costs.smsStaffMinutes, costs);
    case "in_app":
      return costs.inApp;
    case "voice_note":
      return costs.voiceNote;
    case "none":
      return 0;
  }
}

function basisCarbon(basis: CostBasis, carbon: CarbonFactors): number {
  switch (basis) {
    case "letter":
      return carbon.letter;
    case "email":
      return carbon.email;
    case "sms":
      return carbon.sms;
    case "in_app":
      return carbon.inApp;
    case "voice_note":
      return carbon.voiceNote;
    case "none":
      return 0;
  }
}

/** Resolve a channel id, failing with UnknownChannelError. */
export function resolveChannel(channel: string): Channel {
  const parsed = Channel.safeParse(channel);
  if (!parsed.success) {
    throw new UnknownChannelError(channel);
  }
  return parsed.data;
}

/** Undiscounted cost of one item on a channel. */
export function unitCost(channel: string, scenario: CostScenario): number {
  return basisUnitCost(COST_BASIS[resolveChannel(channel)], scenario.costs);
}

/** Grams of CO2e for one item on a channel. */
export function unitCarbon(channel: string, scenario: CostScenario): number {
  return basisCarbon(COST_BASIS[resolveChannel(channel)], scenario.carbon);
}

/**
 * Discount rate for a volume: the rate of the highest threshold met or
 * exceeded, 0 below the smallest threshold.
 */
export function discountRate(volume: number, discounts: VolumeDiscounts): number {
  if (volume >= discounts.largeThreshold) return discounts.largeRate;
  if (volume >= discounts.mediumThreshold) return discounts.mediumRate;
  if (volume >= discounts.smallThreshold) return discounts.smallRate;
  return 0;
}

/**
 * Cost and carbon of sending `volume` items on a channel.
 *
 * @throws UnknownChannelError for a channel the catalogue does not know
 * @throws InvalidInputError for a negative or fractional volume
 */
export function calculateChannelCost(
  channel: string,
  volume: number,
  scenario: CostScenario,
): ChannelCostCalculation {
  const resolved = resolveChannel(channel);
  if (!Number.isInteger(volume) || volume < 0) {
    throw new InvalidInputError(`Volume must be a non-negative integer, got ${volume}`);
  }

  const basis = COST_BASIS[resolved];
  const base = basisUnitCost(basis, scenario.costs);
  const discount = discountRate(volume, scenario.discounts);
  const discounted = base * (1 - discount);

  return {
    channel: resolved,
    volume,
    unitCost: base,
    discountApplied: discount,
    discountedUnitCost: discounted,
    totalCost: discounted * volume,
    totalCarbon: basisCarbon(basis, scenario.carbon) * volume,
  };
}
