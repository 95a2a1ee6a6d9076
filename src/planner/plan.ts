/**
 * Immutable plan helpers.
 *
 * Every helper returns a new plan value and leaves its input untouched.
 * Every helper that changes the timeline renumbers it, so step indices
 * always run 1..N in list order.
 */

import { isDeepStrictEqual } from "node:util";
import type {
  Channel,
  ChannelStep,
  CommunicationPlan,
  ContentAsset,
} from "../schemas/channel.js";

export type StepDraft = Omit<ChannelStep, "step" | "mandatory"> & { mandatory?: boolean };

/** Reassign step indices 1..N in list order. */
export function renumber(steps: readonly ChannelStep[]): ChannelStep[] {
  return steps.map((step, i) => (step.step === i + 1 ? { ...step } : { ...step, step: i + 1 }));
}

export function makeStep(draft: StepDraft): ChannelStep {
  return { ...draft, step: 1, mandatory: draft.mandatory ?? false };
}

export function hasChannel(plan: CommunicationPlan, channel: Channel): boolean {
  return plan.steps.some((s) => s.channel === channel);
}

/** True when some step's purpose mentions `word` (case-insensitive). */
export function hasPurpose(plan: CommunicationPlan, word: string): boolean {
  const needle = word.toLowerCase();
  return plan.steps.some((s) => s.purpose.toLowerCase().includes(needle));
}

export function withSteps(plan: CommunicationPlan, steps: readonly ChannelStep[]): CommunicationPlan {
  return { ...plan, steps: renumber(steps) };
}

/** Insert a step at `position` (clamped to the timeline). */
export function insertStep(
  plan: CommunicationPlan,
  position: number,
  draft: StepDraft,
): CommunicationPlan {
  const at = Math.max(0, Math.min(position, plan.steps.length));
  const steps = [...plan.steps];
  steps.splice(at, 0, makeStep(draft));
  return withSteps(plan, steps);
}

export function appendStep(plan: CommunicationPlan, draft: StepDraft): CommunicationPlan {
  return withSteps(plan, [...plan.steps, makeStep(draft)]);
}

export function removeChannel(plan: CommunicationPlan, channel: Channel): CommunicationPlan {
  return withSteps(
    plan,
    plan.steps.filter((s) => s.channel !== channel),
  );
}

export function setAsset(
  plan: CommunicationPlan,
  channel: Channel,
  asset: ContentAsset,
): CommunicationPlan {
  return { ...plan, assets: { ...plan.assets, [channel]: { ...asset } } };
}

export function removeAsset(plan: CommunicationPlan, channel: Channel): CommunicationPlan {
  if (!(channel in plan.assets)) return plan;
  const assets = { ...plan.assets };
  delete assets[channel];
  return { ...plan, assets };
}

/** Append a risk note unless an identical note is already logged. */
export function appendRisk(plan: CommunicationPlan, note: string): CommunicationPlan {
  if (plan.risks.includes(note)) return plan;
  return { ...plan, risks: [...plan.risks, note] };
}

/** Place an override note at the head of the risk log, once. */
export function leadRisk(plan: CommunicationPlan, note: string): CommunicationPlan {
  if (plan.risks.includes(note)) return plan;
  return { ...plan, risks: [note, ...plan.risks] };
}

export function plansEqual(a: CommunicationPlan, b: CommunicationPlan): boolean {
  return isDeepStrictEqual(a, b);
}

export function channelsOf(plan: CommunicationPlan): Channel[] {
  return plan.steps.map((s) => s.channel);
}
