/**
 * Event log schema: JSONL event stream for audit and metrics.
 *
 * Every plan produced or rejected, every rule that changed a plan, every
 * batch run and every scenario change is recorded as an event.
 */

import { z } from "zod";

/** Event types: exhaustive list of observable actions. */
export const EventType = z.enum([
  // Plans
  "plan.created",
  "plan.rejected",
  "plan.optimized",

  // Rules
  "rule.applied",

  // Batches
  "batch.started",
  "batch.completed",

  // Scenarios
  "scenario.switched",
  "scenario.defined",
  "scenario.updated",
  "scenario.removed",
]);
export type EventType = z.infer<typeof EventType>;

/** Base event structure. */
export const BaseEvent = z.object({
  /** Monotonic event ID (set by event logger). */
  eventId: z.number().int().positive(),
  /** Event type. */
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Component or user that caused this event. */
  actor: z.string(),
  /** Plan id (customer id) for plan-related events. */
  planId: z.string().optional(),
  /** Event-specific payload. */
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;

/** Payload of a `rule.applied` event. */
export const RuleAppliedPayload = z.object({
  rule: z.string(),
  category: z.string(),
  classification: z.string(),
});
export type RuleAppliedPayload = z.infer<typeof RuleAppliedPayload>;

/** Payload of a `scenario.switched` event. */
export const ScenarioSwitchPayload = z.object({
  from: z.string(),
  to: z.string(),
});
export type ScenarioSwitchPayload = z.infer<typeof ScenarioSwitchPayload>;
