/**
 * Channel, segment and plan schemas.
 *
 * A communication plan is the ordered channel timeline chosen for one
 * (customer, letter) pair, together with the content assets for those
 * channels, the upsell decision and the risk/override log. Plans are
 * plain serialisable records; every pipeline stage returns a new one.
 */

import { z } from "zod";

/** Delivery mechanisms known to the catalogue. */
export const Channel = z.enum([
  "letter",
  "email",
  "sms",
  "in_app",
  "voice_note",
  "phone",
  "braille",
  "audio",
]);
export type Channel = z.infer<typeof Channel>;

/** Customer segment, as assigned by the upstream categoriser. */
export const CustomerCategory = z.enum([
  "digital_first",
  "assisted_digital",
  "low_digital",
  "accessibility",
  "vulnerable",
]);
export type CustomerCategory = z.infer<typeof CustomerCategory>;

/** Message type, as assigned by the upstream letter classifier. */
export const MessageClassification = z.enum([
  "regulatory",
  "promotional",
  "information",
]);
export type MessageClassification = z.infer<typeof MessageClassification>;

export const Tone = z.enum(["formal", "engaging", "clear"]);
export type Tone = z.infer<typeof Tone>;

/** One entry of the channel timeline. */
export const ChannelStep = z.object({
  /** 1-based position; always equals the index in the list plus one. */
  step: z.number().int().positive(),
  channel: Channel,
  /** Timing offset relative to dispatch ("immediate", "+1 hour", ...). */
  when: z.string().min(1),
  purpose: z.string(),
  rationale: z.string(),
  /** Required by the message classification. */
  mandatory: z.boolean().default(false),
  /** Set when the step was inserted to satisfy a compliance rule. */
  compliance: z.string().optional(),
  /** Set when the step survived cost optimisation. */
  optimization: z.string().optional(),
});
export type ChannelStep = z.infer<typeof ChannelStep>;

/** Content for one channel. Subjects only apply to email. */
export const ContentAsset = z.object({
  subject: z.string().optional(),
  body: z.string(),
});
export type ContentAsset = z.infer<typeof ContentAsset>;

export const ContentAssets = z.record(Channel, ContentAsset);
export type ContentAssets = z.infer<typeof ContentAssets>;

export const UpsellDecision = z.object({
  included: z.boolean(),
  product: z.string().nullable(),
  message: z.string().nullable(),
  reasoning: z.string(),
});
export type UpsellDecision = z.infer<typeof UpsellDecision>;

export const CommunicationPlan = z.object({
  customerId: z.string().min(1),
  category: CustomerCategory,
  /** Effective classification (promotional can be forced to information). */
  classification: MessageClassification,
  steps: z.array(ChannelStep),
  assets: ContentAssets,
  upsell: UpsellDecision,
  /** Risk/override annotations. Entries are never removed or rewritten. */
  risks: z.array(z.string()),
  /** Names of the rules that changed the plan, in application order. */
  appliedRules: z.array(z.string()),
});
export type CommunicationPlan = z.infer<typeof CommunicationPlan>;
