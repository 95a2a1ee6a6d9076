/**
 * External collaborators the planning service consumes.
 *
 * Implementations (AI categorisation, content generation, voice synthesis)
 * live outside this package; the planner decides which channels need
 * content, never the wording.
 */

import type {
  Channel,
  ContentAssets,
  MessageClassification,
  UpsellDecision,
} from "../schemas/channel.js";
import type {
  CategorizedCustomer,
  LetterClassification,
  PlanRequest,
} from "../schemas/customer.js";

/** Raw customer record as uploaded; shape is owned by the categoriser. */
export type CustomerRecord = Record<string, unknown>;

export interface CustomerCategorizer {
  categorize(customer: CustomerRecord): Promise<CategorizedCustomer>;
}

export interface LetterClassifier {
  classify(letterText: string): Promise<LetterClassification>;
}

export interface ContentRequest {
  /** Final channels of the plan, in timeline order. */
  channels: Channel[];
  customer: PlanRequest;
  classification: MessageClassification;
  upsell: UpsellDecision;
}

export interface ContentGenerator {
  /** Assets for any subset of the requested channels. */
  generate(request: ContentRequest): Promise<ContentAssets>;
}

export interface SynthesisRequest {
  planId: string;
  channel: Extract<Channel, "voice_note" | "audio">;
  text: string;
}

export interface SynthesizedMedia {
  channel: Extract<Channel, "voice_note" | "audio">;
  /** Handle returned by the synthesiser (file path or URL). */
  location: string;
}

export interface VoiceSynthesizer {
  synthesize(request: SynthesisRequest): Promise<SynthesizedMedia>;
}
