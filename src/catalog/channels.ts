/**
 * Channel catalogue: the fixed strategy tables the planner works from.
 *
 * Category strategies (default channels, channel cap, priority ranking),
 * classification rules (mandatory channels, channel cap, tone), channel
 * timing, and the durable-medium policy per category.
 */

import type {
  Channel,
  CustomerCategory,
  MessageClassification,
  Tone,
} from "../schemas/channel.js";
import { CATEGORY_LABELS } from "../schemas/customer.js";

export interface CategoryStrategy {
  /** Default channels, in the order the builder appends them. */
  channels: readonly Channel[];
  /** Strategy label. */
  strategy: "digital_first" | "guided_digital" | "traditional" | "accessible" | "supportive";
  maxChannels: number;
  /** Total order used by the optimiser; channels not listed rank last. */
  priority: readonly Channel[];
}

export interface ClassificationRule {
  mandatoryChannels: readonly Channel[];
  maxChannels: number;
  tone: Tone;
}

export interface DurableMediumPolicy {
  channels: ReadonlySet<Channel>;
  preferred: Channel;
}

export const CATEGORY_STRATEGIES: Readonly<Record<CustomerCategory, CategoryStrategy>> = {
  digital_first: {
    channels: ["in_app", "email", "voice_note"],
    strategy: "digital_first",
    maxChannels: 3,
    priority: ["in_app", "email", "voice_note", "sms", "letter"],
  },
  assisted_digital: {
    channels: ["email", "sms", "phone"],
    strategy: "guided_digital",
    maxChannels: 3,
    priority: ["email", "in_app", "sms", "letter", "phone"],
  },
  low_digital: {
    channels: ["letter", "phone"],
    strategy: "traditional",
    maxChannels: 2,
    priority: ["letter", "phone", "email", "in_app", "sms"],
  },
  accessibility: {
    channels: ["letter", "braille", "audio", "phone"],
    strategy: "accessible",
    maxChannels: 4,
    priority: ["email", "in_app", "sms", "letter", "phone"],
  },
  vulnerable: {
    channels: ["letter", "phone"],
    strategy: "supportive",
    maxChannels: 2,
    priority: ["letter", "phone", "email", "sms", "in_app"],
  },
};

export const CLASSIFICATION_RULES: Readonly<Record<MessageClassification, ClassificationRule>> = {
  regulatory: { mandatoryChannels: ["letter"], maxChannels: 2, tone: "formal" },
  promotional: { mandatoryChannels: [], maxChannels: 4, tone: "engaging" },
  information: { mandatoryChannels: [], maxChannels: 2, tone: "clear" },
};

const DIGITAL_DURABLE: DurableMediumPolicy = {
  channels: new Set<Channel>(["email", "in_app", "letter"]),
  preferred: "email",
};

const POSTAL_DURABLE: DurableMediumPolicy = {
  channels: new Set<Channel>(["letter"]),
  preferred: "letter",
};

/**
 * Durable media per category. Email and in-app only qualify for the
 * digitally capable categories; a letter always qualifies.
 */
export const DURABLE_MEDIA: Readonly<Record<CustomerCategory, DurableMediumPolicy>> = {
  digital_first: DIGITAL_DURABLE,
  assisted_digital: DIGITAL_DURABLE,
  low_digital: POSTAL_DURABLE,
  accessibility: POSTAL_DURABLE,
  vulnerable: POSTAL_DURABLE,
};

export const CHANNEL_TIMING: Readonly<Record<Channel, string>> = {
  in_app: "immediate",
  email: "immediate",
  letter: "immediate",
  voice_note: "immediate",
  sms: "+1 hour",
  phone: "+1 day",
  braille: "+1 day",
  audio: "+1 day",
};

/** Channels delivered electronically (used for the digital share of a batch). */
export const DIGITAL_CHANNELS: ReadonlySet<Channel> = new Set<Channel>([
  "email",
  "in_app",
  "sms",
  "voice_note",
]);

/** Channels delivered by post or in person. */
export const TRADITIONAL_CHANNELS: ReadonlySet<Channel> = new Set<Channel>(["letter", "phone"]);

export function isDurableFor(category: CustomerCategory, channel: Channel): boolean {
  return DURABLE_MEDIA[category].channels.has(channel);
}

/** Position of a channel in the category ranking; unlisted channels rank last. */
export function priorityRank(category: CustomerCategory, channel: Channel): number {
  const priority = CATEGORY_STRATEGIES[category].priority;
  const index = priority.indexOf(channel);
  return index === -1 ? priority.length : index;
}

/** Channel budget for a fresh plan: the tighter of the two caps. */
export function channelBudget(
  category: CustomerCategory,
  classification: MessageClassification,
): number {
  return Math.min(
    CLASSIFICATION_RULES[classification].maxChannels,
    CATEGORY_STRATEGIES[category].maxChannels,
  );
}

const CLASSIFICATION_LABEL: Record<MessageClassification, string> = {
  regulatory: "REGULATORY",
  promotional: "PROMOTIONAL",
  information: "INFORMATION",
};

export function classificationLabel(classification: MessageClassification): string {
  return CLASSIFICATION_LABEL[classification];
}

/** Purpose line for a step, templated from the classification. */
export function channelPurpose(channel: Channel, classification: MessageClassification): string {
  const label = CLASSIFICATION_LABEL[classification];
  switch (channel) {
    case "in_app":
      return `${label} notification for digital-first experience`;
    case "email":
      return `${label} communication with full details`;
    case "sms":
      return `Quick ${label} alert and summary`;
    case "letter":
      return `Formal ${label} documentation`;
    case "phone":
      return `Personal support call for ${label} matter`;
    case "voice_note":
      return `Audio version for convenient ${label} access`;
    case "braille":
      return `Accessible ${label} format`;
    case "audio":
      return `Audio ${label} communication`;
  }
}

/** Rationale line for a step, templated from the category. */
export function channelRationale(channel: Channel, category: CustomerCategory): string {
  const label = CATEGORY_LABELS[category];
  switch (channel) {
    case "in_app":
      return `${label} customers prefer app-based communication`;
    case "email":
      return `Suitable for ${label} customers with digital capability`;
    case "sms":
      return `Quick reach for ${label} customers`;
    case "letter":
      return `Preferred method for ${label} customers`;
    case "phone":
      return `${label} customers benefit from personal contact`;
    case "voice_note":
      return `Audio convenience for ${label} customers`;
    case "braille":
      return `Accessibility requirement for ${label} customers`;
    case "audio":
      return `Alternative format for ${label} customers`;
  }
}
