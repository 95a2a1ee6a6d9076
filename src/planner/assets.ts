/**
 * Draft content assets and the fixed content patterns the rules check for.
 *
 * Wording is owned by the external content generator; drafts only mark
 * which channels need content until the generator fills them in.
 */

import type {
  Channel,
  ChannelStep,
  ContentAssets,
  CustomerCategory,
  MessageClassification,
  UpsellDecision,
} from "../schemas/channel.js";
import { classificationLabel } from "../catalog/channels.js";

/** Promotional keywords and offer markup stripped for vulnerable customers. */
export const PROMOTIONAL_PATTERN =
  /\b(offers?|upgrade|exclusive|premium|limited[- ]time|special deal)\b|💎|<div[^>]*class=["'][^"']*promo/i;

export const NEUTRAL_SUPPORT_MESSAGE =
  "We're here to help with your banking needs. Contact us for support.";

export const NEUTRAL_SUPPORT_SUBJECT = "Support with your account";

export const SMS_MAX_LENGTH = 160;

export const COACHING_PHONE_SCRIPT =
  "Hi [Name], this is [Agent] from [Bank]. We noticed you received our recent communication. " +
  "I'm calling to see if you'd like help setting up online banking or our mobile app. " +
  "It can make managing your accounts much more convenient. " +
  "Would you have 10 minutes for me to walk you through it?";

export const SUPPORTIVE_PHONE_SCRIPT =
  "Hello [Name], this is [Agent] from [Bank]. " +
  "We wanted to make sure you received and understood our recent communication. " +
  "Is there anything we can help explain or any questions you might have? " +
  "We're here to support you, and there's no rush. " +
  "Would you prefer to discuss this now or schedule a callback at a more convenient time?";

export const LETTER_ONLINE_HELP =
  "For your convenience, you can also view this information online or via our mobile app. " +
  "Call us at [PHONE] if you'd like help getting started.";

export function isPromotional(text: string | undefined): boolean {
  return text !== undefined && PROMOTIONAL_PATTERN.test(text);
}

/** Placeholder asset for one channel; phone calls carry a script set by rules. */
export function draftFor(channel: Channel, classification: MessageClassification): ContentAssets[Channel] {
  const label = classificationLabel(classification);
  switch (channel) {
    case "email":
      return { subject: "Your account information", body: `<p>${label} email content</p>` };
    case "sms":
      return { body: `${label} SMS content (max ${SMS_MAX_LENGTH} chars)` };
    case "letter":
      return { body: `${label} letter content` };
    case "in_app":
      return { body: `${label} in-app notification content` };
    case "voice_note":
      return { body: `${label} voice note script` };
    case "braille":
      return { body: `${label} braille format content` };
    case "audio":
      return { body: `${label} audio script` };
    case "phone":
      return undefined;
  }
}

/**
 * Placeholder assets for every channel on the timeline. When the upsell is
 * included the in-app draft carries the offer line.
 */
export function draftAssets(
  steps: readonly ChannelStep[],
  classification: MessageClassification,
  upsell: UpsellDecision,
): ContentAssets {
  const assets: ContentAssets = {};
  for (const { channel } of steps) {
    const draft = draftFor(channel, classification);
    if (draft) assets[channel] = draft;
  }

  const inApp = assets.in_app;
  if (inApp && upsell.included && upsell.message) {
    assets.in_app = { ...inApp, body: `${inApp.body}\n\n${upsell.message}` };
  }

  return assets;
}

/** Category default product when the categoriser suggests none. */
export function defaultUpsellProduct(category: CustomerCategory): { product: string; message: string } {
  if (category === "digital_first" || category === "assisted_digital") {
    return {
      product: "Premium Digital Banking",
      message: "Upgrade to Premium Digital Banking for enhanced features",
    };
  }
  return {
    product: "Premium Account",
    message: "Consider our Premium Account for additional benefits",
  };
}
