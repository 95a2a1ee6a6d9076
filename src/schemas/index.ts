/**
 * Schema barrel export: all Zod schemas for the planner.
 */

export {
  Channel,
  CustomerCategory,
  MessageClassification,
  Tone,
  ChannelStep,
  ContentAsset,
  ContentAssets,
  UpsellDecision,
  CommunicationPlan,
} from "./channel.js";

export {
  CATEGORY_LABELS,
  CategoryInput,
  ClassificationInput,
  CategorizedCustomer,
  LetterClassification,
  PlanRequest,
} from "./customer.js";

export {
  ChannelCosts,
  CarbonFactors,
  VolumeDiscounts,
  ScenarioDefinition,
  ScenarioId,
  CostScenario,
  CostConfigFile,
  ChannelCostCalculation,
  ChannelTotals,
  CostSummary,
  ApproachCost,
  ChannelUsage,
  BatchCostSummary,
} from "./cost.js";

export {
  EventType,
  BaseEvent,
  RuleAppliedPayload,
  ScenarioSwitchPayload,
} from "./event.js";

export type { PlanRequestInput } from "./customer.js";
