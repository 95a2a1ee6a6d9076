/**
 * Channel planner: public API.
 */

export * from "./schemas/index.js";
export * from "./errors.js";

export {
  CATEGORY_STRATEGIES,
  CLASSIFICATION_RULES,
  DURABLE_MEDIA,
  CHANNEL_TIMING,
  channelBudget,
  isDurableFor,
  priorityRank,
} from "./catalog/channels.js";
export type { CategoryStrategy, ClassificationRule, DurableMediumPolicy } from "./catalog/channels.js";
export { calculateChannelCost, discountRate, unitCarbon, unitCost } from "./catalog/cost-model.js";

export {
  BUILT_IN_SCENARIOS,
  BUILT_IN_SCENARIO_IDS,
  DEFAULT_SCENARIO_ID,
  defaultScenario,
} from "./config/defaults.js";
export type { ScenarioSource } from "./config/defaults.js";
export { ScenarioStore } from "./config/scenario-store.js";
export type { ScenarioListing, ScenarioStoreOptions, ScenarioValueChange } from "./config/scenario-store.js";

export { buildPlan, buildTimeline, decideUpsell } from "./planner/builder.js";
export { composeRules } from "./rules/composer.js";
export type { CompositionResult } from "./rules/composer.js";
export type { PlanRule, RuleContext } from "./rules/types.js";
export { enforceRegulatoryCompliance, enforceVulnerableProtection } from "./rules/protection.js";
export { optimizePlan } from "./optimizer/optimizer.js";
export { aggregateCosts, evaluateBatch, evaluatePlan } from "./costing/evaluator.js";
export { recommendBatch, summarizeBatch } from "./costing/summary.js";
export type { BatchSummary } from "./costing/summary.js";

export { EventLogger } from "./events/logger.js";
export type { EventCallback, EventLoggerOptions, EventQuery } from "./events/logger.js";
export { PlannerMetrics } from "./metrics/exporter.js";

export { PlanningService, planCommunication } from "./service/planning-service.js";
export type {
  BatchResult,
  PipelineOutcome,
  PlanOptions,
  PlanResult,
  PlanningServiceConfig,
  PlanningServiceDependencies,
} from "./service/planning-service.js";
export type * from "./service/interfaces.js";
