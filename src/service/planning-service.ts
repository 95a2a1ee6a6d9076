/**
 * Planning service: runs the planning pipeline for one customer or a batch
 * and records what happened.
 *
 *   validate → build → compose → optimise → content → evaluate
 *
 * The pipeline itself (`planCommunication`) is pure. The service adds the
 * collaborators (content generation, voice synthesis), the event log,
 * metrics, and the scenario snapshot each evaluation is costed against.
 */

import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { ZodIssue } from "zod";
import {
  ContentAssets,
  type Channel,
  type CommunicationPlan,
  type MessageClassification,
} from "../schemas/channel.js";
import { CategorizedCustomer, PlanRequest } from "../schemas/customer.js";
import type { BatchCostSummary, CostScenario, CostSummary } from "../schemas/cost.js";
import { buildPlan } from "../planner/builder.js";
import { channelsOf, plansEqual } from "../planner/plan.js";
import { VULNERABLE_PROTECTION_RULE, composeRules } from "../rules/composer.js";
import { enforceVulnerableProtection } from "../rules/protection.js";
import { optimizePlan } from "../optimizer/optimizer.js";
import { aggregateCosts, evaluatePlan } from "../costing/evaluator.js";
import { recommendBatch, summarizeBatch, type BatchSummary } from "../costing/summary.js";
import { EventLogger } from "../events/logger.js";
import type { PlannerMetrics } from "../metrics/exporter.js";
import { BUILT_IN_SCENARIOS, type ScenarioSource } from "../config/defaults.js";
import {
  CollaboratorUnavailableError,
  InvalidInputError,
  formatIssues,
} from "../errors.js";
import type {
  ContentGenerator,
  CustomerCategorizer,
  CustomerRecord,
  LetterClassifier,
  SynthesizedMedia,
  VoiceSynthesizer,
} from "./interfaces.js";

export interface PlanningServiceConfig {
  /** Root data directory; events go to `<dataDir>/events`. */
  dataDir: string;
  /** Actor recorded on plan and rejection events (default: "planner"). */
  actor?: string;
}

export interface PlanningServiceDependencies {
  logger?: EventLogger;
  metrics?: PlannerMetrics;
  scenarios?: ScenarioSource;
  contentGenerator?: ContentGenerator;
  voiceSynthesizer?: VoiceSynthesizer;
  categorizer?: CustomerCategorizer;
  classifier?: LetterClassifier;
}

export interface PipelineOutcome {
  plan: CommunicationPlan;
  requestedClassification: MessageClassification;
  /** Rules that changed the plan, in application order. */
  applied: string[];
  /** Steps removed by the optimiser. */
  trimmed: number;
}

export interface PlanResult extends PipelineOutcome {
  planId: string;
  cost: CostSummary;
  media: SynthesizedMedia[];
}

export interface BatchResult {
  batchId: string;
  scenarioId: string;
  classification: MessageClassification;
  results: PlanResult[];
  cost: BatchCostSummary;
  summary: BatchSummary;
  recommendations: string[];
}

export interface PlanOptions {
  /** Scenario to cost against; defaults to the current scenario. */
  scenarioId?: string;
}

/**
 * Build, compose and optimise one plan. No I/O.
 */
export function planCommunication(request: PlanRequest): PipelineOutcome {
  const built = buildPlan(request);
  const composed = composeRules(built, {
    category: request.category,
    classification: request.classification,
  });
  const optimized = optimizePlan(composed.plan, composed.classification, request.category);

  return {
    plan: optimized,
    requestedClassification: request.classification,
    applied: composed.applied,
    trimmed: composed.plan.steps.length - optimized.steps.length,
  };
}

function spoken(channel: Channel): channel is "voice_note" | "audio" {
  return channel === "voice_note" || channel === "audio";
}

function rejection(subject: string, issues: ZodIssue[]): InvalidInputError {
  return new InvalidInputError(`Invalid ${subject}: ${formatIssues(issues)}`, issues);
}

export class PlanningService {
  private readonly logger: EventLogger;
  private readonly metrics?: PlannerMetrics;
  private readonly scenarios: ScenarioSource;
  private readonly contentGenerator?: ContentGenerator;
  private readonly voiceSynthesizer?: VoiceSynthesizer;
  private readonly categorizer?: CustomerCategorizer;
  private readonly classifier?: LetterClassifier;
  private readonly actor: string;

  constructor(deps: PlanningServiceDependencies, config: PlanningServiceConfig) {
    this.logger = deps.logger ?? new EventLogger(join(config.dataDir, "events"));
    this.metrics = deps.metrics;
    this.scenarios = deps.scenarios ?? BUILT_IN_SCENARIOS;
    this.contentGenerator = deps.contentGenerator;
    this.voiceSynthesizer = deps.voiceSynthesizer;
    this.categorizer = deps.categorizer;
    this.classifier = deps.classifier;
    this.actor = config.actor ?? "planner";
  }

  /**
   * Plan one (customer, letter) pair.
   *
   * @throws InvalidInputError before the pipeline starts if the request
   *   does not validate
   */
  async plan(input: unknown, options?: PlanOptions): Promise<PlanResult> {
    const request = await this.validate(input);
    const scenario = this.snapshot(options);
    return this.run(request, scenario);
  }

  /**
   * Plan a batch of categorised customers for one letter classification.
   * Every plan is costed against a single scenario snapshot taken before
   * the first plan is built. An empty batch yields zero-valued totals.
   *
   * @throws InvalidInputError if any customer does not validate; nothing
   *   is planned in that case
   */
  async planBatch(
    customers: readonly unknown[],
    classification: MessageClassification,
    options?: PlanOptions,
  ): Promise<BatchResult> {
    const requests: PlanRequest[] = [];
    for (const [index, customer] of customers.entries()) {
      const parsed = CategorizedCustomer.safeParse(customer);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => ({ ...issue, path: [index, ...issue.path] }));
        const error = rejection(`customer at index ${index}`, issues);
        await this.logger.logRejected(this.actor, error.message);
        throw error;
      }
      requests.push({
        customerId: parsed.data.customerId,
        category: parsed.data.category,
        classification,
        upsellEligible: parsed.data.upsellEligible,
        upsellProducts: parsed.data.upsellProducts,
      });
    }

    const scenario = this.snapshot(options);
    const batchId = randomUUID();
    await this.logger.logBatch("batch.started", {
      batchId,
      customers: requests.length,
      classification,
      scenarioId: scenario.id,
    });

    const results: PlanResult[] = [];
    for (const request of requests) {
      results.push(await this.run(request, scenario));
    }

    const cost = aggregateCosts(results.map((r) => r.cost), scenario);
    const summary = summarizeBatch(results.map((r) => r.plan));
    const recommendations = recommendBatch(cost, summary);

    if (results.length > 0) {
      this.metrics?.recordBatchSavings(cost.savings.costPercentage);
    }
    await this.logger.logBatch("batch.completed", {
      batchId,
      customers: results.length,
      scenarioId: scenario.id,
      totalCost: cost.optimized.totalCost,
      baselineCost: cost.baseline.totalCost,
      savingsPercentage: cost.savings.costPercentage,
    });

    return {
      batchId,
      scenarioId: scenario.id,
      classification,
      results,
      cost,
      summary,
      recommendations,
    };
  }

  /**
   * Classify a letter and categorise raw customer records with the
   * configured collaborators, then plan the batch.
   *
   * @throws CollaboratorUnavailableError without a classifier or categoriser
   */
  async planLetter(
    letterText: string,
    records: readonly CustomerRecord[],
    options?: PlanOptions,
  ): Promise<BatchResult> {
    if (!this.classifier) throw new CollaboratorUnavailableError("letter classifier");
    if (!this.categorizer) throw new CollaboratorUnavailableError("customer categorizer");

    const { classification } = await this.classifier.classify(letterText);
    const customers: CategorizedCustomer[] = [];
    for (const record of records) {
      customers.push(await this.categorizer.categorize(record));
    }
    return this.planBatch(customers, classification, options);
  }

  private snapshot(options?: PlanOptions): CostScenario {
    return options?.scenarioId !== undefined
      ? this.scenarios.get(options.scenarioId)
      : this.scenarios.current();
  }

  private async validate(input: unknown): Promise<PlanRequest> {
    const parsed = PlanRequest.safeParse(input);
    if (parsed.success) return parsed.data;

    const error = rejection("plan request", parsed.error.issues);
    await this.logger.logRejected(this.actor, error.message);
    throw error;
  }

  private async run(request: PlanRequest, scenario: CostScenario): Promise<PlanResult> {
    const planId = `${request.customerId}-${randomUUID().slice(0, 8)}`;
    const outcome = planCommunication(request);
    const plan = await this.withContent(outcome.plan, request);
    const applied = plan.appliedRules;
    const media = await this.synthesize(planId, plan);
    const cost = evaluatePlan(plan, scenario);

    for (const rule of applied) {
      await this.logger.logRule(planId, {
        rule,
        category: plan.category,
        classification: plan.classification,
      });
    }
    if (outcome.trimmed > 0) {
      await this.logger.log("plan.optimized", "optimizer", {
        planId,
        payload: { trimmed: outcome.trimmed, classification: plan.classification },
      });
    }
    await this.logger.logPlan(planId, this.actor, {
      customerId: plan.customerId,
      category: plan.category,
      classification: plan.classification,
      requestedClassification: outcome.requestedClassification,
      channels: channelsOf(plan),
      scenarioId: scenario.id,
      totalCost: cost.totalCost,
    });

    this.metrics?.recordPlan(plan.category, plan.classification, cost.totalCost);
    this.metrics?.recordRules(applied);
    this.metrics?.recordTrimmed(plan.classification, outcome.trimmed);

    return { ...outcome, plan, applied, planId, cost, media };
  }

  /**
   * Merge generated content over the drafts for the plan's final channels.
   * Vulnerable customers are protected again afterwards, since generated
   * text is not trusted to be free of sales content.
   */
  private async withContent(plan: CommunicationPlan, request: PlanRequest): Promise<CommunicationPlan> {
    if (!this.contentGenerator) return plan;

    const channels = channelsOf(plan);
    const generated = ContentAssets.safeParse(
      await this.contentGenerator.generate({
        channels,
        customer: request,
        classification: plan.classification,
        upsell: plan.upsell,
      }),
    );
    if (!generated.success) {
      throw rejection("generated content", generated.error.issues);
    }

    const assets = { ...plan.assets };
    for (const channel of channels) {
      const asset = generated.data[channel];
      if (asset) assets[channel] = asset;
    }
    const merged: CommunicationPlan = { ...plan, assets };
    if (plan.category !== "vulnerable") return merged;

    const protectedPlan = enforceVulnerableProtection(merged);
    if (plansEqual(merged, protectedPlan)) return merged;
    return {
      ...protectedPlan,
      appliedRules: [...protectedPlan.appliedRules, VULNERABLE_PROTECTION_RULE.name],
    };
  }

  private async synthesize(planId: string, plan: CommunicationPlan): Promise<SynthesizedMedia[]> {
    if (!this.voiceSynthesizer) return [];

    const media: SynthesizedMedia[] = [];
    for (const { channel } of plan.steps) {
      if (!spoken(channel)) continue;
      const text = plan.assets[channel]?.body;
      if (!text) continue;
      media.push(await this.voiceSynthesizer.synthesize({ planId, channel, text }));
    }
    return media;
  }
}
