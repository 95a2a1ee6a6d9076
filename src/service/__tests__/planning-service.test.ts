import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { PlanningService, planCommunication } from "../planning-service.js";
import type {
  ContentGenerator,
  CustomerCategorizer,
  LetterClassifier,
  VoiceSynthesizer,
} from "../interfaces.js";
import { EventLogger } from "../../events/logger.js";
import { PlannerMetrics } from "../../metrics/exporter.js";
import { channelsOf } from "../../planner/plan.js";
import { NEUTRAL_SUPPORT_MESSAGE } from "../../planner/assets.js";
import { VULNERABLE_PROTECTION_NOTE } from "../../rules/protection.js";
import {
  CollaboratorUnavailableError,
  InvalidInputError,
  UnknownScenarioError,
} from "../../errors.js";

describe("planCommunication", () => {
  it("builds, composes and optimises without side effects", () => {
    const outcome = planCommunication({
      customerId: "C-1",
      category: "low_digital",
      classification: "information",
      upsellEligible: false,
      upsellProducts: [],
    });
    expect(channelsOf(outcome.plan)).toEqual(["letter", "phone"]);
    expect(outcome.applied).toEqual(["low-digital-postal-first", "information-clarity"]);
    expect(outcome.trimmed).toBe(2);
    expect(outcome.plan.risks).toEqual([
      "COST OPTIMISATION: 2 channel(s) removed to meet the information cap of 2",
    ]);
  });
});

describe("PlanningService", () => {
  let tmpDir: string;
  let logger: EventLogger;
  let metrics: PlannerMetrics;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "chplan-service-"));
    logger = new EventLogger(join(tmpDir, "events"));
    metrics = new PlannerMetrics();
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  function service(deps: ConstructorParameters<typeof PlanningService>[0] = {}): PlanningService {
    return new PlanningService({ logger, metrics, ...deps }, { dataDir: tmpDir, actor: "test" });
  }

  describe("plan", () => {
    it("accepts categoriser and classifier labels", async () => {
      const result = await service().plan({
        customerId: "C-1",
        category: "Low/no-digital (offline-preferred)",
        classification: "INFORMATION",
      });

      expect(result.planId).toMatch(/^C-1-[0-9a-f]{8}$/);
      expect(result.plan.category).toBe("low_digital");
      expect(channelsOf(result.plan)).toEqual(["letter", "phone"]);
      expect(result.cost.scenarioId).toBe("realistic");
      expect(result.cost.totalCost).toBeCloseTo(1.46, 10);
      expect(result.media).toEqual([]);
    });

    it("logs applied rules, the optimisation and the plan", async () => {
      const result = await service().plan({
        customerId: "C-1",
        category: "low_digital",
        classification: "information",
      });

      const events = await logger.query({ planId: result.planId });
      expect(events.map((e) => [e.type, e.actor])).toEqual([
        ["rule.applied", "composer"],
        ["rule.applied", "composer"],
        ["plan.optimized", "optimizer"],
        ["plan.created", "test"],
      ]);
      expect(events[0]?.payload).toEqual({
        rule: "low-digital-postal-first",
        category: "low_digital",
        classification: "information",
      });
      expect(events[2]?.payload).toEqual({ trimmed: 2, classification: "information" });
      expect(events[3]?.payload).toMatchObject({
        customerId: "C-1",
        requestedClassification: "information",
        channels: ["letter", "phone"],
        scenarioId: "realistic",
      });
    });

    it("records metrics", async () => {
      await service().plan({ customerId: "C-1", category: "low_digital", classification: "information" });
      const output = await metrics.getMetrics();
      expect(output).toContain('chplan_plans_total{category="low_digital",classification="information"} 1');
      expect(output).toContain('chplan_rule_applications_total{rule="information-clarity"} 1');
      expect(output).toContain('chplan_channels_trimmed_total{classification="information"} 2');
    });

    it("reports a forced classification alongside the requested one", async () => {
      const result = await service().plan({
        customerId: "V-1",
        category: "vulnerable",
        classification: "promotional",
        upsellEligible: true,
        upsellProducts: ["Gold Card"],
      });
      expect(result.requestedClassification).toBe("promotional");
      expect(result.plan.classification).toBe("information");
      expect(result.plan.upsell.included).toBe(false);
    });

    it("costs against the requested scenario", async () => {
      const result = await service().plan(
        { customerId: "C-1", category: "low_digital", classification: "information" },
        { scenarioId: "conservative" },
      );
      expect(result.cost.scenarioId).toBe("conservative");
      expect(result.cost.totalCost).toBeCloseTo(2.65, 10);

      await expect(
        service().plan(
          { customerId: "C-1", category: "low_digital", classification: "information" },
          { scenarioId: "missing" },
        ),
      ).rejects.toThrow(UnknownScenarioError);
    });

    it("rejects an invalid request before planning and logs it", async () => {
      await expect(
        service().plan({ customerId: "C-1", category: "unknown", classification: "information" }),
      ).rejects.toThrow(InvalidInputError);

      const events = await logger.query();
      expect(events.map((e) => e.type)).toEqual(["plan.rejected"]);
      expect(String(events[0]?.payload["reason"])).toMatch(/^Invalid plan request: category: /);
    });

    it("writes events under the data directory by default", async () => {
      const standalone = new PlanningService({}, { dataDir: tmpDir });
      await standalone.plan({ customerId: "C-1", category: "low_digital", classification: "information" });
      const events = await new EventLogger(join(tmpDir, "events")).query({ type: "plan.created" });
      expect(events.map((e) => e.actor)).toEqual(["planner"]);
    });
  });

  describe("collaborators", () => {
    it("merges generated content for the final channels only", async () => {
      const generate = vi.fn<ContentGenerator["generate"]>().mockResolvedValue({
        in_app: { body: "Your statement is ready" },
        email: { subject: "Statement", body: "<p>Ready</p>" },
        sms: { body: "not on the plan" },
      });
      const result = await service({ contentGenerator: { generate } }).plan({
        customerId: "D-1",
        category: "digital_first",
        classification: "information",
      });

      expect(channelsOf(result.plan)).toEqual(["in_app", "email"]);
      expect(generate).toHaveBeenCalledTimes(1);
      expect(generate.mock.calls[0]?.[0]).toMatchObject({
        channels: ["in_app", "email"],
        classification: "information",
      });
      expect(result.plan.assets.in_app).toEqual({ body: "Your statement is ready" });
      expect(result.plan.assets.email).toEqual({ subject: "Statement", body: "<p>Ready</p>" });
      expect(result.plan.assets.sms).toBeUndefined();
    });

    it("rejects generated content that does not validate", async () => {
      const contentGenerator: ContentGenerator = {
        generate: () => Promise.resolve(JSON.parse('{"email":{"subject":"Statement"}}')),
      };
      await expect(
        service({ contentGenerator }).plan({
          customerId: "D-1",
          category: "digital_first",
          classification: "information",
        }),
      ).rejects.toThrow("Invalid generated content: email.body: Required");
    });

    it("protects vulnerable customers from generated sales text", async () => {
      const contentGenerator: ContentGenerator = {
        generate: () => Promise.resolve({ letter: { body: "Upgrade today for exclusive rates" } }),
      };
      const result = await service({ contentGenerator }).plan({
        customerId: "V-1",
        category: "vulnerable",
        classification: "information",
      });

      expect(channelsOf(result.plan)).toEqual(["letter", "phone"]);
      expect(result.plan.assets.letter?.body).toBe(NEUTRAL_SUPPORT_MESSAGE);
      expect(result.plan.risks).toEqual([
        VULNERABLE_PROTECTION_NOTE,
        "COST OPTIMISATION: 2 channel(s) removed to meet the information cap of 2",
      ]);
      expect(result.applied).toEqual([
        "vulnerable-callback-support",
        "information-clarity",
        "vulnerable-protection",
        "vulnerable-protection",
      ]);
    });

    it("synthesises audio for spoken channels", async () => {
      const synthesize = vi.fn<VoiceSynthesizer["synthesize"]>(async (request) => ({
        channel: request.channel,
        location: `media/${request.planId}/${request.channel}.mp3`,
      }));
      const result = await service({ voiceSynthesizer: { synthesize } }).plan({
        customerId: "A-1",
        category: "accessibility",
        classification: "promotional",
      });

      expect(channelsOf(result.plan)).toEqual(["letter", "braille", "audio", "phone"]);
      expect(synthesize).toHaveBeenCalledWith({
        planId: result.planId,
        channel: "audio",
        text: "PROMOTIONAL audio script",
      });
      expect(result.media).toEqual([{ channel: "audio", location: `media/${result.planId}/audio.mp3` }]);
    });
  });

  describe("planBatch", () => {
    it("plans and costs every customer against one scenario", async () => {
      const batch = await service().planBatch(
        [
          { customerId: "A", category: "low_digital" },
          { customerId: "B", category: "Digital-first self-serve", upsellEligible: false },
        ],
        "information",
      );

      expect(batch.scenarioId).toBe("realistic");
      expect(batch.results.map((r) => channelsOf(r.plan))).toEqual([
        ["letter", "phone"],
        ["in_app", "email"],
      ]);
      expect(batch.cost.optimized.totalCost).toBeCloseTo(1.488, 10);
      expect(batch.cost.baseline.totalCost).toBeCloseTo(2.92, 10);
      expect(batch.cost.savings.cost).toBeCloseTo(1.432, 10);
      expect(batch.summary.categoryDistribution).toEqual({ low_digital: 1, digital_first: 1 });
      expect(batch.recommendations[0]).toBe("Limited savings of 49%. Review customer segmentation strategy.");

      const events = await logger.query();
      expect(events[0]?.type).toBe("batch.started");
      expect(events[0]?.payload).toMatchObject({ batchId: batch.batchId, customers: 2 });
      expect(events.at(-1)?.type).toBe("batch.completed");
      expect(await metrics.getMetrics()).toMatch(/chplan_batch_savings_ratio 0\.49/);
    });

    it("returns zero totals and no recommendations for an empty batch", async () => {
      const batch = await service().planBatch([], "regulatory");
      expect(batch.results).toEqual([]);
      expect(batch.cost.optimized.totalCost).toBe(0);
      expect(batch.cost.savings.costPercentage).toBe(0);
      expect(batch.summary.mostPopularChannel).toBeNull();
      expect(batch.recommendations).toEqual([]);
    });

    it("plans nothing when any customer is invalid", async () => {
      await expect(
        service().planBatch(
          [
            { customerId: "A", category: "low_digital" },
            { customerId: "B", category: "not-a-category" },
          ],
          "information",
        ),
      ).rejects.toThrow("Invalid customer at index 1: 1.category:");

      const events = await logger.query();
      expect(events.map((e) => e.type)).toEqual(["plan.rejected"]);
    });
  });

  describe("planLetter", () => {
    const classifier: LetterClassifier = {
      classify: () => Promise.resolve({ classification: "regulatory" }),
    };
    const categorizer: CustomerCategorizer = {
      categorize: (record) =>
        Promise.resolve({
          customerId: String(record["id"]),
          category: "low_digital",
          upsellEligible: false,
          upsellProducts: [],
          financialIndicators: {},
        }),
    };

    it("classifies the letter and categorises each record", async () => {
      const batch = await service({ classifier, categorizer }).planLetter("Changes to your terms", [
        { id: 1 },
        { id: 2 },
      ]);
      expect(batch.classification).toBe("regulatory");
      expect(batch.results.map((r) => r.plan.customerId)).toEqual(["1", "2"]);
      const first = batch.results[0];
      expect(first && channelsOf(first.plan)).toEqual(["letter", "phone"]);
    });

    it("fails without the collaborators", async () => {
      await expect(service({ categorizer }).planLetter("text", [])).rejects.toThrow(
        CollaboratorUnavailableError,
      );
      await expect(service({ classifier }).planLetter("text", [])).rejects.toThrow(
        "No customer categorizer configured",
      );
    });
  });
});
