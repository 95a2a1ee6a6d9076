/**
 * Helpers shared by the CLI commands: root directory, store wiring, output
 * formatting and error reporting.
 */

import { join, resolve } from "node:path";
import { homedir } from "node:os";
import type { Command } from "commander";
import { EventLogger } from "../events/logger.js";
import { ScenarioStore } from "../config/scenario-store.js";
import type { PlanResult } from "../service/planning-service.js";
import {
  CollaboratorUnavailableError,
  InvalidInputError,
  UnknownChannelError,
  UnknownScenarioError,
} from "../errors.js";

export const DEFAULT_ROOT = process.env["CHPLAN_ROOT"] ?? resolve(homedir(), ".chplan");

export const COST_CONFIG_FILE = "cost-config.yaml";

export function rootDir(program: Command): string {
  const root: unknown = program.opts()["root"];
  return typeof root === "string" ? root : DEFAULT_ROOT;
}

export function eventLogger(root: string): EventLogger {
  return new EventLogger(join(root, "events"));
}

export async function openStore(root: string, logger: EventLogger): Promise<ScenarioStore> {
  return ScenarioStore.open(join(root, COST_CONFIG_FILE), { logger, actor: "cli" });
}

export function money(value: number): string {
  return value.toFixed(4);
}

export function grams(value: number): string {
  return `${value.toFixed(2)} g`;
}

/** Human-readable lines for one plan. */
export function formatPlan(result: PlanResult): string[] {
  const { plan, cost } = result;
  const forced =
    result.requestedClassification !== plan.classification
      ? ` (requested ${result.requestedClassification})`
      : "";

  const lines = [
    `Plan ${result.planId} for ${plan.customerId}`,
    `Category: ${plan.category} | Classification: ${plan.classification}${forced}`,
    "Steps:",
    ...plan.steps.map(
      (s) => `  ${s.step}. ${s.channel} @ ${s.when}${s.mandatory ? " [mandatory]" : ""} - ${s.purpose}`,
    ),
    `Upsell: ${plan.upsell.included && plan.upsell.product ? plan.upsell.product : "none"} (${plan.upsell.reasoning})`,
  ];

  if (plan.risks.length > 0) {
    lines.push("Risks:", ...plan.risks.map((r) => `  - ${r}`));
  }
  lines.push(`Rules applied: ${result.applied.length > 0 ? result.applied.join(", ") : "none"}`);
  lines.push(`Cost: ${money(cost.totalCost)} (${cost.scenarioId}) | Carbon: ${grams(cost.totalCarbon)}`);
  return lines;
}

/**
 * Print an expected failure as a ❌ line and set a failing exit code.
 * Anything else is rethrown.
 */
export function reportError(err: unknown): void {
  if (
    err instanceof InvalidInputError ||
    err instanceof UnknownScenarioError ||
    err instanceof UnknownChannelError ||
    err instanceof CollaboratorUnavailableError
  ) {
    console.log(`❌ ${err.message}`);
    process.exitCode = 1;
    return;
  }
  throw err;
}
