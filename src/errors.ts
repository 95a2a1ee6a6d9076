/**
 * Error types for the planner.
 *
 * All failures are local to the call that raised them and are not retried.
 */

import type { ZodIssue } from "zod";

/**
 * Thrown when a cost is requested for a channel the catalogue does not know.
 */
export class UnknownChannelError extends Error {
  readonly channel: string;

  constructor(channel: string) {
    super(`Unknown channel: ${channel}`);
    this.name = "UnknownChannelError";
    this.channel = channel;
  }
}

/**
 * Thrown when a scenario id is not registered. The current scenario is left
 * unchanged.
 */
export class UnknownScenarioError extends Error {
  readonly scenarioId: string;

  constructor(scenarioId: string, known: readonly string[] = []) {
    const hint = known.length > 0 ? `. Known scenarios: ${known.join(", ")}` : "";
    super(`Scenario '${scenarioId}' not found${hint}`);
    this.name = "UnknownScenarioError";
    this.scenarioId = scenarioId;
  }
}

/**
 * Thrown when input is rejected before the pipeline starts.
 */
export class InvalidInputError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

/** Render zod issues as `path: message` lines. */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Thrown when an operation needs an external collaborator (categoriser,
 * classifier) the service was not given.
 */
export class CollaboratorUnavailableError extends Error {
  readonly collaborator: string;

  constructor(collaborator: string) {
    super(`No ${collaborator} configured`);
    this.name = "CollaboratorUnavailableError";
    this.collaborator = collaborator;
  }
}
