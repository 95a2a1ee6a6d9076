/**
 * Planner event logger: append-only JSONL event log.
 *
 * Writes one JSON object per line to events/YYYY-MM-DD.jsonl.
 * Uses the BaseEvent schema from schemas/event.ts.
 */

import { appendFile, mkdir, symlink, unlink, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import {
  BaseEvent,
  type EventType,
  type RuleAppliedPayload,
  type ScenarioSwitchPayload,
} from "../schemas/event.js";

export type EventCallback = (event: BaseEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
}

export interface EventQuery {
  type?: EventType;
  planId?: string;
  actor?: string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function parseEventLine(line: string): BaseEvent | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = BaseEvent.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
  }

  get directory(): string {
    return this.eventsDir;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    actor: string,
    opts?: {
      planId?: string;
      payload?: Record<string, unknown>;
    },
  ): Promise<BaseEvent> {
    this.eventCounter += 1;

    const event: BaseEvent = {
      eventId: this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      actor,
      planId: opts?.planId,
      payload: opts?.payload ?? {},
    };

    const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
    const filePath = join(this.eventsDir, `${date}.jsonl`);

    await mkdir(this.eventsDir, { recursive: true });
    await appendFile(filePath, JSON.stringify(event) + "\n", "utf-8");

    await this.updateSymlink(date);

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Point events.jsonl at the current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, "events.jsonl");

    try {
      await unlink(symlinkPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
    }

    try {
      // Relative target, so the directory can be moved
      await symlink(`${date}.jsonl`, symlinkPath);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[EventLogger] Failed to update symlink: ${message}`);
    }
  }

  /** Log a finished plan. */
  async logPlan(
    planId: string,
    actor: string,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.log("plan.created", actor, { planId, payload });
  }

  /** Log a request rejected before the pipeline started. */
  async logRejected(
    actor: string,
    reason: string,
    planId?: string,
  ): Promise<void> {
    await this.log("plan.rejected", actor, { planId, payload: { reason } });
  }

  /** Log a rule that changed a plan. */
  async logRule(planId: string, payload: RuleAppliedPayload): Promise<void> {
    await this.log("rule.applied", "composer", { planId, payload });
  }

  /** Log batch boundaries. */
  async logBatch(
    type: "batch.started" | "batch.completed",
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.log(type, "planner", { payload });
  }

  /** Log a change of the current scenario. */
  async logScenarioSwitch(actor: string, payload: ScenarioSwitchPayload): Promise<void> {
    await this.log("scenario.switched", actor, { payload });
  }

  /** Log scenario definition changes. */
  async logScenario(
    type: "scenario.defined" | "scenario.updated" | "scenario.removed",
    actor: string,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.log(type, actor, { payload });
  }

  /**
   * Query events from the log.
   *
   * Reads all JSONL files in the events directory and filters by criteria.
   * Malformed lines are skipped.
   */
  async query(filter?: EventQuery): Promise<BaseEvent[]> {
    let files: string[];
    try {
      files = await readdir(this.eventsDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw err;
    }
    const jsonlFiles = files.filter((f) => f.endsWith(".jsonl") && f !== "events.jsonl").sort();

    const events: BaseEvent[] = [];

    for (const file of jsonlFiles) {
      const content = await readFile(join(this.eventsDir, file), "utf-8");
      const lines = content.trim().split("\n").filter((line) => line.length > 0);

      for (const line of lines) {
        const event = parseEventLine(line);
        if (!event) continue;

        if (filter?.type && event.type !== filter.type) continue;
        if (filter?.planId && event.planId !== filter.planId) continue;
        if (filter?.actor && event.actor !== filter.actor) continue;

        events.push(event);
      }
    }

    return events;
  }
}
