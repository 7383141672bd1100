import { schedule, validate } from "node-cron";
import type { ScheduledTask } from "node-cron";
import { ConfigError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("scheduler");

export type ScheduledJob = () => Promise<void>;
export type RunTrigger = "scheduled" | "startup";

let scheduledTask: ScheduledTask | null = null;
let activeRun: Promise<void> | null = null;

/**
 * Run `job` unless a previous run is still going. Returns false when the
 * trigger was dropped. Failures are logged; the schedule keeps running.
 */
export async function triggerRun(job: ScheduledJob, trigger: RunTrigger): Promise<boolean> {
  if (activeRun) {
    log.warn("Run already in progress — skipping trigger", { trigger });
    return false;
  }

  log.info("Triggering run", { trigger });
  activeRun = (async () => {
    try {
      await job();
    } catch (error) {
      log.error("Scheduled run failed", { trigger, error });
    }
  })();

  try {
    await activeRun;
  } finally {
    activeRun = null;
  }
  return true;
}

export function isRunInProgress(): boolean {
  return activeRun !== null;
}

/** Replace any existing schedule with `cronExpression` in `timezone`. */
export function startScheduler(cronExpression: string, timezone: string, job: ScheduledJob): void {
  stopScheduler();

  if (!validate(cronExpression)) {
    log.error("Invalid cron expression", { cronExpression });
    throw new ConfigError([`SCHEDULE_CRON: invalid cron expression "${cronExpression}"`]);
  }

  scheduledTask = schedule(
    cronExpression,
    async () => {
      await triggerRun(job, "scheduled");
    },
    { timezone }
  );
  log.info("Run scheduled", { cronExpression, timezone });
}

export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    log.info("Schedule stopped");
  }
}
