import cron, { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { Config } from "./config";
import { RunAlreadyInProgress } from "./errors";
import type { RunCoordinator } from "./pipeline";

/** "02:00" -> "0 2 * * *" */
export function scheduleTimeToCron(time: string): string {
  const m = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  if (!m) throw new Error(`Invalid schedule time "${time}", expected HH:MM`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) throw new Error(`Invalid schedule time "${time}", expected HH:MM`);
  return `${minute} ${hour} * * *`;
}

/** One scheduled tick. Never throws: the cron loop has nobody to report to but the log. */
export async function runScheduledCycleCount(coordinator: RunCoordinator, log: Logger): Promise<void> {
  try {
    const res = await coordinator.run({ trigger: "scheduled" });
    log.info({ runId: res.runId, ordersCreated: res.ordersCreated, outcome: res.outcome }, "[CRON] cycle count done");
  } catch (e) {
    if (e instanceof RunAlreadyInProgress) {
      log.info("[CRON] skipped: a run is already in progress");
      return;
    }
    log.error({ err: e }, "[CRON] cycle count failed");
  }
}

export function startScheduler(
  coordinator: RunCoordinator,
  cfg: Pick<Config, "cronExpr" | "scheduleTime" | "timezone">,
  log: Logger
): ScheduledTask {
  const expr = cfg.cronExpr ?? scheduleTimeToCron(cfg.scheduleTime);
  if (!cron.validate(expr)) throw new Error(`Invalid cron expression "${expr}"`);

  const task = cron.schedule(expr, () => runScheduledCycleCount(coordinator, log), {
    timezone: cfg.timezone,
  });
  log.info({ cron: expr, timezone: cfg.timezone ?? "local" }, "[CRON] daily cycle count scheduled");
  return task;
}
