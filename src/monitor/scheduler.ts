import { errorMessage, logger } from "../logger.js";
import type { MonitorEngine } from "./engine.js";
import type { MonitorSettingsService } from "./settings.js";
import type { SubscriptionRegistry } from "./subscriptions.js";

const log = logger.child("scheduler");

const MINUTE_MS = 60_000;

/**
 * Delay before the first tick after a restart: whatever is left of the
 * interval since the last successful check, or zero when none is pending.
 */
export const initialDelayMs = (
  intervalMinutes: number,
  lastCheckAt: string | null,
  now: Date,
): number => {
  if (!lastCheckAt) return 0;
  const last = Date.parse(lastCheckAt);
  if (!Number.isFinite(last)) return 0;
  const elapsed = now.getTime() - last;
  if (elapsed < 0) return 0;
  return Math.max(0, intervalMinutes * MINUTE_MS - elapsed);
};

export interface MonitorSchedulerDeps {
  engine: Pick<MonitorEngine, "runScheduled">;
  settings: Pick<MonitorSettingsService, "getConfig" | "getState">;
  subscriptions: Pick<SubscriptionRegistry, "list">;
  now?: () => Date;
}

export class MonitorScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(private readonly deps: MonitorSchedulerDeps) {}

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const [config, state] = await Promise.all([
      this.deps.settings.getConfig(),
      this.deps.settings.getState(),
    ]);
    const delay = initialDelayMs(config.intervalMinutes, state.lastCheckAt, this.now());
    log.info("Scheduler started", { intervalMinutes: config.intervalMinutes, firstTickInMs: delay });
    this.schedule(delay);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log.info("Scheduler stopped");
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let intervalMinutes: number | null = null;
    try {
      const config = await this.deps.settings.getConfig();
      intervalMinutes = config.intervalMinutes;
      if (!config.autoCheck) {
        log.debug("Auto check disabled, tick skipped");
        return;
      }
      const subscribers = await this.deps.subscriptions.list();
      if (subscribers.length === 0) {
        log.debug("No subscribers, tick skipped");
        return;
      }
      await this.deps.engine.runScheduled();
    } catch (error) {
      log.error("Scheduler tick failed", { message: errorMessage(error) });
    } finally {
      await this.scheduleNext(intervalMinutes);
    }
  }

  private async scheduleNext(knownInterval: number | null): Promise<void> {
    let intervalMinutes = knownInterval;
    try {
      intervalMinutes = (await this.deps.settings.getConfig()).intervalMinutes;
    } catch (error) {
      log.warn("Could not read interval, reusing previous value", { message: errorMessage(error) });
    }
    this.schedule((intervalMinutes ?? 60) * MINUTE_MS);
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }
}
