import type { CredentialStore } from "../balance/credentials.js";
import type { TokenRefresher } from "../balance/refresher.js";
import type { BalanceGateway } from "../balance/types.js";
import { errorMessage, logger } from "../logger.js";
import type { Notifier } from "../notify/notifier.js";
import { runCycle } from "./cycle.js";
import type { MonitorSettingsService } from "./settings.js";
import type { SubscriptionRegistry } from "./subscriptions.js";
import type { CheckOutcome, CheckTrigger } from "./types.js";

const log = logger.child("engine");

export interface MonitorEngineDeps {
  settings: MonitorSettingsService;
  subscriptions: SubscriptionRegistry;
  credentials: CredentialStore;
  client: BalanceGateway;
  refresher: TokenRefresher;
  notifier: Notifier;
  now?: () => Date;
}

export type CheckNowResult = { accepted: true; outcome: CheckOutcome } | { accepted: false };

/**
 * Owns the single in-flight cycle. Scheduled ticks skip while a cycle runs,
 * `checkNow` is rejected as busy, and `query` waits for the running cycle.
 */
export class MonitorEngine {
  private inFlight: Promise<CheckOutcome> | null = null;

  constructor(private readonly deps: MonitorEngineDeps) {}

  isBusy(): boolean {
    return this.inFlight !== null;
  }

  async runScheduled(): Promise<CheckOutcome | null> {
    if (this.inFlight) {
      log.debug("Scheduled tick skipped, cycle already running");
      return null;
    }
    return this.start("scheduled");
  }

  async checkNow(): Promise<CheckNowResult> {
    if (this.inFlight) {
      return { accepted: false };
    }
    return { accepted: true, outcome: await this.start("manual") };
  }

  async query(): Promise<CheckOutcome> {
    if (this.inFlight) {
      log.debug("Query joined the running cycle");
      return this.inFlight;
    }
    return this.start("query");
  }

  private start(trigger: CheckTrigger): Promise<CheckOutcome> {
    const run = this.execute(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async execute(trigger: CheckTrigger): Promise<CheckOutcome> {
    const now = this.deps.now?.() ?? new Date();
    try {
      const [config, state] = await Promise.all([
        this.deps.settings.getConfig(),
        this.deps.settings.getState(),
      ]);
      const result = await runCycle(
        {
          credentials: this.deps.credentials,
          client: this.deps.client,
          refresher: this.deps.refresher,
        },
        { config, state, now },
      );

      if (result.state !== state) {
        await this.deps.settings.saveState(result.state);
      }

      const { outcome } = result;
      if ((outcome.kind === "success" || outcome.kind === "auth-refreshed") && outcome.event) {
        const recipients = await this.deps.subscriptions.list();
        await this.deps.notifier.notify(outcome.event, recipients);
      }

      this.logOutcome(trigger, outcome);
      return outcome;
    } catch (error) {
      const message = errorMessage(error);
      log.error("Monitor cycle crashed", { trigger, message });
      return { kind: "failure", reason: "remote", message };
    }
  }

  private logOutcome(trigger: CheckTrigger, outcome: CheckOutcome): void {
    switch (outcome.kind) {
      case "success":
      case "auth-refreshed":
        log.info("Monitor cycle finished", {
          trigger,
          kind: outcome.kind,
          balance: outcome.reading.balance,
          event: outcome.event?.type ?? null,
        });
        return;
      case "auth-expired":
        log.warn("Monitor cycle stopped on expired token", { trigger, message: outcome.message });
        return;
      case "failure":
        log.warn("Monitor cycle failed", { trigger, reason: outcome.reason, message: outcome.message });
        return;
    }
  }
}
