import type { AuthzService } from "../auth/authz.js";
import type { CredentialStore } from "../balance/credentials.js";
import { logger } from "../logger.js";
import type { MonitorEngine } from "../monitor/engine.js";
import type { MonitorSettingsService } from "../monitor/settings.js";
import type { SubscriptionRegistry } from "../monitor/subscriptions.js";
import type { CheckOutcome } from "../monitor/types.js";
import { formatEvent, formatLowBalance, formatReading, formatStatus, HELP_TEXT } from "../notify/format.js";

const log = logger.child("commands");

export const MAX_INTERVAL_MINUTES = 7 * 24 * 60;

export interface CommandRequest {
  sessionId: string;
  userId: number | null;
  args: string;
}

export interface HandlerServices {
  engine: MonitorEngine;
  subscriptions: SubscriptionRegistry;
  settings: MonitorSettingsService;
  credentials: CredentialStore;
  authz: AuthzService;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

export const parseThreshold = (raw: string): Parsed<number> => {
  const text = raw.trim();
  const value = Number(text);
  if (!text || !Number.isFinite(value)) {
    return { ok: false, error: "Usage: /threshold <number>" };
  }
  if (value < 0) {
    return { ok: false, error: "⚠️ Threshold must be zero or greater." };
  }
  return { ok: true, value };
};

export const parseInterval = (raw: string): Parsed<number> => {
  const text = raw.trim();
  const value = Number(text);
  if (!text || !Number.isFinite(value)) {
    return { ok: false, error: "Usage: /interval <minutes>" };
  }
  if (!Number.isInteger(value) || value < 1 || value > MAX_INTERVAL_MINUTES) {
    return {
      ok: false,
      error: `⚠️ Interval must be a whole number between 1 and ${MAX_INTERVAL_MINUTES} minutes.`,
    };
  }
  return { ok: true, value };
};

export const parseToggle = (raw: string): boolean | null => {
  const text = raw.trim().toLowerCase();
  if (text === "on" || text === "enable") return true;
  if (text === "off" || text === "disable") return false;
  return null;
};

const describeFailure = (outcome: Exclude<CheckOutcome, { kind: "success" | "auth-refreshed" }>): string => {
  if (outcome.kind === "auth-expired") {
    return formatEvent({ type: "auth-failure", message: outcome.message });
  }
  switch (outcome.reason) {
    case "no-credentials":
      return formatEvent({ type: "no-credentials" });
    case "auth-refresh-failed":
      return formatEvent({ type: "auth-failure", message: outcome.message });
    case "remote":
      return formatEvent({ type: "remote-failure", message: outcome.message });
  }
};

export const createCommandHandlers = (services: HandlerServices) => {
  const { engine, subscriptions, settings, credentials, authz } = services;

  const adminOnly =
    (handler: (request: CommandRequest) => Promise<string>) =>
    async (request: CommandRequest): Promise<string> => {
      if (request.userId === null) {
        return "Could not identify the user.";
      }
      if (!(await authz.isAdmin(request.userId))) {
        log.warn("Rejected admin command", { userId: request.userId, sessionId: request.sessionId });
        return "⛔ Only admins can change monitor settings.";
      }
      return handler(request);
    };

  return {
    balance: async (_request: CommandRequest): Promise<string> => {
      const outcome = await engine.query();
      if (outcome.kind === "success" || outcome.kind === "auth-refreshed") {
        return formatReading(outcome.reading);
      }
      return describeFailure(outcome);
    },

    checkNow: async (_request: CommandRequest): Promise<string> => {
      const result = await engine.checkNow();
      if (!result.accepted) {
        return "⏳ A balance check is already in progress.";
      }
      const { outcome } = result;
      if (outcome.kind === "success" || outcome.kind === "auth-refreshed") {
        const { threshold } = await settings.getConfig();
        if (outcome.reading.balance < threshold) {
          return formatLowBalance(outcome.reading.balance, threshold, outcome.reading.updateTime);
        }
        return formatReading(outcome.reading);
      }
      return describeFailure(outcome);
    },

    subscribe: async (request: CommandRequest): Promise<string> => {
      const added = await subscriptions.subscribe(request.sessionId, request.userId);
      log.info("Subscribe requested", { sessionId: request.sessionId, added });
      return added ? "✅ Subscribed to balance alerts." : "✅ This chat is already subscribed.";
    },

    unsubscribe: async (request: CommandRequest): Promise<string> => {
      const removed = await subscriptions.unsubscribe(request.sessionId);
      log.info("Unsubscribe requested", { sessionId: request.sessionId, removed });
      return removed ? "✅ Unsubscribed from balance alerts." : "ℹ️ This chat is not subscribed.";
    },

    status: async (request: CommandRequest): Promise<string> => {
      const [config, state, subscribed, subscribers] = await Promise.all([
        settings.getConfig(),
        settings.getState(),
        subscriptions.isSubscribed(request.sessionId),
        subscriptions.list(),
      ]);
      return formatStatus({ config, state, subscribed, subscriberCount: subscribers.length });
    },

    threshold: adminOnly(async (request) => {
      const parsed = parseThreshold(request.args);
      if (!parsed.ok) return parsed.error;
      await settings.updateConfig({ threshold: parsed.value });
      log.info("Threshold updated", { threshold: parsed.value, userId: request.userId });
      return `✅ Threshold set to ${parsed.value.toFixed(2)}.`;
    }),

    interval: adminOnly(async (request) => {
      const parsed = parseInterval(request.args);
      if (!parsed.ok) return parsed.error;
      await settings.updateConfig({ intervalMinutes: parsed.value });
      log.info("Interval updated", { intervalMinutes: parsed.value, userId: request.userId });
      return `✅ Check interval set to ${parsed.value} min (applies from the next check).`;
    }),

    monitor: adminOnly(async (request) => {
      const enabled = parseToggle(request.args);
      if (enabled === null) return "Usage: /monitor on|off";
      await settings.updateConfig({ autoCheck: enabled });
      log.info("Auto check toggled", { autoCheck: enabled, userId: request.userId });
      return enabled ? "✅ Automatic checks enabled." : "✅ Automatic checks disabled.";
    }),

    autoRefresh: adminOnly(async (request) => {
      const enabled = parseToggle(request.args);
      if (enabled === null) return "Usage: /autorefresh on|off";
      await settings.updateConfig({ autoRefreshToken: enabled });
      log.info("Auto refresh toggled", { autoRefreshToken: enabled, userId: request.userId });
      return enabled ? "✅ Automatic token refresh enabled." : "✅ Automatic token refresh disabled.";
    }),

    setToken: adminOnly(async (request) => {
      const token = request.args.trim();
      if (!token || /\s/.test(token)) return "Usage: /settoken <token>";
      await credentials.replaceToken(token, "command");
      return "✅ Access token replaced.";
    }),

    reset: adminOnly(async (request) => {
      await settings.resetState();
      log.info("Monitor state reset", { userId: request.userId });
      return "✅ Last balance cleared. The next check sets a new baseline.";
    }),

    help: async (_request: CommandRequest): Promise<string> => HELP_TEXT,
  };
};

export type CommandHandlers = ReturnType<typeof createCommandHandlers>;
