import type { BalanceReading } from "../balance/types.js";
import type { MonitorEvent } from "../monitor/types.js";
import type { MonitorConfig, MonitorState } from "../store/types.js";

export type NotifyEvent =
  | MonitorEvent
  | { type: "auth-failure"; message: string }
  | { type: "no-credentials" }
  | { type: "remote-failure"; message: string };

const money = (value: number): string => value.toFixed(2);

const updatedLine = (updateTime: string | null): string[] =>
  updateTime ? [`• 🕒 Updated: ${updateTime}`] : [];

export const formatLowBalance = (balance: number, threshold: number, updateTime: string | null): string =>
  [
    "⚠️ Low balance alert",
    `• 💰 Balance: ${money(balance)}`,
    `• 📉 Threshold: ${money(threshold)}`,
    ...updatedLine(updateTime),
  ].join("\n");

export const formatEvent = (event: NotifyEvent): string => {
  switch (event.type) {
    case "low-balance":
      return formatLowBalance(event.balance, event.threshold, event.updateTime);
    case "recharge":
      return [
        "🔔 Balance recharged",
        `• 💰 Balance: ${money(event.balance)}`,
        `• ➕ Added: ${money(event.delta)}`,
        ...updatedLine(event.updateTime),
      ].join("\n");
    case "auth-failure":
      return [
        "⚠️ Authentication with the balance service failed",
        `• 💬 ${event.message}`,
        "Check ELECTRICITY_ACCOUNT / ELECTRICITY_PASSWORD or set a fresh token with /settoken <token>.",
      ].join("\n");
    case "no-credentials":
      return "⚠️ No balance credentials configured. Set ELECTRICITY_TOKEN or ELECTRICITY_ACCOUNT / ELECTRICITY_PASSWORD, or use /settoken <token>.";
    case "remote-failure":
      return "⚠️ Balance check failed. Please try again later.";
  }
};

export const formatReading = (reading: BalanceReading): string =>
  [
    "🔍 Balance",
    `• 🏠 Room: ${reading.roomName}`,
    `• 💰 Balance: ${money(reading.balance)}`,
    ...(reading.price !== null ? [`• ⚡ Price: ${reading.price}/kWh`] : []),
    `• 📶 Online: ${reading.online ? "yes" : "no"}`,
    ...updatedLine(reading.updateTime),
  ].join("\n");

export interface StatusView {
  config: MonitorConfig;
  state: MonitorState;
  subscribed: boolean;
  subscriberCount: number;
}

export const formatStatus = ({ config, state, subscribed, subscriberCount }: StatusView): string =>
  [
    "📊 Monitor status",
    `• ✅ Auto check: ${config.autoCheck ? "on" : "off"}`,
    `• 🔑 Auto token refresh: ${config.autoRefreshToken ? "on" : "off"}`,
    `• ⏱️ Interval: ${config.intervalMinutes} min`,
    `• 📉 Threshold: ${money(config.threshold)}`,
    `• 💰 Last balance: ${state.lastBalance === null ? "n/a" : money(state.lastBalance)}`,
    `• 🕒 Last check: ${state.lastCheckAt ?? "never"}`,
    `• 🔔 This chat: ${subscribed ? "subscribed" : "not subscribed"}`,
    `• 👥 Subscribers: ${subscriberCount}`,
  ].join("\n");

export const HELP_TEXT = [
  "Commands:",
  "/balance - query the current balance",
  "/subscribe - receive alerts in this chat",
  "/unsubscribe - stop alerts in this chat",
  "/status - monitor settings and last reading",
  "/checknow - run a check immediately",
  "/threshold <number> - set the low-balance threshold (admin)",
  "/interval <minutes> - set the check interval (admin)",
  "/monitor on|off - toggle automatic checks (admin)",
  "/autorefresh on|off - toggle automatic token refresh (admin)",
  "/settoken <token> - replace the access token (admin)",
  "/reset - forget the last balance (admin)",
  "/help - this message",
].join("\n");
