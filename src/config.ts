import path from "node:path";

import dotenv from "dotenv";

import type { MonitorConfig } from "./store/types.js";

dotenv.config();

type Env = Record<string, string | undefined>;

const required = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) throw new Error(`Missing required env var: ${key}`);
  return value;
};

const optional = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const parseIdList = (value: string): number[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => Number(item))
    .filter((item) => Number.isFinite(item));

const parseNumber = (env: Env, key: string, fallback: number): number => {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number`);
  }
  return value;
};

const parseBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = optional(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new Error(`${key} must be true or false`);
};

export interface BalanceCredentialsConfig {
  token?: string;
  account?: string;
  password?: string;
}

export interface AppConfig {
  botToken: string;
  admins: number[];
  dataDir: string;
  transport: "polling" | "webhook";
  balanceApiUrl: string;
  balanceTimeoutMs: number;
  credentials: BalanceCredentialsConfig;
  monitorDefaults: MonitorConfig;
}

export const loadConfig = (env: Env = process.env): AppConfig => {
  const botToken = required(env, "BOT_TOKEN");
  const admins = parseIdList(required(env, "ADMIN_USER_IDS"));
  if (admins.length === 0) {
    throw new Error("ADMIN_USER_IDS must contain at least one numeric user id");
  }

  const transport = env.BOT_TRANSPORT ?? "polling";
  if (transport !== "polling" && transport !== "webhook") {
    throw new Error("BOT_TRANSPORT must be polling or webhook");
  }

  const balanceApiUrl = required(env, "BALANCE_API_URL");
  try {
    new URL(balanceApiUrl);
  } catch {
    throw new Error("BALANCE_API_URL must be an absolute URL");
  }

  const threshold = parseNumber(env, "DEFAULT_THRESHOLD", 30);
  if (threshold < 0) {
    throw new Error("DEFAULT_THRESHOLD must be >= 0");
  }
  const intervalMinutes = parseNumber(env, "DEFAULT_INTERVAL_MINUTES", 60);
  if (!Number.isInteger(intervalMinutes) || intervalMinutes < 1) {
    throw new Error("DEFAULT_INTERVAL_MINUTES must be a positive integer");
  }
  const balanceTimeoutMs = parseNumber(env, "BALANCE_TIMEOUT_MS", 15000);
  if (balanceTimeoutMs < 1000) {
    throw new Error("BALANCE_TIMEOUT_MS must be >= 1000");
  }

  return {
    botToken,
    admins,
    dataDir: path.resolve(env.DATA_DIR ?? "./data"),
    transport,
    balanceApiUrl,
    balanceTimeoutMs,
    credentials: {
      token: optional(env, "ELECTRICITY_TOKEN"),
      account: optional(env, "ELECTRICITY_ACCOUNT"),
      password: optional(env, "ELECTRICITY_PASSWORD"),
    },
    monitorDefaults: {
      threshold,
      intervalMinutes,
      autoCheck: parseBoolean(env, "AUTO_CHECK", true),
      autoRefreshToken: parseBoolean(env, "AUTO_REFRESH_TOKEN", true),
    },
  };
};

/** Only long polling is wired up; a webhook deployment is refused before anything starts. */
export const ensurePollingTransport = (config: Pick<AppConfig, "transport">): void => {
  if (config.transport !== "polling") {
    throw new Error("Webhook mode is not implemented");
  }
};
