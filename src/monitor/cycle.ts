import type { CredentialStore } from "../balance/credentials.js";
import type { TokenRefresher } from "../balance/refresher.js";
import type { BalanceGateway, BalanceReading, BalanceResult } from "../balance/types.js";
import { logger } from "../logger.js";
import type { MonitorConfig, MonitorState } from "../store/types.js";
import { classifyTransition } from "./classify.js";
import type { CheckOutcome } from "./types.js";

const log = logger.child("cycle");

export interface CycleDeps {
  credentials: CredentialStore;
  client: BalanceGateway;
  refresher: TokenRefresher;
}

export interface CycleInput {
  config: MonitorConfig;
  state: MonitorState;
  now: Date;
}

export interface CycleResult {
  outcome: CheckOutcome;
  state: MonitorState;
}

type FetchStep =
  | { kind: "reading"; reading: BalanceReading; refreshed: boolean }
  | { kind: "done"; outcome: CheckOutcome };

const AUTH_HINT = "Automatic token refresh failed";

/**
 * Gets a reading, spending at most one login on the way. A missing token with
 * usable credentials logs in first; an expired token logs in and retries once.
 */
const fetchWithRefresh = async (deps: CycleDeps, config: MonitorConfig): Promise<FetchStep> => {
  const login = deps.credentials.getAccountCredentials();
  const canRefresh = config.autoRefreshToken && login !== null;
  let refreshed = false;

  const refreshToken = async (): Promise<string | null> => {
    const result = await deps.refresher.refresh(login?.account, login?.password);
    if (!result.ok) {
      log.warn("Token refresh failed, keeping previous token", { reason: result.reason });
      return null;
    }
    await deps.credentials.replaceToken(result.token, "refresh");
    return result.token;
  };

  let token = deps.credentials.getToken();
  if (!token) {
    if (!canRefresh) {
      return {
        kind: "done",
        outcome: { kind: "failure", reason: "no-credentials", message: "No token or login credentials configured" },
      };
    }
    refreshed = true;
    token = await refreshToken();
    if (!token) {
      return {
        kind: "done",
        outcome: { kind: "failure", reason: "auth-refresh-failed", message: AUTH_HINT },
      };
    }
  }

  let result: BalanceResult = await deps.client.fetchBalance(token);

  if (result.status === "auth-expired") {
    if (!config.autoRefreshToken) {
      return { kind: "done", outcome: { kind: "auth-expired", message: result.message } };
    }
    if (refreshed || !login) {
      return {
        kind: "done",
        outcome: { kind: "failure", reason: "auth-refresh-failed", message: result.message },
      };
    }
    refreshed = true;
    const fresh = await refreshToken();
    if (!fresh) {
      return {
        kind: "done",
        outcome: { kind: "failure", reason: "auth-refresh-failed", message: AUTH_HINT },
      };
    }
    result = await deps.client.fetchBalance(fresh);
    if (result.status === "auth-expired") {
      return {
        kind: "done",
        outcome: { kind: "failure", reason: "auth-refresh-failed", message: result.message },
      };
    }
  }

  if (result.status === "failure") {
    return { kind: "done", outcome: { kind: "failure", reason: "remote", message: result.message } };
  }

  return { kind: "reading", reading: result.reading, refreshed };
};

export const runCycle = async (deps: CycleDeps, input: CycleInput): Promise<CycleResult> => {
  const step = await fetchWithRefresh(deps, input.config);
  if (step.kind === "done") {
    return { outcome: step.outcome, state: input.state };
  }

  const { reading } = step;
  const event = classifyTransition(
    input.state.lastBalance,
    reading.balance,
    input.config.threshold,
    reading.updateTime,
  );
  const state: MonitorState = {
    lastBalance: reading.balance,
    lastCheckAt: input.now.toISOString(),
  };

  log.debug("Cycle classified", {
    previous: input.state.lastBalance,
    balance: reading.balance,
    event: event?.type ?? null,
  });

  return {
    outcome: step.refreshed
      ? { kind: "auth-refreshed", reading, event }
      : { kind: "success", reading, event },
    state,
  };
};
