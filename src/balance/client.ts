import { logger } from "../logger.js";
import type { BalanceGateway, BalanceReading, BalanceResult, TokenGateway } from "./types.js";

const log = logger.child("balance");

const TOKEN_COOKIE = "AppUserToken";

const LOGIN_EXPIRED_KEYWORDS = [
  "登录过期",
  "登录已过期",
  "请登录",
  "请先登录",
  "未登录",
  "账号过期",
  "token过期",
  "Token过期",
];

export interface BalanceClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export class BalanceApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BalanceApiError";
  }
}

export class BalanceHttpError extends BalanceApiError {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "BalanceHttpError";
  }
}

export class BalanceAuthError extends BalanceApiError {
  constructor(message: string) {
    super(message);
    this.name = "BalanceAuthError";
  }
}

export const looksLikeLoginExpired = (message: string): boolean =>
  LOGIN_EXPIRED_KEYWORDS.some((keyword) => message.includes(keyword));

export const extractCookieValue = (setCookie: string | null, name: string): string | null => {
  if (!setCookie) return null;
  const match = new RegExp(`(?:^|[;,]\\s*)${name}=([^;,]*)`).exec(setCookie);
  const value = match?.[1]?.trim();
  return value ? value : null;
};

type PortalDevice = {
  DeviceType?: unknown;
  DeviceName?: unknown;
  DeviceBalance?: unknown;
  DevicePrice?: unknown;
  UpdateTime?: unknown;
  IsOnline?: unknown;
  SwitchStatus?: unknown;
};

type PortalEnvelope = {
  Tag?: unknown;
  Message?: unknown;
  Data?: unknown;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === "object" && !Array.isArray(value);

const toOptionalNumber = (value: unknown): number | null => {
  if (value === null || value === undefined || value === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const toOptionalString = (value: unknown): string | null =>
  typeof value === "string" && value.trim() ? value.trim() : null;

const portalMessage = (envelope: PortalEnvelope): string =>
  typeof envelope.Message === "string" && envelope.Message ? envelope.Message : "unknown error";

/**
 * Picks the electricity meter out of a `GetUserBindDevices` payload.
 * Throws {@link BalanceAuthError} when the portal says the session is gone.
 */
export const parseBalancePayload = (payload: unknown): BalanceReading => {
  if (!isObject(payload)) {
    throw new BalanceApiError("Balance service returned a non-object payload");
  }
  const envelope: PortalEnvelope = payload;
  if (envelope.Tag !== 1) {
    const message = portalMessage(envelope);
    if (looksLikeLoginExpired(message)) {
      throw new BalanceAuthError(message);
    }
    throw new BalanceApiError(`Balance service error: ${message}`);
  }

  const data: Record<string, unknown> = isObject(envelope.Data) ? envelope.Data : {};
  const devices = Array.isArray(data.DevicesList) ? data.DevicesList.filter(isObject) : [];
  if (devices.length === 0) {
    throw new BalanceApiError("No bound devices found");
  }

  const meter: PortalDevice | undefined = devices.find((device) => device.DeviceType === 1);
  if (!meter) {
    throw new BalanceApiError("No electricity meter device found");
  }

  const balance = toOptionalNumber(meter.DeviceBalance);
  if (balance === null) {
    throw new BalanceApiError("Meter balance is missing or not numeric");
  }

  return {
    balance,
    roomName: toOptionalString(data.RoomName) ?? "unknown",
    deviceName: toOptionalString(meter.DeviceName),
    price: toOptionalNumber(meter.DevicePrice),
    updateTime: toOptionalString(meter.UpdateTime),
    online: meter.IsOnline === 1,
    switchOn: meter.SwitchStatus === 1,
  };
};

interface PortalResponse {
  payload: unknown;
  headers: Headers;
}

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BalanceApiError(`Balance service invalid JSON: ${message}`);
  }
};

export class BalanceClient implements BalanceGateway, TokenGateway {
  constructor(private readonly options: BalanceClientOptions) {}

  async fetchBalance(token: string): Promise<BalanceResult> {
    log.debug("Fetching balance");
    try {
      const { payload } = await this.request("/Home/GetUserBindDevices", {
        headers: {
          Cookie: `${TOKEN_COOKIE}=${token}`,
          Referer: new URL("/Home/Index", this.options.baseUrl).toString(),
        },
      });
      const reading = parseBalancePayload(payload);
      log.debug("Balance fetched", { balance: reading.balance, room: reading.roomName });
      return { status: "ok", reading };
    } catch (error) {
      if (error instanceof BalanceAuthError) {
        log.warn("Balance token rejected", { message: error.message });
        return { status: "auth-expired", message: error.message };
      }
      const message = error instanceof Error ? error.message : String(error);
      log.warn("Balance fetch failed", { message });
      return { status: "failure", message };
    }
  }

  async login(account: string, password: string): Promise<string> {
    const { payload, headers } = await this.request("/Login/LoginJson", {
      headers: {
        "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
        Referer: new URL("/Login/Login", this.options.baseUrl).toString(),
      },
      body: new URLSearchParams({ account, password }).toString(),
    });
    if (!isObject(payload) || payload.Tag !== 1) {
      const message = isObject(payload) ? portalMessage(payload) : "unknown error";
      throw new BalanceApiError(`Login failed: ${message}`);
    }

    const token = extractCookieValue(headers.get("set-cookie"), TOKEN_COOKIE);
    if (!token) {
      throw new BalanceApiError("Login succeeded but token cookie is missing");
    }
    return token;
  }

  private async request(
    path: string,
    options: { headers: Record<string, string>; body?: string },
  ): Promise<PortalResponse> {
    const url = new URL(path, this.options.baseUrl);
    const headers = new Headers({
      Accept: "application/json, text/javascript, */*; q=0.01",
      "X-Requested-With": "XMLHttpRequest",
      Origin: url.origin,
      ...options.headers,
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body: options.body,
        signal: controller.signal,
      });
      if (response.status === 401 || response.status === 403) {
        throw new BalanceAuthError(`Balance service rejected the token (${response.status})`);
      }
      if (response.redirected && new URL(response.url).pathname.startsWith("/Login")) {
        throw new BalanceAuthError("Balance service redirected to the login page");
      }
      if (!response.ok) {
        const message = (await response.text()).trim();
        throw new BalanceHttpError(
          message || `Balance service error (${response.status})`,
          response.status,
        );
      }
      // The body is read before the timer is cleared; a stalled body aborts too.
      const payload = parseJson(await response.text());
      return { payload, headers: response.headers };
    } catch (error) {
      if (error instanceof BalanceApiError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BalanceApiError(`Balance service unavailable: ${message}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
