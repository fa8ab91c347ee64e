import type {
  AdminUser,
  MonitorConfig,
  MonitorState,
  StoredCredentials,
  Subscription,
  TokenSource,
} from "./types.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === "object" && !Array.isArray(value);
const isNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);
const isString = (value: unknown): value is string => typeof value === "string";
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isNullable =
  <T>(guard: (value: unknown) => value is T) =>
  (value: unknown): value is T | null =>
    value === null || guard(value);

export const isArrayOf =
  <T>(guard: (value: unknown) => value is T) =>
  (value: unknown): value is T[] =>
    Array.isArray(value) && value.every(guard);

export const isAdminUser = (value: unknown): value is AdminUser => {
  if (!isRecord(value)) return false;
  return isNumber(value.telegramUserId) && isString(value.createdAt);
};

export const isSubscription = (value: unknown): value is Subscription => {
  if (!isRecord(value)) return false;
  const { sessionId } = value;
  return (
    isString(sessionId) &&
    sessionId.length > 0 &&
    isNullable(isNumber)(value.subscribedBy) &&
    isString(value.createdAt)
  );
};

export const isMonitorConfig = (value: unknown): value is MonitorConfig => {
  if (!isRecord(value)) return false;
  const { threshold, intervalMinutes } = value;
  return (
    isNumber(threshold) &&
    threshold >= 0 &&
    isNumber(intervalMinutes) &&
    Number.isInteger(intervalMinutes) &&
    intervalMinutes > 0 &&
    isBoolean(value.autoCheck) &&
    isBoolean(value.autoRefreshToken)
  );
};

export const isMonitorState = (value: unknown): value is MonitorState => {
  if (!isRecord(value)) return false;
  return isNullable(isNumber)(value.lastBalance) && isNullable(isString)(value.lastCheckAt);
};

const isTokenSource = (value: unknown): value is TokenSource =>
  value === "env" || value === "refresh" || value === "command";

export const isStoredCredentials = (value: unknown): value is StoredCredentials => {
  if (!isRecord(value)) return false;
  return (
    isNullable(isString)(value.token) &&
    isNullable(isTokenSource)(value.source) &&
    isNullable(isString)(value.updatedAt)
  );
};
