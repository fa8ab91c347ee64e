import type { BalanceReading } from "../balance/types.js";

export type MonitorEvent =
  | { type: "low-balance"; balance: number; threshold: number; updateTime: string | null }
  | { type: "recharge"; balance: number; previous: number; delta: number; updateTime: string | null };

export type FailureReason = "no-credentials" | "auth-refresh-failed" | "remote";

export type CheckOutcome =
  | { kind: "success"; reading: BalanceReading; event: MonitorEvent | null }
  | { kind: "auth-refreshed"; reading: BalanceReading; event: MonitorEvent | null }
  | { kind: "auth-expired"; message: string }
  | { kind: "failure"; reason: FailureReason; message: string };

export type CheckTrigger = "scheduled" | "manual" | "query";
