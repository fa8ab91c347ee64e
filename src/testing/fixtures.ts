import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type {
  BalanceGateway,
  BalanceReading,
  BalanceResult,
  TokenGateway,
} from "../balance/types.js";
import type { MessageSender } from "../notify/notifier.js";
import { JsonStore } from "../store/jsonStore.js";
import type { StoreState } from "../store/types.js";

export interface TempStore {
  store: JsonStore;
  dir: string;
  cleanup: () => Promise<void>;
}

export const createTempStore = async (defaults: Partial<StoreState> = {}): Promise<TempStore> => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "balance-watch-"));
  const store = new JsonStore(dir, defaults);
  await store.init();
  return { store, dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
};

export const makeReading = (balance: number, overrides: Partial<BalanceReading> = {}): BalanceReading => ({
  balance,
  roomName: "Room 101",
  deviceName: "Meter",
  price: 0.6,
  updateTime: null,
  online: true,
  switchOn: true,
  ...overrides,
});

export const ok = (balance: number): BalanceResult => ({ status: "ok", reading: makeReading(balance) });

/** Replays scripted results in order and records the token of every call. */
export class ScriptedBalanceGateway implements BalanceGateway {
  readonly tokens: string[] = [];

  constructor(private readonly results: Array<BalanceResult | Promise<BalanceResult>> = []) {}

  push(...results: Array<BalanceResult | Promise<BalanceResult>>): void {
    this.results.push(...results);
  }

  async fetchBalance(token: string): Promise<BalanceResult> {
    this.tokens.push(token);
    const next = this.results.shift();
    if (!next) return { status: "failure", message: "no scripted result" };
    return next;
  }
}

export class ScriptedTokenGateway implements TokenGateway {
  readonly calls: Array<{ account: string; password: string }> = [];

  constructor(private readonly outcome: { token: string } | { error: string }) {}

  async login(account: string, password: string): Promise<string> {
    this.calls.push({ account, password });
    if ("error" in this.outcome) throw new Error(this.outcome.error);
    return this.outcome.token;
  }
}

export class RecordingSender implements MessageSender {
  readonly sent: Array<{ sessionId: string; text: string }> = [];

  constructor(private readonly failing: Set<string> = new Set()) {}

  async send(sessionId: string, text: string): Promise<void> {
    if (this.failing.has(sessionId)) {
      throw new Error(`chat ${sessionId} unavailable`);
    }
    this.sent.push({ sessionId, text });
  }
}

export const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};
