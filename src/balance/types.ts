export interface BalanceReading {
  balance: number;
  roomName: string;
  deviceName: string | null;
  price: number | null;
  updateTime: string | null;
  online: boolean;
  switchOn: boolean;
}

export type BalanceResult =
  | { status: "ok"; reading: BalanceReading }
  | { status: "auth-expired"; message: string }
  | { status: "failure"; message: string };

export type RefreshResult = { ok: true; token: string } | { ok: false; reason: string };

export interface BalanceGateway {
  fetchBalance(token: string): Promise<BalanceResult>;
}

export interface TokenGateway {
  login(account: string, password: string): Promise<string>;
}
