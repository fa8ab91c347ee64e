export interface AdminUser {
  telegramUserId: number;
  createdAt: string;
}

export interface Subscription {
  sessionId: string;
  subscribedBy: number | null;
  createdAt: string;
}

export interface MonitorConfig {
  threshold: number;
  intervalMinutes: number;
  autoCheck: boolean;
  autoRefreshToken: boolean;
}

export interface MonitorState {
  lastBalance: number | null;
  lastCheckAt: string | null;
}

export type TokenSource = "env" | "refresh" | "command";

export interface StoredCredentials {
  token: string | null;
  source: TokenSource | null;
  updatedAt: string | null;
}

export interface StoreState {
  admins: AdminUser[];
  subscriptions: Subscription[];
  monitorConfig: MonitorConfig;
  monitorState: MonitorState;
  credentials: StoredCredentials;
}
