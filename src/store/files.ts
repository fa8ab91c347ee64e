export const STORE_FILES = {
  admins: "admins.json",
  subscriptions: "subscriptions.json",
  monitorConfig: "monitor-config.json",
  monitorState: "monitor-state.json",
  credentials: "credentials.json",
} as const;

export type StoreFileKey = keyof typeof STORE_FILES;
