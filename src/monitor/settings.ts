import type { JsonStore } from "../store/jsonStore.js";
import type { MonitorConfig, MonitorState } from "../store/types.js";
import { KeyedQueue } from "../utils/queue.js";

export class MonitorSettingsService {
  private readonly queue = new KeyedQueue();

  constructor(private readonly store: JsonStore) {}

  async getConfig(): Promise<MonitorConfig> {
    return this.store.read("monitorConfig");
  }

  async updateConfig(patch: Partial<MonitorConfig>): Promise<MonitorConfig> {
    return this.queue.run("monitorConfig", async () => {
      const current = await this.store.read("monitorConfig");
      const next = { ...current, ...patch };
      await this.store.write("monitorConfig", next);
      return next;
    });
  }

  async getState(): Promise<MonitorState> {
    return this.store.read("monitorState");
  }

  async saveState(state: MonitorState): Promise<void> {
    await this.queue.run("monitorState", () => this.store.write("monitorState", state));
  }

  async resetState(): Promise<void> {
    await this.saveState({ lastBalance: null, lastCheckAt: null });
  }
}
