import type { JsonStore } from "../store/jsonStore.js";
import { KeyedQueue } from "../utils/queue.js";

const now = () => new Date().toISOString();

export class SubscriptionRegistry {
  private readonly queue = new KeyedQueue();

  constructor(private readonly store: JsonStore) {}

  async subscribe(sessionId: string, subscribedBy: number | null = null): Promise<boolean> {
    return this.queue.run("subscriptions", async () => {
      const entries = await this.store.read("subscriptions");
      if (entries.some((entry) => entry.sessionId === sessionId)) return false;
      entries.push({ sessionId, subscribedBy, createdAt: now() });
      await this.store.write("subscriptions", entries);
      return true;
    });
  }

  async unsubscribe(sessionId: string): Promise<boolean> {
    return this.queue.run("subscriptions", async () => {
      const entries = await this.store.read("subscriptions");
      const next = entries.filter((entry) => entry.sessionId !== sessionId);
      if (next.length === entries.length) return false;
      await this.store.write("subscriptions", next);
      return true;
    });
  }

  async isSubscribed(sessionId: string): Promise<boolean> {
    const entries = await this.store.read("subscriptions");
    return entries.some((entry) => entry.sessionId === sessionId);
  }

  async list(): Promise<string[]> {
    const entries = await this.store.read("subscriptions");
    return entries.map((entry) => entry.sessionId);
  }
}
