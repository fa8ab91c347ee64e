import type { JsonStore } from "../store/jsonStore.js";

export class AuthzService {
  constructor(private readonly store: JsonStore) {}

  async isAdmin(userId: number): Promise<boolean> {
    const admins = await this.store.read("admins");
    return admins.some((admin) => admin.telegramUserId === userId);
  }
}
