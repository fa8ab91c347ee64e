import type { Api } from "grammy";

import type { MessageSender } from "../notify/notifier.js";

export class TelegramSender implements MessageSender {
  constructor(private readonly api: Api) {}

  async send(sessionId: string, text: string): Promise<void> {
    await this.api.sendMessage(sessionId, text);
  }
}
