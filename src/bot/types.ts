import type { Context } from "grammy";

import type { CommandHandlers } from "./handlers.js";

export interface BotServices {
  handlers: CommandHandlers;
}

export type BotContext = Context & {
  services: BotServices;
};
