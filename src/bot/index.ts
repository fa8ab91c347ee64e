import { Bot } from "grammy";

import { attachServices } from "./middleware.js";
import { registerCommands } from "./commands.js";
import { logger } from "../logger.js";
import type { BotContext, BotServices } from "./types.js";

export const createTelegramBot = (token: string, services: BotServices): Bot<BotContext> => {
  const bot = new Bot<BotContext>(token);
  bot.use(attachServices(services));
  registerCommands(bot);

  bot.catch((error) => {
    logger.error("Unhandled bot error", {
      updateId: error.ctx.update.update_id,
      message: error.error instanceof Error ? error.error.message : String(error.error),
    });
  });

  return bot;
};
