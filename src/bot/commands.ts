import type { Bot } from "grammy";

import { logger } from "../logger.js";
import type { CommandHandlers, CommandRequest } from "./handlers.js";
import type { BotContext } from "./types.js";

type HandlerName = keyof CommandHandlers;

const COMMAND_ROUTES: Array<{ command: string; handler: HandlerName; description: string }> = [
  { command: "balance", handler: "balance", description: "Query the current balance" },
  { command: "subscribe", handler: "subscribe", description: "Receive alerts in this chat" },
  { command: "unsubscribe", handler: "unsubscribe", description: "Stop alerts in this chat" },
  { command: "status", handler: "status", description: "Monitor status" },
  { command: "checknow", handler: "checkNow", description: "Run a check now" },
  { command: "threshold", handler: "threshold", description: "Set the alert threshold" },
  { command: "interval", handler: "interval", description: "Set the check interval" },
  { command: "monitor", handler: "monitor", description: "Toggle automatic checks" },
  { command: "autorefresh", handler: "autoRefresh", description: "Toggle token refresh" },
  { command: "settoken", handler: "setToken", description: "Replace the access token" },
  { command: "reset", handler: "reset", description: "Forget the last balance" },
  { command: "help", handler: "help", description: "Usage" },
  { command: "start", handler: "help", description: "Start the bot" },
];

const toRequest = (ctx: BotContext): CommandRequest | null => {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return null;
  const match = typeof ctx.match === "string" ? ctx.match : "";
  return {
    sessionId: String(chatId),
    userId: ctx.from?.id ?? null,
    args: match.trim(),
  };
};

export const registerCommands = (bot: Bot<BotContext>): void => {
  for (const route of COMMAND_ROUTES) {
    bot.command(route.command, async (ctx) => {
      const request = toRequest(ctx);
      if (!request) {
        await ctx.reply("Could not identify the chat.");
        return;
      }

      logger.debug("Command received", {
        command: route.command,
        sessionId: request.sessionId,
        userId: request.userId,
      });

      try {
        const reply = await ctx.services.handlers[route.handler](request);
        await ctx.reply(reply);
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        logger.error("Command failed", { command: route.command, sessionId: request.sessionId, message });
        await ctx.reply("⚠️ Something went wrong. Please try again later.");
      }
    });
  }
};

export const botCommandList = COMMAND_ROUTES.filter((route) => route.command !== "start").map(
  ({ command, description }) => ({ command, description }),
);
