import { Api } from "grammy";

import { createTelegramBot } from "./bot/index.js";
import { botCommandList } from "./bot/commands.js";
import { createCommandHandlers } from "./bot/handlers.js";
import { ensurePollingTransport, loadConfig } from "./config.js";
import { AuthzService } from "./auth/authz.js";
import { BalanceClient } from "./balance/client.js";
import { CredentialStore } from "./balance/credentials.js";
import { TokenRefresher } from "./balance/refresher.js";
import { MonitorEngine } from "./monitor/engine.js";
import { MonitorScheduler } from "./monitor/scheduler.js";
import { MonitorSettingsService } from "./monitor/settings.js";
import { SubscriptionRegistry } from "./monitor/subscriptions.js";
import { Notifier } from "./notify/notifier.js";
import { TelegramSender } from "./relay/telegramSender.js";
import { JsonStore } from "./store/jsonStore.js";
import { logger } from "./logger.js";

const now = () => new Date().toISOString();

const bootstrap = async (): Promise<void> => {
  const config = loadConfig();
  ensurePollingTransport(config);
  logger.info("Bootstrapping balance monitor", {
    dataDir: config.dataDir,
    transport: config.transport,
    balanceApiUrl: config.balanceApiUrl,
  });
  const store = new JsonStore(config.dataDir, { monitorConfig: config.monitorDefaults });
  await store.init();

  logger.info("Syncing admins from env", { count: config.admins.length });
  await store.write(
    "admins",
    config.admins.map((telegramUserId) => ({ telegramUserId, createdAt: now() })),
  );

  const credentials = new CredentialStore(
    store,
    config.credentials.account,
    config.credentials.password,
  );
  await credentials.load(config.credentials.token);

  const client = new BalanceClient({
    baseUrl: config.balanceApiUrl,
    timeoutMs: config.balanceTimeoutMs,
  });
  const settings = new MonitorSettingsService(store);
  const subscriptions = new SubscriptionRegistry(store);

  const engine = new MonitorEngine({
    settings,
    subscriptions,
    credentials,
    client,
    refresher: new TokenRefresher(client),
    notifier: new Notifier(new TelegramSender(new Api(config.botToken))),
  });
  const scheduler = new MonitorScheduler({ engine, settings, subscriptions });

  const bot = createTelegramBot(config.botToken, {
    handlers: createCommandHandlers({
      engine,
      subscriptions,
      settings,
      credentials,
      authz: new AuthzService(store),
    }),
  });

  await bot.api.setMyCommands(botCommandList);

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    scheduler.stop();
    bot.stop().catch((error: unknown) => {
      logger.error("Bot stop failed", { message: error instanceof Error ? error.message : String(error) });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));


  await scheduler.start();
  logger.info("Bot starting", { mode: "polling" });
  await bot.start();
};

bootstrap().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  logger.error("Bootstrap failed", { message });
  process.exitCode = 1;
});
