import path from "node:path";

import { askInstallerQuestions } from "./prompts.js";
import { validateBalanceApiUrl, validateTelegramToken } from "./preflight.js";
import { initializeDataFiles, writeEnvFile } from "./writers.js";

const assertAnswers = (answers: Awaited<ReturnType<typeof askInstallerQuestions>>): void => {
  if (!answers.botToken) throw new Error("BOT_TOKEN is required");
  if (answers.adminUserIds.length === 0) {
    throw new Error("At least one ADMIN_USER_ID is required");
  }
  validateBalanceApiUrl(answers.balanceApiUrl);
  if (!Number.isFinite(answers.threshold) || answers.threshold < 0) {
    throw new Error("DEFAULT_THRESHOLD must be >= 0");
  }
  if (!Number.isInteger(answers.intervalMinutes) || answers.intervalMinutes < 1) {
    throw new Error("DEFAULT_INTERVAL_MINUTES must be a positive integer");
  }
  if (!answers.electricityToken && !(answers.electricityAccount && answers.electricityPassword)) {
    process.stdout.write("! No token or account/password given; set one later with /settoken\n");
  }
};

const run = async (): Promise<void> => {
  process.stdout.write("Balance monitor installer\n\n");

  const answers = await askInstallerQuestions();
  assertAnswers(answers);

  process.stdout.write("- Validating Telegram token...\n");
  await validateTelegramToken(answers.botToken);

  process.stdout.write("- Writing .env...\n");
  await writeEnvFile(answers);

  process.stdout.write("- Initializing JSON data files...\n");
  const dataDir = await initializeDataFiles(answers);

  process.stdout.write("\nSetup complete\n");
  process.stdout.write(`- .env: ${path.resolve(".env")}\n`);
  process.stdout.write(`- data dir: ${dataDir}\n`);
  process.stdout.write("\nNext: npm install && npm run dev\n");
};

run().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Installer failed: ${message}\n`);
  process.exitCode = 1;
});
