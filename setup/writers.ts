import { writeFile } from "node:fs/promises";
import path from "node:path";

import { JsonStore } from "../src/store/jsonStore.js";
import type { InstallerAnswers } from "./prompts.js";

const now = () => new Date().toISOString();

export const writeEnvFile = async (answers: InstallerAnswers): Promise<void> => {
  const content = [
    `BOT_TOKEN=${answers.botToken}`,
    `ADMIN_USER_IDS=${answers.adminUserIds.join(",")}`,
    "BOT_TRANSPORT=polling",
    `DATA_DIR=${answers.dataDir}`,
    `BALANCE_API_URL=${answers.balanceApiUrl}`,
    ...(answers.electricityAccount ? [`ELECTRICITY_ACCOUNT=${answers.electricityAccount}`] : []),
    ...(answers.electricityPassword ? [`ELECTRICITY_PASSWORD=${answers.electricityPassword}`] : []),
    ...(answers.electricityToken ? [`ELECTRICITY_TOKEN=${answers.electricityToken}`] : []),
    `DEFAULT_THRESHOLD=${answers.threshold}`,
    `DEFAULT_INTERVAL_MINUTES=${answers.intervalMinutes}`,
  ].join("\n");

  await writeFile(path.resolve(".env"), `${content}\n`, "utf8");
};

export const initializeDataFiles = async (answers: InstallerAnswers): Promise<string> => {
  const dataDir = path.resolve(answers.dataDir);
  const store = new JsonStore(dataDir, {
    monitorConfig: {
      threshold: answers.threshold,
      intervalMinutes: answers.intervalMinutes,
      autoCheck: true,
      autoRefreshToken: true,
    },
  });
  await store.init();
  await store.write(
    "admins",
    answers.adminUserIds.map((telegramUserId) => ({ telegramUserId, createdAt: now() })),
  );
  return dataDir;
};
