import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

export interface InstallerAnswers {
  botToken: string;
  adminUserIds: number[];
  dataDir: string;
  balanceApiUrl: string;
  electricityAccount: string;
  electricityPassword: string;
  electricityToken: string;
  threshold: number;
  intervalMinutes: number;
}

const parseIds = (raw: string): number[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => Number(item))
    .filter((item) => Number.isFinite(item));

export const askInstallerQuestions = async (): Promise<InstallerAnswers> => {
  const rl = createInterface({ input, output });
  try {
    const botToken = (await rl.question("BOT_TOKEN: ")).trim();
    const adminRaw = (await rl.question("ADMIN_USER_IDS (comma separated): ")).trim();
    const dataDirRaw = (await rl.question("DATA_DIR (./data): ")).trim();
    const balanceApiUrl = (await rl.question("BALANCE_API_URL: ")).trim();
    const account = (await rl.question("ELECTRICITY_ACCOUNT (optional): ")).trim();
    const password = (await rl.question("ELECTRICITY_PASSWORD (optional): ")).trim();
    const token = (await rl.question("ELECTRICITY_TOKEN (optional): ")).trim();
    const thresholdRaw = (await rl.question("DEFAULT_THRESHOLD (30): ")).trim();
    const intervalRaw = (await rl.question("DEFAULT_INTERVAL_MINUTES (60): ")).trim();

    return {
      botToken,
      adminUserIds: parseIds(adminRaw),
      dataDir: dataDirRaw || "./data",
      balanceApiUrl,
      electricityAccount: account,
      electricityPassword: password,
      electricityToken: token,
      threshold: Number(thresholdRaw || "30"),
      intervalMinutes: Number(intervalRaw || "60"),
    };
  } finally {
    rl.close();
  }
};
