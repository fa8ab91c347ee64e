export const validateTelegramToken = async (token: string): Promise<void> => {
  const response = await fetch(`https://api.telegram.org/bot${token}/getMe`);
  if (!response.ok) {
    throw new Error(`Telegram validation failed: HTTP ${response.status}`);
  }
  const payload: unknown = await response.json();
  if (!payload || typeof payload !== "object" || !("ok" in payload) || payload.ok !== true) {
    const description =
      payload && typeof payload === "object" && "description" in payload ? String(payload.description) : "unknown";
    throw new Error(`Telegram validation failed: ${description}`);
  }
};

export const validateBalanceApiUrl = (value: string): void => {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error("BALANCE_API_URL must be an absolute URL");
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new Error("BALANCE_API_URL must use http or https");
  }
};
