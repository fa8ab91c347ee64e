import { logger } from "../logger.js";
import type { RefreshResult, TokenGateway } from "./types.js";

const log = logger.child("refresher");

export class TokenRefresher {
  constructor(private readonly gateway: TokenGateway) {}

  async refresh(account: string | undefined, password: string | undefined): Promise<RefreshResult> {
    if (!account || !password) {
      return { ok: false, reason: "Account or password is not configured" };
    }
    try {
      const token = await this.gateway.login(account, password);
      log.info("Obtained a new token");
      return { ok: true, token };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn("Token refresh failed", { reason });
      return { ok: false, reason };
    }
  }
}
