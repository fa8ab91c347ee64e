import { logger } from "../logger.js";
import type { JsonStore } from "../store/jsonStore.js";
import type { TokenSource } from "../store/types.js";

const log = logger.child("credentials");

const now = () => new Date().toISOString();

export interface AccountCredentials {
  account: string;
  password: string;
}

/**
 * Holds the portal access token plus the optional login pair. The token is
 * swapped in memory before it is persisted, so readers never see a stale
 * value once `replaceToken` has been called.
 */
export class CredentialStore {
  private token: string | null = null;

  constructor(
    private readonly store: JsonStore,
    private readonly account?: string,
    private readonly password?: string,
  ) {}

  async load(envToken?: string): Promise<void> {
    const stored = await this.store.read("credentials");
    if (stored.token) {
      this.token = stored.token;
      log.info("Loaded stored token", { source: stored.source, updatedAt: stored.updatedAt });
      return;
    }
    if (envToken) {
      await this.replaceToken(envToken, "env");
    }
  }

  getToken(): string | null {
    return this.token;
  }

  getAccountCredentials(): AccountCredentials | null {
    if (!this.account || !this.password) return null;
    return { account: this.account, password: this.password };
  }

  async replaceToken(token: string, source: TokenSource): Promise<void> {
    this.token = token;
    await this.store.write("credentials", { token, source, updatedAt: now() });
    log.info("Token replaced", { source });
  }
}
