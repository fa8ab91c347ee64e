import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { logger } from "../logger.js";
import { STORE_FILES, type StoreFileKey } from "./files.js";
import {
  isAdminUser,
  isArrayOf,
  isMonitorConfig,
  isMonitorState,
  isStoredCredentials,
  isSubscription,
} from "./schemas.js";
import type { StoreState } from "./types.js";

const log = logger.child("store");

type FileValueMap = StoreState;

type FileGuards = {
  [K in StoreFileKey]: (value: unknown) => value is FileValueMap[K];
};

const FILE_GUARDS: FileGuards = {
  admins: isArrayOf(isAdminUser),
  subscriptions: isArrayOf(isSubscription),
  monitorConfig: isMonitorConfig,
  monitorState: isMonitorState,
  credentials: isStoredCredentials,
};

export const DEFAULT_VALUES: FileValueMap = {
  admins: [],
  subscriptions: [],
  monitorConfig: {
    threshold: 30,
    intervalMinutes: 60,
    autoCheck: true,
    autoRefreshToken: true,
  },
  monitorState: {
    lastBalance: null,
    lastCheckAt: null,
  },
  credentials: {
    token: null,
    source: null,
    updatedAt: null,
  },
};

export class JsonStore {
  private readonly fileChains = new Map<string, Promise<void>>();
  private readonly defaults: FileValueMap;

  constructor(
    private readonly dataDir: string,
    defaults: Partial<FileValueMap> = {},
  ) {
    this.defaults = { ...DEFAULT_VALUES, ...defaults };
  }

  async init(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await Promise.all((Object.keys(STORE_FILES) as StoreFileKey[]).map((key) => this.ensureFile(key)));
  }

  async read<K extends StoreFileKey>(key: K): Promise<FileValueMap[K]> {
    return this.enqueue(this.resolvePath(key), () => this.readUnlocked(key));
  }

  async write<K extends StoreFileKey>(key: K, value: FileValueMap[K]): Promise<void> {
    const filePath = this.resolvePath(key);
    await this.enqueue(filePath, () => this.atomicWrite(filePath, value));
  }

  getDataDir(): string {
    return this.dataDir;
  }

  private defaultFor<K extends StoreFileKey>(key: K): FileValueMap[K] {
    return structuredClone(this.defaults[key]);
  }

  /** Reads and writes of one file share a chain, so a read never lands between the renames of a write. */
  private enqueue<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
    const chain = this.fileChains.get(filePath) ?? Promise.resolve();
    const next = chain.then(operation);
    this.fileChains.set(
      filePath,
      next.then(
        () => undefined,
        () => undefined,
      ),
    );
    return next;
  }

  private async ensureFile(key: StoreFileKey): Promise<void> {
    const filePath = this.resolvePath(key);
    await this.enqueue(filePath, async () => {
      try {
        await stat(filePath);
      } catch {
        await this.atomicWrite(filePath, this.defaultFor(key));
      }
    });
  }

  private async readUnlocked<K extends StoreFileKey>(key: K): Promise<FileValueMap[K]> {
    const isValid: (value: unknown) => value is FileValueMap[K] = FILE_GUARDS[key];
    try {
      const raw = await readFile(this.resolvePath(key), "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (!isValid(parsed)) {
        throw new Error(`Unexpected shape in ${STORE_FILES[key]}`);
      }
      return parsed;
    } catch (error) {
      return this.tryRecover(key, error);
    }
  }

  private async tryRecover<K extends StoreFileKey>(
    key: K,
    originalError: unknown,
  ): Promise<FileValueMap[K]> {
    const filePath = this.resolvePath(key);
    const backupPath = `${filePath}.bak`;
    const isValid: (value: unknown) => value is FileValueMap[K] = FILE_GUARDS[key];
    log.warn("Failed to parse store file", {
      file: STORE_FILES[key],
      message: originalError instanceof Error ? originalError.message : String(originalError),
    });
    try {
      const backupRaw = await readFile(backupPath, "utf8");
      const backupParsed: unknown = JSON.parse(backupRaw);
      if (!isValid(backupParsed)) {
        throw new Error("Backup JSON has an unexpected shape");
      }
      await this.atomicWrite(filePath, backupParsed);
      log.info("Recovered store file from backup", { file: STORE_FILES[key] });
      return backupParsed;
    } catch {
      const fallback = this.defaultFor(key);
      await this.atomicWrite(filePath, fallback);
      log.warn("Reset store file to defaults", { file: STORE_FILES[key] });
      return fallback;
    }
  }

  private async atomicWrite(filePath: string, value: unknown): Promise<void> {
    const tmpPath = `${filePath}.tmp`;
    const bakPath = `${filePath}.bak`;
    const serialized = `${JSON.stringify(value, null, 2)}\n`;

    await writeFile(tmpPath, serialized, "utf8");

    try {
      await stat(filePath);
      await rename(filePath, bakPath);
    } catch {
      await rm(bakPath, { force: true });
    }

    await rename(tmpPath, filePath);
  }

  private resolvePath(key: StoreFileKey): string {
    return path.join(this.dataDir, STORE_FILES[key]);
  }
}
