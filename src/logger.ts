type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (component: string) => Logger;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const resolveLevel = (): LogLevel => {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  if (process.env.VITEST) return "error";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

const activeLevel = resolveLevel();

const write = (
  level: LogLevel,
  component: string | undefined,
  message: string,
  meta?: LogMeta,
): void => {
  if (levelOrder[level] < levelOrder[activeLevel]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    ...(component ? { component } : {}),
    msg: message,
    ...(meta ? { meta } : {}),
  };
  const line = `${JSON.stringify(payload)}\n`;
  if (level === "error" || level === "warn") {
    process.stderr.write(line);
    return;
  }
  process.stdout.write(line);
};

const createLogger = (component?: string): Logger => ({
  debug: (message, meta) => write("debug", component, message, meta),
  info: (message, meta) => write("info", component, message, meta),
  warn: (message, meta) => write("warn", component, message, meta),
  error: (message, meta) => write("error", component, message, meta),
  child: (name) => createLogger(component ? `${component}.${name}` : name),
});

export const logger = createLogger();

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
