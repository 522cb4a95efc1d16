import { getEnv, isProduction } from "./config/index.js";

type Level = "debug" | "info" | "warn" | "error";

type Payload = Record<string, unknown> | undefined;

const LEVEL_RANK: Record<Level | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const log = (level: Level, message: string, payload?: Payload) => {
  const env = getEnv();
  if (LEVEL_RANK[level] < LEVEL_RANK[env.LOG_LEVEL]) {
    return;
  }

  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context: isProduction() ? "production" : "development",
    ...(payload ?? {}),
  };

  if (level === "error") {
    console.error(entry);
  } else if (level === "warn") {
    console.warn(entry);
  } else if (level === "info") {
    console.info(entry);
  } else {
    console.debug(entry);
  }
};

export const logger = {
  debug: (message: string, payload?: Payload) => log("debug", message, payload),
  info: (message: string, payload?: Payload) => log("info", message, payload),
  warn: (message: string, payload?: Payload) => log("warn", message, payload),
  error: (message: string, payload?: Payload) => log("error", message, payload),
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
