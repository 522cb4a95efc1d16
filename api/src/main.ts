import { logger } from "@shotbatch/core";
import { getApiEnv } from "./config/env.js";
import { createRunState } from "./run-state.js";
import { startServer } from "./server.js";

const { PORT, HOSTNAME } = getApiEnv();
const { stop } = startServer({ state: createRunState(), port: PORT, hostname: HOSTNAME });

/**
 * Stop any live browser session before exiting so Chromium is not left
 * behind.
 */
const handleShutdown = async (signal: NodeJS.Signals) => {
  logger.info("Received shutdown signal", { signal });
  await stop();
  process.exit(0);
};

process.once("SIGINT", (signal) => void handleShutdown(signal));
process.once("SIGTERM", (signal) => void handleShutdown(signal));
