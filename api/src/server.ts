import { type ServerType, serve } from "@hono/node-server";
import { describeError, logger } from "@shotbatch/core";
import { createApp } from "./index.js";
import type { CaptureRunState } from "./run-state.js";

export interface StartServerOptions {
  state: CaptureRunState;
  port: number;
  hostname: string;
}

export interface RunningServer {
  server: ServerType;
  /** Stop any live browser session, then stop accepting connections. */
  stop: () => Promise<void>;
}

export const startServer = ({ state, port, hostname }: StartServerOptions): RunningServer => {
  const server = serve({ fetch: createApp(state).fetch, port, hostname }, (info) => {
    logger.info("Capture server listening", { port: info.port, address: info.address });
  });

  const stop = async () => {
    try {
      await state.shutdown();
    } catch (error) {
      logger.error("Failed to stop capture session", { error: describeError(error) });
    }
    server.close();
  };

  return { server, stop };
};
