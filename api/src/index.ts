import { logger } from "@shotbatch/core";
import { Hono } from "hono";
import { registerRoutes } from "./routes.js";
import { type CaptureRunState, createRunState } from "./run-state.js";

export { CaptureRunState, createRunState, type CaptureRunStateOptions } from "./run-state.js";
export { CsvInputError, parseAddressCsv } from "./input.js";
export { captureRequestSchema, registerRoutes, resolveCaptureRequest } from "./routes.js";
export type * from "./types.js";

export const createApp = (state: CaptureRunState = createRunState()) => {
  const app = new Hono();

  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.info("Request completed", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      elapsedMs: Date.now() - startedAt,
    });
  });

  registerRoutes(app, state);

  app.get("/", (c) =>
    c.json({
      service: "shotbatch",
      docs: "POST /captures or /captures/csv to stream a batch, GET /captures/archive for the ZIP, GET /health for readiness",
    }),
  );

  return app;
};
