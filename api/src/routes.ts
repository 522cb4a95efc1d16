import { readFile } from "node:fs/promises";
import { zValidator } from "@hono/zod-validator";
import {
  AddressError,
  type AddressListResult,
  BatchInProgressError,
  EmptyBatchError,
  type BatchMessage,
  describeError,
  formatLogLine,
  logger,
  normalizeAddressList,
  parsePastedAddresses,
  summarizeError,
  verifyCaptureSession,
} from "@shotbatch/core";
import type { Context, Hono } from "hono";
import { streamText } from "hono/streaming";
import { z } from "zod";
import { CsvInputError, parseAddressCsv } from "./input.js";
import type { CaptureRunState } from "./run-state.js";
import type { CaptureStreamMessage } from "./types.js";

/**
 * Shape of the `POST /captures` payload: either a list of addresses or the
 * raw contents of a paste box, one address per line.
 */
export const captureRequestSchema = z.union([
  z
    .object({
      addresses: z
        .array(z.string())
        .min(1, "Provide at least one address to capture."),
    })
    .strict(),
  z
    .object({
      text: z.string().min(1, "Provide at least one address to capture."),
    })
    .strict(),
]);

export type CaptureRequest = z.infer<typeof captureRequestSchema>;

export const resolveCaptureRequest = (
  request: CaptureRequest,
  limit: number,
): AddressListResult =>
  "addresses" in request
    ? normalizeAddressList(request.addresses, { limit })
    : parsePastedAddresses(request.text, { limit });

const truncationWarning = (truncated: number, limit: number) =>
  `Batch limited to ${limit} addresses; ${truncated} entr${truncated === 1 ? "y was" : "ies were"} ignored.`;

const toStreamLines = (message: BatchMessage): CaptureStreamMessage => {
  switch (message.kind) {
    case "phase":
      return message;
    case "progress":
      return { ...message, log: formatLogLine(message.outcome) };
    case "completed":
      return {
        kind: "completed",
        runId: message.run.runId,
        startedAt: message.run.startedAt,
        finishedAt: message.run.finishedAt,
        counters: message.run.counters,
      };
  }
};

/**
 * Claim the coordinator and stream the batch as NDJSON. The claim is taken
 * before the response starts, so an overlapping request gets a plain 409.
 */
const streamBatch = (c: Context, state: CaptureRunState, input: AddressListResult) => {
  const limit = state.config.maxAddressesPerBatch;
  let batch: AsyncGenerator<BatchMessage, void, undefined>;
  try {
    batch = state.coordinator.stream(input.addresses);
  } catch (error) {
    if (error instanceof BatchInProgressError) {
      return c.json({ ok: false, error: error.message }, 409);
    }
    if (error instanceof EmptyBatchError) {
      return c.json({ ok: false, error: error.message }, 400);
    }
    throw error;
  }

  const { aggregator } = state;
  aggregator.reset(input.addresses.length);

  return streamText(c, async (stream) => {
    const write = (message: CaptureStreamMessage) => stream.writeln(JSON.stringify(message));

    const accepted: CaptureStreamMessage = {
      kind: "accepted",
      totalCount: input.addresses.length,
      truncated: input.truncated > 0,
      ...(input.truncated > 0 ? { warning: truncationWarning(input.truncated, limit) } : {}),
    };
    await write(accepted);

    try {
      for await (const message of batch) {
        if (message.kind === "progress") {
          aggregator.onProgress(message);
        }
        if (message.kind === "completed") {
          await aggregator.onComplete(message.run);
          await write(toStreamLines(message));
          const archive = aggregator.archiveOutcome;
          if (archive) {
            await write({ kind: "archive", archive });
          }
          continue;
        }
        await write(toStreamLines(message));
      }
    } catch (error) {
      logger.error("Capture batch aborted", { error: describeError(error) });
      await write({ kind: "error", message: summarizeError(error) });
    }
  });
};

/**
 * Register health, capture, status, download and flush routes on the
 * provided Hono app.
 */
export const registerRoutes = (app: Hono, state: CaptureRunState) => {
  const limit = state.config.maxAddressesPerBatch;

  const rejectAddressErrors = (c: Context, error: unknown) => {
    if (error instanceof AddressError || error instanceof CsvInputError) {
      return c.json({ ok: false, error: error.message }, 400);
    }
    throw error;
  };

  app.get("/health", async (c) => {
    try {
      await verifyCaptureSession(state.createSession(state.config));
      return c.json({ status: "healthy" });
    } catch (error) {
      const message = summarizeError(error);
      logger.error("Health check failed", { message });
      return c.json({ status: "unhealthy", error: message }, 503);
    }
  });

  app.post(
    "/captures",
    zValidator("json", captureRequestSchema, (result, c) => {
      if (!result.success) {
        // Compact payload instead of Zod's verbose structure.
        return c.json(
          {
            ok: false,
            error: "Invalid request payload",
            details: result.error.flatten(),
          },
          400,
        );
      }
    }),
    (c) => {
      let input: AddressListResult;
      try {
        input = resolveCaptureRequest(c.req.valid("json"), limit);
      } catch (error) {
        return rejectAddressErrors(c, error);
      }
      return streamBatch(c, state, input);
    },
  );

  app.post("/captures/csv", async (c) => {
    let input: AddressListResult;
    try {
      input = parseAddressCsv(await c.req.text(), { limit });
    } catch (error) {
      return rejectAddressErrors(c, error);
    }
    return streamBatch(c, state, input);
  });

  app.get("/captures", (c) =>
    c.json({
      running: state.running,
      processingComplete: state.aggregator.complete,
      counters: state.aggregator.counters(),
      records: state.aggregator.recordAll(),
      log: state.aggregator.log(),
      archive: state.aggregator.archiveOutcome,
    }),
  );

  app.get("/captures/archive", async (c) => {
    if (state.running) {
      return c.json({ ok: false, error: "A capture batch is still running." }, 409);
    }

    const archive = await state.aggregator.packageArtifacts();
    if (archive.status === "skipped") {
      return c.json({ ok: false, error: archive.warning }, 404);
    }

    const contents = await readFile(archive.archivePath);
    return new Response(new Uint8Array(contents), {
      status: 200,
      headers: {
        "Content-Type": "application/zip",
        "Content-Disposition": `attachment; filename="${state.store.archiveName}"`,
      },
    });
  });

  app.post("/flush", async (c) => {
    try {
      await state.flush();
    } catch (error) {
      if (error instanceof BatchInProgressError) {
        return c.json({ ok: false, error: error.message }, 409);
      }
      throw error;
    }
    return c.json({ ok: true });
  });
};
