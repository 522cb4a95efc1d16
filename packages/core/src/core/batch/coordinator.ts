import { randomUUID } from "node:crypto";
import { type CaptureConfig, buildCaptureConfig } from "../../config/index.js";
import { BatchInProgressError, EmptyBatchError, summarizeError } from "../../errors.js";
import { logger } from "../../logger.js";
import type {
  BatchMessage,
  BatchObserver,
  BatchRun,
  CaptureFailure,
  CapturePosition,
  OutcomeRecord,
  PhaseUpdate,
} from "../../types/capture.js";
import type { ArtifactStore } from "../artifacts/store.js";
import { CaptureSession } from "../capture/session.js";
import { buildUserAgentPool } from "../capture/user-agents.js";
import { runCaptureTask } from "../capture/task.js";
import { normalizeAddress } from "../jobs/address.js";
import { AsyncChannel } from "./channel.js";
import { createTaskLimiter } from "./pool.js";

type TaskMessage = PhaseUpdate | { kind: "outcome"; outcome: OutcomeRecord };

export interface BatchCoordinatorOptions {
  store: ArtifactStore;
  config?: CaptureConfig;
  createSession?: (config: CaptureConfig) => CaptureSession;
  random?: () => number;
}

export const sessionFromConfig = (config: CaptureConfig): CaptureSession =>
  new CaptureSession({
    launch: config.launch,
    context: config.context,
    userAgents: buildUserAgentPool(config.generatedUserAgents),
  });

const unexpectedFailure = (
  address: string,
  position: CapturePosition,
  error: unknown,
): OutcomeRecord => {
  const failure: CaptureFailure = {
    status: "failure",
    address,
    index: position.index,
    durationMs: 0,
    errorKind: "unexpected",
    errorSummary: summarizeError(error),
  };
  return Object.freeze(failure);
};

/**
 * Runs one batch at a time: one browser session, one task per address, at
 * most `maxConcurrency` tasks in flight. Tasks report through a channel that
 * only the coordinator reads, so observers see messages strictly in the
 * order tasks finish.
 */
export class BatchCoordinator {
  private active = false;
  private liveSession: CaptureSession | null = null;
  private readonly config: CaptureConfig;
  private readonly store: ArtifactStore;
  private readonly createSession: (config: CaptureConfig) => CaptureSession;
  private readonly random: () => number;

  constructor(options: BatchCoordinatorOptions) {
    this.store = options.store;
    this.config = options.config ?? buildCaptureConfig();
    this.createSession = options.createSession ?? sessionFromConfig;
    this.random = options.random ?? Math.random;
  }

  get running(): boolean {
    return this.active;
  }

  /**
   * Claim the coordinator and return the batch's message stream. Entries are
   * normalised first, so bare hosts get `https://` and unsupported schemes
   * throw `AddressError` before anything is claimed.
   *
   * The claim is taken here, not on the first `next()`, so an overlapping
   * caller is refused synchronously. It is released only when the stream
   * runs to the end or the loop breaks out of it: a stream that is never
   * iterated keeps the coordinator busy.
   */
  stream(addresses: readonly string[]): AsyncGenerator<BatchMessage, void, undefined> {
    if (this.active) {
      throw new BatchInProgressError();
    }
    if (addresses.length === 0) {
      throw new EmptyBatchError();
    }

    const normalized = addresses.map(normalizeAddress);
    this.active = true;
    return this.execute(normalized);
  }

  /**
   * Stop the live session, if any. Tasks still in flight fail and the batch
   * completes with their failure records.
   */
  async close(): Promise<void> {
    const session = this.liveSession;
    if (session) {
      await session.stop();
    }
  }

  async run(addresses: readonly string[], observer: BatchObserver): Promise<BatchRun> {
    let completed: BatchRun | null = null;

    for await (const message of this.stream(addresses)) {
      if (message.kind === "phase") {
        await observer.onPhase?.(message);
      } else if (message.kind === "progress") {
        await observer.onProgress(message);
      } else {
        completed = message.run;
        await observer.onComplete?.(message.run);
      }
    }

    if (!completed) {
      throw new Error("Capture batch ended without a completion signal");
    }
    return completed;
  }

  private async *execute(
    addresses: string[],
  ): AsyncGenerator<BatchMessage, void, undefined> {
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    const total = addresses.length;
    const outcomes: OutcomeRecord[] = [];

    try {
      await this.store.reset();

      const session = this.createSession(this.config);
      this.liveSession = session;
      logger.info("Accepted capture batch", { runId, totalTasks: total });

      try {
        await session.start();

        for (const [offset, address] of addresses.entries()) {
          yield { kind: "phase", address, index: offset + 1, total, phase: "queued" };
        }

        const channel = new AsyncChannel<TaskMessage>();
        const limiter = createTaskLimiter(Math.min(this.config.maxConcurrency, total));

        const tasks = addresses.map((address, offset) => {
          const position: CapturePosition = { index: offset + 1, total };
          return limiter
            .run(() =>
              runCaptureTask(session, address, position, {
                store: this.store,
                timings: this.config.timings,
                random: this.random,
                reportPhase: (phase) => {
                  channel.push({ kind: "phase", address, index: position.index, total, phase });
                },
              }),
            )
            .catch((error: unknown) => unexpectedFailure(address, position, error))
            .then((outcome) => {
              channel.push({ kind: "outcome", outcome });
            });
        });

        while (outcomes.length < total) {
          const message = await channel.next();
          if (message.kind === "phase") {
            yield message;
            continue;
          }

          outcomes.push(message.outcome);
          yield {
            kind: "progress",
            completedCount: outcomes.length,
            totalCount: total,
            outcome: message.outcome,
          };
        }

        await Promise.all(tasks);
      } finally {
        this.liveSession = null;
        await session.stop();
      }

      const succeeded = outcomes.filter((outcome) => outcome.status === "success").length;
      const run: BatchRun = {
        runId,
        startedAt,
        finishedAt: new Date().toISOString(),
        counters: {
          submitted: total,
          completed: outcomes.length,
          succeeded,
          failed: outcomes.length - succeeded,
        },
        outcomes: Object.freeze([...outcomes]),
      };

      logger.info("Completed capture batch", {
        runId,
        totalTasks: total,
        tasksSucceeded: run.counters.succeeded,
        tasksFailed: run.counters.failed,
      });

      yield { kind: "completed", run };
    } finally {
      this.active = false;
    }
  }
}
