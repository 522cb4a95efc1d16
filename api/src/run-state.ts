import {
  ArtifactStore,
  BatchCoordinator,
  BatchInProgressError,
  type CaptureConfig,
  type CaptureSession,
  ResultAggregator,
  buildCaptureConfig,
  logger,
  sessionFromConfig,
} from "@shotbatch/core";
import { getApiEnv } from "./config/env.js";

export interface CaptureRunStateOptions {
  config?: CaptureConfig;
  rootDir?: string;
  createSession?: (config: CaptureConfig) => CaptureSession;
  random?: () => number;
}

/**
 * Process-wide state behind the HTTP surface: the artifact store, the single
 * coordinator that guards against overlapping batches, and the aggregated log
 * of the most recent run.
 */
export class CaptureRunState {
  readonly config: CaptureConfig;
  readonly store: ArtifactStore;
  readonly coordinator: BatchCoordinator;
  readonly aggregator: ResultAggregator;
  readonly createSession: (config: CaptureConfig) => CaptureSession;

  constructor(options: CaptureRunStateOptions = {}) {
    this.config = options.config ?? buildCaptureConfig();
    this.store = new ArtifactStore(
      this.config.storage,
      options.rootDir ?? getApiEnv().CAPTURE_ROOT_DIR,
    );
    this.createSession = options.createSession ?? sessionFromConfig;
    this.coordinator = new BatchCoordinator({
      store: this.store,
      config: this.config,
      createSession: this.createSession,
      random: options.random,
    });
    this.aggregator = new ResultAggregator(this.store);
  }

  get running(): boolean {
    return this.coordinator.running;
  }

  /**
   * Delete every screenshot and archive and forget the last run. Refused while
   * a batch is running.
   */
  async flush(): Promise<void> {
    if (this.running) {
      throw new BatchInProgressError("Cannot flush while a capture batch is running");
    }
    await this.store.reset();
    this.aggregator.reset();
    logger.info("Flushed screenshots and archives", {
      artifactDir: this.store.artifactDir,
      archiveDir: this.store.archiveDir,
    });
  }

  async shutdown(): Promise<void> {
    await this.coordinator.close();
  }
}

export const createRunState = (options: CaptureRunStateOptions = {}): CaptureRunState =>
  new CaptureRunState(options);
