import { ArchiveError } from "../../errors.js";
import { describeError, logger } from "../../logger.js";
import type {
  ArchiveOutcome,
  BatchCounters,
  BatchObserver,
  BatchRun,
  OutcomeRecord,
  ProgressEvent,
} from "../../types/capture.js";
import { packageArtifactDirectory } from "../artifacts/archive.js";
import type { ArtifactStore } from "../artifacts/store.js";

export const NO_ARTIFACTS_WARNING =
  "Processing completed, but no screenshots were successfully generated.";

export const formatLogLine = (outcome: OutcomeRecord): string =>
  outcome.status === "success"
    ? `✅ Success: ${outcome.address}`
    : `⚠️ Error on ${outcome.address}: ${outcome.errorSummary}`;

type ReadyArchive = Extract<ArchiveOutcome, { status: "created" | "reused" }>;

/**
 * Append-only log of one run's outcomes, in the order the coordinator
 * delivered them, plus the archive derived from the run's artifacts.
 */
export class ResultAggregator implements BatchObserver {
  private outcomes: OutcomeRecord[] = [];
  private submitted = 0;
  private finished = false;
  private archive: ReadyArchive | null = null;
  private completionArchive: ArchiveOutcome | null = null;
  private archiving: Promise<ArchiveOutcome> | null = null;

  constructor(private readonly store: ArtifactStore) {}

  /** Start a new run; every record and the cached archive are dropped. */
  reset(submitted = 0): void {
    this.outcomes = [];
    this.submitted = submitted;
    this.finished = false;
    this.archive = null;
    this.archiving = null;
    this.completionArchive = null;
  }

  record(outcome: OutcomeRecord): void {
    this.outcomes.push(outcome);
  }

  onProgress(event: ProgressEvent): void {
    this.submitted = Math.max(this.submitted, event.totalCount);
    this.record(event.outcome);
  }

  async onComplete(run: BatchRun): Promise<void> {
    this.submitted = run.counters.submitted;
    this.finished = true;
    const archive = await this.packageArtifacts();
    this.completionArchive = archive;
    if (archive.status === "skipped") {
      logger.warn("Archive skipped", { runId: run.runId, warning: archive.warning });
    }
  }

  recordAll(): readonly OutcomeRecord[] {
    return Object.freeze([...this.outcomes]);
  }

  counters(): BatchCounters {
    const succeeded = this.outcomes.filter((outcome) => outcome.status === "success").length;
    return {
      submitted: Math.max(this.submitted, this.outcomes.length),
      completed: this.outcomes.length,
      succeeded,
      failed: this.outcomes.length - succeeded,
    };
  }

  /** Archive outcome produced when the run completed, if it has. */
  get archiveOutcome(): ArchiveOutcome | null {
    return this.completionArchive;
  }

  get complete(): boolean {
    return this.finished && this.outcomes.length === this.submitted;
  }

  log(): string[] {
    return this.outcomes.map(formatLogLine);
  }

  async hasAnyArtifacts(): Promise<boolean> {
    for (const outcome of this.outcomes) {
      if (outcome.status === "success" && (await this.store.fileExists(outcome.artifactPath))) {
        return true;
      }
    }
    return false;
  }

  /**
   * Zip the artifact directory once per run. Later calls reuse the archive;
   * a run without artifacts, or a packaging failure, yields a warning instead
   * of an error.
   */
  packageArtifacts(): Promise<ArchiveOutcome> {
    if (!this.archiving) {
      this.archiving = this.buildArchive().finally(() => {
        this.archiving = null;
      });
    }
    return this.archiving;
  }

  private async buildArchive(): Promise<ArchiveOutcome> {
    const cached = this.archive;
    if (cached && (await this.store.fileExists(cached.archivePath))) {
      return { ...cached, status: "reused" };
    }

    if (!(await this.hasAnyArtifacts())) {
      return { status: "skipped", warning: NO_ARTIFACTS_WARNING };
    }

    try {
      const entries = await packageArtifactDirectory(this.store);
      const created: ReadyArchive = {
        status: "created",
        archivePath: this.store.archivePath,
        entries: Object.freeze(entries),
      };
      this.archive = created;
      return created;
    } catch (error) {
      if (!(error instanceof ArchiveError)) {
        throw error;
      }
      logger.warn("Failed to package artifacts", { error: describeError(error) });
      return { status: "skipped", warning: error.message };
    }
  }
}
