export type CapturePhase = "queued" | "navigating" | "settling" | "capturing" | "completed";

export type CaptureFailureKind =
  | "context"
  | "navigation-timeout"
  | "navigation"
  | "capture"
  | "unexpected";

export interface CapturePosition {
  /** 1-based position in the submitted address list. */
  index: number;
  total: number;
}

interface OutcomeBase {
  address: string;
  index: number;
  durationMs: number;
}

export interface CaptureSuccess extends OutcomeBase {
  status: "success";
  artifactName: string;
  artifactPath: string;
}

export interface CaptureFailure extends OutcomeBase {
  status: "failure";
  errorKind: CaptureFailureKind;
  /** First line of the underlying error message. */
  errorSummary: string;
}

export type OutcomeRecord = Readonly<CaptureSuccess> | Readonly<CaptureFailure>;

export interface BatchCounters {
  submitted: number;
  completed: number;
  succeeded: number;
  failed: number;
}

export interface PhaseUpdate {
  kind: "phase";
  address: string;
  index: number;
  total: number;
  phase: Exclude<CapturePhase, "completed">;
}

export interface ProgressEvent {
  kind: "progress";
  completedCount: number;
  totalCount: number;
  outcome: OutcomeRecord;
}

export interface BatchRun {
  runId: string;
  startedAt: string;
  finishedAt: string;
  counters: BatchCounters;
  /** Outcomes in completion order. */
  outcomes: readonly OutcomeRecord[];
}

export interface BatchCompleted {
  kind: "completed";
  run: BatchRun;
}

export type BatchMessage = PhaseUpdate | ProgressEvent | BatchCompleted;

export interface BatchObserver {
  onPhase?: (update: PhaseUpdate) => Promise<void> | void;
  onProgress: (event: ProgressEvent) => Promise<void> | void;
  onComplete?: (run: BatchRun) => Promise<void> | void;
}

export type ArchiveOutcome =
  | {
      status: "created" | "reused";
      archivePath: string;
      entries: readonly string[];
    }
  | {
      status: "skipped";
      warning: string;
    };
