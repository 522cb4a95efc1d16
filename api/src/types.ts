import type {
  ArchiveOutcome,
  BatchCounters,
  BatchRun,
  PhaseUpdate,
  ProgressEvent,
} from "@shotbatch/core/types";

export interface CaptureAccepted {
  kind: "accepted";
  totalCount: number;
  truncated: boolean;
  warning?: string;
}

export interface CaptureProgressLine extends ProgressEvent {
  log: string;
}

export interface CaptureCompletedLine {
  kind: "completed";
  runId: BatchRun["runId"];
  startedAt: string;
  finishedAt: string;
  counters: BatchCounters;
}

export interface CaptureArchiveLine {
  kind: "archive";
  archive: ArchiveOutcome;
}

export interface CaptureStreamError {
  kind: "error";
  message: string;
}

/** One NDJSON line of a `POST /captures` response. */
export type CaptureStreamMessage =
  | CaptureAccepted
  | PhaseUpdate
  | CaptureProgressLine
  | CaptureCompletedLine
  | CaptureArchiveLine
  | CaptureStreamError;
