export type {
  ArchiveOutcome,
  BatchCompleted,
  BatchCounters,
  BatchMessage,
  BatchObserver,
  BatchRun,
  CaptureFailure,
  CaptureFailureKind,
  CapturePhase,
  CapturePosition,
  CaptureSuccess,
  OutcomeRecord,
  PhaseUpdate,
  ProgressEvent,
} from "./capture.js";
