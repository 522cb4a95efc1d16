/**
 * Error taxonomy of the capture engine.
 *
 * Only {@link LaunchError} is allowed to abort a batch. Task-level errors are
 * converted into failure outcomes by the Capture Task, and {@link ArchiveError}
 * surfaces as a warning once the batch is already complete.
 */

export type AddressIssue = "empty" | "unsupported_protocol";

export class AddressError extends Error {
  constructor(
    message: string,
    readonly issue: AddressIssue,
    readonly detail?: string,
  ) {
    super(message);
    this.name = "AddressError";
  }
}

export class LaunchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LaunchError";
  }
}

export class ContextCreationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ContextCreationError";
  }
}

export class NavigationTimeoutError extends Error {
  constructor(
    message: string,
    readonly address: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NavigationTimeoutError";
  }
}

export class NavigationError extends Error {
  constructor(
    message: string,
    readonly address: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NavigationError";
  }
}

export class CaptureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaptureError";
  }
}

export class ArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

export class BatchInProgressError extends Error {
  constructor(message = "A capture batch is already running") {
    super(message);
    this.name = "BatchInProgressError";
  }
}

export class EmptyBatchError extends Error {
  constructor(message = "Provide at least one address to capture") {
    super(message);
    this.name = "EmptyBatchError";
  }
}

/**
 * First line of an error's message, the form recorded in failure outcomes
 * and log lines.
 */
export const summarizeError = (error: unknown): string => {
  const message = error instanceof Error ? error.message : String(error);
  const [firstLine = ""] = message.split(/\r?\n/);
  return firstLine.trim() || (error instanceof Error ? error.name : "Unknown error");
};
