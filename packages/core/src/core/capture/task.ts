import type { BrowserContext, Page, Route } from "playwright-core";
import { shouldAbortRequest } from "../../capture-filters.js";
import type { TaskTimings } from "../../config/index.js";
import {
  CaptureError,
  ContextCreationError,
  NavigationError,
  NavigationTimeoutError,
  summarizeError,
} from "../../errors.js";
import { describeError, logger } from "../../logger.js";
import type {
  CaptureFailure,
  CaptureFailureKind,
  CapturePhase,
  CapturePosition,
  CaptureSuccess,
  OutcomeRecord,
} from "../../types/capture.js";
import type { ArtifactStore } from "../artifacts/store.js";
import { buildArtifactName } from "../jobs/artifact-name.js";
import type { CaptureSession } from "./session.js";
import { settleLazyContent } from "./settle.js";

export type CapturePhaseEmitter = (
  phase: Exclude<CapturePhase, "queued" | "completed">,
) => Promise<void> | void;

export interface CaptureTaskOptions {
  store: ArtifactStore;
  timings: TaskTimings;
  random?: () => number;
  reportPhase?: CapturePhaseEmitter;
}

// Playwright tags its timeouts by name; the message may quote the address.
const isTimeout = (error: unknown): boolean =>
  error instanceof Error && error.name === "TimeoutError";

export const classifyFailure = (error: unknown): CaptureFailureKind => {
  if (error instanceof ContextCreationError) return "context";
  if (error instanceof NavigationTimeoutError) return "navigation-timeout";
  if (error instanceof NavigationError) return "navigation";
  if (error instanceof CaptureError) return "capture";
  return "unexpected";
};

/**
 * Friendlier wording for the operator log. The outcome record keeps the raw
 * first line.
 */
const mapErrorToPageError = (error: unknown): string => {
  if (error instanceof NavigationTimeoutError || isTimeout(error)) {
    return "Timed out while loading the page";
  }

  const message = describeError(error);
  if (/net::ERR_NAME_NOT_RESOLVED/i.test(message)) {
    return "DNS resolution failed for the requested host";
  }

  if (/net::ERR_CONNECTION/i.test(message)) {
    return "Connection error encountered while fetching the page";
  }

  return message;
};

export const sampleSettleDelay = (
  range: { min: number; max: number },
  random: () => number = Math.random,
): number => Math.round(range.min + random() * (range.max - range.min));

const navigate = async (page: Page, address: string, timeoutMs: number) => {
  try {
    await page.goto(address, {
      timeout: timeoutMs,
      waitUntil: "domcontentloaded",
    });
  } catch (error) {
    const summary = summarizeError(error);
    if (isTimeout(error)) {
      throw new NavigationTimeoutError(summary, address, { cause: error });
    }
    throw new NavigationError(summary, address, { cause: error });
  }
};

const capture = async (page: Page, path: string) => {
  try {
    await page.screenshot({ path, fullPage: true, type: "png" });
  } catch (error) {
    throw new CaptureError(summarizeError(error), { cause: error });
  }
};

/**
 * Capture one address into one outcome record. Never rejects: every failure
 * up to and including the screenshot becomes a failure record, and the
 * browsing context is closed on every path.
 */
export const runCaptureTask = async (
  session: CaptureSession,
  address: string,
  position: CapturePosition,
  options: CaptureTaskOptions,
): Promise<OutcomeRecord> => {
  const { store, timings } = options;
  const random = options.random ?? Math.random;
  const startedAtMs = Date.now();

  const notifyPhase = async (
    phase: Exclude<CapturePhase, "queued" | "completed">,
  ) => {
    if (!options.reportPhase) {
      return;
    }

    try {
      await options.reportPhase(phase);
    } catch (error) {
      logger.debug("Failed to report phase", {
        phase,
        error: describeError(error),
      });
    }
  };

  logger.info("Starting capture task", {
    address,
    index: position.index,
    total: position.total,
  });

  let context: BrowserContext | null = null;

  try {
    context = await session.newIsolatedContext();

    await context.route("**/*", (route: Route) => {
      if (shouldAbortRequest(route.request().url())) {
        return route.abort();
      }
      return route.continue();
    });

    const page = await context.newPage();

    await notifyPhase("navigating");
    await navigate(page, address, timings.navigationTimeoutMs);
    await page.waitForTimeout(sampleSettleDelay(timings.settleDelayMs, random));

    await notifyPhase("settling");
    const settled = await settleLazyContent(page, {
      pauseMs: timings.scrollPauseMs,
      maxIterations: timings.maxScrollIterations,
    });
    logger.debug("Page settled", { address, ...settled });

    await notifyPhase("capturing");
    const artifactName = buildArtifactName(address, position.index);
    const artifactPath = store.artifactPath(artifactName);
    await capture(page, artifactPath);

    const success: CaptureSuccess = {
      status: "success",
      address,
      index: position.index,
      durationMs: Date.now() - startedAtMs,
      artifactName,
      artifactPath,
    };

    logger.info("Capture task completed successfully", {
      address,
      artifactName,
      durationMs: success.durationMs,
    });
    return Object.freeze(success);
  } catch (error) {
    const failure: CaptureFailure = {
      status: "failure",
      address,
      index: position.index,
      durationMs: Date.now() - startedAtMs,
      errorKind: classifyFailure(error),
      errorSummary: summarizeError(error),
    };

    logger.error("Capture task failed", {
      address,
      errorKind: failure.errorKind,
      message: mapErrorToPageError(error),
      durationMs: failure.durationMs,
    });
    return Object.freeze(failure);
  } finally {
    if (context) {
      try {
        await context.close();
      } catch (e) {
        logger.warn("Failed to close browsing context", {
          error: String(e),
          address,
        });
      }
    }
  }
};
