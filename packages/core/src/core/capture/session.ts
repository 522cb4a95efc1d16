import chromium from "@sparticuz/chromium";
import {
  type Browser,
  type BrowserContext,
  type BrowserContextOptions,
  type LaunchOptions,
  chromium as playwrightChromium,
} from "playwright-core";
import {
  type ContextConfig,
  type LaunchConfig,
  buildCaptureConfig,
} from "../../config/index.js";
import { ContextCreationError, LaunchError, summarizeError } from "../../errors.js";
import { describeError, logger } from "../../logger.js";
import { buildUserAgentPool, pickUserAgent } from "./user-agents.js";

export type SessionState = "unstarted" | "running" | "closed";

interface ResolvedExecutable {
  path: string;
  args: string[];
}

const STABILITY_ARGS = ["--disable-dev-shm-usage", "--disable-gpu"];

let cachedExecutable: ResolvedExecutable | null | undefined;

const resolveChromiumExecutable = async (
  config: LaunchConfig,
): Promise<ResolvedExecutable | null> => {
  if (config.executablePath) {
    return { path: config.executablePath, args: chromium.args };
  }

  if (cachedExecutable !== undefined) {
    return cachedExecutable;
  }

  // @sparticuz/chromium only ships Linux binaries. Fall back to the
  // Playwright-installed Chromium on non-Linux platforms.
  if (process.platform !== "linux") {
    cachedExecutable = null;
    return null;
  }

  const executablePath = await chromium.executablePath();
  if (!executablePath) {
    throw new Error(
      "Unable to resolve Chromium binary path from @sparticuz/chromium",
    );
  }

  cachedExecutable = { path: executablePath, args: chromium.args };
  return cachedExecutable;
};

export const buildLaunchArgs = (
  config: LaunchConfig,
  baseArgs: readonly string[] = [],
): string[] => {
  const args = new Set<string>(baseArgs);

  if (config.disableAutomationFlags) {
    args.add("--disable-blink-features=AutomationControlled");
  }
  if (config.disableSandbox) {
    args.add("--no-sandbox");
  }
  for (const arg of STABILITY_ARGS) {
    args.add(arg);
  }

  return [...args];
};

export const buildLaunchOptions = (
  config: LaunchConfig,
  executable: ResolvedExecutable | null,
): LaunchOptions => {
  const launchOptions: LaunchOptions = {
    headless: config.headless,
    timeout: config.launchTimeoutMs,
    args: buildLaunchArgs(config, executable?.args),
  };

  if (executable) {
    launchOptions.executablePath = executable.path;
  }

  return launchOptions;
};

export const buildContextOptions = (
  config: ContextConfig,
  userAgent: string,
): BrowserContextOptions => ({
  userAgent,
  viewport: { ...config.viewport },
  javaScriptEnabled: config.javaScriptEnabled,
  ignoreHTTPSErrors: config.ignoreHTTPSErrors,
});

export interface CaptureSessionOptions {
  launch: LaunchConfig;
  context: ContextConfig;
  userAgents?: readonly string[];
  random?: () => number;
}

/**
 * One Chromium process for the duration of one batch. Tasks draw isolated
 * contexts from it; the session itself is never reused across batches.
 */
export class CaptureSession {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private currentState: SessionState = "unstarted";
  private readonly userAgents: readonly string[];
  private readonly random: () => number;

  constructor(private readonly options: CaptureSessionOptions) {
    this.userAgents = options.userAgents ?? buildUserAgentPool();
    this.random = options.random ?? Math.random;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Launch Chromium. Concurrent callers share the same launch; calling it on
   * a running session is a no-op.
   */
  async start(): Promise<void> {
    if (this.currentState === "running") return;
    if (this.currentState === "closed") {
      throw new LaunchError(
        "Capture session is closed; create a new session for the next batch",
      );
    }

    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }

    await this.launching;
  }

  /**
   * Close the browser. Safe to call repeatedly and on a session that never
   * started.
   */
  async stop(): Promise<void> {
    const pending = this.launching;
    if (pending) {
      try {
        await pending;
      } catch (error) {
        logger.debug("Launch failed before the session was stopped", {
          error: describeError(error),
        });
      }
    }

    const browser = this.browser;
    this.browser = null;
    if (this.currentState === "running") {
      this.currentState = "closed";
    }

    if (!browser) return;

    try {
      await browser.close();
      logger.info("Capture session stopped");
    } catch (error) {
      logger.warn("Failed to close capture browser", {
        error: describeError(error),
      });
    }
  }

  async newIsolatedContext(
    userAgentPool: readonly string[] = this.userAgents,
  ): Promise<BrowserContext> {
    const browser = this.browser;
    if (this.currentState !== "running" || !browser) {
      throw new ContextCreationError(
        `Cannot create a browsing context: session is ${this.currentState}`,
      );
    }

    const userAgent = pickUserAgent(userAgentPool, this.random);

    try {
      return await browser.newContext(
        buildContextOptions(this.options.context, userAgent),
      );
    } catch (error) {
      throw new ContextCreationError(
        `Failed to create browsing context: ${summarizeError(error)}`,
        { cause: error },
      );
    }
  }

  private async launch(): Promise<Browser> {
    const startedAt = Date.now();

    try {
      const executable = await resolveChromiumExecutable(this.options.launch);
      const launchOptions = buildLaunchOptions(this.options.launch, executable);
      const browser = await playwrightChromium.launch(launchOptions);

      browser.on("disconnected", () => {
        if (this.browser !== browser) return;
        this.browser = null;
        this.currentState = "closed";
        logger.warn("Capture browser disconnected");
      });

      this.browser = browser;
      this.currentState = "running";
      logger.info("Capture session started", {
        headless: launchOptions.headless,
        executablePath: launchOptions.executablePath ?? "playwright-default",
        elapsedMs: Date.now() - startedAt,
      });
      return browser;
    } catch (error) {
      logger.error("Capture session failed to launch", {
        error: describeError(error),
        elapsedMs: Date.now() - startedAt,
      });
      throw new LaunchError(
        `Failed to launch Chromium: ${summarizeError(error)}`,
        { cause: error },
      );
    }
  }
}

export const createCaptureSession = (
  overrides: Partial<CaptureSessionOptions> = {},
): CaptureSession => {
  const config = buildCaptureConfig();
  return new CaptureSession({
    launch: config.launch,
    context: config.context,
    userAgents: buildUserAgentPool(config.generatedUserAgents),
    ...overrides,
  });
};

/**
 * Lightweight readiness probe that proves Chromium launches and can hand out
 * a browsing context in the current environment.
 */
export const verifyCaptureSession = async (
  session: CaptureSession = createCaptureSession(),
): Promise<void> => {
  try {
    await session.start();
    const context = await session.newIsolatedContext();
    await context.close();
  } finally {
    await session.stop();
  }
};
