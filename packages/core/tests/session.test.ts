import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  TEST_EXECUTABLE,
  buildTestConfig,
  resetPlaywrightMocks,
  setupPlaywrightMocks,
} from "./helpers/fake-browser.js";

const loadSession = async () => {
  const sessionModule = await import("../src/core/capture/session.js");
  const errors = await import("../src/errors.js");
  return { ...sessionModule, ...errors };
};

const sessionOptions = () => {
  const config = buildTestConfig();
  return { launch: config.launch, context: config.context };
};

beforeEach(() => {
  vi.resetModules();
  vi.clearAllMocks();
});

afterEach(() => {
  resetPlaywrightMocks();
  vi.resetModules();
});

describe("buildLaunchArgs", () => {
  it("adds automation, sandbox and stability flags after the base args", async () => {
    setupPlaywrightMocks();
    const { buildLaunchArgs } = await loadSession();

    const args = buildLaunchArgs(buildTestConfig().launch, ["--single-process", "--no-sandbox"]);

    expect(args).toEqual([
      "--single-process",
      "--no-sandbox",
      "--disable-blink-features=AutomationControlled",
      "--disable-dev-shm-usage",
      "--disable-gpu",
    ]);
  });

  it("omits the optional flags when disabled", async () => {
    setupPlaywrightMocks();
    const { buildLaunchArgs } = await loadSession();

    const args = buildLaunchArgs({
      ...buildTestConfig().launch,
      disableAutomationFlags: false,
      disableSandbox: false,
    });

    expect(args).toEqual(["--disable-dev-shm-usage", "--disable-gpu"]);
  });
});

describe("buildContextOptions", () => {
  it("copies the viewport and applies the user agent", async () => {
    setupPlaywrightMocks();
    const { buildContextOptions } = await loadSession();

    expect(buildContextOptions(buildTestConfig().context, "UA-1")).toEqual({
      userAgent: "UA-1",
      viewport: { width: 1280, height: 720 },
      javaScriptEnabled: true,
      ignoreHTTPSErrors: true,
    });
  });
});

describe("CaptureSession", () => {
  it("launches once for concurrent starts", async () => {
    const { launchMock } = setupPlaywrightMocks();
    const { CaptureSession } = await loadSession();
    const session = new CaptureSession(sessionOptions());

    expect(session.state).toBe("unstarted");
    await Promise.all([session.start(), session.start()]);
    await session.start();

    expect(session.state).toBe("running");
    expect(launchMock).toHaveBeenCalledTimes(1);
    expect(launchMock).toHaveBeenCalledWith({
      headless: true,
      timeout: 5_000,
      executablePath: TEST_EXECUTABLE,
      args: [
        "--single-process",
        "--disable-blink-features=AutomationControlled",
        "--no-sandbox",
        "--disable-dev-shm-usage",
        "--disable-gpu",
      ],
    });
  });

  it("draws the user agent from its pool", async () => {
    const { browser } = setupPlaywrightMocks();
    const { CaptureSession } = await loadSession();
    const session = new CaptureSession({
      ...sessionOptions(),
      userAgents: ["UA-1", "UA-2"],
      random: () => 0.99,
    });

    await session.start();
    await session.newIsolatedContext();

    expect(browser.newContext).toHaveBeenCalledWith({
      userAgent: "UA-2",
      viewport: { width: 1280, height: 720 },
      javaScriptEnabled: true,
      ignoreHTTPSErrors: true,
    });
  });

  it("refuses contexts before start and after stop", async () => {
    setupPlaywrightMocks();
    const { CaptureSession, ContextCreationError } = await loadSession();
    const session = new CaptureSession(sessionOptions());

    await expect(session.newIsolatedContext()).rejects.toBeInstanceOf(ContextCreationError);

    await session.start();
    await session.stop();

    await expect(session.newIsolatedContext()).rejects.toThrow(
      "Cannot create a browsing context: session is closed",
    );
  });

  it("wraps context creation failures", async () => {
    const { browser } = setupPlaywrightMocks();
    const { CaptureSession, ContextCreationError } = await loadSession();
    browser.newContext.mockRejectedValueOnce(new Error("Browser has been closed"));
    const session = new CaptureSession(sessionOptions());
    await session.start();

    const attempt = session.newIsolatedContext();

    await expect(attempt).rejects.toBeInstanceOf(ContextCreationError);
    await expect(attempt).rejects.toThrow(
      "Failed to create browsing context: Browser has been closed",
    );
  });

  it("stops idempotently and cannot be restarted", async () => {
    const { browser } = setupPlaywrightMocks();
    const { CaptureSession, LaunchError } = await loadSession();
    const session = new CaptureSession(sessionOptions());

    await session.start();
    await session.stop();
    await session.stop();

    expect(session.state).toBe("closed");
    expect(browser.close).toHaveBeenCalledTimes(1);
    await expect(session.start()).rejects.toBeInstanceOf(LaunchError);
  });

  it("stopping a session that never started is a no-op", async () => {
    const { browser } = setupPlaywrightMocks();
    const { CaptureSession } = await loadSession();
    const session = new CaptureSession(sessionOptions());

    await session.stop();

    expect(session.state).toBe("unstarted");
    expect(browser.close).not.toHaveBeenCalled();
  });

  it("reports launch failures as LaunchError", async () => {
    const { launchMock } = setupPlaywrightMocks();
    const { CaptureSession, LaunchError } = await loadSession();
    launchMock.mockRejectedValueOnce(new Error("spawn /usr/bin/chromium-test ENOENT"));
    const session = new CaptureSession(sessionOptions());

    const attempt = session.start();

    await expect(attempt).rejects.toBeInstanceOf(LaunchError);
    await expect(attempt).rejects.toThrow(
      "Failed to launch Chromium: spawn /usr/bin/chromium-test ENOENT",
    );
    expect(session.state).toBe("unstarted");
  });

  it("closes itself when the browser disconnects", async () => {
    const { browser } = setupPlaywrightMocks();
    const { CaptureSession } = await loadSession();
    const session = new CaptureSession(sessionOptions());
    await session.start();

    const [event, handler] = browser.on.mock.calls[0] ?? [];
    expect(event).toBe("disconnected");
    if (typeof handler !== "function") {
      throw new Error("Expected a disconnected handler");
    }
    handler();

    expect(session.state).toBe("closed");
  });
});

describe("verifyCaptureSession", () => {
  it("opens and closes a context, then stops the session", async () => {
    const { browser, contexts } = setupPlaywrightMocks();
    const { CaptureSession, verifyCaptureSession } = await loadSession();
    const session = new CaptureSession(sessionOptions());

    await verifyCaptureSession(session);

    expect(browser.newContext).toHaveBeenCalledTimes(1);
    expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(session.state).toBe("closed");
  });
});
