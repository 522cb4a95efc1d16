import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FakeBrowserOptions } from "./helpers/fake-browser.js";
import {
  buildTestConfig,
  createWorkspace,
  removeWorkspace,
  resetPlaywrightMocks,
  setupPlaywrightMocks,
} from "./helpers/fake-browser.js";

let workspace: string;

const prepare = async (options: FakeBrowserOptions = {}) => {
  const mocks = setupPlaywrightMocks(options);
  const core = await import("../src/index.js");
  const config = buildTestConfig();
  const store = new core.ArtifactStore(config.storage, workspace);
  await store.reset();
  const session = new core.CaptureSession({ launch: config.launch, context: config.context });
  return { ...mocks, core, config, store, session };
};

beforeEach(async () => {
  vi.resetModules();
  workspace = await createWorkspace();
});

afterEach(async () => {
  resetPlaywrightMocks();
  vi.resetModules();
  await removeWorkspace(workspace);
});

describe("sampleSettleDelay", () => {
  it("interpolates inside the range", async () => {
    setupPlaywrightMocks();
    const { sampleSettleDelay } = await import("../src/index.js");

    expect(sampleSettleDelay({ min: 2_000, max: 4_000 }, () => 0)).toBe(2_000);
    expect(sampleSettleDelay({ min: 2_000, max: 4_000 }, () => 0.25)).toBe(2_500);
    expect(sampleSettleDelay({ min: 2_000, max: 4_000 }, () => 1)).toBe(4_000);
  });
});

describe("classifyFailure", () => {
  it("maps each error class to its failure kind", async () => {
    setupPlaywrightMocks();
    const core = await import("../src/index.js");

    expect(core.classifyFailure(new core.ContextCreationError("x"))).toBe("context");
    expect(core.classifyFailure(new core.NavigationTimeoutError("x", "https://a.test"))).toBe(
      "navigation-timeout",
    );
    expect(core.classifyFailure(new core.NavigationError("x", "https://a.test"))).toBe(
      "navigation",
    );
    expect(core.classifyFailure(new core.CaptureError("x"))).toBe("capture");
    expect(core.classifyFailure(new Error("x"))).toBe("unexpected");
  });
});

describe("runCaptureTask", () => {
  it("navigates, settles and writes a full-page screenshot", async () => {
    const { core, config, store, session, pages, contexts } = await prepare();
    await session.start();
    const phases: string[] = [];

    const outcome = await core.runCaptureTask(
      session,
      "https://example.com/docs",
      { index: 3, total: 5 },
      {
        store,
        timings: { ...config.timings, settleDelayMs: { min: 2_000, max: 4_000 } },
        random: () => 0.5,
        reportPhase: (phase) => {
          phases.push(phase);
        },
      },
    );

    const artifactPath = join(workspace, "screenshots", "3_example.com_docs.png");
    expect(outcome).toMatchObject({
      status: "success",
      address: "https://example.com/docs",
      index: 3,
      artifactName: "3_example.com_docs.png",
      artifactPath,
    });
    expect(Object.isFrozen(outcome)).toBe(true);
    expect(phases).toEqual(["navigating", "settling", "capturing"]);

    const page = pages[0];
    expect(page?.goto).toHaveBeenCalledWith("https://example.com/docs", {
      timeout: 1_000,
      waitUntil: "domcontentloaded",
    });
    expect(page?.waitForTimeout.mock.calls[0]).toEqual([3_000]);
    expect(page?.screenshot).toHaveBeenCalledWith({
      path: artifactPath,
      fullPage: true,
      type: "png",
    });
    expect(await store.listArtifacts()).toEqual(["3_example.com_docs.png"]);
    expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
  });

  it("aborts heavy media requests and lets the rest through", async () => {
    const { core, config, store, session, contexts } = await prepare();
    await session.start();

    await core.runCaptureTask(session, "https://example.com", { index: 1, total: 1 }, {
      store,
      timings: config.timings,
    });

    const [pattern, handler] = contexts[0]?.route.mock.calls[0] ?? [];
    expect(pattern).toBe("**/*");
    if (typeof handler !== "function") {
      throw new Error("Expected a route handler");
    }

    const routeFor = (url: string) => ({
      request: () => ({ url: () => url }),
      abort: vi.fn().mockResolvedValue(undefined),
      continue: vi.fn().mockResolvedValue(undefined),
    });

    const image = routeFor("https://example.com/hero.webp");
    await handler(image);
    expect(image.abort).toHaveBeenCalledTimes(1);
    expect(image.continue).not.toHaveBeenCalled();

    const script = routeFor("https://example.com/app.js");
    await handler(script);
    expect(script.continue).toHaveBeenCalledTimes(1);
    expect(script.abort).not.toHaveBeenCalled();
  });

  it("records navigation failures with the first line of the error", async () => {
    const { core, config, store, session, contexts } = await prepare({
      goto: async () => {
        throw new Error("page.goto: net::ERR_NAME_NOT_RESOLVED at https://invalid.test/\nCall log:");
      },
    });
    await session.start();

    const outcome = await core.runCaptureTask(session, "https://invalid.test", { index: 2, total: 2 }, {
      store,
      timings: config.timings,
    });

    expect(outcome).toMatchObject({
      status: "failure",
      address: "https://invalid.test",
      index: 2,
      errorKind: "navigation",
      errorSummary: "page.goto: net::ERR_NAME_NOT_RESOLVED at https://invalid.test/",
    });
    expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
    expect(await store.listArtifacts()).toEqual([]);
  });

  it("distinguishes navigation timeouts", async () => {
    const { core, config, store, session } = await prepare({
      goto: async () => {
        const error = new Error("page.goto: Timeout 1000ms exceeded.");
        error.name = "TimeoutError";
        throw error;
      },
    });
    await session.start();

    const outcome = await core.runCaptureTask(session, "https://slow.test", { index: 1, total: 1 }, {
      store,
      timings: config.timings,
    });

    expect(outcome).toMatchObject({
      status: "failure",
      errorKind: "navigation-timeout",
      errorSummary: "page.goto: Timeout 1000ms exceeded.",
    });
  });

  it("keeps DNS failures on hosts named after timeouts as navigation errors", async () => {
    const { core, config, store, session } = await prepare({
      goto: async () => {
        throw new Error("page.goto: net::ERR_NAME_NOT_RESOLVED at https://timeout.invalid/");
      },
    });
    await session.start();

    const outcome = await core.runCaptureTask(session, "https://timeout.invalid", { index: 1, total: 1 }, {
      store,
      timings: config.timings,
    });

    expect(outcome).toMatchObject({
      status: "failure",
      errorKind: "navigation",
      errorSummary: "page.goto: net::ERR_NAME_NOT_RESOLVED at https://timeout.invalid/",
    });
  });

  it("records screenshot failures as capture errors", async () => {
    const { core, config, store, session } = await prepare({
      screenshot: async () => {
        throw new Error("Target page, context or browser has been closed");
      },
    });
    await session.start();

    const outcome = await core.runCaptureTask(session, "https://example.com", { index: 1, total: 1 }, {
      store,
      timings: config.timings,
    });

    expect(outcome).toMatchObject({
      status: "failure",
      errorKind: "capture",
      errorSummary: "Target page, context or browser has been closed",
    });
  });

  it("records a context failure when the session is not running", async () => {
    const { core, config, store, session, contexts } = await prepare();

    const outcome = await core.runCaptureTask(session, "https://example.com", { index: 1, total: 1 }, {
      store,
      timings: config.timings,
    });

    expect(outcome).toMatchObject({
      status: "failure",
      errorKind: "context",
      errorSummary: "Cannot create a browsing context: session is unstarted",
    });
    expect(contexts).toHaveLength(0);
  });

  it("ignores errors thrown by the phase reporter", async () => {
    const { core, config, store, session } = await prepare();
    await session.start();

    const outcome = await core.runCaptureTask(session, "https://example.com", { index: 1, total: 1 }, {
      store,
      timings: config.timings,
      reportPhase: () => {
        throw new Error("listener went away");
      },
    });

    expect(outcome.status).toBe("success");
  });
});
