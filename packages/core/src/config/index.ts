import { z } from "zod";

/**
 * Accept common textual boolean representations so collaborators can set env
 * vars without memorising exact casing.
 */
const booleanLike = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    if (["1", "true", "yes", "on"].includes(value)) return true;
    if (["0", "false", "no", "off", ""].includes(value)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid boolean string: ${value}`,
    });
    return z.NEVER;
  });

const booleanFromEnv = z.boolean().or(booleanLike);

const durationMs = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).catch(fallback);

/**
 * Central definition of runtime settings. Defaults reproduce the capture
 * constants the tool has always shipped with, so an empty environment yields
 * a 1920x1080 headless run with a 60s navigation cap.
 */
const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .catch("development"),
    LOG_LEVEL: z
      .enum(["debug", "info", "warn", "error", "silent"])
      .catch("info"),
    CAPTURE_HEADLESS: booleanFromEnv.catch(true),
    CAPTURE_DISABLE_AUTOMATION_FLAGS: booleanFromEnv.catch(true),
    CAPTURE_DISABLE_SANDBOX: booleanFromEnv.catch(true),
    CAPTURE_LAUNCH_TIMEOUT_MS: durationMs(1_000, 120_000, 30_000),
    CAPTURE_VIEWPORT_WIDTH: z.coerce
      .number()
      .int()
      .min(320)
      .max(4096)
      .catch(1920),
    CAPTURE_VIEWPORT_HEIGHT: z.coerce
      .number()
      .int()
      .min(320)
      .max(4096)
      .catch(1080),
    CAPTURE_NAVIGATION_TIMEOUT_MS: durationMs(1_000, 300_000, 60_000),
    CAPTURE_SETTLE_DELAY_MIN_MS: durationMs(0, 60_000, 2_000),
    CAPTURE_SETTLE_DELAY_MAX_MS: durationMs(0, 60_000, 4_000),
    CAPTURE_SCROLL_PAUSE_MS: durationMs(0, 10_000, 1_000),
    CAPTURE_MAX_SCROLL_ITERATIONS: z.coerce
      .number()
      .int()
      .min(1)
      .max(200)
      .catch(30),
    CAPTURE_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(50).catch(10),
    CAPTURE_MAX_ADDRESSES_PER_BATCH: z.coerce
      .number()
      .int()
      .min(1)
      .max(100)
      .catch(10),
    CAPTURE_ARTIFACT_DIR: z.string().trim().min(1).catch("screenshots"),
    CAPTURE_ARCHIVE_DIR: z.string().trim().min(1).catch("zip_files"),
    CAPTURE_ARCHIVE_NAME: z
      .string()
      .trim()
      .regex(/^[\w.-]+\.zip$/)
      .catch("screenshots.zip"),
    CAPTURE_GENERATED_USER_AGENTS: z.coerce
      .number()
      .int()
      .min(0)
      .max(20)
      .catch(0),
    CHROMIUM_BINARY: z.string().trim().min(1).optional(),
  })
  .passthrough();

export type RuntimeEnv = z.infer<typeof envSchema>;

let cachedEnv: RuntimeEnv | null = null;

export const getEnv = (): RuntimeEnv => {
  if (!cachedEnv) {
    cachedEnv = envSchema.parse(process.env);
  }
  return cachedEnv;
};

/**
 * Drop the cached environment so the next {@link getEnv} call re-reads
 * `process.env`.
 */
export const resetEnvCache = () => {
  cachedEnv = null;
};

export const isProduction = () => getEnv().NODE_ENV === "production";

export interface LaunchConfig {
  headless: boolean;
  /** Adds `--disable-blink-features=AutomationControlled`. */
  disableAutomationFlags: boolean;
  /** Adds `--no-sandbox`; required when running as root in containers. */
  disableSandbox: boolean;
  launchTimeoutMs: number;
  /** Explicit Chromium binary; otherwise resolved at launch time. */
  executablePath?: string;
}

export interface ViewportSize {
  width: number;
  height: number;
}

export interface ContextConfig {
  viewport: ViewportSize;
  javaScriptEnabled: boolean;
  ignoreHTTPSErrors: boolean;
}

export interface TaskTimings {
  navigationTimeoutMs: number;
  settleDelayMs: { min: number; max: number };
  scrollPauseMs: number;
  maxScrollIterations: number;
}

export interface StorageConfig {
  artifactDir: string;
  archiveDir: string;
  archiveName: string;
}

/**
 * Every option the capture engine recognises. Components receive the slice
 * they need instead of reading the environment themselves.
 */
export interface CaptureConfig {
  launch: LaunchConfig;
  context: ContextConfig;
  timings: TaskTimings;
  storage: StorageConfig;
  maxConcurrency: number;
  maxAddressesPerBatch: number;
  generatedUserAgents: number;
}

export const buildCaptureConfig = (env: RuntimeEnv = getEnv()): CaptureConfig => {
  const settleMin = Math.min(
    env.CAPTURE_SETTLE_DELAY_MIN_MS,
    env.CAPTURE_SETTLE_DELAY_MAX_MS,
  );
  const settleMax = Math.max(
    env.CAPTURE_SETTLE_DELAY_MIN_MS,
    env.CAPTURE_SETTLE_DELAY_MAX_MS,
  );

  return {
    launch: {
      headless: env.CAPTURE_HEADLESS,
      disableAutomationFlags: env.CAPTURE_DISABLE_AUTOMATION_FLAGS,
      disableSandbox: env.CAPTURE_DISABLE_SANDBOX,
      launchTimeoutMs: env.CAPTURE_LAUNCH_TIMEOUT_MS,
      executablePath: env.CHROMIUM_BINARY,
    },
    context: {
      viewport: {
        width: env.CAPTURE_VIEWPORT_WIDTH,
        height: env.CAPTURE_VIEWPORT_HEIGHT,
      },
      javaScriptEnabled: true,
      ignoreHTTPSErrors: true,
    },
    timings: {
      navigationTimeoutMs: env.CAPTURE_NAVIGATION_TIMEOUT_MS,
      settleDelayMs: { min: settleMin, max: settleMax },
      scrollPauseMs: env.CAPTURE_SCROLL_PAUSE_MS,
      maxScrollIterations: env.CAPTURE_MAX_SCROLL_ITERATIONS,
    },
    storage: {
      artifactDir: env.CAPTURE_ARTIFACT_DIR,
      archiveDir: env.CAPTURE_ARCHIVE_DIR,
      archiveName: env.CAPTURE_ARCHIVE_NAME,
    },
    maxConcurrency: env.CAPTURE_MAX_CONCURRENCY,
    maxAddressesPerBatch: env.CAPTURE_MAX_ADDRESSES_PER_BATCH,
    generatedUserAgents: env.CAPTURE_GENERATED_USER_AGENTS,
  };
};
