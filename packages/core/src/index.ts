export {
  buildCaptureConfig,
  getEnv,
  isProduction,
  resetEnvCache,
  type CaptureConfig,
  type ContextConfig,
  type LaunchConfig,
  type RuntimeEnv,
  type StorageConfig,
  type TaskTimings,
} from "./config/index.js";
export { describeError, logger } from "./logger.js";
export * from "./errors.js";
export { HEAVY_MEDIA_EXTENSIONS, isHeavyMedia, shouldAbortRequest } from "./capture-filters.js";
export {
  normalizeAddress,
  normalizeAddressList,
  parsePastedAddresses,
  type AddressListResult,
} from "./core/jobs/address.js";
export { buildArtifactName, sanitizeAddress } from "./core/jobs/artifact-name.js";
export {
  CaptureSession,
  buildContextOptions,
  buildLaunchArgs,
  buildLaunchOptions,
  createCaptureSession,
  verifyCaptureSession,
  type CaptureSessionOptions,
  type SessionState,
} from "./core/capture/session.js";
export { DEFAULT_USER_AGENTS, buildUserAgentPool, pickUserAgent } from "./core/capture/user-agents.js";
export {
  settleLazyContent,
  type ScrollablePage,
  type SettleOptions,
  type SettleReport,
} from "./core/capture/settle.js";
export {
  classifyFailure,
  runCaptureTask,
  sampleSettleDelay,
  type CaptureTaskOptions,
} from "./core/capture/task.js";
export { AsyncChannel } from "./core/batch/channel.js";
export { createTaskLimiter, type TaskLimiter } from "./core/batch/pool.js";
export {
  BatchCoordinator,
  sessionFromConfig,
  type BatchCoordinatorOptions,
} from "./core/batch/coordinator.js";
export {
  NO_ARTIFACTS_WARNING,
  ResultAggregator,
  formatLogLine,
} from "./core/batch/aggregator.js";
export { ArtifactStore } from "./core/artifacts/store.js";
export { packageArtifactDirectory } from "./core/artifacts/archive.js";
export type * from "./types/index.js";
