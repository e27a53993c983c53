export { BatchJob, createBatchId } from "./batch.js";
export type { BatchOptions } from "./batch.js";
export {
  ClaimedNames,
  isCaseInsensitiveDir,
  resolveCollision,
  seedClaimedNames,
  withSuffix,
} from "./collision.js";
export { configSchema, defaultConfig, loadConfig, parseConfig } from "./config.js";
export type { Config, ConfigInput } from "./config.js";
export {
  FilenameDescriptionClient,
  VisionDescriptionClient,
  createDescriptionClient,
  parseDescriptionResponse,
} from "./describer.js";
export type { DescriptionClient } from "./describer.js";
export * from "./errors.js";
export { BackupLedger } from "./ledger.js";
export type { BatchListing, UndoOptions, UndoResult } from "./ledger.js";
export { buildFieldMap, formatDate, planNames } from "./renamer.js";
export { nextRetryStep, withRetry } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { scanMedia } from "./scan.js";
export { SequenceRegistry, formatCounter, scopeKeyFor } from "./sequence.js";
export { expandTemplate, parsePattern, sanitizeFilename, validatePattern } from "./template.js";
export type * from "./types.js";
export { extractFrame, getVideoDuration, middleFrameExtractor } from "./video-frame.js";
export type { FrameExtractor } from "./video-frame.js";
