// Main entry point for @view-extract/core

// --- Search ---
export { firstMatch, locate } from "./locate";
export { intersects, rect, standardizeRect } from "./rect";
// --- Extraction ---
export type { ExtractorOptions } from "./extractor";
export { Extractor } from "./extractor";
export { ManualScheduler, nextTask } from "./scheduler";
// --- DOM ---
export { domTree } from "./dom";
// --- Logging / errors ---
export type { Logger, LoggerOptions } from "./logger";
export { createLogger } from "./logger";
export type { ExtractErrorCode } from "./errors";
export { ExtractError } from "./errors";
// --- Types ---
export type {
  ExtractResult,
  MatchHandler,
  MissCode,
  NativeTree,
  NodeType,
  Rect,
  Scheduler,
} from "./types";
