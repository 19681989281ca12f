// @view-extract/react - React bindings for @view-extract/core

// --- Components ---
export { Extract, extract } from "./Extract";
export type { ExtractProps } from "./Extract";

// --- Hooks ---
export { useExtract } from "./useExtract";
export type { UseExtractOptions } from "./useExtract";

// --- Re-exports ---
export type { MatchHandler, NodeType, Scheduler } from "@view-extract/core";
export { ManualScheduler } from "@view-extract/core";
