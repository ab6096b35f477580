export * from "./types";
export * from "./errors";
export { getLogger } from "./logger";
export type { BaseCtx, Level, LogCtx, LogOptions, Logger } from "./logger";
export { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from "./config";
export type { EngineConfig } from "./config";

export * from "./layout/geometry";
export {
  blocksByType,
  blocksInBox,
  blocksInColumn,
  blocksInRow,
  blocksNear,
  blocksOnPage,
  computeLayoutHash,
  createLayout,
  findRegex,
  findText,
  findTextExact,
  inferBlockType,
  isLikelyHeader,
  isNumericText,
  layoutText,
} from "./layout/document";
export type { CreateLayoutOptions } from "./layout/document";

export { checkProcessorIntegrity, parseLayout, parseProcessor, serializeProcessor } from "./processors/schema";
export { parseSource } from "./processors/source";
export type { SourceRef } from "./processors/source";
export { matchProcessor } from "./processors/routing";
export type { ProcessorMatch } from "./processors/routing";

export { ProcessorExecutor } from "./engine/executor";
export type { ExecutorOptions } from "./engine/executor";
export { findAnchorBlock, resolveAnchors } from "./engine/anchors";
export type { AnchorMap } from "./engine/anchors";
export { resolveRegions } from "./engine/regions";
export type { RegionMap } from "./engine/regions";
export { createTree, readPath, treeToData, writePath } from "./engine/tree";
export type { DataNode, MapNode } from "./engine/tree";
export { parseFormula, evaluateFormula } from "./calc/formula";
export { validate } from "./validation/validator";
export { parsePredicate } from "./validation/predicate";

export * from "./ingest/index";
