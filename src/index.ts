export * from "./core/model/types";
export {
  RobotDiffError,
  ParseError,
  UnsupportedElementError,
  FormatDetectionError,
  ComparisonScopeError,
  type RobotDiffErrorCode,
} from "./core/model/errors";
export type { FormatAdapter, ModelSource } from "./core/adapters/types";
export { adapterStore, detectFormat, getAdapter, isModelFormat, registerCoreAdapters } from "./core/adapters/registry";
export { parseUrdfString, urdfAdapter } from "./core/adapters/urdf/urdfAdapter";
export { parseSdfString, sdfAdapter } from "./core/adapters/sdf/sdfAdapter";
export { parseMjcfString, mjcfAdapter } from "./core/adapters/mjcf/mjcfAdapter";
export { parseUsdString, usdAdapter } from "./core/adapters/usd/usdAdapter";
export { loadUsdLayers } from "./core/adapters/usd/usdLayers";
export { alignModels, type Alignment, type EntityPair, type Renames } from "./core/align/alignment";
export { diffAligned, type DiffSettings, type MeshReferenceMode, type ToleranceMode } from "./core/diff/diffEngine";
export { isFieldCategory, resolveOptions, type CompareOptions, type ResolvedOptions } from "./core/compare/options";
export { compare, compareModels, compareSources, exitCodeFor, type CompareResult } from "./core/compare/compare";
export { renderReport, type RenderOptions, type ReportLayout } from "./core/report/renderReport";
export {
  addLogSink,
  formatLogLine,
  log,
  logDebug,
  logError,
  logInfo,
  logWarn,
  scopedLogger,
  type LogOptions,
  type LogScope,
  type LogSink,
  type ScopedLogger,
} from "./core/services/logger";
export { consoleStore, selectEntries, type LogEntry, type LogFilter, type LogLevel } from "./core/store/consoleStore";
