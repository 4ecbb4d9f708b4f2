// packages/check-engine/src/index.ts
//
// Public surface of the check engine.

export {
  ConnectionTimeoutError,
  ConnectionError,
  AttributeResolutionError,
  ResultKeyError,
  ToolResultError,
  ReductionError,
  ConfigError,
  isDisconnectError,
  describeError,
} from "./errors";
export {
  SEVERITIES,
  severityRank,
  maxSeverity,
  minSeverity,
  combineSeverity,
  resultFromError,
  type FoldInput,
} from "./severity";
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig, type EngineConfig } from "./config";
export { createLogger, silentLogger, type Logger } from "./log";
export { DEFAULT_REDUCE_METHOD, isNoData, reduceSamples } from "./reduce";
export { DataCache, type DataCacheOptions, type SignalReadOptions } from "./cache";
export { SchemaTool, ToolResultBundle, getResultValueByKey, schemaHasKey } from "./tools";
export {
  PreparedComparison,
  PreparedSignalComparison,
  PreparedToolComparison,
  comparisonLabel,
  resolveComponent,
  type BindOptions,
  type ComparisonParent,
} from "./comparison";
export { runComparisons, runBounded, laneLimit, getResultFromComparison, type RunOptions } from "./execute";
export {
  PREPARE_FAILURE_REASON,
  PreparedGroup,
  PreparedDeviceConfiguration,
  PreparedPointConfiguration,
  PreparedToolConfiguration,
  prepareConfiguration,
  type AnyPreparedConfiguration,
  type CompareOptions,
  type FailedConfiguration,
  type PrepareContext,
  type PreparedCheckNode,
  type WalkedComparison,
} from "./prepared";
export {
  PreparedFile,
  walkConfigs,
  walkFileConfigs,
  getByDevice,
  getByPoint,
  getByTag,
  type PrepareFileOptions,
} from "./file";
export { pathOf, listLeafResults, formatLeafResults, type LeafResultRow } from "./report";
