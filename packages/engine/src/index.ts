export { Engine, type Clock, type EngineOptions } from "./engine";
export {
  DEFAULT_LOAD_TIMEOUT_MS,
  DEFAULT_TARGET_SERVICE,
  loadConfigFromEnv,
  type EngineConfig,
  type LogLevel
} from "./config";
export {
  ConfigError,
  EngineError,
  ExtractorNotFoundError,
  InvariantViolationError,
  MalformedArtifactError,
  NotFoundError,
  ValidationError
} from "./errors";
export { Logger } from "./logger";
export { loadSourceDataset, type SourceLoadResult } from "./sources/loader";
export { createBuiltinRegistry, listBuiltinExtractors } from "./extractors/builtin";
export {
  StaticExtractorRegistry,
  type ExtractorDefinition,
  type ExtractorRegistry
} from "./extractors/registry";
export { runExtractor } from "./extractors/runner";
export { buildAnalysisResult, groupFindings } from "./analysis/aggregator";
export { correlate } from "./analysis/correlator";
export { plan } from "./analysis/planner";
export { levelForScore, score } from "./analysis/scorer";
export { normalizeSeverity } from "./analysis/severity";
export {
  buildMarkdownReport,
  renderHtmlReport,
  renderJsonReport,
  type ReportFormat
} from "./report";
