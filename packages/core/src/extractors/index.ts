export type {
  ExtractionResult,
  ExtractorContext,
  ExtractorExecution,
  ExtractorLogEntry,
  ExtractorLogLevel,
  ExtractorManifest
} from "./types";
export { validateExtractionResult, validateManifest } from "./validation";
