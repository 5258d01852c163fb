import type {
  AnalysisWarning,
  Finding,
  FindingCategory,
  SourceKind
} from "../../../shared/src/contracts";
import type { SourceDataset } from "../artifacts";

export type ExtractorLogLevel = "debug" | "info" | "warn" | "error";

export interface ExtractorManifest {
  id: string;
  name: string;
  description: string;
  category: FindingCategory;
  version: string;
  sources: SourceKind[];
  tags?: string[];
}

export interface ExtractorLogEntry {
  level: ExtractorLogLevel;
  message: string;
  data?: unknown;
}

export interface ExtractionResult {
  findings: Finding[];
  logs: ExtractorLogEntry[];
  warnings: AnalysisWarning[];
}

export interface ExtractorContext {
  target_service: string;
  /** Only scan network-policy documents whose filename names the target service. */
  scope_policies_to_target?: boolean;
}

export interface ExtractorExecution {
  extract: (dataset: SourceDataset, ctx: ExtractorContext) => ExtractionResult;
}
