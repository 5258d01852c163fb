import type {
  AnalysisWarning,
  ApplicationErrorFinding,
  ApplicationErrorKind,
  Severity
} from "../../../../../shared/src/contracts";
import type { ExtractorExecution } from "../../../../../core/src/extractors";
import { IdAllocator } from "../../../analysis/severity";
import { DOCUMENT_SOURCES } from "../../../sources/loader";

type MarkerRule = {
  kind: ApplicationErrorKind;
  marker: string;
  severity: Severity;
  description: string;
  impact: string;
  matches: (content: string, lower: string) => boolean;
};

export const MARKER_RULES: MarkerRule[] = [
  {
    kind: "http_error",
    marker: "405",
    severity: "medium",
    description: "Method Not Allowed error detected",
    impact: "API authentication/authorization issue",
    matches: (content, lower) => content.includes("405") && lower.includes("method not allowed")
  },
  {
    kind: "pod_failure",
    marker: "CrashLoopBackOff",
    severity: "high",
    description: "Pod repeatedly crashing",
    impact: "Application stability issue",
    matches: (_content, lower) => lower.includes("crashloopbackoff")
  }
];

export const extract: ExtractorExecution["extract"] = (dataset) => {
  const findings: ApplicationErrorFinding[] = [];
  const warnings: AnalysisWarning[] = [];
  const ids = new IdAllocator();

  for (const document of dataset.logs) {
    const lower = document.content.toLowerCase();
    const sourcePath = `${DOCUMENT_SOURCES.logs.dir}/${document.filename}`;
    for (const rule of MARKER_RULES) {
      if (!rule.matches(document.content, lower)) {
        continue;
      }
      const allocated = ids.allocate(`${rule.marker}:${document.filename}`, sourcePath);
      if (allocated.warning) {
        warnings.push(allocated.warning);
      }
      findings.push({
        category: "application_error",
        id: allocated.id,
        severity: rule.severity,
        description: rule.description,
        impact_note: rule.impact,
        source_artifact: sourcePath,
        details: { kind: rule.kind, marker: rule.marker }
      });
    }
  }

  return {
    findings,
    warnings,
    logs: [
      {
        level: "info",
        message: "log scan complete",
        data: { documents: dataset.logs.length, matches: findings.length }
      }
    ]
  };
};
