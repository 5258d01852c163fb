import type {
  AnalysisWarning,
  VulnerabilityFinding
} from "../../../../../shared/src/contracts";
import type { ExtractorExecution } from "../../../../../core/src/extractors";
import {
  IdAllocator,
  isHighOrCritical,
  normalizeSeverity,
  numberOrZero,
  textOrUnknown
} from "../../../analysis/severity";

export const IMPACT_NOTE = "Container security vulnerability";

export const extract: ExtractorExecution["extract"] = (dataset) => {
  const findings: VulnerabilityFinding[] = [];
  const warnings: AnalysisWarning[] = [];
  const ids = new IdAllocator();
  let skipped = 0;

  for (const artifact of dataset.vulnerability_scan) {
    for (const entry of artifact.content.report.findings ?? []) {
      const normalized = normalizeSeverity(entry.severity, artifact.path);
      if (normalized.warning) {
        warnings.push(normalized.warning);
      }
      if (!isHighOrCritical(normalized.severity)) {
        skipped += 1;
        continue;
      }

      const pkg = textOrUnknown(entry.package_name);
      const allocated = ids.allocate(textOrUnknown(entry.vulnerability_id), artifact.path, pkg);
      if (allocated.warning) {
        warnings.push(allocated.warning);
      }

      findings.push({
        category: "vulnerability",
        id: allocated.id,
        severity: normalized.severity,
        description: textOrUnknown(entry.description),
        impact_note: IMPACT_NOTE,
        source_artifact: artifact.path,
        details: {
          package: pkg,
          cvss_score: numberOrZero(entry.cvss_score)
        }
      });
    }
  }

  return {
    findings,
    warnings,
    logs: [
      {
        level: "info",
        message: "vulnerability extraction complete",
        data: { kept: findings.length, skipped }
      }
    ]
  };
};
