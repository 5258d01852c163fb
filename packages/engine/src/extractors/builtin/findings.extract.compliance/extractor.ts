import type {
  AnalysisWarning,
  ComplianceFinding
} from "../../../../../shared/src/contracts";
import type { ExtractorExecution } from "../../../../../core/src/extractors";
import {
  IdAllocator,
  isHighOrCritical,
  normalizeSeverity,
  optionalText,
  textOrUnknown
} from "../../../analysis/severity";

export const IMPACT_NOTE = "Kubernetes security compliance violation";

export const extract: ExtractorExecution["extract"] = (dataset) => {
  const findings: ComplianceFinding[] = [];
  const warnings: AnalysisWarning[] = [];
  const ids = new IdAllocator();
  let skipped = 0;

  for (const artifact of dataset.compliance_benchmark) {
    for (const check of artifact.content.report.failed_checks_details ?? []) {
      const normalized = normalizeSeverity(check.severity, artifact.path);
      if (normalized.warning) {
        warnings.push(normalized.warning);
      }
      if (!isHighOrCritical(normalized.severity)) {
        skipped += 1;
        continue;
      }

      const allocated = ids.allocate(textOrUnknown(check.id), artifact.path);
      if (allocated.warning) {
        warnings.push(allocated.warning);
      }

      const remediation = optionalText(check.remediation);
      findings.push({
        category: "compliance",
        id: allocated.id,
        severity: normalized.severity,
        description: textOrUnknown(check.description),
        ...(remediation ? { remediation_hint: remediation } : {}),
        impact_note: IMPACT_NOTE,
        source_artifact: artifact.path
      });
    }
  }

  return {
    findings,
    warnings,
    logs: [
      {
        level: "info",
        message: "compliance extraction complete",
        data: { kept: findings.length, skipped }
      }
    ]
  };
};
