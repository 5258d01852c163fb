import type {
  AnalysisWarning,
  DependencyFinding
} from "../../../../../shared/src/contracts";
import type { ExtractorExecution } from "../../../../../core/src/extractors";
import { IdAllocator, normalizeSeverity, optionalText, textOrUnknown } from "../../../analysis/severity";

export const IMPACT_NOTE = "Vulnerable third-party component in the application build";

export const extract: ExtractorExecution["extract"] = (dataset) => {
  const findings: DependencyFinding[] = [];
  const warnings: AnalysisWarning[] = [];
  const ids = new IdAllocator();

  for (const artifact of dataset.sbom) {
    const vulnerabilities = artifact.content.vulnerabilities ?? [];
    const severities = vulnerabilities.map((vulnerability) => {
      const normalized = normalizeSeverity(vulnerability.severity, artifact.path);
      if (normalized.warning) {
        warnings.push(normalized.warning);
      }
      return normalized.severity;
    });

    for (const pkg of artifact.content.packages ?? []) {
      const spdxId = optionalText(pkg.SPDXID);
      if (!spdxId) {
        continue;
      }
      vulnerabilities.forEach((vulnerability, index) => {
        if (!affects(vulnerability.affectedPackages, spdxId)) {
          return;
        }
        const name = textOrUnknown(pkg.name);
        const version = textOrUnknown(pkg.versionInfo);
        const vulnerabilityName = textOrUnknown(vulnerability.name);
        const allocated = ids.allocate(
          `${name}@${version}:${vulnerabilityName}`,
          artifact.path,
          spdxId
        );
        if (allocated.warning) {
          warnings.push(allocated.warning);
        }
        findings.push({
          category: "dependency",
          id: allocated.id,
          severity: severities[index],
          description: `${name} ${version} is affected by ${vulnerabilityName}`,
          impact_note: IMPACT_NOTE,
          source_artifact: artifact.path,
          details: {
            package: name,
            version,
            vulnerability: vulnerabilityName,
            license: textOrUnknown(pkg.licenseConcluded)
          }
        });
      });
    }
  }

  return {
    findings,
    warnings,
    logs: [
      {
        level: "info",
        message: "dependency extraction complete",
        data: { pairs: findings.length }
      }
    ]
  };
};

function affects(affectedPackages: unknown, spdxId: string): boolean {
  return (
    Array.isArray(affectedPackages) &&
    affectedPackages.some((entry) => optionalText(entry) === spdxId)
  );
}
