import type {
  Correlation,
  CorrelationKind,
  FindingCategory,
  FindingsByCategory
} from "../../../shared/src/contracts";

/** Finding categories a correlation kind draws its related ids from. */
export const CORRELATION_CATEGORIES: Record<CorrelationKind, FindingCategory[]> = {
  vulnerability_dependency_link: ["vulnerability", "dependency"],
  compliance_configuration_link: ["compliance", "misconfiguration"],
  network_error_link: ["application_error", "misconfiguration"]
};

/**
 * Derives cross-category links. Only the vulnerability/dependency rule matches
 * on a shared identifier (the package name); the other two are co-occurrence
 * signals and say nothing about causality.
 *
 * Output order is fixed: vulnerability_dependency_link,
 * compliance_configuration_link, network_error_link.
 */
export function correlate(findings: FindingsByCategory): Correlation[] {
  const correlations: Correlation[] = [];

  const vulnerablePackages = new Set(findings.vulnerability.map((finding) => finding.details.package));
  const dependencyPackages = new Set(findings.dependency.map((finding) => finding.details.package));
  const shared = [...vulnerablePackages].filter((pkg) => dependencyPackages.has(pkg)).sort();
  if (shared.length > 0) {
    const sharedSet = new Set(shared);
    correlations.push({
      kind: "vulnerability_dependency_link",
      description: `Vulnerable packages found in SBOM: ${shared.join(", ")}`,
      impact_note: "Direct security vulnerability in application dependencies",
      related_finding_ids: uniqueIds([
        ...findings.vulnerability
          .filter((finding) => sharedSet.has(finding.details.package))
          .map((finding) => finding.id),
        ...findings.dependency
          .filter((finding) => sharedSet.has(finding.details.package))
          .map((finding) => finding.id)
      ])
    });
  }

  if (findings.compliance.length > 0 && findings.misconfiguration.length > 0) {
    correlations.push({
      kind: "compliance_configuration_link",
      description: "CIS compliance failures related to container and network misconfigurations",
      impact_note: "Infrastructure security posture compromised",
      related_finding_ids: uniqueIds([
        ...findings.compliance.map((finding) => finding.id),
        ...findings.misconfiguration.map((finding) => finding.id)
      ])
    });
  }

  const networkPolicies = findings.misconfiguration.filter(
    (finding) => finding.details.kind === "network_policy"
  );
  if (findings.application_error.length > 0 && networkPolicies.length > 0) {
    correlations.push({
      kind: "network_error_link",
      description: "Application errors potentially caused by restrictive network policies",
      impact_note: "Service availability affected by security controls",
      related_finding_ids: uniqueIds([
        ...findings.application_error.map((finding) => finding.id),
        ...networkPolicies.map((finding) => finding.id)
      ])
    });
  }

  return correlations;
}

function uniqueIds(ids: string[]): string[] {
  return [...new Set(ids)];
}
