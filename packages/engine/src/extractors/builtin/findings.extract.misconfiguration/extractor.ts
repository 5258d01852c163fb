import type {
  AnalysisWarning,
  MisconfigurationFinding
} from "../../../../../shared/src/contracts";
import type { TextDocument } from "../../../../../core/src/artifacts";
import type { ExtractorExecution } from "../../../../../core/src/extractors";
import { IdAllocator, normalizeSeverity, optionalText, textOrUnknown } from "../../../analysis/severity";
import { DOCUMENT_SOURCES } from "../../../sources/loader";

export const CONTAINER_IMPACT_NOTE = "Container configuration weakens workload isolation";

export const PERMISSIVE_POLICY = {
  title: "Overly permissive network policy",
  description: "Network policy allows traffic from any source",
  resolution: "Restrict network policies to specific namespaces/services",
  impact: "Service reachable from unintended network sources"
} as const;

/** Coarse textual heuristic: both terms anywhere in the body, any order. */
export function isPermissivePolicy(content: string): boolean {
  const lower = content.toLowerCase();
  return lower.includes("allow") && lower.includes("any");
}

export const extract: ExtractorExecution["extract"] = (dataset, ctx) => {
  const findings: MisconfigurationFinding[] = [];
  const warnings: AnalysisWarning[] = [];
  const ids = new IdAllocator();
  let skipped = 0;

  for (const artifact of dataset.vulnerability_scan) {
    for (const entry of artifact.content.report.misconfigurations ?? []) {
      const normalized = normalizeSeverity(entry.severity, artifact.path);
      if (normalized.warning) {
        warnings.push(normalized.warning);
      }
      // Scanner misconfigurations are kept at high only; critical is not promoted.
      if (normalized.severity !== "high") {
        skipped += 1;
        continue;
      }

      const title = textOrUnknown(entry.title);
      const allocated = ids.allocate(optionalText(entry.id) ?? title, artifact.path);
      if (allocated.warning) {
        warnings.push(allocated.warning);
      }

      const resolution = optionalText(entry.resolution);
      findings.push({
        category: "misconfiguration",
        id: allocated.id,
        severity: normalized.severity,
        description: textOrUnknown(entry.message),
        ...(resolution ? { remediation_hint: resolution } : {}),
        impact_note: CONTAINER_IMPACT_NOTE,
        source_artifact: artifact.path,
        details: { kind: "container_misconfiguration", title }
      });
    }
  }

  const policies = selectPolicies(dataset.network_policies, ctx.target_service, ctx.scope_policies_to_target);
  for (const policy of policies) {
    if (!isPermissivePolicy(policy.content)) {
      continue;
    }
    const sourcePath = `${DOCUMENT_SOURCES.network_policies.dir}/${policy.filename}`;
    const allocated = ids.allocate(`network_policy:${policy.filename}`, sourcePath);
    if (allocated.warning) {
      warnings.push(allocated.warning);
    }
    findings.push({
      category: "misconfiguration",
      id: allocated.id,
      severity: "high",
      description: PERMISSIVE_POLICY.description,
      remediation_hint: PERMISSIVE_POLICY.resolution,
      impact_note: PERMISSIVE_POLICY.impact,
      source_artifact: sourcePath,
      details: { kind: "network_policy", title: PERMISSIVE_POLICY.title }
    });
  }

  return {
    findings,
    warnings,
    logs: [
      {
        level: "info",
        message: "misconfiguration extraction complete",
        data: { kept: findings.length, skipped, policies_scanned: policies.length }
      }
    ]
  };
};

function selectPolicies(
  documents: TextDocument[],
  targetService: string,
  scopeToTarget?: boolean
): TextDocument[] {
  if (!scopeToTarget) {
    return documents;
  }
  return documents.filter((document) => document.filename.includes(targetService));
}
