import type {
  Correlation,
  CorrelationKind,
  Finding,
  FindingsByCategory,
  RemediationAction,
  RemediationBucket,
  RemediationPlan,
  RemediationPriority
} from "../../../shared/src/contracts";
import { InvariantViolationError } from "../errors";
import { CORRELATION_CATEGORIES } from "./correlator";
import { isHighOrCritical } from "./severity";

type ActionTemplate = {
  description: string;
  priority: RemediationPriority;
  estimated_effort: string;
  owner_role: string;
};

export const LONG_TERM_TEMPLATES: ActionTemplate[] = [
  {
    description: "Implement automated vulnerability scanning in CI/CD pipeline",
    priority: "medium",
    estimated_effort: "1-2 weeks",
    owner_role: "DevSecOps Team"
  },
  {
    description: "Establish CIS benchmark compliance monitoring",
    priority: "medium",
    estimated_effort: "1 week",
    owner_role: "Platform Team"
  },
  {
    description: "Implement SBOM generation and analysis in build process",
    priority: "low",
    estimated_effort: "2-3 weeks",
    owner_role: "Development Team"
  }
];

export const MONITORING_RECOMMENDATIONS = [
  "Implement continuous vulnerability scanning",
  "Set up CIS compliance monitoring alerts",
  "Monitor network policy violations",
  "Track application error rates and patterns",
  "Regular SBOM analysis and dependency updates"
];

const MONITORING_TEMPLATES: ActionTemplate[] = MONITORING_RECOMMENDATIONS.map((description) => ({
  description,
  priority: "low",
  estimated_effort: "ongoing",
  owner_role: "Operations Team"
}));

/**
 * Builds the four-bucket plan. Immediate and short-term actions come from
 * findings; long-term and monitoring actions are standing templates and are
 * tagged with a `template` origin.
 */
export function plan(findings: FindingsByCategory, correlations: Correlation[]): RemediationPlan {
  const kindsFor = correlationKindsFor(correlations);
  const result: RemediationPlan = {
    immediate: [],
    short_term: [],
    long_term: LONG_TERM_TEMPLATES.map((template) => fromTemplate(template, "long_term")),
    monitoring: MONITORING_TEMPLATES.map((template) => fromTemplate(template, "monitoring"))
  };

  for (const finding of findings.vulnerability) {
    if (!isHighOrCritical(finding.severity)) {
      continue;
    }
    result.immediate.push(
      fromFinding(finding, "immediate", kindsFor(finding), {
        description: `Update ${finding.details.package} to fix ${finding.id}`,
        priority: "critical",
        estimated_effort: "2-4 hours",
        owner_role: "DevSecOps Team"
      })
    );
  }

  for (const finding of findings.compliance) {
    if (!isHighOrCritical(finding.severity)) {
      continue;
    }
    result.immediate.push(
      fromFinding(finding, "immediate", kindsFor(finding), {
        description: finding.remediation_hint ?? `Resolve compliance check ${finding.id}`,
        priority: "high",
        estimated_effort: "1-2 hours",
        owner_role: "Platform Team"
      })
    );
  }

  for (const finding of findings.misconfiguration) {
    result.short_term.push(
      fromFinding(finding, "short_term", kindsFor(finding), {
        description: finding.remediation_hint ?? `Fix misconfiguration: ${finding.details.title}`,
        priority: "medium",
        estimated_effort: "4-8 hours",
        owner_role: "Development Team"
      })
    );
  }

  assertImmediateOrigins(result.immediate);
  return result;
}

export function assertImmediateOrigins(actions: ReadonlyArray<RemediationAction>): void {
  for (const action of actions) {
    const { origin } = action;
    if (origin.kind !== "finding") {
      throw new InvariantViolationError(
        `Immediate action "${action.description}" has no originating finding`
      );
    }
    if (origin.category !== "vulnerability" && origin.category !== "compliance") {
      throw new InvariantViolationError(
        `Immediate action for ${origin.finding_id} originates from ${origin.category}`
      );
    }
    if (!isHighOrCritical(origin.severity)) {
      throw new InvariantViolationError(
        `Immediate action for ${origin.finding_id} originates from a ${origin.severity} finding`
      );
    }
  }
}

function fromTemplate(template: ActionTemplate, bucket: RemediationBucket): RemediationAction {
  return { ...template, bucket, origin: { kind: "template" }, correlation_kinds: [] };
}

function fromFinding(
  finding: Finding,
  bucket: RemediationBucket,
  correlationKinds: CorrelationKind[],
  template: ActionTemplate
): RemediationAction {
  return {
    ...template,
    bucket,
    origin: {
      kind: "finding",
      category: finding.category,
      finding_id: finding.id,
      severity: finding.severity
    },
    correlation_kinds: correlationKinds
  };
}

function correlationKindsFor(correlations: Correlation[]): (finding: Finding) => CorrelationKind[] {
  return (finding) =>
    correlations
      .filter(
        (correlation) =>
          CORRELATION_CATEGORIES[correlation.kind].includes(finding.category) &&
          correlation.related_finding_ids.includes(finding.id)
      )
      .map((correlation) => correlation.kind);
}
