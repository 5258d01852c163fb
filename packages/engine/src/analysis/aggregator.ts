import type {
  AnalysisResult,
  AnalysisWarning,
  Correlation,
  Finding,
  FindingCategory,
  FindingOf,
  FindingsByCategory,
  RemediationPlan,
  RiskAssessment,
  SourceKind,
  SourceSummary
} from "../../../shared/src/contracts";
import { validateArtifactContent } from "../../../core/src/artifacts";
import { InvariantViolationError } from "../errors";
import { assertImmediateOrigins } from "./planner";
import { levelForScore } from "./scorer";

export const FINDING_CATEGORIES: FindingCategory[] = [
  "vulnerability",
  "compliance",
  "misconfiguration",
  "dependency",
  "application_error"
];

export interface AnalysisParts {
  target_service: string;
  generated_at: string;
  sources: Record<SourceKind, SourceSummary>;
  findings: FindingsByCategory;
  correlations: Correlation[];
  risk_assessment: RiskAssessment;
  remediation_plan: RemediationPlan;
  warnings: AnalysisWarning[];
}

export function groupFindings(findings: ReadonlyArray<Finding>): FindingsByCategory {
  const grouped: { [C in FindingCategory]: Array<FindingOf<C>> } = {
    vulnerability: [],
    compliance: [],
    misconfiguration: [],
    dependency: [],
    application_error: []
  };
  for (const finding of findings) {
    switch (finding.category) {
      case "vulnerability":
        grouped.vulnerability.push(finding);
        break;
      case "compliance":
        grouped.compliance.push(finding);
        break;
      case "misconfiguration":
        grouped.misconfiguration.push(finding);
        break;
      case "dependency":
        grouped.dependency.push(finding);
        break;
      case "application_error":
        grouped.application_error.push(finding);
        break;
    }
  }
  return grouped;
}

export function countFindings(findings: FindingsByCategory): number {
  return FINDING_CATEGORIES.reduce((total, category) => total + findings[category].length, 0);
}

/**
 * Assembles the immutable result of one run. The parts are copied, checked
 * against the result invariants and deep-frozen; any violation is a bug in
 * the pipeline and throws.
 */
export function buildAnalysisResult(parts: AnalysisParts): AnalysisResult {
  const result: AnalysisResult = structuredClone({
    target_service: parts.target_service,
    generated_at: parts.generated_at,
    sources: parts.sources,
    findings: {
      vulnerability: parts.findings.vulnerability,
      compliance: parts.findings.compliance,
      misconfiguration: parts.findings.misconfiguration,
      dependency: parts.findings.dependency,
      application_error: parts.findings.application_error
    },
    correlations: parts.correlations,
    risk_assessment: parts.risk_assessment,
    remediation_plan: parts.remediation_plan,
    warnings: parts.warnings
  });

  assertResultInvariants(result);
  return deepFreeze(result);
}

export function assertResultInvariants(result: AnalysisResult): void {
  const keys = new Set<string>();
  const ids = new Set<string>();
  for (const category of FINDING_CATEGORIES) {
    for (const finding of result.findings[category]) {
      if (finding.category !== category) {
        throw new InvariantViolationError(
          `Finding ${finding.id} of category ${finding.category} grouped under ${category}`
        );
      }
      const key = `${category}\u0000${finding.id}`;
      if (keys.has(key)) {
        throw new InvariantViolationError(`Duplicate finding key (${category}, ${finding.id})`);
      }
      keys.add(key);
      ids.add(finding.id);
    }
  }

  for (const correlation of result.correlations) {
    if (correlation.related_finding_ids.length === 0) {
      throw new InvariantViolationError(`Correlation ${correlation.kind} references no findings`);
    }
    for (const id of correlation.related_finding_ids) {
      if (!ids.has(id)) {
        throw new InvariantViolationError(
          `Correlation ${correlation.kind} references unknown finding ${id}`
        );
      }
    }
  }

  const { score, level } = result.risk_assessment;
  if (level !== levelForScore(score)) {
    throw new InvariantViolationError(`Risk level ${level} does not match score ${score}`);
  }

  assertImmediateOrigins(result.remediation_plan.immediate);

  const validation = validateArtifactContent("analysis_result.json", result);
  if (!validation.ok) {
    throw new InvariantViolationError(
      `Analysis result failed schema validation: ${validation.errors.join("; ")}`
    );
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
