import type {
  AnalysisResult,
  CorrelationKind,
  FindingCategory,
  RemediationAction,
  Severity
} from "../../../shared/src/contracts";
import { FINDING_CATEGORIES } from "../analysis/aggregator";

export type ReportFormat = "comprehensive" | "pci-dss" | "3ds" | "sox";

export const REPORT_FORMATS: ReportFormat[] = ["comprehensive", "pci-dss", "3ds", "sox"];

const REPORT_TITLES: Record<ReportFormat, string> = {
  comprehensive: "Root Cause Analysis Report",
  "pci-dss": "PCI DSS Compliance RCA Report",
  "3ds": "3DS Security RCA Report",
  sox: "SOX Compliance RCA Report"
};

const CATEGORY_LABELS: Record<FindingCategory, string> = {
  vulnerability: "Vulnerabilities",
  compliance: "Compliance",
  misconfiguration: "Misconfigurations",
  dependency: "Dependencies",
  application_error: "Application Errors"
};

const SEVERITY_COLUMNS: Severity[] = ["critical", "high", "medium", "low"];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function reportTitle(format: ReportFormat, targetService: string): string {
  return `${REPORT_TITLES[format]} - ${targetService}`;
}

/**
 * Renders an analysis result as a Markdown report. The compliance-flavoured
 * formats share the comprehensive layout and differ only in the title.
 */
export function buildMarkdownReport(
  result: AnalysisResult,
  options: { format?: ReportFormat } = {}
): string {
  const format = options.format ?? "comprehensive";
  const risk = result.risk_assessment;
  const lines: string[] = [];

  lines.push(`# ${reportTitle(format, result.target_service)}`);
  lines.push("");
  lines.push(`**Generated:** ${result.generated_at}`);
  lines.push(`**Target Service:** ${result.target_service}`);
  lines.push("");

  lines.push("## Executive Summary");
  lines.push("");
  lines.push(
    `This report correlates vulnerability scans, compliance benchmarks, configuration audits and application logs affecting ${result.target_service}.`
  );
  lines.push("");
  lines.push(`**Overall Risk Level:** ${risk.level.toUpperCase()}`);
  lines.push(`**Risk Score:** ${risk.score}`);
  lines.push("");

  lines.push("## Findings Summary");
  lines.push("");
  lines.push("| Category | Critical | High | Medium | Low | Total |");
  lines.push("|----------|----------|------|--------|-----|-------|");
  for (const category of FINDING_CATEGORIES) {
    const findings = result.findings[category];
    const counts = SEVERITY_COLUMNS.map(
      (severity) => findings.filter((finding) => finding.severity === severity).length
    );
    lines.push(`| ${CATEGORY_LABELS[category]} | ${counts.join(" | ")} | ${findings.length} |`);
  }
  lines.push("");

  lines.push("## Detailed Findings");
  lines.push("");
  pushFindingDetails(lines, result);

  lines.push("## Correlation Analysis");
  lines.push("");
  if (result.correlations.length === 0) {
    lines.push("No cross-category correlations detected.");
    lines.push("");
  }
  for (const correlation of result.correlations) {
    lines.push(`### ${titleForKind(correlation.kind)}`);
    lines.push(`- **Description:** ${correlation.description}`);
    lines.push(`- **Business Impact:** ${correlation.impact_note}`);
    lines.push(`- **Related Findings:** ${correlation.related_finding_ids.join(", ")}`);
    lines.push("");
  }

  lines.push("## Risk Assessment");
  lines.push("");
  lines.push(`### Risk Level: ${risk.level.toUpperCase()}`);
  lines.push(`### Risk Score: ${risk.score}`);
  lines.push("");
  lines.push("### Risk Factors");
  if (risk.factors.length === 0) {
    lines.push("- None");
  }
  for (const factor of risk.factors) {
    lines.push(`- ${factor}`);
  }
  lines.push("");
  lines.push("### Affected Components");
  const assumed = new Set(risk.assumed_components);
  for (const component of risk.affected_components) {
    lines.push(assumed.has(component) ? `- ${component} (assumed)` : `- ${component}`);
  }
  lines.push("");
  lines.push(
    "_Assumed components reflect the blast radius the risk model presumes; they were not observed in the sources._"
  );
  lines.push("");

  lines.push("## Remediation Plan");
  lines.push("");
  pushActions(lines, "Immediate Actions (Execute within 24 hours)", result.remediation_plan.immediate);
  pushActions(lines, "Short-term Fixes (Execute within 1 week)", result.remediation_plan.short_term);
  pushActions(
    lines,
    "Long-term Improvements (Execute within 1 month)",
    result.remediation_plan.long_term
  );

  lines.push("## Monitoring Recommendations");
  lines.push("");
  for (const action of result.remediation_plan.monitoring) {
    lines.push(`- ${action.description}`);
  }
  lines.push("");

  lines.push("## Compliance Mapping");
  lines.push("");
  lines.push("### PCI DSS Requirements");
  lines.push("- **Requirement 6.1:** Develop and maintain secure systems and applications");
  lines.push("- **Requirement 6.2:** Ensure systems are protected from known vulnerabilities");
  lines.push("- **Requirement 11.2.3:** Regular external vulnerability scans");
  lines.push("");
  lines.push("### 3DS Security Requirements");
  lines.push("- **Requirement 3.1.1:** Secure development and maintenance processes");
  lines.push("- **Requirement 3.2.1:** Vulnerability management program");
  lines.push("- **Requirement 3.5.1:** Secure software development lifecycle");
  lines.push("");
  lines.push("### SOX Compliance");
  lines.push("- **Section 404:** Internal controls over financial reporting");
  lines.push("- **Risk Assessment:** Identification and analysis of relevant risks");
  lines.push("- **Control Activities:** Policies and procedures for risk mitigation");
  lines.push("");

  lines.push("## Warnings");
  lines.push("");
  if (result.warnings.length === 0) {
    lines.push("No warnings.");
  }
  for (const warning of result.warnings) {
    const detail = warning.detail ? ` (${warning.detail})` : "";
    lines.push(`- \`${warning.code}\` ${warning.source}: ${warning.message}${detail}`);
  }
  lines.push("");

  return lines.join("\n");
}

function pushFindingDetails(lines: string[], result: AnalysisResult): void {
  const { findings } = result;

  lines.push("### Vulnerabilities");
  lines.push("");
  if (findings.vulnerability.length === 0) {
    lines.push("None.");
    lines.push("");
  }
  for (const finding of findings.vulnerability) {
    lines.push(`#### ${finding.id} - ${finding.details.package}`);
    lines.push(`- **Severity:** ${finding.severity.toUpperCase()}`);
    lines.push(`- **CVSS Score:** ${finding.details.cvss_score}`);
    lines.push(`- **Description:** ${finding.description}`);
    lines.push(`- **Impact:** ${finding.impact_note}`);
    lines.push("");
  }

  lines.push("### Compliance Failures");
  lines.push("");
  if (findings.compliance.length === 0) {
    lines.push("None.");
    lines.push("");
  }
  for (const finding of findings.compliance) {
    lines.push(`#### ${finding.id}`);
    lines.push(`- **Severity:** ${finding.severity.toUpperCase()}`);
    lines.push(`- **Description:** ${finding.description}`);
    lines.push(`- **Remediation:** ${finding.remediation_hint ?? "Not provided"}`);
    lines.push(`- **Impact:** ${finding.impact_note}`);
    lines.push("");
  }

  lines.push("### Misconfigurations");
  lines.push("");
  if (findings.misconfiguration.length === 0) {
    lines.push("None.");
    lines.push("");
  }
  for (const finding of findings.misconfiguration) {
    lines.push(`#### ${finding.details.title}`);
    lines.push(`- **Type:** ${finding.details.kind}`);
    lines.push(`- **Severity:** ${finding.severity.toUpperCase()}`);
    lines.push(`- **Issue:** ${finding.description}`);
    lines.push(`- **Resolution:** ${finding.remediation_hint ?? "Not provided"}`);
    lines.push(`- **Source:** ${finding.source_artifact}`);
    lines.push("");
  }

  lines.push("### Dependencies");
  lines.push("");
  if (findings.dependency.length === 0) {
    lines.push("None.");
    lines.push("");
  }
  for (const finding of findings.dependency) {
    lines.push(`#### ${finding.details.package} ${finding.details.version}`);
    lines.push(`- **Vulnerability:** ${finding.details.vulnerability}`);
    lines.push(`- **Severity:** ${finding.severity.toUpperCase()}`);
    lines.push(`- **License:** ${finding.details.license}`);
    lines.push("");
  }

  lines.push("### Application Errors");
  lines.push("");
  if (findings.application_error.length === 0) {
    lines.push("None.");
    lines.push("");
  }
  for (const finding of findings.application_error) {
    lines.push(`#### ${finding.description}`);
    lines.push(`- **Type:** ${finding.details.kind}`);
    lines.push(`- **Marker:** ${finding.details.marker}`);
    lines.push(`- **Severity:** ${finding.severity.toUpperCase()}`);
    lines.push(`- **Source:** ${finding.source_artifact}`);
    lines.push(`- **Impact:** ${finding.impact_note}`);
    lines.push("");
  }
}

function pushActions(
  lines: string[],
  heading: string,
  actions: ReadonlyArray<RemediationAction>
): void {
  lines.push(`### ${heading}`);
  lines.push("");
  if (actions.length === 0) {
    lines.push("None.");
    lines.push("");
  }
  for (const action of actions) {
    lines.push(`#### ${action.description}`);
    lines.push(`- **Priority:** ${action.priority.toUpperCase()}`);
    lines.push(`- **Estimated Time:** ${action.estimated_effort}`);
    lines.push(`- **Owner:** ${action.owner_role}`);
    if (action.correlation_kinds.length > 0) {
      lines.push(`- **Correlated With:** ${action.correlation_kinds.map(titleForKind).join(", ")}`);
    }
    lines.push("");
  }
}

function titleForKind(kind: CorrelationKind): string {
  return kind
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
