export type ID = string;
export type ISODateTime = string;

export type Severity = "low" | "medium" | "high" | "critical";

export type FindingCategory =
  | "vulnerability"
  | "compliance"
  | "misconfiguration"
  | "dependency"
  | "application_error";

export type SourceKind =
  | "compliance_benchmark"
  | "vulnerability_scan"
  | "sbom"
  | "network_policies"
  | "logs";

export type SourceStatus = "loaded" | "missing" | "malformed" | "unreadable";

interface FindingBase {
  id: string;
  severity: Severity;
  description: string;
  remediation_hint?: string;
  impact_note: string;
  /** Relative path of the artifact (or document) the finding was extracted from. */
  source_artifact: string;
}

export interface VulnerabilityFinding extends FindingBase {
  category: "vulnerability";
  details: {
    package: string;
    cvss_score: number;
  };
}

export interface ComplianceFinding extends FindingBase {
  category: "compliance";
}

export type MisconfigurationKind = "container_misconfiguration" | "network_policy";

export interface MisconfigurationFinding extends FindingBase {
  category: "misconfiguration";
  details: {
    kind: MisconfigurationKind;
    title: string;
  };
}

export interface DependencyFinding extends FindingBase {
  category: "dependency";
  details: {
    package: string;
    version: string;
    vulnerability: string;
    license: string;
  };
}

export type ApplicationErrorKind = "http_error" | "pod_failure";

export interface ApplicationErrorFinding extends FindingBase {
  category: "application_error";
  details: {
    kind: ApplicationErrorKind;
    marker: string;
  };
}

export type Finding =
  | VulnerabilityFinding
  | ComplianceFinding
  | MisconfigurationFinding
  | DependencyFinding
  | ApplicationErrorFinding;

export type FindingOf<C extends FindingCategory> = Extract<Finding, { category: C }>;

export type FindingsByCategory = {
  [C in FindingCategory]: ReadonlyArray<FindingOf<C>>;
};

export type CorrelationKind =
  | "vulnerability_dependency_link"
  | "compliance_configuration_link"
  | "network_error_link";

export interface Correlation {
  kind: CorrelationKind;
  description: string;
  impact_note: string;
  /**
   * Bare finding ids, resolved within the categories the kind links. Ids are
   * only unique per category, so an id listed once may name a finding in
   * each of those categories.
   */
  related_finding_ids: string[];
}

export type RiskLevel = "low" | "medium" | "high" | "critical";

export interface RiskAssessment {
  score: number;
  level: RiskLevel;
  factors: string[];
  /**
   * Target service followed by the assumed infrastructure blast radius.
   * The infrastructure entries are a model assumption, not something the
   * analysis discovered; they are repeated in `assumed_components`.
   */
  affected_components: string[];
  assumed_components: string[];
}

export type RemediationPriority = "critical" | "high" | "medium" | "low";
export type RemediationBucket = "immediate" | "short_term" | "long_term" | "monitoring";

export type ActionOrigin =
  | {
      kind: "finding";
      category: FindingCategory;
      finding_id: string;
      severity: Severity;
    }
  | { kind: "template" };

export interface RemediationAction {
  description: string;
  priority: RemediationPriority;
  estimated_effort: string;
  owner_role: string;
  bucket: RemediationBucket;
  origin: ActionOrigin;
  correlation_kinds: CorrelationKind[];
}

export type RemediationPlan = {
  [B in RemediationBucket]: RemediationAction[];
};

export type AnalysisWarningCode =
  | "malformed_artifact"
  | "unreadable_artifact"
  | "unrecognized_severity"
  | "duplicate_finding_id";

export interface AnalysisWarning {
  code: AnalysisWarningCode;
  source: string;
  message: string;
  detail?: string;
}

export interface SourceSummary {
  status: SourceStatus;
  documents: number;
}

export interface AnalysisResult {
  target_service: string;
  generated_at: ISODateTime;
  sources: Record<SourceKind, SourceSummary>;
  findings: FindingsByCategory;
  correlations: Correlation[];
  risk_assessment: RiskAssessment;
  remediation_plan: RemediationPlan;
  warnings: AnalysisWarning[];
}

export interface AnalyzeRequest {
  target_service?: string;
  sources_dir?: string;
}

export interface AnalyzeResponse {
  result: AnalysisResult;
  /** Present when run history is enabled. */
  record?: AnalysisRecord;
}

export interface AnalysisRecord {
  id: ID;
  target_service: string;
  generated_at: ISODateTime;
  risk_score: number;
  risk_level: RiskLevel;
  finding_count: number;
  warning_count: number;
  created_at: ISODateTime;
}

export interface AnalysisListRequest {
  target_service?: string;
  limit?: number;
}

export interface AnalysisListResponse {
  analyses: AnalysisRecord[];
}

export interface AnalysisGetResponse {
  record: AnalysisRecord;
  result: AnalysisResult;
}
