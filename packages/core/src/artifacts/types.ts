import type { SourceKind, SourceStatus } from "../../../shared/src/contracts";

export type JSONSchema = Record<string, unknown>;

/**
 * Raw scanner records. Field values are not trusted: the artifact schemas
 * only check structure, and extractors narrow each field as they read it.
 */
export interface ComplianceCheck {
  id?: unknown;
  description?: unknown;
  severity?: unknown;
  remediation?: unknown;
}

export interface ComplianceBenchmarkArtifact {
  report: {
    benchmark?: unknown;
    failed_checks_details?: ComplianceCheck[];
  };
}

export interface ScanVulnerability {
  vulnerability_id?: unknown;
  package_name?: unknown;
  installed_version?: unknown;
  severity?: unknown;
  cvss_score?: unknown;
  description?: unknown;
}

export interface ScanMisconfiguration {
  id?: unknown;
  title?: unknown;
  severity?: unknown;
  message?: unknown;
  resolution?: unknown;
}

export interface VulnerabilityScanArtifact {
  report: {
    target?: unknown;
    findings?: ScanVulnerability[];
    misconfigurations?: ScanMisconfiguration[];
  };
}

export interface SbomPackage {
  SPDXID?: unknown;
  name?: unknown;
  versionInfo?: unknown;
  licenseConcluded?: unknown;
}

export interface SbomVulnerability {
  name?: unknown;
  severity?: unknown;
  affectedPackages?: unknown;
}

export interface SbomArtifact {
  packages?: SbomPackage[];
  vulnerabilities?: SbomVulnerability[];
}

export interface TextDocument {
  filename: string;
  content: string;
}

export interface LoadedArtifact<T> {
  /** Path relative to the sources root, with forward slashes. */
  path: string;
  content: T;
}

export interface SourceDataset {
  compliance_benchmark: Array<LoadedArtifact<ComplianceBenchmarkArtifact>>;
  vulnerability_scan: Array<LoadedArtifact<VulnerabilityScanArtifact>>;
  sbom: Array<LoadedArtifact<SbomArtifact>>;
  network_policies: TextDocument[];
  logs: TextDocument[];
}

export type StructuredSourceKind = Extract<
  SourceKind,
  "compliance_benchmark" | "vulnerability_scan" | "sbom"
>;

export type StructuredArtifactMap = {
  compliance_benchmark: ComplianceBenchmarkArtifact;
  vulnerability_scan: VulnerabilityScanArtifact;
  sbom: SbomArtifact;
};

export interface SourceLoadSummary {
  kind: SourceKind;
  status: SourceStatus;
  documents: number;
}

export type ArtifactSchemas = Record<string, JSONSchema>;
