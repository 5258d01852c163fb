export type {
  ArtifactSchemas,
  ComplianceBenchmarkArtifact,
  ComplianceCheck,
  JSONSchema,
  LoadedArtifact,
  SbomArtifact,
  SbomPackage,
  SbomVulnerability,
  ScanMisconfiguration,
  ScanVulnerability,
  SourceDataset,
  SourceLoadSummary,
  StructuredArtifactMap,
  StructuredSourceKind,
  TextDocument,
  VulnerabilityScanArtifact
} from "./types";
export { getArtifactSchema, listArtifactSchemas, validateArtifactContent } from "./validation";
