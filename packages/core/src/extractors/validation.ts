import type { SourceKind } from "../../../shared/src/contracts";
import type { ExtractionResult, ExtractorManifest } from "./types";

const SOURCE_KINDS: ReadonlySet<SourceKind> = new Set<SourceKind>([
  "compliance_benchmark",
  "vulnerability_scan",
  "sbom",
  "network_policies",
  "logs"
]);

export function validateManifest(manifest: ExtractorManifest): { ok: boolean; errors: string[] } {
  const errors: string[] = [];
  if (!manifest.id.includes(".")) {
    errors.push("id must be namespaced (use dots)");
  }
  if (!isSemver(manifest.version)) {
    errors.push("version must be semver (x.y.z)");
  }
  if (manifest.sources.length === 0) {
    errors.push("sources must not be empty");
  }
  for (const source of manifest.sources) {
    if (!SOURCE_KINDS.has(source)) {
      errors.push(`unknown source kind: ${source}`);
    }
  }
  return { ok: errors.length === 0, errors };
}

export function validateExtractionResult(
  result: ExtractionResult,
  manifest: ExtractorManifest
): { ok: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const log of result.logs) {
    if (!log.level || !log.message) {
      errors.push("log entries must include level and message");
      break;
    }
  }

  const seen = new Set<string>();
  for (const finding of result.findings) {
    if (finding.category !== manifest.category) {
      errors.push(`undeclared finding category: ${finding.category}`);
    }
    if (!finding.id) {
      errors.push("findings must include an id");
    } else if (seen.has(finding.id)) {
      errors.push(`duplicate finding id: ${finding.id}`);
    }
    seen.add(finding.id);
  }

  return { ok: errors.length === 0, errors };
}

function isSemver(value: string): boolean {
  return /^\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?$/.test(value);
}
