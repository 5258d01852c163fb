import type { ExtractorManifest } from "../../../../../core/src/extractors";

export const manifest: ExtractorManifest = {
  id: "findings.extract.vulnerability",
  name: "Vulnerability Findings",
  description: "Keep high and critical entries from the container vulnerability scan.",
  category: "vulnerability",
  version: "1.0.0",
  sources: ["vulnerability_scan"],
  tags: ["scanner", "cve"]
};
