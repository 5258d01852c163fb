import type { ExtractorManifest } from "../../../../../core/src/extractors";

export const manifest: ExtractorManifest = {
  id: "findings.extract.compliance",
  name: "Compliance Findings",
  description: "Keep high and critical failed checks from the CIS benchmark report.",
  category: "compliance",
  version: "1.0.0",
  sources: ["compliance_benchmark"],
  tags: ["cis", "kubernetes"]
};
