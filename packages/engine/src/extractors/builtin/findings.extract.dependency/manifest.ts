import type { ExtractorManifest } from "../../../../../core/src/extractors";

export const manifest: ExtractorManifest = {
  id: "findings.extract.dependency",
  name: "Dependency Findings",
  description: "Pair SBOM packages with the vulnerabilities that list them as affected.",
  category: "dependency",
  version: "1.0.0",
  sources: ["sbom"],
  tags: ["sbom", "spdx"]
};
