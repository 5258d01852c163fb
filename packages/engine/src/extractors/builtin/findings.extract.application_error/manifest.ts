import type { ExtractorManifest } from "../../../../../core/src/extractors";

export const manifest: ExtractorManifest = {
  id: "findings.extract.application_error",
  name: "Application Error Findings",
  description: "Scan log documents for HTTP 405 responses and crash-looping pods.",
  category: "application_error",
  version: "1.0.0",
  sources: ["logs"],
  tags: ["logs", "kubernetes"]
};
