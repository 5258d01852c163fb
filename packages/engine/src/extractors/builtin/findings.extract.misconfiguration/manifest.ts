import type { ExtractorManifest } from "../../../../../core/src/extractors";

export const manifest: ExtractorManifest = {
  id: "findings.extract.misconfiguration",
  name: "Misconfiguration Findings",
  description:
    "Keep high scanner misconfigurations and flag network policies that admit traffic from any source.",
  category: "misconfiguration",
  version: "1.0.0",
  sources: ["vulnerability_scan", "network_policies"],
  tags: ["scanner", "network-policy"]
};
