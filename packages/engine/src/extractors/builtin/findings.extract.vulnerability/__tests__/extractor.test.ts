import assert from "node:assert/strict";
import { test } from "node:test";
import { createBuiltinRegistry } from "../../index";
import { runExtractorWithFixtures } from "../../../testing/harness";
import { emptyDataset } from "../../../../sources/loader";
import { Logger } from "../../../../logger";
import { extract } from "../extractor";

const ctx = { target_service: "payment-service" };

test("findings.extract.vulnerability matches fixtures", () => {
  const registry = createBuiltinRegistry(new Logger("error"));
  const result = runExtractorWithFixtures(registry, "findings.extract.vulnerability");
  assert.deepEqual(result.logs[0].data, { kept: 3, skipped: 2 });
});

test("findings.extract.vulnerability yields nothing for low and medium entries", () => {
  const dataset = emptyDataset();
  dataset.vulnerability_scan.push({
    path: "security/trivy_vulnerability_report.json",
    content: {
      report: {
        findings: [
          { vulnerability_id: "CVE-2024-1000", package_name: "busybox", severity: "LOW" },
          { vulnerability_id: "CVE-2024-1001", package_name: "busybox", severity: "Medium" }
        ]
      }
    }
  });

  const result = extract(dataset, ctx);
  assert.deepEqual(result.findings, []);
  assert.deepEqual(result.warnings, []);
});

test("findings.extract.vulnerability defaults absent fields", () => {
  const dataset = emptyDataset();
  dataset.vulnerability_scan.push({
    path: "security/trivy_vulnerability_report.json",
    content: { report: { findings: [{ severity: " critical " }] } }
  });

  const [finding] = extract(dataset, ctx).findings;
  assert.equal(finding.id, "unknown");
  assert.equal(finding.severity, "critical");
  assert.equal(finding.description, "unknown");
  assert.equal(finding.category, "vulnerability");
  if (finding.category === "vulnerability") {
    assert.deepEqual(finding.details, { package: "unknown", cvss_score: 0 });
  }
});

test("findings.extract.vulnerability keeps good entries beside mistyped ones", () => {
  const dataset = emptyDataset();
  dataset.vulnerability_scan.push({
    path: "security/trivy_vulnerability_report.json",
    content: {
      report: {
        findings: [
          { vulnerability_id: "CVE-2024-0001", package_name: "openssl", severity: "CRITICAL", cvss_score: 9.8 },
          { vulnerability_id: "CVE-2024-0002", package_name: "zlib", severity: null },
          { vulnerability_id: "CVE-2024-0003", package_name: "curl", severity: "HIGH", cvss_score: "7.5" }
        ]
      }
    }
  });

  const result = extract(dataset, ctx);
  assert.deepEqual(
    result.findings.map((finding) =>
      finding.category === "vulnerability" ? [finding.id, finding.details.cvss_score] : []
    ),
    [
      ["CVE-2024-0001", 9.8],
      ["CVE-2024-0003", 0]
    ]
  );
  assert.deepEqual(result.warnings, [
    {
      code: "unrecognized_severity",
      source: "security/trivy_vulnerability_report.json",
      message: "Unrecognized severity treated as low",
      detail: "null"
    }
  ]);
});
