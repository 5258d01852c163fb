import assert from "node:assert/strict";
import { test } from "node:test";
import { createBuiltinRegistry } from "../../index";
import { runExtractorWithFixtures } from "../../../testing/harness";
import { emptyDataset } from "../../../../sources/loader";
import { Logger } from "../../../../logger";
import { extract } from "../extractor";

const ctx = { target_service: "payment-service" };

test("findings.extract.compliance matches fixtures", () => {
  const registry = createBuiltinRegistry(new Logger("error"));
  runExtractorWithFixtures(registry, "findings.extract.compliance");
});

test("findings.extract.compliance warns on missing severity and drops the check", () => {
  const dataset = emptyDataset();
  dataset.compliance_benchmark.push({
    path: "security/cis_benchmark_report.json",
    content: { report: { failed_checks_details: [{ id: "4.1.1", description: "No severity" }] } }
  });

  const result = extract(dataset, ctx);
  assert.deepEqual(result.findings, []);
  assert.deepEqual(result.warnings, [
    {
      code: "unrecognized_severity",
      source: "security/cis_benchmark_report.json",
      message: "Unrecognized severity treated as low",
      detail: "absent"
    }
  ]);
});

test("findings.extract.compliance counts repeated check ids", () => {
  const dataset = emptyDataset();
  dataset.compliance_benchmark.push({
    path: "security/cis_benchmark_report.json",
    content: {
      report: {
        failed_checks_details: [
          { id: "5.1.1", severity: "high" },
          { id: "5.1.1", severity: "high" },
          { id: "5.1.1", severity: "critical" }
        ]
      }
    }
  });

  const result = extract(dataset, ctx);
  assert.deepEqual(
    result.findings.map((finding) => finding.id),
    ["5.1.1", "5.1.1#2", "5.1.1#3"]
  );
  assert.equal(result.warnings.length, 2);
  assert.equal(result.warnings[0].code, "duplicate_finding_id");
});

test("findings.extract.compliance tolerates a report without failed checks", () => {
  const dataset = emptyDataset();
  dataset.compliance_benchmark.push({
    path: "security/cis_benchmark_report.json",
    content: { report: {} }
  });
  assert.deepEqual(extract(dataset, ctx).findings, []);
});

test("findings.extract.compliance keeps the remediation text as written", () => {
  const dataset = emptyDataset();
  dataset.compliance_benchmark.push({
    path: "security/cis_benchmark_report.json",
    content: {
      report: {
        failed_checks_details: [
          { id: 512, severity: "critical", remediation: "  Set runAsNonRoot  " },
          { id: "1.1.1", severity: "high", remediation: "   " }
        ]
      }
    }
  });

  const result = extract(dataset, ctx);
  assert.deepEqual(
    result.findings.map((finding) => [finding.id, finding.remediation_hint]),
    [
      ["512", "  Set runAsNonRoot  "],
      ["1.1.1", undefined]
    ]
  );
  assert.equal("remediation_hint" in result.findings[1], false);
});
