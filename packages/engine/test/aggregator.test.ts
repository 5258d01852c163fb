import assert from "node:assert/strict";
import { test } from "node:test";
import type { Finding, SourceKind, SourceSummary } from "../../shared/src/contracts";
import { buildAnalysisResult, groupFindings, type AnalysisParts } from "../src/analysis/aggregator";
import { correlate } from "../src/analysis/correlator";
import { plan } from "../src/analysis/planner";
import { score } from "../src/analysis/scorer";
import { InvariantViolationError } from "../src/errors";
import { compliance, dependency, misconfiguration, vulnerability } from "./helpers";

const missing: SourceSummary = { status: "missing", documents: 0 };
const sources: Record<SourceKind, SourceSummary> = {
  compliance_benchmark: missing,
  vulnerability_scan: missing,
  sbom: missing,
  network_policies: missing,
  logs: missing
};

function partsFor(findings: Finding[]): AnalysisParts {
  const grouped = groupFindings(findings);
  const correlations = correlate(grouped);
  return {
    target_service: "payment-service",
    generated_at: "2025-03-01T00:00:00.000Z",
    sources,
    findings: grouped,
    correlations,
    risk_assessment: score(grouped, "payment-service"),
    remediation_plan: plan(grouped, correlations),
    warnings: []
  };
}

test("aggregated result is deep-frozen and detached from its inputs", () => {
  const parts = partsFor([
    vulnerability("CVE-1", "openssl", "critical"),
    dependency("openssl", "CVE-1"),
    compliance("5.2.5", "high")
  ]);
  const result = buildAnalysisResult(parts);

  assert.ok(Object.isFrozen(result));
  assert.ok(Object.isFrozen(result.findings.vulnerability));
  assert.ok(Object.isFrozen(result.findings.vulnerability[0].details));
  assert.ok(Object.isFrozen(result.remediation_plan.immediate[0].origin));
  assert.notEqual(result.correlations, parts.correlations);
  assert.equal(Object.isFrozen(parts.correlations), false);
  assert.deepEqual(Object.keys(result.findings), [
    "vulnerability",
    "compliance",
    "misconfiguration",
    "dependency",
    "application_error"
  ]);
});

test("the same id may appear in different categories", () => {
  const result = buildAnalysisResult(
    partsFor([compliance("KSV012", "high"), misconfiguration("KSV012", "Runs as root user")])
  );
  assert.equal(result.findings.compliance[0].id, "KSV012");
  assert.equal(result.findings.misconfiguration[0].id, "KSV012");
});

test("duplicate category and id fails loudly", () => {
  const parts = partsFor([]);
  const duplicated = {
    ...parts,
    findings: groupFindings([
      vulnerability("CVE-1", "openssl", "high"),
      vulnerability("CVE-1", "libssl3", "high")
    ])
  };
  assert.throws(() => buildAnalysisResult(duplicated), InvariantViolationError);
});

test("a correlation referencing an unknown finding fails loudly", () => {
  const parts = partsFor([compliance("5.2.5", "high")]);
  const broken: AnalysisParts = {
    ...parts,
    correlations: [
      {
        kind: "compliance_configuration_link",
        description: "dangling",
        impact_note: "none",
        related_finding_ids: ["5.2.5", "KSV999"]
      }
    ]
  };
  assert.throws(() => buildAnalysisResult(broken), /references unknown finding KSV999/);
});

test("a level that does not match the score fails loudly", () => {
  const parts = partsFor([vulnerability("CVE-1", "openssl", "critical")]);
  const skewed: AnalysisParts = {
    ...parts,
    risk_assessment: { ...parts.risk_assessment, level: "low" }
  };
  assert.throws(() => buildAnalysisResult(skewed), InvariantViolationError);
});

test("an immediate action without a qualifying origin fails loudly", () => {
  const parts = partsFor([]);
  const rogue: AnalysisParts = {
    ...parts,
    remediation_plan: {
      ...parts.remediation_plan,
      immediate: [
        {
          description: "Restart everything",
          priority: "critical",
          estimated_effort: "1 hour",
          owner_role: "Operations Team",
          bucket: "immediate",
          origin: { kind: "template" },
          correlation_kinds: []
        }
      ]
    }
  };
  assert.throws(() => buildAnalysisResult(rogue), InvariantViolationError);
});

test("an empty target service fails schema validation", () => {
  const parts = partsFor([]);
  assert.throws(
    () => buildAnalysisResult({ ...parts, target_service: "" }),
    /failed schema validation/
  );
});
