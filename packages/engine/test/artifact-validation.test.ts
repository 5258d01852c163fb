import assert from "node:assert/strict";
import { test } from "node:test";
import { validateArtifactContent } from "../../core/src/artifacts";
import { validateManifest } from "../../core/src/extractors";

test("compliance benchmark requires a report object", () => {
  const result = validateArtifactContent("compliance_benchmark", { checks: [] });
  assert.equal(result.ok, false);
  assert.deepEqual(result.errors, ["must have required property 'report'"]);
});

test("vulnerability scan checks structure, not field types", () => {
  assert.deepEqual(
    validateArtifactContent("vulnerability_scan", {
      report: {
        findings: [
          { vulnerability_id: "CVE-2024-0001", severity: "CRITICAL" },
          { vulnerability_id: 42, severity: null, cvss_score: "9.8" }
        ]
      }
    }),
    { ok: true, errors: [] }
  );
  assert.deepEqual(
    validateArtifactContent("vulnerability_scan", { report: { findings: ["CVE-2024-0001"] } }),
    { ok: false, errors: ["/report/findings/0 must be object"] }
  );
});

test("sbom accepts partial package records", () => {
  const result = validateArtifactContent("sbom", {
    packages: [{ name: "openssl" }],
    vulnerabilities: []
  });
  assert.deepEqual(result, { ok: true, errors: [] });
});

test("unknown artifact types pass through", () => {
  assert.deepEqual(validateArtifactContent("unknown.json", 42), { ok: true, errors: [] });
});

test("extractor manifests must be namespaced and semver", () => {
  const result = validateManifest({
    id: "flat",
    name: "Flat",
    description: "",
    category: "vulnerability",
    version: "1",
    sources: []
  });
  assert.deepEqual(result.errors, [
    "id must be namespaced (use dots)",
    "version must be semver (x.y.z)",
    "sources must not be empty"
  ]);
});
