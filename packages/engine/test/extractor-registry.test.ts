import assert from "node:assert/strict";
import { test } from "node:test";
import { createBuiltinRegistry, listBuiltinExtractors } from "../src/extractors/builtin";
import { StaticExtractorRegistry, type ExtractorDefinition } from "../src/extractors/registry";
import { runExtractor } from "../src/extractors/runner";
import { ExtractorNotFoundError, InvariantViolationError, ValidationError } from "../src/errors";
import { Logger } from "../src/logger";
import { emptyDataset } from "../src/sources/loader";
import { vulnerability } from "./helpers";

const logger = new Logger("error");
const ctx = { target_service: "payment-service" };

function stubExtractor(overrides: Partial<ExtractorDefinition["manifest"]> = {}): ExtractorDefinition {
  return {
    manifest: {
      id: "findings.extract.stub",
      name: "Stub",
      description: "Emits a fixed vulnerability.",
      category: "vulnerability",
      version: "0.1.0",
      sources: ["vulnerability_scan"],
      ...overrides
    },
    extract: () => ({
      findings: [vulnerability("CVE-1", "openssl", "high")],
      logs: [],
      warnings: []
    }),
    location: "."
  };
}

test("builtin registry lists extractors in pipeline order", () => {
  const registry = createBuiltinRegistry(logger);
  assert.deepEqual(
    registry.listExtractors().map((manifest) => manifest.id),
    [
      "findings.extract.vulnerability",
      "findings.extract.compliance",
      "findings.extract.misconfiguration",
      "findings.extract.dependency",
      "findings.extract.application_error"
    ]
  );
  assert.deepEqual(
    registry.listExtractors().map((manifest) => manifest.category),
    ["vulnerability", "compliance", "misconfiguration", "dependency", "application_error"]
  );
});

test("registry rejects duplicate ids", () => {
  const [first] = listBuiltinExtractors();
  assert.throws(
    () => new StaticExtractorRegistry([first, first], { logger }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.message === "Duplicate extractor id: findings.extract.vulnerability"
  );
});

test("registry rejects invalid manifests", () => {
  assert.throws(
    () => new StaticExtractorRegistry([stubExtractor({ version: "latest" })], { logger }),
    ValidationError
  );
});

test("running an unknown extractor fails", () => {
  const registry = createBuiltinRegistry(logger);
  assert.throws(
    () => runExtractor(registry, "findings.extract.unknown", emptyDataset(), ctx),
    ExtractorNotFoundError
  );
});

test("findings outside the declared category are an invariant violation", () => {
  const registry = new StaticExtractorRegistry([stubExtractor({ category: "compliance" })], {
    logger
  });
  assert.throws(
    () => runExtractor(registry, "findings.extract.stub", emptyDataset(), ctx),
    /undeclared finding category: vulnerability/
  );
  assert.throws(
    () => runExtractor(registry, "findings.extract.stub", emptyDataset(), ctx),
    InvariantViolationError
  );
});

test("a conforming extractor result passes through unchanged", () => {
  const registry = new StaticExtractorRegistry([stubExtractor()], { logger });
  const result = runExtractor(registry, "findings.extract.stub", emptyDataset(), ctx);
  assert.deepEqual(
    result.findings.map((finding) => finding.id),
    ["CVE-1"]
  );
});
